// Raised at engine entry when options or the time range cannot be used as given
export class InvalidConfigurationError extends Error {
  readonly issues: string[];

  constructor(issues: string[]) {
    super(`Invalid configuration: ${issues.join('; ')}`);
    this.name = 'InvalidConfigurationError';
    this.issues = issues;
  }
}

// Raised when nothing can be reported for a scope (no workload could be listed)
export class ScopeUnavailableError extends Error {
  readonly scope: string;

  constructor(scope: string, reason: string, options?: { cause?: unknown }) {
    super(`Cannot analyze ${scope}: ${reason}`, options);
    this.name = 'ScopeUnavailableError';
    this.scope = scope;
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
