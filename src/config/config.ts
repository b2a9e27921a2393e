import type { TimeRangePreset } from '../types/metrics';

export interface AppConfig {
  prometheusUrl: string;
  prometheusToken?: string | undefined;
  defaultRange: TimeRangePreset;
  queryConcurrency?: number | undefined;
  queryTimeoutMs?: number | undefined;
}

const RANGE_PRESETS: readonly TimeRangePreset[] = ['1h', '6h', '24h', '7d', '30d'];

export function getConfig(): AppConfig {
  return {
    prometheusUrl: process.env.PROMETHEUS_URL || 'http://localhost:9090',
    prometheusToken: process.env.PROMETHEUS_TOKEN || undefined,
    defaultRange: parseRangePreset(process.env.GOVERNANCE_DEFAULT_RANGE) ?? '24h',
    queryConcurrency: parseIntegerVar('GOVERNANCE_QUERY_CONCURRENCY'),
    queryTimeoutMs: parseIntegerVar('GOVERNANCE_QUERY_TIMEOUT_MS')
  };
}

export function parseRangePreset(value: string | undefined): TimeRangePreset | undefined {
  return RANGE_PRESETS.find(preset => preset === value);
}

// Left to the options schema to reject non-positive values
function parseIntegerVar(name: string): number | undefined {
  const raw = getEnvVar(name);
  if (raw === undefined) return undefined;
  const value = Number(raw);
  if (!Number.isInteger(value)) {
    throw new Error(`Environment variable ${name} must be an integer, got "${raw}"`);
  }
  return value;
}

export function getEnvVar(name: string, defaultValue?: string): string | undefined {
  return process.env[name] || defaultValue;
}
