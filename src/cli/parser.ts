import type { AnalysisScope } from '../types/k8s';

export interface CliArgs {
  namespace: string;
  allNamespaces: boolean;
  workload?: string | undefined;
  context?: string | undefined;
  range?: string | undefined;
  percentile?: number | undefined;
  history: boolean;
}

export function parseArgs(args: string[]): CliArgs {
  const result: CliArgs = {
    namespace: 'default',
    allNamespaces: false,
    workload: undefined,
    context: undefined,
    range: undefined,
    percentile: undefined,
    history: true
  };

  const positionalArgs: string[] = [];
  let i = 0;

  while (i < args.length) {
    const arg = args[i];

    // Handle --context or -c
    if (arg === '--context' || arg === '-c') {
      result.context = args[i + 1];
      i += 2;
      continue;
    }

    // Handle --context=value
    if (arg?.startsWith('--context=')) {
      result.context = arg.split('=')[1];
      i++;
      continue;
    }

    // Handle --workload or -w
    if (arg === '--workload' || arg === '-w') {
      result.workload = args[i + 1];
      i += 2;
      continue;
    }

    if (arg?.startsWith('--workload=')) {
      result.workload = arg.split('=')[1];
      i++;
      continue;
    }

    // Handle --range or -r
    if (arg === '--range' || arg === '-r') {
      result.range = args[i + 1];
      i += 2;
      continue;
    }

    if (arg?.startsWith('--range=')) {
      result.range = arg.split('=')[1];
      i++;
      continue;
    }

    if (arg === '--percentile' || arg?.startsWith('--percentile=')) {
      const raw = arg === '--percentile' ? args[i + 1] : arg.split('=')[1];
      result.percentile = raw === undefined ? undefined : Number(raw);
      i += arg === '--percentile' ? 2 : 1;
      continue;
    }

    // Handle --all (whole cluster)
    if (arg === '--all' || arg === '-A') {
      result.allNamespaces = true;
      i++;
      continue;
    }

    if (arg === '--no-history') {
      result.history = false;
      i++;
      continue;
    }

    // Collect positional arguments
    if (arg && !arg.startsWith('-')) {
      positionalArgs.push(arg);
    }

    i++;
  }

  // First positional argument is the namespace
  const [namespace] = positionalArgs;
  if (namespace) {
    result.namespace = namespace;
  }

  return result;
}

export function scopeFromArgs(args: CliArgs): AnalysisScope {
  if (args.allNamespaces) return { kind: 'cluster' };
  if (args.workload) return { kind: 'workload', namespace: args.namespace, workload: args.workload };
  return { kind: 'namespace', namespace: args.namespace };
}
