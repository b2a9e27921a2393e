import type { MetricQuerySpec } from '../types/metrics';
import type { WorkloadSelector } from '../types/resources';

const MIN_RATE_WINDOW_SECONDS = 300;

function escapeRegex(value: string): string {
  // Backslashes are doubled once more for the PromQL string literal
  return value.replace(/[.*+?^${}()|[\]\\]/g, match => `\\\\${match}`);
}

// Pod name pattern generated by each controller kind for its pods
export function podNamePattern(selector: WorkloadSelector): string {
  const name = escapeRegex(selector.workloadName);
  switch (selector.workloadKind) {
    case 'Deployment':
      return `${name}-[a-z0-9]+-[a-z0-9]+`;
    case 'StatefulSet':
      return `${name}-[0-9]+`;
    case 'CronJob':
      return `${name}-[0-9]+-[a-z0-9]+`;
    case 'DaemonSet':
    case 'ReplicaSet':
    case 'Job':
      return `${name}-[a-z0-9]+`;
    default:
      return name;
  }
}

function labelMatchers(selector: WorkloadSelector): string {
  return [
    `namespace="${selector.namespace}"`,
    `pod=~"${podNamePattern(selector)}"`,
    `container="${selector.containerName}"`
  ].join(',');
}

export function renderQuery(spec: MetricQuerySpec): string {
  const matchers = labelMatchers(spec.selector);
  if (spec.resource === 'cpu') {
    const rateWindow = Math.max(MIN_RATE_WINDOW_SECONDS, spec.stepSeconds);
    return `${spec.aggregation}(rate(container_cpu_usage_seconds_total{${matchers}}[${rateWindow}s]))`;
  }
  return `${spec.aggregation}(container_memory_working_set_bytes{${matchers}})`;
}
