import { getLogger } from '@fluidware-it/saddlebag';
import { runWorkerPool } from './workerPool';
import type { EngineOptions } from '../config/options';
import { InvalidConfigurationError, errorMessage } from '../errors';
import type {
  MetricAggregation,
  MetricQuerySpec,
  MetricSampleSeries,
  MetricsCollaborator,
  QueryOutcome,
  ResolvedOutcome,
  ResolvedWorkload,
  TimeRangeInput,
  TimeRangePreset
} from '../types/metrics';
import type { QueryStatistics, WindowUsed } from '../types/report';
import { RESOURCE_KINDS, selectorKey, type ResourceKind, type WorkloadSelector } from '../types/resources';

const logger = getLogger();

export const RANGE_PRESET_SECONDS: Record<TimeRangePreset, number> = {
  '1h': 3600,
  '6h': 6 * 3600,
  '24h': 24 * 3600,
  '7d': 7 * 86400,
  '30d': 30 * 86400
};

// Candidate steps in seconds, finest first
export const STEP_LADDER = [15, 30, 60, 120, 300, 600, 900, 1800, 3600, 7200, 10800, 21600, 43200, 86400];

const AGGREGATION: Record<ResourceKind, MetricAggregation> = {
  cpu: 'avg',
  memory: 'max'
};

export interface QueryWindow {
  start: Date;
  end: Date;
  stepSeconds: number;
}

export interface PlannedQuery {
  key: string;
  spec: MetricQuerySpec;
}

export interface QueryPlan {
  window: QueryWindow;
  selectors: WorkloadSelector[];
  queries: PlannedQuery[];
}

export interface PlanExecution {
  workloads: ResolvedWorkload[];
  statistics: QueryStatistics;
}

export type ExecutionOptions = Pick<EngineOptions, 'concurrency' | 'queryTimeoutMs' | 'queryRetries' | 'batchDeadlineMs'>;

// Smallest ladder step that keeps a series at or under maxSamples points
export function stepForRange(rangeSeconds: number, maxSamples: number): number {
  const step = STEP_LADDER.find(candidate => rangeSeconds / candidate <= maxSamples);
  if (step === undefined) {
    throw new InvalidConfigurationError([
      `timeRange: ${rangeSeconds}s cannot be sampled with at most ${maxSamples} points per series`
    ]);
  }
  return step;
}

// Resolves a preset or custom range against `now`. The end is clamped to `now`
// so no query ever asks for samples from the future.
export function prepareQueryWindow(range: TimeRangeInput, now: Date, maxSamples: number): QueryWindow {
  let start: Date;
  let end: Date;
  if (typeof range === 'string') {
    end = now;
    start = new Date(now.getTime() - RANGE_PRESET_SECONDS[range] * 1000);
  } else {
    if (Number.isNaN(range.start.getTime()) || Number.isNaN(range.end.getTime())) {
      throw new InvalidConfigurationError(['timeRange: start and end must be valid dates']);
    }
    start = range.start;
    end = range.end.getTime() > now.getTime() ? now : range.end;
  }

  if (start.getTime() >= end.getTime()) {
    throw new InvalidConfigurationError(['timeRange: start must be before end (and before the current time)']);
  }

  const rangeSeconds = (end.getTime() - start.getTime()) / 1000;
  return { start, end, stepSeconds: stepForRange(rangeSeconds, maxSamples) };
}

export function windowUsed(window: QueryWindow): WindowUsed {
  return { start: window.start.toISOString(), end: window.end.toISOString(), stepSeconds: window.stepSeconds };
}

function queryKey(selector: WorkloadSelector, resource: ResourceKind): string {
  return `${selectorKey(selector)}#${resource}`;
}

// One query per workload container and resource kind; replicas of the same container collapse
export function planQueries(selectors: readonly WorkloadSelector[], window: QueryWindow): QueryPlan {
  const unique = new Map<string, WorkloadSelector>();
  for (const selector of selectors) {
    const key = selectorKey(selector);
    if (!unique.has(key)) unique.set(key, selector);
  }

  const planned = [...unique.values()];
  const queries = planned.flatMap(selector =>
    RESOURCE_KINDS.map(resource => ({
      key: queryKey(selector, resource),
      spec: {
        resource,
        aggregation: AGGREGATION[resource],
        selector,
        start: window.start,
        end: window.end,
        stepSeconds: window.stepSeconds
      }
    }))
  );

  return { window, selectors: planned, queries };
}

const DEADLINE = 'deadline-exceeded';
const TIMEOUT = 'query-timeout';

type AttemptResult =
  | { kind: 'ok'; series: MetricSampleSeries }
  | { kind: 'error'; error: unknown }
  | { kind: 'timeout' }
  | { kind: 'deadline' };

async function attemptQuery(
  collaborator: MetricsCollaborator,
  spec: MetricQuerySpec,
  timeoutMs: number,
  batchSignal: AbortSignal
): Promise<AttemptResult> {
  const controller = new AbortController();
  const onBatchAbort = (): void => controller.abort(DEADLINE);
  batchSignal.addEventListener('abort', onBatchAbort, { once: true });
  const timer = setTimeout(() => controller.abort(TIMEOUT), timeoutMs);

  const aborted = new Promise<AttemptResult>(resolve => {
    controller.signal.addEventListener(
      'abort',
      () => resolve(controller.signal.reason === DEADLINE ? { kind: 'deadline' } : { kind: 'timeout' }),
      { once: true }
    );
  });
  const query = collaborator.query(spec, controller.signal).then(
    (series): AttemptResult => ({ kind: 'ok', series }),
    (error: unknown): AttemptResult => ({ kind: 'error', error })
  );

  try {
    return await Promise.race([query, aborted]);
  } finally {
    clearTimeout(timer);
    batchSignal.removeEventListener('abort', onBatchAbort);
  }
}

async function runQuery(
  collaborator: MetricsCollaborator,
  planned: PlannedQuery,
  options: ExecutionOptions,
  batchSignal: AbortSignal
): Promise<ResolvedOutcome> {
  const maxAttempts = options.queryRetries + 1;
  let lastError = '';

  for (let attempt = 1; attempt <= maxAttempts; attempt++) {
    if (batchSignal.aborted) return { status: 'skipped', reason: 'deadline-exceeded' };
    const result = await attemptQuery(collaborator, planned.spec, options.queryTimeoutMs, batchSignal);
    switch (result.kind) {
      case 'ok':
        return { status: 'succeeded', series: result.series, attempts: attempt };
      case 'timeout':
        logger.warn(`Metric query ${planned.key} timed out after ${options.queryTimeoutMs}ms`);
        return { status: 'timed-out', attempts: attempt };
      case 'deadline':
        return { status: 'skipped', reason: 'deadline-exceeded' };
      case 'error':
        lastError = errorMessage(result.error);
        logger.warn(`Metric query ${planned.key} failed (attempt ${attempt}/${maxAttempts}): ${lastError}`);
    }
  }

  return { status: 'failed', message: lastError, attempts: maxAttempts };
}

function resolvePending(outcome: QueryOutcome | undefined): ResolvedOutcome {
  if (!outcome || outcome.status === 'pending') return { status: 'skipped', reason: 'deadline-exceeded' };
  return outcome;
}

export function summarizeOutcomes(workloads: readonly ResolvedWorkload[]): QueryStatistics {
  const statistics: QueryStatistics = { total: 0, succeeded: 0, failed: 0, timedOut: 0, skipped: 0 };
  for (const workload of workloads) {
    for (const outcome of [workload.cpu, workload.memory]) {
      statistics.total++;
      if (outcome.status === 'succeeded') statistics.succeeded++;
      else if (outcome.status === 'failed') statistics.failed++;
      else if (outcome.status === 'timed-out') statistics.timedOut++;
      else statistics.skipped++;
    }
  }
  return statistics;
}

// Executes a plan with a bounded worker pool. Individual failures are recorded,
// never thrown; the result lists every planned workload with both outcomes resolved.
export async function executePlan(
  plan: QueryPlan,
  collaborator: MetricsCollaborator,
  options: ExecutionOptions
): Promise<PlanExecution> {
  const outcomes = new Map<string, QueryOutcome>(plan.queries.map(q => [q.key, { status: 'pending' }]));
  const batch = new AbortController();
  const deadline =
    options.batchDeadlineMs === null ? undefined : setTimeout(() => batch.abort(DEADLINE), options.batchDeadlineMs);

  logger.info(
    `Executing ${plan.queries.length} metric queries for ${plan.selectors.length} workload container(s) ` +
      `(concurrency ${options.concurrency}, step ${plan.window.stepSeconds}s)`
  );

  try {
    await runWorkerPool(
      plan.queries,
      options.concurrency,
      async planned => {
        outcomes.set(planned.key, await runQuery(collaborator, planned, options, batch.signal));
      },
      batch.signal
    );
  } finally {
    clearTimeout(deadline);
  }

  if (batch.signal.aborted) {
    logger.warn(`Metric batch deadline of ${options.batchDeadlineMs}ms exceeded; unresolved queries were skipped`);
  }

  const workloads = plan.selectors.map(selector => ({
    selector,
    cpu: resolvePending(outcomes.get(queryKey(selector, 'cpu'))),
    memory: resolvePending(outcomes.get(queryKey(selector, 'memory')))
  }));
  return { workloads, statistics: summarizeOutcomes(workloads) };
}
