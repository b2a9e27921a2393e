import type { ResourceKind, WorkloadSelector } from './resources';

export type TimeRangePreset = '1h' | '6h' | '24h' | '7d' | '30d';

export interface TimeWindow {
  start: Date;
  end: Date;
}

export type TimeRangeInput = TimeRangePreset | TimeWindow;

export type MetricAggregation = 'avg' | 'max';

export interface MetricQuerySpec {
  resource: ResourceKind;
  aggregation: MetricAggregation;
  selector: WorkloadSelector;
  start: Date;
  end: Date;
  stepSeconds: number;
}

export interface MetricSample {
  timestamp: number; // unix seconds
  value: number;
}

// cpu values are millicores, memory values are bytes
export interface MetricSampleSeries {
  samples: MetricSample[];
}

export interface MetricsCollaborator {
  query(spec: MetricQuerySpec, signal: AbortSignal): Promise<MetricSampleSeries>;
}

export type QueryOutcome =
  | { status: 'pending' }
  | { status: 'succeeded'; series: MetricSampleSeries; attempts: number }
  | { status: 'failed'; message: string; attempts: number }
  | { status: 'timed-out'; attempts: number }
  | { status: 'skipped'; reason: 'deadline-exceeded' };

export type ResolvedOutcome = Exclude<QueryOutcome, { status: 'pending' }>;

export interface ResolvedWorkload {
  selector: WorkloadSelector;
  cpu: ResolvedOutcome;
  memory: ResolvedOutcome;
}
