import type { EngineOptions } from '../config/options';
import type { MetricSample, MetricSampleSeries, ResolvedOutcome } from '../types/metrics';
import type { Confidence, InsufficientReason, Recommendation, WindowUsed } from '../types/report';
import type { ResourceKind } from '../types/resources';

export type ReducerOptions = Pick<
  EngineOptions,
  | 'percentile'
  | 'minSamples'
  | 'minDurationSeconds'
  | 'cpuLimitRatio'
  | 'memoryLimitRatio'
  | 'seasonalityWindows'
  | 'seasonalityCvThreshold'
  | 'cpuGranularityMillicores'
  | 'memoryGranularityBytes'
>;

// Tolerates float noise so that e.g. 195.00000000000003 stays 195
const ROUNDING_EPSILON = 1e-9;

export function percentile(sortedValues: readonly number[], p: number): number {
  if (sortedValues.length === 0) {
    throw new Error('percentile of an empty set');
  }
  const rank = (p / 100) * (sortedValues.length - 1);
  const lower = Math.floor(rank);
  const upper = Math.ceil(rank);
  const lowValue = sortedValues[lower] ?? 0;
  const highValue = sortedValues[upper] ?? lowValue;
  return lowValue + (highValue - lowValue) * (rank - lower);
}

export function roundUpTo(value: number, granularity: number): number {
  return Math.ceil(value / granularity - ROUNDING_EPSILON) * granularity;
}

function mean(values: readonly number[]): number {
  return values.reduce((sum, v) => sum + v, 0) / values.length;
}

// Coefficient of variation of the sub-window means; null when fewer than two windows have data
export function subWindowVariation(samples: readonly MetricSample[], windows: number): number | null {
  const first = samples[0];
  const last = samples[samples.length - 1];
  if (!first || !last || last.timestamp <= first.timestamp) return null;

  const span = last.timestamp - first.timestamp;
  const buckets: number[][] = Array.from({ length: windows }, () => []);
  for (const sample of samples) {
    const index = Math.min(windows - 1, Math.floor(((sample.timestamp - first.timestamp) / span) * windows));
    buckets[index]?.push(sample.value);
  }

  const means = buckets.filter(b => b.length > 0).map(mean);
  if (means.length < 2) return null;

  const average = mean(means);
  if (average === 0) return null;
  const variance = mean(means.map(m => (m - average) ** 2));
  return Math.sqrt(variance) / average;
}

function usableSamples(series: MetricSampleSeries): MetricSample[] {
  return series.samples
    .filter(s => Number.isFinite(s.value) && s.value >= 0 && Number.isFinite(s.timestamp))
    .sort((a, b) => a.timestamp - b.timestamp);
}

export function insufficient(
  resource: ResourceKind,
  window: WindowUsed,
  options: Pick<ReducerOptions, 'percentile'>,
  reason: InsufficientReason,
  sampleCount = 0
): Recommendation {
  return {
    resource,
    confidence: 'insufficient-data',
    suggestedRequest: null,
    suggestedLimit: null,
    percentile: options.percentile,
    window,
    sampleCount,
    reason
  };
}

export function reduceSeries(
  series: MetricSampleSeries,
  resource: ResourceKind,
  window: WindowUsed,
  options: ReducerOptions
): Recommendation {
  const samples = usableSamples(series);

  if (samples.length === 0) {
    return insufficient(resource, window, options, series.samples.length === 0 ? 'no-data' : 'too-few-samples');
  }
  if (samples.length < options.minSamples) {
    return insufficient(resource, window, options, 'too-few-samples', samples.length);
  }
  const span = (samples[samples.length - 1]?.timestamp ?? 0) - (samples[0]?.timestamp ?? 0);
  if (span < options.minDurationSeconds) {
    return insufficient(resource, window, options, 'span-too-short', samples.length);
  }

  const values = samples.map(s => s.value).sort((a, b) => a - b);
  const percentileValue = percentile(values, options.percentile);
  const granularity = resource === 'cpu' ? options.cpuGranularityMillicores : options.memoryGranularityBytes;
  const ratio = resource === 'cpu' ? options.cpuLimitRatio : options.memoryLimitRatio;

  const suggestedRequest = roundUpTo(percentileValue, granularity);
  const suggestedLimit = roundUpTo(suggestedRequest * ratio, granularity);

  const variation = subWindowVariation(samples, options.seasonalityWindows);
  const confidence: Confidence =
    variation !== null && variation > options.seasonalityCvThreshold ? 'seasonal-pattern-detected' : 'sufficient-data';

  return {
    resource,
    confidence,
    suggestedRequest,
    suggestedLimit,
    percentile: options.percentile,
    window,
    sampleCount: samples.length,
    statistics: {
      mean: mean(values),
      max: values[values.length - 1] ?? percentileValue,
      percentileValue
    }
  };
}

// Maps a resolved query to a recommendation; anything but success is insufficient data
export function recommendationFromOutcome(
  outcome: ResolvedOutcome,
  resource: ResourceKind,
  window: WindowUsed,
  options: ReducerOptions
): Recommendation {
  switch (outcome.status) {
    case 'succeeded':
      return reduceSeries(outcome.series, resource, window, options);
    case 'failed':
      return insufficient(resource, window, options, 'query-failed');
    case 'timed-out':
      return insufficient(resource, window, options, 'query-timeout');
    case 'skipped':
      return insufficient(resource, window, options, outcome.reason);
  }
}
