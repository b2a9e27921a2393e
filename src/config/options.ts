import { z } from 'zod';
import { InvalidConfigurationError } from '../errors';

const MIB = 1024 * 1024;

// Product policy defaults. Every one of them can be overridden per report.
export const DEFAULT_LIMIT_RATIO = 3;
export const DEFAULT_RATIO_TOLERANCE = 1.5;
export const DEFAULT_MIN_CPU_REQUEST_MILLICORES = 10;
export const DEFAULT_MIN_MEMORY_REQUEST_BYTES = 32 * MIB;
export const DEFAULT_OVERCOMMIT_WARNING = 0.75;
export const DEFAULT_OVERCOMMIT_CRITICAL = 0.9;
export const DEFAULT_PERCENTILE = 95;
export const DEFAULT_MIN_SAMPLES = 12;
export const DEFAULT_MIN_DURATION_SECONDS = 3600;
export const DEFAULT_SEASONALITY_WINDOWS = 4;
export const DEFAULT_SEASONALITY_CV_THRESHOLD = 0.3;
export const DEFAULT_MAX_SAMPLES_PER_SERIES = 200;
export const DEFAULT_QUERY_CONCURRENCY = 8;
export const DEFAULT_QUERY_TIMEOUT_MS = 10_000;
export const DEFAULT_QUERY_RETRIES = 1;
export const DEFAULT_NEW_WORKLOAD_DAYS = 7;
export const DEFAULT_SYSTEM_NAMESPACE_PREFIXES: readonly string[] = ['kube-', 'openshift-'];

const positive = z.number().finite().positive();
const positiveInt = z.number().int().positive();

export const engineOptionsSchema = z
  .object({
    cpuLimitRatio: z.number().finite().min(1).default(DEFAULT_LIMIT_RATIO),
    memoryLimitRatio: z.number().finite().min(1).default(DEFAULT_LIMIT_RATIO),
    ratioTolerance: positive.default(DEFAULT_RATIO_TOLERANCE),
    minCpuRequestMillicores: z.number().finite().nonnegative().default(DEFAULT_MIN_CPU_REQUEST_MILLICORES),
    minMemoryRequestBytes: z.number().finite().nonnegative().default(DEFAULT_MIN_MEMORY_REQUEST_BYTES),
    overcommitWarning: positive.default(DEFAULT_OVERCOMMIT_WARNING),
    overcommitCritical: positive.default(DEFAULT_OVERCOMMIT_CRITICAL),
    percentile: z.number().gt(0).max(100).default(DEFAULT_PERCENTILE),
    minSamples: positiveInt.default(DEFAULT_MIN_SAMPLES),
    minDurationSeconds: z.number().finite().nonnegative().default(DEFAULT_MIN_DURATION_SECONDS),
    seasonalityWindows: z.number().int().min(2).default(DEFAULT_SEASONALITY_WINDOWS),
    seasonalityCvThreshold: positive.default(DEFAULT_SEASONALITY_CV_THRESHOLD),
    maxSamplesPerSeries: z.number().int().min(10).default(DEFAULT_MAX_SAMPLES_PER_SERIES),
    cpuGranularityMillicores: positive.default(1),
    memoryGranularityBytes: positive.default(MIB),
    concurrency: positiveInt.max(64).default(DEFAULT_QUERY_CONCURRENCY),
    queryTimeoutMs: positiveInt.default(DEFAULT_QUERY_TIMEOUT_MS),
    queryRetries: z.number().int().nonnegative().max(5).default(DEFAULT_QUERY_RETRIES),
    batchDeadlineMs: positiveInt.nullable().default(null),
    historical: z.boolean().default(true),
    includeSystemNamespaces: z.boolean().default(false),
    systemNamespacePrefixes: z.array(z.string().min(1)).default(() => [...DEFAULT_SYSTEM_NAMESPACE_PREFIXES]),
    newWorkloadThresholdDays: z.number().finite().nonnegative().default(DEFAULT_NEW_WORKLOAD_DAYS)
  })
  .strict()
  .superRefine((options, ctx) => {
    if (options.overcommitWarning >= options.overcommitCritical) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['overcommitWarning'],
        message: 'must be lower than overcommitCritical'
      });
    }
  });

export type EngineOptions = Readonly<z.output<typeof engineOptionsSchema>>;
export type EngineOptionsInput = z.input<typeof engineOptionsSchema>;

// Defaults are applied once here; the returned object is frozen for the whole run
export function resolveEngineOptions(overrides: EngineOptionsInput = {}): EngineOptions {
  const parsed = engineOptionsSchema.safeParse(overrides);
  if (!parsed.success) {
    throw new InvalidConfigurationError(
      parsed.error.issues.map(issue => `${issue.path.join('.') || 'options'}: ${issue.message}`)
    );
  }
  const options = parsed.data;
  Object.freeze(options.systemNamespacePrefixes);
  return Object.freeze(options);
}
