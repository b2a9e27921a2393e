import fetch from 'node-fetch';
import { z } from 'zod';
import { getLogger } from '@fluidware-it/saddlebag';
import { renderQuery } from './promql';
import type { MetricQuerySpec, MetricSampleSeries, MetricsCollaborator } from '../types/metrics';

const logger = getLogger();

const rangeResponseSchema = z.object({
  status: z.enum(['success', 'error']),
  error: z.string().optional(),
  data: z
    .object({
      resultType: z.string(),
      result: z.array(
        z.object({
          metric: z.record(z.string()),
          values: z.array(z.tuple([z.number(), z.string()]))
        })
      )
    })
    .optional()
});

export interface PrometheusClientOptions {
  baseUrl: string;
  token?: string | undefined;
}

// Range-query adapter for the Prometheus HTTP API. CPU is returned in millicores, memory in bytes.
export class PrometheusMetricsClient implements MetricsCollaborator {
  private readonly baseUrl: string;
  private readonly token: string | undefined;

  constructor(options: PrometheusClientOptions) {
    this.baseUrl = options.baseUrl.replace(/\/+$/, '');
    this.token = options.token;
  }

  async query(spec: MetricQuerySpec, signal: AbortSignal): Promise<MetricSampleSeries> {
    const promql = renderQuery(spec);
    const params = new URLSearchParams({
      query: promql,
      start: String(spec.start.getTime() / 1000),
      end: String(spec.end.getTime() / 1000),
      step: `${spec.stepSeconds}s`
    });
    const headers: Record<string, string> = { Accept: 'application/json' };
    if (this.token) {
      headers.Authorization = `Bearer ${this.token}`;
    }

    logger.debug(`Prometheus range query: ${promql}`);
    const response = await fetch(`${this.baseUrl}/api/v1/query_range?${params.toString()}`, { headers, signal });
    const body: unknown = await response.json().catch(() => undefined);

    const parsed = rangeResponseSchema.safeParse(body);
    if (!response.ok) {
      const reason = parsed.success && parsed.data.error ? parsed.data.error : `HTTP ${response.status}`;
      throw new Error(`Prometheus query failed: ${reason}`);
    }
    if (!parsed.success) {
      throw new Error(`Unexpected Prometheus response: ${parsed.error.issues[0]?.message ?? 'invalid body'}`);
    }
    if (parsed.data.status === 'error') {
      throw new Error(`Prometheus query failed: ${parsed.data.error ?? 'unknown error'}`);
    }

    const series = parsed.data.data?.result ?? [];
    if (series.length > 1) {
      logger.debug(`Prometheus returned ${series.length} series for an aggregated query; using the first`);
    }
    const scale = spec.resource === 'cpu' ? 1000 : 1;
    return {
      samples: (series[0]?.values ?? []).map(([timestamp, value]) => ({ timestamp, value: Number(value) * scale }))
    };
  }
}
