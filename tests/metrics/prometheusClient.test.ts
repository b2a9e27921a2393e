import { describe, it, expect, vi, beforeEach } from 'vitest';
import fetch, { Response } from 'node-fetch';
import { PrometheusMetricsClient } from '../../src/metrics/prometheusClient';
import type { MetricQuerySpec } from '../../src/types/metrics';

vi.mock('node-fetch', async importOriginal => {
  const actual = await importOriginal<typeof import('node-fetch')>();
  return { ...actual, default: vi.fn() };
});

const spec: MetricQuerySpec = {
  resource: 'cpu',
  aggregation: 'avg',
  selector: { namespace: 'payments', workloadName: 'ledger', workloadKind: 'Deployment', containerName: 'app' },
  start: new Date('2026-01-01T00:00:00Z'),
  end: new Date('2026-01-02T00:00:00Z'),
  stepSeconds: 600
};

function jsonResponse(body: unknown, status = 200): Response {
  return new Response(JSON.stringify(body), { status, headers: { 'Content-Type': 'application/json' } });
}

function matrix(values: [number, string][]) {
  return { status: 'success', data: { resultType: 'matrix', result: [{ metric: {}, values }] } };
}

describe('PrometheusMetricsClient', () => {
  const signal = new AbortController().signal;

  beforeEach(() => {
    vi.mocked(fetch).mockReset();
  });

  it('should issue a range query with the rendered PromQL', async () => {
    vi.mocked(fetch).mockResolvedValueOnce(jsonResponse(matrix([])));
    const client = new PrometheusMetricsClient({ baseUrl: 'http://prometheus.test:9090/', token: 'test-secret' });

    await client.query(spec, signal);

    const call = vi.mocked(fetch).mock.calls[0];
    const init = call?.[1];
    const parsed = new URL(String(call?.[0]));
    expect(parsed.origin + parsed.pathname).toBe('http://prometheus.test:9090/api/v1/query_range');
    expect(parsed.searchParams.get('start')).toBe('1767225600');
    expect(parsed.searchParams.get('end')).toBe('1767312000');
    expect(parsed.searchParams.get('step')).toBe('600s');
    expect(parsed.searchParams.get('query')).toContain('container_cpu_usage_seconds_total');
    expect(init?.headers).toEqual({ Accept: 'application/json', Authorization: 'Bearer test-secret' });
    expect(init?.signal).toBe(signal);
  });

  it('should omit the authorization header without a token', async () => {
    vi.mocked(fetch).mockResolvedValueOnce(jsonResponse(matrix([])));
    const client = new PrometheusMetricsClient({ baseUrl: 'http://prometheus.test:9090' });

    await client.query(spec, signal);

    expect(vi.mocked(fetch).mock.calls[0]?.[1]?.headers).toEqual({ Accept: 'application/json' });
  });

  it('should convert CPU cores to millicores', async () => {
    vi.mocked(fetch).mockResolvedValueOnce(
      jsonResponse(
        matrix([
          [1767225600, '0.25'],
          [1767226200, '0.5']
        ])
      )
    );
    const client = new PrometheusMetricsClient({ baseUrl: 'http://prometheus.test:9090' });

    await expect(client.query(spec, signal)).resolves.toEqual({
      samples: [
        { timestamp: 1767225600, value: 250 },
        { timestamp: 1767226200, value: 500 }
      ]
    });
  });

  it('should keep memory in bytes', async () => {
    vi.mocked(fetch).mockResolvedValueOnce(jsonResponse(matrix([[1767225600, '134217728']])));
    const client = new PrometheusMetricsClient({ baseUrl: 'http://prometheus.test:9090' });

    const series = await client.query({ ...spec, resource: 'memory', aggregation: 'max' }, signal);

    expect(series.samples).toEqual([{ timestamp: 1767225600, value: 134217728 }]);
  });

  it('should return no samples for an empty result', async () => {
    vi.mocked(fetch).mockResolvedValueOnce(
      jsonResponse({ status: 'success', data: { resultType: 'matrix', result: [] } })
    );
    const client = new PrometheusMetricsClient({ baseUrl: 'http://prometheus.test:9090' });

    await expect(client.query(spec, signal)).resolves.toEqual({ samples: [] });
  });

  it('should surface the Prometheus error message', async () => {
    vi.mocked(fetch).mockResolvedValueOnce(
      jsonResponse({ status: 'error', errorType: 'timeout', error: 'query timed out in expression evaluation' }, 503)
    );
    const client = new PrometheusMetricsClient({ baseUrl: 'http://prometheus.test:9090' });

    await expect(client.query(spec, signal)).rejects.toThrow(
      'Prometheus query failed: query timed out in expression evaluation'
    );
  });

  it('should report the HTTP status when the body is not JSON', async () => {
    vi.mocked(fetch).mockResolvedValueOnce(new Response('upstream unavailable', { status: 502 }));
    const client = new PrometheusMetricsClient({ baseUrl: 'http://prometheus.test:9090' });

    await expect(client.query(spec, signal)).rejects.toThrow('Prometheus query failed: HTTP 502');
  });

  it('should reject an unexpected body', async () => {
    vi.mocked(fetch).mockResolvedValueOnce(jsonResponse({ hello: 'world' }));
    const client = new PrometheusMetricsClient({ baseUrl: 'http://prometheus.test:9090' });

    await expect(client.query(spec, signal)).rejects.toThrow('Unexpected Prometheus response');
  });
});
