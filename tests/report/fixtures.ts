import { assembleReport, type ReportParts } from '../../src/report/assembler';
import { IssueSeverity, type Recommendation, type ValidationFinding, type WorkloadRecommendation } from '../../src/types/report';
import type { ResourceSnapshot } from '../../src/types/resources';

export const GIB = 1024 ** 3;
export const MIB = 1024 * 1024;

const window = { start: '2026-01-01T00:00:00.000Z', end: '2026-01-02T00:00:00.000Z', stepSeconds: 600 };

export const missingRequestFinding: ValidationFinding = {
  ruleId: 'missing-request',
  severity: IssueSeverity.ERROR,
  subject: {
    namespace: 'payments',
    workloadName: 'ledger',
    workloadKind: 'Deployment',
    podName: 'ledger-1',
    containerName: 'app'
  },
  resource: 'cpu',
  message: 'Container "app" has no CPU request set',
  detail: { text: 'request=none, limit=none' },
  remediation: 'Set resources.requests.cpu'
};

export const malformedFinding: ValidationFinding = {
  ruleId: 'malformed-quantity',
  severity: IssueSeverity.INFO,
  subject: { namespace: 'payments', workloadName: 'worker', workloadKind: 'StatefulSet', podName: 'worker-0', containerName: 'app' },
  message: 'Container "app" declares an unparseable quantity and was excluded from analysis',
  detail: { text: 'requests.cpu="abc"' },
  remediation: 'Fix requests.cpu'
};

const cpuRecommendation: Recommendation = {
  resource: 'cpu',
  confidence: 'sufficient-data',
  suggestedRequest: 195,
  suggestedLimit: 585,
  percentile: 95,
  window,
  sampleCount: 100,
  statistics: { mean: 149.5, max: 199, percentileValue: 194.05 }
};

const memoryRecommendation: Recommendation = {
  resource: 'memory',
  confidence: 'insufficient-data',
  suggestedRequest: null,
  suggestedLimit: null,
  percentile: 95,
  window,
  sampleCount: 0,
  reason: 'query-timeout'
};

export const ledgerRecommendation: WorkloadRecommendation = {
  selector: { namespace: 'payments', workloadName: 'ledger', workloadKind: 'Deployment', containerName: 'app' },
  category: 'established',
  current: {
    cpu: { request: 50, limit: null },
    memory: { request: 128 * MIB, limit: 384 * MIB },
    qosClass: 'Burstable'
  },
  cpu: cpuRecommendation,
  memory: memoryRecommendation
};

export const ledgerSnapshot: ResourceSnapshot = {
  namespace: 'payments',
  workloadName: 'ledger',
  workloadKind: 'Deployment',
  podName: 'ledger-1',
  containerName: 'app',
  cpu: { request: 50, limit: null },
  memory: { request: 128 * MIB, limit: 384 * MIB },
  workloadAgeSeconds: 30 * 86400,
  qosClass: 'Burstable'
};

export const sidecarSnapshot: ResourceSnapshot = {
  ...ledgerSnapshot,
  containerName: 'sidecar',
  cpu: { request: null, limit: null },
  memory: { request: null, limit: null },
  qosClass: 'BestEffort'
};

export function reportParts(overrides: Partial<ReportParts> = {}): ReportParts {
  return {
    scope: { kind: 'namespace', namespace: 'payments' },
    generatedAt: new Date('2026-01-02T00:00:00Z'),
    window: { start: new Date('2026-01-01T00:00:00Z'), end: new Date('2026-01-02T00:00:00Z') },
    findings: [missingRequestFinding, malformedFinding],
    recommendations: [ledgerRecommendation],
    overcommit: {
      cpu: { status: 'measured', capacity: 1000, requested: 800, ratio: 0.8, severity: 'warning', unaccounted: 1 },
      memory: { status: 'capacity-unknown', requested: 2 * GIB, unaccounted: 1, reason: 'capacity not reported' }
    },
    snapshots: [ledgerSnapshot, sidecarSnapshot],
    totalWorkloads: 1,
    queries: { total: 2, succeeded: 1, failed: 0, timedOut: 1, skipped: 0 },
    ...overrides
  };
}

export function sampleReport(overrides: Partial<ReportParts> = {}) {
  return assembleReport(reportParts(overrides));
}
