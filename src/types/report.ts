import type { AnalysisScope } from './k8s';
import type { QosClass, ResourceKind, WorkloadSelector } from './resources';

export enum IssueSeverity {
  CRITICAL = 'critical',
  ERROR = 'error',
  WARNING = 'warning',
  INFO = 'info'
}

export type RuleId =
  | 'missing-request'
  | 'missing-limit'
  | 'ratio-out-of-bounds'
  | 'below-minimum-request'
  | 'malformed-quantity'
  | 'missing-workload-metadata'
  | 'inventory-partial-failure';

export interface FindingSubject {
  namespace: string;
  workloadName?: string | undefined;
  workloadKind?: string | undefined;
  podName?: string | undefined;
  containerName?: string | undefined;
}

export interface FindingDetail {
  text: string;
  request?: number | undefined;
  limit?: number | undefined;
  ratio?: number | undefined;
  floor?: number | undefined;
  band?: { min: number; max: number } | undefined;
  rawValue?: string | undefined;
  field?: string | undefined;
}

export interface ValidationFinding {
  ruleId: RuleId;
  severity: IssueSeverity;
  subject: FindingSubject;
  resource?: ResourceKind | undefined;
  message: string;
  detail?: FindingDetail | undefined;
  remediation: string;
}

export type Confidence = 'sufficient-data' | 'insufficient-data' | 'seasonal-pattern-detected';

export type InsufficientReason =
  | 'too-few-samples'
  | 'span-too-short'
  | 'no-data'
  | 'query-failed'
  | 'query-timeout'
  | 'deadline-exceeded';

export interface WindowUsed {
  start: string;
  end: string;
  stepSeconds: number;
}

export interface UsageStatistics {
  mean: number;
  max: number;
  percentileValue: number;
}

export interface Recommendation {
  resource: ResourceKind;
  confidence: Confidence;
  suggestedRequest: number | null;
  suggestedLimit: number | null;
  percentile: number;
  window: WindowUsed;
  sampleCount: number;
  statistics?: UsageStatistics | undefined;
  reason?: InsufficientReason | undefined;
}

export type WorkloadCategory = 'new' | 'established';

export interface WorkloadRecommendation {
  selector: WorkloadSelector;
  category: WorkloadCategory;
  current: {
    cpu: { request: number | null; limit: number | null };
    memory: { request: number | null; limit: number | null };
    qosClass: QosClass;
  };
  cpu: Recommendation;
  memory: Recommendation;
}

export type OvercommitSeverity = 'ok' | 'warning' | 'critical';

export type ResourceOvercommit =
  | {
      status: 'measured';
      capacity: number;
      requested: number;
      ratio: number;
      severity: OvercommitSeverity;
      unaccounted: number;
    }
  | {
      status: 'capacity-unknown';
      requested: number;
      unaccounted: number;
      reason: string;
    };

export interface OvercommitResult {
  cpu: ResourceOvercommit;
  memory: ResourceOvercommit;
}

export type SeverityCounts = Record<IssueSeverity, number>;

export interface QueryStatistics {
  total: number;
  succeeded: number;
  failed: number;
  timedOut: number;
  skipped: number;
}

export interface ReportSummary {
  findingsBySeverity: SeverityCounts;
  totalFindings: number;
  totalSnapshots: number;
  totalWorkloads: number;
  qosClasses: Record<QosClass, number>;
  recommendationsByConfidence: Record<Confidence, number>;
  queries: QueryStatistics;
}

export interface GovernanceReport {
  scope: AnalysisScope;
  generatedAt: string;
  window: { start: string; end: string };
  findings: ValidationFinding[];
  recommendations: WorkloadRecommendation[];
  overcommit: OvercommitResult;
  summary: ReportSummary;
}
