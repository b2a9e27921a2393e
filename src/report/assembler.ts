import type { AnalysisScope } from '../types/k8s';
import {
  IssueSeverity,
  type Confidence,
  type GovernanceReport,
  type OvercommitResult,
  type QueryStatistics,
  type SeverityCounts,
  type ValidationFinding,
  type WorkloadRecommendation
} from '../types/report';
import type { QosClass, ResourceSnapshot } from '../types/resources';

export interface ReportParts {
  scope: AnalysisScope;
  generatedAt: Date;
  window: { start: Date; end: Date };
  findings: readonly ValidationFinding[];
  recommendations: readonly WorkloadRecommendation[];
  overcommit: OvercommitResult;
  snapshots: readonly ResourceSnapshot[];
  totalWorkloads: number;
  queries: QueryStatistics;
}

export function countBySeverity(findings: readonly ValidationFinding[]): SeverityCounts {
  const counts: SeverityCounts = {
    [IssueSeverity.CRITICAL]: 0,
    [IssueSeverity.ERROR]: 0,
    [IssueSeverity.WARNING]: 0,
    [IssueSeverity.INFO]: 0
  };
  for (const finding of findings) {
    counts[finding.severity]++;
  }
  return counts;
}

function countByConfidence(recommendations: readonly WorkloadRecommendation[]): Record<Confidence, number> {
  const counts: Record<Confidence, number> = {
    'sufficient-data': 0,
    'insufficient-data': 0,
    'seasonal-pattern-detected': 0
  };
  for (const entry of recommendations) {
    counts[entry.cpu.confidence]++;
    counts[entry.memory.confidence]++;
  }
  return counts;
}

export function countByQosClass(snapshots: readonly ResourceSnapshot[]): Record<QosClass, number> {
  const counts: Record<QosClass, number> = { Guaranteed: 0, Burstable: 0, BestEffort: 0 };
  for (const snapshot of snapshots) {
    counts[snapshot.qosClass]++;
  }
  return counts;
}

// Pure aggregation: every finding and recommendation handed in ends up in the report
export function assembleReport(parts: ReportParts): GovernanceReport {
  const findings = [...parts.findings];
  const recommendations = [...parts.recommendations];

  const report: GovernanceReport = {
    scope: parts.scope,
    generatedAt: parts.generatedAt.toISOString(),
    window: { start: parts.window.start.toISOString(), end: parts.window.end.toISOString() },
    findings,
    recommendations,
    overcommit: parts.overcommit,
    summary: {
      findingsBySeverity: countBySeverity(findings),
      totalFindings: findings.length,
      totalSnapshots: parts.snapshots.length,
      totalWorkloads: parts.totalWorkloads,
      qosClasses: countByQosClass(parts.snapshots),
      recommendationsByConfidence: countByConfidence(recommendations),
      queries: { ...parts.queries }
    }
  };

  Object.freeze(findings);
  Object.freeze(recommendations);
  return Object.freeze(report);
}
