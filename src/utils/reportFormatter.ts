import { formatQuantity } from '../analysis/quantity';
import { describeScope } from '../types/k8s';
import {
  IssueSeverity,
  type GovernanceReport,
  type Recommendation,
  type ResourceOvercommit,
  type ValidationFinding,
  type WorkloadRecommendation
} from '../types/report';
import type { ResourceKind } from '../types/resources';

function subjectLabel(finding: ValidationFinding): string {
  const { subject } = finding;
  const parts = [subject.namespace];
  if (subject.workloadName) parts.push(`${subject.workloadKind ?? 'Workload'}/${subject.workloadName}`);
  if (subject.podName) parts.push(subject.podName);
  if (subject.containerName) parts.push(subject.containerName);
  return parts.join(' / ');
}

function formatFinding(finding: ValidationFinding): string {
  const lines: string[] = [];

  lines.push(`### ${finding.ruleId}${finding.resource ? ` (${finding.resource})` : ''}`);
  lines.push('');
  lines.push(`**Resource:** ${subjectLabel(finding)}`);
  lines.push('');
  lines.push(finding.message);
  if (finding.detail) {
    lines.push('');
    lines.push(`**Observed:** ${finding.detail.text}`);
  }
  lines.push('');
  lines.push(`**Remediation:** ${finding.remediation}`);

  return lines.join('\n');
}

function formatOvercommitRow(resource: ResourceKind, result: ResourceOvercommit): string {
  const requested = formatQuantity(resource, result.requested);
  if (result.status === 'capacity-unknown') {
    return `| ${resource} | unknown | ${requested} | - | capacity unknown (${result.reason}) | ${result.unaccounted} |`;
  }
  const ratio = `${(result.ratio * 100).toFixed(1)}%`;
  return `| ${resource} | ${formatQuantity(resource, result.capacity)} | ${requested} | ${ratio} | ${result.severity} | ${result.unaccounted} |`;
}

function formatSuggestion(resource: ResourceKind, rec: Recommendation): string {
  if (rec.suggestedRequest === null || rec.suggestedLimit === null) {
    return `${rec.confidence}${rec.reason ? ` (${rec.reason})` : ''}`;
  }
  const suffix = rec.confidence === 'seasonal-pattern-detected' ? ' (seasonal)' : '';
  return `${formatQuantity(resource, rec.suggestedRequest)} / ${formatQuantity(resource, rec.suggestedLimit)}${suffix}`;
}

function formatCurrent(resource: ResourceKind, entry: WorkloadRecommendation): string {
  const { request, limit } = entry.current[resource];
  const render = (value: number | null): string => (value === null ? 'none' : formatQuantity(resource, value));
  return `${render(request)} / ${render(limit)}`;
}

function formatRecommendations(entries: readonly WorkloadRecommendation[]): string {
  const lines: string[] = [];
  lines.push('## Recommendations');
  lines.push('');
  lines.push('| Workload | Container | QoS | CPU current | CPU suggested | Memory current | Memory suggested |');
  lines.push('|----------|-----------|-----|-------------|---------------|----------------|------------------|');
  entries.forEach(entry => {
    const { selector } = entry;
    lines.push(
      `| ${selector.namespace}/${selector.workloadKind}/${selector.workloadName} | ${selector.containerName} | ${entry.current.qosClass} | ` +
        `${formatCurrent('cpu', entry)} | ${formatSuggestion('cpu', entry.cpu)} | ` +
        `${formatCurrent('memory', entry)} | ${formatSuggestion('memory', entry.memory)} |`
    );
  });
  return lines.join('\n');
}

export function formatReport(report: GovernanceReport): string {
  const lines: string[] = [];
  const { summary } = report;

  // Header
  lines.push(`# Resource Governance Report: ${describeScope(report.scope)}`);
  lines.push('');
  lines.push(`**Generated:** ${report.generatedAt}`);
  lines.push(`**Window:** ${report.window.start} to ${report.window.end}`);
  lines.push('');
  lines.push(
    `**Summary:** ${summary.totalWorkloads} workload(s), ${summary.totalSnapshots} container(s), ` +
      `${summary.totalFindings} finding(s) (critical ${summary.findingsBySeverity.critical}, ` +
      `error ${summary.findingsBySeverity.error}, warning ${summary.findingsBySeverity.warning}, ` +
      `info ${summary.findingsBySeverity.info})`
  );
  const { qosClasses } = summary;
  lines.push(
    `**QoS:** Guaranteed ${qosClasses.Guaranteed}, Burstable ${qosClasses.Burstable}, BestEffort ${qosClasses.BestEffort}`
  );
  lines.push('');
  lines.push('---');

  lines.push('', '## Overcommit', '');
  lines.push('| Resource | Capacity | Requested | Ratio | Severity | Unaccounted |');
  lines.push('|----------|----------|-----------|-------|----------|-------------|');
  lines.push(formatOvercommitRow('cpu', report.overcommit.cpu));
  lines.push(formatOvercommitRow('memory', report.overcommit.memory));

  // Render finding sections grouped by severity
  const severitySections: { severity: IssueSeverity; title: string }[] = [
    { severity: IssueSeverity.CRITICAL, title: 'Critical' },
    { severity: IssueSeverity.ERROR, title: 'Errors' },
    { severity: IssueSeverity.WARNING, title: 'Warnings' },
    { severity: IssueSeverity.INFO, title: 'Info' }
  ];

  for (const { severity, title } of severitySections) {
    const findings = report.findings.filter(f => f.severity === severity);
    if (findings.length > 0) {
      lines.push('', `## ${title}`, '');
      findings.forEach(finding => {
        lines.push(formatFinding(finding), '');
      });
    }
  }

  if (report.recommendations.length > 0) {
    lines.push('');
    lines.push(formatRecommendations(report.recommendations));
    const { queries } = summary;
    lines.push('');
    lines.push(
      `_Metric queries: ${queries.succeeded}/${queries.total} succeeded, ${queries.failed} failed, ` +
        `${queries.timedOut} timed out, ${queries.skipped} skipped_`
    );
  }

  return lines.join('\n');
}
