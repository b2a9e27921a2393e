import { formatQuantity } from './quantity';
import type { EngineOptions } from '../config/options';
import { IssueSeverity, type FindingDetail, type RuleId, type ValidationFinding } from '../types/report';
import { RESOURCE_KINDS, type ResourceKind, type ResourceSnapshot } from '../types/resources';

export type ValidationThresholds = Pick<
  EngineOptions,
  'cpuLimitRatio' | 'memoryLimitRatio' | 'ratioTolerance' | 'minCpuRequestMillicores' | 'minMemoryRequestBytes'
>;

interface RuleViolation {
  severity: IssueSeverity;
  message: string;
  detail: FindingDetail;
  remediation: string;
}

interface ResourceRule {
  id: RuleId;
  check(resource: ResourceKind, snapshot: ResourceSnapshot, thresholds: ValidationThresholds): RuleViolation | null;
}

function targetRatio(resource: ResourceKind, thresholds: ValidationThresholds): number {
  return resource === 'cpu' ? thresholds.cpuLimitRatio : thresholds.memoryLimitRatio;
}

function minimumRequest(resource: ResourceKind, thresholds: ValidationThresholds): number {
  return resource === 'cpu' ? thresholds.minCpuRequestMillicores : thresholds.minMemoryRequestBytes;
}

function label(resource: ResourceKind): string {
  return resource === 'cpu' ? 'CPU' : 'memory';
}

function formatRatio(ratio: number): string {
  return ratio.toFixed(1);
}

const missingRequest: ResourceRule = {
  id: 'missing-request',
  check(resource, snapshot) {
    const { request, limit } = snapshot[resource];
    if (request !== null) return null;
    const observed = limit === null ? 'request=none, limit=none' : `request=none, limit=${formatQuantity(resource, limit)}`;
    return {
      severity: IssueSeverity.ERROR,
      message: `Container "${snapshot.containerName}" has no ${label(resource)} request set`,
      detail: { text: observed, ...(limit !== null && { limit }) },
      remediation: `Set resources.requests.${resource} so the scheduler can reserve capacity (${observed})`
    };
  }
};

const missingLimit: ResourceRule = {
  id: 'missing-limit',
  check(resource, snapshot, thresholds) {
    const { request, limit } = snapshot[resource];
    if (request === null || limit !== null) return null;
    const suggested = Math.ceil(request * targetRatio(resource, thresholds));
    return {
      severity: IssueSeverity.WARNING,
      message: `Container "${snapshot.containerName}" has a ${label(resource)} request but no limit`,
      detail: { text: `request=${formatQuantity(resource, request)}, limit=none`, request },
      remediation: `Set resources.limits.${resource} (e.g. ${formatQuantity(resource, suggested)} for a ${targetRatio(resource, thresholds)}:1 ratio to request=${formatQuantity(resource, request)})`
    };
  }
};

const ratioOutOfBounds: ResourceRule = {
  id: 'ratio-out-of-bounds',
  check(resource, snapshot, thresholds) {
    const { request, limit } = snapshot[resource];
    if (request === null || limit === null || request <= 0) return null;

    const target = targetRatio(resource, thresholds);
    const tolerance = thresholds.ratioTolerance;
    const ratio = limit / request;
    const upper = target + tolerance;
    // Anything from limit == request (Guaranteed QoS) up to the upper edge is accepted
    if (ratio >= 1 && ratio <= upper) return null;

    const severe = ratio < 1 || ratio > target + 2 * tolerance;
    const band = { min: 1, max: upper };
    const text = `request=${formatQuantity(resource, request)}, limit=${formatQuantity(resource, limit)}, ratio=${formatRatio(ratio)}`;
    const direction = ratio > upper ? 'too high' : 'too low';

    return {
      severity: severe ? IssueSeverity.ERROR : IssueSeverity.WARNING,
      message: `${label(resource)} limit:request ratio ${direction} for container "${snapshot.containerName}" (${formatRatio(ratio)}:1)`,
      detail: { text, request, limit, ratio, band },
      remediation:
        ratio < 1
          ? `${label(resource)} limit must not be lower than the request (${text})`
          : `Bring the ${label(resource)} limit:request ratio within ${formatRatio(band.min)}-${formatRatio(band.max)} (target ${target}:1; ${text})`
    };
  }
};

const belowMinimumRequest: ResourceRule = {
  id: 'below-minimum-request',
  check(resource, snapshot, thresholds) {
    const { request } = snapshot[resource];
    const floor = minimumRequest(resource, thresholds);
    if (request === null || request >= floor) return null;
    return {
      severity: IssueSeverity.WARNING,
      message: `${label(resource)} request too low for container "${snapshot.containerName}" (${formatQuantity(resource, request)})`,
      detail: {
        text: `request=${formatQuantity(resource, request)}, minimum=${formatQuantity(resource, floor)}`,
        request,
        floor
      },
      remediation: `Increase resources.requests.${resource} to at least ${formatQuantity(resource, floor)}`
    };
  }
};

// Evaluation order is the output order
export const VALIDATION_RULES: readonly ResourceRule[] = [missingRequest, missingLimit, ratioOutOfBounds, belowMinimumRequest];

export function validateSnapshot(snapshot: ResourceSnapshot, thresholds: ValidationThresholds): ValidationFinding[] {
  const findings: ValidationFinding[] = [];
  for (const rule of VALIDATION_RULES) {
    for (const resource of RESOURCE_KINDS) {
      const violation = rule.check(resource, snapshot, thresholds);
      if (!violation) continue;
      findings.push({
        ruleId: rule.id,
        severity: violation.severity,
        subject: {
          namespace: snapshot.namespace,
          workloadName: snapshot.workloadName,
          workloadKind: snapshot.workloadKind,
          podName: snapshot.podName,
          containerName: snapshot.containerName
        },
        resource,
        message: violation.message,
        detail: violation.detail,
        remediation: violation.remediation
      });
    }
  }
  return findings;
}

export function validateSnapshots(snapshots: readonly ResourceSnapshot[], thresholds: ValidationThresholds): ValidationFinding[] {
  return snapshots.flatMap(snapshot => validateSnapshot(snapshot, thresholds));
}
