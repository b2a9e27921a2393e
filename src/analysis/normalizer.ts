import { parseResourceQuantity, toCanonical } from './quantity';
import { IssueSeverity, type ValidationFinding } from '../types/report';
import type { RawContainerSpec, RawPodSpec, RawWorkload } from '../types/k8s';
import type { QosClass, ResourceKind, ResourcePair, ResourceSnapshot } from '../types/resources';

export interface NormalizationResult {
  snapshots: ResourceSnapshot[];
  findings: ValidationFinding[];
}

interface MalformedField {
  field: string;
  rawValue: string;
}

type ParsedPair = { ok: true; pair: ResourcePair } | { ok: false; malformed: MalformedField };

function parseField(
  resource: ResourceKind,
  section: 'requests' | 'limits',
  values: Record<string, string> | undefined
): { ok: true; value: number | null } | { ok: false; malformed: MalformedField } {
  const raw = values?.[resource];
  if (raw === undefined) return { ok: true, value: null };

  const parsed = parseResourceQuantity(raw);
  if (parsed === null || parsed < 0) {
    return { ok: false, malformed: { field: `${section}.${resource}`, rawValue: raw } };
  }
  return { ok: true, value: toCanonical(resource, parsed) };
}

function parsePair(resource: ResourceKind, container: RawContainerSpec): ParsedPair {
  const request = parseField(resource, 'requests', container.requests);
  if (!request.ok) return request;
  const limit = parseField(resource, 'limits', container.limits);
  if (!limit.ok) return limit;
  return { ok: true, pair: { request: request.value, limit: limit.value } };
}

export function classifyQos(cpu: ResourcePair, memory: ResourcePair): QosClass {
  const pairs = [cpu, memory];
  if (pairs.every(p => p.request === null && p.limit === null)) return 'BestEffort';
  if (pairs.every(p => p.request !== null && p.limit !== null && p.request === p.limit)) return 'Guaranteed';
  return 'Burstable';
}

function malformedFinding(workload: RawWorkload, pod: RawPodSpec, container: RawContainerSpec, malformed: MalformedField): ValidationFinding {
  return {
    ruleId: 'malformed-quantity',
    severity: IssueSeverity.INFO,
    subject: {
      namespace: workload.namespace,
      workloadName: workload.name,
      workloadKind: workload.kind,
      podName: pod.name,
      containerName: container.name
    },
    message: `Container "${container.name}" declares an unparseable quantity and was excluded from analysis`,
    detail: {
      text: `${malformed.field}="${malformed.rawValue}"`,
      field: malformed.field,
      rawValue: malformed.rawValue
    },
    remediation: `Fix ${malformed.field} to a valid Kubernetes quantity (e.g. "250m" or "512Mi")`
  };
}

function missingMetadataFinding(workload: RawWorkload, missing: string): ValidationFinding {
  return {
    ruleId: 'missing-workload-metadata',
    severity: IssueSeverity.INFO,
    subject: {
      namespace: workload.namespace,
      workloadName: workload.name || undefined,
      workloadKind: workload.kind
    },
    message: `Workload ${workload.kind}/${workload.name || '<unnamed>'} is missing ${missing} and was excluded from analysis`,
    detail: { text: `missing=${missing}` },
    remediation: 'Check that the inventory source returns complete workload metadata'
  };
}

function workloadAgeSeconds(workload: RawWorkload, now: Date): number | null {
  if (!workload.createdAt) return null;
  const created = Date.parse(workload.createdAt);
  if (Number.isNaN(created)) return null;
  return Math.max(0, Math.floor((now.getTime() - created) / 1000));
}

function normalizeContainer(
  workload: RawWorkload,
  pod: RawPodSpec,
  container: RawContainerSpec,
  ageSeconds: number
): ResourceSnapshot | MalformedField {
  const cpu = parsePair('cpu', container);
  if (!cpu.ok) return cpu.malformed;
  const memory = parsePair('memory', container);
  if (!memory.ok) return memory.malformed;

  return Object.freeze({
    namespace: workload.namespace,
    workloadName: workload.name,
    workloadKind: workload.kind,
    podName: pod.name,
    containerName: container.name,
    cpu: Object.freeze(cpu.pair),
    memory: Object.freeze(memory.pair),
    workloadAgeSeconds: ageSeconds,
    qosClass: classifyQos(cpu.pair, memory.pair)
  });
}

// Converts raw declarations into one snapshot per container. Bad data is
// excluded and reported as info findings; the pass itself never fails.
export function normalizeWorkloads(workloads: RawWorkload[], now: Date): NormalizationResult {
  const snapshots: ResourceSnapshot[] = [];
  const findings: ValidationFinding[] = [];

  for (const workload of workloads) {
    if (!workload.name) {
      findings.push(missingMetadataFinding(workload, 'name'));
      continue;
    }
    const ageSeconds = workloadAgeSeconds(workload, now);
    if (ageSeconds === null) {
      findings.push(missingMetadataFinding(workload, 'creation timestamp'));
      continue;
    }

    for (const pod of workload.pods) {
      for (const container of pod.containers) {
        const result = normalizeContainer(workload, pod, container, ageSeconds);
        if ('field' in result) {
          findings.push(malformedFinding(workload, pod, container, result));
        } else {
          snapshots.push(result);
        }
      }
    }
  }

  return { snapshots, findings };
}
