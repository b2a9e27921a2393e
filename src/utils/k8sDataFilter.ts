import type { V1Container, V1Node, V1ObjectMeta, V1Pod, V1ResourceQuota } from '@kubernetes/client-node';
import { parseResourceQuantity, toCanonical } from '../analysis/quantity';
import type { ClusterCapacity, OwnerReference, RawContainerSpec, RawPodSpec } from '../types/k8s';

export interface FilteredPod extends RawPodSpec {
  namespace: string;
  phase: string;
  ownerReferences: OwnerReference[];
}

// Pods that finished no longer hold their requests on a node
const TERMINAL_PHASES = ['Succeeded', 'Failed'];

function toIsoTimestamp(value: Date | string | undefined): string | undefined {
  if (value === undefined) return undefined;
  return value instanceof Date ? value.toISOString() : value;
}

export function getOwnerReferences(metadata: V1ObjectMeta | undefined): OwnerReference[] {
  return (metadata?.ownerReferences ?? []).map(ref => ({ kind: ref.kind, name: ref.name }));
}

function mapContainer(container: V1Container): RawContainerSpec {
  const { resources } = container;
  return {
    name: container.name,
    ...(resources?.requests && { requests: { ...resources.requests } }),
    ...(resources?.limits && { limits: { ...resources.limits } })
  };
}

export function filterPodData(pod: V1Pod): FilteredPod {
  return {
    name: pod.metadata?.name || '',
    namespace: pod.metadata?.namespace || 'default',
    phase: pod.status?.phase || 'Unknown',
    createdAt: toIsoTimestamp(pod.metadata?.creationTimestamp),
    ownerReferences: getOwnerReferences(pod.metadata),
    containers: (pod.spec?.containers ?? []).map(mapContainer)
  };
}

export function isActivePod(pod: FilteredPod): boolean {
  return !TERMINAL_PHASES.includes(pod.phase);
}

function sumQuantities(values: (string | undefined)[], resource: 'cpu' | 'memory'): number | null {
  let total: number | null = null;
  for (const raw of values) {
    if (raw === undefined) continue;
    const parsed = parseResourceQuantity(raw);
    if (parsed === null || parsed < 0) continue;
    total = (total ?? 0) + toCanonical(resource, parsed);
  }
  return total;
}

// Sum of node allocatable; null for a resource no node reported
export function sumNodeAllocatable(nodes: V1Node[]): ClusterCapacity {
  return {
    cpuMillicores: sumQuantities(
      nodes.map(n => n.status?.allocatable?.cpu),
      'cpu'
    ),
    memoryBytes: sumQuantities(
      nodes.map(n => n.status?.allocatable?.memory),
      'memory'
    )
  };
}

function tightestQuota(quotas: V1ResourceQuota[], keys: string[], resource: 'cpu' | 'memory'): number | null {
  let tightest: number | null = null;
  for (const quota of quotas) {
    const hard = quota.spec?.hard ?? {};
    const raw = keys.map(k => hard[k]).find(v => v !== undefined);
    const value = sumQuantities([raw], resource);
    if (value !== null && (tightest === null || value < tightest)) tightest = value;
  }
  return tightest;
}

// Hard request quota of a namespace; with several quotas the lowest one binds
export function quotaCapacity(quotas: V1ResourceQuota[]): ClusterCapacity {
  return {
    cpuMillicores: tightestQuota(quotas, ['requests.cpu', 'cpu'], 'cpu'),
    memoryBytes: tightestQuota(quotas, ['requests.memory', 'memory'], 'memory')
  };
}
