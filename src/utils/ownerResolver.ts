import { getLogger } from '@fluidware-it/saddlebag';
import type { V1ObjectMeta } from '@kubernetes/client-node';
import { k8sAppsApi, k8sBatchApi } from '../cluster/k8sClient';
import { errorMessage } from '../errors';
import type { OwnerReference } from '../types/k8s';

const logger = getLogger();

// Maps a resource key ("ReplicaSet/my-rs-abc123") to its resolved parent owner
export type OwnerMap = Map<string, OwnerReference>;

// Extract the first ownerReference from a K8s resource metadata
function getFirstOwner(metadata: V1ObjectMeta | undefined): OwnerReference | undefined {
  const ref = metadata?.ownerReferences?.[0];
  if (!ref) return undefined;
  return { kind: ref.kind, name: ref.name };
}

// Fetch ReplicaSets and Jobs in a namespace, build a map that resolves
// each intermediate owner (ReplicaSet → Deployment, Job → CronJob) to
// its parent workload.
export async function buildOwnerMap(namespace: string): Promise<OwnerMap> {
  const ownerMap: OwnerMap = new Map();

  const [replicaSets, jobs] = await Promise.all([fetchReplicaSetOwners(namespace), fetchJobOwners(namespace)]);

  // RS → Deployment
  for (const [rsName, parent] of replicaSets) {
    ownerMap.set(`ReplicaSet/${rsName}`, parent);
  }

  // Job → CronJob
  for (const [jobName, parent] of jobs) {
    ownerMap.set(`Job/${jobName}`, parent);
  }

  return ownerMap;
}

function collectOwners(items: { metadata?: V1ObjectMeta | undefined }[]): [string, OwnerReference][] {
  const entries: [string, OwnerReference][] = [];
  for (const item of items) {
    const parent = getFirstOwner(item.metadata);
    if (parent && item.metadata?.name) {
      entries.push([item.metadata.name, parent]);
    }
  }
  return entries;
}

// Without this map pods fall back to their direct owner, so a failure only coarsens grouping
async function fetchReplicaSetOwners(namespace: string): Promise<[string, OwnerReference][]> {
  try {
    const res = await k8sAppsApi.listNamespacedReplicaSet({ namespace });
    return collectOwners(res.items);
  } catch (error: unknown) {
    logger.warn(`Failed to fetch ReplicaSets for owner resolution: ${errorMessage(error)}`);
    return [];
  }
}

async function fetchJobOwners(namespace: string): Promise<[string, OwnerReference][]> {
  try {
    const res = await k8sBatchApi.listNamespacedJob({ namespace });
    return collectOwners(res.items);
  } catch (error: unknown) {
    logger.warn(`Failed to fetch Jobs for owner resolution: ${errorMessage(error)}`);
    return [];
  }
}

// Resolve a pod's ultimate owner workload.
// Walks up: Pod → ReplicaSet → Deployment, Pod → Job → CronJob, etc.
// Returns the highest-level owner found, or the direct owner if no parent exists.
export function resolveOwner(
  podOwnerRefs: OwnerReference[] | undefined,
  ownerMap: OwnerMap
): OwnerReference | undefined {
  const directOwner = podOwnerRefs?.[0];
  if (!directOwner) return undefined;

  const key = `${directOwner.kind}/${directOwner.name}`;

  // Check if the direct owner has a parent (e.g. RS → Deployment)
  const resolvedParent = ownerMap.get(key);
  return resolvedParent || directOwner;
}
