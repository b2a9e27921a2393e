import { getLogger } from '@fluidware-it/saddlebag';
import { k8sCoreApi } from './k8sClient';
import { ScopeUnavailableError, errorMessage } from '../errors';
import { runWorkerPool } from '../metrics/workerPool';
import { buildOwnerMap, resolveOwner, type OwnerMap } from '../utils/ownerResolver';
import { filterPodData, isActivePod, quotaCapacity, sumNodeAllocatable, type FilteredPod } from '../utils/k8sDataFilter';
import {
  describeScope,
  type AnalysisScope,
  type ClusterCapacity,
  type InventoryCollaborator,
  type InventoryFailure,
  type InventoryListing,
  type RawWorkload
} from '../types/k8s';

const logger = getLogger();

// Namespaces listed at once; each one issues three API calls (pods, ReplicaSets, Jobs)
export const NAMESPACE_CONCURRENCY = 4;

function earliest(a: string | undefined, b: string | undefined): string | undefined {
  if (!a) return b;
  if (!b) return a;
  return Date.parse(b) < Date.parse(a) ? b : a;
}

// Groups pods under the controller that ultimately owns them. A pod with no owner is its own workload.
export function groupPodsByWorkload(namespace: string, pods: FilteredPod[], ownerMap: OwnerMap): RawWorkload[] {
  const workloads = new Map<string, RawWorkload>();

  for (const pod of pods) {
    const owner = resolveOwner(pod.ownerReferences, ownerMap) ?? { kind: 'Pod', name: pod.name };
    const key = `${owner.kind}/${owner.name}`;
    let workload = workloads.get(key);
    if (!workload) {
      workload = { namespace, name: owner.name, kind: owner.kind, createdAt: pod.createdAt, pods: [] };
      workloads.set(key, workload);
    }
    workload.createdAt = earliest(workload.createdAt, pod.createdAt);
    workload.pods.push({ name: pod.name, createdAt: pod.createdAt, containers: pod.containers });
  }

  return [...workloads.values()];
}

async function listNamespaceWorkloads(namespace: string): Promise<RawWorkload[]> {
  const [podList, ownerMap] = await Promise.all([k8sCoreApi.listNamespacedPod({ namespace }), buildOwnerMap(namespace)]);
  const pods = podList.items.map(filterPodData).filter(isActivePod);
  return groupPodsByWorkload(namespace, pods, ownerMap);
}

async function listClusterWorkloads(): Promise<InventoryListing> {
  let namespaces: string[];
  try {
    const res = await k8sCoreApi.listNamespace();
    namespaces = res.items.map(ns => ns.metadata?.name).filter((name): name is string => !!name);
  } catch (error: unknown) {
    throw new ScopeUnavailableError('cluster', `cannot list namespaces: ${errorMessage(error)}`, { cause: error });
  }

  const listed = new Map<string, RawWorkload[]>();
  const failures: InventoryFailure[] = [];
  await runWorkerPool(namespaces, NAMESPACE_CONCURRENCY, async namespace => {
    try {
      listed.set(namespace, await listNamespaceWorkloads(namespace));
    } catch (error: unknown) {
      logger.warn(`Failed to list workloads in namespace ${namespace}: ${errorMessage(error)}`);
      failures.push({ namespace, message: errorMessage(error) });
    }
  });

  // Keep the namespace order the API returned, whichever worker finished first
  const workloads = namespaces.flatMap(namespace => listed.get(namespace) ?? []);
  failures.sort((a, b) => namespaces.indexOf(a.namespace) - namespaces.indexOf(b.namespace));
  if (namespaces.length > 0 && failures.length === namespaces.length) {
    throw new ScopeUnavailableError('cluster', 'workloads could not be listed in any namespace');
  }
  return { workloads, failures };
}

// Inventory collaborator backed by the Kubernetes API
export class KubernetesInventory implements InventoryCollaborator {
  async listWorkloadResourceSpecs(scope: AnalysisScope): Promise<InventoryListing> {
    if (scope.kind === 'cluster') {
      return listClusterWorkloads();
    }

    let workloads: RawWorkload[];
    try {
      workloads = await listNamespaceWorkloads(scope.namespace);
    } catch (error: unknown) {
      throw new ScopeUnavailableError(describeScope(scope), errorMessage(error), { cause: error });
    }

    if (scope.kind === 'workload') {
      workloads = workloads.filter(w => w.name === scope.workload);
      if (workloads.length === 0) {
        throw new ScopeUnavailableError(describeScope(scope), 'no running pods found for this workload');
      }
    }
    return { workloads, failures: [] };
  }

  async getClusterCapacity(scope: AnalysisScope): Promise<ClusterCapacity> {
    const cluster = async (): Promise<ClusterCapacity> => sumNodeAllocatable((await k8sCoreApi.listNode()).items);
    if (scope.kind === 'cluster') {
      return cluster();
    }

    let quota: ClusterCapacity = { cpuMillicores: null, memoryBytes: null };
    try {
      const res = await k8sCoreApi.listNamespacedResourceQuota({ namespace: scope.namespace });
      quota = quotaCapacity(res.items);
    } catch (error: unknown) {
      logger.warn(`Failed to read ResourceQuotas in ${scope.namespace}, using cluster capacity: ${errorMessage(error)}`);
    }
    if (quota.cpuMillicores !== null && quota.memoryBytes !== null) {
      return quota;
    }

    const allocatable = await cluster();
    return {
      cpuMillicores: quota.cpuMillicores ?? allocatable.cpuMillicores,
      memoryBytes: quota.memoryBytes ?? allocatable.memoryBytes
    };
  }
}
