// Canonical resource model

export type ResourceKind = 'cpu' | 'memory';

export const RESOURCE_KINDS: readonly ResourceKind[] = ['cpu', 'memory'];

export type QosClass = 'Guaranteed' | 'Burstable' | 'BestEffort';

// CPU in millicores, memory in bytes. null means the field was not declared.
export interface ResourcePair {
  request: number | null;
  limit: number | null;
}

export interface ResourceSnapshot {
  namespace: string;
  workloadName: string;
  workloadKind: string;
  podName: string;
  containerName: string;
  cpu: ResourcePair;
  memory: ResourcePair;
  workloadAgeSeconds: number;
  qosClass: QosClass;
}

// Identifies one container of one workload, independent of pod replicas
export interface WorkloadSelector {
  namespace: string;
  workloadName: string;
  workloadKind: string;
  containerName: string;
}

export function selectorOf(snapshot: ResourceSnapshot): WorkloadSelector {
  return {
    namespace: snapshot.namespace,
    workloadName: snapshot.workloadName,
    workloadKind: snapshot.workloadKind,
    containerName: snapshot.containerName
  };
}

export function selectorKey(selector: WorkloadSelector): string {
  return `${selector.namespace}/${selector.workloadKind}/${selector.workloadName}/${selector.containerName}`;
}
