// Types for the inventory side of the engine (Kubernetes API responses reduced to what we need)

export interface OwnerReference {
  kind: string;
  name: string;
}

export type AnalysisScope =
  | { kind: 'cluster' }
  | { kind: 'namespace'; namespace: string }
  | { kind: 'workload'; namespace: string; workload: string };

export interface RawContainerSpec {
  name: string;
  requests?: Record<string, string> | undefined;
  limits?: Record<string, string> | undefined;
}

export interface RawPodSpec {
  name: string;
  createdAt?: string | undefined;
  containers: RawContainerSpec[];
}

// A controller (or a bare pod) with the pods it currently owns
export interface RawWorkload {
  namespace: string;
  name: string;
  kind: string;
  createdAt?: string | undefined;
  pods: RawPodSpec[];
}

export interface InventoryFailure {
  namespace: string;
  message: string;
}

export interface InventoryListing {
  workloads: RawWorkload[];
  failures: InventoryFailure[];
}

// Allocatable resources for a scope; null when the inventory does not know
export interface ClusterCapacity {
  cpuMillicores: number | null;
  memoryBytes: number | null;
}

export interface InventoryCollaborator {
  listWorkloadResourceSpecs(scope: AnalysisScope): Promise<InventoryListing>;
  getClusterCapacity(scope: AnalysisScope): Promise<ClusterCapacity>;
}

export function describeScope(scope: AnalysisScope): string {
  switch (scope.kind) {
    case 'cluster':
      return 'cluster';
    case 'namespace':
      return `namespace/${scope.namespace}`;
    case 'workload':
      return `workload/${scope.namespace}/${scope.workload}`;
  }
}
