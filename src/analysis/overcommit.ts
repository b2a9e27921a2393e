import type { EngineOptions } from '../config/options';
import type { ClusterCapacity } from '../types/k8s';
import type { OvercommitResult, OvercommitSeverity, ResourceOvercommit } from '../types/report';
import type { ResourceKind, ResourceSnapshot } from '../types/resources';

export type OvercommitThresholds = Pick<EngineOptions, 'overcommitWarning' | 'overcommitCritical'>;

// Capacity as the inventory reported it, or why it could not be determined
export type CapacityLookup = { ok: true; capacity: ClusterCapacity } | { ok: false; reason: string };

function classify(ratio: number, thresholds: OvercommitThresholds): OvercommitSeverity {
  if (ratio > thresholds.overcommitCritical) return 'critical';
  if (ratio > thresholds.overcommitWarning) return 'warning';
  return 'ok';
}

function capacityOf(resource: ResourceKind, capacity: ClusterCapacity): number | null {
  return resource === 'cpu' ? capacity.cpuMillicores : capacity.memoryBytes;
}

function aggregate(
  resource: ResourceKind,
  lookup: CapacityLookup,
  snapshots: readonly ResourceSnapshot[],
  thresholds: OvercommitThresholds
): ResourceOvercommit {
  let requested = 0;
  let unaccounted = 0;
  for (const snapshot of snapshots) {
    const request = snapshot[resource].request;
    if (request === null) {
      unaccounted++;
    } else {
      requested += request;
    }
  }

  if (!lookup.ok) {
    return { status: 'capacity-unknown', requested, unaccounted, reason: lookup.reason };
  }
  const capacity = capacityOf(resource, lookup.capacity);
  if (capacity === null || !Number.isFinite(capacity) || capacity <= 0) {
    return {
      status: 'capacity-unknown',
      requested,
      unaccounted,
      reason: capacity === null ? 'capacity not reported' : `capacity reported as ${capacity}`
    };
  }

  const ratio = requested / capacity;
  return { status: 'measured', capacity, requested, ratio, severity: classify(ratio, thresholds), unaccounted };
}

export function computeOvercommit(
  lookup: CapacityLookup,
  snapshots: readonly ResourceSnapshot[],
  thresholds: OvercommitThresholds
): OvercommitResult {
  return {
    cpu: aggregate('cpu', lookup, snapshots, thresholds),
    memory: aggregate('memory', lookup, snapshots, thresholds)
  };
}
