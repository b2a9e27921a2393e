import { getLogger } from '@fluidware-it/saddlebag';
import { normalizeWorkloads } from '../analysis/normalizer';
import { computeOvercommit, type CapacityLookup } from '../analysis/overcommit';
import { recommendationFromOutcome } from '../analysis/reducer';
import { validateSnapshots } from '../analysis/validator';
import { resolveEngineOptions, type EngineOptions, type EngineOptionsInput } from '../config/options';
import { InvalidConfigurationError, ScopeUnavailableError, errorMessage } from '../errors';
import { executePlan, planQueries, prepareQueryWindow, windowUsed, type QueryWindow } from '../metrics/queryPlanner';
import { assembleReport } from '../report/assembler';
import {
  describeScope,
  type AnalysisScope,
  type InventoryCollaborator,
  type InventoryFailure,
  type InventoryListing,
  type RawWorkload
} from '../types/k8s';
import type { MetricsCollaborator, ResolvedWorkload, TimeRangeInput } from '../types/metrics';
import {
  IssueSeverity,
  type GovernanceReport,
  type QueryStatistics,
  type ValidationFinding,
  type WorkloadRecommendation
} from '../types/report';
import { selectorKey, selectorOf, type ResourceSnapshot } from '../types/resources';

const logger = getLogger();

export interface EngineCollaborators {
  inventory: InventoryCollaborator;
  metrics: MetricsCollaborator;
  clock?: () => Date;
}

interface HistoryResult {
  recommendations: WorkloadRecommendation[];
  statistics: QueryStatistics;
}

const NO_QUERIES: QueryStatistics = { total: 0, succeeded: 0, failed: 0, timedOut: 0, skipped: 0 };

function validateScope(scope: AnalysisScope): void {
  const issues: string[] = [];
  if (scope.kind !== 'cluster' && !scope.namespace) issues.push('scope.namespace: must not be empty');
  if (scope.kind === 'workload' && !scope.workload) issues.push('scope.workload: must not be empty');
  if (issues.length > 0) throw new InvalidConfigurationError(issues);
}

function isSystemNamespace(namespace: string, options: EngineOptions): boolean {
  return options.systemNamespacePrefixes.some(prefix => namespace.startsWith(prefix));
}

function partialFailureFinding(failure: InventoryFailure): ValidationFinding {
  return {
    ruleId: 'inventory-partial-failure',
    severity: IssueSeverity.WARNING,
    subject: { namespace: failure.namespace },
    message: `Workloads in namespace ${failure.namespace} could not be listed and are missing from this report`,
    detail: { text: failure.message },
    remediation: 'Check API server availability and RBAC permissions for this namespace, then regenerate the report'
  };
}

function toWorkloadRecommendation(
  resolved: ResolvedWorkload,
  snapshot: ResourceSnapshot,
  window: QueryWindow,
  options: EngineOptions
): WorkloadRecommendation {
  const used = windowUsed(window);
  return {
    selector: resolved.selector,
    category: snapshot.workloadAgeSeconds < options.newWorkloadThresholdDays * 86400 ? 'new' : 'established',
    current: {
      cpu: { ...snapshot.cpu },
      memory: { ...snapshot.memory },
      qosClass: snapshot.qosClass
    },
    cpu: recommendationFromOutcome(resolved.cpu, 'cpu', used, options),
    memory: recommendationFromOutcome(resolved.memory, 'memory', used, options)
  };
}

// Single-pass pipeline: normalize, validate and aggregate synchronously, then
// fetch history with bounded concurrency and assemble. Nothing is kept between calls.
export class GovernanceEngine {
  private readonly inventory: InventoryCollaborator;
  private readonly metrics: MetricsCollaborator;
  private readonly clock: () => Date;

  constructor(collaborators: EngineCollaborators) {
    this.inventory = collaborators.inventory;
    this.metrics = collaborators.metrics;
    this.clock = collaborators.clock ?? (() => new Date());
  }

  async generateReport(
    scope: AnalysisScope,
    timeRange: TimeRangeInput,
    overrides: EngineOptionsInput = {}
  ): Promise<GovernanceReport> {
    const options = resolveEngineOptions(overrides);
    validateScope(scope);
    const now = this.clock();
    const window = prepareQueryWindow(timeRange, now, options.maxSamplesPerSeries);
    const scopeName = describeScope(scope);

    logger.info(`Generating governance report for ${scopeName}`);
    const listing = await this.listWorkloads(scope);
    const workloads = this.filterWorkloads(scope, listing.workloads, options);

    const { snapshots, findings: dataQuality } = normalizeWorkloads(workloads, now);
    const findings = [
      ...listing.failures.map(partialFailureFinding),
      ...dataQuality,
      ...validateSnapshots(snapshots, options)
    ];
    logger.info(`${scopeName}: ${workloads.length} workload(s), ${snapshots.length} container snapshot(s), ${findings.length} finding(s)`);

    const [capacity, history] = await Promise.all([
      this.lookupCapacity(scope),
      options.historical
        ? this.collectHistory(snapshots, window, options)
        : Promise.resolve<HistoryResult>({ recommendations: [], statistics: NO_QUERIES })
    ]);

    return assembleReport({
      scope,
      generatedAt: now,
      window,
      findings,
      recommendations: history.recommendations,
      overcommit: computeOvercommit(capacity, snapshots, options),
      snapshots,
      totalWorkloads: workloads.length,
      queries: history.statistics
    });
  }

  private async listWorkloads(scope: AnalysisScope): Promise<InventoryListing> {
    try {
      return await this.inventory.listWorkloadResourceSpecs(scope);
    } catch (error: unknown) {
      if (error instanceof ScopeUnavailableError) throw error;
      throw new ScopeUnavailableError(describeScope(scope), errorMessage(error), { cause: error });
    }
  }

  private filterWorkloads(scope: AnalysisScope, workloads: RawWorkload[], options: EngineOptions): RawWorkload[] {
    if (scope.kind !== 'cluster' || options.includeSystemNamespaces) return workloads;
    return workloads.filter(w => !isSystemNamespace(w.namespace, options));
  }

  private async lookupCapacity(scope: AnalysisScope): Promise<CapacityLookup> {
    try {
      return { ok: true, capacity: await this.inventory.getClusterCapacity(scope) };
    } catch (error: unknown) {
      logger.warn(`Capacity lookup failed for ${describeScope(scope)}: ${errorMessage(error)}`);
      return { ok: false, reason: errorMessage(error) };
    }
  }

  private async collectHistory(
    snapshots: readonly ResourceSnapshot[],
    window: QueryWindow,
    options: EngineOptions
  ): Promise<HistoryResult> {
    const representative = new Map<string, ResourceSnapshot>();
    for (const snapshot of snapshots) {
      const key = selectorKey(selectorOf(snapshot));
      if (!representative.has(key)) representative.set(key, snapshot);
    }

    const plan = planQueries([...representative.values()].map(selectorOf), window);
    const execution = await executePlan(plan, this.metrics, options);

    const recommendations: WorkloadRecommendation[] = [];
    for (const resolved of execution.workloads) {
      const snapshot = representative.get(selectorKey(resolved.selector));
      if (snapshot) recommendations.push(toWorkloadRecommendation(resolved, snapshot, window, options));
    }
    return { recommendations, statistics: execution.statistics };
  }
}
