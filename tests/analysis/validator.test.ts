import { describe, it, expect } from 'vitest';
import { validateSnapshot, validateSnapshots } from '../../src/analysis/validator';
import { resolveEngineOptions } from '../../src/config/options';
import { IssueSeverity } from '../../src/types/report';
import type { ResourcePair, ResourceSnapshot } from '../../src/types/resources';

const MIB = 1024 * 1024;
const thresholds = resolveEngineOptions();

function snapshot(cpu: ResourcePair, memory: ResourcePair = { request: 128 * MIB, limit: 384 * MIB }): ResourceSnapshot {
  return {
    namespace: 'payments',
    workloadName: 'ledger',
    workloadKind: 'Deployment',
    podName: 'ledger-7d9f8b6c5-abcde',
    containerName: 'app',
    cpu,
    memory,
    workloadAgeSeconds: 86400,
    qosClass: 'Burstable'
  };
}

describe('validator', () => {
  it('should report nothing for a well-configured container', () => {
    expect(validateSnapshot(snapshot({ request: 100, limit: 300 }), thresholds)).toEqual([]);
  });

  it('should flag a missing CPU limit as a warning', () => {
    const findings = validateSnapshot(snapshot({ request: 50, limit: null }), thresholds);

    expect(findings).toHaveLength(1);
    expect(findings[0]?.ruleId).toBe('missing-limit');
    expect(findings[0]?.resource).toBe('cpu');
    expect(findings[0]?.severity).toBe(IssueSeverity.WARNING);
    expect(findings[0]?.detail?.text).toBe('request=50m, limit=none');
    expect(findings[0]?.remediation).toBe('Set resources.limits.cpu (e.g. 150m for a 3:1 ratio to request=50m)');
  });

  it('should flag a missing request as an error', () => {
    const findings = validateSnapshot(snapshot({ request: null, limit: null }), thresholds);

    expect(findings).toHaveLength(1);
    expect(findings[0]?.ruleId).toBe('missing-request');
    expect(findings[0]?.severity).toBe(IssueSeverity.ERROR);
    expect(findings[0]?.detail?.text).toBe('request=none, limit=none');
  });

  it('should mention the declared limit when only the request is missing', () => {
    const findings = validateSnapshot(snapshot({ request: null, limit: 500 }), thresholds);

    expect(findings[0]?.detail?.text).toBe('request=none, limit=500m');
    expect(findings[0]?.detail?.limit).toBe(500);
  });

  it('should flag a ratio far outside the band as an error', () => {
    const findings = validateSnapshot(snapshot({ request: 100, limit: 1000 }), thresholds);

    expect(findings).toHaveLength(1);
    expect(findings[0]?.ruleId).toBe('ratio-out-of-bounds');
    expect(findings[0]?.severity).toBe(IssueSeverity.ERROR);
    expect(findings[0]?.detail?.text).toBe('request=100m, limit=1000m, ratio=10.0');
    expect(findings[0]?.detail?.ratio).toBe(10);
    expect(findings[0]?.detail?.band).toEqual({ min: 1, max: 4.5 });
  });

  it('should flag a ratio just outside the band as a warning', () => {
    const findings = validateSnapshot(snapshot({ request: 100, limit: 500 }), thresholds);

    expect(findings[0]?.ruleId).toBe('ratio-out-of-bounds');
    expect(findings[0]?.severity).toBe(IssueSeverity.WARNING);
  });

  it('should accept a ratio on the edge of the band', () => {
    expect(validateSnapshot(snapshot({ request: 100, limit: 450 }), thresholds)).toEqual([]);
  });

  it('should accept requests equal to limits', () => {
    const guaranteed = snapshot({ request: 500, limit: 500 }, { request: 512 * MIB, limit: 512 * MIB });

    expect(validateSnapshot(guaranteed, thresholds)).toEqual([]);
  });

  it('should accept ratios between 1 and the lower edge of the tolerance band', () => {
    expect(validateSnapshot(snapshot({ request: 100, limit: 120 }), thresholds)).toEqual([]);
  });

  it('should flag a limit lower than the request as an error', () => {
    const findings = validateSnapshot(snapshot({ request: 200, limit: 100 }), thresholds);

    expect(findings[0]?.severity).toBe(IssueSeverity.ERROR);
    expect(findings[0]?.message).toBe('CPU limit:request ratio too low for container "app" (0.5:1)');
  });

  it('should not evaluate the ratio for a zero request', () => {
    const findings = validateSnapshot(
      snapshot({ request: 0, limit: 100 }),
      resolveEngineOptions({ minCpuRequestMillicores: 0 })
    );

    expect(findings).toEqual([]);
  });

  it('should flag requests below the minimum', () => {
    const findings = validateSnapshot(snapshot({ request: 5, limit: 15 }), thresholds);

    expect(findings).toHaveLength(1);
    expect(findings[0]?.ruleId).toBe('below-minimum-request');
    expect(findings[0]?.detail?.text).toBe('request=5m, minimum=10m');
    expect(findings[0]?.detail?.floor).toBe(10);
  });

  it('should order findings by rule, then CPU before memory', () => {
    const findings = validateSnapshot(
      snapshot({ request: null, limit: null }, { request: 16 * MIB, limit: null }),
      thresholds
    );

    expect(findings.map(f => `${f.ruleId}:${f.resource}`)).toEqual([
      'missing-request:cpu',
      'missing-limit:memory',
      'below-minimum-request:memory'
    ]);
  });

  it('should honour overridden thresholds', () => {
    const strict = resolveEngineOptions({ cpuLimitRatio: 2, ratioTolerance: 0.5 });

    expect(validateSnapshot(snapshot({ request: 100, limit: 300 }), strict).map(f => f.ruleId)).toEqual([
      'ratio-out-of-bounds'
    ]);
  });

  it('should return identical findings when run twice on the same snapshots', () => {
    const snapshots = [
      snapshot({ request: 50, limit: null }),
      { ...snapshot({ request: null, limit: null }, { request: 16 * MIB, limit: null }), containerName: 'sidecar' },
      { ...snapshot({ request: 100, limit: 1000 }), containerName: 'worker' },
      { ...snapshot({ request: 200, limit: 100 }), containerName: 'proxy' }
    ];

    const first = validateSnapshots(snapshots, thresholds);
    const second = validateSnapshots(snapshots, thresholds);

    expect(first).toHaveLength(6);
    expect(second).toEqual(first);
  });

  it('should validate every snapshot in order', () => {
    const first = snapshot({ request: 50, limit: null });
    const second = { ...snapshot({ request: null, limit: null }), containerName: 'sidecar' };

    expect(validateSnapshots([first, second], thresholds).map(f => f.subject.containerName)).toEqual(['app', 'sidecar']);
  });
});
