import { describe, it, expect } from 'vitest';
import { parseArgs, scopeFromArgs } from '../../src/cli/parser';

describe('CLI Parser', () => {
  describe('parseArgs', () => {
    it('should return default values when no arguments provided', () => {
      const args = parseArgs([]);

      expect(args.namespace).toBe('default');
      expect(args.allNamespaces).toBe(false);
      expect(args.workload).toBeUndefined();
      expect(args.context).toBeUndefined();
      expect(args.range).toBeUndefined();
      expect(args.percentile).toBeUndefined();
      expect(args.history).toBe(true);
    });

    it('should parse namespace as first positional argument', () => {
      const args = parseArgs(['payments']);

      expect(args.namespace).toBe('payments');
    });

    it('should parse --context flag', () => {
      const args = parseArgs(['--context', 'prod-cluster']);

      expect(args.context).toBe('prod-cluster');
    });

    it('should parse -c shorthand for context', () => {
      const args = parseArgs(['-c', 'staging-cluster']);

      expect(args.context).toBe('staging-cluster');
    });

    it('should handle = syntax for context', () => {
      const args = parseArgs(['--context=prod']);

      expect(args.context).toBe('prod');
    });

    it('should parse --workload and -w', () => {
      expect(parseArgs(['--workload', 'api']).workload).toBe('api');
      expect(parseArgs(['-w', 'worker']).workload).toBe('worker');
      expect(parseArgs(['--workload=cron']).workload).toBe('cron');
    });

    it('should parse --range and -r', () => {
      expect(parseArgs(['--range', '7d']).range).toBe('7d');
      expect(parseArgs(['-r', '1h']).range).toBe('1h');
      expect(parseArgs(['--range=30d']).range).toBe('30d');
    });

    it('should parse --percentile as a number', () => {
      expect(parseArgs(['--percentile', '99']).percentile).toBe(99);
      expect(parseArgs(['--percentile=90']).percentile).toBe(90);
    });

    it('should parse --all and --no-history', () => {
      const args = parseArgs(['--all', '--no-history']);

      expect(args.allNamespaces).toBe(true);
      expect(args.history).toBe(false);
    });

    it('should parse namespace after flags', () => {
      const args = parseArgs(['--context', 'my-cluster', 'my-namespace']);

      expect(args.namespace).toBe('my-namespace');
      expect(args.context).toBe('my-cluster');
    });

    it('should parse all flags together', () => {
      const args = parseArgs(['monitoring', '-c', 'prod', '-w', 'grafana', '-r', '6h', '--no-history']);

      expect(args.namespace).toBe('monitoring');
      expect(args.context).toBe('prod');
      expect(args.workload).toBe('grafana');
      expect(args.range).toBe('6h');
      expect(args.history).toBe(false);
    });
  });

  describe('scopeFromArgs', () => {
    it('should build a cluster scope for --all', () => {
      expect(scopeFromArgs(parseArgs(['--all', 'ignored']))).toEqual({ kind: 'cluster' });
    });

    it('should build a workload scope when a workload is given', () => {
      expect(scopeFromArgs(parseArgs(['payments', '-w', 'ledger']))).toEqual({
        kind: 'workload',
        namespace: 'payments',
        workload: 'ledger'
      });
    });

    it('should default to a namespace scope', () => {
      expect(scopeFromArgs(parseArgs(['payments']))).toEqual({ kind: 'namespace', namespace: 'payments' });
    });
  });
});
