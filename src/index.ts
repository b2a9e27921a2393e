import * as dotenv from 'dotenv';
import { getLogger } from '@fluidware-it/saddlebag';
import { parseArgs, scopeFromArgs } from './cli/parser';
import { getConfig, parseRangePreset } from './config/config';
import type { EngineOptionsInput } from './config/options';
import { getCurrentContext, switchContext } from './cluster/k8sClient';
import { KubernetesInventory } from './cluster/inventory';
import { GovernanceEngine } from './engine/governanceEngine';
import { PrometheusMetricsClient } from './metrics/prometheusClient';
import { formatReport } from './utils/reportFormatter';

dotenv.config();

const logger = getLogger();

async function main() {
  const args = parseArgs(process.argv.slice(2));
  const config = getConfig();

  if (args.context) {
    switchContext(args.context);
    logger.info(`Using context: ${args.context}`);
  } else {
    logger.info(`Using current context: ${getCurrentContext()}`);
  }

  const range = args.range === undefined ? config.defaultRange : parseRangePreset(args.range);
  if (!range) {
    throw new Error(`Unsupported range "${args.range}". Use one of 1h, 6h, 24h, 7d, 30d`);
  }

  const overrides: EngineOptionsInput = { historical: args.history };
  if (args.percentile !== undefined) overrides.percentile = args.percentile;
  if (config.queryConcurrency !== undefined) overrides.concurrency = config.queryConcurrency;
  if (config.queryTimeoutMs !== undefined) overrides.queryTimeoutMs = config.queryTimeoutMs;

  const engine = new GovernanceEngine({
    inventory: new KubernetesInventory(),
    metrics: new PrometheusMetricsClient({ baseUrl: config.prometheusUrl, token: config.prometheusToken })
  });

  const report = await engine.generateReport(scopeFromArgs(args), range, overrides);

  // eslint-disable-next-line no-console
  console.log(formatReport(report));
  logger.info(`Report complete. ${report.summary.totalFindings} finding(s), ${report.recommendations.length} recommendation(s).`);
}

main().catch((e: unknown) => {
  logger.error(e instanceof Error ? e.message : String(e));
  process.exitCode = 1;
});
