/**
 * Optimization Runs
 *
 * Builds the optimizer for a resolved configuration, runs it and records
 * the outcome. Shared by the synchronous endpoint and the job runner.
 */
import type { Logger } from 'pino';
import { OptimizationConfig } from '../contracts/optimize';
import { withDimensionCheck } from '../objectives';
import { OptimizationSummary, TTOptimizer } from '../optimizer';
import { OptimizationCancelledError } from '../utils/errors';
import { formatSeconds } from '../utils/format';
import defaultLogger from '../utils/logger';
import { recordOptimization } from '../utils/metrics';

const SEPARATOR = '-'.repeat(70);

export function createOptimizer(config: OptimizationConfig, logger: Logger = defaultLogger): TTOptimizer {
  const { objective, settings } = config;
  return new TTOptimizer(withDimensionCheck(objective.evaluate, settings.dimension), settings, logger);
}

function logSummary(logger: Logger, config: OptimizationConfig, summary: OptimizationSummary): void {
  logger.info(
    {
      objective: config.objective.id,
      dimension: summary.dimension,
      evaluations: summary.evaluations,
      cacheHits: summary.cacheHits,
      yOpt: summary.yOpt,
      elapsed: formatSeconds(summary.elapsedMs),
    },
    `${SEPARATOR}\n${summary.report}\n`,
  );
}

/**
 * Run to completion on the calling stack.
 */
export function runOptimization(config: OptimizationConfig, logger: Logger = defaultLogger): OptimizationSummary {
  const optimizer = createOptimizer(config, logger);
  const started = Date.now();

  try {
    const summary = optimizer.optimize(config.rank);
    recordOptimization(config.objective.id, 'sync', 'succeeded', Date.now() - started, summary.evaluations, summary.cacheHits);
    logSummary(logger, config, summary);
    return summary;
  } catch (error) {
    recordOptimization(config.objective.id, 'sync', 'failed', Date.now() - started, optimizer.evaluations, optimizer.cacheHits);
    throw error;
  }
}

/**
 * Run cooperatively; rejects with the abort reason when the signal fires.
 */
export async function runOptimizationAsync(
  config: OptimizationConfig,
  signal: AbortSignal,
  logger: Logger = defaultLogger,
): Promise<OptimizationSummary> {
  const optimizer = createOptimizer(config, logger);
  const started = Date.now();

  try {
    const summary = await optimizer.optimizeAsync(config.rank, { signal });
    recordOptimization(config.objective.id, 'job', 'succeeded', Date.now() - started, summary.evaluations, summary.cacheHits);
    logSummary(logger, config, summary);
    return summary;
  } catch (error) {
    const outcome = error instanceof OptimizationCancelledError ? 'cancelled' : 'failed';
    recordOptimization(config.objective.id, 'job', outcome, Date.now() - started, optimizer.evaluations, optimizer.cacheHits);
    throw error;
  }
}
