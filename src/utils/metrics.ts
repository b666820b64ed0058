/**
 * Service Metrics
 *
 * Provides structured metrics for:
 * - Optimization run duration
 * - Objective evaluations and cache hits
 * - Job lifecycle
 * - HTTP request duration
 */

import { Counter, Histogram, Gauge, Registry, collectDefaultMetrics } from 'prom-client';

export const metricsRegistry = new Registry();

collectDefaultMetrics({ register: metricsRegistry });

/**
 * Optimization run duration histogram
 */
export const optimizationDuration = new Histogram({
  name: 'tt_optimization_duration_ms',
  help: 'Optimization run duration in milliseconds',
  labelNames: ['objective', 'mode', 'outcome'],
  buckets: [10, 50, 100, 500, 1000, 5000, 10000, 30000, 60000, 300000],
  registers: [metricsRegistry],
});

export const objectiveEvaluations = new Counter({
  name: 'tt_objective_evaluations_total',
  help: 'Total objective function evaluations',
  labelNames: ['objective'],
  registers: [metricsRegistry],
});

export const cacheHits = new Counter({
  name: 'tt_objective_cache_hits_total',
  help: 'Objective evaluations served from the cache',
  labelNames: ['objective'],
  registers: [metricsRegistry],
});

export const jobsByStatus = new Gauge({
  name: 'tt_jobs',
  help: 'Number of tracked optimization jobs by status',
  labelNames: ['status'],
  registers: [metricsRegistry],
});

export const requestDuration = new Histogram({
  name: 'tt_request_duration_ms',
  help: 'HTTP request duration in milliseconds',
  labelNames: ['method', 'path', 'status'],
  buckets: [5, 10, 25, 50, 100, 250, 500, 1000, 2500, 5000],
  registers: [metricsRegistry],
});

/**
 * Record a finished optimization run
 */
export function recordOptimization(
  objective: string,
  mode: 'sync' | 'job',
  outcome: 'succeeded' | 'failed' | 'cancelled',
  durationMs: number,
  evaluations: number,
  hits: number,
): void {
  optimizationDuration.observe({ objective, mode, outcome }, durationMs);
  objectiveEvaluations.inc({ objective }, evaluations);
  if (hits > 0) {
    cacheHits.inc({ objective }, hits);
  }
}

export function recordRequest(method: string, path: string, status: number, durationMs: number): void {
  requestDuration.observe({ method, path, status: String(status) }, durationMs);
}
