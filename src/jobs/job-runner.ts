/**
 * Optimization Job Runner
 *
 * In-memory job queue for optimization runs:
 * - bounded concurrency, FIFO start order
 * - per-job timeout and cancellation through AbortController
 * - finished jobs are evicted after the retention period
 */
import type { Logger } from 'pino';
import { v4 as uuidv4 } from 'uuid';
import { OptimizationConfig } from '../contracts/optimize';
import { OptimizationSummary } from '../optimizer';
import { runOptimizationAsync } from '../services/optimization';
import {
  JobNotFoundError,
  JobStateError,
  OptimizationCancelledError,
  OptimizationTimeoutError,
  OptimizerServiceError,
} from '../utils/errors';
import defaultLogger from '../utils/logger';
import { jobsByStatus } from '../utils/metrics';
import { JobRunnerOptions, JobStatus, OptimizationJob, TERMINAL_STATUSES } from './types';

export type RunFunction = (
  config: OptimizationConfig,
  signal: AbortSignal,
  logger: Logger,
) => Promise<OptimizationSummary>;

interface JobEntry {
  record: OptimizationJob;
  config: OptimizationConfig;
  finishedAt?: number;
  controller?: AbortController;
  done: Promise<void>;
  settle: () => void;
}

export class JobRunner {
  private readonly jobs = new Map<string, JobEntry>();
  private readonly queue: string[] = [];
  private running = 0;
  private readonly options: Required<JobRunnerOptions>;
  private readonly run: RunFunction;
  private readonly logger: Logger;
  private readonly sweepTimer?: NodeJS.Timeout;

  constructor(options: JobRunnerOptions, run: RunFunction = runOptimizationAsync, logger: Logger = defaultLogger) {
    if (!Number.isInteger(options.concurrency) || options.concurrency < 1) {
      throw new RangeError(`concurrency must be a positive integer, got ${options.concurrency}`);
    }
    this.options = {
      sweepIntervalMs: 60000,
      now: Date.now,
      ...options,
    };
    this.run = run;
    this.logger = logger;

    if (this.options.sweepIntervalMs > 0) {
      this.sweepTimer = setInterval(() => this.evictExpired(), this.options.sweepIntervalMs);
      this.sweepTimer.unref();
    }
  }

  submit(config: OptimizationConfig): OptimizationJob {
    let settle: () => void = () => undefined;
    const done = new Promise<void>((resolve) => {
      settle = resolve;
    });

    const record: OptimizationJob = {
      job_id: uuidv4(),
      status: 'queued',
      objective: config.objective.id,
      dimension: config.settings.dimension,
      rank: config.rank,
      evaluations_budget: config.settings.evaluations,
      created_at: this.timestamp(),
    };

    this.jobs.set(record.job_id, { record, config, done, settle });
    this.queue.push(record.job_id);
    this.logger.info({ job_id: record.job_id, objective: record.objective }, 'Optimization job queued');

    this.pump();
    this.updateGauge();
    return { ...record };
  }

  get(jobId: string): OptimizationJob {
    return { ...this.entry(jobId).record };
  }

  list(): OptimizationJob[] {
    return [...this.jobs.values()].map((entry) => ({ ...entry.record }));
  }

  /**
   * Cancel a queued or running job. Running jobs stop at the next fiber.
   */
  cancel(jobId: string): OptimizationJob {
    const entry = this.entry(jobId);
    const { status } = entry.record;

    if (TERMINAL_STATUSES.includes(status)) {
      throw new JobStateError(`Job ${jobId} already ${status}`, { job_id: jobId, status });
    }

    if (status === 'queued') {
      const position = this.queue.indexOf(jobId);
      if (position >= 0) this.queue.splice(position, 1);
      this.finish(entry, 'cancelled', undefined, new OptimizationCancelledError());
    } else {
      entry.controller?.abort(new OptimizationCancelledError());
    }

    return { ...entry.record };
  }

  /**
   * Resolves once the job reaches a terminal status.
   */
  async waitFor(jobId: string): Promise<OptimizationJob> {
    const entry = this.entry(jobId);
    await entry.done;
    return { ...entry.record };
  }

  countByStatus(): Record<JobStatus, number> {
    const counts: Record<JobStatus, number> = {
      queued: 0,
      running: 0,
      succeeded: 0,
      failed: 0,
      cancelled: 0,
    };
    for (const entry of this.jobs.values()) {
      counts[entry.record.status]++;
    }
    return counts;
  }

  /**
   * Drop finished jobs older than the retention period. Returns how many were removed.
   */
  evictExpired(): number {
    const cutoff = this.options.now() - this.options.retentionMs;
    let removed = 0;
    for (const [jobId, entry] of this.jobs.entries()) {
      if (entry.finishedAt !== undefined && entry.finishedAt <= cutoff) {
        this.jobs.delete(jobId);
        removed++;
      }
    }
    if (removed > 0) {
      this.logger.debug({ removed }, 'Evicted finished optimization jobs');
      this.updateGauge();
    }
    return removed;
  }

  /**
   * Stop the eviction sweep and cancel everything still pending.
   */
  close(): void {
    if (this.sweepTimer) clearInterval(this.sweepTimer);
    for (const entry of this.jobs.values()) {
      if (entry.record.status === 'queued' || entry.record.status === 'running') {
        this.cancel(entry.record.job_id);
      }
    }
  }

  private entry(jobId: string): JobEntry {
    const entry = this.jobs.get(jobId);
    if (!entry) {
      throw new JobNotFoundError(jobId);
    }
    return entry;
  }

  private pump(): void {
    while (this.running < this.options.concurrency && this.queue.length > 0) {
      const jobId = this.queue.shift();
      const entry = jobId ? this.jobs.get(jobId) : undefined;
      if (entry) {
        this.start(entry);
      }
    }
  }

  private start(entry: JobEntry): void {
    const { record } = entry;
    const controller = new AbortController();
    const timeoutMs = this.options.timeoutMs;
    const timer = setTimeout(() => controller.abort(new OptimizationTimeoutError(timeoutMs)), timeoutMs);
    timer.unref();

    entry.controller = controller;
    record.status = 'running';
    record.started_at = this.timestamp();
    this.running++;
    this.updateGauge();

    const jobLogger = this.logger.child({ job_id: record.job_id });
    jobLogger.info('Optimization job started');

    this.run(entry.config, controller.signal, jobLogger)
      .then(
        (summary) => this.finish(entry, 'succeeded', summary),
        (error: unknown) => {
          const status = error instanceof OptimizationCancelledError ? 'cancelled' : 'failed';
          this.finish(entry, status, undefined, error);
        },
      )
      .finally(() => {
        clearTimeout(timer);
        this.running--;
        this.pump();
      })
      .catch((error: unknown) => {
        jobLogger.error({ error }, 'Optimization job bookkeeping failed');
      });
  }

  private finish(entry: JobEntry, status: JobStatus, summary?: OptimizationSummary, error?: unknown): void {
    const { record } = entry;
    record.status = status;
    record.finished_at = this.timestamp();
    entry.finishedAt = this.options.now();
    entry.controller = undefined;

    if (summary) {
      record.minimum_value = summary.report;
      record.result = {
        y_opt: summary.yOpt,
        x_opt: summary.xOpt,
        evaluations: summary.evaluations,
        cache_hits: summary.cacheHits,
        elapsed_ms: summary.elapsedMs,
      };
    }

    if (error !== undefined) {
      record.error =
        error instanceof OptimizerServiceError
          ? { code: error.code, message: error.message }
          : { code: 'OPTIMIZATION_ERROR', message: error instanceof Error ? error.message : String(error) };
    }

    if (status === 'failed') {
      this.logger.error({ job_id: record.job_id, error: record.error }, 'Optimization job failed');
    } else {
      this.logger.info({ job_id: record.job_id, status }, 'Optimization job finished');
    }

    entry.settle();
    this.updateGauge();
  }

  private updateGauge(): void {
    const counts = this.countByStatus();
    for (const [status, count] of Object.entries(counts)) {
      jobsByStatus.set({ status }, count);
    }
  }

  private timestamp(): string {
    return new Date(this.options.now()).toISOString();
  }
}
