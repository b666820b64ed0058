/**
 * Optimization Job Contracts
 */

export type JobStatus = 'queued' | 'running' | 'succeeded' | 'failed' | 'cancelled';

export const TERMINAL_STATUSES: readonly JobStatus[] = ['succeeded', 'failed', 'cancelled'];

export interface JobResult {
  y_opt: number;
  x_opt: number[] | null;
  evaluations: number;
  cache_hits: number;
  elapsed_ms: number;
}

export interface JobError {
  code: string;
  message: string;
}

/**
 * Public view of a job, as returned by the jobs API
 */
export interface OptimizationJob {
  job_id: string;
  status: JobStatus;
  objective: string;
  dimension: number;
  rank: number;
  evaluations_budget: number;
  created_at: string;
  started_at?: string;
  finished_at?: string;
  minimum_value?: string;
  result?: JobResult;
  error?: JobError;
}

export interface JobRunnerOptions {
  concurrency: number;
  timeoutMs: number;
  retentionMs: number;
  /** Interval of the eviction sweep; 0 disables it */
  sweepIntervalMs?: number;
  now?: () => number;
}
