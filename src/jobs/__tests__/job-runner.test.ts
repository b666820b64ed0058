import { JobRunner, RunFunction } from '../job-runner';
import { OptimizationConfig, resolveOptimizationConfig } from '../../contracts/optimize';
import { OptimizerDefaults } from '../../config';
import { OptimizationSummary } from '../../optimizer';
import { runOptimization } from '../../services/optimization';
import { JobNotFoundError, JobStateError } from '../../utils/errors';

const defaults: OptimizerDefaults = {
  dimension: 100,
  lowerBound: -10,
  upperBound: 10,
  gridFactor: 2,
  gridExponent: 12,
  evaluations: 100000,
  rank: 4,
  seed: 42,
  objective: 'alpine',
  name: 'Alpine',
  xOptReal: 1,
  withLog: false,
  withCache: false,
};

const smallConfig: OptimizationConfig = resolveOptimizationConfig(
  { dimension: 2, lower_bound: -2, upper_bound: 2, grid_size: 5, rank: 5, evaluations: 100 },
  defaults,
);

const summary: OptimizationSummary = {
  name: 'Alpine',
  dimension: 2,
  evaluations: 100,
  cacheHits: 0,
  yOpt: 0,
  xOpt: [0, 0],
  eX: 0,
  eY: 0,
  elapsedMs: 3,
  report: 'report',
};

interface Deferred {
  resolve: (value: OptimizationSummary) => void;
  reject: (reason: unknown) => void;
}

/**
 * Run function whose calls are settled by the test, or by the abort signal.
 */
function controllableRun(): { run: jest.Mock<ReturnType<RunFunction>, Parameters<RunFunction>>; calls: Deferred[] } {
  const calls: Deferred[] = [];
  const run = jest.fn<ReturnType<RunFunction>, Parameters<RunFunction>>(
    (_config, signal) =>
      new Promise<OptimizationSummary>((resolve, reject) => {
        calls.push({ resolve, reject });
        signal.addEventListener('abort', () => reject(signal.reason));
      }),
  );
  return { run, calls };
}

const flush = () => new Promise<void>((resolve) => setImmediate(resolve));

describe('JobRunner', () => {
  let runner: JobRunner;
  let clock: number;

  const createRunner = (run: RunFunction, overrides: Partial<{ concurrency: number; timeoutMs: number }> = {}) =>
    new JobRunner({
      concurrency: overrides.concurrency ?? 1,
      timeoutMs: overrides.timeoutMs ?? 60000,
      retentionMs: 1000,
      sweepIntervalMs: 0,
      now: () => clock,
    }, run);

  beforeEach(() => {
    clock = Date.UTC(2026, 0, 1);
  });

  afterEach(() => {
    runner?.close();
  });

  it('should start a submitted job and record its result', async () => {
    const { run, calls } = controllableRun();
    runner = createRunner(run);

    const job = runner.submit(smallConfig);
    expect(job.status).toBe('running');
    expect(job.objective).toBe('alpine');
    expect(job.dimension).toBe(2);
    expect(job.evaluations_budget).toBe(100);
    expect(job.created_at).toBe('2026-01-01T00:00:00.000Z');

    calls[0].resolve(summary);
    const finished = await runner.waitFor(job.job_id);

    expect(finished.status).toBe('succeeded');
    expect(finished.minimum_value).toBe('report');
    expect(finished.result).toEqual({
      y_opt: 0,
      x_opt: [0, 0],
      evaluations: 100,
      cache_hits: 0,
      elapsed_ms: 3,
    });
    expect(finished.finished_at).toBe('2026-01-01T00:00:00.000Z');
  });

  it('should queue jobs beyond the concurrency limit', async () => {
    const { run, calls } = controllableRun();
    runner = createRunner(run);

    const first = runner.submit(smallConfig);
    const second = runner.submit(smallConfig);

    expect(second.status).toBe('queued');
    expect(run).toHaveBeenCalledTimes(1);

    calls[0].resolve(summary);
    await runner.waitFor(first.job_id);
    await flush();

    expect(run).toHaveBeenCalledTimes(2);
    expect(runner.get(second.job_id).status).toBe('running');

    calls[1].resolve(summary);
    await runner.waitFor(second.job_id);
    expect(runner.countByStatus()).toEqual({
      queued: 0,
      running: 0,
      succeeded: 2,
      failed: 0,
      cancelled: 0,
    });
  });

  it('should cancel a queued job without running it', async () => {
    const { run } = controllableRun();
    runner = createRunner(run);

    runner.submit(smallConfig);
    const queued = runner.submit(smallConfig);
    const cancelled = runner.cancel(queued.job_id);

    expect(cancelled.status).toBe('cancelled');
    expect(cancelled.error).toEqual({
      code: 'OPTIMIZATION_CANCELLED',
      message: 'Optimization was cancelled',
    });
    expect(run).toHaveBeenCalledTimes(1);
  });

  it('should cancel a running job through its abort signal', async () => {
    const { run } = controllableRun();
    runner = createRunner(run);

    const job = runner.submit(smallConfig);
    runner.cancel(job.job_id);
    const finished = await runner.waitFor(job.job_id);

    expect(finished.status).toBe('cancelled');
    expect(finished.error?.code).toBe('OPTIMIZATION_CANCELLED');
  });

  it('should refuse to cancel a finished job', async () => {
    const { run, calls } = controllableRun();
    runner = createRunner(run);

    const job = runner.submit(smallConfig);
    calls[0].resolve(summary);
    await runner.waitFor(job.job_id);

    expect(() => runner.cancel(job.job_id)).toThrow(JobStateError);
  });

  it('should fail jobs that exceed the timeout', async () => {
    const { run } = controllableRun();
    runner = createRunner(run, { timeoutMs: 10 });

    const job = runner.submit(smallConfig);
    const finished = await runner.waitFor(job.job_id);

    expect(finished.status).toBe('failed');
    expect(finished.error).toEqual({
      code: 'OPTIMIZATION_TIMEOUT',
      message: 'Optimization exceeded 10 ms',
    });
  });

  it('should record unexpected failures', async () => {
    const { run, calls } = controllableRun();
    runner = createRunner(run);

    const job = runner.submit(smallConfig);
    calls[0].reject(new Error('boom'));
    const finished = await runner.waitFor(job.job_id);

    expect(finished.status).toBe('failed');
    expect(finished.error).toEqual({ code: 'OPTIMIZATION_ERROR', message: 'boom' });
  });

  it('should throw for unknown jobs', () => {
    runner = createRunner(controllableRun().run);
    expect(() => runner.get('missing')).toThrow(JobNotFoundError);
  });

  it('should evict finished jobs after the retention period', async () => {
    const { run, calls } = controllableRun();
    runner = createRunner(run);

    const job = runner.submit(smallConfig);
    calls[0].resolve(summary);
    await runner.waitFor(job.job_id);

    clock += 999;
    expect(runner.evictExpired()).toBe(0);

    clock += 1;
    expect(runner.evictExpired()).toBe(1);
    expect(() => runner.get(job.job_id)).toThrow(JobNotFoundError);
  });

  it('should run the real optimizer and report like the synchronous path', async () => {
    runner = new JobRunner({ concurrency: 1, timeoutMs: 60000, retentionMs: 1000, sweepIntervalMs: 0 });

    const job = runner.submit(smallConfig);
    const finished = await runner.waitFor(job.job_id);

    expect(finished.status).toBe('succeeded');
    expect(finished.minimum_value).toBe(runOptimization(smallConfig).report);
    expect(finished.minimum_value).toBe('Alpine-2d  | evals=1.0e+02 | y= 0.0000e+00 | e_x=1.0e+00 e_y=0.0e+00');
  });
});
