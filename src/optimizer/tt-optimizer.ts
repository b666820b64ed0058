/**
 * TT Optimizer
 *
 * Minimizes a batched objective over a box discretized on a (possibly QTT
 * folded) grid, using the TT cross search. Usage:
 *
 *   const tto = new TTOptimizer(alpine, settings);
 *   tto.optimize(4);
 *   tto.info(); // "Alpine-100d | evals=1.0e+05 | y= 1.2345e+00 | e_x=... e_y=..."
 *
 * Counts every objective evaluation against the budget, optionally caches
 * evaluations by multi-index, and tracks the best point seen.
 */
import { setImmediate as yieldToEventLoop } from 'node:timers/promises';
import type { Logger } from 'pino';
import { Grid } from './grid';
import { TTCrossSearch } from './tt-cross';
import { BatchObjective, OptimizationSummary, OptimizerSettings } from './types';
import { formatExponential } from '../utils/format';
import { SeededRNG } from '../utils/rng';
import { OptimizationCancelledError, OptimizerServiceError } from '../utils/errors';
import defaultLogger from '../utils/logger';

export interface AsyncRunOptions {
  signal?: AbortSignal;
  /** Fibers to evaluate between yields to the event loop */
  yieldEvery?: number;
}

function norm(values: readonly number[]): number {
  return Math.sqrt(values.reduce((sum, v) => sum + v * v, 0));
}

export class TTOptimizer {
  readonly grid: Grid;
  private readonly objective: BatchObjective;
  private readonly settings: OptimizerSettings;
  private readonly budget: number;
  private readonly logger: Logger;
  private readonly cache = new Map<string, number>();
  private cacheOnlySteps = 0;
  private kEvals = 0;
  private kCache = 0;
  private y = Infinity;
  private x: number[] | null = null;
  private elapsed = 0;

  constructor(objective: BatchObjective, settings: OptimizerSettings, logger: Logger = defaultLogger) {
    if (!(settings.evaluations > 0)) {
      throw new RangeError(`evaluations must be positive, got ${settings.evaluations}`);
    }
    if (settings.xOptReal && settings.xOptReal.length !== settings.dimension) {
      throw new RangeError(
        `xOptReal has ${settings.xOptReal.length} entries, expected ${settings.dimension}`,
      );
    }

    this.grid = new Grid(settings.dimension, settings.lowerBound, settings.upperBound, settings.grid);
    this.objective = objective;
    this.settings = settings;
    this.budget = Math.floor(settings.evaluations);
    this.logger = logger;
  }

  get evaluations(): number {
    return this.kEvals;
  }

  get cacheHits(): number {
    return this.kCache;
  }

  get yOpt(): number {
    return this.y;
  }

  get xOpt(): number[] | null {
    return this.x ? [...this.x] : null;
  }

  /**
   * Relative (or absolute, for a zero reference) distance to the known minimizer.
   */
  get eX(): number | null {
    const real = this.settings.xOptReal;
    if (!real || !this.x) return null;
    const current = this.x;
    const diff = norm(real.map((v, j) => current[j] - v));
    const scale = norm(real);
    return scale > 0 ? diff / scale : diff;
  }

  get eY(): number | null {
    const real = this.settings.yOptReal;
    if (real === undefined || !Number.isFinite(this.y)) return null;
    const diff = Math.abs(this.y - real);
    return real !== 0 ? diff / Math.abs(real) : diff;
  }

  /**
   * Run the search to completion.
   */
  optimize(rank: number): OptimizationSummary {
    const started = Date.now();
    try {
      this.createSearch(rank).run();
    } finally {
      this.elapsed += Date.now() - started;
    }
    return this.summary();
  }

  /**
   * Run the search, yielding to the event loop between fibers so the process
   * keeps serving while it runs. Rejects with the abort reason when cancelled.
   */
  async optimizeAsync(rank: number, options: AsyncRunOptions = {}): Promise<OptimizationSummary> {
    const { signal, yieldEvery = 1 } = options;
    const search = this.createSearch(rank);
    let steps = 0;
    let started = Date.now();

    try {
      while (search.step()) {
        steps++;
        if (steps % yieldEvery === 0) {
          this.elapsed += Date.now() - started;
          await yieldToEventLoop();
          started = Date.now();
        }
        if (signal?.aborted) {
          throw signal.reason instanceof OptimizerServiceError
            ? signal.reason
            : new OptimizationCancelledError();
        }
      }
    } finally {
      this.elapsed += Date.now() - started;
    }

    return this.summary();
  }

  /**
   * One-line status report. Contains no timing, so identical runs give
   * identical reports.
   */
  info(): string {
    const parts: string[] = [];
    const { name } = this.settings;

    if (name) {
      parts.push(`${name}-${this.settings.dimension}d`.padEnd(10, ' '));
    }

    let evals = `evals=${formatExponential(this.kEvals, 1, 7)}`;
    if (this.settings.withCache) {
      evals += ` (+ ${formatExponential(this.kCache, 1, 7)})`;
    }
    parts.push(evals);
    parts.push(`y=${formatExponential(this.y, 4, 11)}`);

    const errors: string[] = [];
    const eX = this.eX;
    const eY = this.eY;
    if (eX !== null) errors.push(`e_x=${formatExponential(eX, 1, 7)}`);
    if (eY !== null) errors.push(`e_y=${formatExponential(eY, 1, 7)}`);
    if (errors.length > 0) {
      parts.push(errors.join(' '));
    }

    return parts.join(' | ');
  }

  summary(): OptimizationSummary {
    return {
      name: this.settings.name ?? '',
      dimension: this.settings.dimension,
      evaluations: this.kEvals,
      cacheHits: this.kCache,
      yOpt: this.y,
      xOpt: this.xOpt,
      eX: this.eX,
      eY: this.eY,
      elapsedMs: this.elapsed,
      report: this.info(),
    };
  }

  private createSearch(rank: number): TTCrossSearch {
    return new TTCrossSearch({
      modes: this.grid.modes,
      rank,
      rng: new SeededRNG(this.settings.seed),
      evaluate: (indices) => this.evaluate(indices),
      // with a cache a fiber may cost less than its size; evaluate() decides
      admits: (count) => this.settings.withCache === true || this.kEvals + count <= this.budget,
    });
  }

  private evaluate(indices: number[][]): number[] | null {
    const withCache = this.settings.withCache ?? false;
    const keys = indices.map((index) => index.join(','));

    const pending = new Map<string, number[]>();
    keys.forEach((key, s) => {
      if (!(withCache && this.cache.has(key)) && !pending.has(key)) {
        pending.set(key, indices[s]);
      }
    });

    // without a cache every requested index is evaluated, duplicates included
    const cost = withCache ? pending.size : indices.length;
    if (this.kEvals + cost > this.budget) {
      return null;
    }

    if (withCache && pending.size === 0) {
      this.cacheOnlySteps++;
      if (this.cacheOnlySteps >= this.grid.modes.length) {
        this.logger.warn(
          { evaluations: this.kEvals, cacheHits: this.kCache },
          'Optimizer converged early: a full sweep was served from cache',
        );
        return null;
      }
    } else {
      this.cacheOnlySteps = 0;
    }

    const requested = withCache ? [...pending.values()] : indices;
    const points = requested.map((index) => this.grid.pointOf(index));
    const values = points.length > 0 ? this.objective(points) : [];
    if (values.length !== points.length) {
      throw new RangeError(`objective returned ${values.length} values for ${points.length} points`);
    }

    let improved = false;
    for (let s = 0; s < values.length; s++) {
      if (values[s] < this.y) {
        this.y = values[s];
        this.x = points[s];
        improved = true;
      }
    }

    this.kEvals += cost;

    if (!withCache) {
      if (improved) this.logImprovement();
      return values;
    }

    requested.forEach((index, s) => this.cache.set(index.join(','), values[s]));
    this.kCache += indices.length - pending.size;
    if (improved) this.logImprovement();

    return keys.map((key) => {
      const value = this.cache.get(key);
      if (value === undefined) {
        throw new OptimizerServiceError(`cache miss for index ${key}`, 'CACHE_INVARIANT', 500);
      }
      return value;
    });
  }

  private logImprovement(): void {
    if (this.settings.withLog) {
      this.logger.debug({ evaluations: this.kEvals, yOpt: this.y }, this.info());
    }
  }
}
