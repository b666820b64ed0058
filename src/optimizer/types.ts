/**
 * Optimizer Contracts
 *
 * Types shared by the grid, the TT cross search and the optimizer handle.
 */

/**
 * Batched objective: samples x d points in, samples values out.
 */
export type BatchObjective = (points: number[][]) => number[];

/**
 * Grid discretization per dimension.
 *
 * - uniform: `size` points per dimension
 * - qtt: `factor ** exponent` points per dimension, each index folded into
 *   `exponent` digits of base `factor`
 */
export type GridSpec =
  | { kind: 'uniform'; size: number | number[] }
  | { kind: 'qtt'; factor: number; exponent: number };

export interface OptimizerSettings {
  dimension: number;
  lowerBound: number | number[];
  upperBound: number | number[];
  grid: GridSpec;
  /** Maximum number of objective evaluations for one run */
  evaluations: number;
  seed: number;
  /** Display name used in reports */
  name?: string;
  /** Known minimizer, only used for the e_x diagnostic */
  xOptReal?: number[];
  /** Known minimum, only used for the e_y diagnostic */
  yOptReal?: number;
  withLog?: boolean;
  withCache?: boolean;
}

/**
 * Multi-index evaluator handed to the search.
 * Returns null when the batch cannot be evaluated (budget spent, run stopped).
 */
export type TensorEvaluator = (indices: number[][]) => number[] | null;

export interface SearchState {
  bestIndex: number[] | null;
  bestValue: number;
  sweeps: number;
  steps: number;
}

export interface OptimizationSummary {
  name: string;
  dimension: number;
  evaluations: number;
  cacheHits: number;
  yOpt: number;
  xOpt: number[] | null;
  eX: number | null;
  eY: number | null;
  elapsedMs: number;
  report: string;
}
