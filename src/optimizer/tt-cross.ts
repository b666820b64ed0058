/**
 * TT cross search.
 *
 * Minimizes a tensor given only as a black-box multi-index evaluator. Each
 * step evaluates one fiber (left index set x mode x right index set) of the
 * current TT core, maps the values so that the smallest seen so far dominate,
 * and picks the next left or right index set with QR + maxvol. Sweeps run
 * left to right and back until the evaluator refuses a batch.
 */
import { Matrix, maxvol, qr } from './linalg';
import { SearchState, TensorEvaluator } from './types';
import { DeterministicRNG } from '../utils/rng';

export interface TTCrossOptions {
  modes: readonly number[];
  rank: number;
  rng: DeterministicRNG;
  evaluate: TensorEvaluator;
  /**
   * Asked with the size of the next fiber before its multi-indices are
   * built. Returning false ends the search.
   */
  admits?: (count: number) => boolean;
}

/**
 * TT ranks bounded by `rank` and by the sizes of the left and right subtensors.
 */
export function boundedRanks(modes: readonly number[], rank: number): number[] {
  const d = modes.length;
  const ranks = new Array<number>(d + 1).fill(1);
  let left = 1;
  for (let k = 1; k < d; k++) {
    left = Math.min(left * modes[k - 1], rank);
    ranks[k] = left;
  }
  let right = 1;
  for (let k = d - 1; k > 0; k--) {
    right = Math.min(right * modes[k], rank);
    ranks[k] = Math.min(ranks[k], right);
  }
  return ranks;
}

/**
 * Larger for values closer to (or below) the current best.
 */
export function emphasizeMinimum(values: readonly number[], best: number): number[] {
  return values.map((y) => Math.PI / 2 - Math.atan(y - best));
}

export class TTCrossSearch {
  readonly modes: readonly number[];
  readonly ranks: readonly number[];
  private readonly evaluate: TensorEvaluator;
  private readonly admits: (count: number) => boolean;
  private readonly leftSets: number[][][];
  private readonly rightSets: number[][][];
  private core: number;
  private leftToRight = true;
  private finished = false;
  private state: SearchState = {
    bestIndex: null,
    bestValue: Infinity,
    sweeps: 0,
    steps: 0,
  };

  constructor(options: TTCrossOptions) {
    const { modes, rank, rng, evaluate, admits = () => true } = options;
    if (modes.length === 0) {
      throw new RangeError('tensor must have at least one mode');
    }
    if (!Number.isInteger(rank) || rank < 1) {
      throw new RangeError(`rank must be a positive integer, got ${rank}`);
    }

    this.modes = modes;
    this.ranks = boundedRanks(modes, rank);
    this.evaluate = evaluate;
    this.admits = admits;
    this.core = 0;

    const d = modes.length;
    this.leftSets = new Array<number[][]>(d + 1).fill([]);
    this.rightSets = new Array<number[][]>(d + 1).fill([]);
    this.leftSets[0] = [[]];
    this.rightSets[d] = [[]];
    this.initRightSets(rng);
  }

  get isFinished(): boolean {
    return this.finished;
  }

  get snapshot(): Readonly<SearchState> {
    return { ...this.state };
  }

  /**
   * Random TT cores, orthogonalized right to left; maxvol on each Q factor
   * gives the initial right index sets.
   */
  private initRightSets(rng: DeterministicRNG): void {
    const d = this.modes.length;
    let carry = Matrix.identity(1);

    for (let k = d - 1; k > 0; k--) {
      const n = this.modes[k];
      const rLeft = this.ranks[k];
      const rRight = this.ranks[k + 1];

      // rows (i, alpha), cols beta: the transposed unfolding of core k times carry
      const tall = new Matrix(n * rRight, rLeft);
      for (let beta = 0; beta < rLeft; beta++) {
        for (let i = 0; i < n; i++) {
          const fiber = new Float64Array(rRight);
          for (let gamma = 0; gamma < rRight; gamma++) {
            fiber[gamma] = rng.nextNormal();
          }
          for (let alpha = 0; alpha < rRight; alpha++) {
            let sum = 0;
            for (let gamma = 0; gamma < rRight; gamma++) {
              sum += fiber[gamma] * carry.get(gamma, alpha);
            }
            tall.set(i * rRight + alpha, beta, sum);
          }
        }
      }

      const { q, r } = qr(tall);
      this.rightSets[k] = this.rightSetFrom(maxvol(q), k);
      carry = r.transpose();
    }
  }

  private leftSetFrom(rows: number[], k: number): number[][] {
    const n = this.modes[k];
    return rows.map((row) => [...this.leftSets[k][Math.floor(row / n)], row % n]);
  }

  private rightSetFrom(rows: number[], k: number): number[][] {
    const rRight = this.ranks[k + 1];
    return rows.map((row) => [Math.floor(row / rRight), ...this.rightSets[k + 1][row % rRight]]);
  }

  fiberSize(k: number): number {
    return this.leftSets[k].length * this.modes[k] * this.rightSets[k + 1].length;
  }

  /**
   * Multi-indices of the fiber of core k, ordered (beta, i, alpha).
   */
  fiberIndices(k: number): number[][] {
    const indices: number[][] = [];
    for (const left of this.leftSets[k]) {
      for (let i = 0; i < this.modes[k]; i++) {
        for (const right of this.rightSets[k + 1]) {
          indices.push([...left, i, ...right]);
        }
      }
    }
    return indices;
  }

  /**
   * Evaluate one fiber and move to the next core.
   * Returns false once the fiber is not admitted or the evaluator refuses it.
   */
  step(): boolean {
    if (this.finished) return false;

    const k = this.core;
    if (!this.admits(this.fiberSize(k))) {
      this.finished = true;
      return false;
    }

    const indices = this.fiberIndices(k);
    const values = this.evaluate(indices);
    if (values === null) {
      this.finished = true;
      return false;
    }
    if (values.length !== indices.length) {
      throw new RangeError(`evaluator returned ${values.length} values for ${indices.length} indices`);
    }

    this.track(indices, values);
    this.state.steps++;

    const d = this.modes.length;
    if (d === 1) {
      // the single fiber is the whole tensor
      this.finished = true;
      this.state.sweeps++;
      return true;
    }

    const z = emphasizeMinimum(values, this.state.bestValue);
    const n = this.modes[k];
    const rLeft = this.ranks[k];
    const rRight = this.ranks[k + 1];

    if (this.leftToRight) {
      if (k < d - 1) {
        this.leftSets[k + 1] = this.leftSetFrom(this.selectLeft(z, rLeft, n, rRight), k);
        this.core = k + 1;
      } else {
        this.rightSets[k] = this.rightSetFrom(this.selectRight(z, rLeft, n, rRight), k);
        this.leftToRight = false;
        this.state.sweeps++;
        this.core = k - 1;
      }
    } else if (k > 0) {
      this.rightSets[k] = this.rightSetFrom(this.selectRight(z, rLeft, n, rRight), k);
      this.core = k - 1;
    } else {
      this.leftSets[1] = this.leftSetFrom(this.selectLeft(z, rLeft, n, rRight), 0);
      this.leftToRight = true;
      this.state.sweeps++;
      this.core = 1;
    }

    return true;
  }

  /**
   * Run until the evaluator refuses a batch.
   */
  run(): Readonly<SearchState> {
    while (this.step()) {
      // keep sweeping
    }
    return this.snapshot;
  }

  private track(indices: number[][], values: number[]): void {
    values.forEach((y, s) => {
      if (y < this.state.bestValue) {
        this.state.bestValue = y;
        this.state.bestIndex = indices[s];
      }
    });
  }

  /** rows (beta, i), cols alpha */
  private selectLeft(z: number[], rLeft: number, n: number, rRight: number): number[] {
    const unfolding = new Matrix(rLeft * n, rRight, Float64Array.from(z));
    return maxvol(qr(unfolding).q);
  }

  /** rows (i, alpha), cols beta */
  private selectRight(z: number[], rLeft: number, n: number, rRight: number): number[] {
    const unfolding = new Matrix(n * rRight, rLeft);
    for (let beta = 0; beta < rLeft; beta++) {
      for (let i = 0; i < n; i++) {
        for (let alpha = 0; alpha < rRight; alpha++) {
          unfolding.set(i * rRight + alpha, beta, z[(beta * n + i) * rRight + alpha]);
        }
      }
    }
    return maxvol(qr(unfolding).q);
  }
}
