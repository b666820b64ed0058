/**
 * Grid discretization.
 *
 * Maps multi-indices of the tensor the TT search works on to points of the
 * continuous box [a, b]^d. In QTT mode every grid index is split into
 * `exponent` base-`factor` digits, least significant digit first.
 */
import { GridSpec } from './types';

function expand(value: number | number[], dimension: number, label: string): number[] {
  if (typeof value === 'number') {
    return new Array<number>(dimension).fill(value);
  }
  if (value.length !== dimension) {
    throw new RangeError(`${label} has ${value.length} entries, expected ${dimension}`);
  }
  return [...value];
}

export class Grid {
  readonly dimension: number;
  readonly lower: readonly number[];
  readonly upper: readonly number[];
  /** Points per dimension */
  readonly sizes: readonly number[];
  /** Mode sizes of the tensor the search sees */
  readonly modes: readonly number[];
  private readonly digits: number;
  private readonly factor: number;

  constructor(
    dimension: number,
    lowerBound: number | number[],
    upperBound: number | number[],
    spec: GridSpec,
  ) {
    if (!Number.isInteger(dimension) || dimension < 1) {
      throw new RangeError(`dimension must be a positive integer, got ${dimension}`);
    }
    this.dimension = dimension;
    this.lower = expand(lowerBound, dimension, 'lowerBound');
    this.upper = expand(upperBound, dimension, 'upperBound');

    this.lower.forEach((a, j) => {
      if (!(a < this.upper[j])) {
        throw new RangeError(`lower bound ${a} is not below upper bound ${this.upper[j]} in dimension ${j}`);
      }
    });

    if (spec.kind === 'qtt') {
      this.factor = spec.factor;
      this.digits = spec.exponent;
      this.sizes = new Array<number>(dimension).fill(spec.factor ** spec.exponent);
      this.modes = new Array<number>(dimension * spec.exponent).fill(spec.factor);
    } else {
      this.factor = 0;
      this.digits = 1;
      this.sizes = expand(spec.size, dimension, 'gridSize');
      this.modes = this.sizes;
    }

    this.sizes.forEach((n) => {
      if (!Number.isInteger(n) || n < 2) {
        throw new RangeError(`grid must have at least 2 integer points per dimension, got ${n}`);
      }
    });
  }

  get isQtt(): boolean {
    return this.factor > 0;
  }

  /**
   * Tensor multi-index -> grid index per dimension.
   */
  toGridIndex(tensorIndex: readonly number[]): number[] {
    if (tensorIndex.length !== this.modes.length) {
      throw new RangeError(`index has ${tensorIndex.length} entries, expected ${this.modes.length}`);
    }
    if (!this.isQtt) {
      return [...tensorIndex];
    }

    const result = new Array<number>(this.dimension);
    for (let j = 0; j < this.dimension; j++) {
      let value = 0;
      let scale = 1;
      for (let t = 0; t < this.digits; t++) {
        value += tensorIndex[j * this.digits + t] * scale;
        scale *= this.factor;
      }
      result[j] = value;
    }
    return result;
  }

  /**
   * Grid index per dimension -> point in the box.
   */
  toPoint(gridIndex: readonly number[]): number[] {
    return gridIndex.map((k, j) => {
      const a = this.lower[j];
      const b = this.upper[j];
      return a + ((b - a) * k) / (this.sizes[j] - 1);
    });
  }

  pointOf(tensorIndex: readonly number[]): number[] {
    return this.toPoint(this.toGridIndex(tensorIndex));
  }
}
