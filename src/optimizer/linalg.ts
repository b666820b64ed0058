/**
 * Dense linear algebra for the TT sweeps.
 *
 * Matrices here are small (rows = rank * mode size, cols = rank), so a
 * row-major Float64Array with straightforward loops is all that is needed.
 */

const PIVOT_EPS = 1e-300;

export class Matrix {
  readonly rows: number;
  readonly cols: number;
  readonly data: Float64Array;

  constructor(rows: number, cols: number, data?: Float64Array) {
    if (data && data.length !== rows * cols) {
      throw new RangeError(`Matrix data length ${data.length} does not match ${rows}x${cols}`);
    }
    this.rows = rows;
    this.cols = cols;
    this.data = data ?? new Float64Array(rows * cols);
  }

  static fromRows(rows: number[][]): Matrix {
    const cols = rows.length > 0 ? rows[0].length : 0;
    const matrix = new Matrix(rows.length, cols);
    rows.forEach((row, i) => {
      if (row.length !== cols) {
        throw new RangeError(`Row ${i} has ${row.length} entries, expected ${cols}`);
      }
      matrix.data.set(row, i * cols);
    });
    return matrix;
  }

  static identity(size: number): Matrix {
    const matrix = new Matrix(size, size);
    for (let i = 0; i < size; i++) {
      matrix.data[i * size + i] = 1;
    }
    return matrix;
  }

  get(i: number, j: number): number {
    return this.data[i * this.cols + j];
  }

  set(i: number, j: number, value: number): void {
    this.data[i * this.cols + j] = value;
  }

  clone(): Matrix {
    return new Matrix(this.rows, this.cols, this.data.slice());
  }

  transpose(): Matrix {
    const result = new Matrix(this.cols, this.rows);
    for (let i = 0; i < this.rows; i++) {
      for (let j = 0; j < this.cols; j++) {
        result.data[j * this.rows + i] = this.data[i * this.cols + j];
      }
    }
    return result;
  }

  multiply(other: Matrix): Matrix {
    if (this.cols !== other.rows) {
      throw new RangeError(`Cannot multiply ${this.rows}x${this.cols} by ${other.rows}x${other.cols}`);
    }
    const result = new Matrix(this.rows, other.cols);
    for (let i = 0; i < this.rows; i++) {
      for (let k = 0; k < this.cols; k++) {
        const a = this.data[i * this.cols + k];
        if (a === 0) continue;
        for (let j = 0; j < other.cols; j++) {
          result.data[i * other.cols + j] += a * other.data[k * other.cols + j];
        }
      }
    }
    return result;
  }

  selectRows(indices: readonly number[]): Matrix {
    const result = new Matrix(indices.length, this.cols);
    indices.forEach((row, i) => {
      result.data.set(this.data.subarray(row * this.cols, (row + 1) * this.cols), i * this.cols);
    });
    return result;
  }

  toRows(): number[][] {
    const rows: number[][] = [];
    for (let i = 0; i < this.rows; i++) {
      rows.push(Array.from(this.data.subarray(i * this.cols, (i + 1) * this.cols)));
    }
    return rows;
  }
}

export interface QRResult {
  /** m x k with orthonormal columns, k = min(m, n) */
  q: Matrix;
  /** k x n upper triangular */
  r: Matrix;
}

/**
 * Thin QR decomposition by Householder reflections.
 */
export function qr(a: Matrix): QRResult {
  const m = a.rows;
  const n = a.cols;
  const k = Math.min(m, n);
  const work = a.clone();
  const reflectors: Array<Float64Array | null> = [];

  for (let j = 0; j < k; j++) {
    let norm = 0;
    for (let i = j; i < m; i++) {
      norm += work.get(i, j) ** 2;
    }
    norm = Math.sqrt(norm);

    const x0 = work.get(j, j);
    const alpha = x0 >= 0 ? -norm : norm;
    const v = new Float64Array(m - j);
    for (let i = j; i < m; i++) {
      v[i - j] = work.get(i, j);
    }
    v[0] -= alpha;

    let vNorm = 0;
    for (let i = 0; i < v.length; i++) {
      vNorm += v[i] * v[i];
    }
    vNorm = Math.sqrt(vNorm);

    if (vNorm < PIVOT_EPS) {
      reflectors.push(null);
      continue;
    }
    for (let i = 0; i < v.length; i++) {
      v[i] /= vNorm;
    }
    applyReflector(work, v, j);
    reflectors.push(v);
  }

  const q = new Matrix(m, k);
  for (let i = 0; i < k; i++) {
    q.set(i, i, 1);
  }
  for (let j = k - 1; j >= 0; j--) {
    const v = reflectors[j];
    if (v) {
      applyReflector(q, v, j);
    }
  }

  const r = new Matrix(k, n);
  for (let i = 0; i < k; i++) {
    for (let j = i; j < n; j++) {
      r.set(i, j, work.get(i, j));
    }
  }

  return { q, r };
}

/**
 * In place: rows [offset, m) of target become (I - 2 v v^T) applied to them.
 */
function applyReflector(target: Matrix, v: Float64Array, offset: number): void {
  for (let col = 0; col < target.cols; col++) {
    let dot = 0;
    for (let i = 0; i < v.length; i++) {
      dot += v[i] * target.get(offset + i, col);
    }
    if (dot === 0) continue;
    for (let i = 0; i < v.length; i++) {
      target.set(offset + i, col, target.get(offset + i, col) - 2 * v[i] * dot);
    }
  }
}

/**
 * Inverse of a square matrix by Gauss-Jordan elimination with partial pivoting.
 */
export function inverse(a: Matrix): Matrix {
  if (a.rows !== a.cols) {
    throw new RangeError(`Cannot invert a ${a.rows}x${a.cols} matrix`);
  }
  const size = a.rows;
  const work = a.clone();
  const result = Matrix.identity(size);

  for (let c = 0; c < size; c++) {
    let pivotRow = c;
    for (let i = c + 1; i < size; i++) {
      if (Math.abs(work.get(i, c)) > Math.abs(work.get(pivotRow, c))) {
        pivotRow = i;
      }
    }
    const pivot = work.get(pivotRow, c);
    if (Math.abs(pivot) < PIVOT_EPS) {
      throw new RangeError('Matrix is singular');
    }
    if (pivotRow !== c) {
      swapRows(work, pivotRow, c);
      swapRows(result, pivotRow, c);
    }

    for (let j = 0; j < size; j++) {
      work.set(c, j, work.get(c, j) / pivot);
      result.set(c, j, result.get(c, j) / pivot);
    }
    for (let i = 0; i < size; i++) {
      if (i === c) continue;
      const factor = work.get(i, c);
      if (factor === 0) continue;
      for (let j = 0; j < size; j++) {
        work.set(i, j, work.get(i, j) - factor * work.get(c, j));
        result.set(i, j, result.get(i, j) - factor * result.get(c, j));
      }
    }
  }

  return result;
}

function swapRows(matrix: Matrix, a: number, b: number): void {
  const rowA = matrix.data.slice(a * matrix.cols, (a + 1) * matrix.cols);
  matrix.data.copyWithin(a * matrix.cols, b * matrix.cols, (b + 1) * matrix.cols);
  matrix.data.set(rowA, b * matrix.cols);
}

export interface MaxvolOptions {
  /** Stop once no coefficient exceeds this magnitude */
  tolerance?: number;
  maxIterations?: number;
}

/**
 * Row indices of a (locally) maximum-volume r x r submatrix of a tall m x r matrix.
 *
 * Starts from the pivots of LU with partial pivoting, then greedily swaps rows
 * while some coefficient of A * inv(A[I]) exceeds the tolerance.
 */
export function maxvol(a: Matrix, options: MaxvolOptions = {}): number[] {
  const { tolerance = 1.01, maxIterations = 100 } = options;
  const m = a.rows;
  const r = a.cols;

  if (r === 0) return [];
  if (m < r) {
    throw new RangeError(`maxvol needs at least as many rows as columns, got ${m}x${r}`);
  }

  const selected = initialPivots(a);
  const b = a.multiply(inverse(a.selectRows(selected)));

  for (let iter = 0; iter < maxIterations; iter++) {
    let best = 0;
    let bi = -1;
    let bj = -1;
    for (let i = 0; i < m; i++) {
      for (let j = 0; j < r; j++) {
        const value = Math.abs(b.get(i, j));
        if (value > best) {
          best = value;
          bi = i;
          bj = j;
        }
      }
    }
    if (best <= tolerance) break;

    selected[bj] = bi;

    const pivot = b.get(bi, bj);
    const column = new Float64Array(m);
    for (let i = 0; i < m; i++) {
      column[i] = b.get(i, bj);
    }
    const row = new Float64Array(r);
    for (let j = 0; j < r; j++) {
      row[j] = (b.get(bi, j) - (j === bj ? 1 : 0)) / pivot;
    }
    for (let i = 0; i < m; i++) {
      if (column[i] === 0) continue;
      for (let j = 0; j < r; j++) {
        b.set(i, j, b.get(i, j) - column[i] * row[j]);
      }
    }
  }

  return selected;
}

function initialPivots(a: Matrix): number[] {
  const m = a.rows;
  const r = a.cols;
  const work = a.clone();
  const order = Array.from({ length: m }, (_, i) => i);

  for (let c = 0; c < r; c++) {
    let p = c;
    for (let i = c + 1; i < m; i++) {
      if (Math.abs(work.get(order[i], c)) > Math.abs(work.get(order[p], c))) {
        p = i;
      }
    }
    [order[c], order[p]] = [order[p], order[c]];

    const pivot = work.get(order[c], c);
    if (Math.abs(pivot) < PIVOT_EPS) continue;
    for (let i = c + 1; i < m; i++) {
      const row = order[i];
      const factor = work.get(row, c) / pivot;
      if (factor === 0) continue;
      for (let j = c; j < r; j++) {
        work.set(row, j, work.get(row, j) - factor * work.get(order[c], j));
      }
    }
  }

  return order.slice(0, r);
}
