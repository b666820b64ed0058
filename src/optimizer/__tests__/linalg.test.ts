import { Matrix, inverse, maxvol, qr } from '../linalg';
import { SeededRNG } from '../../utils/rng';

function expectMatrixClose(actual: Matrix, expected: number[][], digits = 10): void {
  expect(actual.rows).toBe(expected.length);
  actual.toRows().forEach((row, i) => {
    row.forEach((value, j) => {
      expect(value).toBeCloseTo(expected[i][j], digits);
    });
  });
}

describe('Matrix', () => {
  it('should multiply matrices', () => {
    const a = Matrix.fromRows([[1, 2], [3, 4]]);
    const b = Matrix.fromRows([[5, 6], [7, 8]]);

    expect(a.multiply(b).toRows()).toEqual([[19, 22], [43, 50]]);
  });

  it('should reject incompatible shapes', () => {
    const a = Matrix.fromRows([[1, 2, 3]]);
    expect(() => a.multiply(a)).toThrow(RangeError);
  });

  it('should transpose', () => {
    expect(Matrix.fromRows([[1, 2, 3], [4, 5, 6]]).transpose().toRows()).toEqual([
      [1, 4],
      [2, 5],
      [3, 6],
    ]);
  });

  it('should select rows in the given order', () => {
    const a = Matrix.fromRows([[1, 1], [2, 2], [3, 3]]);
    expect(a.selectRows([2, 0]).toRows()).toEqual([[3, 3], [1, 1]]);
  });

  it('should reject ragged rows', () => {
    expect(() => Matrix.fromRows([[1, 2], [3]])).toThrow(RangeError);
  });
});

describe('qr', () => {
  it('should factor a tall matrix into orthonormal Q and triangular R', () => {
    const a = Matrix.fromRows([[1, 2], [3, 4], [5, 6]]);
    const { q, r } = qr(a);

    expect(q.rows).toBe(3);
    expect(q.cols).toBe(2);
    expect(r.rows).toBe(2);
    expect(r.get(1, 0)).toBe(0);

    expectMatrixClose(q.transpose().multiply(q), [[1, 0], [0, 1]]);
    expectMatrixClose(q.multiply(r), a.toRows());
  });

  it('should factor a wide matrix', () => {
    const a = Matrix.fromRows([[2, -1, 0], [1, 3, 4]]);
    const { q, r } = qr(a);

    expect(q.cols).toBe(2);
    expect(r.cols).toBe(3);
    expectMatrixClose(q.multiply(r), a.toRows());
  });

  it('should keep Q orthonormal for a zero matrix', () => {
    const { q, r } = qr(new Matrix(3, 2));

    expectMatrixClose(q.transpose().multiply(q), [[1, 0], [0, 1]]);
    expectMatrixClose(r, [[0, 0], [0, 0]]);
  });
});

describe('inverse', () => {
  it('should invert a square matrix', () => {
    expectMatrixClose(inverse(Matrix.fromRows([[4, 7], [2, 6]])), [
      [0.6, -0.7],
      [-0.2, 0.4],
    ]);
  });

  it('should need pivoting for a zero leading entry', () => {
    expectMatrixClose(inverse(Matrix.fromRows([[0, 1], [1, 0]])), [[0, 1], [1, 0]]);
  });

  it('should reject singular matrices', () => {
    expect(() => inverse(Matrix.fromRows([[1, 2], [2, 4]]))).toThrow('Matrix is singular');
  });
});

describe('maxvol', () => {
  it('should pick the rows of the maximum-volume submatrix', () => {
    const a = Matrix.fromRows([
      [1, 0],
      [0, 1],
      [0.5, 0.5],
      [3, 1],
    ]);

    expect([...maxvol(a)].sort()).toEqual([1, 3]);
  });

  it('should select every row of a square matrix', () => {
    const a = Matrix.fromRows([[2, 1, 0], [0, 1, 0], [1, 0, 3]]);
    expect([...maxvol(a)].sort()).toEqual([0, 1, 2]);
  });

  it('should bound the interpolation coefficients of a random tall matrix', () => {
    const rng = new SeededRNG(42);
    const a = new Matrix(12, 3);
    for (let i = 0; i < a.data.length; i++) {
      a.data[i] = rng.nextNormal();
    }

    const rows = maxvol(a, { tolerance: 1.01 });
    expect(new Set(rows).size).toBe(3);

    const coefficients = a.multiply(inverse(a.selectRows(rows)));
    for (const value of coefficients.data) {
      expect(Math.abs(value)).toBeLessThanOrEqual(1.01 + 1e-9);
    }
  });

  it('should reject matrices with fewer rows than columns', () => {
    expect(() => maxvol(Matrix.fromRows([[1, 2, 3]]))).toThrow(RangeError);
  });
});
