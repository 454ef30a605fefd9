/**
 * Dense matrix helpers used by compensation and ellipsoid gates
 *
 * @module core/utils/matrix
 */

export type Matrix = readonly (readonly number[])[];

const SINGULAR_EPSILON = 1e-12;

export function isSquare(matrix: Matrix): boolean {
  return matrix.every((row) => row.length === matrix.length);
}

export function identity(size: number): number[][] {
  return Array.from({ length: size }, (_, i) =>
    Array.from({ length: size }, (_, j) => (i === j ? 1 : 0))
  );
}

/**
 * Invert a square matrix by Gauss-Jordan elimination with partial pivoting.
 *
 * @returns the inverse, or null when the matrix is singular
 */
export function invert(matrix: Matrix): number[][] | null {
  const n = matrix.length;
  if (!isSquare(matrix)) return null;

  const a = matrix.map((row) => [...row]);
  const inv = identity(n);

  for (let col = 0; col < n; col++) {
    let pivot = col;
    for (let row = col + 1; row < n; row++) {
      if (Math.abs(a[row][col]) > Math.abs(a[pivot][col])) pivot = row;
    }
    if (Math.abs(a[pivot][col]) < SINGULAR_EPSILON) return null;

    [a[col], a[pivot]] = [a[pivot], a[col]];
    [inv[col], inv[pivot]] = [inv[pivot], inv[col]];

    const scale = a[col][col];
    for (let j = 0; j < n; j++) {
      a[col][j] /= scale;
      inv[col][j] /= scale;
    }

    for (let row = 0; row < n; row++) {
      if (row === col) continue;
      const factor = a[row][col];
      if (factor === 0) continue;
      for (let j = 0; j < n; j++) {
        a[row][j] -= factor * a[col][j];
        inv[row][j] -= factor * inv[col][j];
      }
    }
  }

  return inv;
}

/**
 * Row vector times matrix: result[j] = sum_i v[i] * m[i][j]
 */
export function multiplyVector(vector: readonly number[], matrix: Matrix): number[] {
  const columns = matrix[0]?.length ?? 0;
  const result = new Array<number>(columns).fill(0);
  for (let i = 0; i < vector.length; i++) {
    for (let j = 0; j < columns; j++) {
      result[j] += vector[i] * matrix[i][j];
    }
  }
  return result;
}

/**
 * Quadratic form vᵀ M v
 */
export function quadraticForm(vector: readonly number[], matrix: Matrix): number {
  const mv = multiplyVector(vector, matrix);
  let sum = 0;
  for (let i = 0; i < vector.length; i++) sum += mv[i] * vector[i];
  return sum;
}
