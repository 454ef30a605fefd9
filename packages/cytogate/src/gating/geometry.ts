/**
 * Geometric membership tests backing the polygon, polytope and ellipsoid gates
 *
 * Two-dimensional tests go through turf; boundary points count as inside.
 * Higher-dimensional polytopes use a phase-one simplex feasibility test for
 * convex-hull membership.
 *
 * @module gating/geometry
 */

import { booleanPointInPolygon, convex, points, polygon } from '@turf/turf';
import type { Feature, Polygon } from 'geojson';

import { quadraticForm, type Matrix } from '../core/utils/matrix.js';
import type { Vertex } from './gate.js';

const PIVOT_EPSILON = 1e-12;

// ============================================================================
// Two dimensions
// ============================================================================

/**
 * Closed turf polygon from an open vertex ring
 */
export function toPolygonFeature(vertices: readonly Vertex[]): Feature<Polygon> {
  const ring = vertices.map((v) => [v[0], v[1]]);
  ring.push([vertices[0][0], vertices[0][1]]);
  return polygon([ring]);
}

/**
 * Convex hull of 2D vertices, or null when they are collinear
 */
export function convexHull2D(vertices: readonly Vertex[]): Feature<Polygon> | null {
  if (!hasPositiveArea(vertices)) return null;
  return convex(points(vertices.map((v) => [v[0], v[1]])));
}

export function containsPoint2D(region: Feature<Polygon>, x: number, y: number): boolean {
  return booleanPointInPolygon([x, y], region);
}

/**
 * True when at least three of the vertices are not collinear
 */
export function hasPositiveArea(vertices: readonly Vertex[]): boolean {
  const [origin, ...rest] = vertices;
  if (!origin) return false;
  for (let i = 0; i < rest.length; i++) {
    for (let j = i + 1; j < rest.length; j++) {
      const cross =
        (rest[i][0] - origin[0]) * (rest[j][1] - origin[1]) -
        (rest[i][1] - origin[1]) * (rest[j][0] - origin[0]);
      if (Math.abs(cross) > PIVOT_EPSILON) return true;
    }
  }
  return false;
}

/**
 * Open ring with a trailing copy of the first vertex removed
 */
export function openRing(vertices: readonly Vertex[]): Vertex[] {
  const ring = [...vertices];
  const first = ring[0];
  const last = ring[ring.length - 1];
  if (ring.length > 1 && first.length === last.length && first.every((c, i) => c === last[i])) {
    ring.pop();
  }
  return ring;
}

// ============================================================================
// N dimensions
// ============================================================================

/**
 * Whether `point` is a convex combination of `vertices`.
 *
 * Solves the phase-one problem for λ ≥ 0, Σλ = 1, Σ λᵢvᵢ = point, using
 * Bland's rule so degenerate hulls terminate. `tolerance` bounds the residual
 * infeasibility accepted as inside, relative to the point's magnitude.
 */
export function inConvexHull(point: readonly number[], vertices: readonly Vertex[], tolerance: number): boolean {
  const m = vertices.length;
  const rows = point.length + 1;
  const rhs = m + rows;

  const tableau: number[][] = [];
  for (let r = 0; r < rows; r++) {
    const row = new Array<number>(rhs + 1).fill(0);
    for (let j = 0; j < m; j++) {
      row[j] = r < point.length ? vertices[j][r] : 1;
    }
    row[m + r] = 1;
    row[rhs] = r < point.length ? point[r] : 1;
    if (row[rhs] < 0) {
      for (let j = 0; j < m; j++) row[j] = -row[j];
      row[rhs] = -row[rhs];
    }
    tableau.push(row);
  }

  const basis = tableau.map((_, r) => m + r);
  const cost = new Array<number>(rhs + 1).fill(0);
  for (const row of tableau) {
    for (let j = 0; j < m; j++) cost[j] -= row[j];
    cost[rhs] -= row[rhs];
  }
  const scale = 1 + tableau.reduce((sum, row) => sum + row[rhs], 0);

  for (;;) {
    let entering = -1;
    for (let j = 0; j < rhs; j++) {
      if (cost[j] < -PIVOT_EPSILON) {
        entering = j;
        break;
      }
    }
    if (entering < 0) break;

    let leaving = -1;
    let best = Infinity;
    for (let r = 0; r < rows; r++) {
      const a = tableau[r][entering];
      if (a <= PIVOT_EPSILON) continue;
      const ratio = tableau[r][rhs] / a;
      if (ratio < best - PIVOT_EPSILON || (Math.abs(ratio - best) <= PIVOT_EPSILON && basis[r] < basis[leaving])) {
        best = ratio;
        leaving = r;
      }
    }
    // phase one is bounded below by zero
    if (leaving < 0) break;

    pivot(tableau, cost, leaving, entering);
    basis[leaving] = entering;
  }

  const infeasibility = -cost[rhs];
  return infeasibility <= tolerance * scale;
}

function pivot(tableau: number[][], cost: number[], row: number, column: number): void {
  const pivotRow = tableau[row];
  const factor = pivotRow[column];
  for (let j = 0; j < pivotRow.length; j++) pivotRow[j] /= factor;

  for (let r = 0; r < tableau.length; r++) {
    if (r === row) continue;
    const f = tableau[r][column];
    if (f === 0) continue;
    for (let j = 0; j < pivotRow.length; j++) tableau[r][j] -= f * pivotRow[j];
  }

  const c = cost[column];
  if (c !== 0) {
    for (let j = 0; j < pivotRow.length; j++) cost[j] -= c * pivotRow[j];
  }
}

// ============================================================================
// Ellipsoids
// ============================================================================

export function euclideanDistance(a: readonly number[], b: readonly number[]): number {
  let sum = 0;
  for (let i = 0; i < a.length; i++) sum += (a[i] - b[i]) ** 2;
  return Math.sqrt(sum);
}

/**
 * Squared Mahalanobis distance of `point` from `mean` given an inverted covariance
 */
export function mahalanobisSquared(point: readonly number[], mean: readonly number[], inverseCovariance: Matrix): number {
  const delta = point.map((v, i) => v - mean[i]);
  return quadraticForm(delta, inverseCovariance);
}
