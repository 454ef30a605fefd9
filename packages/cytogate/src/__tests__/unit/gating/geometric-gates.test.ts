/**
 * Geometric Gate Unit Tests
 *
 * Membership rules of rectangle, polygon, polytope and ellipsoid gates,
 * and the descriptor rules enforced by createGate.
 */

import { describe, it, expect } from 'vitest';

import { InvalidGateDescriptionError, NoSuchParameterError } from '../../../core/errors.js';
import { evaluateGate } from '../../../gating/evaluate.js';
import { createGate } from '../../../gating/gate-factory.js';
import { firstColumn, populationOf, valuesPopulation } from '../../helpers/populations.js';

function insideFlags(gate: ReturnType<typeof createGate>, rows: readonly (readonly number[])[], refs: string[]): boolean[] {
  const population = populationOf(
    refs,
    rows.map((row, i) => [...row, i])
  );
  const inside = new Set(evaluateGate(gate, population).events.map((event) => event.valueAt(refs.length)));
  return rows.map((_, i) => inside.has(i));
}

describe('rectangle gates', () => {
  it('should treat the minimum as inclusive and the maximum as exclusive', () => {
    const gate = createGate({ kind: 'rectangle', id: 'R', dimensions: [{ parameter: 'FL1', min: 10, max: 20 }] });
    const population = valuesPopulation('FL1', [9.999, 10, 15, 19.999, 20]);

    const result = evaluateGate(gate, population);

    expect(firstColumn(result)).toEqual([10, 15, 19.999]);
    expect(result.name).toBe('sample_R');
    expect(result.parent).toBe(population);
  });

  it('should leave a missing bound unbounded', () => {
    const gate = createGate({ kind: 'rectangle', id: 'high', dimensions: [{ parameter: 'FL1', min: 0 }] });

    const result = evaluateGate(gate, valuesPopulation('FL1', [-1, 0, 1e12]));

    expect(firstColumn(result)).toEqual([0, 1e12]);
  });

  it('should require every dimension to match', () => {
    const gate = createGate({
      kind: 'rectangle',
      id: 'box',
      dimensions: [
        { parameter: 'x', min: 0, max: 10 },
        { parameter: 'y', min: 0, max: 10 },
      ],
    });

    expect(insideFlags(gate, [[5, 5], [5, 11], [-1, 5]], ['x', 'y', 'row'])).toEqual([true, false, false]);
  });

  it('should reject a dimension with neither bound', () => {
    expect(() => createGate({ kind: 'rectangle', id: 'R', dimensions: [{ parameter: 'FL1' }] })).toThrow(
      InvalidGateDescriptionError
    );
  });

  it('should reject min >= max', () => {
    expect(() =>
      createGate({ kind: 'rectangle', id: 'R', dimensions: [{ parameter: 'FL1', min: 5, max: 5 }] })
    ).toThrow('Invalid gate "R": dimension FL1 has min 5 >= max 5');
  });

  it('should reject zero dimensions', () => {
    expect(() => createGate({ kind: 'rectangle', id: 'R', dimensions: [] })).toThrow(
      'Invalid gate "R": gate has zero dimensions'
    );
  });

  it('should reject an empty id', () => {
    expect(() =>
      createGate({ kind: 'rectangle', id: ' ', dimensions: [{ parameter: 'FL1', min: 0 }] })
    ).toThrow(InvalidGateDescriptionError);
  });

  it('should fail evaluation for an unknown parameter', () => {
    const gate = createGate({ kind: 'rectangle', id: 'R', dimensions: [{ parameter: 'CD8', min: 0 }] });

    expect(() => evaluateGate(gate, valuesPopulation('FL1', [1]))).toThrow(NoSuchParameterError);
  });
});

describe('polygon gates', () => {
  const square = createGate({
    kind: 'polygon',
    id: 'square',
    dimensions: ['x', 'y'],
    vertices: [
      [0, 0],
      [10, 0],
      [10, 10],
      [0, 10],
    ],
  });

  it('should keep events inside and on the boundary', () => {
    expect(insideFlags(square, [[5, 5], [0, 5], [11, 5], [5, -0.5]], ['x', 'y', 'row'])).toEqual([
      true,
      true,
      false,
      false,
    ]);
  });

  it('should accept a closed ring and drop the repeated vertex', () => {
    const gate = createGate({
      kind: 'polygon',
      id: 'tri',
      dimensions: ['x', 'y'],
      vertices: [
        [0, 0],
        [4, 0],
        [0, 4],
        [0, 0],
      ],
    });

    expect(gate.kind === 'polygon' ? gate.vertices : []).toHaveLength(3);
  });

  it('should honour concave shapes', () => {
    const ell = createGate({
      kind: 'polygon',
      id: 'L',
      dimensions: ['x', 'y'],
      vertices: [
        [0, 0],
        [10, 0],
        [10, 2],
        [2, 2],
        [2, 10],
        [0, 10],
      ],
    });

    expect(insideFlags(ell, [[1, 8], [8, 1], [8, 8]], ['x', 'y', 'row'])).toEqual([true, true, false]);
  });

  it('should reject anything but two dimensions', () => {
    expect(() =>
      createGate({ kind: 'polygon', id: 'P', dimensions: ['x'], vertices: [[0], [1], [2]] })
    ).toThrow('Invalid gate "P": polygon gates need exactly 2 dimensions, got 1');
  });

  it('should reject fewer than three vertices', () => {
    expect(() =>
      createGate({
        kind: 'polygon',
        id: 'P',
        dimensions: ['x', 'y'],
        vertices: [
          [0, 0],
          [1, 1],
        ],
      })
    ).toThrow('Invalid gate "P": polygon gates need at least 3 vertices, got 2');
  });
});

describe('polytope gates', () => {
  it('should use the convex hull of the vertices in two dimensions', () => {
    const gate = createGate({
      kind: 'polytope',
      id: 'hull',
      dimensions: ['x', 'y'],
      // interior vertex (5, 5) does not shrink the hull
      vertices: [
        [0, 0],
        [10, 0],
        [5, 5],
        [10, 10],
        [0, 10],
      ],
    });

    expect(insideFlags(gate, [[5, 8], [10, 5], [12, 5]], ['x', 'y', 'row'])).toEqual([true, true, false]);
  });

  it('should test convex-hull membership in three dimensions', () => {
    const gate = createGate({
      kind: 'polytope',
      id: 'tetra',
      dimensions: ['x', 'y', 'z'],
      vertices: [
        [0, 0, 0],
        [1, 0, 0],
        [0, 1, 0],
        [0, 0, 1],
      ],
    });

    expect(
      insideFlags(
        gate,
        [
          [0.2, 0.2, 0.2],
          [0, 0, 0],
          [0.5, 0.5, 0.5],
          [-0.1, 0.2, 0.2],
        ],
        ['x', 'y', 'z', 'row']
      )
    ).toEqual([true, true, false, false]);
  });

  it('should reject collinear vertices in two dimensions', () => {
    expect(() =>
      createGate({
        kind: 'polytope',
        id: 'line',
        dimensions: ['x', 'y'],
        vertices: [
          [0, 0],
          [1, 1],
          [2, 2],
        ],
      })
    ).toThrow('Invalid gate "line": polytope vertices are collinear');
  });

  it('should require N + 1 vertices', () => {
    expect(() =>
      createGate({
        kind: 'polytope',
        id: 'flat',
        dimensions: ['x', 'y', 'z'],
        vertices: [
          [0, 0, 0],
          [1, 0, 0],
          [0, 1, 0],
        ],
      })
    ).toThrow('Invalid gate "flat": polytope over 3 dimensions needs at least 4 vertices, got 3');
  });

  it('should reject a vertex of the wrong arity', () => {
    expect(() =>
      createGate({
        kind: 'polytope',
        id: 'bad',
        dimensions: ['x', 'y'],
        vertices: [
          [0, 0],
          [1, 0],
          [0, 1, 2],
        ],
      })
    ).toThrow('Invalid gate "bad": vertex 3 has 3 coordinates, expected 2');
  });
});

describe('ellipsoid gates', () => {
  it('should keep points whose focal distances sum to at most the distance', () => {
    const gate = createGate({
      kind: 'ellipsoid',
      id: 'E',
      dimensions: ['x', 'y'],
      shape: {
        form: 'foci',
        foci: [
          [-3, 0],
          [3, 0],
        ],
        distance: 10,
      },
    });

    // (5, 0): 8 + 2 = 10, on the boundary; (0, 4): 5 + 5 = 10; (0, 4.5) is outside
    expect(insideFlags(gate, [[5, 0], [0, 4], [0, 4.5], [0, 0]], ['x', 'y', 'row'])).toEqual([
      true,
      true,
      false,
      true,
    ]);
  });

  it('should compare the squared Mahalanobis distance with distanceSquare', () => {
    const gate = createGate({
      kind: 'ellipsoid',
      id: 'M',
      dimensions: ['x', 'y'],
      shape: {
        form: 'covariance',
        mean: [10, 10],
        covariance: [
          [4, 0],
          [0, 1],
        ],
        distanceSquare: 1,
      },
    });

    // (12, 10): 4/4 = 1; (10, 11): 1/1 = 1; (11, 10.9): 0.25 + 0.81 > 1
    expect(insideFlags(gate, [[12, 10], [10, 11], [11, 10.9], [10, 10]], ['x', 'y', 'row'])).toEqual([
      true,
      true,
      false,
      true,
    ]);
  });

  it('should reject a singular covariance matrix', () => {
    expect(() =>
      createGate({
        kind: 'ellipsoid',
        id: 'S',
        dimensions: ['x', 'y'],
        shape: {
          form: 'covariance',
          mean: [0, 0],
          covariance: [
            [1, 2],
            [2, 4],
          ],
          distanceSquare: 1,
        },
      })
    ).toThrow('Invalid gate "S": covariance matrix is singular');
  });

  it('should reject a negative distance', () => {
    expect(() =>
      createGate({
        kind: 'ellipsoid',
        id: 'N',
        dimensions: ['x'],
        shape: { form: 'foci', foci: [[0], [1]], distance: -1 },
      })
    ).toThrow(InvalidGateDescriptionError);
  });

  it('should require exactly two foci', () => {
    expect(() =>
      createGate({
        kind: 'ellipsoid',
        id: 'F',
        dimensions: ['x'],
        shape: { form: 'foci', foci: [[0]], distance: 1 },
      })
    ).toThrow('Invalid gate "F": ellipsoid gates need exactly 2 foci, got 1');
  });
});
