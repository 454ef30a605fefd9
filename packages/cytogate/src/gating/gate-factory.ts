/**
 * Gate Factory
 *
 * Turns descriptor records into gates, enforcing each variant's domain
 * rules. Boolean operands become proxy gates; they are resolved against the
 * gate set once every descriptor has been read.
 *
 * @module gating/gate-factory
 */

import { InvalidGateDescriptionError } from '../core/errors.js';
import { invert } from '../core/utils/matrix.js';
import type { ParameterReference } from '../data/parameter.js';
import type {
  BooleanGateDescriptor,
  DecisionNodeDescriptor,
  DecisionTreeGateDescriptor,
  EllipsoidGateDescriptor,
  GateDescriptor,
  PolygonGateDescriptor,
  PolytopeGateDescriptor,
  RectangleGateDescriptor,
} from './descriptors.js';
import {
  isDecisionLeaf,
  type AndGate,
  type DecisionTreeGate,
  type EllipsoidGate,
  type Gate,
  type NotGate,
  type OrGate,
  type PolygonGate,
  type PolytopeGate,
  type ProxyGate,
  type RectangleGate,
  type Vertex,
} from './gate.js';
import { hasPositiveArea, openRing } from './geometry.js';

/**
 * Create a gate from its descriptor
 *
 * @throws InvalidGateDescriptionError when the descriptor breaks a domain rule
 */
export function createGate(descriptor: GateDescriptor): Gate {
  if (descriptor.id.trim() === '') {
    throw new InvalidGateDescriptionError(descriptor.id, 'gate id must not be empty');
  }

  switch (descriptor.kind) {
    case 'rectangle':
      return createRectangle(descriptor);
    case 'polygon':
      return createPolygon(descriptor);
    case 'polytope':
      return createPolytope(descriptor);
    case 'ellipsoid':
      return createEllipsoid(descriptor);
    case 'decision-tree':
      return createDecisionTree(descriptor);
    case 'and':
    case 'or':
    case 'not':
      return createBoolean(descriptor);
  }
}

export function proxyGate(id: string): ProxyGate {
  return { kind: 'proxy', id, dimensions: [] };
}

export function andGate(id: string, operands: readonly Gate[]): AndGate {
  if (operands.length < 2) {
    throw new InvalidGateDescriptionError(id, `and gate needs at least 2 operands, got ${operands.length}`);
  }
  return { kind: 'and', id, dimensions: [], operands: [...operands] };
}

export function orGate(id: string, operands: readonly Gate[]): OrGate {
  if (operands.length < 2) {
    throw new InvalidGateDescriptionError(id, `or gate needs at least 2 operands, got ${operands.length}`);
  }
  return { kind: 'or', id, dimensions: [], operands: [...operands] };
}

export function notGate(id: string, operand: Gate): NotGate {
  return { kind: 'not', id, dimensions: [], operand };
}

// ============================================================================
// Geometric gates
// ============================================================================

function createRectangle(descriptor: RectangleGateDescriptor): RectangleGate {
  const { id } = descriptor;
  requireDimensions(id, descriptor.dimensions);

  for (const dimension of descriptor.dimensions) {
    const { parameter, min, max } = dimension;
    if (min === undefined && max === undefined) {
      throw new InvalidGateDescriptionError(id, `dimension ${parameter} has neither a minimum nor a maximum`);
    }
    if ((min !== undefined && Number.isNaN(min)) || (max !== undefined && Number.isNaN(max))) {
      throw new InvalidGateDescriptionError(id, `dimension ${parameter} has a non-numeric bound`);
    }
    if (min !== undefined && max !== undefined && min >= max) {
      throw new InvalidGateDescriptionError(id, `dimension ${parameter} has min ${min} >= max ${max}`);
    }
  }

  return {
    kind: 'rectangle',
    id,
    dimensions: descriptor.dimensions.map((d) => d.parameter),
    ranges: descriptor.dimensions.map(({ min, max }) => ({
      ...(min !== undefined ? { min } : {}),
      ...(max !== undefined ? { max } : {}),
    })),
  };
}

function createPolygon(descriptor: PolygonGateDescriptor): PolygonGate {
  const { id, dimensions } = descriptor;
  requireDimensions(id, dimensions);
  if (dimensions.length !== 2) {
    throw new InvalidGateDescriptionError(id, `polygon gates need exactly 2 dimensions, got ${dimensions.length}`);
  }

  const vertices = openRing(descriptor.vertices);
  requireVertices(id, vertices, 2);
  if (vertices.length < 3) {
    throw new InvalidGateDescriptionError(id, `polygon gates need at least 3 vertices, got ${vertices.length}`);
  }

  return { kind: 'polygon', id, dimensions: [...dimensions], vertices };
}

function createPolytope(descriptor: PolytopeGateDescriptor): PolytopeGate {
  const { id, dimensions } = descriptor;
  requireDimensions(id, dimensions);
  if (dimensions.length < 2) {
    throw new InvalidGateDescriptionError(id, 'polytope gates need at least 2 dimensions');
  }

  const vertices = descriptor.vertices.map((v) => [...v]);
  requireVertices(id, vertices, dimensions.length);
  if (vertices.length < dimensions.length + 1) {
    throw new InvalidGateDescriptionError(
      id,
      `polytope over ${dimensions.length} dimensions needs at least ${dimensions.length + 1} vertices, got ${vertices.length}`
    );
  }
  if (dimensions.length === 2 && !hasPositiveArea(vertices)) {
    throw new InvalidGateDescriptionError(id, 'polytope vertices are collinear');
  }

  return { kind: 'polytope', id, dimensions: [...dimensions], vertices };
}

function createEllipsoid(descriptor: EllipsoidGateDescriptor): EllipsoidGate {
  const { id, dimensions, shape } = descriptor;
  requireDimensions(id, dimensions);
  const n = dimensions.length;

  switch (shape.form) {
    case 'foci': {
      if (shape.foci.length !== 2) {
        throw new InvalidGateDescriptionError(id, `ellipsoid gates need exactly 2 foci, got ${shape.foci.length}`);
      }
      requireVertices(id, shape.foci, n);
      if (!Number.isFinite(shape.distance) || shape.distance < 0) {
        throw new InvalidGateDescriptionError(id, `ellipsoid distance must be a non-negative number, got ${shape.distance}`);
      }
      const [first, second] = shape.foci;
      return {
        kind: 'ellipsoid',
        id,
        dimensions: [...dimensions],
        shape: { form: 'foci', foci: [[...first], [...second]], distance: shape.distance },
      };
    }
    case 'covariance': {
      requireVertices(id, [shape.mean], n);
      if (shape.covariance.length !== n || shape.covariance.some((row) => row.length !== n)) {
        throw new InvalidGateDescriptionError(id, `covariance matrix must be ${n}x${n}`);
      }
      if (invert(shape.covariance) === null) {
        throw new InvalidGateDescriptionError(id, 'covariance matrix is singular');
      }
      if (!Number.isFinite(shape.distanceSquare) || shape.distanceSquare < 0) {
        throw new InvalidGateDescriptionError(
          id,
          `ellipsoid distance square must be a non-negative number, got ${shape.distanceSquare}`
        );
      }
      return {
        kind: 'ellipsoid',
        id,
        dimensions: [...dimensions],
        shape: {
          form: 'covariance',
          mean: [...shape.mean],
          covariance: shape.covariance.map((row) => [...row]),
          distanceSquare: shape.distanceSquare,
        },
      };
    }
  }
}

function createDecisionTree(descriptor: DecisionTreeGateDescriptor): DecisionTreeGate {
  const { id, root } = descriptor;
  const dimensions: ParameterReference[] = [];

  const walk = (node: DecisionNodeDescriptor): void => {
    if (isDecisionLeaf(node)) return;
    if (!Number.isFinite(node.threshold)) {
      throw new InvalidGateDescriptionError(id, `threshold on ${node.parameter} must be finite`);
    }
    if (!dimensions.includes(node.parameter)) dimensions.push(node.parameter);
    walk(node.greaterOrEqual);
    walk(node.lessThan);
  };
  walk(root);
  requireDimensions(id, dimensions);

  return { kind: 'decision-tree', id, dimensions, root };
}

// ============================================================================
// Boolean gates
// ============================================================================

function createBoolean(descriptor: BooleanGateDescriptor): Gate {
  const { id, operands } = descriptor;
  const proxies = operands.map(proxyGate);

  switch (descriptor.kind) {
    case 'and':
      return andGate(id, proxies);
    case 'or':
      return orGate(id, proxies);
    case 'not': {
      const [operand] = proxies;
      if (proxies.length !== 1 || !operand) {
        throw new InvalidGateDescriptionError(id, `not gate needs exactly 1 operand, got ${proxies.length}`);
      }
      return notGate(id, operand);
    }
  }
}

// ============================================================================
// Shared rules
// ============================================================================

function requireDimensions(id: string, dimensions: readonly unknown[]): void {
  if (dimensions.length === 0) {
    throw new InvalidGateDescriptionError(id, 'gate has zero dimensions');
  }
}

function requireVertices(id: string, vertices: readonly Vertex[], arity: number): void {
  vertices.forEach((vertex, i) => {
    if (vertex.length !== arity) {
      throw new InvalidGateDescriptionError(id, `vertex ${i + 1} has ${vertex.length} coordinates, expected ${arity}`);
    }
    if (!vertex.every(Number.isFinite)) {
      throw new InvalidGateDescriptionError(id, `vertex ${i + 1} has a non-finite coordinate`);
    }
  });
}
