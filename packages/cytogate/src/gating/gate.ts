/**
 * Gate Model
 *
 * Closed set of gate variants. Every variant carries an id and the ordered
 * parameter references it reads; evaluation dispatches on `kind` with an
 * exhaustive switch (see evaluate.ts).
 *
 * @module gating/gate
 */

import type { ParameterReference } from '../data/parameter.js';
import type { DecisionLeafDescriptor, DecisionNodeDescriptor } from './descriptors.js';

export type Vertex = readonly number[];

/**
 * Half-open range: min inclusive, max exclusive. A missing bound is infinite.
 */
export interface Range {
  readonly min?: number;
  readonly max?: number;
}

interface GateBase {
  readonly id: string;
  readonly dimensions: readonly ParameterReference[];
}

export interface RectangleGate extends GateBase {
  readonly kind: 'rectangle';
  /** One range per dimension */
  readonly ranges: readonly Range[];
}

export interface PolygonGate extends GateBase {
  readonly kind: 'polygon';
  /** Open ring (first vertex not repeated) over exactly two dimensions */
  readonly vertices: readonly Vertex[];
}

/**
 * Convex hull of `vertices`
 */
export interface PolytopeGate extends GateBase {
  readonly kind: 'polytope';
  readonly vertices: readonly Vertex[];
}

export type EllipsoidShape =
  | {
      /** Inside iff the summed distance to both foci is at most `distance` */
      readonly form: 'foci';
      readonly foci: readonly [Vertex, Vertex];
      readonly distance: number;
    }
  | {
      /** Inside iff the squared Mahalanobis distance from `mean` is at most `distanceSquare` */
      readonly form: 'covariance';
      readonly mean: Vertex;
      readonly covariance: readonly (readonly number[])[];
      readonly distanceSquare: number;
    };

export interface EllipsoidGate extends GateBase {
  readonly kind: 'ellipsoid';
  readonly shape: EllipsoidShape;
}

export type DecisionNode = DecisionNodeDescriptor;

export interface DecisionTreeGate extends GateBase {
  readonly kind: 'decision-tree';
  readonly root: DecisionNode;
}

export interface AndGate extends GateBase {
  readonly kind: 'and';
  readonly operands: readonly Gate[];
}

export interface OrGate extends GateBase {
  readonly kind: 'or';
  readonly operands: readonly Gate[];
}

export interface NotGate extends GateBase {
  readonly kind: 'not';
  readonly operand: Gate;
}

/**
 * Stand-in for the gate with id `id`, looked up when evaluated
 */
export interface ProxyGate extends GateBase {
  readonly kind: 'proxy';
}

export type BooleanGate = AndGate | OrGate | NotGate;

export type Gate =
  | RectangleGate
  | PolygonGate
  | PolytopeGate
  | EllipsoidGate
  | DecisionTreeGate
  | AndGate
  | OrGate
  | NotGate
  | ProxyGate;

export type GateKind = Gate['kind'];

/**
 * Read access to named gates, as needed to resolve proxies
 */
export interface GateLookup {
  get(id: string): Gate | undefined;
}

/**
 * Direct operands of a boolean gate; empty for every other kind
 */
export function operandsOf(gate: Gate): readonly Gate[] {
  switch (gate.kind) {
    case 'and':
    case 'or':
      return gate.operands;
    case 'not':
      return [gate.operand];
    default:
      return [];
  }
}

/**
 * Ids of proxy gates reachable through `gate`'s operands, in encounter order
 */
export function proxyTargets(gate: Gate): string[] {
  const targets: string[] = [];
  const walk = (current: Gate): void => {
    for (const operand of operandsOf(current)) {
      if (operand.kind === 'proxy') {
        if (!targets.includes(operand.id)) targets.push(operand.id);
      } else {
        walk(operand);
      }
    }
  };
  walk(gate);
  return targets;
}

export function isDecisionLeaf(node: DecisionNode): node is DecisionLeafDescriptor {
  return 'inside' in node;
}
