/**
 * Gate descriptor records
 *
 * Already-parsed gate definitions as supplied by a descriptor reader. Boolean
 * gates name their operands by gate id; ids are resolved once the whole set
 * has been read.
 *
 * @module gating/descriptors
 */

import type { ParameterReference } from '../data/parameter.js';

export interface RectangleDimensionDescriptor {
  readonly parameter: ParameterReference;
  /** Inclusive lower bound; omitted means unbounded */
  readonly min?: number;
  /** Exclusive upper bound; omitted means unbounded */
  readonly max?: number;
}

export interface RectangleGateDescriptor {
  readonly kind: 'rectangle';
  readonly id: string;
  readonly dimensions: readonly RectangleDimensionDescriptor[];
}

export interface PolygonGateDescriptor {
  readonly kind: 'polygon';
  readonly id: string;
  readonly dimensions: readonly ParameterReference[];
  readonly vertices: readonly (readonly number[])[];
}

export interface PolytopeGateDescriptor {
  readonly kind: 'polytope';
  readonly id: string;
  readonly dimensions: readonly ParameterReference[];
  readonly vertices: readonly (readonly number[])[];
}

export type EllipsoidShapeDescriptor =
  | {
      readonly form: 'foci';
      readonly foci: readonly (readonly number[])[];
      readonly distance: number;
    }
  | {
      readonly form: 'covariance';
      readonly mean: readonly number[];
      readonly covariance: readonly (readonly number[])[];
      readonly distanceSquare: number;
    };

export interface EllipsoidGateDescriptor {
  readonly kind: 'ellipsoid';
  readonly id: string;
  readonly dimensions: readonly ParameterReference[];
  readonly shape: EllipsoidShapeDescriptor;
}

export interface DecisionLeafDescriptor {
  readonly inside: boolean;
}

export interface DecisionBranchDescriptor {
  readonly parameter: ParameterReference;
  readonly threshold: number;
  readonly greaterOrEqual: DecisionNodeDescriptor;
  readonly lessThan: DecisionNodeDescriptor;
}

export type DecisionNodeDescriptor = DecisionLeafDescriptor | DecisionBranchDescriptor;

export interface DecisionTreeGateDescriptor {
  readonly kind: 'decision-tree';
  readonly id: string;
  readonly root: DecisionNodeDescriptor;
}

export interface BooleanGateDescriptor {
  readonly kind: 'and' | 'or' | 'not';
  readonly id: string;
  /** Operand gate ids */
  readonly operands: readonly string[];
}

export type GateDescriptor =
  | RectangleGateDescriptor
  | PolygonGateDescriptor
  | PolytopeGateDescriptor
  | EllipsoidGateDescriptor
  | DecisionTreeGateDescriptor
  | BooleanGateDescriptor;
