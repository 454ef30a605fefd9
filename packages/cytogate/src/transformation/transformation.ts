/**
 * Transformations
 *
 * Derived parameters computed from other parameters through the resolver.
 * A transformation whose result is not a finite number (log of a
 * non-positive value, division by zero) raises DataRetrievalError, which
 * fails the gate reading it.
 *
 * @module transformation/transformation
 */

import { DataRetrievalError, InvalidTransformationError } from '../core/errors.js';
import type { FlowEvent } from '../data/flow-event.js';
import { ParameterCollection } from '../data/parameter-collection.js';
import type { Parameter, ParameterReference, ValueResolver } from '../data/parameter.js';

export type TransformationSpec =
  | { readonly kind: 'linear'; readonly parameter: ParameterReference; readonly a: number; readonly b: number }
  | {
      readonly kind: 'quadratic';
      readonly parameter: ParameterReference;
      readonly a: number;
      readonly b: number;
      readonly c: number;
    }
  | { readonly kind: 'ln'; readonly parameter: ParameterReference; readonly r: number; readonly d: number }
  | {
      readonly kind: 'log';
      readonly parameter: ParameterReference;
      readonly r: number;
      readonly d: number;
      readonly base: number;
    }
  | { readonly kind: 'ratio'; readonly numerator: ParameterReference; readonly denominator: ParameterReference };

export type TransformationKind = TransformationSpec['kind'];

export type TransformationDescriptor = TransformationSpec & {
  readonly id: ParameterReference;
  readonly label?: string;
};

export class TransformationParameter implements Parameter {
  readonly dependencies: readonly ParameterReference[];
  readonly label: string;

  constructor(
    public readonly reference: ParameterReference,
    public readonly spec: TransformationSpec,
    label?: string
  ) {
    this.dependencies = spec.kind === 'ratio' ? [spec.numerator, spec.denominator] : [spec.parameter];
    this.label = label ?? reference;
  }

  value(event: FlowEvent, resolver: ValueResolver): number {
    const result = this.compute(event, resolver);
    if (!Number.isFinite(result)) {
      throw new DataRetrievalError(`Transformation ${this.label} produced ${result}`);
    }
    return result;
  }

  private compute(event: FlowEvent, resolver: ValueResolver): number {
    const { spec } = this;
    switch (spec.kind) {
      case 'linear':
        return spec.a * resolver.value(spec.parameter, event) + spec.b;
      case 'quadratic': {
        const x = resolver.value(spec.parameter, event);
        return spec.a * x * x + spec.b * x + spec.c;
      }
      case 'ln':
        return (spec.r / spec.d) * Math.log(resolver.value(spec.parameter, event));
      case 'log':
        return ((spec.r / spec.d) * Math.log(resolver.value(spec.parameter, event))) / Math.log(spec.base);
      case 'ratio':
        return resolver.value(spec.numerator, event) / resolver.value(spec.denominator, event);
    }
  }
}

/**
 * @throws InvalidTransformationError for coefficients that can never yield a value
 */
export function createTransformation(descriptor: TransformationDescriptor): TransformationParameter {
  const { id } = descriptor;
  return new TransformationParameter(id, toSpec(descriptor), descriptor.label);
}

function toSpec(descriptor: TransformationDescriptor): TransformationSpec {
  switch (descriptor.kind) {
    case 'linear':
      return { kind: 'linear', parameter: descriptor.parameter, a: descriptor.a, b: descriptor.b };
    case 'quadratic':
      return { kind: 'quadratic', parameter: descriptor.parameter, a: descriptor.a, b: descriptor.b, c: descriptor.c };
    case 'ln':
      requireNonZeroDivisor(descriptor.id, descriptor.d);
      return { kind: 'ln', parameter: descriptor.parameter, r: descriptor.r, d: descriptor.d };
    case 'log':
      requireNonZeroDivisor(descriptor.id, descriptor.d);
      if (descriptor.base <= 0 || descriptor.base === 1) {
        throw new InvalidTransformationError(descriptor.id, `log base must be positive and not 1, got ${descriptor.base}`);
      }
      return { kind: 'log', parameter: descriptor.parameter, r: descriptor.r, d: descriptor.d, base: descriptor.base };
    case 'ratio':
      return { kind: 'ratio', numerator: descriptor.numerator, denominator: descriptor.denominator };
  }
}

function requireNonZeroDivisor(id: ParameterReference, d: number): void {
  if (d === 0) {
    throw new InvalidTransformationError(id, 'd must not be zero');
  }
}

/**
 * Parameter collection made of transformations
 */
export class TransformationCollection extends ParameterCollection {
  static fromDescriptors(descriptors: readonly TransformationDescriptor[]): TransformationCollection {
    return new TransformationCollection(descriptors.map(createTransformation));
  }
}
