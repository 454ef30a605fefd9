/**
 * Parameter Collection
 *
 * Ordered set of parameters with at most one parameter per referenceable
 * name. Unreferenceable parameters are kept and iterated, but can never be
 * found through `get`.
 *
 * @module data/parameter-collection
 */

import { DuplicateReferenceError } from '../core/errors.js';
import {
  ChannelParameter,
  isReferenceable,
  type Parameter,
  type ParameterReference,
} from './parameter.js';

export class ParameterCollection implements Iterable<Parameter> {
  private readonly parameters: readonly Parameter[];
  private readonly byReference: ReadonlyMap<ParameterReference, Parameter>;

  constructor(parameters: Iterable<Parameter>) {
    const list = [...parameters];
    const byReference = new Map<ParameterReference, Parameter>();
    const duplicates: ParameterReference[] = [];

    for (const parameter of list) {
      if (!isReferenceable(parameter.reference)) continue;
      if (byReference.has(parameter.reference)) {
        if (!duplicates.includes(parameter.reference)) duplicates.push(parameter.reference);
        continue;
      }
      byReference.set(parameter.reference, parameter);
    }

    if (duplicates.length > 0) {
      throw new DuplicateReferenceError(duplicates);
    }

    this.parameters = Object.freeze(list);
    this.byReference = byReference;
  }

  /**
   * Build a collection of measured channels numbered 1..n in the given order
   */
  static channels(references: readonly ParameterReference[]): ParameterCollection {
    return new ParameterCollection(
      references.map((reference, i) => new ChannelParameter(i + 1, reference))
    );
  }

  get size(): number {
    return this.parameters.length;
  }

  get(reference: ParameterReference): Parameter | undefined {
    if (!isReferenceable(reference)) return undefined;
    return this.byReference.get(reference);
  }

  has(reference: ParameterReference): boolean {
    return this.get(reference) !== undefined;
  }

  /** Referenceable names in collection order */
  references(): ParameterReference[] {
    return [...this.byReference.keys()];
  }

  toArray(): readonly Parameter[] {
    return this.parameters;
  }

  [Symbol.iterator](): Iterator<Parameter> {
    return this.parameters[Symbol.iterator]();
  }
}
