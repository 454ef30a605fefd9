/**
 * Reference Resolver
 *
 * Maps parameter references to parameters across an ordered list of
 * collections, and computes parameter values for events.
 *
 * INVARIANTS (checked eagerly at construction):
 * - No referenceable name is defined by more than one collection
 * - No parameter transitively depends on itself
 *
 * Dependencies naming a reference that cannot be resolved are ignored by
 * the cycle check. They surface as NoSuchParameterError when a value that
 * needs them is computed, so one gate's bad reference does not reject a
 * resolver that other gates can still use.
 *
 * @module data/reference-resolver
 */

import {
  CircularDependencyError,
  DuplicateReferenceError,
  NoSuchParameterError,
} from '../core/errors.js';
import type { FlowEvent } from './flow-event.js';
import {
  isReferenceable,
  type Parameter,
  type ParameterReference,
  type ValueResolver,
} from './parameter.js';
import type { ParameterCollection } from './parameter-collection.js';

export class ReferenceResolver implements ValueResolver {
  /** Contributing collections, base resolver's first */
  readonly collections: readonly ParameterCollection[];

  private readonly cache = new Map<ParameterReference, Parameter>();

  constructor(collections: readonly ParameterCollection[], base?: ReferenceResolver) {
    this.collections = Object.freeze(
      base ? [...base.collections, ...collections] : [...collections]
    );

    const duplicates = findDuplicateReferences(this.collections);
    if (duplicates.length > 0) {
      throw new DuplicateReferenceError(duplicates);
    }

    const cycle = this.findCycle();
    if (cycle) {
      throw new CircularDependencyError(cycle);
    }
  }

  /**
   * New resolver whose universe is this one's followed by `collections`
   */
  extend(collections: readonly ParameterCollection[]): ReferenceResolver {
    return new ReferenceResolver(collections, this);
  }

  /**
   * Resolve a reference, returning the first match in collection order
   *
   * @throws NoSuchParameterError when no collection defines it
   */
  resolve(reference: ParameterReference): Parameter {
    const parameter = this.find(reference);
    if (!parameter) {
      throw new NoSuchParameterError(reference);
    }
    return parameter;
  }

  /**
   * Like resolve, but returns undefined for an unknown reference
   */
  find(reference: ParameterReference): Parameter | undefined {
    if (!isReferenceable(reference)) return undefined;

    const cached = this.cache.get(reference);
    if (cached) return cached;

    for (const collection of this.collections) {
      const parameter = collection.get(reference);
      if (parameter) {
        this.cache.set(reference, parameter);
        return parameter;
      }
    }
    return undefined;
  }

  has(reference: ParameterReference): boolean {
    return this.find(reference) !== undefined;
  }

  value(target: ParameterReference | Parameter, event: FlowEvent): number {
    const parameter = typeof target === 'string' ? this.resolve(target) : target;
    return parameter.value(event, this);
  }

  allParameters(): Parameter[] {
    return this.collections.flatMap((collection) => [...collection]);
  }

  // ==========================================================================
  // Cycle detection
  // ==========================================================================

  private findCycle(): Parameter[] | null {
    const proven = new Set<Parameter>();
    for (const parameter of this.allParameters()) {
      if (proven.has(parameter)) continue;
      const cycle = this.visit(parameter, [], proven);
      if (cycle) return cycle;
    }
    return null;
  }

  private visit(parameter: Parameter, path: Parameter[], proven: Set<Parameter>): Parameter[] | null {
    const start = path.indexOf(parameter);
    if (start >= 0) {
      return [...path.slice(start), parameter];
    }
    if (proven.has(parameter)) return null;

    path.push(parameter);
    for (const dependency of parameter.dependencies) {
      const target = this.find(dependency);
      if (!target) continue;
      const cycle = this.visit(target, path, proven);
      if (cycle) return cycle;
    }
    path.pop();

    proven.add(parameter);
    return null;
  }
}

/**
 * References defined by more than one collection, in order of first repeat
 */
function findDuplicateReferences(collections: readonly ParameterCollection[]): ParameterReference[] {
  const seen = new Set<ParameterReference>();
  const duplicates: ParameterReference[] = [];

  for (const collection of collections) {
    const references = collection.references();
    for (const reference of references) {
      if (seen.has(reference) && !duplicates.includes(reference)) {
        duplicates.push(reference);
      }
    }
    for (const reference of references) seen.add(reference);
  }

  return duplicates;
}
