/**
 * Population
 *
 * Immutable ordered collection of events plus the resolver used to read
 * them. Derived populations share event objects with their parent.
 *
 * @module data/population
 */

import { FlowEvent } from './flow-event.js';
import { ParameterCollection } from './parameter-collection.js';
import type { ParameterReference } from './parameter.js';
import { ReferenceResolver } from './reference-resolver.js';

export interface Population {
  readonly name: string;
  readonly events: readonly FlowEvent[];
  readonly resolver: ReferenceResolver;
  readonly parent?: Population;
}

export function createPopulation(
  name: string,
  events: readonly FlowEvent[],
  resolver: ReferenceResolver,
  parent?: Population
): Population {
  const population: Population = {
    name,
    events: Object.freeze([...events]),
    resolver,
    ...(parent ? { parent } : {}),
  };
  return Object.freeze(population);
}

/**
 * Child population of `parent` holding a subset (or replacement) of its events
 */
export function derivePopulation(
  parent: Population,
  name: string,
  events: readonly FlowEvent[],
  resolver: ReferenceResolver = parent.resolver
): Population {
  return createPopulation(name, events, resolver, parent);
}

/**
 * Root population over raw rows, with one channel parameter per column
 */
export function populationFromRows(
  name: string,
  references: readonly ParameterReference[],
  rows: readonly (readonly number[])[]
): Population {
  const resolver = new ReferenceResolver([ParameterCollection.channels(references)]);
  return createPopulation(
    name,
    rows.map((row) => new FlowEvent(row)),
    resolver
  );
}
