/**
 * Population statistics
 *
 * The aggregate figures an analysis result exposes per gate. Empty
 * populations yield NaN aggregates; standard deviation is the sample
 * (n - 1) estimate and is 0 for a single event.
 *
 * @module data/statistics
 */

import type { ParameterReference } from './parameter.js';
import type { Population } from './population.js';
import type { ReferenceResolver } from './reference-resolver.js';

export interface ParameterStatistics {
  readonly reference: ParameterReference;
  readonly min: number;
  readonly max: number;
  readonly mean: number;
  readonly median: number;
  readonly standardDeviation: number;
}

export interface PopulationStatistics {
  readonly count: number;
  readonly parameters: readonly ParameterStatistics[];
}

export function populationStatistics(
  population: Population,
  references: readonly ParameterReference[],
  resolver: ReferenceResolver = population.resolver
): PopulationStatistics {
  const parameters = references.map((reference) => {
    const parameter = resolver.resolve(reference);
    const values = population.events.map((event) => resolver.value(parameter, event));
    return describe(reference, values);
  });

  return { count: population.events.length, parameters };
}

/**
 * Events in `population` as a fraction of its parent's events
 */
export function fractionOfParent(population: Population): number {
  const parentCount = population.parent?.events.length;
  if (parentCount === undefined || parentCount === 0) return NaN;
  return population.events.length / parentCount;
}

function describe(reference: ParameterReference, values: readonly number[]): ParameterStatistics {
  if (values.length === 0) {
    return { reference, min: NaN, max: NaN, mean: NaN, median: NaN, standardDeviation: NaN };
  }

  const sorted = [...values].sort((a, b) => a - b);
  const n = sorted.length;
  const mean = sorted.reduce((sum, v) => sum + v, 0) / n;
  const middle = Math.floor(n / 2);
  const median = n % 2 === 0 ? (sorted[middle - 1] + sorted[middle]) / 2 : sorted[middle];
  const variance =
    n < 2 ? 0 : sorted.reduce((sum, v) => sum + (v - mean) ** 2, 0) / (n - 1);

  return {
    reference,
    min: sorted[0],
    max: sorted[n - 1],
    mean,
    median,
    standardDeviation: Math.sqrt(variance),
  };
}
