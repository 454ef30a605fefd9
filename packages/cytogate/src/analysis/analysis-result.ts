/**
 * Analysis results
 *
 * Immutable outcome of applying a gate set to one population: one
 * sub-population per gate that evaluated, and the errors of those that did
 * not. A population-scoped error means no gate was evaluated at all.
 *
 * @module analysis/analysis-result
 */

import type { ParameterReference } from '../data/parameter.js';
import type { Population } from '../data/population.js';
import type { ReferenceResolver } from '../data/reference-resolver.js';
import { populationStatistics, type PopulationStatistics } from '../data/statistics.js';
import type { Gate } from '../gating/gate.js';

export interface GateAnalysisError {
  readonly scope: 'gate';
  readonly gateId: string;
  readonly cause: Error;
}

export interface PopulationAnalysisError {
  readonly scope: 'population';
  readonly cause: Error;
}

export type AnalysisError = GateAnalysisError | PopulationAnalysisError;

export interface GateResult {
  readonly gate: Gate;
  readonly population: Population;
}

/**
 * One summary row per evaluated gate
 */
export interface GateSummary {
  readonly gateId: string;
  readonly count: number;
  readonly parentCount: number;
  /** count / parentCount; NaN for an empty parent */
  readonly fraction: number;
}

export class PopulationAnalysisResult implements Iterable<GateResult> {
  private readonly results: readonly GateResult[];
  private readonly byId: ReadonlyMap<string, GateResult>;
  readonly errors: readonly AnalysisError[];

  constructor(
    public readonly population: Population,
    results: readonly GateResult[],
    errors: readonly AnalysisError[],
    /** Resolver the gates were evaluated with; absent when it could not be built */
    public readonly resolver?: ReferenceResolver
  ) {
    this.results = Object.freeze([...results]);
    this.byId = new Map(results.map((result): [string, GateResult] => [result.gate.id, result]));
    this.errors = Object.freeze([...errors]);
  }

  hasErrors(): boolean {
    return this.errors.length > 0;
  }

  getGateResult(gate: string | Gate): Population | undefined {
    const id = typeof gate === 'string' ? gate : gate.id;
    return this.byId.get(id)?.population;
  }

  /** Ids of gates that evaluated, in gate-set order */
  gateIds(): string[] {
    return this.results.map((result) => result.gate.id);
  }

  gateErrors(): GateAnalysisError[] {
    return this.errors.filter((error): error is GateAnalysisError => error.scope === 'gate');
  }

  get size(): number {
    return this.results.length;
  }

  [Symbol.iterator](): Iterator<GateResult> {
    return this.results[Symbol.iterator]();
  }

  summary(): GateSummary[] {
    const parentCount = this.population.events.length;
    return this.results.map(({ gate, population }) => ({
      gateId: gate.id,
      count: population.events.length,
      parentCount,
      fraction: parentCount === 0 ? NaN : population.events.length / parentCount,
    }));
  }

  /**
   * Aggregate statistics of one gate's sub-population
   */
  statistics(gateId: string, references: readonly ParameterReference[]): PopulationStatistics | undefined {
    const population = this.getGateResult(gateId);
    return population ? populationStatistics(population, references) : undefined;
  }
}

/**
 * Ordered results for one collection of populations
 */
export class CollectionAnalysisResult implements Iterable<PopulationAnalysisResult> {
  readonly results: readonly PopulationAnalysisResult[];

  constructor(results: readonly PopulationAnalysisResult[]) {
    this.results = Object.freeze([...results]);
  }

  hasErrors(): boolean {
    return this.results.some((result) => result.hasErrors());
  }

  get size(): number {
    return this.results.length;
  }

  [Symbol.iterator](): Iterator<PopulationAnalysisResult> {
    return this.results[Symbol.iterator]();
  }
}
