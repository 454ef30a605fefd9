/**
 * Analyzer
 *
 * Applies the gates of a gate set to populations. Each analysis builds its
 * own resolver (population resolver plus the analyzer's extra collections),
 * so no resolver is shared between analyses.
 *
 * ISOLATION:
 * - Resolver construction failure: one population-scoped error, no gates run
 * - Gate failure: one gate-scoped error, remaining gates still run
 *
 * @module analysis/analyzer
 */

import { DEFAULT_ENGINE_CONFIG, type EngineConfig } from '../core/config.js';
import { NoSuchGateError, describeError, toError } from '../core/errors.js';
import { createLogger, type Logger } from '../core/utils/logger.js';
import type { ParameterCollection } from '../data/parameter-collection.js';
import type { Population } from '../data/population.js';
import { ReferenceResolver } from '../data/reference-resolver.js';
import { evaluateGate } from '../gating/evaluate.js';
import type { Gate } from '../gating/gate.js';
import type { GateSet } from '../gating/gate-set.js';
import {
  CollectionAnalysisResult,
  PopulationAnalysisResult,
  type AnalysisError,
  type GateResult,
} from './analysis-result.js';

export interface AnalyzerOptions {
  /** Collections appended to every population's resolver, e.g. transformations */
  readonly parameterCollections?: readonly ParameterCollection[];
  readonly config?: EngineConfig;
  readonly logger?: Logger;
}

export interface AnalyzeOptions {
  /** Evaluate only these gates, in this order */
  readonly gateIds?: readonly string[];
}

export class Analyzer {
  private readonly collections: readonly ParameterCollection[];
  private readonly config: EngineConfig;
  private readonly logger: Logger;

  constructor(options: AnalyzerOptions = {}) {
    this.collections = options.parameterCollections ?? [];
    this.config = options.config ?? DEFAULT_ENGINE_CONFIG;
    this.logger = options.logger ?? createLogger({ module: 'analyzer' });
  }

  analyze(gateSet: GateSet, population: Population, options: AnalyzeOptions = {}): PopulationAnalysisResult {
    let resolver: ReferenceResolver;
    try {
      resolver = new ReferenceResolver(this.collections, population.resolver);
    } catch (error) {
      this.logger.warn('Skipping population: resolver could not be built', {
        population: population.name,
        error: describeError(error),
      });
      const failure: AnalysisError = { scope: 'population', cause: toError(error) };
      return new PopulationAnalysisResult(population, [], [failure]);
    }

    const results: GateResult[] = [];
    const errors: AnalysisError[] = [];

    for (const { id, gate } of this.selectGates(gateSet, options)) {
      if (!gate) {
        errors.push({ scope: 'gate', gateId: id, cause: new NoSuchGateError([id]) });
        continue;
      }
      try {
        const subPopulation = evaluateGate(gate, population, { resolver, gates: gateSet, config: this.config });
        results.push({ gate, population: subPopulation });
        this.logger.debug('Gate evaluated', {
          population: population.name,
          gate: id,
          count: subPopulation.events.length,
        });
      } catch (error) {
        this.logger.warn(`Skipping Gate ${id}`, {
          population: population.name,
          error: describeError(error),
        });
        errors.push({ scope: 'gate', gateId: id, cause: toError(error) });
      }
    }

    return new PopulationAnalysisResult(population, results, errors, resolver);
  }

  /**
   * One result per population, in order
   */
  analyzeAll(gateSet: GateSet, populations: readonly Population[], options: AnalyzeOptions = {}): PopulationAnalysisResult[] {
    return populations.map((population) => this.analyze(gateSet, population, options));
  }

  /**
   * One collection result per population collection, in order
   */
  analyzeBatch(
    gateSet: GateSet,
    collections: readonly (readonly Population[])[],
    options: AnalyzeOptions = {}
  ): CollectionAnalysisResult[] {
    return collections.map(
      (populations) => new CollectionAnalysisResult(this.analyzeAll(gateSet, populations, options))
    );
  }

  private selectGates(gateSet: GateSet, options: AnalyzeOptions): { id: string; gate: Gate | undefined }[] {
    const ids = options.gateIds ?? gateSet.ids();
    return ids.map((id) => ({ id, gate: gateSet.get(id) }));
  }
}
