/**
 * Processing pipeline
 *
 * For every data set in every location of a relations store, the resolved
 * relations become an ordered list of named steps (compensation, then
 * transformation, then gating). Each step maps one immutable population to
 * zero or more output populations; the accumulated name is threaded
 * explicitly through `appendName`.
 *
 * FAILURE POLICY:
 * - A location whose data file cannot be loaded is reported and skipped
 * - A step that cannot be applied skips its data set
 * - A gate that fails is reported; the other gates of the set still run
 *
 * @module pipeline/pipeline
 */

import { Analyzer } from '../analysis/analyzer.js';
import { compensatePopulation } from '../compensation/compensate.js';
import { DEFAULT_ENGINE_CONFIG, appendName, type EngineConfig } from '../core/config.js';
import { describeError, errorMessage, toError } from '../core/errors.js';
import { createLogger, type Logger } from '../core/utils/logger.js';
import { derivePopulation, type Population } from '../data/population.js';
import type { RelationCollection } from '../relations/relation-collection.js';
import {
  DEFAULT_RELATION_ORDER,
  describeRelation,
  type CompensationRelation,
  type GatingRelation,
  type Relation,
  type RelationType,
  type TransformationRelation,
} from '../relations/relation.js';
import type { RelationsStore } from '../relations/relations-store.js';
import type { DataSource, LoadedDataSet } from './data-source.js';

// ============================================================================
// Types
// ============================================================================

export interface PipelineOptions {
  readonly source: DataSource;
  readonly analyzer?: Analyzer;
  readonly config?: EngineConfig;
  readonly logger?: Logger;
  readonly order?: readonly RelationType[];
}

export type DataSetStatus = 'completed' | 'skipped';

export interface DataSetOutcome {
  readonly location: string;
  readonly dataSetNumber: number;
  readonly status: DataSetStatus;
  /** Final populations; empty when skipped */
  readonly outputs: readonly Population[];
  /** Names of the steps applied, in order */
  readonly steps: readonly string[];
  readonly messages: readonly string[];
  readonly gateFailures: readonly GateFailure[];
  /** Why the data set was skipped */
  readonly reason?: string;
}

export interface GateFailure {
  readonly gateId: string;
  readonly message: string;
}

export interface LocationError {
  readonly location: string;
  readonly error: Error;
}

export interface PipelineResult {
  readonly outcomes: readonly DataSetOutcome[];
  readonly errors: readonly LocationError[];
}

export type StepResult =
  | {
      readonly ok: true;
      readonly outputs: readonly Population[];
      readonly messages: readonly string[];
      readonly gateFailures?: readonly GateFailure[];
    }
  | { readonly ok: false; readonly reason: string };

export interface PipelineStep {
  readonly name: string;
  apply(input: Population): StepResult;
}

export interface StepContext {
  readonly source: DataSource;
  readonly analyzer: Analyzer;
  readonly config: EngineConfig;
}

// ============================================================================
// Running
// ============================================================================

export function runPipeline(store: RelationsStore, options: PipelineOptions): PipelineResult {
  const config = options.config ?? DEFAULT_ENGINE_CONFIG;
  const logger = options.logger ?? createLogger({ module: 'pipeline' });
  const context: StepContext = {
    source: options.source,
    analyzer: options.analyzer ?? new Analyzer({ config, logger }),
    config,
  };

  const outcomes: DataSetOutcome[] = [];
  const errors: LocationError[] = [];

  for (const location of store.locations()) {
    let dataSets: readonly LoadedDataSet[];
    try {
      dataSets = options.source.loadDataFile(location).dataSets;
    } catch (error) {
      logger.error('Skipping location: data file could not be loaded', {
        location,
        error: describeError(error),
      });
      errors.push({ location, error: toError(error) });
      continue;
    }

    for (const dataSet of dataSets) {
      const relations = store.relationsFor(location, dataSet.number);
      const outcome = processDataSet(location, dataSet, relations, context, options.order);
      if (outcome.status === 'skipped') {
        logger.warn('Skipping data set', { location, dataSet: dataSet.number, reason: outcome.reason });
      } else {
        logger.info('Data set processed', {
          location,
          dataSet: dataSet.number,
          outputs: outcome.outputs.length,
        });
      }
      outcomes.push(outcome);
    }
  }

  return { outcomes, errors };
}

export function pipelineHasErrors(result: PipelineResult): boolean {
  return (
    result.errors.length > 0 ||
    result.outcomes.some((outcome) => outcome.status === 'skipped' || outcome.gateFailures.length > 0)
  );
}

/**
 * Apply the relations of one data set in processing order
 */
export function processDataSet(
  location: string,
  dataSet: LoadedDataSet,
  relations: RelationCollection,
  context: StepContext,
  order: readonly RelationType[] = DEFAULT_RELATION_ORDER
): DataSetOutcome {
  const steps = relations.inOrder(order).map((relation) => stepFor(relation, context));
  const messages: string[] = [];
  const gateFailures: GateFailure[] = [];
  let branches: readonly Population[] = [dataSet.population];

  for (const step of steps) {
    const next: Population[] = [];
    for (const branch of branches) {
      const result = step.apply(branch);
      if (!result.ok) {
        return {
          location,
          dataSetNumber: dataSet.number,
          status: 'skipped',
          outputs: [],
          steps: steps.map((s) => s.name),
          messages,
          gateFailures,
          reason: result.reason,
        };
      }
      next.push(...result.outputs);
      messages.push(...result.messages);
      gateFailures.push(...(result.gateFailures ?? []));
    }
    branches = next;
  }

  return {
    location,
    dataSetNumber: dataSet.number,
    status: 'completed',
    outputs: branches,
    steps: steps.map((s) => s.name),
    messages,
    gateFailures,
  };
}

// ============================================================================
// Steps
// ============================================================================

export function stepFor(relation: Relation, context: StepContext): PipelineStep {
  switch (relation.type) {
    case 'compensation':
      return compensationStep(relation, context);
    case 'transformation':
      return transformationStep(relation, context);
    case 'gating':
      return gatingStep(relation, context);
    case 'experiment-description':
    case 'instrumentation':
    case 'unknown':
      return ignoredStep(relation);
  }
}

function compensationStep(relation: CompensationRelation, context: StepContext): PipelineStep {
  return {
    name: describeRelation(relation),
    apply: (input) => {
      const { matrixId } = relation;
      if (matrixId === undefined) {
        return { ok: false, reason: `Compensation ${relation.location} has no matrix id` };
      }
      try {
        const matrix = context.source.loadSpilloverMatrices(relation.location).get(matrixId);
        if (!matrix) {
          return { ok: false, reason: `Compensation matrix ${matrixId} not found in ${relation.location}` };
        }
        const name = appendName(input.name, context.config.compensationSuffix, context.config);
        const output = compensatePopulation(input, matrix, { name, config: context.config });
        return { ok: true, outputs: [output], messages: [] };
      } catch (error) {
        return { ok: false, reason: errorMessage(error) };
      }
    },
  };
}

function transformationStep(relation: TransformationRelation, context: StepContext): PipelineStep {
  return {
    name: describeRelation(relation),
    apply: (input) => {
      try {
        const collection = context.source.loadTransformations(relation.location);
        const resolver = input.resolver.extend([collection]);
        const name = appendName(input.name, context.config.transformationSuffix, context.config);
        return { ok: true, outputs: [derivePopulation(input, name, input.events, resolver)], messages: [] };
      } catch (error) {
        return { ok: false, reason: errorMessage(error) };
      }
    },
  };
}

function gatingStep(relation: GatingRelation, context: StepContext): PipelineStep {
  return {
    name: describeRelation(relation),
    apply: (input) => {
      const { gateId } = relation;
      try {
        const gateSet = context.source.loadGateSet(relation.location);
        if (gateId !== undefined && !gateSet.has(gateId)) {
          return { ok: false, reason: `Gate ${gateId} not found in ${relation.location}` };
        }

        const result = context.analyzer.analyze(gateSet, input, gateId === undefined ? {} : { gateIds: [gateId] });
        const populationError = result.errors.find((error) => error.scope === 'population');
        if (populationError) {
          return { ok: false, reason: populationError.cause.message };
        }

        return {
          ok: true,
          outputs: [...result].map(({ population }) => population),
          messages: [],
          gateFailures: result
            .gateErrors()
            .map((error) => ({ gateId: error.gateId, message: error.cause.message })),
        };
      } catch (error) {
        return { ok: false, reason: errorMessage(error) };
      }
    },
  };
}

function ignoredStep(relation: Relation): PipelineStep {
  const name = describeRelation(relation);
  return {
    name,
    apply: (input) => ({ ok: true, outputs: [input], messages: [`Ignoring ${name}`] }),
  };
}
