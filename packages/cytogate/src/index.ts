/**
 * Cytogate
 *
 * Gate evaluation, parameter reference resolution and relation management
 * for flow cytometry event data, with compensation, transformations and a
 * processing pipeline built on top.
 *
 * @packageDocumentation
 */

// Core
export * from './core/errors.js';
export {
  DEFAULT_ENGINE_CONFIG,
  appendName,
  resolveEngineConfig,
  type EngineConfig,
} from './core/config.js';
export {
  createLogger,
  logger,
  Logger,
  type LogFormat,
  type LogLevel,
  type LoggerOptions,
  type LogMetadata,
} from './core/utils/logger.js';

// Data
export { FlowEvent } from './data/flow-event.js';
export {
  ChannelParameter,
  UNREFERENCEABLE,
  isChannelParameter,
  isReferenceable,
  type Parameter,
  type ParameterReference,
  type ValueResolver,
} from './data/parameter.js';
export { ParameterCollection } from './data/parameter-collection.js';
export { ReferenceResolver } from './data/reference-resolver.js';
export {
  createPopulation,
  derivePopulation,
  populationFromRows,
  type Population,
} from './data/population.js';
export {
  fractionOfParent,
  populationStatistics,
  type ParameterStatistics,
  type PopulationStatistics,
} from './data/statistics.js';

// Gating
export type * from './gating/descriptors.js';
export type * from './gating/gate.js';
export { isDecisionLeaf, operandsOf, proxyTargets } from './gating/gate.js';
export { andGate, createGate, notGate, orGate, proxyGate } from './gating/gate-factory.js';
export { compileGate, evaluateGate, type EvaluationContext, type EventPredicate } from './gating/evaluate.js';
export { GateSet } from './gating/gate-set.js';

// Analysis
export {
  CollectionAnalysisResult,
  PopulationAnalysisResult,
  type AnalysisError,
  type GateAnalysisError,
  type GateResult,
  type GateSummary,
  type PopulationAnalysisError,
} from './analysis/analysis-result.js';
export { Analyzer, type AnalyzeOptions, type AnalyzerOptions } from './analysis/analyzer.js';

// Relations
export * from './relations/relation.js';
export { RelationCollection } from './relations/relation-collection.js';
export { RelationsStore } from './relations/relations-store.js';
export { storeFromManifest, type LocationMapper } from './relations/manifest.js';

// Compensation and transformations
export { SpilloverMatrix, SpilloverMatrixSet, type SpilloverEntry } from './compensation/spillover-matrix.js';
export { compensatePopulation, type CompensateOptions } from './compensation/compensate.js';
export {
  TransformationCollection,
  TransformationParameter,
  createTransformation,
  type TransformationDescriptor,
  type TransformationKind,
  type TransformationSpec,
} from './transformation/transformation.js';

// Pipeline
export {
  CachingDataSource,
  type DataSource,
  type LoadedDataFile,
  type LoadedDataSet,
} from './pipeline/data-source.js';
export {
  pipelineHasErrors,
  processDataSet,
  runPipeline,
  stepFor,
  type DataSetOutcome,
  type DataSetStatus,
  type GateFailure,
  type LocationError,
  type PipelineOptions,
  type PipelineResult,
  type PipelineStep,
  type StepContext,
  type StepResult,
} from './pipeline/pipeline.js';

// Documents and files
export * from './schemas/descriptors.js';
export { parseEventCsv, type EventTable } from './io/csv.js';
export { parseDocumentText, readDocument, readText } from './io/read-document.js';
export { FileDataSource, type FileDataSourceOptions } from './io/file-data-source.js';
