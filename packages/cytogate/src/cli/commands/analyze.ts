/**
 * Analyze Command
 *
 * Runs the processing pipeline over event files with relations given on the
 * command line. Every relation applies to every data set of every file.
 *
 * Usage:
 *   cytogate analyze --events <file...> [options]
 *
 * Options:
 *   --events <file...>         Event tables (.csv, .json, .yaml)
 *   --gating <file>            Gate document
 *   --gate <id>                Apply only this gate
 *   --compensation <file>      Spillover matrix document (requires --matrix)
 *   --matrix <id>              Matrix to compensate with
 *   --transformations <file>   Transformation document
 *   --format <fmt>             Output format: table|json|ndjson|csv
 *
 * @module cli/commands/analyze
 */

import { errorMessage } from '../../core/errors.js';
import { FileDataSource } from '../../io/file-data-source.js';
import { CachingDataSource } from '../../pipeline/data-source.js';
import { runPipeline } from '../../pipeline/pipeline.js';
import type { Relation } from '../../relations/relation.js';
import { RelationsStore } from '../../relations/relations-store.js';
import { EXIT_CODES, engineLogger, type CommandContext, type ExitCode } from '../lib/context.js';
import { formatOutput, printError, printOutput, type OutputFormat } from '../lib/output.js';
import { REPORT_COLUMNS, exitCodeFor, reportRows } from '../lib/report.js';

export interface AnalyzeOptions {
  readonly events: readonly string[];
  readonly gating?: string;
  readonly gate?: string;
  readonly compensation?: string;
  readonly matrix?: string;
  readonly transformations?: string;
  readonly format?: OutputFormat;
  /** Directory relative paths resolve against (default: cwd) */
  readonly baseDir?: string;
}

/**
 * File-level relations for every events file
 *
 * @throws Error when the option combination is invalid
 */
export function buildAnalyzeStore(options: AnalyzeOptions): RelationsStore {
  if (options.events.length === 0) {
    throw new Error('At least one --events file is required');
  }
  if (options.compensation !== undefined && options.matrix === undefined) {
    throw new Error('--compensation requires --matrix');
  }
  if (options.matrix !== undefined && options.compensation === undefined) {
    throw new Error('--matrix requires --compensation');
  }
  if (options.gate !== undefined && options.gating === undefined) {
    throw new Error('--gate requires --gating');
  }

  const relations: Relation[] = [];
  if (options.compensation !== undefined) {
    relations.push({ type: 'compensation', location: options.compensation, matrixId: options.matrix });
  }
  if (options.transformations !== undefined) {
    relations.push({ type: 'transformation', location: options.transformations });
  }
  if (options.gating !== undefined) {
    relations.push({ type: 'gating', location: options.gating, gateId: options.gate });
  }

  const store = new RelationsStore();
  for (const location of options.events) {
    for (const relation of relations) {
      store.addFileRelation(location, relation);
    }
  }
  return store;
}

export async function analyzeCommand(options: AnalyzeOptions, context: CommandContext): Promise<ExitCode> {
  const { config, logger } = context;
  const format = options.format ?? config.output.format;

  let store: RelationsStore;
  try {
    store = buildAnalyzeStore(options);
  } catch (error) {
    printError(errorMessage(error));
    return EXIT_CODES.CONFIG_ERROR;
  }

  logger.commandStart('analyze', { events: options.events.length, format });

  const source = new CachingDataSource(
    new FileDataSource({ baseDir: options.baseDir, logger: engineLogger(config, 'file-data-source') })
  );
  const result = runPipeline(store, {
    source,
    config: config.engine,
    logger: engineLogger(config, 'pipeline'),
  });

  printOutput(formatOutput(reportRows(result), format, REPORT_COLUMNS));

  const exitCode = exitCodeFor(result);
  logger.commandEnd(exitCode === EXIT_CODES.SUCCESS, {
    dataSets: result.outcomes.length,
    locationErrors: result.errors.length,
  });
  return exitCode;
}
