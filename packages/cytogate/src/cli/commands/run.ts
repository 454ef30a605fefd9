/**
 * Run Command
 *
 * Loads one or more relation manifests into a single relations store and
 * runs the processing pipeline over every file they name. Locations inside
 * a manifest resolve against the manifest's own directory.
 *
 * Usage:
 *   cytogate run <manifest...> [--dry-run] [--format <fmt>]
 *
 * @module cli/commands/run
 */

import { dirname, resolve } from 'node:path';

import { errorMessage } from '../../core/errors.js';
import { FileDataSource } from '../../io/file-data-source.js';
import { readDocument } from '../../io/read-document.js';
import { CachingDataSource } from '../../pipeline/data-source.js';
import { runPipeline } from '../../pipeline/pipeline.js';
import { storeFromManifest } from '../../relations/manifest.js';
import { describeRelation } from '../../relations/relation.js';
import { RelationsStore } from '../../relations/relations-store.js';
import { RelationManifestSchema, parseDocument } from '../../schemas/descriptors.js';
import { EXIT_CODES, engineLogger, type CommandContext, type ExitCode } from '../lib/context.js';
import { formatOutput, printError, printOutput, type OutputFormat, type TableColumn } from '../lib/output.js';
import { REPORT_COLUMNS, exitCodeFor, reportRows } from '../lib/report.js';

export interface RunOptions {
  readonly manifests: readonly string[];
  readonly dryRun?: boolean;
  readonly format?: OutputFormat;
}

export interface RelationPlanRow {
  readonly [key: string]: unknown;
  readonly location: string;
  /** 'file' for file-level defaults, otherwise the data set number */
  readonly scope: string;
  readonly relations: string;
}

const PLAN_COLUMNS: readonly TableColumn[] = [
  { key: 'location', header: 'Location' },
  { key: 'scope', header: 'Scope' },
  { key: 'relations', header: 'Relations (processing order)' },
];

/**
 * Merge every manifest into one store
 *
 * @throws DescriptorValidationError, DuplicateRelationError, DataSourceError
 */
export function loadManifests(paths: readonly string[]): RelationsStore {
  const store = new RelationsStore();
  for (const path of paths) {
    const absolute = resolve(path);
    const manifest = parseDocument(RelationManifestSchema, readDocument(absolute), path);
    const baseDir = dirname(absolute);
    storeFromManifest(manifest, (location) => resolve(baseDir, location), store);
  }
  return store;
}

/**
 * Resolved relations per location: file-level defaults, then every data set
 * that carries its own
 */
export function relationPlan(store: RelationsStore): RelationPlanRow[] {
  const rows: RelationPlanRow[] = [];
  for (const location of store.locations()) {
    rows.push({
      location,
      scope: 'file',
      relations: store.fileRelationsFor(location).inOrder().map(describeRelation).join('; '),
    });
    for (const number of store.dataSetNumbers(location)) {
      rows.push({
        location,
        scope: String(number),
        relations: store.relationsFor(location, number).inOrder().map(describeRelation).join('; '),
      });
    }
  }
  return rows;
}

export async function runCommand(options: RunOptions, context: CommandContext): Promise<ExitCode> {
  const { config, logger } = context;
  const format = options.format ?? config.output.format;

  logger.commandStart('run', { manifests: options.manifests.length, dryRun: options.dryRun ?? false });

  let store: RelationsStore;
  try {
    store = loadManifests(options.manifests);
  } catch (error) {
    printError(errorMessage(error));
    logger.commandEnd(false);
    return EXIT_CODES.ERRORS;
  }

  if (options.dryRun) {
    printOutput(formatOutput(relationPlan(store), format, PLAN_COLUMNS));
    logger.commandEnd(true, { locations: store.locations().length });
    return EXIT_CODES.SUCCESS;
  }

  const result = runPipeline(store, {
    source: new CachingDataSource(new FileDataSource({ logger: engineLogger(config, 'file-data-source') })),
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
