/**
 * Gates Command
 *
 * Builds a gate set from a gate document, validates its references and
 * lists the gates.
 *
 * Usage:
 *   cytogate gates <file> [--format <fmt>]
 *
 * @module cli/commands/gates
 */

import { resolve } from 'node:path';

import { errorMessage } from '../../core/errors.js';
import { proxyTargets, type GateKind } from '../../gating/gate.js';
import { GateSet } from '../../gating/gate-set.js';
import { readDocument } from '../../io/read-document.js';
import { GateDocumentSchema, parseDocument } from '../../schemas/descriptors.js';
import { EXIT_CODES, type CommandContext, type ExitCode } from '../lib/context.js';
import { formatOutput, printError, printOutput, type OutputFormat, type TableColumn } from '../lib/output.js';

export interface GatesOptions {
  readonly file: string;
  readonly format?: OutputFormat;
}

export interface GateRow {
  readonly [key: string]: unknown;
  readonly id: string;
  readonly kind: GateKind;
  readonly dimensions: string;
  readonly references: string;
}

const GATE_COLUMNS: readonly TableColumn[] = [
  { key: 'id', header: 'Gate' },
  { key: 'kind', header: 'Kind' },
  { key: 'dimensions', header: 'Dimensions' },
  { key: 'references', header: 'References' },
];

export function gateRows(gateSet: GateSet): GateRow[] {
  return gateSet.toArray().map((gate): GateRow => ({
    id: gate.id,
    kind: gate.kind,
    dimensions: gate.dimensions.join(', '),
    references: proxyTargets(gate).join(', '),
  }));
}

export async function gatesCommand(options: GatesOptions, context: CommandContext): Promise<ExitCode> {
  const { config, logger } = context;
  const format = options.format ?? config.output.format;

  logger.commandStart('gates', { file: options.file });

  let gateSet: GateSet;
  try {
    const document = parseDocument(GateDocumentSchema, readDocument(resolve(options.file)), options.file);
    gateSet = GateSet.fromDescriptors(document.gates);
  } catch (error) {
    printError(errorMessage(error));
    logger.commandEnd(false);
    return EXIT_CODES.ERRORS;
  }

  printOutput(formatOutput(gateRows(gateSet), format, GATE_COLUMNS));
  logger.commandEnd(true, { gates: gateSet.size });
  return EXIT_CODES.SUCCESS;
}
