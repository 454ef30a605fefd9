#!/usr/bin/env tsx
/**
 * Cytogate CLI Entry Point
 *
 * Gate evaluation and processing pipeline for flow cytometry event data.
 *
 * @module cytogate-cli
 */

import { Command, Option } from 'commander';
import { readFileSync } from 'node:fs';
import { dirname, join } from 'node:path';
import { fileURLToPath } from 'node:url';

import { analyzeCommand } from '../src/cli/commands/analyze.js';
import { gatesCommand } from '../src/cli/commands/gates.js';
import { runCommand } from '../src/cli/commands/run.js';
import { loadConfig, validateConfig } from '../src/cli/lib/config.js';
import { EXIT_CODES, cliLogLevel, type CommandContext } from '../src/cli/lib/context.js';
import { createCLILogger } from '../src/cli/lib/logger.js';
import type { OutputFormat } from '../src/cli/lib/output.js';

export { EXIT_CODES } from '../src/cli/lib/context.js';

// ============================================================================
// Global State
// ============================================================================

export interface GlobalContext extends CommandContext {
  readonly startTime: number;
}

let globalContext: GlobalContext | null = null;

export function getGlobalContext(): GlobalContext {
  if (!globalContext) {
    throw new Error('Global context not initialized. Call initializeContext first.');
  }
  return globalContext;
}

// ============================================================================
// CLI Setup
// ============================================================================

function getVersion(): string {
  const packageJsonPath = join(dirname(fileURLToPath(import.meta.url)), '..', 'package.json');
  try {
    const packageJson: unknown = JSON.parse(readFileSync(packageJsonPath, 'utf-8'));
    if (typeof packageJson === 'object' && packageJson !== null && 'version' in packageJson) {
      return typeof packageJson.version === 'string' ? packageJson.version : '0.0.0';
    }
    return '0.0.0';
  } catch {
    return '0.0.0';
  }
}

interface GlobalOptions {
  verbose?: boolean;
  json?: boolean;
  quiet?: boolean;
  config?: string;
}

async function initializeContext(options: GlobalOptions): Promise<GlobalContext> {
  const startTime = Date.now();

  const config = await loadConfig({
    configPath: options.config,
    overrides: {
      verbose: options.verbose,
      json: options.json,
      quiet: options.quiet,
    },
  });
  validateConfig(config);

  const logger = createCLILogger({
    level: cliLogLevel(config),
    json: config.json,
  });

  globalContext = { config, logger, startTime };
  return globalContext;
}

function formatOption(): Option {
  return new Option('--format <fmt>', 'Output format').choices(['table', 'json', 'ndjson', 'csv']);
}

function collect(value: string, previous: string[]): string[] {
  return [...previous, value];
}

function createProgram(): Command {
  const program = new Command();

  program
    .name('cytogate')
    .description('Cytogate CLI - gating, compensation and transformation of flow cytometry events')
    .version(getVersion(), '-V, --version', 'Output the version number')
    .option('-v, --verbose', 'Enable verbose output')
    .option('--json', 'Log as JSON (machine-readable)')
    .option('-q, --quiet', 'Only log warnings and errors')
    .option('--config <path>', 'Path to config file (default: .cytogaterc)')
    .hook('preAction', async (thisCommand) => {
      const options = thisCommand.opts<GlobalOptions>();
      try {
        await initializeContext(options);
      } catch (error) {
        console.error(`Configuration error: ${error instanceof Error ? error.message : String(error)}`);
        process.exit(EXIT_CODES.CONFIG_ERROR);
      }
    });

  program
    .command('analyze')
    .description('Gate, compensate and transform event files')
    .requiredOption('--events <file>', 'Event table (.csv, .json, .yaml); repeatable', collect, [])
    .option('--gating <file>', 'Gate document')
    .option('--gate <id>', 'Apply only this gate')
    .option('--compensation <file>', 'Spillover matrix document')
    .option('--matrix <id>', 'Spillover matrix id')
    .option('--transformations <file>', 'Transformation document')
    .addOption(formatOption())
    .action(async (options: {
      events: string[];
      gating?: string;
      gate?: string;
      compensation?: string;
      matrix?: string;
      transformations?: string;
      format?: OutputFormat;
    }) => {
      const exitCode = await analyzeCommand(options, getGlobalContext());
      if (exitCode !== EXIT_CODES.SUCCESS) process.exit(exitCode);
    });

  program
    .command('run')
    .description('Process every file named in relation manifests')
    .argument('<manifest...>', 'Relation manifest files (.yaml, .json)')
    .option('--dry-run', 'Print resolved relations without processing')
    .addOption(formatOption())
    .action(async (manifests: string[], options: { dryRun?: boolean; format?: OutputFormat }) => {
      const exitCode = await runCommand({ manifests, ...options }, getGlobalContext());
      if (exitCode !== EXIT_CODES.SUCCESS) process.exit(exitCode);
    });

  program
    .command('gates')
    .description('Validate a gate document and list its gates')
    .argument('<file>', 'Gate document (.yaml, .json)')
    .addOption(formatOption())
    .action(async (file: string, options: { format?: OutputFormat }) => {
      const exitCode = await gatesCommand({ file, ...options }, getGlobalContext());
      if (exitCode !== EXIT_CODES.SUCCESS) process.exit(exitCode);
    });

  return program;
}

// ============================================================================
// Main Entry Point
// ============================================================================

async function main(): Promise<void> {
  const program = createProgram();

  try {
    await program.parseAsync(process.argv);
  } catch (error) {
    if (globalContext) {
      globalContext.logger.error('Command failed', {
        error: error instanceof Error ? error.message : String(error),
        duration_ms: Date.now() - globalContext.startTime,
      });
    } else {
      console.error(`Error: ${error instanceof Error ? error.message : String(error)}`);
    }
    process.exit(EXIT_CODES.ERRORS);
  }
}

main().catch((error: unknown) => {
  console.error('Fatal error:', error);
  process.exit(EXIT_CODES.ERRORS);
});
