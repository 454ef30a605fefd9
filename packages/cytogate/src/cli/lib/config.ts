/**
 * CLI Configuration Management
 *
 * Loads configuration from .cytogaterc (YAML or JSON) with environment
 * variable overrides and defaults.
 *
 * Configuration precedence (highest to lowest):
 * 1. Command-line options
 * 2. Environment variables (CYTOGATE_*)
 * 3. Config file (.cytogaterc or --config path)
 * 4. Default values
 *
 * @module cli/lib/config
 */

import { existsSync } from 'node:fs';
import { join, resolve } from 'node:path';
import { z } from 'zod';

import { DEFAULT_ENGINE_CONFIG, type EngineConfig } from '../../core/config.js';
import { readDocument } from '../../io/read-document.js';
import { parseDocument } from '../../schemas/descriptors.js';
import type { OutputFormat } from './output.js';

// ============================================================================
// Configuration Types
// ============================================================================

export interface OutputConfig {
  readonly format: OutputFormat;
}

/**
 * Full CLI configuration
 */
export interface CLIConfig {
  /** Configuration file version */
  readonly version: number;

  /** Engine tolerances and naming */
  readonly engine: EngineConfig;

  /** Result output settings */
  readonly output: OutputConfig;

  // Runtime overrides (from CLI flags)
  /** Enable verbose output */
  readonly verbose: boolean;
  /** Output as JSON */
  readonly json: boolean;
  /** Only warnings and errors */
  readonly quiet: boolean;
  /** Resolved config file path */
  readonly configPath: string | null;
}

const OutputFormatSchema = z.enum(['table', 'json', 'ndjson', 'csv']);

/**
 * Config file structure
 */
const ConfigFileSchema = z.object({
  version: z.number().int().optional(),
  engine: z
    .object({
      polytope_tolerance: z.number().nonnegative().optional(),
      name_separator: z.string().optional(),
      compensation_suffix: z.string().min(1).optional(),
      transformation_suffix: z.string().min(1).optional(),
    })
    .optional(),
  output: z
    .object({
      format: OutputFormatSchema.optional(),
    })
    .optional(),
});

type ConfigFile = z.infer<typeof ConfigFileSchema>;

// ============================================================================
// Default Configuration
// ============================================================================

export const DEFAULT_CONFIG: Omit<CLIConfig, 'verbose' | 'json' | 'quiet' | 'configPath'> = {
  version: 1,
  engine: DEFAULT_ENGINE_CONFIG,
  output: {
    format: 'table',
  },
};

// ============================================================================
// Configuration Loading
// ============================================================================

const CONFIG_FILE_NAMES = ['.cytogaterc', '.cytogaterc.yaml', '.cytogaterc.yml', '.cytogaterc.json'];

/**
 * Find config file in current directory or parent directories
 */
function findConfigFile(startDir: string): string | null {
  let dir = resolve(startDir);
  const root = resolve('/');

  while (dir !== root) {
    for (const fileName of CONFIG_FILE_NAMES) {
      const filePath = join(dir, fileName);
      if (existsSync(filePath)) {
        return filePath;
      }
    }
    dir = resolve(dir, '..');
  }

  return null;
}

function parseConfigFile(filePath: string): ConfigFile {
  const content = readDocument(filePath);
  // an empty YAML file parses to null
  return parseDocument(ConfigFileSchema, content ?? {}, filePath);
}

function getEnvVar(name: string): string | undefined {
  return process.env[`CYTOGATE_${name}`];
}

function getEnvBool(name: string): boolean | undefined {
  const value = getEnvVar(name);
  if (value === undefined) return undefined;
  return value.toLowerCase() === 'true' || value === '1';
}

function getEnvFloat(name: string): number | undefined {
  const value = getEnvVar(name);
  if (value === undefined) return undefined;
  const num = parseFloat(value);
  return isNaN(num) ? undefined : num;
}

function getEnvFormat(name: string): OutputFormat | undefined {
  const parsed = OutputFormatSchema.safeParse(getEnvVar(name));
  return parsed.success ? parsed.data : undefined;
}

export interface LoadConfigOptions {
  /** Explicit config file path */
  configPath?: string;
  /** CLI flag overrides */
  overrides?: {
    verbose?: boolean;
    json?: boolean;
    quiet?: boolean;
    format?: OutputFormat;
  };
}

/**
 * Load and merge configuration from all sources
 */
export async function loadConfig(options: LoadConfigOptions = {}): Promise<CLIConfig> {
  let configPath: string | null = null;
  let fileConfig: ConfigFile = {};

  if (options.configPath) {
    configPath = resolve(options.configPath);
    if (!existsSync(configPath)) {
      throw new Error(`Config file not found: ${configPath}`);
    }
    fileConfig = parseConfigFile(configPath);
  } else {
    const envConfigPath = getEnvVar('CONFIG');
    if (envConfigPath) {
      configPath = resolve(envConfigPath);
      if (existsSync(configPath)) {
        fileConfig = parseConfigFile(configPath);
      }
    } else {
      configPath = findConfigFile(process.cwd());
      if (configPath) {
        fileConfig = parseConfigFile(configPath);
      }
    }
  }

  const engine = DEFAULT_CONFIG.engine;

  return {
    version: fileConfig.version ?? DEFAULT_CONFIG.version,

    engine: {
      polytopeTolerance:
        getEnvFloat('POLYTOPE_TOLERANCE') ??
        fileConfig.engine?.polytope_tolerance ??
        engine.polytopeTolerance,
      nameSeparator:
        getEnvVar('NAME_SEPARATOR') ?? fileConfig.engine?.name_separator ?? engine.nameSeparator,
      compensationSuffix:
        fileConfig.engine?.compensation_suffix ?? engine.compensationSuffix,
      transformationSuffix:
        fileConfig.engine?.transformation_suffix ?? engine.transformationSuffix,
    },

    output: {
      format:
        options.overrides?.format ??
        getEnvFormat('FORMAT') ??
        fileConfig.output?.format ??
        DEFAULT_CONFIG.output.format,
    },

    verbose: options.overrides?.verbose ?? getEnvBool('VERBOSE') ?? false,
    json: options.overrides?.json ?? getEnvBool('JSON') ?? false,
    quiet: options.overrides?.quiet ?? getEnvBool('QUIET') ?? false,
    configPath,
  };
}

/**
 * Validate configuration
 *
 * @throws Error if configuration is invalid
 */
export function validateConfig(config: CLIConfig): void {
  if (config.version !== 1) {
    throw new Error(`Unsupported config version: ${config.version}. Expected 1.`);
  }

  if (config.engine.polytopeTolerance < 0 || !Number.isFinite(config.engine.polytopeTolerance)) {
    throw new Error('Polytope tolerance must be a non-negative number');
  }

  if (config.verbose && config.quiet) {
    throw new Error('--verbose and --quiet cannot be combined');
  }
}
