/**
 * Layer Export CLI Configuration Management
 *
 * Loads configuration from .layer-exportrc (YAML or JSON) with environment
 * variable overrides and defaults.
 *
 * Configuration precedence (highest to lowest):
 * 1. Command-line options
 * 2. Environment variables (LAYER_EXPORT_*)
 * 3. Config file (.layer-exportrc or --config path)
 * 4. Default values
 *
 * @module cli/lib/config
 */

import { readFileSync, existsSync } from 'node:fs';
import { join, resolve } from 'node:path';
import { parse as parseYaml } from 'yaml';
import { EXPORT_FORMATS } from '../../core/constants.js';
import { isExportFormat } from '../../core/type-guards.js';
import type { ExportFormat } from '../../core/types.js';

// ============================================================================
// Configuration Types
// ============================================================================

/**
 * Default export settings
 */
export interface DefaultsConfig {
  /** Directory exports are written to when none is given */
  readonly outputDir: string;
  /** Format used when none is given */
  readonly format: ExportFormat;
}

/**
 * Full CLI configuration
 */
export interface CLIConfig {
  /** Configuration file version */
  readonly version: number;

  readonly defaults: DefaultsConfig;

  // Runtime overrides (from CLI flags)
  /** Enable verbose output */
  readonly verbose: boolean;
  /** Output results as JSON */
  readonly json: boolean;
  /** Resolved config file path */
  readonly configPath: string | null;
}

/**
 * Config file structure (YAML)
 */
interface ConfigFileSchema {
  version?: number;
  defaults?: {
    output_dir?: string;
    format?: string;
  };
}

// ============================================================================
// Default Configuration
// ============================================================================

export const DEFAULT_CONFIG: Omit<CLIConfig, 'verbose' | 'json' | 'configPath'> = {
  version: 1,
  defaults: {
    outputDir: './exports',
    format: 'csv',
  },
};

// ============================================================================
// Configuration Loading
// ============================================================================

const CONFIG_FILE_NAMES = [
  '.layer-exportrc',
  '.layer-exportrc.yaml',
  '.layer-exportrc.yml',
  '.layer-exportrc.json',
];

/**
 * Find config file in the start directory or its parents
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

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Parse config file content, keeping only keys of the expected types
 */
function parseConfigFile(filePath: string): ConfigFileSchema {
  const content = readFileSync(filePath, 'utf-8');
  // YAML is a superset of JSON, so one parser covers every file name
  const parsed: unknown = filePath.endsWith('.json') ? JSON.parse(content) : parseYaml(content);

  if (parsed === null || parsed === undefined) return {};
  if (!isRecord(parsed)) {
    throw new Error(`Config file ${filePath} must contain a mapping`);
  }

  const schema: ConfigFileSchema = {};
  if (typeof parsed.version === 'number') {
    schema.version = parsed.version;
  }
  if (isRecord(parsed.defaults)) {
    const { output_dir, format } = parsed.defaults;
    schema.defaults = {
      ...(typeof output_dir === 'string' ? { output_dir } : {}),
      ...(typeof format === 'string' ? { format } : {}),
    };
  }
  return schema;
}

/**
 * Get environment variable with prefix
 */
function getEnvVar(name: string): string | undefined {
  return process.env[`LAYER_EXPORT_${name}`];
}

/**
 * Get boolean environment variable
 */
function getEnvBool(name: string): boolean | undefined {
  const value = getEnvVar(name);
  if (value === undefined) return undefined;
  return value.toLowerCase() === 'true' || value === '1';
}

export interface LoadConfigOptions {
  /** Explicit config file path */
  configPath?: string;
  /** Directory the config file search starts from */
  cwd?: string;
  /** CLI flag overrides */
  overrides?: {
    verbose?: boolean;
    json?: boolean;
  };
}

/**
 * Load and merge configuration from all sources
 *
 * @throws Error when an explicit config path does not exist or the merged
 * configuration is invalid
 */
export function loadConfig(options: LoadConfigOptions = {}): CLIConfig {
  let configPath: string | null = null;
  let fileConfig: ConfigFileSchema = {};

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
      configPath = findConfigFile(options.cwd ?? process.cwd());
      if (configPath) {
        fileConfig = parseConfigFile(configPath);
      }
    }
  }

  const format =
    getEnvVar('FORMAT') ?? fileConfig.defaults?.format ?? DEFAULT_CONFIG.defaults.format;

  const config: CLIConfig = {
    version: fileConfig.version ?? DEFAULT_CONFIG.version,
    defaults: {
      outputDir:
        getEnvVar('OUTPUT_DIR') ??
        fileConfig.defaults?.output_dir ??
        DEFAULT_CONFIG.defaults.outputDir,
      format: parseFormat(format),
    },
    verbose: options.overrides?.verbose ?? getEnvBool('VERBOSE') ?? false,
    json: options.overrides?.json ?? getEnvBool('JSON') ?? false,
    configPath,
  };

  validateConfig(config);
  return config;
}

function parseFormat(value: string): ExportFormat {
  const normalized = value.trim().toLowerCase();
  if (!isExportFormat(normalized)) {
    throw new Error(
      `Invalid default format: ${value}. Must be one of: ${EXPORT_FORMATS.join(', ')}`
    );
  }
  return normalized;
}

/**
 * Resolve the default output directory relative to the config file
 */
export function resolveOutputDir(config: CLIConfig): string {
  const basePath = config.configPath ? resolve(config.configPath, '..') : process.cwd();
  return resolve(basePath, config.defaults.outputDir);
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

  if (config.defaults.outputDir.trim() === '') {
    throw new Error('Default output directory must not be empty');
  }
}
