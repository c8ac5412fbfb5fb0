#!/usr/bin/env tsx
/**
 * Layer Export CLI Entry Point
 *
 * Exports a GeoPackage table or a shapefile layer to CSV, JSON or GeoJSON.
 *
 * @module layer-export-cli
 */

import { Command } from 'commander';
import { readFileSync } from 'node:fs';
import { dirname, join } from 'node:path';
import { fileURLToPath } from 'node:url';

import {
  CLI_NAME,
  EXIT_CODES,
  loadConfig,
  registerExportCommand,
  registerLayersCommand,
  type CLIConfig,
} from '../src/cli/index.js';
import { errorMessage } from '../src/core/errors.js';

interface GlobalOptions {
  verbose?: boolean;
  json?: boolean;
  config?: string;
}

function getVersion(): string {
  const packageJsonPath = join(dirname(fileURLToPath(import.meta.url)), '..', 'package.json');
  const packageJson: unknown = JSON.parse(readFileSync(packageJsonPath, 'utf-8'));
  if (
    typeof packageJson === 'object' &&
    packageJson !== null &&
    'version' in packageJson &&
    typeof packageJson.version === 'string'
  ) {
    return packageJson.version;
  }
  return '0.0.0';
}

function createProgram(): Command {
  const program = new Command();
  let config: CLIConfig | null = null;

  const getConfig = (): CLIConfig => {
    if (!config) {
      throw new Error('Configuration not loaded');
    }
    return config;
  };

  program
    .name(CLI_NAME)
    .description('Export geospatial layers to CSV, JSON or GeoJSON')
    .version(getVersion(), '-V, --version', 'Output the version number')
    .option('-v, --verbose', 'Enable verbose output')
    .option('--json', 'Output results as JSON (machine-readable)')
    .option('--config <path>', 'Path to config file (default: .layer-exportrc)')
    .hook('preAction', (thisCommand) => {
      const options = thisCommand.opts<GlobalOptions>();
      try {
        config = loadConfig({
          configPath: options.config,
          overrides: { verbose: options.verbose, json: options.json },
        });
        if (config.verbose && !process.env.LOG_LEVEL) {
          process.env.LOG_LEVEL = 'debug';
        }
      } catch (error) {
        console.error(`Configuration error: ${errorMessage(error)}`);
        process.exit(EXIT_CODES.CONFIG_ERROR);
      }
    });

  registerExportCommand(program, getConfig);
  registerLayersCommand(program, getConfig);

  return program;
}

async function main(): Promise<void> {
  await createProgram().parseAsync(process.argv);
}

main().catch((error: unknown) => {
  console.error(`Fatal error: ${errorMessage(error)}`);
  process.exit(EXIT_CODES.ERRORS);
});
