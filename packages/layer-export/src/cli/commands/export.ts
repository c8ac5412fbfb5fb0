/**
 * Export Command
 *
 * Export one layer to CSV, JSON or GeoJSON.
 *
 * Usage:
 *   layer-export export <location> <identifier> [options]
 *
 * Options:
 *   -o, --output-dir <dir>   Output directory (default: config defaults.output_dir)
 *   -f, --format <fmt>       Output format: csv|json|geojson (default: config defaults.format)
 *   -n, --name <name>        Output file name without extension
 *
 * Examples:
 *   layer-export export ./city.gpkg parcels --format geojson
 *   layer-export export ./shapes roads -o ./out -n roads_2024
 */

import type { Command } from 'commander';
import { dirname } from 'node:path';
import type { ExportResult } from '../../core/types.js';
import { LayerExporter, describeResult } from '../../services/layer-exporter.js';
import { resolveOutputDir, type CLIConfig } from '../lib/config.js';
import { EXIT_CODES, type ExitCode } from '../lib/exit-codes.js';

/**
 * Export options from CLI
 */
export interface ExportCommandOptions {
  readonly outputDir?: string;
  readonly format?: string;
  readonly name?: string;
}

/**
 * Register the export command
 */
export function registerExportCommand(program: Command, getConfig: () => CLIConfig): void {
  program
    .command('export <location> <identifier>')
    .description('Export a layer to CSV, JSON or GeoJSON (coordinates in EPSG:4326)')
    .option('-o, --output-dir <dir>', 'Output directory')
    .option('-f, --format <fmt>', 'Output format: csv|json|geojson')
    .option('-n, --name <name>', 'Output file name without extension')
    .action(async (location: string, identifier: string, options: ExportCommandOptions) => {
      process.exitCode = await runExport(location, identifier, options, getConfig());
    });
}

/**
 * Run an export and print its outcome
 */
export async function runExport(
  location: string,
  identifier: string,
  options: ExportCommandOptions,
  config: CLIConfig,
  exporter: LayerExporter = new LayerExporter()
): Promise<ExitCode> {
  const result = await exporter.export({
    sourceLocation: location,
    sourceIdentifier: identifier,
    outputDirectory: options.outputDir ?? resolveOutputDir(config),
    format: options.format ?? config.defaults.format,
    outputName: options.name,
  });

  printResult(result, config.json);
  return result.status === 'failed' ? EXIT_CODES.ERRORS : EXIT_CODES.SUCCESS;
}

function printResult(result: ExportResult, json: boolean): void {
  if (json) {
    console.log(JSON.stringify(result, null, 2));
    return;
  }

  const line = describeResult(result);
  if (result.status === 'failed') {
    console.error(line);
    return;
  }

  console.log(line);
  if (result.status === 'succeeded') {
    console.log(`  Records: ${result.recordCount}`);
    console.log(`  Folder:  ${dirname(result.outputPath)}`);
  }
}
