/**
 * Layers Command
 *
 * List the layers a source location holds.
 *
 * Usage:
 *   layer-export layers <location>
 */

import type { Command } from 'commander';
import { errorMessage } from '../../core/errors.js';
import { resolveSource } from '../../sources/index.js';
import type { FeatureSource } from '../../sources/types.js';
import type { CLIConfig } from '../lib/config.js';
import { EXIT_CODES, type ExitCode } from '../lib/exit-codes.js';

export function registerLayersCommand(program: Command, getConfig: () => CLIConfig): void {
  program
    .command('layers <location>')
    .description('List layers in a GeoPackage or shapefile directory')
    .action(async (location: string) => {
      process.exitCode = await runLayers(location, getConfig());
    });
}

export async function runLayers(
  location: string,
  config: CLIConfig,
  source: FeatureSource = resolveSource(location)
): Promise<ExitCode> {
  try {
    const layers = await source.listLayers(location);

    if (config.json) {
      console.log(JSON.stringify({ location, driver: source.driver, layers }, null, 2));
    } else if (layers.length === 0) {
      console.log(`No layers found in ${location}`);
    } else {
      for (const layer of layers) {
        console.log(layer);
      }
    }
    return EXIT_CODES.SUCCESS;
  } catch (error) {
    console.error(`Error: ${errorMessage(error)}`);
    return EXIT_CODES.ERRORS;
  }
}
