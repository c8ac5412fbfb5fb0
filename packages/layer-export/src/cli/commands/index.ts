export { registerExportCommand, runExport } from './export.js';
export type { ExportCommandOptions } from './export.js';
export { registerLayersCommand, runLayers } from './layers.js';
