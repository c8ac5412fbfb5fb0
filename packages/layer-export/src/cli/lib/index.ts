export { loadConfig, validateConfig, resolveOutputDir, DEFAULT_CONFIG } from './config.js';
export type { CLIConfig, DefaultsConfig, LoadConfigOptions } from './config.js';
export { EXIT_CODES } from './exit-codes.js';
export type { ExitCode } from './exit-codes.js';
