/**
 * Structured logging for Layer Export
 *
 * Console-backed. Production writes one JSON object per line; anything else
 * gets a single readable line. Loggers carry bound context (module, layer,
 * format) that is merged into every entry they write.
 *
 * @module logger
 */

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

export interface LogMetadata {
  readonly [key: string]: unknown;
}

export interface LoggerConfig {
  readonly service: string;
  /** Fixed threshold; LOG_LEVEL is consulted on every call when absent */
  readonly level?: LogLevel;
  /** JSON lines when false */
  readonly pretty?: boolean;
  /** Metadata attached to every entry */
  readonly context?: LogMetadata;
}

const SEVERITY: Readonly<Record<LogLevel, number>> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
};

const SINKS: Readonly<Record<LogLevel, (line: string) => void>> = {
  debug: (line) => console.debug(line),
  info: (line) => console.info(line),
  warn: (line) => console.warn(line),
  error: (line) => console.error(line),
};

function isLogLevel(value: string | undefined): value is LogLevel {
  return value === 'debug' || value === 'info' || value === 'warn' || value === 'error';
}

function thresholdFromEnv(): LogLevel {
  const level = process.env.LOG_LEVEL?.toLowerCase();
  return isLogLevel(level) ? level : 'info';
}

export class Logger {
  constructor(private readonly config: LoggerConfig) {}

  get service(): string {
    return this.config.service;
  }

  /**
   * Logger writing under the same service with extra bound metadata
   */
  child(context: LogMetadata): Logger {
    return new Logger({
      ...this.config,
      context: { ...this.config.context, ...context },
    });
  }

  debug(message: string, metadata?: LogMetadata): void {
    this.write('debug', message, metadata);
  }

  info(message: string, metadata?: LogMetadata): void {
    this.write('info', message, metadata);
  }

  warn(message: string, metadata?: LogMetadata): void {
    this.write('warn', message, metadata);
  }

  error(message: string, metadata?: LogMetadata): void {
    this.write('error', message, metadata);
  }

  private write(level: LogLevel, message: string, metadata?: LogMetadata): void {
    const threshold = this.config.level ?? thresholdFromEnv();
    if (SEVERITY[level] < SEVERITY[threshold]) return;

    const timestamp = new Date().toISOString();
    const fields = { ...this.config.context, ...metadata };
    const hasFields = Object.keys(fields).length > 0;
    const pretty = this.config.pretty ?? process.env.NODE_ENV !== 'production';

    const line = pretty
      ? `[${timestamp}] ${level.toUpperCase()} ${this.config.service}: ${message}` +
        (hasFields ? ` ${JSON.stringify(fields)}` : '')
      : JSON.stringify({ timestamp, level, service: this.config.service, message, ...fields });

    SINKS[level](line);
  }
}

export const logger = new Logger({ service: 'layer-export' });

/**
 * Logger for one module, written as service `layer-export:<module>`
 */
export function createLogger(context: { readonly module: string }): Logger {
  return new Logger({ service: `layer-export:${context.module}` });
}
