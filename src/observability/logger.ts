import { readFileSync } from 'fs';
import pino, { type Logger, type LoggerOptions } from 'pino';
import { z } from 'zod';
import type { LoggingConfig } from '../config/schema.js';

export interface LoggerConfig extends Partial<LoggingConfig> {
  serviceName?: string;
  version?: string;
}

const PackageMetadataSchema = z.object({
  name: z.string(),
  version: z.string(),
});

// Same relative path from src/observability and dist/observability
const PACKAGE = PackageMetadataSchema.parse(
  JSON.parse(readFileSync(new URL('../../package.json', import.meta.url), 'utf8'))
);

export function createLogger(config: LoggerConfig = {}): Logger {
  const {
    level = 'info',
    prettyPrint = false,
    serviceName = PACKAGE.name,
    version = PACKAGE.version,
  } = config;

  const options: LoggerOptions = {
    level,
    name: serviceName,
    base: { service: serviceName, version },
    serializers: { err: pino.stdSerializers.err },
    timestamp: pino.stdTimeFunctions.isoTime,
    formatters: {
      level: (label: string) => ({ level: label }),
    },
  };

  if (!prettyPrint) {
    return pino(options);
  }

  return pino({
    ...options,
    transport: {
      target: 'pino-pretty',
      options: { colorize: true, translateTime: 'SYS:standard', ignore: 'hostname' },
    },
  });
}

let processLogger: Logger | null = null;

/**
 * Process-wide logger. Modules log through `getLogger().child({ module })`.
 */
export function getLogger(): Logger {
  if (!processLogger) {
    processLogger = createLogger();
  }
  return processLogger;
}

/**
 * Replace the process logger; `ConfigLoader.load` calls this with the
 * `logging` section.
 */
export function initLogger(config: LoggerConfig): Logger {
  processLogger = createLogger(config);
  return processLogger;
}
