import os from 'node:os';
import { Writable } from 'node:stream';

import pino from 'pino';

import { validateLoggerEnv } from './env.schema.js';

// Validate environment variables (reads NODE_ENV directly from process.env)
const env = validateLoggerEnv(process.env);

/**
 * Formats a log label string to be a fixed length. When the label string
 * is longer than the specified size, it is truncated and prefixed by a
 * horizontal ellipsis (…).
 */
export function formatLabel(label: string, size: number): string {
  const str = label.padStart(size);
  return str.length <= size ? str : `…${str.slice(-size + 1)}`;
}

export type Logger = pino.Logger;

const loggerCache = new Map<string, Logger>();

let rootLogger: Logger | undefined;

export interface TransportMode {
  console: boolean;
  file: boolean;
}

// Mutable so embedding applications can toggle console/file outputs at runtime
let transportMode: TransportMode = {
  console: env.LOGGER_CONSOLE_ENABLED,
  file: env.LOGGER_FILE_LOG_ENABLED,
};

interface TransportTarget {
  level: string;
  options: Record<string, unknown>;
  target: string;
}

function isTestEnvironment(): boolean {
  // vitest may set these after module load, so check process.env as well
  return env.NODE_ENV === 'test' || process.env['NODE_ENV'] === 'test' || process.env['VITEST'] === 'true';
}

/**
 * Creates and configures the root logger instance.
 */
function createRootLogger(): Logger {
  const transportTargets: TransportTarget[] = [];
  const isTestEnv = isTestEnvironment();

  if (transportMode.console && !isTestEnv) {
    if (env.NODE_ENV === 'development') {
      transportTargets.push({
        level: 'trace',
        options: {
          ignore: 'pid,hostname,category,categoryLabel,service,environment',
          messageFormat: '[{categoryLabel}] {msg}',
          translateTime: 'SYS:HH:MM:ss',
        },
        target: 'pino-pretty',
      });
    } else {
      // Production: plain JSON on stdout for log processors
      transportTargets.push({
        level: 'trace',
        options: {
          destination: 1,
        },
        target: 'pino/file',
      });
    }
  }

  if (transportMode.file && !isTestEnv) {
    transportTargets.push({
      level: 'trace',
      options: {
        destination: `./${env.LOGGER_FILE_LOG_DIRNAME}/${env.LOGGER_FILE_LOG_FILENAME}`,
        mkdir: true,
      },
      target: 'pino/file',
    });
  }

  const pinoConfig: pino.LoggerOptions = {
    base: {
      environment: env.NODE_ENV,
      hostname: os.hostname(),
      pid: process.pid,
      service: env.LOGGER_SERVICE_NAME,
    },
    level: env.LOGGER_LOG_LEVEL,
    timestamp: pino.stdTimeFunctions.isoTime,
  };

  if (isTestEnv) {
    const noopStream = new Writable({
      write(_chunk, _encoding, callback) {
        callback();
      },
    });
    return pino(pinoConfig, noopStream);
  }

  if (transportTargets.length > 0) {
    pinoConfig.transport = { targets: transportTargets };
  }
  return pino(pinoConfig);
}

function getOrCreateCategoryLogger(category: string): Logger {
  const cached = loggerCache.get(category);
  if (cached) return cached;

  if (!rootLogger) {
    rootLogger = createRootLogger();
  }

  const categoryLogger = rootLogger.child({
    category,
    categoryLabel: formatLabel(category, 25),
  });

  loggerCache.set(category, categoryLogger);

  return categoryLogger;
}

/**
 * Returns a category logger that stays in sync with transport reconfiguration.
 *
 * The returned Proxy looks up the latest underlying pino logger on every
 * property access, so calls made after `setLoggerTransports(...)` use the new
 * transports even if the caller captured the logger at module top-level.
 */
export const getLogger = (category: string): Logger => {
  const target = getOrCreateCategoryLogger(category);
  return new Proxy(target, {
    get: (_target, prop) => {
      const logger = getOrCreateCategoryLogger(category);
      const value: unknown = Reflect.get(logger, prop, logger);
      return typeof value === 'function' ? value.bind(logger) : value;
    },
  });
};

/**
 * Update transport mode at runtime.
 * Resets cached loggers so the new configuration applies immediately.
 */
export function setLoggerTransports(next: Partial<TransportMode>): void {
  transportMode = { ...transportMode, ...next };
  rootLogger = undefined;
  loggerCache.clear();
}

export function getLoggerTransports(): TransportMode {
  return { ...transportMode };
}
