import os from 'node:os';
import { Writable } from 'node:stream';

import pino from 'pino';

import { validateLoggerEnv, type LoggerEnvConfig } from './env.schema.js';

export type Logger = pino.Logger;

const loggerCache = new Map<string, Logger>();

let rootLogger: Logger | undefined;
let env: LoggerEnvConfig | undefined;

function getEnv(): LoggerEnvConfig {
  if (!env) {
    env = validateLoggerEnv(process.env);
  }
  return env;
}

/**
 * Formats a category label to a fixed width. Longer labels are truncated from
 * the left and prefixed with an ellipsis.
 */
export function formatLabel(label: string, size: number): string {
  const str = label.padStart(size);
  return str.length <= size ? str : `…${str.slice(-size + 1)}`;
}

function isTestEnvironment(config: LoggerEnvConfig): boolean {
  return config.NODE_ENV === 'test' || process.env['NODE_ENV'] === 'test' || process.env['VITEST'] === 'true';
}

function createRootLogger(): Logger {
  const config = getEnv();

  const options: pino.LoggerOptions = {
    base: {
      environment: config.NODE_ENV,
      hostname: os.hostname(),
      pid: process.pid,
      service: config.LOGGER_SERVICE_NAME,
    },
    level: config.LOGGER_LOG_LEVEL,
    timestamp: pino.stdTimeFunctions.isoTime,
  };

  // Tests never spawn transport workers
  if (isTestEnvironment(config)) {
    const noopStream = new Writable({
      write(_chunk, _encoding, callback) {
        callback();
      },
    });
    return pino(options, noopStream);
  }

  if (config.LOGGER_CONSOLE_ENABLED && config.NODE_ENV === 'development') {
    options.transport = {
      options: {
        destination: 2,
        ignore: 'pid,hostname,category,service,environment',
        messageFormat: '[{categoryLabel}] {msg}',
      },
      target: 'pino-pretty',
    };
    return pino(options);
  }

  if (config.LOGGER_CONSOLE_ENABLED) {
    // Structured JSON on stderr so stdout stays free for command output
    return pino(options, pino.destination(2));
  }

  options.enabled = false;
  return pino(options);
}

function getOrCreateCategoryLogger(category: string): Logger {
  const cached = loggerCache.get(category);
  if (cached) return cached;

  if (!rootLogger) {
    rootLogger = createRootLogger();
  }

  const categoryLogger = rootLogger.child({
    category,
    categoryLabel: formatLabel(category, 20),
  });

  loggerCache.set(category, categoryLogger);
  return categoryLogger;
}

/**
 * Returns the logger for a category. Loggers are created lazily so that
 * modules may call this at import time before the environment is final.
 */
export function getLogger(category: string): Logger {
  return getOrCreateCategoryLogger(category);
}

/**
 * Drops the root logger and every cached category logger. The next
 * `getLogger` call re-reads the environment.
 */
export function resetLoggers(): void {
  rootLogger = undefined;
  env = undefined;
  loggerCache.clear();
}
