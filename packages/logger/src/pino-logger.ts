import os from 'node:os';
import path from 'node:path';
import { Writable } from 'node:stream';

import pino from 'pino';

import { type LoggerEnvConfig, validateLoggerEnv } from './env.schema.js';

export type Logger = pino.Logger;

interface TransportTarget {
  level: string;
  options: Record<string, unknown>;
  target: string;
}

/**
 * Formats a log label string to be a fixed length. When the label string
 * is longer than the specified size, it is truncated and prefixed by a
 * horizontal ellipsis (…).
 */
export function formatLabel(label: string, size: number): string {
  const str = label.padStart(size);
  return str.length <= size ? str : `…${str.slice(-size + 1)}`;
}

const loggerCache = new Map<string, Logger>();

let rootLogger: Logger | undefined;
let loggerEnv: LoggerEnvConfig | undefined;

function getLoggerEnv(): LoggerEnvConfig {
  if (!loggerEnv) {
    loggerEnv = validateLoggerEnv(process.env);
  }
  return loggerEnv;
}

function isTestEnvironment(env: LoggerEnvConfig): boolean {
  return env.NODE_ENV === 'test' || process.env['NODE_ENV'] === 'test' || process.env['VITEST'] === 'true';
}

/**
 * Builds the transport list from env. Console output stays off by default:
 * inside a CI step stdout is reserved for workflow commands.
 */
export function buildTransportTargets(env: LoggerEnvConfig): TransportTarget[] {
  const targets: TransportTarget[] = [];
  const level = env.LOGGER_LOG_LEVEL;

  if (env.LOGGER_CONSOLE_ENABLED) {
    if (env.NODE_ENV === 'development') {
      targets.push({
        level,
        options: {
          ignore: 'pid,hostname,categoryLabel,service,environment',
          translateTime: 'HH:MM:ss',
        },
        target: 'pino-pretty',
      });
    } else {
      targets.push({
        level,
        options: { destination: 1 },
        target: 'pino/file',
      });
    }
  }

  if (env.LOGGER_FILE_LOG_ENABLED) {
    targets.push({
      level,
      options: {
        destination: path.join(env.LOGGER_LOG_DIRNAME, env.LOGGER_FILE_LOG_FILENAME),
        mkdir: true,
      },
      target: 'pino/file',
    });
  }

  return targets;
}

function createRootLogger(): Logger {
  const env = getLoggerEnv();

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

  // Tests never spawn transport workers
  if (isTestEnvironment(env)) {
    const noopStream = new Writable({
      write(_chunk, _encoding, callback) {
        callback();
      },
    });
    return pino(pinoConfig, noopStream);
  }

  const targets = buildTransportTargets(env);
  if (targets.length === 0) {
    return pino({ ...pinoConfig, enabled: false });
  }

  return pino({ ...pinoConfig, transport: { targets } });
}

/**
 * Returns the logger for a category, creating it on first use.
 * Each category is a child of a single root logger.
 */
export function getLogger(category: string): Logger {
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
 * Drops the root logger and every cached category logger so the next
 * getLogger call re-reads env.
 */
export function resetLoggers(): void {
  rootLogger = undefined;
  loggerEnv = undefined;
  loggerCache.clear();
}
