import os from 'node:os';
import path from 'node:path';
import { Writable } from 'node:stream';

import pino from 'pino';

import { resolveLoggerEnv, type LoggerEnvConfig } from './env.schema.js';

export type Logger = pino.Logger;

interface TransportMode {
  console: boolean;
  file: boolean;
}

interface TransportTarget {
  level: string;
  options: Record<string, unknown>;
  target: string;
}

// Resolved lazily; a bad variable falls back to its default instead of throwing
let env: LoggerEnvConfig | undefined;

// Rejected variables, reported once by the next root logger
let pendingEnvIssues: string[] = [];

const loggerCache = new Map<string, Logger>();

let rootLogger: Logger | undefined;

let transportMode: TransportMode | undefined;

function getEnv(): LoggerEnvConfig {
  if (!env) {
    const resolved = resolveLoggerEnv(process.env);
    env = resolved.config;
    pendingEnvIssues = resolved.issues;
  }
  return env;
}

function getTransportMode(): TransportMode {
  if (!transportMode) {
    const config = getEnv();
    transportMode = { console: config.LOGGER_CONSOLE_ENABLED, file: config.LOGGER_FILE_LOG_ENABLED };
  }
  return transportMode;
}

/**
 * Formats a category label to a fixed width. Longer labels keep their tail
 * and gain a leading ellipsis (…).
 */
export function formatLabel(label: string, size: number): string {
  const str = label.padStart(size);
  return str.length <= size ? str : `…${str.slice(-size + 1)}`;
}

function isTestEnvironment(config: LoggerEnvConfig): boolean {
  // vitest may set these after the module loaded
  return config.NODE_ENV === 'test' || process.env['NODE_ENV'] === 'test' || process.env['VITEST'] === 'true';
}

function buildTransportTargets(config: LoggerEnvConfig, mode: TransportMode): TransportTarget[] {
  const targets: TransportTarget[] = [];

  if (mode.console) {
    if (config.NODE_ENV === 'development') {
      targets.push({
        level: 'trace',
        options: {
          ignore: 'pid,hostname,category,categoryLabel,service,environment',
        },
        target: 'pino-pretty',
      });
    } else {
      // Plain JSON on stdout for log processors
      targets.push({
        level: 'trace',
        options: {
          destination: 1,
        },
        target: 'pino/file',
      });
    }
  }

  if (mode.file) {
    targets.push({
      level: 'trace',
      options: {
        destination: path.join(config.LOGGER_LOG_DIRNAME, config.LOGGER_FILE_LOG_FILENAME),
        mkdir: true,
      },
      target: 'pino/file',
    });
  }

  return targets;
}

function reportEnvIssues(logger: Logger): Logger {
  if (pendingEnvIssues.length > 0) {
    logger.warn({ issues: pendingEnvIssues }, 'Invalid logger environment, using defaults for rejected variables');
    pendingEnvIssues = [];
  }
  return logger;
}

function createRootLogger(): Logger {
  const config = getEnv();

  const pinoConfig: pino.LoggerOptions = {
    base: {
      environment: config.NODE_ENV,
      hostname: os.hostname(),
      pid: process.pid,
      service: config.LOGGER_SERVICE_NAME,
    },
    level: config.LOGGER_LOG_LEVEL,
    timestamp: pino.stdTimeFunctions.isoTime,
  };

  if (isTestEnvironment(config)) {
    // No transports under test: they spawn worker threads
    const noopStream = new Writable({
      write(_chunk, _encoding, callback) {
        callback();
      },
    });
    return reportEnvIssues(pino.pino(pinoConfig, noopStream));
  }

  const targets = buildTransportTargets(config, getTransportMode());
  if (targets.length === 0) {
    return reportEnvIssues(pino.pino({ ...pinoConfig, enabled: false }));
  }

  return reportEnvIssues(pino.pino({ ...pinoConfig, transport: { targets } }));
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
 * The returned Proxy resolves the current pino child on every property access,
 * so loggers captured at module top-level pick up `setLoggerTransports(...)`.
 */
export const getLogger = (category: string): Logger => {
  return new Proxy({} as Logger, {
    get: (_target, prop) => {
      const logger = getOrCreateCategoryLogger(category);
      const value: unknown = Reflect.get(logger, prop, logger);
      return typeof value === 'function' ? value.bind(logger) : value;
    },
  });
};

/**
 * Update transport mode at runtime. Cached loggers are dropped so the new
 * configuration applies on the next log call.
 */
export function setLoggerTransports(next: Partial<TransportMode>): void {
  transportMode = { ...getTransportMode(), ...next };
  rootLogger = undefined;
  loggerCache.clear();
}

/**
 * Forget the validated environment and every cached logger.
 */
export function resetLogger(): void {
  env = undefined;
  pendingEnvIssues = [];
  transportMode = undefined;
  rootLogger = undefined;
  loggerCache.clear();
}
