/**
 * Logger
 *
 * Winston logger creation and per-module caching
 */

import * as winston from 'winston';
import { hostname } from 'os';
import type { LoggerMeta } from './types.js';
import { createDevFormat, createProdFormat } from './formatting.js';

export const LOGGER_SERVICE_NAME = 'kubernetes-discovery';

export function resolveLogLevel(env: NodeJS.ProcessEnv = process.env): string {
  if (env.LOG_LEVEL) return env.LOG_LEVEL;

  switch (env.NODE_ENV) {
    case 'production':
      return 'info';
    case 'test':
      return 'warn';
    default:
      return 'debug';
  }
}

/**
 * Create a Winston logger instance for one module of the resolver
 */
export function createLogger(moduleName: string, options: Partial<LoggerMeta> = {}): winston.Logger {
  const meta: LoggerMeta = {
    service: LOGGER_SERVICE_NAME,
    module: moduleName,
    env: process.env.NODE_ENV || 'development',
    version: process.env.npm_package_version,
    instanceId: process.env.HOSTNAME || process.env.POD_NAME || hostname() || 'unknown',
    ...options,
  };

  const isDevelopment = process.env.NODE_ENV === 'development';

  return winston.createLogger({
    level: resolveLogLevel(),
    defaultMeta: meta,
    format: isDevelopment ? createDevFormat() : createProdFormat(),
    transports: [new winston.transports.Console()],
  });
}

const loggers = new Map<string, winston.Logger>();

export function getLogger(moduleName: string): winston.Logger {
  const existing = loggers.get(moduleName);
  if (existing) return existing;

  const logger = createLogger(moduleName);
  loggers.set(moduleName, logger);
  return logger;
}
