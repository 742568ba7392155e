/**
 * Logger Configuration
 *
 * Configures pino with environment-aware formatting:
 * - Production: JSON output for log aggregation
 * - Development: pretty-printed colorized output
 * - Test: silent unless LOG_LEVEL says otherwise
 *
 * Usage:
 *   import { createComponentLogger } from './logger';
 *   const log = createComponentLogger('loader');
 *   log.info({ documentId }, 'Document loaded');
 */

import pino, { Logger, LoggerOptions } from 'pino';
import { runtime } from './runtime';

// =============================================================================
// Configuration
// =============================================================================

const baseOptions: LoggerOptions = {
  level: runtime.logLevel,
  base: {
    pid: process.pid,
    env: runtime.nodeEnv,
  },
  timestamp: pino.stdTimeFunctions.isoTime,
  // Résumé text carries personal data; keep raw document content out of logs
  redact: {
    paths: ['rawText', '*.rawText'],
    remove: true,
  },
};

const developmentOptions: LoggerOptions = {
  ...baseOptions,
  transport: {
    target: 'pino-pretty',
    options: {
      colorize: true,
      translateTime: 'SYS:HH:MM:ss.l',
      ignore: 'pid,hostname,env',
      messageFormat: '{msg}',
      singleLine: false,
    },
  },
};

const productionOptions: LoggerOptions = {
  ...baseOptions,
  formatters: {
    level: (label) => ({ level: label }),
    bindings: (bindings) => ({
      pid: bindings.pid,
      host: bindings.hostname,
      env: runtime.nodeEnv,
    }),
  },
};

// =============================================================================
// Logger Instance
// =============================================================================

export const logger: Logger = pino(
  runtime.isDevelopment ? developmentOptions : productionOptions
);

/**
 * Create a child logger for a specific component
 *
 * @example
 * const log = createComponentLogger('synthesizer');
 * log.debug({ spanCount }, 'Synthesis started');
 */
export function createComponentLogger(component: string): Logger {
  return logger.child({ component });
}

/**
 * Create a child logger bound to one document
 */
export function createDocumentLogger(documentId: string): Logger {
  return logger.child({ documentId });
}

export const loggers = {
  loader: createComponentLogger('loader'),
  segmenter: createComponentLogger('segmenter'),
  extraction: createComponentLogger('extraction'),
  synthesis: createComponentLogger('synthesis'),
  rating: createComponentLogger('rating'),
  pipeline: createComponentLogger('pipeline'),
  errors: createComponentLogger('errors'),
};

// =============================================================================
// Utility Functions
// =============================================================================

/**
 * Serialize an error for structured logging
 */
export function serializeError(err: unknown): Record<string, unknown> {
  if (err instanceof Error) {
    const extras: Record<string, unknown> = {};
    for (const [key, value] of Object.entries(err)) {
      if (!['name', 'message', 'stack'].includes(key)) {
        extras[key] = value;
      }
    }
    return {
      type: err.constructor.name,
      message: err.message,
      stack: runtime.isDevelopment ? err.stack : undefined,
      ...extras,
    };
  }
  return { message: String(err) };
}

export default logger;
