/**
 * Runtime Environment
 *
 * Loads `.env` and exposes the process-level settings every module shares.
 *
 * Usage:
 *   import { runtime } from './runtime';
 *   if (runtime.isTest) { ... }
 */

import 'dotenv/config';

// =============================================================================
// Types
// =============================================================================

export type NodeEnv = 'development' | 'production' | 'test';

export type LogLevel = 'fatal' | 'error' | 'warn' | 'info' | 'debug' | 'trace' | 'silent';

export interface RuntimeConfig {
  nodeEnv: NodeEnv;
  isDevelopment: boolean;
  isProduction: boolean;
  isTest: boolean;
  logLevel: LogLevel;
}

// =============================================================================
// Helpers
// =============================================================================

const LOG_LEVELS: readonly LogLevel[] = ['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent'];

function parseNodeEnv(value: string | undefined): NodeEnv {
  if (value === 'production' || value === 'test') {
    return value;
  }
  return 'development';
}

function parseLogLevel(value: string | undefined, nodeEnv: NodeEnv): LogLevel {
  const match = LOG_LEVELS.find(level => level === value);
  if (match) return match;

  switch (nodeEnv) {
    case 'test':
      return 'silent';
    case 'development':
      return 'debug';
    default:
      return 'info';
  }
}

/**
 * Build the runtime configuration from an environment map
 */
export function loadRuntimeConfig(env: NodeJS.ProcessEnv = process.env): RuntimeConfig {
  const nodeEnv = parseNodeEnv(env.NODE_ENV);

  return {
    nodeEnv,
    isDevelopment: nodeEnv === 'development',
    isProduction: nodeEnv === 'production',
    isTest: nodeEnv === 'test',
    logLevel: parseLogLevel(env.LOG_LEVEL, nodeEnv)
  };
}

export const runtime: RuntimeConfig = loadRuntimeConfig();
