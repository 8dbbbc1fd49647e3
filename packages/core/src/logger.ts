import { z } from 'zod';
import type { LogLevel, Logger } from './types.js';

export const LogLevelSchema = z.enum(['error', 'warn', 'info', 'debug']);

export const LOG_LEVEL_ENV = 'TASKRUN_LOG_LEVEL';

const LEVELS: readonly LogLevel[] = ['error', 'warn', 'info', 'debug'];

/**
 * Read the log level from the environment, falling back to 'info'
 * when the variable is unset or holds an unknown level.
 */
export function resolveLogLevel(env: NodeJS.ProcessEnv = process.env): LogLevel {
  const parsed = LogLevelSchema.safeParse(env[LOG_LEVEL_ENV]?.trim().toLowerCase());
  return parsed.success ? parsed.data : 'info';
}

/**
 * Create default console logger
 *
 * Messages above `level` are dropped.
 */
export function createDefaultLogger(level: LogLevel = 'info'): Logger {
  const currentLevel = LEVELS.indexOf(level);

  return {
    error: (msg: string, meta?: unknown) => {
      if (currentLevel >= 0) console.error(`[TASKRUN ERROR] ${msg}`, meta ?? '');
    },
    warn: (msg: string, meta?: unknown) => {
      if (currentLevel >= 1) console.warn(`[TASKRUN WARN] ${msg}`, meta ?? '');
    },
    info: (msg: string, meta?: unknown) => {
      if (currentLevel >= 2) console.log(`[TASKRUN INFO] ${msg}`, meta ?? '');
    },
    debug: (msg: string, meta?: unknown) => {
      if (currentLevel >= 3) console.log(`[TASKRUN DEBUG] ${msg}`, meta ?? '');
    },
  };
}

/**
 * Logger that discards everything
 */
export const silentLogger: Logger = {
  error: () => {},
  warn: () => {},
  info: () => {},
  debug: () => {},
};
