/**
 * Core types for the taskrun library
 */

// ============================================================================
// Logging
// ============================================================================

export type LogLevel = 'error' | 'warn' | 'info' | 'debug';

export interface Logger {
  error(message: string, meta?: unknown): void;
  warn(message: string, meta?: unknown): void;
  info(message: string, meta?: unknown): void;
  debug(message: string, meta?: unknown): void;
}

// ============================================================================
// Task Data
// ============================================================================

/**
 * Named input values supplied to a task instance
 */
export type TaskParams = Record<string, unknown>;

// ============================================================================
// Executor Configuration
// ============================================================================

export interface TaskExecutorConfig {
  logLevel?: LogLevel; // Ignored when a logger is supplied
  logger?: Logger;
}
