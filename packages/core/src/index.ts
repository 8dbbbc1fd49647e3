/**
 * taskrun core
 *
 * Execution protocol for a single task: validate parameters, run, and
 * finalize a structured result.
 */

export type { Logger, LogLevel, TaskParams, TaskExecutorConfig } from './types.js';

export { createDefaultLogger, resolveLogLevel, silentLogger, LogLevelSchema, LOG_LEVEL_ENV } from './logger.js';

export {
  parseStatus,
  statusToString,
  isTerminalStatus,
  canTransition,
  TaskStatusWireSchema,
  type TaskStatus,
  type TaskStatusWire,
} from './status.js';

export {
  ErrorKinds,
  TaskError,
  ValidationError,
  MissingParameterError,
  InvalidParameterError,
  InvalidMessageError,
  UnexpectedError,
  toTaskError,
  formatZodIssues,
  type ErrorKind,
} from './errors.js';

export {
  TaskMessageSchema,
  createMessage,
  parseMessage,
  type TaskMessage,
  type CreateMessageOptions,
} from './message.js';

// Export result system
export * from './result/index.js';

// Export task system
export * from './tasks/index.js';
