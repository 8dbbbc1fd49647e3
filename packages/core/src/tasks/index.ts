/**
 * Task System - Task contract, parameter validation and execution
 *
 * A task type declares its identity path, its required parameters and its
 * run logic. The executor drives one instance of it from Pending to a
 * terminal status and always hands back a complete result.
 */

export type {
  Task,
  TaskInfo,
  TaskExec,
  TaskContext,
  TaskMetadata,
  TaskStage,
  RunOutcome,
} from './task.js';

export {
  checkRequiredParams,
  validateParams,
  type RequiredParamsCheck,
  type ParamValidationResult,
} from './validator.js';

export {
  TaskExecutor,
  type TaskExecutorEvents,
  type TaskIdentity,
  type StatusChangeEvent,
  type RunEndEvent,
  type ExecutionEndEvent,
  type ExecuteOptions,
} from './executor.js';

export {
  defineTask,
  TaskType,
  TaskInstance,
  TaskTypeSchema,
  TaskDefinitionError,
  type TaskDefinition,
  type CreateTaskOptions,
} from './define.js';
