import type { ZodType, ZodTypeDef } from 'zod';
import type { TaskError } from '../errors.js';
import type { TaskResult } from '../result/index.js';
import type { TaskStatus } from '../status.js';
import type { Logger, TaskParams } from '../types.js';

/**
 * Opaque caller-defined data carried alongside a task
 */
export type TaskMetadata = Record<string, unknown>;

/**
 * What a stage hands back: the next result, or the error that stopped it
 */
export type RunOutcome = TaskResult | TaskError;

/**
 * Everything a task body can see while it runs
 */
export interface TaskContext<P = TaskParams, M = TaskMetadata> {
  readonly uuid: string;
  readonly path: string;
  readonly params: P; // Validated parameters
  readonly metadata: M | undefined;
  readonly logger: Logger;
  readonly previous?: TaskResult;
}

export type TaskStage<P = TaskParams, M = TaskMetadata> = (
  result: TaskResult,
  context: TaskContext<P, M>
) => RunOutcome;

/**
 * Identity and state accessors of a task instance.
 *
 * `status` and `result` are written by the executor only.
 */
export interface TaskInfo<M = TaskMetadata> {
  readonly uuid: string;
  readonly path: string;
  readonly requiredParams?: readonly string[];
  status: TaskStatus;
  result: TaskResult;
  params(): TaskParams;
  metadata(): M | undefined;
}

/**
 * Behaviour of a task instance.
 *
 * `run` is called at most once per instance. `preRun` runs after parameter
 * validation while the task is still pending; `postRun` runs after a
 * successful `run`. Each stage receives a copy of the current result and
 * returns the next one, or returns (or throws) an error.
 */
export interface TaskExec<P = TaskParams, M = TaskMetadata> {
  readonly paramsSchema?: ZodType<P, ZodTypeDef, unknown>;
  run(result: TaskResult, context: TaskContext<P, M>): RunOutcome;
  preRun?(result: TaskResult, context: TaskContext<P, M>): RunOutcome;
  postRun?(result: TaskResult, context: TaskContext<P, M>): RunOutcome;
}

export type Task<P = TaskParams, M = TaskMetadata> = TaskInfo<M> & TaskExec<P, M>;
