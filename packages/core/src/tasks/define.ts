import { randomUUID } from 'crypto';
import { z, type ZodType, type ZodTypeDef } from 'zod';
import { InvalidMessageError, formatZodIssues } from '../errors.js';
import type { TaskMessage } from '../message.js';
import { cloneResult, createResult, type TaskResult } from '../result/index.js';
import type { TaskStatus } from '../status.js';
import type { TaskParams } from '../types.js';
import type { Task, TaskMetadata, TaskStage } from './task.js';

/**
 * Zod schema for the static part of a task type
 */
export const TaskTypeSchema = z.object({
  path: z.string().min(1),
  requiredParams: z.array(z.string().min(1)).default([]),
});

export interface TaskDefinition<P = TaskParams, M = TaskMetadata> {
  /** Identity path of the task type, also used as message entrypoint */
  path: string;
  requiredParams?: readonly string[];
  paramsSchema?: ZodType<P, ZodTypeDef, unknown>;
  /** Used to decode metadata carried by messages */
  metadataSchema?: ZodType<M, ZodTypeDef, unknown>;
  run: TaskStage<P, M>;
  preRun?: TaskStage<P, M>;
  postRun?: TaskStage<P, M>;
}

export interface CreateTaskOptions<M = TaskMetadata> {
  uuid?: string;
  params?: TaskParams;
  metadata?: M;
  result?: TaskResult;
}

/**
 * Custom error for malformed task type definitions
 */
export class TaskDefinitionError extends Error {
  constructor(
    message: string,
    public errors?: z.ZodError
  ) {
    super(message);
    this.name = 'TaskDefinitionError';
  }

  getDetails(): string {
    if (!this.errors) return this.message;

    return formatZodIssues(this.errors).join('\n');
  }
}

/**
 * A task instance built from a TaskDefinition
 */
export class TaskInstance<P = TaskParams, M = TaskMetadata> implements Task<P, M> {
  readonly uuid: string;
  readonly path: string;
  readonly requiredParams: readonly string[];
  readonly paramsSchema?: ZodType<P, ZodTypeDef, unknown>;
  readonly preRun?: TaskStage<P, M>;
  readonly postRun?: TaskStage<P, M>;
  readonly run: TaskStage<P, M>;

  status: TaskStatus = 'Pending';
  result: TaskResult;

  private readonly suppliedParams: TaskParams;
  private readonly suppliedMetadata: M | undefined;

  constructor(type: TaskType<P, M>, definition: TaskDefinition<P, M>, options: CreateTaskOptions<M>) {
    this.uuid = options.uuid ?? randomUUID();
    this.path = type.path;
    this.requiredParams = type.requiredParams;
    this.paramsSchema = definition.paramsSchema;
    this.run = definition.run;
    this.preRun = definition.preRun;
    this.postRun = definition.postRun;

    // Deep copies in and out: nested values are never shared
    this.suppliedParams = structuredClone(options.params ?? {});
    this.suppliedMetadata = options.metadata;
    this.result = { ...cloneResult(options.result ?? createResult()), uuid: this.uuid };
  }

  params(): TaskParams {
    return structuredClone(this.suppliedParams);
  }

  metadata(): M | undefined {
    return this.suppliedMetadata;
  }
}

/**
 * A task type: creates pending instances sharing one definition
 */
export class TaskType<P = TaskParams, M = TaskMetadata> {
  readonly path: string;
  readonly requiredParams: readonly string[];

  constructor(private readonly definition: TaskDefinition<P, M>) {
    const parsed = TaskTypeSchema.safeParse({
      path: definition.path,
      requiredParams: definition.requiredParams,
    });

    if (!parsed.success) {
      throw new TaskDefinitionError(`Invalid task definition '${definition.path}'`, parsed.error);
    }

    this.path = parsed.data.path;
    this.requiredParams = Object.freeze(parsed.data.requiredParams);
  }

  create(options: CreateTaskOptions<M> = {}): TaskInstance<P, M> {
    return new TaskInstance(this, this.definition, options);
  }

  /**
   * Build an instance from a decoded message. The message entrypoint must
   * name this task type.
   *
   * @throws InvalidMessageError on entrypoint or metadata mismatch
   */
  fromMessage(message: TaskMessage): TaskInstance<P, M> {
    if (message.entrypoint !== this.path) {
      throw new InvalidMessageError([
        `entrypoint: expected '${this.path}', received '${message.entrypoint}'`,
      ]);
    }

    const schema: ZodType<M, ZodTypeDef, unknown> = this.definition.metadataSchema ?? z.custom<M>();
    const metadata = schema.safeParse(message.metadata);
    if (!metadata.success) {
      throw new InvalidMessageError(
        formatZodIssues(metadata.error).map((issue) => `metadata.${issue}`)
      );
    }

    return this.create({
      uuid: message.uuid,
      params: message.params,
      metadata: metadata.data,
      result: message.result,
    });
  }
}

/**
 * Define a task type
 *
 * @example
 * ```typescript
 * const Greet = defineTask<{ user: string }>({
 *   path: 'demo.Greet',
 *   requiredParams: ['user'],
 *   run: (result, { params }) => ({ ...result, stdout: `Hello ${params.user}` }),
 * });
 *
 * const task = Greet.create({ params: { user: 'Ada' } });
 * ```
 */
export function defineTask<P = TaskParams, M = TaskMetadata>(
  definition: TaskDefinition<P, M>
): TaskType<P, M> {
  return new TaskType(definition);
}
