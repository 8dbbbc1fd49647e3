import { randomUUID } from 'crypto';
import { z } from 'zod';
import { InvalidMessageError, formatZodIssues } from './errors.js';
import { TaskResultSchema, createResult, type TaskResult } from './result/index.js';

/**
 * Zod schema for the serialized form of a task instance
 */
export const TaskMessageSchema = z.object({
  uuid: z.string().uuid(),
  entrypoint: z.string(),
  params: z.record(z.unknown()),
  metadata: z.record(z.unknown()),
  result: TaskResultSchema,
});

export type TaskMessage = z.infer<typeof TaskMessageSchema>;

export interface CreateMessageOptions {
  entrypoint: string;
  uuid?: string;
  params?: Record<string, unknown>;
  metadata?: Record<string, unknown>;
  result?: TaskResult;
}

/**
 * Build a message, filling in a fresh uuid and an empty result bound to it
 */
export function createMessage(options: CreateMessageOptions): TaskMessage {
  const uuid = options.uuid ?? randomUUID();

  return {
    uuid,
    entrypoint: options.entrypoint,
    params: { ...options.params },
    metadata: { ...options.metadata },
    result: options.result ?? createResult({ uuid }),
  };
}

/**
 * Decode an untrusted value (e.g. parsed JSON) into a message
 *
 * @throws InvalidMessageError if the value does not match TaskMessageSchema
 */
export function parseMessage(value: unknown): TaskMessage {
  const parsed = TaskMessageSchema.safeParse(value);

  if (!parsed.success) {
    throw new InvalidMessageError(formatZodIssues(parsed.error));
  }

  return parsed.data;
}
