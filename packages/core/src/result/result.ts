import { randomUUID } from 'crypto';
import { z } from 'zod';
import type { TaskError } from '../errors.js';

/**
 * Zod schema for a serialized task result
 */
export const TaskResultSchema = z.object({
  uuid: z.string().uuid(),
  retcode: z.number().int().nonnegative(),
  stdout: z.string().nullable(),
  stderr: z.string().nullable(),
  retval: z.record(z.unknown()),
});

/**
 * Structured outcome of a task execution.
 *
 * `retcode` 0 means success. Codes >= 300 (HTTP style) and 1 (Unix style)
 * are errors.
 */
export type TaskResult = z.infer<typeof TaskResultSchema>;

export type TaskResultInit = Partial<TaskResult>;

export function createResult(init: TaskResultInit = {}): TaskResult {
  return {
    uuid: init.uuid ?? randomUUID(),
    retcode: init.retcode ?? 0,
    stdout: init.stdout ?? null,
    stderr: init.stderr ?? null,
    retval: { ...init.retval },
  };
}

export function isErrorResult(result: TaskResult): boolean {
  return result.retcode >= 300 || result.retcode === 1;
}

/**
 * Combine two results.
 *
 * - uuid comes from `next`
 * - the highest retcode wins
 * - `next` streams replace `base` streams when set
 * - `next` retval entries overlay `base` entries
 */
export function mergeResults(base: TaskResult, next: TaskResult): TaskResult {
  return {
    uuid: next.uuid,
    retcode: Math.max(base.retcode, next.retcode),
    stdout: next.stdout ?? base.stdout,
    stderr: next.stderr ?? base.stderr,
    retval: { ...base.retval, ...next.retval },
  };
}

/**
 * Build a failure result from an error: its code becomes the retcode,
 * its message the stderr and its details the retval.
 */
export function resultFromError(error: TaskError, uuid: string): TaskResult {
  return createResult({
    uuid,
    retcode: error.code,
    stderr: error.message,
    retval: { ...error.details },
  });
}

/**
 * One-line summary used in lifecycle logs, e.g. `Ok(0, stdout: "done")`
 */
export function formatResult(result: TaskResult): string {
  const show = (value: string | null) => (value === null ? 'None' : JSON.stringify(value));

  return isErrorResult(result)
    ? `Err(${result.retcode}, stderr: ${show(result.stderr)})`
    : `Ok(${result.retcode}, stdout: ${show(result.stdout)})`;
}

/**
 * Decode an untrusted value into a result
 *
 * @throws ZodError when the value does not match TaskResultSchema
 */
export function parseResult(value: unknown): TaskResult {
  return TaskResultSchema.parse(value);
}

/**
 * Copy a result so stages can mutate their input freely
 */
export function cloneResult(result: TaskResult): TaskResult {
  return { ...result, retval: { ...result.retval } };
}
