import { z, type ZodType, type ZodTypeDef } from 'zod';
import {
  InvalidParameterError,
  MissingParameterError,
  formatZodIssues,
  type ValidationError,
} from '../errors.js';
import type { TaskParams } from '../types.js';
import type { Task } from './task.js';

export type RequiredParamsCheck = { valid: true } | { valid: false; error: MissingParameterError };

export type ParamValidationResult<P> =
  | { valid: true; params: P }
  | { valid: false; error: ValidationError };

/**
 * Check that every required name is supplied.
 *
 * Names are checked in declaration order and the first missing one is
 * reported. A name counts as supplied when it is an own key of `params`
 * with a value other than `undefined`. An empty or absent list always
 * passes.
 */
export function checkRequiredParams(
  required: readonly string[] | undefined,
  params: TaskParams
): RequiredParamsCheck {
  for (const name of required ?? []) {
    if (!Object.hasOwn(params, name) || params[name] === undefined) {
      return { valid: false, error: new MissingParameterError(name) };
    }
  }

  return { valid: true };
}

/**
 * Validate a task's parameters: required names first, then the declared
 * schema (if any). Tasks without a schema get their parameters unchanged.
 */
export function validateParams<P, M>(
  task: Pick<Task<P, M>, 'requiredParams' | 'paramsSchema' | 'params'>
): ParamValidationResult<P> {
  const params = task.params();

  const required = checkRequiredParams(task.requiredParams, params);
  if (!required.valid) {
    return required;
  }

  const schema: ZodType<P, ZodTypeDef, unknown> = task.paramsSchema ?? z.custom<P>();
  const parsed = schema.safeParse(params);

  if (!parsed.success) {
    return { valid: false, error: new InvalidParameterError(formatZodIssues(parsed.error)) };
  }

  return { valid: true, params: parsed.data };
}
