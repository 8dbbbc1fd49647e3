import type { ZodError } from 'zod';

/**
 * Error contract shared by the validator, the executor and task logic.
 *
 * Every failure carries a kind (classification + numeric code), a
 * human-readable message and optional structured details. The executor
 * only needs these to build a failure result.
 */

export interface ErrorKind {
  name: string;
  code: number;
  description: string;
}

export const ErrorKinds = {
  MissingParameter: {
    name: 'MissingParameter',
    code: 400,
    description: 'A required task parameter was not supplied',
  },
  InvalidParameter: {
    name: 'InvalidParameter',
    code: 400,
    description: 'Task parameters do not match the declared schema',
  },
  InvalidMessage: {
    name: 'InvalidMessage',
    code: 400,
    description: 'Task message could not be decoded',
  },
  Unexpected: {
    name: 'Unexpected',
    code: 500,
    description: 'Unexpected error',
  },
} as const satisfies Record<string, ErrorKind>;

/**
 * Base error for task failures
 */
export class TaskError extends Error {
  readonly kind: ErrorKind;
  readonly details: Record<string, unknown>;

  constructor(kind: ErrorKind, message: string, details: Record<string, unknown> = {}) {
    super(message);
    this.name = 'TaskError';
    this.kind = kind;
    this.details = details;
  }

  get code(): number {
    return this.kind.code;
  }
}

/**
 * Raised before a task body runs when its parameters are unusable
 */
export class ValidationError extends TaskError {
  constructor(kind: ErrorKind, message: string, details: Record<string, unknown> = {}) {
    super(kind, message, details);
    this.name = 'ValidationError';
  }
}

export class MissingParameterError extends ValidationError {
  constructor(public readonly parameter: string) {
    super(ErrorKinds.MissingParameter, `Missing required parameter: '${parameter}'`, {
      parameter,
    });
    this.name = 'MissingParameterError';
  }
}

export class InvalidParameterError extends ValidationError {
  constructor(public readonly issues: string[]) {
    super(ErrorKinds.InvalidParameter, `Invalid parameters: ${issues.join('; ')}`, { issues });
    this.name = 'InvalidParameterError';
  }
}

export class InvalidMessageError extends TaskError {
  constructor(public readonly issues: string[]) {
    super(ErrorKinds.InvalidMessage, `Invalid task message: ${issues.join('; ')}`, { issues });
    this.name = 'InvalidMessageError';
  }
}

export class UnexpectedError extends TaskError {
  constructor(message: string, details: Record<string, unknown> = {}) {
    super(ErrorKinds.Unexpected, message, details);
    this.name = 'UnexpectedError';
  }
}

/**
 * Coerce any thrown value into a TaskError
 */
export function toTaskError(value: unknown): TaskError {
  if (value instanceof TaskError) {
    return value;
  }
  if (value instanceof Error) {
    return new UnexpectedError(value.message, { name: value.name });
  }
  return new UnexpectedError(String(value));
}

/**
 * Flatten zod issues into `path: message` lines
 */
export function formatZodIssues(error: ZodError): string[] {
  return error.errors.map((issue) =>
    issue.path.length > 0 ? `${issue.path.join('.')}: ${issue.message}` : issue.message
  );
}
