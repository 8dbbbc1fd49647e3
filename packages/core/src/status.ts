import { z } from 'zod';

/**
 * Lifecycle state of a task instance.
 *
 * `Pending` is the initial state; `Success` and `Failed` are terminal.
 */
export type TaskStatus = 'Pending' | 'Running' | 'Success' | 'Failed';

/**
 * Wire form of a status (upper case)
 */
export const TaskStatusWireSchema = z.enum(['PENDING', 'RUNNING', 'SUCCESS', 'FAILED']);

export type TaskStatusWire = z.infer<typeof TaskStatusWireSchema>;

const TO_WIRE: Record<TaskStatus, TaskStatusWire> = {
  Pending: 'PENDING',
  Running: 'RUNNING',
  Success: 'SUCCESS',
  Failed: 'FAILED',
};

const FROM_WIRE: Record<TaskStatusWire, TaskStatus> = {
  PENDING: 'Pending',
  RUNNING: 'Running',
  SUCCESS: 'Success',
  FAILED: 'Failed',
};

// Allowed edges; Pending -> Failed covers failures before the body runs
const TRANSITIONS: Record<TaskStatus, readonly TaskStatus[]> = {
  Pending: ['Running', 'Failed'],
  Running: ['Success', 'Failed'],
  Success: [],
  Failed: [],
};

export function statusToString(status: TaskStatus): TaskStatusWire {
  return TO_WIRE[status];
}

/**
 * Decode a wire status. Anything unrecognised, including non-string
 * values, decodes to 'Pending'.
 */
export function parseStatus(value: unknown): TaskStatus {
  const parsed = TaskStatusWireSchema.safeParse(value);
  return parsed.success ? FROM_WIRE[parsed.data] : 'Pending';
}

export function isTerminalStatus(status: TaskStatus): boolean {
  return TRANSITIONS[status].length === 0;
}

export function canTransition(from: TaskStatus, to: TaskStatus): boolean {
  return TRANSITIONS[from].includes(to);
}
