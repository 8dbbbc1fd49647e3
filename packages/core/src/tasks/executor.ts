import { EventEmitter } from 'eventemitter3';
import { TaskError, toTaskError } from '../errors.js';
import { createDefaultLogger } from '../logger.js';
import {
  cloneResult,
  formatResult,
  mergeResults,
  resultFromError,
  type TaskResult,
} from '../result/index.js';
import { canTransition, type TaskStatus } from '../status.js';
import type { LogLevel, Logger, TaskExecutorConfig } from '../types.js';
import type { RunOutcome, Task, TaskContext, TaskInfo } from './task.js';
import { validateParams } from './validator.js';

export interface TaskIdentity {
  path: string;
  uuid: string;
}

export interface StatusChangeEvent extends TaskIdentity {
  from: TaskStatus;
  to: TaskStatus;
}

export interface RunEndEvent extends TaskIdentity {
  ok: boolean;
  result: TaskResult;
  error?: TaskError;
}

export interface ExecutionEndEvent extends TaskIdentity {
  status: TaskStatus;
  result: TaskResult;
}

/**
 * Lifecycle events, emitted in this order for a full run:
 * start, status (Pending -> Running), run-end, status (Running -> terminal), end
 */
export interface TaskExecutorEvents {
  start: (event: TaskIdentity) => void;
  status: (event: StatusChangeEvent) => void;
  'run-end': (event: RunEndEvent) => void;
  end: (event: ExecutionEndEvent) => void;
}

export interface ExecuteOptions {
  /**
   * Result of an upstream step, merged into the task's result before
   * validation
   */
  previous?: TaskResult;
}

type StageOutcome = { ok: true; result: TaskResult } | { ok: false; error: TaskError };

type PrepareOutcome<P, M> = { ok: true; context: TaskContext<P, M> } | { ok: false; error: TaskError };

/**
 * TaskExecutor - Drives one task instance through its lifecycle
 *
 * `Pending` → `Running` → `Success` | `Failed`. Parameter validation (and
 * the optional `preRun` hook) happen while pending; a failure there moves
 * the task straight to `Failed` and its body never runs.
 *
 * `execute` never throws: every failure ends up in the returned result
 * (non-zero `retcode`, error message in `stderr`) and in the task status.
 * Listeners are called one at a time; one that throws is logged and the
 * others still receive the event. A logger that throws is replaced by the
 * console logger for that message.
 *
 * @example
 * ```typescript
 * const executor = new TaskExecutor({ logLevel: 'debug' });
 *
 * executor.on('status', ({ from, to }) => console.log(`${from} -> ${to}`));
 *
 * const result = executor.execute(Hello.create({ params: { user: 'Ada' } }));
 * ```
 */
export class TaskExecutor extends EventEmitter<TaskExecutorEvents> {
  private logger: Logger;
  private fallbackLogger: Logger = createDefaultLogger('error');

  constructor(config: TaskExecutorConfig = {}) {
    super();
    this.logger = config.logger ?? createDefaultLogger(config.logLevel ?? 'info');
  }

  getLogger(): Logger {
    return this.logger;
  }

  execute<P, M>(task: Task<P, M>, options: ExecuteOptions = {}): TaskResult {
    const identity = this.identity(task);

    // Single-shot: a task that already left Pending is never run again
    if (task.status !== 'Pending') {
      this.log('warn', 'Task already executed, skipping', { ...identity, status: task.status });
      return cloneResult(task.result);
    }

    this.log('info', 'Task execution started', identity);
    this.notify<TaskIdentity>(this.listeners('start'), identity, (listener) =>
      this.removeListener('start', listener, undefined, true)
    );

    let current = cloneResult(task.result);
    if (options.previous) {
      current = mergeResults(current, { ...options.previous, uuid: task.uuid });
    }

    const prepared = this.prepare(task, options.previous);
    if (!prepared.ok) {
      this.log('warn', 'Task parameters rejected', { ...identity, error: prepared.error.message });
      return this.finish(task, this.failure(task, current, prepared.error));
    }
    const context = prepared.context;

    const preRun = task.preRun;
    if (preRun) {
      const input = current;
      const before = this.attempt(task, 'PreRun', () => preRun.call(task, cloneResult(input), context));
      if (!before.ok) {
        return this.finish(task, this.failure(task, current, before.error));
      }
      current = before.result;
    }

    this.transition(task, 'Running');

    const input = current;
    const ran = this.attempt(task, 'Run', () => task.run(cloneResult(input), context));
    this.log('info', 'Task run finished', { ...identity, outcome: this.describe(ran) });
    const runEnd: RunEndEvent = ran.ok
      ? { ...identity, ok: true, result: cloneResult(ran.result) }
      : { ...identity, ok: false, result: cloneResult(input), error: ran.error };
    this.notify<RunEndEvent>(this.listeners('run-end'), runEnd, (listener) =>
      this.removeListener('run-end', listener, undefined, true)
    );

    if (!ran.ok) {
      return this.finish(task, this.failure(task, current, ran.error));
    }

    let final = ran.result;
    const postRun = task.postRun;
    if (postRun) {
      const produced = final;
      const after = this.attempt(task, 'PostRun', () => postRun.call(task, cloneResult(produced), context));
      if (!after.ok) {
        return this.finish(task, this.failure(task, produced, after.error));
      }
      final = after.result;
    }

    return this.finish(task, final);
  }

  /**
   * Validate parameters and read metadata. A throwing schema or accessor
   * counts as a rejection like any validation error.
   */
  private prepare<P, M>(task: Task<P, M>, previous: TaskResult | undefined): PrepareOutcome<P, M> {
    try {
      const validation = validateParams(task);
      if (!validation.valid) {
        return { ok: false, error: validation.error };
      }

      return {
        ok: true,
        context: {
          uuid: task.uuid,
          path: task.path,
          params: validation.params,
          metadata: task.metadata(),
          logger: this.logger,
          previous,
        },
      };
    } catch (error) {
      return { ok: false, error: toTaskError(error) };
    }
  }

  /**
   * Call one stage, turning a returned or thrown error into a failed outcome
   */
  private attempt(task: TaskInfo<unknown>, stage: string, call: () => RunOutcome): StageOutcome {
    this.log('debug', `${stage} started`, this.identity(task));

    let outcome: StageOutcome;
    try {
      const value = call();
      outcome =
        value instanceof TaskError
          ? { ok: false, error: value }
          : { ok: true, result: { ...value, uuid: task.uuid } };
    } catch (error) {
      outcome = { ok: false, error: toTaskError(error) };
    }

    this.log('debug', `${stage} finished`, { ...this.identity(task), outcome: this.describe(outcome) });
    return outcome;
  }

  private failure(task: TaskInfo<unknown>, current: TaskResult, error: TaskError): TaskResult {
    const failed = mergeResults(current, resultFromError(error, task.uuid));
    // A failure never reports retcode 0, whatever code its kind declares
    return failed.retcode === 0 ? { ...failed, retcode: 1 } : failed;
  }

  /**
   * Apply the final result and the terminal status. A result with a
   * non-zero retcode always ends in Failed.
   */
  private finish(task: TaskInfo<unknown>, result: TaskResult): TaskResult {
    task.result = result;
    this.transition(task, result.retcode === 0 ? 'Success' : 'Failed');

    const identity = this.identity(task);
    const status = task.status;
    const summary = formatResult(result);
    if (status === 'Success') {
      this.log('info', 'Task execution finished', { ...identity, result: summary });
    } else {
      this.log('error', 'Task execution failed', { ...identity, result: summary });
    }

    this.notify<ExecutionEndEvent>(
      this.listeners('end'),
      { ...identity, status, result: cloneResult(result) },
      (listener) => this.removeListener('end', listener, undefined, true)
    );
    return cloneResult(result);
  }

  /**
   * Move the task to `to` if the edge exists from its current status;
   * anything else is refused and logged.
   */
  private transition(task: TaskInfo<unknown>, to: TaskStatus): void {
    const from = task.status;
    const identity = this.identity(task);

    if (!canTransition(from, to)) {
      this.log('error', 'Illegal status transition refused', { ...identity, from, to });
      return;
    }

    this.log('debug', 'Task status updated', { ...identity, from, to });
    task.status = to;
    this.notify<StatusChangeEvent>(this.listeners('status'), { ...identity, from, to }, (listener) =>
      this.removeListener('status', listener, undefined, true)
    );
  }

  /**
   * Deliver an event to each listener in turn. `release` drops listeners
   * registered with `once`; listener failures never reach the caller of
   * execute().
   */
  private notify<T>(
    listeners: ReadonlyArray<(event: T) => void>,
    event: T,
    release: (listener: (event: T) => void) => void
  ): void {
    for (const listener of listeners) {
      release(listener);
      try {
        listener(event);
      } catch (error) {
        this.log('error', 'Lifecycle listener failed', {
          error: error instanceof Error ? error.message : String(error),
        });
      }
    }
  }

  private log(level: LogLevel, message: string, meta?: unknown): void {
    try {
      this.logger[level](message, meta);
    } catch (error) {
      this.fallbackLogger.error('Logger failed', {
        level,
        message,
        error: error instanceof Error ? error.message : String(error),
      });
    }
  }

  private identity(task: TaskInfo<unknown>): TaskIdentity {
    return { path: task.path, uuid: task.uuid };
  }

  private describe(outcome: StageOutcome): string {
    return outcome.ok ? formatResult(outcome.result) : `${outcome.error.name}: ${outcome.error.message}`;
  }
}
