import { describe, it, expect, vi, beforeEach } from 'vitest';
import { z } from 'zod';
import { TaskExecutor } from '../executor.js';
import { defineTask, type TaskInstance } from '../define.js';
import type { Task, TaskContext } from '../task.js';
import { TaskError, UnexpectedError } from '../../errors.js';
import { createResult, type TaskResult } from '../../result/index.js';
import type { Logger } from '../../types.js';

const MANUAL_UUID = '5d2f3c4e-8a1b-4c6d-9e0f-1a2b3c4d5e6f';

type HelloParams = { user: string };
type HelloMeta = { hostname: string };

const createLogger = () => ({
  error: vi.fn(),
  warn: vi.fn(),
  info: vi.fn(),
  debug: vi.fn(),
});

function createManualTask(overrides: Partial<Task> = {}): Task {
  return {
    uuid: MANUAL_UUID,
    path: 'tests.Manual',
    status: 'Pending',
    result: createResult({ uuid: MANUAL_UUID }),
    params: () => ({}),
    metadata: () => undefined,
    run: (result) => result,
    ...overrides,
  };
}

function recordEvents(executor: TaskExecutor): string[] {
  const events: string[] = [];
  executor.on('start', () => events.push('start'));
  executor.on('status', ({ from, to }) => events.push(`${from}->${to}`));
  executor.on('run-end', ({ ok }) => events.push(ok ? 'run-end' : 'run-end(fail)'));
  executor.on('end', ({ status }) => events.push(`end:${status}`));
  return events;
}

describe('TaskExecutor', () => {
  let logger: ReturnType<typeof createLogger>;
  let executor: TaskExecutor;
  let events: string[];

  const greet = vi.fn((result: TaskResult, context: TaskContext<HelloParams, HelloMeta>) => ({
    ...result,
    stdout: `Hello ${context.params.user} from ${context.metadata?.hostname ?? 'localhost'}`,
  }));

  const Hello = defineTask<HelloParams, HelloMeta>({
    path: 'tests.Hello',
    requiredParams: ['user'],
    run: greet,
  });

  beforeEach(() => {
    logger = createLogger();
    executor = new TaskExecutor({ logger });
    events = recordEvents(executor);
  });

  describe('validation', () => {
    it('should fail without running the task when a required parameter is missing', () => {
      const task = Hello.create({ params: {}, metadata: { hostname: 'host1' } });

      const result = executor.execute(task);

      expect(task.status).toBe('Failed');
      expect(result.retcode).toBe(400);
      expect(result.stdout).toBeNull();
      expect(result.stderr).toBe("Missing required parameter: 'user'");
      expect(result.retval).toEqual({ parameter: 'user' });
      expect(greet).not.toHaveBeenCalled();
    });

    it('should treat an undefined value as missing', () => {
      const task = Hello.create({ params: { user: undefined } });

      executor.execute(task);

      expect(task.status).toBe('Failed');
      expect(greet).not.toHaveBeenCalled();
    });

    it('should report the first missing parameter in declaration order', () => {
      const Pair = defineTask({
        path: 'tests.Pair',
        requiredParams: ['left', 'right', 'middle'],
        run: (result) => result,
      });

      const result = executor.execute(Pair.create({ params: { left: 1 } }));

      expect(result.stderr).toBe("Missing required parameter: 'right'");
    });

    it('should emit start, the Pending -> Failed edge and end only', () => {
      executor.execute(Hello.create());

      expect(events).toEqual(['start', 'Pending->Failed', 'end:Failed']);
    });

    it('should accept any parameters when none are required', () => {
      const Free = defineTask({ path: 'tests.Free', run: (result) => result });

      const result = executor.execute(Free.create({ params: { anything: 'goes' } }));

      expect(result.retcode).toBe(0);
      expect(events).toContain('Running->Success');
    });

    it('should reject parameters that do not match the declared schema', () => {
      const Count = defineTask({
        path: 'tests.Count',
        requiredParams: ['count'],
        paramsSchema: z.object({ count: z.number() }),
        run: (result, { params }) => ({ ...result, retval: { doubled: params.count * 2 } }),
      });

      const task = Count.create({ params: { count: 'three' } });
      const result = executor.execute(task);

      expect(task.status).toBe('Failed');
      expect(result.retcode).toBe(400);
      expect(result.stderr).toBe('Invalid parameters: count: Expected number, received string');
    });

    it('should hand schema-parsed parameters to run', () => {
      const Count = defineTask({
        path: 'tests.Count',
        paramsSchema: z.object({ count: z.coerce.number() }),
        run: (result, { params }) => ({ ...result, retval: { doubled: params.count * 2 } }),
      });

      const result = executor.execute(Count.create({ params: { count: '21' } }));

      expect(result.retval).toEqual({ doubled: 42 });
    });
  });

  describe('run', () => {
    it('should succeed with the result returned by the task', () => {
      const task = Hello.create({ params: { user: 'Cedric' }, metadata: { hostname: 'host1' } });

      const result = executor.execute(task);

      expect(task.status).toBe('Success');
      expect(result.retcode).toBe(0);
      expect(result.stdout).toBe('Hello Cedric from host1');
      expect(task.result).toEqual(result);
      expect(greet).toHaveBeenCalledTimes(1);
    });

    it('should emit lifecycle events in transition order', () => {
      executor.execute(Hello.create({ params: { user: 'Cedric' } }));

      expect(events).toEqual(['start', 'Pending->Running', 'run-end', 'Running->Success', 'end:Success']);
    });

    it('should pass the current result and context to run', () => {
      const task = Hello.create({
        params: { user: 'Ada' },
        metadata: { hostname: 'host2' },
        result: createResult({ retval: { seeded: true } }),
      });

      executor.execute(task);

      const [input, context] = greet.mock.calls[0];
      expect(input.uuid).toBe(task.uuid);
      expect(input.retval).toEqual({ seeded: true });
      expect(context.uuid).toBe(task.uuid);
      expect(context.path).toBe('tests.Hello');
      expect(context.params).toEqual({ user: 'Ada' });
      expect(context.metadata).toEqual({ hostname: 'host2' });
      expect(context.logger).toBe(logger);
    });

    it('should see the task as Running while its body executes', () => {
      let seen: string | undefined;
      const Probe = defineTask({
        path: 'tests.Probe',
        run: (result) => {
          seen = task.status;
          return result;
        },
      });
      const task: TaskInstance = Probe.create();

      executor.execute(task);

      expect(seen).toBe('Running');
    });

    it('should fail with the code and message of a returned error', () => {
      const Broken = defineTask({
        path: 'tests.Broken',
        run: () => new UnexpectedError('Task failed !'),
      });
      const task = Broken.create();

      const result = executor.execute(task);

      expect(task.status).toBe('Failed');
      expect(result.retcode).toBe(500);
      expect(result.stderr).toBe('Task failed !');
      expect(events).toEqual([
        'start',
        'Pending->Running',
        'run-end(fail)',
        'Running->Failed',
        'end:Failed',
      ]);
    });

    it('should translate a thrown Error into an unexpected failure', () => {
      const Throws = defineTask({
        path: 'tests.Throws',
        run: () => {
          throw new RangeError('out of range');
        },
      });

      const result = executor.execute(Throws.create());

      expect(result.retcode).toBe(500);
      expect(result.stderr).toBe('out of range');
      expect(result.retval).toEqual({ name: 'RangeError' });
    });

    it('should translate a thrown non-error value', () => {
      const Throws = defineTask({
        path: 'tests.Throws',
        run: () => {
          throw 'plain failure';
        },
      });

      const result = executor.execute(Throws.create());

      expect(result.retcode).toBe(500);
      expect(result.stderr).toBe('plain failure');
    });

    it('should keep a thrown TaskError as is', () => {
      const kind = { name: 'Conflict', code: 409, description: 'Resource conflict' };
      const Throws = defineTask({
        path: 'tests.Throws',
        run: () => {
          throw new TaskError(kind, 'already exists', { id: 7 });
        },
      });

      const result = executor.execute(Throws.create());

      expect(result.retcode).toBe(409);
      expect(result.stderr).toBe('already exists');
      expect(result.retval).toEqual({ id: 7 });
    });

    it('should never report retcode 0 for a failure', () => {
      const kind = { name: 'Odd', code: 0, description: 'Error kind without a code' };
      const Odd = defineTask({ path: 'tests.Odd', run: () => new TaskError(kind, 'odd') });
      const task = Odd.create();

      const result = executor.execute(task);

      expect(task.status).toBe('Failed');
      expect(result.retcode).toBe(1);
    });

    it('should fail when run returns a non-zero retcode', () => {
      const Exit = defineTask({
        path: 'tests.Exit',
        run: (result) => ({ ...result, retcode: 2, stderr: 'exit status 2' }),
      });
      const task = Exit.create();

      const result = executor.execute(task);

      expect(task.status).toBe('Failed');
      expect(result.retcode).toBe(2);
      expect(result.stderr).toBe('exit status 2');
      expect(events).toEqual(['start', 'Pending->Running', 'run-end', 'Running->Failed', 'end:Failed']);
    });

    it('should not let run change the parameters held by the task', () => {
      const Mutate = defineTask<{ opts: { n: number } }>({
        path: 'tests.Mutate',
        run: (result, { params }) => {
          params.opts.n = 99;
          return result;
        },
      });
      const task = Mutate.create({ params: { opts: { n: 1 } } });

      executor.execute(task);

      expect(task.status).toBe('Success');
      expect(task.params()).toEqual({ opts: { n: 1 } });
    });

    it('should refuse a status change that skips the lifecycle', () => {
      const Tamper = defineTask({
        path: 'tests.Tamper',
        run: (result) => {
          task.status = 'Failed';
          return result;
        },
      });
      const task: TaskInstance = Tamper.create();

      executor.execute(task);

      expect(task.status).toBe('Failed');
      expect(events).toEqual(['start', 'Pending->Running', 'run-end', 'end:Failed']);
      expect(logger.error).toHaveBeenCalledWith('Illegal status transition refused', {
        path: 'tests.Tamper',
        uuid: task.uuid,
        from: 'Failed',
        to: 'Success',
      });
    });

    it('should keep the task uuid even if run returns a foreign result', () => {
      const Fresh = defineTask({
        path: 'tests.Fresh',
        run: () => createResult({ uuid: '6f1c2a9e-5b0d-4c1e-9a51-1f0c3c7d2b11', stdout: 'fresh' }),
      });
      const task = Fresh.create();
      const uuid = task.uuid;

      const result = executor.execute(task);

      expect(result.uuid).toBe(uuid);
      expect(task.uuid).toBe(uuid);
      expect(result.stdout).toBe('fresh');
    });
  });

  describe('previous result', () => {
    it('should merge an upstream result before running', () => {
      const task = Hello.create({ params: { user: 'Ada' } });
      const previous = createResult({ stdout: 'upstream', retval: { step: 1 } });

      executor.execute(task, { previous });

      const [input, context] = greet.mock.calls[0];
      expect(input.uuid).toBe(task.uuid);
      expect(input.stdout).toBe('upstream');
      expect(input.retval).toEqual({ step: 1 });
      expect(context.previous).toBe(previous);
    });
  });

  describe('hooks', () => {
    it('should let preRun augment the result seen by run', () => {
      const run = vi.fn((result: TaskResult) => result);
      const Hooked = defineTask({
        path: 'tests.Hooked',
        preRun: (result) => ({ ...result, retval: { ...result.retval, prepared: true } }),
        run,
      });

      const result = executor.execute(Hooked.create());

      expect(run.mock.calls[0][0].retval).toEqual({ prepared: true });
      expect(result.retval).toEqual({ prepared: true });
    });

    it('should fail before Running when preRun fails', () => {
      const run = vi.fn((result: TaskResult) => result);
      const Hooked = defineTask({
        path: 'tests.Hooked',
        preRun: () => new UnexpectedError('not ready'),
        run,
      });
      const task = Hooked.create();

      const result = executor.execute(task);

      expect(task.status).toBe('Failed');
      expect(result.stderr).toBe('not ready');
      expect(run).not.toHaveBeenCalled();
      expect(events).toEqual(['start', 'Pending->Failed', 'end:Failed']);
    });

    it('should fail after running when postRun throws', () => {
      const Hooked = defineTask({
        path: 'tests.Hooked',
        run: (result) => ({ ...result, stdout: 'ran' }),
        postRun: () => {
          throw new Error('cleanup failed');
        },
      });
      const task = Hooked.create();

      const result = executor.execute(task);

      expect(task.status).toBe('Failed');
      expect(result.retcode).toBe(500);
      expect(result.stdout).toBe('ran');
      expect(result.stderr).toBe('cleanup failed');
      expect(events).toEqual(['start', 'Pending->Running', 'run-end', 'Running->Failed', 'end:Failed']);
    });

    it('should use the result returned by postRun', () => {
      const Hooked = defineTask({
        path: 'tests.Hooked',
        run: (result) => ({ ...result, stdout: 'ran' }),
        postRun: (result) => ({ ...result, retval: { checked: true } }),
      });

      const result = executor.execute(Hooked.create());

      expect(result.stdout).toBe('ran');
      expect(result.retval).toEqual({ checked: true });
    });
  });

  describe('single shot', () => {
    it('should not run an already executed task again', () => {
      const task = Hello.create({ params: { user: 'Cedric' } });
      const first = executor.execute(task);
      events.length = 0;

      const second = executor.execute(task);

      expect(second).toEqual(first);
      expect(task.status).toBe('Success');
      expect(greet).toHaveBeenCalledTimes(1);
      expect(events).toEqual([]);
      expect(logger.warn).toHaveBeenCalledWith('Task already executed, skipping', {
        path: 'tests.Hello',
        uuid: task.uuid,
        status: 'Success',
      });
    });
  });

  describe('observability', () => {
    it('should log start and completion with the task identity', () => {
      const task = Hello.create({ params: { user: 'Cedric' }, metadata: { hostname: 'host1' } });

      executor.execute(task);

      expect(logger.info).toHaveBeenCalledWith('Task execution started', {
        path: 'tests.Hello',
        uuid: task.uuid,
      });
      expect(logger.info).toHaveBeenCalledWith('Task execution finished', {
        path: 'tests.Hello',
        uuid: task.uuid,
        result: 'Ok(0, stdout: "Hello Cedric from host1")',
      });
      expect(logger.debug).toHaveBeenCalledWith('Task status updated', {
        path: 'tests.Hello',
        uuid: task.uuid,
        from: 'Pending',
        to: 'Running',
      });
    });

    it('should log failures at error level', () => {
      const task = Hello.create();

      executor.execute(task);

      expect(logger.error).toHaveBeenCalledWith('Task execution failed', {
        path: 'tests.Hello',
        uuid: task.uuid,
        result: `Err(400, stderr: "Missing required parameter: 'user'")`,
      });
    });

    it('should carry the final result on the end event', () => {
      const end = vi.fn();
      executor.on('end', end);
      const task = Hello.create({ params: { user: 'Cedric' }, metadata: { hostname: 'host1' } });

      const result = executor.execute(task);

      expect(end).toHaveBeenCalledWith({
        path: 'tests.Hello',
        uuid: task.uuid,
        status: 'Success',
        result,
      });
    });

    it('should not let a failing listener escape execute', () => {
      executor.on('start', () => {
        throw new Error('listener broke');
      });
      const task = Hello.create({ params: { user: 'Cedric' } });

      const result = executor.execute(task);

      expect(result.retcode).toBe(0);
      expect(task.status).toBe('Success');
      expect(logger.error).toHaveBeenCalledWith('Lifecycle listener failed', {
        error: 'listener broke',
      });
    });

    it('should still deliver the event to the other listeners', () => {
      const second = vi.fn();
      executor.on('start', () => {
        throw new Error('listener broke');
      });
      executor.on('start', second);
      const task = Hello.create({ params: { user: 'Cedric' } });

      executor.execute(task);

      expect(second).toHaveBeenCalledWith({ path: 'tests.Hello', uuid: task.uuid });
    });

    it('should call a once listener a single time', () => {
      const once = vi.fn();
      executor.once('end', once);

      executor.execute(Hello.create({ params: { user: 'Ada' } }));
      executor.execute(Hello.create({ params: { user: 'Grace' } }));

      expect(once).toHaveBeenCalledTimes(1);
      expect(executor.listenerCount('end')).toBe(1);
    });

    it('should default to a console logger', () => {
      const quiet: Logger = new TaskExecutor({ logLevel: 'error' }).getLogger();

      expect(typeof quiet.info).toBe('function');
    });
  });

  describe('failures outside the task body', () => {
    it('should fail when the parameter schema throws', () => {
      const Decode = defineTask({
        path: 'tests.Decode',
        paramsSchema: z.object({ raw: z.string().transform((raw): unknown => JSON.parse(raw)) }),
        run: (result) => result,
      });
      const task = Decode.create({ params: { raw: '{not json' } });

      const result = executor.execute(task);

      expect(task.status).toBe('Failed');
      expect(result.retcode).toBe(500);
      expect(result.retval).toEqual({ name: 'SyntaxError' });
      expect(events).toEqual(['start', 'Pending->Failed', 'end:Failed']);
    });

    it('should fail when reading the parameters throws', () => {
      const run = vi.fn((result: TaskResult) => result);
      const task = createManualTask({
        params: () => {
          throw new Error('decode failed');
        },
        run,
      });

      const result = executor.execute(task);

      expect(task.status).toBe('Failed');
      expect(result).toEqual({
        uuid: MANUAL_UUID,
        retcode: 500,
        stdout: null,
        stderr: 'decode failed',
        retval: { name: 'Error' },
      });
      expect(run).not.toHaveBeenCalled();
      expect(events).toEqual(['start', 'Pending->Failed', 'end:Failed']);
    });

    it('should fail when reading the metadata throws', () => {
      const task = createManualTask({
        metadata: () => {
          throw new Error('metadata unavailable');
        },
      });

      const result = executor.execute(task);

      expect(task.status).toBe('Failed');
      expect(result.retcode).toBe(500);
      expect(result.stderr).toBe('metadata unavailable');
    });

    it('should complete when the logger throws', () => {
      const consoleError = vi.spyOn(console, 'error').mockImplementation(() => {});
      const broken: Logger = {
        ...createLogger(),
        info: () => {
          throw new Error('sink down');
        },
      };
      const task = Hello.create({ params: { user: 'Cedric' } });

      const result = new TaskExecutor({ logger: broken }).execute(task);

      expect(task.status).toBe('Success');
      expect(result.stdout).toBe('Hello Cedric from localhost');
      expect(consoleError).toHaveBeenCalledWith('[TASKRUN ERROR] Logger failed', {
        level: 'info',
        message: 'Task execution started',
        error: 'sink down',
      });
      consoleError.mockRestore();
    });
  });
});
