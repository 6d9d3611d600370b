import { describe, it, beforeEach, afterEach, mock } from 'node:test';
import assert from 'node:assert/strict';

import { jobProgressUpdateCodec, jobResultCodec, workerTaskRequestCodec } from '../protocol/codec.js';
import type { JobProgressUpdate, JobResult } from '../protocol/messages.js';
import { configureLogging, resetLogging, type LogEntry } from '../utils/logger.js';
import { InMemoryMessageBus } from './message-bus.js';
import {
  executeWorkerTask,
  MessageBusTaskRunner,
  Worker,
  type TaskRunner,
  type WorkerConfig,
  type WorkerTaskFunction,
} from './worker.js';

const encoder = new TextEncoder();
const decoder = new TextDecoder();

const PROGRESS_QUEUE = 'test_task_progress';
const RESULT_QUEUE = 'test_task_results';

const idleRunner: TaskRunner = {
  start: async () => {},
  stop: async () => {},
};

describe('worker', () => {
  let bus: InMemoryMessageBus;
  let entries: LogEntry[];
  let progress: JobProgressUpdate[];
  let results: JobResult[];

  function config(taskFunction: WorkerTaskFunction, taskRunner: TaskRunner = idleRunner): WorkerConfig {
    return {
      messageBus: bus,
      taskType: 'grow_optimizer',
      taskFunction,
      taskRunner,
      taskProgressQueueName: PROGRESS_QUEUE,
      taskResultQueueName: RESULT_QUEUE,
    };
  }

  beforeEach(async () => {
    entries = [];
    progress = [];
    results = [];
    configureLogging({ handler: (e) => entries.push(e) });
    bus = new InMemoryMessageBus();
    await bus.start();
    await bus.subscribe(PROGRESS_QUEUE, (body) => {
      progress.push(jobProgressUpdateCodec.decode(body));
    });
    await bus.subscribe(RESULT_QUEUE, (body) => {
      results.push(jobResultCodec.decode(body));
    });
  });

  afterEach(async () => {
    await bus.stop();
    resetLogging();
  });

  describe('executeWorkerTask', () => {
    it('wraps a successful task with progress updates and one result', async () => {
      const taskFunction = mock.fn<WorkerTaskFunction>(async (esdl, _params, updateProgress) => {
        await updateProgress(0.5, 'Halfway');
        return `${esdl}<optimized/>`;
      });

      const outcome = await executeWorkerTask(config(taskFunction), {
        jobId: 'job-1',
        taskId: 'task-1',
        esdl: encoder.encode('<esdl/>'),
        params: { horizon: 10 },
      });
      await bus.drain();

      assert.deepStrictEqual(outcome, { resultType: 'SUCCEEDED', outputEsdl: '<esdl/><optimized/>' });
      assert.strictEqual(taskFunction.mock.callCount(), 1);
      assert.deepStrictEqual(taskFunction.mock.calls[0]?.arguments.slice(0, 2), [
        '<esdl/>',
        { horizon: 10 },
      ]);
      assert.deepStrictEqual(progress, [
        { jobId: 'job-1', taskId: 'task-1', taskType: 'grow_optimizer', progress: 0, message: 'Job calculation started' },
        { jobId: 'job-1', taskId: 'task-1', taskType: 'grow_optimizer', progress: 0.5, message: 'Halfway' },
        { jobId: 'job-1', taskId: 'task-1', taskType: 'grow_optimizer', progress: 1, message: 'Calculation finished.' },
      ]);
      assert.strictEqual(results.length, 1);
      assert.strictEqual(results[0]?.resultType, 'SUCCEEDED');
      assert.strictEqual(results[0]?.logs, '');
      assert.strictEqual(decoder.decode(results[0]?.outputEsdl), '<esdl/><optimized/>');
    });

    it('publishes a FAILED result when the task throws', async () => {
      const outcome = await executeWorkerTask(
        config(() => {
          throw new Error('solver diverged');
        }),
        { jobId: 'job-1', taskId: 'task-1', esdl: encoder.encode('<esdl/>'), params: {} }
      );
      await bus.drain();

      assert.deepStrictEqual(outcome, { resultType: 'FAILED', error: 'solver diverged' });
      assert.deepStrictEqual(
        progress.map((p) => p.progress),
        [0]
      );
      assert.deepStrictEqual(results, [
        {
          jobId: 'job-1',
          taskId: 'task-1',
          taskType: 'grow_optimizer',
          resultType: 'FAILED',
          logs: 'solver diverged',
        },
      ]);

      const errors = entries.filter((e) => e.level === 'error');
      assert.strictEqual(errors.length, 1);
      assert.strictEqual(errors[0]?.message, '[omotes:worker] Failure detected for task task-1');
    });

    it('fails the task on progress outside 0..1', async () => {
      const outcome = await executeWorkerTask(
        config(async (esdl, _params, updateProgress) => {
          await updateProgress(2, 'Too far');
          return esdl;
        }),
        { jobId: 'job-1', taskId: 'task-1', esdl: new Uint8Array(), params: {} }
      );
      await bus.drain();

      assert.deepStrictEqual(outcome, {
        resultType: 'FAILED',
        error: 'Progress must be between 0 and 1: 2',
      });
      assert.strictEqual(results[0]?.resultType, 'FAILED');
    });
  });

  describe('Worker', () => {
    it('runs tasks dispatched on its task queue', async () => {
      const worker = new Worker(config(async (esdl) => esdl.toUpperCase(), new MessageBusTaskRunner(bus)));

      await worker.start();
      assert.strictEqual(worker.getState(), 'running');

      await bus.publish(
        'tasks.grow_optimizer',
        workerTaskRequestCodec.encode({
          jobId: 'job-7',
          taskType: 'grow_optimizer',
          esdl: encoder.encode('<esdl/>'),
          params: {},
        })
      );
      await bus.drain();

      assert.strictEqual(results.length, 1);
      const result = results[0];
      assert.ok(result);
      assert.strictEqual(result.jobId, 'job-7');
      assert.strictEqual(decoder.decode(result.outputEsdl), '<ESDL/>');
      assert.match(result.taskId, /^[0-9a-f-]{36}$/);
      assert.ok(progress.every((p) => p.taskId === result.taskId));

      await worker.stop();
      assert.strictEqual(worker.getState(), 'stopped');
    });

    it('drops tasks of another task type', async () => {
      const taskFunction = mock.fn<WorkerTaskFunction>((esdl) => esdl);
      const worker = new Worker(config(taskFunction, new MessageBusTaskRunner(bus)));
      await worker.start();

      await bus.publish(
        'tasks.grow_optimizer',
        workerTaskRequestCodec.encode({
          jobId: 'job-8',
          taskType: 'simulator',
          esdl: new Uint8Array(),
          params: {},
        })
      );
      await bus.drain();

      assert.strictEqual(taskFunction.mock.callCount(), 0);
      assert.strictEqual(results.length, 0);
      assert.strictEqual(entries.filter((e) => e.level === 'error').length, 1);
      await worker.stop();
    });

    it('cannot be started twice', async () => {
      const worker = new Worker(config((esdl) => esdl));
      await worker.start();

      await assert.rejects(worker.start(), /Cannot start worker: current state is running/);
      await worker.stop();
    });

    it('returns to stopped when the runner fails to start', async () => {
      const failingRunner: TaskRunner = {
        start: async () => {
          throw new Error('queue unavailable');
        },
        stop: async () => {},
      };
      const worker = new Worker(config((esdl) => esdl, failingRunner));

      await assert.rejects(worker.start(), /queue unavailable/);
      assert.strictEqual(worker.getState(), 'stopped');
    });
  });
});
