/**
 * Worker - runs the tasks of one task type.
 *
 * A task runner hands task invocations to `executeWorkerTask`, which wraps the
 * task function with progress updates and publishes exactly one result per task.
 */

import { randomUUID } from 'node:crypto';

import { workerTaskRequestCodec, jobProgressUpdateCodec, jobResultCodec } from '../protocol/codec.js';
import type { JobResult, WireParams } from '../protocol/messages.js';
import { workerTaskQueueName } from '../queue-names.js';
import { logger } from '../utils/logger.js';
import type { MessageBus } from './message-bus.js';

const log = logger.child({ name: 'worker' });

/**
 * Report task progress.
 *
 * @param fraction - Progress between 0 and 1
 */
export type UpdateProgressHandler = (fraction: number, message: string) => Promise<void>;

/**
 * The computation of a task: takes the input document and job parameters and
 * returns the output document.
 */
export type WorkerTaskFunction = (
  esdl: string,
  params: Readonly<WireParams>,
  updateProgress: UpdateProgressHandler
) => string | Promise<string>;

/**
 * One execution of a task, as handed over by the task runner.
 */
export interface TaskInvocation {
  jobId: string;
  /** Execution id assigned by the task runner */
  taskId: string;
  esdl: Uint8Array;
  params: WireParams;
}

export type TaskOutcome =
  | { resultType: 'SUCCEEDED'; outputEsdl: string }
  | { resultType: 'FAILED'; error: string };

export type TaskExecutor = (invocation: TaskInvocation) => Promise<TaskOutcome>;

/**
 * Delivers task invocations of one task type to an executor.
 */
export interface TaskRunner {
  start(taskType: string, execute: TaskExecutor): Promise<void>;
  stop(): Promise<void>;
}

/**
 * Configuration for a worker, built once per process.
 */
export interface WorkerConfig {
  messageBus: MessageBus;
  /** Task type this worker runs; orchestrators dispatch tasks by this name */
  taskType: string;
  taskFunction: WorkerTaskFunction;
  taskRunner: TaskRunner;
  /** Queue to publish progress updates to */
  taskProgressQueueName: string;
  /** Queue to publish results to */
  taskResultQueueName: string;
}

function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

/**
 * Run one task invocation.
 *
 * Publishes progress 0 before and progress 1 after the task function, followed by a
 * `SUCCEEDED` result holding the output document. If anything fails, the failure is
 * logged and a `FAILED` result carrying the error message is published instead.
 */
export async function executeWorkerTask(
  config: WorkerConfig,
  invocation: TaskInvocation
): Promise<TaskOutcome> {
  const { messageBus, taskType } = config;
  const { jobId, taskId } = invocation;

  const updateProgress: UpdateProgressHandler = async (fraction, message) => {
    if (!(fraction >= 0 && fraction <= 1)) {
      throw new RangeError(`Progress must be between 0 and 1: ${String(fraction)}`);
    }
    log.debug(
      `Sending progress update. Progress ${String(fraction)} for job ${jobId} (task id ${taskId}) with message ${message}`
    );
    await messageBus.publish(
      config.taskProgressQueueName,
      jobProgressUpdateCodec.encode({ jobId, taskId, taskType, progress: fraction, message })
    );
  };

  const publishResult = async (result: JobResult): Promise<void> => {
    await messageBus.publish(config.taskResultQueueName, jobResultCodec.encode(result));
  };

  log.info(`Worker started new task ${jobId}`, { taskId, taskType });
  try {
    await updateProgress(0, 'Job calculation started');
    const inputEsdl = new TextDecoder().decode(invocation.esdl);
    const outputEsdl = await config.taskFunction(inputEsdl, invocation.params, updateProgress);
    await updateProgress(1, 'Calculation finished.');

    await publishResult({
      jobId,
      taskId,
      taskType,
      resultType: 'SUCCEEDED',
      outputEsdl: new TextEncoder().encode(outputEsdl),
      logs: '',
    });
    return { resultType: 'SUCCEEDED', outputEsdl };
  } catch (error) {
    const message = errorMessage(error);
    log.error(`Failure detected for task ${taskId}`, { jobId, taskType, error: message });

    await publishResult({ jobId, taskId, taskType, resultType: 'FAILED', logs: message });
    return { resultType: 'FAILED', error: message };
  }
}

/**
 * Task runner consuming `WorkerTaskRequest`s from the task type's queue
 * (`tasks.<task_type>`). Tasks run one at a time, each with a fresh task id.
 */
export class MessageBusTaskRunner implements TaskRunner {
  private readonly messageBus: MessageBus;
  private queueName: string | null = null;

  constructor(messageBus: MessageBus) {
    this.messageBus = messageBus;
  }

  async start(taskType: string, execute: TaskExecutor): Promise<void> {
    const queueName = workerTaskQueueName(taskType);
    await this.messageBus.subscribe(queueName, async (body) => {
      const request = workerTaskRequestCodec.decode(body);
      if (request.taskType !== taskType) {
        log.error(
          `Received a task (job id: ${request.jobId}) of type ${request.taskType} on queue ${queueName}. Dropping message.`
        );
        return;
      }
      const outcome = await execute({
        jobId: request.jobId,
        taskId: randomUUID(),
        esdl: request.esdl,
        params: request.params,
      });
      log.debug(`Task for job ${request.jobId} finished`, { resultType: outcome.resultType });
    });
    this.queueName = queueName;
  }

  async stop(): Promise<void> {
    if (this.queueName) {
      await this.messageBus.unsubscribe(this.queueName);
      this.queueName = null;
    }
  }
}

/**
 * Worker state.
 */
export type WorkerState = 'stopped' | 'starting' | 'running' | 'stopping';

/**
 * Worker for one task type.
 *
 * @example
 * ```typescript
 * const settings = loadWorkerSettings();
 * configureLogging({ level: settings.logLevel });
 * const worker = new Worker({
 *   messageBus,
 *   taskType: 'grow_optimizer',
 *   taskFunction: async (esdl, params, updateProgress) => {
 *     await updateProgress(0.5, 'Halfway');
 *     return esdl;
 *   },
 *   taskRunner: new MessageBusTaskRunner(messageBus),
 *   taskProgressQueueName: settings.taskProgressQueueName,
 *   taskResultQueueName: settings.taskResultQueueName,
 * });
 * await worker.start();
 * ```
 */
export class Worker {
  private readonly config: WorkerConfig;
  private state: WorkerState = 'stopped';

  constructor(config: WorkerConfig) {
    this.config = config;
  }

  /**
   * Get the current worker state.
   */
  getState(): WorkerState {
    return this.state;
  }

  async start(): Promise<void> {
    if (this.state !== 'stopped') {
      throw new Error(`Cannot start worker: current state is ${this.state}`);
    }

    this.state = 'starting';
    try {
      log.info(`Starting worker to work on task ${this.config.taskType}`);
      await this.config.messageBus.start();
      await this.config.taskRunner.start(this.config.taskType, (invocation) =>
        executeWorkerTask(this.config, invocation)
      );
      this.state = 'running';
      log.info('Worker is running');
    } catch (error) {
      this.state = 'stopped';
      log.error('Failed to start worker', { error: errorMessage(error) });
      throw error;
    }
  }

  async stop(): Promise<void> {
    if (this.state !== 'running') {
      log.warn(`Cannot stop worker: current state is ${this.state}`);
      return;
    }

    this.state = 'stopping';
    log.info('Stopping worker...');
    try {
      await this.config.taskRunner.stop();
      await this.config.messageBus.stop();
    } finally {
      this.state = 'stopped';
      log.info('Worker stopped');
    }
  }
}
