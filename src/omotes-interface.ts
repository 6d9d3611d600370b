/**
 * OmotesInterface - client-side session for submitting and following jobs.
 *
 * The session submits jobs to the orchestrator and delivers their progress, status
 * and result to callbacks. It keeps no job list of its own: applications that
 * want to follow jobs across restarts record the `Job` handle and call `reconnect()`.
 */

import { convertParamsDictToWire } from './core/params.js';
import type { ParamsDict } from './core/parameters.js';
import { WorkflowTypeManager, type WorkflowType } from './core/workflow-type.js';
import { Job } from './job.js';
import {
  availableWorkflowsCodec,
  jobCancelCodec,
  jobProgressUpdateCodec,
  jobResultCodec,
  jobStatusUpdateCodec,
  jobSubmissionCodec,
  requestAvailableWorkflowsCodec,
} from './protocol/codec.js';
import type {
  JobProgressUpdate,
  JobResult,
  JobStatusUpdate,
  JobSubmission,
} from './protocol/messages.js';
import {
  availableWorkflowsQueueName,
  jobCancelQueueName,
  jobProgressQueueName,
  jobResultsQueueName,
  jobStatusQueueName,
  jobSubmissionQueueName,
  requestAvailableWorkflowsQueueName,
} from './queue-names.js';
import type { MessageBus } from './runtime/message-bus.js';
import { logger } from './utils/logger.js';

const log = logger.child({ name: 'client' });

/**
 * Callbacks for one job. Only `onFinished` is required.
 */
export interface JobCallbacks {
  /** Called once with the job result */
  onFinished: (job: Job, result: JobResult) => void | Promise<void>;
  /** Called for every progress update */
  onProgressUpdate?: ((job: Job, update: JobProgressUpdate) => void | Promise<void>) | undefined;
  /** Called for every status update */
  onStatusUpdate?: ((job: Job, update: JobStatusUpdate) => void | Promise<void>) | undefined;
}

/**
 * Options for submitting a job.
 */
export interface SubmitJobOptions {
  /** Input document (ESDL); strings are sent UTF-8 encoded */
  esdl: string | Uint8Array;
  /** Values for the parameters the workflow declares */
  params: ParamsDict;
  workflowType: WorkflowType;
  /** How long the job may run before the orchestrator considers it timed out */
  jobTimeoutMs?: number | undefined;
  callbacks: JobCallbacks;
  /** Disconnect from the job after `onFinished` completed (default: true) */
  autoDisconnect?: boolean | undefined;
}

export interface OmotesInterfaceConfig {
  messageBus: MessageBus;
  /** Known workflow types (default: empty until a catalog is received) */
  workflowTypeManager?: WorkflowTypeManager | undefined;
}

/**
 * Client-side session.
 *
 * @example
 * ```typescript
 * const omotes = new OmotesInterface({ messageBus });
 * await omotes.start();
 *
 * const job = await omotes.submit({
 *   esdl,
 *   params: { horizon: 10 },
 *   workflowType,
 *   callbacks: {
 *     onFinished: (job, result) => console.log(job.id, result.resultType),
 *   },
 * });
 * ```
 */
export class OmotesInterface {
  private readonly messageBus: MessageBus;
  private workflowTypeManager: WorkflowTypeManager;

  constructor(config: OmotesInterfaceConfig) {
    this.messageBus = config.messageBus;
    this.workflowTypeManager = config.workflowTypeManager ?? new WorkflowTypeManager([]);
  }

  async start(): Promise<void> {
    await this.messageBus.start();
    log.info('Client session started');
  }

  async stop(): Promise<void> {
    await this.messageBus.stop();
    log.info('Client session stopped');
  }

  /**
   * Submit a new job and follow its progress, status and result.
   *
   * The job's queues are subscribed before the submission is published, so no update
   * sent by a fast orchestrator is missed.
   *
   * @returns The job handle. Record it durably to `reconnect()` after a restart.
   * @throws MissingFieldException if a declared parameter has no value
   * @throws WrongFieldTypeException if a parameter value has the wrong kind
   */
  async submit(options: SubmitJobOptions): Promise<Job> {
    const { workflowType, jobTimeoutMs } = options;
    const params = convertParamsDictToWire(workflowType, options.params);
    const job = Job.create(workflowType);

    await this.reconnect(job, options.callbacks, options.autoDisconnect);

    const submission: JobSubmission = {
      uuid: job.id,
      workflowType: workflowType.workflowTypeName,
      esdl: typeof options.esdl === 'string' ? new TextEncoder().encode(options.esdl) : options.esdl,
      params,
      ...(jobTimeoutMs !== undefined ? { timeoutMs: Math.round(jobTimeoutMs) } : {}),
    };
    try {
      await this.messageBus.publish(
        jobSubmissionQueueName(workflowType),
        jobSubmissionCodec.encode(submission)
      );
    } catch (error) {
      await this.disconnect(job);
      throw error;
    }

    log.info('Submitted job', { jobId: job.id, workflowTypeName: workflowType.workflowTypeName });
    return job;
  }

  /**
   * Follow a job that was submitted earlier, without submitting it again.
   *
   * Either all three of the job's queues are consumed afterwards or, if one of them
   * cannot be, none of the consumers added by this call remain.
   */
  async reconnect(job: Job, callbacks: JobCallbacks, autoDisconnect = true): Promise<void> {
    const connected: string[] = [];
    try {
      const resultQueue = jobResultsQueueName(job);
      await this.messageBus.receiveOnce(resultQueue, undefined, async (body) => {
        const result = jobResultCodec.decode(body);
        await callbacks.onFinished(job, result);
        if (autoDisconnect) {
          await this.disconnect(job);
        }
      });
      connected.push(resultQueue);

      const progressQueue = jobProgressQueueName(job);
      await this.messageBus.subscribe(progressQueue, async (body) => {
        const update = jobProgressUpdateCodec.decode(body);
        await callbacks.onProgressUpdate?.(job, update);
      });
      connected.push(progressQueue);

      const statusQueue = jobStatusQueueName(job);
      await this.messageBus.subscribe(statusQueue, async (body) => {
        const update = jobStatusUpdateCodec.decode(body);
        await callbacks.onStatusUpdate?.(job, update);
      });
      connected.push(statusQueue);
    } catch (error) {
      for (const queueName of connected) {
        await this.messageBus.unsubscribe(queueName);
      }
      log.error('Could not connect to job', {
        jobId: job.id,
        error: error instanceof Error ? error.message : String(error),
      });
      throw error;
    }

    log.debug('Connected to job', { jobId: job.id });
  }

  /**
   * Stop following a job. Safe to call more than once and from inside a callback.
   */
  async disconnect(job: Job): Promise<void> {
    await this.messageBus.unsubscribe(jobResultsQueueName(job));
    await this.messageBus.unsubscribe(jobProgressQueueName(job));
    await this.messageBus.unsubscribe(jobStatusQueueName(job));
    log.debug('Disconnected from job', { jobId: job.id });
  }

  /**
   * Ask the orchestrator to cancel a job. The outcome arrives as a status update on
   * the job's status queue, so the job stays connected.
   */
  async cancel(job: Job): Promise<void> {
    await this.messageBus.publish(jobCancelQueueName(), jobCancelCodec.encode({ uuid: job.id }));
    log.info('Requested job cancellation', { jobId: job.id });
  }

  /**
   * Ask the orchestrator to broadcast its workflow catalog.
   */
  async requestAvailableWorkflows(): Promise<void> {
    await this.messageBus.publish(
      requestAvailableWorkflowsQueueName(),
      requestAvailableWorkflowsCodec.encode({})
    );
  }

  /**
   * Replace the known workflow types with every catalog the orchestrator broadcasts.
   */
  async connectToAvailableWorkflows(
    onUpdate?: (workflowTypeManager: WorkflowTypeManager) => void | Promise<void>
  ): Promise<void> {
    await this.messageBus.subscribe(availableWorkflowsQueueName(), async (body) => {
      const catalog = availableWorkflowsCodec.decode(body);
      this.workflowTypeManager = WorkflowTypeManager.fromWireCatalog(catalog);
      log.info(`Received ${String(catalog.workflows.length)} available workflow(s)`);
      await onUpdate?.(this.workflowTypeManager);
    });
  }

  getWorkflowTypeManager(): WorkflowTypeManager {
    return this.workflowTypeManager;
  }
}
