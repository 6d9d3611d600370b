/**
 * OrchestratorInterface - orchestrator-side session.
 *
 * Receives job submissions and cancellations from clients, reports progress, status
 * and results back to them, and hands tasks to workers.
 */

import type { WorkflowType, WorkflowTypeManager } from '../core/workflow-type.js';
import { DEFAULT_TASK_PROGRESS_QUEUE_NAME, DEFAULT_TASK_RESULT_QUEUE_NAME } from '../config.js';
import { Job } from '../job.js';
import {
  availableWorkflowsCodec,
  jobCancelCodec,
  jobProgressUpdateCodec,
  jobResultCodec,
  jobStatusUpdateCodec,
  jobSubmissionCodec,
  requestAvailableWorkflowsCodec,
  workerTaskRequestCodec,
} from '../protocol/codec.js';
import type {
  JobCancel,
  JobProgressUpdate,
  JobResult,
  JobStatusUpdate,
  JobSubmission,
} from '../protocol/messages.js';
import {
  availableWorkflowsQueueName,
  jobCancelQueueName,
  jobProgressQueueName,
  jobResultsQueueName,
  jobStatusQueueName,
  jobSubmissionQueueName,
  requestAvailableWorkflowsQueueName,
  workerTaskQueueName,
} from '../queue-names.js';
import { logger } from '../utils/logger.js';
import type { MessageBus } from './message-bus.js';

const log = logger.child({ name: 'orchestrator' });

export type NewJobHandler = (submission: JobSubmission, job: Job) => void | Promise<void>;
export type CancelJobHandler = (cancel: JobCancel) => void | Promise<void>;
export type TaskProgressHandler = (update: JobProgressUpdate) => void | Promise<void>;
export type TaskResultHandler = (result: JobResult) => void | Promise<void>;

export interface OrchestratorInterfaceConfig {
  messageBus: MessageBus;
  /** Workflow types this orchestrator accepts jobs for */
  workflowTypeManager: WorkflowTypeManager;
  /** Queue workers publish task progress to (default: omotes_task_progress_events) */
  taskProgressQueueName?: string | undefined;
  /** Queue workers publish task results to (default: omotes_task_result_events) */
  taskResultQueueName?: string | undefined;
}

export class OrchestratorInterface {
  private readonly messageBus: MessageBus;
  private readonly workflowTypeManager: WorkflowTypeManager;
  private readonly taskProgressQueueName: string;
  private readonly taskResultQueueName: string;

  constructor(config: OrchestratorInterfaceConfig) {
    this.messageBus = config.messageBus;
    this.workflowTypeManager = config.workflowTypeManager;
    this.taskProgressQueueName = config.taskProgressQueueName ?? DEFAULT_TASK_PROGRESS_QUEUE_NAME;
    this.taskResultQueueName = config.taskResultQueueName ?? DEFAULT_TASK_RESULT_QUEUE_NAME;
  }

  async start(): Promise<void> {
    await this.messageBus.start();
    log.info('Orchestrator session started');
  }

  async stop(): Promise<void> {
    await this.messageBus.stop();
    log.info('Orchestrator session stopped');
  }

  /**
   * Consume the submission queue of every known workflow type.
   *
   * A submission found on the queue of another workflow type is dropped with an error
   * log; it is not forwarded to its own queue.
   */
  async listenForSubmissions(onNewJob: NewJobHandler): Promise<void> {
    for (const workflowType of this.workflowTypeManager.getAllWorkflows()) {
      await this.messageBus.subscribe(jobSubmissionQueueName(workflowType), async (body) => {
        await this.handleSubmission(workflowType, body, onNewJob);
      });
      log.debug(`Listening for submissions of ${workflowType.workflowTypeName}`);
    }
  }

  private async handleSubmission(
    workflowType: WorkflowType,
    body: Uint8Array,
    onNewJob: NewJobHandler
  ): Promise<void> {
    const submission = jobSubmissionCodec.decode(body);
    if (submission.workflowType !== workflowType.workflowTypeName) {
      log.error(
        `Received a job submission (id: ${submission.uuid}) that was meant for workflow type ${submission.workflowType} but found it on queue ${jobSubmissionQueueName(workflowType)}. Dropping message.`
      );
      return;
    }
    await onNewJob(submission, new Job(submission.uuid, workflowType));
  }

  /**
   * Consume the shared cancellation queue. Cancellations are not checked against
   * workflow types.
   */
  async listenForCancellations(onCancel: CancelJobHandler): Promise<void> {
    await this.messageBus.subscribe(jobCancelQueueName(), async (body) => {
      await onCancel(jobCancelCodec.decode(body));
    });
  }

  async publishProgress(job: Job, update: JobProgressUpdate): Promise<void> {
    await this.messageBus.publish(jobProgressQueueName(job), jobProgressUpdateCodec.encode(update));
  }

  async publishStatus(job: Job, update: JobStatusUpdate): Promise<void> {
    await this.messageBus.publish(jobStatusQueueName(job), jobStatusUpdateCodec.encode(update));
    log.debug('Published job status', { jobId: job.id, status: update.status });
  }

  async publishResult(job: Job, result: JobResult): Promise<void> {
    await this.messageBus.publish(jobResultsQueueName(job), jobResultCodec.encode(result));
    log.info('Published job result', { jobId: job.id, resultType: result.resultType });
  }

  /**
   * Broadcast the catalog of workflow types to clients.
   */
  async publishAvailableWorkflows(): Promise<void> {
    await this.messageBus.publish(
      availableWorkflowsQueueName(),
      availableWorkflowsCodec.encode(this.workflowTypeManager.toWireCatalog())
    );
  }

  /**
   * Answer every catalog request with a broadcast of the catalog.
   */
  async listenForAvailableWorkflowsRequests(): Promise<void> {
    await this.messageBus.subscribe(requestAvailableWorkflowsQueueName(), async (body) => {
      requestAvailableWorkflowsCodec.decode(body);
      await this.publishAvailableWorkflows();
    });
  }

  /**
   * Hand the computation of a job to the workers of a task type.
   */
  async dispatchTask(job: Job, submission: JobSubmission, taskType: string): Promise<void> {
    await this.messageBus.publish(
      workerTaskQueueName(taskType),
      workerTaskRequestCodec.encode({
        jobId: job.id,
        taskType,
        esdl: submission.esdl,
        params: submission.params,
      })
    );
    log.info('Dispatched task', { jobId: job.id, taskType });
  }

  async listenForTaskProgress(onProgress: TaskProgressHandler): Promise<void> {
    await this.messageBus.subscribe(this.taskProgressQueueName, async (body) => {
      await onProgress(jobProgressUpdateCodec.decode(body));
    });
  }

  async listenForTaskResults(onResult: TaskResultHandler): Promise<void> {
    await this.messageBus.subscribe(this.taskResultQueueName, async (body) => {
      await onResult(jobResultCodec.decode(body));
    });
  }
}
