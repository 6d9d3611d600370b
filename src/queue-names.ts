/**
 * Names of the queues jobs travel through. Identifiers are used verbatim.
 */

import type { WorkflowType } from './core/workflow-type.js';
import type { Job } from './job.js';

/** Queue the orchestrator consumes submissions of one workflow type from. */
export function jobSubmissionQueueName(workflowType: WorkflowType): string {
  return `job_submissions.${workflowType.workflowTypeName}`;
}

export function jobResultsQueueName(job: Job): string {
  return `jobs.${job.id}.result`;
}

export function jobProgressQueueName(job: Job): string {
  return `jobs.${job.id}.progress`;
}

export function jobStatusQueueName(job: Job): string {
  return `jobs.${job.id}.status`;
}

/** Shared by all workflow types. */
export function jobCancelQueueName(): string {
  return 'job_cancellations';
}

/** Catalog broadcasts from the orchestrator. */
export function availableWorkflowsQueueName(): string {
  return 'available_workflows';
}

export function requestAvailableWorkflowsQueueName(): string {
  return 'request_available_workflows';
}

/** Queue the workers of one task type consume task requests from. */
export function workerTaskQueueName(taskType: string): string {
  return `tasks.${taskType}`;
}
