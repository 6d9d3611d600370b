/**
 * Job - handle for one submitted job.
 *
 * A handle is created at submission and never changes. Clients that want to
 * reconnect after a restart record `toDict()` durably and rebuild the handle with
 * `Job.fromDict()`.
 */

import { randomUUID } from 'node:crypto';

import type { WorkflowType, WorkflowTypeManager } from './core/workflow-type.js';
import { WorkflowTypeNotFoundError } from './errors.js';

/**
 * Serializable form of a job handle.
 */
export interface JobDict {
  id: string;
  workflowTypeName: string;
}

export class Job {
  /** Job ID, generated at submission */
  readonly id: string;
  /** Workflow type the job runs */
  readonly workflowType: WorkflowType;

  constructor(id: string, workflowType: WorkflowType) {
    this.id = id;
    this.workflowType = workflowType;
    Object.freeze(this);
  }

  /**
   * Create a handle with a freshly generated id.
   */
  static create(workflowType: WorkflowType): Job {
    return new Job(randomUUID(), workflowType);
  }

  toDict(): JobDict {
    return { id: this.id, workflowTypeName: this.workflowType.workflowTypeName };
  }

  /**
   * Rebuild a handle recorded with `toDict()`.
   *
   * @throws WorkflowTypeNotFoundError if the registry does not know the workflow type
   */
  static fromDict(dict: JobDict, workflowTypeManager: WorkflowTypeManager): Job {
    const workflowType = workflowTypeManager.getWorkflowByName(dict.workflowTypeName);
    if (!workflowType) {
      throw new WorkflowTypeNotFoundError(dict.workflowTypeName);
    }
    return new Job(dict.id, workflowType);
  }
}
