/**
 * Workflow types and the registry of workflow types known to a session.
 *
 * A registry is built from the JSON workflow configuration (orchestrator side) or from
 * the catalog broadcast on the bus (client side).
 */

import { readFile } from 'node:fs/promises';
import { z, type ZodIssue } from 'zod';

import { MissingFieldException, WrongFieldTypeException } from '../errors.js';
import type { AvailableWorkflows, WorkflowMessage } from '../protocol/messages.js';
import { logger } from '../utils/logger.js';
import {
  isParameterTypeName,
  parameterFromJsonConfig,
  parameterFromWireMessage,
  parameterToWireMessage,
  type WorkflowParameter,
} from './parameters.js';

const log = logger.child({ name: 'workflows' });

export interface WorkflowTypeOptions {
  /** Technical name of the workflow, unique within a registry */
  workflowTypeName: string;
  /** Human-readable name of the workflow */
  workflowTypeDescriptionName: string;
  /** Parameters the workflow takes besides its input document, in order */
  workflowParameters?: readonly WorkflowParameter[] | undefined;
}

/**
 * A kind of computation the system can run. Identity is the name alone.
 */
export class WorkflowType {
  readonly workflowTypeName: string;
  readonly workflowTypeDescriptionName: string;
  readonly workflowParameters: readonly WorkflowParameter[] | undefined;

  constructor(options: WorkflowTypeOptions) {
    this.workflowTypeName = options.workflowTypeName;
    this.workflowTypeDescriptionName = options.workflowTypeDescriptionName;
    this.workflowParameters = options.workflowParameters
      ? Object.freeze([...options.workflowParameters])
      : undefined;
    Object.freeze(this);
  }

  equals(other: WorkflowType): boolean {
    return this.workflowTypeName === other.workflowTypeName;
  }

  /** Key for maps and sets; equal workflow types share a key. */
  hashKey(): string {
    return this.workflowTypeName;
  }
}

// ── JSON configuration shape ────────────────────────────────────────────

const parameterConfigSchema = z
  .object({
    parameter_type: z.string(),
  })
  .passthrough();

const workflowConfigSchema = z.object({
  workflow_type_name: z.string(),
  workflow_type_description_name: z.string(),
  workflow_parameters: z.array(parameterConfigSchema).optional(),
});

const workflowConfigFileSchema = z.array(workflowConfigSchema);

function isMissingValue(issue: ZodIssue): boolean {
  return issue.code === 'invalid_type' && issue.received === 'undefined';
}

function describeIssues(issues: ZodIssue[]): string {
  return issues
    .map((issue) => {
      const path = issue.path.join('.');
      return path ? `${path}: ${issue.message}` : issue.message;
    })
    .join('; ');
}

/**
 * Container for all workflow types a session knows, keyed by name.
 */
export class WorkflowTypeManager {
  private readonly workflows: Map<string, WorkflowType>;

  constructor(possibleWorkflows: readonly WorkflowType[]) {
    this.workflows = new Map(
      possibleWorkflows.map((workflow) => [workflow.workflowTypeName, workflow])
    );
  }

  getWorkflowByName(name: string): WorkflowType | undefined {
    return this.workflows.get(name);
  }

  getAllWorkflows(): WorkflowType[] {
    return Array.from(this.workflows.values());
  }

  workflowExists(workflow: WorkflowType | string): boolean {
    const name = typeof workflow === 'string' ? workflow : workflow.workflowTypeName;
    return this.workflows.has(name);
  }

  /**
   * Build the catalog message broadcast to clients.
   */
  toWireCatalog(): AvailableWorkflows {
    return {
      workflows: this.getAllWorkflows().map(
        (workflow): WorkflowMessage => ({
          typeName: workflow.workflowTypeName,
          typeDescription: workflow.workflowTypeDescriptionName,
          parameters: (workflow.workflowParameters ?? []).map(parameterToWireMessage),
        })
      ),
    };
  }

  /**
   * Rebuild a registry from a received catalog message.
   */
  static fromWireCatalog(catalog: AvailableWorkflows): WorkflowTypeManager {
    return new WorkflowTypeManager(
      catalog.workflows.map(
        (workflow) =>
          new WorkflowType({
            workflowTypeName: workflow.typeName,
            workflowTypeDescriptionName: workflow.typeDescription,
            workflowParameters: workflow.parameters.map(parameterFromWireMessage),
          })
      )
    );
  }

  /**
   * Build a registry from the parsed JSON workflow configuration: an ordered list of
   * `{ workflow_type_name, workflow_type_description_name, workflow_parameters? }`.
   *
   * @throws MissingFieldException if a required field is absent
   * @throws WrongFieldTypeException if a field holds a value of the wrong kind
   */
  static fromJsonConfig(json: unknown): WorkflowTypeManager {
    const result = workflowConfigFileSchema.safeParse(json);
    if (!result.success) {
      const issues = result.error.issues;
      const message = `Invalid workflow configuration: ${describeIssues(issues)}`;
      if (issues.every(isMissingValue)) {
        throw new MissingFieldException(message);
      }
      throw new WrongFieldTypeException(message);
    }

    const workflowTypes = result.data.map((workflowConfig) => {
      const workflowParameters: WorkflowParameter[] = [];
      for (const parameterConfig of workflowConfig.workflow_parameters ?? []) {
        const { parameter_type: parameterType, ...fragment } = parameterConfig;
        if (!isParameterTypeName(parameterType)) {
          log.debug(`Skipping parameter with unknown parameter_type '${parameterType}'`, {
            workflowTypeName: workflowConfig.workflow_type_name,
          });
          continue;
        }
        workflowParameters.push(parameterFromJsonConfig(parameterType, fragment));
      }

      return new WorkflowType({
        workflowTypeName: workflowConfig.workflow_type_name,
        workflowTypeDescriptionName: workflowConfig.workflow_type_description_name,
        workflowParameters,
      });
    });

    return new WorkflowTypeManager(workflowTypes);
  }

  /**
   * Read and parse a JSON workflow configuration file.
   */
  static async fromJsonConfigFile(path: string | URL): Promise<WorkflowTypeManager> {
    const contents = await readFile(path, 'utf-8');
    const json: unknown = JSON.parse(contents);
    return WorkflowTypeManager.fromJsonConfig(json);
  }
}
