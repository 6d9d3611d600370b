/**
 * Settings for orchestrator and worker processes, read from the environment.
 */

import { parseLogLevel, type LogLevel } from './utils/logger.js';

export const DEFAULT_TASK_PROGRESS_QUEUE_NAME = 'omotes_task_progress_events';
export const DEFAULT_TASK_RESULT_QUEUE_NAME = 'omotes_task_result_events';

type Env = Readonly<Record<string, string | undefined>>;

export interface WorkerSettings {
  /** Queue workers publish task progress to */
  taskProgressQueueName: string;
  /** Queue workers publish task results to */
  taskResultQueueName: string;
  logLevel: LogLevel;
}

export interface OrchestratorSettings {
  taskProgressQueueName: string;
  taskResultQueueName: string;
  /** Path of the JSON workflow configuration */
  workflowConfigFile: string;
  logLevel: LogLevel;
}

function nonEmpty(value: string | undefined): string | undefined {
  return value && value.trim() !== '' ? value : undefined;
}

/**
 * Read worker settings.
 *
 * - `TASK_PROGRESS_QUEUE_NAME` (default `omotes_task_progress_events`)
 * - `TASK_RESULT_QUEUE_NAME` (default `omotes_task_result_events`)
 * - `LOG_LEVEL` (default `info`)
 */
export function loadWorkerSettings(env: Env = process.env): WorkerSettings {
  return {
    taskProgressQueueName:
      nonEmpty(env['TASK_PROGRESS_QUEUE_NAME']) ?? DEFAULT_TASK_PROGRESS_QUEUE_NAME,
    taskResultQueueName: nonEmpty(env['TASK_RESULT_QUEUE_NAME']) ?? DEFAULT_TASK_RESULT_QUEUE_NAME,
    logLevel: parseLogLevel(env['LOG_LEVEL']),
  };
}

/**
 * Read orchestrator settings. Takes the worker queue names plus
 * `WORKFLOW_SETTINGS_FILE`, which is required.
 */
export function loadOrchestratorSettings(env: Env = process.env): OrchestratorSettings {
  const workflowConfigFile = nonEmpty(env['WORKFLOW_SETTINGS_FILE']);
  if (!workflowConfigFile) {
    throw new Error('WORKFLOW_SETTINGS_FILE must be set to the path of the workflow configuration');
  }
  const { taskProgressQueueName, taskResultQueueName, logLevel } = loadWorkerSettings(env);
  return { taskProgressQueueName, taskResultQueueName, workflowConfigFile, logLevel };
}
