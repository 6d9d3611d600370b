/**
 * Job lifecycle example.
 *
 * Runs an orchestrator, a worker and a client in one process on the in-memory
 * message bus, submits a grow_optimizer job and prints its progress and result.
 *
 * Run with:
 *   npm run example:lifecycle
 *
 * Environment variables:
 *   WORKFLOW_SETTINGS_FILE - Workflow configuration (default: ./workflows.json)
 *   TASK_PROGRESS_QUEUE_NAME - Queue for worker progress events
 *   TASK_RESULT_QUEUE_NAME - Queue for worker results
 *   LOG_LEVEL - SDK log level (default: info)
 */

import 'dotenv/config';
import { fileURLToPath } from 'node:url';

import {
  InMemoryMessageBus,
  Job,
  MessageBusTaskRunner,
  OmotesInterface,
  OrchestratorInterface,
  Worker,
  WorkflowTypeManager,
  configureLogging,
  loadOrchestratorSettings,
  type JobResult,
} from '../../src/index.js';
import { growOptimizerTask } from './worker.js';

async function main() {
  const settings = loadOrchestratorSettings({
    WORKFLOW_SETTINGS_FILE: fileURLToPath(new URL('./workflows.json', import.meta.url)),
    ...process.env,
  });
  configureLogging({ file: 'omotes.log', level: settings.logLevel });
  const workflowTypeManager = await WorkflowTypeManager.fromJsonConfigFile(
    settings.workflowConfigFile
  );
  const messageBus = new InMemoryMessageBus();

  // Orchestrator: forward every job to the worker and relay its events
  const orchestrator = new OrchestratorInterface({
    messageBus,
    workflowTypeManager,
    taskProgressQueueName: settings.taskProgressQueueName,
    taskResultQueueName: settings.taskResultQueueName,
  });
  await orchestrator.start();

  const jobs = new Map<string, Job>();
  await orchestrator.listenForAvailableWorkflowsRequests();
  await orchestrator.listenForSubmissions(async (submission, job) => {
    jobs.set(job.id, job);
    await orchestrator.publishStatus(job, { jobId: job.id, status: 'ENQUEUED' });
    await orchestrator.dispatchTask(job, submission, job.workflowType.workflowTypeName);
    await orchestrator.publishStatus(job, { jobId: job.id, status: 'RUNNING' });
  });
  await orchestrator.listenForTaskProgress(async (update) => {
    const job = jobs.get(update.jobId);
    if (job) {
      await orchestrator.publishProgress(job, update);
    }
  });
  await orchestrator.listenForTaskResults(async (result) => {
    const job = jobs.get(result.jobId);
    if (job) {
      await orchestrator.publishStatus(job, { jobId: job.id, status: 'FINISHED' });
      await orchestrator.publishResult(job, result);
      jobs.delete(job.id);
    }
  });

  // Worker for the grow_optimizer task type
  const worker = new Worker({
    messageBus,
    taskType: 'grow_optimizer',
    taskFunction: growOptimizerTask,
    taskRunner: new MessageBusTaskRunner(messageBus),
    taskProgressQueueName: settings.taskProgressQueueName,
    taskResultQueueName: settings.taskResultQueueName,
  });
  await worker.start();

  // Client: discover the workflows and submit a job
  const omotes = new OmotesInterface({ messageBus });
  await omotes.connectToAvailableWorkflows((manager) => {
    const names = manager.getAllWorkflows().map((w) => w.workflowTypeName);
    console.log(`Available workflows: ${names.join(', ')}`);
  });
  await omotes.requestAvailableWorkflows();
  await messageBus.drain();

  const workflowType = omotes.getWorkflowTypeManager().getWorkflowByName('grow_optimizer');
  if (!workflowType) {
    throw new Error('grow_optimizer is not available');
  }

  try {
    const result = await new Promise<JobResult>((resolve, reject) => {
      omotes
        .submit({
          esdl: '<esdl:EnergySystem name="example"/>',
          params: { horizon: 4, solver: 'gurobi' },
          workflowType,
          callbacks: {
            onFinished: (_job, jobResult) => {
              resolve(jobResult);
            },
            onProgressUpdate: (_job, update) => {
              console.log(`Progress ${String(Math.round(update.progress * 100))}%: ${update.message}`);
            },
            onStatusUpdate: (_job, update) => {
              console.log(`Status: ${update.status}`);
            },
          },
        })
        .then((job) => {
          console.log(`Submitted job ${job.id}`);
        })
        .catch(reject);
    });

    console.log(`Result: ${result.resultType}`);
    console.log(new TextDecoder().decode(result.outputEsdl));
  } finally {
    await worker.stop();
  }
}

main().catch(console.error);
