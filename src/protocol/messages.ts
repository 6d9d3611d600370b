/**
 * Wire messages exchanged between the SDK, the orchestrator and workers.
 *
 * Each message kind has a Zod schema. Decoded payloads are validated against it
 * before any handler sees them.
 */

import { z } from 'zod';

// ── Scalars ─────────────────────────────────────────────────────────────

/** Values a parameter can take on the wire. */
export const wireValueSchema = z.union([z.string(), z.boolean(), z.number()]);
export type WireValue = z.infer<typeof wireValueSchema>;

/** Job configuration as sent on the wire, keyed by parameter key name. */
export const wireParamsSchema = z.record(wireValueSchema);
export type WireParams = z.infer<typeof wireParamsSchema>;

const bytesSchema = z.custom<Uint8Array>((value) => value instanceof Uint8Array, {
  message: 'Expected bytes',
});

// ── Workflow catalog ────────────────────────────────────────────────────

export const stringEnumMessageSchema = z.object({
  keyName: z.string(),
  displayName: z.string(),
});
export type StringEnumMessage = z.infer<typeof stringEnumMessageSchema>;

export const stringParameterMessageSchema = z.object({
  default: z.string().optional(),
  enumOptions: z.array(stringEnumMessageSchema),
});
export type StringParameterMessage = z.infer<typeof stringParameterMessageSchema>;

export const booleanParameterMessageSchema = z.object({
  default: z.boolean().optional(),
});
export type BooleanParameterMessage = z.infer<typeof booleanParameterMessageSchema>;

export const integerParameterMessageSchema = z.object({
  default: z.number().int().optional(),
  minimum: z.number().int().optional(),
  maximum: z.number().int().optional(),
});
export type IntegerParameterMessage = z.infer<typeof integerParameterMessageSchema>;

export const floatParameterMessageSchema = z.object({
  default: z.number().optional(),
  minimum: z.number().optional(),
  maximum: z.number().optional(),
});
export type FloatParameterMessage = z.infer<typeof floatParameterMessageSchema>;

export const dateTimeParameterMessageSchema = z.object({
  /** ISO-8601 string */
  default: z.string().optional(),
});
export type DateTimeParameterMessage = z.infer<typeof dateTimeParameterMessageSchema>;

/**
 * The parameter-type oneof. Exactly one case is populated per parameter.
 */
export const parameterTypeMessageSchema = z.discriminatedUnion('case', [
  z.object({ case: z.literal('stringParameter'), value: stringParameterMessageSchema }),
  z.object({ case: z.literal('booleanParameter'), value: booleanParameterMessageSchema }),
  z.object({ case: z.literal('integerParameter'), value: integerParameterMessageSchema }),
  z.object({ case: z.literal('floatParameter'), value: floatParameterMessageSchema }),
  z.object({ case: z.literal('datetimeParameter'), value: dateTimeParameterMessageSchema }),
]);
export type ParameterTypeMessage = z.infer<typeof parameterTypeMessageSchema>;
export type ParameterTypeCase = ParameterTypeMessage['case'];

export const workflowParameterMessageSchema = z.object({
  keyName: z.string(),
  title: z.string().optional(),
  description: z.string().optional(),
  parameterType: parameterTypeMessageSchema,
});
export type WorkflowParameterMessage = z.infer<typeof workflowParameterMessageSchema>;

export const workflowMessageSchema = z.object({
  typeName: z.string(),
  typeDescription: z.string(),
  parameters: z.array(workflowParameterMessageSchema),
});
export type WorkflowMessage = z.infer<typeof workflowMessageSchema>;

export const availableWorkflowsSchema = z.object({
  workflows: z.array(workflowMessageSchema),
});
export type AvailableWorkflows = z.infer<typeof availableWorkflowsSchema>;

export const requestAvailableWorkflowsSchema = z.object({});
export type RequestAvailableWorkflows = z.infer<typeof requestAvailableWorkflowsSchema>;

// ── Job lifecycle ───────────────────────────────────────────────────────

export const jobSubmissionSchema = z.object({
  uuid: z.string(),
  timeoutMs: z.number().int().nonnegative().optional(),
  workflowType: z.string(),
  esdl: bytesSchema,
  params: wireParamsSchema,
});
export type JobSubmission = z.infer<typeof jobSubmissionSchema>;

export const jobCancelSchema = z.object({
  uuid: z.string(),
});
export type JobCancel = z.infer<typeof jobCancelSchema>;

export const jobProgressUpdateSchema = z.object({
  jobId: z.string(),
  taskId: z.string(),
  taskType: z.string(),
  progress: z.number().min(0).max(1),
  message: z.string(),
});
export type JobProgressUpdate = z.infer<typeof jobProgressUpdateSchema>;

export const JOB_STATUSES = ['REGISTERED', 'ENQUEUED', 'RUNNING', 'FINISHED', 'CANCELLED'] as const;
export const jobStatusSchema = z.enum(JOB_STATUSES);
export type JobStatus = z.infer<typeof jobStatusSchema>;

export const jobStatusUpdateSchema = z.object({
  jobId: z.string(),
  status: jobStatusSchema,
});
export type JobStatusUpdate = z.infer<typeof jobStatusUpdateSchema>;

export const resultTypeSchema = z.enum(['SUCCEEDED', 'FAILED']);
export type ResultType = z.infer<typeof resultTypeSchema>;

export const jobResultSchema = z.object({
  jobId: z.string(),
  taskId: z.string(),
  taskType: z.string(),
  resultType: resultTypeSchema,
  outputEsdl: bytesSchema.optional(),
  logs: z.string(),
});
export type JobResult = z.infer<typeof jobResultSchema>;

// ── Orchestrator → worker ───────────────────────────────────────────────

export const workerTaskRequestSchema = z.object({
  jobId: z.string(),
  taskType: z.string(),
  esdl: bytesSchema,
  params: wireParamsSchema,
});
export type WorkerTaskRequest = z.infer<typeof workerTaskRequestSchema>;
