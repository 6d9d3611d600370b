/**
 * Byte codecs for wire messages.
 *
 * Messages travel as UTF-8 JSON (see `utils/serializer`). Decoding validates the
 * payload against the message schema and fails the whole message on any issue.
 */

import type { ZodIssue, ZodType } from 'zod';
import { MessageDecodeError } from '../errors.js';
import { serializeToBytes, deserializeFromBytes } from '../utils/serializer.js';
import {
  availableWorkflowsSchema,
  jobCancelSchema,
  jobProgressUpdateSchema,
  jobResultSchema,
  jobStatusUpdateSchema,
  jobSubmissionSchema,
  requestAvailableWorkflowsSchema,
  workerTaskRequestSchema,
  type AvailableWorkflows,
  type JobCancel,
  type JobProgressUpdate,
  type JobResult,
  type JobStatusUpdate,
  type JobSubmission,
  type RequestAvailableWorkflows,
  type WorkerTaskRequest,
} from './messages.js';

/**
 * Encodes one kind of message to bytes and back.
 */
export interface MessageCodec<T> {
  /** Message kind, used in error messages */
  readonly messageType: string;
  encode(message: T): Uint8Array;
  /**
   * @throws MessageDecodeError if the bytes do not hold a valid message of this kind
   */
  decode(bytes: Uint8Array): T;
}

function formatIssues(issues: ZodIssue[]): string {
  return issues
    .map((issue) => {
      const path = issue.path.join('.');
      return path ? `${path}: ${issue.message}` : issue.message;
    })
    .join('; ');
}

/**
 * Create a JSON codec validated by a Zod schema.
 */
export function createJsonCodec<T>(messageType: string, schema: ZodType<T>): MessageCodec<T> {
  return {
    messageType,

    encode(message: T): Uint8Array {
      return serializeToBytes(message);
    },

    decode(bytes: Uint8Array): T {
      let payload: unknown;
      try {
        payload = deserializeFromBytes(bytes);
      } catch (error) {
        throw new MessageDecodeError(messageType, 'payload is not valid UTF-8 JSON', {
          cause: error,
        });
      }

      const result = schema.safeParse(payload);
      if (!result.success) {
        throw new MessageDecodeError(messageType, formatIssues(result.error.issues), {
          cause: result.error,
        });
      }
      return result.data;
    },
  };
}

export const jobSubmissionCodec: MessageCodec<JobSubmission> = createJsonCodec(
  'JobSubmission',
  jobSubmissionSchema
);

export const jobCancelCodec: MessageCodec<JobCancel> = createJsonCodec(
  'JobCancel',
  jobCancelSchema
);

export const jobProgressUpdateCodec: MessageCodec<JobProgressUpdate> = createJsonCodec(
  'JobProgressUpdate',
  jobProgressUpdateSchema
);

export const jobStatusUpdateCodec: MessageCodec<JobStatusUpdate> = createJsonCodec(
  'JobStatusUpdate',
  jobStatusUpdateSchema
);

export const jobResultCodec: MessageCodec<JobResult> = createJsonCodec(
  'JobResult',
  jobResultSchema
);

export const availableWorkflowsCodec: MessageCodec<AvailableWorkflows> = createJsonCodec(
  'AvailableWorkflows',
  availableWorkflowsSchema
);

export const requestAvailableWorkflowsCodec: MessageCodec<RequestAvailableWorkflows> =
  createJsonCodec('RequestAvailableWorkflows', requestAvailableWorkflowsSchema);

export const workerTaskRequestCodec: MessageCodec<WorkerTaskRequest> = createJsonCodec(
  'WorkerTaskRequest',
  workerTaskRequestSchema
);
