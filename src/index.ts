/**
 * OMOTES SDK for submitting jobs and exchanging job lifecycle messages between
 * clients, the orchestrator and workers.
 *
 * @packageDocumentation
 */

// Client
export {
  OmotesInterface,
  type OmotesInterfaceConfig,
  type JobCallbacks,
  type SubmitJobOptions,
} from './omotes-interface.js';

// Job handle
export { Job, type JobDict } from './job.js';

// Core - Workflow parameters
export {
  PARAMETER_TYPES,
  PARAMETER_TYPE_TO_WIRE_CASE,
  stringParameterType,
  booleanParameterType,
  integerParameterType,
  floatParameterType,
  dateTimeParameterType,
  getParameterType,
  isParameterTypeName,
  roundHalfToEven,
  parameterFromJsonConfig,
  parameterToWireMessage,
  parameterFromWireMessage,
  parameterToWireValue,
  parameterFromWireValue,
  parametersEqual,
  type ParameterTypeName,
  type ParameterTypeDefinition,
  type ParameterOfType,
  type ParameterValueTypes,
  type StringEnumOption,
  type StringParameter,
  type BooleanParameter,
  type IntegerParameter,
  type FloatParameter,
  type DateTimeParameter,
  type WorkflowParameter,
  type ParamsDict,
  type ParamsDictValue,
  type JsonConfigFragment,
} from './core/parameters.js';

// Core - Workflow types
export {
  WorkflowType,
  WorkflowTypeManager,
  type WorkflowTypeOptions,
} from './core/workflow-type.js';

// Core - Job parameter values
export {
  convertParamsDictToWire,
  convertWireToParamsDict,
  parseWorkflowConfigParameter,
} from './core/params.js';

// Queue names
export {
  jobSubmissionQueueName,
  jobResultsQueueName,
  jobProgressQueueName,
  jobStatusQueueName,
  jobCancelQueueName,
  availableWorkflowsQueueName,
  requestAvailableWorkflowsQueueName,
  workerTaskQueueName,
} from './queue-names.js';

// Runtime - Message bus
export {
  InMemoryMessageBus,
  type MessageBus,
  type MessageHandler,
  type TimeoutHandler,
} from './runtime/message-bus.js';

// Runtime - Orchestrator
export {
  OrchestratorInterface,
  type OrchestratorInterfaceConfig,
  type NewJobHandler,
  type CancelJobHandler,
  type TaskProgressHandler,
  type TaskResultHandler,
} from './runtime/orchestrator-interface.js';

// Runtime - Worker
export {
  Worker,
  MessageBusTaskRunner,
  executeWorkerTask,
  type WorkerConfig,
  type WorkerState,
  type WorkerTaskFunction,
  type UpdateProgressHandler,
  type TaskRunner,
  type TaskExecutor,
  type TaskInvocation,
  type TaskOutcome,
} from './runtime/worker.js';

// Protocol
export {
  createJsonCodec,
  jobSubmissionCodec,
  jobCancelCodec,
  jobProgressUpdateCodec,
  jobStatusUpdateCodec,
  jobResultCodec,
  availableWorkflowsCodec,
  requestAvailableWorkflowsCodec,
  workerTaskRequestCodec,
  type MessageCodec,
} from './protocol/codec.js';
export {
  JOB_STATUSES,
  type JobSubmission,
  type JobCancel,
  type JobProgressUpdate,
  type JobStatus,
  type JobStatusUpdate,
  type JobResult,
  type ResultType,
  type AvailableWorkflows,
  type RequestAvailableWorkflows,
  type WorkerTaskRequest,
  type WorkflowMessage,
  type WorkflowParameterMessage,
  type ParameterTypeMessage,
  type ParameterTypeCase,
  type WireValue,
  type WireParams,
} from './protocol/messages.js';

// Configuration
export {
  loadWorkerSettings,
  loadOrchestratorSettings,
  DEFAULT_TASK_PROGRESS_QUEUE_NAME,
  DEFAULT_TASK_RESULT_QUEUE_NAME,
  type WorkerSettings,
  type OrchestratorSettings,
} from './config.js';

// Errors
export {
  MissingFieldException,
  WrongFieldTypeException,
  MessageDecodeError,
  WorkflowTypeNotFoundError,
} from './errors.js';

// Utils
export {
  configureLogging,
  createLogger,
  parseLogLevel,
  type Logger,
  type LogLevel,
  type LogEntry,
  type ConfigureLoggingOptions,
} from './utils/logger.js';
export { serialize, deserialize } from './utils/serializer.js';
