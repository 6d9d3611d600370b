/**
 * Errors raised by the SDK.
 */

/**
 * Thrown when a configuration or parameter mapping does not contain a required field
 * and no default is available.
 */
export class MissingFieldException extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'MissingFieldException';
  }
}

/**
 * Thrown when a field is present but holds a value of the wrong kind.
 *
 * Extends TypeError so callers validating configuration can catch it as such.
 */
export class WrongFieldTypeException extends TypeError {
  constructor(message: string) {
    super(message);
    this.name = 'WrongFieldTypeException';
  }
}

/**
 * Thrown when a message received from the bus cannot be decoded. The message is not
 * processed any further.
 */
export class MessageDecodeError extends Error {
  constructor(
    public readonly messageType: string,
    message: string,
    options?: { cause?: unknown }
  ) {
    super(`Could not decode ${messageType} message: ${message}`, options);
    this.name = 'MessageDecodeError';
  }
}

/**
 * Thrown when a workflow type is looked up by name and the local registry does not know it.
 */
export class WorkflowTypeNotFoundError extends Error {
  constructor(public readonly workflowTypeName: string) {
    super(`Workflow type not found: ${workflowTypeName}`);
    this.name = 'WorkflowTypeNotFoundError';
  }
}
