/**
 * Conversion of job parameter values between their runtime and wire forms, and
 * extraction of typed values from a received job configuration.
 */

import { MissingFieldException, WrongFieldTypeException } from '../errors.js';
import type { WireParams } from '../protocol/messages.js';
import { logger } from '../utils/logger.js';
import {
  getParameterType,
  parameterFromWireValue,
  parameterToWireValue,
  type ParameterTypeName,
  type ParameterValueTypes,
  type ParamsDict,
} from './parameters.js';
import type { WorkflowType } from './workflow-type.js';

const log = logger.child({ name: 'parameters' });

/**
 * Convert the runtime parameter values of a job to wire scalars. Every parameter the
 * workflow declares must have a value; keys the workflow does not declare are not sent.
 *
 * @throws MissingFieldException if a declared parameter has no value
 * @throws WrongFieldTypeException if a value has the wrong kind for its parameter
 */
export function convertParamsDictToWire(workflowType: WorkflowType, params: ParamsDict): WireParams {
  const wireParams: WireParams = {};

  for (const parameter of workflowType.workflowParameters ?? []) {
    const value = Object.hasOwn(params, parameter.keyName) ? params[parameter.keyName] : undefined;
    if (value === undefined) {
      throw new MissingFieldException(
        `Param with key "${parameter.keyName}" is missing in params dict.`
      );
    }
    wireParams[parameter.keyName] = parameterToWireValue(parameter, value);
  }

  return wireParams;
}

/**
 * Convert the wire parameter values of a job back to runtime values, one per declared
 * parameter.
 *
 * @throws MissingFieldException if a declared parameter has no value
 * @throws WrongFieldTypeException if a value has the wrong kind for its parameter
 */
export function convertWireToParamsDict(workflowType: WorkflowType, wireParams: WireParams): ParamsDict {
  const params: ParamsDict = {};

  for (const parameter of workflowType.workflowParameters ?? []) {
    const value = Object.hasOwn(wireParams, parameter.keyName)
      ? wireParams[parameter.keyName]
      : undefined;
    if (value === undefined) {
      throw new MissingFieldException(
        `Param with key "${parameter.keyName}" is missing in wire params.`
      );
    }
    params[parameter.keyName] = parameterFromWireValue(parameter, value);
  }

  return params;
}

function describeDefault(value: unknown): string {
  return value instanceof Date ? value.toISOString() : String(value);
}

/**
 * Read one field of a received job configuration as the given parameter kind.
 *
 * - present with a compatible value: the converted value
 * - present with an incompatible value: `defaultValue` if given, otherwise the
 *   `WrongFieldTypeException` is rethrown
 * - absent: `defaultValue` if given, otherwise `MissingFieldException`
 *
 * @example
 * ```typescript
 * const horizon = parseWorkflowConfigParameter(config, 'horizon', 'integer', 10);
 * ```
 */
export function parseWorkflowConfigParameter<K extends ParameterTypeName>(
  config: Readonly<Record<string, unknown>>,
  fieldKey: string,
  expectedType: K,
  defaultValue?: ParameterValueTypes[K]
): ParameterValueTypes[K] {
  if (!Object.hasOwn(config, fieldKey)) {
    if (defaultValue !== undefined) {
      log.warn(
        `${fieldKey} field was missing in workflow configuration. Using default value ${describeDefault(defaultValue)}`
      );
      return defaultValue;
    }
    log.error(`${fieldKey} field was missing in workflow configuration. No default available.`);
    throw new MissingFieldException(`${fieldKey} field was missing in workflow configuration.`);
  }

  const value = config[fieldKey];
  try {
    return getParameterType(expectedType).fromWireValue(value);
  } catch (error) {
    if (!(error instanceof WrongFieldTypeException)) {
      throw error;
    }
    const kind = value === null ? 'null' : typeof value;
    if (defaultValue !== undefined) {
      log.warn(
        `${fieldKey} field was passed in workflow configuration but as a ${kind} instead of ${expectedType}. Using default value ${describeDefault(defaultValue)}`
      );
      return defaultValue;
    }
    log.error(
      `${fieldKey} field was passed in workflow configuration but as a ${kind} instead of ${expectedType}. No default available.`
    );
    throw error;
  }
}
