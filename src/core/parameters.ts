/**
 * Workflow parameters.
 *
 * A workflow declares an ordered list of typed parameters besides its input document.
 * The five parameter kinds form a closed union discriminated by `typeName`; all
 * per-kind behaviour lives in the static `PARAMETER_TYPES` table. A parameter moves
 * between three forms:
 *
 * - the human-editable JSON configuration (`fromJsonConfig`)
 * - the wire catalog message (`toWireMessage` / `fromWireMessage`)
 * - job values: runtime values (`ParamsDictValue`) ↔ wire scalars (`WireValue`)
 */

import { MissingFieldException, WrongFieldTypeException } from '../errors.js';
import type {
  ParameterTypeCase,
  ParameterTypeMessage,
  StringParameterMessage,
  BooleanParameterMessage,
  IntegerParameterMessage,
  FloatParameterMessage,
  DateTimeParameterMessage,
  WireValue,
  WorkflowParameterMessage,
} from '../protocol/messages.js';
import { logger } from '../utils/logger.js';

const log = logger.child({ name: 'parameters' });

// ── Parameter model ─────────────────────────────────────────────────────

export type ParameterTypeName = 'string' | 'boolean' | 'integer' | 'float' | 'datetime';

interface BaseParameter {
  /** Key of the parameter in configuration files and job parameter mappings */
  readonly keyName: string;
  /** Display title (defaults to a prettified key name in user interfaces) */
  readonly title?: string | undefined;
  /** Display description */
  readonly description?: string | undefined;
}

export interface StringEnumOption {
  readonly keyName: string;
  readonly displayName: string;
}

export interface StringParameter extends BaseParameter {
  readonly typeName: 'string';
  readonly default?: string | undefined;
  /** Multiple choice values, in display order */
  readonly enumOptions?: readonly StringEnumOption[] | undefined;
}

export interface BooleanParameter extends BaseParameter {
  readonly typeName: 'boolean';
  readonly default?: boolean | undefined;
}

export interface IntegerParameter extends BaseParameter {
  readonly typeName: 'integer';
  readonly default?: number | undefined;
  readonly minimum?: number | undefined;
  readonly maximum?: number | undefined;
}

export interface FloatParameter extends BaseParameter {
  readonly typeName: 'float';
  readonly default?: number | undefined;
  readonly minimum?: number | undefined;
  readonly maximum?: number | undefined;
}

export interface DateTimeParameter extends BaseParameter {
  readonly typeName: 'datetime';
  readonly default?: Date | undefined;
}

export type WorkflowParameter =
  | StringParameter
  | BooleanParameter
  | IntegerParameter
  | FloatParameter
  | DateTimeParameter;

export type ParameterOfType<K extends ParameterTypeName> = Extract<
  WorkflowParameter,
  { typeName: K }
>;

/** Runtime value type per parameter kind. */
export interface ParameterValueTypes {
  string: string;
  boolean: boolean;
  integer: number;
  float: number;
  datetime: Date;
}

export type ParamsDictValue = ParameterValueTypes[ParameterTypeName];

/** Job configuration in runtime form, keyed by parameter key name. */
export type ParamsDict = Record<string, ParamsDictValue>;

/** A parameter entry of the JSON configuration file, with snake_case keys. */
export type JsonConfigFragment = Record<string, unknown>;

type WireMessageOfCase<C extends ParameterTypeCase> = Extract<
  ParameterTypeMessage,
  { case: C }
>['value'];

// ── Wire tag tables ─────────────────────────────────────────────────────

export const PARAMETER_TYPE_TO_WIRE_CASE = {
  string: 'stringParameter',
  boolean: 'booleanParameter',
  integer: 'integerParameter',
  float: 'floatParameter',
  datetime: 'datetimeParameter',
} as const satisfies Record<ParameterTypeName, ParameterTypeCase>;

export function isParameterTypeName(value: unknown): value is ParameterTypeName {
  return typeof value === 'string' && Object.hasOwn(PARAMETER_TYPE_TO_WIRE_CASE, value);
}

// ── Helpers ─────────────────────────────────────────────────────────────

const CLASS_NAMES: Record<ParameterTypeName, string> = {
  string: 'StringParameter',
  boolean: 'BooleanParameter',
  integer: 'IntegerParameter',
  float: 'FloatParameter',
  datetime: 'DateTimeParameter',
};

function formatValue(value: unknown): string {
  if (typeof value === 'string') return value;
  if (value instanceof Date) return value.toISOString();
  if (value !== null && typeof value === 'object') return JSON.stringify(value);
  return String(value);
}

function kindOf(value: unknown): string {
  if (value === null) return 'null';
  if (value instanceof Date) return 'Date';
  if (Array.isArray(value)) return 'array';
  return typeof value;
}

/**
 * Whether an optional wire field is set. Unset fields are absent from the message;
 * a field set to 0 (or false, or '') is present.
 */
function hasField<T extends object>(message: T, key: keyof T & string): boolean {
  return Object.hasOwn(message, key) && message[key] !== undefined;
}

function isInteger(value: unknown): value is number {
  return typeof value === 'number' && Number.isInteger(value);
}

function isFiniteNumber(value: unknown): value is number {
  return typeof value === 'number' && Number.isFinite(value);
}

/**
 * Round to the nearest integer; halves go to the even neighbour (2.5 -> 2, -1.5 -> -2).
 */
export function roundHalfToEven(value: number): number {
  const floor = Math.floor(value);
  const diff = value - floor;
  if (diff < 0.5) return floor;
  if (diff > 0.5) return floor + 1;
  return floor % 2 === 0 ? floor : floor + 1;
}

const ISO_DATETIME =
  /^\d{4}-\d{2}-\d{2}(?:[T ]\d{2}:\d{2}(?::\d{2}(?:\.\d{1,6})?)?(?:Z|[+-]\d{2}:?\d{2})?)?$/;

/**
 * Parse an ISO-8601 date or date-time string.
 *
 * @throws WrongFieldTypeException if the value is not a string in ISO format
 */
function parseIsoDateTime(value: unknown): Date {
  const date = typeof value === 'string' && ISO_DATETIME.test(value) ? new Date(value) : null;
  if (!date || Number.isNaN(date.getTime())) {
    throw new WrongFieldTypeException(
      `Invalid default datetime format, should be a string in ISO format: '${formatValue(value)}'`
    );
  }
  return date;
}

/**
 * Read the fields every parameter kind shares from a JSON configuration fragment.
 */
function baseFromJsonConfig(typeName: ParameterTypeName, config: JsonConfigFragment): BaseParameter {
  const className = CLASS_NAMES[typeName];
  const keyName = config['key_name'];
  if (keyName === undefined || keyName === null) {
    throw new MissingFieldException(`'key_name' is required for ${className}`);
  }
  if (typeof keyName !== 'string') {
    throw new WrongFieldTypeException(
      `'key_name' for ${className} must be in 'str' format: '${formatValue(keyName)}'`
    );
  }

  const base: { keyName: string; title?: string; description?: string } = { keyName };
  for (const field of ['title', 'description'] as const) {
    const value = config[field];
    if (value === undefined || value === null) continue;
    if (typeof value !== 'string') {
      throw new WrongFieldTypeException(
        `'${field}' for ${className} must be in 'str' format: '${formatValue(value)}'`
      );
    }
    base[field] = value;
  }
  return base;
}

/**
 * Read the numeric `default`/`minimum`/`maximum` fields of an integer or float fragment.
 */
function numericBoundsFromJsonConfig(
  typeName: 'integer' | 'float',
  config: JsonConfigFragment
): { default?: number; minimum?: number; maximum?: number } {
  const accepts = typeName === 'integer' ? isInteger : isFiniteNumber;
  const format = typeName === 'integer' ? 'int' : 'float';
  const bounds: { default?: number; minimum?: number; maximum?: number } = {};

  for (const field of ['default', 'minimum', 'maximum'] as const) {
    const value = config[field];
    if (value === undefined || value === null) continue;
    if (!accepts(value)) {
      throw new WrongFieldTypeException(
        `'${field}' for ${CLASS_NAMES[typeName]} must be in '${format}' format: '${formatValue(value)}'`
      );
    }
    bounds[field] = value;
  }
  return bounds;
}

function numericBoundsFromWire(
  message: IntegerParameterMessage | FloatParameterMessage
): { default?: number; minimum?: number; maximum?: number } {
  const bounds: { default?: number; minimum?: number; maximum?: number } = {};
  if (hasField(message, 'default') && message.default !== undefined) bounds.default = message.default;
  if (hasField(message, 'minimum') && message.minimum !== undefined) bounds.minimum = message.minimum;
  if (hasField(message, 'maximum') && message.maximum !== undefined) bounds.maximum = message.maximum;
  return bounds;
}

function numericBoundsToWire(parameter: IntegerParameter | FloatParameter): {
  default?: number;
  minimum?: number;
  maximum?: number;
} {
  return {
    ...(parameter.default !== undefined ? { default: parameter.default } : {}),
    ...(parameter.minimum !== undefined ? { minimum: parameter.minimum } : {}),
    ...(parameter.maximum !== undefined ? { maximum: parameter.maximum } : {}),
  };
}

function wrongRuntimeValue(value: unknown, expected: string): WrongFieldTypeException {
  return new WrongFieldTypeException(
    `Cannot convert value "${formatValue(value)}" to a wire value as the type is ${kindOf(value)} while ${expected} was expected.`
  );
}

function wrongWireValue(value: unknown, expected: string): WrongFieldTypeException {
  return new WrongFieldTypeException(
    `Cannot convert value "${formatValue(value)}" from a wire value as the type is ${kindOf(value)} while ${expected} was expected.`
  );
}

function freezeParameter<P extends WorkflowParameter>(parameter: P): P {
  const frozen: WorkflowParameter = parameter;
  if (frozen.typeName === 'string' && frozen.enumOptions) {
    for (const option of frozen.enumOptions) {
      Object.freeze(option);
    }
    Object.freeze(frozen.enumOptions);
  }
  Object.freeze(parameter);
  return parameter;
}

// ── Parameter type definitions ──────────────────────────────────────────

/**
 * Behaviour of one parameter kind.
 */
export interface ParameterTypeDefinition<K extends ParameterTypeName> {
  readonly typeName: K;
  readonly wireCase: (typeof PARAMETER_TYPE_TO_WIRE_CASE)[K];
  /**
   * Validate a JSON configuration fragment and build the parameter.
   *
   * @throws WrongFieldTypeException if a field holds a value of the wrong kind
   * @throws MissingFieldException if `key_name` is missing
   */
  fromJsonConfig(config: JsonConfigFragment): ParameterOfType<K>;
  toWireMessage(parameter: ParameterOfType<K>): WireMessageOfCase<(typeof PARAMETER_TYPE_TO_WIRE_CASE)[K]>;
  fromWireMessage(
    base: BaseParameter,
    message: WireMessageOfCase<(typeof PARAMETER_TYPE_TO_WIRE_CASE)[K]>
  ): ParameterOfType<K>;
  /**
   * Convert a runtime value to its wire scalar.
   *
   * @throws WrongFieldTypeException if the value has the wrong kind
   */
  toWireValue(value: unknown): WireValue;
  /**
   * Convert a wire scalar to its runtime value.
   *
   * @throws WrongFieldTypeException if the value has the wrong kind
   */
  fromWireValue(value: unknown): ParameterValueTypes[K];
}

export const stringParameterType: ParameterTypeDefinition<'string'> = {
  typeName: 'string',
  wireCase: 'stringParameter',

  fromJsonConfig(config) {
    const base = baseFromJsonConfig('string', config);
    const defaultValue = config['default'];
    if (defaultValue !== undefined && typeof defaultValue !== 'string') {
      throw new WrongFieldTypeException("'default' for StringParameter must be in 'str' format");
    }

    let enumOptions: StringEnumOption[] | undefined;
    const rawOptions = config['enum_options'];
    if (rawOptions !== undefined) {
      if (!Array.isArray(rawOptions)) {
        throw new WrongFieldTypeException("'enum_options' for StringParameter must be a 'list'");
      }
      enumOptions = rawOptions.map((rawOption: unknown) => {
        if (rawOption === null || typeof rawOption !== 'object') {
          throw new WrongFieldTypeException(
            `A string enum option must be an object: '${formatValue(rawOption)}'`
          );
        }
        const option: Record<string, string> = {};
        for (const enumKey of ['key_name', 'display_name']) {
          if (!(enumKey in rawOption)) {
            throw new WrongFieldTypeException(`A string enum option must contain a '${enumKey}'`);
          }
          const value: unknown = Reflect.get(rawOption, enumKey);
          if (typeof value !== 'string') {
            throw new WrongFieldTypeException(
              `'${enumKey}' for a string enum option must be in 'str' format: '${formatValue(value)}'`
            );
          }
          option[enumKey] = value;
        }
        return { keyName: option['key_name'] ?? '', displayName: option['display_name'] ?? '' };
      });
    }

    return freezeParameter({
      ...base,
      typeName: 'string',
      ...(defaultValue !== undefined ? { default: defaultValue } : {}),
      ...(enumOptions !== undefined ? { enumOptions } : {}),
    });
  },

  toWireMessage(parameter): StringParameterMessage {
    return {
      ...(parameter.default !== undefined ? { default: parameter.default } : {}),
      enumOptions: (parameter.enumOptions ?? []).map((option) => ({
        keyName: option.keyName,
        displayName: option.displayName,
      })),
    };
  },

  fromWireMessage(base, message) {
    return freezeParameter({
      ...base,
      typeName: 'string',
      ...(hasField(message, 'default') && message.default !== undefined
        ? { default: message.default }
        : {}),
      ...(message.enumOptions.length > 0
        ? {
            enumOptions: message.enumOptions.map((option) => ({
              keyName: option.keyName,
              displayName: option.displayName,
            })),
          }
        : {}),
    });
  },

  toWireValue(value) {
    if (typeof value !== 'string') throw wrongRuntimeValue(value, 'a string');
    return value;
  },

  fromWireValue(value) {
    if (typeof value !== 'string') throw wrongWireValue(value, 'a string');
    return value;
  },
};

export const booleanParameterType: ParameterTypeDefinition<'boolean'> = {
  typeName: 'boolean',
  wireCase: 'booleanParameter',

  fromJsonConfig(config) {
    const base = baseFromJsonConfig('boolean', config);
    const defaultValue = config['default'];
    if (defaultValue !== undefined && typeof defaultValue !== 'boolean') {
      throw new WrongFieldTypeException(
        `'default' for BooleanParameter must be in 'bool' format: '${formatValue(defaultValue)}'`
      );
    }
    return freezeParameter({
      ...base,
      typeName: 'boolean',
      ...(defaultValue !== undefined ? { default: defaultValue } : {}),
    });
  },

  toWireMessage(parameter): BooleanParameterMessage {
    return parameter.default !== undefined ? { default: parameter.default } : {};
  },

  fromWireMessage(base, message) {
    return freezeParameter({
      ...base,
      typeName: 'boolean',
      ...(hasField(message, 'default') && message.default !== undefined
        ? { default: message.default }
        : {}),
    });
  },

  toWireValue(value) {
    if (typeof value !== 'boolean') throw wrongRuntimeValue(value, 'a bool');
    return value;
  },

  fromWireValue(value) {
    if (typeof value !== 'boolean') throw wrongWireValue(value, 'a bool');
    return value;
  },
};

export const integerParameterType: ParameterTypeDefinition<'integer'> = {
  typeName: 'integer',
  wireCase: 'integerParameter',

  fromJsonConfig(config) {
    return freezeParameter({
      ...baseFromJsonConfig('integer', config),
      typeName: 'integer',
      ...numericBoundsFromJsonConfig('integer', config),
    });
  },

  toWireMessage(parameter): IntegerParameterMessage {
    return numericBoundsToWire(parameter);
  },

  fromWireMessage(base, message) {
    return freezeParameter({ ...base, typeName: 'integer', ...numericBoundsFromWire(message) });
  },

  toWireValue(value) {
    if (!isInteger(value)) throw wrongRuntimeValue(value, 'an int');
    return value;
  },

  fromWireValue(value) {
    if (!isFiniteNumber(value)) throw wrongWireValue(value, 'an int or float');
    const result = roundHalfToEven(value);
    if (result !== value) {
      log.warn(
        `A field was passed in workflow configuration as a float value with decimals instead of an integer. Rounding the field value from ${String(value)} to ${String(result)}.`
      );
    }
    return result;
  },
};

export const floatParameterType: ParameterTypeDefinition<'float'> = {
  typeName: 'float',
  wireCase: 'floatParameter',

  fromJsonConfig(config) {
    return freezeParameter({
      ...baseFromJsonConfig('float', config),
      typeName: 'float',
      ...numericBoundsFromJsonConfig('float', config),
    });
  },

  toWireMessage(parameter): FloatParameterMessage {
    return numericBoundsToWire(parameter);
  },

  fromWireMessage(base, message) {
    return freezeParameter({ ...base, typeName: 'float', ...numericBoundsFromWire(message) });
  },

  toWireValue(value) {
    if (!isFiniteNumber(value)) throw wrongRuntimeValue(value, 'a float');
    return value;
  },

  fromWireValue(value) {
    if (!isFiniteNumber(value)) throw wrongWireValue(value, 'a float');
    return value;
  },
};

export const dateTimeParameterType: ParameterTypeDefinition<'datetime'> = {
  typeName: 'datetime',
  wireCase: 'datetimeParameter',

  fromJsonConfig(config) {
    const base = baseFromJsonConfig('datetime', config);
    const defaultValue = config['default'];
    return freezeParameter({
      ...base,
      typeName: 'datetime',
      ...(defaultValue !== undefined && defaultValue !== null
        ? { default: parseIsoDateTime(defaultValue) }
        : {}),
    });
  },

  toWireMessage(parameter): DateTimeParameterMessage {
    return parameter.default !== undefined ? { default: parameter.default.toISOString() } : {};
  },

  fromWireMessage(base, message) {
    return freezeParameter({
      ...base,
      typeName: 'datetime',
      ...(hasField(message, 'default') && message.default !== undefined
        ? { default: parseIsoDateTime(message.default) }
        : {}),
    });
  },

  /** Dates travel as seconds since the epoch. */
  toWireValue(value) {
    if (!(value instanceof Date) || Number.isNaN(value.getTime())) {
      throw wrongRuntimeValue(value, 'a datetime');
    }
    return value.getTime() / 1000;
  },

  fromWireValue(value) {
    if (!isFiniteNumber(value)) throw wrongWireValue(value, 'a float');
    return new Date(value * 1000);
  },
};

/**
 * Static table of all parameter kinds.
 */
export const PARAMETER_TYPES: { readonly [K in ParameterTypeName]: ParameterTypeDefinition<K> } = {
  string: stringParameterType,
  boolean: booleanParameterType,
  integer: integerParameterType,
  float: floatParameterType,
  datetime: dateTimeParameterType,
};

export function getParameterType<K extends ParameterTypeName>(
  typeName: K
): ParameterTypeDefinition<K> {
  return PARAMETER_TYPES[typeName];
}

// ── Dispatch over the union ─────────────────────────────────────────────

/**
 * Build a parameter from a JSON configuration fragment of the given kind.
 */
export function parameterFromJsonConfig(
  typeName: ParameterTypeName,
  config: JsonConfigFragment
): WorkflowParameter {
  return PARAMETER_TYPES[typeName].fromJsonConfig(config);
}

function toParameterTypeMessage(parameter: WorkflowParameter): ParameterTypeMessage {
  switch (parameter.typeName) {
    case 'string':
      return { case: 'stringParameter', value: stringParameterType.toWireMessage(parameter) };
    case 'boolean':
      return { case: 'booleanParameter', value: booleanParameterType.toWireMessage(parameter) };
    case 'integer':
      return { case: 'integerParameter', value: integerParameterType.toWireMessage(parameter) };
    case 'float':
      return { case: 'floatParameter', value: floatParameterType.toWireMessage(parameter) };
    case 'datetime':
      return { case: 'datetimeParameter', value: dateTimeParameterType.toWireMessage(parameter) };
  }
}

/**
 * Convert a parameter to its catalog wire message.
 */
export function parameterToWireMessage(parameter: WorkflowParameter): WorkflowParameterMessage {
  return {
    keyName: parameter.keyName,
    ...(parameter.title !== undefined ? { title: parameter.title } : {}),
    ...(parameter.description !== undefined ? { description: parameter.description } : {}),
    parameterType: toParameterTypeMessage(parameter),
  };
}

/**
 * Rebuild a parameter from its catalog wire message.
 */
export function parameterFromWireMessage(message: WorkflowParameterMessage): WorkflowParameter {
  const base: BaseParameter = {
    keyName: message.keyName,
    ...(hasField(message, 'title') ? { title: message.title } : {}),
    ...(hasField(message, 'description') ? { description: message.description } : {}),
  };

  const parameterType = message.parameterType;
  switch (parameterType.case) {
    case 'stringParameter':
      return stringParameterType.fromWireMessage(base, parameterType.value);
    case 'booleanParameter':
      return booleanParameterType.fromWireMessage(base, parameterType.value);
    case 'integerParameter':
      return integerParameterType.fromWireMessage(base, parameterType.value);
    case 'floatParameter':
      return floatParameterType.fromWireMessage(base, parameterType.value);
    case 'datetimeParameter':
      return dateTimeParameterType.fromWireMessage(base, parameterType.value);
  }
}

/**
 * Convert a runtime value to the wire scalar for this parameter.
 */
export function parameterToWireValue(parameter: WorkflowParameter, value: unknown): WireValue {
  return PARAMETER_TYPES[parameter.typeName].toWireValue(value);
}

/**
 * Convert a wire scalar to the runtime value for this parameter.
 */
export function parameterFromWireValue(parameter: WorkflowParameter, value: unknown): ParamsDictValue {
  return PARAMETER_TYPES[parameter.typeName].fromWireValue(value);
}

/**
 * Two parameters are equal if they have the same kind and key name. Display metadata,
 * defaults, bounds and enum options do not take part.
 */
export function parametersEqual(a: WorkflowParameter, b: WorkflowParameter): boolean {
  return a.typeName === b.typeName && a.keyName === b.keyName;
}
