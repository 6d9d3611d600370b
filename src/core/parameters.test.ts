import { describe, it, beforeEach, afterEach } from 'node:test';
import assert from 'node:assert/strict';

import { MissingFieldException, WrongFieldTypeException } from '../errors.js';
import { configureLogging, resetLogging, type LogEntry } from '../utils/logger.js';
import {
  booleanParameterType,
  dateTimeParameterType,
  floatParameterType,
  integerParameterType,
  isParameterTypeName,
  parameterFromJsonConfig,
  parameterFromWireMessage,
  parameterToWireMessage,
  parametersEqual,
  roundHalfToEven,
  stringParameterType,
  type WorkflowParameter,
} from './parameters.js';

function assertWrongField(fn: () => unknown, message: string): void {
  assert.throws(fn, (err: unknown) => {
    assert.ok(err instanceof WrongFieldTypeException);
    assert.ok(err instanceof TypeError);
    assert.strictEqual(err.message, message);
    return true;
  });
}

describe('fromJsonConfig', () => {
  it('builds a string parameter with enum options in order', () => {
    const parameter = stringParameterType.fromJsonConfig({
      key_name: 'solver',
      title: 'Solver',
      default: 'highs',
      enum_options: [
        { key_name: 'highs', display_name: 'HiGHS' },
        { key_name: 'gurobi', display_name: 'Gurobi' },
      ],
    });

    assert.deepStrictEqual(parameter, {
      keyName: 'solver',
      title: 'Solver',
      typeName: 'string',
      default: 'highs',
      enumOptions: [
        { keyName: 'highs', displayName: 'HiGHS' },
        { keyName: 'gurobi', displayName: 'Gurobi' },
      ],
    });
    assert.ok(Object.isFrozen(parameter));
  });

  it('rejects a non-string default for a string parameter', () => {
    assertWrongField(
      () => stringParameterType.fromJsonConfig({ key_name: 'solver', default: 3 }),
      "'default' for StringParameter must be in 'str' format"
    );
  });

  it('rejects enum options that are not a list', () => {
    assertWrongField(
      () => stringParameterType.fromJsonConfig({ key_name: 'solver', enum_options: 'highs' }),
      "'enum_options' for StringParameter must be a 'list'"
    );
  });

  it('rejects an enum option without display_name', () => {
    assertWrongField(
      () =>
        stringParameterType.fromJsonConfig({ key_name: 'solver', enum_options: [{ key_name: 'a' }] }),
      "A string enum option must contain a 'display_name'"
    );
  });

  it('rejects an enum option with a non-string key_name', () => {
    assertWrongField(
      () =>
        stringParameterType.fromJsonConfig({
          key_name: 'solver',
          enum_options: [{ key_name: 7, display_name: 'Seven' }],
        }),
      "'key_name' for a string enum option must be in 'str' format: '7'"
    );
  });

  it('rejects a non-boolean default for a boolean parameter', () => {
    assertWrongField(
      () => booleanParameterType.fromJsonConfig({ key_name: 'dry_run', default: 'yes' }),
      "'default' for BooleanParameter must be in 'bool' format: 'yes'"
    );
  });

  it('rejects a fractional minimum for an integer parameter', () => {
    assertWrongField(
      () => integerParameterType.fromJsonConfig({ key_name: 'horizon', minimum: 1.5 }),
      "'minimum' for IntegerParameter must be in 'int' format: '1.5'"
    );
  });

  it('accepts integers for float bounds', () => {
    const parameter = floatParameterType.fromJsonConfig({
      key_name: 'discount',
      default: 0.5,
      minimum: 0,
      maximum: 1,
    });

    assert.deepStrictEqual(parameter, {
      keyName: 'discount',
      typeName: 'float',
      default: 0.5,
      minimum: 0,
      maximum: 1,
    });
  });

  it('rejects a string bound for a float parameter', () => {
    assertWrongField(
      () => floatParameterType.fromJsonConfig({ key_name: 'discount', maximum: 'one' }),
      "'maximum' for FloatParameter must be in 'float' format: 'one'"
    );
  });

  it('parses an ISO datetime default', () => {
    const parameter = dateTimeParameterType.fromJsonConfig({
      key_name: 'start',
      default: '2023-12-31T00:00:00Z',
    });

    assert.strictEqual(parameter.default?.toISOString(), '2023-12-31T00:00:00.000Z');
  });

  it('rejects a datetime default that is not ISO formatted', () => {
    assertWrongField(
      () => dateTimeParameterType.fromJsonConfig({ key_name: 'start', default: '2023-12-31T0:00:00' }),
      "Invalid default datetime format, should be a string in ISO format: '2023-12-31T0:00:00'"
    );
  });

  it('requires key_name', () => {
    assert.throws(
      () => parameterFromJsonConfig('boolean', { default: true }),
      (err: unknown) => {
        assert.ok(err instanceof MissingFieldException);
        assert.strictEqual(err.message, "'key_name' is required for BooleanParameter");
        return true;
      }
    );
  });
});

describe('wire messages', () => {
  it('omits unset bounds and keeps zero bounds', () => {
    const parameter = integerParameterType.fromJsonConfig({ key_name: 'horizon', minimum: 0 });

    const message = parameterToWireMessage(parameter);

    assert.deepStrictEqual(message, {
      keyName: 'horizon',
      parameterType: { case: 'integerParameter', value: { minimum: 0 } },
    });
  });

  it('distinguishes an unset bound from a bound set to zero', () => {
    const rebuilt = parameterFromWireMessage({
      keyName: 'horizon',
      parameterType: { case: 'floatParameter', value: { minimum: 0 } },
    });

    assert.strictEqual(rebuilt.typeName, 'float');
    if (rebuilt.typeName !== 'float') return;
    assert.strictEqual(rebuilt.minimum, 0);
    assert.strictEqual(Object.hasOwn(rebuilt, 'maximum'), false);
    assert.strictEqual(Object.hasOwn(rebuilt, 'default'), false);
  });

  it('reproduces every kind through its wire message', () => {
    const parameters: WorkflowParameter[] = [
      parameterFromJsonConfig('string', {
        key_name: 'solver',
        description: 'LP solver',
        enum_options: [{ key_name: 'highs', display_name: 'HiGHS' }],
      }),
      parameterFromJsonConfig('boolean', { key_name: 'dry_run', default: false }),
      parameterFromJsonConfig('integer', { key_name: 'horizon', default: 0, maximum: 40 }),
      parameterFromJsonConfig('float', { key_name: 'discount', minimum: -1.5 }),
      parameterFromJsonConfig('datetime', { key_name: 'start', default: '2024-03-01T08:30:00Z' }),
    ];

    for (const parameter of parameters) {
      const rebuilt = parameterFromWireMessage(parameterToWireMessage(parameter));
      assert.ok(parametersEqual(parameter, rebuilt));
      assert.deepStrictEqual(rebuilt, parameter);
    }
  });
});

describe('wire values', () => {
  let entries: LogEntry[];

  beforeEach(() => {
    entries = [];
    configureLogging({ handler: (e) => entries.push(e) });
  });

  afterEach(() => {
    resetLogging();
  });

  it('rounds a fractional wire value for an integer and warns', () => {
    assert.strictEqual(integerParameterType.fromWireValue(1.5), 2);

    const warnings = entries.filter((e) => e.level === 'warn');
    assert.strictEqual(warnings.length, 1);
    assert.ok(warnings[0]?.message.includes('Rounding the field value from 1.5 to 2'));
  });

  it('rounds halves of an integer wire value to the even neighbour', () => {
    assert.deepStrictEqual(
      [2.5, -1.5, 0.5, -2.5, 3.5].map((v) => integerParameterType.fromWireValue(v)),
      [2, -2, 0, -2, 4]
    );
    assert.strictEqual(entries.filter((e) => e.level === 'warn').length, 5);
  });

  it('rounds non-halves to the nearest integer', () => {
    assert.deepStrictEqual([2.4, 2.6, -2.4, -2.6, 7].map(roundHalfToEven), [2, 3, -2, -3, 7]);
  });

  it('does not warn for an integral wire value', () => {
    assert.strictEqual(integerParameterType.fromWireValue(4), 4);
    assert.strictEqual(entries.length, 0);
  });

  it('rejects a string wire value for an integer', () => {
    assert.throws(() => integerParameterType.fromWireValue('abc'), WrongFieldTypeException);
  });

  it('rejects a fractional runtime value for an integer', () => {
    assert.throws(() => integerParameterType.toWireValue(2.5), WrongFieldTypeException);
  });

  it('requires exact kinds for strings and booleans', () => {
    assert.strictEqual(stringParameterType.fromWireValue('a'), 'a');
    assert.strictEqual(booleanParameterType.toWireValue(false), false);
    assert.throws(() => stringParameterType.fromWireValue(1), WrongFieldTypeException);
    assert.throws(() => booleanParameterType.fromWireValue('true'), WrongFieldTypeException);
  });

  it('requires a number for floats', () => {
    assert.strictEqual(floatParameterType.fromWireValue(0.25), 0.25);
    assert.throws(() => floatParameterType.fromWireValue(true), WrongFieldTypeException);
    assert.throws(() => floatParameterType.toWireValue(Number.NaN), WrongFieldTypeException);
  });

  it('converts datetimes to epoch seconds and back', () => {
    const at = new Date('2024-03-01T08:30:15Z');

    const wire = dateTimeParameterType.toWireValue(at);

    assert.strictEqual(wire, 1709281815);
    assert.strictEqual(dateTimeParameterType.fromWireValue(wire).getTime(), at.getTime());
  });

  it('names the expected kind in the error', () => {
    assertWrongField(
      () => dateTimeParameterType.toWireValue('2024-03-01'),
      'Cannot convert value "2024-03-01" to a wire value as the type is string while a datetime was expected.'
    );
  });
});

describe('parametersEqual', () => {
  it('ignores display metadata and defaults', () => {
    const a = parameterFromJsonConfig('integer', { key_name: 'horizon', title: 'A', default: 1 });
    const b = parameterFromJsonConfig('integer', { key_name: 'horizon', title: 'B', maximum: 9 });
    assert.ok(parametersEqual(a, b));
  });

  it('compares the kind', () => {
    const a = parameterFromJsonConfig('integer', { key_name: 'horizon' });
    const b = parameterFromJsonConfig('float', { key_name: 'horizon' });
    assert.strictEqual(parametersEqual(a, b), false);
  });
});

describe('isParameterTypeName', () => {
  it('accepts the five kinds only', () => {
    assert.ok(isParameterTypeName('datetime'));
    assert.strictEqual(isParameterTypeName('toString'), false);
    assert.strictEqual(isParameterTypeName('enum'), false);
  });
});
