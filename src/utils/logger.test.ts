import { describe, it, afterEach } from 'node:test';
import assert from 'node:assert/strict';

import {
  configureLogging,
  createLogger,
  parseLogLevel,
  resetLogging,
  logger,
  type LogEntry,
} from './logger.js';

describe('createLogger', () => {
  it('emits log entries at correct levels', () => {
    const entries: LogEntry[] = [];
    const log = createLogger({ level: 'debug', handler: (e) => entries.push(e) });

    log.debug('d');
    log.info('i');
    log.warn('w');
    log.error('e');

    assert.deepStrictEqual(
      entries.map((e) => e.level),
      ['debug', 'info', 'warn', 'error']
    );
  });

  it('does not emit debug entries at level info', () => {
    const entries: LogEntry[] = [];
    const log = createLogger({ level: 'info', handler: (e) => entries.push(e) });

    log.debug('should not appear');
    log.info('should appear');

    assert.strictEqual(entries.length, 1);
    assert.strictEqual(entries[0]?.level, 'info');
  });

  it('includes context in log entries', () => {
    const entries: LogEntry[] = [];
    const log = createLogger({ level: 'debug', handler: (e) => entries.push(e) });

    log.info('job submitted', { jobId: 'job-1', workflowType: 'grow_optimizer' });

    assert.deepStrictEqual(entries[0]?.context, {
      jobId: 'job-1',
      workflowType: 'grow_optimizer',
    });
  });

  it('prefixes message with name', () => {
    const entries: LogEntry[] = [];
    const log = createLogger({ name: 'client', handler: (e) => entries.push(e) });

    log.info('hello');

    assert.strictEqual(entries[0]?.message, '[client] hello');
  });

  it('includes an ISO timestamp', () => {
    const entries: LogEntry[] = [];
    const log = createLogger({ handler: (e) => entries.push(e) });

    log.info('test');

    const timestamp = entries[0]?.timestamp ?? '';
    assert.strictEqual(new Date(timestamp).toISOString(), timestamp);
  });
});

describe('child logger', () => {
  it('joins parent and child names', () => {
    const entries: LogEntry[] = [];
    const parent = createLogger({ name: 'omotes', handler: (e) => entries.push(e) });
    const child = parent.child({ name: 'worker' });

    child.info('hello');

    assert.strictEqual(entries[0]?.message, '[omotes:worker] hello');
  });

  it('inherits parent level and handler', () => {
    const entries: LogEntry[] = [];
    const parent = createLogger({ level: 'warn', handler: (e) => entries.push(e) });
    const child = parent.child({});

    child.info('should not appear');
    child.warn('should appear');

    assert.strictEqual(entries.length, 1);
    assert.strictEqual(entries[0]?.level, 'warn');
  });

  it('uses child name when parent has no name', () => {
    const entries: LogEntry[] = [];
    const parent = createLogger({ handler: (e) => entries.push(e) });
    const child = parent.child({ name: 'bus' });

    child.info('hello');

    assert.strictEqual(entries[0]?.message, '[bus] hello');
  });
});

describe('configureLogging', () => {
  afterEach(() => {
    resetLogging();
  });

  it('redirects loggers created before the call', () => {
    const entries: LogEntry[] = [];
    const moduleLogger = logger.child({ name: 'orchestrator' });

    configureLogging({ handler: (e) => entries.push(e) });
    moduleLogger.error('dropped');

    assert.strictEqual(entries.length, 1);
    assert.strictEqual(entries[0]?.message, '[omotes:orchestrator] dropped');
  });

  it('applies the configured level to loggers without their own level', () => {
    const entries: LogEntry[] = [];
    const moduleLogger = logger.child({ name: 'worker' });

    configureLogging({ handler: (e) => entries.push(e), level: 'debug' });
    moduleLogger.debug('Sending progress update');
    configureLogging({ level: 'error' });
    moduleLogger.warn('Rounding the field value');
    moduleLogger.error('Failure detected');

    assert.deepStrictEqual(
      entries.map((e) => e.message),
      ['[omotes:worker] Sending progress update', '[omotes:worker] Failure detected']
    );
  });

  it('keeps the level a logger was created with', () => {
    const entries: LogEntry[] = [];
    const log = createLogger({ level: 'warn', handler: (e) => entries.push(e) });

    configureLogging({ level: 'debug' });
    log.info('ignored');

    assert.strictEqual(entries.length, 0);
  });

  it('restores the default level on reset', () => {
    const entries: LogEntry[] = [];
    configureLogging({ handler: (e) => entries.push(e), level: 'error' });
    resetLogging();
    configureLogging({ handler: (e) => entries.push(e) });

    logger.error('kept');
    logger.debug('filtered');

    assert.deepStrictEqual(
      entries.map((e) => e.message),
      ['[omotes] kept']
    );
  });
});

describe('parseLogLevel', () => {
  it('accepts any casing', () => {
    assert.strictEqual(parseLogLevel('DEBUG'), 'debug');
    assert.strictEqual(parseLogLevel(' Error '), 'error');
  });

  it('maps WARNING to warn', () => {
    assert.strictEqual(parseLogLevel('WARNING'), 'warn');
  });

  it('falls back for unknown or missing values', () => {
    assert.strictEqual(parseLogLevel('verbose'), 'info');
    assert.strictEqual(parseLogLevel(undefined, 'warn'), 'warn');
  });
});
