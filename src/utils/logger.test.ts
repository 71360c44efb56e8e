import { describe, it, afterEach } from 'node:test';
import assert from 'node:assert/strict';
import * as fs from 'node:fs/promises';
import * as path from 'node:path';
import * as os from 'node:os';

import {
  configureLogging,
  createLogger,
  isLogLevel,
  resetLogging,
  type LogEntry,
} from './logger.js';

describe('createLogger', () => {
  it('emits entries at each level when level=debug', () => {
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

  it('drops entries below the configured level', () => {
    const entries: LogEntry[] = [];
    const log = createLogger({ level: 'warn', handler: (e) => entries.push(e) });

    log.debug('no');
    log.info('no');
    log.warn('yes');

    assert.strictEqual(entries.length, 1);
    assert.strictEqual(entries[0]?.message, 'yes');
  });

  it('carries context and an ISO timestamp', () => {
    const entries: LogEntry[] = [];
    const log = createLogger({ handler: (e) => entries.push(e) });

    log.info('refused', { code: 'Disallowed' });

    assert.deepStrictEqual(entries[0]?.context, { code: 'Disallowed' });
    const stamp = entries[0]?.timestamp ?? '';
    assert.strictEqual(new Date(stamp).toISOString(), stamp);
  });

  it('prefixes messages with the logger name', () => {
    const entries: LogEntry[] = [];
    const log = createLogger({ name: 'sandbox', handler: (e) => entries.push(e) });

    log.info('hello');

    assert.strictEqual(entries[0]?.message, '[sandbox] hello');
  });
});

describe('child logger', () => {
  it('nests names', () => {
    const entries: LogEntry[] = [];
    const parent = createLogger({ name: 'sandbox', handler: (e) => entries.push(e) });

    parent.child({ name: 'git' }).info('classified');

    assert.strictEqual(entries[0]?.message, '[sandbox:git] classified');
  });

  it('inherits level and handler unless overridden', () => {
    const entries: LogEntry[] = [];
    const parent = createLogger({ level: 'error', handler: (e) => entries.push(e) });

    parent.child({}).warn('hidden');
    parent.child({ level: 'debug' }).debug('shown');

    assert.strictEqual(entries.length, 1);
    assert.strictEqual(entries[0]?.message, 'shown');
  });

  it('uses the child name when the parent has none', () => {
    const entries: LogEntry[] = [];
    const parent = createLogger({ handler: (e) => entries.push(e) });

    parent.child({ name: 'paths' }).info('x');

    assert.strictEqual(entries[0]?.message, '[paths] x');
  });
});

describe('configureLogging', () => {
  afterEach(() => {
    resetLogging();
  });

  it('redirects loggers created before the call', () => {
    const log = createLogger({ name: 'early' });
    const entries: LogEntry[] = [];
    configureLogging({ handler: (e) => entries.push(e) });

    log.warn('late');

    assert.strictEqual(entries[0]?.message, '[early] late');
  });

  it('appends formatted lines to a file', async () => {
    const dir = await fs.mkdtemp(path.join(os.tmpdir(), 'sandbox-log-test-'));
    const file = path.join(dir, 'out.log');
    try {
      configureLogging({ file });
      createLogger({ name: 'f' }).error('boom', { n: 1 });

      const text = await fs.readFile(file, 'utf8');
      assert.match(text, /^\[[^\]]+\] ERROR: \[f\] boom \{"n":1\}\n$/);
    } finally {
      await fs.rm(dir, { recursive: true, force: true });
    }
  });
});

describe('isLogLevel', () => {
  it('accepts known levels only', () => {
    assert.strictEqual(isLogLevel('warn'), true);
    assert.strictEqual(isLogLevel('verbose'), false);
    assert.strictEqual(isLogLevel(undefined), false);
  });
});
