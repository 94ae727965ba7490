import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { existsSync, mkdtempSync, readFileSync, rmSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { createSubsystemLogger, getLogOutputFailure, parseLevel, setLogLevel, setLogOutput } from './subsystem.js';

describe('Subsystem Logging', () => {
  let dir: string;
  let logFile: string;

  const records = () =>
    readFileSync(logFile, 'utf8')
      .trimEnd()
      .split('\n')
      .map(line => JSON.parse(line));

  beforeEach(() => {
    dir = mkdtempSync(join(tmpdir(), 'sysdash-log-'));
    logFile = join(dir, 'sysdash.log');
    setLogOutput({ kind: 'file', path: logFile });
    setLogLevel('info');
  });

  afterEach(() => {
    setLogOutput({ kind: 'discard' });
    rmSync(dir, { recursive: true, force: true });
  });

  it('should write one JSON record per call with level, subsystem and fields', () => {
    createSubsystemLogger('test/subsystem').info('Sampler ready', { source: 'gpu' });

    const [record, ...rest] = records();
    expect(rest).toEqual([]);
    expect(record).toMatchObject({ level: 'info', subsystem: 'test/subsystem', source: 'gpu', msg: 'Sampler ready' });
    expect(record.time).toMatch(/^\d{4}-\d{2}-\d{2}T/);
  });

  it('should drop records below the minimum level', () => {
    const log = createSubsystemLogger('test/subsystem');
    log.debug('hidden');
    log.warn('shown');

    expect(records().map(r => r.msg)).toEqual(['shown']);
  });

  it('should apply a level change to loggers created earlier', () => {
    const log = createSubsystemLogger('test/subsystem');
    setLogLevel('debug');
    log.debug('now visible');

    expect(records().map(r => r.level)).toEqual(['debug']);
  });

  it('should write nothing while output is discarded', () => {
    setLogOutput({ kind: 'discard' });
    createSubsystemLogger('test/subsystem').error('dropped');

    expect(existsSync(logFile)).toBe(false);
    expect(getLogOutputFailure()).toBeUndefined();
  });

  it('should turn logging off instead of throwing when the log file cannot be written', () => {
    const unwritable = join(dir, 'missing', 'sysdash.log');
    setLogOutput({ kind: 'file', path: unwritable });
    const log = createSubsystemLogger('test/subsystem');

    expect(() => log.warn('first')).not.toThrow();
    expect(getLogOutputFailure()).toBe(`${unwritable}: ENOENT: no such file or directory, open '${unwritable}'`);

    setLogOutput({ kind: 'file', path: logFile });
    log.warn('second');

    expect(getLogOutputFailure()).toBeUndefined();
    expect(records().map(r => r.msg)).toEqual(['second']);
  });

  it('should parse level names case-insensitively', () => {
    expect(parseLevel(' WARN ')).toBe('warn');
    expect(parseLevel('verbose')).toBeUndefined();
    expect(parseLevel(undefined)).toBeUndefined();
  });
});
