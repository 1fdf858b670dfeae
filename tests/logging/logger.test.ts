import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import fs from 'node:fs';
import path from 'node:path';
import { closeLogger, getLogFilePath, initLogger, logger, parseLogLevel } from '../../src/logging/logger.js';
import { makeTempDir } from '../fixtures.js';

let tempDir: string;

beforeEach(() => {
  tempDir = makeTempDir('log');
});

afterEach(() => {
  closeLogger();
  fs.rmSync(tempDir, { recursive: true, force: true });
});

function readEntries(filePath: string): Record<string, unknown>[] {
  return fs
    .readFileSync(filePath, 'utf-8')
    .trim()
    .split('\n')
    .map((line): Record<string, unknown> => JSON.parse(line));
}

describe('logger', () => {
  it('does nothing before init', () => {
    logger.error('dropped');
    expect(getLogFilePath()).toBeNull();
  });

  it('writes NDJSON entries at or above the level', () => {
    const filePath = initLogger(path.join(tempDir, 'logs'), 'info');
    expect(filePath).toBe(path.join(tempDir, 'logs', 'gcm.log'));

    logger.debug('hidden');
    logger.info('launching', { profile: 'dev', extensions: 2 });
    logger.warn('careful');

    const entries = readEntries(filePath);
    expect(entries.map((e) => e.msg)).toEqual(['launching', 'careful']);
    expect(entries[0]).toMatchObject({ level: 'info', profile: 'dev', extensions: 2 });
    expect(typeof entries[0]?.ts).toBe('string');
  });

  it('does not let fields override the reserved keys', () => {
    const filePath = initLogger(tempDir, 'debug');
    logger.debug('real', { msg: 'fake', level: 'error' });
    expect(readEntries(filePath)[0]).toMatchObject({ msg: 'real', level: 'debug' });
  });

  it('parses level names', () => {
    expect(parseLogLevel('DEBUG')).toBe('debug');
    expect(parseLogLevel('warning')).toBe('warn');
    expect(parseLogLevel(' error ')).toBe('error');
    expect(parseLogLevel(undefined)).toBe('info');
    expect(parseLogLevel('verbose')).toBe('info');
  });
});
