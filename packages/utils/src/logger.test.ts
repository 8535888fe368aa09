import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import fs from 'node:fs';
import os from 'node:os';
import path from 'node:path';
import { createLogger, formatLogEntry } from './logger.js';

describe('logger', () => {
  const saved = { ...process.env };

  beforeEach(() => {
    delete process.env.PARLEY_LOG_FILE;
    delete process.env.PARLEY_LOG_JSON;
  });

  afterEach(() => {
    process.env = { ...saved };
    vi.restoreAllMocks();
  });

  it('formats text entries with extra fields', () => {
    const line = formatLogEntry(
      { ts: '2024-01-01T00:00:00.000Z', level: 'INFO', component: 'session', msg: 'appended', sequence: 3 },
      false
    );
    expect(line).toBe('2024-01-01T00:00:00.000Z [INFO] [session] appended sequence=3');
  });

  it('formats JSON entries', () => {
    const line = formatLogEntry(
      { ts: '2024-01-01T00:00:00.000Z', level: 'WARN', component: 'storage', msg: 'slow' },
      true
    );
    expect(JSON.parse(line)).toEqual({
      ts: '2024-01-01T00:00:00.000Z',
      level: 'WARN',
      component: 'storage',
      msg: 'slow',
    });
  });

  it('filters by PARLEY_LOG_LEVEL', () => {
    process.env.PARLEY_LOG_LEVEL = 'WARN';
    const logSpy = vi.spyOn(console, 'log').mockImplementation(() => {});
    const errSpy = vi.spyOn(console, 'error').mockImplementation(() => {});
    const log = createLogger('test');

    log.info('hidden');
    log.warn('shown');

    expect(logSpy).not.toHaveBeenCalled();
    expect(errSpy).toHaveBeenCalledTimes(1);
    expect(String(errSpy.mock.calls[0][0])).toContain('[WARN] [test] shown');
  });

  it('writes to PARLEY_LOG_FILE instead of the console', () => {
    const dir = fs.mkdtempSync(path.join(os.tmpdir(), 'parley-log-'));
    const file = path.join(dir, 'nested', 'parley.log');
    process.env.PARLEY_LOG_FILE = file;
    process.env.PARLEY_LOG_LEVEL = 'DEBUG';
    const logSpy = vi.spyOn(console, 'log').mockImplementation(() => {});

    createLogger('file-test').debug('to disk', { id: 'x' });

    expect(logSpy).not.toHaveBeenCalled();
    expect(fs.readFileSync(file, 'utf-8')).toMatch(/\[DEBUG\] \[file-test\] to disk id=x\n$/);
    fs.rmSync(dir, { recursive: true, force: true });
  });
});
