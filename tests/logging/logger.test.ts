import { describe, it, expect, vi, beforeEach } from 'vitest';

vi.mock('node:fs/promises', () => ({
  mkdir: vi.fn().mockResolvedValue(undefined),
  appendFile: vi.fn().mockResolvedValue(undefined),
}));

import { appendFile, mkdir } from 'node:fs/promises';
import { Logger } from '../../src/logging/logger.js';

const mockAppendFile = vi.mocked(appendFile);
const mockMkdir = vi.mocked(mkdir);

function writtenEntries(): unknown[] {
  return mockAppendFile.mock.calls.map(([, data]) => JSON.parse(String(data)));
}

describe('Logger', () => {
  let logger: Logger;

  beforeEach(() => {
    vi.clearAllMocks();
    logger = new Logger({ source: 'run', logDir: '/tmp/logs', level: 'info', console: false });
  });

  it('writes JSON lines to <logDir>/<source>.log', async () => {
    logger.info('hello', { phase: 'test', command: 2, channel: 'beta' });
    await logger.flush();

    expect(logger.filePath).toBe('/tmp/logs/run.log');
    expect(mockAppendFile).toHaveBeenCalledWith('/tmp/logs/run.log', expect.stringMatching(/\n$/), 'utf-8');
    expect(writtenEntries()).toEqual([
      {
        timestamp: expect.any(String),
        level: 'info',
        source: 'run',
        message: 'hello',
        phase: 'test',
        command: 2,
        channel: 'beta',
      },
    ]);
  });

  it('drops entries below the configured level', async () => {
    logger.debug('hidden');
    logger.warn('shown');
    await logger.flush();

    expect(writtenEntries()).toEqual([expect.objectContaining({ level: 'warn', message: 'shown' })]);
  });

  it('logs events with their payload as data', async () => {
    logger.event({ type: 'phase-skipped', phase: 'test', reason: 'an earlier phase failed' }, 'warn');
    await logger.flush();

    expect(writtenEntries()).toEqual([
      expect.objectContaining({
        level: 'warn',
        message: 'phase-skipped',
        data: { type: 'phase-skipped', phase: 'test', reason: 'an earlier phase failed' },
      }),
    ]);
  });

  it('formats console lines with time, level, source and context', () => {
    const line = logger.formatConsole({
      timestamp: new Date(2024, 0, 2, 3, 4, 5, 6).toISOString(),
      level: 'warn',
      source: 'run',
      phase: 'test',
      command: 1,
      channel: 'nightly',
      message: 'careful',
    });
    expect(line).toBe('03:04:05.006 WARN  [run] [test #1 nightly] careful');
  });

  it('omits the context brackets when there is no context', () => {
    const line = logger.formatConsole({
      timestamp: new Date(2024, 0, 2, 13, 0, 0, 0).toISOString(),
      level: 'info',
      source: 'run',
      message: 'plain',
    });
    expect(line).toBe('13:00:00.000 INFO  [run] plain');
  });

  it('prints errors to stderr when console output is on', () => {
    const errorSpy = vi.spyOn(console, 'error').mockImplementation(() => undefined);
    const consoleLogger = new Logger({ source: 'run', logDir: '/tmp/logs', level: 'info', console: true });
    consoleLogger.error('boom');
    expect(errorSpy).toHaveBeenCalledWith(expect.stringMatching(/ ERROR \[run\] boom$/));
    errorSpy.mockRestore();
  });

  it('disables file logging after a failed write and warns once', async () => {
    const warnSpy = vi.spyOn(console, 'warn').mockImplementation(() => undefined);
    mockAppendFile.mockRejectedValueOnce(new Error('EACCES'));

    logger.info('first');
    await logger.flush();
    logger.info('second');
    await logger.flush();

    expect(mockAppendFile).toHaveBeenCalledTimes(1);
    expect(warnSpy).toHaveBeenCalledTimes(1);
    expect(warnSpy).toHaveBeenCalledWith('Log file /tmp/logs/run.log disabled: EACCES');
    warnSpy.mockRestore();
  });

  it('creates the log directory once', async () => {
    logger.info('a');
    logger.info('b');
    await logger.flush();
    expect(mockMkdir).toHaveBeenCalledTimes(1);
    expect(mockMkdir).toHaveBeenCalledWith('/tmp/logs', { recursive: true });
  });

  it('gives each channel its own log file', () => {
    expect(logger.child('beta').filePath).toBe('/tmp/logs/run-beta.log');
  });
});
