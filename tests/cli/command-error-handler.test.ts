import { describe, it, expect, vi, beforeEach, afterEach, type MockInstance } from 'vitest';
import { handleCommandError, withCommandHandler } from '../../src/cli/command-error-handler.js';
import { ConfigLoadError } from '../../src/config/loader.js';
import {
  CommandFailedError,
  ManifestError,
  MatrixFailedError,
  RuntimeInterruptedError,
  UnknownChannelError,
  UnknownPhaseError,
} from '../../src/errors.js';

class ExitCalled extends Error {
  constructor(readonly code: string | number | null | undefined) {
    super(`process.exit(${String(code)})`);
  }
}

function exitCodeOf(err: unknown): string | number | null | undefined {
  try {
    handleCommandError(err);
  } catch (e) {
    if (e instanceof ExitCalled) return e.code;
    throw e;
  }
}

describe('handleCommandError', () => {
  let exitSpy: MockInstance<typeof process.exit>;
  let errorSpy: MockInstance<typeof console.error>;

  beforeEach(() => {
    exitSpy = vi.spyOn(process, 'exit').mockImplementation((code) => {
      throw new ExitCalled(code);
    });
    errorSpy = vi.spyOn(console, 'error').mockImplementation(() => undefined);
  });

  afterEach(() => {
    exitSpy.mockRestore();
    errorSpy.mockRestore();
  });

  it('exits with the failing command status', () => {
    expect(exitCodeOf(new CommandFailedError('Pipeline failed', 'test', 'cargo test', 101))).toBe(101);
    expect(errorSpy).toHaveBeenCalledWith(expect.stringContaining('Error: Pipeline failed'));
  });

  it('exits with the matrix exit code', () => {
    expect(exitCodeOf(new MatrixFailedError('1 of 3 channel(s) failed: beta', ['beta'], 2))).toBe(2);
  });

  it('exits with the signal exit code when interrupted', () => {
    expect(exitCodeOf(new RuntimeInterruptedError('Run interrupted by SIGINT', 'SIGINT', 130))).toBe(130);
  });

  it('exits 1 for configuration and manifest errors', () => {
    expect(exitCodeOf(new ConfigLoadError('Config file not found: /x'))).toBe(1);
    expect(exitCodeOf(new ManifestError('Manifest circle.yml is empty', 'circle.yml'))).toBe(1);
    expect(exitCodeOf(new UnknownPhaseError("Unknown phase(s) 'x'", ['x']))).toBe(1);
    expect(exitCodeOf(new UnknownChannelError("Unknown channel 'x'", 'x', ['stable']))).toBe(1);
  });

  it('exits 1 for anything else', () => {
    expect(exitCodeOf('plain string')).toBe(1);
    expect(errorSpy).toHaveBeenCalledWith(expect.stringContaining('Error: plain string'));
  });
});

describe('withCommandHandler', () => {
  it('passes arguments through and leaves successful actions alone', async () => {
    const action = vi.fn(async (_name: string) => undefined);
    await withCommandHandler(action)('beta');
    expect(action).toHaveBeenCalledWith('beta');
  });

  it('routes a rejected action to the error handler', async () => {
    const exitSpy = vi.spyOn(process, 'exit').mockImplementation((code) => {
      throw new ExitCalled(code);
    });
    const errorSpy = vi.spyOn(console, 'error').mockImplementation(() => undefined);

    const wrapped = withCommandHandler(async () => {
      throw new CommandFailedError('boom', 'test', 'false', 7);
    });
    await expect(wrapped()).rejects.toMatchObject({ code: 7 });

    exitSpy.mockRestore();
    errorSpy.mockRestore();
  });
});
