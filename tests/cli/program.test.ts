import { describe, it, expect, vi, beforeEach, afterEach, type MockInstance } from 'vitest';
import chalk from 'chalk';
import { createProgram, failureOf } from '../../src/cli/program.js';
import { renderMatrixSummary, renderPlan, renderRunSummary } from '../../src/cli/status-renderer.js';
import { MatrixRunner } from '../../src/core/matrix-runner.js';
import { PipelineRuntime } from '../../src/core/runtime.js';
import { parseManifest } from '../../src/manifest/parser.js';
import { makeMatrixReport, makeRunReport } from '../helpers/report-fixtures.js';
import { MATRIX_MANIFEST, makeConfig } from '../helpers/runtime-fixtures.js';

const mocks = vi.hoisted(() => ({
  loadConfig: vi.fn(),
  run: vi.fn(),
  loadPipeline: vi.fn(),
  matrixRun: vi.fn(),
}));

vi.mock('../../src/config/loader.js', async (importOriginal) => {
  const actual = await importOriginal<typeof import('../../src/config/loader.js')>();
  return { ...actual, loadConfig: mocks.loadConfig };
});

vi.mock('../../src/core/runtime.js', () => ({
  PipelineRuntime: vi.fn().mockImplementation(function () {
    return { run: mocks.run, loadPipeline: mocks.loadPipeline };
  }),
}));

vi.mock('../../src/core/matrix-runner.js', () => ({
  MatrixRunner: vi.fn().mockImplementation(function () {
    return { run: mocks.matrixRun };
  }),
}));

class ExitCalled extends Error {
  constructor(readonly code: string | number | null | undefined) {
    super(`process.exit(${String(code)})`);
  }
}

async function runCli(...args: string[]): Promise<void> {
  await createProgram().parseAsync(['node', 'phaserun', ...args]);
}

async function exitCodeOf(...args: string[]): Promise<string | number | null | undefined> {
  try {
    await runCli(...args);
  } catch (err) {
    if (err instanceof ExitCalled) return err.code;
    throw err;
  }
  throw new Error('expected the command to exit');
}

describe('phaserun program', () => {
  const config = makeConfig('/work');
  let exitSpy: MockInstance<typeof process.exit>;
  let logSpy: MockInstance<typeof console.log>;
  let errorSpy: MockInstance<typeof console.error>;

  beforeEach(() => {
    vi.clearAllMocks();
    mocks.loadConfig.mockResolvedValue(config);
    exitSpy = vi.spyOn(process, 'exit').mockImplementation((code) => {
      throw new ExitCalled(code);
    });
    logSpy = vi.spyOn(console, 'log').mockImplementation(() => undefined);
    errorSpy = vi.spyOn(console, 'error').mockImplementation(() => undefined);
  });

  afterEach(() => {
    exitSpy.mockRestore();
    logSpy.mockRestore();
    errorSpy.mockRestore();
  });

  it('registers every command', () => {
    expect(createProgram().commands.map((c) => c.name())).toEqual([
      'run',
      'matrix',
      'validate',
      'cache',
      'report',
      'init',
    ]);
  });

  describe('run', () => {
    it('exits with the failing command status', async () => {
      const report = makeRunReport();
      mocks.run.mockResolvedValue({ report, reportPath: '/work/.state/reports/r.json' });

      expect(await exitCodeOf('run', '--channel', 'beta', '-p', 'test')).toBe(101);

      expect(mocks.run).toHaveBeenCalledWith({ channel: 'beta', phases: ['test'] });
      expect(logSpy).toHaveBeenCalledWith(renderRunSummary(report));
      expect(logSpy).toHaveBeenCalledWith(chalk.dim('\nReport: /work/.state/reports/r.json'));
      expect(errorSpy).toHaveBeenCalledWith(
        chalk.red("Error: Pipeline failed with exit status 101 in phase 'test': cargo test"),
      );
    });

    it('returns normally when the pipeline passes', async () => {
      mocks.run.mockResolvedValue({ report: makeRunReport({ success: true, exitCode: 0 }) });

      await runCli('run');

      expect(exitSpy).not.toHaveBeenCalled();
      expect(mocks.run).toHaveBeenCalledWith({ channel: undefined, phases: undefined });
    });

    it('prints the plan on a dry run without running anything', async () => {
      const pipeline = parseManifest(MATRIX_MANIFEST, 'circle.yml');
      mocks.loadPipeline.mockResolvedValue(pipeline);

      await runCli('run', '--dry-run', '--channel', 'stable');

      expect(mocks.loadPipeline).toHaveBeenCalledWith({ channel: 'stable', phases: undefined });
      expect(mocks.run).not.toHaveBeenCalled();
      expect(logSpy).toHaveBeenCalledTimes(1);
      expect(logSpy).toHaveBeenCalledWith(renderPlan(pipeline, ['stable', 'beta']));
    });

    it('applies command-line overrides to the configuration', async () => {
      mocks.run.mockResolvedValue({ report: makeRunReport({ success: true, exitCode: 0 }) });

      await runCli('run', '-c', 'ci.json', '--shell', '/bin/sh', '--log-level', 'warn', '--no-report');

      expect(mocks.loadConfig).toHaveBeenCalledWith('ci.json');
      const [runtimeConfig] = vi.mocked(PipelineRuntime).mock.calls[0];
      expect(runtimeConfig.shell).toBe('/bin/sh');
      expect(runtimeConfig.logging.level).toBe('warn');
      expect(runtimeConfig.reports.enabled).toBe(false);
    });

    it('rejects an unknown log level', async () => {
      const program = createProgram();
      const written: string[] = [];
      for (const command of program.commands) {
        command.configureOutput({ writeErr: (str) => written.push(str) });
      }

      await expect(program.parseAsync(['node', 'phaserun', 'run', '--log-level', 'loud'])).rejects.toBeInstanceOf(
        ExitCalled,
      );
      expect(exitSpy).toHaveBeenCalledWith(1);
      expect(written.join('')).toBe(
        "error: option '--log-level <level>' argument 'loud' is invalid. Expected one of: debug, info, warn, error.\n",
      );
      expect(mocks.run).not.toHaveBeenCalled();
    });
  });

  describe('matrix', () => {
    it('exits with the first failing channel status', async () => {
      const report = makeMatrixReport();
      mocks.matrixRun.mockResolvedValue({ report });

      expect(await exitCodeOf('matrix', '--channels', 'stable', 'beta')).toBe(101);

      expect(mocks.matrixRun).toHaveBeenCalledWith({ phases: undefined });
      const [matrixConfig] = vi.mocked(MatrixRunner).mock.calls[0];
      expect(matrixConfig.channels).toEqual(['stable', 'beta']);
      expect(logSpy).toHaveBeenCalledWith(renderMatrixSummary(report));
      expect(errorSpy).toHaveBeenCalledWith(chalk.red('Error: 1 of 2 channel(s) failed: beta'));
    });
  });
});

describe('failureOf', () => {
  it('names the last command of the failed phase', () => {
    const err = failureOf(makeRunReport());
    expect(err).toMatchObject({ phase: 'test', command: 'cargo test', exitCode: 101 });
  });

  it('falls back to the exit status alone when no phase failed', () => {
    const err = failureOf(makeRunReport({ exitCode: 130, phases: [] }));
    expect(err.message).toBe('Pipeline failed with exit status 130');
    expect(err).toMatchObject({ phase: '', command: '', exitCode: 130 });
  });
});
