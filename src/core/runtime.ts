import { join, delimiter } from 'node:path';
import {
  PipelineExecutor,
  RunProgressWriter,
  getCommandCount,
  getPhaseCount,
  getPhaseSubset,
  isCommandFailure,
  type CommandRunner,
  type PhaseResult,
  type Pipeline,
} from '../../packages/pipeline-engine/src/index.js';
import { resolvePath, type RuntimeConfig } from '../config/loader.js';
import { replayForChannel } from '../channels/replay.js';
import { RuntimeInterruptedError } from '../errors.js';
import { ShellCommandRunner } from '../execution/shell-runner.js';
import { RevisionReader } from '../git/revision.js';
import { Logger } from '../logging/logger.js';
import { collectCacheDirectives, resolveCacheDirectives } from '../manifest/cache.js';
import { loadManifest } from '../manifest/parser.js';
import { ReportWriter } from '../reporting/report-writer.js';
import type { Report, RunReport } from '../reporting/types.js';
import { ensureDir } from '../util/fs.js';
import { killAllTrackedProcesses, stripRunnerEnv } from '../util/process.js';

export interface RunOptions {
  /** Replay the pipeline for a single channel. */
  channel?: string;
  /** Run only these phases, in pipeline order. */
  phases?: string[];
}

export interface RunOutcome {
  report: RunReport;
  /** Where the report was written; undefined when reports are disabled. */
  reportPath?: string;
}

export interface RuntimeDeps {
  runner?: CommandRunner;
  logger?: Logger;
  revisionReader?: { head(): Promise<string | undefined> };
}

const EXIT_CODES: Partial<Record<NodeJS.Signals, number>> = {
  SIGINT: 130,
  SIGTERM: 143,
};

/**
 * Top-level PipelineRuntime: loads the manifest, runs it, records the
 * outcome and owns interrupt handling.
 */
export class PipelineRuntime {
  readonly logger: Logger;
  private readonly runner: CommandRunner;
  private readonly executor = new PipelineExecutor();
  private readonly reportWriter: ReportWriter;
  private readonly revisionReader: { head(): Promise<string | undefined> };
  private interruptedBy: NodeJS.Signals | null = null;

  constructor(
    private readonly config: RuntimeConfig,
    deps: RuntimeDeps = {},
  ) {
    this.logger =
      deps.logger ??
      new Logger({
        source: 'run',
        logDir: join(config.stateDir, 'logs'),
        level: config.logging.level,
        console: config.logging.console,
      });
    this.runner = deps.runner ?? new ShellCommandRunner({ shell: config.shell });
    this.reportWriter = new ReportWriter(config);
    this.revisionReader = deps.revisionReader ?? new RevisionReader(config.workingDirectory, this.logger);
  }

  /**
   * Load the manifest and narrow it to the requested phases and channel.
   */
  async loadPipeline(opts: RunOptions = {}): Promise<Pipeline> {
    let pipeline = await loadManifest(this.config.manifestPath);
    if (opts.phases && opts.phases.length > 0) {
      pipeline = getPhaseSubset(pipeline, opts.phases);
    }
    if (opts.channel !== undefined) {
      pipeline = replayForChannel(pipeline, opts.channel, this.config.channels);
    }
    return pipeline;
  }

  /**
   * The inherited environment plus configured variables and PATH entries.
   */
  buildEnvironment(): Record<string, string | undefined> {
    const env: Record<string, string | undefined> = {
      ...stripRunnerEnv(process.env),
      ...this.config.environment.variables,
    };
    const extra = this.config.environment.extraPath.map((p) => resolvePath(p, this.config.workingDirectory));
    if (extra.length > 0) {
      env.PATH = [...extra, env.PATH].filter((p): p is string => Boolean(p)).join(delimiter);
    }
    return env;
  }

  /**
   * Run the pipeline once, write its report and print a summary.
   * Throws RuntimeInterruptedError after recording an interrupted run.
   */
  async run(opts: RunOptions = {}): Promise<RunOutcome> {
    const pipeline = await this.loadPipeline(opts);
    await ensureDir(this.config.stateDir);
    const revision = await this.revisionReader.head();

    const report = await this.withShutdownHandlers((signal) =>
      this.execute(pipeline, { logger: this.logger, signal, revision }),
    );

    const reportPath = await this.writeReport(report);
    await this.logger.flush();
    this.throwIfInterrupted();
    return { report, reportPath };
  }

  /**
   * Execute an already-loaded pipeline and build its report.
   */
  async execute(
    pipeline: Pipeline,
    opts: { logger: Logger; signal?: AbortSignal; revision?: string },
  ): Promise<RunReport> {
    const { logger } = opts;
    const startTime = Date.now();
    const channel = pipeline.channel;

    const progressDir = channel ? join(this.config.stateDir, 'channels', channel) : this.config.stateDir;
    const progress = new RunProgressWriter(progressDir, pipeline, logger);
    let finished: PhaseResult[] = [];
    let progressWrites: Promise<void> = Promise.resolve();
    const queueProgress = (current?: string): void => {
      const snapshot = [...finished];
      progressWrites = progressWrites
        .then(() => progress.write(snapshot, current))
        .catch((err: unknown) => {
          logger.warn(`Failed to write progress: ${err instanceof Error ? err.message : String(err)}`);
        });
    };

    const cacheDirectories = await resolveCacheDirectives(
      collectCacheDirectives(pipeline),
      this.config.workingDirectory,
    );
    if (cacheDirectories.length > 0) {
      logger.event({ type: 'cache-directories-recorded', paths: cacheDirectories.map((d) => d.resolved) });
    }

    logger.event({
      type: 'run-started',
      manifest: pipeline.source,
      channel,
      phaseCount: getPhaseCount(pipeline),
      commandCount: getCommandCount(pipeline),
    });

    const result = await this.executor.run(pipeline, {
      cwd: this.config.workingDirectory,
      env: this.buildEnvironment(),
      runner: this.runner,
      logger,
      signal: opts.signal,
      callbacks: {
        onPhaseStart: (phase) => {
          logger.event({ type: 'phase-started', phase: phase.name, commandCount: phase.commands.length });
          progress.appendEvent(`Phase ${phase.name} started`);
          queueProgress(phase.name);
        },
        onCommandStart: (command) => {
          logger.info(`$ ${command.run}`, { phase: command.phase, command: command.index, channel });
          logger.event(
            { type: 'command-started', phase: command.phase, index: command.index, command: command.run },
            'debug',
          );
        },
        onCommandComplete: (r) => {
          if (!isCommandFailure(r)) return;
          logger.event(
            {
              type: 'command-failed',
              phase: r.command.phase,
              index: r.command.index,
              command: r.command.run,
              exitCode: r.exitCode,
              signal: r.signal,
              duration: r.duration,
            },
            'error',
          );
        },
        onPhaseComplete: (r) => {
          finished = [...finished, r];
          if (r.status === 'skipped') return;
          logger.event({ type: 'phase-completed', phase: r.phaseName, status: r.status, duration: r.duration });
          progress.appendEvent(`Phase ${r.phaseName} ${r.status}`);
          queueProgress();
        },
      },
    });

    for (const phase of result.phases.filter((p) => p.status === 'skipped')) {
      const reason = result.interrupted ? 'run interrupted' : 'an earlier phase failed';
      logger.event({ type: 'phase-skipped', phase: phase.phaseName, reason }, 'debug');
    }

    finished = result.phases;
    queueProgress();
    await progressWrites;

    logger.event(
      {
        type: 'run-completed',
        success: result.success,
        exitCode: result.exitCode,
        channel,
        duration: result.duration,
      },
      result.success ? 'info' : 'error',
    );

    return this.reportWriter.buildRunReport(result, {
      startTime,
      revision: opts.revision,
      cacheDirectories,
    });
  }

  /**
   * Write a report unless reports are disabled.
   */
  async writeReport(report: Report): Promise<string | undefined> {
    if (!this.config.reports.enabled) return undefined;
    const path = await this.reportWriter.write(report);
    this.logger.debug(`Report written to ${path}`);
    return path;
  }

  /**
   * Run `fn` with SIGINT/SIGTERM handlers installed. The first signal aborts
   * the run and terminates running commands; a second one kills them.
   */
  async withShutdownHandlers<T>(fn: (signal: AbortSignal) => Promise<T>): Promise<T> {
    const controller = new AbortController();

    const onKillError = (pid: number, err: Error): void => {
      this.logger.warn(`Could not signal process group ${pid}: ${err.message}`);
    };
    const handler = (signal: NodeJS.Signals): void => {
      if (controller.signal.aborted) {
        killAllTrackedProcesses('SIGKILL', onKillError);
        return;
      }
      this.interruptedBy = signal;
      controller.abort();
      const processesSignalled = killAllTrackedProcesses('SIGTERM', onKillError);
      this.logger.warn(`Received ${signal}; stopping the run`);
      this.logger.event({ type: 'run-interrupted', signal, processesSignalled }, 'warn');
    };
    const onSigint = (): void => handler('SIGINT');
    const onSigterm = (): void => handler('SIGTERM');

    process.on('SIGINT', onSigint);
    process.on('SIGTERM', onSigterm);
    try {
      return await fn(controller.signal);
    } finally {
      process.off('SIGINT', onSigint);
      process.off('SIGTERM', onSigterm);
    }
  }

  /**
   * Throw RuntimeInterruptedError when a signal stopped the last run.
   */
  throwIfInterrupted(): void {
    if (this.interruptedBy === null) return;
    const signal = this.interruptedBy;
    this.interruptedBy = null;
    throw new RuntimeInterruptedError(`Run interrupted by ${signal}`, signal, EXIT_CODES[signal] ?? 1);
  }

  /**
   * Resolve HEAD for reports.
   */
  async revision(): Promise<string | undefined> {
    return this.revisionReader.head();
  }

  get reports(): ReportWriter {
    return this.reportWriter;
  }
}
