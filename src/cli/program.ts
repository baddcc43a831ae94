import { Command, InvalidArgumentError } from 'commander';
import chalk from 'chalk';
import { runInit } from './init.js';
import { withCommandHandler } from './command-error-handler.js';
import {
  renderCacheDirectives,
  renderMatrixSummary,
  renderPlan,
  renderRunSummary,
} from './status-renderer.js';
import { loadConfig, applyOverrides, type RuntimeConfig } from '../config/loader.js';
import { PipelineRuntime } from '../core/runtime.js';
import { MatrixRunner } from '../core/matrix-runner.js';
import { ReportService } from '../core/report-service.js';
import { CommandFailedError, MatrixFailedError } from '../errors.js';
import type { LogLevel } from '../logging/events.js';
import { Logger } from '../logging/logger.js';
import { collectCacheDirectives, resolveCacheDirectives } from '../manifest/cache.js';
import { loadManifest } from '../manifest/parser.js';
import type { RunReport } from '../reporting/types.js';
import { PreRunValidationSuite } from '../validation/suite.js';

interface CommonOptions {
  config?: string;
  manifest?: string;
  shell?: string;
  logLevel?: LogLevel;
}

interface RunCliOptions extends CommonOptions {
  channel?: string;
  phase?: string[];
  dryRun?: boolean;
  report: boolean;
}

interface MatrixCliOptions extends CommonOptions {
  channels?: string[];
  phase?: string[];
  report: boolean;
}

interface ReportCliOptions {
  config?: string;
  format: string;
  history?: boolean;
}

const LOG_LEVELS: readonly LogLevel[] = ['debug', 'info', 'warn', 'error'];

function parseLogLevel(value: string): LogLevel {
  const level = LOG_LEVELS.find((l) => l === value);
  if (level === undefined) {
    throw new InvalidArgumentError(`Expected one of: ${LOG_LEVELS.join(', ')}.`);
  }
  return level;
}

function withCommonOptions(command: Command): Command {
  return command
    .option('-c, --config <path>', 'Path to phaserun.config.json (default: ./phaserun.config.json when present)')
    .option('-m, --manifest <path>', 'Override: manifest file')
    .option('--shell <path>', 'Override: shell that runs each command')
    .option('--log-level <level>', 'Override: debug, info, warn or error', parseLogLevel);
}

async function configFrom(opts: CommonOptions & { channels?: string[]; report?: boolean }): Promise<RuntimeConfig> {
  const config = await loadConfig(opts.config);
  return applyOverrides(config, {
    manifest: opts.manifest,
    shell: opts.shell,
    logLevel: opts.logLevel,
    channels: opts.channels,
    noReport: opts.report === false,
  });
}

/**
 * The error a failed run exits with: the failing command and its exit status.
 */
export function failureOf(report: RunReport): CommandFailedError {
  const phase = report.phases.find((p) => p.status === 'failed');
  const command = phase?.commands[phase.commands.length - 1];
  const where = phase && command ? ` in phase '${phase.name}': ${command.command}` : '';
  return new CommandFailedError(
    `Pipeline failed with exit status ${report.exitCode}${where}`,
    phase?.name ?? '',
    command?.command ?? '',
    report.exitCode,
  );
}

/**
 * Build the `phaserun` command-line program.
 */
export function createProgram(): Command {
  const program = new Command();

  program
    .name('phaserun')
    .description('Run CI phase manifests locally, once or per toolchain channel')
    .version('0.1.0');

  // ─── run ──────────────────────────────────────────────
  withCommonOptions(program.command('run'))
    .description('Run the manifest phases in order, stopping at the first failing command')
    .option('--channel <name>', 'Replay the pipeline for one channel')
    .option('-p, --phase <names...>', 'Run only these phases')
    .option('-d, --dry-run', 'Print the plan without running anything')
    .option('--no-report', 'Do not write a run report')
    .action(withCommandHandler(async (opts: RunCliOptions) => {
      const config = await configFrom(opts);
      const runtime = new PipelineRuntime(config);

      if (opts.dryRun) {
        const pipeline = await runtime.loadPipeline({ channel: opts.channel, phases: opts.phase });
        console.log(renderPlan(pipeline, config.channels));
        return;
      }

      const { report, reportPath } = await runtime.run({ channel: opts.channel, phases: opts.phase });
      console.log('');
      console.log(renderRunSummary(report));
      if (reportPath) {
        console.log(chalk.dim(`\nReport: ${reportPath}`));
      }

      if (!report.success) {
        throw failureOf(report);
      }
    }));

  // ─── matrix ───────────────────────────────────────────
  withCommonOptions(program.command('matrix'))
    .description('Replay the pipeline once per channel, one after another')
    .option('--channels <names...>', 'Override: channels to replay')
    .option('-p, --phase <names...>', 'Run only these phases')
    .option('--no-report', 'Do not write a matrix report')
    .action(withCommandHandler(async (opts: MatrixCliOptions) => {
      const config = await configFrom(opts);
      const runtime = new PipelineRuntime(config);
      const { report, reportPath } = await new MatrixRunner(config, runtime).run({ phases: opts.phase });

      console.log('');
      console.log(renderMatrixSummary(report));
      if (reportPath) {
        console.log(chalk.dim(`\nReport: ${reportPath}`));
      }

      if (!report.success) {
        const failed = report.runs.filter((r) => !r.success).map((r) => r.channel ?? '');
        throw new MatrixFailedError(
          `${failed.length} of ${report.runs.length} channel(s) failed: ${failed.join(', ')}`,
          failed,
          report.exitCode,
        );
      }
    }));

  // ─── validate ─────────────────────────────────────────
  withCommonOptions(program.command('validate'))
    .description('Run pre-flight checks against the configuration and manifest')
    .action(withCommandHandler(async (opts: CommonOptions) => {
      const config = await configFrom(opts);
      const suite = new PreRunValidationSuite();
      const result = await suite.run(config);
      console.log(suite.formatResults(result));
      if (!result.passed) {
        process.exit(1);
      }
    }));

  // ─── cache ────────────────────────────────────────────
  withCommonOptions(program.command('cache'))
    .description('List the cache directories the manifest declares')
    .action(withCommandHandler(async (opts: CommonOptions) => {
      const config = await configFrom(opts);
      const pipeline = await loadManifest(config.manifestPath);
      const directives = await resolveCacheDirectives(collectCacheDirectives(pipeline), config.workingDirectory);
      console.log(renderCacheDirectives(directives));
    }));

  // ─── report ───────────────────────────────────────────
  program
    .command('report')
    .description('Show the most recent run or matrix report')
    .option('-c, --config <path>', 'Path to phaserun.config.json')
    .option('-f, --format <format>', 'Output format (json for raw JSON)', 'human')
    .option('--history', 'List all report files, oldest first')
    .action(withCommandHandler(async (opts: ReportCliOptions) => {
      const config = await loadConfig(opts.config);
      const logger = new Logger({
        source: 'report',
        logDir: `${config.stateDir}/logs`,
        level: config.logging.level,
        console: config.logging.console,
      });
      const service = new ReportService(config, logger);
      await service.report({ format: opts.format, history: opts.history });
    }));

  // ─── init ─────────────────────────────────────────────
  program
    .command('init')
    .description('Create phaserun.config.json and a starter manifest in the current directory')
    .option('-y, --yes', 'Accept all defaults without prompting')
    .action(withCommandHandler(async (opts: { yes?: boolean }) => {
      await runInit({ yes: !!opts.yes });
    }));

  return program;
}
