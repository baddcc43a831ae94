import type { RuntimeConfig } from '../config/loader.js';
import { replayForChannel } from '../channels/replay.js';
import type { MatrixReport, RunReport } from '../reporting/types.js';
import type { PipelineRuntime, RunOptions } from './runtime.js';

export interface MatrixOutcome {
  report: MatrixReport;
  reportPath?: string;
}

/**
 * Replays the pipeline once per channel, one after another. Each replay
 * runs to its own completion or first failure; a failed channel does not
 * stop the channels after it. An interrupt does.
 */
export class MatrixRunner {
  constructor(
    private readonly config: RuntimeConfig,
    private readonly runtime: PipelineRuntime,
  ) {}

  async run(opts: Omit<RunOptions, 'channel'> = {}): Promise<MatrixOutcome> {
    const channels = this.config.channels;
    const base = await this.runtime.loadPipeline(opts);
    const replays = channels.map((channel) => replayForChannel(base, channel, channels));
    const revision = await this.runtime.revision();
    const logger = this.runtime.logger;
    const startTime = Date.now();

    logger.event({ type: 'matrix-started', channels: [...channels] });

    const runs = await this.runtime.withShutdownHandlers(async (signal) => {
      const reports: RunReport[] = [];
      for (const pipeline of replays) {
        if (signal.aborted) break;
        logger.info(`Replaying ${pipeline.source} for channel '${pipeline.channel ?? ''}'`);
        const channelLogger = logger.child(pipeline.channel ?? 'default');
        reports.push(await this.runtime.execute(pipeline, { logger: channelLogger, signal, revision }));
        await channelLogger.flush();
      }
      return reports;
    });

    const report = this.runtime.reports.buildMatrixReport(runs, { startTime, revision });
    logger.event(
      {
        type: 'matrix-completed',
        passed: runs.filter((r) => r.success).map((r) => r.channel ?? ''),
        failed: runs.filter((r) => !r.success).map((r) => r.channel ?? ''),
        duration: report.duration,
      },
      report.success ? 'info' : 'error',
    );

    const reportPath = await this.runtime.writeReport(report);
    await logger.flush();
    this.runtime.throwIfInterrupted();
    return { report, reportPath };
  }
}
