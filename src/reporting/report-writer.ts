import { join } from 'node:path';
import { randomUUID } from 'node:crypto';
import type { PipelineResult } from '../../packages/pipeline-engine/src/index.js';
import type { RuntimeConfig } from '../config/loader.js';
import type { ResolvedCacheDirective } from '../manifest/cache.js';
import { atomicWriteJSON, ensureDir, readJSON, readdirOrEmpty } from '../util/fs.js';
import {
  ReportSchema,
  type MatrixReport,
  type Report,
  type RunPhaseSummary,
  type RunReport,
} from './types.js';

/**
 * `report-<UTC start time>-<kind>.json`, e.g. `report-20240301T100000.000Z-run.json`.
 * Names sort in start order regardless of the local clock.
 */
export function reportFileName(report: Pick<Report, 'startTime' | 'kind'>): string {
  const timestamp = new Date(report.startTime).toISOString().replace(/[-:]/g, '');
  return `report-${timestamp}-${report.kind}.json`;
}

export class ReportWriter {
  constructor(private readonly config: RuntimeConfig) {}

  /**
   * Assemble a RunReport from one pipeline execution.
   */
  buildRunReport(
    result: PipelineResult,
    opts: { startTime: number; revision?: string; cacheDirectories: ResolvedCacheDirective[] },
  ): RunReport {
    const endTime = opts.startTime + result.duration;

    const phases: RunPhaseSummary[] = result.phases.map((phase) => ({
      name: phase.phaseName,
      status: phase.status,
      duration: phase.duration,
      commands: phase.commands.map((c) => ({
        index: c.command.index,
        list: c.command.list,
        command: c.command.run,
        exitCode: c.exitCode,
        signal: c.signal,
        duration: c.duration,
      })),
      error: phase.error,
      outputTail: phase.failedCommand?.outputTail,
    }));

    return {
      kind: 'run',
      runId: randomUUID(),
      project: this.config.projectName,
      manifest: this.config.manifestPath,
      revision: opts.revision,
      channel: result.channel,
      startTime: new Date(opts.startTime).toISOString(),
      endTime: new Date(endTime).toISOString(),
      duration: result.duration,
      success: result.success,
      exitCode: result.exitCode,
      interrupted: result.interrupted,
      phases,
      cacheDirectories: opts.cacheDirectories.map(({ phase, path, resolved, exists }) => ({
        phase,
        path,
        resolved,
        exists,
      })),
    };
  }

  /**
   * Assemble a MatrixReport from the per-channel run reports.
   * The matrix exit code is the first failed replay's exit code.
   */
  buildMatrixReport(runs: RunReport[], opts: { startTime: number; revision?: string }): MatrixReport {
    const endTime = Date.now();
    const firstFailure = runs.find((r) => !r.success);

    return {
      kind: 'matrix',
      runId: randomUUID(),
      project: this.config.projectName,
      manifest: this.config.manifestPath,
      revision: opts.revision,
      startTime: new Date(opts.startTime).toISOString(),
      endTime: new Date(endTime).toISOString(),
      duration: endTime - opts.startTime,
      success: firstFailure === undefined,
      exitCode: firstFailure ? firstFailure.exitCode || 1 : 0,
      channels: runs.map((r) => r.channel ?? '(none)'),
      runs,
    };
  }

  /**
   * Write the report as a timestamped JSON file to `<stateDir>/reports/`.
   * Returns the path of the written file.
   */
  async write(report: Report): Promise<string> {
    const reportsDir = join(this.config.stateDir, 'reports');
    await ensureDir(reportsDir);

    const filePath = join(reportsDir, reportFileName(report));

    await atomicWriteJSON(filePath, report);
    return filePath;
  }

  /**
   * List all report files in `<stateDir>/reports/`, oldest first.
   */
  static async listReports(stateDir: string): Promise<string[]> {
    const reportsDir = join(stateDir, 'reports');
    const entries = await readdirOrEmpty(reportsDir);
    return entries
      .filter((f) => f.startsWith('report-') && f.endsWith('.json'))
      .sort()
      .map((f) => join(reportsDir, f));
  }

  /**
   * Read and validate a report file.
   */
  static async readReport(filePath: string): Promise<Report> {
    const result = ReportSchema.safeParse(await readJSON(filePath));
    if (!result.success) {
      throw new Error(`Malformed report ${filePath}: ${result.error.issues[0]?.message ?? 'invalid'}`);
    }
    return result.data;
  }
}
