import type { RuntimeConfig } from '../config/loader.js';
import { ReportWriter } from '../reporting/report-writer.js';
import { renderMatrixSummary, renderRunSummary } from '../cli/status-renderer.js';
import type { Logger } from '../logging/logger.js';

export class ReportService {
  constructor(
    private readonly config: RuntimeConfig,
    private readonly logger: Logger,
  ) {}

  async report(options: { format?: string; history?: boolean } = {}): Promise<void> {
    const paths = await ReportWriter.listReports(this.config.stateDir);

    if (paths.length === 0) {
      console.log('No reports found.');
      return;
    }

    if (options.history) {
      for (const p of paths) {
        console.log(p);
      }
      return;
    }

    const mostRecent = paths[paths.length - 1];
    this.logger.debug(`Reading report ${mostRecent}`);
    const report = await ReportWriter.readReport(mostRecent);

    if (options.format === 'json') {
      console.log(JSON.stringify(report));
      return;
    }

    console.log(`\n=== phaserun ${report.kind === 'matrix' ? 'Matrix' : 'Run'} Report ===\n`);
    console.log(`  Run ID:   ${report.runId}`);
    console.log(`  Project:  ${report.project}`);
    console.log(`  Started:  ${report.startTime}`);
    if (report.revision) {
      console.log(`  Revision: ${report.revision}`);
    }
    console.log('');
    console.log(report.kind === 'matrix' ? renderMatrixSummary(report) : renderRunSummary(report));
    console.log('');
  }
}
