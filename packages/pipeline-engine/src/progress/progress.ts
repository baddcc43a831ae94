/**
 * Progress writer for a pipeline run's progress.md.
 */

import { join } from 'node:path';
import { atomicWriteFile, ensureDir } from '../util/fs.js';
import type { Logger, Pipeline, PhaseResult } from '../types.js';

const STATUS_EMOJI: Record<PhaseResult['status'] | 'running' | 'pending', string> = {
  passed: '✅',
  failed: '❌',
  skipped: '⏭️',
  running: '🔄',
  pending: '⏳',
};

/**
 * Writes progress.md for the current run into the state directory.
 */
export class RunProgressWriter {
  private readonly progressPath: string;
  private events: string[] = [];

  constructor(
    private readonly stateDir: string,
    private readonly pipeline: Pipeline,
    private readonly logger: Logger,
  ) {
    this.progressPath = join(stateDir, 'progress.md');
  }

  /**
   * Write or update the progress file.
   */
  async write(phases: PhaseResult[], currentPhase?: string): Promise<void> {
    await ensureDir(this.stateDir);

    const title = this.pipeline.channel
      ? `${this.pipeline.source} (${this.pipeline.channel})`
      : this.pipeline.source;

    let md = `# Pipeline: ${title}\n\n`;
    md += `- **Last Updated**: ${new Date().toISOString()}\n\n`;
    md += `## Phases\n\n`;
    md += `| # | Phase | Status | Commands | Duration |\n`;
    md += `|---|-------|--------|----------|----------|`;

    this.pipeline.phases.forEach((phase, i) => {
      const result = phases.find((p) => p.phaseName === phase.name);
      const status = result ? result.status : phase.name === currentPhase ? 'running' : 'pending';
      const ran = result ? result.commands.length : 0;
      const duration = result ? `${(result.duration / 1000).toFixed(1)}s` : '—';
      md += `\n| ${i + 1} | ${phase.name} | ${STATUS_EMOJI[status]} ${status} | ${ran}/${phase.commands.length} | ${duration} |`;
    });

    const failed = phases.filter((p) => p.failedCommand !== undefined);
    if (failed.length > 0) {
      md += `\n\n## Failures\n`;
      for (const phase of failed) {
        md += `\n### ${phase.phaseName}\n\n`;
        md += `- ❌ ${phase.error ?? 'failed'}\n`;
        const tail = phase.failedCommand?.outputTail ?? [];
        if (tail.length > 0) {
          md += `\n\`\`\`\n${tail.join('\n')}\n\`\`\`\n`;
        }
      }
    }

    if (this.events.length > 0) {
      md += `\n\n## Event Log\n\n`;
      for (const event of this.events.slice(-20)) {
        md += `- ${event}\n`;
      }
    }

    md += '\n';

    await atomicWriteFile(this.progressPath, md);
    this.logger.debug(`Progress written to ${this.progressPath}`);
  }

  /**
   * Append an event to the progress log.
   */
  appendEvent(event: string): void {
    const ts = new Date().toISOString().slice(11, 19);
    this.events.push(`\`${ts}\` ${event}`);
  }
}
