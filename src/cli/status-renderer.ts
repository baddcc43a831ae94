import type { Pipeline } from '../../packages/pipeline-engine/src/index.js';
import { mentionedChannels } from '../channels/replay.js';
import type { ResolvedCacheDirective } from '../manifest/cache.js';
import type { MatrixReport, RunPhaseSummary, RunReport } from '../reporting/types.js';
import { formatElapsed } from '../util/duration.js';

const STATUS_EMOJI: Record<RunPhaseSummary['status'], string> = {
  passed: '✅',
  failed: '❌',
  skipped: '⏭️',
};

function resultLabel(success: boolean, exitCode: number): string {
  return success ? '✅ passed' : `❌ failed (exit ${exitCode})`;
}

/**
 * Renders a finished run as a header, a phase table and, on failure, the
 * failed command with its last output lines.
 */
export function renderRunSummary(report: RunReport): string {
  const header = [
    `Manifest: ${report.manifest}`,
    ...(report.channel ? [`Channel: ${report.channel}`] : []),
    `Result: ${report.interrupted ? '⚠️ interrupted' : resultLabel(report.success, report.exitCode)}`,
    `Duration: ${formatElapsed(report.duration)}`,
  ].join('  |  ');

  const rows = report.phases.map((phase, i) => [
    String(i + 1),
    phase.name,
    `${STATUS_EMOJI[phase.status]} ${phase.status}`,
    String(phase.commands.length),
    phase.status === 'skipped' ? '—' : formatElapsed(phase.duration),
  ]);

  let out = header + '\n\n' + renderTable(['#', 'Phase', 'Status', 'Commands', 'Duration'], rows);

  const failedPhase = report.phases.find((p) => p.status === 'failed');
  const failedCommand = failedPhase?.commands[failedPhase.commands.length - 1];
  if (failedPhase && failedCommand) {
    const status = failedCommand.signal ? `killed by ${failedCommand.signal}` : `exit status ${failedCommand.exitCode ?? 'unknown'}`;
    out += `\n\nFailed command (${failedPhase.name} #${failedCommand.index}, ${status}):\n`;
    out += `  $ ${failedCommand.command}\n`;
    const tail = failedPhase.outputTail ?? [];
    if (tail.length > 0) {
      out += '  Last output:\n';
      for (const line of tail) {
        out += `    ${line}\n`;
      }
    }
  }

  return out;
}

/**
 * Renders one row per channel replay.
 */
export function renderMatrixSummary(report: MatrixReport): string {
  const header = [
    `Manifest: ${report.manifest}`,
    `Result: ${resultLabel(report.success, report.exitCode)}`,
    `Duration: ${formatElapsed(report.duration)}`,
  ].join('  |  ');

  const rows = report.runs.map((run) => {
    const failed = run.phases.find((p) => p.status === 'failed');
    return [
      run.channel ?? '—',
      run.interrupted ? '⚠️ interrupted' : run.success ? '✅ passed' : '❌ failed',
      String(run.exitCode),
      failed ? failed.name : '—',
      formatElapsed(run.duration),
    ];
  });

  return header + '\n\n' + renderTable(['Channel', 'Status', 'Exit', 'Failed Phase', 'Duration'], rows);
}

/**
 * Renders what a run would execute, without executing anything.
 */
export function renderPlan(pipeline: Pipeline, channels: readonly string[]): string {
  const title = pipeline.channel ? `${pipeline.source} (channel ${pipeline.channel})` : pipeline.source;
  const lines = [`Plan for ${title}:`];

  pipeline.phases.forEach((phase, i) => {
    const count = phase.commands.length;
    lines.push(`${i + 1}. ${phase.name} (${count} command${count === 1 ? '' : 's'})`);
    for (const command of phase.commands) {
      const named = mentionedChannels(command.run, channels);
      const suffix = named.length > 0 ? `  [${named.join(', ')}]` : '';
      lines.push(`   ${command.list.padEnd(8)} $ ${command.run}${suffix}`);
    }
    for (const directive of phase.cacheDirectories) {
      lines.push(`   cache    ${directive.path}`);
    }
  });

  return lines.join('\n');
}

/**
 * Renders cache directives as a table.
 */
export function renderCacheDirectives(directives: ResolvedCacheDirective[]): string {
  if (directives.length === 0) return 'No cache directories declared.';
  const rows = directives.map((d) => [d.phase, d.path, d.resolved, d.exists ? 'yes' : 'no']);
  return renderTable(['Phase', 'Path', 'Resolved', 'Exists'], rows);
}

function renderTable(headers: string[], rows: string[][]): string {
  const allRows = [headers, ...rows];
  const colWidths = headers.map((_, colIdx) =>
    Math.max(...allRows.map((row) => (row[colIdx] ?? '').length)),
  );

  const formatRow = (row: string[]) =>
    '| ' + row.map((cell, i) => cell.padEnd(colWidths[i])).join(' | ') + ' |';

  const separator = '|-' + colWidths.map((w) => '-'.repeat(w)).join('-|-') + '-|';

  const lines = [formatRow(headers), separator, ...rows.map(formatRow)];
  return lines.join('\n');
}
