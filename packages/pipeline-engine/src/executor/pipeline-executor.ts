import { constants } from 'node:os';
import type { CommandResult, Pipeline, PipelineResult, PhaseResult } from '../types.js';
import { PhaseExecutor, type PhaseContext } from './phase-executor.js';

/**
 * Map a failed command to the status the pipeline propagates.
 * A signal-killed command maps to 128 + the signal number, as shells do.
 */
export function exitStatusOf(result: CommandResult): number {
  if (result.signal !== null) {
    const entry = Object.entries(constants.signals).find(([name]) => name === result.signal);
    return 128 + (entry?.[1] ?? 0);
  }
  return result.exitCode ?? 1;
}

/**
 * Runs every phase of a pipeline in order. The first failed phase aborts
 * the run and each remaining phase is reported as skipped.
 */
export class PipelineExecutor {
  constructor(private readonly phaseExecutor: PhaseExecutor = new PhaseExecutor()) {}

  async run(pipeline: Pipeline, ctx: PhaseContext): Promise<PipelineResult> {
    const start = Date.now();
    const results: PhaseResult[] = [];
    let env = { ...ctx.env };
    if (pipeline.channel !== undefined) {
      env.PHASERUN_CHANNEL = pipeline.channel;
    }

    let failed: PhaseResult | undefined;

    for (const phase of pipeline.phases) {
      if (failed || ctx.signal?.aborted) {
        results.push({ phaseName: phase.name, status: 'skipped', duration: 0, commands: [] });
        continue;
      }

      env = { ...env, ...phase.environment };
      const result = await this.phaseExecutor.execute(phase, { ...ctx, env });
      results.push(result);

      if (result.status === 'failed') {
        failed = result;
        ctx.logger.error(`Phase '${phase.name}' failed: ${result.error ?? 'unknown error'}`, {
          phase: phase.name,
        });
      }
    }

    const interrupted = ctx.signal?.aborted ?? false;
    const failedCommand = failed?.failedCommand;
    let exitCode = 0;
    if (failedCommand) {
      exitCode = exitStatusOf(failedCommand);
    } else if (failed || interrupted) {
      exitCode = 1;
    }

    return {
      success: exitCode === 0 && !interrupted,
      exitCode,
      duration: Date.now() - start,
      phases: results,
      channel: pipeline.channel,
      failedCommand,
      interrupted,
    };
  }
}
