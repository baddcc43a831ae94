/**
 * Sequential, fail-fast execution of a single phase's commands.
 */

import type {
  CommandContext,
  CommandResult,
  CommandRunner,
  CommandSpec,
  Logger,
  Phase,
  PhaseResult,
} from '../types.js';

/** Callbacks injected by the pipeline executor or runtime. */
export type PhaseCallbacks = {
  onPhaseStart?: (phase: Phase) => void;
  onPhaseComplete?: (result: PhaseResult) => void;
  onCommandStart?: (command: CommandSpec) => void;
  onCommandComplete?: (result: CommandResult) => void;
};

/**
 * All dependencies and shared state needed by a phase during execution.
 */
export type PhaseContext = {
  /** Working directory for every command. */
  cwd: string;
  /** Environment for the phase, already merged with earlier phases' variables. */
  env: Record<string, string | undefined>;
  runner: CommandRunner;
  logger: Logger;
  callbacks?: PhaseCallbacks;
  /** Aborted when the run is interrupted; no further command starts. */
  signal?: AbortSignal;
};

/** A command failed when it exited non-zero or was killed by a signal. */
export function isCommandFailure(result: CommandResult): boolean {
  return result.exitCode !== 0 || result.signal !== null;
}

/**
 * Runs a phase's commands strictly in declared order and stops at the
 * first failure. Nothing is retried and no command is given a timeout.
 */
export class PhaseExecutor {
  async execute(phase: Phase, ctx: PhaseContext): Promise<PhaseResult> {
    const phaseStart = Date.now();
    const results: CommandResult[] = [];
    ctx.callbacks?.onPhaseStart?.(phase);

    const commandCtx: CommandContext = {
      cwd: ctx.cwd,
      env: { ...ctx.env, PHASERUN_PHASE: phase.name },
    };

    let failedCommand: CommandResult | undefined;
    let error: string | undefined;

    for (const command of phase.commands) {
      if (ctx.signal?.aborted) {
        error = 'Interrupted before command started';
        break;
      }

      ctx.callbacks?.onCommandStart?.(command);
      ctx.logger.debug(`Running: ${command.run}`, { phase: phase.name, command: command.index });

      const result = await ctx.runner.run(command, commandCtx);
      results.push(result);
      ctx.callbacks?.onCommandComplete?.(result);

      if (isCommandFailure(result)) {
        failedCommand = result;
        error = result.signal
          ? `Command killed by ${result.signal}: ${command.run}`
          : `Command exited with status ${result.exitCode ?? 'unknown'}: ${command.run}`;
        break;
      }
    }

    const phaseResult: PhaseResult = {
      phaseName: phase.name,
      status: error === undefined ? 'passed' : 'failed',
      duration: Date.now() - phaseStart,
      commands: results,
      failedCommand,
      error,
    };
    ctx.callbacks?.onPhaseComplete?.(phaseResult);
    return phaseResult;
  }
}
