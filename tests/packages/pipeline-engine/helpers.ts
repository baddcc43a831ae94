import { vi } from 'vitest';
import type {
  CommandContext,
  CommandResult,
  CommandRunner,
  CommandSpec,
  Logger,
  Phase,
} from '../../../packages/pipeline-engine/src/index.js';

export function makeLogger(): Logger {
  return {
    info: vi.fn(),
    warn: vi.fn(),
    error: vi.fn(),
    debug: vi.fn(),
  };
}

export function makePhase(name: string, commands: string[], environment: Record<string, string> = {}): Phase {
  return {
    name,
    commands: commands.map((run, index) => ({ phase: name, list: 'override', index, run })),
    cacheDirectories: [],
    environment,
  };
}

type Outcome = { exitCode?: number | null; signal?: NodeJS.Signals | null; output?: string[] };

/**
 * Records every command it is asked to run. Commands exit 0 unless an
 * outcome is registered for their text.
 */
export class FakeRunner implements CommandRunner {
  readonly calls: Array<{ command: CommandSpec; env: CommandContext['env']; cwd: string }> = [];
  private readonly outcomes = new Map<string, Outcome>();

  failOn(run: string, outcome: Outcome): this {
    this.outcomes.set(run, outcome);
    return this;
  }

  async run(command: CommandSpec, ctx: CommandContext): Promise<CommandResult> {
    this.calls.push({ command, env: ctx.env, cwd: ctx.cwd });
    const outcome = this.outcomes.get(command.run) ?? {};
    return {
      command,
      exitCode: outcome.exitCode === undefined ? 0 : outcome.exitCode,
      signal: outcome.signal ?? null,
      duration: 1,
      outputTail: outcome.output ?? [],
    };
  }

  get ran(): string[] {
    return this.calls.map((c) => c.command.run);
  }
}
