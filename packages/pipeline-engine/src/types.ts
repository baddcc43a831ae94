/**
 * Shared type definitions for the pipeline engine.
 */

/** Minimal logger interface for engine consumers. */
export interface Logger {
  info(message: string, context?: Record<string, unknown>): void;
  warn(message: string, context?: Record<string, unknown>): void;
  error(message: string, context?: Record<string, unknown>): void;
  debug(message: string, context?: Record<string, unknown>): void;
}

/** Which command list of a phase a command was declared in. */
export type CommandList = 'pre' | 'override' | 'post';

/** A single shell command. The text is opaque and handed to the shell verbatim. */
export interface CommandSpec {
  /** Name of the phase that declares the command. */
  phase: string;
  /** Command list within the phase. */
  list: CommandList;
  /** 0-based position within the phase (across all lists). */
  index: number;
  /** Literal command text. */
  run: string;
}

/** A directory the CI host should persist between runs. Informational only. */
export interface CacheDirective {
  /** Phase that declared the directive. */
  phase: string;
  /** Path exactly as written in the manifest. */
  path: string;
}

/** A named group of sequential commands. */
export interface Phase {
  name: string;
  commands: CommandSpec[];
  cacheDirectories: CacheDirective[];
  /** Variables exported to this phase and every later phase. */
  environment: Record<string, string>;
}

/** Ordered phases; phase order is execution order. */
export interface Pipeline {
  /** Where the pipeline was read from, for messages. */
  source: string;
  phases: Phase[];
  /** Set when the pipeline is a replay for a single channel. */
  channel?: string;
}

/** Outcome of one command. */
export interface CommandResult {
  command: CommandSpec;
  exitCode: number | null;
  signal: NodeJS.Signals | null;
  /** Duration in milliseconds. */
  duration: number;
  /** Last lines of combined stdout/stderr. */
  outputTail: string[];
}

/** Outcome of a single phase. */
export interface PhaseResult {
  phaseName: string;
  status: 'passed' | 'failed' | 'skipped';
  duration: number;
  commands: CommandResult[];
  /** The first failed command, when status is 'failed'. */
  failedCommand?: CommandResult;
  error?: string;
}

/** Outcome of a pipeline run. */
export interface PipelineResult {
  success: boolean;
  /** 0 on success, else the failing command's status (128 + n for signal n). */
  exitCode: number;
  duration: number;
  phases: PhaseResult[];
  channel?: string;
  failedCommand?: CommandResult;
  interrupted: boolean;
}

/** Everything a command needs to run. */
export interface CommandContext {
  cwd: string;
  env: Record<string, string | undefined>;
}

/** Executes one command and waits for it to finish. */
export interface CommandRunner {
  run(command: CommandSpec, ctx: CommandContext): Promise<CommandResult>;
}

/** Error thrown when a phase subset names a phase the pipeline does not have. */
export class UnknownPhaseError extends Error {
  phaseNames: string[];

  constructor(message: string, phaseNames: string[]) {
    super(message);
    this.name = 'UnknownPhaseError';
    this.phaseNames = phaseNames;
  }
}
