import type {
  CommandContext,
  CommandResult,
  CommandRunner,
  CommandSpec,
} from '../../packages/pipeline-engine/src/index.js';
import { spawnProcess } from '../util/process.js';

/** Where streamed command output goes. */
export interface OutputSink {
  write(chunk: Buffer | string): unknown;
}

export interface ShellRunnerOptions {
  /** Shell binary; commands run as `<shell> -c <command>`. */
  shell: string;
  /** Number of trailing output lines kept for reports. */
  tailLines?: number;
  stdout?: OutputSink;
  stderr?: OutputSink;
}

/**
 * Keeps the last `limit` complete-or-partial lines of a byte stream.
 */
export class OutputTail {
  private lines: string[] = [];
  private partial = '';

  constructor(private readonly limit: number) {}

  push(chunk: Buffer | string): void {
    const text = this.partial + chunk.toString();
    const parts = text.split(/\r?\n/);
    this.partial = parts.pop() ?? '';
    this.lines.push(...parts);
    if (this.lines.length > this.limit) {
      this.lines = this.lines.slice(-this.limit);
    }
  }

  toArray(): string[] {
    const all = this.partial ? [...this.lines, this.partial] : this.lines;
    return all.slice(-this.limit);
  }
}

/**
 * Runs each command through the configured shell with the context's
 * environment, streaming output live while keeping a tail for reports.
 */
export class ShellCommandRunner implements CommandRunner {
  private readonly tailLines: number;
  private readonly stdout: OutputSink;
  private readonly stderr: OutputSink;

  constructor(private readonly opts: ShellRunnerOptions) {
    this.tailLines = opts.tailLines ?? 20;
    this.stdout = opts.stdout ?? process.stdout;
    this.stderr = opts.stderr ?? process.stderr;
  }

  async run(command: CommandSpec, ctx: CommandContext): Promise<CommandResult> {
    const start = Date.now();
    const tail = new OutputTail(this.tailLines);

    const { promise } = spawnProcess(command.run, [], {
      cwd: ctx.cwd,
      env: ctx.env,
      shell: this.opts.shell,
      collect: false,
      onStdout: (chunk) => {
        this.stdout.write(chunk);
        tail.push(chunk);
      },
      onStderr: (chunk) => {
        this.stderr.write(chunk);
        tail.push(chunk);
      },
    });

    const result = await promise;
    if (result.spawnError !== undefined) {
      const message = `Failed to start ${this.opts.shell}: ${result.spawnError}\n`;
      this.stderr.write(message);
      tail.push(message);
    }

    return {
      command,
      exitCode: result.exitCode,
      signal: result.signal,
      duration: Date.now() - start,
      outputTail: tail.toArray(),
    };
  }
}
