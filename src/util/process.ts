import { spawn, type ChildProcess, type SpawnOptions } from 'node:child_process';

export interface ProcessResult {
  exitCode: number | null;
  stdout: string;
  stderr: string;
  signal: NodeJS.Signals | null;
  /** Set when the process could not be started at all. */
  spawnError?: string;
}

export interface SpawnOpts {
  cwd?: string;
  env?: Record<string, string | undefined>;
  shell?: string | boolean;
  /** Receives stdout chunks as they arrive. */
  onStdout?: (chunk: Buffer) => void;
  /** Receives stderr chunks as they arrive. */
  onStderr?: (chunk: Buffer) => void;
  /**
   * Keep the output in the result (default true). Callers that stream it
   * through `onStdout`/`onStderr` turn this off; `stdout` and `stderr` are
   * then empty.
   */
  collect?: boolean;
}

/**
 * Strip PHASERUN_* variables so an outer run's phase and channel never leak
 * into a nested one.
 */
export function stripRunnerEnv(env: Record<string, string | undefined>): Record<string, string | undefined> {
  const stripped = { ...env };
  for (const key of Object.keys(stripped)) {
    if (key.startsWith('PHASERUN_')) {
      delete stripped[key];
    }
  }
  return stripped;
}

/**
 * Spawn a child process and collect its output.
 * The child gets its own process group so an interrupt can take down
 * everything it started. Stdin is closed.
 *
 * The result settles on `'close'`, once the child has exited and its output
 * pipes are closed. A background job that inherits stdout or stderr (for
 * example `server & echo started`) keeps the pipes open, so the result waits
 * for that job too. Redirect its output to detach it.
 */
export function spawnProcess(
  command: string,
  args: string[],
  opts: SpawnOpts = {},
): { promise: Promise<ProcessResult>; process: ChildProcess } {
  const spawnOpts: SpawnOptions = {
    cwd: opts.cwd,
    env: opts.env,
    stdio: ['ignore', 'pipe', 'pipe'],
    shell: opts.shell,
    detached: true,
  };

  const child = spawn(command, args, spawnOpts);
  trackProcess(child);

  const promise = new Promise<ProcessResult>((resolve) => {
    const collect = opts.collect ?? true;
    const stdoutChunks: Buffer[] = [];
    const stderrChunks: Buffer[] = [];

    child.stdout?.on('data', (chunk: Buffer) => {
      if (collect) stdoutChunks.push(chunk);
      opts.onStdout?.(chunk);
    });
    child.stderr?.on('data', (chunk: Buffer) => {
      if (collect) stderrChunks.push(chunk);
      opts.onStderr?.(chunk);
    });

    child.on('close', (code, signal) => {
      resolve({
        exitCode: code,
        stdout: Buffer.concat(stdoutChunks).toString('utf-8'),
        stderr: Buffer.concat(stderrChunks).toString('utf-8'),
        signal,
      });
    });

    child.on('error', (err) => {
      resolve({
        exitCode: 127,
        stdout: Buffer.concat(stdoutChunks).toString('utf-8'),
        stderr: err.message,
        signal: null,
        spawnError: err.message,
      });
    });
  });

  return { promise, process: child };
}

/**
 * Run a command and wait for the result. Convenience wrapper around spawnProcess.
 */
export async function exec(
  command: string,
  args: string[],
  opts: SpawnOpts = {},
): Promise<ProcessResult> {
  const { promise } = spawnProcess(command, args, opts);
  return promise;
}

/**
 * Run a command string through the given shell (`<shell> -c <command>`).
 */
export async function execShell(
  command: string,
  opts: Omit<SpawnOpts, 'shell'> & { shell?: string } = {},
): Promise<ProcessResult> {
  return exec(command, [], { ...opts, shell: opts.shell ?? true });
}

/**
 * Active child processes that need cleanup on shutdown.
 */
const activeProcesses = new Set<ChildProcess>();

export function trackProcess(child: ChildProcess): void {
  activeProcesses.add(child);
  child.on('close', () => activeProcesses.delete(child));
  child.on('error', () => activeProcesses.delete(child));
}

/**
 * Send a signal to every tracked child's process group.
 * Children stay tracked until they close, so a later call can escalate.
 * A group that cannot be signalled is reported through `onError` and the
 * remaining groups are still signalled.
 * Returns the number of process groups signalled.
 */
export function killAllTrackedProcesses(
  signal: NodeJS.Signals = 'SIGTERM',
  onError?: (pid: number, err: Error) => void,
): number {
  let signalled = 0;
  for (const child of activeProcesses) {
    if (child.pid === undefined) continue;
    try {
      process.kill(-child.pid, signal);
      signalled++;
    } catch (err) {
      // ESRCH: the group is already gone
      if (err instanceof Error && 'code' in err && err.code === 'ESRCH') continue;
      onError?.(child.pid, err instanceof Error ? err : new Error(String(err)));
    }
  }
  return signalled;
}

export function getTrackedProcessCount(): number {
  return activeProcesses.size;
}
