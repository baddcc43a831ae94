export class ManifestError extends Error {
  source: string;
  issues: string[];

  constructor(message: string, source: string, issues: string[] = []) {
    super(issues.length > 0 ? `${message}\n${issues.map((i) => `  - ${i}`).join('\n')}` : message);
    this.name = 'ManifestError';
    this.source = source;
    this.issues = issues;
  }
}

export class CommandFailedError extends Error {
  phase: string;
  command: string;
  exitCode: number;

  constructor(message: string, phase: string, command: string, exitCode: number) {
    super(message);
    this.name = 'CommandFailedError';
    this.phase = phase;
    this.command = command;
    this.exitCode = exitCode;
  }
}

export class MatrixFailedError extends Error {
  failedChannels: string[];
  exitCode: number;

  constructor(message: string, failedChannels: string[], exitCode: number) {
    super(message);
    this.name = 'MatrixFailedError';
    this.failedChannels = failedChannels;
    this.exitCode = exitCode;
  }
}

export class RuntimeInterruptedError extends Error {
  signal: string;
  exitCode: number;

  constructor(message: string, signal: string, exitCode: number) {
    super(message);
    this.name = 'RuntimeInterruptedError';
    this.signal = signal;
    this.exitCode = exitCode;
  }
}

export { UnknownPhaseError } from '../packages/pipeline-engine/src/index.js';

export class UnknownChannelError extends Error {
  channel: string;
  channels: string[];

  constructor(message: string, channel: string, channels: string[]) {
    super(message);
    this.name = 'UnknownChannelError';
    this.channel = channel;
    this.channels = channels;
  }
}
