/**
 * Typed event definitions for phaserun's structured logging.
 */

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

export interface LogEntry {
  timestamp: string;
  level: LogLevel;
  source: string;
  phase?: string;
  channel?: string;
  command?: number;
  message: string;
  data?: Record<string, unknown>;
}

/** Context accepted by every logger method. */
export type LogContext = {
  phase?: string;
  channel?: string;
  command?: number;
  data?: Record<string, unknown>;
};

// ── Run-level events ──

export interface RunStartedEvent {
  type: 'run-started';
  manifest: string;
  channel?: string;
  phaseCount: number;
  commandCount: number;
}

export interface RunCompletedEvent {
  type: 'run-completed';
  success: boolean;
  exitCode: number;
  channel?: string;
  duration: number;
}

export interface RunInterruptedEvent {
  type: 'run-interrupted';
  signal: string;
  channel?: string;
  processesSignalled: number;
}

// ── Phase-level events ──

export interface PhaseStartedEvent {
  type: 'phase-started';
  phase: string;
  commandCount: number;
}

export interface PhaseCompletedEvent {
  type: 'phase-completed';
  phase: string;
  status: 'passed' | 'failed';
  duration: number;
}

export interface PhaseSkippedEvent {
  type: 'phase-skipped';
  phase: string;
  reason: string;
}

// ── Command-level events ──

export interface CommandStartedEvent {
  type: 'command-started';
  phase: string;
  index: number;
  command: string;
}

export interface CommandFailedEvent {
  type: 'command-failed';
  phase: string;
  index: number;
  command: string;
  exitCode: number | null;
  signal: string | null;
  duration: number;
}

// ── Matrix events ──

export interface MatrixStartedEvent {
  type: 'matrix-started';
  channels: string[];
}

export interface MatrixCompletedEvent {
  type: 'matrix-completed';
  passed: string[];
  failed: string[];
  duration: number;
}

// ── Cache events ──

export interface CacheDirectoriesRecordedEvent {
  type: 'cache-directories-recorded';
  paths: string[];
}

export type RunnerEvent =
  | RunStartedEvent
  | RunCompletedEvent
  | RunInterruptedEvent
  | PhaseStartedEvent
  | PhaseCompletedEvent
  | PhaseSkippedEvent
  | CommandStartedEvent
  | CommandFailedEvent
  | MatrixStartedEvent
  | MatrixCompletedEvent
  | CacheDirectoriesRecordedEvent;
