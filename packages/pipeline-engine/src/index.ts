// pipeline-engine entry point

// Shared types
export type {
  Logger,
  CommandList,
  CommandSpec,
  CacheDirective,
  Phase,
  Pipeline,
  CommandResult,
  PhaseResult,
  PipelineResult,
  CommandContext,
  CommandRunner,
} from './types.js';
export { UnknownPhaseError } from './types.js';

// Phase lookup
export { getPhaseSubset, getPhaseCount, getCommandCount } from './phase/registry.js';

// Executors
export type { PhaseContext, PhaseCallbacks } from './executor/phase-executor.js';
export { PhaseExecutor, isCommandFailure } from './executor/phase-executor.js';
export { PipelineExecutor, exitStatusOf } from './executor/pipeline-executor.js';

// Progress
export { RunProgressWriter } from './progress/progress.js';
