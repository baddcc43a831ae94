/**
 * Phase lookup helpers for parsed pipelines.
 */

import { UnknownPhaseError, type Pipeline } from '../types.js';

/**
 * Get a subset of phases by name, returned in pipeline order.
 * Throws UnknownPhaseError when any requested name is missing.
 */
export function getPhaseSubset(pipeline: Pipeline, names: string[]): Pipeline {
  const known = new Set(pipeline.phases.map((p) => p.name));
  const unknown = names.filter((n) => !known.has(n));
  if (unknown.length > 0) {
    throw new UnknownPhaseError(
      `Unknown phase(s) ${unknown.map((n) => `'${n}'`).join(', ')} in ${pipeline.source}; ` +
        `available: ${[...known].join(', ')}`,
      unknown,
    );
  }
  return {
    ...pipeline,
    phases: pipeline.phases.filter((p) => names.includes(p.name)),
  };
}

/**
 * Get the total number of phases.
 */
export function getPhaseCount(pipeline: Pipeline): number {
  return pipeline.phases.length;
}

/**
 * Count the commands across all phases.
 */
export function getCommandCount(pipeline: Pipeline): number {
  return pipeline.phases.reduce((sum, p) => sum + p.commands.length, 0);
}
