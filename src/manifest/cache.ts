import type { CacheDirective, Pipeline } from '../../packages/pipeline-engine/src/index.js';
import { resolvePath } from '../config/loader.js';
import { isDirectory } from '../util/fs.js';

/** A cache directive with its path resolved for display. */
export interface ResolvedCacheDirective extends CacheDirective {
  /** Absolute path after `~` expansion and working-directory resolution. */
  resolved: string;
  /** Whether the directory currently exists. */
  exists: boolean;
}

/**
 * Collect cache directives in phase order, keeping the first occurrence of each path.
 */
export function collectCacheDirectives(pipeline: Pipeline): CacheDirective[] {
  const seen = new Set<string>();
  const directives: CacheDirective[] = [];
  for (const phase of pipeline.phases) {
    for (const directive of phase.cacheDirectories) {
      if (seen.has(directive.path)) continue;
      seen.add(directive.path);
      directives.push(directive);
    }
  }
  return directives;
}

/**
 * Resolve directives against the working directory. Nothing is copied or
 * restored; the result only tells the host what to persist.
 */
export async function resolveCacheDirectives(
  directives: CacheDirective[],
  workingDirectory: string,
): Promise<ResolvedCacheDirective[]> {
  return Promise.all(
    directives.map(async (directive) => {
      const resolved = resolvePath(directive.path, workingDirectory);
      return { ...directive, resolved, exists: await isDirectory(resolved) };
    }),
  );
}
