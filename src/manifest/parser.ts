import { readFile } from 'node:fs/promises';
import { isMap, isNode, isScalar, parseDocument } from 'yaml';
import type { CommandList, CommandSpec, Phase, Pipeline } from '../../packages/pipeline-engine/src/index.js';
import { ManifestError } from '../errors.js';
import { ManifestPhaseSchema, type ManifestPhase } from './schema.js';

const COMMAND_LISTS: readonly CommandList[] = ['pre', 'override', 'post'];

function describe(value: unknown): string {
  if (value === null) return 'null';
  if (Array.isArray(value)) return 'a list';
  return `a ${typeof value}`;
}

function toPhase(name: string, raw: ManifestPhase): Phase {
  const commands: CommandSpec[] = [];
  for (const list of COMMAND_LISTS) {
    for (const run of raw[list] ?? []) {
      commands.push({ phase: name, list, index: commands.length, run });
    }
  }

  return {
    name,
    commands,
    cacheDirectories: (raw.cache_directories ?? []).map((path) => ({ phase: name, path })),
    environment: raw.environment ?? {},
  };
}

/**
 * Parse manifest text into a Pipeline.
 *
 * Phases keep their declaration order. Within a phase, `pre`, `override`
 * and `post` commands are concatenated in that order.
 */
export function parseManifest(text: string, source = '<manifest>'): Pipeline {
  const doc = parseDocument(text);
  const [syntaxError] = doc.errors;
  if (syntaxError) {
    throw new ManifestError(`Invalid YAML in ${source}: ${syntaxError.message}`, source);
  }

  const root = doc.contents;
  if (!isMap(root)) {
    const value: unknown = doc.toJS();
    if (value === null || value === undefined) {
      throw new ManifestError(`Manifest ${source} is empty`, source);
    }
    throw new ManifestError(
      `Manifest ${source} must be a mapping of phase names, got ${describe(value)}`,
      source,
    );
  }

  // Read keys from the map node so integer-like phase names keep declaration order.
  const phases: Phase[] = [];
  const issues: string[] = [];
  for (const pair of root.items) {
    const key: unknown = isScalar(pair.key) ? pair.key.value : pair.key;
    const name = key === null || key === undefined ? '' : String(key);
    if (name === '') {
      issues.push('Phase names must not be empty');
      continue;
    }

    const value: unknown = isNode(pair.value) ? pair.value.toJS(doc) : pair.value;
    const result = ManifestPhaseSchema.safeParse(value);
    if (result.success) {
      phases.push(toPhase(name, result.data));
    } else {
      issues.push(...result.error.issues.map((i) => [name, ...i.path].join('.') + `: ${i.message}`));
    }
  }

  if (issues.length > 0) {
    throw new ManifestError(`Invalid manifest ${source}:`, source, issues);
  }
  if (phases.length === 0) {
    throw new ManifestError(`Manifest ${source} declares no phases`, source);
  }

  return { source, phases };
}

/**
 * Read and parse a manifest file.
 */
export async function loadManifest(path: string): Promise<Pipeline> {
  let text: string;
  try {
    text = await readFile(path, 'utf-8');
  } catch (err) {
    const msg = err instanceof Error ? err.message : String(err);
    throw new ManifestError(`Cannot read manifest ${path}: ${msg}`, path);
  }
  return parseManifest(text, path);
}
