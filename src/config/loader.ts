import { readFile } from 'node:fs/promises';
import { resolve, isAbsolute, join, dirname, basename } from 'node:path';
import { homedir } from 'node:os';
import { RunnerConfigSchema, type RunnerConfig } from './schema.js';
import { exists } from '../util/fs.js';

export const DEFAULT_CONFIG_FILE = 'phaserun.config.json';

/**
 * Config as consumed by the runtime: every path is absolute and every
 * optional field loadConfig synthesises is narrowed to required.
 */
export interface RuntimeConfig extends Omit<RunnerConfig, 'projectName' | 'stateDir' | 'manifest'> {
  readonly projectName: string;
  /** Absolute path of the manifest. */
  readonly manifestPath: string;
  /** Always an absolute path. */
  readonly workingDirectory: string;
  /** Always an absolute path. */
  readonly stateDir: string;
  /** The config file that was read, if any. */
  readonly configPath?: string;
}

export class ConfigLoadError extends Error {
  constructor(
    message: string,
    public readonly details?: unknown,
  ) {
    super(message);
    this.name = 'ConfigLoadError';
  }
}

/** Expand a leading `~` to the home directory. */
export function expandHome(path: string): string {
  if (path === '~') return homedir();
  if (path.startsWith('~/')) return join(homedir(), path.slice(2));
  return path;
}

/** Resolve `path` against `base` after expanding `~`. */
export function resolvePath(path: string, base: string): string {
  const expanded = expandHome(path);
  return isAbsolute(expanded) ? expanded : resolve(base, expanded);
}

/** Derive a project name from a directory name. */
export function projectNameFrom(dir: string): string {
  const name = basename(dir)
    .toLowerCase()
    .replace(/[^a-z0-9-]+/g, '-')
    .replace(/^-+|-+$/g, '');
  return name || 'project';
}

/**
 * Load, parse, and validate a phaserun.config.json file.
 *
 * Without an explicit path the default file in the current directory is
 * used when present, and built-in defaults otherwise. An explicit path
 * that does not exist is an error.
 */
export async function loadConfig(configPath?: string): Promise<RuntimeConfig> {
  const explicit = configPath !== undefined;
  const absPath = resolvePath(configPath ?? DEFAULT_CONFIG_FILE, process.cwd());

  let raw: unknown = {};
  let readFrom: string | undefined;

  if (await exists(absPath)) {
    try {
      const content = await readFile(absPath, 'utf-8');
      raw = JSON.parse(content);
      readFrom = absPath;
    } catch (err) {
      throw new ConfigLoadError(`Failed to parse config file: ${absPath}`, err);
    }
  } else if (explicit) {
    throw new ConfigLoadError(`Config file not found: ${absPath}`);
  }

  // Validate with Zod
  const result = RunnerConfigSchema.safeParse(raw);
  if (!result.success) {
    const issues = result.error.issues
      .map((i) => `  - ${i.path.join('.')}: ${i.message}`)
      .join('\n');
    throw new ConfigLoadError(`Invalid config:\n${issues}`, result.error);
  }

  const config = result.data;
  const baseDir = readFrom ? dirname(readFrom) : process.cwd();
  const workingDirectory = resolvePath(config.workingDirectory, baseDir);
  const projectName = config.projectName ?? projectNameFrom(workingDirectory);

  // Kept outside the working directory
  const stateDir = config.stateDir
    ? resolvePath(config.stateDir, baseDir)
    : join(homedir(), '.phaserun', projectName);

  const { manifest, ...rest } = config;
  const frozen: RuntimeConfig = {
    ...rest,
    projectName,
    manifestPath: resolvePath(manifest, workingDirectory),
    workingDirectory,
    stateDir,
    configPath: readFrom,
  };

  return Object.freeze(frozen);
}

/**
 * Apply CLI overrides to a loaded config.
 */
export function applyOverrides(
  config: RuntimeConfig,
  overrides: {
    manifest?: string;
    channels?: string[];
    shell?: string;
    logLevel?: RuntimeConfig['logging']['level'];
    noReport?: boolean;
  },
): RuntimeConfig {
  const logging =
    overrides.logLevel != null ? { ...config.logging, level: overrides.logLevel } : config.logging;
  const reports = overrides.noReport ? { ...config.reports, enabled: false } : config.reports;

  return Object.freeze({
    ...config,
    manifestPath:
      overrides.manifest != null ? resolvePath(overrides.manifest, process.cwd()) : config.manifestPath,
    channels: overrides.channels && overrides.channels.length > 0 ? overrides.channels : config.channels,
    shell: overrides.shell ?? config.shell,
    logging,
    reports,
  });
}
