import { mkdtemp, realpath, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import type { RuntimeConfig } from '../../src/config/loader.js';
import { RunnerConfigSchema, type RunnerConfig } from '../../src/config/schema.js';
import { Logger } from '../../src/logging/logger.js';

export const MATRIX_MANIFEST = [
  'dependencies:',
  '  override:',
  '    - install',
  '    - toolchain update stable',
  '    - toolchain update beta',
  '  cache_directories:',
  '    - cache',
  'test:',
  '  override:',
  '    - toolchain default stable && cargo test',
  '    - toolchain default beta && cargo test',
  '',
].join('\n');

/** A fresh working directory with a manifest and a state directory inside it. */
export async function makeWorkspace(manifest: string): Promise<string> {
  const dir = await realpath(await mkdtemp(join(tmpdir(), 'phaserun-')));
  await writeFile(join(dir, 'circle.yml'), manifest, 'utf-8');
  return dir;
}

export function makeConfig(dir: string, overrides: Partial<RunnerConfig> = {}): RuntimeConfig {
  const { manifest, projectName, stateDir, ...rest } = RunnerConfigSchema.parse({
    channels: ['stable', 'beta'],
    logging: { level: 'debug', console: false },
    ...overrides,
  });
  return {
    ...rest,
    projectName: projectName ?? 'demo',
    manifestPath: join(dir, manifest),
    workingDirectory: dir,
    stateDir: stateDir ?? join(dir, '.state'),
  };
}

export function quietLogger(config: RuntimeConfig): Logger {
  return new Logger({ source: 'run', logDir: join(config.stateDir, 'logs'), level: 'debug', console: false });
}

export const fixedRevision = { head: async (): Promise<string | undefined> => 'abc123' };
