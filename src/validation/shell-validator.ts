import { delimiter, isAbsolute, join } from 'node:path';
import { isExecutable } from '../util/fs.js';
import type { PreRunValidator, ValidationContext, ValidationResult } from './types.js';

/**
 * Find an executable by name on a PATH string.
 */
export async function findOnPath(name: string, pathEnv: string | undefined): Promise<string | null> {
  for (const dir of (pathEnv ?? '').split(delimiter)) {
    if (!dir) continue;
    const candidate = join(dir, name);
    if (await isExecutable(candidate)) return candidate;
  }
  return null;
}

export const shellValidator: PreRunValidator = {
  name: 'shell',

  async validate({ config }: ValidationContext): Promise<ValidationResult> {
    const errors: string[] = [];
    const warnings: string[] = [];
    const { shell } = config;

    const found = isAbsolute(shell)
      ? (await isExecutable(shell)) ? shell : null
      : await findOnPath(shell, process.env.PATH);

    if (found === null) {
      errors.push(`Shell '${shell}' not found or not executable.`);
    }

    return { passed: errors.length === 0, errors, warnings };
  },
};
