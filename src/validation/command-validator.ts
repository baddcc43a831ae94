import type { CommandSpec } from '../../packages/pipeline-engine/src/index.js';
import { execShell } from '../util/process.js';
import type { PreRunValidator, ValidationContext, ValidationResult } from './types.js';

/** Resolves a command word in the given shell; true when it is runnable. */
export type CommandLookup = (word: string, shell: string) => Promise<boolean>;

const ASSIGNMENT = /^[A-Za-z_][A-Za-z0-9_]*=/;
const PLAIN_WORD = /^[A-Za-z0-9_./+-]+$/;

/**
 * The word a command starts with, skipping leading variable assignments.
 * Null when the command starts with something that cannot be checked
 * without running it (quotes, substitutions, redirections).
 */
export function commandWord(run: string): string | null {
  const words = run.trim().split(/\s+/);
  const word = words.find((w) => !ASSIGNMENT.test(w));
  if (word === undefined || !PLAIN_WORD.test(word)) return null;
  return word;
}

const lookupInShell: CommandLookup = async (word, shell) => {
  const result = await execShell(`command -v ${word}`, { shell });
  return result.exitCode === 0;
};

/**
 * Warns about commands whose first word the shell cannot resolve. Only a
 * warning: an earlier command may install the tool.
 */
export class CommandValidator implements PreRunValidator {
  readonly name = 'command';

  constructor(private readonly lookup: CommandLookup = lookupInShell) {}

  async validate({ config, pipeline }: ValidationContext): Promise<ValidationResult> {
    const warnings: string[] = [];
    if (pipeline === null) {
      return { passed: true, errors: [], warnings };
    }

    const firstUse = new Map<string, CommandSpec>();
    for (const command of pipeline.phases.flatMap((p) => p.commands)) {
      const word = commandWord(command.run);
      if (word !== null && !firstUse.has(word)) {
        firstUse.set(word, command);
      }
    }

    for (const [word, command] of firstUse) {
      if (!(await this.lookup(word, config.shell))) {
        warnings.push(
          `'${word}' (first used in ${command.phase} #${command.index}) is not on PATH; an earlier command must provide it.`,
        );
      }
    }

    return { passed: true, errors: [], warnings };
  }
}
