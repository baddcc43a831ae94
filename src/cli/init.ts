import { join } from 'node:path';
import chalk from 'chalk';
import { confirm } from '@inquirer/prompts';
import { stringify } from 'yaml';
import { DEFAULT_CONFIG_FILE, projectNameFrom, resolvePath } from '../config/loader.js';
import { DEFAULT_MANIFEST, RunnerConfigSchema } from '../config/schema.js';
import { collectAnswers } from './prompts.js';
import { atomicWriteFile, atomicWriteJSON, exists } from '../util/fs.js';

/**
 * A starter manifest: one shared dependency phase and a test phase with
 * one command per channel, so every replay has something of its own to run.
 */
export function starterManifest(channels: readonly string[]): string {
  const doc = {
    dependencies: {
      override: ['echo "install toolchains and dependencies here"'],
      cache_directories: ['~/.cache'],
    },
    test: {
      override: channels.map((channel) => `echo "run the test suite on ${channel}"`),
    },
  };
  return '# Phases run top to bottom. A command naming a channel runs only in that channel\'s replay.\n' + stringify(doc);
}

export async function runInit(opts: { yes: boolean; dir?: string }): Promise<void> {
  const dir = opts.dir ?? process.cwd();

  // 1. Check for an existing config
  const configPath = join(dir, DEFAULT_CONFIG_FILE);
  if (await exists(configPath)) {
    if (!opts.yes) {
      const overwrite = await confirm({
        message: `${DEFAULT_CONFIG_FILE} already exists. Overwrite?`,
        default: false,
      });
      if (!overwrite) {
        console.log(chalk.yellow('Aborted.'));
        return;
      }
    } else {
      console.log(chalk.yellow(`Overwriting existing ${DEFAULT_CONFIG_FILE}...`));
    }
  }

  // 2. Collect prompt answers (--yes takes every default)
  const defaultManifestExists = await exists(join(dir, DEFAULT_MANIFEST));
  const answers = await collectAnswers(opts.yes, {
    projectName: projectNameFrom(dir),
    manifestExists: defaultManifestExists,
  });

  // 3. Validate and write the config
  const config = RunnerConfigSchema.parse({
    projectName: answers.projectName,
    manifest: answers.manifest,
    shell: answers.shell,
    channels: answers.channels,
  });
  await atomicWriteJSON(configPath, config);

  // 4. Starter manifest, never over an existing one
  const manifestPath = resolvePath(config.manifest, dir);
  const wroteManifest = answers.writeManifest && !(await exists(manifestPath));
  if (wroteManifest) {
    await atomicWriteFile(manifestPath, starterManifest(config.channels));
  }

  // 5. Print success summary
  console.log('');
  console.log(chalk.green('✓ phaserun initialized successfully!'));
  console.log('');
  console.log(`  ${chalk.bold('Project:')}  ${answers.projectName}`);
  console.log(`  ${chalk.bold('Manifest:')} ${config.manifest}`);
  console.log(`  ${chalk.bold('Channels:')} ${config.channels.join(', ')}`);
  console.log('');
  console.log(`  ${chalk.dim(DEFAULT_CONFIG_FILE)} written`);
  if (wroteManifest) {
    console.log(`  ${chalk.dim(config.manifest)} written`);
  }
  console.log('');
}
