import { input, checkbox, confirm } from '@inquirer/prompts';
import { CHANNEL_NAME, DEFAULT_CHANNELS, DEFAULT_MANIFEST, DEFAULT_SHELL } from '../config/schema.js';

// ---------------------------------------------------------------------------
// Exported validators (testable in isolation)
// ---------------------------------------------------------------------------

/** Validates that a project name matches /^[a-z0-9-]+$/ */
export function validateProjectName(value: string): true | string {
  if (/^[a-z0-9-]+$/.test(value)) return true;
  return 'Project name must contain only lowercase letters, digits, and hyphens (no uppercase, spaces, or special characters).';
}

/** Validates a non-empty string */
export function validateNonEmpty(value: string): true | string {
  if (value.trim().length > 0) return true;
  return 'Value must not be empty.';
}

/** Splits a comma-separated list of channel names */
export function parseChannelList(value: string): string[] {
  return value
    .split(',')
    .map((c) => c.trim())
    .filter((c) => c.length > 0);
}

/** Validates a comma-separated list of channel names */
export function validateChannelList(value: string): true | string {
  const channels = parseChannelList(value);
  if (channels.length === 0) return 'List at least one channel.';
  const bad = channels.find((c) => !CHANNEL_NAME.test(c));
  if (bad !== undefined) return `Channel '${bad}' must start with a letter or digit and contain only letters, digits, '.', '_' and '-'.`;
  return true;
}

// ---------------------------------------------------------------------------
// Answers type
// ---------------------------------------------------------------------------

export interface InitAnswers {
  projectName: string;
  manifest: string;
  shell: string;
  channels: string[];
  writeManifest: boolean;
}

// ---------------------------------------------------------------------------
// Prompt helpers
// ---------------------------------------------------------------------------

async function promptChannels(): Promise<string[]> {
  const picked = await checkbox<string>({
    message: 'Toolchain channels to replay the pipeline for:',
    choices: DEFAULT_CHANNELS.map((c) => ({ name: c, value: c, checked: true })),
  });

  const extra = await input({
    message: 'Additional channels (comma-separated, blank for none):',
    default: '',
    validate: (value) => value.trim() === '' || validateChannelList(value),
  });

  const channels = [...picked, ...parseChannelList(extra)];
  return channels.length > 0 ? [...new Set(channels)] : [...DEFAULT_CHANNELS];
}

// ---------------------------------------------------------------------------
// Main entry point
// ---------------------------------------------------------------------------

/**
 * Interactively collect the answers needed to write phaserun.config.json.
 * When `yes` is true every prompt is skipped and defaults are used.
 */
export async function collectAnswers(
  yes: boolean,
  defaults: { projectName: string; manifestExists: boolean },
): Promise<InitAnswers> {
  if (yes) {
    return {
      projectName: defaults.projectName,
      manifest: DEFAULT_MANIFEST,
      shell: DEFAULT_SHELL,
      channels: [...DEFAULT_CHANNELS],
      writeManifest: !defaults.manifestExists,
    };
  }

  const projectName = await input({
    message: 'Project name (lowercase letters, digits, hyphens):',
    default: defaults.projectName,
    validate: validateProjectName,
  });

  const manifest = await input({
    message: 'Manifest file:',
    default: DEFAULT_MANIFEST,
    validate: validateNonEmpty,
  });

  const shell = await input({
    message: 'Shell that runs each command:',
    default: DEFAULT_SHELL,
    validate: validateNonEmpty,
  });

  const channels = await promptChannels();

  const writeManifest = defaults.manifestExists
    ? false
    : await confirm({ message: `Write a starter ${manifest}?`, default: true });

  return { projectName, manifest, shell, channels, writeManifest };
}
