import { z } from 'zod';

export const DEFAULT_CHANNELS = ['stable', 'beta', 'nightly'] as const;
export const DEFAULT_MANIFEST = 'circle.yml';
export const DEFAULT_SHELL = '/bin/bash';
export const CHANNEL_NAME = /^[A-Za-z0-9][A-Za-z0-9._-]*$/;

const ChannelNameSchema = z
  .string()
  .min(1)
  .regex(CHANNEL_NAME, 'Channel names may contain letters, digits, ".", "_" and "-"');

export const RunnerConfigSchema = z.object({
  /** Project name, used for the default state directory. Defaults to the working directory's name. */
  projectName: z
    .string()
    .min(1)
    .regex(/^[a-z0-9-]+$/)
    .optional(),

  /** Path to the phase manifest, relative to the working directory. */
  manifest: z.string().min(1).default(DEFAULT_MANIFEST),

  /** Directory commands run in. Relative to the config file's directory. */
  workingDirectory: z.string().default('.'),

  /** Where logs, progress and reports are kept. Defaults to `~/.phaserun/<projectName>`. */
  stateDir: z.string().optional(),

  /** Shell every command is handed to, as `<shell> -c <command>`. */
  shell: z.string().min(1).default(DEFAULT_SHELL),

  /** Toolchain release channels a matrix run replays, in order. */
  channels: z.array(ChannelNameSchema).min(1).default([...DEFAULT_CHANNELS]),

  environment: z
    .object({
      /** Variables exported to every command, on top of the inherited environment. */
      variables: z.record(z.string(), z.string()).default({}),
      /** Directories prepended to PATH. */
      extraPath: z.array(z.string()).default([]),
    })
    .default({}),

  logging: z
    .object({
      level: z.enum(['debug', 'info', 'warn', 'error']).default('info'),
      /** Print runner log lines to the console. Command output is always streamed. */
      console: z.boolean().default(true),
    })
    .default({}),

  reports: z
    .object({
      /** Write a JSON run report after every run. */
      enabled: z.boolean().default(true),
    })
    .default({}),
});

export type RunnerConfig = z.infer<typeof RunnerConfigSchema>;
