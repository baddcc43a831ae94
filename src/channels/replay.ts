/**
 * Channel replays: one pipeline run per toolchain release channel.
 *
 * A command belongs to a channel when it names the channel as a whole word
 * (`toolchain default nightly`, `cargo +beta test`). Commands naming no
 * configured channel are shared by every replay.
 */

import type { Pipeline } from '../../packages/pipeline-engine/src/index.js';
import { UnknownChannelError } from '../errors.js';

function escapeRegExp(value: string): string {
  return value.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
}

/**
 * Whether `command` names `channel` as a whole word.
 * Letters, digits and `_` continue a word; anything else ends it.
 */
export function mentionsChannel(command: string, channel: string): boolean {
  const pattern = new RegExp(`(?<![A-Za-z0-9_])${escapeRegExp(channel)}(?![A-Za-z0-9_])`);
  return pattern.test(command);
}

/**
 * The configured channels a command names, in configuration order.
 */
export function mentionedChannels(command: string, channels: readonly string[]): string[] {
  return channels.filter((channel) => mentionsChannel(command, channel));
}

/**
 * Whether a command runs when the pipeline is replayed for `channel`.
 */
export function runsOnChannel(command: string, channel: string, channels: readonly string[]): boolean {
  const named = mentionedChannels(command, channels);
  return named.length === 0 || named.includes(channel);
}

/**
 * Build the pipeline replayed for one channel: commands that belong only to
 * other channels are dropped, and the result is tagged with the channel.
 * Command indices keep their manifest positions.
 */
export function replayForChannel(pipeline: Pipeline, channel: string, channels: readonly string[]): Pipeline {
  if (!channels.includes(channel)) {
    throw new UnknownChannelError(
      `Unknown channel '${channel}'; configured channels: ${channels.join(', ')}`,
      channel,
      [...channels],
    );
  }

  return {
    ...pipeline,
    channel,
    phases: pipeline.phases.map((phase) => ({
      ...phase,
      commands: phase.commands.filter((command) => runsOnChannel(command.run, channel, channels)),
    })),
  };
}
