import { mentionsChannel } from '../channels/replay.js';
import type { PreRunValidator, ValidationContext, ValidationResult } from './types.js';

export const manifestValidator: PreRunValidator = {
  name: 'manifest',

  async validate({ config, pipeline, manifestError }: ValidationContext): Promise<ValidationResult> {
    const errors: string[] = [];
    const warnings: string[] = [];

    if (pipeline === null) {
      errors.push(manifestError ?? `Manifest ${config.manifestPath} could not be loaded.`);
      return { passed: false, errors, warnings };
    }

    for (const phase of pipeline.phases) {
      if (phase.commands.length === 0) {
        warnings.push(`Phase '${phase.name}' has no commands.`);
      }
    }

    const commands = pipeline.phases.flatMap((p) => p.commands);
    for (const channel of config.channels) {
      if (!commands.some((c) => mentionsChannel(c.run, channel))) {
        warnings.push(`No command names channel '${channel}'; its replay runs only shared commands.`);
      }
    }

    return { passed: true, errors, warnings };
  },
};
