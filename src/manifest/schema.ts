import { z } from 'zod';

const CommandSchema = z
  .string({ invalid_type_error: 'Command must be a string' })
  .refine((s) => s.trim().length > 0, 'Command must not be empty');

const CommandListSchema = z.array(CommandSchema, {
  invalid_type_error: 'Expected a list of commands',
});

/** One phase of the manifest. Unknown keys are rejected. */
export const PhaseSchema = z
  .object({
    /** Commands run before `override`. */
    pre: CommandListSchema.optional(),
    /** The phase's main commands. */
    override: CommandListSchema.optional(),
    /** Commands run after `override`. */
    post: CommandListSchema.optional(),
    /** Directories the CI host should persist between runs. */
    cache_directories: z.array(z.string().min(1)).optional(),
    /** Variables exported to this phase and every later one. */
    environment: z
      .record(z.string(), z.union([z.string(), z.number(), z.boolean()]).transform(String))
      .optional(),
  })
  .strict();

/** A manifest entry; an empty phase may be written as `name:` alone. */
export const ManifestPhaseSchema = PhaseSchema.nullable().transform(
  (phase): z.output<typeof PhaseSchema> => phase ?? {},
);

export type ManifestPhase = z.infer<typeof PhaseSchema>;
