import { z } from 'zod';
import { zodToJsonSchema } from 'zod-to-json-schema';

const withId = <T extends object>(schema: T, id: string) => ({ ...schema, $id: id });

export const ParticipantTimingConfigSchema = z.object({
  pollIntervalMs: z.number().int().positive(),
  stableIdleMs: z.number().int().nonnegative(),
  retryBaseMs: z.number().int().positive(),
  retryMaxMs: z.number().int().positive(),
  turnTimeoutMs: z.number().int().nonnegative(),
  maxAutoResponses: z.number().int().nonnegative(),
});

/** On-disk prompt configuration (snake_case keys) */
export const PromptConfigFileSchema = z.object({
  prompt_template: z.string(),
  pass_keyword: z.string(),
});

export type PromptConfigFile = z.infer<typeof PromptConfigFileSchema>;

export const jsonSchemas = {
  participantTiming: withId(
    zodToJsonSchema(ParticipantTimingConfigSchema, { target: 'jsonSchema7' }),
    'ParleyParticipantTimingConfig'
  ),
  promptConfig: withId(zodToJsonSchema(PromptConfigFileSchema, { target: 'jsonSchema7' }), 'ParleyPromptConfig'),
};
