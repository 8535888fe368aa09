import { describe, it, expect } from 'vitest';
import { ParticipantTimingConfigSchema, PromptConfigFileSchema, jsonSchemas } from './schemas.js';
import { DEFAULT_PARTICIPANT_TIMING } from './groupchat-config.js';

describe('config schemas', () => {
  it('validates participant timing defaults', () => {
    expect(ParticipantTimingConfigSchema.parse(DEFAULT_PARTICIPANT_TIMING)).toEqual(DEFAULT_PARTICIPANT_TIMING);
  });

  it('rejects a non-positive poll interval', () => {
    const result = ParticipantTimingConfigSchema.safeParse({ ...DEFAULT_PARTICIPANT_TIMING, pollIntervalMs: 0 });
    expect(result.success).toBe(false);
  });

  it('validates the prompt config file shape', () => {
    const cfg = { prompt_template: 'Hi {{MY_NAME}}', pass_keyword: '[SKIP]' };
    expect(PromptConfigFileSchema.parse(cfg)).toEqual(cfg);
    expect(PromptConfigFileSchema.safeParse({ promptTemplate: 'x' }).success).toBe(false);
  });

  it('exports JSON schemas with ids', () => {
    expect(jsonSchemas.participantTiming.$id).toBe('ParleyParticipantTimingConfig');
    expect(jsonSchemas.promptConfig.$id).toBe('ParleyPromptConfig');
  });
});
