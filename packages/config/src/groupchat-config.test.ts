import { describe, it, expect } from 'vitest';
import path from 'node:path';
import os from 'node:os';
import {
  DEFAULT_PARTICIPANT_TIMING,
  DEFAULT_PASS_KEYWORD,
  DEFAULT_PROMPT_TEMPLATE,
  getParleyHome,
  getGroupChatDir,
  getPromptConfigPath,
} from './groupchat-config.js';

describe('groupchat-config defaults', () => {
  it('exposes participant timing defaults', () => {
    expect(DEFAULT_PARTICIPANT_TIMING).toEqual({
      pollIntervalMs: 500,
      stableIdleMs: 1000,
      retryBaseMs: 1000,
      retryMaxMs: 8000,
      turnTimeoutMs: 900_000,
      maxAutoResponses: 20,
    });
  });

  it('uses [PASS] as the pass keyword', () => {
    expect(DEFAULT_PASS_KEYWORD).toBe('[PASS]');
  });

  it('default template carries every placeholder', () => {
    for (const placeholder of ['{{MY_NAME}}', '{{PARTICIPANTS}}', '{{TRANSCRIPT_PATH}}', '{{NEW_MESSAGE_COUNT}}', '{{PASS_KEYWORD}}']) {
      expect(DEFAULT_PROMPT_TEMPLATE).toContain(placeholder);
    }
  });
});

describe('parley paths', () => {
  it('prefers PARLEY_HOME', () => {
    const env = { PARLEY_HOME: '/data/parley' };
    expect(getParleyHome(env)).toBe('/data/parley');
    expect(getGroupChatDir(env)).toBe(path.join('/data/parley', 'groupchat'));
    expect(getPromptConfigPath(env)).toBe(path.join('/data/parley', 'groupchat_prompt.json'));
  });

  it('falls back to ~/.parley', () => {
    expect(getParleyHome({})).toBe(path.join(os.homedir(), '.parley'));
  });
});
