import os from 'node:os';
import path from 'node:path';

/** Timing and safety limits for a single participant controller */
export const DEFAULT_PARTICIPANT_TIMING = {
  /** Interval of both the input-check and output-capture loops */
  pollIntervalMs: 500,
  /** How long the agent must report idle before it counts as stably idle */
  stableIdleMs: 1000,
  retryBaseMs: 1000,
  retryMaxMs: 8000,
  /** Abandon a turn that produced no output for this long (0 disables) */
  turnTimeoutMs: 15 * 60 * 1000,
  /** Replies a participant may post without a user message in between (0 disables) */
  maxAutoResponses: 20,
} as const;

export type ParticipantTimingConfig = {
  -readonly [K in keyof typeof DEFAULT_PARTICIPANT_TIMING]: number;
};

export const DEFAULT_PASS_KEYWORD = '[PASS]';

export const DEFAULT_PROMPT_TEMPLATE = [
  '[Group Chat] You are "{{MY_NAME}}", participants: {{PARTICIPANTS}}. History: {{TRANSCRIPT_PATH}}',
  '{{NEW_MESSAGE_COUNT}} new message(s) since your last turn. Do not ask for pasted messages. Use the history file as the only source of latest conversation updates.',
  'If you have nothing to add, reply with exactly "{{PASS_KEYWORD}}".',
  '@name in a message means it is only for that participant; reply with exactly "{{PASS_KEYWORD}}" if it is not you.',
  'If you know what to do, there is no need to reply anything, just do it.',
].join('\n');

export const PROMPT_CONFIG_FILENAME = 'groupchat_prompt.json';
export const GROUPCHAT_DIRNAME = 'groupchat';

/**
 * Base directory for parley data.
 * PARLEY_HOME wins, otherwise ~/.parley
 */
export function getParleyHome(env: NodeJS.ProcessEnv = process.env): string {
  if (env.PARLEY_HOME) {
    return env.PARLEY_HOME;
  }
  return path.join(os.homedir(), '.parley');
}

export function getGroupChatDir(env: NodeJS.ProcessEnv = process.env): string {
  return path.join(getParleyHome(env), GROUPCHAT_DIRNAME);
}

export function getPromptConfigPath(env: NodeJS.ProcessEnv = process.env): string {
  return path.join(getParleyHome(env), PROMPT_CONFIG_FILENAME);
}
