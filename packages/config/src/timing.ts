import { ConfigError } from '@parley/utils';
import { DEFAULT_PARTICIPANT_TIMING, type ParticipantTimingConfig } from './groupchat-config.js';
import { ParticipantTimingConfigSchema } from './schemas.js';

const ENV_KEYS: ReadonlyArray<[keyof ParticipantTimingConfig, string]> = [
  ['pollIntervalMs', 'PARLEY_POLL_INTERVAL_MS'],
  ['stableIdleMs', 'PARLEY_STABLE_IDLE_MS'],
  ['retryBaseMs', 'PARLEY_RETRY_BASE_MS'],
  ['retryMaxMs', 'PARLEY_RETRY_MAX_MS'],
  ['turnTimeoutMs', 'PARLEY_TURN_TIMEOUT_MS'],
  ['maxAutoResponses', 'PARLEY_MAX_AUTO_RESPONSES'],
];

function readEnvNumber(env: NodeJS.ProcessEnv, key: string): number | undefined {
  const raw = env[key];
  if (raw === undefined || raw.trim() === '') return undefined;
  const value = Number(raw);
  if (!Number.isFinite(value)) {
    throw new ConfigError(`${key} must be a number, got "${raw}"`);
  }
  return value;
}

/**
 * Merge defaults, PARLEY_* environment overrides and explicit overrides (in that order)
 * and validate the result.
 */
export function resolveParticipantTiming(
  overrides: Partial<ParticipantTimingConfig> = {},
  env: NodeJS.ProcessEnv = process.env
): ParticipantTimingConfig {
  const merged: ParticipantTimingConfig = { ...DEFAULT_PARTICIPANT_TIMING };
  for (const [field, envKey] of ENV_KEYS) {
    const fromEnv = readEnvNumber(env, envKey);
    if (fromEnv !== undefined) {
      merged[field] = fromEnv;
    }
    const explicit = overrides[field];
    if (explicit !== undefined) {
      merged[field] = explicit;
    }
  }

  const parsed = ParticipantTimingConfigSchema.safeParse(merged);
  if (!parsed.success) {
    const detail = parsed.error.issues.map(issue => `${issue.path.join('.')}: ${issue.message}`).join('; ');
    throw new ConfigError(detail);
  }
  if (parsed.data.retryMaxMs < parsed.data.retryBaseMs) {
    throw new ConfigError('retryMaxMs must be >= retryBaseMs');
  }
  return parsed.data;
}
