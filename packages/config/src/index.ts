export {
  DEFAULT_PARTICIPANT_TIMING,
  DEFAULT_PASS_KEYWORD,
  DEFAULT_PROMPT_TEMPLATE,
  PROMPT_CONFIG_FILENAME,
  GROUPCHAT_DIRNAME,
  getParleyHome,
  getGroupChatDir,
  getPromptConfigPath,
  type ParticipantTimingConfig,
} from './groupchat-config.js';

export {
  ParticipantTimingConfigSchema,
  PromptConfigFileSchema,
  jsonSchemas,
  type PromptConfigFile,
} from './schemas.js';

export { resolveParticipantTiming } from './timing.js';

export {
  PromptConfigStore,
  DEFAULT_PROMPT_CONFIG,
  normalizePromptConfig,
  renderPromptTemplate,
  type PromptConfig,
  type PromptConfigStoreOptions,
  type PromptValues,
} from './prompt-config.js';
