/**
 * Prompt configuration for group chat payloads.
 *
 * Stored as `groupchat_prompt.json` under the parley home directory:
 *   { "prompt_template": "...", "pass_keyword": "[PASS]" }
 * A missing file is created with the defaults on first load.
 */

import fs from 'node:fs';
import path from 'node:path';
import { createLogger, errorMessage } from '@parley/utils';
import { DEFAULT_PASS_KEYWORD, DEFAULT_PROMPT_TEMPLATE, getPromptConfigPath } from './groupchat-config.js';
import { PromptConfigFileSchema, type PromptConfigFile } from './schemas.js';

const log = createLogger('prompt-config');

export interface PromptConfig {
  promptTemplate: string;
  passKeyword: string;
}

/** Values substituted into the prompt template */
export interface PromptValues {
  myName: string;
  participants: readonly string[];
  transcriptPath: string;
  newMessageCount: number;
  passKeyword: string;
}

export const DEFAULT_PROMPT_CONFIG: Readonly<PromptConfig> = {
  promptTemplate: DEFAULT_PROMPT_TEMPLATE,
  passKeyword: DEFAULT_PASS_KEYWORD,
};

/** Blank fields fall back to their defaults. */
export function normalizePromptConfig(config: PromptConfig): PromptConfig {
  const promptTemplate = config.promptTemplate.trim() === '' ? DEFAULT_PROMPT_TEMPLATE : config.promptTemplate;
  const passKeyword = config.passKeyword.trim() === '' ? DEFAULT_PASS_KEYWORD : config.passKeyword.trim();
  return { promptTemplate, passKeyword };
}

/**
 * Substitute placeholders. {{HISTORY_PATH}} is accepted as an alias of {{TRANSCRIPT_PATH}}.
 * Unknown or missing placeholders are left alone.
 */
export function renderPromptTemplate(template: string, values: PromptValues): string {
  return template
    .replaceAll('{{MY_NAME}}', values.myName)
    .replaceAll('{{PARTICIPANTS}}', values.participants.join(', '))
    .replaceAll('{{TRANSCRIPT_PATH}}', values.transcriptPath)
    .replaceAll('{{HISTORY_PATH}}', values.transcriptPath)
    .replaceAll('{{NEW_MESSAGE_COUNT}}', String(values.newMessageCount))
    .replaceAll('{{PASS_KEYWORD}}', values.passKeyword);
}

function toFile(config: PromptConfig): PromptConfigFile {
  return { prompt_template: config.promptTemplate, pass_keyword: config.passKeyword };
}

export interface PromptConfigStoreOptions {
  /** Defaults to <parley home>/groupchat_prompt.json */
  filePath?: string;
}

export class PromptConfigStore {
  readonly filePath: string;
  private current: PromptConfig = { ...DEFAULT_PROMPT_CONFIG };
  private loaded = false;

  constructor(options: PromptConfigStoreOptions = {}) {
    this.filePath = options.filePath ?? getPromptConfigPath();
  }

  /** Current configuration, loading it on first access. */
  get config(): PromptConfig {
    if (!this.loaded) {
      this.load();
    }
    return { ...this.current };
  }

  get passKeyword(): string {
    return this.config.passKeyword;
  }

  /**
   * Read the file. A missing file is written with defaults; an unreadable or
   * invalid one is left on disk untouched and the defaults are used.
   */
  load(): PromptConfig {
    this.loaded = true;

    if (!fs.existsSync(this.filePath)) {
      this.current = { ...DEFAULT_PROMPT_CONFIG };
      this.writeFile(this.current);
      return { ...this.current };
    }

    try {
      const raw: unknown = JSON.parse(fs.readFileSync(this.filePath, 'utf-8'));
      const parsed = PromptConfigFileSchema.safeParse(raw);
      if (!parsed.success) {
        log.warn('Prompt config has unexpected shape, using defaults', { path: this.filePath });
        this.current = { ...DEFAULT_PROMPT_CONFIG };
      } else {
        this.current = normalizePromptConfig({
          promptTemplate: parsed.data.prompt_template,
          passKeyword: parsed.data.pass_keyword,
        });
      }
    } catch (err) {
      log.warn('Failed to read prompt config, using defaults', { path: this.filePath, error: errorMessage(err) });
      this.current = { ...DEFAULT_PROMPT_CONFIG };
    }
    return { ...this.current };
  }

  reload(): PromptConfig {
    return this.load();
  }

  save(config: PromptConfig): PromptConfig {
    this.current = normalizePromptConfig(config);
    this.loaded = true;
    this.writeFile(this.current);
    return { ...this.current };
  }

  resetToDefaults(): PromptConfig {
    return this.save({ ...DEFAULT_PROMPT_CONFIG });
  }

  render(values: Omit<PromptValues, 'passKeyword'>): string {
    const { promptTemplate, passKeyword } = this.config;
    return renderPromptTemplate(promptTemplate, { ...values, passKeyword });
  }

  private writeFile(config: PromptConfig): void {
    try {
      fs.mkdirSync(path.dirname(this.filePath), { recursive: true });
      const tmp = `${this.filePath}.tmp`;
      fs.writeFileSync(tmp, JSON.stringify(toFile(config), null, 2) + '\n');
      fs.renameSync(tmp, this.filePath);
    } catch (err) {
      log.error('Failed to write prompt config', { path: this.filePath, error: errorMessage(err) });
    }
  }
}
