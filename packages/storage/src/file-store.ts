import fs from 'node:fs';
import path from 'node:path';
import { HistoryFileError, errorMessage, storageLog } from '@parley/utils';
import { sortByUpdatedDesc, type ConversationStore } from './adapter.js';
import { HistoryFileSchema, serializeHistoryFile, type HistoryFile } from './history-file.js';

export interface FileConversationStoreOptions {
  /** Directory holding <chatId>.json and <chatId>.debug.log */
  baseDir: string;
}

function isMissing(err: unknown): boolean {
  return err instanceof Error && 'code' in err && err.code === 'ENOENT';
}

/**
 * One pretty-printed JSON file per conversation.
 * Writes go to a temp file and are renamed into place, serialized per conversation.
 */
export class FileConversationStore implements ConversationStore {
  readonly driver = 'file' as const;
  readonly baseDir: string;
  private writeChains: Map<string, Promise<void>> = new Map();

  constructor(options: FileConversationStoreOptions) {
    this.baseDir = options.baseDir;
  }

  async init(): Promise<void> {
    await fs.promises.mkdir(this.baseDir, { recursive: true });
  }

  transcriptPath(chatId: string): string {
    return path.join(this.baseDir, `${chatId}.json`);
  }

  debugLogPath(chatId: string): string {
    return path.join(this.baseDir, `${chatId}.debug.log`);
  }

  save(file: HistoryFile): Promise<void> {
    const target = this.transcriptPath(file.chatID);
    const body = serializeHistoryFile(file);
    const write = async (): Promise<void> => {
      await fs.promises.mkdir(this.baseDir, { recursive: true });
      const tmp = `${target}.tmp`;
      await fs.promises.writeFile(tmp, body, 'utf-8');
      await fs.promises.rename(tmp, target);
    };

    // Serialize writes per conversation; the stored chain never rejects
    const previous = this.writeChains.get(file.chatID) ?? Promise.resolve();
    const next = previous.then(write);
    this.writeChains.set(file.chatID, next.catch(() => undefined));

    return next.catch(err => {
      throw new HistoryFileError(target, errorMessage(err));
    });
  }

  async load(chatId: string): Promise<HistoryFile | null> {
    const target = this.transcriptPath(chatId);
    let raw: string;
    try {
      raw = await fs.promises.readFile(target, 'utf-8');
    } catch (err) {
      if (!isMissing(err)) {
        storageLog.warn('Failed to read history file', { path: target, error: errorMessage(err) });
      }
      return null;
    }
    return this.parse(target, raw);
  }

  async listAll(): Promise<HistoryFile[]> {
    let entries: string[];
    try {
      entries = await fs.promises.readdir(this.baseDir);
    } catch (err) {
      if (!isMissing(err)) {
        storageLog.warn('Failed to list history directory', { dir: this.baseDir, error: errorMessage(err) });
      }
      return [];
    }

    const files: HistoryFile[] = [];
    for (const entry of entries) {
      if (!entry.endsWith('.json')) continue;
      const loaded = await this.load(entry.slice(0, -'.json'.length));
      if (loaded) {
        files.push(loaded);
      }
    }
    return sortByUpdatedDesc(files);
  }

  async delete(chatId: string): Promise<void> {
    await this.writeChains.get(chatId);
    for (const target of [this.transcriptPath(chatId), this.debugLogPath(chatId)]) {
      try {
        await fs.promises.unlink(target);
      } catch (err) {
        if (!isMissing(err)) {
          throw new HistoryFileError(target, errorMessage(err));
        }
      }
    }
  }

  private parse(target: string, raw: string): HistoryFile | null {
    let json: unknown;
    try {
      json = JSON.parse(raw);
    } catch (err) {
      storageLog.warn('History file is not valid JSON', { path: target, error: errorMessage(err) });
      return null;
    }
    const parsed = HistoryFileSchema.safeParse(json);
    if (!parsed.success) {
      storageLog.warn('History file has unexpected shape', { path: target, issues: parsed.error.issues.length });
      return null;
    }
    return parsed.data;
  }
}
