import path from 'node:path';
import { storageLog } from '@parley/utils';
import { resolveHistoryMeta, type HistoryFile } from './history-file.js';

export type StoreDriver = 'file' | 'memory';

/**
 * Persistence collaborator for conversations.
 * The core never blocks on it: saves are fire-and-forget and failures are logged.
 */
export interface ConversationStore {
  readonly driver: StoreDriver;
  init(): Promise<void>;
  /** Path handed to agents so they can read the full transcript */
  transcriptPath(chatId: string): string;
  /** Where the per-chat debug log lives */
  debugLogPath(chatId: string): string;
  save(file: HistoryFile): Promise<void>;
  /** Returns null when the conversation does not exist or cannot be read */
  load(chatId: string): Promise<HistoryFile | null>;
  /** All saved conversations, most recently updated first */
  listAll(): Promise<HistoryFile[]>;
  delete(chatId: string): Promise<void>;
}

export interface StorageConfig {
  type?: string;
  /** Directory holding <chatId>.json files */
  dir?: string;
}

export function sortByUpdatedDesc(files: HistoryFile[]): HistoryFile[] {
  return [...files].sort((a, b) => {
    const ua = resolveHistoryMeta(a).updatedAt;
    const ub = resolveHistoryMeta(b).updatedAt;
    return ua === ub ? 0 : ua < ub ? 1 : -1;
  });
}

/**
 * In-memory store (no persistence). Used for tests and throwaway chats.
 */
export class MemoryConversationStore implements ConversationStore {
  readonly driver = 'memory' as const;
  private files: Map<string, HistoryFile> = new Map();
  private baseDir: string;

  constructor(options: { baseDir?: string } = {}) {
    this.baseDir = options.baseDir ?? path.join('memory', 'groupchat');
  }

  async init(): Promise<void> {
    // Nothing to prepare
  }

  transcriptPath(chatId: string): string {
    return path.join(this.baseDir, `${chatId}.json`);
  }

  debugLogPath(chatId: string): string {
    return path.join(this.baseDir, `${chatId}.debug.log`);
  }

  async save(file: HistoryFile): Promise<void> {
    this.files.set(file.chatID, structuredClone(file));
  }

  async load(chatId: string): Promise<HistoryFile | null> {
    const file = this.files.get(chatId);
    return file ? structuredClone(file) : null;
  }

  async listAll(): Promise<HistoryFile[]> {
    return sortByUpdatedDesc(Array.from(this.files.values()).map(f => structuredClone(f)));
  }

  async delete(chatId: string): Promise<void> {
    this.files.delete(chatId);
  }
}

export function getStorageConfigFromEnv(env: NodeJS.ProcessEnv = process.env): StorageConfig {
  return {
    type: env.PARLEY_STORAGE_TYPE,
    dir: env.PARLEY_STORAGE_DIR,
  };
}

/**
 * Create a conversation store.
 *
 * Configuration priority:
 * 1. Explicit config passed to function
 * 2. Environment variables (PARLEY_STORAGE_TYPE, PARLEY_STORAGE_DIR)
 * 3. Default: JSON files under <parley home>/groupchat
 *
 * A file store that cannot initialize falls back to memory so a chat can still run.
 */
export async function createConversationStore(
  defaultDir: string,
  config?: StorageConfig
): Promise<ConversationStore> {
  const envConfig = getStorageConfigFromEnv();
  const type = (config?.type ?? envConfig.type ?? 'file').toLowerCase();
  const dir = config?.dir ?? envConfig.dir ?? defaultDir;

  switch (type) {
    case 'none':
    case 'memory': {
      storageLog.info('Using in-memory conversation store (no persistence)');
      const store = new MemoryConversationStore({ baseDir: dir });
      await store.init();
      return store;
    }

    case 'file':
    case 'json':
    default: {
      const { FileConversationStore } = await import('./file-store.js');
      const store = new FileConversationStore({ baseDir: dir });
      try {
        await store.init();
        return store;
      } catch (err) {
        storageLog.warn('File store initialization failed, falling back to memory', {
          dir,
          error: err instanceof Error ? err.message : String(err),
        });
        const fallback = new MemoryConversationStore({ baseDir: dir });
        await fallback.init();
        return fallback;
      }
    }
  }
}
