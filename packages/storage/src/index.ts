export {
  type ConversationStore,
  type StorageConfig,
  type StoreDriver,
  MemoryConversationStore,
  createConversationStore,
  getStorageConfigFromEnv,
  sortByUpdatedDesc,
} from './adapter.js';

export { FileConversationStore, type FileConversationStoreOptions } from './file-store.js';

export {
  HistoryFileSchema,
  StoredGroupMessageSchema,
  StoredMessageSourceSchema,
  StoredThinkingStepSchema,
  persistableMessages,
  resolveHistoryMeta,
  serializeHistoryFile,
  type HistoryFile,
  type ResolvedHistoryMeta,
  type StoredGroupMessage,
  type StoredMessageSource,
  type StoredThinkingStep,
} from './history-file.js';
