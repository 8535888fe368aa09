import type { HistoryFile, StoredGroupMessage } from './history-file.js';

export const makeStoredMessage = (overrides: Partial<StoredGroupMessage> = {}): StoredGroupMessage => ({
  id: overrides.id ?? `msg-${Math.random().toString(16).slice(2, 10)}`,
  timestamp: overrides.timestamp ?? '2024-03-01T10:00:00.000Z',
  source: overrides.source ?? { kind: 'user' },
  content: overrides.content ?? 'hello',
  isStreaming: overrides.isStreaming ?? false,
  persist: overrides.persist ?? true,
  thinkingTrace: overrides.thinkingTrace,
});

export const makeHistoryFile = (overrides: Partial<HistoryFile> = {}): HistoryFile => ({
  chatID: overrides.chatID ?? 'chat-1',
  title: overrides.title ?? 'Design review',
  participants: overrides.participants ?? ['Alice', 'Bob'],
  participantIds: overrides.participantIds,
  createdAt: overrides.createdAt,
  updatedAt: overrides.updatedAt,
  messages: overrides.messages ?? [makeStoredMessage({ id: 'm1' })],
});
