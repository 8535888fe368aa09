import { describe, it, expect } from 'vitest';
import {
  HistoryFileSchema,
  persistableMessages,
  resolveHistoryMeta,
  serializeHistoryFile,
} from './history-file.js';
import { makeHistoryFile, makeStoredMessage } from './test-helpers.js';

describe('HistoryFileSchema', () => {
  it('defaults isStreaming and persist on load', () => {
    const parsed = HistoryFileSchema.parse({
      chatID: 'c1',
      title: 't',
      participants: [],
      messages: [{ id: 'm1', timestamp: '2024-01-01T00:00:00.000Z', source: { kind: 'system' }, content: 'hi' }],
    });
    expect(parsed.messages[0].isStreaming).toBe(false);
    expect(parsed.messages[0].persist).toBe(true);
  });

  it('rejects unknown source kinds', () => {
    const result = HistoryFileSchema.safeParse({
      chatID: 'c1',
      title: 't',
      participants: [],
      messages: [{ id: 'm1', timestamp: 'x', source: { kind: 'robot' }, content: 'hi' }],
    });
    expect(result.success).toBe(false);
  });
});

describe('resolveHistoryMeta', () => {
  it('derives missing metadata from messages', () => {
    const file = makeHistoryFile({
      messages: [
        makeStoredMessage({ id: 'a', timestamp: '2024-03-01T10:00:00.000Z' }),
        makeStoredMessage({
          id: 'b',
          timestamp: '2024-03-01T10:01:00.000Z',
          source: { kind: 'agent', name: 'Bob', participantId: 'p-bob' },
        }),
        makeStoredMessage({
          id: 'c',
          timestamp: '2024-03-01T10:02:00.000Z',
          source: { kind: 'agent', name: 'Bob', participantId: 'p-bob' },
        }),
      ],
    });
    expect(resolveHistoryMeta(file)).toEqual({
      participantIds: ['p-bob'],
      createdAt: '2024-03-01T10:00:00.000Z',
      updatedAt: '2024-03-01T10:02:00.000Z',
    });
  });

  it('prefers explicit metadata', () => {
    const file = makeHistoryFile({
      participantIds: ['p1', 'p2'],
      createdAt: '2024-01-01T00:00:00.000Z',
      updatedAt: '2024-02-01T00:00:00.000Z',
    });
    expect(resolveHistoryMeta(file)).toEqual({
      participantIds: ['p1', 'p2'],
      createdAt: '2024-01-01T00:00:00.000Z',
      updatedAt: '2024-02-01T00:00:00.000Z',
    });
  });

  it('uses the clock for an empty file', () => {
    const now = new Date('2024-05-05T05:05:05.000Z');
    const meta = resolveHistoryMeta(makeHistoryFile({ messages: [] }), now);
    expect(meta.createdAt).toBe('2024-05-05T05:05:05.000Z');
    expect(meta.updatedAt).toBe('2024-05-05T05:05:05.000Z');
  });
});

describe('persistableMessages', () => {
  it('drops streaming and transient messages', () => {
    const kept = persistableMessages([
      makeStoredMessage({ id: 'keep' }),
      makeStoredMessage({ id: 'streaming', isStreaming: true }),
      makeStoredMessage({ id: 'transient', persist: false }),
    ]);
    expect(kept.map(m => m.id)).toEqual(['keep']);
  });
});

describe('serializeHistoryFile', () => {
  it('writes keys in sorted order and omits undefined fields', () => {
    const text = serializeHistoryFile(makeHistoryFile({ messages: [] }));
    expect(text).toBe(
      '{\n  "chatID": "chat-1",\n  "messages": [],\n  "participants": [\n    "Alice",\n    "Bob"\n  ],\n  "title": "Design review"\n}\n'
    );
  });
});
