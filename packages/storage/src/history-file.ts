/**
 * On-disk shape of a saved conversation.
 *
 * {
 *   "chatID": "...",
 *   "title": "...",
 *   "participants": ["Alice", "Bob"],
 *   "participantIds": ["p-1", "p-2"],
 *   "createdAt": "2024-01-01T00:00:00.000Z",
 *   "updatedAt": "2024-01-01T00:05:00.000Z",
 *   "messages": [...]
 * }
 *
 * participantIds/createdAt/updatedAt are optional; older files are resolved from their messages.
 */

import { z } from 'zod';

export const StoredThinkingStepSchema = z.object({
  kind: z.enum(['thought', 'action', 'result']),
  text: z.string(),
  ts: z.string(),
});

export const StoredMessageSourceSchema = z.discriminatedUnion('kind', [
  z.object({ kind: z.literal('user') }),
  z.object({
    kind: z.literal('agent'),
    name: z.string(),
    participantId: z.string(),
    colorHint: z.string().optional(),
  }),
  z.object({ kind: z.literal('system') }),
]);

export const StoredGroupMessageSchema = z.object({
  id: z.string(),
  timestamp: z.string(),
  source: StoredMessageSourceSchema,
  content: z.string(),
  isStreaming: z.boolean().default(false),
  persist: z.boolean().default(true),
  thinkingTrace: z.array(StoredThinkingStepSchema).optional(),
});

export const HistoryFileSchema = z.object({
  chatID: z.string().min(1),
  title: z.string(),
  participants: z.array(z.string()),
  participantIds: z.array(z.string()).optional(),
  createdAt: z.string().optional(),
  updatedAt: z.string().optional(),
  messages: z.array(StoredGroupMessageSchema),
});

export type StoredThinkingStep = z.infer<typeof StoredThinkingStepSchema>;
export type StoredMessageSource = z.infer<typeof StoredMessageSourceSchema>;
export type StoredGroupMessage = z.infer<typeof StoredGroupMessageSchema>;
export type HistoryFile = z.infer<typeof HistoryFileSchema>;

export interface ResolvedHistoryMeta {
  participantIds: string[];
  createdAt: string;
  updatedAt: string;
}

/** Fill in optional metadata from the messages when a file predates it. */
export function resolveHistoryMeta(file: HistoryFile, now: Date = new Date()): ResolvedHistoryMeta {
  const fromMessages: string[] = [];
  for (const message of file.messages) {
    if (message.source.kind === 'agent' && !fromMessages.includes(message.source.participantId)) {
      fromMessages.push(message.source.participantId);
    }
  }

  const first = file.messages[0]?.timestamp;
  const last = file.messages[file.messages.length - 1]?.timestamp;
  const createdAt = file.createdAt ?? first ?? now.toISOString();

  return {
    participantIds: file.participantIds ?? fromMessages,
    createdAt,
    updatedAt: file.updatedAt ?? last ?? createdAt,
  };
}

/** Messages that are neither streaming nor marked transient. */
export function persistableMessages(messages: readonly StoredGroupMessage[]): StoredGroupMessage[] {
  return messages.filter(m => m.persist && !m.isStreaming);
}

/** Stable key order so saved files diff cleanly. */
export function serializeHistoryFile(file: HistoryFile): string {
  return JSON.stringify(sortKeys(file), null, 2) + '\n';
}

function sortKeys(value: unknown): unknown {
  if (Array.isArray(value)) {
    return value.map(sortKeys);
  }
  if (value !== null && typeof value === 'object') {
    const sorted: Record<string, unknown> = {};
    for (const [key, inner] of Object.entries(value).sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0))) {
      if (inner !== undefined) {
        sorted[key] = sortKeys(inner);
      }
    }
    return sorted;
  }
  return value;
}
