import { randomUUID } from 'node:crypto';
import type { StoredGroupMessage } from '@parley/storage';
import type { GroupMessage, MessageSource, ParticipantIdentity, ThinkingStep } from './types.js';

export function createUserMessage(content: string, timestamp: Date = new Date()): GroupMessage {
  return { id: randomUUID(), timestamp, source: { kind: 'user' }, content, isStreaming: false, persist: true };
}

export function createSystemMessage(content: string, options: { persist?: boolean; timestamp?: Date } = {}): GroupMessage {
  return {
    id: randomUUID(),
    timestamp: options.timestamp ?? new Date(),
    source: { kind: 'system' },
    content,
    isStreaming: false,
    persist: options.persist ?? true,
  };
}

export function createAgentMessage(
  participant: ParticipantIdentity,
  content: string,
  options: { id?: string; timestamp?: Date; thinkingTrace?: ThinkingStep[] } = {}
): GroupMessage {
  return {
    id: options.id ?? randomUUID(),
    timestamp: options.timestamp ?? new Date(),
    source: { kind: 'agent', name: participant.name, participantId: participant.id, colorHint: participant.colorHint },
    content,
    isStreaming: false,
    persist: true,
    thinkingTrace: options.thinkingTrace,
  };
}

export function displayNameOf(source: MessageSource): string {
  switch (source.kind) {
    case 'user':
      return 'You';
    case 'agent':
      return source.name;
    case 'system':
      return 'System';
  }
}

/** The participant that wrote the message, if an agent did. */
export function authorParticipantId(message: GroupMessage): string | undefined {
  return message.source.kind === 'agent' ? message.source.participantId : undefined;
}

export function toStoredMessage(message: GroupMessage): StoredGroupMessage {
  return {
    id: message.id,
    timestamp: message.timestamp.toISOString(),
    source: { ...message.source },
    content: message.content,
    isStreaming: message.isStreaming,
    persist: message.persist,
    thinkingTrace: message.thinkingTrace?.map(step => ({ kind: step.kind, text: step.text, ts: step.ts.toISOString() })),
  };
}

export function fromStoredMessage(stored: StoredGroupMessage): GroupMessage {
  return {
    id: stored.id,
    timestamp: new Date(stored.timestamp),
    source: { ...stored.source },
    content: stored.content,
    isStreaming: stored.isStreaming,
    persist: stored.persist,
    thinkingTrace: stored.thinkingTrace?.map(step => ({ kind: step.kind, text: step.text, ts: new Date(step.ts) })),
  };
}
