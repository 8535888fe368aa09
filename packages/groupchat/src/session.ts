/**
 * GroupChatSession - the conversation log.
 *
 * Append-only and sequence-numbered. `sequence` always equals the number of
 * messages appended, so message N (0-based) has sequence N + 1 and
 * `messagesAfter(s)` is a plain slice.
 */

import { EventEmitter } from 'node:events';
import { randomUUID } from 'node:crypto';
import { errorMessage, sessionLog } from '@parley/utils';
import { persistableMessages, resolveHistoryMeta, type HistoryFile } from '@parley/storage';
import { rememberBounded, setBounded } from './bounded.js';
import { disambiguateDisplayNames, sanitizeSourceTag } from './display-names.js';
import { fromStoredMessage, toStoredMessage } from './message.js';
import {
  AGENT_STATUS_RANK,
  isTerminalStatus,
  type AgentRunStatus,
  type EphemeralCard,
  type EphemeralRun,
  type GroupMessage,
  type LiveAgentState,
  type MessageListener,
  type ParticipantDirectory,
  type RealtimeEvent,
} from './types.js';

const MAX_EPHEMERAL_RUNS = 50;
/** Realtime dedupe memory: recent event ids and run statuses */
export const MAX_SEEN_EVENT_IDS = 1000;
export const MAX_TRACKED_RUNS = 200;

export interface GroupChatSessionInit {
  id?: string;
  title: string;
  participantIds?: readonly string[];
  messages?: readonly GroupMessage[];
  createdAt?: Date;
}

function runKey(runId: string, agentId: string): string {
  return `${runId}::${agentId}`;
}

export class GroupChatSession extends EventEmitter {
  readonly id: string;
  title: string;
  readonly createdAt: Date;
  lastActivityAt: Date;
  hasUnreadActivity = false;

  private _participantIds: string[] = [];
  private _messages: GroupMessage[] = [];
  private _sequence = 0;
  private messageListeners: Set<MessageListener> = new Set();

  // Realtime state
  private seenEventIds: Set<string> = new Set();
  private statusByRunAgent: Map<string, AgentRunStatus> = new Map();
  private fallbackRunIdByAgent: Map<string, string> = new Map();
  private _liveAgentStates: Map<string, LiveAgentState> = new Map();
  private _ephemeralRuns: EphemeralRun[] = [];

  constructor(init: GroupChatSessionInit) {
    super();
    this.id = init.id ?? randomUUID();
    this.title = init.title;
    this.createdAt = init.createdAt ?? new Date();
    this.lastActivityAt = this.createdAt;
    for (const id of init.participantIds ?? []) {
      if (!this._participantIds.includes(id)) {
        this._participantIds.push(id);
      }
    }
    if (init.messages) {
      // A restored log continues counting from its length
      this._messages = [...init.messages];
      this._sequence = this._messages.length;
      const last = this._messages[this._messages.length - 1];
      if (last) {
        this.lastActivityAt = last.timestamp;
      }
    }
  }

  static fromHistoryFile(file: HistoryFile): GroupChatSession {
    const meta = resolveHistoryMeta(file);
    return new GroupChatSession({
      id: file.chatID,
      title: file.title,
      participantIds: meta.participantIds,
      messages: file.messages.map(fromStoredMessage),
      createdAt: new Date(meta.createdAt),
    });
  }

  // =============================================================================
  // Log
  // =============================================================================

  get sequence(): number {
    return this._sequence;
  }

  get messages(): readonly GroupMessage[] {
    return this._messages;
  }

  /**
   * Append and broadcast `{ message, sequence }` to every subscriber before returning.
   * A throwing subscriber is logged; it never affects the append or other subscribers.
   */
  append(message: GroupMessage): number {
    this._messages.push(message);
    this._sequence += 1;
    this.lastActivityAt = new Date();
    this.hasUnreadActivity = true;

    const sequence = this._sequence;
    for (const listener of [...this.messageListeners]) {
      try {
        listener({ message, sequence });
      } catch (err) {
        sessionLog.error('Message subscriber threw', { chat: this.id, sequence, error: errorMessage(err) });
      }
    }
    return sequence;
  }

  messagesAfter(sequence: number): GroupMessage[] {
    const start = Math.max(0, Math.floor(sequence));
    if (start >= this._messages.length) return [];
    return this._messages.slice(start);
  }

  subscribe(listener: MessageListener): () => void {
    this.messageListeners.add(listener);
    return () => {
      this.messageListeners.delete(listener);
    };
  }

  onParticipantsChanged(listener: (participantIds: readonly string[]) => void): () => void {
    this.on('participants-changed', listener);
    return () => {
      this.off('participants-changed', listener);
    };
  }

  onRealtimeEvent(listener: (event: RealtimeEvent) => void): () => void {
    this.on('realtime', listener);
    return () => {
      this.off('realtime', listener);
    };
  }

  markRead(): void {
    this.hasUnreadActivity = false;
  }

  // =============================================================================
  // Participants
  // =============================================================================

  get participantIds(): readonly string[] {
    return this._participantIds;
  }

  addParticipant(id: string): boolean {
    if (this._participantIds.includes(id)) return false;
    this._participantIds.push(id);
    this.emit('participants-changed', [...this._participantIds]);
    return true;
  }

  removeParticipant(id: string): boolean {
    const index = this._participantIds.indexOf(id);
    if (index === -1) return false;
    this._participantIds.splice(index, 1);
    this.emit('participants-changed', [...this._participantIds]);
    return true;
  }

  /**
   * Labels for every participant. Unresolvable participants fall back to the
   * name on their latest message, then "AI".
   */
  participantDisplayNames(directory: ParticipantDirectory): Map<string, string> {
    return disambiguateDisplayNames(
      this._participantIds.map(id => {
        const identity = directory.getParticipant(id);
        if (identity) {
          return { id, baseName: identity.name, sourceTag: sanitizeSourceTag(identity.sourceTag, identity.name) };
        }
        return { id, baseName: this.lastAgentName(id) };
      })
    );
  }

  private lastAgentName(participantId: string): string | undefined {
    for (let i = this._messages.length - 1; i >= 0; i--) {
      const source = this._messages[i].source;
      if (source.kind === 'agent' && source.participantId === participantId) {
        return source.name;
      }
    }
    return undefined;
  }

  // =============================================================================
  // Realtime (ephemeral) state
  // =============================================================================

  get liveAgentStates(): ReadonlyMap<string, LiveAgentState> {
    return this._liveAgentStates;
  }

  get ephemeralRuns(): readonly EphemeralRun[] {
    return this._ephemeralRuns;
  }

  applyRealtimeEvent(event: RealtimeEvent): boolean {
    if (this.seenEventIds.has(event.eventId)) return false;
    rememberBounded(this.seenEventIds, event.eventId, MAX_SEEN_EVENT_IDS);

    switch (event.type) {
      case 'agent-status': {
        if (!event.ephemeral || event.persist) return false;
        const runId = this.resolveRunId(event.agentId, event.runId, event.ts);
        if (!this.advanceStatus(runId, event.agentId, event.status)) return false;
        this._liveAgentStates.set(event.agentId, {
          agentId: event.agentId,
          runId,
          status: event.status,
          phaseText: event.phaseText,
          updatedAt: event.ts,
        });
        if (isTerminalStatus(event.status)) {
          this.completeRun(runId, event.agentId, event.ts);
        }
        break;
      }

      case 'ephemeral-message': {
        if (!event.ephemeral || event.persist) return false;
        const runId = this.resolveRunId(event.agentId, event.runId, event.ts);
        this.appendEphemeralCard(runId, event.agentId, {
          id: event.eventId,
          kind: event.kind,
          text: event.text,
          meta: event.meta,
          ts: event.ts,
        });
        break;
      }

      case 'assistant-message': {
        if (event.ephemeral || !event.persist) return false;
        this.advanceStatus(event.runId, event.agentId, 'done');
        this.completeRun(event.runId, event.agentId, event.ts);
        break;
      }
    }

    this.emit('realtime', event);
    return true;
  }

  removeEphemeralRun(id: string): void {
    this._ephemeralRuns = this._ephemeralRuns.filter(run => run.id !== id);
  }

  private resolveRunId(agentId: string, explicitRunId: string, ts: Date): string {
    if (explicitRunId.trim() !== '') {
      this.fallbackRunIdByAgent.set(agentId, explicitRunId);
      return explicitRunId;
    }
    const known = this.fallbackRunIdByAgent.get(agentId);
    if (known) return known;
    const fallback = `fallback-${agentId}-${ts.getTime()}`;
    this.fallbackRunIdByAgent.set(agentId, fallback);
    return fallback;
  }

  /** Status only moves strictly forward in rank and never leaves a terminal state. */
  private advanceStatus(runId: string, agentId: string, next: AgentRunStatus): boolean {
    const key = runKey(runId, agentId);
    const current = this.statusByRunAgent.get(key);
    if (current !== undefined) {
      if (isTerminalStatus(current)) return false;
      if (AGENT_STATUS_RANK[next] <= AGENT_STATUS_RANK[current]) return false;
    }
    setBounded(this.statusByRunAgent, key, next, MAX_TRACKED_RUNS);
    return true;
  }

  private appendEphemeralCard(runId: string, agentId: string, card: EphemeralCard): void {
    const id = runKey(runId, agentId);
    const existing = this._ephemeralRuns.find(run => run.id === id);
    if (existing) {
      if (existing.cards.some(c => c.id === card.id)) return;
      existing.cards.push(card);
      existing.cards.sort((a, b) => a.ts.getTime() - b.ts.getTime());
      existing.updatedAt = card.ts;
      if (!existing.isCompleted) {
        existing.isCollapsed = false;
      }
    } else {
      this._ephemeralRuns.push({
        id,
        runId,
        agentId,
        cards: [card],
        isCollapsed: false,
        isCompleted: false,
        updatedAt: card.ts,
      });
    }

    this._ephemeralRuns.sort((a, b) => a.updatedAt.getTime() - b.updatedAt.getTime());
    if (this._ephemeralRuns.length > MAX_EPHEMERAL_RUNS) {
      this._ephemeralRuns.splice(0, this._ephemeralRuns.length - MAX_EPHEMERAL_RUNS);
    }
  }

  private completeRun(runId: string, agentId: string, ts: Date): void {
    const run = this._ephemeralRuns.find(r => r.id === runKey(runId, agentId));
    if (!run) return;
    run.isCompleted = true;
    run.isCollapsed = true;
    if (ts.getTime() > run.updatedAt.getTime()) {
      run.updatedAt = ts;
    }
  }

  // =============================================================================
  // Persistence
  // =============================================================================

  toHistoryFile(): HistoryFile {
    const names = new Set<string>();
    for (const message of this._messages) {
      if (message.source.kind === 'agent') {
        names.add(message.source.name);
      }
    }
    const stored = persistableMessages(this._messages.map(toStoredMessage));
    return {
      chatID: this.id,
      title: this.title,
      participants: [...names].sort(),
      participantIds: [...this._participantIds],
      createdAt: this.createdAt.toISOString(),
      updatedAt: this.lastActivityAt.toISOString(),
      messages: stored,
    };
  }
}
