/**
 * GroupChatCoordinator - owns the participant controllers of one conversation.
 *
 * Fans every appended message out to all controllers except its author and
 * folds pass signals into a single "stalled" flag: stalled once every
 * participant has passed since the last real message.
 */

import { EventEmitter } from 'node:events';
import { resolveParticipantTiming, type ParticipantTimingConfig } from '@parley/config';
import type { ConversationStore } from '@parley/storage';
import {
  ConversationClosedError,
  ParticipantNotFoundError,
  coordinatorLog,
  errorMessage,
} from '@parley/utils';
import type { GroupChatDebugLogger } from './debug-logger.js';
import { authorParticipantId, createUserMessage } from './message.js';
import { ParticipantController, type PromptSource } from './participant-controller.js';
import type { GroupChatSession } from './session.js';
import type {
  GroupMessage,
  MessageEvent,
  ParticipantDebugStatus,
  ParticipantDirectory,
  RealtimeEvent,
} from './types.js';

export interface GroupChatCoordinatorOptions {
  session: GroupChatSession;
  directory: ParticipantDirectory;
  prompt: PromptSource;
  store?: ConversationStore;
  /** Merged over defaults and PARLEY_* environment overrides */
  timing?: Partial<ParticipantTimingConfig>;
  debugLog?: GroupChatDebugLogger;
  now?: () => number;
}

export class GroupChatCoordinator extends EventEmitter {
  readonly session: GroupChatSession;
  private readonly directory: ParticipantDirectory;
  private readonly prompt: PromptSource;
  private readonly store?: ConversationStore;
  private readonly timing: ParticipantTimingConfig;
  private readonly debugLog?: GroupChatDebugLogger;
  private readonly now?: () => number;

  private controllers: Map<string, ParticipantController> = new Map();
  private passState: Map<string, boolean> = new Map();
  private _isStalled = false;
  private unsubscribeMessages: (() => void) | null = null;
  private unsubscribeParticipants: (() => void) | null = null;
  private isShutDown = false;

  constructor(options: GroupChatCoordinatorOptions) {
    super();
    this.session = options.session;
    this.directory = options.directory;
    this.prompt = options.prompt;
    this.store = options.store;
    this.timing = resolveParticipantTiming(options.timing);
    this.debugLog = options.debugLog;
    this.now = options.now;
  }

  // =============================================================================
  // Setup
  // =============================================================================

  /** Create controllers for current participants and start listening to the log. */
  setupControllers(): void {
    if (this.isShutDown || this.unsubscribeMessages) return;
    this.syncControllersToParticipants();
    this.unsubscribeParticipants = this.session.onParticipantsChanged(() => this.syncControllersToParticipants());
    this.unsubscribeMessages = this.session.subscribe(event => this.deliverMessage(event));
  }

  /**
   * Shut down controllers of departed participants and create controllers for
   * new ones that the directory can resolve.
   */
  syncControllersToParticipants(): void {
    if (this.isShutDown) return;
    const desired = new Set(this.session.participantIds);

    for (const [id, controller] of this.controllers) {
      if (!desired.has(id)) {
        controller.shutdown();
        this.controllers.delete(id);
        this.passState.delete(id);
        coordinatorLog.info('Participant left', { chat: this.session.id, participant: controller.participant.name });
      }
    }

    for (const id of this.session.participantIds) {
      if (this.controllers.has(id)) continue;
      const participant = this.directory.getParticipant(id);
      if (!participant) {
        coordinatorLog.warn('Participant not resolvable, skipping', { chat: this.session.id, participant: id });
        continue;
      }

      const controller = new ParticipantController({
        participant,
        session: this.session,
        directory: this.directory,
        prompt: this.prompt,
        store: this.store,
        timing: this.timing,
        debugLog: this.debugLog,
        displayNames: () => this.session.participantDisplayNames(this.directory),
        events: {
          onPassStateChanged: (participantId, didPass) => this.handlePassStateChange(participantId, didPass),
        },
        now: this.now,
      });
      this.passState.set(id, false);
      this.controllers.set(id, controller);
      controller.start();
      coordinatorLog.info('Participant joined', { chat: this.session.id, participant: participant.name });
    }
  }

  // =============================================================================
  // Fan-out and stall detection
  // =============================================================================

  private deliverMessage(event: MessageEvent): void {
    const author = authorParticipantId(event.message);
    this.debugLog?.log({
      category: 'fanout',
      decision: 'broadcast',
      meta: { sequence: event.sequence, author: author ?? event.message.source.kind },
    });
    for (const [id, controller] of this.controllers) {
      if (id === author) continue;
      controller.deliverMessage(event.sequence);
    }
  }

  private handlePassStateChange(participantId: string, didPass: boolean): void {
    if (!didPass) {
      // Real reply: everyone gets a fresh chance
      this.clearPassState();
      return;
    }

    this.passState.set(participantId, true);
    const allPassed = this.passState.size > 0 && [...this.passState.values()].every(Boolean);
    if (allPassed && !this._isStalled) {
      this.setStalled(true);
      coordinatorLog.info('Conversation stalled, every participant passed', { chat: this.session.id });
    }
  }

  private clearPassState(): void {
    for (const key of this.passState.keys()) {
      this.passState.set(key, false);
    }
    this.setStalled(false);
  }

  private setStalled(value: boolean): void {
    if (this._isStalled === value) return;
    this._isStalled = value;
    this.emit('stall-changed', value);
  }

  onStallChanged(listener: (isStalled: boolean) => void): () => void {
    this.on('stall-changed', listener);
    return () => {
      this.off('stall-changed', listener);
    };
  }

  get isStalled(): boolean {
    return this._isStalled;
  }

  /** True while any participant is working on a turn. */
  get isConversationActive(): boolean {
    for (const controller of this.controllers.values()) {
      if (controller.isProcessing) return true;
    }
    return false;
  }

  // =============================================================================
  // User actions
  // =============================================================================

  sendUserMessage(text: string): GroupMessage {
    if (this.isShutDown) {
      throw new ConversationClosedError(this.session.id);
    }
    this.clearPassState();
    for (const controller of this.controllers.values()) {
      controller.resetAutoResponses();
    }

    const message = createUserMessage(text);
    this.session.append(message);
    if (this.store) {
      this.store.save(this.session.toHistoryFile()).catch(err => {
        coordinatorLog.error('Failed to save conversation', { chat: this.session.id, error: errorMessage(err) });
      });
    }
    return message;
  }

  /**
   * Post a reply that arrived outside the capture loop (e.g. a structured
   * assistant message). Same turn-id and content dedupe as captured replies.
   */
  commitReply(participantId: string, turnId: string, content: string): boolean {
    const controller = this.controllers.get(participantId);
    if (!controller) {
      throw new ParticipantNotFoundError(participantId);
    }
    return controller.commitReply(turnId, content);
  }

  /** Abandon every turn and pending delivery; polling keeps running. */
  stopAll(): void {
    for (const controller of this.controllers.values()) {
      controller.stop();
    }
  }

  /** Fresh round for every participant from the current end of the log. */
  resetAll(): void {
    for (const controller of this.controllers.values()) {
      controller.reset();
    }
    this.clearPassState();
  }

  shutdown(): void {
    if (this.isShutDown) return;
    this.isShutDown = true;
    this.unsubscribeMessages?.();
    this.unsubscribeMessages = null;
    this.unsubscribeParticipants?.();
    this.unsubscribeParticipants = null;
    for (const controller of this.controllers.values()) {
      controller.shutdown();
    }
    this.controllers.clear();
    this.passState.clear();
    this.removeAllListeners();
  }

  // =============================================================================
  // Realtime and introspection
  // =============================================================================

  receiveRealtimeEvent(event: RealtimeEvent): void {
    this.session.applyRealtimeEvent(event);
  }

  receiveRealtimeEvents(events: readonly RealtimeEvent[]): void {
    for (const event of events) {
      this.session.applyRealtimeEvent(event);
    }
  }

  controller(participantId: string): ParticipantController | undefined {
    return this.controllers.get(participantId);
  }

  statuses(): ParticipantDebugStatus[] {
    return [...this.controllers.values()].map(controller => controller.status());
  }
}
