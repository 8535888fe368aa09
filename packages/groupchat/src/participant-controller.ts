/**
 * ParticipantController - drives one agent through the turn cycle:
 *
 *   Idle → Checking → (Delivering) → Injecting → AwaitingOutput → Capturing → Idle
 *
 * Two polling loops run on the same interval: the input loop looks for new
 * messages while the agent is free, the capture loop waits for the agent to
 * settle after an injection and classifies what it wrote.
 */

import { createHash, randomUUID } from 'node:crypto';
import { DEFAULT_PARTICIPANT_TIMING, type ParticipantTimingConfig, type PromptValues } from '@parley/config';
import type { ConversationStore } from '@parley/storage';
import { TimeoutError, errorMessage, participantLog } from '@parley/utils';
import type { GroupChatDebugLogger } from './debug-logger.js';
import { DeliveryQueue, type DeliveryAttemptResult } from './delivery-queue.js';
import { StableIdleTracker } from './idle-tracker.js';
import { rememberBounded } from './bounded.js';
import { authorParticipantId, createAgentMessage } from './message.js';
import { cleanCapturedOutput, isPassSignal } from './output-cleaner.js';
import type { GroupChatSession } from './session.js';
import type {
  AgentAdapter,
  AgentRunStatus,
  OutputMarker,
  ParticipantDebugStatus,
  ParticipantDirectory,
  ParticipantEventSink,
  ParticipantIdentity,
  ParticipantPhase,
} from './types.js';

/** Renders the injected payload; PromptConfigStore satisfies this */
export interface PromptSource {
  readonly passKeyword: string;
  render(values: Omit<PromptValues, 'passKeyword'>): string;
}

export interface ParticipantControllerOptions {
  participant: ParticipantIdentity;
  session: GroupChatSession;
  directory: ParticipantDirectory;
  prompt: PromptSource;
  store?: ConversationStore;
  events?: ParticipantEventSink;
  timing?: Partial<ParticipantTimingConfig>;
  debugLog?: GroupChatDebugLogger;
  /** Labels for {{PARTICIPANTS}} and {{MY_NAME}}, keyed by participant id */
  displayNames?: () => ReadonlyMap<string, string>;
  now?: () => number;
}

interface QueuedPayload {
  payload: string;
  /** Log sequence the payload was rendered against */
  throughSequence: number;
  newMessageCount: number;
  runId: string;
}

interface ActiveTurn {
  token: string;
  turnId: string;
  runId: string;
  injectedAtSequence: number;
  payload: string;
  marker: OutputMarker;
  injectedAt: number;
}

const MAX_POSTED_TURN_IDS = 500;

/** Whitespace-collapsed, case-folded content hash */
export function contentFingerprint(content: string): string {
  const normalized = content.replace(/\s+/g, ' ').trim().toLowerCase();
  return createHash('sha256').update(normalized).digest('hex').slice(0, 16);
}

export class ParticipantController {
  readonly participant: ParticipantIdentity;
  private readonly session: GroupChatSession;
  private readonly directory: ParticipantDirectory;
  private readonly prompt: PromptSource;
  private readonly store?: ConversationStore;
  private readonly events?: ParticipantEventSink;
  private readonly debugLog?: GroupChatDebugLogger;
  private readonly displayNames?: () => ReadonlyMap<string, string>;
  private readonly timing: ParticipantTimingConfig;
  private readonly now: () => number;

  private readonly idle: StableIdleTracker;
  private readonly queue: DeliveryQueue<QueuedPayload>;

  // =============================================================================
  // Turn state
  // =============================================================================

  private _lastSeenSequence: number;
  private activeTurn: ActiveTurn | null = null;
  private injecting = false;
  /** Log sequence captured for the injection in flight */
  private injectingAtSequence: number | null = null;
  private _consecutivePassCount = 0;
  private _autoResponseCount = 0;
  private pendingSignal = false;
  private phase: ParticipantPhase = 'idle';
  private lastError?: string;
  /** Bumped by stop(); in-flight work from an older generation is discarded */
  private generation = 0;

  private postedTurnIds: Set<string> = new Set();
  /** Our latest post, for dropping a re-capture of it before anyone else speaks */
  private lastPost: { fingerprint: string; sequence: number } | null = null;

  private inputTimer: NodeJS.Timeout | null = null;
  private captureTimer: NodeJS.Timeout | null = null;
  private capturing = false;
  private isShutDown = false;

  constructor(options: ParticipantControllerOptions) {
    this.participant = options.participant;
    this.session = options.session;
    this.directory = options.directory;
    this.prompt = options.prompt;
    this.store = options.store;
    this.events = options.events;
    this.debugLog = options.debugLog;
    this.displayNames = options.displayNames;
    this.timing = { ...DEFAULT_PARTICIPANT_TIMING, ...options.timing };
    this.now = options.now ?? (() => Date.now());

    // History before joining is not replayed
    this._lastSeenSequence = this.session.sequence;
    this.idle = new StableIdleTracker(this.timing.stableIdleMs);
    this.queue = new DeliveryQueue<QueuedPayload>({
      attempt: item => this.attemptDelivery(item),
      retryBaseMs: this.timing.retryBaseMs,
      retryMaxMs: this.timing.retryMaxMs,
      onDelivered: () => {
        // A replacement rendered before the injection adds nothing new
        this.queue.discardIf(item => item.throughSequence <= this._lastSeenSequence);
      },
      onRetryScheduled: ({ attempts, delayMs, reason }) => {
        this.trace('delivery', 'retry-scheduled', reason, { attempts, delayMs });
      },
      now: this.now,
    });
  }

  get id(): string {
    return this.participant.id;
  }

  get lastSeenSequence(): number {
    return this._lastSeenSequence;
  }

  get consecutivePassCount(): number {
    return this._consecutivePassCount;
  }

  get autoResponseCount(): number {
    return this._autoResponseCount;
  }

  /** True from the start of an injection until its output has been captured. */
  get isProcessing(): boolean {
    return this.injecting || this.activeTurn !== null;
  }

  // =============================================================================
  // Lifecycle
  // =============================================================================

  start(): void {
    if (this.isShutDown || this.inputTimer) return;
    this.inputTimer = setInterval(() => this.inputTick(), this.timing.pollIntervalMs);
    this.captureTimer = setInterval(() => {
      this.captureTick().catch(err => {
        this.capturing = false;
        participantLog.error('Capture loop failed', { participant: this.participant.name, error: errorMessage(err) });
      });
    }, this.timing.pollIntervalMs);
  }

  /**
   * Abandon the current turn and pending delivery; polling continues.
   * Messages the discarded work covered count as seen.
   */
  stop(): void {
    const discardedThrough = Math.max(
      this.queue.pending?.item.throughSequence ?? 0,
      this.activeTurn?.injectedAtSequence ?? 0,
      this.injectingAtSequence ?? 0
    );
    if (discardedThrough > this._lastSeenSequence) {
      this._lastSeenSequence = discardedThrough;
    }
    this.generation += 1;
    this.activeTurn = null;
    this.queue.clear();
    this.pendingSignal = false;
    if (!this.isShutDown) {
      this.phase = 'idle';
    }
    this.trace('lifecycle', 'stopped', undefined, { lastSeenSequence: this._lastSeenSequence });
  }

  /** Start a fresh round from the current end of the log. */
  reset(): void {
    this.stop();
    this._lastSeenSequence = this.session.sequence;
    this._consecutivePassCount = 0;
    this._autoResponseCount = 0;
    this.lastError = undefined;
    this.trace('lifecycle', 'reset', undefined, { lastSeenSequence: this._lastSeenSequence });
  }

  /** A user message lifts the auto-response cap. */
  resetAutoResponses(): void {
    this._autoResponseCount = 0;
  }

  shutdown(): void {
    if (this.isShutDown) return;
    this.stop();
    this.isShutDown = true;
    this.phase = 'stopped';
    if (this.inputTimer) {
      clearInterval(this.inputTimer);
      this.inputTimer = null;
    }
    if (this.captureTimer) {
      clearInterval(this.captureTimer);
      this.captureTimer = null;
    }
    this.queue.dispose();
  }

  // =============================================================================
  // Input side
  // =============================================================================

  /** Fan-out signal from the coordinator: the log grew to `sequence`. */
  deliverMessage(sequence: number): void {
    if (this.isShutDown || sequence <= this._lastSeenSequence) return;
    if (this.isProcessing) {
      this.pendingSignal = true;
      this.trace('fanout', 'deferred-processing', undefined, { sequence });
      return;
    }
    const adapter = this.directory.getAdapter(this.participant.id);
    if (!adapter || !this.sampleStableIdle(adapter)) {
      this.pendingSignal = true;
      this.trace('fanout', 'deferred-not-idle', undefined, { sequence });
      return;
    }
    this.checkForNewMessages();
  }

  private inputTick(): void {
    if (this.isShutDown || this.isProcessing) return;
    const adapter = this.directory.getAdapter(this.participant.id);
    if (!adapter || !this.sampleStableIdle(adapter)) return;
    this.checkForNewMessages();
  }

  private checkForNewMessages(): void {
    if (this.isShutDown || this.isProcessing) return;
    this.pendingSignal = false;

    const current = this.session.sequence;
    if (current <= this._lastSeenSequence) return;
    const pending = this.queue.pending;
    if (pending && pending.item.throughSequence >= current) return;

    this.phase = 'checking';
    const fresh = this.session.messagesAfter(this._lastSeenSequence);
    const relevant = fresh.filter(message => authorParticipantId(message) !== this.participant.id);

    if (relevant.length === 0) {
      // Only our own echoes are new
      this._lastSeenSequence = current;
      this.phase = 'idle';
      this.trace('check', 'self-only', undefined, { sequence: current });
      return;
    }

    if (this.timing.maxAutoResponses > 0 && this._autoResponseCount >= this.timing.maxAutoResponses) {
      this.phase = 'idle';
      this.trace('check', 'auto-response-cap', undefined, { count: this._autoResponseCount });
      return;
    }

    const payload = this.renderPayload(relevant.length);
    this.enqueue(payload, current, relevant.length);
  }

  private renderPayload(newMessageCount: number): string {
    const labels = this.displayNames?.();
    const myName = labels?.get(this.participant.id) ?? this.participant.name;
    const participants = labels ? Array.from(labels.values()) : [this.participant.name];
    return this.prompt.render({
      myName,
      participants,
      transcriptPath: this.store?.transcriptPath(this.session.id) ?? '',
      newMessageCount,
    });
  }

  private enqueue(payload: string, throughSequence: number, newMessageCount: number): void {
    const runId = randomUUID();
    this.phase = 'delivering';
    this.publishStatus(runId, 'queued');
    this.trace('delivery', 'enqueued', undefined, { throughSequence, newMessageCount });
    this.queue.enqueue({ payload, throughSequence, newMessageCount, runId });
  }

  private async attemptDelivery(item: QueuedPayload): Promise<DeliveryAttemptResult> {
    if (this.isShutDown) return { delivered: false, reason: 'controller shut down' };
    if (this.isProcessing) return { delivered: false, reason: 'turn in progress' };

    const adapter = this.directory.getAdapter(this.participant.id);
    if (!adapter) return this.deliveryFailed('adapter unavailable');
    if (!this.sampleStableIdle(adapter)) return this.deliveryFailed('agent busy');

    const generation = this.generation;
    const marker = adapter.currentMarker();
    const sequenceAtInjection = this.session.sequence;

    this.injecting = true;
    this.injectingAtSequence = sequenceAtInjection;
    this.phase = 'injecting';
    let accepted: boolean;
    try {
      accepted = await adapter.inject(item.payload);
    } catch (err) {
      participantLog.warn('Injection threw', { participant: this.participant.name, error: errorMessage(err) });
      accepted = false;
    } finally {
      this.injecting = false;
      this.injectingAtSequence = null;
    }

    if (generation !== this.generation || this.isShutDown) {
      return { delivered: false, reason: 'stopped during injection' };
    }
    if (!accepted) {
      return this.deliveryFailed('inject rejected');
    }

    const injectedAt = this.now();
    this._lastSeenSequence = sequenceAtInjection;
    this.idle.markBusy();
    this.activeTurn = {
      token: randomUUID(),
      turnId: randomUUID(),
      runId: item.runId,
      injectedAtSequence: sequenceAtInjection,
      payload: item.payload,
      marker,
      injectedAt,
    };
    this.phase = 'awaiting-output';
    this.lastError = undefined;
    this.publishStatus(item.runId, 'running');
    this.trace('inject', 'injected', undefined, {
      sequence: sequenceAtInjection,
      newMessageCount: item.newMessageCount,
    });
    return { delivered: true };
  }

  private deliveryFailed(reason: string): DeliveryAttemptResult {
    this.phase = 'delivering';
    this.trace('delivery', 'failed', reason);
    return { delivered: false, reason };
  }

  // =============================================================================
  // Output side
  // =============================================================================

  private async captureTick(): Promise<void> {
    const turn = this.activeTurn;
    if (this.isShutDown || this.capturing || !turn) return;

    if (this.timing.turnTimeoutMs > 0 && this.now() - turn.injectedAt >= this.timing.turnTimeoutMs) {
      this.abandonTimedOutTurn(turn);
      return;
    }

    const adapter = this.directory.getAdapter(this.participant.id);
    if (!adapter) {
      // Handle lost mid-turn: keep the payload for when the agent comes back
      this.activeTurn = null;
      this.publishStatus(turn.runId, 'error', 'agent adapter lost');
      this.trace('turn', 'adapter-lost', 'payload re-enqueued');
      participantLog.warn('Agent adapter lost during turn, re-enqueueing', { participant: this.participant.name });
      this.enqueue(turn.payload, turn.injectedAtSequence, 0);
      return;
    }

    if (!this.sampleStableIdle(adapter)) {
      this.phase = 'awaiting-output';
      return;
    }

    this.capturing = true;
    this.phase = 'capturing';
    let raw: string;
    try {
      raw = await adapter.readOutputSince(turn.marker);
    } catch (err) {
      this.phase = 'awaiting-output';
      this.trace('capture', 'read-failed', errorMessage(err));
      return;
    } finally {
      this.capturing = false;
    }

    if (this.activeTurn !== turn) return;

    const passKeyword = this.prompt.passKeyword;
    const cleaned = cleanCapturedOutput(raw, { payload: turn.payload, passKeyword });
    if (cleaned === '') {
      this.phase = 'awaiting-output';
      this.trace('capture', 'empty', undefined, { rawLength: raw.length });
      return;
    }

    this.activeTurn = null;
    if (isPassSignal(cleaned, passKeyword)) {
      this.recordPass(turn);
    } else {
      this.trace('capture', 'reply', undefined, { turnId: turn.turnId }, raw);
      if (!this.commitReply(turn.turnId, cleaned, turn.runId)) {
        this.publishStatus(turn.runId, 'done', 'duplicate');
      }
    }
    this.afterTurn();
  }

  private recordPass(turn: ActiveTurn): void {
    this._consecutivePassCount += 1;
    this.events?.onPassStateChanged(this.participant.id, true);
    this.publishStatus(turn.runId, 'done', 'passed');
    this.trace('capture', 'pass', undefined, { consecutivePassCount: this._consecutivePassCount });
  }

  /**
   * Post a reply for a turn. Appends at most once per turn id, and drops
   * content equal to our own latest post while it is still the last message.
   * Returns true when the message was appended.
   */
  commitReply(turnId: string, content: string, runId?: string): boolean {
    if (this.postedTurnIds.has(turnId)) {
      this.trace('dedupe', 'duplicate-turn', undefined, { turnId });
      return false;
    }
    const fingerprint = contentFingerprint(content);
    if (this.lastPost?.fingerprint === fingerprint && this.lastPost.sequence === this.session.sequence) {
      this.trace('dedupe', 'duplicate-content', undefined, { turnId });
      return false;
    }
    rememberBounded(this.postedTurnIds, turnId, MAX_POSTED_TURN_IDS);

    const sequence = this.session.append(createAgentMessage(this.participant, content));
    this.lastPost = { fingerprint, sequence };
    this._consecutivePassCount = 0;
    this._autoResponseCount += 1;
    this.events?.onPassStateChanged(this.participant.id, false);
    if (runId) {
      this.publishStatus(runId, 'done');
    }
    this.trace('reply', 'appended', undefined, { turnId, sequence });
    this.persist();
    return true;
  }

  private abandonTimedOutTurn(turn: ActiveTurn): void {
    this.activeTurn = null;
    const err = new TimeoutError(`waiting for ${this.participant.name} to answer`, this.timing.turnTimeoutMs);
    this.lastError = err.message;
    participantLog.warn('Turn abandoned', { participant: this.participant.name, error: err.message });
    this.publishStatus(turn.runId, 'error', err.message);
    this.trace('turn', 'timeout', err.message, { turnId: turn.turnId });
    this.afterTurn();
  }

  private afterTurn(): void {
    this.phase = 'idle';
    if (this.isProcessing || this.isShutDown) return;
    if (this.pendingSignal) {
      this.trace('fanout', 'drained');
    }
    this.checkForNewMessages();
    if (this.queue.pending && !this.queue.isInFlight && !this.isProcessing) {
      this.queue.kick();
    }
  }

  private persist(): void {
    if (!this.store) return;
    this.store.save(this.session.toHistoryFile()).catch(err => {
      participantLog.error('Failed to save conversation', { chat: this.session.id, error: errorMessage(err) });
      this.trace('persist', 'failed', errorMessage(err));
    });
  }

  // =============================================================================
  // Helpers
  // =============================================================================

  private sampleStableIdle(adapter: AgentAdapter): boolean {
    const now = this.now();
    this.idle.sample(adapter.isIdle(), now);
    return this.idle.isStable(now);
  }

  private publishStatus(runId: string, status: AgentRunStatus, phaseText?: string): void {
    this.session.applyRealtimeEvent({
      type: 'agent-status',
      eventId: randomUUID(),
      runId,
      agentId: this.participant.id,
      status,
      phaseText,
      ts: new Date(this.now()),
      ephemeral: true,
      persist: false,
    });
  }

  private trace(
    category: string,
    decision: string,
    detail?: string,
    meta?: Record<string, string | number | boolean | undefined>,
    output?: string
  ): void {
    this.debugLog?.log({ participant: this.participant.id, category, decision, detail, meta, output });
  }

  status(): ParticipantDebugStatus {
    const pending = this.queue.pending;
    const turn = this.activeTurn;
    return {
      participantId: this.participant.id,
      name: this.participant.name,
      phase: this.phase,
      isProcessing: this.isProcessing,
      lastSeenSequence: this._lastSeenSequence,
      consecutivePassCount: this._consecutivePassCount,
      autoResponseCount: this._autoResponseCount,
      pendingDelivery: pending
        ? { attempts: pending.attempts, lastFailure: pending.lastFailure, nextAttemptAt: pending.nextAttemptAt }
        : undefined,
      activeTurn: turn
        ? {
            turnId: turn.turnId,
            runId: turn.runId,
            injectedAtSequence: turn.injectedAtSequence,
            injectedAt: turn.injectedAt,
          }
        : undefined,
      lastError: this.lastError,
    };
  }
}
