/**
 * Shared group chat types: messages, realtime events, participant status,
 * and the seams to the outside world (agent adapter, participant directory).
 */

// =============================================================================
// Messages
// =============================================================================

export type MessageSource =
  | { kind: 'user' }
  | { kind: 'agent'; name: string; participantId: string; colorHint?: string }
  | { kind: 'system' };

export type ThinkingStepKind = 'thought' | 'action' | 'result';

export interface ThinkingStep {
  kind: ThinkingStepKind;
  text: string;
  ts: Date;
}

export interface GroupMessage {
  readonly id: string;
  readonly timestamp: Date;
  readonly source: MessageSource;
  readonly content: string;
  readonly isStreaming: boolean;
  /** Transient messages are shown but never written to the transcript */
  readonly persist: boolean;
  readonly thinkingTrace?: readonly ThinkingStep[];
}

/** Broadcast payload for every append */
export interface MessageEvent {
  message: GroupMessage;
  sequence: number;
}

export type MessageListener = (event: MessageEvent) => void;

// =============================================================================
// Participants and agents
// =============================================================================

export interface ParticipantIdentity {
  id: string;
  name: string;
  /** Short tag of the underlying CLI (e.g. "claude", "codex"), used to disambiguate names */
  sourceTag?: string;
  colorHint?: string;
}

/** Opaque position in an agent's output stream */
export type OutputMarker = string | number;

/**
 * Terminal-backed agent as seen by the core.
 * Raw idle is a point sample; the controller applies its own stability window.
 */
export interface AgentAdapter {
  isIdle(): boolean;
  /** Write text plus submit; false when the terminal refused it */
  inject(text: string): Promise<boolean>;
  currentMarker(): OutputMarker;
  readOutputSince(marker: OutputMarker): Promise<string>;
}

/** Resolves participants and their live adapters; an undefined adapter means the handle is gone */
export interface ParticipantDirectory {
  getParticipant(participantId: string): ParticipantIdentity | undefined;
  getAdapter(participantId: string): AgentAdapter | undefined;
}

// =============================================================================
// Controller status
// =============================================================================

export type ParticipantPhase =
  | 'idle'
  | 'checking'
  | 'delivering'
  | 'injecting'
  | 'awaiting-output'
  | 'capturing'
  | 'stopped';

export interface ParticipantDebugStatus {
  participantId: string;
  name: string;
  phase: ParticipantPhase;
  isProcessing: boolean;
  lastSeenSequence: number;
  consecutivePassCount: number;
  autoResponseCount: number;
  pendingDelivery?: {
    attempts: number;
    lastFailure?: string;
    nextAttemptAt?: number;
  };
  activeTurn?: {
    turnId: string;
    runId: string;
    injectedAtSequence: number;
    injectedAt: number;
  };
  lastError?: string;
}

/** Controller to coordinator notifications */
export interface ParticipantEventSink {
  onPassStateChanged(participantId: string, didPass: boolean): void;
}

// =============================================================================
// Realtime events
// =============================================================================

export type AgentRunStatus =
  | 'idle'
  | 'queued'
  | 'running'
  | 'thinking'
  | 'calling_tool'
  | 'tool_running'
  | 'waiting_tool'
  | 'drafting'
  | 'streaming'
  | 'summarizing'
  | 'done'
  | 'error';

export const AGENT_STATUS_RANK: Record<AgentRunStatus, number> = {
  idle: 0,
  queued: 1,
  running: 2,
  thinking: 3,
  calling_tool: 4,
  tool_running: 4,
  waiting_tool: 5,
  drafting: 6,
  streaming: 7,
  summarizing: 8,
  done: 9,
  error: 9,
};

export function isTerminalStatus(status: AgentRunStatus): boolean {
  return status === 'done' || status === 'error';
}

interface RealtimeEventBase {
  eventId: string;
  runId: string;
  agentId: string;
  ts: Date;
  ephemeral: boolean;
  persist: boolean;
}

export interface AgentStatusEvent extends RealtimeEventBase {
  type: 'agent-status';
  status: AgentRunStatus;
  phaseText?: string;
}

export type EphemeralKind = 'thought' | 'action' | 'result' | 'note';

export interface EphemeralMessageEvent extends RealtimeEventBase {
  type: 'ephemeral-message';
  kind: EphemeralKind;
  text: string;
  meta?: Record<string, string>;
}

export interface AssistantMessageEvent extends RealtimeEventBase {
  type: 'assistant-message';
  messageId: string;
  content: string;
}

export type RealtimeEvent = AgentStatusEvent | EphemeralMessageEvent | AssistantMessageEvent;

export interface LiveAgentState {
  agentId: string;
  runId: string;
  status: AgentRunStatus;
  phaseText?: string;
  updatedAt: Date;
}

export interface EphemeralCard {
  id: string;
  kind: EphemeralKind;
  text: string;
  meta?: Record<string, string>;
  ts: Date;
}

export interface EphemeralRun {
  id: string;
  runId: string;
  agentId: string;
  cards: EphemeralCard[];
  isCollapsed: boolean;
  isCompleted: boolean;
  updatedAt: Date;
}
