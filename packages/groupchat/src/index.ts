// Types
export {
  AGENT_STATUS_RANK,
  isTerminalStatus,
  type AgentAdapter,
  type AgentRunStatus,
  type AgentStatusEvent,
  type AssistantMessageEvent,
  type EphemeralCard,
  type EphemeralKind,
  type EphemeralMessageEvent,
  type EphemeralRun,
  type GroupMessage,
  type LiveAgentState,
  type MessageEvent,
  type MessageListener,
  type MessageSource,
  type OutputMarker,
  type ParticipantDebugStatus,
  type ParticipantDirectory,
  type ParticipantEventSink,
  type ParticipantIdentity,
  type ParticipantPhase,
  type RealtimeEvent,
  type ThinkingStep,
  type ThinkingStepKind,
} from './types.js';

// Messages and the conversation log
export {
  authorParticipantId,
  createAgentMessage,
  createSystemMessage,
  createUserMessage,
  displayNameOf,
  fromStoredMessage,
  toStoredMessage,
} from './message.js';
export { GroupChatSession, type GroupChatSessionInit } from './session.js';
export { disambiguateDisplayNames, sanitizeSourceTag, shortParticipantId, type DisplayNameInput } from './display-names.js';

// Output handling
export {
  cleanCapturedOutput,
  isPassSignal,
  normalizeTerminalText,
  stripAnsi,
  stripLineMarkers,
  type CleanOutputOptions,
} from './output-cleaner.js';

// Turn machinery
export { StableIdleTracker } from './idle-tracker.js';
export {
  DeliveryQueue,
  computeBackoffDelay,
  type DeliveryAttemptResult,
  type DeliveryQueueOptions,
  type PendingDelivery,
} from './delivery-queue.js';
export {
  ParticipantController,
  contentFingerprint,
  type ParticipantControllerOptions,
  type PromptSource,
} from './participant-controller.js';

// Coordination
export { GroupChatCoordinator, type GroupChatCoordinatorOptions } from './coordinator.js';
export {
  GroupChatManager,
  toClosedGroupChat,
  type ClosedGroupChat,
  type CreateGroupChatOptions,
  type GroupChatManagerOptions,
} from './manager.js';
export { GroupChatDebugLogger, type DebugLogEntry } from './debug-logger.js';
