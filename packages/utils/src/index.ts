export {
  createLogger,
  formatLogEntry,
  sessionLog,
  coordinatorLog,
  participantLog,
  storageLog,
  type Logger,
  type LogEntry,
  type LogLevel,
} from './logger.js';

export {
  ParleyError,
  ParticipantNotFoundError,
  ConversationNotFoundError,
  ConversationClosedError,
  HistoryFileError,
  ConfigError,
  TimeoutError,
  errorMessage,
} from './errors.js';
