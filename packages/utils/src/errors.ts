/**
 * Error Types for parley
 *
 * Single source of truth for typed error classes.
 */

export class ParleyError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ParleyError';
  }
}

export class ParticipantNotFoundError extends ParleyError {
  constructor(participantId: string) {
    super(`Participant not found: ${participantId}`);
    this.name = 'ParticipantNotFoundError';
  }
}

export class ConversationNotFoundError extends ParleyError {
  constructor(chatId: string) {
    super(`Conversation not found: ${chatId}`);
    this.name = 'ConversationNotFoundError';
  }
}

export class ConversationClosedError extends ParleyError {
  constructor(chatId: string) {
    super(`Conversation is closed: ${chatId}`);
    this.name = 'ConversationClosedError';
  }
}

export class HistoryFileError extends ParleyError {
  constructor(filePath: string, reason: string) {
    super(`History file error (${filePath}): ${reason}`);
    this.name = 'HistoryFileError';
  }
}

export class ConfigError extends ParleyError {
  constructor(message: string) {
    super(`Invalid configuration: ${message}`);
    this.name = 'ConfigError';
  }
}

export class TimeoutError extends ParleyError {
  constructor(operation: string, timeoutMs: number) {
    super(`Timeout after ${timeoutMs}ms: ${operation}`);
    this.name = 'TimeoutError';
  }
}

/** Render any thrown value as a log-friendly message. */
export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
