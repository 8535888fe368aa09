import { describe, it, expect } from 'vitest';
import {
  ParleyError,
  ParticipantNotFoundError,
  ConversationNotFoundError,
  ConversationClosedError,
  HistoryFileError,
  ConfigError,
  TimeoutError,
  errorMessage,
} from './errors.js';

describe('Error Classes', () => {
  describe('ParleyError', () => {
    it('creates error with message', () => {
      const err = new ParleyError('test error');
      expect(err.message).toBe('test error');
      expect(err.name).toBe('ParleyError');
      expect(err).toBeInstanceOf(Error);
      expect(err).toBeInstanceOf(ParleyError);
    });
  });

  describe('ParticipantNotFoundError', () => {
    it('includes participant id in message', () => {
      const err = new ParticipantNotFoundError('agent-7');
      expect(err.message).toBe('Participant not found: agent-7');
      expect(err.name).toBe('ParticipantNotFoundError');
      expect(err).toBeInstanceOf(ParleyError);
    });
  });

  describe('ConversationNotFoundError', () => {
    it('includes chat id in message', () => {
      const err = new ConversationNotFoundError('chat-1');
      expect(err.message).toBe('Conversation not found: chat-1');
      expect(err.name).toBe('ConversationNotFoundError');
    });
  });

  describe('ConversationClosedError', () => {
    it('includes chat id in message', () => {
      const err = new ConversationClosedError('chat-2');
      expect(err.message).toBe('Conversation is closed: chat-2');
      expect(err).toBeInstanceOf(ParleyError);
    });
  });

  describe('HistoryFileError', () => {
    it('includes path and reason', () => {
      const err = new HistoryFileError('/tmp/x.json', 'invalid JSON');
      expect(err.message).toBe('History file error (/tmp/x.json): invalid JSON');
      expect(err.name).toBe('HistoryFileError');
    });
  });

  describe('ConfigError', () => {
    it('prefixes the message', () => {
      const err = new ConfigError('pollIntervalMs must be positive');
      expect(err.message).toBe('Invalid configuration: pollIntervalMs must be positive');
      expect(err.name).toBe('ConfigError');
    });
  });

  describe('TimeoutError', () => {
    it('includes operation and timeout', () => {
      const err = new TimeoutError('await output', 5000);
      expect(err.message).toBe('Timeout after 5000ms: await output');
      expect(err.name).toBe('TimeoutError');
    });
  });

  describe('errorMessage', () => {
    it('reads Error messages and stringifies everything else', () => {
      expect(errorMessage(new Error('boom'))).toBe('boom');
      expect(errorMessage('plain')).toBe('plain');
      expect(errorMessage(42)).toBe('42');
    });
  });
});
