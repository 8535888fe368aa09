/**
 * GroupChatManager - open conversations plus a recycle bin of closed ones.
 *
 * Closed chats are whatever the store holds that is not currently open; they
 * can be restored while every original participant is still available.
 */

import type { ParticipantTimingConfig } from '@parley/config';
import { resolveHistoryMeta, type ConversationStore, type HistoryFile } from '@parley/storage';
import { ConversationNotFoundError, coordinatorLog, errorMessage } from '@parley/utils';
import { GroupChatCoordinator } from './coordinator.js';
import { GroupChatDebugLogger } from './debug-logger.js';
import type { PromptSource } from './participant-controller.js';
import { GroupChatSession } from './session.js';
import type { GroupMessage, ParticipantDirectory } from './types.js';

/** Minimum participants for a restorable chat */
const MIN_RESTORE_PARTICIPANTS = 2;

export interface ClosedGroupChat {
  id: string;
  title: string;
  participants: string[];
  participantIds: string[];
  createdAt: Date;
  updatedAt: Date;
  messageCount: number;
}

export function toClosedGroupChat(file: HistoryFile): ClosedGroupChat {
  const meta = resolveHistoryMeta(file);
  return {
    id: file.chatID,
    title: file.title,
    participants: [...file.participants],
    participantIds: meta.participantIds,
    createdAt: new Date(meta.createdAt),
    updatedAt: new Date(meta.updatedAt),
    messageCount: file.messages.length,
  };
}

export interface CreateGroupChatOptions {
  title: string;
  participantIds: readonly string[];
  id?: string;
  createdAt?: Date;
  messages?: readonly GroupMessage[];
}

export interface GroupChatManagerOptions {
  store: ConversationStore;
  directory: ParticipantDirectory;
  prompt: PromptSource;
  timing?: Partial<ParticipantTimingConfig>;
  /** Per-chat debug log files; defaults to on for file-backed stores */
  debugLogging?: boolean;
  now?: () => number;
}

export class GroupChatManager {
  private readonly options: GroupChatManagerOptions;
  private chats: Map<string, GroupChatCoordinator> = new Map();
  private _activeGroupChatId: string | undefined;
  private _closedGroupChats: ClosedGroupChat[] = [];

  constructor(options: GroupChatManagerOptions) {
    this.options = options;
  }

  get groupChats(): GroupChatSession[] {
    return [...this.chats.values()].map(coordinator => coordinator.session);
  }

  get activeGroupChatId(): string | undefined {
    return this._activeGroupChatId;
  }

  get activeGroupChat(): GroupChatSession | undefined {
    return this._activeGroupChatId ? this.chats.get(this._activeGroupChatId)?.session : undefined;
  }

  get closedGroupChats(): readonly ClosedGroupChat[] {
    return this._closedGroupChats;
  }

  coordinator(chatId: string): GroupChatCoordinator | undefined {
    return this.chats.get(chatId);
  }

  // =============================================================================
  // Open chats
  // =============================================================================

  async createGroupChat(options: CreateGroupChatOptions): Promise<GroupChatCoordinator> {
    const { store, directory, prompt, timing, now } = this.options;
    const session = new GroupChatSession({
      id: options.id,
      title: options.title,
      participantIds: options.participantIds,
      messages: options.messages,
      createdAt: options.createdAt,
    });

    const debugLogging = this.options.debugLogging ?? store.driver === 'file';
    const coordinator = new GroupChatCoordinator({
      session,
      directory,
      prompt,
      store,
      timing,
      now,
      debugLog: debugLogging ? new GroupChatDebugLogger(session.id, store.debugLogPath(session.id)) : undefined,
    });

    this.chats.set(session.id, coordinator);
    this._activeGroupChatId = session.id;

    // Agents are pointed at the transcript, so it has to exist before the first turn
    await this.save(session);
    coordinator.setupControllers();
    coordinatorLog.info('Group chat opened', { chat: session.id, participants: session.participantIds.length });

    await this.refreshClosedGroupChats();
    return coordinator;
  }

  focusGroupChat(chatId: string): GroupChatSession {
    const coordinator = this.chats.get(chatId);
    if (!coordinator) {
      throw new ConversationNotFoundError(chatId);
    }
    this._activeGroupChatId = chatId;
    coordinator.session.markRead();
    return coordinator.session;
  }

  async closeGroupChat(chatId: string): Promise<void> {
    const coordinator = this.chats.get(chatId);
    if (!coordinator) {
      throw new ConversationNotFoundError(chatId);
    }
    coordinator.shutdown();
    this.chats.delete(chatId);
    await this.save(coordinator.session);

    if (this._activeGroupChatId === chatId) {
      const [next] = this.chats.keys();
      this._activeGroupChatId = next;
    }
    coordinatorLog.info('Group chat closed', { chat: chatId });
    await this.refreshClosedGroupChats();
  }

  // =============================================================================
  // Recycle bin
  // =============================================================================

  async refreshClosedGroupChats(): Promise<readonly ClosedGroupChat[]> {
    const files = await this.options.store.listAll();
    this._closedGroupChats = files.filter(file => !this.chats.has(file.chatID)).map(toClosedGroupChat);
    return this._closedGroupChats;
  }

  async canRestoreClosedGroupChat(chatId: string): Promise<boolean> {
    const file = await this.options.store.load(chatId);
    return file !== null && this.isRestorable(file);
  }

  /**
   * Reopen a closed chat with its history. Returns the already-open chat when it
   * is open, or null when it is missing or a participant is unavailable.
   */
  async restoreClosedGroupChat(chatId: string): Promise<GroupChatCoordinator | null> {
    const open = this.chats.get(chatId);
    if (open) {
      this.focusGroupChat(chatId);
      await this.refreshClosedGroupChats();
      return open;
    }

    const file = await this.options.store.load(chatId);
    if (!file || !this.isRestorable(file)) {
      return null;
    }
    const restored = GroupChatSession.fromHistoryFile(file);
    return this.createGroupChat({
      id: restored.id,
      title: restored.title,
      participantIds: restored.participantIds,
      messages: restored.messages,
      createdAt: restored.createdAt,
    });
  }

  async permanentlyDeleteClosedGroupChat(chatId: string): Promise<void> {
    if (this.chats.has(chatId)) return;
    await this.options.store.delete(chatId);
    this._closedGroupChats = this._closedGroupChats.filter(chat => chat.id !== chatId);
  }

  async clearAllClosedGroupChats(): Promise<void> {
    for (const closed of this._closedGroupChats) {
      await this.options.store.delete(closed.id);
    }
    this._closedGroupChats = [];
  }

  shutdown(): void {
    for (const coordinator of this.chats.values()) {
      coordinator.shutdown();
    }
    this.chats.clear();
    this._activeGroupChatId = undefined;
  }

  private isRestorable(file: HistoryFile): boolean {
    const { participantIds } = resolveHistoryMeta(file);
    if (participantIds.length < MIN_RESTORE_PARTICIPANTS) return false;
    return participantIds.every(id => this.options.directory.getAdapter(id) !== undefined);
  }

  private async save(session: GroupChatSession): Promise<void> {
    try {
      await this.options.store.save(session.toHistoryFile());
    } catch (err) {
      coordinatorLog.error('Failed to save conversation', { chat: session.id, error: errorMessage(err) });
    }
  }
}
