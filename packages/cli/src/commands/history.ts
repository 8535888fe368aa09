import type { Command } from 'commander';
import { getGroupChatDir } from '@parley/config';
import { displayNameOf } from '@parley/groupchat';
import {
  createConversationStore,
  getStorageConfigFromEnv,
  resolveHistoryMeta,
  type ConversationStore,
  type HistoryFile,
} from '@parley/storage';
import { ConversationNotFoundError } from '@parley/utils';

function openStore(env: NodeJS.ProcessEnv): Promise<ConversationStore> {
  return createConversationStore(getGroupChatDir(env), getStorageConfigFromEnv(env));
}

export function formatHistorySummary(file: HistoryFile): string {
  const { updatedAt } = resolveHistoryMeta(file);
  const agents = file.participants.length > 0 ? file.participants.join(', ') : 'no replies yet';
  return `${file.chatID}  ${file.title}  [${agents}]  ${file.messages.length} message(s)  updated ${updatedAt}`;
}

export function formatTranscript(file: HistoryFile): string[] {
  const lines = [`# ${file.title} (${file.chatID})`];
  for (const message of file.messages) {
    lines.push(`[${message.timestamp}] ${displayNameOf(message.source)}: ${message.content}`);
  }
  return lines;
}

export function registerHistoryCommands(program: Command, env: NodeJS.ProcessEnv): void {
  const history = program.command('history').description('Saved group chat transcripts');

  history
    .command('list')
    .description('List saved group chats, most recent first')
    .option('--json', 'Print as JSON', false)
    .action(async (options: { json: boolean }) => {
      const store = await openStore(env);
      const files = await store.listAll();

      if (options.json) {
        console.log(JSON.stringify(files.map(f => ({ id: f.chatID, title: f.title, ...resolveHistoryMeta(f) })), null, 2));
        return;
      }
      if (files.length === 0) {
        console.log('No saved group chats.');
        return;
      }
      for (const file of files) {
        console.log(formatHistorySummary(file));
      }
    });

  history
    .command('show <id>')
    .description('Print a transcript')
    .action(async (id: string) => {
      const store = await openStore(env);
      const file = await store.load(id);
      if (!file) {
        throw new ConversationNotFoundError(id);
      }
      for (const line of formatTranscript(file)) {
        console.log(line);
      }
    });

  history
    .command('delete <id>')
    .description('Delete a transcript and its debug log')
    .action(async (id: string) => {
      const store = await openStore(env);
      if (!(await store.load(id))) {
        throw new ConversationNotFoundError(id);
      }
      await store.delete(id);
      console.log(`Deleted ${id}`);
    });

  history
    .command('clear')
    .description('Delete every saved group chat')
    .action(async () => {
      const store = await openStore(env);
      const files = await store.listAll();
      for (const file of files) {
        await store.delete(file.chatID);
      }
      console.log(`Deleted ${files.length} group chat(s)`);
    });
}
