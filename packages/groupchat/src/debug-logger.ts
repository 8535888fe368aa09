import fs from 'node:fs';
import path from 'node:path';
import { createLogger, errorMessage } from '@parley/utils';

const log = createLogger('groupchat-debug');

export interface DebugLogEntry {
  /** Participant id, or undefined for chat-level events */
  participant?: string;
  category: string;
  decision: string;
  detail?: string;
  /** Captured output, written as a delimited block after the line */
  output?: string;
  meta?: Record<string, string | number | boolean | undefined>;
}

function singleLine(text: string): string {
  return text.replace(/\r/g, '').replace(/\n/g, '\\n');
}

/**
 * Per-chat debug trail, one line per decision:
 *
 *   [GroupChatDebug] ts=... chat=... participant=... category=... decision=... detail=... k=v
 *
 * Writes are serialized; failures are logged and never reach the caller.
 */
export class GroupChatDebugLogger {
  private writeChain: Promise<void> = Promise.resolve();

  constructor(
    readonly chatId: string,
    readonly filePath: string,
    private readonly now: () => Date = () => new Date()
  ) {}

  format(entry: DebugLogEntry, ts: string = this.now().toISOString()): string {
    const participant = entry.participant ?? '-';
    let line = `[GroupChatDebug] ts=${ts} chat=${this.chatId} participant=${participant} category=${entry.category} decision=${entry.decision}`;
    if (entry.detail) {
      line += ` detail=${singleLine(entry.detail)}`;
    }
    const meta = Object.entries(entry.meta ?? {})
      .filter((pair): pair is [string, string | number | boolean] => pair[1] !== undefined)
      .sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0));
    if (meta.length > 0) {
      line += ' ' + meta.map(([k, v]) => `${k}=${singleLine(String(v))}`).join(' ');
    }

    let chunk = line + '\n';
    if (entry.output) {
      const head = `ts=${ts} chat=${this.chatId} participant=${participant} category=${entry.category}`;
      chunk += `[GroupChatDebugOutput] ${head}\n`;
      chunk += entry.output.endsWith('\n') ? entry.output : entry.output + '\n';
      chunk += `[GroupChatDebugOutputEnd] ${head}\n`;
    }
    return chunk;
  }

  log(entry: DebugLogEntry): void {
    const chunk = this.format(entry);
    this.writeChain = this.writeChain
      .then(async () => {
        await fs.promises.mkdir(path.dirname(this.filePath), { recursive: true });
        await fs.promises.appendFile(this.filePath, chunk, 'utf-8');
      })
      .catch(err => {
        log.warn('Failed to write debug log', { path: this.filePath, error: errorMessage(err) });
      });
  }

  /** Resolves once every queued line has been written. */
  flush(): Promise<void> {
    return this.writeChain;
  }
}
