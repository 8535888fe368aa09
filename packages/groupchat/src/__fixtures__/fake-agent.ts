/**
 * In-process stand-ins for terminal agents.
 *
 * FakeAgentAdapter keeps an output buffer; markers are offsets into it.
 * Scripted replies are written to the buffer when a payload is injected.
 */

import type { AgentAdapter, OutputMarker, ParticipantDirectory, ParticipantIdentity } from '../types.js';

export class FakeAgentAdapter implements AgentAdapter {
  idle = true;
  acceptInput = true;
  /** Write the injected payload into the output, like a TUI echoing its input */
  echoInput = false;
  output = '';
  readonly injected: string[] = [];
  private replies: string[] = [];

  /** Queue replies, consumed one per successful injection. */
  script(...replies: string[]): this {
    this.replies.push(...replies);
    return this;
  }

  write(text: string): void {
    this.output += text;
  }

  isIdle(): boolean {
    return this.idle;
  }

  async inject(text: string): Promise<boolean> {
    if (!this.acceptInput) return false;
    this.injected.push(text);
    if (this.echoInput) {
      this.output += `> ${text}\n`;
    }
    const reply = this.replies.shift();
    if (reply !== undefined) {
      this.output += reply;
    }
    return true;
  }

  currentMarker(): OutputMarker {
    return this.output.length;
  }

  async readOutputSince(marker: OutputMarker): Promise<string> {
    return this.output.slice(Number(marker));
  }
}

export class FakeDirectory implements ParticipantDirectory {
  private participants: Map<string, ParticipantIdentity> = new Map();
  private adapters: Map<string, FakeAgentAdapter> = new Map();

  add(identity: ParticipantIdentity, adapter: FakeAgentAdapter = new FakeAgentAdapter()): FakeAgentAdapter {
    this.participants.set(identity.id, identity);
    this.adapters.set(identity.id, adapter);
    return adapter;
  }

  /** Simulate the terminal going away while the participant stays known. */
  detach(participantId: string): FakeAgentAdapter | undefined {
    const adapter = this.adapters.get(participantId);
    this.adapters.delete(participantId);
    return adapter;
  }

  attach(participantId: string, adapter: FakeAgentAdapter): void {
    this.adapters.set(participantId, adapter);
  }

  forget(participantId: string): void {
    this.participants.delete(participantId);
    this.adapters.delete(participantId);
  }

  getParticipant(participantId: string): ParticipantIdentity | undefined {
    return this.participants.get(participantId);
  }

  getAdapter(participantId: string): FakeAgentAdapter | undefined {
    return this.adapters.get(participantId);
  }
}

/** PromptSource with a fixed, easy-to-assert template */
export const testPrompt = {
  passKeyword: '[PASS]',
  render(values: { myName: string; participants: readonly string[]; transcriptPath: string; newMessageCount: number }): string {
    return `[Group Chat] ${values.myName} with ${values.participants.join(', ')}: ${values.newMessageCount} new in ${values.transcriptPath}\nReply or say [PASS].`;
  },
};
