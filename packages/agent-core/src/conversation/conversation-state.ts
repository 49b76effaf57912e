/**
 * ConversationState: the ordered message log of one run.
 *
 * Invariant: at most one system message, and only at index 0.
 * Created once per run and mutated only by the turn loop.
 */

import type { Message, ToolResult } from '@turnkit/agent-contracts';

export function renderToolMessage(result: ToolResult): string {
  return `Tool '${result.name}' returned: ${JSON.stringify(result.output)}`;
}

export class ConversationState {
  private readonly log: Message[] = [];

  /**
   * Seed order: system message (when instructions are non-empty), session
   * history, then the user input. System messages found in history are
   * dropped to keep the invariant.
   */
  static seed(instructions: string, history: ReadonlyArray<Message>, input: string): ConversationState {
    const state = new ConversationState();
    if (instructions !== '') {
      state.log.push({ role: 'system', content: instructions });
    }
    for (const message of history) {
      if (message.role !== 'system') {
        state.log.push({ ...message });
      }
    }
    state.log.push({ role: 'user', content: input });
    return state;
  }

  get messages(): ReadonlyArray<Message> {
    return this.log;
  }

  get length(): number {
    return this.log.length;
  }

  /** Copy of the log, safe to hand to a backend or hook */
  snapshot(): Message[] {
    return this.log.map((message) => ({ ...message }));
  }

  last(): Message | undefined {
    return this.log[this.log.length - 1];
  }

  appendAssistant(content: string): Message {
    return this.push({ role: 'assistant', content });
  }

  appendTool(result: ToolResult): Message {
    return this.push({ role: 'tool', content: renderToolMessage(result) });
  }

  /**
   * Point the system message at new instructions after a handoff.
   * An existing system message is overwritten (even with empty text);
   * otherwise one is inserted only for non-empty instructions.
   */
  syncSystemMessage(instructions: string): void {
    const first = this.log[0];
    if (first?.role === 'system') {
      this.log[0] = { role: 'system', content: instructions };
    } else if (instructions !== '') {
      this.log.unshift({ role: 'system', content: instructions });
    }
  }

  private push(message: Message): Message {
    this.log.push(message);
    return message;
  }
}
