/**
 * Conversation messages.
 *
 * The conversation log keeps at most one `system` message and, when present,
 * it sits at index 0.
 */

export type MessageRole = 'system' | 'user' | 'assistant' | 'tool';

export interface Message {
  role: MessageRole;
  content: string;
}
