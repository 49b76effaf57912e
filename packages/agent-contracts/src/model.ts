/**
 * Model backend wire shapes.
 *
 * These are provider-neutral: a backend adapter translates them to and from
 * a specific API. The runner only ever sees these types.
 */

import type { Message } from './messages.js';
import type { ToolCall, ToolDefinition } from './tool-types.js';

export interface JsonSchemaFormat {
  name: string;
  description?: string;
  schema: Record<string, unknown>;
  strict: boolean;
}

export type ResponseFormat =
  | { type: 'text' }
  | { type: 'json_object' }
  | { type: 'json_schema'; jsonSchema: JsonSchemaFormat };

export interface CompletionRequest {
  messages: Message[];
  model: string;
  /** Absent when the active catalog is empty */
  tools?: ToolDefinition[];
  responseFormat?: ResponseFormat;
  /** Forwarded from the agent profile; the runner still dispatches calls one at a time */
  parallelToolCalls?: boolean;
  /** Aborted when the run is cancelled */
  signal?: AbortSignal;
}

export interface CompletionResponse {
  /** `undefined` (or `null` from loose adapters) means the model produced no text */
  content?: string | null;
  toolCalls: ToolCall[];
  finishReason?: string;
}

/**
 * One fragment of a streamed tool call. Fragments sharing an `index` belong
 * to the same call and are concatenated in arrival order.
 */
export interface ToolCallDelta {
  index: number;
  id?: string;
  name?: string;
  arguments?: string;
}

export interface StreamChunk {
  delta?: string;
  toolCallDeltas: ToolCallDelta[];
  /** Set on the last chunk of a response */
  finishReason?: string;
}
