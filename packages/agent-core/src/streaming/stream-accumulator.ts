/**
 * StreamAccumulator: rebuilds one complete response from streamed chunks.
 *
 * Text deltas are forwarded as raw_response_event the moment they arrive.
 * Tool-call fragments are grouped by positional index; id, name and
 * argument fragments concatenate in arrival order. Arguments are parsed
 * only once the stream is finished.
 */

import {
  isJsonObject,
  type CompletionResponse,
  type JsonObject,
  type StreamChunk,
  type ToolCall,
} from '@turnkit/agent-contracts';
import type { EventSink } from '../core/dispatcher.js';

interface PartialToolCall {
  index: number;
  id: string;
  name: string;
  arguments: string;
}

/** Malformed JSON or a non-object value becomes `{}` */
export function parseToolArguments(raw: string): JsonObject {
  if (raw.trim() === '') {
    return {};
  }
  try {
    const value: unknown = JSON.parse(raw);
    return isJsonObject(value) ? value : {};
  } catch {
    return {};
  }
}

export class StreamAccumulator {
  private text = '';
  private readonly partials = new Map<number, PartialToolCall>();
  private finishReason: string | undefined;

  constructor(private readonly emit: EventSink) {}

  get finished(): boolean {
    return this.finishReason !== undefined;
  }

  /** Returns true once a chunk carried a finish reason */
  push(chunk: StreamChunk): boolean {
    if (chunk.delta !== undefined && chunk.delta !== '') {
      this.text += chunk.delta;
      this.emit({ type: 'raw_response_event', data: chunk.delta });
    }

    for (const delta of chunk.toolCallDeltas) {
      let partial = this.partials.get(delta.index);
      if (!partial) {
        partial = { index: delta.index, id: '', name: '', arguments: '' };
        this.partials.set(delta.index, partial);
      }
      partial.id += delta.id ?? '';
      partial.name += delta.name ?? '';
      partial.arguments += delta.arguments ?? '';
    }

    if (chunk.finishReason) {
      this.finishReason = chunk.finishReason;
    }
    return this.finished;
  }

  /** Read chunks until one carries a finish reason, the stream ends or `signal` fires */
  async consume(stream: AsyncIterable<StreamChunk>, signal?: AbortSignal): Promise<CompletionResponse> {
    for await (const chunk of stream) {
      if (this.push(chunk) || signal?.aborted) {
        break;
      }
    }
    return this.result();
  }

  /**
   * Response in the same shape the synchronous path receives.
   * Calls with an empty name are dropped.
   */
  result(): CompletionResponse {
    const toolCalls: ToolCall[] = [...this.partials.values()]
      .sort((a, b) => a.index - b.index)
      .filter((partial) => partial.name !== '')
      .map((partial) => ({
        id: partial.id === '' ? `call_${partial.index}` : partial.id,
        name: partial.name,
        arguments: parseToolArguments(partial.arguments),
      }));

    return {
      content: this.text === '' ? undefined : this.text,
      toolCalls,
      finishReason: this.finishReason,
    };
  }
}
