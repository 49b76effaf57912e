/**
 * ModelBackend: the completion service the runner drives.
 *
 * complete() returns one whole response. stream() resolves once the stream
 * is established and yields chunks until one carries a finishReason.
 * A rejected stream() promise is an establishment failure; an iterator that
 * throws is a mid-stream failure.
 *
 * The runner passes the backend explicitly (Runner constructor or per-run
 * override); there is no process-wide default client.
 */

import type { CompletionRequest, CompletionResponse, StreamChunk } from '@turnkit/agent-contracts';

export interface ModelBackend {
  /** Used in log lines */
  readonly name?: string;

  complete(request: CompletionRequest): Promise<CompletionResponse>;

  stream(request: CompletionRequest): Promise<AsyncIterable<StreamChunk>>;
}
