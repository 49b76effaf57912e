/**
 * Session: conversation history store.
 *
 * Items are JSON values; the runner writes `Message` objects and skips
 * anything that does not parse as one when loading. Any method may reject;
 * the runner treats that as fatal for the run.
 */

import type { JsonValue } from '@turnkit/agent-contracts';

export interface Session {
  /**
   * Stored items in chronological order.
   * With `limit`, only the most recent `limit` items (still chronological).
   */
  getItems(limit?: number): Promise<JsonValue[]>;

  addItems(items: JsonValue[]): Promise<void>;

  /** Remove and return the most recent item */
  popItem(): Promise<JsonValue | undefined>;

  clear(): Promise<void>;
}
