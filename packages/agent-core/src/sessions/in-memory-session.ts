/**
 * Process-local session history, lost on exit.
 */

import { UserError, type JsonValue } from '@turnkit/agent-contracts';
import type { Session } from '@turnkit/agent-sdk';

export function assertLimit(limit: number | undefined): void {
  if (limit !== undefined && (!Number.isInteger(limit) || limit < 0)) {
    throw new UserError(`Session item limit must be a non-negative integer, got ${limit}`);
  }
}

export class InMemorySession implements Session {
  private items: JsonValue[] = [];

  constructor(readonly sessionId: string = 'default') {}

  async getItems(limit?: number): Promise<JsonValue[]> {
    assertLimit(limit);
    const selected = limit === undefined ? this.items : this.items.slice(Math.max(0, this.items.length - limit));
    return structuredClone(selected);
  }

  async addItems(items: JsonValue[]): Promise<void> {
    this.items.push(...structuredClone(items));
  }

  async popItem(): Promise<JsonValue | undefined> {
    return this.items.pop();
  }

  async clear(): Promise<void> {
    this.items = [];
  }
}
