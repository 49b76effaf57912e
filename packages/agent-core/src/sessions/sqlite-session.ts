/**
 * SqliteSession: history persisted in SQLite via better-sqlite3.
 *
 * One table holds every session; rows are keyed by (session_id, item_index)
 * and item_data is the JSON text of the item.
 */

import Database from 'better-sqlite3';
import {
  SerializationError,
  errorMessage,
  type JsonValue,
} from '@turnkit/agent-contracts';
import type { Session } from '@turnkit/agent-sdk';
import { assertLimit } from './in-memory-session.js';

export const SESSION_SCHEMA = `
CREATE TABLE IF NOT EXISTS sessions (
  session_id TEXT NOT NULL,
  item_index INTEGER NOT NULL,
  item_data TEXT NOT NULL,
  created_at TEXT NOT NULL DEFAULT CURRENT_TIMESTAMP,
  PRIMARY KEY (session_id, item_index)
)`;

export interface SqliteSessionOptions {
  /** Database file; defaults to ':memory:' */
  path?: string;
  /** Share an already open database instead of opening `path` */
  database?: Database.Database;
}

interface ItemRow {
  item_index: number;
  item_data: string;
}

export class SqliteSession implements Session {
  private readonly db: Database.Database;
  private readonly ownsDatabase: boolean;

  constructor(
    readonly sessionId: string,
    options: SqliteSessionOptions = {},
  ) {
    this.ownsDatabase = options.database === undefined;
    this.db = options.database ?? new Database(options.path ?? ':memory:');
    if (this.ownsDatabase && options.path && options.path !== ':memory:') {
      this.db.pragma('journal_mode = WAL');
    }
    this.db.exec(SESSION_SCHEMA);
  }

  async getItems(limit?: number): Promise<JsonValue[]> {
    assertLimit(limit);
    const rows =
      limit === undefined
        ? this.db
            .prepare<[string], ItemRow>(
              'SELECT item_index, item_data FROM sessions WHERE session_id = ? ORDER BY item_index ASC',
            )
            .all(this.sessionId)
        : this.db
            .prepare<[string, number], ItemRow>(
              `SELECT item_index, item_data FROM (
                 SELECT item_index, item_data FROM sessions
                 WHERE session_id = ? ORDER BY item_index DESC LIMIT ?
               ) ORDER BY item_index ASC`,
            )
            .all(this.sessionId, limit);
    return rows.map((row) => this.decode(row));
  }

  async addItems(items: JsonValue[]): Promise<void> {
    const nextIndex = this.db.prepare<[string], { next: number }>(
      'SELECT COALESCE(MAX(item_index), -1) + 1 AS next FROM sessions WHERE session_id = ?',
    );
    const insert = this.db.prepare<[string, number, string]>(
      'INSERT INTO sessions (session_id, item_index, item_data) VALUES (?, ?, ?)',
    );

    const insertAll = this.db.transaction((encoded: string[]) => {
      let index = nextIndex.get(this.sessionId)?.next ?? 0;
      for (const data of encoded) {
        insert.run(this.sessionId, index++, data);
      }
    });
    insertAll(items.map((item) => JSON.stringify(item)));
  }

  async popItem(): Promise<JsonValue | undefined> {
    const select = this.db.prepare<[string], ItemRow>(
      'SELECT item_index, item_data FROM sessions WHERE session_id = ? ORDER BY item_index DESC LIMIT 1',
    );
    const remove = this.db.prepare<[string, number]>(
      'DELETE FROM sessions WHERE session_id = ? AND item_index = ?',
    );

    const pop = this.db.transaction((): ItemRow | undefined => {
      const row = select.get(this.sessionId);
      if (row) {
        remove.run(this.sessionId, row.item_index);
      }
      return row;
    });
    const row = pop();
    return row ? this.decode(row) : undefined;
  }

  async clear(): Promise<void> {
    this.db.prepare<[string]>('DELETE FROM sessions WHERE session_id = ?').run(this.sessionId);
  }

  /** Closes the database unless it was passed in */
  close(): void {
    if (this.ownsDatabase) {
      this.db.close();
    }
  }

  private decode(row: ItemRow): JsonValue {
    try {
      const value: JsonValue = JSON.parse(row.item_data);
      return value;
    } catch (error) {
      throw new SerializationError(
        `Session "${this.sessionId}" item ${row.item_index} is not valid JSON: ${errorMessage(error)}`,
        error,
      );
    }
  }
}
