import type { Queryable } from "../db/tx";

/**
 * Small key/value records scoped to one browser session.
 */
export interface SessionCache {
  get(key: string): Promise<string | null>;
  set(key: string, value: string): Promise<void>;
  /** Stores `value` only when `key` is absent; returns whether it was stored. */
  add(key: string, value: string): Promise<boolean>;
  /** Returns whether `key` was present. */
  delete(key: string): Promise<boolean>;
  /** All entries whose key starts with `prefix`. */
  list(prefix: string): Promise<Map<string, string>>;
}

type SessionCacheRow = { key: string; value: string };

export class PgSessionCache implements SessionCache {
  constructor(
    private readonly db: Queryable,
    private readonly sessionId: string
  ) {}

  async get(key: string): Promise<string | null> {
    const res = await this.db.query<SessionCacheRow>(
      "SELECT key, value FROM session_cache WHERE session_id = $1 AND key = $2 LIMIT 1",
      [this.sessionId, key]
    );
    const row = res.rows[0];
    return row ? String(row.value) : null;
  }

  async set(key: string, value: string): Promise<void> {
    await this.db.query(
      `
        INSERT INTO session_cache (session_id, key, value)
        VALUES ($1, $2, $3)
        ON CONFLICT (session_id, key)
        DO UPDATE SET value = EXCLUDED.value, updated_at = now()
      `,
      [this.sessionId, key, value]
    );
  }

  async add(key: string, value: string): Promise<boolean> {
    const res = await this.db.query<Pick<SessionCacheRow, "key">>(
      `
        INSERT INTO session_cache (session_id, key, value)
        VALUES ($1, $2, $3)
        ON CONFLICT (session_id, key) DO NOTHING
        RETURNING key
      `,
      [this.sessionId, key, value]
    );
    return res.rows.length === 1;
  }

  async delete(key: string): Promise<boolean> {
    const res = await this.db.query<Pick<SessionCacheRow, "key">>(
      "DELETE FROM session_cache WHERE session_id = $1 AND key = $2 RETURNING key",
      [this.sessionId, key]
    );
    return res.rows.length > 0;
  }

  async list(prefix: string): Promise<Map<string, string>> {
    const res = await this.db.query<SessionCacheRow>("SELECT key, value FROM session_cache WHERE session_id = $1", [
      this.sessionId
    ]);
    const entries = new Map<string, string>();
    for (const row of res.rows) {
      if (row.key.startsWith(prefix)) entries.set(row.key, String(row.value));
    }
    return entries;
  }
}

export async function clearSessionCache(db: Queryable, sessionId: string): Promise<void> {
  await db.query("DELETE FROM session_cache WHERE session_id = $1", [sessionId]);
}
