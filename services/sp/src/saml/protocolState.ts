import type { Pool } from "pg";
import { withTransaction, type Queryable } from "../db/tx";

/**
 * Server-side store for in-flight SAML handshake state, keyed by the protocol
 * message id. Owned by the protocol client; flows only acquire and release it.
 */
export interface ProtocolStateStore {
  get(key: string): Promise<string | null>;
  set(key: string, value: string): Promise<void>;
  delete(key: string): Promise<string | null>;
}

type ProtocolStateRow = { value: string; created_at: Date };

export class PgProtocolStateStore implements ProtocolStateStore {
  private released = false;

  constructor(
    private readonly db: Queryable,
    private readonly ttlMs: number
  ) {}

  private assertOpen(): void {
    if (this.released) throw new Error("protocol state store used after release");
  }

  release(): void {
    this.released = true;
  }

  async get(key: string): Promise<string | null> {
    this.assertOpen();
    const res = await this.db.query<ProtocolStateRow>(
      "SELECT value, created_at FROM saml_protocol_state WHERE id = $1 LIMIT 1",
      [key]
    );
    const row = res.rows[0];
    if (!row) return null;

    const ageMs = Date.now() - new Date(row.created_at).getTime();
    if (!Number.isFinite(ageMs) || ageMs > this.ttlMs) {
      await this.db.query("DELETE FROM saml_protocol_state WHERE id = $1", [key]);
      return null;
    }
    return String(row.value);
  }

  async set(key: string, value: string): Promise<void> {
    this.assertOpen();
    await this.db.query(
      `
        INSERT INTO saml_protocol_state (id, value)
        VALUES ($1, $2)
        ON CONFLICT (id)
        DO UPDATE SET value = EXCLUDED.value, created_at = now()
      `,
      [key, value]
    );
  }

  async delete(key: string): Promise<string | null> {
    this.assertOpen();
    const res = await this.db.query<{ value: string }>(
      "DELETE FROM saml_protocol_state WHERE id = $1 RETURNING value",
      [key]
    );
    const row = res.rows[0];
    return row ? String(row.value) : null;
  }
}

/**
 * Scoped acquisition of the protocol state store.
 *
 * Everything `fn` writes is committed before this resolves, so callers must
 * only emit their HTTP response afterwards. A throw rolls the scope back. The
 * store cannot be used once the scope has ended.
 */
export async function withProtocolStateStore<T>(
  pool: Pool,
  options: { ttlMs: number },
  fn: (store: ProtocolStateStore) => Promise<T>
): Promise<T> {
  return withTransaction(pool, async (client) => {
    const store = new PgProtocolStateStore(client, options.ttlMs);
    try {
      return await fn(store);
    } finally {
      store.release();
    }
  });
}

export async function cleanupProtocolState(db: Queryable, ttlMs: number): Promise<number> {
  const cutoff = new Date(Date.now() - ttlMs);
  const res = await db.query("DELETE FROM saml_protocol_state WHERE created_at < $1", [cutoff]);
  return typeof res.rowCount === "number" ? res.rowCount : 0;
}
