import type { Pool, PoolClient } from "pg";

export type Queryable = Pick<PoolClient, "query">;

/**
 * Runs `fn` inside a transaction on a dedicated pool client.
 *
 * Commits when `fn` resolves, rolls back when it throws; the client is always
 * released back to the pool.
 */
export async function withTransaction<T>(pool: Pool, fn: (client: PoolClient) => Promise<T>): Promise<T> {
  const client = await pool.connect();
  try {
    await client.query("BEGIN");
    const result = await fn(client);
    await client.query("COMMIT");
    return result;
  } catch (err) {
    await client.query("ROLLBACK");
    throw err;
  } finally {
    client.release();
  }
}
