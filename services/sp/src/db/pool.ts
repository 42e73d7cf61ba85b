import { Pool } from "pg";
import type { Logger } from "pino";

export function createPool(databaseUrl: string, logger?: Logger): Pool {
  const pool = new Pool({ connectionString: databaseUrl });
  // An idle client losing its connection emits on the pool; unhandled, that ends the process.
  pool.on("error", (err) => {
    logger?.error({ err }, "db_idle_client_error");
  });
  return pool;
}
