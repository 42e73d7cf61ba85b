import path from "node:path";
import { DEFAULT_DATABASE_URL } from "../config";
import { runMigrations } from "../db/migrations";
import { createPool } from "../db/pool";

// Only the database is needed here; the SAML configuration is not loaded.
const pool = createPool(process.env.DATABASE_URL?.trim() || DEFAULT_DATABASE_URL);

const migrationsDir = path.resolve(process.cwd(), "migrations");

runMigrations(pool, { migrationsDir })
  .then(async (applied) => {
    await pool.end();
    // eslint-disable-next-line no-console
    console.log(`migrations applied: ${applied}`);
  })
  .catch(async (err) => {
    // eslint-disable-next-line no-console
    console.error(err);
    await pool.end();
    process.exitCode = 1;
  });
