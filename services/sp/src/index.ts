import crypto from "node:crypto";
import path from "node:path";
import { cleanupExpiredSessions } from "./auth/sessions";
import { loadConfig } from "./config";
import { createPool } from "./db/pool";
import { runMigrations } from "./db/migrations";
import { createLogger } from "./observability/logger";
import { runWithRequestId } from "./observability/request-id";
import { cleanupProtocolState } from "./saml/protocolState";

const config = loadConfig();
const logger = createLogger();
const pool = createPool(config.databaseUrl, logger);

// Resolve relative to the current working directory so this works in:
// - local dev (cwd = services/sp)
// - Docker image (cwd = /app)
const migrationsDir = path.resolve(process.cwd(), "migrations");

async function main(): Promise<void> {
  // docker-compose `depends_on` does not wait for Postgres readiness. Retry migrations
  // a few times so `docker-compose up` reliably brings the stack up.
  for (let attempt = 1; attempt <= 30; attempt++) {
    try {
      const applied = await runMigrations(pool, { migrationsDir });
      logger.info({ applied }, "migrations_applied");
      break;
    } catch (err) {
      if (attempt === 30) throw err;
      logger.warn({ attempt }, "database not ready; retrying");
      await new Promise((resolve) => setTimeout(resolve, 1000));
    }
  }

  const { buildApp } = await import("./app");
  const app = buildApp({ db: pool, config, logger });

  if (config.stateCleanupIntervalMs != null) {
    const sweep = () =>
      runWithRequestId(`sweep-${crypto.randomUUID()}`, async () => {
        const states = await cleanupProtocolState(pool, config.saml.requestTtlMs);
        const sessions = await cleanupExpiredSessions(pool);
        if (states > 0 || sessions > 0) {
          app.log.debug({ states, sessions }, "saml_state_cleanup");
        }
      });

    void sweep().catch((err) => {
      app.log.warn({ err }, "saml_state_cleanup_failed");
    });

    const timer = setInterval(() => {
      void sweep().catch((err) => {
        app.log.warn({ err }, "saml_state_cleanup_failed");
      });
    }, config.stateCleanupIntervalMs);

    app.addHook("onClose", async () => {
      clearInterval(timer);
    });
  }

  app.addHook("onClose", async () => {
    await pool.end();
  });

  await app.listen({ port: config.port, host: "0.0.0.0" });
}

main().catch((err) => {
  logger.error({ err }, "startup_failed");
  process.exitCode = 1;
});
