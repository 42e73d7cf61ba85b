import cookie from "@fastify/cookie";
import Fastify, { type FastifyBaseLogger, type FastifyInstance } from "fastify";
import type { Pool } from "pg";
import { createPgUserResolver, type UserResolver } from "./auth/users";
import type { AppConfig } from "./config";
import { registerSecurityHeaders } from "./http/securityHeaders";
import { createLogger } from "./observability/logger";
import { createMetrics, instrumentDb, registerMetrics } from "./observability/metrics";
import { genRequestId, registerRequestId } from "./observability/request-id";
import { registerSamlRoutes } from "./routes/saml";
import type { SamlEngineFactory } from "./saml/engine";
import { createNodeSamlEngine } from "./saml/nodeSamlEngine";

export interface BuildAppOptions {
  db: Pool;
  config: AppConfig;
  logger?: FastifyBaseLogger;
  /** Defaults to the `@node-saml/node-saml` engine. */
  samlEngineFactory?: SamlEngineFactory;
  /** Defaults to resolving users by `username = NameID`. */
  userResolver?: UserResolver;
}

export function buildApp(options: BuildAppOptions): FastifyInstance {
  const metrics = createMetrics();
  instrumentDb(options.db, metrics);

  const app = Fastify({
    loggerInstance: (options.logger ?? createLogger()) as FastifyBaseLogger,
    genReqId: genRequestId,
    requestIdLogLabel: "requestId",
    trustProxy: options.config.trustProxy ?? false
  });

  app.decorate("db", options.db);
  app.decorate("config", options.config);
  app.decorate("metrics", metrics);
  app.decorate("samlEngineFactory", options.samlEngineFactory ?? createNodeSamlEngine);
  app.decorate(
    "userResolver",
    options.userResolver ?? createPgUserResolver({ createUnknownUsers: options.config.createUnknownUsers })
  );

  registerRequestId(app);
  registerMetrics(app, metrics);
  registerSecurityHeaders(app);

  app.register(cookie);
  // The IdP POST binding delivers `SAMLResponse` as application/x-www-form-urlencoded.
  app.addContentTypeParser(
    "application/x-www-form-urlencoded",
    { parseAs: "string" },
    function parseFormBody(_req, body, done) {
      const params = new URLSearchParams(String(body));
      const out: Record<string, string | string[]> = Object.create(null);
      for (const [key, value] of params) {
        const existing = out[key];
        if (existing === undefined) {
          out[key] = value;
        } else if (Array.isArray(existing)) {
          existing.push(value);
        } else {
          out[key] = [existing, value];
        }
      }
      done(null, out);
    }
  );

  app.get("/health", async () => ({ status: "ok" }));

  registerSamlRoutes(app);

  return app;
}
