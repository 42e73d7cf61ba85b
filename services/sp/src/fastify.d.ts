import "fastify";
import type { Pool } from "pg";
import type { AppConfig } from "./config";
import type { AuthenticatedUser, BrowserSession } from "./auth/sessions";
import type { UserResolver } from "./auth/users";
import type { ServiceMetrics } from "./observability/metrics";
import type { SamlEngineFactory } from "./saml/engine";

declare module "fastify" {
  interface FastifyInstance {
    db: Pool;
    config: AppConfig;
    metrics: ServiceMetrics;
    samlEngineFactory: SamlEngineFactory;
    userResolver: UserResolver;
  }

  interface FastifyRequest {
    user?: AuthenticatedUser;
    browserSession?: BrowserSession;
  }
}
