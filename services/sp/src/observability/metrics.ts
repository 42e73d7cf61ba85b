import { Counter, Histogram, Registry } from "prom-client";
import type { FastifyInstance, FastifyRequest } from "fastify";

export type ServiceMetrics = {
  registry: Registry;
  httpRequestsTotal: Counter<"method" | "route" | "status">;
  httpRequestDurationSeconds: Histogram<"method" | "route" | "status">;
  dbQueriesTotal: Counter<"operation" | "status">;
  dbQueryDurationSeconds: Histogram<"operation" | "status">;
  authFailuresTotal: Counter<"reason">;
  rateLimitedTotal: Counter<"route" | "reason">;
  samlLoginsTotal: Counter<"idp">;
  samlLogoutsTotal: Counter<"direction" | "outcome">;
};

const requestStarts = new WeakMap<FastifyRequest, bigint>();
const instrumented = new WeakSet<object>();

function routeLabel(request: FastifyRequest): string {
  const route = request.routeOptions.url;
  if (typeof route === "string" && route.length > 0) return route;
  return "unknown";
}

function extractDbOperation(args: unknown[]): string {
  const first = args[0];
  let text: string | null = null;

  if (typeof first === "string") {
    text = first;
  } else if (first && typeof first === "object" && "text" in first && typeof first.text === "string") {
    text = first.text;
  }

  if (!text) return "unknown";
  const match = text.trim().match(/^([a-zA-Z]+)/);
  return match?.[1] ? match[1].toUpperCase() : "unknown";
}

export function createMetrics(): ServiceMetrics {
  const registry = new Registry();

  const httpRequestsTotal = new Counter({
    name: "http_requests_total",
    help: "HTTP requests processed by the service",
    labelNames: ["method", "route", "status"],
    registers: [registry]
  });

  const httpRequestDurationSeconds = new Histogram({
    name: "http_request_duration_seconds",
    help: "HTTP request latency (seconds)",
    labelNames: ["method", "route", "status"],
    buckets: [0.005, 0.01, 0.025, 0.05, 0.1, 0.25, 0.5, 1, 2.5, 5, 10],
    registers: [registry]
  });

  const dbQueriesTotal = new Counter({
    name: "db_queries_total",
    help: "Database queries executed by the service",
    labelNames: ["operation", "status"],
    registers: [registry]
  });

  const dbQueryDurationSeconds = new Histogram({
    name: "db_query_duration_seconds",
    help: "Database query latency (seconds)",
    labelNames: ["operation", "status"],
    buckets: [0.001, 0.0025, 0.005, 0.01, 0.025, 0.05, 0.1, 0.25, 0.5, 1, 2.5],
    registers: [registry]
  });

  const authFailuresTotal = new Counter({
    name: "auth_failures_total",
    help: "Authentication failures",
    labelNames: ["reason"],
    registers: [registry]
  });

  const rateLimitedTotal = new Counter({
    name: "rate_limited_total",
    help: "Requests rejected by rate limiting",
    labelNames: ["route", "reason"],
    registers: [registry]
  });

  const samlLoginsTotal = new Counter({
    name: "saml_logins_total",
    help: "Successful SAML logins",
    labelNames: ["idp"],
    registers: [registry]
  });

  const samlLogoutsTotal = new Counter({
    name: "saml_logouts_total",
    help: "SAML single logout exchanges",
    labelNames: ["direction", "outcome"],
    registers: [registry]
  });

  return {
    registry,
    httpRequestsTotal,
    httpRequestDurationSeconds,
    dbQueriesTotal,
    dbQueryDurationSeconds,
    authFailuresTotal,
    rateLimitedTotal,
    samlLoginsTotal,
    samlLogoutsTotal
  };
}

export function registerMetrics(app: FastifyInstance, metrics: ServiceMetrics): void {
  app.get("/metrics", async (_request, reply) => {
    reply.header("content-type", metrics.registry.contentType);
    return metrics.registry.metrics();
  });

  app.addHook("onRequest", (request, _reply, done) => {
    requestStarts.set(request, process.hrtime.bigint());
    done();
  });

  app.addHook("onResponse", (request, reply, done) => {
    const start = requestStarts.get(request);
    if (!start) return done();

    const durationSeconds = Number(process.hrtime.bigint() - start) / 1e9;
    const labels = {
      method: request.method,
      route: routeLabel(request),
      status: String(reply.statusCode)
    };

    metrics.httpRequestsTotal.inc(labels);
    metrics.httpRequestDurationSeconds.observe(labels, durationSeconds);
    done();
  });
}

function patchQueryable(queryable: object, metrics: ServiceMetrics): void {
  if (instrumented.has(queryable)) return;
  instrumented.add(queryable);

  const originalQuery: unknown = Reflect.get(queryable, "query");
  if (typeof originalQuery !== "function") return;

  Reflect.set(queryable, "query", async (...args: unknown[]) => {
    const operation = extractDbOperation(args);
    const start = process.hrtime.bigint();
    const observe = (status: "ok" | "error") => {
      const durationSeconds = Number(process.hrtime.bigint() - start) / 1e9;
      metrics.dbQueriesTotal.inc({ operation, status });
      metrics.dbQueryDurationSeconds.observe({ operation, status }, durationSeconds);
    };

    try {
      const result: unknown = await Reflect.apply(originalQuery, queryable, args);
      observe("ok");
      return result;
    } catch (err) {
      observe("error");
      throw err;
    }
  });
}

/**
 * Counts and times every query issued through `db` and through clients it
 * hands out from `connect()`.
 */
export function instrumentDb<T extends object>(db: T, metrics: ServiceMetrics): T {
  if (instrumented.has(db)) return db;
  patchQueryable(db, metrics);

  const originalConnect: unknown = Reflect.get(db, "connect");
  if (typeof originalConnect === "function") {
    Reflect.set(db, "connect", async (...args: unknown[]) => {
      const client: unknown = await Reflect.apply(originalConnect, db, args);
      if (client && typeof client === "object") patchQueryable(client, metrics);
      return client;
    });
  }

  return db;
}
