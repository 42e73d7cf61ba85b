import type { FastifyInstance, FastifyReply, FastifyRequest } from "fastify";
import { z } from "zod";
import {
  authenticateSession,
  clearSessionCookie,
  createBrowserSession,
  lookupSessionByToken,
  readSessionToken,
  revokeSession,
  setSessionCookie,
  type BrowserSession
} from "../auth/sessions";
import { withTransaction } from "../db/tx";
import { TokenBucketRateLimiter } from "../http/rateLimit";
import { safeRedirectTarget } from "../http/redirect";
import { getClientIp, getClientMeta } from "../http/request-meta";
import { SpProtocolClient } from "../saml/client";
import type { RedirectMessage } from "../saml/engine";
import {
  NotAuthenticatedError,
  UnknownRequestError,
  UserResolutionError,
  isSamlFlowError,
  type SamlFlowError
} from "../saml/errors";
import { IdentityRecordTracker } from "../saml/identityRecords";
import { OutstandingQueryTracker } from "../saml/outstandingQueries";
import { withProtocolStateStore, type ProtocolStateStore } from "../saml/protocolState";
import { PgSessionCache } from "../saml/sessionCache";
import { loadSpConfig } from "../saml/spConfig";
import { renderWayfPage } from "../saml/wayf";

export const SAML_ROUTES = {
  login: "/saml2/login",
  acs: "/saml2/acs",
  logout: "/saml2/logout",
  logoutService: "/saml2/ls",
  metadata: "/saml2/metadata"
} as const;

const TEXT = "text/plain; charset=utf-8";
const LOGOUT_ERROR = "Error during logout";

const LoginQuery = z.object({
  next: z.string().optional(),
  idp: z.string().min(1).optional()
});

const AcsBody = z.object({
  SAMLResponse: z.string().min(1),
  RelayState: z.string().optional()
});

const LogoutServiceQuery = z.object({
  SAMLResponse: z.string().optional(),
  SAMLRequest: z.string().optional(),
  RelayState: z.string().optional(),
  SigAlg: z.string().optional(),
  Signature: z.string().optional()
});

/**
 * What arrived at the logout service, decided once from the query string.
 */
export type LogoutServiceMessage =
  | { kind: "sp_initiated_reply"; message: RedirectMessage }
  | { kind: "idp_initiated_request"; message: RedirectMessage };

export function classifyLogoutServiceQuery(
  query: z.infer<typeof LogoutServiceQuery>,
  originalQuery: string
): LogoutServiceMessage | null {
  const params: Record<string, string> = {};
  for (const [key, value] of Object.entries(query)) {
    if (typeof value === "string") params[key] = value;
  }
  const message: RedirectMessage = { params, originalQuery };

  // A reply to our own LogoutRequest wins if both are present.
  if (query.SAMLResponse) return { kind: "sp_initiated_reply", message };
  if (query.SAMLRequest) return { kind: "idp_initiated_request", message };
  return null;
}

function rawQueryString(request: FastifyRequest): string {
  const index = request.url.indexOf("?");
  return index === -1 ? "" : request.url.slice(index + 1);
}

function loginRedirect(next: string): string {
  return `${SAML_ROUTES.login}?${new URLSearchParams({ next }).toString()}`;
}

async function loadBrowserSession(request: FastifyRequest): Promise<void> {
  const token = readSessionToken(request, request.server.config);
  if (!token) return;
  const found = await lookupSessionByToken(request.server.db, token);
  if (!found) return;
  request.browserSession = found.session;
  request.user = found.user ?? undefined;
}

function identitiesFor(request: FastifyRequest, session: BrowserSession | undefined): IdentityRecordTracker | undefined {
  if (!session) return undefined;
  return new IdentityRecordTracker(new PgSessionCache(request.server.db, session.id));
}

function protocolClient(
  request: FastifyRequest,
  bindings: { identities?: IdentityRecordTracker; state?: ProtocolStateStore } = {}
): SpProtocolClient {
  const config = loadSpConfig(request.server.config.saml);
  return new SpProtocolClient({ config, engine: request.server.samlEngineFactory(config), ...bindings });
}

function flowErrorResponse(err: SamlFlowError): { status: number; body: string } {
  switch (err.code) {
    case "unknown_identity_provider":
      return { status: 400, body: "unknown identity provider" };
    case "unknown_request":
    case "verification_failure":
      return { status: 400, body: "SAML response has errors" };
    case "user_resolution_failure":
      return { status: 403, body: "user not valid" };
    case "not_authenticated":
      return { status: 401, body: "not authenticated" };
    case "configuration_error":
    case "duplicate_request_id":
    case "protocol_contract_violation":
      return { status: 500, body: "internal error" };
  }
}

/**
 * Sends the minimal browser-facing answer for a flow error. Anything that is
 * not a flow error is rethrown to Fastify's error handler.
 */
function replyWithFlowError(request: FastifyRequest, reply: FastifyReply, err: unknown, next?: string): FastifyReply {
  if (!isSamlFlowError(err)) throw err;

  if (err instanceof NotAuthenticatedError && next !== undefined) {
    request.log.info({ code: err.code }, "saml_login_required");
    return reply.redirect(loginRedirect(next));
  }

  const { status, body } = flowErrorResponse(err);
  if (status >= 500) {
    request.log.error({ err, code: err.code }, "saml_flow_failed");
  } else {
    request.log.warn({ code: err.code, reason: err.message }, "saml_flow_rejected");
  }
  return reply.code(status).type(TEXT).send(body);
}

export function registerSamlRoutes(app: FastifyInstance): void {
  const samlIpLimiter = new TokenBucketRateLimiter({ capacity: 30, refillMs: 60_000 });

  const rateLimited = async (request: FastifyRequest, reply: FastifyReply) => {
    const limited = samlIpLimiter.take(getClientIp(request) ?? "unknown");
    if (limited.ok) return;
    request.server.metrics.rateLimitedTotal.inc({ route: request.routeOptions.url ?? "unknown", reason: "ip" });
    return reply
      .header("Retry-After", String(Math.max(1, Math.ceil(limited.retryAfterMs / 1000))))
      .code(429)
      .type(TEXT)
      .send("too many requests");
  };

  app.get(SAML_ROUTES.login, { preHandler: [rateLimited, loadBrowserSession] }, async (request, reply) => {
    const parsed = LoginQuery.safeParse(request.query);
    if (!parsed.success) return reply.code(400).type(TEXT).send("invalid request");

    const config = request.server.config;
    const next = safeRedirectTarget(parsed.data.next, config.publicBaseUrl, config.loginRedirectUrl);
    const client = protocolClient(request);

    if (parsed.data.idp === undefined && client.isWayfNeeded()) {
      const html = renderWayfPage({ loginPath: SAML_ROUTES.login, next, idps: client.availableIdps() });
      return reply.type("text/html; charset=utf-8").send(html);
    }

    try {
      const { requestId, location } = await client.authenticate({ idpId: parsed.data.idp, relayState: next });

      let session = request.browserSession;
      if (!session) {
        const created = await createBrowserSession(request.server.db, {
          expiresAt: new Date(Date.now() + config.sessionTtlSeconds * 1000),
          ...getClientMeta(request)
        });
        setSessionCookie(reply, config, created.token);
        session = { id: created.sessionId, userId: null, authenticatedAt: null, expiresAt: created.expiresAt };
      }

      const queries = new OutstandingQueryTracker(new PgSessionCache(request.server.db, session.id));
      await queries.record(requestId, next);

      request.log.info({ requestId, idp: parsed.data.idp ?? null }, "saml_authn_request_sent");
      return reply.redirect(location);
    } catch (err) {
      return replyWithFlowError(request, reply, err);
    }
  });

  // Reached by a cross-site POST from the IdP; there is no CSRF token to check.
  app.post(SAML_ROUTES.acs, { preHandler: [rateLimited, loadBrowserSession] }, async (request, reply) => {
    const parsed = AcsBody.safeParse(request.body);
    if (!parsed.success) {
      request.server.metrics.authFailuresTotal.inc({ reason: "invalid_request" });
      return reply.code(400).type(TEXT).send("SAML response has errors");
    }

    const db = request.server.db;
    const config = request.server.config;
    const session = request.browserSession;
    const cache = session ? new PgSessionCache(db, session.id) : null;
    const queries = cache ? new OutstandingQueryTracker(cache) : null;

    try {
      const outstanding: ReadonlySet<string> = queries ? await queries.outstanding() : new Set();
      const assertion = await protocolClient(request).consumeResponse({
        samlResponse: parsed.data.SAMLResponse,
        relayState: parsed.data.RelayState ?? "",
        outstanding
      });

      const requestId = assertion.inResponseTo;
      let recordedNext: string | null = null;
      if (queries && requestId) {
        recordedNext = await queries.resolve(requestId).catch((err: unknown) => {
          if (err instanceof UnknownRequestError) return null;
          throw err;
        });
        if (!(await queries.forget(requestId))) {
          request.log.warn({ requestId }, "saml_outstanding_query_already_cleared");
        }
      }
      // Verification only succeeds against this session's outstanding set.
      if (!session) throw new NotAuthenticatedError("assertion consumed without a browser session");

      const token = await withTransaction(db, async (tx) => {
        const user = await request.server.userResolver.resolve(tx, {
          idpId: assertion.idpId,
          nameId: assertion.subject.nameId,
          attributes: assertion.attributes
        });
        if (!user) throw new UserResolutionError();

        const authenticated = await authenticateSession(tx, {
          sessionId: session.id,
          userId: user.id,
          expiresAt: new Date(Date.now() + config.sessionTtlSeconds * 1000)
        });
        await protocolClient(request, {
          identities: new IdentityRecordTracker(new PgSessionCache(tx, session.id))
        }).rememberIdentity(assertion);

        request.log.info({ userId: user.id, idp: assertion.idpId }, "saml_login_succeeded");
        return authenticated.token;
      });

      setSessionCookie(reply, config, token);
      request.server.metrics.samlLoginsTotal.inc({ idp: assertion.idpId });
      const relayState = parsed.data.RelayState || recordedNext;
      return reply.redirect(safeRedirectTarget(relayState, config.publicBaseUrl, "/"));
    } catch (err) {
      if (isSamlFlowError(err)) request.server.metrics.authFailuresTotal.inc({ reason: err.code });
      return replyWithFlowError(request, reply, err);
    }
  });

  app.get(SAML_ROUTES.logout, { preHandler: loadBrowserSession }, async (request, reply) => {
    const config = request.server.config;
    try {
      if (!request.user) throw new NotAuthenticatedError();
      const identities = identitiesFor(request, request.browserSession);

      // The scope commits the pending LogoutRequest before the redirect is sent.
      const location = await withProtocolStateStore(
        request.server.db,
        { ttlMs: config.saml.requestTtlMs },
        async (state) => protocolClient(request, { identities, state }).globalLogout({ relayState: config.logoutRedirectUrl })
      );

      request.server.metrics.samlLogoutsTotal.inc({ direction: "sp_initiated", outcome: "requested" });
      return reply.redirect(location);
    } catch (err) {
      return replyWithFlowError(request, reply, err, SAML_ROUTES.logout);
    }
  });

  app.get(SAML_ROUTES.logoutService, { preHandler: loadBrowserSession }, async (request, reply) => {
    const parsed = LogoutServiceQuery.safeParse(request.query);
    if (!parsed.success) return reply.code(400).type(TEXT).send(LOGOUT_ERROR);

    const received = classifyLogoutServiceQuery(parsed.data, rawQueryString(request));
    if (!received) return reply.code(404).type(TEXT).send("not found");

    const db = request.server.db;
    const config = request.server.config;
    const session = request.browserSession;
    const identities = identitiesFor(request, session);

    const endLocalSession = async () => {
      if (identities) await identities.clear();
      if (session) await revokeSession(db, session.id);
      clearSessionCookie(reply, config);
    };

    try {
      switch (received.kind) {
        case "sp_initiated_reply": {
          const result = await withProtocolStateStore(db, { ttlMs: config.saml.requestTtlMs }, async (state) =>
            protocolClient(request, { identities, state }).consumeLogoutResponse(received.message)
          );
          if (result.status === "failure") {
            request.server.metrics.samlLogoutsTotal.inc({ direction: "sp_initiated", outcome: "failure" });
            request.log.warn({ reason: result.reason }, "saml_logout_response_rejected");
            return reply.code(400).type(TEXT).send(LOGOUT_ERROR);
          }

          await endLocalSession();
          request.server.metrics.samlLogoutsTotal.inc({ direction: "sp_initiated", outcome: "success" });
          request.log.info({ inResponseTo: result.inResponseTo }, "saml_logout_completed");
          return reply.redirect(config.logoutRedirectUrl);
        }
        case "idp_initiated_request": {
          const result = await protocolClient(request, { identities }).consumeLogoutRequest(received.message);
          request.server.metrics.samlLogoutsTotal.inc({ direction: "idp_initiated", outcome: result.outcome });
          switch (result.outcome) {
            case "success":
              await endLocalSession();
              request.log.info("saml_idp_logout_completed");
              return reply.redirect(result.location);
            case "partial":
              request.log.warn({ reason: result.reason }, "saml_idp_logout_partial");
              return reply.redirect(result.location);
            case "rejected":
              request.log.warn({ reason: result.reason }, "saml_idp_logout_rejected");
              return reply.code(400).type(TEXT).send(LOGOUT_ERROR);
          }
        }
      }
    } catch (err) {
      if (!isSamlFlowError(err)) throw err;
      request.log.warn({ code: err.code, reason: err.message }, "saml_logout_failed");
      return reply.code(400).type(TEXT).send(LOGOUT_ERROR);
    }
  });

  app.get(SAML_ROUTES.metadata, async (request, reply) => {
    const metadata = request.server.config.metadata;
    try {
      const xml = protocolClient(request).metadata({
        now: new Date(),
        metadataId: metadata.id,
        name: metadata.name,
        sign: metadata.sign
      });
      return reply.type("text/xml; charset=utf8").send(xml);
    } catch (err) {
      return replyWithFlowError(request, reply, err);
    }
  });
}
