import crypto from "node:crypto";
import type { CookieSerializeOptions } from "@fastify/cookie";
import type { FastifyReply, FastifyRequest } from "fastify";
import type { AppConfig } from "../config";
import type { Queryable } from "../db/tx";
import { clearSessionCache } from "../saml/sessionCache";

/**
 * Browser session. Exists before login so the login flow has somewhere to
 * keep outstanding requests; `userId` is set once the IdP response is accepted.
 */
export interface BrowserSession {
  id: string;
  userId: string | null;
  authenticatedAt: Date | null;
  expiresAt: Date;
}

export interface AuthenticatedUser {
  id: string;
  username: string;
}

export interface SessionLookupResult {
  session: BrowserSession;
  /** Null for anonymous sessions and for sessions whose user was deactivated. */
  user: AuthenticatedUser | null;
}

export interface CreateSessionInput {
  expiresAt: Date;
  ipAddress?: string | null;
  userAgent?: string | null;
}

type SessionRow = {
  session_id: string;
  session_user_id: string | null;
  session_authenticated_at: Date | null;
  session_expires_at: Date;
  user_id: string | null;
  user_username: string | null;
  user_is_active: boolean | null;
};

export function generateSessionToken(): string {
  return crypto.randomBytes(32).toString("hex");
}

export function hashSessionToken(token: string): string {
  return crypto.createHash("sha256").update(token).digest("hex");
}

export async function createBrowserSession(
  db: Queryable,
  input: CreateSessionInput
): Promise<{ sessionId: string; token: string; expiresAt: Date }> {
  const sessionId = crypto.randomUUID();
  const token = generateSessionToken();

  await db.query(
    `
      INSERT INTO sessions (id, token_hash, expires_at, ip_address, user_agent)
      VALUES ($1, $2, $3, $4, $5)
    `,
    [sessionId, hashSessionToken(token), input.expiresAt, input.ipAddress ?? null, input.userAgent ?? null]
  );

  return { sessionId, token, expiresAt: input.expiresAt };
}

export async function lookupSessionByToken(db: Queryable, token: string): Promise<SessionLookupResult | null> {
  const result = await db.query<SessionRow>(
    `
      SELECT
        s.id AS session_id,
        s.user_id AS session_user_id,
        s.authenticated_at AS session_authenticated_at,
        s.expires_at AS session_expires_at,
        u.id AS user_id,
        u.username AS user_username,
        u.is_active AS user_is_active
      FROM sessions s
      LEFT JOIN users u ON u.id = s.user_id
      WHERE s.token_hash = $1
        AND s.revoked_at IS NULL
        AND s.expires_at > now()
      LIMIT 1
    `,
    [hashSessionToken(token)]
  );

  const row = result.rows[0];
  if (!row) return null;

  const user =
    row.user_id && row.user_username && row.user_is_active && row.session_authenticated_at
      ? { id: row.user_id, username: row.user_username }
      : null;

  return {
    session: {
      id: row.session_id,
      userId: row.session_user_id,
      authenticatedAt: row.session_authenticated_at ? new Date(row.session_authenticated_at) : null,
      expiresAt: new Date(row.session_expires_at)
    },
    user
  };
}

/**
 * Logs `userId` into an existing browser session. The cookie token is rotated
 * so a token issued before login cannot ride the authenticated session.
 */
export async function authenticateSession(
  db: Queryable,
  input: { sessionId: string; userId: string; expiresAt: Date }
): Promise<{ token: string; expiresAt: Date }> {
  const token = generateSessionToken();
  const res = await db.query(
    `
      UPDATE sessions
      SET token_hash = $1, user_id = $2, authenticated_at = now(), expires_at = $3
      WHERE id = $4 AND revoked_at IS NULL
    `,
    [hashSessionToken(token), input.userId, input.expiresAt, input.sessionId]
  );
  if (res.rowCount !== 1) throw new Error("session to authenticate no longer exists");
  return { token, expiresAt: input.expiresAt };
}

/**
 * Ends the local session and drops everything cached for it.
 */
export async function revokeSession(db: Queryable, sessionId: string): Promise<void> {
  await clearSessionCache(db, sessionId);
  await db.query("UPDATE sessions SET revoked_at = now() WHERE id = $1", [sessionId]);
}

/**
 * Deletes expired and revoked sessions with their cached records, at most
 * `batchSize` per call.
 */
export async function cleanupExpiredSessions(db: Queryable, batchSize = 500): Promise<number> {
  const limit = Math.max(1, Math.floor(batchSize));
  const res = await db.query<{ id: string }>(
    `SELECT id FROM sessions WHERE expires_at < now() OR revoked_at IS NOT NULL LIMIT ${limit}`
  );
  for (const row of res.rows) {
    await clearSessionCache(db, row.id);
    await db.query("DELETE FROM sessions WHERE id = $1", [row.id]);
  }
  return res.rows.length;
}

/**
 * The assertion consumer is reached by a cross-site POST from the IdP, so the
 * cookie must be sent on it: `SameSite=None` where browsers allow it (Secure).
 */
export function sessionCookieOptions(config: AppConfig): CookieSerializeOptions {
  return {
    path: "/",
    httpOnly: true,
    sameSite: config.cookieSecure ? "none" : "lax",
    secure: config.cookieSecure,
    maxAge: config.sessionTtlSeconds
  };
}

export function setSessionCookie(reply: FastifyReply, config: AppConfig, token: string): void {
  reply.setCookie(config.sessionCookieName, token, sessionCookieOptions(config));
}

export function clearSessionCookie(reply: FastifyReply, config: AppConfig): void {
  reply.clearCookie(config.sessionCookieName, { path: "/" });
}

export function readSessionToken(request: FastifyRequest, config: AppConfig): string | null {
  const token = request.cookies[config.sessionCookieName];
  return typeof token === "string" && token.length > 0 ? token : null;
}
