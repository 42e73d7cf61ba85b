import crypto from "node:crypto";
import fs from "node:fs";
import path from "node:path";
import { fileURLToPath } from "node:url";
import zlib from "node:zlib";
import { newDb } from "pg-mem";
import type { Pool } from "pg";
import { SignedXml } from "xml-crypto";
import { buildApp } from "../app";
import type { UserResolver } from "../auth/users";
import type { AppConfig } from "../config";
import { runMigrations } from "../db/migrations";
import { createLogger } from "../observability/logger";
import type {
  LogoutRequestResult,
  LogoutResponseResult,
  MetadataOptions,
  RedirectMessage,
  RedirectRequest,
  SamlEngine,
  SamlEngineFactory,
  VerifiedAssertion
} from "../saml/engine";
import { VerificationFailureError } from "../saml/errors";
import type { IdentityRecord } from "../saml/identityRecords";
import type { ProtocolStateStore } from "../saml/protocolState";
import type { SessionCache } from "../saml/sessionCache";
import { resolveSpConfig, type IdentityProviderConfig } from "../saml/spConfig";

const here = path.dirname(fileURLToPath(import.meta.url));

export function getMigrationsDir(): string {
  // services/sp/src/__tests__ -> services/sp/migrations
  return path.resolve(here, "../../migrations");
}

function readFixture(name: string): string {
  return fs.readFileSync(path.join(here, "fixtures", name), "utf8");
}

export const IDP_PRIVATE_KEY_PEM = readFixture("idp-key.pem");
export const IDP_CERT_PEM = readFixture("idp-cert.pem");
export const SP_PRIVATE_KEY_PEM = readFixture("sp-key.pem");
export const SP_CERT_PEM = readFixture("sp-cert.pem");

export const PUBLIC_BASE_URL = "http://sp.example.test";
export const SP_ENTITY_ID = "http://sp.example.test/saml2/metadata";
export const ACS_URL = "http://sp.example.test/saml2/acs";
export const IDP_ENTITY_ID = "https://idp.example.test/metadata";
export const IDP_SSO_URL = "https://idp.example.test/sso";
export const IDP_SLO_URL = "https://idp.example.test/slo";
export const SESSION_COOKIE = "sp_session";

export const RSA_SHA256 = "http://www.w3.org/2001/04/xmldsig-more#rsa-sha256";
export const STATUS_SUCCESS = "urn:oasis:names:tc:SAML:2.0:status:Success";

export function singleIdpDocument(overrides: Record<string, unknown> = {}): Record<string, unknown> {
  return {
    entityId: SP_ENTITY_ID,
    idps: [
      {
        id: "test-idp",
        entityId: IDP_ENTITY_ID,
        displayName: "Test IdP",
        ssoUrl: IDP_SSO_URL,
        sloUrl: IDP_SLO_URL,
        certPem: IDP_CERT_PEM
      }
    ],
    ...overrides
  };
}

export function multiIdpDocument(): Record<string, unknown> {
  return {
    entityId: SP_ENTITY_ID,
    idps: [
      {
        id: "idp-a",
        entityId: "https://a.idp.example.test/metadata",
        displayName: "Alpha <University>",
        ssoUrl: "https://a.idp.example.test/sso",
        certPem: IDP_CERT_PEM
      },
      {
        id: "idp-b",
        entityId: "https://b.idp.example.test/metadata",
        ssoUrl: "https://b.idp.example.test/sso",
        certPem: IDP_CERT_PEM
      }
    ]
  };
}

export function createTestConfig(
  options: { samlDocument?: Record<string, unknown>; overrides?: Partial<AppConfig> } = {}
): AppConfig {
  return {
    port: 0,
    databaseUrl: "postgres://unused",
    sessionCookieName: SESSION_COOKIE,
    sessionTtlSeconds: 60 * 60,
    cookieSecure: false,
    trustProxy: false,
    publicBaseUrl: PUBLIC_BASE_URL,
    saml: resolveSpConfig(options.samlDocument ?? singleIdpDocument(), PUBLIC_BASE_URL),
    metadata: { id: "sp-metadata", name: "urn:test:federation", sign: false },
    createUnknownUsers: true,
    loginRedirectUrl: "/",
    logoutRedirectUrl: "/logged-out",
    stateCleanupIntervalMs: null,
    ...options.overrides
  };
}

export async function createTestDb(): Promise<Pool> {
  const mem = newDb({ autoCreateForeignKeyIndices: true });
  const pgAdapter = mem.adapters.createPg();
  const db: Pool = new pgAdapter.Pool();
  await runMigrations(db, { migrationsDir: getMigrationsDir() });
  return db;
}

export async function createTestApp(
  options: {
    config?: AppConfig;
    samlEngineFactory?: SamlEngineFactory;
    userResolver?: UserResolver;
  } = {}
): Promise<{ db: Pool; config: AppConfig; app: ReturnType<typeof buildApp> }> {
  const db = await createTestDb();
  const config = options.config ?? createTestConfig();
  const app = buildApp({
    db,
    config,
    logger: createLogger({ level: "silent" }),
    samlEngineFactory: options.samlEngineFactory,
    userResolver: options.userResolver
  });
  await app.ready();
  return { db, config, app };
}

export function extractCookie(setCookieHeader: string | string[] | undefined, cookieName = SESSION_COOKIE): string {
  if (!setCookieHeader) throw new Error("missing set-cookie header");
  const entries = Array.isArray(setCookieHeader) ? setCookieHeader : [setCookieHeader];
  const raw = entries.find((value) => value.startsWith(`${cookieName}=`));
  if (!raw) throw new Error(`missing set-cookie for ${cookieName}`);
  const [pair] = raw.split(";");
  if (!pair) throw new Error("malformed set-cookie header");
  return pair;
}

/** Session cache over a plain Map, for tracker tests. */
export class MapSessionCache implements SessionCache {
  readonly entries = new Map<string, string>();

  async get(key: string): Promise<string | null> {
    return this.entries.get(key) ?? null;
  }

  async set(key: string, value: string): Promise<void> {
    this.entries.set(key, value);
  }

  async add(key: string, value: string): Promise<boolean> {
    if (this.entries.has(key)) return false;
    this.entries.set(key, value);
    return true;
  }

  async delete(key: string): Promise<boolean> {
    return this.entries.delete(key);
  }

  async list(prefix: string): Promise<Map<string, string>> {
    return new Map([...this.entries].filter(([key]) => key.startsWith(prefix)));
  }
}

export class MapProtocolStateStore implements ProtocolStateStore {
  readonly entries = new Map<string, string>();

  async get(key: string): Promise<string | null> {
    return this.entries.get(key) ?? null;
  }

  async set(key: string, value: string): Promise<void> {
    this.entries.set(key, value);
  }

  async delete(key: string): Promise<string | null> {
    const value = this.entries.get(key) ?? null;
    this.entries.delete(key);
    return value;
  }
}

export function assertionFor(
  inResponseTo: string | null,
  overrides: Partial<Omit<VerifiedAssertion, "inResponseTo">> = {}
): VerifiedAssertion {
  return {
    idpId: "test-idp",
    issuer: IDP_ENTITY_ID,
    inResponseTo,
    subject: {
      nameId: "alice@example.test",
      nameIdFormat: "urn:oasis:names:tc:SAML:1.1:nameid-format:emailAddress",
      sessionIndex: "_idp-session-1"
    },
    attributes: { email: "alice@example.test" },
    ...overrides
  };
}

/**
 * Scriptable engine for flow tests. Request ids are `_req-1`, `_req-2`, ...
 * and LogoutRequest ids `_logout-1`, ...; posted responses are looked up by
 * their exact `SAMLResponse` text in `responses`. A LogoutResponse is the
 * query `SAMLResponse=ok:<id>` (or `fail:<id>`).
 */
export class FakeSamlEngine implements SamlEngine {
  readonly responses = new Map<string, VerifiedAssertion>();
  readonly authnRequests: Array<{ idpId: string; relayState: string; requestId: string }> = [];
  readonly logoutRequests: Array<{ idpId: string; identity: IdentityRecord; requestId: string }> = [];
  readonly processedLogoutRequests: Array<{ idpId: string; identity: IdentityRecord | null }> = [];
  authnLocation: ((idp: IdentityProviderConfig, requestId: string) => string) | null = null;
  logoutRequestResult: LogoutRequestResult | null = null;
  private requestCounter = 0;
  private logoutCounter = 0;

  async buildAuthnRequest(input: { idp: IdentityProviderConfig; relayState: string }): Promise<RedirectRequest> {
    this.requestCounter += 1;
    const requestId = `_req-${this.requestCounter}`;
    this.authnRequests.push({ idpId: input.idp.id, relayState: input.relayState, requestId });
    const location = this.authnLocation
      ? this.authnLocation(input.idp, requestId)
      : `${input.idp.ssoUrl}?SAMLRequest=${encodeURIComponent(requestId)}`;
    return { requestId, location };
  }

  async verifyResponse(input: {
    samlResponse: string;
    relayState: string;
    outstanding: ReadonlySet<string>;
  }): Promise<VerifiedAssertion> {
    const assertion = this.responses.get(input.samlResponse);
    if (!assertion) throw new VerificationFailureError("unparseable response");
    if (assertion.inResponseTo !== null && !input.outstanding.has(assertion.inResponseTo)) {
      throw new VerificationFailureError("InResponseTo is not valid");
    }
    return assertion;
  }

  async buildLogoutRequest(input: {
    idp: IdentityProviderConfig;
    identity: IdentityRecord;
    relayState: string;
    state: ProtocolStateStore;
  }): Promise<RedirectRequest> {
    this.logoutCounter += 1;
    const requestId = `_logout-${this.logoutCounter}`;
    await input.state.set(requestId, "pending");
    this.logoutRequests.push({ idpId: input.idp.id, identity: input.identity, requestId });
    return { requestId, location: `${input.idp.sloUrl ?? input.idp.ssoUrl}?SAMLRequest=${requestId}` };
  }

  async verifyLogoutResponse(input: {
    idp: IdentityProviderConfig;
    message: RedirectMessage;
    state: ProtocolStateStore;
  }): Promise<LogoutResponseResult> {
    const [status, requestId] = (input.message.params.SAMLResponse ?? "").split(":");
    if (!requestId || (await input.state.get(requestId)) === null) {
      return { status: "failure", reason: "unknown LogoutRequest" };
    }
    if (status !== "ok") return { status: "failure", reason: "IdP reported failure" };
    await input.state.delete(requestId);
    return { status: "success", inResponseTo: requestId };
  }

  async processLogoutRequest(input: {
    idp: IdentityProviderConfig;
    message: RedirectMessage;
    identity: IdentityRecord | null;
  }): Promise<LogoutRequestResult> {
    this.processedLogoutRequests.push({ idpId: input.idp.id, identity: input.identity });
    return this.logoutRequestResult ?? { outcome: "rejected", reason: "no result scripted" };
  }

  peekIssuer(): string | null {
    return null;
  }

  buildMetadata(options: MetadataOptions): string {
    return `<EntitiesDescriptor ID="${options.metadataId}"/>`;
  }
}

export function deflateBase64(xml: string): string {
  return zlib.deflateRawSync(Buffer.from(xml, "utf8")).toString("base64");
}

export function inflateBase64(value: string): string {
  return zlib.inflateRawSync(Buffer.from(value, "base64")).toString("utf8");
}

/**
 * Redirect-binding query for `message` (`SAMLRequest` or `SAMLResponse`),
 * signed with the IdP key over `<message>[&RelayState]&SigAlg`.
 */
export function signedRedirectQuery(
  kind: "SAMLRequest" | "SAMLResponse",
  xml: string,
  options: { relayState?: string; privateKeyPem?: string } = {}
): string {
  const parts = [`${kind}=${encodeURIComponent(deflateBase64(xml))}`];
  if (options.relayState !== undefined) parts.push(`RelayState=${encodeURIComponent(options.relayState)}`);
  parts.push(`SigAlg=${encodeURIComponent(RSA_SHA256)}`);
  const signed = parts.join("&");

  const signature = crypto
    .createSign("RSA-SHA256")
    .update(signed)
    .sign(options.privateKeyPem ?? IDP_PRIVATE_KEY_PEM, "base64");
  return `${signed}&Signature=${encodeURIComponent(signature)}`;
}

export function buildSignedSamlResponse(options: {
  inResponseTo: string;
  nameId: string;
  sessionIndex?: string;
  assertionId?: string;
  responseId?: string;
  destination?: string;
  issuer?: string;
  audience?: string;
  privateKeyPem?: string;
}): string {
  const now = Date.now();
  const issueInstant = new Date(now).toISOString();
  const notBefore = new Date(now - 60_000).toISOString();
  const notOnOrAfter = new Date(now + 5 * 60_000).toISOString();
  const assertionId = options.assertionId ?? `_assertion-${crypto.randomUUID()}`;
  const responseId = options.responseId ?? `_response-${crypto.randomUUID()}`;
  const destination = options.destination ?? ACS_URL;
  const issuer = options.issuer ?? IDP_ENTITY_ID;

  const xml = `
    <samlp:Response
      xmlns:samlp="urn:oasis:names:tc:SAML:2.0:protocol"
      xmlns:saml="urn:oasis:names:tc:SAML:2.0:assertion"
      ID="${responseId}"
      Version="2.0"
      IssueInstant="${issueInstant}"
      Destination="${destination}"
      InResponseTo="${options.inResponseTo}"
    >
      <saml:Issuer>${issuer}</saml:Issuer>
      <samlp:Status>
        <samlp:StatusCode Value="${STATUS_SUCCESS}" />
      </samlp:Status>
      <saml:Assertion
        ID="${assertionId}"
        Version="2.0"
        IssueInstant="${issueInstant}"
      >
        <saml:Issuer>${issuer}</saml:Issuer>
        <saml:Subject>
          <saml:NameID Format="urn:oasis:names:tc:SAML:1.1:nameid-format:emailAddress">${options.nameId}</saml:NameID>
          <saml:SubjectConfirmation Method="urn:oasis:names:tc:SAML:2.0:cm:bearer">
            <saml:SubjectConfirmationData
              InResponseTo="${options.inResponseTo}"
              Recipient="${destination}"
              NotOnOrAfter="${notOnOrAfter}"
            />
          </saml:SubjectConfirmation>
        </saml:Subject>
        <saml:Conditions NotBefore="${notBefore}" NotOnOrAfter="${notOnOrAfter}">
          <saml:AudienceRestriction>
            <saml:Audience>${options.audience ?? SP_ENTITY_ID}</saml:Audience>
          </saml:AudienceRestriction>
        </saml:Conditions>
        <saml:AuthnStatement AuthnInstant="${issueInstant}" SessionIndex="${options.sessionIndex ?? "_idp-session-1"}">
          <saml:AuthnContext>
            <saml:AuthnContextClassRef>urn:oasis:names:tc:SAML:2.0:ac:classes:PasswordProtectedTransport</saml:AuthnContextClassRef>
          </saml:AuthnContext>
        </saml:AuthnStatement>
        <saml:AttributeStatement>
          <saml:Attribute Name="email">
            <saml:AttributeValue>${options.nameId}</saml:AttributeValue>
          </saml:Attribute>
        </saml:AttributeStatement>
      </saml:Assertion>
    </samlp:Response>
  `.trim();

  const sig = new SignedXml();
  sig.signatureAlgorithm = RSA_SHA256;
  sig.canonicalizationAlgorithm = "http://www.w3.org/2001/10/xml-exc-c14n#";
  sig.privateKey = options.privateKeyPem ?? IDP_PRIVATE_KEY_PEM;

  sig.addReference({
    xpath: `//*[local-name()='Assertion' and @ID='${assertionId}']`,
    transforms: [
      "http://www.w3.org/2000/09/xmldsig#enveloped-signature",
      "http://www.w3.org/2001/10/xml-exc-c14n#"
    ],
    digestAlgorithm: "http://www.w3.org/2001/04/xmlenc#sha256",
    uri: `#${assertionId}`
  });

  sig.computeSignature(xml, {
    location: {
      reference: `//*[local-name()='Assertion' and @ID='${assertionId}']/*[local-name()='Issuer']`,
      action: "after"
    }
  });

  return Buffer.from(sig.getSignedXml(), "utf8").toString("base64");
}

export function buildLogoutResponseXml(options: { inResponseTo: string; status?: string; issuer?: string }): string {
  return `<samlp:LogoutResponse xmlns:samlp="urn:oasis:names:tc:SAML:2.0:protocol" xmlns:saml="urn:oasis:names:tc:SAML:2.0:assertion" ID="_lr-${crypto.randomUUID()}" Version="2.0" IssueInstant="${new Date().toISOString()}" Destination="http://sp.example.test/saml2/ls" InResponseTo="${options.inResponseTo}"><saml:Issuer>${options.issuer ?? IDP_ENTITY_ID}</saml:Issuer><samlp:Status><samlp:StatusCode Value="${options.status ?? STATUS_SUCCESS}"/></samlp:Status></samlp:LogoutResponse>`;
}

export function buildLogoutRequestXml(options: { nameId: string; sessionIndex?: string; issuer?: string }): string {
  const sessionIndex = options.sessionIndex ? `<samlp:SessionIndex>${options.sessionIndex}</samlp:SessionIndex>` : "";
  return `<samlp:LogoutRequest xmlns:samlp="urn:oasis:names:tc:SAML:2.0:protocol" xmlns:saml="urn:oasis:names:tc:SAML:2.0:assertion" ID="_idp-lr-${crypto.randomUUID()}" Version="2.0" IssueInstant="${new Date().toISOString()}" Destination="http://sp.example.test/saml2/ls"><saml:Issuer>${options.issuer ?? IDP_ENTITY_ID}</saml:Issuer><saml:NameID Format="urn:oasis:names:tc:SAML:1.1:nameid-format:emailAddress">${options.nameId}</saml:NameID>${sessionIndex}</samlp:LogoutRequest>`;
}

export function formBody(fields: Record<string, string>): string {
  return new URLSearchParams(fields).toString();
}
