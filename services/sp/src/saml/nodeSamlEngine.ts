import crypto from "node:crypto";
import zlib from "node:zlib";
import { SAML, ValidateInResponseTo, type CacheProvider, type Profile } from "@node-saml/node-saml";
import type {
  LogoutRequestResult,
  LogoutResponseResult,
  MetadataOptions,
  RedirectMessage,
  RedirectRequest,
  SamlEngine,
  SamlSubject,
  VerifiedAssertion
} from "./engine";
import { ConfigurationError, ProtocolContractViolationError, VerificationFailureError } from "./errors";
import type { IdentityRecord } from "./identityRecords";
import { metadataValidUntil, wrapInEntitiesDescriptor } from "./metadata";
import type { ProtocolStateStore } from "./protocolState";
import { findIdpByEntityId, splitCertBundle, type IdentityProviderConfig, type SpConfig } from "./spConfig";

// Hard cap for decoded SAML messages. Keeps memory bounded before any XML parsing.
const MAX_SAML_MESSAGE_BYTES = 1024 * 1024;
const STATUS_SUCCESS = "urn:oasis:names:tc:SAML:2.0:status:Success";
const DEFAULT_NAME_ID_FORMAT = "urn:oasis:names:tc:SAML:1.1:nameid-format:unspecified";
const CLOCK_SKEW_MS = 2 * 60 * 1000;

function buildSaml(
  config: SpConfig,
  idp: IdentityProviderConfig,
  cacheProvider: CacheProvider,
  options: { signMetadata?: boolean; generateUniqueId?: () => string } = {}
): SAML {
  return new SAML({
    entryPoint: idp.ssoUrl,
    logoutUrl: idp.sloUrl ?? idp.ssoUrl,
    issuer: config.entityId,
    callbackUrl: config.assertionConsumerServiceUrl,
    logoutCallbackUrl: config.singleLogoutServiceUrl,
    // Audience must match the SP issuer for most IdPs.
    audience: config.entityId,
    idpIssuer: idp.entityId,
    idpCert: splitCertBundle(idp.certPem),
    privateKey: config.privateKeyPem,
    signatureAlgorithm: config.signatureAlgorithm,
    identifierFormat: config.nameIdFormat ?? null,
    wantAssertionsSigned: config.wantAssertionsSigned,
    wantAuthnResponseSigned: config.wantResponseSigned,
    acceptedClockSkewMs: CLOCK_SKEW_MS,
    validateInResponseTo: ValidateInResponseTo.always,
    requestIdExpirationPeriodMs: config.requestTtlMs,
    cacheProvider,
    signMetadata: options.signMetadata ?? false,
    ...(options.generateUniqueId ? { generateUniqueId: options.generateUniqueId } : {})
  });
}

/** Records the ids the library saves without persisting anything. */
function capturingCache(saved: string[]): CacheProvider {
  return {
    async saveAsync(key: string, value: string) {
      saved.push(key);
      return { value, createdAt: Date.now() };
    },
    async getAsync() {
      return null;
    },
    async removeAsync() {
      return null;
    }
  };
}

/** Answers InResponseTo lookups from the browser session's outstanding requests. */
function outstandingCache(outstanding: ReadonlySet<string>): CacheProvider {
  return {
    async saveAsync() {
      return null;
    },
    async getAsync(key: string) {
      return outstanding.has(key) ? key : null;
    },
    async removeAsync() {
      // Consumption is the outstanding query tracker's job.
      return null;
    }
  };
}

function stateCache(state: ProtocolStateStore, saved: string[]): CacheProvider {
  return {
    async saveAsync(key: string, value: string) {
      await state.set(key, value);
      saved.push(key);
      return { value, createdAt: Date.now() };
    },
    getAsync: (key: string) => state.get(key),
    async removeAsync(key: string | null) {
      if (!key) return null;
      return state.delete(key);
    }
  };
}

function decodePostedMessage(base64: string): string {
  const trimmed = base64.replace(/ /g, "+").replace(/\s+/g, "");
  const estimatedBytes = Math.floor((trimmed.length * 3) / 4);
  if (!Number.isFinite(estimatedBytes) || estimatedBytes > MAX_SAML_MESSAGE_BYTES) {
    throw new VerificationFailureError("SAMLResponse exceeded maximum size");
  }
  // Buffer.from(..., "base64") silently skips invalid characters; check the alphabet first.
  if (!/^[A-Za-z0-9+/]*={0,2}$/.test(trimmed)) {
    throw new VerificationFailureError("SAMLResponse was not valid base64");
  }

  const xml = Buffer.from(trimmed, "base64").toString("utf8");
  if (xml.trim().length === 0) {
    throw new VerificationFailureError("SAMLResponse decoded to an empty document");
  }
  return xml;
}

function inflateRedirectMessage(base64: string): string {
  const raw = Buffer.from(base64, "base64");
  if (raw.byteLength > MAX_SAML_MESSAGE_BYTES) {
    throw new VerificationFailureError("redirect message exceeded maximum size");
  }
  try {
    return zlib.inflateRawSync(raw, { maxOutputLength: MAX_SAML_MESSAGE_BYTES }).toString("utf8");
  } catch (err) {
    throw new VerificationFailureError("redirect message was not valid DEFLATE data", { cause: err });
  }
}

function preflightResponseXml(xml: string): void {
  if (/<\s*!doctype/i.test(xml) || /<\s*!entity/i.test(xml)) {
    throw new VerificationFailureError("SAMLResponse contains a forbidden DOCTYPE/ENTITY");
  }

  // Signature wrapping defence: a response may carry at most one assertion.
  const assertions = xml.match(/<\s*(?:[A-Za-z0-9_]+:)?Assertion\b/g) ?? [];
  if (assertions.length > 1) {
    throw new VerificationFailureError(`expected at most 1 Assertion (got ${assertions.length})`);
  }
}

export function extractIssuer(xml: string): string | null {
  const match = xml.match(/<\s*(?:[A-Za-z0-9_]+:)?Issuer\b[^>]*>([^<]+)<\s*\/\s*(?:[A-Za-z0-9_]+:)?Issuer\s*>/);
  const value = match?.[1]?.trim();
  return value && value.length > 0 ? value : null;
}

function extractInResponseTo(xml: string, element: "Response" | "LogoutResponse"): string | null {
  const pattern = new RegExp(`<\\s*(?:[A-Za-z0-9_]+:)?${element}\\b[^>]*\\bInResponseTo\\s*=\\s*"([^"]+)"`);
  const match = xml.match(pattern);
  const value = match?.[1]?.trim();
  return value && value.length > 0 ? value : null;
}

function extractStatusCode(xml: string): string | null {
  const match = xml.match(/<\s*(?:[A-Za-z0-9_]+:)?StatusCode\b[^>]*\bValue\s*=\s*"([^"]+)"/);
  return match?.[1]?.trim() ?? null;
}

function optionalString(value: unknown): string | undefined {
  return typeof value === "string" && value.trim().length > 0 ? value : undefined;
}

function subjectFromProfile(profile: Profile): SamlSubject {
  const nameId = optionalString(profile.nameID);
  if (!nameId) throw new VerificationFailureError("SAML assertion has no NameID");
  return {
    nameId,
    nameIdFormat: optionalString(profile.nameIDFormat) ?? DEFAULT_NAME_ID_FORMAT,
    nameQualifier: optionalString(profile.nameQualifier),
    spNameQualifier: optionalString(profile.spNameQualifier),
    sessionIndex: optionalString(profile.sessionIndex)
  };
}

function attributesOf(profile: Profile): Record<string, unknown> {
  const attributes = profile.attributes;
  if (!attributes || typeof attributes !== "object") return {};
  return Object.fromEntries(Object.entries(attributes));
}

function profileFromIdentity(identity: IdentityRecord): Profile {
  return {
    issuer: identity.issuer,
    nameID: identity.nameId,
    nameIDFormat: identity.nameIdFormat,
    nameQualifier: identity.nameQualifier,
    spNameQualifier: identity.spNameQualifier,
    sessionIndex: identity.sessionIndex
  };
}

function errorMessage(err: unknown, fallback: string): string {
  return err instanceof Error && err.message ? err.message : fallback;
}

class NodeSamlEngine implements SamlEngine {
  constructor(private readonly config: SpConfig) {}

  /**
   * Picks the IdP whose entity id issued `issuer`; with a single configured IdP
   * that one is used and the library's issuer check decides.
   */
  private idpForIssuer(issuer: string | null): IdentityProviderConfig | null {
    if (issuer) {
      const match = findIdpByEntityId(this.config, issuer);
      if (match) return match;
    }
    return this.config.idps.length === 1 ? (this.config.idps[0] ?? null) : null;
  }

  async buildAuthnRequest(input: { idp: IdentityProviderConfig; relayState: string }): Promise<RedirectRequest> {
    const saved: string[] = [];
    const saml = buildSaml(this.config, input.idp, capturingCache(saved));

    let location: string;
    try {
      location = await saml.getAuthorizeUrlAsync(input.relayState, undefined, {});
    } catch (err) {
      throw new ConfigurationError(errorMessage(err, "failed to build AuthnRequest"), { cause: err });
    }

    const [requestId, ...extra] = saved;
    if (!requestId || extra.length > 0) {
      throw new ProtocolContractViolationError(`expected 1 AuthnRequest id, library produced ${saved.length}`);
    }
    return { requestId, location };
  }

  async verifyResponse(input: {
    samlResponse: string;
    relayState: string;
    outstanding: ReadonlySet<string>;
  }): Promise<VerifiedAssertion> {
    const xml = decodePostedMessage(input.samlResponse);
    preflightResponseXml(xml);

    const idp = this.idpForIssuer(extractIssuer(xml));
    if (!idp) throw new VerificationFailureError("response issuer is not a configured identity provider");

    const saml = buildSaml(this.config, idp, outstandingCache(input.outstanding));
    let profile: Profile | null;
    try {
      const result = await saml.validatePostResponseAsync({
        SAMLResponse: input.samlResponse,
        RelayState: input.relayState
      });
      profile = result.profile;
    } catch (err) {
      throw new VerificationFailureError(errorMessage(err, "SAML response validation failed"), { cause: err });
    }
    if (!profile) throw new VerificationFailureError("SAML response carried no assertion");

    return {
      idpId: idp.id,
      issuer: optionalString(profile.issuer) ?? idp.entityId,
      inResponseTo: optionalString(profile.inResponseTo) ?? extractInResponseTo(xml, "Response"),
      subject: subjectFromProfile(profile),
      attributes: attributesOf(profile)
    };
  }

  async buildLogoutRequest(input: {
    idp: IdentityProviderConfig;
    identity: IdentityRecord;
    relayState: string;
    state: ProtocolStateStore;
  }): Promise<RedirectRequest> {
    const saved: string[] = [];
    const saml = buildSaml(this.config, input.idp, stateCache(input.state, saved));

    let location: string;
    try {
      location = await saml.getLogoutUrlAsync(profileFromIdentity(input.identity), input.relayState, {});
    } catch (err) {
      throw new ConfigurationError(errorMessage(err, "failed to build LogoutRequest"), { cause: err });
    }

    const [requestId] = saved;
    if (!requestId) throw new ProtocolContractViolationError("library did not register the LogoutRequest id");
    return { requestId, location };
  }

  async verifyLogoutResponse(input: {
    idp: IdentityProviderConfig;
    message: RedirectMessage;
    state: ProtocolStateStore;
  }): Promise<LogoutResponseResult> {
    const encoded = input.message.params.SAMLResponse;
    if (!encoded) return { status: "failure", reason: "missing SAMLResponse" };

    let xml: string;
    try {
      xml = inflateRedirectMessage(encoded);
    } catch (err) {
      return { status: "failure", reason: errorMessage(err, "undecodable LogoutResponse") };
    }

    const inResponseTo = extractInResponseTo(xml, "LogoutResponse");
    if (!inResponseTo) return { status: "failure", reason: "LogoutResponse has no InResponseTo" };
    if ((await input.state.get(inResponseTo)) === null) {
      return { status: "failure", reason: "LogoutResponse does not answer a pending LogoutRequest" };
    }

    const saml = buildSaml(this.config, input.idp, stateCache(input.state, []));
    try {
      const result = await saml.validateRedirectAsync({ ...input.message.params }, input.message.originalQuery);
      if (!result.loggedOut) return { status: "failure", reason: "IdP did not confirm logout" };
    } catch (err) {
      return { status: "failure", reason: errorMessage(err, "LogoutResponse validation failed") };
    }

    const status = extractStatusCode(xml);
    if (status !== STATUS_SUCCESS) return { status: "failure", reason: `LogoutResponse status ${status ?? "missing"}` };

    await input.state.delete(inResponseTo);
    return { status: "success", inResponseTo };
  }

  async processLogoutRequest(input: {
    idp: IdentityProviderConfig;
    message: RedirectMessage;
    identity: IdentityRecord | null;
  }): Promise<LogoutRequestResult> {
    const saved: string[] = [];
    const saml = buildSaml(this.config, input.idp, capturingCache(saved));

    let profile: Profile | null;
    try {
      const result = await saml.validateRedirectAsync({ ...input.message.params }, input.message.originalQuery);
      profile = result.profile;
    } catch (err) {
      return { outcome: "rejected", reason: errorMessage(err, "LogoutRequest validation failed") };
    }
    if (!profile) return { outcome: "rejected", reason: "message was not a LogoutRequest" };

    let reason: string | null = null;
    if (!input.identity) {
      reason = "no SAML identity in the local session";
    } else if (input.identity.idpId !== input.idp.id || input.identity.nameId !== profile.nameID) {
      reason = "LogoutRequest subject does not match the local session";
    }

    let location: string;
    try {
      location = await saml.getLogoutResponseUrlAsync(profile, input.message.params.RelayState ?? "", {}, reason === null);
    } catch (err) {
      return { outcome: "rejected", reason: errorMessage(err, "failed to build LogoutResponse") };
    }

    return reason === null ? { outcome: "success", location } : { outcome: "partial", location, reason };
  }

  peekIssuer(message: RedirectMessage): string | null {
    const encoded = message.params.SAMLRequest ?? message.params.SAMLResponse;
    if (!encoded) return null;
    try {
      return extractIssuer(inflateRedirectMessage(encoded));
    } catch {
      return null;
    }
  }

  buildMetadata(options: MetadataOptions): string {
    const [idp] = this.config.idps;
    if (!idp) throw new ConfigurationError("at least one identity provider must be configured");
    if (options.sign && !this.config.privateKeyPem) {
      throw new ConfigurationError("metadata signing requires privateKeyPem");
    }

    // Metadata must not vary between calls, so its document id is derived from the entity id.
    const documentId = `_${crypto.createHash("sha256").update(this.config.entityId).digest("hex").slice(0, 40)}`;
    const saml = buildSaml(this.config, idp, capturingCache([]), {
      signMetadata: options.sign,
      generateUniqueId: () => documentId
    });

    let entityXml: string;
    try {
      entityXml = saml.generateServiceProviderMetadata(null, this.config.publicCertPem ?? null);
    } catch (err) {
      throw new ConfigurationError(errorMessage(err, "failed to build SP metadata"), { cause: err });
    }

    return wrapInEntitiesDescriptor(entityXml, {
      name: options.name,
      metadataId: options.metadataId,
      validUntil: metadataValidUntil(options.now, this.config.validFor)
    });
  }
}

export function createNodeSamlEngine(config: SpConfig): SamlEngine {
  return new NodeSamlEngine(config);
}
