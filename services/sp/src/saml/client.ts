import type {
  LogoutRequestResult,
  LogoutResponseResult,
  MetadataOptions,
  RedirectMessage,
  RedirectRequest,
  SamlEngine,
  VerifiedAssertion
} from "./engine";
import {
  ConfigurationError,
  NotAuthenticatedError,
  ProtocolContractViolationError,
  UnknownIdentityProviderError,
  VerificationFailureError,
  isSamlFlowError
} from "./errors";
import type { IdentityRecord, IdentityRecordTracker } from "./identityRecords";
import type { ProtocolStateStore } from "./protocolState";
import {
  availableIdps,
  defaultIdp,
  findIdp,
  findIdpByEntityId,
  isWayfNeeded,
  type IdentityProviderConfig,
  type IdentityProviderSummary,
  type SpConfig
} from "./spConfig";

export interface SpProtocolClientOptions {
  config: SpConfig;
  engine: SamlEngine;
  /** The caller's browser session; absent when it has none yet. */
  identities?: IdentityRecordTracker;
  /** Required by SP-initiated logout only. */
  state?: ProtocolStateStore;
}

function isAbsoluteHttpUrl(value: string): boolean {
  try {
    const url = new URL(value);
    return url.protocol === "https:" || url.protocol === "http:";
  } catch {
    return false;
  }
}

/**
 * One SAML protocol step per call. Bound to a private copy of the SP
 * configuration and to the caller's identity record store.
 */
export class SpProtocolClient {
  private readonly config: SpConfig;
  private readonly engine: SamlEngine;
  private readonly identities: IdentityRecordTracker | undefined;
  private readonly state: ProtocolStateStore | undefined;

  constructor(options: SpProtocolClientOptions) {
    this.config = options.config;
    this.engine = options.engine;
    this.identities = options.identities;
    this.state = options.state;
  }

  private async currentIdentity(): Promise<IdentityRecord | null> {
    return this.identities ? this.identities.get() : null;
  }

  private requireState(): ProtocolStateStore {
    if (!this.state) throw new ConfigurationError("protocol state store is not bound to this client");
    return this.state;
  }

  /**
   * IdP a redirect-binding message belongs to: the one named by its Issuer,
   * then the one the session logged in with, then the sole configured IdP.
   */
  private idpForMessage(message: RedirectMessage, identity: IdentityRecord | null): IdentityProviderConfig | null {
    const issuer = this.engine.peekIssuer(message);
    if (issuer) {
      const byIssuer = findIdpByEntityId(this.config, issuer);
      if (byIssuer) return byIssuer;
    }
    if (identity) {
      const byIdentity = findIdp(this.config, identity.idpId);
      if (byIdentity) return byIdentity;
    }
    return this.config.idps.length === 1 ? (this.config.idps[0] ?? null) : null;
  }

  isWayfNeeded(): boolean {
    return isWayfNeeded(this.config);
  }

  availableIdps(): IdentityProviderSummary[] {
    return availableIdps(this.config);
  }

  async authenticate(input: { idpId?: string; relayState: string }): Promise<RedirectRequest> {
    let idp: IdentityProviderConfig;
    if (input.idpId !== undefined) {
      const found = findIdp(this.config, input.idpId);
      if (!found) throw new UnknownIdentityProviderError(input.idpId);
      idp = found;
    } else {
      idp = defaultIdp(this.config);
    }

    const request = await this.engine.buildAuthnRequest({ idp, relayState: input.relayState });
    if (!request.requestId) throw new ConfigurationError("AuthnRequest has no request id");
    if (!isAbsoluteHttpUrl(request.location)) {
      throw new ConfigurationError("AuthnRequest did not produce a redirect target");
    }
    return request;
  }

  /**
   * Verifies an IdP response against every request still outstanding for the
   * session. Only solicited responses are accepted.
   */
  async consumeResponse(input: {
    samlResponse: string;
    relayState: string;
    outstanding: ReadonlySet<string>;
  }): Promise<VerifiedAssertion> {
    let assertion: VerifiedAssertion;
    try {
      assertion = await this.engine.verifyResponse(input);
    } catch (err) {
      if (isSamlFlowError(err)) throw err;
      throw new VerificationFailureError(err instanceof Error ? err.message : "SAML response validation failed", {
        cause: err
      });
    }

    if (assertion.inResponseTo === null) {
      throw new VerificationFailureError("unsolicited SAML responses are not accepted");
    }
    if (!input.outstanding.has(assertion.inResponseTo)) {
      throw new VerificationFailureError("SAML response answers a request this session did not send");
    }
    return assertion;
  }

  async rememberIdentity(assertion: VerifiedAssertion): Promise<IdentityRecord> {
    if (!this.identities) throw new ConfigurationError("no browser session is bound to this client");
    const record: IdentityRecord = {
      idpId: assertion.idpId,
      issuer: assertion.issuer,
      nameId: assertion.subject.nameId,
      nameIdFormat: assertion.subject.nameIdFormat,
      nameQualifier: assertion.subject.nameQualifier,
      spNameQualifier: assertion.subject.spNameQualifier,
      sessionIndex: assertion.subject.sessionIndex
    };
    await this.identities.set(record);
    return record;
  }

  async forgetIdentity(): Promise<void> {
    await this.identities?.clear();
  }

  /**
   * Builds a LogoutRequest for the session's subject and returns the IdP
   * location to send the browser to. The request id is kept in the protocol
   * state store until the IdP answers.
   */
  async globalLogout(input: { relayState: string }): Promise<string> {
    const state = this.requireState();
    const identity = await this.currentIdentity();
    if (!identity) throw new NotAuthenticatedError("local session has no SAML identity");

    const idp = findIdp(this.config, identity.idpId);
    if (!idp) throw new UnknownIdentityProviderError(identity.idpId);

    const request = await this.engine.buildLogoutRequest({ idp, identity, relayState: input.relayState, state });
    if (!request.location) throw new ProtocolContractViolationError("LogoutRequest produced no Location");
    return request.location;
  }

  async consumeLogoutResponse(message: RedirectMessage): Promise<LogoutResponseResult> {
    const state = this.requireState();
    const identity = await this.currentIdentity();
    const idp = this.idpForMessage(message, identity);
    if (!idp) return { status: "failure", reason: "LogoutResponse issuer is not a configured identity provider" };

    return this.engine.verifyLogoutResponse({ idp, message, state });
  }

  async consumeLogoutRequest(message: RedirectMessage): Promise<LogoutRequestResult> {
    const identity = await this.currentIdentity();
    const idp = this.idpForMessage(message, identity);
    if (!idp) return { outcome: "rejected", reason: "LogoutRequest issuer is not a configured identity provider" };

    return this.engine.processLogoutRequest({ idp, message, identity });
  }

  metadata(options: MetadataOptions): string {
    return this.engine.buildMetadata(options);
  }
}
