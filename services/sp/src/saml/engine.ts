import type { IdentityRecord } from "./identityRecords";
import type { ProtocolStateStore } from "./protocolState";
import type { IdentityProviderConfig, SpConfig } from "./spConfig";

/** Subject of a verified assertion, as needed later to log it out. */
export interface SamlSubject {
  nameId: string;
  nameIdFormat: string;
  nameQualifier?: string;
  spNameQualifier?: string;
  sessionIndex?: string;
}

export interface VerifiedAssertion {
  idpId: string;
  issuer: string;
  /** Id of the AuthnRequest this response answers; null when unsolicited. */
  inResponseTo: string | null;
  subject: SamlSubject;
  attributes: Record<string, unknown>;
}

/** A message received on the HTTP-Redirect binding. */
export interface RedirectMessage {
  params: Record<string, string>;
  /** Raw query string exactly as received, needed to check the detached signature. */
  originalQuery: string;
}

export interface RedirectRequest {
  requestId: string;
  location: string;
}

export type LogoutResponseResult =
  | { status: "success"; inResponseTo: string }
  | { status: "failure"; reason: string };

/**
 * Outcome of an IdP-initiated LogoutRequest.
 *
 * `partial` means the request verified and a LogoutResponse was produced, but
 * it could not be honoured for this session (no identity, or a different
 * subject). The browser is still sent back to the IdP.
 */
export type LogoutRequestResult =
  | { outcome: "success"; location: string }
  | { outcome: "partial"; location: string; reason: string }
  | { outcome: "rejected"; reason: string };

export interface MetadataOptions {
  now: Date;
  /** `ID` of the emitted `EntitiesDescriptor`; omitted when empty. */
  metadataId: string;
  /** `Name` of the emitted `EntitiesDescriptor`; omitted when empty. */
  name: string;
  sign: boolean;
}

/**
 * Capabilities the SP needs from a SAML protocol library. Flow logic only
 * talks to this interface, so the library behind it can be swapped.
 */
export interface SamlEngine {
  buildAuthnRequest(input: { idp: IdentityProviderConfig; relayState: string }): Promise<RedirectRequest>;
  verifyResponse(input: {
    samlResponse: string;
    relayState: string;
    outstanding: ReadonlySet<string>;
  }): Promise<VerifiedAssertion>;
  buildLogoutRequest(input: {
    idp: IdentityProviderConfig;
    identity: IdentityRecord;
    relayState: string;
    state: ProtocolStateStore;
  }): Promise<RedirectRequest>;
  verifyLogoutResponse(input: {
    idp: IdentityProviderConfig;
    message: RedirectMessage;
    state: ProtocolStateStore;
  }): Promise<LogoutResponseResult>;
  processLogoutRequest(input: {
    idp: IdentityProviderConfig;
    message: RedirectMessage;
    identity: IdentityRecord | null;
  }): Promise<LogoutRequestResult>;
  /** Issuer of a redirect-binding message, without verifying it. */
  peekIssuer(message: RedirectMessage): string | null;
  buildMetadata(options: MetadataOptions): string;
}

export type SamlEngineFactory = (config: SpConfig) => SamlEngine;
