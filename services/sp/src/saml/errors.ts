export type SamlFlowErrorCode =
  | "configuration_error"
  | "unknown_identity_provider"
  | "duplicate_request_id"
  | "unknown_request"
  | "verification_failure"
  | "user_resolution_failure"
  | "not_authenticated"
  | "protocol_contract_violation";

/**
 * Base class for every failure a SAML flow can surface. `code` is stable and
 * safe to log or use as a metrics label; `message` may carry operator detail
 * and is never sent to the browser.
 */
export class SamlFlowError extends Error {
  readonly code: SamlFlowErrorCode;

  constructor(code: SamlFlowErrorCode, message?: string, options?: { cause?: unknown }) {
    super(message ?? code, options);
    this.name = new.target.name;
    this.code = code;
  }
}

export class ConfigurationError extends SamlFlowError {
  constructor(message: string, options?: { cause?: unknown }) {
    super("configuration_error", message, options);
  }
}

export class UnknownIdentityProviderError extends SamlFlowError {
  readonly idpId: string;

  constructor(idpId: string) {
    super("unknown_identity_provider", `unknown identity provider: ${idpId}`);
    this.idpId = idpId;
  }
}

export class DuplicateRequestIdError extends SamlFlowError {
  readonly requestId: string;

  constructor(requestId: string) {
    super("duplicate_request_id", `request id already outstanding: ${requestId}`);
    this.requestId = requestId;
  }
}

export class UnknownRequestError extends SamlFlowError {
  readonly requestId: string;

  constructor(requestId: string) {
    super("unknown_request", `no outstanding request with id ${requestId}`);
    this.requestId = requestId;
  }
}

export class VerificationFailureError extends SamlFlowError {
  constructor(message: string, options?: { cause?: unknown }) {
    super("verification_failure", message, options);
  }
}

export class UserResolutionError extends SamlFlowError {
  constructor(message = "no local user for SAML identity") {
    super("user_resolution_failure", message);
  }
}

export class NotAuthenticatedError extends SamlFlowError {
  constructor(message = "no authenticated SAML session") {
    super("not_authenticated", message);
  }
}

export class ProtocolContractViolationError extends SamlFlowError {
  constructor(message: string) {
    super("protocol_contract_violation", message);
  }
}

export function isSamlFlowError(err: unknown): err is SamlFlowError {
  return err instanceof SamlFlowError;
}
