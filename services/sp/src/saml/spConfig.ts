import { z } from "zod";
import { ConfigurationError } from "./errors";

const CERT_BLOCK_REGEX = /-----BEGIN CERTIFICATE-----[\s\S]*?-----END CERTIFICATE-----/g;

const IdentityProviderSchema = z.object({
  id: z.string().regex(/^[a-z0-9_-]{1,64}$/, "idp id must match [a-z0-9_-]{1,64}"),
  entityId: z.string().min(1),
  displayName: z.string().min(1).optional(),
  ssoUrl: z.string().url(),
  sloUrl: z.string().url().optional(),
  certPem: z.string().min(1)
});

/**
 * SP protocol configuration document (`SAML_CONFIG_PATH` / `SAML_CONFIG_JSON`).
 *
 * Endpoint URLs may be omitted; {@link resolveSpConfig} derives them from the
 * public base URL.
 */
export const SpConfigDocumentSchema = z
  .object({
    entityId: z.string().min(1),
    assertionConsumerServiceUrl: z.string().url().optional(),
    singleLogoutServiceUrl: z.string().url().optional(),
    idps: z.array(IdentityProviderSchema).min(1),
    nameIdFormat: z.string().min(1).nullable().optional(),
    wantAssertionsSigned: z.boolean().default(true),
    wantResponseSigned: z.boolean().default(false),
    signatureAlgorithm: z.enum(["sha1", "sha256", "sha512"]).default("sha256"),
    privateKeyPem: z.string().min(1).optional(),
    publicCertPem: z.string().min(1).optional(),
    // Metadata validity window, in hours.
    validFor: z.number().int().positive().default(24),
    requestTtlMs: z.number().int().positive().default(10 * 60 * 1000)
  })
  .strict();

export type IdentityProviderConfig = z.infer<typeof IdentityProviderSchema>;

export type SpConfig = Omit<z.infer<typeof SpConfigDocumentSchema>, "assertionConsumerServiceUrl" | "singleLogoutServiceUrl"> & {
  assertionConsumerServiceUrl: string;
  singleLogoutServiceUrl: string;
};

export interface IdentityProviderSummary {
  id: string;
  entityId: string;
  displayName: string;
}

function buildEndpointUrl(baseUrl: string, pathname: string): string {
  const base = new URL(baseUrl);
  base.search = "";
  base.hash = "";
  if (!base.pathname.endsWith("/")) base.pathname = `${base.pathname}/`;
  const relative = pathname.startsWith("/") ? pathname.slice(1) : pathname;
  return new URL(relative, base).toString();
}

export function resolveSpConfig(raw: unknown, publicBaseUrl: string): SpConfig {
  const parsed = SpConfigDocumentSchema.safeParse(raw);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    const where = issue && issue.path.length > 0 ? ` at ${issue.path.join(".")}` : "";
    throw new ConfigurationError(`invalid SAML configuration${where}: ${issue?.message ?? "parse failed"}`);
  }

  const doc = parsed.data;
  const ids = new Set<string>();
  for (const idp of doc.idps) {
    if (ids.has(idp.id)) throw new ConfigurationError(`duplicate idp id: ${idp.id}`);
    ids.add(idp.id);
  }
  if (doc.privateKeyPem && !doc.publicCertPem) {
    throw new ConfigurationError("publicCertPem is required when privateKeyPem is set");
  }

  return {
    ...doc,
    assertionConsumerServiceUrl: doc.assertionConsumerServiceUrl ?? buildEndpointUrl(publicBaseUrl, "/saml2/acs"),
    singleLogoutServiceUrl: doc.singleLogoutServiceUrl ?? buildEndpointUrl(publicBaseUrl, "/saml2/ls")
  };
}

/**
 * Returns a private deep copy of the process-wide SP configuration.
 *
 * Every protocol operation works on its own copy so nothing the SAML library
 * does to its options can leak into another request.
 */
export function loadSpConfig(source: SpConfig): SpConfig {
  return structuredClone(source);
}

export function isWayfNeeded(config: SpConfig): boolean {
  return config.idps.length > 1;
}

export function availableIdps(config: SpConfig): IdentityProviderSummary[] {
  return config.idps.map((idp) => ({
    id: idp.id,
    entityId: idp.entityId,
    displayName: idp.displayName ?? idp.entityId
  }));
}

export function findIdp(config: SpConfig, idpId: string): IdentityProviderConfig | null {
  return config.idps.find((idp) => idp.id === idpId) ?? null;
}

export function findIdpByEntityId(config: SpConfig, entityId: string): IdentityProviderConfig | null {
  return config.idps.find((idp) => idp.entityId === entityId) ?? null;
}

/**
 * Sole configured IdP, used when the caller did not pick one.
 */
export function defaultIdp(config: SpConfig): IdentityProviderConfig {
  const [first, ...rest] = config.idps;
  if (!first || rest.length > 0) {
    throw new ConfigurationError("an identity provider must be selected when several are configured");
  }
  return first;
}

/**
 * Splits a PEM bundle into individual certificates (certificate rollover).
 */
export function splitCertBundle(certPem: string): string | string[] {
  const blocks = [...certPem.matchAll(CERT_BLOCK_REGEX)].map((match) => match[0].trim());
  return blocks.length > 1 ? blocks : certPem;
}
