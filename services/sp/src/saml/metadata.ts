import { DOMImplementation, DOMParser, XMLSerializer } from "@xmldom/xmldom";
import { ProtocolContractViolationError } from "./errors";

export const METADATA_NS = "urn:oasis:names:tc:SAML:2.0:metadata";

const HOUR_MS = 60 * 60 * 1000;

export function metadataValidUntil(now: Date, validForHours: number): Date {
  return new Date(now.getTime() + validForHours * HOUR_MS);
}

/**
 * Wraps a single `EntityDescriptor` in an `EntitiesDescriptor` carrying the
 * federation-facing name, id and validity window. The inner descriptor (and
 * any signature on it) is copied unchanged.
 */
export function wrapInEntitiesDescriptor(
  entityDescriptorXml: string,
  options: { name: string; metadataId: string; validUntil: Date }
): string {
  const parsed = new DOMParser().parseFromString(entityDescriptorXml, "text/xml");
  const entity = parsed.documentElement;
  if (!entity || entity.localName !== "EntityDescriptor") {
    throw new ProtocolContractViolationError("SP metadata did not contain an EntityDescriptor");
  }

  const doc = new DOMImplementation().createDocument(METADATA_NS, "EntitiesDescriptor", null);
  const wrapper = doc.documentElement;
  if (options.metadataId) wrapper.setAttribute("ID", options.metadataId);
  if (options.name) wrapper.setAttribute("Name", options.name);
  wrapper.setAttribute("validUntil", options.validUntil.toISOString());
  wrapper.appendChild(doc.importNode(entity, true));

  return `<?xml version="1.0" encoding="UTF-8"?>\n${new XMLSerializer().serializeToString(doc)}`;
}
