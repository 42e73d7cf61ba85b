import { DuplicateRequestIdError, UnknownRequestError } from "./errors";
import type { SessionCache } from "./sessionCache";

export const OUTSTANDING_QUERY_PREFIX = "saml.outstanding:";

function keyFor(requestId: string): string {
  return `${OUTSTANDING_QUERY_PREFIX}${requestId}`;
}

/**
 * AuthnRequests sent from this browser session that have not been answered
 * yet, keyed by request id, valued by the post-login return location.
 * Each request is its own cache entry.
 */
export class OutstandingQueryTracker {
  constructor(private readonly cache: SessionCache) {}

  async record(requestId: string, returnLocation: string): Promise<void> {
    const stored = await this.cache.add(keyFor(requestId), returnLocation);
    if (!stored) throw new DuplicateRequestIdError(requestId);
  }

  async resolve(requestId: string): Promise<string> {
    const returnLocation = await this.cache.get(keyFor(requestId));
    if (returnLocation === null) throw new UnknownRequestError(requestId);
    return returnLocation;
  }

  /**
   * Removes `requestId`; returns whether it was outstanding.
   */
  async forget(requestId: string): Promise<boolean> {
    return this.cache.delete(keyFor(requestId));
  }

  async outstanding(): Promise<ReadonlySet<string>> {
    const entries = await this.cache.list(OUTSTANDING_QUERY_PREFIX);
    return new Set([...entries.keys()].map((key) => key.slice(OUTSTANDING_QUERY_PREFIX.length)));
  }
}
