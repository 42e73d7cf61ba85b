import { z } from "zod";
import type { SessionCache } from "./sessionCache";

const IDENTITY_KEY = "saml.identity";

export const IdentityRecordSchema = z.object({
  idpId: z.string().min(1),
  issuer: z.string().min(1),
  nameId: z.string().min(1),
  nameIdFormat: z.string().min(1),
  nameQualifier: z.string().optional(),
  spNameQualifier: z.string().optional(),
  sessionIndex: z.string().optional()
});

/** SAML identity of the subject logged into the local session. */
export type IdentityRecord = z.infer<typeof IdentityRecordSchema>;

export class IdentityRecordTracker {
  constructor(private readonly cache: SessionCache) {}

  async set(record: IdentityRecord): Promise<void> {
    await this.cache.set(IDENTITY_KEY, JSON.stringify(IdentityRecordSchema.parse(record)));
  }

  async get(): Promise<IdentityRecord | null> {
    const raw = await this.cache.get(IDENTITY_KEY);
    if (!raw) return null;
    try {
      const result = IdentityRecordSchema.safeParse(JSON.parse(raw));
      return result.success ? result.data : null;
    } catch {
      return null;
    }
  }

  async clear(): Promise<void> {
    await this.cache.delete(IDENTITY_KEY);
  }
}
