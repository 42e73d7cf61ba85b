import crypto from "node:crypto";
import type { Queryable } from "../db/tx";

export interface LocalUser {
  id: string;
  username: string;
}

/** Identity handed to the local authentication backend after verification. */
export interface ResolvableIdentity {
  idpId: string;
  nameId: string;
  attributes: Record<string, unknown>;
}

/**
 * Local authentication backend: maps a verified SAML identity to a local user,
 * or null when that identity may not log in.
 */
export interface UserResolver {
  resolve(db: Queryable, identity: ResolvableIdentity): Promise<LocalUser | null>;
}

type UserRow = { id: string; username: string; is_active: boolean };

async function findUser(db: Queryable, username: string): Promise<UserRow | null> {
  const res = await db.query<UserRow>("SELECT id, username, is_active FROM users WHERE username = $1 LIMIT 1", [
    username
  ]);
  return res.rows[0] ?? null;
}

/**
 * Resolves users by `username = NameID`, optionally provisioning unknown ones.
 */
export function createPgUserResolver(options: { createUnknownUsers: boolean }): UserResolver {
  return {
    async resolve(db, identity) {
      const username = identity.nameId.trim();
      if (username.length === 0) return null;

      let row = await findUser(db, username);
      if (!row && options.createUnknownUsers) {
        await db.query("INSERT INTO users (id, username) VALUES ($1, $2) ON CONFLICT (username) DO NOTHING", [
          crypto.randomUUID(),
          username
        ]);
        row = await findUser(db, username);
      }
      if (!row || !row.is_active) return null;

      await db.query("UPDATE users SET last_login_at = now() WHERE id = $1", [row.id]);
      return { id: row.id, username: row.username };
    }
  };
}
