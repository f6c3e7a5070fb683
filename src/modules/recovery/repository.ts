// src/modules/recovery/repository.ts
// ============================================================================
// Account-Repository (recovery.accounts)
// ----------------------------------------------------------------------------
// - logged_in wird vom Spielserver gepflegt, hier nur gelesen
// - save() schreibt ausschließlich den Passwort-Hash (Kontaktadresse gehört
//   dem normalen Änderungsweg)
// ============================================================================

import type { Queryable } from "../../libs/db.js";
import { StoreError } from "./errors.js";
import type { Account, AccountRow, AccountStore } from "./types.js";

export async function findAccountByIdentity(
  client: Queryable,
  identity: string,
): Promise<AccountRow | null> {
  const res = await client.query<AccountRow>(
    `
      SELECT
        identity,
        player_name,
        password_hash,
        contact_address,
        logged_in,
        password_changed_at,
        created_at,
        updated_at
      FROM recovery.accounts
      WHERE identity = $1
      LIMIT 1;
    `,
    [identity],
  );

  return res.rows[0] ?? null;
}

export async function updateAccountCredential(
  client: Queryable,
  input: {
    identity: string;
    passwordHash: string;
  },
): Promise<number> {
  const res = await client.query(
    `
      UPDATE recovery.accounts
      SET
        password_hash = $2,
        password_changed_at = now(),
        updated_at = now()
      WHERE identity = $1;
    `,
    [input.identity, input.passwordHash],
  );

  return res.rowCount ?? 0;
}

export function toAccount(row: AccountRow): Account {
  return {
    identity: row.identity,
    playerName: row.player_name,
    passwordHash: row.password_hash,
    contactAddress: row.contact_address,
    loggedIn: row.logged_in,
  };
}

export class PgAccountStore implements AccountStore {
  constructor(private readonly client: Queryable) {}

  async lookup(identity: string): Promise<Account | null> {
    try {
      const row = await findAccountByIdentity(this.client, identity);
      return row ? toAccount(row) : null;
    } catch (cause) {
      throw new StoreError("Account lookup failed", { cause });
    }
  }

  async save(account: Readonly<Account>): Promise<void> {
    if (!account.passwordHash) {
      throw new StoreError("Refusing to store an empty password hash");
    }

    let updated: number;
    try {
      updated = await updateAccountCredential(this.client, {
        identity: account.identity,
        passwordHash: account.passwordHash,
      });
    } catch (cause) {
      throw new StoreError("Account save failed", { cause });
    }

    if (updated !== 1) {
      throw new StoreError(`Account save touched ${updated} rows`);
    }
  }
}
