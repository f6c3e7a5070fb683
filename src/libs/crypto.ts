// src/libs/crypto.ts
// ============================================================================
// Passwort-Hashing (argon2id) & temporäre Passwörter
// ----------------------------------------------------------------------------
// - Sichere Default-Parameter für argon2id
// - hashPassword() + argon2Hasher (CredentialHasher für den Recovery-Flow)
// - generateTemporarySecret(): alphanumerisch, CSPRNG (crypto.randomInt)
// ============================================================================

import { randomInt } from "node:crypto";
import argon2 from "argon2";

export const TEMPORARY_SECRET_LENGTH = 16;

const SECRET_ALPHABET =
  "ABCDEFGHIJKLMNOPQRSTUVWXYZabcdefghijklmnopqrstuvwxyz0123456789";

/** Einweg-Hash für Klartext-Passwörter. */
export interface CredentialHasher {
  hash(plain: string): Promise<string>;
}

// ---------------------------------------------------------------------------
// Passwort hashen
// ---------------------------------------------------------------------------

export async function hashPassword(plain: string): Promise<string> {
  return argon2.hash(plain, {
    type: argon2.argon2id,
    memoryCost: 2 ** 16, // 64 MiB
    timeCost: 3,
    parallelism: 1,
  });
}

export const argon2Hasher: CredentialHasher = {
  hash: hashPassword,
};

// ---------------------------------------------------------------------------
// Temporäres Passwort erzeugen
// ---------------------------------------------------------------------------
//
// 62^16 ≈ 4.8e28 Möglichkeiten: eine Kollision mit dem aktuellen Passwort
// wird nicht geprüft. randomInt wirft, wenn keine Entropie verfügbar ist –
// das ist fatal und wird nicht abgefangen.
//
export function generateTemporarySecret(length = TEMPORARY_SECRET_LENGTH): string {
  if (!Number.isInteger(length) || length < 1) {
    throw new RangeError(`Invalid secret length: ${length}`);
  }

  let secret = "";
  for (let i = 0; i < length; i++) {
    secret += SECRET_ALPHABET[randomInt(SECRET_ALPHABET.length)];
  }
  return secret;
}
