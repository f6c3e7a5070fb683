// src/libs/pii.ts
// ============================================================================
// Pseudonymisierung für Logs
// ----------------------------------------------------------------------------
// E-Mail-Adressen und Spieler-IDs landen nur als SHA-256 im Log.
// ============================================================================

import { createHash } from "node:crypto";

export function sha256(value: string): string {
  return createHash("sha256").update(value, "utf8").digest("hex");
}

/** Normalisiert (trim + lowercase), damit dieselbe Adresse denselben Hash ergibt. */
export function hashEmailForLog(email: string): string {
  return sha256(email.trim().toLowerCase());
}

export function hashIdentityForLog(identity: string): string {
  return sha256(identity.trim().toLowerCase());
}
