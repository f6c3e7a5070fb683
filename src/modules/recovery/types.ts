// src/modules/recovery/types.ts
// ============================================================================
// Typen für den Passwort-Recovery-Flow (Spieler-Accounts)
// ============================================================================

import type { MailSecurityPolicy } from "../../libs/mail.js";

// ---------------------------------------------------------------------------
// Datenmodell
// ---------------------------------------------------------------------------

export interface Account {
  /** Stabile Spieler-ID (UUID), nie änderbar */
  readonly identity: string;
  playerName: string;
  /** argon2id-Hash, nie leer */
  passwordHash: string;
  contactAddress: string | null;
  /** Sitzungs-Flag; wird außerhalb dieses Service gepflegt */
  loggedIn: boolean;
}

export interface AccountRow {
  identity: string;
  player_name: string;
  password_hash: string;
  contact_address: string | null;
  logged_in: boolean;
  password_changed_at: Date | null;
  created_at: Date;
  updated_at: Date;
}

export interface AccountStore {
  lookup(identity: string): Promise<Account | null>;
  /** @throws StoreError */
  save(account: Readonly<Account>): Promise<void>;
}

// ---------------------------------------------------------------------------
// Aufrufer + Ergebnis
// ---------------------------------------------------------------------------

export type RecoveryCaller =
  | { kind: "console" }
  | {
      kind: "player";
      identity: string;
      playerName: string;
      connected: boolean;
    };

export type RecoveryAbortReason =
  | "players-only"
  | "feature-disabled"
  | "already-logged-in"
  | "account-not-loaded"
  | "no-contact-address"
  | "recovery-in-progress"
  | "command-failed";

export type RecoveryResult =
  | { ok: true }
  | { ok: false; reason: RecoveryAbortReason; message: string };

export type RecoveryState =
  | "validating"
  | "composing"
  | "dispatching"
  | "completed"
  | "aborted";

// ---------------------------------------------------------------------------
// Mail
// ---------------------------------------------------------------------------

export interface MailTemplateVars {
  playerName: string;
  serverIdentifier: string;
  temporarySecret: string;
}

export interface MailTemplates {
  subject: string;
  html: string;
}

export interface MailAddress {
  address: string;
  name?: string;
}

export interface ComposedMail {
  from: MailAddress;
  to: MailAddress;
  subject: string;
  html: string;
  text: string;
  date: Date;
}

// ---------------------------------------------------------------------------
// Konfiguration
// ---------------------------------------------------------------------------

export type RecoveryMessages = Record<RecoveryAbortReason, string> & {
  success: string;
};

export interface RecoveryConfig {
  mail: {
    enabled: boolean;
    host: string;
    port: number;
    senderAccount: string;
    senderPassword: string;
    senderDisplayName?: string;
    securityPolicy: MailSecurityPolicy;
    connectionTimeoutMs?: number;
  };
  templates: MailTemplates;
  /** Explizit konfigurierter Servername (Vorrang vor der gebundenen Adresse) */
  serverIdentifier?: string;
  secretLength: number;
  lockTtlMs: number;
  messages: RecoveryMessages;
}
