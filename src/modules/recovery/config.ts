// src/modules/recovery/config.ts
// ============================================================================
// RecoveryConfig aus ENV + Templates bauen
// ----------------------------------------------------------------------------
// Der Workflow liest nie selbst aus env: alles, was er braucht, steckt im
// expliziten RecoveryConfig-Objekt (Tests bauen es direkt).
// ============================================================================

import { readFileSync } from "node:fs";
import type { Env } from "../../libs/env.js";
import type { MailTemplates, RecoveryConfig, RecoveryMessages } from "./types.js";

export const DEFAULT_TEMPLATE_URL = new URL("../../../templates/recovery-mail.html", import.meta.url);

export const DEFAULT_MESSAGES: RecoveryMessages = {
  success: "A new password was sent to your e-mail address.",
  "players-only": "Only players can reset their password.",
  "feature-disabled": "Password recovery by e-mail is not enabled on this server.",
  "already-logged-in": "You are already logged in.",
  "account-not-loaded": "Your account could not be found. Try again in a moment.",
  "no-contact-address": "There is no e-mail address stored for your account.",
  "recovery-in-progress": "A password reset is already in progress for your account.",
  "command-failed": "Error executing command. See the server log for details.",
};

export function loadMailTemplates(
  value: Pick<Env, "MAIL_SUBJECT_TEMPLATE" | "MAIL_TEMPLATE_FILE">,
): MailTemplates {
  const html = value.MAIL_TEMPLATE_FILE
    ? readFileSync(value.MAIL_TEMPLATE_FILE, "utf8")
    : readFileSync(DEFAULT_TEMPLATE_URL, "utf8");

  if (!html.trim()) {
    throw new Error(`Mail-Template ist leer: ${value.MAIL_TEMPLATE_FILE ?? DEFAULT_TEMPLATE_URL.pathname}`);
  }

  return { subject: value.MAIL_SUBJECT_TEMPLATE, html };
}

export function buildRecoveryConfig(value: Env, templates: MailTemplates): RecoveryConfig {
  return {
    mail: {
      enabled: value.MAIL_ENABLED,
      host: value.SMTP_HOST,
      port: value.SMTP_PORT,
      senderAccount: value.SMTP_USER ?? "",
      senderPassword: value.SMTP_PASS ?? "",
      senderDisplayName: value.SMTP_SENDER_NAME,
      securityPolicy: value.SMTP_SECURITY,
      connectionTimeoutMs: value.SMTP_CONNECTION_TIMEOUT_MS,
    },
    templates,
    serverIdentifier: value.SERVER_IDENTIFIER?.trim() || undefined,
    secretLength: value.RECOVERY_SECRET_LENGTH,
    lockTtlMs: value.RECOVERY_LOCK_TTL_MS,
    messages: { ...DEFAULT_MESSAGES },
  };
}
