// src/modules/recovery/composer.ts
// ============================================================================
// Recovery-Mail zusammenbauen
// ----------------------------------------------------------------------------
// - Betreff + HTML-Body aus Templates ({{playerName}}, {{serverIdentifier}},
//   {{temporarySecret}}); Werte im Body werden HTML-escaped
// - Text-Part wird aus dem gerenderten HTML abgeleitet (Tags → Leerzeichen)
// - nodemailer baut aus html + text ein multipart/alternative
// ============================================================================

import { z } from "zod";
import { CompositionError } from "./errors.js";
import type { ComposedMail, MailAddress, MailTemplates, MailTemplateVars } from "./types.js";

const PLACEHOLDER = /\{\{\s*(playerName|serverIdentifier|temporarySecret)\s*\}\}/g;

// Tag plus direkt folgende Tags (nur Whitespace dazwischen) → ein Leerzeichen
const MARKUP_RUN = /<[^>]*>(\s*<[^>]*>)*/g;

const AddressSchema = z.string().trim().email();

const HTML_ESCAPES: Record<string, string> = {
  "&": "&amp;",
  "<": "&lt;",
  ">": "&gt;",
  '"': "&quot;",
  "'": "&#39;",
};

export function escapeHtml(value: string): string {
  return value.replace(/[&<>"']/g, (ch) => HTML_ESCAPES[ch] ?? ch);
}

// &lt; und &gt; bleiben stehen: dekodiert würden escapte Werte wieder zu Tags
function decodeBasicEntities(value: string): string {
  return value
    .replace(/&nbsp;/g, " ")
    .replace(/&quot;/g, '"')
    .replace(/&#39;/g, "'")
    .replace(/&amp;/g, "&");
}

export function renderTemplate(
  template: string,
  vars: MailTemplateVars,
  escape: (value: string) => string = (value) => value,
): string {
  return template.replace(PLACEHOLDER, (_match, name: keyof MailTemplateVars) =>
    escape(vars[name]),
  );
}

export function stripMarkup(html: string): string {
  return decodeBasicEntities(html.replace(MARKUP_RUN, " ")).trim();
}

function requireAddress(role: "sender" | "recipient", address: string): string {
  const parsed = AddressSchema.safeParse(address);
  if (!parsed.success) {
    throw new CompositionError(`Malformed ${role} address`, { cause: parsed.error });
  }
  return parsed.data;
}

export interface ComposeOptions {
  sender: MailAddress;
  templates: MailTemplates;
  now?: Date;
}

/**
 * @throws CompositionError bei ungültiger Absender- oder Empfängeradresse
 */
export function composeRecoveryMail(
  recipient: MailAddress,
  vars: MailTemplateVars,
  options: ComposeOptions,
): ComposedMail {
  const fromAddress = requireAddress("sender", options.sender.address);
  const toAddress = requireAddress("recipient", recipient.address);

  // Header-Injection: Zeilenumbrüche im Betreff verwerfen
  const subject = renderTemplate(options.templates.subject, vars).replace(/[\r\n]+/g, " ").trim();
  const html = renderTemplate(options.templates.html, vars, escapeHtml);

  return {
    from: { address: fromAddress, name: options.sender.name },
    to: { address: toAddress, name: recipient.name },
    subject,
    html,
    text: stripMarkup(html),
    date: options.now ?? new Date(),
  };
}
