// src/libs/mail.ts
// ============================================================================
// SMTP-Session-Fabrik für die Recovery-Mail
// ----------------------------------------------------------------------------
// - Session wird PRO Anfrage neu gebaut (Konfigurationsänderungen greifen
//   sofort; Recovery ist selten, der Setup-Overhead ist egal)
// - TLS ist Pflicht: implizites TLS (smtps) oder STARTTLS mit requireTLS.
//   Kein Plaintext-Fallback, Zertifikat + Hostname werden geprüft.
// - Optionaler Transport-Provider: schlägt er fehl, wird geloggt und der
//   Standard-SMTP-Transport von nodemailer verwendet
// ============================================================================

import nodemailer, { type SendMailOptions } from "nodemailer";
import type SMTPTransport from "nodemailer/lib/smtp-transport/index.js";
import { z } from "zod";
import type { Logger } from "./logger.js";

export type MailSecurityPolicy = "smtps" | "starttls";

export interface MailSessionConfig {
  host: string;
  port: number;
  senderAccount: string;
  senderPassword: string;
  senderDisplayName?: string;
  securityPolicy: MailSecurityPolicy;
  connectionTimeoutMs?: number;
}

/**
 * Der Teil von nodemailers Transporter, den der Recovery-Flow nutzt.
 * Ein SMTP-Transporter aus createTransport() erfüllt ihn direkt.
 */
export interface MailTransporter {
  sendMail(mail: SendMailOptions): Promise<{ messageId: string }>;
  verify(): Promise<true>;
  close(): void;
}

export interface MailSession {
  readonly transporter: MailTransporter;
  readonly host: string;
  readonly port: number;
  readonly securityPolicy: MailSecurityPolicy;
  readonly sender: {
    address: string;
    name?: string;
  };
}

/**
 * Alternativer Transport (z. B. ein gebündelter oder gepatchter SMTP-Stack).
 * Ist nur eine Optimierung – Fehler hier brechen die Session nicht ab.
 */
export interface TransportProvider {
  readonly name: string;
  create(options: SMTPTransport.Options): MailTransporter;
}

export class ConfigurationError extends Error {
  statusCode = 500;

  constructor(message = "Invalid mail configuration", options?: { cause?: unknown }) {
    super(message, options);
    this.name = "ConfigurationError";
  }
}

const MailSessionConfigSchema = z.object({
  host: z.string().trim().min(1, "host fehlt"),
  port: z.number().int().min(1).max(65535),
  senderAccount: z.string().trim().min(1, "senderAccount fehlt"),
  senderPassword: z.string().min(1, "senderPassword fehlt"),
  senderDisplayName: z.string().trim().min(1).optional(),
  securityPolicy: z.enum(["smtps", "starttls"]),
  connectionTimeoutMs: z.number().int().positive().optional(),
});

/**
 * Übersetzt die validierte Konfiguration in nodemailer-Optionen.
 */
export function toTransportOptions(config: MailSessionConfig): SMTPTransport.Options {
  const implicitTls = config.securityPolicy === "smtps";
  const timeout = config.connectionTimeoutMs ?? 15_000;

  return {
    host: config.host,
    port: config.port,
    secure: implicitTls,
    // STARTTLS muss klappen, sonst Abbruch (kein Downgrade auf Plaintext)
    requireTLS: !implicitTls,
    ignoreTLS: false,
    auth: {
      user: config.senderAccount,
      pass: config.senderPassword,
    },
    tls: {
      rejectUnauthorized: true,
      servername: config.host,
      minVersion: "TLSv1.2",
    },
    connectionTimeout: timeout,
    greetingTimeout: timeout,
    socketTimeout: timeout * 2,
  };
}

/**
 * Baut eine Mail-Session.
 *
 * @throws ConfigurationError bei fehlenden/ungültigen Feldern
 */
export function buildMailSession(
  config: MailSessionConfig,
  log: Logger,
  provider?: TransportProvider,
): MailSession {
  const parsed = MailSessionConfigSchema.safeParse(config);
  if (!parsed.success) {
    const fields = Object.keys(parsed.error.flatten().fieldErrors).join(", ");
    throw new ConfigurationError(`Invalid mail configuration: ${fields}`, {
      cause: parsed.error,
    });
  }

  const valid = parsed.data;
  const options = toTransportOptions(valid);

  let transporter: MailTransporter | undefined;
  if (provider) {
    try {
      transporter = provider.create(options);
    } catch (err) {
      log.error({ err, provider: provider.name }, "mail_provider_override_failed");
    }
  }

  return {
    transporter: transporter ?? nodemailer.createTransport(options),
    host: valid.host,
    port: valid.port,
    securityPolicy: valid.securityPolicy,
    sender: {
      address: valid.senderAccount,
      name: valid.senderDisplayName,
    },
  };
}

/**
 * Healthcheck: öffnet eine Verbindung (inkl. TLS + Login) und schließt sie.
 */
export async function mailHealth(session: MailSession): Promise<{
  ok: boolean;
  reason?: string;
}> {
  try {
    await session.transporter.verify();
    return { ok: true };
  } catch (err: unknown) {
    return {
      ok: false,
      reason: err instanceof Error ? err.message : "smtp_verify_failed",
    };
  } finally {
    session.transporter.close();
  }
}
