// src/libs/env.ts
// ============================================================================
// Zentrale Umgebungsvariablen-Verwaltung (Docker + Secrets-first) mit Zod
// ----------------------------------------------------------------------------
// Ziele
// - Keine .env-Abhängigkeit (kein dotenv)
// - Secrets bevorzugt aus *_FILE (Docker secrets) lesen
// - Fail-fast nur beim echten Service-Start (nicht bei Test-Imports)
// - Keine Secret-Werte loggen (nur [set]/[unset])
//
// Hinweise
// - MAIL_ENABLED=false ist der Default: ohne SMTP-Zugang wird jede
//   Recovery-Anfrage mit "feature-disabled" abgelehnt.
// - SMTP_USER ist gleichzeitig das Absenderkonto der Recovery-Mail.
// ============================================================================

import { readFileSync } from "node:fs";
import { z } from "zod";

// ----------------------------------------------------------------------------
// Helpers: Secrets lesen
// ----------------------------------------------------------------------------

/**
 * Liest ein Secret aus einer Datei (Docker secrets: /run/secrets/*).
 * - trimmt Whitespace
 * - entfernt trailing newlines
 * - wirft Fehler, wenn Datei nicht lesbar / leer
 */
function readSecretFile(filePath: string | undefined, label: string): string | undefined {
  if (!filePath) return undefined;

  let value: string;
  try {
    value = readFileSync(filePath, "utf8");
  } catch {
    throw new Error(`${label} nicht lesbar: ${filePath}`);
  }

  const trimmed = value.replace(/\r?\n+$/, "").trim();
  if (!trimmed) throw new Error(`${label} ist leer: ${filePath}`);

  return trimmed;
}

/**
 * Entscheidet: *_FILE wird bevorzugt gelesen, ENV ist Fallback.
 */
function resolveFromFileOrEnv(opts: {
  envValue?: string;
  filePath?: string;
  label: string;
}): string | undefined {
  const fromFile = readSecretFile(opts.filePath, opts.label);
  if (fromFile && fromFile.trim() !== "") return fromFile;
  if (opts.envValue && opts.envValue.trim() !== "") return opts.envValue;
  return undefined;
}

/**
 * Maskiert sensible Werte für Logs.
 */
function mask(value: unknown): string {
  if (value === undefined || value === null || value === "") return "[unset]";
  return "[set]";
}

// z.coerce.boolean() macht aus "false" ein true – deshalb explizit parsen.
const booleanFlag = (fallback: boolean) =>
  z
    .union([z.boolean(), z.string()])
    .optional()
    .transform((value, ctx) => {
      if (value === undefined || value === "") return fallback;
      if (typeof value === "boolean") return value;

      const normalized = value.trim().toLowerCase();
      if (["1", "true", "yes", "on"].includes(normalized)) return true;
      if (["0", "false", "no", "off"].includes(normalized)) return false;

      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        message: `Ungültiger Boolean-Wert: ${value}`,
      });
      return z.NEVER;
    });

// ----------------------------------------------------------------------------
// Schema: erwartet ENV + optional *_FILE
// ----------------------------------------------------------------------------

const EnvSchema = z.object({
  // --------------------------------------------------------------------------
  // Laufzeit / Server
  // --------------------------------------------------------------------------
  NODE_ENV: z.enum(["development", "test", "production"]).default("development"),
  HOST: z.string().default("0.0.0.0"),
  PORT: z.coerce.number().int().min(1).max(65535).default(3000),
  LOG_LEVEL: z.enum(["fatal", "error", "warn", "info", "debug", "trace", "silent"]).default("info"),
  REQUEST_ID_HEADER: z.string().default("x-request-id"),
  TRUST_PROXY: booleanFlag(true),
  METRICS_ENABLED: booleanFlag(true),

  // --------------------------------------------------------------------------
  // Service-zu-Service (Game-Server -> Recovery-Service)
  // --------------------------------------------------------------------------
  INTERNAL_API_TOKEN: z.string().optional(),
  INTERNAL_API_TOKEN_FILE: z.string().optional(),

  // --------------------------------------------------------------------------
  // PostgreSQL (Account-Store)
  // --------------------------------------------------------------------------
  DATABASE_URL: z.string().optional(),
  DATABASE_URL_FILE: z.string().optional(),

  // --------------------------------------------------------------------------
  // Redis (optional) – nur für den Recovery-Lock über mehrere Instanzen
  // --------------------------------------------------------------------------
  REDIS_URL: z.string().optional(),
  REDIS_PASSWORD: z.string().optional(),
  REDIS_PASSWORD_FILE: z.string().optional(),
  REDIS_NAMESPACE: z.string().default("recovery"),

  // --------------------------------------------------------------------------
  // SMTP / Mail
  // - SMTP_SECURITY=smtps   → implizites TLS (Port 465)
  // - SMTP_SECURITY=starttls → STARTTLS ist Pflicht, kein Plaintext-Fallback
  // --------------------------------------------------------------------------
  MAIL_ENABLED: booleanFlag(false),
  SMTP_HOST: z.string().default("localhost"),
  SMTP_PORT: z.coerce.number().int().min(1).max(65535).default(465),
  SMTP_SECURITY: z.enum(["smtps", "starttls"]).default("smtps"),
  SMTP_USER: z.string().optional(),
  SMTP_PASS: z.string().optional(),
  SMTP_USER_FILE: z.string().optional(),
  SMTP_PASS_FILE: z.string().optional(),
  SMTP_SENDER_NAME: z.string().optional(),
  SMTP_CONNECTION_TIMEOUT_MS: z.coerce.number().int().positive().default(15_000),

  // --------------------------------------------------------------------------
  // Recovery-Mail Inhalte
  // --------------------------------------------------------------------------
  MAIL_SUBJECT_TEMPLATE: z
    .string()
    .default("Your new password for {{serverIdentifier}}"),
  MAIL_TEMPLATE_FILE: z.string().optional(),
  SERVER_IDENTIFIER: z.string().optional(),

  // --------------------------------------------------------------------------
  // Recovery-Workflow
  // --------------------------------------------------------------------------
  RECOVERY_SECRET_LENGTH: z.coerce.number().int().min(8).max(64).default(16),
  RECOVERY_LOCK_TTL_MS: z.coerce.number().int().min(1_000).default(30_000),
  TASK_CONCURRENCY: z.coerce.number().int().min(1).max(64).default(4),

  // --------------------------------------------------------------------------
  // Startup-Validation Switch (nur als String; wir interpretieren unten)
  // --------------------------------------------------------------------------
  STARTUP_VALIDATE_ENV: z.string().optional(),
});

type RawEnv = z.infer<typeof EnvSchema>;

/**
 * Baut die Redis-URL: ein separates Passwort (z. B. aus REDIS_PASSWORD_FILE)
 * wird in die URL übernommen, falls dort noch keins steht.
 */
function buildRedisUrl(input: Pick<RawEnv, "REDIS_URL" | "REDIS_PASSWORD">): string | undefined {
  if (!input.REDIS_URL) return undefined;
  if (!input.REDIS_PASSWORD) return input.REDIS_URL;

  const url = new URL(input.REDIS_URL);
  if (!url.password) {
    url.password = input.REDIS_PASSWORD;
  }
  return url.toString();
}

/**
 * Parst eine ENV-Quelle inkl. *_FILE-Auflösung.
 * Exportiert, damit Tests eigene Quellen übergeben können.
 */
export function parseEnv(source: NodeJS.ProcessEnv) {
  const raw = EnvSchema.parse({
    ...source,
    INTERNAL_API_TOKEN: resolveFromFileOrEnv({
      envValue: source.INTERNAL_API_TOKEN,
      filePath: source.INTERNAL_API_TOKEN_FILE,
      label: "INTERNAL_API_TOKEN_FILE",
    }),
    DATABASE_URL: resolveFromFileOrEnv({
      envValue: source.DATABASE_URL,
      filePath: source.DATABASE_URL_FILE,
      label: "DATABASE_URL_FILE",
    }),
    REDIS_PASSWORD: resolveFromFileOrEnv({
      envValue: source.REDIS_PASSWORD,
      filePath: source.REDIS_PASSWORD_FILE,
      label: "REDIS_PASSWORD_FILE",
    }),
    SMTP_USER: resolveFromFileOrEnv({
      envValue: source.SMTP_USER,
      filePath: source.SMTP_USER_FILE,
      label: "SMTP_USER_FILE",
    }),
    SMTP_PASS: resolveFromFileOrEnv({
      envValue: source.SMTP_PASS,
      filePath: source.SMTP_PASS_FILE,
      label: "SMTP_PASS_FILE",
    }),
  });

  return {
    ...raw,
    REQUEST_ID_HEADER: raw.REQUEST_ID_HEADER.toLowerCase(),
    REDIS_URL: buildRedisUrl(raw),
  };
}

export type Env = ReturnType<typeof parseEnv>;

/**
 * Prüft die Konfiguration für einen echten Service-Start.
 * Wirft beim ersten harten Fehler; Warnungen gehen an `warn`.
 */
export function validateEnvForStartup(
  value: Env,
  warn: (msg: string) => void = console.warn,
): void {
  if (!value.DATABASE_URL) {
    throw new Error("DATABASE_URL fehlt: setze DATABASE_URL oder DATABASE_URL_FILE.");
  }

  if (!value.INTERNAL_API_TOKEN) {
    throw new Error(
      "INTERNAL_API_TOKEN fehlt: setze INTERNAL_API_TOKEN oder INTERNAL_API_TOKEN_FILE.",
    );
  }

  if (value.MAIL_ENABLED && (!value.SMTP_USER || !value.SMTP_PASS)) {
    throw new Error(
      "MAIL_ENABLED=true braucht SMTP_USER und SMTP_PASS (oder *_FILE).",
    );
  }

  if (!value.MAIL_ENABLED) {
    warn("[env] MAIL_ENABLED=false – Passwort-Recovery ist deaktiviert.");
  }
}

// Final export: normalisierte ENV des Prozesses
export const env = parseEnv(process.env);

// ----------------------------------------------------------------------------
// Fail-fast: nur wenn Service wirklich startet
// ----------------------------------------------------------------------------
//
// Tests importieren env.ts ohne vollständige Konfiguration → nicht in test crashen.
//
// Schalter:
// - STARTUP_VALIDATE_ENV=1 -> immer validieren (typisch im Container)
// - sonst: validate in development/production, nicht in test
//
const shouldValidate =
  process.env.STARTUP_VALIDATE_ENV === "1" ? true : env.NODE_ENV !== "test";

if (shouldValidate) {
  validateEnvForStartup(env);
}

// ----------------------------------------------------------------------------
// Debug-Ausgabe ohne Secrets
// ----------------------------------------------------------------------------

/**
 * Gibt eine sichere Zusammenfassung der Konfiguration aus (ohne Secrets).
 */
export function logEnvSummary(
  log: (msg: string, extra?: unknown) => void = console.info,
  value: Env = env,
) {
  const summary = {
    NODE_ENV: value.NODE_ENV,
    HOST: value.HOST,
    PORT: value.PORT,
    LOG_LEVEL: value.LOG_LEVEL,
    TRUST_PROXY: value.TRUST_PROXY,
    METRICS_ENABLED: value.METRICS_ENABLED,

    INTERNAL_API_TOKEN: mask(value.INTERNAL_API_TOKEN),
    DATABASE_URL: mask(value.DATABASE_URL),
    REDIS_URL: mask(value.REDIS_URL),
    REDIS_NAMESPACE: value.REDIS_NAMESPACE,

    MAIL_ENABLED: value.MAIL_ENABLED,
    SMTP_HOST: value.SMTP_HOST,
    SMTP_PORT: value.SMTP_PORT,
    SMTP_SECURITY: value.SMTP_SECURITY,
    SMTP_USER: mask(value.SMTP_USER),
    SMTP_PASS: mask(value.SMTP_PASS),
    SMTP_SENDER_NAME: value.SMTP_SENDER_NAME ?? "[unset]",
    MAIL_TEMPLATE_FILE: value.MAIL_TEMPLATE_FILE ?? "[default]",
    SERVER_IDENTIFIER: value.SERVER_IDENTIFIER ?? "[bound address]",

    RECOVERY_SECRET_LENGTH: value.RECOVERY_SECRET_LENGTH,
    RECOVERY_LOCK_TTL_MS: value.RECOVERY_LOCK_TTL_MS,
    TASK_CONCURRENCY: value.TASK_CONCURRENCY,
  };

  log("[env] configuration summary", summary);
}
