// src/modules/recovery/errors.ts
// ============================================================================
// Fehlerklassen des Recovery-Flows (statusCode wie im übrigen Service)
// ============================================================================

import type { RecoveryAbortReason } from "./types.js";

export { ConfigurationError } from "../../libs/mail.js";

// Abbruchgrund → HTTP-Status + API-Fehlercode
export const ABORT_RESPONSES: Record<RecoveryAbortReason, { status: number; code: string }> = {
  "players-only": { status: 403, code: "PLAYERS_ONLY" },
  "feature-disabled": { status: 503, code: "MAIL_NOT_ENABLED" },
  "account-not-loaded": { status: 404, code: "ACCOUNT_NOT_LOADED" },
  "already-logged-in": { status: 409, code: "ALREADY_LOGGED_IN" },
  "no-contact-address": { status: 422, code: "NO_CONTACT_ADDRESS" },
  "recovery-in-progress": { status: 409, code: "RECOVERY_IN_PROGRESS" },
  "command-failed": { status: 500, code: "COMMAND_FAILED" },
};

export class RecoveryPreconditionError extends Error {
  statusCode: number;

  constructor(
    readonly reason: Exclude<RecoveryAbortReason, "command-failed">,
    message: string,
  ) {
    super(message);
    this.name = "RecoveryPreconditionError";
    this.statusCode = ABORT_RESPONSES[reason].status;
  }
}

export class CompositionError extends Error {
  statusCode = 500;

  constructor(message = "Could not compose recovery mail", options?: { cause?: unknown }) {
    super(message, options);
    this.name = "CompositionError";
  }
}

export class DeliveryError extends Error {
  statusCode = 502;

  constructor(message = "Recovery mail delivery failed", options?: { cause?: unknown }) {
    super(message, options);
    this.name = "DeliveryError";
  }
}

export class StoreError extends Error {
  statusCode = 500;

  constructor(message = "Account store operation failed", options?: { cause?: unknown }) {
    super(message, options);
    this.name = "StoreError";
  }
}
