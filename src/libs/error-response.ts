// src/libs/error-response.ts
// ============================================================================
// Einheitliches Fehlerformat der API
// ----------------------------------------------------------------------------
//   { status, error: { code, message }, details? }
// Codes sind SCREAMING_SNAKE_CASE und stabil (der Spielserver wertet sie aus).
// ============================================================================

import type { FastifyReply } from "fastify";
import type { ZodError } from "zod";

export type ApiErrorBody = {
  status: number;
  error: {
    code: string;
    message: string;
  };
  details?: unknown;
};

export function apiError(
  status: number,
  code: string,
  message: string,
  details?: unknown,
): ApiErrorBody {
  const body: ApiErrorBody = { status, error: { code, message } };
  if (details !== undefined) body.details = details;
  return body;
}

export function sendApiError(
  reply: FastifyReply,
  status: number,
  code: string,
  message: string,
  details?: unknown,
) {
  return reply.code(status).send(apiError(status, code, message, details));
}

/** 400 mit den flachen Zod-Fehlern als details. */
export function sendValidationError(reply: FastifyReply, message: string, error: ZodError) {
  return sendApiError(reply, 400, "VALIDATION_FAILED", message, error.flatten());
}
