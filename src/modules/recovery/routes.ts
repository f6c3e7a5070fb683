// src/modules/recovery/routes.ts
// ============================================================================
// Fastify-Routen für die Passwort-Recovery
// ----------------------------------------------------------------------------
// - POST /internal/recovery/forgot → Recovery für einen Spieler anstoßen
//
// Der Chat-Befehl selbst lebt im Spielserver; der leitet ihn als internen
// Aufruf (x-internal-token) hierher weiter.
// ============================================================================

import type { FastifyInstance } from "fastify";
import { z } from "zod";

import { sendApiError, sendValidationError } from "../../libs/error-response.js";
import { ABORT_RESPONSES } from "./errors.js";
import type { CredentialRecoveryWorkflow } from "./service.js";
import type { RecoveryCaller } from "./types.js";

// ---------------------------------------------------------------------------
// Zod-Schemas
// ---------------------------------------------------------------------------

const ForgotBodySchema = z.discriminatedUnion("source", [
  z.object({ source: z.literal("console") }),
  z.object({
    source: z.literal("player"),
    identity: z.string().uuid("identity muss eine UUID sein."),
    playerName: z.string().trim().min(1).max(64),
    connected: z.boolean(),
  }),
]);

type ForgotBody = z.infer<typeof ForgotBodySchema>;

function toCaller(body: ForgotBody): RecoveryCaller {
  if (body.source === "console") return { kind: "console" };
  return {
    kind: "player",
    identity: body.identity,
    playerName: body.playerName,
    connected: body.connected,
  };
}

export interface RecoveryRoutesOptions {
  workflow: CredentialRecoveryWorkflow;
  successMessage: string;
}

// Registrierung in app.ts:
//   await app.register(recoveryRoutes, { prefix: "/internal/recovery", workflow, ... });
export default async function recoveryRoutes(app: FastifyInstance, opts: RecoveryRoutesOptions) {
  app.post<{ Body: unknown }>(
    "/forgot",
    { config: { internal: true } },
    async (req, reply) => {
      const parsed = ForgotBodySchema.safeParse(req.body);
      if (!parsed.success) {
        return sendValidationError(reply, "Ungültige Eingabe für Passwort-Recovery.", parsed.error);
      }

      const result = await opts.workflow.requestRecovery(toCaller(parsed.data));
      if (result.ok) {
        return reply.code(202).send({ ok: true, message: opts.successMessage });
      }

      const { status, code } = ABORT_RESPONSES[result.reason];
      return sendApiError(reply, status, code, result.message);
    },
  );
}
