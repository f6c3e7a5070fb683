// src/plugins/internal-auth.ts
// ============================================================================
// Internal-Auth-Plugin (Service-zu-Service)
// ----------------------------------------------------------------------------
// - Für Routes mit config.internal === true:
//   Header x-internal-token muss INTERNAL_API_TOKEN entsprechen
// - Vergleich in konstanter Zeit (über SHA-256-Digests, gleiche Länge)
// - Ohne konfiguriertes Token wird jede interne Anfrage abgelehnt
// ============================================================================

import { createHash, timingSafeEqual } from "node:crypto";
import fp from "fastify-plugin";
import type { FastifyPluginAsync } from "fastify";
import { sendApiError } from "../libs/error-response.js";
import { isHealthPath, readHeaderValue } from "../libs/http.js";

export const INTERNAL_TOKEN_HEADER = "x-internal-token";

export interface InternalAuthOptions {
  token?: string;
}

function digest(value: string): Buffer {
  return createHash("sha256").update(value, "utf8").digest();
}

export function internalTokenMatches(expected: string | undefined, provided: string | undefined): boolean {
  if (!expected || !provided) return false;
  return timingSafeEqual(digest(expected), digest(provided));
}

const internalAuthPlugin: FastifyPluginAsync<InternalAuthOptions> = async (app, opts) => {
  if (!opts.token) {
    app.log.warn("internal_auth_token_missing");
  }

  app.addHook("preHandler", async (req, reply) => {
    if (isHealthPath(req)) return;
    if (req.routeOptions.config.internal !== true) return;

    const provided = readHeaderValue(req.headers[INTERNAL_TOKEN_HEADER]);
    if (!internalTokenMatches(opts.token, provided)) {
      req.log.warn({ route: req.routeOptions.url }, "internal_auth_rejected");
      return sendApiError(reply, 401, "UNAUTHORIZED", "Missing or invalid internal token.");
    }
  });
};

export default fp(internalAuthPlugin, { name: "internal-auth" });
