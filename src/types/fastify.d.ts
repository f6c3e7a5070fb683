// src/types/fastify.d.ts
// ============================================================================
// Fastify Type Augmentation
// ----------------------------------------------------------------------------
// - Route Config: config.internal (plugins/internal-auth.ts)
// - Request: Startzeit für die HTTP-Metriken
// ============================================================================

import "fastify";

declare module "fastify" {
  interface FastifyContextConfig {
    /**
     * Wenn true, muss der Aufrufer x-internal-token mitsenden
     * (plugins/internal-auth.ts).
     */
    internal?: boolean;
  }

  interface FastifyRequest {
    requestStartedAtNs?: bigint;
  }
}
