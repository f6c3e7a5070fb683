// src/libs/logger.ts
// ============================================================================
// Logger-Vertrag für Code außerhalb von Route-Handlern
// ----------------------------------------------------------------------------
// Zur Laufzeit ist das immer der pino-Logger von Fastify (app.log bzw. ein
// child davon). Workflow, Tasks und Mail-Session hängen nur an diesen
// vier Methoden, damit Tests einen schlanken Fake übergeben können.
// ============================================================================

import type { FastifyBaseLogger } from "fastify";

export type Logger = Pick<FastifyBaseLogger, "debug" | "info" | "warn" | "error">;
