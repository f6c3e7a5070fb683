// ============================================================================
// src/libs/http.ts
// ----------------------------------------------------------------------------
// HTTP-Hilfsfunktionen (Logging, Keys, Metriken)
// ============================================================================
import type { FastifyRequest } from "fastify";

/** Liefert eine stabile Routen-ID (für Logs/Metriken). */
export function getRouteId(req: FastifyRequest): string {
  return req.routeOptions?.url ?? req.raw.url?.split("?")[0] ?? "unknown";
}

/** Ermittelt, ob die Anfrage einen Health-Endpoint adressiert. */
export function isHealthPath(req: FastifyRequest): boolean {
  const url = (req.raw.url ?? "").split("?")[0];
  return (
    url === "/health" ||
    url === "/healthz" ||
    url === "/metrics" ||
    url.startsWith("/health/")
  );
}

/** Liest einen Header-Wert (string | string[]) als getrimmten String. */
export function readHeaderValue(value: unknown): string | undefined {
  if (typeof value === "string") {
    const trimmed = value.trim();
    return trimmed.length > 0 ? trimmed : undefined;
  }

  if (Array.isArray(value) && typeof value[0] === "string") {
    const trimmed = value[0].trim();
    return trimmed.length > 0 ? trimmed : undefined;
  }

  return undefined;
}
