// src/libs/db.ts
// ============================================================================
// PostgreSQL Connector
// - Ein zentraler Connection-Pool pro Prozess
// - Healthcheck-Funktionen für /health & Startup-Checks
// - Graceful Shutdown für geordnetes Beenden (z. B. bei SIGTERM)
// ============================================================================

import pg, { type QueryResult, type QueryResultRow } from "pg";
import { env } from "./env.js";

const { Pool } = pg;

// ============================================================================
// Typen
// ============================================================================

/**
 * Minimaler Query-Vertrag, den Pool und PoolClient gleichermaßen erfüllen.
 * Repositories hängen nur hieran (Tests übergeben einen Fake).
 */
export interface Queryable {
  query<R extends QueryResultRow = QueryResultRow>(
    text: string,
    values?: unknown[],
  ): Promise<QueryResult<R>>;
}

// ============================================================================
// Connection-Pool
// ----------------------------------------------------------------------------
// EIN Pool pro Prozess. Der Pool verbindet sich erst bei der ersten Query,
// ein Import ohne DATABASE_URL (Tests) ist daher unkritisch.
// ============================================================================

/**
 * Hinweise:
 * - max: maximale Anzahl gleichzeitiger Verbindungen im Pool
 * - idleTimeoutMillis: wie lange ein ungenutzter Client offen bleibt
 * - connectionTimeoutMillis: Timeout für Verbindungsaufbau
 */
export const pool = new Pool({
  connectionString: env.DATABASE_URL,
  max: 10,
  idleTimeoutMillis: 10_000,
  connectionTimeoutMillis: 5_000,
});

// ============================================================================
// Healthcheck für /health & /health/db
// ============================================================================

/**
 * @returns { ok: true } wenn die DB erreichbar ist,
 *          { ok: false, error: string } bei Fehler
 */
export async function dbHealth(): Promise<{ ok: boolean; error?: string }> {
  try {
    await pool.query("SELECT 1;");
    return { ok: true };
  } catch (err: unknown) {
    const message =
      err instanceof Error ? err.message : "unknown database error";

    return {
      ok: false,
      error: message,
    };
  }
}

// ============================================================================
// Graceful Shutdown
// ============================================================================

/**
 * Beendet den globalen Connection-Pool.
 * Wartet, bis alle ausgeliehenen Clients zurück im Pool sind.
 */
export async function closeDb(): Promise<void> {
  await pool.end();
}
