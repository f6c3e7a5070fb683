// src/server.ts
// ============================================================================
// Bootstrap für den Account-Recovery-Service
// ----------------------------------------------------------------------------
// Aufgaben:
//  - Prozessstart: buildApp() + listen()
//  - Prozessweite Fehlerwächter (unhandledRejection / uncaughtException)
//  - Geordneter Shutdown mit Timeout-Guard (SIGINT, SIGTERM, SIGUSR2)
//    → app.close() wartet auf offene Mail-/Speicher-Tasks
//  - Node-HTTP Low-Level Timeouts
// ============================================================================

import { buildApp, setReady } from "./app.js";
import { env, logEnvSummary } from "./libs/env.js";

// Maximale Wartezeit für geordnetes Beenden, bevor hart terminiert wird.
const SHUTDOWN_TIMEOUT_MS = Number(process.env.SHUTDOWN_TIMEOUT_MS ?? 10_000);

// HTTP-Timeouts (Node-Server-Ebene, zusätzlich zu Fastify-Optionen)
const REQUEST_TIMEOUT_MS = Number(process.env.REQUEST_TIMEOUT_MS ?? 30_000);
const HEADERS_TIMEOUT_MS = Number(process.env.HEADERS_TIMEOUT_MS ?? 61_000);
const KEEPALIVE_TIMEOUT_MS = Number(process.env.KEEPALIVE_TIMEOUT_MS ?? 65_000);

let app: Awaited<ReturnType<typeof buildApp>> | undefined;
let startingUp = false;
let shuttingDown = false;

/**
 * Loggt über pino, solange die App existiert, sonst über console.
 */
function safeLog(
  level: "info" | "warn" | "error",
  msg: string,
  extra: Record<string, unknown> = {},
) {
  if (app) {
    app.log[level]({ ctx: "server", ...extra }, msg);
    return;
  }
  const fn = level === "error" ? console.error : level === "warn" ? console.warn : console.log;
  fn(msg, extra);
}

// ============================================================================
// Prozessweite Fehlerwächter
// ============================================================================

process.on("unhandledRejection", (reason) => {
  safeLog("error", "unhandled_rejection", { reason });
});

process.on("uncaughtException", (err) => {
  safeLog("error", "uncaught_exception", { err });
  void shutdown("uncaughtException");
});

// ============================================================================
// Start & Listen
// ============================================================================

async function start() {
  if (startingUp) return;
  startingUp = true;

  try {
    app = await buildApp();

    app.server.requestTimeout = REQUEST_TIMEOUT_MS;
    app.server.headersTimeout = HEADERS_TIMEOUT_MS;
    app.server.keepAliveTimeout = KEEPALIVE_TIMEOUT_MS;

    const log = app.log;
    logEnvSummary((msg, extra) => log.info({ config: extra }, msg));

    await app.listen({ host: env.HOST, port: env.PORT });
    setReady(true);

    app.log.info(
      { address: app.server.address(), pid: process.pid, node: process.version },
      "recovery_service_listening",
    );
  } catch (err) {
    // Startfehler → Exit, damit der Orchestrator neu starten kann
    console.error("server_start_failed", err);
    process.exitCode = 1;
    setTimeout(() => process.exit(1), 50);
  }
}

// ============================================================================
// Geordneter Shutdown
// ============================================================================

async function shutdown(reason: string) {
  if (shuttingDown) return;
  shuttingDown = true;

  const killTimer = setTimeout(() => {
    safeLog("error", "shutdown_forced_exit", { timeoutMs: SHUTDOWN_TIMEOUT_MS, reason });
    process.exit(1);
  }, SHUTDOWN_TIMEOUT_MS);
  killTimer.unref();

  try {
    safeLog("info", "shutdown_received", { reason });
    setReady(false);

    if (app) {
      // triggert onClose-Hooks: Worker-Pool drainen, Redis, DB
      await app.close();
      safeLog("info", "server_closed");
    }

    clearTimeout(killTimer);
    process.exit(0);
  } catch (err) {
    safeLog("error", "shutdown_error", { err });
    clearTimeout(killTimer);
    process.exit(1);
  }
}

// SIGINT  = Ctrl+C / `docker stop`
// SIGTERM = Standard-Stop in Docker/Kubernetes
// SIGUSR2 = nodemon im Dev-Modus
process.once("SIGINT", () => void shutdown("SIGINT"));
process.once("SIGTERM", () => void shutdown("SIGTERM"));
process.once("SIGUSR2", () => void shutdown("SIGUSR2"));

void start();
