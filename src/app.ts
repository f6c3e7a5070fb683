// src/app.ts
// ============================================================================
// Account-Recovery-Service (Fastify)
// ----------------------------------------------------------------------------
// Verantwortlichkeiten:
//  - Zentrales Fastify-Setup (Logger, Request-IDs, Timeouts)
//  - Recovery-Workflow zusammenstecken (Store, Worker-Pool, Lock, Mail)
//  - /health, /healthz, /health/* + /metrics
//  - Internal-Auth vor /internal/recovery
//  - Graceful Shutdown (Worker-Pool, Redis, DB via onClose)
//
// Für Tests lässt sich jede Abhängigkeit über AppOptions ersetzen.
// ============================================================================

import Fastify, {
  type FastifyInstance,
  type FastifyServerOptions,
} from "fastify";
import { randomUUID } from "node:crypto";

import internalAuthPlugin from "./plugins/internal-auth.js";

import type { CredentialHasher } from "./libs/crypto.js";
import { closeDb, dbHealth, pool } from "./libs/db.js";
import { env } from "./libs/env.js";
import { apiError } from "./libs/error-response.js";
import { WorkerPoolExecutor, type TaskExecutor } from "./libs/executor.js";
import { getRouteId } from "./libs/http.js";
import { mailHealth, type TransportProvider } from "./libs/mail.js";
import { recordHttpRequest, renderPrometheusMetrics } from "./libs/metrics.js";
import { ensureRedis, getRedis, quitRedis, redisHealth } from "./libs/redis.js";

import { buildRecoveryConfig, loadMailTemplates } from "./modules/recovery/config.js";
import { MemoryRecoveryLock, RedisRecoveryLock, type RecoveryLock } from "./modules/recovery/lock.js";
import { PgAccountStore } from "./modules/recovery/repository.js";
import recoveryRoutes from "./modules/recovery/routes.js";
import { CredentialRecoveryWorkflow } from "./modules/recovery/service.js";
import type { AccountStore, RecoveryConfig } from "./modules/recovery/types.js";

// ---------------------------------------------------------------------------
// Readiness-Flag (von server.ts über setReady() manipulierbar)
// ---------------------------------------------------------------------------

let isReady = false;

export function setReady(ready: boolean) {
  isReady = ready;
}

type ComponentHealth = { ok: boolean; [key: string]: unknown };

export interface HealthChecks {
  db(): Promise<ComponentHealth>;
  /** nur gesetzt, wenn Redis konfiguriert ist */
  redis?: () => Promise<ComponentHealth>;
}

// Optionale Start-Parameter für Tests / spezielle Umgebungen
export type AppOptions = FastifyServerOptions & {
  config?: RecoveryConfig;
  store?: AccountStore;
  executor?: TaskExecutor;
  lock?: RecoveryLock;
  hasher?: CredentialHasher;
  transportProvider?: TransportProvider;
  internalToken?: string;
  metricsEnabled?: boolean;
  healthChecks?: HealthChecks;
};

// ---------------------------------------------------------------------------
// Hilfsfunktion: Health- und Observability-Routen registrieren
// ---------------------------------------------------------------------------

async function registerHealthRoutes(
  app: FastifyInstance,
  deps: {
    checks: HealthChecks;
    workflow: CredentialRecoveryWorkflow;
    metricsEnabled: boolean;
  },
) {
  const { checks, workflow } = deps;

  const checkSmtp = async (): Promise<ComponentHealth> => {
    if (!workflow.mailEnabled) return { ok: true, status: "disabled" };
    return mailHealth(workflow.createMailSession());
  };

  app.get("/", async () => ({
    ok: true,
    service: "account-recovery-service",
    ts: Date.now(),
  }));

  // Prometheus endpoint (optional per config)
  app.get("/metrics", async (_req, reply) => {
    if (!deps.metricsEnabled) {
      return reply.code(404).send(apiError(404, "NOT_FOUND", "Not found."));
    }
    reply.type("text/plain; version=0.0.4; charset=utf-8");
    return reply.send(renderPrometheusMetrics());
  });

  // Liveness-Check – lebt der Prozess?
  app.get("/healthz", async () => ({ status: "alive", pid: process.pid }));
  app.get("/health/live", async () => ({ status: "alive", pid: process.pid }));

  // Zentrales Health-Aggregat – Docker-Healthcheck hängt an /health
  app.get("/health", async (_req, reply) => {
    const services: Record<string, "ok" | "degraded" | "down" | "disabled"> = {};
    let overall: "ok" | "degraded" | "down" = isReady ? "ok" : "degraded";

    // DB
    try {
      const dh = await checks.db();
      services.db = dh.ok ? "ok" : "down";
      if (!dh.ok) overall = "down";
    } catch (err) {
      services.db = "down";
      overall = "down";
      app.log.error({ err }, "health_db_failed");
    }

    // Redis (nur wenn konfiguriert)
    if (checks.redis) {
      try {
        const rh = await checks.redis();
        services.redis = rh.ok ? "ok" : "down";
        if (!rh.ok) overall = "down";
      } catch (err) {
        services.redis = "down";
        overall = "down";
        app.log.error({ err }, "health_redis_failed");
      }
    }

    // SMTP – Ausfall macht den Service nur "degraded"
    if (!workflow.mailEnabled) {
      services.smtp = "disabled";
    } else {
      try {
        const sh = await checkSmtp();
        services.smtp = sh.ok ? "ok" : "degraded";
      } catch (err) {
        services.smtp = "degraded";
        app.log.warn({ err }, "health_smtp_failed");
      }
      if (services.smtp === "degraded" && overall === "ok") overall = "degraded";
    }

    return reply.code(overall === "down" ? 503 : 200).send({
      status: overall,
      env: env.NODE_ENV,
      ready: isReady,
      services,
      ts: new Date().toISOString(),
    });
  });

  // Detail-Endpoints
  app.get("/health/db", async (_req, reply) => {
    try {
      const dh = await checks.db();
      return reply.code(dh.ok ? 200 : 503).send({ status: dh.ok ? "ok" : "down", ...dh });
    } catch (err) {
      app.log.error({ err }, "health_db_failed");
      return reply.code(503).send({ status: "down" });
    }
  });

  app.get("/health/smtp", async (_req, reply) => {
    try {
      const sh = await checkSmtp();
      return reply.send({ status: sh.ok ? "ok" : "degraded", ...sh });
    } catch (err) {
      app.log.warn({ err }, "health_smtp_failed");
      return reply.code(503).send({ status: "degraded" });
    }
  });
}

// ---------------------------------------------------------------------------
// Haupt-Fabrikfunktion: baut eine Fastify-Instanz
// ---------------------------------------------------------------------------

export async function buildApp(opts: AppOptions = {}): Promise<FastifyInstance> {
  const {
    config,
    store,
    executor,
    lock,
    hasher,
    transportProvider,
    internalToken = env.INTERNAL_API_TOKEN,
    metricsEnabled = env.METRICS_ENABLED,
    healthChecks,
    logger = { level: env.LOG_LEVEL },
    ...rest
  } = opts;

  const app = Fastify({
    logger,
    trustProxy: env.TRUST_PROXY,
    requestIdHeader: env.REQUEST_ID_HEADER,
    requestIdLogLabel: "request_id",
    genReqId: () => randomUUID(),
    requestTimeout: 30_000,
    connectionTimeout: 10_000,
    keepAliveTimeout: 65_000,
    ...rest,
  });

  app.addHook("onRequest", async (request, reply) => {
    request.requestStartedAtNs = process.hrtime.bigint();
    reply.header(env.REQUEST_ID_HEADER, request.id);
  });

  app.addHook("onSend", async (_request, reply, payload) => {
    reply.header("X-Content-Type-Options", "nosniff");
    reply.header("Referrer-Policy", "no-referrer");
    return payload;
  });

  app.addHook("onResponse", async (request, reply) => {
    const started = request.requestStartedAtNs;
    if (!started) return;

    const durationSeconds = Number(process.hrtime.bigint() - started) / 1_000_000_000;
    recordHttpRequest(request.method, getRouteId(request), reply.statusCode, durationSeconds);
  });

  // -------------------------------------------------------------------------
  // Recovery-Abhängigkeiten
  // -------------------------------------------------------------------------
  const redis = getRedis();
  const recoveryConfig = config ?? buildRecoveryConfig(env, loadMailTemplates(env));
  const taskExecutor = executor ?? new WorkerPoolExecutor(app.log, env.TASK_CONCURRENCY);
  const recoveryLock =
    lock ??
    (redis
      ? new RedisRecoveryLock(redis, env.REDIS_NAMESPACE, recoveryConfig.lockTtlMs, app.log)
      : new MemoryRecoveryLock(recoveryConfig.lockTtlMs));

  const workflow = new CredentialRecoveryWorkflow({
    config: recoveryConfig,
    store: store ?? new PgAccountStore(pool),
    executor: taskExecutor,
    lock: recoveryLock,
    log: app.log,
    hasher,
    transportProvider,
    boundAddress: () => {
      const address = app.server.address();
      return address && typeof address === "object" ? address.address : undefined;
    },
  });

  const checks: HealthChecks = healthChecks ?? {
    db: dbHealth,
    redis: redis ? () => redisHealth(redis) : undefined,
  };

  // Redis-Initialisierung (onReady-Hook)
  app.addHook("onReady", async () => {
    if (redis) {
      try {
        await ensureRedis(redis);
        app.log.info("redis_connected");
      } catch (err) {
        app.log.error({ err }, "redis_init_failed");
      }
    }
    isReady = true;
  });

  // -------------------------------------------------------------------------
  // Routen
  // -------------------------------------------------------------------------
  await app.register(async (instance) => {
    await instance.register(internalAuthPlugin, { token: internalToken });
    await instance.register(recoveryRoutes, {
      prefix: "/internal/recovery",
      workflow,
      successMessage: recoveryConfig.messages.success,
    });
  });

  await registerHealthRoutes(app, { checks, workflow, metricsEnabled });

  // Error-/NotFound-Handler
  app.setErrorHandler((err, req, reply) => {
    req.log.error({ err }, "unhandled_error");

    const status = err.statusCode ?? (err.validation ? 400 : 500);
    const code =
      status === 400
        ? "VALIDATION_FAILED"
        : status === 401
          ? "UNAUTHORIZED"
          : status === 404
            ? "NOT_FOUND"
            : "INTERNAL";
    const message = status >= 500 ? "Internal server error." : err.message;

    return reply
      .code(status)
      .type("application/json")
      .send(apiError(status, code, message, err.validation));
  });

  app.setNotFoundHandler((req, reply) => {
    return reply
      .code(404)
      .send(apiError(404, "NOT_FOUND", `Route ${req.method}:${req.url} not found`));
  });

  // Graceful Shutdown Hooks (werden von server.ts via app.close() getriggert)
  app.addHook("onClose", async () => {
    if (taskExecutor.drain) {
      await taskExecutor.drain();
      app.log.info("task_executor_drained");
    }

    if (redis) {
      await quitRedis(redis);
      app.log.info("redis_closed");
    }

    // Tests übergeben eigene Stores; den Pool dann nicht anfassen
    if (!store) {
      try {
        await closeDb();
        app.log.info("db_pool_closed");
      } catch (err) {
        app.log.warn({ err }, "db_shutdown_failed");
      }
    }
  });

  return app;
}
