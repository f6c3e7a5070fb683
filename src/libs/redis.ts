// ============================================================================
// src/libs/redis.ts
// ----------------------------------------------------------------------------
// Optionale Redis-Integration (ioredis v5)
// - nur aktiv, wenn env.REDIS_URL gesetzt ist
// - globaler Singleton-Client (lazyConnect)
// - Short Locks (SET NX PX) für den Recovery-Lock über mehrere Instanzen
// ============================================================================
import { Redis } from "ioredis";
import { randomUUID } from "node:crypto";
import { env } from "./env.js";
import { sha256 } from "./pii.js";

// globaler Cache für Singleton (verhindert Mehrfachverbindungen im Dev)
const GLOBAL_KEY = "__recovery_service_redis__" as const;
type GlobalWithRedis = typeof globalThis & { [GLOBAL_KEY]?: Redis };
const g = globalThis as GlobalWithRedis;

const DEFAULT_LOCK_TTL_MS = 30_000;

// -----------------------------
// Client-Erzeugung
// -----------------------------
function createClient(url: string): Redis {
  const client = new Redis(url, {
    lazyConnect: true,
    enableReadyCheck: true,
    maxRetriesPerRequest: 3,
    retryStrategy: (times: number) => Math.min(1000 * times, 10_000),
  });

  client.on("error", (err) => console.error("[redis] error", err));
  return client;
}

/**
 * Liefert den Singleton-Client oder null, wenn Redis nicht konfiguriert ist.
 */
export function getRedis(): Redis | null {
  if (!env.REDIS_URL) return null;
  return g[GLOBAL_KEY] ?? (g[GLOBAL_KEY] = createClient(env.REDIS_URL));
}

// -----------------------------
// Health & Lifecycle
// -----------------------------
export async function ensureRedis(client: Redis): Promise<void> {
  if (client.status === "wait" || client.status === "end") {
    await client.connect();
  }
  await client.ping();
}

export async function redisHealth(client: Redis): Promise<{ ok: boolean; mode: string }> {
  try {
    const pong = await client.ping();
    return { ok: pong === "PONG", mode: client.status };
  } catch {
    return { ok: false, mode: client.status };
  }
}

export async function quitRedis(client: Redis): Promise<void> {
  try {
    await client.quit();
  } catch {
    client.disconnect();
  }
}

// -----------------------------
// Short Locks (Redis SET NX PX)
// -----------------------------
export type RedisLockHandle = {
  key: string;
  token: string;
};

export function lockKey(namespace: string, scope: string, resource: string): string {
  return [namespace, "lock", scope, sha256(resource)].join(":");
}

export async function acquireShortLock(
  client: Redis,
  opts: {
    namespace: string;
    scope: string;
    resource: string;
    ttlMs?: number;
  },
): Promise<{ acquired: boolean; lock?: RedisLockHandle }> {
  const ttlMs = Math.max(1_000, Math.floor(opts.ttlMs ?? DEFAULT_LOCK_TTL_MS));
  const keyName = lockKey(opts.namespace, opts.scope, opts.resource);
  const token = randomUUID();
  const result = await client.set(keyName, token, "PX", ttlMs, "NX");
  if (result !== "OK") return { acquired: false };
  return {
    acquired: true,
    lock: {
      key: keyName,
      token,
    },
  };
}

export async function releaseShortLock(
  client: Redis,
  lock: RedisLockHandle,
): Promise<boolean> {
  // ACL-minimal ohne EVAL:
  // Wenn der Lock-Token nicht mehr passt, wird nicht gelöscht.
  const current = await client.get(lock.key);
  if (current !== lock.token) return false;
  return (await client.del(lock.key)) === 1;
}
