// src/modules/recovery/lock.ts
// ============================================================================
// Recovery-Lock pro Spieler-Identity
// ----------------------------------------------------------------------------
// - verhindert zwei parallele Passwort-Rotationen für denselben Account
// - wird gehalten, bis der Speicher-Task fertig ist (max. TTL)
// - Redis (SET NX PX) bei mehreren Instanzen, sonst In-Process
// ============================================================================

import type { Redis } from "ioredis";
import type { Logger } from "../../libs/logger.js";
import { acquireShortLock, releaseShortLock } from "../../libs/redis.js";

export interface RecoveryLockHandle {
  release(): Promise<void>;
}

export interface RecoveryLock {
  /** null, wenn bereits eine Recovery für diese Identity läuft */
  tryAcquire(identity: string): Promise<RecoveryLockHandle | null>;
}

export class MemoryRecoveryLock implements RecoveryLock {
  private readonly held = new Map<string, { token: number; expiresAt: number }>();
  private nextToken = 1;

  constructor(
    private readonly ttlMs: number,
    private readonly now: () => number = Date.now,
  ) {}

  async tryAcquire(identity: string): Promise<RecoveryLockHandle | null> {
    const current = this.held.get(identity);
    if (current && current.expiresAt > this.now()) return null;

    const token = this.nextToken++;
    this.held.set(identity, { token, expiresAt: this.now() + this.ttlMs });

    return {
      release: async () => {
        // abgelaufener und neu vergebener Lock gehört jemand anderem
        if (this.held.get(identity)?.token === token) this.held.delete(identity);
      },
    };
  }
}

export class RedisRecoveryLock implements RecoveryLock {
  constructor(
    private readonly client: Redis,
    private readonly namespace: string,
    private readonly ttlMs: number,
    private readonly log: Logger,
  ) {}

  async tryAcquire(identity: string): Promise<RecoveryLockHandle | null> {
    const result = await acquireShortLock(this.client, {
      namespace: this.namespace,
      scope: "recovery",
      resource: identity,
      ttlMs: this.ttlMs,
    });
    const lock = result.lock;
    if (!result.acquired || !lock) return null;

    return {
      release: async () => {
        const released = await releaseShortLock(this.client, lock);
        if (!released) this.log.warn({ key: lock.key }, "recovery_lock_expired_before_release");
      },
    };
  }
}
