// src/modules/recovery/service.ts
// ============================================================================
// Passwort-Recovery für Spieler-Accounts
// ----------------------------------------------------------------------------
// Ablauf:  validating → composing → dispatching → completed
//          (aborted aus jedem Zustand vor completed)
//
// 1. Vorbedingungen prüfen (Reihenfolge fest, keine Seiteneffekte)
// 2. Temporäres Passwort + Mail-Session + Mail bauen
// 3. Versand-Task abgeben, dann Passwort hashen, im Account setzen und
//    Speicher-Task mit eingefrorener Kopie abgeben
//
// Auf keinen der beiden Tasks wird gewartet. Schlägt der Versand fehl, ist das
// neue Passwort trotzdem gesetzt (der Spieler muss es erneut anfordern).
// ============================================================================

import {
  argon2Hasher,
  generateTemporarySecret,
  type CredentialHasher,
} from "../../libs/crypto.js";
import type { BackgroundTask, TaskExecutor } from "../../libs/executor.js";
import type { Logger } from "../../libs/logger.js";
import {
  buildMailSession,
  type MailSession,
  type TransportProvider,
} from "../../libs/mail.js";
import { recordAccountSave, recordRecoveryOutcome } from "../../libs/metrics.js";
import { hashIdentityForLog } from "../../libs/pii.js";

import { composeRecoveryMail } from "./composer.js";
import { createMailDeliveryTask } from "./delivery.js";
import { RecoveryPreconditionError, StoreError } from "./errors.js";
import type { RecoveryLock, RecoveryLockHandle } from "./lock.js";
import type {
  Account,
  AccountStore,
  ComposedMail,
  RecoveryAbortReason,
  RecoveryCaller,
  RecoveryConfig,
  RecoveryResult,
  RecoveryState,
} from "./types.js";

export const FALLBACK_SERVER_IDENTIFIER = "Game Server";

export interface CredentialRecoveryDeps {
  config: RecoveryConfig;
  store: AccountStore;
  executor: TaskExecutor;
  lock: RecoveryLock;
  log: Logger;
  hasher?: CredentialHasher;
  transportProvider?: TransportProvider;
  /** gebundene Adresse des HTTP-Servers, z. B. "10.0.0.5:3000" */
  boundAddress?: () => string | undefined;
  generateSecret?: (length: number) => string;
  now?: () => Date;
}

type RecoveryContext = {
  state: RecoveryState;
  identity?: string;
};

export class CredentialRecoveryWorkflow {
  private readonly config: RecoveryConfig;
  private readonly store: AccountStore;
  private readonly executor: TaskExecutor;
  private readonly lock: RecoveryLock;
  private readonly log: Logger;
  private readonly hasher: CredentialHasher;
  private readonly transportProvider?: TransportProvider;
  private readonly boundAddress: () => string | undefined;
  private readonly generateSecret: (length: number) => string;
  private readonly now: () => Date;

  constructor(deps: CredentialRecoveryDeps) {
    this.config = deps.config;
    this.store = deps.store;
    this.executor = deps.executor;
    this.lock = deps.lock;
    this.log = deps.log;
    this.hasher = deps.hasher ?? argon2Hasher;
    this.transportProvider = deps.transportProvider;
    this.boundAddress = deps.boundAddress ?? (() => undefined);
    this.generateSecret = deps.generateSecret ?? generateTemporarySecret;
    this.now = deps.now ?? (() => new Date());
  }

  get mailEnabled(): boolean {
    return this.config.mail.enabled;
  }

  /** Neue SMTP-Session (pro Anfrage bzw. pro Healthcheck). */
  createMailSession(): MailSession {
    return buildMailSession(this.config.mail, this.log, this.transportProvider);
  }

  serverIdentifier(): string {
    return this.config.serverIdentifier ?? this.boundAddress() ?? FALLBACK_SERVER_IDENTIFIER;
  }

  async requestRecovery(caller: RecoveryCaller): Promise<RecoveryResult> {
    const ctx: RecoveryContext = { state: "validating" };

    // -----------------------------------------------------------------------
    // validating
    // -----------------------------------------------------------------------
    let account: Account;
    let playerName: string;
    try {
      ({ account, playerName } = await this.validate(caller, ctx));
    } catch (err) {
      if (err instanceof RecoveryPreconditionError) {
        return this.abort(ctx, err.reason);
      }
      this.log.error({ err, identity: ctx.identity }, "recovery_lookup_failed");
      return this.abort(ctx, "command-failed");
    }

    let acquired: RecoveryLockHandle | null;
    try {
      acquired = await this.lock.tryAcquire(account.identity);
    } catch (err) {
      this.log.error({ err, identity: ctx.identity }, "recovery_lock_failed");
      return this.abort(ctx, "command-failed");
    }
    if (!acquired) {
      return this.abort(ctx, "recovery-in-progress");
    }
    const handle = acquired;

    let lockHandedOver = false;
    try {
      // ---------------------------------------------------------------------
      // composing
      // ---------------------------------------------------------------------
      this.transition(ctx, "composing");

      // keine Entropie → fatal, wird nicht in ein Ergebnis übersetzt
      const secret = this.generateSecret(this.config.secretLength);

      const prepared = this.prepareMail(account, playerName, secret);
      if (!prepared) {
        return this.abort(ctx, "command-failed");
      }

      // ---------------------------------------------------------------------
      // dispatching
      // ---------------------------------------------------------------------
      this.transition(ctx, "dispatching");
      const delivery = createMailDeliveryTask(prepared.session, prepared.message, this.log);
      if (!this.executor.submit(delivery)) {
        prepared.session.transporter.close();
        this.log.error({ identity: ctx.identity, task: delivery.name }, "recovery_dispatch_rejected");
        return this.abort(ctx, "command-failed");
      }

      let passwordHash: string;
      try {
        passwordHash = await this.hasher.hash(secret);
      } catch (err) {
        // Mail ist schon unterwegs; das alte Passwort bleibt gültig
        this.log.error({ err, identity: ctx.identity }, "recovery_hash_failed");
        return this.abort(ctx, "command-failed");
      }

      const snapshot = Object.freeze({ ...account, passwordHash });
      const persistence = this.createPersistenceTask(snapshot, handle);
      if (!this.executor.submit(persistence)) {
        // Pool beim Hashen geschlossen: Mail ist raus, gespeichert wird nichts
        this.log.error({ identity: ctx.identity, task: persistence.name }, "recovery_dispatch_rejected");
        return this.abort(ctx, "command-failed");
      }
      account.passwordHash = passwordHash;
      lockHandedOver = true;

      this.transition(ctx, "completed");
      recordRecoveryOutcome("completed");
      this.log.info({ identity: ctx.identity }, "recovery_completed");
      return { ok: true };
    } finally {
      if (!lockHandedOver) await this.releaseLock(handle, ctx);
    }
  }

  // -------------------------------------------------------------------------
  // Vorbedingungen (Reihenfolge ist Teil des Verhaltens)
  // -------------------------------------------------------------------------
  private async validate(
    caller: RecoveryCaller,
    ctx: RecoveryContext,
  ): Promise<{ account: Account; playerName: string }> {
    if (caller.kind !== "player" || !caller.connected) {
      throw this.precondition("players-only");
    }
    ctx.identity = hashIdentityForLog(caller.identity);

    // vor dem Lookup: ohne Mail gibt es nichts zu tun
    if (!this.config.mail.enabled) {
      throw this.precondition("feature-disabled");
    }

    const account = await this.store.lookup(caller.identity);
    if (!account) {
      throw this.precondition("account-not-loaded");
    }
    if (account.loggedIn) {
      throw this.precondition("already-logged-in");
    }
    if (!account.contactAddress) {
      throw this.precondition("no-contact-address");
    }

    return { account, playerName: caller.playerName };
  }

  private prepareMail(
    account: Account,
    playerName: string,
    secret: string,
  ): { session: MailSession; message: ComposedMail } | null {
    let session: MailSession | undefined;
    try {
      session = this.createMailSession();
      const message = composeRecoveryMail(
        { address: account.contactAddress ?? "", name: playerName },
        {
          playerName,
          serverIdentifier: this.serverIdentifier(),
          temporarySecret: secret,
        },
        {
          sender: { address: session.sender.address, name: session.sender.name },
          templates: this.config.templates,
          now: this.now(),
        },
      );
      return { session, message };
    } catch (err) {
      session?.transporter.close();
      this.log.error({ err, identity: hashIdentityForLog(account.identity) }, "recovery_compose_failed");
      return null;
    }
  }

  private createPersistenceTask(snapshot: Readonly<Account>, handle: RecoveryLockHandle): BackgroundTask {
    const identity = hashIdentityForLog(snapshot.identity);

    return {
      name: "account_save",
      key: `account:${snapshot.identity}`,
      run: async () => {
        try {
          await this.store.save(snapshot);
          recordAccountSave(true);
          this.log.info({ identity }, "account_save_succeeded");
        } catch (cause) {
          const err = cause instanceof StoreError ? cause : new StoreError(undefined, { cause });
          recordAccountSave(false);
          this.log.error({ err, identity }, "account_save_failed");
        } finally {
          await this.releaseLock(handle, { state: "completed", identity });
        }
      },
    };
  }

  // -------------------------------------------------------------------------
  // Helpers
  // -------------------------------------------------------------------------
  private precondition(reason: Exclude<RecoveryAbortReason, "command-failed">) {
    return new RecoveryPreconditionError(reason, this.config.messages[reason]);
  }

  private transition(ctx: RecoveryContext, next: RecoveryState): void {
    this.log.debug({ identity: ctx.identity, from: ctx.state, to: next }, "recovery_state_changed");
    ctx.state = next;
  }

  private abort(ctx: RecoveryContext, reason: RecoveryAbortReason): RecoveryResult {
    this.transition(ctx, "aborted");
    recordRecoveryOutcome(reason);
    this.log.info({ identity: ctx.identity, reason }, "recovery_aborted");
    return this.failure(reason);
  }

  private failure(reason: RecoveryAbortReason): RecoveryResult {
    return { ok: false, reason, message: this.config.messages[reason] };
  }

  private async releaseLock(handle: RecoveryLockHandle, ctx: RecoveryContext): Promise<void> {
    try {
      await handle.release();
    } catch (err) {
      this.log.warn({ err, identity: ctx.identity }, "recovery_lock_release_failed");
    }
  }
}
