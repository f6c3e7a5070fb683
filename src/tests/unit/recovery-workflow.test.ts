import { beforeEach, describe, expect, it } from "vitest";
import { WorkerPoolExecutor } from "../../libs/executor.js";
import { getCounter, resetMetrics } from "../../libs/metrics.js";
import { MemoryRecoveryLock } from "../../modules/recovery/lock.js";
import {
  CredentialRecoveryWorkflow,
  FALLBACK_SERVER_IDENTIFIER,
  type CredentialRecoveryDeps,
} from "../../modules/recovery/service.js";
import type { RecoveryCaller } from "../../modules/recovery/types.js";
import {
  createTestLogger,
  fakeHasher,
  fakeProvider,
  FakeTransporter,
  makeAccount,
  makeConfig,
  ManualExecutor,
  MemoryAccountStore,
  PLAYER_ID,
} from "../support/fakes.js";

const SECRET = "Abc123Def456Ghi7";

const player: RecoveryCaller = {
  kind: "player",
  identity: PLAYER_ID,
  playerName: "Steve",
  connected: true,
};

function setup(overrides: Partial<CredentialRecoveryDeps> = {}) {
  const store = new MemoryAccountStore([makeAccount()]);
  const executor = new ManualExecutor();
  const transporter = new FakeTransporter();
  const log = createTestLogger();

  const workflow = new CredentialRecoveryWorkflow({
    config: makeConfig(),
    store,
    executor,
    lock: new MemoryRecoveryLock(30_000),
    log,
    hasher: fakeHasher,
    transportProvider: fakeProvider(transporter),
    generateSecret: () => SECRET,
    ...overrides,
  });

  return { workflow, store, executor, transporter, log };
}

describe("CredentialRecoveryWorkflow", () => {
  beforeEach(() => {
    resetMetrics();
  });

  it("schedules exactly one delivery and one persistence task", async () => {
    const { workflow, store, executor, transporter } = setup();

    await expect(workflow.requestRecovery(player)).resolves.toEqual({ ok: true });

    expect(executor.tasks.map((task) => task.name)).toEqual(["mail_delivery", "account_save"]);
    expect(executor.tasks[1]?.key).toBe(`account:${PLAYER_ID}`);
    // nichts läuft, bevor der Pool die Tasks abarbeitet
    expect(transporter.sent).toHaveLength(0);
    expect(store.saved).toHaveLength(0);

    await executor.runAll();

    expect(transporter.sent).toHaveLength(1);
    expect(transporter.sent[0]).toMatchObject({
      from: { name: "Example Server", address: "noreply@example.test" },
      to: { name: "Steve", address: "steve@example.test" },
      subject: "Your new password for play.example.test",
    });
    expect(transporter.sent[0]?.html).toContain(`<b>${SECRET}</b>`);
    expect(transporter.closed).toBe(1);

    expect(store.saved).toHaveLength(1);
    expect(store.saved[0]?.passwordHash).toBe(`hashed:${SECRET}`);
    expect(Object.isFrozen(store.saved[0])).toBe(true);

    expect(getCounter("recovery_requests_total", { outcome: "completed" })).toBe(1);
    expect(getCounter("recovery_mail_total", { result: "sent" })).toBe(1);
    expect(getCounter("recovery_account_save_total", { result: "saved" })).toBe(1);
  });

  it("generates a secret of the configured length by default", async () => {
    const { workflow, store, executor } = setup({ generateSecret: undefined });

    await workflow.requestRecovery(player);
    await executor.runAll();

    expect(store.saved[0]?.passwordHash).toMatch(/^hashed:[A-Za-z0-9]{16}$/);
  });

  it("refuses the console", async () => {
    const { workflow, store, executor } = setup();

    const result = await workflow.requestRecovery({ kind: "console" });

    expect(result).toEqual({
      ok: false,
      reason: "players-only",
      message: "Only players can reset their password.",
    });
    expect(store.lookups).toBe(0);
    expect(executor.tasks).toHaveLength(0);
  });

  it("refuses a player who is not connected", async () => {
    const { workflow } = setup();

    const result = await workflow.requestRecovery({ ...player, connected: false });

    expect(result).toMatchObject({ ok: false, reason: "players-only" });
  });

  it("aborts before the lookup when mail is disabled", async () => {
    const config = makeConfig();
    const { workflow, store, executor } = setup({
      config: { ...config, mail: { ...config.mail, enabled: false } },
    });

    const result = await workflow.requestRecovery(player);

    expect(result).toMatchObject({ ok: false, reason: "feature-disabled" });
    expect(store.lookups).toBe(0);
    expect(executor.tasks).toHaveLength(0);
  });

  it("reports an unknown account", async () => {
    const { workflow, executor } = setup({ store: new MemoryAccountStore() });

    const result = await workflow.requestRecovery(player);

    expect(result).toMatchObject({ ok: false, reason: "account-not-loaded" });
    expect(executor.tasks).toHaveLength(0);
  });

  it("refuses a logged-in account and leaves the hash alone", async () => {
    const store = new MemoryAccountStore([makeAccount({ loggedIn: true })]);
    const { workflow, executor } = setup({ store });

    const result = await workflow.requestRecovery(player);

    expect(result).toMatchObject({ ok: false, reason: "already-logged-in" });
    expect(executor.tasks).toHaveLength(0);
    expect(store.accounts.get(PLAYER_ID)?.passwordHash).toBe("old-hash");
  });

  it("refuses an account without contact address", async () => {
    const store = new MemoryAccountStore([makeAccount({ contactAddress: null })]);
    const { workflow, executor } = setup({ store });

    const result = await workflow.requestRecovery(player);

    expect(result).toMatchObject({ ok: false, reason: "no-contact-address" });
    expect(executor.tasks).toHaveLength(0);
    expect(getCounter("recovery_requests_total", { outcome: "no-contact-address" })).toBe(1);
  });

  it("still rotates the hash when delivery fails", async () => {
    const { workflow, store, executor, transporter, log } = setup();
    transporter.failWith = new Error("connection refused");

    await expect(workflow.requestRecovery(player)).resolves.toEqual({ ok: true });
    await executor.runAll();

    expect(transporter.sent).toHaveLength(0);
    expect(transporter.closed).toBe(1);
    expect(store.saved[0]?.passwordHash).toBe(`hashed:${SECRET}`);
    expect(log.error).toHaveBeenCalledWith(
      expect.objectContaining({ host: "smtp.example.test" }),
      "mail_delivery_failed",
    );
    expect(getCounter("recovery_mail_total", { result: "failed" })).toBe(1);
  });

  it("fails the command on invalid mail configuration without side effects", async () => {
    const config = makeConfig();
    const { workflow, store, executor, log } = setup({
      config: { ...config, mail: { ...config.mail, senderPassword: "" } },
    });

    const result = await workflow.requestRecovery(player);

    expect(result).toEqual({
      ok: false,
      reason: "command-failed",
      message: "Error executing command. See the server log for details.",
    });
    expect(executor.tasks).toHaveLength(0);
    expect(store.accounts.get(PLAYER_ID)?.passwordHash).toBe("old-hash");
    expect(log.error).toHaveBeenCalledWith(expect.anything(), "recovery_compose_failed");
  });

  it("fails the command when the contact address is malformed", async () => {
    const store = new MemoryAccountStore([makeAccount({ contactAddress: "steve-at-example" })]);
    const { workflow, executor, transporter } = setup({ store });

    const result = await workflow.requestRecovery(player);

    expect(result).toMatchObject({ ok: false, reason: "command-failed" });
    expect(executor.tasks).toHaveLength(0);
    expect(transporter.closed).toBe(1);
  });

  it("fails the command when the lookup throws", async () => {
    const store = new MemoryAccountStore([makeAccount()]);
    store.failLookup = true;
    const { workflow, log } = setup({ store });

    const result = await workflow.requestRecovery(player);

    expect(result).toMatchObject({ ok: false, reason: "command-failed" });
    expect(log.error).toHaveBeenCalledWith(expect.anything(), "recovery_lookup_failed");
  });

  it("keeps the old credential when hashing fails after delivery was scheduled", async () => {
    const lock = new MemoryRecoveryLock(30_000);
    const { workflow, store, executor, log } = setup({
      lock,
      hasher: {
        hash: async () => {
          throw new Error("out of memory");
        },
      },
    });

    const result = await workflow.requestRecovery(player);

    expect(result).toMatchObject({ ok: false, reason: "command-failed" });
    expect(executor.tasks.map((task) => task.name)).toEqual(["mail_delivery"]);
    expect(store.accounts.get(PLAYER_ID)?.passwordHash).toBe("old-hash");
    expect(log.info).toHaveBeenCalledWith(
      { identity: expect.any(String), reason: "command-failed" },
      "recovery_aborted",
    );
    expect(getCounter("recovery_requests_total", { outcome: "command-failed" })).toBe(1);

    // Lock ist wieder frei
    await expect(lock.tryAcquire(PLAYER_ID)).resolves.not.toBeNull();
  });

  it("fails the command when the worker pool is already closed", async () => {
    const lock = new MemoryRecoveryLock(30_000);
    const executor = new WorkerPoolExecutor(createTestLogger(), 1);
    await executor.drain();
    const { workflow, store, transporter, log } = setup({ lock, executor });

    const result = await workflow.requestRecovery(player);

    expect(result).toMatchObject({ ok: false, reason: "command-failed" });
    expect(transporter.sent).toHaveLength(0);
    expect(transporter.closed).toBe(1);
    expect(store.saved).toHaveLength(0);
    expect(log.error).toHaveBeenCalledWith(
      expect.objectContaining({ task: "mail_delivery" }),
      "recovery_dispatch_rejected",
    );
    await expect(lock.tryAcquire(PLAYER_ID)).resolves.not.toBeNull();
  });

  it("fails the command when the persistence task is rejected", async () => {
    const lock = new MemoryRecoveryLock(30_000);
    const store = new MemoryAccountStore([makeAccount()]);
    const { workflow, executor, log } = setup({ lock, store });
    executor.capacity = 1;

    const result = await workflow.requestRecovery(player);

    expect(result).toMatchObject({ ok: false, reason: "command-failed" });
    expect(executor.tasks.map((task) => task.name)).toEqual(["mail_delivery"]);
    expect(log.error).toHaveBeenCalledWith(
      expect.objectContaining({ task: "account_save" }),
      "recovery_dispatch_rejected",
    );
    expect(getCounter("recovery_requests_total", { outcome: "completed" })).toBe(0);
    await expect(lock.tryAcquire(PLAYER_ID)).resolves.not.toBeNull();

    await executor.runAll();
    expect(store.saved).toHaveLength(0);
    expect(store.accounts.get(PLAYER_ID)?.passwordHash).toBe("old-hash");
  });

  it("rejects a second request while the first one is being persisted", async () => {
    const { workflow, executor } = setup();

    await expect(workflow.requestRecovery(player)).resolves.toEqual({ ok: true });
    await expect(workflow.requestRecovery(player)).resolves.toMatchObject({
      ok: false,
      reason: "recovery-in-progress",
    });
    expect(executor.tasks).toHaveLength(2);

    await executor.runAll();
    await expect(workflow.requestRecovery(player)).resolves.toEqual({ ok: true });
  });

  it("logs a failed save and releases the lock", async () => {
    const { workflow, store, executor, log } = setup();
    store.failSave = true;

    await workflow.requestRecovery(player);
    await executor.runAll();

    expect(log.error).toHaveBeenCalledWith(
      expect.objectContaining({ err: expect.objectContaining({ name: "StoreError" }) }),
      "account_save_failed",
    );
    expect(getCounter("recovery_account_save_total", { result: "failed" })).toBe(1);

    store.failSave = false;
    await expect(workflow.requestRecovery(player)).resolves.toEqual({ ok: true });
  });

  it("resolves the server identifier from config, bound address, then fallback", () => {
    const config = makeConfig();

    expect(setup().workflow.serverIdentifier()).toBe("play.example.test");
    expect(
      setup({
        config: { ...config, serverIdentifier: undefined },
        boundAddress: () => "10.0.0.5",
      }).workflow.serverIdentifier(),
    ).toBe("10.0.0.5");
    expect(
      setup({ config: { ...config, serverIdentifier: undefined } }).workflow.serverIdentifier(),
    ).toBe(FALLBACK_SERVER_IDENTIFIER);
  });
});
