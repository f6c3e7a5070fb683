// tests/http/recovery.test.ts
import { afterEach, describe, expect, it } from "vitest";
import type { FastifyInstance } from "fastify";
import { buildApp, type AppOptions } from "../../app.js";
import type { RecoveryConfig } from "../../modules/recovery/types.js";
import {
  fakeHasher,
  fakeProvider,
  FakeTransporter,
  makeAccount,
  makeConfig,
  ManualExecutor,
  MemoryAccountStore,
  PLAYER_ID,
} from "../support/fakes.js";

const TOKEN = "test-internal-token";

let app: FastifyInstance | undefined;

async function startApp(overrides: AppOptions = {}) {
  const executor = new ManualExecutor();
  const store = new MemoryAccountStore([makeAccount()]);
  const transporter = new FakeTransporter();

  app = await buildApp({
    logger: false,
    config: makeConfig(),
    store,
    executor,
    hasher: fakeHasher,
    transportProvider: fakeProvider(transporter),
    internalToken: TOKEN,
    healthChecks: { db: async () => ({ ok: true }) },
    ...overrides,
  });
  await app.ready();

  return { app, executor, store, transporter };
}

function forgot(instance: FastifyInstance, payload: object, token: string | null = TOKEN) {
  return instance.inject({
    method: "POST",
    url: "/internal/recovery/forgot",
    headers: token ? { "x-internal-token": token } : {},
    payload,
  });
}

const player = {
  source: "player",
  identity: PLAYER_ID,
  playerName: "Steve",
  connected: true,
};

describe("POST /internal/recovery/forgot", () => {
  afterEach(async () => {
    await app?.close();
    app = undefined;
  });

  it("accepts a connected player and schedules both tasks", async () => {
    const { app, executor, store, transporter } = await startApp();

    const res = await forgot(app, player);

    expect(res.statusCode).toBe(202);
    expect(res.json()).toEqual({
      ok: true,
      message: "A new password was sent to your e-mail address.",
    });
    expect(executor.tasks).toHaveLength(2);

    await executor.runAll();
    expect(transporter.sent).toHaveLength(1);
    expect(store.saved[0]?.passwordHash).toMatch(/^hashed:[A-Za-z0-9]{16}$/);
  });

  it("rejects calls without the internal token", async () => {
    const { app, executor } = await startApp();

    const res = await forgot(app, player, null);

    expect(res.statusCode).toBe(401);
    expect(res.json()).toEqual({
      status: 401,
      error: { code: "UNAUTHORIZED", message: "Missing or invalid internal token." },
    });
    expect(executor.tasks).toHaveLength(0);
  });

  it("rejects a wrong internal token", async () => {
    const { app } = await startApp();

    const res = await forgot(app, player, "wrong-token");

    expect(res.statusCode).toBe(401);
  });

  it("validates the body", async () => {
    const { app } = await startApp();

    const res = await forgot(app, { ...player, identity: "not-a-uuid" });

    expect(res.statusCode).toBe(400);
    expect(res.json()).toMatchObject({
      status: 400,
      error: { code: "VALIDATION_FAILED" },
    });
  });

  it("maps the console caller to 403", async () => {
    const { app } = await startApp();

    const res = await forgot(app, { source: "console" });

    expect(res.statusCode).toBe(403);
    expect(res.json()).toEqual({
      status: 403,
      error: { code: "PLAYERS_ONLY", message: "Only players can reset their password." },
    });
  });

  it("maps disabled mail to 503", async () => {
    const config: RecoveryConfig = makeConfig();
    const { app } = await startApp({ config: { ...config, mail: { ...config.mail, enabled: false } } });

    const res = await forgot(app, player);

    expect(res.statusCode).toBe(503);
    expect(res.json()).toMatchObject({ error: { code: "MAIL_NOT_ENABLED" } });
  });

  it("maps an unknown account to 404", async () => {
    const { app } = await startApp({ store: new MemoryAccountStore() });

    const res = await forgot(app, player);

    expect(res.statusCode).toBe(404);
    expect(res.json()).toMatchObject({ error: { code: "ACCOUNT_NOT_LOADED" } });
  });

  it("maps a logged-in account to 409", async () => {
    const { app } = await startApp({
      store: new MemoryAccountStore([makeAccount({ loggedIn: true })]),
    });

    const res = await forgot(app, player);

    expect(res.statusCode).toBe(409);
    expect(res.json()).toMatchObject({ error: { code: "ALREADY_LOGGED_IN" } });
  });

  it("maps a missing contact address to 422", async () => {
    const { app } = await startApp({
      store: new MemoryAccountStore([makeAccount({ contactAddress: null })]),
    });

    const res = await forgot(app, player);

    expect(res.statusCode).toBe(422);
    expect(res.json()).toMatchObject({ error: { code: "NO_CONTACT_ADDRESS" } });
  });

  it("maps a concurrent request to 409 RECOVERY_IN_PROGRESS", async () => {
    const { app } = await startApp();

    expect((await forgot(app, player)).statusCode).toBe(202);
    const res = await forgot(app, player);

    expect(res.statusCode).toBe(409);
    expect(res.json()).toMatchObject({ error: { code: "RECOVERY_IN_PROGRESS" } });
  });

  it("maps a broken mail configuration to 500 COMMAND_FAILED", async () => {
    const config = makeConfig();
    const { app, executor } = await startApp({
      config: { ...config, mail: { ...config.mail, senderAccount: "" } },
    });

    const res = await forgot(app, player);

    expect(res.statusCode).toBe(500);
    expect(res.json()).toEqual({
      status: 500,
      error: {
        code: "COMMAND_FAILED",
        message: "Error executing command. See the server log for details.",
      },
    });
    expect(executor.tasks).toHaveLength(0);
  });
});
