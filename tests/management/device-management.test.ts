import { afterEach, beforeEach, describe, expect, test, vi } from "vitest";
import { loadConfig } from "../../src/common/config.js";
import { InMemoryFeederStore } from "../../src/db/memory.js";
import { SecurityEventLogger, type SecurityEvent } from "../../src/audit/security-events.js";
import { SecretEnvelope } from "../../src/security/secret-envelope.js";
import { secretHash } from "../../src/security/secret-hash.js";
import { CommandDispatchQueue } from "../../src/sync/command-queue.js";
import { DeviceManagementService, generateDeviceSecret } from "../../src/management/device-management.js";
import { extractAdminToken } from "../../src/management/admin-routes.js";
import { buildServer, type FeederServer } from "../../src/server.js";

const NOW = 1_700_000_000_000;
const KEY = Buffer.alloc(32, 5).toString("base64");

function setup() {
  const store = new InMemoryFeederStore();
  const envelope = new SecretEnvelope(Buffer.alloc(32, 5));
  const events: SecurityEvent[] = [];
  const queue = new CommandDispatchQueue(store, { claimLimit: 10, redeliverySec: 10 });
  const service = new DeviceManagementService({
    store,
    queue,
    envelope,
    events: new SecurityEventLogger((e) => events.push(e))
  });
  return { store, envelope, events, service };
}

async function logsOf(store: InMemoryFeederStore, deviceId: string) {
  return store.listFeedLogs(deviceId, { limit: 50, offset: 0 });
}

describe("device management", () => {
  beforeEach(() => {
    vi.useFakeTimers({ toFake: ["Date"] });
    vi.setSystemTime(NOW);
  });

  afterEach(() => {
    vi.useRealTimers();
  });

  test("generated secrets are 32 random bytes in base64url", () => {
    const secret = generateDeviceSecret();
    expect(secret).toMatch(/^[A-Za-z0-9_-]{43}$/);
    expect(generateDeviceSecret()).not.toBe(secret);
  });

  test("createDevice stores the hash and sealed secret and returns the secret once", async () => {
    const { service, store, envelope, events } = setup();
    const issued = await service.createDevice("owner-1", "feeder-001", "Kitchen");
    expect(issued.deviceId).toBe("feeder-001");
    expect(issued.note).toBe("Secret is shown once. Store it in firmware config.");

    const device = await store.findDevice("feeder-001");
    expect(device?.secretHash).toBe(secretHash(issued.secret));
    expect(device && envelope.decrypt(device.encryptedSecret)).toBe(issued.secret);
    expect(device?.createdAtMs).toBe(NOW);
    expect(events.map((e) => e.event)).toEqual(["device_created"]);
  });

  test("createDevice rejects duplicates and blank fields", async () => {
    const { service } = setup();
    await service.createDevice("owner-1", "feeder-001", "Kitchen");
    await expect(service.createDevice("owner-1", "feeder-001", "Again")).rejects.toMatchObject({
      statusCode: 409,
      code: "device_id_exists"
    });
    await expect(service.createDevice(" ", "feeder-002", "Hall")).rejects.toMatchObject({
      code: "owner_user_id_required"
    });
    await expect(service.createDevice("owner-1", "feeder-002", "")).rejects.toMatchObject({
      code: "name_required"
    });
  });

  test("rotateSecret replaces the secret and logs the rotation", async () => {
    const { service, store, envelope, events } = setup();
    const first = await service.createDevice("owner-1", "feeder-001", "Kitchen");
    const rotated = await service.rotateSecret("feeder-001");
    expect(rotated.secret).not.toBe(first.secret);

    const device = await store.findDevice("feeder-001");
    expect(device?.secretHash).toBe(secretHash(rotated.secret));
    expect(device && envelope.decrypt(device.encryptedSecret)).toBe(rotated.secret);
    expect((await logsOf(store, "feeder-001")).map((l) => [l.type, l.message])).toEqual([["INFO", "Secret rotated"]]);
    expect(events.at(-1)?.event).toBe("secret_rotated");
  });

  test("unknown devices are 404 for every operation", async () => {
    const { service } = setup();
    await expect(service.rotateSecret("nope")).rejects.toMatchObject({ statusCode: 404, code: "device_not_found" });
    await expect(service.getDevice("nope")).rejects.toMatchObject({ code: "device_not_found" });
    await expect(service.feedNow("nope")).rejects.toMatchObject({ code: "device_not_found" });
    await expect(service.listLogs("nope")).rejects.toMatchObject({ code: "device_not_found" });
  });

  test("createProfile validates portion, name and uniqueness", async () => {
    const { service } = setup();
    await service.createDevice("owner-1", "feeder-001", "Kitchen");
    const profile = await service.createProfile("feeder-001", " weekday ", 1500);
    expect(profile).toMatchObject({ deviceId: "feeder-001", name: "weekday", defaultPortionMs: 1500 });

    await expect(service.createProfile("feeder-001", "weekend", 0)).rejects.toMatchObject({
      code: "default_portion_ms_must_be_positive"
    });
    await expect(service.createProfile("feeder-001", "   ", 1000)).rejects.toMatchObject({
      code: "profile_name_required"
    });
    await expect(service.createProfile("feeder-001", "weekday", 900)).rejects.toMatchObject({
      statusCode: 409,
      code: "profile_name_exists"
    });
  });

  test("setActiveProfile queues SET_PROFILE and records the change", async () => {
    const { service, store } = setup();
    await service.createDevice("owner-1", "feeder-001", "Kitchen");
    await service.createProfile("feeder-001", "weekday", 1500);

    const command = await service.setActiveProfile("feeder-001", "weekday");
    expect(command).toMatchObject({ commandType: "SET_PROFILE", payload: { profileName: "weekday" }, status: "PENDING" });
    expect(await store.getActiveProfileName("feeder-001")).toBe("weekday");
    expect((await logsOf(store, "feeder-001")).map((l) => [l.type, l.message])).toEqual([
      ["PROFILE_CHANGED", "Active profile changed to weekday"]
    ]);
    await expect(service.setActiveProfile("feeder-001", "weekend")).rejects.toMatchObject({
      statusCode: 404,
      code: "profile_not_found"
    });
  });

  test("replaceSchedule validates every event before writing", async () => {
    const { service, store } = setup();
    await service.createDevice("owner-1", "feeder-001", "Kitchen");
    await service.createProfile("feeder-001", "weekday", 1500);

    await expect(
      service.replaceSchedule("feeder-001", "weekday", [
        { hh: 7, mm: 30, portionMs: 1200 },
        { hh: 24, mm: 0, portionMs: 1200 }
      ])
    ).rejects.toMatchObject({ code: "hh_must_be_0_23" });
    await expect(
      service.replaceSchedule("feeder-001", "weekday", [{ hh: 7, mm: 60, portionMs: 1200 }])
    ).rejects.toMatchObject({ code: "mm_must_be_0_59" });
    await expect(
      service.replaceSchedule("feeder-001", "weekday", [{ hh: 7, mm: 0, portionMs: -5 }])
    ).rejects.toMatchObject({ code: "portion_ms_must_be_positive" });
    expect(await store.listSchedule("feeder-001")).toEqual([]);
    expect(await store.listCommands("feeder-001", 10)).toEqual([]);
  });

  test("replaceSchedule swaps the events and pushes SET_SCHEDULE", async () => {
    const { service, store } = setup();
    await service.createDevice("owner-1", "feeder-001", "Kitchen");
    await service.createProfile("feeder-001", "weekday", 1500);
    await service.replaceSchedule("feeder-001", "weekday", [{ hh: 6, mm: 0, portionMs: 900 }]);
    vi.setSystemTime(NOW + 1000);

    const command = await service.replaceSchedule("feeder-001", "weekday", [
      { hh: 18, mm: 15, portionMs: 1100 },
      { hh: 7, mm: 30, portionMs: 1200 }
    ]);
    expect(command.payload).toEqual({
      profileName: "weekday",
      events: [
        { hh: 18, mm: 15, portionMs: 1100 },
        { hh: 7, mm: 30, portionMs: 1200 }
      ]
    });
    expect((await store.listSchedule("feeder-001")).map((e) => [e.hh, e.mm, e.portionMs])).toEqual([
      [7, 30, 1200],
      [18, 15, 1100]
    ]);
    const [latest] = await logsOf(store, "feeder-001");
    expect(latest).toMatchObject({
      type: "SCHEDULE_UPDATED",
      message: "Schedule updated for profile weekday",
      meta: { profileName: "weekday", eventsCount: 2 }
    });
  });

  test("updateDefaultPortion changes the profile and pushes SET_DEFAULT_PORTION", async () => {
    const { service, store } = setup();
    await service.createDevice("owner-1", "feeder-001", "Kitchen");
    await service.createProfile("feeder-001", "weekday", 1500);
    const command = await service.updateDefaultPortion("feeder-001", "weekday", 1800);
    expect(command.payload).toEqual({ profileName: "weekday", defaultPortionMs: 1800 });
    expect((await store.findProfileByName("feeder-001", "weekday"))?.defaultPortionMs).toBe(1800);
  });

  test("feedNow picks requested, then active, then first profile portion, then 1000 ms", async () => {
    const { service, store } = setup();
    await service.createDevice("owner-1", "feeder-001", "Kitchen");
    expect((await service.feedNow("feeder-001")).payload).toEqual({ portionMs: 1000 });

    await service.createProfile("feeder-001", "b-large", 2000);
    await service.createProfile("feeder-001", "a-small", 1500);
    expect((await service.feedNow("feeder-001")).payload).toEqual({ portionMs: 1500 });

    await service.setActiveProfile("feeder-001", "b-large");
    expect((await service.feedNow("feeder-001")).payload).toEqual({ portionMs: 2000 });
    expect((await service.feedNow("feeder-001", 700)).payload).toEqual({ portionMs: 700 });
    await expect(service.feedNow("feeder-001", 0)).rejects.toMatchObject({ code: "portion_ms_must_be_positive" });

    const manual = (await logsOf(store, "feeder-001")).filter((l) => l.type === "MANUAL_FEED");
    expect(manual).toHaveLength(4);
    expect(manual[0]).toMatchObject({ message: "Manual feed requested" });
  });

  test("cancelCommand fails a pending command once", async () => {
    const { service, store } = setup();
    await service.createDevice("owner-1", "feeder-001", "Kitchen");
    const command = await service.enqueueCommand("feeder-001", "REBOOT");
    await service.cancelCommand("feeder-001", command.id);
    expect((await store.getCommand(command.id))?.status).toBe("FAILED");
    await expect(service.cancelCommand("feeder-001", command.id)).rejects.toMatchObject({
      statusCode: 404,
      code: "command_not_cancellable"
    });
  });

  test("listLogs filters by type and text and pages by size", async () => {
    const { service, store } = setup();
    await service.createDevice("owner-1", "feeder-001", "Kitchen");
    await store.insertFeedLogs("feeder-001", [
      { tsMs: NOW - 3000, type: "FEED", message: "Fed 1500 ms", meta: {} },
      { tsMs: NOW - 2000, type: "ERROR", message: "Motor stalled", meta: {} },
      { tsMs: NOW - 1000, type: "FEED", message: "Fed 900 ms", meta: {} }
    ]);

    expect((await service.listLogs("feeder-001", { type: " feed " })).map((l) => l.message)).toEqual([
      "Fed 900 ms",
      "Fed 1500 ms"
    ]);
    expect((await service.listLogs("feeder-001", { query: "MOTOR" })).map((l) => l.message)).toEqual([
      "Motor stalled"
    ]);
    expect((await service.listLogs("feeder-001", { page: 1, size: 1 })).map((l) => l.message)).toEqual([
      "Motor stalled"
    ]);
    expect(await service.listLogs("feeder-001", { size: 0 })).toHaveLength(1);
  });

  test("getDevice reports online within two minutes of the last poll", async () => {
    const { service, store } = setup();
    await service.createDevice("owner-1", "feeder-001", "Kitchen");
    expect(await service.getDevice("feeder-001")).toMatchObject({ online: false, lastSeenAtMs: null, status: {} });

    await store.updateDeviceStatus("feeder-001", { seenAtMs: NOW, status: { fw: "1.0.3" }, firmwareVersion: "1.0.3" });
    vi.setSystemTime(NOW + 119_000);
    expect(await service.getDevice("feeder-001")).toMatchObject({
      online: true,
      firmwareVersion: "1.0.3",
      status: { fw: "1.0.3" }
    });
    vi.setSystemTime(NOW + 120_000);
    expect((await service.getDevice("feeder-001")).online).toBe(false);
  });
});

describe("admin routes", () => {
  let server: FeederServer | undefined;

  async function start(adminApiToken: string) {
    const events: SecurityEvent[] = [];
    server = await buildServer({
      config: loadConfig({ DEVICE_SECRET_ENCRYPTION_KEY: KEY, ADMIN_API_TOKEN: adminApiToken }),
      store: new InMemoryFeederStore(),
      events: new SecurityEventLogger((e) => events.push(e)),
      requestLogging: false
    });
    return { app: server.app, events };
  }

  afterEach(async () => {
    await server?.app.close();
    server = undefined;
  });

  const auth = { authorization: "Bearer test-admin-token" };

  test("rejects requests without the admin token", async () => {
    const { app, events } = await start("test-admin-token");
    const res = await app.inject({ method: "GET", url: "/api/admin/devices/feeder-001" });
    expect(res.statusCode).toBe(401);
    expect(res.json()).toEqual({ error: "admin_token_required" });
    expect(events.map((e) => e.event)).toEqual(["admin_auth_failed"]);

    const wrong = await app.inject({
      method: "GET",
      url: "/api/admin/devices/feeder-001",
      headers: { "x-admin-token": "other-token" }
    });
    expect(wrong.statusCode).toBe(401);
  });

  test("leaves the admin surface open when no token is configured", async () => {
    const { app } = await start("");
    const res = await app.inject({
      method: "POST",
      url: "/api/admin/devices",
      payload: { ownerUserId: "owner-1", deviceId: "feeder-001", name: "Kitchen" }
    });
    expect(res.statusCode).toBe(201);
  });

  test("provisions a device and manages its profile over HTTP", async () => {
    const { app } = await start("test-admin-token");
    const created = await app.inject({
      method: "POST",
      url: "/api/admin/devices",
      headers: auth,
      payload: { ownerUserId: "owner-1", deviceId: "feeder-001", name: "Kitchen" }
    });
    expect(created.statusCode).toBe(201);
    expect(created.json()).toMatchObject({ deviceId: "feeder-001" });

    const profile = await app.inject({
      method: "POST",
      url: "/api/admin/devices/feeder-001/profiles",
      headers: { "x-admin-token": "test-admin-token" },
      payload: { name: "weekday", defaultPortionMs: 1500 }
    });
    expect(profile.statusCode).toBe(201);

    const activated = await app.inject({
      method: "POST",
      url: "/api/admin/devices/feeder-001/active-profile",
      headers: auth,
      payload: { profileName: "weekday" }
    });
    expect(activated.json()).toMatchObject({ ok: true });

    const device = await app.inject({ method: "GET", url: "/api/admin/devices/feeder-001", headers: auth });
    expect(device.statusCode).toBe(200);
    expect(device.json()).toMatchObject({
      deviceId: "feeder-001",
      activeProfile: "weekday",
      profiles: [{ name: "weekday", defaultPortionMs: 1500 }],
      online: false
    });
    expect(device.json()).not.toHaveProperty("encryptedSecret");
  });

  test("feed-now accepts an empty body and shows up in the command list", async () => {
    const { app } = await start("test-admin-token");
    await app.inject({
      method: "POST",
      url: "/api/admin/devices",
      headers: auth,
      payload: { ownerUserId: "owner-1", deviceId: "feeder-001", name: "Kitchen" }
    });
    const fed = await app.inject({ method: "POST", url: "/api/admin/devices/feeder-001/feed-now", headers: auth });
    expect(fed.statusCode).toBe(200);
    const { commandId } = fed.json<{ commandId: string }>();

    const list = await app.inject({ method: "GET", url: "/api/admin/devices/feeder-001/commands", headers: auth });
    expect(list.json<{ commands: Array<{ id: string; payload: unknown }> }>().commands).toMatchObject([
      { id: commandId, commandType: "FEED_NOW", payload: { portionMs: 1000 }, status: "PENDING" }
    ]);

    const cancelled = await app.inject({
      method: "POST",
      url: `/api/admin/devices/feeder-001/commands/${commandId}/cancel`,
      headers: auth
    });
    expect(cancelled.json()).toEqual({ ok: true });
  });

  test("maps validation failures to 400", async () => {
    const { app } = await start("test-admin-token");
    await app.inject({
      method: "POST",
      url: "/api/admin/devices",
      headers: auth,
      payload: { ownerUserId: "owner-1", deviceId: "feeder-001", name: "Kitchen" }
    });
    const badType = await app.inject({
      method: "POST",
      url: "/api/admin/devices/feeder-001/commands",
      headers: auth,
      payload: { commandType: "SELF_DESTRUCT" }
    });
    expect(badType.statusCode).toBe(400);
    expect(badType.json()).toEqual({ error: "validation_error" });

    const badPayload = await app.inject({
      method: "POST",
      url: "/api/admin/devices/feeder-001/commands",
      headers: auth,
      payload: { commandType: "FEED_NOW", payload: { portionMs: "lots" } }
    });
    expect(badPayload.json()).toEqual({ error: "invalid_command_payload" });

    const missing = await app.inject({ method: "GET", url: "/api/admin/devices/feeder-404", headers: auth });
    expect(missing.statusCode).toBe(404);
    expect(missing.json()).toEqual({ error: "device_not_found" });
  });

  test("lists logs with query filters", async () => {
    const { app } = await start("test-admin-token");
    await app.inject({
      method: "POST",
      url: "/api/admin/devices",
      headers: auth,
      payload: { ownerUserId: "owner-1", deviceId: "feeder-001", name: "Kitchen" }
    });
    await app.inject({ method: "POST", url: "/api/admin/devices/feeder-001/rotate-secret", headers: auth });
    await app.inject({
      method: "POST",
      url: "/api/admin/devices/feeder-001/feed-now",
      headers: auth,
      payload: { portionMs: 800 }
    });

    const res = await app.inject({
      method: "GET",
      url: "/api/admin/devices/feeder-001/logs?type=manual_feed&size=5",
      headers: auth
    });
    expect(res.json<{ logs: Array<{ type: string; meta: unknown }> }>().logs).toMatchObject([
      { type: "MANUAL_FEED", meta: { portionMs: 800 } }
    ]);
  });
});

describe("extractAdminToken", () => {
  test("reads the custom header or a bearer token", () => {
    expect(extractAdminToken({ "x-admin-token": "test-admin-token" })).toBe("test-admin-token");
    expect(extractAdminToken({ authorization: "Bearer  test-admin-token " })).toBe("test-admin-token");
    expect(extractAdminToken({ authorization: "Basic abc" })).toBeUndefined();
    expect(extractAdminToken({})).toBeUndefined();
  });
});
