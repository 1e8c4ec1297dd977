import { describe, expect, test } from "vitest";
import { ConfigError, loadConfig } from "../../src/common/config.js";

const KEY = Buffer.alloc(32, 1).toString("base64");

function configIssues(env: Record<string, string | undefined>): string[] {
  try {
    loadConfig(env);
  } catch (err) {
    if (err instanceof ConfigError) return err.issues.map((i) => i.key);
    throw err;
  }
  return [];
}

describe("config", () => {
  test("applies defaults when only the master key is set", () => {
    const config = loadConfig({ DEVICE_SECRET_ENCRYPTION_KEY: KEY });
    expect(config.server).toEqual({ port: 8080, host: "0.0.0.0", logLevel: "info" });
    expect(config.databaseUrl).toBeUndefined();
    expect(config.deviceAuth).toEqual({
      signatureEnabled: false,
      pollIntervalSec: 60,
      nonceWindowSec: 300,
      maxPollPerMinute: 10
    });
    expect(config.commands).toEqual({ claimLimit: 10, redeliverySec: 10 });
    expect(config.security).toEqual({ encryptionKey: KEY, adminApiToken: "" });
  });

  test("reads overrides and coerces numbers", () => {
    const config = loadConfig({
      DEVICE_SECRET_ENCRYPTION_KEY: KEY,
      PORT: "9090",
      DATABASE_URL: "postgres://feeder:pw@localhost:5432/feeder",
      DEVICE_SIGNATURE_ENABLED: "TRUE",
      DEVICE_NONCE_WINDOW_SEC: "120",
      COMMAND_REDELIVERY_SEC: "30",
      ADMIN_API_TOKEN: "test-admin-token"
    });
    expect(config.server.port).toBe(9090);
    expect(config.databaseUrl).toBe("postgres://feeder:pw@localhost:5432/feeder");
    expect(config.deviceAuth.signatureEnabled).toBe(true);
    expect(config.deviceAuth.nonceWindowSec).toBe(120);
    expect(config.commands.redeliverySec).toBe(30);
    expect(config.security.adminApiToken).toBe("test-admin-token");
  });

  test("accepts 1/0 and yes/no for flags", () => {
    expect(loadConfig({ DEVICE_SECRET_ENCRYPTION_KEY: KEY, DEVICE_SIGNATURE_ENABLED: "1" }).deviceAuth.signatureEnabled).toBe(true);
    expect(loadConfig({ DEVICE_SECRET_ENCRYPTION_KEY: KEY, DEVICE_SIGNATURE_ENABLED: "no" }).deviceAuth.signatureEnabled).toBe(false);
  });

  test("empty values fall back to defaults", () => {
    const config = loadConfig({ DEVICE_SECRET_ENCRYPTION_KEY: KEY, PORT: "", DEVICE_SIGNATURE_ENABLED: " " });
    expect(config.server.port).toBe(8080);
    expect(config.deviceAuth.signatureEnabled).toBe(false);
  });

  test("fails fast listing every offending key", () => {
    expect(
      configIssues({ PORT: "not-a-port", DEVICE_SIGNATURE_ENABLED: "maybe", COMMAND_CLAIM_LIMIT: "11" }).sort()
    ).toEqual(["COMMAND_CLAIM_LIMIT", "DEVICE_SECRET_ENCRYPTION_KEY", "DEVICE_SIGNATURE_ENABLED", "PORT"]);
  });

  test("rejects a zero redelivery lease", () => {
    expect(configIssues({ DEVICE_SECRET_ENCRYPTION_KEY: KEY, COMMAND_REDELIVERY_SEC: "0" })).toEqual([
      "COMMAND_REDELIVERY_SEC"
    ]);
  });

  test("ConfigError message names the keys", () => {
    expect(() => loadConfig({})).toThrow(/DEVICE_SECRET_ENCRYPTION_KEY/);
  });
});
