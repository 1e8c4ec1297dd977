// Copyright (c) 2025 EdgeCoder, LLC
// SPDX-License-Identifier: BUSL-1.1

import { z } from "zod";

const booleanFlag = z
  .string()
  .default("false")
  .transform((value) => value.toLowerCase())
  .pipe(z.enum(["true", "false", "1", "0", "yes", "no"]))
  .transform((value) => value === "true" || value === "1" || value === "yes");

const intFromEnv = (fallback: number, min: number, max: number) =>
  z.coerce.number().int().min(min).max(max).default(fallback);

export const envSchema = z.object({
  PORT: intFromEnv(8080, 1, 65535),
  HOST: z.string().min(1).default("0.0.0.0"),
  DATABASE_URL: z.string().url().optional(),
  DEVICE_SIGNATURE_ENABLED: booleanFlag,
  DEVICE_POLL_INTERVAL_SEC: intFromEnv(60, 1, 86_400),
  DEVICE_NONCE_WINDOW_SEC: intFromEnv(300, 1, 86_400),
  DEVICE_MAX_POLL_PER_MINUTE: intFromEnv(10, 1, 10_000),
  COMMAND_CLAIM_LIMIT: intFromEnv(10, 1, 10),
  COMMAND_REDELIVERY_SEC: intFromEnv(10, 1, 86_400),
  DEVICE_SECRET_ENCRYPTION_KEY: z.string().min(1, "must be set"),
  ADMIN_API_TOKEN: z.string().default(""),
  LOG_LEVEL: z.enum(["trace", "debug", "info", "warn", "error", "fatal", "silent"]).default("info")
});

export interface DeviceAuthConfig {
  signatureEnabled: boolean;
  pollIntervalSec: number;
  nonceWindowSec: number;
  maxPollPerMinute: number;
}

export interface CommandQueueConfig {
  claimLimit: number;
  redeliverySec: number;
}

export interface AppConfig {
  server: { port: number; host: string; logLevel: z.infer<typeof envSchema>["LOG_LEVEL"] };
  databaseUrl?: string;
  deviceAuth: DeviceAuthConfig;
  commands: CommandQueueConfig;
  security: { encryptionKey: string; adminApiToken: string };
}

export class ConfigError extends Error {
  constructor(readonly issues: Array<{ key: string; message: string }>) {
    super(`invalid configuration: ${issues.map((i) => `${i.key} ${i.message}`).join("; ")}`);
    this.name = "ConfigError";
  }
}

/** Empty strings count as unset so `FOO=` in an env file falls back to the default. */
function dropEmpty(env: Record<string, string | undefined>): Record<string, string> {
  const out: Record<string, string> = {};
  for (const [key, value] of Object.entries(env)) {
    if (value !== undefined && value.trim() !== "") out[key] = value.trim();
  }
  return out;
}

export function loadConfig(env: Record<string, string | undefined> = process.env): AppConfig {
  const parsed = envSchema.safeParse(dropEmpty(env));
  if (!parsed.success) {
    throw new ConfigError(
      parsed.error.issues.map((issue) => ({ key: issue.path.join("."), message: issue.message }))
    );
  }
  const e = parsed.data;
  return {
    server: { port: e.PORT, host: e.HOST, logLevel: e.LOG_LEVEL },
    databaseUrl: e.DATABASE_URL,
    deviceAuth: {
      signatureEnabled: e.DEVICE_SIGNATURE_ENABLED,
      pollIntervalSec: e.DEVICE_POLL_INTERVAL_SEC,
      nonceWindowSec: e.DEVICE_NONCE_WINDOW_SEC,
      maxPollPerMinute: e.DEVICE_MAX_POLL_PER_MINUTE
    },
    commands: {
      claimLimit: e.COMMAND_CLAIM_LIMIT,
      redeliverySec: e.COMMAND_REDELIVERY_SEC
    },
    security: {
      encryptionKey: e.DEVICE_SECRET_ENCRYPTION_KEY,
      adminApiToken: e.ADMIN_API_TOKEN
    }
  };
}
