// Copyright (c) 2025 EdgeCoder, LLC
// SPDX-License-Identifier: BUSL-1.1

import { z } from "zod";
import { ApiError } from "../common/errors.js";
import { createLogger } from "../common/logger.js";
import {
  type FeedLogInput,
  type PollConfig,
  type PollLogItem,
  type PollResponse,
  isJsonObject
} from "../common/types.js";
import type { FeederStore } from "../db/store.js";
import { SecurityEventLogger } from "../audit/security-events.js";
import type { DeviceAuthenticator } from "../security/device-auth.js";
import type { PollRateLimiter } from "../security/poll-rate-limiter.js";
import type { CommandDispatchQueue } from "./command-queue.js";

/* ------------------------------------------------------------------ */
/*  Zod request-body schema (exported for direct unit-testing)        */
/* ------------------------------------------------------------------ */

const pollStatusSchema = z
  .object({
    fw: z.string().optional(),
    uptimeSec: z.number().optional(),
    rssi: z.number().optional(),
    error: z.string().nullable().optional(),
    lastFeedTs: z.number().nullable().optional()
  })
  .passthrough();

const pollLogItemSchema = z.object({
  ts: z.number().default(0),
  type: z.string().nullable().optional(),
  msg: z.string().nullable().optional(),
  meta: z.record(z.string(), z.unknown()).nullable().optional()
});

export const pollRequestSchema = z.object({
  deviceId: z.string().trim().min(1),
  ts: z.number().int().default(0),
  status: pollStatusSchema.nullable().optional(),
  log: z.array(pollLogItemSchema).nullable().optional(),
  ack: z.array(z.string()).nullable().optional()
});

export type ParsedPollRequest = z.infer<typeof pollRequestSchema>;

export interface PollInput {
  rawBody: Buffer;
  headerDeviceId?: string;
  nonce?: string;
  signature?: string;
  ip?: string;
}

export interface PollServiceDeps {
  store: FeederStore;
  queue: CommandDispatchQueue;
  limiter: PollRateLimiter;
  authenticator: DeviceAuthenticator;
  pollIntervalSec: number;
  events?: SecurityEventLogger;
}

const pollLog = createLogger("poll");

/** 9999-12-31T23:59:59Z; device clocks past this are treated as unset. */
const MAX_LOG_TS_SEC = 253_402_300_799;

/**
 * Blank or missing type becomes INFO. The ts is whole epoch seconds (fractions
 * are dropped); a non-positive or out-of-range ts means "now".
 */
export function toFeedLogInput(item: PollLogItem, nowMs: number): FeedLogInput {
  const type = item.type?.trim();
  const tsSec = Math.trunc(item.ts);
  return {
    tsMs: tsSec > 0 && tsSec <= MAX_LOG_TS_SEC ? tsSec * 1000 : nowMs,
    type: type ? type.toUpperCase() : "INFO",
    message: item.msg ?? "",
    meta: item.meta ?? {}
  };
}

export function parsePollBody(rawBody: Buffer): ParsedPollRequest {
  let body: unknown;
  try {
    body = JSON.parse(rawBody.toString("utf8"));
  } catch {
    throw ApiError.badRequest("invalid_json");
  }
  if (!isJsonObject(body)) throw ApiError.badRequest("invalid_poll_request");
  const deviceId = body.deviceId;
  if (typeof deviceId !== "string" || deviceId.trim() === "") {
    throw ApiError.badRequest("device_id_required");
  }
  const parsed = pollRequestSchema.safeParse(body);
  if (!parsed.success) throw ApiError.badRequest("invalid_poll_request");
  return parsed.data;
}

export class PollService {
  private readonly events: SecurityEventLogger;

  constructor(private readonly deps: PollServiceDeps) {
    this.events = deps.events ?? new SecurityEventLogger();
  }

  /**
   * Authentication and rate limiting run before any write. The status update
   * commits on its own; log ingestion, acks and the claim share one transaction.
   */
  async handlePoll(input: PollInput): Promise<PollResponse> {
    const request = parsePollBody(input.rawBody);
    const deviceId = request.deviceId;

    if (!this.deps.limiter.allow(deviceId)) {
      this.events.record("poll_rate_limit_exceeded", { deviceId, ip: input.ip });
      throw ApiError.tooManyRequests("poll_rate_limit_exceeded");
    }

    const device = await this.deps.store.findDevice(deviceId);
    if (!device) {
      this.events.record("unknown_device", { deviceId, ip: input.ip });
      throw ApiError.unauthorized("unknown_device");
    }

    await this.deps.authenticator.authenticate({
      device,
      headerDeviceId: input.headerDeviceId,
      nonce: input.nonce,
      signature: input.signature,
      requestTs: request.ts,
      rawBody: input.rawBody,
      ip: input.ip
    });

    const nowMs = Date.now();
    await this.deps.store.updateDeviceStatus(deviceId, {
      seenAtMs: nowMs,
      status: request.status ?? {},
      firmwareVersion: request.status?.fw
    });

    const logs = (request.log ?? []).map((item) => toFeedLogInput(item, nowMs));
    const acks = request.ack ?? [];

    const { claimed, acked } = await this.deps.store.transaction(async (tx) => {
      await tx.insertFeedLogs(deviceId, logs);
      const queue = this.deps.queue.withStore(tx);
      const ackedCount = await queue.ack(deviceId, acks);
      const commands = await queue.claim(deviceId);
      return { claimed: commands, acked: ackedCount };
    });

    const config = await this.configSnapshot(deviceId);

    pollLog.info("poll handled", {
      deviceId,
      logs: logs.length,
      acked,
      delivered: claimed.length,
      mode: this.deps.authenticator.mode
    });

    return {
      serverTime: Math.floor(Date.now() / 1000),
      intervalSec: this.deps.pollIntervalSec,
      commands: claimed.map((c) => ({ id: c.id, commandType: c.commandType, payloadJson: c.payload })),
      config
    };
  }

  private async configSnapshot(deviceId: string): Promise<PollConfig> {
    const [activeProfile, profiles, schedule] = await Promise.all([
      this.deps.store.getActiveProfileName(deviceId),
      this.deps.store.listProfiles(deviceId),
      this.deps.store.listSchedule(deviceId)
    ]);
    return {
      activeProfile,
      profiles: profiles.map((p) => ({ name: p.name, defaultPortionMs: p.defaultPortionMs })),
      schedule: schedule.map((s) => ({ profileName: s.profileName, hh: s.hh, mm: s.mm, portionMs: s.portionMs }))
    };
  }
}
