#!/usr/bin/env node
// Copyright (c) 2025 EdgeCoder, LLC
// SPDX-License-Identifier: BUSL-1.1

import { randomUUID } from "node:crypto";
import { pathToFileURL } from "node:url";
import { request } from "undici";
import { z } from "zod";
import { createLogger } from "../common/logger.js";
import type { PollRequest } from "../common/types.js";
import { canonicalJson } from "../security/canonical-json.js";
import { signBody } from "../security/signature.js";

const simLog = createLogger("sim");

const simEnvSchema = z.object({
  SIM_POLL_URL: z.string().url().default("http://localhost:8080/api/device/poll"),
  SIM_DEVICE_ID: z.string().min(1).default("feeder-001"),
  SIM_DEVICE_SECRET: z.string().default(""),
  SIM_SIGNATURE_ENABLED: z
    .string()
    .default("false")
    .transform((value) => value.trim().toLowerCase() === "true"),
  SIM_INTERVAL_SEC: z.coerce.number().int().positive().default(60)
});

export interface SimulatorConfig {
  pollUrl: string;
  deviceId: string;
  deviceSecret: string;
  signatureEnabled: boolean;
  intervalSec: number;
}

export function simulatorConfigFromEnv(env: Record<string, string | undefined> = process.env): SimulatorConfig {
  const e = simEnvSchema.parse(env);
  if (e.SIM_SIGNATURE_ENABLED && !e.SIM_DEVICE_SECRET) {
    throw new Error("SIM_DEVICE_SECRET is required when SIM_SIGNATURE_ENABLED=true");
  }
  return {
    pollUrl: e.SIM_POLL_URL,
    deviceId: e.SIM_DEVICE_ID,
    deviceSecret: e.SIM_DEVICE_SECRET,
    signatureEnabled: e.SIM_SIGNATURE_ENABLED,
    intervalSec: e.SIM_INTERVAL_SEC
  };
}

export interface SignedPoll {
  payload: string;
  headers: Record<string, string>;
}

export interface PollReply {
  statusCode: number;
  text: string;
}

export type PollTransport = (url: string, poll: SignedPoll) => Promise<PollReply>;

export const undiciTransport: PollTransport = async (url, poll) => {
  const res = await request(url, { method: "POST", headers: poll.headers, body: poll.payload });
  return { statusCode: res.statusCode, text: await res.body.text() };
};

const pollReplySchema = z.object({
  commands: z.array(z.object({ id: z.string(), commandType: z.string() }).passthrough()).default([])
});

/**
 * Stand-in for feeder firmware: reports status, acks whatever the previous
 * poll delivered, and signs the canonical body when signatures are on.
 */
export class DeviceSimulator {
  private ackQueue: string[] = [];
  private uptimeSec = 0;

  constructor(
    private readonly config: SimulatorConfig,
    private readonly transport: PollTransport = undiciTransport
  ) {}

  get pendingAcks(): readonly string[] {
    return this.ackQueue;
  }

  buildBody(nowMs = Date.now()): PollRequest {
    return {
      deviceId: this.config.deviceId,
      ts: Math.floor(nowMs / 1000),
      status: { fw: "1.0.3-sim", uptimeSec: this.uptimeSec, rssi: -55, error: null, lastFeedTs: null },
      log: [],
      ack: [...this.ackQueue]
    };
  }

  sign(body: PollRequest, nonce: string = randomUUID()): SignedPoll {
    const payload = canonicalJson(body);
    const headers: Record<string, string> = { "content-type": "application/json" };
    if (this.config.signatureEnabled) {
      headers["x-device-id"] = this.config.deviceId;
      headers["x-nonce"] = nonce;
      headers["x-sign"] = signBody(payload, this.config.deviceSecret);
    }
    return { payload, headers };
  }

  /** One poll round. Returns the delivered command ids, which are acked on the next round. */
  async pollOnce(): Promise<string[]> {
    this.uptimeSec += this.config.intervalSec;
    const poll = this.sign(this.buildBody());
    const reply = await this.transport(this.config.pollUrl, poll);
    if (reply.statusCode < 200 || reply.statusCode >= 300) {
      simLog.error("poll failed", { statusCode: reply.statusCode, body: reply.text });
      return [];
    }
    let json: unknown;
    try {
      json = JSON.parse(reply.text);
    } catch (err) {
      simLog.error("invalid json from server", { body: reply.text, error: String(err) });
      return [];
    }
    const parsed = pollReplySchema.safeParse(json);
    if (!parsed.success) {
      simLog.error("unexpected poll response", { body: reply.text });
      return [];
    }
    this.ackQueue = parsed.data.commands.map((c) => c.id).filter((id) => id.length > 0);
    if (this.ackQueue.length > 0) {
      simLog.info("received commands", { commands: parsed.data.commands });
    } else {
      simLog.info("heartbeat ok");
    }
    return [...this.ackQueue];
  }

  start(): () => void {
    const tick = () => {
      this.pollOnce().catch((err: unknown) => simLog.error("poll error", { error: String(err) }));
    };
    tick();
    const timer = setInterval(tick, this.config.intervalSec * 1000);
    return () => clearInterval(timer);
  }
}

function isMain(): boolean {
  const entry = process.argv[1];
  return entry !== undefined && import.meta.url === pathToFileURL(entry).href;
}

if (isMain()) {
  const config = simulatorConfigFromEnv();
  simLog.info("simulator started", {
    pollUrl: config.pollUrl,
    deviceId: config.deviceId,
    signatureEnabled: config.signatureEnabled,
    intervalSec: config.intervalSec
  });
  new DeviceSimulator(config).start();
}
