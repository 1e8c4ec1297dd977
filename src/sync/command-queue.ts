// Copyright (c) 2025 EdgeCoder, LLC
// SPDX-License-Identifier: BUSL-1.1

import { z } from "zod";
import { ApiError } from "../common/errors.js";
import type { CommandQueueConfig } from "../common/config.js";
import type { CommandRecord, CommandType, JsonObject } from "../common/types.js";
import type { CommandStore } from "../db/store.js";

const portionMs = z.number().int().positive();
const profileName = z.string().trim().min(1);

export const scheduleEventSchema = z.object({
  hh: z.number().int().min(0).max(23),
  mm: z.number().int().min(0).max(59),
  portionMs
});

/** Payload shape per command type. Devices receive the parsed output verbatim as `payloadJson`. */
export const commandPayloadSchemas: Record<CommandType, z.ZodType<JsonObject>> = {
  FEED_NOW: z.object({ portionMs }),
  SET_PROFILE: z.object({ profileName }),
  SET_SCHEDULE: z.object({ profileName, events: z.array(scheduleEventSchema) }),
  SET_DEFAULT_PORTION: z.object({ profileName, defaultPortionMs: portionMs }),
  REBOOT: z.record(z.string(), z.unknown()),
  PING: z.record(z.string(), z.unknown())
};

const commandIdSchema = z.string().uuid();

/**
 * Per-device command state machine:
 *   PENDING --claim--> SENT --ack--> ACKED
 *   PENDING|SENT --cancel--> FAILED
 * A SENT command stays due for re-delivery until acked once its lease
 * (`redeliverySec`) has run out.
 */
export class CommandDispatchQueue {
  constructor(
    private readonly store: CommandStore,
    private readonly config: CommandQueueConfig
  ) {
    // a SENT command is never due again while the poll that claimed it may still be in flight
    if (!Number.isInteger(config.redeliverySec) || config.redeliverySec < 1) {
      throw new RangeError(`redeliverySec must be a positive integer, got ${config.redeliverySec}`);
    }
  }

  /** Same queue bound to another store handle, typically a transaction. */
  withStore(store: CommandStore): CommandDispatchQueue {
    return new CommandDispatchQueue(store, this.config);
  }

  async enqueue(deviceId: string, commandType: CommandType, payload: unknown = {}): Promise<CommandRecord> {
    const parsed = commandPayloadSchemas[commandType].safeParse(payload);
    if (!parsed.success) throw ApiError.badRequest("invalid_command_payload");
    return this.store.insertCommand({
      deviceId,
      commandType,
      payload: parsed.data,
      createdAtMs: Date.now()
    });
  }

  async claim(deviceId: string): Promise<CommandRecord[]> {
    const nowMs = Date.now();
    return this.store.claimDueCommands(deviceId, {
      limit: this.config.claimLimit,
      nowMs,
      redeliverBeforeMs: nowMs - this.config.redeliverySec * 1000
    });
  }

  /** Idempotent: ids that are unknown, foreign or already final are ignored. */
  async ack(deviceId: string, commandIds: readonly string[]): Promise<number> {
    const ids = [
      ...new Set(
        commandIds.map((id) => id.trim().toLowerCase()).filter((id) => commandIdSchema.safeParse(id).success)
      )
    ];
    if (ids.length === 0) return 0;
    return this.store.ackCommands(deviceId, ids, Date.now());
  }

  async cancel(deviceId: string, commandId: string): Promise<boolean> {
    if (!commandIdSchema.safeParse(commandId).success) return false;
    return this.store.failCommand(deviceId, commandId);
  }
}
