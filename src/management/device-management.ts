// Copyright (c) 2025 EdgeCoder, LLC
// SPDX-License-Identifier: BUSL-1.1

import { randomBytes } from "node:crypto";
import { ApiError } from "../common/errors.js";
import { log } from "../common/logger.js";
import type {
  CommandRecord,
  CommandType,
  FeedLogRecord,
  JsonObject,
  ProfileRecord,
  ScheduleEventInput,
  ScheduleEventRecord
} from "../common/types.js";
import type { FeederStore } from "../db/store.js";
import { SecurityEventLogger } from "../audit/security-events.js";
import type { SecretEnvelope } from "../security/secret-envelope.js";
import { secretHash } from "../security/secret-hash.js";
import type { CommandDispatchQueue } from "../sync/command-queue.js";

const ONLINE_WINDOW_MS = 2 * 60_000;
const DEFAULT_PORTION_MS = 1000;
const MAX_LOG_PAGE_SIZE = 200;

export interface DeviceSecretIssued {
  deviceId: string;
  secret: string;
  note: string;
}

export interface DeviceDetails {
  deviceId: string;
  ownerUserId: string;
  name: string;
  online: boolean;
  lastSeenAtMs: number | null;
  firmwareVersion: string | null;
  status: JsonObject;
  activeProfile: string | null;
  profiles: ProfileRecord[];
  schedule: ScheduleEventRecord[];
}

export interface LogQuery {
  type?: string;
  query?: string;
  page?: number;
  size?: number;
}

/** 32 random bytes, base64url. */
export function generateDeviceSecret(): string {
  return randomBytes(32).toString("base64url");
}

function required(value: string | undefined, code: string): string {
  const trimmed = value?.trim();
  if (!trimmed) throw ApiError.badRequest(code);
  return trimmed;
}

function positivePortion(value: number, code: string): number {
  if (!Number.isInteger(value) || value <= 0) throw ApiError.badRequest(code);
  return value;
}

function validateScheduleEvent(event: ScheduleEventInput): ScheduleEventInput {
  if (!Number.isInteger(event.hh) || event.hh < 0 || event.hh > 23) {
    throw ApiError.badRequest("hh_must_be_0_23");
  }
  if (!Number.isInteger(event.mm) || event.mm < 0 || event.mm > 59) {
    throw ApiError.badRequest("mm_must_be_0_59");
  }
  positivePortion(event.portionMs, "portion_ms_must_be_positive");
  return { hh: event.hh, mm: event.mm, portionMs: event.portionMs };
}

export interface DeviceManagementDeps {
  store: FeederStore;
  queue: CommandDispatchQueue;
  envelope: SecretEnvelope;
  events?: SecurityEventLogger;
}

/**
 * Operator-side writes: device provisioning, secret rotation, profile and
 * schedule edits. Every config change is pushed to the device as a command
 * and recorded in its feed log.
 */
export class DeviceManagementService {
  private readonly events: SecurityEventLogger;

  constructor(private readonly deps: DeviceManagementDeps) {
    this.events = deps.events ?? new SecurityEventLogger();
  }

  async createDevice(ownerUserId: string, deviceId: string, name: string): Promise<DeviceSecretIssued> {
    const owner = required(ownerUserId, "owner_user_id_required");
    const id = required(deviceId, "device_id_required");
    const displayName = required(name, "name_required");
    if (await this.deps.store.findDevice(id)) throw ApiError.conflict("device_id_exists");

    const secret = generateDeviceSecret();
    await this.deps.store.createDevice(
      {
        deviceId: id,
        ownerUserId: owner,
        name: displayName,
        secretHash: secretHash(secret),
        encryptedSecret: this.deps.envelope.encrypt(secret)
      },
      Date.now()
    );
    log.info("device created", { deviceId: id, ownerUserId: owner });
    this.events.record("device_created", { deviceId: id });
    return { deviceId: id, secret, note: "Secret is shown once. Store it in firmware config." };
  }

  async rotateSecret(deviceId: string): Promise<DeviceSecretIssued> {
    await this.requireDevice(deviceId);
    const secret = generateDeviceSecret();
    await this.deps.store.rotateDeviceSecret(deviceId, secretHash(secret), this.deps.envelope.encrypt(secret));
    await this.appendLog(deviceId, "INFO", "Secret rotated");
    this.events.record("secret_rotated", { deviceId });
    return { deviceId, secret, note: "Secret rotated and shown once." };
  }

  async getDevice(deviceId: string): Promise<DeviceDetails> {
    const device = await this.requireDevice(deviceId);
    const [activeProfile, profiles, schedule] = await Promise.all([
      this.deps.store.getActiveProfileName(deviceId),
      this.deps.store.listProfiles(deviceId),
      this.deps.store.listSchedule(deviceId)
    ]);
    const lastSeenAtMs = device.lastSeenAtMs ?? null;
    return {
      deviceId: device.deviceId,
      ownerUserId: device.ownerUserId,
      name: device.name,
      online: lastSeenAtMs !== null && lastSeenAtMs > Date.now() - ONLINE_WINDOW_MS,
      lastSeenAtMs,
      firmwareVersion: device.firmwareVersion ?? null,
      status: device.lastStatus ?? {},
      activeProfile,
      profiles,
      schedule
    };
  }

  async createProfile(deviceId: string, name: string, defaultPortionMs: number): Promise<ProfileRecord> {
    await this.requireDevice(deviceId);
    positivePortion(defaultPortionMs, "default_portion_ms_must_be_positive");
    const profileName = required(name, "profile_name_required");
    if (await this.deps.store.findProfileByName(deviceId, profileName)) {
      throw ApiError.conflict("profile_name_exists");
    }
    return this.deps.store.createProfile(deviceId, profileName, defaultPortionMs);
  }

  async setActiveProfile(deviceId: string, profileName: string): Promise<CommandRecord> {
    await this.requireDevice(deviceId);
    const profile = await this.requireProfile(deviceId, profileName);
    return this.deps.store.transaction(async (tx) => {
      await tx.setActiveProfile(deviceId, profile.id);
      const command = await this.deps.queue.withStore(tx).enqueue(deviceId, "SET_PROFILE", {
        profileName: profile.name
      });
      await tx.insertFeedLogs(deviceId, [
        { tsMs: Date.now(), type: "PROFILE_CHANGED", message: `Active profile changed to ${profile.name}`, meta: {} }
      ]);
      return command;
    });
  }

  async replaceSchedule(
    deviceId: string,
    profileName: string,
    events: ScheduleEventInput[]
  ): Promise<CommandRecord> {
    await this.requireDevice(deviceId);
    const profile = await this.requireProfile(deviceId, profileName);
    const validated = events.map(validateScheduleEvent);
    return this.deps.store.transaction(async (tx) => {
      await tx.replaceSchedule(profile.id, validated);
      const command = await this.deps.queue.withStore(tx).enqueue(deviceId, "SET_SCHEDULE", {
        profileName: profile.name,
        events: validated
      });
      await tx.insertFeedLogs(deviceId, [
        {
          tsMs: Date.now(),
          type: "SCHEDULE_UPDATED",
          message: `Schedule updated for profile ${profile.name}`,
          meta: { profileName: profile.name, eventsCount: validated.length }
        }
      ]);
      return command;
    });
  }

  async updateDefaultPortion(deviceId: string, profileName: string, defaultPortionMs: number): Promise<CommandRecord> {
    await this.requireDevice(deviceId);
    positivePortion(defaultPortionMs, "default_portion_ms_must_be_positive");
    const profile = await this.requireProfile(deviceId, profileName);
    return this.deps.store.transaction(async (tx) => {
      await tx.updateProfilePortion(profile.id, defaultPortionMs);
      return this.deps.queue.withStore(tx).enqueue(deviceId, "SET_DEFAULT_PORTION", {
        profileName: profile.name,
        defaultPortionMs
      });
    });
  }

  async feedNow(deviceId: string, portionMs?: number): Promise<CommandRecord> {
    await this.requireDevice(deviceId);
    const portion = await this.resolvePortion(deviceId, portionMs);
    const command = await this.deps.queue.enqueue(deviceId, "FEED_NOW", { portionMs: portion });
    await this.appendLog(deviceId, "MANUAL_FEED", "Manual feed requested", { portionMs: portion });
    return command;
  }

  async enqueueCommand(deviceId: string, commandType: CommandType, payload: unknown = {}): Promise<CommandRecord> {
    await this.requireDevice(deviceId);
    return this.deps.queue.enqueue(deviceId, commandType, payload);
  }

  async cancelCommand(deviceId: string, commandId: string): Promise<void> {
    await this.requireDevice(deviceId);
    if (!(await this.deps.queue.cancel(deviceId, commandId))) {
      throw ApiError.notFound("command_not_cancellable");
    }
  }

  async listCommands(deviceId: string, limit = 50): Promise<CommandRecord[]> {
    await this.requireDevice(deviceId);
    return this.deps.store.listCommands(deviceId, Math.max(1, Math.min(limit, MAX_LOG_PAGE_SIZE)));
  }

  async listLogs(deviceId: string, query: LogQuery = {}): Promise<FeedLogRecord[]> {
    await this.requireDevice(deviceId);
    const size = Math.max(1, Math.min(query.size ?? 50, MAX_LOG_PAGE_SIZE));
    const page = Math.max(query.page ?? 0, 0);
    return this.deps.store.listFeedLogs(deviceId, {
      type: query.type?.trim().toUpperCase() || undefined,
      query: query.query?.trim() || undefined,
      limit: size,
      offset: page * size
    });
  }

  private async requireDevice(deviceId: string) {
    const device = await this.deps.store.findDevice(deviceId);
    if (!device) throw ApiError.notFound("device_not_found");
    return device;
  }

  private async requireProfile(deviceId: string, profileName: string): Promise<ProfileRecord> {
    const name = required(profileName, "profile_name_required");
    const profile = await this.deps.store.findProfileByName(deviceId, name);
    if (!profile) throw ApiError.notFound("profile_not_found");
    return profile;
  }

  /** Requested portion, else the active profile's default, else the first profile's, else 1000 ms. */
  private async resolvePortion(deviceId: string, requested: number | undefined): Promise<number> {
    if (requested !== undefined) return positivePortion(requested, "portion_ms_must_be_positive");
    const active = await this.deps.store.getActiveProfileName(deviceId);
    if (active) {
      const profile = await this.deps.store.findProfileByName(deviceId, active);
      if (profile) return profile.defaultPortionMs;
    }
    const [first] = await this.deps.store.listProfiles(deviceId);
    return first?.defaultPortionMs ?? DEFAULT_PORTION_MS;
  }

  private async appendLog(deviceId: string, type: string, message: string, meta: JsonObject = {}): Promise<void> {
    await this.deps.store.insertFeedLogs(deviceId, [{ tsMs: Date.now(), type, message, meta }]);
  }
}
