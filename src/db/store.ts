// Copyright (c) 2025 EdgeCoder, LLC
// SPDX-License-Identifier: BUSL-1.1

import type {
  CommandRecord,
  CommandType,
  DeviceRecord,
  FeedLogFilter,
  FeedLogInput,
  FeedLogRecord,
  JsonObject,
  NewDevice,
  ProfileRecord,
  ScheduleEventInput,
  ScheduleEventRecord
} from "../common/types.js";
import type { NonceStore } from "../security/nonce-guard.js";

export interface DeviceStore {
  findDevice(deviceId: string): Promise<DeviceRecord | null>;
  createDevice(device: NewDevice, createdAtMs: number): Promise<void>;
  updateDeviceStatus(
    deviceId: string,
    update: { seenAtMs: number; status: JsonObject; firmwareVersion?: string }
  ): Promise<void>;
  /** The only writer of secret material: hash and envelope always change together. */
  rotateDeviceSecret(deviceId: string, secretHash: string, encryptedSecret: Buffer): Promise<boolean>;
  setActiveProfile(deviceId: string, profileId: string): Promise<void>;
}

export interface CommandStore {
  insertCommand(input: {
    deviceId: string;
    commandType: CommandType;
    payload: JsonObject;
    createdAtMs: number;
  }): Promise<CommandRecord>;
  /**
   * Atomically selects up to `limit` due commands for the device, oldest first,
   * skipping rows another claimer holds, and marks them SENT at `nowMs`.
   * A SENT command is due again once its `sentAtMs` is strictly before `redeliverBeforeMs`.
   */
  claimDueCommands(
    deviceId: string,
    opts: { limit: number; nowMs: number; redeliverBeforeMs: number }
  ): Promise<CommandRecord[]>;
  /** SENT → ACKED for the device's own ids. Returns the number of rows changed. */
  ackCommands(deviceId: string, commandIds: string[], ackedAtMs: number): Promise<number>;
  /** PENDING|SENT → FAILED. */
  failCommand(deviceId: string, commandId: string): Promise<boolean>;
  getCommand(commandId: string): Promise<CommandRecord | null>;
  listCommands(deviceId: string, limit: number): Promise<CommandRecord[]>;
}

export interface FeedLogStore {
  /** All-or-nothing batch append. */
  insertFeedLogs(deviceId: string, entries: FeedLogInput[]): Promise<void>;
  listFeedLogs(deviceId: string, filter: FeedLogFilter): Promise<FeedLogRecord[]>;
}

/** Profile/schedule read model owned by the management side. */
export interface DeviceConfigStore {
  getActiveProfileName(deviceId: string): Promise<string | null>;
  listProfiles(deviceId: string): Promise<ProfileRecord[]>;
  findProfileByName(deviceId: string, name: string): Promise<ProfileRecord | null>;
  createProfile(deviceId: string, name: string, defaultPortionMs: number): Promise<ProfileRecord>;
  updateProfilePortion(profileId: string, defaultPortionMs: number): Promise<void>;
  replaceSchedule(profileId: string, events: ScheduleEventInput[]): Promise<void>;
  /** Ordered by profile name, then hh, then mm. */
  listSchedule(deviceId: string): Promise<ScheduleEventRecord[]>;
}

export interface FeederStore extends DeviceStore, NonceStore, CommandStore, FeedLogStore, DeviceConfigStore {
  /** Runs `fn` in one transaction. Nested calls join the outer one. */
  transaction<T>(fn: (tx: FeederStore) => Promise<T>): Promise<T>;
  close(): Promise<void>;
}
