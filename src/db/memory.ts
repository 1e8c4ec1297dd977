import { randomUUID } from "node:crypto";
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
import { InMemoryNonceStore } from "../security/nonce-guard.js";
import type { FeederStore } from "./store.js";

interface StoredScheduleEvent extends ScheduleEventInput {
  id: string;
  profileId: string;
}

interface MemoryState {
  devices: Map<string, DeviceRecord>;
  profiles: Map<string, ProfileRecord>;
  schedule: StoredScheduleEvent[];
  commands: Map<string, CommandRecord>;
  feedLogs: FeedLogRecord[];
  nonces: InMemoryNonceStore;
  /** Serializes top-level transactions. */
  txTail: Promise<void>;
}

type UndoLog = Array<() => void>;

/**
 * In-memory FeederStore for tests and development.
 * A transaction handle records an undo step for every write it makes; rollback
 * reverts those writes only, so writes made outside the transaction survive it.
 * Nonces are never rolled back.
 */
export class InMemoryFeederStore implements FeederStore {
  private readonly state: MemoryState;

  constructor(
    state?: MemoryState,
    private readonly undo?: UndoLog
  ) {
    this.state = state ?? {
      devices: new Map(),
      profiles: new Map(),
      schedule: [],
      commands: new Map(),
      feedLogs: [],
      nonces: new InMemoryNonceStore(),
      txTail: Promise.resolve()
    };
  }

  async close(): Promise<void> {}

  async transaction<T>(fn: (tx: FeederStore) => Promise<T>): Promise<T> {
    if (this.undo) return fn(this);
    const run = async (): Promise<T> => {
      const undo: UndoLog = [];
      try {
        return await fn(new InMemoryFeederStore(this.state, undo));
      } catch (err) {
        for (const step of undo.reverse()) step();
        throw err;
      }
    };
    const result = this.state.txTail.then(run);
    // the caller observes failures through `result`; the tail only orders the next transaction
    this.state.txTail = result.then(
      () => undefined,
      () => undefined
    );
    return result;
  }

  /** Sets a record; rollback restores the previous one unless someone else has replaced it since. */
  private put<V>(collection: Map<string, V>, key: string, value: V): void {
    const previous = collection.get(key);
    collection.set(key, value);
    this.undo?.push(() => {
      if (collection.get(key) !== value) return;
      if (previous === undefined) collection.delete(key);
      else collection.set(key, previous);
    });
  }

  /* ---------------------------------------------------------------- */
  /*  Devices                                                         */
  /* ---------------------------------------------------------------- */

  async findDevice(deviceId: string): Promise<DeviceRecord | null> {
    return this.state.devices.get(deviceId) ?? null;
  }

  async createDevice(device: NewDevice, createdAtMs: number): Promise<void> {
    if (this.state.devices.has(device.deviceId)) {
      throw new Error(`duplicate device_id: ${device.deviceId}`);
    }
    this.put(this.state.devices, device.deviceId, { ...device, createdAtMs });
  }

  async updateDeviceStatus(
    deviceId: string,
    update: { seenAtMs: number; status: JsonObject; firmwareVersion?: string }
  ): Promise<void> {
    const device = this.state.devices.get(deviceId);
    if (!device) return;
    this.put(this.state.devices, deviceId, {
      ...device,
      lastSeenAtMs: update.seenAtMs,
      lastStatus: update.status,
      firmwareVersion: update.firmwareVersion ?? device.firmwareVersion
    });
  }

  async rotateDeviceSecret(deviceId: string, secretHash: string, encryptedSecret: Buffer): Promise<boolean> {
    const device = this.state.devices.get(deviceId);
    if (!device) return false;
    this.put(this.state.devices, deviceId, { ...device, secretHash, encryptedSecret });
    return true;
  }

  async setActiveProfile(deviceId: string, profileId: string): Promise<void> {
    const device = this.state.devices.get(deviceId);
    if (!device) return;
    this.put(this.state.devices, deviceId, { ...device, activeProfileId: profileId });
  }

  /* ---------------------------------------------------------------- */
  /*  Nonces                                                          */
  /* ---------------------------------------------------------------- */

  purgeNoncesOlderThan(minTsSec: number): Promise<number> {
    return this.state.nonces.purgeNoncesOlderThan(minTsSec);
  }

  registerNonce(deviceId: string, nonce: string, tsSec: number): Promise<boolean> {
    return this.state.nonces.registerNonce(deviceId, nonce, tsSec);
  }

  /* ---------------------------------------------------------------- */
  /*  Command queue                                                   */
  /* ---------------------------------------------------------------- */

  async insertCommand(input: {
    deviceId: string;
    commandType: CommandType;
    payload: JsonObject;
    createdAtMs: number;
  }): Promise<CommandRecord> {
    const record: CommandRecord = {
      id: randomUUID(),
      deviceId: input.deviceId,
      commandType: input.commandType,
      payload: input.payload,
      status: "PENDING",
      createdAtMs: input.createdAtMs
    };
    this.put(this.state.commands, record.id, record);
    return record;
  }

  // No await between selection and marking: concurrent claimers never see the same row as due.
  async claimDueCommands(
    deviceId: string,
    opts: { limit: number; nowMs: number; redeliverBeforeMs: number }
  ): Promise<CommandRecord[]> {
    const due = [...this.state.commands.values()]
      .filter(
        (c) =>
          c.deviceId === deviceId &&
          (c.status === "PENDING" ||
            (c.status === "SENT" && c.sentAtMs !== undefined && c.sentAtMs < opts.redeliverBeforeMs))
      )
      .sort((a, b) => a.createdAtMs - b.createdAtMs)
      .slice(0, opts.limit);
    return due.map((c) => {
      const claimed: CommandRecord = { ...c, status: "SENT", sentAtMs: opts.nowMs };
      this.put(this.state.commands, c.id, claimed);
      return claimed;
    });
  }

  async ackCommands(deviceId: string, commandIds: string[], ackedAtMs: number): Promise<number> {
    let changed = 0;
    for (const id of new Set(commandIds)) {
      const command = this.state.commands.get(id);
      if (!command || command.deviceId !== deviceId || command.status !== "SENT") continue;
      this.put(this.state.commands, id, { ...command, status: "ACKED", ackedAtMs });
      changed += 1;
    }
    return changed;
  }

  async failCommand(deviceId: string, commandId: string): Promise<boolean> {
    const command = this.state.commands.get(commandId);
    if (!command || command.deviceId !== deviceId) return false;
    if (command.status !== "PENDING" && command.status !== "SENT") return false;
    this.put(this.state.commands, commandId, { ...command, status: "FAILED" });
    return true;
  }

  async getCommand(commandId: string): Promise<CommandRecord | null> {
    return this.state.commands.get(commandId) ?? null;
  }

  async listCommands(deviceId: string, limit: number): Promise<CommandRecord[]> {
    return [...this.state.commands.values()]
      .filter((c) => c.deviceId === deviceId)
      .sort((a, b) => b.createdAtMs - a.createdAtMs)
      .slice(0, limit);
  }

  /* ---------------------------------------------------------------- */
  /*  Feed logs                                                       */
  /* ---------------------------------------------------------------- */

  async insertFeedLogs(deviceId: string, entries: FeedLogInput[]): Promise<void> {
    const added = new Set<FeedLogRecord>();
    for (const entry of entries) {
      const record: FeedLogRecord = { ...entry, id: randomUUID(), deviceId };
      this.state.feedLogs.push(record);
      added.add(record);
    }
    this.undo?.push(() => {
      this.state.feedLogs = this.state.feedLogs.filter((record) => !added.has(record));
    });
  }

  async listFeedLogs(deviceId: string, filter: FeedLogFilter): Promise<FeedLogRecord[]> {
    const needle = filter.query?.toLowerCase();
    return this.state.feedLogs
      .filter(
        (entry) =>
          entry.deviceId === deviceId &&
          (!filter.type || entry.type === filter.type) &&
          (!needle || entry.message.toLowerCase().includes(needle))
      )
      .sort((a, b) => b.tsMs - a.tsMs)
      .slice(filter.offset, filter.offset + filter.limit);
  }

  /* ---------------------------------------------------------------- */
  /*  Profiles and schedule                                           */
  /* ---------------------------------------------------------------- */

  async getActiveProfileName(deviceId: string): Promise<string | null> {
    const profileId = this.state.devices.get(deviceId)?.activeProfileId;
    if (!profileId) return null;
    return this.state.profiles.get(profileId)?.name ?? null;
  }

  async listProfiles(deviceId: string): Promise<ProfileRecord[]> {
    return [...this.state.profiles.values()]
      .filter((p) => p.deviceId === deviceId)
      .sort((a, b) => a.name.localeCompare(b.name));
  }

  async findProfileByName(deviceId: string, name: string): Promise<ProfileRecord | null> {
    for (const profile of this.state.profiles.values()) {
      if (profile.deviceId === deviceId && profile.name === name) return profile;
    }
    return null;
  }

  async createProfile(deviceId: string, name: string, defaultPortionMs: number): Promise<ProfileRecord> {
    if (await this.findProfileByName(deviceId, name)) {
      throw new Error(`duplicate profile name: ${name}`);
    }
    const profile: ProfileRecord = { id: randomUUID(), deviceId, name, defaultPortionMs };
    this.put(this.state.profiles, profile.id, profile);
    return profile;
  }

  async updateProfilePortion(profileId: string, defaultPortionMs: number): Promise<void> {
    const profile = this.state.profiles.get(profileId);
    if (!profile) return;
    this.put(this.state.profiles, profileId, { ...profile, defaultPortionMs });
  }

  async replaceSchedule(profileId: string, events: ScheduleEventInput[]): Promise<void> {
    const removed = this.state.schedule.filter((e) => e.profileId === profileId);
    const inserted = new Set<StoredScheduleEvent>(
      events.map((e) => ({ id: randomUUID(), profileId, hh: e.hh, mm: e.mm, portionMs: e.portionMs }))
    );
    this.state.schedule = [...this.state.schedule.filter((e) => e.profileId !== profileId), ...inserted];
    this.undo?.push(() => {
      this.state.schedule = [...this.state.schedule.filter((e) => !inserted.has(e)), ...removed];
    });
  }

  async listSchedule(deviceId: string): Promise<ScheduleEventRecord[]> {
    const rows: ScheduleEventRecord[] = [];
    for (const event of this.state.schedule) {
      const profile = this.state.profiles.get(event.profileId);
      if (!profile || profile.deviceId !== deviceId) continue;
      rows.push({ ...event, profileName: profile.name });
    }
    return rows.sort(
      (a, b) => a.profileName.localeCompare(b.profileName) || a.hh - b.hh || a.mm - b.mm
    );
  }
}
