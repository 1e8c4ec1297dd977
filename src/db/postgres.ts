import { randomUUID } from "node:crypto";
import { Pool, type PoolClient, type QueryResult, type QueryResultRow } from "pg";
import {
  type CommandRecord,
  type CommandType,
  type DeviceRecord,
  type FeedLogFilter,
  type FeedLogInput,
  type FeedLogRecord,
  type JsonObject,
  type NewDevice,
  type ProfileRecord,
  type ScheduleEventInput,
  type ScheduleEventRecord,
  isCommandStatus,
  isCommandType,
  isJsonObject
} from "../common/types.js";
import { describeError, log } from "../common/logger.js";
import type { FeederStore } from "./store.js";

export const SCHEMA_SQL = `
CREATE TABLE IF NOT EXISTS devices (
  device_id TEXT PRIMARY KEY,
  owner_user_id TEXT NOT NULL,
  name TEXT NOT NULL,
  secret_hash TEXT NOT NULL,
  encrypted_secret BYTEA NOT NULL,
  last_seen_at_ms BIGINT,
  last_status_json JSONB,
  firmware_version TEXT,
  active_profile_id TEXT,
  created_at_ms BIGINT NOT NULL
);

CREATE TABLE IF NOT EXISTS profiles (
  profile_id TEXT PRIMARY KEY,
  device_id TEXT NOT NULL REFERENCES devices(device_id) ON DELETE CASCADE,
  name TEXT NOT NULL,
  default_portion_ms INT NOT NULL CHECK (default_portion_ms > 0),
  created_at_ms BIGINT NOT NULL,
  UNIQUE (device_id, name)
);

CREATE TABLE IF NOT EXISTS schedule_events (
  event_id TEXT PRIMARY KEY,
  profile_id TEXT NOT NULL REFERENCES profiles(profile_id) ON DELETE CASCADE,
  hh SMALLINT NOT NULL CHECK (hh BETWEEN 0 AND 23),
  mm SMALLINT NOT NULL CHECK (mm BETWEEN 0 AND 59),
  portion_ms INT NOT NULL CHECK (portion_ms > 0)
);

CREATE TABLE IF NOT EXISTS command_queue (
  command_id UUID PRIMARY KEY,
  device_id TEXT NOT NULL REFERENCES devices(device_id) ON DELETE CASCADE,
  command_type TEXT NOT NULL,
  payload_json JSONB NOT NULL DEFAULT '{}'::jsonb,
  status TEXT NOT NULL CHECK (status IN ('PENDING', 'SENT', 'ACKED', 'FAILED')),
  created_at_ms BIGINT NOT NULL,
  sent_at_ms BIGINT,
  acked_at_ms BIGINT
);

CREATE INDEX IF NOT EXISTS idx_command_queue_device_status
  ON command_queue (device_id, status, created_at_ms);

CREATE TABLE IF NOT EXISTS feed_logs (
  log_id UUID PRIMARY KEY,
  device_id TEXT NOT NULL REFERENCES devices(device_id) ON DELETE CASCADE,
  ts_ms BIGINT NOT NULL,
  type TEXT NOT NULL,
  message TEXT NOT NULL,
  meta_json JSONB NOT NULL DEFAULT '{}'::jsonb
);

CREATE INDEX IF NOT EXISTS idx_feed_logs_device_ts ON feed_logs (device_id, ts_ms DESC);

CREATE TABLE IF NOT EXISTS device_nonces (
  device_id TEXT NOT NULL REFERENCES devices(device_id) ON DELETE CASCADE,
  nonce TEXT NOT NULL,
  ts_epoch_sec BIGINT NOT NULL,
  PRIMARY KEY (device_id, nonce)
);

CREATE INDEX IF NOT EXISTS idx_device_nonces_ts ON device_nonces (ts_epoch_sec);
`;

type BigintColumn = string | number;

interface DeviceRow {
  device_id: string;
  owner_user_id: string;
  name: string;
  secret_hash: string;
  encrypted_secret: Buffer;
  last_seen_at_ms: BigintColumn | null;
  last_status_json: unknown;
  firmware_version: string | null;
  active_profile_id: string | null;
  created_at_ms: BigintColumn;
}

interface CommandRow {
  command_id: string;
  device_id: string;
  command_type: string;
  payload_json: unknown;
  status: string;
  created_at_ms: BigintColumn;
  sent_at_ms: BigintColumn | null;
  acked_at_ms: BigintColumn | null;
}

interface FeedLogRow {
  log_id: string;
  device_id: string;
  ts_ms: BigintColumn;
  type: string;
  message: string;
  meta_json: unknown;
}

interface ProfileRow {
  profile_id: string;
  device_id: string;
  name: string;
  default_portion_ms: number;
}

interface ScheduleRow {
  event_id: string;
  profile_id: string;
  profile_name: string;
  hh: number;
  mm: number;
  portion_ms: number;
}

const COMMAND_COLUMNS =
  "command_id, device_id, command_type, payload_json, status, created_at_ms, sent_at_ms, acked_at_ms";

function optionalNumber(value: BigintColumn | null): number | undefined {
  return value === null ? undefined : Number(value);
}

function mapDevice(row: DeviceRow): DeviceRecord {
  return {
    deviceId: row.device_id,
    ownerUserId: row.owner_user_id,
    name: row.name,
    secretHash: row.secret_hash,
    encryptedSecret: row.encrypted_secret,
    lastSeenAtMs: optionalNumber(row.last_seen_at_ms),
    lastStatus: isJsonObject(row.last_status_json) ? row.last_status_json : undefined,
    firmwareVersion: row.firmware_version ?? undefined,
    activeProfileId: row.active_profile_id ?? undefined,
    createdAtMs: Number(row.created_at_ms)
  };
}

function mapCommand(row: CommandRow): CommandRecord {
  if (!isCommandType(row.command_type)) {
    throw new Error(`unknown command_type in command_queue: ${row.command_type}`);
  }
  if (!isCommandStatus(row.status)) {
    throw new Error(`unknown status in command_queue: ${row.status}`);
  }
  return {
    id: row.command_id,
    deviceId: row.device_id,
    commandType: row.command_type,
    payload: isJsonObject(row.payload_json) ? row.payload_json : {},
    status: row.status,
    createdAtMs: Number(row.created_at_ms),
    sentAtMs: optionalNumber(row.sent_at_ms),
    ackedAtMs: optionalNumber(row.acked_at_ms)
  };
}

function mapProfile(row: ProfileRow): ProfileRecord {
  return {
    id: row.profile_id,
    deviceId: row.device_id,
    name: row.name,
    defaultPortionMs: Number(row.default_portion_ms)
  };
}

export class PostgresStore implements FeederStore {
  /** `client` is set on the instance handed to a transaction callback. */
  constructor(
    private readonly pool: Pool,
    private readonly client?: PoolClient
  ) {}

  static fromEnv(url = process.env.DATABASE_URL): PostgresStore | null {
    if (!url) return null;
    const pool = new Pool({ connectionString: url });
    return new PostgresStore(pool);
  }

  async migrate(): Promise<void> {
    await this.query(SCHEMA_SQL);
  }

  async close(): Promise<void> {
    if (this.client) return;
    await this.pool.end();
  }

  private query<R extends QueryResultRow>(text: string, values?: unknown[]): Promise<QueryResult<R>> {
    return this.client ? this.client.query<R>(text, values) : this.pool.query<R>(text, values);
  }

  async transaction<T>(fn: (tx: FeederStore) => Promise<T>): Promise<T> {
    return this.inTransaction(fn);
  }

  private async inTransaction<T>(fn: (tx: PostgresStore) => Promise<T>): Promise<T> {
    if (this.client) return fn(this);
    const client = await this.pool.connect();
    try {
      await client.query("BEGIN");
      const result = await fn(new PostgresStore(this.pool, client));
      await client.query("COMMIT");
      return result;
    } catch (err) {
      try {
        await client.query("ROLLBACK");
      } catch (rollbackErr) {
        log.error("rollback failed", { error: describeError(rollbackErr) });
      }
      throw err;
    } finally {
      client.release();
    }
  }

  /* ---------------------------------------------------------------- */
  /*  Devices                                                         */
  /* ---------------------------------------------------------------- */

  async findDevice(deviceId: string): Promise<DeviceRecord | null> {
    const result = await this.query<DeviceRow>(
      `SELECT device_id, owner_user_id, name, secret_hash, encrypted_secret, last_seen_at_ms,
              last_status_json, firmware_version, active_profile_id, created_at_ms
       FROM devices WHERE device_id = $1`,
      [deviceId]
    );
    const row = result.rows[0];
    return row ? mapDevice(row) : null;
  }

  async createDevice(device: NewDevice, createdAtMs: number): Promise<void> {
    await this.query(
      `INSERT INTO devices (device_id, owner_user_id, name, secret_hash, encrypted_secret, created_at_ms)
       VALUES ($1,$2,$3,$4,$5,$6)`,
      [device.deviceId, device.ownerUserId, device.name, device.secretHash, device.encryptedSecret, createdAtMs]
    );
  }

  async updateDeviceStatus(
    deviceId: string,
    update: { seenAtMs: number; status: JsonObject; firmwareVersion?: string }
  ): Promise<void> {
    await this.query(
      `UPDATE devices
       SET last_seen_at_ms = $2,
           last_status_json = $3::jsonb,
           firmware_version = COALESCE($4, firmware_version)
       WHERE device_id = $1`,
      [deviceId, update.seenAtMs, JSON.stringify(update.status), update.firmwareVersion ?? null]
    );
  }

  async rotateDeviceSecret(deviceId: string, secretHash: string, encryptedSecret: Buffer): Promise<boolean> {
    const result = await this.query(
      `UPDATE devices SET secret_hash = $2, encrypted_secret = $3 WHERE device_id = $1`,
      [deviceId, secretHash, encryptedSecret]
    );
    return (result.rowCount ?? 0) > 0;
  }

  async setActiveProfile(deviceId: string, profileId: string): Promise<void> {
    await this.query(`UPDATE devices SET active_profile_id = $2 WHERE device_id = $1`, [deviceId, profileId]);
  }

  /* ---------------------------------------------------------------- */
  /*  Nonces                                                          */
  /* ---------------------------------------------------------------- */

  async purgeNoncesOlderThan(minTsSec: number): Promise<number> {
    const result = await this.query(`DELETE FROM device_nonces WHERE ts_epoch_sec < $1`, [minTsSec]);
    return result.rowCount ?? 0;
  }

  async registerNonce(deviceId: string, nonce: string, tsSec: number): Promise<boolean> {
    const result = await this.query(
      `INSERT INTO device_nonces (device_id, nonce, ts_epoch_sec) VALUES ($1,$2,$3)
       ON CONFLICT (device_id, nonce) DO NOTHING`,
      [deviceId, nonce, tsSec]
    );
    return result.rowCount === 1;
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
    const result = await this.query<CommandRow>(
      `INSERT INTO command_queue (command_id, device_id, command_type, payload_json, status, created_at_ms)
       VALUES ($1,$2,$3,$4::jsonb,'PENDING',$5)
       RETURNING ${COMMAND_COLUMNS}`,
      [randomUUID(), input.deviceId, input.commandType, JSON.stringify(input.payload), input.createdAtMs]
    );
    return mapCommand(result.rows[0]);
  }

  async claimDueCommands(
    deviceId: string,
    opts: { limit: number; nowMs: number; redeliverBeforeMs: number }
  ): Promise<CommandRecord[]> {
    return this.inTransaction(async (tx) => {
      const due = await tx.query<CommandRow>(
        `SELECT ${COMMAND_COLUMNS}
         FROM command_queue
         WHERE device_id = $1
           AND (status = 'PENDING' OR (status = 'SENT' AND sent_at_ms < $3))
         ORDER BY created_at_ms ASC, command_id ASC
         LIMIT $2
         FOR UPDATE SKIP LOCKED`,
        [deviceId, opts.limit, opts.redeliverBeforeMs]
      );
      if (due.rows.length === 0) return [];
      const ids = due.rows.map((row) => row.command_id);
      await tx.query(
        `UPDATE command_queue SET status = 'SENT', sent_at_ms = $2 WHERE command_id = ANY($1::uuid[])`,
        [ids, opts.nowMs]
      );
      return due.rows.map((row) => ({ ...mapCommand(row), status: "SENT" as const, sentAtMs: opts.nowMs }));
    });
  }

  async ackCommands(deviceId: string, commandIds: string[], ackedAtMs: number): Promise<number> {
    if (commandIds.length === 0) return 0;
    const result = await this.query(
      `UPDATE command_queue SET status = 'ACKED', acked_at_ms = $3
       WHERE device_id = $1 AND command_id = ANY($2::uuid[]) AND status = 'SENT'`,
      [deviceId, commandIds, ackedAtMs]
    );
    return result.rowCount ?? 0;
  }

  async failCommand(deviceId: string, commandId: string): Promise<boolean> {
    const result = await this.query(
      `UPDATE command_queue SET status = 'FAILED'
       WHERE device_id = $1 AND command_id = $2 AND status IN ('PENDING', 'SENT')`,
      [deviceId, commandId]
    );
    return (result.rowCount ?? 0) > 0;
  }

  async getCommand(commandId: string): Promise<CommandRecord | null> {
    const result = await this.query<CommandRow>(
      `SELECT ${COMMAND_COLUMNS} FROM command_queue WHERE command_id = $1`,
      [commandId]
    );
    const row = result.rows[0];
    return row ? mapCommand(row) : null;
  }

  async listCommands(deviceId: string, limit: number): Promise<CommandRecord[]> {
    const result = await this.query<CommandRow>(
      `SELECT ${COMMAND_COLUMNS} FROM command_queue
       WHERE device_id = $1 ORDER BY created_at_ms DESC LIMIT $2`,
      [deviceId, limit]
    );
    return result.rows.map(mapCommand);
  }

  /* ---------------------------------------------------------------- */
  /*  Feed logs                                                       */
  /* ---------------------------------------------------------------- */

  async insertFeedLogs(deviceId: string, entries: FeedLogInput[]): Promise<void> {
    if (entries.length === 0) return;
    await this.query(
      `INSERT INTO feed_logs (log_id, device_id, ts_ms, type, message, meta_json)
       SELECT id, $1, ts, t, m, meta::jsonb
       FROM unnest($2::uuid[], $3::bigint[], $4::text[], $5::text[], $6::text[]) AS x(id, ts, t, m, meta)`,
      [
        deviceId,
        entries.map(() => randomUUID()),
        entries.map((e) => e.tsMs),
        entries.map((e) => e.type),
        entries.map((e) => e.message),
        entries.map((e) => JSON.stringify(e.meta))
      ]
    );
  }

  async listFeedLogs(deviceId: string, filter: FeedLogFilter): Promise<FeedLogRecord[]> {
    const values: unknown[] = [deviceId];
    let where = "device_id = $1";
    if (filter.type) {
      values.push(filter.type);
      where += ` AND type = $${values.length}`;
    }
    if (filter.query) {
      values.push(`%${filter.query}%`);
      where += ` AND message ILIKE $${values.length}`;
    }
    values.push(filter.limit, filter.offset);
    const result = await this.query<FeedLogRow>(
      `SELECT log_id, device_id, ts_ms, type, message, meta_json FROM feed_logs
       WHERE ${where}
       ORDER BY ts_ms DESC
       LIMIT $${values.length - 1} OFFSET $${values.length}`,
      values
    );
    return result.rows.map((row) => ({
      id: row.log_id,
      deviceId: row.device_id,
      tsMs: Number(row.ts_ms),
      type: row.type,
      message: row.message,
      meta: isJsonObject(row.meta_json) ? row.meta_json : {}
    }));
  }

  /* ---------------------------------------------------------------- */
  /*  Profiles and schedule                                           */
  /* ---------------------------------------------------------------- */

  async getActiveProfileName(deviceId: string): Promise<string | null> {
    const result = await this.query<{ name: string | null }>(
      `SELECT p.name FROM devices d
       LEFT JOIN profiles p ON p.profile_id = d.active_profile_id
       WHERE d.device_id = $1`,
      [deviceId]
    );
    return result.rows[0]?.name ?? null;
  }

  async listProfiles(deviceId: string): Promise<ProfileRecord[]> {
    const result = await this.query<ProfileRow>(
      `SELECT profile_id, device_id, name, default_portion_ms FROM profiles
       WHERE device_id = $1 ORDER BY name ASC`,
      [deviceId]
    );
    return result.rows.map(mapProfile);
  }

  async findProfileByName(deviceId: string, name: string): Promise<ProfileRecord | null> {
    const result = await this.query<ProfileRow>(
      `SELECT profile_id, device_id, name, default_portion_ms FROM profiles
       WHERE device_id = $1 AND name = $2`,
      [deviceId, name]
    );
    const row = result.rows[0];
    return row ? mapProfile(row) : null;
  }

  async createProfile(deviceId: string, name: string, defaultPortionMs: number): Promise<ProfileRecord> {
    const result = await this.query<ProfileRow>(
      `INSERT INTO profiles (profile_id, device_id, name, default_portion_ms, created_at_ms)
       VALUES ($1,$2,$3,$4,$5)
       RETURNING profile_id, device_id, name, default_portion_ms`,
      [randomUUID(), deviceId, name, defaultPortionMs, Date.now()]
    );
    return mapProfile(result.rows[0]);
  }

  async updateProfilePortion(profileId: string, defaultPortionMs: number): Promise<void> {
    await this.query(`UPDATE profiles SET default_portion_ms = $2 WHERE profile_id = $1`, [
      profileId,
      defaultPortionMs
    ]);
  }

  async replaceSchedule(profileId: string, events: ScheduleEventInput[]): Promise<void> {
    await this.inTransaction(async (tx) => {
      await tx.query(`DELETE FROM schedule_events WHERE profile_id = $1`, [profileId]);
      if (events.length === 0) return;
      await tx.query(
        `INSERT INTO schedule_events (event_id, profile_id, hh, mm, portion_ms)
         SELECT id, $1, hh, mm, portion
         FROM unnest($2::text[], $3::smallint[], $4::smallint[], $5::int[]) AS x(id, hh, mm, portion)`,
        [
          profileId,
          events.map(() => randomUUID()),
          events.map((e) => e.hh),
          events.map((e) => e.mm),
          events.map((e) => e.portionMs)
        ]
      );
    });
  }

  async listSchedule(deviceId: string): Promise<ScheduleEventRecord[]> {
    const result = await this.query<ScheduleRow>(
      `SELECT e.event_id, e.profile_id, p.name AS profile_name, e.hh, e.mm, e.portion_ms
       FROM schedule_events e
       INNER JOIN profiles p ON p.profile_id = e.profile_id
       WHERE p.device_id = $1
       ORDER BY p.name ASC, e.hh ASC, e.mm ASC`,
      [deviceId]
    );
    return result.rows.map((row) => ({
      id: row.event_id,
      profileId: row.profile_id,
      profileName: row.profile_name,
      hh: Number(row.hh),
      mm: Number(row.mm),
      portionMs: Number(row.portion_ms)
    }));
  }
}
