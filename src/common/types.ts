export type CommandType =
  | "FEED_NOW"
  | "SET_PROFILE"
  | "SET_SCHEDULE"
  | "SET_DEFAULT_PORTION"
  | "REBOOT"
  | "PING";

export const COMMAND_TYPES: readonly CommandType[] = [
  "FEED_NOW",
  "SET_PROFILE",
  "SET_SCHEDULE",
  "SET_DEFAULT_PORTION",
  "REBOOT",
  "PING"
];

export type CommandStatus = "PENDING" | "SENT" | "ACKED" | "FAILED";

export type JsonObject = Record<string, unknown>;

export interface DeviceRecord {
  deviceId: string;
  ownerUserId: string;
  name: string;
  /** Hex SHA-256 of the plaintext secret. */
  secretHash: string;
  /** IV ‖ ciphertext ‖ tag, sealed with the server master key. */
  encryptedSecret: Buffer;
  lastSeenAtMs?: number;
  lastStatus?: JsonObject;
  firmwareVersion?: string;
  activeProfileId?: string;
  createdAtMs: number;
}

export interface NewDevice {
  deviceId: string;
  ownerUserId: string;
  name: string;
  secretHash: string;
  encryptedSecret: Buffer;
}

export interface CommandRecord {
  id: string;
  deviceId: string;
  commandType: CommandType;
  payload: JsonObject;
  status: CommandStatus;
  createdAtMs: number;
  sentAtMs?: number;
  ackedAtMs?: number;
}

export interface FeedLogInput {
  tsMs: number;
  type: string;
  message: string;
  meta: JsonObject;
}

export interface FeedLogRecord extends FeedLogInput {
  id: string;
  deviceId: string;
}

export interface FeedLogFilter {
  type?: string;
  query?: string;
  limit: number;
  offset: number;
}

export interface ProfileRecord {
  id: string;
  deviceId: string;
  name: string;
  defaultPortionMs: number;
}

export interface ScheduleEventInput {
  hh: number;
  mm: number;
  portionMs: number;
}

export interface ScheduleEventRecord extends ScheduleEventInput {
  id: string;
  profileId: string;
  profileName: string;
}

/* ------------------------------------------------------------------ */
/*  Poll wire format                                                  */
/* ------------------------------------------------------------------ */

export interface PollStatus {
  fw?: string;
  uptimeSec?: number;
  rssi?: number;
  error?: string | null;
  lastFeedTs?: number | null;
}

export interface PollLogItem {
  ts: number;
  type?: string | null;
  msg?: string | null;
  meta?: JsonObject | null;
}

export interface PollRequest {
  deviceId: string;
  ts: number;
  status?: PollStatus | null;
  log?: PollLogItem[] | null;
  ack?: string[] | null;
}

export interface PollCommand {
  id: string;
  commandType: CommandType;
  payloadJson: JsonObject;
}

export interface PollConfig {
  activeProfile: string | null;
  profiles: Array<{ name: string; defaultPortionMs: number }>;
  schedule: Array<{ profileName: string; hh: number; mm: number; portionMs: number }>;
}

export interface PollResponse {
  serverTime: number;
  intervalSec: number;
  commands: PollCommand[];
  config: PollConfig;
}

export const COMMAND_STATUSES: readonly CommandStatus[] = ["PENDING", "SENT", "ACKED", "FAILED"];

export function isCommandType(value: string): value is CommandType {
  return COMMAND_TYPES.some((type) => type === value);
}

export function isCommandStatus(value: string): value is CommandStatus {
  return COMMAND_STATUSES.some((status) => status === value);
}

export function isJsonObject(value: unknown): value is JsonObject {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}
