// Copyright (c) 2025 EdgeCoder, LLC
// SPDX-License-Identifier: BUSL-1.1

import { createLogger } from "../common/logger.js";

export type SecurityLevel = "INFO" | "WARN" | "HIGH" | "CRITICAL";

export type SecurityEventType =
  | "unknown_device"
  | "invalid_device_header"
  | "missing_credentials"
  | "timestamp_out_of_window"
  | "replay_detected"
  | "secret_integrity_check_failed"
  | "secret_decryption_failed"
  | "invalid_signature"
  | "poll_rate_limit_exceeded"
  | "admin_auth_failed"
  | "secret_rotated"
  | "device_created";

export interface SecurityEvent {
  timestamp: string;
  level: SecurityLevel;
  event: SecurityEventType;
  deviceId?: string;
  ip?: string;
  details?: Record<string, unknown>;
}

const SEVERITY_MAP: Record<SecurityEventType, SecurityLevel> = {
  unknown_device: "WARN",
  invalid_device_header: "WARN",
  missing_credentials: "WARN",
  timestamp_out_of_window: "WARN",
  replay_detected: "HIGH",
  secret_integrity_check_failed: "CRITICAL",
  secret_decryption_failed: "CRITICAL",
  invalid_signature: "HIGH",
  poll_rate_limit_exceeded: "WARN",
  admin_auth_failed: "HIGH",
  secret_rotated: "INFO",
  device_created: "INFO"
};

export type SecurityEventSink = (event: SecurityEvent) => void;

const auditLog = createLogger("security");

export const logSink: SecurityEventSink = (event) => {
  if (event.level === "INFO") auditLog.info(event.event, event);
  else if (event.level === "WARN") auditLog.warn(event.event, event);
  else auditLog.error(event.event, event);
};

export class SecurityEventLogger {
  constructor(private readonly sink: SecurityEventSink = logSink) {}

  severity(eventType: SecurityEventType): SecurityLevel {
    return SEVERITY_MAP[eventType];
  }

  record(event: SecurityEventType, params: Omit<SecurityEvent, "timestamp" | "level" | "event"> = {}): void {
    this.sink({
      ...params,
      event,
      level: this.severity(event),
      timestamp: new Date().toISOString()
    });
  }
}
