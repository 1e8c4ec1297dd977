// Copyright (c) 2025 EdgeCoder, LLC
// SPDX-License-Identifier: BUSL-1.1

import { ApiError } from "../common/errors.js";
import type { DeviceRecord } from "../common/types.js";
import type { DeviceAuthConfig } from "../common/config.js";
import { SecurityEventLogger } from "../audit/security-events.js";
import { NonceGuard, type NonceStore } from "./nonce-guard.js";
import { matchesSecretHash } from "./secret-hash.js";
import { SecretEnvelope, SecretEnvelopeError } from "./secret-envelope.js";
import { verifyBody } from "./signature.js";

export interface DeviceAuthContext {
  /** Device already resolved from the body's deviceId. */
  device: DeviceRecord;
  headerDeviceId?: string;
  nonce?: string;
  signature?: string;
  /** Device-claimed request time, unix seconds. */
  requestTs: number;
  /** Body bytes exactly as received; the signature covers these. */
  rawBody: Buffer;
  ip?: string;
}

export interface DeviceAuthenticator {
  readonly mode: "enforcing" | "permissive";
  authenticate(ctx: DeviceAuthContext): Promise<void>;
}

/** Bootstrap/demo mode: the caller has already proven the device exists. */
export class PermissiveDeviceAuthenticator implements DeviceAuthenticator {
  readonly mode = "permissive" as const;

  async authenticate(_ctx: DeviceAuthContext): Promise<void> {
    return;
  }
}

function present(value: string | undefined): string | undefined {
  const trimmed = value?.trim();
  return trimmed ? trimmed : undefined;
}

export class EnforcingDeviceAuthenticator implements DeviceAuthenticator {
  readonly mode = "enforcing" as const;
  private readonly nonceGuard: NonceGuard;

  constructor(
    nonces: NonceStore,
    private readonly envelope: SecretEnvelope,
    private readonly windowSec: number,
    private readonly events: SecurityEventLogger = new SecurityEventLogger()
  ) {
    this.nonceGuard = new NonceGuard(nonces, windowSec);
  }

  /**
   * Cheap structural checks first, then replay registration, then crypto.
   * The nonce is burned before the signature is checked so a replay cannot
   * dodge registration by carrying a different signature.
   */
  async authenticate(ctx: DeviceAuthContext): Promise<void> {
    const { device, ip } = ctx;
    const deviceId = device.deviceId;

    if (present(ctx.headerDeviceId) !== deviceId) {
      throw this.reject(ApiError.unauthorized("invalid_device_header"), "invalid_device_header", deviceId, ip);
    }
    const nonce = present(ctx.nonce);
    if (!nonce) {
      throw this.reject(ApiError.unauthorized("nonce_required"), "missing_credentials", deviceId, ip);
    }
    const signature = present(ctx.signature);
    if (!signature) {
      throw this.reject(ApiError.unauthorized("signature_required"), "missing_credentials", deviceId, ip);
    }

    const nowSec = Math.floor(Date.now() / 1000);
    if (Math.abs(nowSec - ctx.requestTs) > this.windowSec) {
      throw this.reject(ApiError.forbidden("timestamp_out_of_window"), "timestamp_out_of_window", deviceId, ip, {
        skewSec: nowSec - ctx.requestTs
      });
    }

    const { accepted } = await this.nonceGuard.check(deviceId, nonce, ctx.requestTs, nowSec);
    if (!accepted) {
      throw this.reject(ApiError.forbidden("replay_detected"), "replay_detected", deviceId, ip);
    }

    const secret = this.openSecret(device, ip);
    if (!matchesSecretHash(secret, device.secretHash)) {
      throw this.reject(
        ApiError.forbidden("secret_integrity_check_failed"),
        "secret_integrity_check_failed",
        deviceId,
        ip
      );
    }

    if (!verifyBody(ctx.rawBody, secret, signature)) {
      throw this.reject(ApiError.forbidden("invalid_signature"), "invalid_signature", deviceId, ip);
    }
  }

  private openSecret(device: DeviceRecord, ip: string | undefined): string {
    try {
      return this.envelope.decrypt(device.encryptedSecret);
    } catch (err) {
      if (!(err instanceof SecretEnvelopeError)) throw err;
      throw this.reject(
        ApiError.forbidden("secret_integrity_check_failed"),
        "secret_decryption_failed",
        device.deviceId,
        ip,
        { reason: err.code }
      );
    }
  }

  private reject(
    error: ApiError,
    event: Parameters<SecurityEventLogger["record"]>[0],
    deviceId: string,
    ip: string | undefined,
    details?: Record<string, unknown>
  ): ApiError {
    this.events.record(event, { deviceId, ip, details });
    return error;
  }
}

export function createDeviceAuthenticator(
  config: DeviceAuthConfig,
  deps: { nonces: NonceStore; envelope: SecretEnvelope; events?: SecurityEventLogger }
): DeviceAuthenticator {
  if (!config.signatureEnabled) return new PermissiveDeviceAuthenticator();
  return new EnforcingDeviceAuthenticator(deps.nonces, deps.envelope, config.nonceWindowSec, deps.events);
}
