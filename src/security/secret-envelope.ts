// Copyright (c) 2025 EdgeCoder, LLC
// SPDX-License-Identifier: BUSL-1.1

import { createCipheriv, createDecipheriv, randomBytes, type CipherGCMTypes } from "node:crypto";

const IV_LENGTH = 12; // GCM
const TAG_LENGTH = 16;

const CIPHER_BY_KEY_LENGTH = new Map<number, CipherGCMTypes>([
  [16, "aes-128-gcm"],
  [24, "aes-192-gcm"],
  [32, "aes-256-gcm"]
]);

export type SecretEnvelopeErrorCode =
  | "invalid_master_key_length"
  | "envelope_truncated"
  | "envelope_authentication_failed";

export class SecretEnvelopeError extends Error {
  constructor(readonly code: SecretEnvelopeErrorCode, options?: { cause?: unknown }) {
    super(code, options);
    this.name = "SecretEnvelopeError";
  }
}

/**
 * AES-GCM sealing of device secrets under the server master key.
 * Layout: IV (12 bytes) ‖ ciphertext ‖ auth tag (16 bytes).
 */
export class SecretEnvelope {
  private readonly key: Buffer;
  private readonly cipher: CipherGCMTypes;

  constructor(masterKey: Buffer) {
    const cipher = CIPHER_BY_KEY_LENGTH.get(masterKey.length);
    if (!cipher) throw new SecretEnvelopeError("invalid_master_key_length");
    this.key = Buffer.from(masterKey);
    this.cipher = cipher;
  }

  static fromBase64(encodedKey: string): SecretEnvelope {
    return new SecretEnvelope(Buffer.from(encodedKey.trim(), "base64"));
  }

  encrypt(plaintext: string): Buffer {
    const iv = randomBytes(IV_LENGTH);
    const cipher = createCipheriv(this.cipher, this.key, iv, { authTagLength: TAG_LENGTH });
    const ciphertext = Buffer.concat([cipher.update(plaintext, "utf8"), cipher.final()]);
    return Buffer.concat([iv, ciphertext, cipher.getAuthTag()]);
  }

  decrypt(envelope: Buffer): string {
    if (envelope.length < IV_LENGTH + TAG_LENGTH) {
      throw new SecretEnvelopeError("envelope_truncated");
    }
    const iv = envelope.subarray(0, IV_LENGTH);
    const tag = envelope.subarray(envelope.length - TAG_LENGTH);
    const ciphertext = envelope.subarray(IV_LENGTH, envelope.length - TAG_LENGTH);
    try {
      const decipher = createDecipheriv(this.cipher, this.key, iv, { authTagLength: TAG_LENGTH });
      decipher.setAuthTag(tag);
      return Buffer.concat([decipher.update(ciphertext), decipher.final()]).toString("utf8");
    } catch (err) {
      throw new SecretEnvelopeError("envelope_authentication_failed", { cause: err });
    }
  }
}
