import { randomBytes } from "node:crypto";
import { describe, expect, test } from "vitest";
import { SecretEnvelope, SecretEnvelopeError } from "../../src/security/secret-envelope.js";

const KEY = Buffer.alloc(32, 7);

function errorCode(fn: () => unknown): string | undefined {
  try {
    fn();
  } catch (err) {
    return err instanceof SecretEnvelopeError ? err.code : "unexpected";
  }
  return undefined;
}

describe("secret-envelope", () => {
  test("round-trips secrets of typical lengths", () => {
    const envelope = new SecretEnvelope(KEY);
    for (const secret of ["x", "test-secret", randomBytes(32).toString("base64url"), "ü-secret-ø"]) {
      expect(envelope.decrypt(envelope.encrypt(secret))).toBe(secret);
    }
  });

  test("layout is iv(12) + ciphertext + tag(16)", () => {
    const sealed = new SecretEnvelope(KEY).encrypt("test-secret");
    expect(sealed.length).toBe(12 + Buffer.byteLength("test-secret") + 16);
  });

  test("never produces the same bytes twice for one input", () => {
    const envelope = new SecretEnvelope(KEY);
    const a = envelope.encrypt("test-secret");
    const b = envelope.encrypt("test-secret");
    expect(a.equals(b)).toBe(false);
    expect(a.subarray(0, 12).equals(b.subarray(0, 12))).toBe(false);
  });

  test("accepts 16, 24 and 32 byte keys", () => {
    for (const size of [16, 24, 32]) {
      const envelope = new SecretEnvelope(Buffer.alloc(size, 1));
      expect(envelope.decrypt(envelope.encrypt("test-secret"))).toBe("test-secret");
    }
  });

  test("rejects other key lengths", () => {
    expect(errorCode(() => new SecretEnvelope(Buffer.alloc(20, 1)))).toBe("invalid_master_key_length");
    expect(errorCode(() => SecretEnvelope.fromBase64(""))).toBe("invalid_master_key_length");
  });

  test("fromBase64 decodes the master key", () => {
    const envelope = SecretEnvelope.fromBase64(KEY.toString("base64"));
    const sealed = new SecretEnvelope(KEY).encrypt("test-secret");
    expect(envelope.decrypt(sealed)).toBe("test-secret");
  });

  test("fails closed on a flipped tag byte", () => {
    const envelope = new SecretEnvelope(KEY);
    const sealed = envelope.encrypt("test-secret");
    sealed[sealed.length - 1] = sealed[sealed.length - 1] ^ 0xff;
    expect(errorCode(() => envelope.decrypt(sealed))).toBe("envelope_authentication_failed");
  });

  test("fails closed on a flipped ciphertext byte", () => {
    const envelope = new SecretEnvelope(KEY);
    const sealed = envelope.encrypt("test-secret");
    sealed[12] = sealed[12] ^ 0x01;
    expect(errorCode(() => envelope.decrypt(sealed))).toBe("envelope_authentication_failed");
  });

  test("fails closed under the wrong key", () => {
    const sealed = new SecretEnvelope(KEY).encrypt("test-secret");
    const other = new SecretEnvelope(Buffer.alloc(32, 8));
    expect(errorCode(() => other.decrypt(sealed))).toBe("envelope_authentication_failed");
  });

  test("rejects input shorter than iv + tag", () => {
    const envelope = new SecretEnvelope(KEY);
    expect(errorCode(() => envelope.decrypt(Buffer.alloc(27)))).toBe("envelope_truncated");
    expect(errorCode(() => envelope.decrypt(Buffer.alloc(0)))).toBe("envelope_truncated");
  });
});
