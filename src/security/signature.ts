// Copyright (c) 2025 EdgeCoder, LLC
// SPDX-License-Identifier: BUSL-1.1

import { createHmac } from "node:crypto";
import { safeEqual } from "../common/crypto-utils.js";

const HEX_SHA256 = /^[0-9a-f]{64}$/;

/** Request body exactly as it travels on the wire. Strings are taken as UTF-8. */
export type SignableBody = Buffer | string;

export function signBody(body: SignableBody, secret: string): string {
  return createHmac("sha256", secret).update(body).digest("hex");
}

export function verifyBody(
  body: SignableBody,
  secret: string,
  candidateHex: string | null | undefined
): boolean {
  if (!candidateHex) return false;
  const normalized = candidateHex.trim().toLowerCase();
  if (!HEX_SHA256.test(normalized)) return false;
  return safeEqual(signBody(body, secret), normalized);
}
