// Copyright (c) 2025 EdgeCoder, LLC
// SPDX-License-Identifier: BUSL-1.1

import { createHash } from "node:crypto";
import { safeEqual } from "../common/crypto-utils.js";

export function secretHash(secret: string): string {
  return createHash("sha256").update(secret, "utf8").digest("hex");
}

export function matchesSecretHash(secret: string, expectedHex: string): boolean {
  return safeEqual(secretHash(secret), expectedHex.trim().toLowerCase());
}
