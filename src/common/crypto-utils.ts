// Copyright (c) 2025 EdgeCoder, LLC
// SPDX-License-Identifier: BUSL-1.1

import { timingSafeEqual } from "node:crypto";

/** Constant-time equality; a length mismatch returns early since lengths are not secret here. */
export function safeEqual(a: string | Buffer, b: string | Buffer): boolean {
  const left = typeof a === "string" ? Buffer.from(a, "utf8") : a;
  const right = typeof b === "string" ? Buffer.from(b, "utf8") : b;
  if (left.length !== right.length) return false;
  return timingSafeEqual(left, right);
}
