// Copyright (c) 2025 EdgeCoder, LLC
// SPDX-License-Identifier: BUSL-1.1

import type { FastifyInstance } from "fastify";
import type { IncomingHttpHeaders } from "node:http";
import type { PollService } from "./poll-service.js";

export const DEVICE_POLL_PATH = "/api/device/poll";

export function headerValue(headers: IncomingHttpHeaders, name: string): string | undefined {
  const value = headers[name.toLowerCase()];
  return Array.isArray(value) ? value[0] : value;
}

/**
 * Registers the device poll endpoint in its own encapsulated scope. JSON bodies
 * reach the handler as the exact received bytes because the signature covers them.
 */
export async function registerPollRoutes(app: FastifyInstance, service: PollService): Promise<void> {
  await app.register(async (scope) => {
    scope.removeContentTypeParser("application/json");
    scope.addContentTypeParser("application/json", { parseAs: "buffer" }, (_req, body, done) => {
      done(null, body);
    });

    scope.post(DEVICE_POLL_PATH, async (req) => {
      const rawBody = Buffer.isBuffer(req.body) ? req.body : Buffer.alloc(0);
      return service.handlePoll({
        rawBody,
        headerDeviceId: headerValue(req.headers, "x-device-id"),
        nonce: headerValue(req.headers, "x-nonce"),
        signature: headerValue(req.headers, "x-sign"),
        ip: req.ip
      });
    });
  });
}
