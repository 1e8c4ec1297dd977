// Copyright (c) 2025 EdgeCoder, LLC
// SPDX-License-Identifier: BUSL-1.1

import Fastify, { type FastifyError, type FastifyInstance } from "fastify";
import { ZodError } from "zod";
import type { AppConfig } from "./common/config.js";
import { isApiError } from "./common/errors.js";
import { describeError, log } from "./common/logger.js";
import type { FeederStore } from "./db/store.js";
import { SecurityEventLogger } from "./audit/security-events.js";
import { createDeviceAuthenticator } from "./security/device-auth.js";
import { PollRateLimiter } from "./security/poll-rate-limiter.js";
import { SecretEnvelope } from "./security/secret-envelope.js";
import { CommandDispatchQueue } from "./sync/command-queue.js";
import { PollService } from "./sync/poll-service.js";
import { registerPollRoutes } from "./sync/poll-routes.js";
import { DeviceManagementService } from "./management/device-management.js";
import { registerAdminRoutes } from "./management/admin-routes.js";

const LIMITER_SWEEP_MS = 60_000;

export interface ServerDeps {
  config: AppConfig;
  store: FeederStore;
  events?: SecurityEventLogger;
  /** Fastify request logging; off in tests. */
  requestLogging?: boolean;
}

export interface FeederServer {
  app: FastifyInstance;
  pollService: PollService;
  management: DeviceManagementService;
  queue: CommandDispatchQueue;
  limiter: PollRateLimiter;
  envelope: SecretEnvelope;
}

export function handleError(error: FastifyError | Error, ip?: string): { statusCode: number; body: { error: string } } {
  if (isApiError(error)) {
    return { statusCode: error.statusCode, body: { error: error.code } };
  }
  if (error instanceof ZodError) {
    return { statusCode: 400, body: { error: "validation_error" } };
  }
  const statusCode = "statusCode" in error && typeof error.statusCode === "number" ? error.statusCode : 500;
  const code = "code" in error && typeof error.code === "string" ? error.code : "";
  if (statusCode === 400 && (code.startsWith("FST_ERR_CTP") || error instanceof SyntaxError)) {
    return { statusCode: 400, body: { error: "invalid_json" } };
  }
  if (statusCode >= 400 && statusCode < 500) {
    return { statusCode, body: { error: "bad_request" } };
  }
  log.error("unhandled request error", { ip, error: describeError(error) });
  return { statusCode: 500, body: { error: "internal_error" } };
}

export async function buildServer(deps: ServerDeps): Promise<FeederServer> {
  const { config, store } = deps;
  const events = deps.events ?? new SecurityEventLogger();
  const envelope = SecretEnvelope.fromBase64(config.security.encryptionKey);
  const limiter = new PollRateLimiter({ maxPerMinute: config.deviceAuth.maxPollPerMinute });
  const queue = new CommandDispatchQueue(store, config.commands);
  const authenticator = createDeviceAuthenticator(config.deviceAuth, { nonces: store, envelope, events });
  const pollService = new PollService({
    store,
    queue,
    limiter,
    authenticator,
    pollIntervalSec: config.deviceAuth.pollIntervalSec,
    events
  });
  const management = new DeviceManagementService({ store, queue, envelope, events });

  const app = Fastify({
    logger: deps.requestLogging === false ? false : { level: config.server.logLevel }
  });

  app.setErrorHandler((error, req, reply) => {
    const { statusCode, body } = handleError(error, req.ip);
    return reply.code(statusCode).send(body);
  });

  app.get("/health", async () => ({ ok: true, signatureMode: authenticator.mode }));

  await registerPollRoutes(app, pollService);
  await registerAdminRoutes(app, management, { adminApiToken: config.security.adminApiToken, events });

  const sweepTimer = setInterval(() => {
    const removed = limiter.sweep();
    if (removed > 0) log.debug("rate limiter swept", { removed });
  }, LIMITER_SWEEP_MS);
  sweepTimer.unref();
  app.addHook("onClose", async () => {
    clearInterval(sweepTimer);
  });

  return { app, pollService, management, queue, limiter, envelope };
}
