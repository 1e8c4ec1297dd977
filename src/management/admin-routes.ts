// Copyright (c) 2025 EdgeCoder, LLC
// SPDX-License-Identifier: BUSL-1.1

import { z } from "zod";
import type { FastifyInstance, FastifyReply, FastifyRequest } from "fastify";
import { COMMAND_TYPES, type CommandType } from "../common/types.js";
import { safeEqual } from "../common/crypto-utils.js";
import { SecurityEventLogger } from "../audit/security-events.js";
import { scheduleEventSchema } from "../sync/command-queue.js";
import type { DeviceManagementService } from "./device-management.js";

/* ------------------------------------------------------------------ */
/*  Zod request-body schemas (exported for direct unit-testing)       */
/* ------------------------------------------------------------------ */

export const createDeviceSchema = z.object({
  ownerUserId: z.string().min(1),
  deviceId: z.string().min(1),
  name: z.string().min(1)
});

export const createProfileSchema = z.object({
  name: z.string().min(1),
  defaultPortionMs: z.number().int()
});

export const updateProfileSchema = z.object({
  defaultPortionMs: z.number().int()
});

export const replaceScheduleSchema = z.object({
  events: z.array(scheduleEventSchema)
});

export const setActiveProfileSchema = z.object({
  profileName: z.string().min(1)
});

export const feedNowSchema = z
  .object({
    portionMs: z.number().int().optional()
  })
  .default({});

const commandTypeSchema = z.custom<CommandType>(
  (value) => typeof value === "string" && COMMAND_TYPES.some((type) => type === value)
);

export const enqueueCommandSchema = z.object({
  commandType: commandTypeSchema,
  payload: z.record(z.string(), z.unknown()).default({})
});

export const logQuerySchema = z.object({
  type: z.string().optional(),
  q: z.string().optional(),
  page: z.coerce.number().int().min(0).default(0),
  size: z.coerce.number().int().default(50)
});

export const commandListQuerySchema = z.object({
  limit: z.coerce.number().int().default(50)
});

const deviceParams = z.object({ deviceId: z.string().min(1) });
const profileParams = deviceParams.extend({ profileName: z.string().min(1) });
const commandParams = deviceParams.extend({ commandId: z.string().min(1) });

/* ------------------------------------------------------------------ */
/*  Admin token                                                       */
/* ------------------------------------------------------------------ */

export function extractAdminToken(headers: Record<string, unknown>): string | undefined {
  const direct = headers["x-admin-token"];
  if (typeof direct === "string" && direct.length > 0) return direct;
  const auth = headers.authorization;
  if (typeof auth === "string" && auth.startsWith("Bearer ")) {
    return auth.slice("Bearer ".length).trim();
  }
  return undefined;
}

/* ------------------------------------------------------------------ */
/*  Route registration                                                */
/* ------------------------------------------------------------------ */

export async function registerAdminRoutes(
  app: FastifyInstance,
  service: DeviceManagementService,
  deps: { adminApiToken: string; events?: SecurityEventLogger }
): Promise<void> {
  const events = deps.events ?? new SecurityEventLogger();

  // An empty token leaves the admin surface open, for local development.
  const authorizeAdmin = async (req: FastifyRequest, reply: FastifyReply) => {
    if (!deps.adminApiToken) return;
    const token = extractAdminToken(req.headers);
    if (token === undefined || !safeEqual(token, deps.adminApiToken)) {
      events.record("admin_auth_failed", { ip: req.ip, details: { path: req.url } });
      return reply.code(401).send({ error: "admin_token_required" });
    }
  };

  await app.register(
    async (admin) => {
      admin.addHook("onRequest", authorizeAdmin);

      /* ---- Devices ---- */
      admin.post("/devices", async (req, reply) => {
        const body = createDeviceSchema.parse(req.body);
        const issued = await service.createDevice(body.ownerUserId, body.deviceId, body.name);
        return reply.code(201).send(issued);
      });

      admin.get("/devices/:deviceId", async (req) => {
        const { deviceId } = deviceParams.parse(req.params);
        return service.getDevice(deviceId);
      });

      admin.post("/devices/:deviceId/rotate-secret", async (req) => {
        const { deviceId } = deviceParams.parse(req.params);
        return service.rotateSecret(deviceId);
      });

      /* ---- Profiles and schedule ---- */
      admin.post("/devices/:deviceId/profiles", async (req, reply) => {
        const { deviceId } = deviceParams.parse(req.params);
        const body = createProfileSchema.parse(req.body);
        const profile = await service.createProfile(deviceId, body.name, body.defaultPortionMs);
        return reply.code(201).send(profile);
      });

      admin.patch("/devices/:deviceId/profiles/:profileName", async (req) => {
        const { deviceId, profileName } = profileParams.parse(req.params);
        const body = updateProfileSchema.parse(req.body);
        const command = await service.updateDefaultPortion(deviceId, profileName, body.defaultPortionMs);
        return { ok: true, commandId: command.id };
      });

      admin.put("/devices/:deviceId/profiles/:profileName/schedule", async (req) => {
        const { deviceId, profileName } = profileParams.parse(req.params);
        const body = replaceScheduleSchema.parse(req.body);
        const command = await service.replaceSchedule(deviceId, profileName, body.events);
        return { ok: true, commandId: command.id };
      });

      admin.post("/devices/:deviceId/active-profile", async (req) => {
        const { deviceId } = deviceParams.parse(req.params);
        const body = setActiveProfileSchema.parse(req.body);
        const command = await service.setActiveProfile(deviceId, body.profileName);
        return { ok: true, commandId: command.id };
      });

      /* ---- Commands ---- */
      admin.post("/devices/:deviceId/feed-now", async (req) => {
        const { deviceId } = deviceParams.parse(req.params);
        const body = feedNowSchema.parse(req.body ?? {});
        const command = await service.feedNow(deviceId, body.portionMs);
        return { ok: true, commandId: command.id };
      });

      admin.post("/devices/:deviceId/commands", async (req, reply) => {
        const { deviceId } = deviceParams.parse(req.params);
        const body = enqueueCommandSchema.parse(req.body);
        const command = await service.enqueueCommand(deviceId, body.commandType, body.payload);
        return reply.code(201).send(command);
      });

      admin.get("/devices/:deviceId/commands", async (req) => {
        const { deviceId } = deviceParams.parse(req.params);
        const query = commandListQuerySchema.parse(req.query);
        return { commands: await service.listCommands(deviceId, query.limit) };
      });

      admin.post("/devices/:deviceId/commands/:commandId/cancel", async (req) => {
        const { deviceId, commandId } = commandParams.parse(req.params);
        await service.cancelCommand(deviceId, commandId);
        return { ok: true };
      });

      /* ---- Logs ---- */
      admin.get("/devices/:deviceId/logs", async (req) => {
        const { deviceId } = deviceParams.parse(req.params);
        const query = logQuerySchema.parse(req.query);
        const logs = await service.listLogs(deviceId, {
          type: query.type,
          query: query.q,
          page: query.page,
          size: query.size
        });
        return { logs };
      });
    },
    { prefix: "/api/admin" }
  );
}
