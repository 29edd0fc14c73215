import type { FastifyInstance, FastifyRequest, FastifyReply } from "fastify";
import { z } from "zod";
import { AlertStatusSchema, CreateAlertSchema } from "../../shared/types";
import { resolveActor } from "../../shared/auth";
import { ForbiddenError } from "../../shared/errors";
import { isAdmin } from "../../services/permissions";
import {
  ErrorResponseSchema,
  IdParamsSchema,
  LocationObjectSchema,
  RecordSchema,
  itemResponse,
  listResponse,
  invalidInput,
  type ModuleOptions,
} from "../schemas";

// ============ Validation Schemas ============

const AlertStatusUpdateSchema = z.object({
  status: AlertStatusSchema,
  details: z.record(z.unknown()).default({}),
});

const CancelSchema = z.object({
  reason: z.string().max(500).default(""),
});

const InitiateVerificationSchema = z.object({
  method: z.enum(["sms", "call"]).default("sms"),
});

const VerifyCodeSchema = z.object({
  code: z.string().regex(/^\d{6}$/, "Code must be 6 digits"),
});

// ============ OpenAPI Schemas ============

const AlertSchema = {
  type: "object",
  additionalProperties: true,
  properties: {
    id: { type: "string" },
    reference: { type: "string", example: "EMG202601011200AB12CD" },
    emergencyType: {
      type: "string",
      enum: ["medical", "accident", "cardiac", "trauma", "respiratory", "pediatric", "other"],
    },
    priority: { type: "string", enum: ["critical", "high", "medium", "low"] },
    status: { type: "string" },
    location: LocationObjectSchema,
    createdAt: { type: "string", format: "date-time" },
  },
} as const;

/**
 * Emergency Alert Routes
 * Raising, verifying and dispatching alerts
 */
export async function alertRoutes(fastify: FastifyInstance, opts: ModuleOptions) {
  const { alerts, verification, orchestrator } = opts.services;

  const assertReporterOrAdmin = async (alertId: string, request: FastifyRequest) => {
    const actor = resolveActor(request);
    const alert = await alerts.get(alertId);
    if (!isAdmin(actor) && alert.reporterId !== actor.userId) {
      throw new ForbiddenError("Only the reporter or an administrator can do this");
    }
    return actor;
  };

  /**
   * POST /alerts
   * Raise an emergency alert (first aiders)
   */
  fastify.post(
    "/alerts",
    {
      schema: {
        tags: ["Alerts"],
        summary: "Raise an emergency alert",
        description:
          "Creates an alert. A second alert from the same reporter within 2 minutes returns the first one.",
        body: {
          type: "object",
          properties: {
            emergencyType: { type: "string" },
            priority: { type: "string" },
            location: LocationObjectSchema,
            address: { type: "string" },
            description: { type: "string" },
            reporterPhone: { type: "string" },
          },
          required: ["emergencyType", "location"],
        },
        response: {
          200: itemResponse(AlertSchema),
          201: itemResponse(AlertSchema),
          400: ErrorResponseSchema,
          401: ErrorResponseSchema,
          403: ErrorResponseSchema,
        },
      },
    },
    async (request: FastifyRequest<{ Body: unknown }>, reply: FastifyReply) => {
      const actor = resolveActor(request);
      const parsed = CreateAlertSchema.safeParse(request.body);
      if (!parsed.success) return invalidInput(reply, parsed.error);

      const { alert, duplicate } = await alerts.createAlert(actor, parsed.data);
      return reply.status(duplicate ? 200 : 201).send({
        success: true,
        message: duplicate ? "Existing alert returned" : "Alert created",
        data: alert,
      });
    }
  );

  /**
   * GET /alerts/active
   * Active alerts; first aiders only see their own
   */
  fastify.get(
    "/alerts/active",
    {
      schema: {
        tags: ["Alerts"],
        summary: "List active alerts",
        response: { 200: listResponse(AlertSchema), 401: ErrorResponseSchema },
      },
    },
    async (request: FastifyRequest, reply: FastifyReply) => {
      const active = await alerts.listActive(resolveActor(request));
      return reply.send({ success: true, data: active, count: active.length });
    }
  );

  /**
   * GET /alerts/history
   * The caller's own alerts, newest first
   */
  fastify.get(
    "/alerts/history",
    {
      schema: {
        tags: ["Alerts"],
        summary: "Alert history for the caller",
        response: { 200: listResponse(AlertSchema), 401: ErrorResponseSchema },
      },
    },
    async (request: FastifyRequest, reply: FastifyReply) => {
      const history = await alerts.history(resolveActor(request).userId);
      return reply.send({ success: true, data: history, count: history.length });
    }
  );

  fastify.get(
    "/alerts/:id",
    {
      schema: {
        tags: ["Alerts"],
        summary: "Get alert by ID",
        params: IdParamsSchema,
        response: { 200: itemResponse(AlertSchema), 404: ErrorResponseSchema },
      },
    },
    async (request: FastifyRequest<{ Params: { id: string } }>, reply: FastifyReply) => {
      resolveActor(request);
      const alert = await alerts.get(request.params.id);
      return reply.send({ success: true, data: alert });
    }
  );

  fastify.get(
    "/alerts/:id/updates",
    {
      schema: {
        tags: ["Alerts"],
        summary: "Alert audit trail",
        params: IdParamsSchema,
        response: { 200: listResponse(RecordSchema), 404: ErrorResponseSchema },
      },
    },
    async (request: FastifyRequest<{ Params: { id: string } }>, reply: FastifyReply) => {
      resolveActor(request);
      const updates = await alerts.updates(request.params.id);
      return reply.send({ success: true, data: updates, count: updates.length });
    }
  );

  /**
   * PATCH /alerts/:id/status
   * Move the alert along; terminal alerts refuse
   */
  fastify.patch(
    "/alerts/:id/status",
    {
      schema: {
        tags: ["Alerts"],
        summary: "Update alert status",
        params: IdParamsSchema,
        body: {
          type: "object",
          properties: {
            status: { type: "string" },
            details: { type: "object", additionalProperties: true },
          },
          required: ["status"],
        },
        response: {
          200: itemResponse(AlertSchema),
          400: ErrorResponseSchema,
          403: ErrorResponseSchema,
          404: ErrorResponseSchema,
          409: ErrorResponseSchema,
        },
      },
    },
    async (request: FastifyRequest<{ Params: { id: string }; Body: unknown }>, reply: FastifyReply) => {
      const actor = await assertReporterOrAdmin(request.params.id, request);
      const parsed = AlertStatusUpdateSchema.safeParse(request.body);
      if (!parsed.success) return invalidInput(reply, parsed.error);

      const alert = await alerts.updateStatus(
        request.params.id,
        parsed.data.status,
        actor.userId,
        parsed.data.details
      );
      return reply.send({ success: true, data: alert });
    }
  );

  fastify.patch(
    "/alerts/:id/location",
    {
      schema: {
        tags: ["Alerts"],
        summary: "Update alert location",
        params: IdParamsSchema,
        body: LocationObjectSchema,
        response: {
          200: itemResponse(AlertSchema),
          400: ErrorResponseSchema,
          403: ErrorResponseSchema,
          404: ErrorResponseSchema,
        },
      },
    },
    async (request: FastifyRequest<{ Params: { id: string }; Body: unknown }>, reply: FastifyReply) => {
      const alert = await alerts.updateLocation(
        request.params.id,
        resolveActor(request),
        request.body
      );
      return reply.send({ success: true, data: alert });
    }
  );

  fastify.post(
    "/alerts/:id/cancel",
    {
      schema: {
        tags: ["Alerts"],
        summary: "Cancel an alert (reporter only)",
        params: IdParamsSchema,
        response: {
          200: itemResponse(AlertSchema),
          403: ErrorResponseSchema,
          404: ErrorResponseSchema,
          409: ErrorResponseSchema,
        },
      },
    },
    async (request: FastifyRequest<{ Params: { id: string }; Body: unknown }>, reply: FastifyReply) => {
      const parsed = CancelSchema.safeParse(request.body ?? {});
      if (!parsed.success) return invalidInput(reply, parsed.error);

      const alert = await alerts.cancel(
        request.params.id,
        resolveActor(request),
        parsed.data.reason
      );
      return reply.send({ success: true, message: "Alert cancelled", data: alert });
    }
  );

  fastify.delete(
    "/alerts/:id",
    {
      schema: {
        tags: ["Alerts"],
        summary: "Delete an alert and everything attached to it",
        params: IdParamsSchema,
        response: {
          200: itemResponse(),
          403: ErrorResponseSchema,
          404: ErrorResponseSchema,
        },
      },
    },
    async (request: FastifyRequest<{ Params: { id: string } }>, reply: FastifyReply) => {
      await alerts.delete(request.params.id, resolveActor(request));
      return reply.send({
        success: true,
        message: "Alert deleted",
        data: { id: request.params.id },
      });
    }
  );

  // ============ Verification ============

  fastify.post(
    "/alerts/:id/verification",
    {
      schema: {
        tags: ["Alerts"],
        summary: "Send a verification code to the reporter",
        params: IdParamsSchema,
        response: {
          200: itemResponse(),
          400: ErrorResponseSchema,
          404: ErrorResponseSchema,
          409: ErrorResponseSchema,
        },
      },
    },
    async (request: FastifyRequest<{ Params: { id: string }; Body: unknown }>, reply: FastifyReply) => {
      await assertReporterOrAdmin(request.params.id, request);
      const parsed = InitiateVerificationSchema.safeParse(request.body ?? {});
      if (!parsed.success) return invalidInput(reply, parsed.error);

      const { verification: record, delivery } = await verification.initiate(
        request.params.id,
        parsed.data.method
      );
      return reply.send({
        success: true,
        message: delivery.success ? "Verification code sent" : "Verification code not delivered",
        data: {
          verificationId: record.id,
          method: record.method,
          delivered: delivery.success,
        },
      });
    }
  );

  fastify.post(
    "/alerts/:id/verification/confirm",
    {
      schema: {
        tags: ["Alerts"],
        summary: "Confirm a verification code",
        params: IdParamsSchema,
        body: {
          type: "object",
          properties: { code: { type: "string" } },
          required: ["code"],
        },
        response: {
          200: itemResponse({
            type: "object",
            properties: { verified: { type: "boolean" } },
          }),
          400: ErrorResponseSchema,
          404: ErrorResponseSchema,
        },
      },
    },
    async (request: FastifyRequest<{ Params: { id: string }; Body: unknown }>, reply: FastifyReply) => {
      await assertReporterOrAdmin(request.params.id, request);
      const parsed = VerifyCodeSchema.safeParse(request.body);
      if (!parsed.success) return invalidInput(reply, parsed.error);

      const verified = await verification.verifyCode(request.params.id, parsed.data.code);
      return reply.send({ success: true, data: { verified } });
    }
  );

  // ============ Dispatch ============

  /**
   * POST /alerts/:id/process
   * Verify, pick the nearest suitable hospital and notify it
   */
  fastify.post(
    "/alerts/:id/process",
    {
      schema: {
        tags: ["Alerts"],
        summary: "Dispatch the alert to a hospital",
        description:
          "Runs verification, discovery within 10 km, hospital selection and notification. Calling it again returns the existing dispatch.",
        params: IdParamsSchema,
        response: {
          200: itemResponse({
            type: "object",
            properties: {
              alert: AlertSchema,
              hospital: { ...RecordSchema, nullable: true },
              communication: { ...RecordSchema, nullable: true },
              selection: {
                type: "string",
                enum: ["distance_matrix", "haversine", "existing"],
              },
            },
          }),
          403: ErrorResponseSchema,
          404: ErrorResponseSchema,
          409: ErrorResponseSchema,
        },
      },
    },
    async (request: FastifyRequest<{ Params: { id: string } }>, reply: FastifyReply) => {
      await assertReporterOrAdmin(request.params.id, request);
      const result = await orchestrator.processAlert(request.params.id);
      return reply.send({
        success: true,
        data: {
          ...result,
          hospital: result.hospital && {
            id: result.hospital.id,
            name: result.hospital.name,
            phone: result.hospital.phone,
            emergencyPhone: result.hospital.emergencyPhone,
            location: result.hospital.location,
          },
        },
      });
    }
  );
}
