import type { FastifyInstance, FastifyRequest, FastifyReply } from "fastify";
import { z } from "zod";
import {
  AcknowledgeSchema,
  CommunicationStatusSchema,
  CreateCommunicationSchema,
  FieldUpdateSchema,
  PrioritySchema,
} from "../../shared/types";
import { resolveActor } from "../../shared/auth";
import { ForbiddenError } from "../../shared/errors";
import { isAdmin, isHospitalSide } from "../../services/permissions";
import {
  ErrorResponseSchema,
  IdParamsSchema,
  RecordSchema,
  itemResponse,
  listResponse,
  invalidInput,
  type ModuleOptions,
} from "../schemas";

// ============ Validation Schemas ============

const ListQuerySchema = z.object({
  status: CommunicationStatusSchema.optional(),
  priority: PrioritySchema.optional(),
});

const StatsQuerySchema = z.object({
  hospitalId: z.string().optional(),
  days: z.coerce.number().int().positive().max(365).default(7),
});

// ============ OpenAPI Schemas ============

const CommunicationSchema = {
  type: "object",
  additionalProperties: true,
  properties: {
    id: { type: "string" },
    alertReference: { type: "string" },
    hospitalId: { type: "string" },
    firstAiderId: { type: "string" },
    status: {
      type: "string",
      enum: [
        "pending",
        "sent",
        "delivered",
        "acknowledged",
        "preparing",
        "ready",
        "en_route",
        "arrived",
        "cancelled",
        "failed",
      ],
    },
    priority: { type: "string", enum: ["critical", "high", "medium", "low"] },
    communicationAttempts: { type: "integer" },
  },
} as const;

const SendOutcomeSchema = {
  type: "object",
  properties: {
    communication: CommunicationSchema,
    delivered: { type: "boolean" },
    channel: { type: "string", nullable: true },
  },
} as const;

const ChecklistSchema = {
  type: "object",
  additionalProperties: true,
  properties: {
    communicationId: { type: "string" },
    items: { type: "object", additionalProperties: { type: "boolean" } },
    completionPercentage: { type: "number" },
  },
} as const;

const StatusBodySchema = {
  type: "object",
  properties: {
    status: { type: "string", enum: ["en_route", "arrived", "cancelled", "failed"] },
    notes: { type: "string" },
  },
  required: ["status"],
} as const;

/**
 * Communication Routes
 * First aider ⇄ hospital handshake: delivery, acknowledgement, preparation
 * and arrival
 */
export async function communicationRoutes(fastify: FastifyInstance, opts: ModuleOptions) {
  const { communications, retry } = opts.services;

  const requireAdmin = (request: FastifyRequest) => {
    const actor = resolveActor(request);
    if (!isAdmin(actor)) {
      throw new ForbiddenError("Administrators only");
    }
    return actor;
  };

  /**
   * POST /communications
   * Open a communication with a hospital and deliver the alert
   */
  fastify.post(
    "/communications",
    {
      schema: {
        tags: ["Communications"],
        summary: "Notify a hospital of an incoming patient",
        description:
          "Creates the communication and tries api, sms, webhook and voice in order until one succeeds.",
        body: {
          type: "object",
          properties: {
            alertId: { type: "string" },
            hospitalId: { type: "string" },
            priority: { type: "string" },
            chiefComplaint: { type: "string" },
            victimName: { type: "string" },
            victimAge: { type: "integer" },
            vitalSigns: { type: "object", additionalProperties: true },
            estimatedArrivalMinutes: { type: "integer" },
          },
          required: ["alertId", "hospitalId", "chiefComplaint"],
        },
        response: {
          201: itemResponse(SendOutcomeSchema),
          400: ErrorResponseSchema,
          403: ErrorResponseSchema,
          404: ErrorResponseSchema,
        },
      },
    },
    async (request: FastifyRequest<{ Body: unknown }>, reply: FastifyReply) => {
      const actor = resolveActor(request);
      const parsed = CreateCommunicationSchema.safeParse(request.body);
      if (!parsed.success) return invalidInput(reply, parsed.error);

      const outcome = await communications.create(actor, parsed.data);
      return reply.status(201).send({
        success: true,
        message: outcome.delivered
          ? `Hospital notified via ${outcome.channel}`
          : "Hospital could not be reached; queued for retry",
        data: outcome,
      });
    }
  );

  /**
   * GET /communications
   * Communications visible to the caller
   */
  fastify.get(
    "/communications",
    {
      schema: {
        tags: ["Communications"],
        summary: "List communications",
        querystring: {
          type: "object",
          properties: {
            status: { type: "string" },
            priority: { type: "string" },
          },
        },
        response: { 200: listResponse(CommunicationSchema), 400: ErrorResponseSchema },
      },
    },
    async (request: FastifyRequest<{ Querystring: Record<string, unknown> }>, reply: FastifyReply) => {
      const actor = resolveActor(request);
      const parsed = ListQuerySchema.safeParse(request.query);
      if (!parsed.success) return invalidInput(reply, parsed.error);

      const rows = await communications.listForActor(actor, parsed.data);
      return reply.send({ success: true, data: rows, count: rows.length });
    }
  );

  fastify.get(
    "/communications/hospital/pending",
    {
      schema: {
        tags: ["Communications"],
        summary: "Alerts awaiting the caller's hospital",
        response: { 200: listResponse(CommunicationSchema), 403: ErrorResponseSchema },
      },
    },
    async (request: FastifyRequest, reply: FastifyReply) => {
      const rows = await communications.hospitalPending(resolveActor(request));
      return reply.send({ success: true, data: rows, count: rows.length });
    }
  );

  fastify.get(
    "/communications/active",
    {
      schema: {
        tags: ["Communications"],
        summary: "The first aider's communications in progress",
        response: { 200: listResponse(CommunicationSchema) },
      },
    },
    async (request: FastifyRequest, reply: FastifyReply) => {
      const rows = await communications.firstAiderActive(resolveActor(request));
      return reply.send({ success: true, data: rows, count: rows.length });
    }
  );

  /**
   * GET /communications/stats
   * Per-status counts and mean response time; hospital staff see their own
   */
  fastify.get(
    "/communications/stats",
    {
      schema: {
        tags: ["Communications"],
        summary: "Communication statistics",
        querystring: {
          type: "object",
          properties: {
            hospitalId: { type: "string" },
            days: { type: "integer", default: 7 },
          },
        },
        response: { 200: itemResponse(), 400: ErrorResponseSchema, 403: ErrorResponseSchema },
      },
    },
    async (request: FastifyRequest<{ Querystring: Record<string, unknown> }>, reply: FastifyReply) => {
      const actor = resolveActor(request);
      const parsed = StatsQuerySchema.safeParse(request.query);
      if (!parsed.success) return invalidInput(reply, parsed.error);

      let hospitalId = parsed.data.hospitalId;
      if (!isAdmin(actor)) {
        if (!isHospitalSide(actor) || !actor.hospitalId) {
          throw new ForbiddenError("Statistics are for hospital staff and administrators");
        }
        hospitalId = actor.hospitalId;
      }

      const stats = await communications.stats({ hospitalId, days: parsed.data.days });
      return reply.send({ success: true, data: stats });
    }
  );

  // ============ Maintenance ============

  fastify.post(
    "/communications/retry",
    {
      schema: {
        tags: ["Communications"],
        summary: "Resend failed communications whose backoff has elapsed",
        response: { 200: itemResponse(), 403: ErrorResponseSchema },
      },
    },
    async (request: FastifyRequest, reply: FastifyReply) => {
      requireAdmin(request);
      const summary = await retry.retryFailed();
      return reply.send({ success: true, data: summary });
    }
  );

  fastify.post(
    "/communications/timeouts",
    {
      schema: {
        tags: ["Communications"],
        summary: "Fail communications the hospital never acknowledged",
        response: { 200: itemResponse(), 403: ErrorResponseSchema },
      },
    },
    async (request: FastifyRequest, reply: FastifyReply) => {
      requireAdmin(request);
      const summary = await retry.checkTimeouts();
      return reply.send({ success: true, data: summary });
    }
  );

  // ============ Single Communication ============

  fastify.get(
    "/communications/:id",
    {
      schema: {
        tags: ["Communications"],
        summary: "Communication with its checklist, assessment and logs",
        params: IdParamsSchema,
        response: {
          200: itemResponse({
            type: "object",
            properties: {
              communication: CommunicationSchema,
              checklist: { ...ChecklistSchema, nullable: true },
              assessment: { ...RecordSchema, nullable: true },
              logs: { type: "array", items: RecordSchema },
            },
          }),
          403: ErrorResponseSchema,
          404: ErrorResponseSchema,
        },
      },
    },
    async (request: FastifyRequest<{ Params: { id: string } }>, reply: FastifyReply) => {
      const detail = await communications.getDetail(request.params.id, resolveActor(request));
      return reply.send({ success: true, data: detail });
    }
  );

  fastify.post(
    "/communications/:id/delivered",
    {
      schema: {
        tags: ["Communications"],
        summary: "Hospital confirms receipt",
        params: IdParamsSchema,
        response: {
          200: itemResponse(CommunicationSchema),
          403: ErrorResponseSchema,
          404: ErrorResponseSchema,
          409: ErrorResponseSchema,
        },
      },
    },
    async (request: FastifyRequest<{ Params: { id: string } }>, reply: FastifyReply) => {
      const communication = await communications.markDelivered(
        request.params.id,
        resolveActor(request)
      );
      return reply.send({ success: true, data: communication });
    }
  );

  /**
   * POST /communications/:id/acknowledge
   * Hospital staff acknowledge; opens the preparation checklist
   */
  fastify.post(
    "/communications/:id/acknowledge",
    {
      schema: {
        tags: ["Communications"],
        summary: "Acknowledge an incoming patient",
        params: IdParamsSchema,
        body: {
          type: "object",
          properties: { notes: { type: "string" } },
        },
        response: {
          200: itemResponse(CommunicationSchema),
          400: ErrorResponseSchema,
          403: ErrorResponseSchema,
          404: ErrorResponseSchema,
          409: ErrorResponseSchema,
        },
      },
    },
    async (request: FastifyRequest<{ Params: { id: string }; Body: unknown }>, reply: FastifyReply) => {
      const actor = resolveActor(request);
      const parsed = AcknowledgeSchema.safeParse(request.body ?? {});
      if (!parsed.success) return invalidInput(reply, parsed.error);

      const communication = await communications.acknowledge(
        request.params.id,
        actor,
        parsed.data.notes
      );
      return reply.send({
        success: true,
        message: "Emergency alert acknowledged",
        data: communication,
      });
    }
  );

  /**
   * PATCH /communications/:id/fields
   * Role-isolated update: first aiders write patient fields, hospital staff
   * write preparation flags
   */
  fastify.patch(
    "/communications/:id/fields",
    {
      schema: {
        tags: ["Communications"],
        summary: "Update communication fields",
        description:
          "First aiders: vitalSigns, firstAidProvided, estimatedArrivalMinutes. Hospital staff: doctorsReady, nursesReady, equipmentReady, bedReady, bloodAvailable, hospitalPreparationNotes. Any other key rejects the whole request.",
        params: IdParamsSchema,
        body: { type: "object", additionalProperties: true },
        response: {
          200: itemResponse(CommunicationSchema),
          400: ErrorResponseSchema,
          403: ErrorResponseSchema,
          404: ErrorResponseSchema,
          409: ErrorResponseSchema,
        },
      },
    },
    async (request: FastifyRequest<{ Params: { id: string }; Body: unknown }>, reply: FastifyReply) => {
      const actor = resolveActor(request);
      const parsed = FieldUpdateSchema.safeParse(request.body);
      if (!parsed.success) return invalidInput(reply, parsed.error);

      const communication = await communications.updateFields(
        request.params.id,
        actor,
        parsed.data
      );
      return reply.send({ success: true, data: communication });
    }
  );

  fastify.get(
    "/communications/:id/checklist",
    {
      schema: {
        tags: ["Communications"],
        summary: "Preparation checklist",
        params: IdParamsSchema,
        response: {
          200: itemResponse(ChecklistSchema),
          403: ErrorResponseSchema,
          404: ErrorResponseSchema,
        },
      },
    },
    async (request: FastifyRequest<{ Params: { id: string } }>, reply: FastifyReply) => {
      const checklist = await communications.getChecklist(
        request.params.id,
        resolveActor(request)
      );
      return reply.send({ success: true, data: checklist });
    }
  );

  fastify.patch(
    "/communications/:id/checklist",
    {
      schema: {
        tags: ["Communications"],
        summary: "Tick preparation checklist items",
        params: IdParamsSchema,
        body: { type: "object", additionalProperties: true },
        response: {
          200: itemResponse(ChecklistSchema),
          400: ErrorResponseSchema,
          403: ErrorResponseSchema,
          404: ErrorResponseSchema,
          409: ErrorResponseSchema,
        },
      },
    },
    async (request: FastifyRequest<{ Params: { id: string }; Body: unknown }>, reply: FastifyReply) => {
      const checklist = await communications.updateChecklist(
        request.params.id,
        resolveActor(request),
        request.body
      );
      return reply.send({ success: true, data: checklist });
    }
  );

  fastify.patch(
    "/communications/:id/status",
    {
      schema: {
        tags: ["Communications"],
        summary: "Mark en route, arrived, cancelled or failed",
        params: IdParamsSchema,
        body: StatusBodySchema,
        response: {
          200: itemResponse(CommunicationSchema),
          400: ErrorResponseSchema,
          403: ErrorResponseSchema,
          404: ErrorResponseSchema,
          409: ErrorResponseSchema,
        },
      },
    },
    async (request: FastifyRequest<{ Params: { id: string }; Body: unknown }>, reply: FastifyReply) => {
      const communication = await communications.updateStatus(
        request.params.id,
        resolveActor(request),
        request.body
      );
      return reply.send({ success: true, data: communication });
    }
  );

  fastify.post(
    "/communications/:id/assessment",
    {
      schema: {
        tags: ["Communications"],
        summary: "Record the first aider's assessment",
        params: IdParamsSchema,
        body: { type: "object", additionalProperties: true },
        response: {
          201: itemResponse(),
          400: ErrorResponseSchema,
          403: ErrorResponseSchema,
          404: ErrorResponseSchema,
          409: ErrorResponseSchema,
        },
      },
    },
    async (request: FastifyRequest<{ Params: { id: string }; Body: unknown }>, reply: FastifyReply) => {
      const assessment = await communications.addAssessment(
        request.params.id,
        resolveActor(request),
        request.body ?? {}
      );
      return reply.status(201).send({ success: true, data: assessment });
    }
  );

  fastify.get(
    "/communications/:id/logs",
    {
      schema: {
        tags: ["Communications"],
        summary: "Delivery and update log",
        params: IdParamsSchema,
        response: {
          200: listResponse(RecordSchema),
          403: ErrorResponseSchema,
          404: ErrorResponseSchema,
        },
      },
    },
    async (request: FastifyRequest<{ Params: { id: string } }>, reply: FastifyReply) => {
      const logs = await communications.logs(request.params.id, resolveActor(request));
      return reply.send({ success: true, data: logs, count: logs.length });
    }
  );
}
