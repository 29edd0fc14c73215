import type { FastifyInstance, FastifyRequest, FastifyReply } from "fastify";
import { z } from "zod";
import {
  EmergencyTypeSchema,
  HospitalLevelSchema,
  SpecialtySchema,
  UpdateCapacitySchema,
} from "../../shared/types";
import { resolveActor } from "../../shared/auth";
import { ForbiddenError } from "../../shared/errors";
import { isAdmin, worksAt } from "../../services/permissions";
import { toPublicHospital } from "../../services/discovery.service";
import {
  ErrorResponseSchema,
  IdParamsSchema,
  itemResponse,
  listResponse,
  invalidInput,
  type ModuleOptions,
} from "../schemas";

// ============ Validation Schemas ============

const csvList = z
  .string()
  .optional()
  .transform((value) =>
    value ? value.split(",").map((s) => s.trim()).filter(Boolean) : []
  );

const NearbyQuerySchema = z.object({
  lat: z.coerce.number(),
  lng: z.coerce.number(),
  radiusKm: z.coerce.number().positive().optional(),
  specialties: csvList.pipe(z.array(SpecialtySchema)),
  level: HospitalLevelSchema.optional(),
  emergencyType: EmergencyTypeSchema.optional(),
  maxResults: z.coerce.number().int().positive().max(100).optional(),
});

const SearchQuerySchema = z.object({
  q: z.string().min(1),
  lat: z.coerce.number().optional(),
  lng: z.coerce.number().optional(),
  maxResults: z.coerce.number().int().positive().max(100).optional(),
});

const MatchBodySchema = z.object({
  lat: z.number(),
  lng: z.number(),
  emergencyType: EmergencyTypeSchema,
  requiredSpecialties: z.array(SpecialtySchema).optional(),
  maxDistanceKm: z.number().positive().optional(),
  maxResults: z.number().int().positive().max(50).optional(),
  excludeHospitalIds: z.array(z.string()).optional(),
});

const FallbackQuerySchema = z.object({
  lat: z.coerce.number(),
  lng: z.coerce.number(),
  maxResults: z.coerce.number().int().positive().max(20).optional(),
});

// ============ OpenAPI Schemas ============

const HospitalSummarySchema = {
  type: "object",
  additionalProperties: true,
  properties: {
    id: { type: "string" },
    name: { type: "string" },
    level: { type: "string" },
    distanceKm: { type: "number" },
  },
} as const;

const HospitalMatchSchema = {
  type: "object",
  properties: {
    hospital: HospitalSummarySchema,
    score: {
      type: "object",
      properties: {
        distanceScore: { type: "number" },
        capacityScore: { type: "number" },
        specialtyScore: { type: "number" },
        levelScore: { type: "number" },
        ratingScore: { type: "number" },
        totalScore: { type: "number" },
      },
    },
    distanceKm: { type: "number" },
    etaMinutes: { type: "integer" },
  },
} as const;

const LocationQuerySchema = {
  lat: { type: "number", description: "Latitude" },
  lng: { type: "number", description: "Longitude" },
} as const;

/**
 * Hospital Routes
 * Discovery, matching, availability and capacity reports
 */
export async function hospitalRoutes(fastify: FastifyInstance, opts: ModuleOptions) {
  const { discovery, matching } = opts.services;

  /**
   * GET /hospitals/nearby
   * Operational hospitals around a point, nearest first
   */
  fastify.get(
    "/hospitals/nearby",
    {
      schema: {
        tags: ["Hospitals"],
        summary: "Find nearby hospitals",
        description:
          "Hospitals accepting emergencies within radiusKm (default 50). Filter with ?specialties=trauma,icu and ?level=level_4.",
        querystring: {
          type: "object",
          properties: {
            ...LocationQuerySchema,
            radiusKm: { type: "number", default: 50 },
            specialties: { type: "string", description: "Comma-separated specialties" },
            level: { type: "string" },
            emergencyType: { type: "string" },
            maxResults: { type: "integer", default: 20 },
          },
          required: ["lat", "lng"],
        },
        response: {
          200: listResponse(HospitalSummarySchema),
          400: ErrorResponseSchema,
        },
      },
    },
    async (request: FastifyRequest<{ Querystring: Record<string, unknown> }>, reply: FastifyReply) => {
      const parsed = NearbyQuerySchema.safeParse(request.query);
      if (!parsed.success) return invalidInput(reply, parsed.error);

      const hospitals = await discovery.findNearby(parsed.data);
      return reply.send({ success: true, data: hospitals, count: hospitals.length });
    }
  );

  /**
   * GET /hospitals/search
   * Text search over name, city and specialties
   */
  fastify.get(
    "/hospitals/search",
    {
      schema: {
        tags: ["Hospitals"],
        summary: "Search hospitals",
        querystring: {
          type: "object",
          properties: {
            q: { type: "string", description: "Search text" },
            ...LocationQuerySchema,
            maxResults: { type: "integer" },
          },
          required: ["q"],
        },
        response: {
          200: listResponse(HospitalSummarySchema),
          400: ErrorResponseSchema,
        },
      },
    },
    async (request: FastifyRequest<{ Querystring: Record<string, unknown> }>, reply: FastifyReply) => {
      const parsed = SearchQuerySchema.safeParse(request.query);
      if (!parsed.success) return invalidInput(reply, parsed.error);

      const { q, lat, lng, maxResults } = parsed.data;
      const near = lat !== undefined && lng !== undefined ? { lat, lng } : undefined;
      const hospitals = await discovery.search(q, near, maxResults);
      return reply.send({ success: true, data: hospitals, count: hospitals.length });
    }
  );

  /**
   * POST /hospitals/match
   * Rank hospitals for an emergency with the score breakdown
   */
  fastify.post(
    "/hospitals/match",
    {
      schema: {
        tags: ["Hospitals"],
        summary: "Match hospitals to an emergency",
        description:
          "Scores each candidate on distance (40%), capacity (25%), specialty (20%), level (10%) and emergency ratings (5%).",
        body: {
          type: "object",
          properties: {
            ...LocationQuerySchema,
            emergencyType: { type: "string" },
            requiredSpecialties: { type: "array", items: { type: "string" } },
            maxDistanceKm: { type: "number" },
            maxResults: { type: "integer" },
            excludeHospitalIds: { type: "array", items: { type: "string" } },
          },
          required: ["lat", "lng", "emergencyType"],
        },
        response: {
          200: listResponse(HospitalMatchSchema),
          400: ErrorResponseSchema,
        },
      },
    },
    async (request: FastifyRequest<{ Body: unknown }>, reply: FastifyReply) => {
      const parsed = MatchBodySchema.safeParse(request.body);
      if (!parsed.success) return invalidInput(reply, parsed.error);

      const matches = await matching.findBestHospitals(parsed.data);
      return reply.send({ success: true, data: matches, count: matches.length });
    }
  );

  /**
   * GET /hospitals/:id
   * Full hospital record
   */
  fastify.get(
    "/hospitals/:id",
    {
      schema: {
        tags: ["Hospitals"],
        summary: "Get hospital by ID",
        params: IdParamsSchema,
        response: {
          200: itemResponse(),
          404: ErrorResponseSchema,
        },
      },
    },
    async (request: FastifyRequest<{ Params: { id: string } }>, reply: FastifyReply) => {
      const hospital = await discovery.getDetails(request.params.id);
      return reply.send({ success: true, data: toPublicHospital(hospital) });
    }
  );

  /**
   * GET /hospitals/:id/availability
   * Whether the hospital can take an emergency right now
   */
  fastify.get(
    "/hospitals/:id/availability",
    {
      schema: {
        tags: ["Hospitals"],
        summary: "Check hospital availability",
        params: IdParamsSchema,
        response: {
          200: itemResponse(),
          404: ErrorResponseSchema,
        },
      },
    },
    async (request: FastifyRequest<{ Params: { id: string } }>, reply: FastifyReply) => {
      const availability = await discovery.checkAvailability(request.params.id);
      return reply.send({ success: true, data: availability });
    }
  );

  /**
   * GET /hospitals/:id/fallbacks
   * Alternatives when the primary hospital cannot take the patient
   */
  fastify.get(
    "/hospitals/:id/fallbacks",
    {
      schema: {
        tags: ["Hospitals"],
        summary: "Fallback hospitals",
        description: "Generic medical matching within 100 km, primary hospital excluded",
        params: IdParamsSchema,
        querystring: {
          type: "object",
          properties: { ...LocationQuerySchema, maxResults: { type: "integer", default: 3 } },
          required: ["lat", "lng"],
        },
        response: {
          200: listResponse(HospitalMatchSchema),
          400: ErrorResponseSchema,
          404: ErrorResponseSchema,
        },
      },
    },
    async (
      request: FastifyRequest<{ Params: { id: string }; Querystring: Record<string, unknown> }>,
      reply: FastifyReply
    ) => {
      const parsed = FallbackQuerySchema.safeParse(request.query);
      if (!parsed.success) return invalidInput(reply, parsed.error);

      const { lat, lng, maxResults } = parsed.data;
      const matches = await matching.getFallbackHospitals(request.params.id, lat, lng, maxResults);
      return reply.send({ success: true, data: matches, count: matches.length });
    }
  );

  /**
   * PATCH /hospitals/:id/capacity
   * Capacity report from the hospital's own staff
   */
  fastify.patch(
    "/hospitals/:id/capacity",
    {
      schema: {
        tags: ["Hospitals"],
        summary: "Update hospital capacity",
        params: IdParamsSchema,
        body: {
          type: "object",
          properties: {
            totalBeds: { type: "integer" },
            availableBeds: { type: "integer" },
            icuBedsTotal: { type: "integer" },
            icuBedsAvailable: { type: "integer" },
            emergencyBedsTotal: { type: "integer" },
            emergencyBedsAvailable: { type: "integer" },
            capacityStatus: {
              type: "string",
              enum: ["low", "moderate", "high", "full", "overflow"],
            },
            isAcceptingPatients: { type: "boolean" },
            emergencyWaitTime: { type: "integer" },
          },
        },
        response: {
          200: itemResponse(),
          400: ErrorResponseSchema,
          403: ErrorResponseSchema,
          404: ErrorResponseSchema,
        },
      },
    },
    async (request: FastifyRequest<{ Params: { id: string }; Body: unknown }>, reply: FastifyReply) => {
      const actor = resolveActor(request);
      if (!isAdmin(actor) && !worksAt(actor, request.params.id)) {
        throw new ForbiddenError("Only this hospital's staff can report its capacity");
      }

      const parsed = UpdateCapacitySchema.safeParse(request.body);
      if (!parsed.success) return invalidInput(reply, parsed.error);

      const hospital = await discovery.updateCapacity(request.params.id, parsed.data);
      return reply.send({
        success: true,
        message: "Capacity updated",
        data: toPublicHospital(hospital),
      });
    }
  );
}
