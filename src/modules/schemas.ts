import type { FastifyReply } from "fastify";
import type { ZodError } from "zod";
import type { HavenServices } from "../services";

export interface ModuleOptions {
  services: HavenServices;
}

// ============ OpenAPI Schemas ============

/** Domain records are passed through as-is */
export const RecordSchema = {
  type: "object",
  additionalProperties: true,
} as const;

export const LocationObjectSchema = {
  type: "object",
  properties: {
    lat: { type: "number", description: "Latitude" },
    lng: { type: "number", description: "Longitude" },
  },
  required: ["lat", "lng"],
} as const;

export const IdParamsSchema = {
  type: "object",
  properties: {
    id: { type: "string", description: "Record ID" },
  },
  required: ["id"],
} as const;

export const ErrorResponseSchema = {
  type: "object",
  properties: {
    success: { type: "boolean" },
    error: { type: "string" },
    details: {},
  },
} as const;

export function itemResponse(data: object = RecordSchema) {
  return {
    type: "object",
    properties: {
      success: { type: "boolean" },
      message: { type: "string" },
      data,
    },
  } as const;
}

export function listResponse(items: object = RecordSchema) {
  return {
    type: "object",
    properties: {
      success: { type: "boolean" },
      data: { type: "array", items },
      count: { type: "integer" },
    },
  } as const;
}

export function invalidInput(reply: FastifyReply, error: ZodError) {
  return reply.status(400).send({
    success: false,
    error: "Invalid input",
    details: error.flatten(),
  });
}
