import Fastify, { type FastifyError } from "fastify";
import cors from "@fastify/cors";
import swagger from "@fastify/swagger";
import swaggerUi from "@fastify/swagger-ui";
import { ZodError } from "zod";

import { alertRoutes } from "./modules/alerts/routes";
import { communicationRoutes } from "./modules/communications/routes";
import { hospitalRoutes } from "./modules/hospitals/routes";
import type { HavenServices } from "./services";
import { config } from "./shared/config";
import { HavenError } from "./shared/errors";
import { loggerOptions } from "./shared/logger";

export interface BuildAppOptions {
  /** Serve the OpenAPI document and UI at /docs */
  docs?: boolean;
}

/**
 * Build and configure Fastify application
 */
export async function buildApp(services: HavenServices, options: BuildAppOptions = {}) {
  const { docs = true } = options;

  const fastify = Fastify({ logger: loggerOptions });

  if (docs) {
    const swaggerServerUrl = process.env.SWAGGER_SERVER_URL || `http://localhost:${config.port}`;

    await fastify.register(swagger, {
      openapi: {
        info: {
          title: "Haven API",
          description: `
## Emergency Response Coordination

Connects first aiders at the scene with the hospital that will receive the patient.

### Features
- **Hospitals**: Discovery by distance, specialty and facility level; weighted matching
- **Alerts**: Raise, verify and dispatch emergency alerts
- **Communications**: Deliver the alert to the hospital, track acknowledgement, preparation and arrival

### Authentication
Requests carry the caller's identity in \`x-user-id\`, \`x-user-role\` and, for hospital staff, \`x-hospital-id\`.
          `,
          version: "1.0.0",
        },
        servers: [
          {
            url: swaggerServerUrl,
            description: swaggerServerUrl.includes("localhost")
              ? "Local development server"
              : "Configured server",
          },
        ],
        tags: [
          { name: "Hospitals", description: "Hospital discovery and matching" },
          { name: "Alerts", description: "Emergency alerts and verification" },
          {
            name: "Communications",
            description: "First aider to hospital handshake",
          },
          { name: "System", description: "System health and info" },
        ],
      },
    });

    await fastify.register(swaggerUi, {
      routePrefix: "/docs",
      uiConfig: {
        docExpansion: "list",
        deepLinking: true,
        displayRequestDuration: true,
      },
      staticCSP: true,
    });
  }

  await fastify.register(cors, {
    origin: true,
    methods: ["GET", "POST", "PUT", "PATCH", "DELETE", "OPTIONS"],
  });

  fastify.setErrorHandler((error: FastifyError, request, reply) => {
    if (error instanceof HavenError) {
      if (error.statusCode >= 500) {
        request.log.error({ err: error }, error.message);
      }
      return reply.status(error.statusCode).send({
        success: false,
        error: error.message,
        details: error.details,
      });
    }
    if (error instanceof ZodError) {
      return reply.status(400).send({
        success: false,
        error: "Invalid input",
        details: error.flatten(),
      });
    }
    if (error.validation) {
      return reply.status(400).send({
        success: false,
        error: error.message,
      });
    }
    if (error.statusCode && error.statusCode < 500) {
      return reply.status(error.statusCode).send({ success: false, error: error.message });
    }

    request.log.error({ err: error }, "Unhandled error");
    return reply.status(500).send({ success: false, error: "Internal server error" });
  });

  // Health check endpoint
  fastify.get(
    "/health",
    {
      schema: {
        tags: ["System"],
        summary: "Health check",
        description: "Check if the API server is running",
        response: {
          200: {
            type: "object",
            properties: {
              status: { type: "string", example: "ok" },
              timestamp: { type: "string", format: "date-time" },
              uptime: {
                type: "number",
                description: "Server uptime in seconds",
              },
            },
          },
        },
      },
    },
    async (_request, reply) => {
      return reply.send({
        status: "ok",
        timestamp: new Date().toISOString(),
        uptime: process.uptime(),
      });
    }
  );

  // API info endpoint
  fastify.get(
    "/",
    {
      schema: {
        tags: ["System"],
        summary: "API Information",
        description: "Get basic API information and available endpoints",
        response: {
          200: {
            type: "object",
            properties: {
              name: { type: "string" },
              version: { type: "string" },
              description: { type: "string" },
              documentation: { type: "string" },
              endpoints: { type: "object", additionalProperties: { type: "string" } },
            },
          },
        },
      },
    },
    async (_request, reply) => {
      return reply.send({
        name: "Haven API",
        version: "1.0.0",
        description: "Emergency Response Coordination",
        documentation: "/docs",
        endpoints: {
          hospitals: "/hospitals/nearby",
          match: "/hospitals/match",
          alerts: "/alerts",
          communications: "/communications",
          health: "/health",
          docs: "/docs",
        },
      });
    }
  );

  await fastify.register(hospitalRoutes, { services });
  await fastify.register(alertRoutes, { services });
  await fastify.register(communicationRoutes, { services });

  return fastify;
}
