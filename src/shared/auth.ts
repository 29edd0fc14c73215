import type { FastifyRequest } from "fastify";
import { UserRoleSchema, type Actor } from "./types";
import { UnauthorizedError } from "./errors";

/**
 * Caller identity from the gateway headers:
 * x-user-id, x-user-role and, for hospital staff, x-hospital-id.
 */
export function resolveActor(request: FastifyRequest): Actor {
  const userId = header(request, "x-user-id");
  const role = UserRoleSchema.safeParse(header(request, "x-user-role"));

  if (!userId || !role.success) {
    throw new UnauthorizedError();
  }

  return {
    userId,
    role: role.data,
    hospitalId: header(request, "x-hospital-id") ?? null,
  };
}

function header(request: FastifyRequest, name: string): string | undefined {
  const value = request.headers[name];
  const first = Array.isArray(value) ? value[0] : value;
  return first?.trim() || undefined;
}
