import { z } from "zod";
import type { Actor, Communication, UserRole } from "../shared/types";
import { VitalSignsSchema } from "../shared/types";
import { ForbiddenError, ValidationError } from "../shared/errors";

// ============ Field Ownership ============

const FirstAiderFieldsSchema = z
  .object({
    vitalSigns: VitalSignsSchema,
    firstAidProvided: z.string().max(5000),
    estimatedArrivalMinutes: z.number().int().min(0).max(1440),
  })
  .partial()
  .strict();

const HospitalFieldsSchema = z
  .object({
    doctorsReady: z.boolean(),
    nursesReady: z.boolean(),
    equipmentReady: z.boolean(),
    bedReady: z.boolean(),
    bloodAvailable: z.boolean(),
    hospitalPreparationNotes: z.string().max(5000),
  })
  .partial()
  .strict();

export type FirstAiderFields = z.infer<typeof FirstAiderFieldsSchema>;
export type HospitalFields = z.infer<typeof HospitalFieldsSchema>;

export const FIRST_AIDER_FIELDS = FirstAiderFieldsSchema.keyof().options;
export const HOSPITAL_FIELDS = HospitalFieldsSchema.keyof().options;

export type AuthorizedUpdate =
  | { side: "first_aider"; fields: FirstAiderFields }
  | { side: "hospital"; fields: HospitalFields };

// ============ Roles ============

const ADMIN_ROLES: readonly UserRole[] = ["system_admin", "organization_admin"];
const HOSPITAL_ROLES: readonly UserRole[] = ["hospital_staff", "hospital_admin"];

export function isAdmin(actor: Actor): boolean {
  return ADMIN_ROLES.includes(actor.role);
}

export function isHospitalSide(actor: Actor): boolean {
  return HOSPITAL_ROLES.includes(actor.role);
}

export function worksAt(actor: Actor, hospitalId: string): boolean {
  return isHospitalSide(actor) && actor.hospitalId === hospitalId;
}

export function canView(actor: Actor, communication: Communication): boolean {
  return (
    isAdmin(actor) ||
    actor.userId === communication.firstAiderId ||
    worksAt(actor, communication.hospitalId)
  );
}

export function assertCanView(actor: Actor, communication: Communication): void {
  if (!canView(actor, communication)) {
    throw new ForbiddenError("Not a participant in this communication");
  }
}

export function assertHospitalStaff(actor: Actor, communication: Communication): void {
  if (!(isAdmin(actor) || worksAt(actor, communication.hospitalId))) {
    throw new ForbiddenError("Only staff of the receiving hospital may do this");
  }
}

/**
 * The one place that decides which communication fields a caller may write.
 * A request carrying any field outside the caller's set is rejected whole.
 */
export function authorizeFieldUpdate(
  actor: Actor,
  communication: Communication,
  patch: Record<string, unknown>
): AuthorizedUpdate {
  const keys = Object.keys(patch);
  if (keys.length === 0) {
    throw new ValidationError("No fields to update");
  }

  let side: AuthorizedUpdate["side"];
  let allowed: readonly string[];
  if (actor.role === "first_aider" && actor.userId === communication.firstAiderId) {
    side = "first_aider";
    allowed = FIRST_AIDER_FIELDS;
  } else if (worksAt(actor, communication.hospitalId)) {
    side = "hospital";
    allowed = HOSPITAL_FIELDS;
  } else {
    throw new ForbiddenError("Not a participant in this communication");
  }

  const rejected = keys.filter((key) => !allowed.includes(key));
  if (rejected.length > 0) {
    throw new ValidationError(`Fields not writable by ${actor.role}`, {
      rejected,
      allowed,
    });
  }

  if (side === "first_aider") {
    const parsed = FirstAiderFieldsSchema.safeParse(patch);
    if (!parsed.success) {
      throw new ValidationError("Invalid field values", parsed.error.flatten());
    }
    return { side, fields: parsed.data };
  }

  const parsed = HospitalFieldsSchema.safeParse(patch);
  if (!parsed.success) {
    throw new ValidationError("Invalid field values", parsed.error.flatten());
  }
  return { side, fields: parsed.data };
}
