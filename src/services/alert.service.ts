/**
 * Alert Service
 *
 * Lifecycle of an emergency alert raised by a first aider. Each status change
 * writes its timestamp and an EmergencyUpdate in the same transaction.
 */

import type { HavenStore } from "../shared/store/types";
import {
  CreateAlertSchema,
  LocationSchema,
  type Actor,
  type AlertStatus,
  type AlertVerification,
  type CreateAlertInput,
  type EmergencyAlert,
  type EmergencyUpdate,
  type Location,
} from "../shared/types";
import { ConflictError, ForbiddenError, NotFoundError, errorMessage } from "../shared/errors";
import { logger } from "../shared/logger";
import {
  addMinutes,
  generateAlertReference,
  generateId,
  parseInput,
} from "../shared/utils";
import type { Geocoder } from "./geocoding.service";
import { isAdmin } from "./permissions";

export interface AlertServiceOptions {
  duplicateWindowMinutes: number;
}

export const TERMINAL_ALERT_STATUSES: readonly AlertStatus[] = [
  "completed",
  "cancelled",
  "expired",
];

/**
 * Forward moves only; terminal statuses have none. `dispatched` can follow
 * `pending` directly when an operator dispatches without verification.
 */
export const ALERT_TRANSITIONS: Record<AlertStatus, readonly AlertStatus[]> = {
  pending: ["verified", "dispatched", "cancelled", "expired"],
  verified: ["hospital_selected", "dispatched", "cancelled", "expired"],
  hospital_selected: ["dispatched", "en_route", "completed", "cancelled", "expired"],
  dispatched: ["en_route", "arrived", "completed", "cancelled", "expired"],
  en_route: ["arrived", "completed", "cancelled"],
  arrived: ["completed", "cancelled"],
  completed: [],
  cancelled: [],
  expired: [],
};

export function canMoveAlert(from: AlertStatus, to: AlertStatus): boolean {
  return ALERT_TRANSITIONS[from].includes(to);
}

/** An alert in one of these counts as a duplicate for the same reporter */
const DUPLICATE_STATUSES: AlertStatus[] = ["pending", "verified", "dispatched"];

export function isTerminalAlert(alert: EmergencyAlert): boolean {
  return TERMINAL_ALERT_STATUSES.includes(alert.status);
}

/**
 * Timestamp and flag changes that go with entering a status
 */
function applyStatus(
  alert: EmergencyAlert,
  status: AlertStatus,
  now: Date
): EmergencyAlert {
  const next: EmergencyAlert = { ...alert, status, updatedAt: now };
  switch (status) {
    case "verified":
      next.isVerified = true;
      next.verifiedAt = now;
      break;
    case "dispatched":
      next.dispatchedAt = now;
      break;
    case "completed":
      next.completedAt = now;
      next.isActive = false;
      break;
    case "cancelled":
      next.cancelledAt = now;
      next.isActive = false;
      break;
    case "expired":
      next.isActive = false;
      break;
  }
  return next;
}

function newUpdate(
  alertId: string,
  updateType: string,
  fields: Partial<Pick<EmergencyUpdate, "previousStatus" | "newStatus" | "actorId" | "details">>,
  now: Date
): EmergencyUpdate {
  return {
    id: generateId(),
    alertId,
    updateType,
    previousStatus: fields.previousStatus ?? null,
    newStatus: fields.newStatus ?? null,
    actorId: fields.actorId ?? null,
    details: fields.details ?? {},
    createdAt: now,
  };
}

export class AlertService {
  private readonly log = logger.child({ module: "alerts" });

  constructor(
    private readonly store: HavenStore,
    private readonly geocoder: Geocoder | null = null,
    private readonly options: AlertServiceOptions = { duplicateWindowMinutes: 2 }
  ) {}

  /**
   * Raise an alert. A second alert from the same reporter inside the
   * duplicate window returns the first one instead.
   */
  async createAlert(
    actor: Actor,
    input: CreateAlertInput
  ): Promise<{ alert: EmergencyAlert; duplicate: boolean }> {
    if (actor.role !== "first_aider") {
      throw new ForbiddenError("Only first aiders can raise emergency alerts");
    }
    const data = parseInput(CreateAlertSchema, input);
    const now = new Date();

    const [existing] = await this.store.alerts.list({
      reporterId: actor.userId,
      statuses: DUPLICATE_STATUSES,
      activeOnly: true,
      createdAfter: addMinutes(now, -this.options.duplicateWindowMinutes),
    });
    if (existing) {
      this.log.info(
        { alertId: existing.id, reporterId: actor.userId },
        "Duplicate alert suppressed"
      );
      return { alert: existing, duplicate: true };
    }

    const address = data.address ?? (await this.lookupAddress(data.location));

    const alert: EmergencyAlert = {
      id: generateId(),
      reference: generateAlertReference(now),
      reporterId: actor.userId,
      reporterPhone: data.reporterPhone ?? null,
      emergencyType: data.emergencyType,
      priority: data.priority,
      location: data.location,
      address,
      description: data.description,
      status: "pending",
      isActive: true,
      isVerified: false,
      verificationMethod: null,
      verificationAttempts: 0,
      requiresOperatorFollowUp: false,
      dispatchKey: null,
      createdAt: now,
      updatedAt: now,
      verifiedAt: null,
      dispatchedAt: null,
      completedAt: null,
      cancelledAt: null,
    };

    await this.store.transaction(async (tx) => {
      await tx.alerts.save(alert);
      await tx.alerts.addUpdate(
        newUpdate(alert.id, "created", { newStatus: "pending", actorId: actor.userId }, now)
      );
    });

    this.log.info(
      { alertId: alert.id, reference: alert.reference, type: alert.emergencyType },
      "Emergency alert created"
    );
    return { alert, duplicate: false };
  }

  async get(alertId: string): Promise<EmergencyAlert> {
    const alert = await this.store.alerts.get(alertId);
    if (!alert) throw new NotFoundError("Emergency alert", alertId);
    return alert;
  }

  /**
   * Move the alert forward along ALERT_TRANSITIONS. Terminal alerts refuse
   * every change.
   */
  async updateStatus(
    alertId: string,
    status: AlertStatus,
    actorId: string | null = null,
    details: Record<string, unknown> = {},
    extra: Partial<Pick<EmergencyAlert, "verificationMethod">> = {}
  ): Promise<EmergencyAlert> {
    return this.store.transaction(async (tx) => {
      const current = await tx.alerts.getForUpdate(alertId);
      if (!current) throw new NotFoundError("Emergency alert", alertId);
      if (isTerminalAlert(current)) {
        throw new ConflictError(`Alert ${current.reference} is already ${current.status}`);
      }
      if (!canMoveAlert(current.status, status)) {
        throw new ConflictError(
          `Cannot move alert ${current.reference} from ${current.status} to ${status}`
        );
      }

      const now = new Date();
      const updated = await tx.alerts.save({ ...applyStatus(current, status, now), ...extra });
      await tx.alerts.addUpdate(
        newUpdate(
          alertId,
          "status_change",
          { previousStatus: current.status, newStatus: status, actorId, details },
          now
        )
      );

      this.log.info(
        { alertId, from: current.status, to: status },
        "Alert status changed"
      );
      return updated;
    });
  }

  /**
   * Store a successful verification and mark the alert verified in one
   * transaction. A pending alert moves to `verified`; one already further
   * along keeps its status and gets a `verification` update instead.
   */
  async recordVerification(
    verification: AlertVerification,
    method: string
  ): Promise<EmergencyAlert> {
    const alertId = verification.alertId;
    return this.store.transaction(async (tx) => {
      const current = await tx.alerts.getForUpdate(alertId);
      if (!current) throw new NotFoundError("Emergency alert", alertId);
      if (isTerminalAlert(current)) {
        throw new ConflictError(`Alert ${current.reference} is already ${current.status}`);
      }

      const now = new Date();
      await tx.alerts.saveVerification(verification);

      if (current.status === "pending") {
        const updated = await tx.alerts.save({
          ...applyStatus(current, "verified", now),
          verificationMethod: method,
        });
        await tx.alerts.addUpdate(
          newUpdate(
            alertId,
            "status_change",
            { previousStatus: "pending", newStatus: "verified", details: { method } },
            now
          )
        );
        this.log.info({ alertId, method }, "Alert verified");
        return updated;
      }

      const updated = await tx.alerts.save({
        ...current,
        isVerified: true,
        verifiedAt: current.verifiedAt ?? now,
        verificationMethod: current.verificationMethod ?? method,
        updatedAt: now,
      });
      await tx.alerts.addUpdate(
        newUpdate(alertId, "verification", { details: { method, status: current.status } }, now)
      );
      return updated;
    });
  }

  async updateLocation(
    alertId: string,
    actor: Actor,
    input: unknown
  ): Promise<EmergencyAlert> {
    const location = parseInput(LocationSchema, input);

    return this.store.transaction(async (tx) => {
      const current = await tx.alerts.getForUpdate(alertId);
      if (!current) throw new NotFoundError("Emergency alert", alertId);
      this.assertReporter(current, actor);
      if (isTerminalAlert(current)) {
        throw new ConflictError(`Alert ${current.reference} is already ${current.status}`);
      }

      const now = new Date();
      const updated = await tx.alerts.save({ ...current, location, updatedAt: now });
      await tx.alerts.addUpdate(
        newUpdate(
          alertId,
          "location_update",
          { actorId: actor.userId, details: { from: current.location, to: location } },
          now
        )
      );
      return updated;
    });
  }

  async cancel(alertId: string, actor: Actor, reason = ""): Promise<EmergencyAlert> {
    const alert = await this.get(alertId);
    this.assertReporter(alert, actor);
    return this.updateStatus(alertId, "cancelled", actor.userId, { reason });
  }

  /**
   * Flag an alert for a human operator, recording the step that failed
   */
  async requireFollowUp(
    alertId: string,
    step: string,
    reason: string
  ): Promise<EmergencyAlert> {
    return this.store.transaction(async (tx) => {
      const current = await tx.alerts.getForUpdate(alertId);
      if (!current) throw new NotFoundError("Emergency alert", alertId);

      const now = new Date();
      // Releases any dispatch claim so the alert can be processed again
      const updated = await tx.alerts.save({
        ...current,
        requiresOperatorFollowUp: true,
        dispatchKey: null,
        updatedAt: now,
      });
      await tx.alerts.addUpdate(
        newUpdate(alertId, "operator_follow_up", { details: { step, reason } }, now)
      );
      this.log.warn({ alertId, step, reason }, "Alert needs operator follow-up");
      return updated;
    });
  }

  /**
   * Active alerts, newest first; first aiders see only their own
   */
  async listActive(actor: Actor): Promise<EmergencyAlert[]> {
    const alerts = await this.store.alerts.list({
      activeOnly: true,
      reporterId: actor.role === "first_aider" ? actor.userId : undefined,
    });
    return alerts.reverse();
  }

  async history(reporterId: string): Promise<EmergencyAlert[]> {
    const alerts = await this.store.alerts.list({ reporterId });
    return alerts.reverse();
  }

  async updates(alertId: string): Promise<EmergencyUpdate[]> {
    await this.get(alertId);
    return this.store.alerts.listUpdates(alertId);
  }

  /**
   * Remove an alert with its updates, verifications and communications
   */
  async delete(alertId: string, actor: Actor): Promise<void> {
    const alert = await this.get(alertId);
    if (!isAdmin(actor) && alert.reporterId !== actor.userId) {
      throw new ForbiddenError("Only the reporter or an administrator can delete an alert");
    }
    await this.store.alerts.delete(alertId);
    this.log.info({ alertId }, "Emergency alert deleted");
  }

  private assertReporter(alert: EmergencyAlert, actor: Actor): void {
    if (alert.reporterId !== actor.userId) {
      throw new ForbiddenError("Only the reporting first aider can change this alert");
    }
  }

  private async lookupAddress(location: Location): Promise<string | null> {
    if (!this.geocoder) return null;
    try {
      return await this.geocoder.reverseGeocode(location);
    } catch (error) {
      // The alert goes out without an address rather than not at all
      this.log.warn({ reason: errorMessage(error) }, "Reverse geocoding failed");
      return null;
    }
  }
}
