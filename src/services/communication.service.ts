/**
 * Communication Service
 *
 * Drives the first aider ⇄ hospital handshake for one patient:
 * 1. Delivers the alert over the hospital's channels (api → sms → webhook → voice)
 * 2. Records the hospital's acknowledgement and opens the preparation checklist
 * 3. Applies role-isolated field updates and derives `preparing`/`ready`
 * 4. Tracks the patient en route and on arrival
 *
 * Every status change commits together with its log entry.
 */

import type { HavenStore } from "../shared/store/types";
import {
  AssessmentInputSchema,
  CHECKLIST_ITEMS,
  CreateCommunicationSchema,
  StatusUpdateSchema,
  UpdateChecklistSchema,
  type Actor,
  type Channel,
  type Communication,
  type CommunicationLog,
  type CommunicationStatus,
  type CreateCommunicationInput,
  type FirstAiderAssessment,
  type Hospital,
  type Priority,
} from "../shared/types";
import {
  ConflictError,
  ForbiddenError,
  NotFoundError,
  PermanentFailure,
  TransientDeliveryError,
  ValidationError,
  errorMessage,
} from "../shared/errors";
import { logger } from "../shared/logger";
import { addMinutes, generateId, minutesBetween, parseInput, round } from "../shared/utils";
import {
  FLAG_CHECKLIST_ITEMS,
  HOSPITAL_FLAGS,
  PREPARATION_STATUSES,
  PRIORITY_RANK,
  TERMINAL_STATUSES,
  TRIAGE_PRIORITY,
  assertTransition,
  createChecklist,
  gcsTotal,
  isChecklistComplete,
  isReadyForPatient,
  viewChecklist,
  type ChecklistView,
} from "./communication.rules";
import {
  assertCanView,
  assertHospitalStaff,
  authorizeFieldUpdate,
  isAdmin,
  isHospitalSide,
} from "./permissions";
import type {
  DeliveryChannel,
  DeliveryResult,
  NotificationDispatcher,
  NotificationSender,
} from "./notification.service";

// ============ Types ============

export interface CommunicationServiceOptions {
  maxAttempts: number;
}

export interface SendOutcome {
  communication: Communication;
  delivered: boolean;
  channel: DeliveryChannel | null;
}

export interface CommunicationDetail {
  communication: Communication;
  checklist: ChecklistView | null;
  assessment: FirstAiderAssessment | null;
  logs: CommunicationLog[];
}

export interface CommunicationListFilter {
  status?: CommunicationStatus;
  priority?: Priority;
}

export interface CommunicationStats {
  periodDays: number;
  total: number;
  byStatus: Record<CommunicationStatus, number>;
  averageResponseMinutes: number | null;
}

interface DeliveryTarget {
  channel: DeliveryChannel;
  recipient: string | null;
}

// ============ Constants ============

/** Statuses an update or explicit status change can still act on */
const OPEN_FOR_CHECKLIST: readonly CommunicationStatus[] = [
  ...PREPARATION_STATUSES,
  "en_route",
];

const PENDING_FOR_HOSPITAL: CommunicationStatus[] = ["sent", "delivered", "acknowledged"];

const ACTIVE_FOR_FIRST_AIDER: CommunicationStatus[] = [
  "sent",
  "delivered",
  "acknowledged",
  "preparing",
  "ready",
  "en_route",
];

/** Statuses a caller may set directly; the rest follow from other operations */
const EXPLICIT_STATUSES: readonly CommunicationStatus[] = [
  "en_route",
  "arrived",
  "cancelled",
  "failed",
];

function emptyStatusCounts(): Record<CommunicationStatus, number> {
  return {
    pending: 0,
    sent: 0,
    delivered: 0,
    acknowledged: 0,
    preparing: 0,
    ready: 0,
    en_route: 0,
    arrived: 0,
    cancelled: 0,
    failed: 0,
  };
}

// ============ Helpers ============

function newLog(
  communicationId: string,
  entry: {
    channel: Channel;
    direction: CommunicationLog["direction"];
    messageType: string;
    messageContent: string;
    messageData?: Record<string, unknown>;
    isSuccessful?: boolean;
    errorMessage?: string | null;
    responseCode?: number | null;
  },
  at: Date = new Date()
): CommunicationLog {
  const isSuccessful = entry.isSuccessful ?? true;
  return {
    id: generateId(),
    communicationId,
    channel: entry.channel,
    direction: entry.direction,
    messageType: entry.messageType,
    messageContent: entry.messageContent,
    messageData: entry.messageData ?? {},
    isSuccessful,
    errorMessage: entry.errorMessage ?? null,
    responseCode: entry.responseCode ?? null,
    sentAt: at,
    deliveredAt: isSuccessful && entry.direction === "outgoing" ? at : null,
    responseReceivedAt: entry.direction === "incoming" ? at : null,
  };
}

/**
 * Ordered delivery channels for a hospital. The API is always tried; the
 * others only when the hospital has them set up.
 */
export function deliveryPlan(hospital: Hospital): DeliveryTarget[] {
  const phone = hospital.emergencyPhone || hospital.phone || null;
  const plan: DeliveryTarget[] = [{ channel: "api", recipient: hospital.apiBaseUrl }];

  if (hospital.smsNotifications) {
    plan.push({ channel: "sms", recipient: phone });
  }
  if (hospital.webhookUrl) {
    plan.push({ channel: "webhook", recipient: hospital.webhookUrl });
  }
  if (phone) {
    plan.push({ channel: "voice", recipient: phone });
  }
  return plan;
}

export function buildDataPacket(
  communication: Communication
): Record<string, unknown> {
  return {
    alertId: communication.alertReference,
    hospitalId: communication.hospitalId,
    timestamp: communication.createdAt.toISOString(),
    priority: communication.priority,
    patientInfo: {
      name: communication.victimName,
      age: communication.victimAge,
      gender: communication.victimGender,
    },
    emergencyDetails: {
      chiefComplaint: communication.chiefComplaint,
      vitalSigns: communication.vitalSigns,
      initialAssessment: communication.initialAssessment,
      firstAidProvided: communication.firstAidProvided,
    },
    logistics: {
      estimatedArrivalMinutes: communication.estimatedArrivalMinutes,
      requiredSpecialties: communication.requiredSpecialties,
      equipmentNeeded: communication.equipmentNeeded,
      bloodTypeRequired: communication.bloodTypeRequired,
    },
    firstAiderInfo: {
      id: communication.firstAiderId,
    },
  };
}

export function buildAlertMessage(communication: Communication): string {
  const patient = [communication.victimName ?? "Unknown", communication.victimAge]
    .filter((part) => part !== null)
    .join(", ");
  const eta =
    communication.estimatedArrivalMinutes === null
      ? "unknown"
      : `${communication.estimatedArrivalMinutes} mins`;

  return [
    `EMERGENCY ALERT - ${communication.alertReference}`,
    `Priority: ${communication.priority.toUpperCase()}`,
    `Patient: ${patient}`,
    `Complaint: ${communication.chiefComplaint}`,
    `ETA: ${eta}`,
    "Login to Haven for details",
  ].join("\n");
}

// ============ Service ============

export class CommunicationService {
  private readonly log = logger.child({ module: "communication" });

  constructor(
    private readonly store: HavenStore,
    private readonly sender: NotificationSender,
    private readonly dispatcher: NotificationDispatcher,
    private readonly options: CommunicationServiceOptions = { maxAttempts: 3 }
  ) {}

  // ============ Creation & Delivery ============

  /**
   * Open a communication for the first aider and deliver it to the hospital
   */
  async create(actor: Actor, input: CreateCommunicationInput): Promise<SendOutcome> {
    if (actor.role !== "first_aider") {
      throw new ForbiddenError("Only first aiders can open a hospital communication");
    }
    const data = parseInput(CreateCommunicationSchema, input);

    const alert = await this.store.alerts.get(data.alertId);
    if (!alert) throw new NotFoundError("Emergency alert", data.alertId);
    const hospital = await this.store.hospitals.get(data.hospitalId);
    if (!hospital) throw new NotFoundError("Hospital", data.hospitalId);

    const now = new Date();
    const communication: Communication = {
      id: generateId(),
      alertId: alert.id,
      alertReference: alert.reference,
      hospitalId: hospital.id,
      firstAiderId: actor.userId,
      status: "pending",
      priority: data.priority,
      victimName: data.victimName ?? null,
      victimAge: data.victimAge ?? null,
      victimGender: data.victimGender ?? null,
      chiefComplaint: data.chiefComplaint,
      vitalSigns: data.vitalSigns,
      initialAssessment: data.initialAssessment,
      firstAidProvided: data.firstAidProvided,
      estimatedArrivalMinutes: data.estimatedArrivalMinutes ?? null,
      estimatedArrivalTime: null,
      requiredSpecialties: data.requiredSpecialties,
      equipmentNeeded: data.equipmentNeeded,
      bloodTypeRequired: data.bloodTypeRequired ?? null,
      communicationAttempts: 0,
      lastCommunicationAttempt: null,
      hospitalAcknowledgedAt: null,
      hospitalAcknowledgedBy: null,
      doctorsReady: false,
      nursesReady: false,
      equipmentReady: false,
      bedReady: false,
      bloodAvailable: false,
      hospitalPreparationNotes: "",
      createdAt: now,
      updatedAt: now,
      sentToHospitalAt: null,
      hospitalReadyAt: null,
      patientArrivedAt: null,
      cancelledAt: null,
      failedAt: null,
    };

    await this.store.communications.save(communication);
    this.log.info(
      { communicationId: communication.id, hospitalId: hospital.id, alert: alert.reference },
      "Communication opened"
    );

    return this.send(communication.id, now);
  }

  /**
   * Try each delivery channel in order until one succeeds. Ends in `sent`
   * when any channel delivered, `failed` otherwise; every attempt is logged.
   */
  async send(communicationId: string, now: Date = new Date()): Promise<SendOutcome> {
    const communication = await this.requireCommunication(communicationId);
    if (communication.status !== "pending" && communication.status !== "failed") {
      throw new ConflictError(
        `Communication ${communicationId} is ${communication.status}; only pending or failed ones are sent`
      );
    }
    if (communication.communicationAttempts >= this.options.maxAttempts) {
      throw new PermanentFailure(communicationId, communication.communicationAttempts);
    }

    const hospital = await this.store.hospitals.get(communication.hospitalId);
    if (!hospital) throw new NotFoundError("Hospital", communication.hospitalId);

    const data = buildDataPacket(communication);
    const message = buildAlertMessage(communication);
    const logs: CommunicationLog[] = [];
    let deliveredVia: DeliveryChannel | null = null;

    for (const target of deliveryPlan(hospital)) {
      const result = await this.attempt(target, message, data, hospital.apiKey);
      logs.push(
        newLog(communicationId, {
          channel: target.channel,
          direction: "outgoing",
          messageType: "emergency_alert",
          messageContent: message,
          messageData: target.channel === "api" || target.channel === "webhook" ? data : {},
          isSuccessful: result.success,
          errorMessage: result.error ?? null,
          responseCode: result.responseCode ?? null,
        })
      );
      if (result.success) {
        deliveredVia = target.channel;
        break;
      }
    }

    let counted = false;
    const saved = await this.store.transaction(async (tx) => {
      const current = await tx.communications.getForUpdate(communicationId);
      if (!current) throw new NotFoundError("Communication", communicationId);

      for (const entry of logs) {
        await tx.communications.addLog(entry);
      }

      // Cancelled while we were sending: keep the audit trail, not the outcome
      if (current.status !== "pending" && current.status !== "failed") {
        return current;
      }
      // A concurrent send already used the last attempt
      if (current.communicationAttempts >= this.options.maxAttempts) {
        return current;
      }
      counted = true;

      const next: CommunicationStatus = deliveredVia ? "sent" : "failed";
      if (next !== current.status) assertTransition(current.status, next);

      const updated: Communication = {
        ...current,
        status: next,
        communicationAttempts: current.communicationAttempts + 1,
        lastCommunicationAttempt: now,
        sentToHospitalAt: deliveredVia ? now : current.sentToHospitalAt,
        failedAt: deliveredVia ? null : now,
        updatedAt: now,
      };
      return tx.communications.save(updated);
    });

    if (!counted) {
      this.log.warn(
        { communicationId, status: saved.status, attempts: saved.communicationAttempts },
        "Delivery outcome discarded; communication changed while sending"
      );
      return { communication: saved, delivered: false, channel: null };
    }

    if (deliveredVia) {
      this.log.info(
        { communicationId, channel: deliveredVia, attempt: saved.communicationAttempts },
        "Emergency alert delivered to hospital"
      );
    } else if (saved.communicationAttempts >= this.options.maxAttempts) {
      this.log.error(
        { communicationId, err: new PermanentFailure(communicationId, saved.communicationAttempts) },
        "Hospital unreachable; operator follow-up required"
      );
    } else {
      this.log.warn(
        { communicationId, attempt: saved.communicationAttempts },
        "All delivery channels failed; queued for retry"
      );
    }

    return { communication: saved, delivered: deliveredVia !== null, channel: deliveredVia };
  }

  private async attempt(
    target: DeliveryTarget,
    message: string,
    data: Record<string, unknown>,
    apiKey: string | null
  ): Promise<DeliveryResult> {
    let result: DeliveryResult;
    if (!target.recipient) {
      result = { success: false, error: `No ${target.channel} endpoint configured` };
    } else {
      try {
        result = await this.sender.send({
          channel: target.channel,
          recipient: target.recipient,
          message,
          data,
          apiKey,
        });
      } catch (error) {
        result = { success: false, error: errorMessage(error) };
      }
    }

    if (!result.success) {
      const failure = new TransientDeliveryError(
        target.channel,
        result.error ?? "unknown error",
        result.responseCode
      );
      this.log.warn({ err: failure }, failure.message);
      return { ...result, error: failure.message };
    }
    return result;
  }

  // ============ Hospital Side ============

  /**
   * Hospital confirms the alert reached its systems
   */
  async markDelivered(communicationId: string, actor: Actor): Promise<Communication> {
    const communication = await this.requireCommunication(communicationId);
    assertHospitalStaff(actor, communication);

    return this.store.transaction(async (tx) => {
      const current = await this.lock(tx, communicationId);
      assertTransition(current.status, "delivered");

      const now = new Date();
      await tx.communications.addLog(
        newLog(communicationId, {
          channel: "api",
          direction: "incoming",
          messageType: "delivery_receipt",
          messageContent: `Delivery confirmed by ${actor.userId}`,
        }, now)
      );
      return tx.communications.save({ ...current, status: "delivered", updatedAt: now });
    });
  }

  /**
   * Hospital staff acknowledge the alert. Opens the preparation checklist.
   */
  async acknowledge(
    communicationId: string,
    actor: Actor,
    notes?: string
  ): Promise<Communication> {
    const communication = await this.requireCommunication(communicationId);
    assertHospitalStaff(actor, communication);

    const saved = await this.store.transaction(async (tx) => {
      const current = await this.lock(tx, communicationId);
      assertTransition(current.status, "acknowledged");

      const now = new Date();
      const updated: Communication = {
        ...current,
        status: "acknowledged",
        hospitalAcknowledgedAt: now,
        hospitalAcknowledgedBy: actor.userId,
        hospitalPreparationNotes: notes ?? current.hospitalPreparationNotes,
        updatedAt: now,
      };
      await tx.communications.save(updated);

      if (!(await tx.communications.getChecklist(communicationId))) {
        await tx.communications.saveChecklist(createChecklist(communicationId, now));
      }

      await tx.communications.addLog(
        newLog(communicationId, {
          channel: "api",
          direction: "incoming",
          messageType: "acknowledgment",
          messageContent: `Hospital acknowledged by ${actor.userId}`,
          messageData: { notes: notes ?? "" },
        }, now)
      );
      return updated;
    });

    this.log.info({ communicationId, by: actor.userId }, "Hospital acknowledged");
    this.notifyFirstAider(
      saved,
      `Hospital acknowledged emergency alert ${saved.alertReference}`
    );
    return saved;
  }

  /**
   * Role-isolated field update. First aiders write patient fields; hospital
   * staff write preparation flags, which re-derive `preparing` / `ready`
   * from the row as persisted.
   */
  async updateFields(
    communicationId: string,
    actor: Actor,
    patch: Record<string, unknown>
  ): Promise<Communication> {
    const communication = await this.requireCommunication(communicationId);
    const update = authorizeFieldUpdate(actor, communication, patch);

    const saved = await this.store.transaction(async (tx) => {
      const current = await this.lock(tx, communicationId);
      const now = new Date();

      if (update.side === "first_aider") {
        if (TERMINAL_STATUSES.includes(current.status)) {
          throw new ConflictError(`Communication is ${current.status}`);
        }
        const updated = await tx.communications.save({
          ...current,
          ...update.fields,
          updatedAt: now,
        });
        await tx.communications.addLog(
          newLog(communicationId, {
            channel: "in_app",
            direction: "outgoing",
            messageType: "patient_update",
            messageContent: `First aider updated ${Object.keys(update.fields).join(", ")}`,
            messageData: update.fields,
          }, now)
        );
        return updated;
      }

      if (!PREPARATION_STATUSES.includes(current.status)) {
        throw new ConflictError(
          `Preparation can only be updated once acknowledged (status is ${current.status})`
        );
      }

      await tx.communications.save({ ...current, ...update.fields, updatedAt: now });

      // Readiness comes from the persisted row, not the request
      const fresh = await this.lock(tx, communicationId);
      const next: CommunicationStatus = isReadyForPatient(fresh) ? "ready" : "preparing";
      let updated = fresh;
      if (next !== fresh.status) {
        assertTransition(fresh.status, next);
        updated = await tx.communications.save({
          ...fresh,
          status: next,
          hospitalReadyAt: next === "ready" ? now : null,
          updatedAt: now,
        });
      }

      const checklist =
        (await tx.communications.getChecklist(communicationId)) ??
        createChecklist(communicationId, now);
      const items = { ...checklist.items };
      for (const flag of HOSPITAL_FLAGS) {
        const value = update.fields[flag];
        if (value !== undefined) {
          items[FLAG_CHECKLIST_ITEMS[flag]] = value;
        }
      }
      const complete = isChecklistComplete(items);
      await tx.communications.saveChecklist({
        ...checklist,
        items,
        completedAt: complete ? (checklist.completedAt ?? now) : null,
        completedBy: complete ? (checklist.completedBy ?? actor.userId) : null,
        updatedAt: now,
      });

      await tx.communications.addLog(
        newLog(communicationId, {
          channel: "in_app",
          direction: "incoming",
          messageType: "preparation_update",
          messageContent: `Preparation updated by ${actor.userId}; status ${updated.status}`,
          messageData: update.fields,
        }, now)
      );
      return updated;
    });

    if (update.side === "hospital") {
      this.notifyFirstAider(
        saved,
        saved.status === "ready"
          ? `Hospital is ready to receive the patient (${saved.alertReference})`
          : `Hospital preparation updated (${saved.alertReference})`
      );
    }
    return saved;
  }

  /**
   * Hospital staff tick items on the 16-point checklist
   */
  async updateChecklist(
    communicationId: string,
    actor: Actor,
    input: unknown
  ): Promise<ChecklistView> {
    const communication = await this.requireCommunication(communicationId);
    assertHospitalStaff(actor, communication);
    const { notes, ...items } = parseInput(UpdateChecklistSchema, input);

    if (!OPEN_FOR_CHECKLIST.includes(communication.status)) {
      throw new ConflictError(`Checklist is not open while ${communication.status}`);
    }

    return this.store.transaction(async (tx) => {
      const now = new Date();
      const checklist =
        (await tx.communications.getChecklist(communicationId)) ??
        createChecklist(communicationId, now);

      const merged = { ...checklist.items };
      for (const item of CHECKLIST_ITEMS) {
        const value = items[item];
        if (value !== undefined) merged[item] = value;
      }

      const complete = isChecklistComplete(merged);
      const saved = await tx.communications.saveChecklist({
        ...checklist,
        items: merged,
        notes: notes ?? checklist.notes,
        completedAt: complete ? (checklist.completedAt ?? now) : null,
        completedBy: complete ? (checklist.completedBy ?? actor.userId) : null,
        updatedAt: now,
      });
      return viewChecklist(saved);
    });
  }

  // ============ Status Changes ============

  /**
   * Explicit transitions: en_route, arrived, cancelled (participants) and
   * failed (administrators)
   */
  async updateStatus(
    communicationId: string,
    actor: Actor,
    input: unknown
  ): Promise<Communication> {
    const { status, notes } = parseInput(StatusUpdateSchema, input);
    if (!EXPLICIT_STATUSES.includes(status)) {
      throw new ValidationError(`Status ${status} cannot be set directly`);
    }

    const communication = await this.requireCommunication(communicationId);
    assertCanView(actor, communication);
    if (status === "failed" && !isAdmin(actor)) {
      throw new ForbiddenError("Only administrators can fail a communication");
    }

    const saved = await this.store.transaction(async (tx) => {
      const current = await this.lock(tx, communicationId);
      assertTransition(current.status, status);

      const now = new Date();
      const updated: Communication = { ...current, status, updatedAt: now };
      switch (status) {
        case "en_route":
          if (current.estimatedArrivalMinutes === null) {
            throw new ValidationError("estimatedArrivalMinutes is required before departing");
          }
          updated.estimatedArrivalTime = addMinutes(now, current.estimatedArrivalMinutes);
          break;
        case "arrived":
          updated.patientArrivedAt = now;
          break;
        case "cancelled":
          updated.cancelledAt = now;
          break;
        case "failed":
          updated.failedAt = now;
          break;
      }

      await tx.communications.save(updated);
      await tx.communications.addLog(
        newLog(communicationId, {
          channel: "in_app",
          direction: isHospitalSide(actor) ? "incoming" : "outgoing",
          messageType: "status_update",
          messageContent: `Status changed from ${current.status} to ${status}`,
          messageData: { notes: notes ?? "", actorId: actor.userId },
        }, now)
      );
      return updated;
    });

    this.log.info({ communicationId, status, by: actor.userId }, "Communication status changed");
    if (isHospitalSide(actor)) {
      this.notifyFirstAider(saved, `Communication ${saved.alertReference} is now ${status}`);
    } else {
      await this.notifyHospital(saved, `Patient ${saved.alertReference}: ${status.replace("_", " ")}`);
    }
    return saved;
  }

  // ============ Assessment ============

  /**
   * Record the first aider's structured assessment (one per communication).
   * A triage category re-prioritises the communication.
   */
  async addAssessment(
    communicationId: string,
    actor: Actor,
    input: unknown
  ): Promise<FirstAiderAssessment> {
    const communication = await this.requireCommunication(communicationId);
    if (actor.role !== "first_aider" || actor.userId !== communication.firstAiderId) {
      throw new ForbiddenError("Only the reporting first aider can assess the patient");
    }
    const data = parseInput(AssessmentInputSchema, input);

    return this.store.transaction(async (tx) => {
      if (await tx.communications.getAssessment(communicationId)) {
        throw new ConflictError("Assessment already recorded for this communication");
      }

      const now = new Date();
      const assessment = await tx.communications.saveAssessment({
        ...data,
        communicationId,
        gcsTotal: gcsTotal(data.gcsEyes, data.gcsVerbal, data.gcsMotor),
        createdAt: now,
      });

      if (data.triageCategory) {
        const current = await this.lock(tx, communicationId);
        await tx.communications.save({
          ...current,
          priority: TRIAGE_PRIORITY[data.triageCategory],
          updatedAt: now,
        });
      }

      await tx.communications.addLog(
        newLog(communicationId, {
          channel: "in_app",
          direction: "outgoing",
          messageType: "assessment",
          messageContent: `Assessment recorded${data.triageCategory ? ` (triage ${data.triageCategory})` : ""}`,
        }, now)
      );
      return assessment;
    });
  }

  // ============ Queries ============

  async get(communicationId: string, actor: Actor): Promise<Communication> {
    const communication = await this.requireCommunication(communicationId);
    assertCanView(actor, communication);
    return communication;
  }

  async getDetail(communicationId: string, actor: Actor): Promise<CommunicationDetail> {
    const communication = await this.get(communicationId, actor);
    const [checklist, assessment, logs] = await Promise.all([
      this.store.communications.getChecklist(communicationId),
      this.store.communications.getAssessment(communicationId),
      this.store.communications.listLogs(communicationId),
    ]);
    return {
      communication,
      checklist: checklist ? viewChecklist(checklist) : null,
      assessment,
      logs,
    };
  }

  async getChecklist(communicationId: string, actor: Actor): Promise<ChecklistView> {
    await this.get(communicationId, actor);
    const checklist = await this.store.communications.getChecklist(communicationId);
    if (!checklist) throw new NotFoundError("Preparation checklist");
    return viewChecklist(checklist);
  }

  async logs(communicationId: string, actor: Actor): Promise<CommunicationLog[]> {
    await this.get(communicationId, actor);
    return this.store.communications.listLogs(communicationId);
  }

  /**
   * Communications visible to the caller: their own as first aider, their
   * hospital's as staff, everything as administrator. Newest first.
   */
  async listForActor(
    actor: Actor,
    filter: CommunicationListFilter = {}
  ): Promise<Communication[]> {
    const base = {
      statuses: filter.status ? [filter.status] : undefined,
      priority: filter.priority,
    };

    let rows: Communication[];
    if (isAdmin(actor)) {
      rows = await this.store.communications.list(base);
    } else if (isHospitalSide(actor)) {
      rows = await this.store.communications.list({
        ...base,
        hospitalId: this.requireHospital(actor),
      });
    } else {
      rows = await this.store.communications.list({ ...base, firstAiderId: actor.userId });
    }
    return rows.reverse();
  }

  /**
   * Alerts awaiting the hospital, most urgent then oldest first
   */
  async hospitalPending(actor: Actor): Promise<Communication[]> {
    const rows = await this.store.communications.list({
      hospitalId: this.requireHospital(actor),
      statuses: PENDING_FOR_HOSPITAL,
    });
    return rows.sort(
      (a, b) =>
        PRIORITY_RANK[a.priority] - PRIORITY_RANK[b.priority] ||
        a.createdAt.getTime() - b.createdAt.getTime()
    );
  }

  async firstAiderActive(actor: Actor): Promise<Communication[]> {
    const rows = await this.store.communications.list({
      firstAiderId: actor.userId,
      statuses: ACTIVE_FOR_FIRST_AIDER,
    });
    return rows.reverse();
  }

  /**
   * Counts per status and mean minutes from delivery to acknowledgement
   */
  async stats(
    filter: { hospitalId?: string; days?: number } = {},
    now: Date = new Date()
  ): Promise<CommunicationStats> {
    const days = filter.days ?? 7;
    const rows = await this.store.communications.list({
      hospitalId: filter.hospitalId,
      createdAfter: addMinutes(now, -days * 24 * 60),
    });

    const byStatus = emptyStatusCounts();
    for (const row of rows) byStatus[row.status] += 1;

    const responseTimes = rows.flatMap((row) =>
      row.sentToHospitalAt && row.hospitalAcknowledgedAt
        ? [minutesBetween(row.sentToHospitalAt, row.hospitalAcknowledgedAt)]
        : []
    );

    return {
      periodDays: days,
      total: rows.length,
      byStatus,
      averageResponseMinutes: responseTimes.length
        ? round(responseTimes.reduce((a, b) => a + b, 0) / responseTimes.length, 1)
        : null,
    };
  }

  // ============ Internals ============

  private async requireCommunication(communicationId: string): Promise<Communication> {
    const communication = await this.store.communications.get(communicationId);
    if (!communication) throw new NotFoundError("Communication", communicationId);
    return communication;
  }

  private async lock(tx: HavenStore, communicationId: string): Promise<Communication> {
    const communication = await tx.communications.getForUpdate(communicationId);
    if (!communication) throw new NotFoundError("Communication", communicationId);
    return communication;
  }

  private requireHospital(actor: Actor): string {
    if (!isHospitalSide(actor) || !actor.hospitalId) {
      throw new ForbiddenError("Caller is not attached to a hospital");
    }
    return actor.hospitalId;
  }

  private notifyFirstAider(communication: Communication, message: string): void {
    this.dispatcher.enqueue({
      channel: "push",
      recipient: communication.firstAiderId,
      message,
      data: { communicationId: communication.id, status: communication.status },
    });
  }

  private async notifyHospital(communication: Communication, message: string): Promise<void> {
    const hospital = await this.store.hospitals.get(communication.hospitalId);
    const phone = hospital?.emergencyPhone || hospital?.phone;
    if (!phone) return;
    this.dispatcher.enqueue({
      channel: "sms",
      recipient: phone,
      message,
      data: { communicationId: communication.id, status: communication.status },
    });
  }
}
