import {
  ChecklistItemsSchema,
  CHECKLIST_ITEMS,
  type ChecklistItem,
  type ChecklistItems,
  type Communication,
  type CommunicationStatus,
  type PreparationChecklist,
  type Priority,
  type TriageCategory,
} from "../shared/types";
import { ConflictError } from "../shared/errors";
import { round } from "../shared/utils";

// ============ Status Transitions ============

/**
 * Allowed moves of the hospital handshake. `failed → sent` is only taken by
 * a resend; `ready → preparing` happens when a gating flag is withdrawn.
 */
export const TRANSITIONS: Record<CommunicationStatus, readonly CommunicationStatus[]> = {
  pending: ["sent", "failed", "cancelled"],
  sent: ["delivered", "acknowledged", "failed", "cancelled"],
  delivered: ["acknowledged", "failed", "cancelled"],
  acknowledged: ["preparing", "ready", "failed", "cancelled"],
  preparing: ["ready", "failed", "cancelled"],
  ready: ["preparing", "en_route", "failed", "cancelled"],
  en_route: ["arrived", "failed", "cancelled"],
  arrived: [],
  cancelled: [],
  failed: ["sent"],
};

export const TERMINAL_STATUSES: readonly CommunicationStatus[] = [
  "arrived",
  "cancelled",
  "failed",
];

/** Statuses in which the hospital side is still getting ready */
export const PREPARATION_STATUSES: readonly CommunicationStatus[] = [
  "acknowledged",
  "preparing",
  "ready",
];

export function canTransition(
  from: CommunicationStatus,
  to: CommunicationStatus
): boolean {
  return TRANSITIONS[from].includes(to);
}

export function assertTransition(
  from: CommunicationStatus,
  to: CommunicationStatus
): void {
  if (!canTransition(from, to)) {
    throw new ConflictError(`Cannot move communication from ${from} to ${to}`);
  }
}

// ============ Preparation ============

export const HOSPITAL_FLAGS = [
  "doctorsReady",
  "nursesReady",
  "equipmentReady",
  "bedReady",
  "bloodAvailable",
] as const;

export type HospitalFlag = (typeof HOSPITAL_FLAGS)[number];

/** Blood is tracked but does not gate readiness */
export const READINESS_FLAGS: readonly HospitalFlag[] = [
  "doctorsReady",
  "nursesReady",
  "equipmentReady",
  "bedReady",
];

export const FLAG_CHECKLIST_ITEMS: Record<HospitalFlag, ChecklistItem> = {
  doctorsReady: "emergencyDoctorAssigned",
  nursesReady: "nursingTeamReady",
  equipmentReady: "vitalMonitorsReady",
  bedReady: "emergencyBedPrepared",
  bloodAvailable: "bloodProductsAvailable",
};

export function isReadyForPatient(
  communication: Pick<Communication, HospitalFlag>
): boolean {
  return READINESS_FLAGS.every((flag) => communication[flag]);
}

// ============ Checklist ============

export function createChecklist(
  communicationId: string,
  now: Date = new Date()
): PreparationChecklist {
  return {
    communicationId,
    items: ChecklistItemsSchema.parse({}),
    notes: "",
    completedAt: null,
    completedBy: null,
    createdAt: now,
    updatedAt: now,
  };
}

export function completionPercentage(items: ChecklistItems): number {
  const done = CHECKLIST_ITEMS.filter((item) => items[item]).length;
  return round((done / CHECKLIST_ITEMS.length) * 100, 1);
}

export function isChecklistComplete(items: ChecklistItems): boolean {
  return CHECKLIST_ITEMS.every((item) => items[item]);
}

export type ChecklistView = PreparationChecklist & { completionPercentage: number };

export function viewChecklist(checklist: PreparationChecklist): ChecklistView {
  return { ...checklist, completionPercentage: completionPercentage(checklist.items) };
}

// ============ Triage ============

export const TRIAGE_PRIORITY: Record<TriageCategory, Priority> = {
  immediate: "critical",
  delayed: "high",
  minor: "medium",
  expectant: "low",
};

export const PRIORITY_RANK: Record<Priority, number> = {
  critical: 0,
  high: 1,
  medium: 2,
  low: 3,
};

/** Glasgow Coma Scale total, when all three parts were assessed */
export function gcsTotal(
  eyes?: number,
  verbal?: number,
  motor?: number
): number | null {
  if (eyes === undefined || verbal === undefined || motor === undefined) {
    return null;
  }
  return eyes + verbal + motor;
}
