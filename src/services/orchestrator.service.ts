/**
 * Orchestrator Service
 *
 * Automated pipeline from a raised alert to a hospital on notice:
 * 1. Verify the alert (auto, or auto_priority for critical/high)
 * 2. Find suitable hospitals within the dispatch radius
 * 3. Pick the one with the shortest driving time (straight-line nearest as fallback)
 * 4. Select it on the alert and open the hospital communication
 *
 * Each run first claims the alert by writing a dispatch key under a row lock,
 * so concurrent runs for one alert open a single communication. A failing
 * step flags the alert for operator follow-up and releases the claim;
 * nothing else is rolled back.
 */

import type { HavenStore } from "../shared/store/types";
import type {
  Actor,
  Communication,
  EmergencyAlert,
  EmergencyType,
  Hospital,
} from "../shared/types";
import { ConflictError, NotFoundError, errorMessage } from "../shared/errors";
import { logger } from "../shared/logger";
import { generateId, round } from "../shared/utils";
import type { AlertService } from "./alert.service";
import { isTerminalAlert } from "./alert.service";
import type { CommunicationService } from "./communication.service";
import type { DiscoveryService, HospitalCandidate } from "./discovery.service";
import type { DistanceProvider, MatrixElement } from "./distance.service";
import type { VerificationService } from "./verification.service";

// ============ Types ============

export type SelectionMethod = "distance_matrix" | "haversine";

export interface HospitalSelection {
  hospital: Hospital;
  method: SelectionMethod;
  distanceKm: number;
  durationSeconds: number | null;
}

export interface DispatchResult {
  alert: EmergencyAlert;
  hospital: Hospital | null;
  communication: Communication | null;
  /** "existing" when the alert had already been dispatched */
  selection: SelectionMethod | "existing";
}

export interface OrchestratorOptions {
  radiusKm: number;
}

type Step = "verify" | "discover" | "select" | "dispatch";

// ============ Suitability ============

const PLACE_TYPES: Partial<Record<EmergencyType, string[]>> = {
  cardiac: ["hospital", "health", "doctor"],
  pediatric: ["hospital", "health", "doctor"],
  respiratory: ["hospital", "health", "doctor"],
  trauma: ["hospital", "health", "emergency_care"],
};

const DEFAULT_PLACE_TYPES = ["hospital", "health"];

export function suitablePlaceTypes(emergencyType: EmergencyType): string[] {
  return PLACE_TYPES[emergencyType] ?? DEFAULT_PLACE_TYPES;
}

export function isSuitable(hospital: Hospital, emergencyType: EmergencyType): boolean {
  if (hospital.businessStatus !== "OPERATIONAL") return false;
  const wanted = suitablePlaceTypes(emergencyType);
  return hospital.placeTypes.some((t) => wanted.includes(t));
}

const ALREADY_DISPATCHED: EmergencyAlert["status"][] = ["dispatched", "hospital_selected"];

// ============ Service ============

export class OrchestratorService {
  private readonly log = logger.child({ module: "orchestrator" });

  constructor(
    private readonly store: HavenStore,
    private readonly alerts: AlertService,
    private readonly verification: VerificationService,
    private readonly discovery: DiscoveryService,
    private readonly communications: CommunicationService,
    private readonly distance: DistanceProvider | null = null,
    private readonly options: OrchestratorOptions = { radiusKm: 10 }
  ) {}

  /**
   * Run the whole pipeline for one alert. Safe to call again: an alert that
   * already has a hospital, or is being dispatched by another call, returns
   * the existing dispatch.
   */
  async processAlert(alertId: string): Promise<DispatchResult> {
    const { alert, claimed } = await this.claimDispatch(alertId);
    if (!claimed) return this.existingDispatch(alert);

    let step: Step = "verify";
    try {
      const verified = await this.verification.autoVerify(alert);

      step = "discover";
      const candidates = await this.findSuitable(verified);
      if (candidates.length === 0) {
        throw new NotFoundError(`Suitable hospital within ${this.options.radiusKm} km`);
      }

      step = "select";
      const selection = await this.selectHospital(verified, candidates);

      step = "dispatch";
      const selected = await this.alerts.updateStatus(alertId, "hospital_selected", null, {
        hospitalId: selection.hospital.id,
        hospitalName: selection.hospital.name,
        distanceKm: round(selection.distanceKm, 2),
        durationSeconds: selection.durationSeconds,
        selection: selection.method,
      });

      const reporter: Actor = {
        userId: verified.reporterId,
        role: "first_aider",
        hospitalId: null,
      };
      const outcome = await this.communications.create(reporter, {
        alertId,
        hospitalId: selection.hospital.id,
        priority: verified.priority,
        chiefComplaint: verified.description || `${verified.emergencyType} emergency`,
        estimatedArrivalMinutes:
          selection.durationSeconds === null
            ? undefined
            : Math.ceil(selection.durationSeconds / 60),
      });

      this.log.info(
        {
          alertId,
          hospitalId: selection.hospital.id,
          selection: selection.method,
          delivered: outcome.delivered,
        },
        "Alert dispatched to hospital"
      );
      return {
        alert: selected,
        hospital: selection.hospital,
        communication: outcome.communication,
        selection: selection.method,
      };
    } catch (error) {
      await this.alerts.requireFollowUp(alertId, step, errorMessage(error));
      throw error;
    }
  }

  /**
   * Operational hospitals in range whose place types fit the emergency,
   * nearest first
   */
  async findSuitable(alert: EmergencyAlert): Promise<HospitalCandidate[]> {
    const candidates = await this.discovery.candidates(alert.location, this.options.radiusKm);
    return candidates.filter((c) => isSuitable(c.hospital, alert.emergencyType));
  }

  /**
   * Shortest driving time from the distance matrix; straight-line nearest
   * when the provider is missing, fails or has no usable route
   */
  async selectHospital(
    alert: EmergencyAlert,
    candidates: HospitalCandidate[]
  ): Promise<HospitalSelection> {
    const [nearest] = candidates;
    if (!nearest) {
      throw new NotFoundError("Suitable hospital");
    }
    const fallback: HospitalSelection = {
      hospital: nearest.hospital,
      method: "haversine",
      distanceKm: nearest.distanceKm,
      durationSeconds: null,
    };
    if (!this.distance) return fallback;

    let row: MatrixElement[] | undefined;
    try {
      [row] = await this.distance.matrix(
        [alert.location],
        candidates.map((c) => c.hospital.location)
      );
    } catch (error) {
      this.log.warn({ reason: errorMessage(error) }, "Distance matrix unavailable");
      return fallback;
    }

    let best: HospitalSelection | null = null;
    for (const [index, candidate] of candidates.entries()) {
      const element = row?.[index];
      if (!element || element.status !== "OK" || element.durationSeconds === null) continue;
      if (best?.durationSeconds != null && best.durationSeconds <= element.durationSeconds) {
        continue;
      }
      best = {
        hospital: candidate.hospital,
        method: "distance_matrix",
        distanceKm:
          element.distanceMeters === null ? candidate.distanceKm : element.distanceMeters / 1000,
        durationSeconds: element.durationSeconds,
      };
    }

    return best ?? fallback;
  }

  private async claimDispatch(
    alertId: string
  ): Promise<{ alert: EmergencyAlert; claimed: boolean }> {
    return this.store.transaction(async (tx) => {
      const current = await tx.alerts.getForUpdate(alertId);
      if (!current) throw new NotFoundError("Emergency alert", alertId);
      if (isTerminalAlert(current)) {
        throw new ConflictError(`Alert ${current.reference} is already ${current.status}`);
      }

      const communications = await tx.communications.list({ alertId });
      if (
        current.dispatchKey !== null ||
        ALREADY_DISPATCHED.includes(current.status) ||
        communications.length > 0
      ) {
        return { alert: current, claimed: false };
      }

      const claimed = await tx.alerts.save({
        ...current,
        dispatchKey: generateId(),
        updatedAt: new Date(),
      });
      return { alert: claimed, claimed: true };
    });
  }

  private async existingDispatch(alert: EmergencyAlert): Promise<DispatchResult> {
    const [communication] = await this.store.communications.list({ alertId: alert.id });
    const hospital = communication
      ? await this.store.hospitals.get(communication.hospitalId)
      : null;
    this.log.info({ alertId: alert.id }, "Alert already dispatched or claimed; returning existing");
    return {
      alert,
      hospital,
      communication: communication ?? null,
      selection: "existing",
    };
  }
}
