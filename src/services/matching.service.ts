/**
 * Matching Service
 *
 * Ranks nearby hospitals for an emergency. Each candidate gets five component
 * scores in [0, 100] which are combined with fixed weights:
 *
 *   total = 0.40·distance + 0.25·capacity + 0.20·specialty + 0.10·level + 0.05·rating
 *
 * Hospitals scoring 0 are dropped; ties are broken by distance, then id.
 */

import type {
  CapabilityLevel,
  CapacityStatus,
  EmergencyType,
  Hospital,
  HospitalLevel,
  Specialty,
} from "../shared/types";
import { NotFoundError, ValidationError } from "../shared/errors";
import { logger } from "../shared/logger";
import { assertValidCoordinate, estimateEtaMinutes, round } from "../shared/utils";
import type { DiscoveryService, HospitalSummary } from "./discovery.service";
import { toSummary } from "./discovery.service";

// ============ Types ============

export interface MatchRequest {
  lat: number;
  lng: number;
  emergencyType: EmergencyType;
  /** Overrides the emergency-type defaults when non-empty */
  requiredSpecialties?: Specialty[];
  maxDistanceKm?: number;
  maxResults?: number;
  excludeHospitalIds?: string[];
}

export interface MatchScore {
  distanceScore: number;
  capacityScore: number;
  specialtyScore: number;
  levelScore: number;
  ratingScore: number;
  totalScore: number;
}

export interface HospitalMatch {
  hospital: HospitalSummary;
  score: MatchScore;
  distanceKm: number;
  etaMinutes: number;
}

// ============ Constants ============

export const SCORE_WEIGHTS = {
  distance: 0.4,
  capacity: 0.25,
  specialty: 0.2,
  level: 0.1,
  rating: 0.05,
} as const;

const DISTANCE_STEPS: ReadonlyArray<[maxKm: number, score: number]> = [
  [5, 100],
  [10, 80],
  [20, 60],
  [30, 40],
  [50, 20],
];

const CAPACITY_BASE: Record<CapacityStatus, number> = {
  low: 100,
  moderate: 75,
  high: 50,
  full: 10,
  overflow: 0,
};

/** Bonus scaled by the share of emergency beds still free */
const EMERGENCY_BED_BONUS = 30;

const EMERGENCY_SPECIALTIES: Partial<Record<EmergencyType, Specialty[]>> = {
  trauma: ["trauma", "surgical", "emergency", "orthopedic"],
  cardiac: ["cardiac", "icu", "emergency"],
  pediatric: ["pediatric", "emergency"],
  respiratory: ["emergency", "icu"],
  medical: ["emergency"],
  accident: ["trauma", "emergency", "surgical"],
};

const CAPABILITY_WEIGHTS: Record<CapabilityLevel, number> = {
  basic: 20,
  intermediate: 40,
  advanced: 70,
  specialized: 100,
};

const LEVEL_SCORES: Record<HospitalLevel, number> = {
  level_1: 30,
  level_2: 50,
  level_3: 70,
  level_4: 85,
  level_5: 95,
  level_6: 100,
};

const DEFAULT_RATING_SCORE = 50;

// ============ Component Scores ============

export function distanceScore(distanceKm: number): number {
  for (const [maxKm, score] of DISTANCE_STEPS) {
    if (distanceKm <= maxKm) return score;
  }
  return 0;
}

export function capacityScore(hospital: Hospital): number {
  const capacity = hospital.capacity;
  if (!capacity || !capacity.isAcceptingPatients) return 0;

  let score = CAPACITY_BASE[capacity.capacityStatus];
  if (capacity.emergencyBedsAvailable > 0) {
    const ratio =
      capacity.emergencyBedsAvailable / Math.max(capacity.emergencyBedsTotal, 1);
    score += ratio * EMERGENCY_BED_BONUS;
  }
  return Math.min(score, 100);
}

export function requiredSpecialtiesFor(
  emergencyType: EmergencyType,
  override: Specialty[] = []
): Specialty[] {
  if (override.length > 0) return override;
  return EMERGENCY_SPECIALTIES[emergencyType] ?? ["emergency"];
}

export function specialtyScore(hospital: Hospital, required: Specialty[]): number {
  if (required.length === 0) return 0;

  const matched = hospital.specialties
    .filter((s) => s.isAvailable && required.includes(s.specialty))
    .reduce((sum, s) => sum + CAPABILITY_WEIGHTS[s.capabilityLevel], 0);

  return Math.min((matched / (required.length * 100)) * 100, 100);
}

/** level_1 scores 30, level_6 scores 100 */
export function levelScore(level: HospitalLevel): number {
  return LEVEL_SCORES[level] ?? 50;
}

export function ratingScore(hospital: Hospital): number {
  const ratings = hospital.ratings
    .filter((r) => r.isApproved && r.wasEmergency)
    .map((r) => r.emergencyCareRating)
    .filter((r): r is number => r !== null);

  if (ratings.length === 0) return DEFAULT_RATING_SCORE;
  const mean = ratings.reduce((a, b) => a + b, 0) / ratings.length;
  return (mean / 5) * 100;
}

export function scoreHospital(
  hospital: Hospital,
  distanceKm: number,
  required: Specialty[]
): MatchScore {
  const components = {
    distanceScore: distanceScore(distanceKm),
    capacityScore: capacityScore(hospital),
    specialtyScore: specialtyScore(hospital, required),
    levelScore: levelScore(hospital.level),
    ratingScore: ratingScore(hospital),
  };

  const total =
    SCORE_WEIGHTS.distance * components.distanceScore +
    SCORE_WEIGHTS.capacity * components.capacityScore +
    SCORE_WEIGHTS.specialty * components.specialtyScore +
    SCORE_WEIGHTS.level * components.levelScore +
    SCORE_WEIGHTS.rating * components.ratingScore;

  return {
    distanceScore: round(components.distanceScore, 2),
    capacityScore: round(components.capacityScore, 2),
    specialtyScore: round(components.specialtyScore, 2),
    levelScore: round(components.levelScore, 2),
    ratingScore: round(components.ratingScore, 2),
    totalScore: round(total, 2),
  };
}

// ============ Service ============

export class MatchingService {
  private readonly log = logger.child({ module: "matching" });

  constructor(private readonly discovery: DiscoveryService) {}

  /**
   * Rank hospitals for an emergency, best first, with the score breakdown
   */
  async findBestHospitals(request: MatchRequest): Promise<HospitalMatch[]> {
    const {
      lat,
      lng,
      emergencyType,
      requiredSpecialties = [],
      maxDistanceKm = 50,
      maxResults = 5,
      excludeHospitalIds = [],
    } = request;

    assertValidCoordinate(lat, lng);
    if (!(maxDistanceKm > 0)) {
      throw new ValidationError("maxDistanceKm must be positive");
    }

    const required = requiredSpecialtiesFor(emergencyType, requiredSpecialties);
    const candidates = await this.discovery.candidates({ lat, lng }, maxDistanceKm);

    const matches = candidates
      .filter((c) => !excludeHospitalIds.includes(c.hospital.id))
      .map(({ hospital, distanceKm }) => ({
        hospital: toSummary(hospital, distanceKm),
        score: scoreHospital(hospital, distanceKm, required),
        distanceKm: round(distanceKm, 2),
        etaMinutes: estimateEtaMinutes(distanceKm),
        rawDistance: distanceKm,
      }))
      .filter((m) => m.score.totalScore > 0)
      .sort(
        (a, b) =>
          b.score.totalScore - a.score.totalScore ||
          a.rawDistance - b.rawDistance ||
          a.hospital.id.localeCompare(b.hospital.id)
      )
      .slice(0, maxResults)
      .map(({ rawDistance: _raw, ...match }) => match);

    this.log.info(
      {
        emergencyType,
        candidates: candidates.length,
        matched: matches.length,
        best: matches[0]?.hospital.id,
      },
      "Hospital matching complete"
    );
    return matches;
  }

  /**
   * Alternatives for when the primary hospital declines or cannot prepare:
   * generic medical matching over a wider radius, primary excluded
   */
  async getFallbackHospitals(
    primaryHospitalId: string,
    lat: number,
    lng: number,
    maxResults = 3
  ): Promise<HospitalMatch[]> {
    await this.discovery.getDetails(primaryHospitalId).catch((error: unknown) => {
      if (error instanceof NotFoundError) {
        throw new NotFoundError("Primary hospital", primaryHospitalId);
      }
      throw error;
    });

    return this.findBestHospitals({
      lat,
      lng,
      emergencyType: "medical",
      maxDistanceKm: 100,
      maxResults,
      excludeHospitalIds: [primaryHospitalId],
    });
  }
}
