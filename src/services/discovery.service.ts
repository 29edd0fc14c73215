/**
 * Discovery Service
 *
 * Finds operational hospitals around a point:
 * - operational and accepting emergencies only
 * - optional facility level and specialty filters
 * - straight-line (haversine) distance within the search radius
 * - nearest first, cached per filter set
 */

import type { HospitalRepository } from "../shared/store/types";
import {
  HospitalCapacitySchema,
  type EmergencyType,
  type Hospital,
  type HospitalCapacity,
  type HospitalLevel,
  type Location,
  type Specialty,
  type UpdateCapacity,
} from "../shared/types";
import { NotFoundError, ValidationError } from "../shared/errors";
import { logger } from "../shared/logger";
import {
  assertValidCoordinate,
  boundingBox,
  haversineKm,
  isPointInBounds,
  round,
  TtlCache,
} from "../shared/utils";

// ============ Types ============

export interface FindNearbyRequest {
  lat: number;
  lng: number;
  radiusKm?: number;
  specialties?: Specialty[];
  level?: HospitalLevel;
  emergencyType?: EmergencyType;
  maxResults?: number;
}

export interface RatingSummary {
  overall: number | null;
  emergencyCare: number | null;
  count: number;
}

export interface HospitalSummary {
  id: string;
  name: string;
  hospitalType: Hospital["hospitalType"];
  level: HospitalLevel;
  distanceKm: number;
  location: Location;
  address: string;
  phone: string;
  emergencyPhone: string | null;
  isVerified: boolean;
  specialties: Hospital["specialties"];
  capacity: HospitalCapacity | null;
  rating: RatingSummary;
}

/** A candidate with its raw (unrounded) distance, for scoring */
export interface HospitalCandidate {
  hospital: Hospital;
  distanceKm: number;
}

export interface Availability {
  isAvailable: boolean;
  reason?: string;
  capacityStatus?: HospitalCapacity["capacityStatus"];
  emergencyBedsAvailable?: number;
  icuBedsAvailable?: number;
  emergencyWaitTime?: number;
  lastUpdated?: Date;
}

// ============ Constants ============

export const DEFAULT_RADIUS_KM = 50;
export const DEFAULT_MAX_RESULTS = 20;

// ============ Helpers ============

export function isMatchCandidate(hospital: Hospital): boolean {
  return hospital.isOperational && hospital.acceptsEmergencies;
}

export function summarizeRatings(hospital: Hospital): RatingSummary {
  const approved = hospital.ratings.filter((r) => r.isApproved);
  const emergency = approved
    .map((r) => r.emergencyCareRating)
    .filter((r): r is number => r !== null);

  const mean = (values: number[]) =>
    values.length ? round(values.reduce((a, b) => a + b, 0) / values.length, 1) : null;

  return {
    overall: mean(approved.map((r) => r.overallRating)),
    emergencyCare: mean(emergency),
    count: approved.length,
  };
}

/** Hospital record without its integration secret */
export type PublicHospital = Omit<Hospital, "apiKey">;

export function toPublicHospital({ apiKey: _apiKey, ...hospital }: Hospital): PublicHospital {
  return hospital;
}

export function toSummary(hospital: Hospital, distanceKm: number): HospitalSummary {
  return {
    id: hospital.id,
    name: hospital.name,
    hospitalType: hospital.hospitalType,
    level: hospital.level,
    distanceKm: round(distanceKm, 2),
    location: hospital.location,
    address: hospital.address,
    phone: hospital.phone,
    emergencyPhone: hospital.emergencyPhone,
    isVerified: hospital.isVerified,
    specialties: hospital.specialties,
    capacity: hospital.capacity,
    rating: summarizeRatings(hospital),
  };
}

// ============ Service ============

export class DiscoveryService {
  private readonly cache: TtlCache<HospitalSummary[]>;
  private readonly log = logger.child({ module: "discovery" });

  constructor(
    private readonly hospitals: HospitalRepository,
    cacheTtlSeconds = 300
  ) {
    this.cache = new TtlCache(cacheTtlSeconds);
  }

  /**
   * Hospitals within radiusKm of (lat, lng), nearest first.
   * An empty list is a valid answer.
   */
  async findNearby(request: FindNearbyRequest): Promise<HospitalSummary[]> {
    const {
      lat,
      lng,
      radiusKm = DEFAULT_RADIUS_KM,
      specialties = [],
      level,
      emergencyType,
      maxResults = DEFAULT_MAX_RESULTS,
    } = request;

    assertValidCoordinate(lat, lng);
    if (!(radiusKm > 0)) {
      throw new ValidationError("radiusKm must be positive");
    }
    if (!Number.isInteger(maxResults) || maxResults < 1) {
      throw new ValidationError("maxResults must be a positive integer");
    }

    const key = [
      lat,
      lng,
      radiusKm,
      emergencyType ?? "",
      level ?? "",
      maxResults,
      [...specialties].sort().join(","),
    ].join("|");

    const cached = this.cache.get(key);
    if (cached) {
      this.log.debug({ key }, "Discovery cache hit");
      return cached;
    }

    const candidates = await this.candidates({ lat, lng }, radiusKm, {
      specialties,
      level,
    });
    const results = candidates
      .slice(0, maxResults)
      .map((c) => toSummary(c.hospital, c.distanceKm));

    this.cache.set(key, results);
    this.log.debug(
      { lat, lng, radiusKm, found: results.length },
      "Nearby hospitals resolved"
    );
    return results;
  }

  /**
   * Every eligible hospital within radiusKm, nearest first (ties by id).
   * Uncached: scoring reads the raw records.
   */
  async candidates(
    origin: Location,
    radiusKm: number,
    filters: { specialties?: Specialty[]; level?: HospitalLevel } = {}
  ): Promise<HospitalCandidate[]> {
    const hospitals = await this.hospitals.list();
    const wanted = filters.specialties ?? [];
    const bounds = boundingBox(origin, radiusKm);

    return hospitals
      .filter(isMatchCandidate)
      .filter((h) => isPointInBounds(h.location, bounds))
      .filter((h) => !filters.level || h.level === filters.level)
      .filter(
        (h) =>
          wanted.length === 0 ||
          h.specialties.some((s) => s.isAvailable && wanted.includes(s.specialty))
      )
      .map((hospital) => ({
        hospital,
        distanceKm: haversineKm(origin, hospital.location),
      }))
      .filter((c) => c.distanceKm <= radiusKm)
      .sort(
        (a, b) =>
          a.distanceKm - b.distanceKm || a.hospital.id.localeCompare(b.hospital.id)
      );
  }

  /**
   * Text search over name, city and specialty tags among operational hospitals
   */
  async search(
    query: string,
    near?: Location,
    maxResults = DEFAULT_MAX_RESULTS
  ): Promise<HospitalSummary[]> {
    const needle = query.trim().toLowerCase();
    if (!needle) {
      throw new ValidationError("Search query is required");
    }
    if (near) assertValidCoordinate(near.lat, near.lng);

    const hospitals = await this.hospitals.list();
    const matches = hospitals
      .filter((h) => h.isOperational)
      .filter(
        (h) =>
          h.name.toLowerCase().includes(needle) ||
          h.city.toLowerCase().includes(needle) ||
          h.specialties.some((s) => s.specialty.includes(needle))
      )
      .map((h) => ({ hospital: h, distanceKm: near ? haversineKm(near, h.location) : 0 }));

    if (near) {
      matches.sort((a, b) => a.distanceKm - b.distanceKm);
    } else {
      matches.sort((a, b) => a.hospital.name.localeCompare(b.hospital.name));
    }

    return matches.slice(0, maxResults).map((m) => toSummary(m.hospital, m.distanceKm));
  }

  async getDetails(hospitalId: string): Promise<Hospital> {
    const hospital = await this.hospitals.get(hospitalId);
    if (!hospital) {
      throw new NotFoundError("Hospital", hospitalId);
    }
    return hospital;
  }

  async checkAvailability(hospitalId: string): Promise<Availability> {
    const hospital = await this.getDetails(hospitalId);
    const capacity = hospital.capacity;

    if (!capacity) {
      return { isAvailable: false, reason: "No capacity information available" };
    }
    if (!isMatchCandidate(hospital)) {
      return { isAvailable: false, reason: "Hospital is not accepting emergencies" };
    }

    return {
      isAvailable:
        capacity.isAcceptingPatients &&
        capacity.emergencyBedsAvailable > 0 &&
        capacity.capacityStatus !== "full" &&
        capacity.capacityStatus !== "overflow",
      capacityStatus: capacity.capacityStatus,
      emergencyBedsAvailable: capacity.emergencyBedsAvailable,
      icuBedsAvailable: capacity.icuBedsAvailable,
      emergencyWaitTime: capacity.emergencyWaitTime,
      lastUpdated: capacity.lastUpdated,
    };
  }

  /**
   * Apply a capacity report from the hospital. A hospital without capacity
   * data needs the full set of bed counts and a status on its first report.
   */
  async updateCapacity(hospitalId: string, patch: UpdateCapacity): Promise<Hospital> {
    const hospital = await this.getDetails(hospitalId);
    const now = new Date();

    const merged = { ...hospital.capacity, ...patch, lastUpdated: now };
    const parsed = HospitalCapacitySchema.safeParse(merged);
    if (!parsed.success) {
      throw new ValidationError("Incomplete capacity report", parsed.error.flatten());
    }

    const saved = await this.hospitals.save({
      ...hospital,
      capacity: parsed.data,
      updatedAt: now,
    });
    this.invalidate();
    return saved;
  }

  /**
   * Drop cached results; called whenever hospital data changes
   */
  invalidate(): void {
    this.cache.clear();
  }
}
