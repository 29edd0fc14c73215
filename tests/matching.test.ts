import { beforeEach, describe, expect, it } from "vitest";
import { DiscoveryService } from "../src/services/discovery.service";
import {
  MatchingService,
  capacityScore,
  distanceScore,
  levelScore,
  ratingScore,
  requiredSpecialtiesFor,
  scoreHospital,
  specialtyScore,
} from "../src/services/matching.service";
import { NotFoundError } from "../src/shared/errors";
import { seedHospitals } from "../src/shared/seed";
import { Database } from "../src/shared/store/Database";
import { NAIROBI_CBD, makeCapacity, makeHospital } from "./helpers";

const rating = (emergencyCareRating: number) => ({
  overallRating: emergencyCareRating,
  emergencyCareRating,
  wasEmergency: true,
  isApproved: true,
});

describe("component scores", () => {
  it("steps distance down by band", () => {
    expect(distanceScore(0)).toBe(100);
    expect(distanceScore(5)).toBe(100);
    expect(distanceScore(5.01)).toBe(80);
    expect(distanceScore(10)).toBe(80);
    expect(distanceScore(20)).toBe(60);
    expect(distanceScore(30)).toBe(40);
    expect(distanceScore(50)).toBe(20);
    expect(distanceScore(50.1)).toBe(0);
  });

  it("scores capacity from status plus free emergency beds", () => {
    expect(capacityScore(makeHospital({ id: "a", capacity: null }))).toBe(0);
    expect(
      capacityScore(makeHospital({ id: "b", capacity: makeCapacity({ isAcceptingPatients: false }) }))
    ).toBe(0);
    expect(
      capacityScore(
        makeHospital({
          id: "c",
          capacity: makeCapacity({ capacityStatus: "moderate", emergencyBedsAvailable: 0 }),
        })
      )
    ).toBe(75);
    expect(
      capacityScore(
        makeHospital({
          id: "d",
          capacity: makeCapacity({
            capacityStatus: "high",
            emergencyBedsTotal: 60,
            emergencyBedsAvailable: 9,
          }),
        })
      )
    ).toBe(54.5);
    // low status with free beds is capped
    expect(capacityScore(makeHospital({ id: "e" }))).toBe(100);
  });

  it("weights matched specialties by capability", () => {
    const hospital = makeHospital({
      id: "kids",
      specialties: [
        { specialty: "pediatric", capabilityLevel: "specialized", isAvailable: true },
        { specialty: "emergency", capabilityLevel: "intermediate", isAvailable: true },
        { specialty: "trauma", capabilityLevel: "specialized", isAvailable: false },
      ],
    });
    expect(specialtyScore(hospital, ["pediatric", "emergency"])).toBe(70);
    expect(specialtyScore(hospital, ["trauma"])).toBe(0);
    expect(specialtyScore(hospital, [])).toBe(0);
  });

  it("maps facility levels", () => {
    expect(levelScore("level_1")).toBe(30);
    expect(levelScore("level_4")).toBe(85);
    expect(levelScore("level_6")).toBe(100);
  });

  it("uses emergency care ratings with a neutral default", () => {
    expect(ratingScore(makeHospital({ id: "new" }))).toBe(50);
    expect(ratingScore(makeHospital({ id: "rated", ratings: [rating(4), rating(5)] }))).toBe(90);
    expect(
      ratingScore(
        makeHospital({
          id: "routine",
          ratings: [{ ...rating(1), wasEmergency: false }],
        })
      )
    ).toBe(50);
  });

  it("derives required specialties from the emergency type", () => {
    expect(requiredSpecialtiesFor("cardiac")).toEqual(["cardiac", "icu", "emergency"]);
    expect(requiredSpecialtiesFor("other")).toEqual(["emergency"]);
    expect(requiredSpecialtiesFor("cardiac", ["neurology"])).toEqual(["neurology"]);
  });
});

describe("scoreHospital", () => {
  it("combines the weighted components", () => {
    const hospital = makeHospital({
      id: "upper-hill",
      level: "level_4",
      specialties: [
        { specialty: "trauma", capabilityLevel: "advanced", isAvailable: true },
        { specialty: "emergency", capabilityLevel: "advanced", isAvailable: true },
      ],
      ratings: [rating(4), rating(5)],
    });

    expect(scoreHospital(hospital, 1.9, ["trauma", "emergency"])).toEqual({
      distanceScore: 100,
      capacityScore: 100,
      specialtyScore: 70,
      levelScore: 85,
      ratingScore: 90,
      totalScore: 92,
    });
  });
});

describe("MatchingService", () => {
  let store: Database;
  let matching: MatchingService;

  beforeEach(() => {
    store = new Database();
    matching = new MatchingService(new DiscoveryService(store.hospitals, 0));
  });

  it("scores a nearby level 4 hospital for a trauma call", async () => {
    await store.hospitals.save(
      makeHospital({
        id: "upper-hill",
        location: { lat: -1.3008, lng: 36.8073 },
        specialties: [
          { specialty: "trauma", capabilityLevel: "advanced", isAvailable: true },
          { specialty: "emergency", capabilityLevel: "advanced", isAvailable: true },
        ],
        ratings: [rating(4), rating(5)],
      })
    );

    const [match] = await matching.findBestHospitals({
      ...NAIROBI_CBD,
      emergencyType: "trauma",
      requiredSpecialties: ["trauma", "emergency"],
    });

    expect(match?.hospital.id).toBe("upper-hill");
    expect(match?.distanceKm).toBe(1.94);
    expect(match?.etaMinutes).toBe(5);
    expect(match?.score.totalScore).toBe(92);
  });

  it("breaks score ties by distance, then id", async () => {
    const specialties = [
      { specialty: "emergency" as const, capabilityLevel: "advanced" as const, isAvailable: true },
    ];
    await store.hospitals.save(makeHospital({ id: "b-twin", specialties }));
    await store.hospitals.save(makeHospital({ id: "a-twin", specialties }));
    await store.hospitals.save(
      makeHospital({ id: "c-near", specialties, location: { lat: -1.2874, lng: 36.8172 } })
    );

    const matches = await matching.findBestHospitals({ ...NAIROBI_CBD, emergencyType: "medical" });

    expect(matches.map((m) => m.score.totalScore)).toEqual([90, 90, 90]);
    expect(matches.map((m) => m.hospital.id)).toEqual(["a-twin", "b-twin", "c-near"]);
  });

  it("ranks the seeded Nairobi hospitals for a trauma call", async () => {
    await seedHospitals(store);

    const matches = await matching.findBestHospitals({
      ...NAIROBI_CBD,
      emergencyType: "trauma",
      maxResults: 10,
    });

    expect(matches.map((m) => m.hospital.id)).toEqual([
      "knh",
      "nairobi-hospital",
      "gertrudes",
      "mama-lucy",
    ]);
    expect(matches[0]?.score.specialtyScore).toBe(85);
    expect(matches[0]?.score.totalScore).toBeCloseTo(84.63, 1);
    expect(matches[1]?.score.totalScore).toBe(82.5);
    expect(matches[3]?.score.distanceScore).toBe(60);
  });

  it("honours exclusions, the radius and the result limit", async () => {
    await seedHospitals(store);

    const matches = await matching.findBestHospitals({
      ...NAIROBI_CBD,
      emergencyType: "trauma",
      maxDistanceKm: 5,
      maxResults: 1,
      excludeHospitalIds: ["knh"],
    });

    expect(matches.map((m) => m.hospital.id)).toEqual(["nairobi-hospital"]);
  });

  it("rejects invalid coordinates and radius", async () => {
    await expect(
      matching.findBestHospitals({ lat: 0, lng: 200, emergencyType: "medical" })
    ).rejects.toThrow("Invalid coordinates: 0, 200");
    await expect(
      matching.findBestHospitals({ ...NAIROBI_CBD, emergencyType: "medical", maxDistanceKm: -1 })
    ).rejects.toThrow("maxDistanceKm must be positive");
  });

  describe("getFallbackHospitals", () => {
    it("offers generic medical alternatives without the primary", async () => {
      await seedHospitals(store);

      const fallbacks = await matching.getFallbackHospitals("knh", NAIROBI_CBD.lat, NAIROBI_CBD.lng);

      expect(fallbacks.map((m) => m.hospital.id)).toEqual([
        "nairobi-hospital",
        "gertrudes",
        "mama-lucy",
      ]);
      expect(fallbacks.map((m) => m.score.totalScore)).toEqual([89.5, 84, 43]);
    });

    it("fails for an unknown primary hospital", async () => {
      const pending = matching.getFallbackHospitals("nope", NAIROBI_CBD.lat, NAIROBI_CBD.lng);
      await expect(pending).rejects.toThrow(NotFoundError);
      await expect(
        matching.getFallbackHospitals("nope", NAIROBI_CBD.lat, NAIROBI_CBD.lng)
      ).rejects.toThrow("Primary hospital nope not found");
    });
  });
});
