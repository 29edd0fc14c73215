import type { HavenStore } from "../store/types";
import type { Hospital } from "../types";

type SeedHospital = Omit<Hospital, "createdAt" | "updatedAt" | "capacity"> & {
  capacity: Omit<NonNullable<Hospital["capacity"]>, "lastUpdated"> | null;
};

/**
 * Nairobi hospitals with approximate coordinates
 */
const NAIROBI_HOSPITALS: SeedHospital[] = [
  {
    id: "knh",
    name: "Kenyatta National Hospital",
    hospitalType: "public",
    level: "level_6",
    location: { lat: -1.3008, lng: 36.8073 },
    address: "Hospital Road, Upper Hill",
    city: "Nairobi",
    phone: "+254200000001",
    emergencyPhone: "+254200000002",
    email: null,
    isOperational: true,
    acceptsEmergencies: true,
    isVerified: true,
    businessStatus: "OPERATIONAL",
    placeTypes: ["hospital", "health", "emergency_care"],
    specialties: [
      { specialty: "trauma", capabilityLevel: "specialized", isAvailable: true },
      { specialty: "emergency", capabilityLevel: "specialized", isAvailable: true },
      { specialty: "surgical", capabilityLevel: "advanced", isAvailable: true },
      { specialty: "icu", capabilityLevel: "advanced", isAvailable: true },
      { specialty: "orthopedic", capabilityLevel: "advanced", isAvailable: true },
      { specialty: "burn_unit", capabilityLevel: "advanced", isAvailable: true },
    ],
    capacity: {
      totalBeds: 1800,
      availableBeds: 120,
      emergencyBedsTotal: 60,
      emergencyBedsAvailable: 9,
      icuBedsTotal: 40,
      icuBedsAvailable: 3,
      averageWaitTime: 90,
      emergencyWaitTime: 25,
      doctorsAvailable: 30,
      nursesAvailable: 85,
      isAcceptingPatients: true,
      capacityStatus: "high",
    },
    ratings: [
      { overallRating: 4, emergencyCareRating: 4, wasEmergency: true, isApproved: true },
      { overallRating: 3, emergencyCareRating: 4, wasEmergency: true, isApproved: true },
    ],
    apiBaseUrl: null,
    apiKey: null,
    smsNotifications: true,
    webhookUrl: null,
  },
  {
    id: "nairobi-hospital",
    name: "The Nairobi Hospital",
    hospitalType: "private",
    level: "level_5",
    location: { lat: -1.2957, lng: 36.8036 },
    address: "Argwings Kodhek Road",
    city: "Nairobi",
    phone: "+254200000011",
    emergencyPhone: "+254200000012",
    email: null,
    isOperational: true,
    acceptsEmergencies: true,
    isVerified: true,
    businessStatus: "OPERATIONAL",
    placeTypes: ["hospital", "health"],
    specialties: [
      { specialty: "cardiac", capabilityLevel: "specialized", isAvailable: true },
      { specialty: "emergency", capabilityLevel: "advanced", isAvailable: true },
      { specialty: "icu", capabilityLevel: "advanced", isAvailable: true },
      { specialty: "surgical", capabilityLevel: "advanced", isAvailable: true },
    ],
    capacity: {
      totalBeds: 400,
      availableBeds: 45,
      emergencyBedsTotal: 20,
      emergencyBedsAvailable: 6,
      icuBedsTotal: 16,
      icuBedsAvailable: 2,
      averageWaitTime: 40,
      emergencyWaitTime: 10,
      doctorsAvailable: 14,
      nursesAvailable: 40,
      isAcceptingPatients: true,
      capacityStatus: "moderate",
    },
    ratings: [
      { overallRating: 5, emergencyCareRating: 5, wasEmergency: true, isApproved: true },
    ],
    apiBaseUrl: null,
    apiKey: null,
    smsNotifications: true,
    webhookUrl: null,
  },
  {
    id: "gertrudes",
    name: "Gertrude's Children's Hospital",
    hospitalType: "private",
    level: "level_4",
    location: { lat: -1.2518, lng: 36.8297 },
    address: "Muthaiga Road",
    city: "Nairobi",
    phone: "+254200000021",
    emergencyPhone: null,
    email: null,
    isOperational: true,
    acceptsEmergencies: true,
    isVerified: true,
    businessStatus: "OPERATIONAL",
    placeTypes: ["hospital", "health", "doctor"],
    specialties: [
      { specialty: "pediatric", capabilityLevel: "specialized", isAvailable: true },
      { specialty: "emergency", capabilityLevel: "intermediate", isAvailable: true },
    ],
    capacity: {
      totalBeds: 150,
      availableBeds: 30,
      emergencyBedsTotal: 10,
      emergencyBedsAvailable: 5,
      icuBedsTotal: 6,
      icuBedsAvailable: 1,
      averageWaitTime: 30,
      emergencyWaitTime: 8,
      doctorsAvailable: 8,
      nursesAvailable: 20,
      isAcceptingPatients: true,
      capacityStatus: "low",
    },
    ratings: [],
    apiBaseUrl: null,
    apiKey: null,
    smsNotifications: false,
    webhookUrl: null,
  },
  {
    id: "mama-lucy",
    name: "Mama Lucy Kibaki Hospital",
    hospitalType: "public",
    level: "level_4",
    location: { lat: -1.2684, lng: 36.9066 },
    address: "Kangundo Road, Embakasi",
    city: "Nairobi",
    phone: "+254200000031",
    emergencyPhone: null,
    email: null,
    isOperational: true,
    acceptsEmergencies: true,
    isVerified: false,
    businessStatus: "OPERATIONAL",
    placeTypes: ["hospital", "health"],
    specialties: [
      { specialty: "maternity", capabilityLevel: "advanced", isAvailable: true },
      { specialty: "emergency", capabilityLevel: "intermediate", isAvailable: true },
      { specialty: "trauma", capabilityLevel: "basic", isAvailable: false },
    ],
    capacity: null,
    ratings: [],
    apiBaseUrl: null,
    apiKey: null,
    smsNotifications: true,
    webhookUrl: null,
  },
];

/**
 * Seed Nairobi hospital data into the given store
 */
export async function seedHospitals(store: HavenStore): Promise<number> {
  const now = new Date();
  for (const seed of NAIROBI_HOSPITALS) {
    await store.hospitals.save({
      ...seed,
      capacity: seed.capacity ? { ...seed.capacity, lastUpdated: now } : null,
      createdAt: now,
      updatedAt: now,
    });
  }
  return NAIROBI_HOSPITALS.length;
}
