import { z } from "zod";

// ============ Location Schema ============
export const LocationSchema = z.object({
  lat: z.number().min(-90).max(90),
  lng: z.number().min(-180).max(180),
});

export type Location = z.infer<typeof LocationSchema>;

// ============ Identity ============
export const UserRoleSchema = z.enum([
  "first_aider",
  "hospital_staff",
  "system_admin",
  "hospital_admin",
  "organization_admin",
]);

export type UserRole = z.infer<typeof UserRoleSchema>;

export interface Actor {
  userId: string;
  role: UserRole;
  /** Hospital the caller works for (hospital staff and hospital admins) */
  hospitalId: string | null;
}

// ============ Hospital Schemas ============
export const HospitalTypeSchema = z.enum([
  "public",
  "private",
  "mission",
  "clinic",
  "specialized",
]);

/** level_1 Basic … level_6 International */
export const HospitalLevelSchema = z.enum([
  "level_1",
  "level_2",
  "level_3",
  "level_4",
  "level_5",
  "level_6",
]);

export type HospitalLevel = z.infer<typeof HospitalLevelSchema>;

export const BusinessStatusSchema = z.enum([
  "OPERATIONAL",
  "CLOSED_TEMPORARILY",
  "CLOSED_PERMANENTLY",
]);

export const SpecialtySchema = z.enum([
  "trauma",
  "cardiac",
  "pediatric",
  "maternity",
  "surgical",
  "icu",
  "emergency",
  "orthopedic",
  "neurology",
  "oncology",
  "burn_unit",
  "psychiatric",
  "rehabilitation",
]);

export type Specialty = z.infer<typeof SpecialtySchema>;

export const CapabilityLevelSchema = z.enum([
  "basic",
  "intermediate",
  "advanced",
  "specialized",
]);

export type CapabilityLevel = z.infer<typeof CapabilityLevelSchema>;

export const CapacityStatusSchema = z.enum([
  "low",
  "moderate",
  "high",
  "full",
  "overflow",
]);

export type CapacityStatus = z.infer<typeof CapacityStatusSchema>;

export const HospitalSpecialtySchema = z.object({
  specialty: SpecialtySchema,
  capabilityLevel: CapabilityLevelSchema,
  isAvailable: z.boolean().default(true),
});

export type HospitalSpecialty = z.infer<typeof HospitalSpecialtySchema>;

export const HospitalCapacitySchema = z.object({
  totalBeds: z.number().int().min(0),
  availableBeds: z.number().int().min(0),
  emergencyBedsTotal: z.number().int().min(0),
  emergencyBedsAvailable: z.number().int().min(0),
  icuBedsTotal: z.number().int().min(0).default(0),
  icuBedsAvailable: z.number().int().min(0).default(0),
  averageWaitTime: z.number().int().min(0).default(0),
  emergencyWaitTime: z.number().int().min(0).default(0),
  doctorsAvailable: z.number().int().min(0).default(0),
  nursesAvailable: z.number().int().min(0).default(0),
  isAcceptingPatients: z.boolean().default(true),
  capacityStatus: CapacityStatusSchema,
  lastUpdated: z.coerce.date(),
});

export type HospitalCapacity = z.infer<typeof HospitalCapacitySchema>;

export const HospitalRatingSchema = z.object({
  overallRating: z.number().int().min(1).max(5),
  emergencyCareRating: z.number().int().min(1).max(5).nullable(),
  wasEmergency: z.boolean(),
  isApproved: z.boolean(),
});

export type HospitalRating = z.infer<typeof HospitalRatingSchema>;

export const HospitalSchema = z.object({
  id: z.string(),
  name: z.string(),
  hospitalType: HospitalTypeSchema,
  level: HospitalLevelSchema,
  location: LocationSchema,
  address: z.string(),
  city: z.string(),
  phone: z.string(),
  emergencyPhone: z.string().nullable(),
  email: z.string().nullable(),
  isOperational: z.boolean(),
  acceptsEmergencies: z.boolean(),
  isVerified: z.boolean(),
  businessStatus: BusinessStatusSchema,
  placeTypes: z.array(z.string()),
  specialties: z.array(HospitalSpecialtySchema),
  capacity: HospitalCapacitySchema.nullable(),
  ratings: z.array(HospitalRatingSchema),
  apiBaseUrl: z.string().nullable(),
  apiKey: z.string().nullable(),
  smsNotifications: z.boolean(),
  webhookUrl: z.string().nullable(),
  createdAt: z.coerce.date(),
  updatedAt: z.coerce.date(),
});

export type Hospital = z.infer<typeof HospitalSchema>;

export const UpdateCapacitySchema = HospitalCapacitySchema.omit({
  lastUpdated: true,
}).partial();

export type UpdateCapacity = z.infer<typeof UpdateCapacitySchema>;

// ============ Emergency Alert Schemas ============
export const EmergencyTypeSchema = z.enum([
  "medical",
  "accident",
  "cardiac",
  "trauma",
  "respiratory",
  "pediatric",
  "other",
]);

export type EmergencyType = z.infer<typeof EmergencyTypeSchema>;

export const PrioritySchema = z.enum(["critical", "high", "medium", "low"]);

export type Priority = z.infer<typeof PrioritySchema>;

export const AlertStatusSchema = z.enum([
  "pending",
  "verified",
  "dispatched",
  "hospital_selected",
  "en_route",
  "arrived",
  "completed",
  "cancelled",
  "expired",
]);

export type AlertStatus = z.infer<typeof AlertStatusSchema>;

export const EmergencyAlertSchema = z.object({
  id: z.string(),
  reference: z.string(),
  reporterId: z.string(),
  reporterPhone: z.string().nullable(),
  emergencyType: EmergencyTypeSchema,
  priority: PrioritySchema,
  location: LocationSchema,
  address: z.string().nullable(),
  description: z.string(),
  status: AlertStatusSchema,
  isActive: z.boolean(),
  isVerified: z.boolean(),
  verificationMethod: z.string().nullable(),
  verificationAttempts: z.number().int().min(0),
  requiresOperatorFollowUp: z.boolean(),
  /** Set while one dispatch run owns the alert; cleared when that run fails */
  dispatchKey: z.string().nullable().default(null),
  createdAt: z.coerce.date(),
  updatedAt: z.coerce.date(),
  verifiedAt: z.coerce.date().nullable(),
  dispatchedAt: z.coerce.date().nullable(),
  completedAt: z.coerce.date().nullable(),
  cancelledAt: z.coerce.date().nullable(),
});

export type EmergencyAlert = z.infer<typeof EmergencyAlertSchema>;

export const EmergencyUpdateSchema = z.object({
  id: z.string(),
  alertId: z.string(),
  updateType: z.string(),
  previousStatus: AlertStatusSchema.nullable(),
  newStatus: AlertStatusSchema.nullable(),
  actorId: z.string().nullable(),
  details: z.record(z.unknown()),
  createdAt: z.coerce.date(),
});

export type EmergencyUpdate = z.infer<typeof EmergencyUpdateSchema>;

export const VerificationMethodSchema = z.enum(["sms", "call", "auto", "auto_priority"]);

export type VerificationMethod = z.infer<typeof VerificationMethodSchema>;

export const AlertVerificationSchema = z.object({
  id: z.string(),
  alertId: z.string(),
  method: VerificationMethodSchema,
  code: z.string().nullable(),
  isSuccessful: z.boolean(),
  responseReceived: z.boolean(),
  createdAt: z.coerce.date(),
  respondedAt: z.coerce.date().nullable(),
});

export type AlertVerification = z.infer<typeof AlertVerificationSchema>;

export const CreateAlertSchema = z.object({
  emergencyType: EmergencyTypeSchema,
  priority: PrioritySchema.default("medium"),
  location: LocationSchema,
  address: z.string().max(500).optional(),
  description: z.string().max(2000).default(""),
  reporterPhone: z.string().max(20).optional(),
});

export type CreateAlertInput = z.input<typeof CreateAlertSchema>;

// ============ Communication Schemas ============
export const CommunicationStatusSchema = z.enum([
  "pending",
  "sent",
  "delivered",
  "acknowledged",
  "preparing",
  "ready",
  "en_route",
  "arrived",
  "cancelled",
  "failed",
]);

export type CommunicationStatus = z.infer<typeof CommunicationStatusSchema>;

export const ChannelSchema = z.enum([
  "api",
  "sms",
  "voice",
  "webhook",
  "push",
  "email",
  "in_app",
  "system",
]);

export type Channel = z.infer<typeof ChannelSchema>;

export const VitalSignsSchema = z.record(z.union([z.string(), z.number()]));

export type VitalSigns = z.infer<typeof VitalSignsSchema>;

export const CommunicationSchema = z.object({
  id: z.string(),
  alertId: z.string(),
  alertReference: z.string(),
  hospitalId: z.string(),
  firstAiderId: z.string(),
  status: CommunicationStatusSchema,
  priority: PrioritySchema,

  victimName: z.string().nullable(),
  victimAge: z.number().int().min(0).max(150).nullable(),
  victimGender: z.enum(["male", "female", "other", "unknown"]).nullable(),
  chiefComplaint: z.string(),
  vitalSigns: VitalSignsSchema,
  initialAssessment: z.string(),
  firstAidProvided: z.string(),
  estimatedArrivalMinutes: z.number().int().min(0).nullable(),
  estimatedArrivalTime: z.coerce.date().nullable(),
  requiredSpecialties: z.array(z.string()),
  equipmentNeeded: z.array(z.string()),
  bloodTypeRequired: z.string().nullable(),

  communicationAttempts: z.number().int().min(0),
  lastCommunicationAttempt: z.coerce.date().nullable(),
  hospitalAcknowledgedAt: z.coerce.date().nullable(),
  hospitalAcknowledgedBy: z.string().nullable(),

  doctorsReady: z.boolean(),
  nursesReady: z.boolean(),
  equipmentReady: z.boolean(),
  bedReady: z.boolean(),
  bloodAvailable: z.boolean(),
  hospitalPreparationNotes: z.string(),

  createdAt: z.coerce.date(),
  updatedAt: z.coerce.date(),
  sentToHospitalAt: z.coerce.date().nullable(),
  hospitalReadyAt: z.coerce.date().nullable(),
  patientArrivedAt: z.coerce.date().nullable(),
  cancelledAt: z.coerce.date().nullable(),
  failedAt: z.coerce.date().nullable(),
});

export type Communication = z.infer<typeof CommunicationSchema>;

export const CreateCommunicationSchema = z.object({
  alertId: z.string().min(1),
  hospitalId: z.string().min(1),
  priority: PrioritySchema.default("high"),
  victimName: z.string().max(200).optional(),
  victimAge: z.number().int().min(0).max(150).optional(),
  victimGender: z.enum(["male", "female", "other", "unknown"]).optional(),
  chiefComplaint: z.string().min(1),
  vitalSigns: VitalSignsSchema.default({}),
  initialAssessment: z.string().default(""),
  firstAidProvided: z.string().default(""),
  estimatedArrivalMinutes: z.number().int().min(0).optional(),
  requiredSpecialties: z.array(z.string()).default([]),
  equipmentNeeded: z.array(z.string()).default([]),
  bloodTypeRequired: z.string().max(10).optional(),
});

export type CreateCommunicationInput = z.input<typeof CreateCommunicationSchema>;

export const CommunicationLogSchema = z.object({
  id: z.string(),
  communicationId: z.string(),
  channel: ChannelSchema,
  direction: z.enum(["outgoing", "incoming"]),
  messageType: z.string(),
  messageContent: z.string(),
  messageData: z.record(z.unknown()),
  isSuccessful: z.boolean(),
  errorMessage: z.string().nullable(),
  responseCode: z.number().int().nullable(),
  sentAt: z.coerce.date(),
  deliveredAt: z.coerce.date().nullable(),
  responseReceivedAt: z.coerce.date().nullable(),
});

export type CommunicationLog = z.infer<typeof CommunicationLogSchema>;

// ============ Preparation Checklist ============
export const ChecklistItemsSchema = z.object({
  // staff
  emergencyDoctorAssigned: z.boolean().default(false),
  specialistDoctorNotified: z.boolean().default(false),
  nursingTeamReady: z.boolean().default(false),
  anesthesiologistAlerted: z.boolean().default(false),
  // beds and rooms
  emergencyBedPrepared: z.boolean().default(false),
  operatingRoomReserved: z.boolean().default(false),
  icuBedAvailable: z.boolean().default(false),
  // equipment
  vitalMonitorsReady: z.boolean().default(false),
  ventilatorAvailable: z.boolean().default(false),
  defibrillatorReady: z.boolean().default(false),
  emergencyMedicationsReady: z.boolean().default(false),
  // diagnostics
  labTestsOrdered: z.boolean().default(false),
  imagingReady: z.boolean().default(false),
  bloodProductsAvailable: z.boolean().default(false),
  // support services
  pharmacyAlerted: z.boolean().default(false),
  bloodBankNotified: z.boolean().default(false),
});

export type ChecklistItems = z.infer<typeof ChecklistItemsSchema>;

export type ChecklistItem = keyof ChecklistItems;

export const CHECKLIST_ITEMS = ChecklistItemsSchema.keyof().options;

export const PreparationChecklistSchema = z.object({
  communicationId: z.string(),
  items: ChecklistItemsSchema,
  notes: z.string(),
  completedAt: z.coerce.date().nullable(),
  completedBy: z.string().nullable(),
  createdAt: z.coerce.date(),
  updatedAt: z.coerce.date(),
});

export type PreparationChecklist = z.infer<typeof PreparationChecklistSchema>;

export const UpdateChecklistSchema = ChecklistItemsSchema.partial()
  .extend({ notes: z.string().max(2000).optional() })
  .strict();

export type UpdateChecklistInput = z.infer<typeof UpdateChecklistSchema>;

// ============ First Aider Assessment ============
export const TriageCategorySchema = z.enum([
  "immediate",
  "delayed",
  "minor",
  "expectant",
]);

export type TriageCategory = z.infer<typeof TriageCategorySchema>;

export const AssessmentInputSchema = z.object({
  consciousnessLevel: z.string().default(""),
  gcsEyes: z.number().int().min(1).max(4).optional(),
  gcsVerbal: z.number().int().min(1).max(5).optional(),
  gcsMotor: z.number().int().min(1).max(6).optional(),
  heartRate: z.number().int().min(0).max(300).optional(),
  bloodPressureSystolic: z.number().int().min(0).max(300).optional(),
  bloodPressureDiastolic: z.number().int().min(0).max(200).optional(),
  respiratoryRate: z.number().int().min(0).max(100).optional(),
  oxygenSaturation: z.number().int().min(0).max(100).optional(),
  temperature: z.number().min(25).max(45).optional(),
  mechanismOfInjury: z.string().default(""),
  injuriesIdentified: z.array(z.string()).default([]),
  painScore: z.number().int().min(0).max(10).optional(),
  allergies: z.string().default(""),
  medications: z.string().default(""),
  medicalHistory: z.string().default(""),
  lastOralIntake: z.string().default(""),
  interventions: z.array(z.string()).default([]),
  medicationsAdministered: z.array(z.string()).default([]),
  triageCategory: TriageCategorySchema.optional(),
  sceneDescription: z.string().default(""),
  safetyConcerns: z.string().default(""),
});

export type AssessmentInput = z.input<typeof AssessmentInputSchema>;

export const FirstAiderAssessmentSchema = AssessmentInputSchema.extend({
  communicationId: z.string(),
  gcsTotal: z.number().int().min(3).max(15).nullable(),
  createdAt: z.coerce.date(),
});

export type FirstAiderAssessment = z.infer<typeof FirstAiderAssessmentSchema>;

// ============ Update Requests ============
export const StatusUpdateSchema = z.object({
  status: CommunicationStatusSchema,
  notes: z.string().max(2000).optional(),
});

export const AcknowledgeSchema = z.object({
  notes: z.string().max(2000).optional(),
});

/** Role-isolated field update; keys are checked against the caller's role */
export const FieldUpdateSchema = z.record(z.unknown());
