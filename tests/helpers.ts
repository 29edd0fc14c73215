import { createServices, type HavenServices } from "../src/services";
import type { DistanceProvider, MatrixElement } from "../src/services/distance.service";
import type {
  DeliveryChannel,
  DeliveryResult,
  NotificationRequest,
  NotificationSender,
} from "../src/services/notification.service";
import { loadConfig, type AppConfig } from "../src/shared/config";
import { Database } from "../src/shared/store/Database";
import type { SendOutcome } from "../src/services/communication.service";
import type {
  Actor,
  CreateAlertInput,
  CreateCommunicationInput,
  EmergencyAlert,
  Hospital,
  HospitalCapacity,
  Location,
} from "../src/shared/types";

export const testConfig: AppConfig = loadConfig({
  NODE_ENV: "test",
  LOG_LEVEL: "silent",
  LOG_PRETTY: "false",
  DISCOVERY_CACHE_TTL_SECONDS: "0",
});

export const NAIROBI_CBD: Location = { lat: -1.2864, lng: 36.8172 };

// ============ Actors ============

export const firstAider: Actor = { userId: "fa-1", role: "first_aider", hospitalId: null };
export const otherFirstAider: Actor = { userId: "fa-2", role: "first_aider", hospitalId: null };
export const admin: Actor = { userId: "admin-1", role: "system_admin", hospitalId: null };

export function staffOf(hospitalId: string, userId = `staff-${hospitalId}`): Actor {
  return { userId, role: "hospital_staff", hospitalId };
}

// ============ Hospitals ============

export function makeCapacity(
  overrides: Partial<HospitalCapacity> = {}
): HospitalCapacity {
  return {
    totalBeds: 100,
    availableBeds: 20,
    emergencyBedsTotal: 20,
    emergencyBedsAvailable: 10,
    icuBedsTotal: 10,
    icuBedsAvailable: 2,
    averageWaitTime: 30,
    emergencyWaitTime: 10,
    doctorsAvailable: 5,
    nursesAvailable: 10,
    isAcceptingPatients: true,
    capacityStatus: "low",
    lastUpdated: new Date("2026-01-01T00:00:00Z"),
    ...overrides,
  };
}

export function makeHospital(
  overrides: Partial<Hospital> & Pick<Hospital, "id">
): Hospital {
  const now = new Date("2026-01-01T00:00:00Z");
  return {
    name: `Hospital ${overrides.id}`,
    hospitalType: "public",
    level: "level_4",
    location: NAIROBI_CBD,
    address: "1 Test Road",
    city: "Nairobi",
    phone: "+254700000000",
    emergencyPhone: null,
    email: null,
    isOperational: true,
    acceptsEmergencies: true,
    isVerified: true,
    businessStatus: "OPERATIONAL",
    placeTypes: ["hospital", "health"],
    specialties: [{ specialty: "emergency", capabilityLevel: "advanced", isAvailable: true }],
    capacity: makeCapacity(),
    ratings: [],
    apiBaseUrl: null,
    apiKey: null,
    smsNotifications: false,
    webhookUrl: null,
    createdAt: now,
    updatedAt: now,
    ...overrides,
  };
}

// ============ Fakes ============

type Responder = (request: NotificationRequest) => DeliveryResult;

/**
 * Records every notification; answers per channel (success by default)
 */
export class FakeSender implements NotificationSender {
  readonly requests: NotificationRequest[] = [];
  private readonly responders = new Map<DeliveryChannel, Responder>();
  private gate: Promise<void> | null = null;

  /** Park every send until the returned function is called */
  hold(): () => void {
    let release = (): void => undefined;
    this.gate = new Promise<void>((resolve) => {
      release = resolve;
    });
    return () => {
      this.gate = null;
      release();
    };
  }

  failChannel(channel: DeliveryChannel, error = "HTTP 503", responseCode = 503): this {
    this.responders.set(channel, () => ({ success: false, error, responseCode }));
    return this;
  }

  succeedChannel(channel: DeliveryChannel): this {
    this.responders.set(channel, () => ({ success: true, responseCode: 200 }));
    return this;
  }

  sentOn(channel: DeliveryChannel): NotificationRequest[] {
    return this.requests.filter((r) => r.channel === channel);
  }

  async send(request: NotificationRequest): Promise<DeliveryResult> {
    this.requests.push(request);
    if (this.gate) await this.gate;
    const responder = this.responders.get(request.channel);
    return responder ? responder(request) : { success: true, responseCode: 200 };
  }
}

/**
 * Distance matrix answering from a fixed table of durations per destination
 */
export class FakeDistanceProvider implements DistanceProvider {
  calls = 0;

  constructor(
    private readonly answer: (destination: Location) => MatrixElement | Error
  ) {}

  async matrix(origins: Location[], destinations: Location[]): Promise<MatrixElement[][]> {
    this.calls += 1;
    return origins.map(() =>
      destinations.map((destination) => {
        const element = this.answer(destination);
        if (element instanceof Error) throw element;
        return element;
      })
    );
  }
}

// ============ Wiring ============

export interface TestContext {
  store: Database;
  sender: FakeSender;
  services: HavenServices;
}

export async function createTestContext(
  hospitals: Hospital[] = [],
  options: { distanceProvider?: DistanceProvider | null; config?: AppConfig } = {}
): Promise<TestContext> {
  const store = new Database();
  for (const hospital of hospitals) {
    await store.hospitals.save(hospital);
  }
  const sender = new FakeSender();
  const services = createServices({
    store,
    config: options.config ?? testConfig,
    sender,
    distanceProvider: options.distanceProvider ?? null,
    geocoder: null,
  });
  return { store, sender, services };
}

// ============ Scenarios ============

export async function raiseAlert(
  services: HavenServices,
  actor: Actor = firstAider,
  overrides: Partial<CreateAlertInput> = {}
): Promise<EmergencyAlert> {
  const { alert } = await services.alerts.createAlert(actor, {
    emergencyType: "trauma",
    priority: "high",
    location: NAIROBI_CBD,
    description: "Motorbike collision, rider conscious",
    reporterPhone: "+254711000000",
    ...overrides,
  });
  return alert;
}

export async function openCommunication(
  services: HavenServices,
  hospitalId: string,
  overrides: Partial<CreateCommunicationInput> = {},
  actor: Actor = firstAider
): Promise<SendOutcome> {
  const alert = await raiseAlert(services, actor);
  return services.communications.create(actor, {
    alertId: alert.id,
    hospitalId,
    chiefComplaint: "Open fracture, left leg",
    ...overrides,
  });
}
