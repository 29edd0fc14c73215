import type {
  AlertStatus,
  AlertVerification,
  Communication,
  CommunicationLog,
  CommunicationStatus,
  EmergencyAlert,
  EmergencyUpdate,
  FirstAiderAssessment,
  Hospital,
  PreparationChecklist,
  Priority,
} from "../types";

// ============ Filters ============

export interface AlertFilter {
  reporterId?: string;
  statuses?: AlertStatus[];
  activeOnly?: boolean;
  createdAfter?: Date;
}

export interface CommunicationFilter {
  alertId?: string;
  hospitalId?: string;
  firstAiderId?: string;
  statuses?: CommunicationStatus[];
  priority?: Priority;
  createdAfter?: Date;
  maxAttempts?: number;
}

// ============ Repositories ============

export interface HospitalRepository {
  list(): Promise<Hospital[]>;
  get(id: string): Promise<Hospital | null>;
  save(hospital: Hospital): Promise<Hospital>;
}

export interface AlertRepository {
  get(id: string): Promise<EmergencyAlert | null>;
  /** Reads the row for a read-modify-write; PostgreSQL takes a row lock */
  getForUpdate(id: string): Promise<EmergencyAlert | null>;
  list(filter?: AlertFilter): Promise<EmergencyAlert[]>;
  save(alert: EmergencyAlert): Promise<EmergencyAlert>;
  /** Removes the alert with its updates, verifications and communications */
  delete(id: string): Promise<boolean>;

  addUpdate(update: EmergencyUpdate): Promise<EmergencyUpdate>;
  listUpdates(alertId: string): Promise<EmergencyUpdate[]>;

  saveVerification(verification: AlertVerification): Promise<AlertVerification>;
  listVerifications(alertId: string): Promise<AlertVerification[]>;
}

export interface CommunicationRepository {
  get(id: string): Promise<Communication | null>;
  /** Reads the row for a read-modify-write; PostgreSQL takes a row lock */
  getForUpdate(id: string): Promise<Communication | null>;
  list(filter?: CommunicationFilter): Promise<Communication[]>;
  save(communication: Communication): Promise<Communication>;

  addLog(log: CommunicationLog): Promise<CommunicationLog>;
  listLogs(communicationId: string): Promise<CommunicationLog[]>;

  getChecklist(communicationId: string): Promise<PreparationChecklist | null>;
  saveChecklist(checklist: PreparationChecklist): Promise<PreparationChecklist>;

  getAssessment(communicationId: string): Promise<FirstAiderAssessment | null>;
  saveAssessment(
    assessment: FirstAiderAssessment
  ): Promise<FirstAiderAssessment>;
}

/**
 * Persistence contract shared by the in-memory and PostgreSQL stores.
 * Everything run inside transaction() commits or rolls back as a unit.
 */
export interface HavenStore {
  readonly hospitals: HospitalRepository;
  readonly alerts: AlertRepository;
  readonly communications: CommunicationRepository;
  transaction<T>(work: (tx: HavenStore) => Promise<T>): Promise<T>;
  close(): Promise<void>;
}
