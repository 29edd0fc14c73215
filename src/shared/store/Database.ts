import type {
  AlertVerification,
  Communication,
  CommunicationLog,
  EmergencyAlert,
  EmergencyUpdate,
  FirstAiderAssessment,
  Hospital,
  PreparationChecklist,
} from "../types";
import type {
  AlertFilter,
  AlertRepository,
  CommunicationFilter,
  CommunicationRepository,
  HavenStore,
  HospitalRepository,
} from "./types";

interface Tables {
  hospitals: Map<string, Hospital>;
  alerts: Map<string, EmergencyAlert>;
  updates: Map<string, EmergencyUpdate>;
  verifications: Map<string, AlertVerification>;
  communications: Map<string, Communication>;
  logs: Map<string, CommunicationLog>;
  checklists: Map<string, PreparationChecklist>;
  assessments: Map<string, FirstAiderAssessment>;
}

function createTables(): Tables {
  return {
    hospitals: new Map(),
    alerts: new Map(),
    updates: new Map(),
    verifications: new Map(),
    communications: new Map(),
    logs: new Map(),
    checklists: new Map(),
    assessments: new Map(),
  };
}

/**
 * Working copy of a table inside a transaction. Remembers which keys were
 * written or deleted so only those rows are applied on commit.
 */
class StagedMap<K, V> extends Map<K, V> {
  readonly touched = new Set<K>();

  static of<K, V>(source: Map<K, V>): StagedMap<K, V> {
    const staged = new StagedMap<K, V>();
    for (const [key, value] of source) {
      staged.load(key, structuredClone(value));
    }
    return staged;
  }

  private load(key: K, value: V): void {
    super.set(key, value);
  }

  override set(key: K, value: V): this {
    this.touched.add(key);
    return super.set(key, value);
  }

  override delete(key: K): boolean {
    this.touched.add(key);
    return super.delete(key);
  }

  commitTo(target: Map<K, V>): void {
    for (const key of this.touched) {
      const value = super.get(key);
      if (value === undefined) target.delete(key);
      else target.set(key, value);
    }
  }
}

interface StagedTables extends Tables {
  hospitals: StagedMap<string, Hospital>;
  alerts: StagedMap<string, EmergencyAlert>;
  updates: StagedMap<string, EmergencyUpdate>;
  verifications: StagedMap<string, AlertVerification>;
  communications: StagedMap<string, Communication>;
  logs: StagedMap<string, CommunicationLog>;
  checklists: StagedMap<string, PreparationChecklist>;
  assessments: StagedMap<string, FirstAiderAssessment>;
}

function stage(tables: Tables): StagedTables {
  return {
    hospitals: StagedMap.of(tables.hospitals),
    alerts: StagedMap.of(tables.alerts),
    updates: StagedMap.of(tables.updates),
    verifications: StagedMap.of(tables.verifications),
    communications: StagedMap.of(tables.communications),
    logs: StagedMap.of(tables.logs),
    checklists: StagedMap.of(tables.checklists),
    assessments: StagedMap.of(tables.assessments),
  };
}

function commit(staged: StagedTables, tables: Tables): void {
  staged.hospitals.commitTo(tables.hospitals);
  staged.alerts.commitTo(tables.alerts);
  staged.updates.commitTo(tables.updates);
  staged.verifications.commitTo(tables.verifications);
  staged.communications.commitTo(tables.communications);
  staged.logs.commitTo(tables.logs);
  staged.checklists.commitTo(tables.checklists);
  staged.assessments.commitTo(tables.assessments);
}

// Rows are copied in and out so callers never hold a live reference
const copy = <T>(value: T): T => structuredClone(value);

const byCreatedAt = (a: { createdAt: Date }, b: { createdAt: Date }) =>
  a.createdAt.getTime() - b.createdAt.getTime();

// ============ Hospital Repository ============
class MemoryHospitalRepository implements HospitalRepository {
  constructor(private readonly tables: Tables) {}

  async list(): Promise<Hospital[]> {
    return Array.from(this.tables.hospitals.values(), copy);
  }

  async get(id: string): Promise<Hospital | null> {
    const hospital = this.tables.hospitals.get(id);
    return hospital ? copy(hospital) : null;
  }

  async save(hospital: Hospital): Promise<Hospital> {
    this.tables.hospitals.set(hospital.id, copy(hospital));
    return copy(hospital);
  }
}

// ============ Alert Repository ============
class MemoryAlertRepository implements AlertRepository {
  constructor(private readonly tables: Tables) {}

  async get(id: string): Promise<EmergencyAlert | null> {
    const alert = this.tables.alerts.get(id);
    return alert ? copy(alert) : null;
  }

  async getForUpdate(id: string): Promise<EmergencyAlert | null> {
    return this.get(id);
  }

  async list(filter: AlertFilter = {}): Promise<EmergencyAlert[]> {
    return Array.from(this.tables.alerts.values())
      .filter(
        (a) =>
          (filter.reporterId === undefined || a.reporterId === filter.reporterId) &&
          (filter.statuses === undefined || filter.statuses.includes(a.status)) &&
          (!filter.activeOnly || a.isActive) &&
          (filter.createdAfter === undefined || a.createdAt >= filter.createdAfter)
      )
      .sort(byCreatedAt)
      .map(copy);
  }

  async save(alert: EmergencyAlert): Promise<EmergencyAlert> {
    this.tables.alerts.set(alert.id, copy(alert));
    return copy(alert);
  }

  async delete(id: string): Promise<boolean> {
    if (!this.tables.alerts.has(id)) return false;

    // Children first, then the alert itself
    for (const comm of this.tables.communications.values()) {
      if (comm.alertId !== id) continue;
      for (const [logId, log] of this.tables.logs) {
        if (log.communicationId === comm.id) this.tables.logs.delete(logId);
      }
      this.tables.checklists.delete(comm.id);
      this.tables.assessments.delete(comm.id);
      this.tables.communications.delete(comm.id);
    }
    for (const [updateId, update] of this.tables.updates) {
      if (update.alertId === id) this.tables.updates.delete(updateId);
    }
    for (const [verificationId, v] of this.tables.verifications) {
      if (v.alertId === id) this.tables.verifications.delete(verificationId);
    }
    return this.tables.alerts.delete(id);
  }

  async addUpdate(update: EmergencyUpdate): Promise<EmergencyUpdate> {
    this.tables.updates.set(update.id, copy(update));
    return copy(update);
  }

  async listUpdates(alertId: string): Promise<EmergencyUpdate[]> {
    return Array.from(this.tables.updates.values())
      .filter((u) => u.alertId === alertId)
      .map(copy);
  }

  async saveVerification(
    verification: AlertVerification
  ): Promise<AlertVerification> {
    this.tables.verifications.set(verification.id, copy(verification));
    return copy(verification);
  }

  async listVerifications(alertId: string): Promise<AlertVerification[]> {
    return Array.from(this.tables.verifications.values())
      .filter((v) => v.alertId === alertId)
      .map(copy);
  }
}

// ============ Communication Repository ============
class MemoryCommunicationRepository implements CommunicationRepository {
  constructor(private readonly tables: Tables) {}

  async get(id: string): Promise<Communication | null> {
    const comm = this.tables.communications.get(id);
    return comm ? copy(comm) : null;
  }

  async getForUpdate(id: string): Promise<Communication | null> {
    return this.get(id);
  }

  async list(filter: CommunicationFilter = {}): Promise<Communication[]> {
    return Array.from(this.tables.communications.values())
      .filter(
        (c) =>
          (filter.alertId === undefined || c.alertId === filter.alertId) &&
          (filter.hospitalId === undefined || c.hospitalId === filter.hospitalId) &&
          (filter.firstAiderId === undefined ||
            c.firstAiderId === filter.firstAiderId) &&
          (filter.statuses === undefined || filter.statuses.includes(c.status)) &&
          (filter.priority === undefined || c.priority === filter.priority) &&
          (filter.createdAfter === undefined ||
            c.createdAt >= filter.createdAfter) &&
          (filter.maxAttempts === undefined ||
            c.communicationAttempts < filter.maxAttempts)
      )
      .sort(byCreatedAt)
      .map(copy);
  }

  async save(communication: Communication): Promise<Communication> {
    this.tables.communications.set(communication.id, copy(communication));
    return copy(communication);
  }

  async addLog(log: CommunicationLog): Promise<CommunicationLog> {
    this.tables.logs.set(log.id, copy(log));
    return copy(log);
  }

  async listLogs(communicationId: string): Promise<CommunicationLog[]> {
    return Array.from(this.tables.logs.values())
      .filter((l) => l.communicationId === communicationId)
      .map(copy);
  }

  async getChecklist(
    communicationId: string
  ): Promise<PreparationChecklist | null> {
    const checklist = this.tables.checklists.get(communicationId);
    return checklist ? copy(checklist) : null;
  }

  async saveChecklist(
    checklist: PreparationChecklist
  ): Promise<PreparationChecklist> {
    this.tables.checklists.set(checklist.communicationId, copy(checklist));
    return copy(checklist);
  }

  async getAssessment(
    communicationId: string
  ): Promise<FirstAiderAssessment | null> {
    const assessment = this.tables.assessments.get(communicationId);
    return assessment ? copy(assessment) : null;
  }

  async saveAssessment(
    assessment: FirstAiderAssessment
  ): Promise<FirstAiderAssessment> {
    this.tables.assessments.set(assessment.communicationId, copy(assessment));
    return copy(assessment);
  }
}

/**
 * In-Memory Database
 * Backs development runs without DATABASE_URL and the test suite.
 * Transactions run one at a time against a staged copy of the tables; only
 * the rows they wrote are applied, and only when the work succeeds.
 */
export class Database implements HavenStore {
  readonly hospitals: HospitalRepository;
  readonly alerts: AlertRepository;
  readonly communications: CommunicationRepository;

  private queue: Promise<unknown> = Promise.resolve();

  constructor(
    private readonly tables: Tables = createTables(),
    private readonly inTransaction = false
  ) {
    this.hospitals = new MemoryHospitalRepository(tables);
    this.alerts = new MemoryAlertRepository(tables);
    this.communications = new MemoryCommunicationRepository(tables);
  }

  async transaction<T>(work: (tx: HavenStore) => Promise<T>): Promise<T> {
    if (this.inTransaction) {
      return work(this);
    }

    const run = this.queue.then(async () => {
      const staged = stage(this.tables);
      const result = await work(new Database(staged, true));
      commit(staged, this.tables);
      return result;
    });
    // The next transaction waits for this one whether it commits or not;
    // the caller still receives the failure through `run`
    this.queue = run.then(
      () => undefined,
      () => undefined
    );
    return run;
  }

  async close(): Promise<void> {
    await this.queue;
  }
}
