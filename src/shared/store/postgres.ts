import { readFile } from "fs/promises";
import { Pool, type PoolClient, type QueryResult, type QueryResultRow } from "pg";
import {
  AlertVerificationSchema,
  CommunicationLogSchema,
  CommunicationSchema,
  EmergencyAlertSchema,
  EmergencyUpdateSchema,
  FirstAiderAssessmentSchema,
  HospitalSchema,
  PreparationChecklistSchema,
  type AlertVerification,
  type Communication,
  type CommunicationLog,
  type EmergencyAlert,
  type EmergencyUpdate,
  type FirstAiderAssessment,
  type Hospital,
  type PreparationChecklist,
} from "../types";
import type {
  AlertFilter,
  AlertRepository,
  CommunicationFilter,
  CommunicationRepository,
  HavenStore,
  HospitalRepository,
} from "./types";

/**
 * Anything that runs a parameterised query: the pool or a checked-out client
 */
export interface Queryable {
  query<R extends QueryResultRow>(
    text: string,
    values?: unknown[]
  ): Promise<QueryResult<R>>;
}

interface DataRow extends QueryResultRow {
  data: unknown;
}

interface RowSchema<T> {
  parse(data: unknown): T;
}

function parseRows<T>(
  schema: RowSchema<T>,
  result: QueryResult<DataRow>
): T[] {
  return result.rows.map((row) => schema.parse(row.data));
}

function parseFirst<T>(
  schema: RowSchema<T>,
  result: QueryResult<DataRow>
): T | null {
  const row = result.rows[0];
  return row ? schema.parse(row.data) : null;
}

/** Builds "WHERE a = $1 AND b = ANY($2)" clauses with positional params */
class WhereBuilder {
  private readonly clauses: string[] = [];
  readonly values: unknown[] = [];

  add(clause: (param: string) => string, value: unknown): this {
    if (value === undefined) return this;
    this.values.push(value);
    this.clauses.push(clause(`$${this.values.length}`));
    return this;
  }

  raw(clause: string): this {
    this.clauses.push(clause);
    return this;
  }

  toString(): string {
    return this.clauses.length ? `WHERE ${this.clauses.join(" AND ")}` : "";
  }
}

// ============ Hospital Repository ============
class PgHospitalRepository implements HospitalRepository {
  constructor(private readonly db: Queryable) {}

  async list(): Promise<Hospital[]> {
    const result = await this.db.query<DataRow>(
      "SELECT data FROM hospitals ORDER BY name ASC"
    );
    return parseRows(HospitalSchema, result);
  }

  async get(id: string): Promise<Hospital | null> {
    const result = await this.db.query<DataRow>(
      "SELECT data FROM hospitals WHERE id = $1",
      [id]
    );
    return parseFirst(HospitalSchema, result);
  }

  async save(hospital: Hospital): Promise<Hospital> {
    await this.db.query(
      `INSERT INTO hospitals (id, name, data, updated_at)
       VALUES ($1, $2, $3, $4)
       ON CONFLICT (id) DO UPDATE
         SET name = EXCLUDED.name, data = EXCLUDED.data, updated_at = EXCLUDED.updated_at`,
      [hospital.id, hospital.name, JSON.stringify(hospital), hospital.updatedAt]
    );
    return hospital;
  }
}

// ============ Alert Repository ============
class PgAlertRepository implements AlertRepository {
  constructor(private readonly db: Queryable) {}

  async get(id: string): Promise<EmergencyAlert | null> {
    const result = await this.db.query<DataRow>(
      "SELECT data FROM emergency_alerts WHERE id = $1",
      [id]
    );
    return parseFirst(EmergencyAlertSchema, result);
  }

  async getForUpdate(id: string): Promise<EmergencyAlert | null> {
    const result = await this.db.query<DataRow>(
      "SELECT data FROM emergency_alerts WHERE id = $1 FOR UPDATE",
      [id]
    );
    return parseFirst(EmergencyAlertSchema, result);
  }

  async list(filter: AlertFilter = {}): Promise<EmergencyAlert[]> {
    const where = new WhereBuilder()
      .add((p) => `reporter_id = ${p}`, filter.reporterId)
      .add((p) => `status = ANY(${p})`, filter.statuses)
      .add((p) => `created_at >= ${p}`, filter.createdAfter);
    if (filter.activeOnly) where.raw("is_active");

    const result = await this.db.query<DataRow>(
      `SELECT data FROM emergency_alerts ${where} ORDER BY created_at ASC`,
      where.values
    );
    return parseRows(EmergencyAlertSchema, result);
  }

  async save(alert: EmergencyAlert): Promise<EmergencyAlert> {
    await this.db.query(
      `INSERT INTO emergency_alerts
         (id, reference, reporter_id, status, is_active, created_at, data)
       VALUES ($1, $2, $3, $4, $5, $6, $7)
       ON CONFLICT (id) DO UPDATE
         SET status = EXCLUDED.status, is_active = EXCLUDED.is_active, data = EXCLUDED.data`,
      [
        alert.id,
        alert.reference,
        alert.reporterId,
        alert.status,
        alert.isActive,
        alert.createdAt,
        JSON.stringify(alert),
      ]
    );
    return alert;
  }

  async delete(id: string): Promise<boolean> {
    // Updates, verifications, communications and their children cascade
    const result = await this.db.query(
      "DELETE FROM emergency_alerts WHERE id = $1",
      [id]
    );
    return (result.rowCount ?? 0) > 0;
  }

  async addUpdate(update: EmergencyUpdate): Promise<EmergencyUpdate> {
    await this.db.query(
      `INSERT INTO emergency_updates (id, alert_id, created_at, data)
       VALUES ($1, $2, $3, $4)`,
      [update.id, update.alertId, update.createdAt, JSON.stringify(update)]
    );
    return update;
  }

  async listUpdates(alertId: string): Promise<EmergencyUpdate[]> {
    const result = await this.db.query<DataRow>(
      "SELECT data FROM emergency_updates WHERE alert_id = $1 ORDER BY created_at ASC",
      [alertId]
    );
    return parseRows(EmergencyUpdateSchema, result);
  }

  async saveVerification(
    verification: AlertVerification
  ): Promise<AlertVerification> {
    await this.db.query(
      `INSERT INTO alert_verifications (id, alert_id, created_at, data)
       VALUES ($1, $2, $3, $4)
       ON CONFLICT (id) DO UPDATE SET data = EXCLUDED.data`,
      [
        verification.id,
        verification.alertId,
        verification.createdAt,
        JSON.stringify(verification),
      ]
    );
    return verification;
  }

  async listVerifications(alertId: string): Promise<AlertVerification[]> {
    const result = await this.db.query<DataRow>(
      "SELECT data FROM alert_verifications WHERE alert_id = $1 ORDER BY created_at ASC",
      [alertId]
    );
    return parseRows(AlertVerificationSchema, result);
  }
}

// ============ Communication Repository ============
class PgCommunicationRepository implements CommunicationRepository {
  constructor(private readonly db: Queryable) {}

  async get(id: string): Promise<Communication | null> {
    const result = await this.db.query<DataRow>(
      "SELECT data FROM emergency_hospital_communications WHERE id = $1",
      [id]
    );
    return parseFirst(CommunicationSchema, result);
  }

  async getForUpdate(id: string): Promise<Communication | null> {
    const result = await this.db.query<DataRow>(
      "SELECT data FROM emergency_hospital_communications WHERE id = $1 FOR UPDATE",
      [id]
    );
    return parseFirst(CommunicationSchema, result);
  }

  async list(filter: CommunicationFilter = {}): Promise<Communication[]> {
    const where = new WhereBuilder()
      .add((p) => `alert_id = ${p}`, filter.alertId)
      .add((p) => `hospital_id = ${p}`, filter.hospitalId)
      .add((p) => `first_aider_id = ${p}`, filter.firstAiderId)
      .add((p) => `status = ANY(${p})`, filter.statuses)
      .add((p) => `priority = ${p}`, filter.priority)
      .add((p) => `created_at >= ${p}`, filter.createdAfter)
      .add((p) => `communication_attempts < ${p}`, filter.maxAttempts);

    const result = await this.db.query<DataRow>(
      `SELECT data FROM emergency_hospital_communications ${where}
       ORDER BY created_at ASC`,
      where.values
    );
    return parseRows(CommunicationSchema, result);
  }

  async save(communication: Communication): Promise<Communication> {
    await this.db.query(
      `INSERT INTO emergency_hospital_communications
         (id, alert_id, hospital_id, first_aider_id, status, priority,
          communication_attempts, created_at, data)
       VALUES ($1, $2, $3, $4, $5, $6, $7, $8, $9)
       ON CONFLICT (id) DO UPDATE
         SET status = EXCLUDED.status,
             priority = EXCLUDED.priority,
             communication_attempts = EXCLUDED.communication_attempts,
             data = EXCLUDED.data`,
      [
        communication.id,
        communication.alertId,
        communication.hospitalId,
        communication.firstAiderId,
        communication.status,
        communication.priority,
        communication.communicationAttempts,
        communication.createdAt,
        JSON.stringify(communication),
      ]
    );
    return communication;
  }

  async addLog(log: CommunicationLog): Promise<CommunicationLog> {
    await this.db.query(
      `INSERT INTO communication_logs (id, communication_id, sent_at, data)
       VALUES ($1, $2, $3, $4)`,
      [log.id, log.communicationId, log.sentAt, JSON.stringify(log)]
    );
    return log;
  }

  async listLogs(communicationId: string): Promise<CommunicationLog[]> {
    const result = await this.db.query<DataRow>(
      "SELECT data FROM communication_logs WHERE communication_id = $1 ORDER BY sent_at ASC",
      [communicationId]
    );
    return parseRows(CommunicationLogSchema, result);
  }

  async getChecklist(
    communicationId: string
  ): Promise<PreparationChecklist | null> {
    const result = await this.db.query<DataRow>(
      "SELECT data FROM preparation_checklists WHERE communication_id = $1",
      [communicationId]
    );
    return parseFirst(PreparationChecklistSchema, result);
  }

  async saveChecklist(
    checklist: PreparationChecklist
  ): Promise<PreparationChecklist> {
    await this.db.query(
      `INSERT INTO preparation_checklists (communication_id, data)
       VALUES ($1, $2)
       ON CONFLICT (communication_id) DO UPDATE SET data = EXCLUDED.data`,
      [checklist.communicationId, JSON.stringify(checklist)]
    );
    return checklist;
  }

  async getAssessment(
    communicationId: string
  ): Promise<FirstAiderAssessment | null> {
    const result = await this.db.query<DataRow>(
      "SELECT data FROM first_aider_assessments WHERE communication_id = $1",
      [communicationId]
    );
    return parseFirst(FirstAiderAssessmentSchema, result);
  }

  async saveAssessment(
    assessment: FirstAiderAssessment
  ): Promise<FirstAiderAssessment> {
    await this.db.query(
      `INSERT INTO first_aider_assessments (communication_id, data)
       VALUES ($1, $2)`,
      [assessment.communicationId, JSON.stringify(assessment)]
    );
    return assessment;
  }
}

/**
 * PostgreSQL store on a pg connection pool.
 * transaction() checks out one client and wraps the work in BEGIN/COMMIT.
 */
export class PgStore implements HavenStore {
  readonly hospitals: HospitalRepository;
  readonly alerts: AlertRepository;
  readonly communications: CommunicationRepository;

  constructor(
    private readonly pool: Pool,
    private readonly client?: PoolClient
  ) {
    const db: Queryable = {
      query: <R extends QueryResultRow>(text: string, values?: unknown[]) =>
        client ? client.query<R>(text, values) : pool.query<R>(text, values),
    };
    this.hospitals = new PgHospitalRepository(db);
    this.alerts = new PgAlertRepository(db);
    this.communications = new PgCommunicationRepository(db);
  }

  static connect(connectionString: string): PgStore {
    return new PgStore(new Pool({ connectionString, max: 10 }));
  }

  async transaction<T>(work: (tx: HavenStore) => Promise<T>): Promise<T> {
    if (this.client) {
      return work(this);
    }

    const client = await this.pool.connect();
    try {
      await client.query("BEGIN");
      const result = await work(new PgStore(this.pool, client));
      await client.query("COMMIT");
      return result;
    } catch (error) {
      await client.query("ROLLBACK");
      throw error;
    } finally {
      client.release();
    }
  }

  /**
   * Apply sql/schema.sql (idempotent)
   */
  async migrate(): Promise<void> {
    const schema = await readFile(
      new URL("../../../sql/schema.sql", import.meta.url),
      "utf8"
    );
    await this.pool.query(schema);
  }

  async close(): Promise<void> {
    await this.pool.end();
  }
}
