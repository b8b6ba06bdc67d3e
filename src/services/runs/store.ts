import { randomUUID } from "node:crypto";
import type { Pool } from "pg";
import type { RunParameters } from "./runner";

export type RunStatus = "queued" | "running" | "completed" | "failed" | "cancelled";

export type RunEventType =
  | "run_leased"
  | "run_completed"
  | "run_failed"
  | "run_cancelled"
  | "run_recovered_failed"
  | "injection_forced_stop"
  | "injection_unauthorized_insertion"
  | "anomaly_prolonged_stop"
  | "anomaly_unauthorized_vehicle";

export const ANOMALY_EVENT_TYPES: ReadonlySet<RunEventType> = new Set<RunEventType>([
  "anomaly_prolonged_stop",
  "anomaly_unauthorized_vehicle",
]);

export interface RunRecord {
  runId: string;
  status: RunStatus;
  parameters: RunParameters;
  stepsExecuted: number;
  anomalyCount: number;
  cancelRequested: boolean;
  errorCode: string | null;
  errorMessage: string | null;
  createdAt: string;
  updatedAt: string;
  startedAt: string | null;
  finishedAt: string | null;
}

export interface RunEventRecord {
  id: string;
  runId: string;
  eventType: RunEventType;
  step: number | null;
  vehicleId: string | null;
  payload: Record<string, unknown>;
  createdAt: string;
}

export interface RunWithEvents {
  run: RunRecord;
  events: RunEventRecord[];
}

export interface RunStore {
  createRun(input: { runId: string; parameters: RunParameters }): Promise<RunRecord>;
  getRun(runId: string): Promise<RunRecord | null>;
  getRunWithEvents(runId: string): Promise<RunWithEvents | null>;
  listRuns(input?: { limit?: number }): Promise<RunRecord[]>;
  claimNextQueuedRun(): Promise<RunRecord | null>;
  setRunStatus(input: {
    runId: string;
    status: RunStatus;
    errorCode?: string | null;
    errorMessage?: string | null;
    startedAt?: string | null;
    finishedAt?: string | null;
  }): Promise<RunRecord | null>;
  setRunProgress(input: {
    runId: string;
    stepsExecuted: number;
    anomalyCount: number;
  }): Promise<RunRecord | null>;
  /**
   * Queued runs are cancelled on the spot; running runs are flagged and
   * stopped by their executor between steps.
   */
  requestCancel(runId: string): Promise<RunRecord | null>;
  appendRunEvent(input: {
    runId: string;
    eventType: RunEventType;
    step?: number | null;
    vehicleId?: string | null;
    payload?: Record<string, unknown>;
  }): Promise<RunEventRecord>;
  listAnomalyEvents(runId: string): Promise<RunEventRecord[]>;
  listStaleActiveRuns(input: { cutoffIso: string; limit?: number }): Promise<RunRecord[]>;
}

function isActive(status: RunStatus): boolean {
  return status === "queued" || status === "running";
}

export class MemoryRunStore implements RunStore {
  private readonly runs = new Map<string, RunRecord>();

  private readonly events = new Map<string, RunEventRecord[]>();

  async createRun(input: { runId: string; parameters: RunParameters }): Promise<RunRecord> {
    const now = new Date().toISOString();
    const run: RunRecord = {
      runId: input.runId,
      status: "queued",
      parameters: input.parameters,
      stepsExecuted: 0,
      anomalyCount: 0,
      cancelRequested: false,
      errorCode: null,
      errorMessage: null,
      createdAt: now,
      updatedAt: now,
      startedAt: null,
      finishedAt: null,
    };

    this.runs.set(run.runId, run);
    this.events.set(run.runId, []);
    return run;
  }

  async getRun(runId: string): Promise<RunRecord | null> {
    return this.runs.get(runId) ?? null;
  }

  async getRunWithEvents(runId: string): Promise<RunWithEvents | null> {
    const run = this.runs.get(runId);
    if (!run) {
      return null;
    }

    return { run, events: [...(this.events.get(runId) ?? [])] };
  }

  async listRuns(input: { limit?: number } = {}): Promise<RunRecord[]> {
    const limit = Math.max(1, input.limit ?? 50);
    return [...this.runs.values()].reverse().slice(0, limit);
  }

  async claimNextQueuedRun(): Promise<RunRecord | null> {
    const queued = [...this.runs.values()].find((run) => run.status === "queued");
    if (!queued) {
      return null;
    }

    const now = new Date().toISOString();
    const claimed: RunRecord = {
      ...queued,
      status: "running",
      startedAt: queued.startedAt ?? now,
      updatedAt: now,
    };
    this.runs.set(claimed.runId, claimed);
    return claimed;
  }

  async setRunStatus(input: {
    runId: string;
    status: RunStatus;
    errorCode?: string | null;
    errorMessage?: string | null;
    startedAt?: string | null;
    finishedAt?: string | null;
  }): Promise<RunRecord | null> {
    const existing = this.runs.get(input.runId);
    if (!existing) {
      return null;
    }

    const updated: RunRecord = {
      ...existing,
      status: input.status,
      errorCode: input.errorCode ?? existing.errorCode,
      errorMessage: input.errorMessage ?? existing.errorMessage,
      startedAt: input.startedAt === undefined ? existing.startedAt : input.startedAt,
      finishedAt: input.finishedAt === undefined ? existing.finishedAt : input.finishedAt,
      updatedAt: new Date().toISOString(),
    };
    this.runs.set(input.runId, updated);
    return updated;
  }

  async setRunProgress(input: {
    runId: string;
    stepsExecuted: number;
    anomalyCount: number;
  }): Promise<RunRecord | null> {
    const existing = this.runs.get(input.runId);
    if (!existing) {
      return null;
    }

    const updated: RunRecord = {
      ...existing,
      stepsExecuted: input.stepsExecuted,
      anomalyCount: input.anomalyCount,
      updatedAt: new Date().toISOString(),
    };
    this.runs.set(input.runId, updated);
    return updated;
  }

  async requestCancel(runId: string): Promise<RunRecord | null> {
    const existing = this.runs.get(runId);
    if (!existing || !isActive(existing.status)) {
      return null;
    }

    const now = new Date().toISOString();
    const updated: RunRecord =
      existing.status === "queued"
        ? { ...existing, status: "cancelled", cancelRequested: true, finishedAt: now, updatedAt: now }
        : { ...existing, cancelRequested: true, updatedAt: now };
    this.runs.set(runId, updated);
    return updated;
  }

  async appendRunEvent(input: {
    runId: string;
    eventType: RunEventType;
    step?: number | null;
    vehicleId?: string | null;
    payload?: Record<string, unknown>;
  }): Promise<RunEventRecord> {
    const event: RunEventRecord = {
      id: randomUUID(),
      runId: input.runId,
      eventType: input.eventType,
      step: input.step ?? null,
      vehicleId: input.vehicleId ?? null,
      payload: input.payload ?? {},
      createdAt: new Date().toISOString(),
    };

    const existing = this.events.get(input.runId) ?? [];
    existing.push(event);
    this.events.set(input.runId, existing);
    return event;
  }

  async listAnomalyEvents(runId: string): Promise<RunEventRecord[]> {
    return (this.events.get(runId) ?? []).filter((event) =>
      ANOMALY_EVENT_TYPES.has(event.eventType),
    );
  }

  async listStaleActiveRuns(input: { cutoffIso: string; limit?: number }): Promise<RunRecord[]> {
    const cutoff = new Date(input.cutoffIso).getTime();
    const limit = Math.max(1, input.limit ?? 200);

    return [...this.runs.values()]
      .filter((run) => run.status === "running")
      .filter((run) => new Date(run.startedAt ?? run.createdAt).getTime() < cutoff)
      .slice(0, limit);
  }
}

interface RunRow {
  run_id: string;
  status: RunStatus;
  parameters: RunParameters;
  steps_executed: number | string;
  anomaly_count: number | string;
  cancel_requested: boolean;
  error_code: string | null;
  error_message: string | null;
  created_at: Date | string;
  updated_at: Date | string;
  started_at: Date | string | null;
  finished_at: Date | string | null;
}

interface RunEventRow {
  id: string;
  run_id: string;
  event_type: RunEventType;
  step: number | string | null;
  vehicle_id: string | null;
  payload: Record<string, unknown> | null;
  created_at: Date | string;
}

const RUN_COLUMNS = `
  run_id,
  status,
  parameters,
  steps_executed,
  anomaly_count,
  cancel_requested,
  error_code,
  error_message,
  created_at,
  updated_at,
  started_at,
  finished_at
`;

const EVENT_COLUMNS = "id, run_id, event_type, step, vehicle_id, payload, created_at";

function toInt(value: number | string): number {
  const parsed = Number.parseInt(String(value), 10);
  return Number.isFinite(parsed) ? parsed : 0;
}

function toIso(value: Date | string): string {
  return value instanceof Date ? value.toISOString() : new Date(value).toISOString();
}

function toIsoOrNull(value: Date | string | null): string | null {
  return value === null ? null : toIso(value);
}

function mapRunRow(row: RunRow): RunRecord {
  return {
    runId: row.run_id,
    status: row.status,
    parameters: row.parameters,
    stepsExecuted: toInt(row.steps_executed),
    anomalyCount: toInt(row.anomaly_count),
    cancelRequested: Boolean(row.cancel_requested),
    errorCode: row.error_code,
    errorMessage: row.error_message,
    createdAt: toIso(row.created_at),
    updatedAt: toIso(row.updated_at),
    startedAt: toIsoOrNull(row.started_at),
    finishedAt: toIsoOrNull(row.finished_at),
  };
}

function mapEventRow(row: RunEventRow): RunEventRecord {
  return {
    id: row.id,
    runId: row.run_id,
    eventType: row.event_type,
    step: row.step === null ? null : toInt(row.step),
    vehicleId: row.vehicle_id,
    payload: row.payload ?? {},
    createdAt: toIso(row.created_at),
  };
}

export class PostgresRunStore implements RunStore {
  constructor(private readonly pool: Pool) {}

  async createRun(input: { runId: string; parameters: RunParameters }): Promise<RunRecord> {
    const result = await this.pool.query<RunRow>(
      `
        INSERT INTO sim_runs (run_id, status, parameters)
        VALUES ($1, 'queued', $2::jsonb)
        RETURNING ${RUN_COLUMNS}
      `,
      [input.runId, JSON.stringify(input.parameters)],
    );

    return mapRunRow(result.rows[0]);
  }

  async getRun(runId: string): Promise<RunRecord | null> {
    const result = await this.pool.query<RunRow>(
      `SELECT ${RUN_COLUMNS} FROM sim_runs WHERE run_id = $1 LIMIT 1`,
      [runId],
    );

    return result.rowCount ? mapRunRow(result.rows[0]) : null;
  }

  async getRunWithEvents(runId: string): Promise<RunWithEvents | null> {
    const run = await this.getRun(runId);
    if (!run) {
      return null;
    }

    const eventResult = await this.pool.query<RunEventRow>(
      `
        SELECT ${EVENT_COLUMNS}
        FROM sim_run_events
        WHERE run_id = $1
        ORDER BY seq ASC
      `,
      [runId],
    );

    return { run, events: eventResult.rows.map((row) => mapEventRow(row)) };
  }

  async listRuns(input: { limit?: number } = {}): Promise<RunRecord[]> {
    const result = await this.pool.query<RunRow>(
      `SELECT ${RUN_COLUMNS} FROM sim_runs ORDER BY created_at DESC LIMIT $1`,
      [Math.max(1, input.limit ?? 50)],
    );

    return result.rows.map((row) => mapRunRow(row));
  }

  async claimNextQueuedRun(): Promise<RunRecord | null> {
    const client = await this.pool.connect();
    try {
      await client.query("BEGIN");
      const result = await client.query<RunRow>(
        `
          WITH candidate AS (
            SELECT run_id
            FROM sim_runs
            WHERE status = 'queued'
            ORDER BY created_at ASC
            FOR UPDATE SKIP LOCKED
            LIMIT 1
          )
          UPDATE sim_runs AS r
          SET
            status = 'running',
            started_at = COALESCE(r.started_at, NOW()),
            updated_at = NOW()
          FROM candidate
          WHERE r.run_id = candidate.run_id
          RETURNING r.*
        `,
      );
      await client.query("COMMIT");
      return result.rowCount ? mapRunRow(result.rows[0]) : null;
    } catch (error) {
      await client.query("ROLLBACK");
      throw error;
    } finally {
      client.release();
    }
  }

  async setRunStatus(input: {
    runId: string;
    status: RunStatus;
    errorCode?: string | null;
    errorMessage?: string | null;
    startedAt?: string | null;
    finishedAt?: string | null;
  }): Promise<RunRecord | null> {
    const result = await this.pool.query<RunRow>(
      `
        UPDATE sim_runs
        SET
          status = $2,
          error_code = COALESCE($3, error_code),
          error_message = COALESCE($4, error_message),
          started_at = CASE WHEN $5::boolean THEN $6::timestamptz ELSE started_at END,
          finished_at = CASE WHEN $7::boolean THEN $8::timestamptz ELSE finished_at END,
          updated_at = NOW()
        WHERE run_id = $1
        RETURNING ${RUN_COLUMNS}
      `,
      [
        input.runId,
        input.status,
        input.errorCode ?? null,
        input.errorMessage ?? null,
        input.startedAt !== undefined,
        input.startedAt ?? null,
        input.finishedAt !== undefined,
        input.finishedAt ?? null,
      ],
    );

    return result.rowCount ? mapRunRow(result.rows[0]) : null;
  }

  async setRunProgress(input: {
    runId: string;
    stepsExecuted: number;
    anomalyCount: number;
  }): Promise<RunRecord | null> {
    const result = await this.pool.query<RunRow>(
      `
        UPDATE sim_runs
        SET steps_executed = $2, anomaly_count = $3, updated_at = NOW()
        WHERE run_id = $1
        RETURNING ${RUN_COLUMNS}
      `,
      [input.runId, input.stepsExecuted, input.anomalyCount],
    );

    return result.rowCount ? mapRunRow(result.rows[0]) : null;
  }

  async requestCancel(runId: string): Promise<RunRecord | null> {
    const result = await this.pool.query<RunRow>(
      `
        UPDATE sim_runs
        SET
          cancel_requested = TRUE,
          status = CASE WHEN status = 'queued' THEN 'cancelled' ELSE status END,
          finished_at = CASE WHEN status = 'queued' THEN NOW() ELSE finished_at END,
          updated_at = NOW()
        WHERE run_id = $1
          AND status IN ('queued', 'running')
        RETURNING ${RUN_COLUMNS}
      `,
      [runId],
    );

    return result.rowCount ? mapRunRow(result.rows[0]) : null;
  }

  async appendRunEvent(input: {
    runId: string;
    eventType: RunEventType;
    step?: number | null;
    vehicleId?: string | null;
    payload?: Record<string, unknown>;
  }): Promise<RunEventRecord> {
    const result = await this.pool.query<RunEventRow>(
      `
        INSERT INTO sim_run_events (id, run_id, event_type, step, vehicle_id, payload)
        VALUES ($1, $2, $3, $4, $5, $6::jsonb)
        RETURNING ${EVENT_COLUMNS}
      `,
      [
        randomUUID(),
        input.runId,
        input.eventType,
        input.step ?? null,
        input.vehicleId ?? null,
        JSON.stringify(input.payload ?? {}),
      ],
    );

    return mapEventRow(result.rows[0]);
  }

  async listAnomalyEvents(runId: string): Promise<RunEventRecord[]> {
    const result = await this.pool.query<RunEventRow>(
      `
        SELECT ${EVENT_COLUMNS}
        FROM sim_run_events
        WHERE run_id = $1
          AND event_type = ANY($2::text[])
        ORDER BY seq ASC
      `,
      [runId, [...ANOMALY_EVENT_TYPES]],
    );

    return result.rows.map((row) => mapEventRow(row));
  }

  async listStaleActiveRuns(input: { cutoffIso: string; limit?: number }): Promise<RunRecord[]> {
    const result = await this.pool.query<RunRow>(
      `
        SELECT ${RUN_COLUMNS}
        FROM sim_runs
        WHERE status = 'running'
          AND COALESCE(started_at, created_at) < $1::timestamptz
        ORDER BY created_at ASC
        LIMIT $2
      `,
      [input.cutoffIso, Math.max(1, input.limit ?? 200)],
    );

    return result.rows.map((row) => mapRunRow(row));
  }
}
