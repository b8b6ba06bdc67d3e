import { randomUUID } from "node:crypto";
import type { FastifyInstance } from "fastify";
import type { Pool } from "pg";
import { assertProductionDatabaseConfigured, getConfig, type AppConfig } from "../config";
import { buildPool } from "../db/pool";
import { RunExecutor, type SimulationSession } from "../services/runs/executor";
import { recoverStaleActiveRuns } from "../services/runs/recovery";
import { runParametersFromConfig, type RunParameters } from "../services/runs/runner";
import {
  MemoryRunStore,
  PostgresRunStore,
  type RunEventRecord,
  type RunRecord,
  type RunStore,
} from "../services/runs/store";
import { startRunWorker, type RunWorkerHandle } from "../services/runs/worker";
import { launchSumo } from "../services/traci/launcher";

export interface RunsRouteOptions {
  config?: AppConfig;
  runStore?: RunStore;
  runExecutor?: RunExecutor;
  runWorker?: RunWorkerHandle;
  launch?: (parameters: RunParameters) => Promise<SimulationSession>;
}

const MAX_STEPS = 86_400;

let cachedPool: Pool | null = null;

function createRunStore(config: AppConfig, logger: FastifyInstance["log"]): RunStore {
  assertProductionDatabaseConfigured(config);
  if (!config.databaseUrl) {
    return new MemoryRunStore();
  }

  if (!cachedPool) {
    cachedPool = buildPool(config, logger);
  }
  return new PostgresRunStore(cachedPool);
}

function isValidUuid(value: string): boolean {
  return /^[0-9a-f]{8}-[0-9a-f]{4}-[1-5][0-9a-f]{3}-[89ab][0-9a-f]{3}-[0-9a-f]{12}$/i.test(
    value,
  );
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return Boolean(value) && typeof value === "object" && !Array.isArray(value);
}

function errorResponse(code: string, message: string, details?: Record<string, unknown>) {
  return {
    ok: false,
    data: null,
    error: {
      code,
      message,
      ...(details ?? {}),
    },
    meta: null,
  };
}

function toApiRun(record: RunRecord): Record<string, unknown> {
  return {
    run_id: record.runId,
    status: record.status,
    parameters: {
      steps: record.parameters.steps,
      stop_injection_step: record.parameters.stopInjectionStep,
      intruder_injection_step: record.parameters.intruderInjectionStep,
      intruder_route_id: record.parameters.intruderRouteId,
      intruder_type_id: record.parameters.intruderTypeId,
      unauthorized_prefix: record.parameters.unauthorizedPrefix,
      stop_speed_threshold: record.parameters.stopSpeedThreshold,
      stop_time_threshold: record.parameters.stopTimeThreshold,
    },
    steps_executed: record.stepsExecuted,
    anomaly_count: record.anomalyCount,
    cancel_requested: record.cancelRequested,
    error_code: record.errorCode,
    error_message: record.errorMessage,
    created_at: record.createdAt,
    updated_at: record.updatedAt,
    started_at: record.startedAt,
    finished_at: record.finishedAt,
  };
}

function toApiEvent(event: RunEventRecord): Record<string, unknown> {
  return {
    id: event.id,
    event_type: event.eventType,
    step: event.step,
    vehicle_id: event.vehicleId,
    payload: event.payload,
    created_at: event.createdAt,
  };
}

function readStep(
  body: Record<string, unknown>,
  key: string,
  fallback: number,
  min: number,
): { value?: number; error?: string } {
  const raw = body[key];
  if (raw === undefined || raw === null) {
    return { value: fallback };
  }

  if (typeof raw !== "number" || !Number.isInteger(raw) || raw < min || raw > MAX_STEPS) {
    return { error: `${key} must be an integer between ${min} and ${MAX_STEPS}` };
  }

  return { value: raw };
}

export function parseRunCreatePayload(
  raw: unknown,
  defaults: RunParameters,
): { value?: RunParameters; error?: string } {
  if (raw !== undefined && raw !== null && !isRecord(raw)) {
    return { error: "Payload must be a JSON object" };
  }

  const body = isRecord(raw) ? raw : {};
  const steps = readStep(body, "steps", defaults.steps, 1);
  if (steps.value === undefined) {
    return { error: steps.error };
  }

  const stopStep = readStep(body, "stop_injection_step", defaults.stopInjectionStep, -1);
  if (stopStep.value === undefined) {
    return { error: stopStep.error };
  }

  const intruderStep = readStep(
    body,
    "intruder_injection_step",
    defaults.intruderInjectionStep,
    -1,
  );
  if (intruderStep.value === undefined) {
    return { error: intruderStep.error };
  }

  const routeRaw = body.intruder_route_id;
  if (routeRaw !== undefined && (typeof routeRaw !== "string" || !routeRaw.trim())) {
    return { error: "intruder_route_id must be a non-empty string" };
  }

  return {
    value: {
      ...defaults,
      steps: steps.value,
      stopInjectionStep: stopStep.value,
      intruderInjectionStep: intruderStep.value,
      intruderRouteId: typeof routeRaw === "string" ? routeRaw.trim() : defaults.intruderRouteId,
    },
  };
}

export async function runsRoutes(app: FastifyInstance, options: RunsRouteOptions = {}) {
  const config = options.config ?? getConfig();
  const runStore = options.runStore ?? createRunStore(config, app.log);
  const defaults = runParametersFromConfig(config);

  const launch =
    options.launch
    ?? (() =>
      launchSumo({
        binary: config.sumoBinary,
        configFile: config.sumoConfigFile,
        extraArgs: config.sumoExtraArgs,
        host: config.traciHost,
        port: config.traciPort,
        connectRetries: config.traciConnectRetries,
        retryDelayMs: config.traciRetryDelayMs,
        logger: app.log,
      }));

  const runExecutor = options.runExecutor ?? new RunExecutor({
    runStore,
    launch,
    logger: app.log,
  });

  if (!options.runStore) {
    try {
      await recoverStaleActiveRuns({
        runStore,
        logger: app.log,
        staleMinutes: config.runRecoveryStaleMinutes,
      });
    } catch (error) {
      app.log.warn({ error }, "run recovery skipped after boot-time error");
    }
  }

  const runWorker =
    options.runWorker
    ?? startRunWorker({
      runStore,
      runExecutor,
      logger: app.log,
      pollIntervalMs: config.runWorkerPollIntervalMs,
    });

  app.addHook("onClose", async () => {
    runWorker.stop();
  });

  app.post("/runs", async (request, reply) => {
    const parsed = parseRunCreatePayload(request.body, defaults);
    if (!parsed.value) {
      return reply
        .code(400)
        .send(errorResponse("VALIDATION_ERROR", parsed.error ?? "Invalid payload"));
    }

    const run = await runStore.createRun({ runId: randomUUID(), parameters: parsed.value });
    return reply.code(202).send({
      ok: true,
      data: { run: toApiRun(run) },
      error: null,
      meta: null,
    });
  });

  app.get<{ Querystring: { limit?: string } }>("/runs", async (request, reply) => {
    const limit = Number.parseInt(request.query.limit ?? "", 10);
    const runs = await runStore.listRuns({
      limit: Number.isFinite(limit) && limit > 0 ? Math.min(limit, 200) : 50,
    });

    return reply.code(200).send({
      ok: true,
      data: { runs: runs.map((run) => toApiRun(run)) },
      error: null,
      meta: null,
    });
  });

  app.get<{ Params: { runId: string } }>("/runs/:runId", async (request, reply) => {
    const runId = request.params.runId.trim();
    if (!isValidUuid(runId)) {
      return reply.code(400).send(errorResponse("VALIDATION_ERROR", "runId must be a valid UUID"));
    }

    const details = await runStore.getRunWithEvents(runId);
    if (!details) {
      return reply.code(404).send(errorResponse("RUN_NOT_FOUND", "Run was not found"));
    }

    return reply.code(200).send({
      ok: true,
      data: {
        run: toApiRun(details.run),
        events: details.events.map((event) => toApiEvent(event)),
      },
      error: null,
      meta: null,
    });
  });

  app.get<{ Params: { runId: string } }>("/runs/:runId/anomalies", async (request, reply) => {
    const runId = request.params.runId.trim();
    if (!isValidUuid(runId)) {
      return reply.code(400).send(errorResponse("VALIDATION_ERROR", "runId must be a valid UUID"));
    }

    const run = await runStore.getRun(runId);
    if (!run) {
      return reply.code(404).send(errorResponse("RUN_NOT_FOUND", "Run was not found"));
    }

    const anomalies = await runStore.listAnomalyEvents(runId);
    return reply.code(200).send({
      ok: true,
      data: {
        run_id: runId,
        status: run.status,
        anomalies: anomalies.map((event) => toApiEvent(event)),
      },
      error: null,
      meta: null,
    });
  });

  app.post<{ Params: { runId: string } }>("/runs/:runId/cancel", async (request, reply) => {
    const runId = request.params.runId.trim();
    if (!isValidUuid(runId)) {
      return reply.code(400).send(errorResponse("VALIDATION_ERROR", "runId must be a valid UUID"));
    }

    const existing = await runStore.getRun(runId);
    if (!existing) {
      return reply.code(404).send(errorResponse("RUN_NOT_FOUND", "Run was not found"));
    }

    const cancelled = await runStore.requestCancel(runId);
    if (!cancelled) {
      return reply.code(409).send(
        errorResponse("RUN_NOT_CANCELLABLE", "Only queued or running runs can be cancelled", {
          status: existing.status,
        }),
      );
    }

    if (cancelled.status === "cancelled") {
      await runStore.appendRunEvent({
        runId,
        eventType: "run_cancelled",
        payload: { steps_executed: 0 },
      });
    }

    return reply.code(202).send({
      ok: true,
      data: { run: toApiRun(cancelled) },
      error: null,
      meta: null,
    });
  });
}
