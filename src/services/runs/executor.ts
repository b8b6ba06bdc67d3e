import type { SimulationControl } from "../traci/client";
import { TraciConnectionError, TraciError } from "../traci/errors";
import { runSimulation, type RunParameters, type SimulationEvent } from "./runner";
import type { RunEventType, RunStore } from "./store";

interface ExecutorLogger {
  info(payload: Record<string, unknown>, message: string): void;
  warn(payload: Record<string, unknown>, message: string): void;
  error(payload: Record<string, unknown>, message: string): void;
}

export interface SimulationSession {
  client: SimulationControl;
  shutdown(): Promise<void>;
}

export interface RunExecutorOptions {
  runStore: RunStore;
  launch: (parameters: RunParameters) => Promise<SimulationSession>;
  logger: ExecutorLogger;
  /** How often, in steps, progress is persisted and cancellation is checked. */
  progressEverySteps?: number;
  random?: () => number;
  now?: () => Date;
}

function errorCodeFor(error: unknown): string {
  if (error instanceof TraciConnectionError) {
    return "SIMULATOR_UNAVAILABLE";
  }
  if (error instanceof TraciError) {
    return "TRACI_ERROR";
  }
  return "RUN_EXECUTION_FAILED";
}

function eventTypeFor(event: SimulationEvent): RunEventType {
  if (event.type === "injection") {
    return event.injection.kind === "forced_stop"
      ? "injection_forced_stop"
      : "injection_unauthorized_insertion";
  }

  return event.anomaly.kind === "prolonged_stop"
    ? "anomaly_prolonged_stop"
    : "anomaly_unauthorized_vehicle";
}

export class RunExecutor {
  private readonly progressEverySteps: number;

  constructor(private readonly options: RunExecutorOptions) {
    this.progressEverySteps = Math.max(1, Math.floor(options.progressEverySteps ?? 10));
  }

  async executeRun(runId: string): Promise<void> {
    const { runStore, logger } = this.options;
    const run = await runStore.getRun(runId);
    if (!run) {
      logger.warn({ runId }, "run executor skipped unknown run");
      return;
    }

    const controller = new AbortController();
    let anomalyCount = 0;
    let session: SimulationSession | null = null;

    try {
      session = await this.options.launch(run.parameters);

      const summary = await runSimulation({
        client: session.client,
        parameters: run.parameters,
        logger,
        signal: controller.signal,
        random: this.options.random,
        now: this.options.now,
        onEvent: async (event) => {
          if (event.type === "anomaly") {
            anomalyCount += 1;
          }
          const source = event.type === "injection" ? event.injection : event.anomaly;
          await runStore.appendRunEvent({
            runId,
            eventType: eventTypeFor(event),
            step: source.step,
            vehicleId: source.vehicleId,
            payload: source.detail,
          });
        },
        onStep: async (stepsExecuted) => {
          if (stepsExecuted % this.progressEverySteps !== 0) {
            return;
          }
          const updated = await runStore.setRunProgress({ runId, stepsExecuted, anomalyCount });
          if (updated?.cancelRequested) {
            controller.abort();
          }
        },
      });

      const latest = await runStore.setRunProgress({
        runId,
        stepsExecuted: summary.stepsExecuted,
        anomalyCount,
      });

      // A cancel accepted after the last progress check still wins.
      const cancelled = summary.cancelled || Boolean(latest?.cancelRequested);
      const finishedAt = new Date().toISOString();
      if (cancelled) {
        await runStore.setRunStatus({ runId, status: "cancelled", finishedAt });
        await runStore.appendRunEvent({
          runId,
          eventType: "run_cancelled",
          payload: { steps_executed: summary.stepsExecuted },
        });
        return;
      }

      await runStore.setRunStatus({ runId, status: "completed", finishedAt });
      await runStore.appendRunEvent({
        runId,
        eventType: "run_completed",
        payload: {
          steps_executed: summary.stepsExecuted,
          injections: summary.injections.length,
          anomalies: anomalyCount,
        },
      });
    } catch (error) {
      const code = errorCodeFor(error);
      const message = error instanceof Error ? error.message : String(error);
      logger.error({ runId, code, error: message }, "simulation run failed");

      await runStore.setRunStatus({
        runId,
        status: "failed",
        errorCode: code,
        errorMessage: message,
        finishedAt: new Date().toISOString(),
      });
      await runStore.appendRunEvent({
        runId,
        eventType: "run_failed",
        payload: { code, message },
      });
    } finally {
      if (session) {
        try {
          await session.shutdown();
        } catch (error) {
          logger.warn(
            { runId, error: error instanceof Error ? error.message : String(error) },
            "simulation shutdown failed",
          );
        }
      }
    }
  }
}
