import { AnomalyDetector, detectAnomalies, type Anomaly } from "../anomaly/detector";
import {
  injectSuddenStop,
  injectUnauthorizedVehicle,
  type Injection,
} from "../anomaly/injector";
import type { SimulationControl } from "../traci/client";

interface RunnerLogger {
  info(payload: Record<string, unknown>, message: string): void;
  warn(payload: Record<string, unknown>, message: string): void;
  error(payload: Record<string, unknown>, message: string): void;
}

export interface RunParameters {
  steps: number;
  /** Step at which a forced stop is injected; -1 disables it. */
  stopInjectionStep: number;
  /** Step at which an unauthorized vehicle is inserted; -1 disables it. */
  intruderInjectionStep: number;
  intruderRouteId: string;
  intruderTypeId: string;
  unauthorizedPrefix: string;
  stopSpeedThreshold: number;
  stopTimeThreshold: number;
}

export type SimulationEvent =
  | { type: "injection"; injection: Injection }
  | { type: "anomaly"; anomaly: Anomaly };

export interface RunSimulationOptions {
  client: SimulationControl;
  parameters: RunParameters;
  logger: RunnerLogger;
  onEvent?: (event: SimulationEvent) => Promise<void> | void;
  onStep?: (stepsExecuted: number) => Promise<void> | void;
  signal?: AbortSignal;
  random?: () => number;
  now?: () => Date;
}

export interface RunSummary {
  stepsExecuted: number;
  cancelled: boolean;
  injections: Injection[];
  anomalies: Anomaly[];
}

export async function runSimulation(options: RunSimulationOptions): Promise<RunSummary> {
  const { client, parameters, logger } = options;
  const detector = new AnomalyDetector({
    stopSpeedThreshold: parameters.stopSpeedThreshold,
    stopTimeThreshold: parameters.stopTimeThreshold,
    unauthorizedPrefix: parameters.unauthorizedPrefix,
  });
  const summary: RunSummary = {
    stepsExecuted: 0,
    cancelled: false,
    injections: [],
    anomalies: [],
  };

  const recordInjection = async (injection: Injection | null) => {
    if (!injection) {
      return;
    }
    summary.injections.push(injection);
    await options.onEvent?.({ type: "injection", injection });
  };

  for (let step = 0; step < parameters.steps; step += 1) {
    if (options.signal?.aborted) {
      summary.cancelled = true;
      logger.warn({ step }, "simulation run cancelled");
      break;
    }

    await client.simulationStep();

    if (step === parameters.stopInjectionStep) {
      await recordInjection(await injectSuddenStop(client, step, logger, options.random));
    }

    if (step === parameters.intruderInjectionStep) {
      await recordInjection(
        await injectUnauthorizedVehicle(
          client,
          step,
          {
            prefix: parameters.unauthorizedPrefix,
            routeId: parameters.intruderRouteId,
            typeId: parameters.intruderTypeId,
            now: options.now,
          },
          logger,
        ),
      );
    }

    for (const anomaly of await detectAnomalies(client, detector, step)) {
      summary.anomalies.push(anomaly);
      if (anomaly.kind === "prolonged_stop") {
        logger.warn(
          { step, vehicleId: anomaly.vehicleId, stoppedSteps: parameters.stopTimeThreshold },
          "anomaly detected: vehicle stopped beyond threshold",
        );
      } else {
        logger.warn(
          { step, vehicleId: anomaly.vehicleId },
          "anomaly detected: unauthorized vehicle on network",
        );
      }
      await options.onEvent?.({ type: "anomaly", anomaly });
    }

    summary.stepsExecuted = step + 1;
    await options.onStep?.(summary.stepsExecuted);
  }

  logger.info(
    {
      stepsExecuted: summary.stepsExecuted,
      injections: summary.injections.length,
      anomalies: summary.anomalies.length,
      cancelled: summary.cancelled,
    },
    "simulation finished",
  );
  return summary;
}

export function runParametersFromConfig(config: {
  simSteps: number;
  stopInjectionStep: number;
  intruderInjectionStep: number;
  intruderRouteId: string;
  intruderTypeId: string;
  unauthorizedVehiclePrefix: string;
  stopSpeedThreshold: number;
  stopTimeThreshold: number;
}): RunParameters {
  return {
    steps: config.simSteps,
    stopInjectionStep: config.stopInjectionStep,
    intruderInjectionStep: config.intruderInjectionStep,
    intruderRouteId: config.intruderRouteId,
    intruderTypeId: config.intruderTypeId,
    unauthorizedPrefix: config.unauthorizedVehiclePrefix,
    stopSpeedThreshold: config.stopSpeedThreshold,
    stopTimeThreshold: config.stopTimeThreshold,
  };
}
