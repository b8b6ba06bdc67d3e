import type { SimulationControl } from "../traci/client";

export type AnomalyKind = "prolonged_stop" | "unauthorized_vehicle";

export interface Anomaly {
  kind: AnomalyKind;
  vehicleId: string;
  step: number;
  detail: Record<string, unknown>;
}

export interface VehicleSample {
  vehicleId: string;
  speed: number;
}

export interface DetectorThresholds {
  /** Speeds strictly below this count as stopped. */
  stopSpeedThreshold: number;
  /** Consecutive stopped steps after which a stop is reported. */
  stopTimeThreshold: number;
  unauthorizedPrefix: string;
}

export const DEFAULT_THRESHOLDS: DetectorThresholds = {
  stopSpeedThreshold: 0.1,
  stopTimeThreshold: 5,
  unauthorizedPrefix: "unauth",
};

export class AnomalyDetector {
  private readonly stopCounters = new Map<string, number>();

  readonly thresholds: DetectorThresholds;

  constructor(thresholds: Partial<DetectorThresholds> = {}) {
    this.thresholds = { ...DEFAULT_THRESHOLDS, ...thresholds };
    if (!Number.isInteger(this.thresholds.stopTimeThreshold) || this.thresholds.stopTimeThreshold < 1) {
      throw new RangeError("stopTimeThreshold must be a positive integer");
    }
  }

  stoppedSteps(vehicleId: string): number {
    return this.stopCounters.get(vehicleId) ?? 0;
  }

  /**
   * Feeds one step worth of vehicle speeds. A prolonged stop is reported on
   * the step its counter reaches the threshold, so once per stop episode; an
   * unauthorized vehicle is reported on every step it is present.
   */
  observe(step: number, samples: readonly VehicleSample[]): Anomaly[] {
    const anomalies: Anomaly[] = [];
    const present = new Set<string>();
    const { stopSpeedThreshold, stopTimeThreshold, unauthorizedPrefix } = this.thresholds;

    for (const sample of samples) {
      present.add(sample.vehicleId);

      if (sample.speed < stopSpeedThreshold) {
        const count = this.stoppedSteps(sample.vehicleId) + 1;
        this.stopCounters.set(sample.vehicleId, count);
        if (count === stopTimeThreshold) {
          anomalies.push({
            kind: "prolonged_stop",
            vehicleId: sample.vehicleId,
            step,
            detail: { stoppedSteps: count, speed: sample.speed },
          });
        }
      } else {
        this.stopCounters.set(sample.vehicleId, 0);
      }

      if (unauthorizedPrefix && sample.vehicleId.startsWith(unauthorizedPrefix)) {
        anomalies.push({
          kind: "unauthorized_vehicle",
          vehicleId: sample.vehicleId,
          step,
          detail: { prefix: unauthorizedPrefix },
        });
      }
    }

    for (const vehicleId of this.stopCounters.keys()) {
      if (!present.has(vehicleId)) {
        this.stopCounters.delete(vehicleId);
      }
    }

    return anomalies;
  }
}

export async function sampleVehicles(client: SimulationControl): Promise<VehicleSample[]> {
  const vehicleIds = await client.vehicle.getIDList();
  const samples: VehicleSample[] = [];
  for (const vehicleId of vehicleIds) {
    samples.push({ vehicleId, speed: await client.vehicle.getSpeed(vehicleId) });
  }
  return samples;
}

export async function detectAnomalies(
  client: SimulationControl,
  detector: AnomalyDetector,
  step: number,
): Promise<Anomaly[]> {
  return detector.observe(step, await sampleVehicles(client));
}
