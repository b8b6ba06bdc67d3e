import type {
  SimulationControl,
  VehicleAddOptions,
  VehicleApi,
} from "../../src/services/traci/client";
import { TraciCommandError } from "../../src/services/traci/errors";

export interface FakeSimulationOptions {
  vehicles?: Array<[string, number]>;
  routes?: string[];
  onStep?: (stepCount: number) => Promise<void> | void;
}

/** Scripted stand-in for a running simulation: vehicles keep the speed they are given. */
export class FakeSimulation implements SimulationControl {
  readonly speeds = new Map<string, number>();

  readonly added: Array<{ vehicleId: string; routeId: string; options: VehicleAddOptions }> = [];

  readonly speedCommands: Array<{ vehicleId: string; speed: number }> = [];

  stepCount = 0;

  closed = false;

  readonly vehicle: VehicleApi;

  private readonly routes: Set<string>;

  constructor(private readonly options: FakeSimulationOptions = {}) {
    for (const [vehicleId, speed] of options.vehicles ?? []) {
      this.speeds.set(vehicleId, speed);
    }
    this.routes = new Set(options.routes ?? ["route_0"]);

    this.vehicle = {
      getIDList: async () => [...this.speeds.keys()],
      getSpeed: async (vehicleId) => this.requireVehicle(vehicleId),
      getRoadID: async (vehicleId) => {
        this.requireVehicle(vehicleId);
        return "edge_0";
      },
      setSpeed: async (vehicleId, speed) => {
        this.requireVehicle(vehicleId);
        this.speedCommands.push({ vehicleId, speed });
        this.speeds.set(vehicleId, speed);
      },
      add: async (vehicleId, routeId, addOptions = {}) => {
        if (!this.routes.has(routeId)) {
          throw new TraciCommandError(`Invalid route '${routeId}' for vehicle '${vehicleId}'.`, 0xc4, 0xff);
        }
        if (this.speeds.has(vehicleId)) {
          throw new TraciCommandError(`The vehicle '${vehicleId}' to add already exists.`, 0xc4, 0xff);
        }
        this.added.push({ vehicleId, routeId, options: addOptions });
        this.speeds.set(vehicleId, 13.9);
      },
      remove: async (vehicleId) => {
        this.requireVehicle(vehicleId);
        this.speeds.delete(vehicleId);
      },
    };
  }

  async simulationStep(): Promise<void> {
    this.stepCount += 1;
    await this.options.onStep?.(this.stepCount);
  }

  async getTime(): Promise<number> {
    return this.stepCount;
  }

  async getMinExpectedNumber(): Promise<number> {
    return this.speeds.size;
  }

  async close(): Promise<void> {
    this.closed = true;
  }

  private requireVehicle(vehicleId: string): number {
    const speed = this.speeds.get(vehicleId);
    if (speed === undefined) {
      throw new TraciCommandError(`Vehicle '${vehicleId}' is not known.`, 0xa4, 0xff);
    }
    return speed;
  }
}

export function silentLogger() {
  return {
    info: () => undefined,
    warn: () => undefined,
    error: () => undefined,
  };
}

export function recordingLogger() {
  const entries: Array<{ level: string; payload: Record<string, unknown>; message: string }> = [];
  const record = (level: string) => (payload: Record<string, unknown>, message: string) => {
    entries.push({ level, payload, message });
  };
  return {
    entries,
    info: record("info"),
    warn: record("warn"),
    error: record("error"),
  };
}
