import type { SimulationControl } from "../traci/client";
import { TraciCommandError } from "../traci/errors";

interface InjectorLogger {
  info(payload: Record<string, unknown>, message: string): void;
  error(payload: Record<string, unknown>, message: string): void;
}

export type InjectionKind = "forced_stop" | "unauthorized_insertion";

export interface Injection {
  kind: InjectionKind;
  vehicleId: string;
  step: number;
  detail: Record<string, unknown>;
}

export interface UnauthorizedVehicleOptions {
  prefix: string;
  routeId: string;
  typeId: string;
  now?: () => Date;
}

/** Forces one uniformly chosen vehicle to speed 0, simulating a breakdown or malicious halt. */
export async function injectSuddenStop(
  client: SimulationControl,
  step: number,
  logger: InjectorLogger,
  random: () => number = Math.random,
): Promise<Injection | null> {
  const vehicleIds = await client.vehicle.getIDList();
  if (vehicleIds.length === 0) {
    logger.info({ step }, "no vehicle on the network to stop");
    return null;
  }

  const index = Math.min(vehicleIds.length - 1, Math.floor(random() * vehicleIds.length));
  const vehicleId = vehicleIds[index];
  await client.vehicle.setSpeed(vehicleId, 0.0);
  logger.info({ step, vehicleId }, "anomaly injection: forcing vehicle to stop");

  return {
    kind: "forced_stop",
    vehicleId,
    step,
    detail: { speed: 0 },
  };
}

export function unauthorizedVehicleId(prefix: string, now: Date): string {
  return `${prefix}${Math.floor(now.getTime() / 1000)}`;
}

/**
 * Inserts a vehicle that was not part of the planned demand. A refusal from
 * the simulator (unknown route, duplicate id) is logged and yields null.
 */
export async function injectUnauthorizedVehicle(
  client: SimulationControl,
  step: number,
  options: UnauthorizedVehicleOptions,
  logger: InjectorLogger,
): Promise<Injection | null> {
  const vehicleId = unauthorizedVehicleId(options.prefix, (options.now ?? (() => new Date()))());

  try {
    await client.vehicle.add(vehicleId, options.routeId, {
      typeId: options.typeId,
      departPos: "0",
      departSpeed: "max",
    });
  } catch (error) {
    if (error instanceof TraciCommandError) {
      logger.error(
        { step, vehicleId, routeId: options.routeId, error: error.message },
        "could not inject unauthorized vehicle",
      );
      return null;
    }
    throw error;
  }

  logger.info({ step, vehicleId, routeId: options.routeId }, "anomaly injection: unauthorized vehicle");
  return {
    kind: "unauthorized_insertion",
    vehicleId,
    step,
    detail: { routeId: options.routeId, typeId: options.typeId },
  };
}
