import {
  ADD_FULL,
  CMD_CLOSE,
  CMD_GET_SIM_VARIABLE,
  CMD_GET_VEHICLE_VARIABLE,
  CMD_GETVERSION,
  CMD_SET_VEHICLE_VARIABLE,
  CMD_SIMSTEP,
  REMOVE,
  REMOVE_REASON_VAPORIZED,
  RESPONSE_OFFSET,
  TRACI_ID_LIST,
  VAR_MIN_EXPECTED_VEHICLES,
  VAR_ROAD_ID,
  VAR_SPEED,
  VAR_TIME,
} from "./constants";
import type { EncodedCommand } from "./connection";
import { TraciProtocolError } from "./errors";
import {
  encodeCommand,
  encodeVariableCommand,
  StorageReader,
  StorageWriter,
} from "./protocol";

export interface TraciTransport {
  send(commands: readonly EncodedCommand[]): Promise<StorageReader>;
  close(): Promise<void>;
}

export interface TraciVersion {
  apiVersion: number;
  sumoVersion: string;
}

export interface VehicleAddOptions {
  typeId?: string;
  depart?: string | number;
  departLane?: string;
  departPos?: string;
  departSpeed?: string;
  arrivalLane?: string;
  arrivalPos?: string;
  arrivalSpeed?: string;
  fromTaz?: string;
  toTaz?: string;
  line?: string;
  personCapacity?: number;
  personNumber?: number;
}

export interface VehicleApi {
  getIDList(): Promise<string[]>;
  getSpeed(vehicleId: string): Promise<number>;
  getRoadID(vehicleId: string): Promise<string>;
  setSpeed(vehicleId: string, speed: number): Promise<void>;
  add(vehicleId: string, routeId: string, options?: VehicleAddOptions): Promise<void>;
  remove(vehicleId: string, reason?: number): Promise<void>;
}

/** The slice of the remote control API the anomaly loop drives. */
export interface SimulationControl {
  readonly vehicle: VehicleApi;
  simulationStep(targetTime?: number): Promise<void>;
  getTime(): Promise<number>;
  getMinExpectedNumber(): Promise<number>;
  close(): Promise<void>;
}

const ADD_FULL_ITEM_COUNT = 14;

function hex(value: number): string {
  return `0x${value.toString(16)}`;
}

export class TraciClient implements SimulationControl {
  readonly vehicle: VehicleApi;

  private closed = false;

  constructor(private readonly transport: TraciTransport) {
    this.vehicle = {
      getIDList: () =>
        this.get(CMD_GET_VEHICLE_VARIABLE, TRACI_ID_LIST, "", (reader) =>
          reader.typedStringList(),
        ),
      getSpeed: (vehicleId) =>
        this.get(CMD_GET_VEHICLE_VARIABLE, VAR_SPEED, vehicleId, (reader) =>
          reader.typedDouble(),
        ),
      getRoadID: (vehicleId) =>
        this.get(CMD_GET_VEHICLE_VARIABLE, VAR_ROAD_ID, vehicleId, (reader) =>
          reader.typedString(),
        ),
      setSpeed: (vehicleId, speed) =>
        this.set(
          CMD_SET_VEHICLE_VARIABLE,
          VAR_SPEED,
          vehicleId,
          new StorageWriter().typedDouble(speed),
        ),
      add: (vehicleId, routeId, options = {}) =>
        this.set(
          CMD_SET_VEHICLE_VARIABLE,
          ADD_FULL,
          vehicleId,
          encodeAddFull(routeId, options),
        ),
      remove: (vehicleId, reason = REMOVE_REASON_VAPORIZED) =>
        this.set(
          CMD_SET_VEHICLE_VARIABLE,
          REMOVE,
          vehicleId,
          new StorageWriter().typedByte(reason),
        ),
    };
  }

  async getVersion(): Promise<TraciVersion> {
    const reader = await this.transport.send([
      { commandId: CMD_GETVERSION, bytes: encodeCommand(CMD_GETVERSION) },
    ]);
    reader.length();
    const responseId = reader.ubyte();
    if (responseId !== CMD_GETVERSION) {
      throw new TraciProtocolError(
        `Received answer ${hex(responseId)} for command ${hex(CMD_GETVERSION)}`,
      );
    }

    return {
      apiVersion: reader.int(),
      sumoVersion: reader.string(),
    };
  }

  /** Advances one step, or up to `targetTime` seconds when it is positive. */
  async simulationStep(targetTime = 0): Promise<void> {
    const reader = await this.transport.send([
      {
        commandId: CMD_SIMSTEP,
        bytes: encodeCommand(CMD_SIMSTEP, new StorageWriter().double(targetTime).toBuffer()),
      },
    ]);
    // No subscriptions are ever registered, so the results block is empty.
    reader.int();
  }

  getTime(): Promise<number> {
    return this.get(CMD_GET_SIM_VARIABLE, VAR_TIME, "", (reader) => reader.typedDouble());
  }

  getMinExpectedNumber(): Promise<number> {
    return this.get(CMD_GET_SIM_VARIABLE, VAR_MIN_EXPECTED_VEHICLES, "", (reader) =>
      reader.typedInt(),
    );
  }

  async close(): Promise<void> {
    if (this.closed) {
      return;
    }

    this.closed = true;
    try {
      await this.transport.send([{ commandId: CMD_CLOSE, bytes: encodeCommand(CMD_CLOSE) }]);
    } finally {
      await this.transport.close();
    }
  }

  private async get<T>(
    commandId: number,
    variableId: number,
    objectId: string,
    readValue: (reader: StorageReader) => T,
  ): Promise<T> {
    const reader = await this.transport.send([
      { commandId, bytes: encodeVariableCommand(commandId, variableId, objectId) },
    ]);

    reader.length();
    const responseId = reader.ubyte();
    const responseVariable = reader.ubyte();
    const responseObject = reader.string();
    if (
      responseId !== commandId + RESPONSE_OFFSET
      || responseVariable !== variableId
      || responseObject !== objectId
    ) {
      throw new TraciProtocolError(
        `Received answer ${hex(responseId)},${hex(responseVariable)},${responseObject} for command ${hex(commandId)},${hex(variableId)},${objectId}`,
      );
    }

    return readValue(reader);
  }

  private async set(
    commandId: number,
    variableId: number,
    objectId: string,
    value: StorageWriter,
  ): Promise<void> {
    await this.transport.send([
      {
        commandId,
        bytes: encodeVariableCommand(commandId, variableId, objectId, value.toBuffer()),
      },
    ]);
  }
}

function encodeAddFull(routeId: string, options: VehicleAddOptions): StorageWriter {
  const strings = [
    routeId,
    options.typeId ?? "DEFAULT_VEHTYPE",
    String(options.depart ?? "now"),
    options.departLane ?? "first",
    options.departPos ?? "base",
    options.departSpeed ?? "0",
    options.arrivalLane ?? "current",
    options.arrivalPos ?? "max",
    options.arrivalSpeed ?? "current",
    options.fromTaz ?? "",
    options.toTaz ?? "",
    options.line ?? "",
  ];

  const writer = new StorageWriter().compound(ADD_FULL_ITEM_COUNT);
  for (const value of strings) {
    writer.typedString(value);
  }
  return writer
    .typedInt(options.personCapacity ?? 0)
    .typedInt(options.personNumber ?? 0);
}
