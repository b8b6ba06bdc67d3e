// Command, variable and type identifiers of the TraCI protocol as used by SUMO.

export const CMD_GETVERSION = 0x00;
export const CMD_SIMSTEP = 0x02;
export const CMD_CLOSE = 0x7f;

export const CMD_GET_VEHICLE_VARIABLE = 0xa4;
export const CMD_GET_SIM_VARIABLE = 0xab;
export const CMD_SET_VEHICLE_VARIABLE = 0xc4;

// A get response id is the request id shifted by this amount.
export const RESPONSE_OFFSET = 0x10;

export const TRACI_ID_LIST = 0x00;
export const VAR_SPEED = 0x40;
export const VAR_ROAD_ID = 0x50;
export const VAR_TIME = 0x66;
export const VAR_MIN_EXPECTED_VEHICLES = 0x7d;
export const REMOVE = 0x81;
export const ADD_FULL = 0x85;

export const TYPE_UBYTE = 0x07;
export const TYPE_BYTE = 0x08;
export const TYPE_INTEGER = 0x09;
export const TYPE_DOUBLE = 0x0b;
export const TYPE_STRING = 0x0c;
export const TYPE_STRINGLIST = 0x0e;
export const TYPE_COMPOUND = 0x0f;

export const RTYPE_OK = 0x00;
export const RTYPE_NOTIMPLEMENTED = 0x01;
export const RTYPE_ERR = 0xff;

export const RESULT_NAMES: Record<number, string> = {
  [RTYPE_OK]: "OK",
  [RTYPE_NOTIMPLEMENTED]: "Not implemented",
  [RTYPE_ERR]: "Error",
};

export const REMOVE_REASON_VAPORIZED = 0x03;
