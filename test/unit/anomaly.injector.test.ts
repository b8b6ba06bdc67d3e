import assert from "node:assert/strict";
import test from "node:test";
import {
  injectSuddenStop,
  injectUnauthorizedVehicle,
  unauthorizedVehicleId,
} from "../../src/services/anomaly/injector";
import { FakeSimulation, recordingLogger, silentLogger } from "../helpers/fake-simulation";

const FIXED_NOW = () => new Date("2023-11-14T22:13:20.750Z");

test("injectSuddenStop stops the vehicle picked by the random source", async () => {
  const simulation = new FakeSimulation({
    vehicles: [
      ["veh0", 10],
      ["veh1", 11],
      ["veh2", 12],
    ],
  });

  const injection = await injectSuddenStop(simulation, 50, silentLogger(), () => 0.5);

  assert.deepEqual(injection, {
    kind: "forced_stop",
    vehicleId: "veh1",
    step: 50,
    detail: { speed: 0 },
  });
  assert.deepEqual(simulation.speedCommands, [{ vehicleId: "veh1", speed: 0 }]);
});

test("injectSuddenStop keeps the index in range when the random source returns 1", async () => {
  const simulation = new FakeSimulation({ vehicles: [["veh0", 10], ["veh1", 11]] });

  const injection = await injectSuddenStop(simulation, 0, silentLogger(), () => 1);

  assert.equal(injection?.vehicleId, "veh1");
});

test("injectSuddenStop does nothing on an empty network", async () => {
  const simulation = new FakeSimulation();

  assert.equal(await injectSuddenStop(simulation, 50, silentLogger()), null);
  assert.deepEqual(simulation.speedCommands, []);
});

test("unauthorizedVehicleId appends whole unix seconds to the prefix", () => {
  assert.equal(unauthorizedVehicleId("unauth", FIXED_NOW()), "unauth1700000000");
});

test("injectUnauthorizedVehicle inserts at the route start at maximum speed", async () => {
  const simulation = new FakeSimulation();

  const injection = await injectUnauthorizedVehicle(
    simulation,
    100,
    { prefix: "unauth", routeId: "route_0", typeId: "car", now: FIXED_NOW },
    silentLogger(),
  );

  assert.deepEqual(injection, {
    kind: "unauthorized_insertion",
    vehicleId: "unauth1700000000",
    step: 100,
    detail: { routeId: "route_0", typeId: "car" },
  });
  assert.deepEqual(simulation.added, [
    {
      vehicleId: "unauth1700000000",
      routeId: "route_0",
      options: { typeId: "car", departPos: "0", departSpeed: "max" },
    },
  ]);
});

test("injectUnauthorizedVehicle logs a refused insertion and returns null", async () => {
  const simulation = new FakeSimulation({ routes: ["route_1"] });
  const logger = recordingLogger();

  const injection = await injectUnauthorizedVehicle(
    simulation,
    100,
    { prefix: "unauth", routeId: "route_0", typeId: "car", now: FIXED_NOW },
    logger,
  );

  assert.equal(injection, null);
  assert.deepEqual(logger.entries, [
    {
      level: "error",
      payload: {
        step: 100,
        vehicleId: "unauth1700000000",
        routeId: "route_0",
        error: "Invalid route 'route_0' for vehicle 'unauth1700000000'.",
      },
      message: "could not inject unauthorized vehicle",
    },
  ]);
});

test("injectUnauthorizedVehicle propagates transport failures", async () => {
  const simulation = new FakeSimulation();
  simulation.vehicle.add = async () => {
    throw new Error("socket hang up");
  };

  await assert.rejects(
    injectUnauthorizedVehicle(
      simulation,
      100,
      { prefix: "unauth", routeId: "route_0", typeId: "car", now: FIXED_NOW },
      silentLogger(),
    ),
    /socket hang up/,
  );
});
