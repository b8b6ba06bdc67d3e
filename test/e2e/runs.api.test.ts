import assert from "node:assert/strict";
import test from "node:test";
import type { AppConfig } from "../../src/config";
import { buildServer } from "../../src/server";
import { MemoryRunStore } from "../../src/services/runs/store";
import { FakeSimulation } from "../helpers/fake-simulation";

function testConfig(overrides: Partial<AppConfig> = {}): AppConfig {
  return {
    port: 0,
    databaseUrl: "",
    databaseSslRootCertPath: "",
    sumoBinary: "sumo",
    sumoConfigFile: "twoIntersection.sumocfg",
    sumoExtraArgs: [],
    traciHost: "127.0.0.1",
    traciPort: null,
    traciConnectRetries: 1,
    traciRetryDelayMs: 10,
    simSteps: 300,
    stopInjectionStep: 50,
    intruderInjectionStep: 100,
    intruderRouteId: "route_0",
    intruderTypeId: "car",
    unauthorizedVehiclePrefix: "unauth",
    stopSpeedThreshold: 0.1,
    stopTimeThreshold: 5,
    runWorkerPollIntervalMs: 10,
    runRecoveryStaleMinutes: 30,
    ...overrides,
  };
}

async function buildIdleServer(runStore = new MemoryRunStore()) {
  return buildServer({
    logger: false,
    runs: {
      config: testConfig(),
      runStore,
      runWorker: { stop() {} },
    },
  });
}

test("POST /api/v1/runs queues a run with the configured defaults", async () => {
  const app = await buildIdleServer();

  const response = await app.inject({
    method: "POST",
    url: "/api/v1/runs",
    payload: {},
  });

  assert.equal(response.statusCode, 202);
  const body = response.json();
  assert.equal(body.ok, true);
  assert.equal(body.data.run.status, "queued");
  assert.deepEqual(body.data.run.parameters, {
    steps: 300,
    stop_injection_step: 50,
    intruder_injection_step: 100,
    intruder_route_id: "route_0",
    intruder_type_id: "car",
    unauthorized_prefix: "unauth",
    stop_speed_threshold: 0.1,
    stop_time_threshold: 5,
  });
  assert.equal(body.meta.request_id, response.headers["x-request-id"]);

  await app.close();
});

test("POST /api/v1/runs accepts overrides and rejects out-of-range steps", async () => {
  const app = await buildIdleServer();

  const accepted = await app.inject({
    method: "POST",
    url: "/api/v1/runs",
    payload: { steps: 60, stop_injection_step: -1, intruder_route_id: " route_1 " },
  });
  assert.equal(accepted.statusCode, 202);
  const parameters = accepted.json().data.run.parameters;
  assert.equal(parameters.steps, 60);
  assert.equal(parameters.stop_injection_step, -1);
  assert.equal(parameters.intruder_route_id, "route_1");

  const rejected = await app.inject({
    method: "POST",
    url: "/api/v1/runs",
    payload: { steps: 0 },
  });
  assert.equal(rejected.statusCode, 400);
  assert.deepEqual(rejected.json().error, {
    code: "VALIDATION_ERROR",
    message: "steps must be an integer between 1 and 86400",
  });

  await app.close();
});

test("GET /api/v1/runs/:runId validates the id and reports unknown runs", async () => {
  const app = await buildIdleServer();

  const invalid = await app.inject({ method: "GET", url: "/api/v1/runs/not-a-uuid" });
  assert.equal(invalid.statusCode, 400);
  assert.equal(invalid.json().error.code, "VALIDATION_ERROR");

  const missing = await app.inject({
    method: "GET",
    url: "/api/v1/runs/6f1c2d3e-4a5b-4c6d-8e7f-901a2b3c4d5e",
  });
  assert.equal(missing.statusCode, 404);
  assert.equal(missing.json().error.code, "RUN_NOT_FOUND");

  await app.close();
});

test("GET /api/v1/runs lists the newest run first", async () => {
  const app = await buildIdleServer();

  const first = await app.inject({ method: "POST", url: "/api/v1/runs", payload: { steps: 10 } });
  const second = await app.inject({ method: "POST", url: "/api/v1/runs", payload: { steps: 20 } });

  const response = await app.inject({ method: "GET", url: "/api/v1/runs?limit=5" });

  assert.equal(response.statusCode, 200);
  assert.deepEqual(
    response.json().data.runs.map((run: { run_id: string }) => run.run_id),
    [second.json().data.run.run_id, first.json().data.run.run_id],
  );

  await app.close();
});

test("POST /api/v1/runs/:runId/cancel cancels a queued run once", async () => {
  const app = await buildIdleServer();

  const created = await app.inject({ method: "POST", url: "/api/v1/runs", payload: {} });
  const runId: string = created.json().data.run.run_id;

  const cancelled = await app.inject({ method: "POST", url: `/api/v1/runs/${runId}/cancel` });
  assert.equal(cancelled.statusCode, 202);
  assert.equal(cancelled.json().data.run.status, "cancelled");

  const again = await app.inject({ method: "POST", url: `/api/v1/runs/${runId}/cancel` });
  assert.equal(again.statusCode, 409);
  assert.deepEqual(again.json().error, {
    code: "RUN_NOT_CANCELLABLE",
    message: "Only queued or running runs can be cancelled",
    status: "cancelled",
  });

  const details = await app.inject({ method: "GET", url: `/api/v1/runs/${runId}` });
  assert.deepEqual(
    details.json().data.events.map((event: { event_type: string }) => event.event_type),
    ["run_cancelled"],
  );

  await app.close();
});

test("a queued run is executed by the worker and its anomalies are listed", async () => {
  const runStore = new MemoryRunStore();
  const app = await buildServer({
    logger: false,
    runs: {
      config: testConfig(),
      runStore,
      launch: async () => {
        const session = new FakeSimulation({ vehicles: [["veh0", 10]] });
        return { client: session, shutdown: () => session.close() };
      },
    },
  });

  const created = await app.inject({
    method: "POST",
    url: "/api/v1/runs",
    payload: { steps: 8, stop_injection_step: 2, intruder_injection_step: -1 },
  });
  const runId: string = created.json().data.run.run_id;

  let status = "queued";
  for (let attempt = 0; attempt < 100 && status !== "completed"; attempt += 1) {
    await new Promise((resolve) => setTimeout(resolve, 10));
    status = (await runStore.getRun(runId))?.status ?? "missing";
  }
  assert.equal(status, "completed");

  const anomalies = await app.inject({ method: "GET", url: `/api/v1/runs/${runId}/anomalies` });
  assert.equal(anomalies.statusCode, 200);
  const body = anomalies.json();
  assert.equal(body.data.status, "completed");
  assert.deepEqual(
    body.data.anomalies.map((event: { event_type: string; step: number; vehicle_id: string }) => [
      event.event_type,
      event.step,
      event.vehicle_id,
    ]),
    [["anomaly_prolonged_stop", 6, "veh0"]],
  );

  await app.close();
});
