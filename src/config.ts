export type SumoBinary = "sumo" | "sumo-gui";

export interface AppConfig {
  port: number;
  databaseUrl: string;
  databaseSslRootCertPath: string;
  sumoBinary: SumoBinary;
  sumoConfigFile: string;
  sumoExtraArgs: string[];
  traciHost: string;
  traciPort: number | null;
  traciConnectRetries: number;
  traciRetryDelayMs: number;
  simSteps: number;
  stopInjectionStep: number;
  intruderInjectionStep: number;
  intruderRouteId: string;
  intruderTypeId: string;
  unauthorizedVehiclePrefix: string;
  stopSpeedThreshold: number;
  stopTimeThreshold: number;
  runWorkerPollIntervalMs: number;
  runRecoveryStaleMinutes: number;
}

function intFromEnv(name: string, fallback: number): number {
  const raw = process.env[name];
  if (!raw) {
    return fallback;
  }

  const parsed = Number.parseInt(raw, 10);
  return Number.isFinite(parsed) && parsed > 0 ? parsed : fallback;
}

// Injection steps may legitimately be 0, and -1 turns an injection off.
function stepFromEnv(name: string, fallback: number): number {
  const raw = process.env[name];
  if (!raw) {
    return fallback;
  }

  const parsed = Number.parseInt(raw, 10);
  return Number.isFinite(parsed) && parsed >= -1 ? parsed : fallback;
}

function floatFromEnv(name: string, fallback: number): number {
  const raw = process.env[name];
  if (!raw) {
    return fallback;
  }

  const parsed = Number.parseFloat(raw);
  return Number.isFinite(parsed) && parsed > 0 ? parsed : fallback;
}

function sumoBinaryFromEnv(): SumoBinary {
  return process.env.SUMO_BINARY?.trim() === "sumo-gui" ? "sumo-gui" : "sumo";
}

function listFromEnv(name: string): string[] {
  const raw = process.env[name]?.trim();
  if (!raw) {
    return [];
  }

  return raw.split(/\s+/);
}

export function getConfig(): AppConfig {
  const traciPort = intFromEnv("TRACI_PORT", 0);

  return {
    port: intFromEnv("PORT", 3001),
    databaseUrl: process.env.DATABASE_URL ?? "",
    databaseSslRootCertPath: process.env.DATABASE_SSL_ROOT_CERT_PATH ?? "",
    sumoBinary: sumoBinaryFromEnv(),
    sumoConfigFile: process.env.SUMO_CONFIG ?? "twoIntersection.sumocfg",
    sumoExtraArgs: listFromEnv("SUMO_EXTRA_ARGS"),
    traciHost: process.env.TRACI_HOST ?? "127.0.0.1",
    traciPort: traciPort > 0 ? traciPort : null,
    traciConnectRetries: intFromEnv("TRACI_CONNECT_RETRIES", 60),
    traciRetryDelayMs: intFromEnv("TRACI_RETRY_DELAY_MS", 1000),
    simSteps: intFromEnv("SIM_STEPS", 300),
    stopInjectionStep: stepFromEnv("STOP_INJECTION_STEP", 50),
    intruderInjectionStep: stepFromEnv("INTRUDER_INJECTION_STEP", 100),
    intruderRouteId: process.env.INTRUDER_ROUTE_ID ?? "route_0",
    intruderTypeId: process.env.INTRUDER_TYPE_ID ?? "car",
    unauthorizedVehiclePrefix: process.env.UNAUTHORIZED_VEHICLE_PREFIX?.trim() || "unauth",
    stopSpeedThreshold: floatFromEnv("STOP_SPEED_THRESHOLD", 0.1),
    stopTimeThreshold: intFromEnv("STOP_TIME_THRESHOLD", 5),
    runWorkerPollIntervalMs: intFromEnv("RUN_WORKER_POLL_INTERVAL_MS", 1000),
    runRecoveryStaleMinutes: intFromEnv("RUN_RECOVERY_STALE_MINUTES", 30),
  };
}

export function assertProductionDatabaseConfigured(config: AppConfig): void {
  if (process.env.NODE_ENV === "production" && !config.databaseUrl) {
    throw new Error("DATABASE_URL is required in production.");
  }
}

export function validateProductionBootConfig(config: AppConfig): void {
  if (process.env.NODE_ENV !== "production") {
    return;
  }

  const missing: string[] = [];
  if (!config.databaseUrl) {
    missing.push("DATABASE_URL");
  }
  if (!config.sumoConfigFile.trim()) {
    missing.push("SUMO_CONFIG");
  }
  // Unset means the default prefix; only an explicitly blank value is rejected.
  const prefix = process.env.UNAUTHORIZED_VEHICLE_PREFIX;
  if (prefix !== undefined && !prefix.trim()) {
    missing.push("UNAUTHORIZED_VEHICLE_PREFIX");
  }

  if (missing.length > 0) {
    throw new Error(
      `Fatal config error: missing required production settings: ${missing.join(", ")}`,
    );
  }
}
