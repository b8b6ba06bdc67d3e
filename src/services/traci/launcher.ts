import { spawn, type ChildProcess } from "node:child_process";
import net from "node:net";
import type { SumoBinary } from "../../config";
import { TraciClient, type TraciVersion } from "./client";
import { TraciConnection } from "./connection";
import { TraciConnectionError } from "./errors";

interface LauncherLogger {
  info(payload: Record<string, unknown>, message: string): void;
  warn(payload: Record<string, unknown>, message: string): void;
}

export interface LaunchSumoOptions {
  binary: SumoBinary;
  configFile: string;
  extraArgs?: string[];
  host?: string;
  port?: number | null;
  connectRetries?: number;
  retryDelayMs?: number;
  logger: LauncherLogger;
  spawnProcess?: (command: string, args: string[]) => ChildProcess;
}

export interface SumoSession {
  client: TraciClient;
  process: ChildProcess;
  port: number;
  version: TraciVersion;
  shutdown(): Promise<void>;
}

export function buildSumoArgs(
  configFile: string,
  port: number,
  extraArgs: readonly string[] = [],
): string[] {
  return [
    "-c",
    configFile,
    "--start",
    "--no-step-log",
    "true",
    ...extraArgs,
    "--remote-port",
    String(port),
  ];
}

export function findFreePort(host = "127.0.0.1"): Promise<number> {
  return new Promise((resolve, reject) => {
    const server = net.createServer();
    server.unref();
    server.once("error", reject);
    server.listen(0, host, () => {
      const address = server.address();
      const port = typeof address === "object" && address ? address.port : 0;
      server.close(() => {
        if (port > 0) {
          resolve(port);
        } else {
          reject(new Error("Could not determine a free local port"));
        }
      });
    });
  });
}

function defaultSpawn(command: string, args: string[]): ChildProcess {
  return spawn(command, args, { stdio: ["ignore", "inherit", "inherit"] });
}

function stopProcess(child: ChildProcess): Promise<void> {
  if (child.pid === undefined || child.exitCode !== null || child.signalCode !== null) {
    return Promise.resolve();
  }

  return new Promise((resolve) => {
    child.once("exit", () => resolve());
    child.kill("SIGTERM");
  });
}

/**
 * Starts the simulator in server mode and connects to it, retrying while the
 * process boots. Mirrors `traci.start` from the SUMO tooling.
 */
export async function launchSumo(options: LaunchSumoOptions): Promise<SumoSession> {
  const host = options.host ?? "127.0.0.1";
  const port = options.port ?? (await findFreePort(host));
  const args = buildSumoArgs(options.configFile, port, options.extraArgs);
  const child = (options.spawnProcess ?? defaultSpawn)(options.binary, args);

  const exited: { reason: string | null } = { reason: null };
  child.once("exit", (code, signal) => {
    exited.reason = signal ? `signal ${signal}` : `exit code ${code ?? "unknown"}`;
  });
  child.once("error", (error) => {
    exited.reason = error.message;
  });

  options.logger.info(
    { binary: options.binary, configFile: options.configFile, port },
    "SUMO process started",
  );

  let connection: TraciConnection;
  try {
    connection = await TraciConnection.connect({
      host,
      port,
      retries: options.connectRetries,
      retryDelayMs: options.retryDelayMs,
      logger: options.logger,
      shouldRetry: () => exited.reason === null,
    });
  } catch (error) {
    const reason = exited.reason;
    await stopProcess(child);
    if (reason !== null) {
      throw new TraciConnectionError(
        `SUMO exited before accepting a TraCI connection (${reason})`,
      );
    }
    throw error;
  }

  const client = new TraciClient(connection);
  let version: TraciVersion;
  try {
    version = await client.getVersion();
  } catch (error) {
    await connection.close();
    await stopProcess(child);
    throw error;
  }

  options.logger.info(
    { apiVersion: version.apiVersion, sumoVersion: version.sumoVersion, port },
    "SUMO simulation started with TraCI",
  );

  return {
    client,
    process: child,
    port,
    version,
    async shutdown() {
      try {
        if (!connection.isClosed) {
          await client.close();
        }
      } finally {
        await stopProcess(child);
      }
    },
  };
}
