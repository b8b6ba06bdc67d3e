import { getConfig } from "../src/config";
import { createLogger } from "../src/logger";
import { runParametersFromConfig, runSimulation } from "../src/services/runs/runner";
import { launchSumo } from "../src/services/traci/launcher";

async function main(): Promise<void> {
  const config = getConfig();
  const logger = createLogger("run-simulation");

  const session = await launchSumo({
    binary: config.sumoBinary,
    configFile: config.sumoConfigFile,
    extraArgs: config.sumoExtraArgs,
    host: config.traciHost,
    port: config.traciPort,
    connectRetries: config.traciConnectRetries,
    retryDelayMs: config.traciRetryDelayMs,
    logger,
  });

  const controller = new AbortController();
  const onSignal = () => controller.abort();
  process.once("SIGINT", onSignal);
  process.once("SIGTERM", onSignal);

  try {
    await runSimulation({
      client: session.client,
      parameters: runParametersFromConfig(config),
      logger,
      signal: controller.signal,
    });
  } finally {
    process.removeListener("SIGINT", onSignal);
    process.removeListener("SIGTERM", onSignal);
    await session.shutdown();
  }
}

main().catch((error) => {
  const message = error instanceof Error ? error.message : String(error);
  console.error(`[run-simulation] Simulation failed: ${message}`);
  process.exit(1);
});
