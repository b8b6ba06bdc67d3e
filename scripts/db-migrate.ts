import fs from "node:fs";
import path from "node:path";
import { getConfig, validateProductionBootConfig } from "../src/config";
import { buildPool } from "../src/db/pool";
import { createLogger } from "../src/logger";

function readMigrationFiles(migrationsDir: string): Array<{ name: string; sql: string }> {
  return fs
    .readdirSync(migrationsDir)
    .filter((file) => file.endsWith(".sql"))
    .sort((a, b) => a.localeCompare(b, "en"))
    .map((name) => ({
      name,
      sql: fs.readFileSync(path.join(migrationsDir, name), "utf8"),
    }));
}

async function main(): Promise<void> {
  const config = getConfig();
  validateProductionBootConfig(config);
  const logger = createLogger("db-migrate");
  const pool = buildPool(config, logger);

  const migrationsDir = path.resolve(__dirname, "../src/db/migrations");
  const migrations = readMigrationFiles(migrationsDir);

  const client = await pool.connect();
  try {
    logger.info({ count: migrations.length, migrationsDir }, "applying migrations");
    for (const migration of migrations) {
      logger.info({ migration: migration.name }, "applying migration");
      await client.query(migration.sql);
    }
    logger.info({}, "migration complete");
  } finally {
    client.release();
    await pool.end();
  }
}

main().catch((error) => {
  const message = error instanceof Error ? error.message : String(error);
  console.error(`[db:migrate] Migration failed: ${message}`);
  process.exit(1);
});
