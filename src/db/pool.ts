import fs from "node:fs";
import path from "node:path";
import { Pool, type PoolConfig } from "pg";
import type { AppConfig } from "../config";

interface PoolLogger {
  info(payload: Record<string, unknown>, message: string): void;
}

type SslMode = "ca_verify" | "insecure_ssl" | "disabled";

const TLS_SSLMODES = new Set(["require", "verify-ca", "verify-full", "no-verify"]);

function splitSslMode(databaseUrl: string): {
  connectionString: string;
  sslMode: string | null;
} {
  const url = new URL(databaseUrl);
  const sslMode = url.searchParams.get("sslmode")?.trim().toLowerCase() || null;
  url.searchParams.delete("sslmode");
  return { connectionString: url.toString(), sslMode };
}

function resolveSsl(
  config: AppConfig,
  sslMode: string | null,
): { ssl: PoolConfig["ssl"]; mode: SslMode } {
  const isProduction = process.env.NODE_ENV === "production";
  const certPath = config.databaseSslRootCertPath.trim();

  if (isProduction && sslMode === "no-verify") {
    throw new Error(
      "Fatal config error: DATABASE_URL must not use sslmode=no-verify in production.",
    );
  }

  if (isProduction && !certPath) {
    throw new Error(
      "Fatal config error: DATABASE_SSL_ROOT_CERT_PATH is required in production.",
    );
  }

  if (certPath) {
    if (!path.isAbsolute(certPath)) {
      throw new Error(
        `Fatal config error: DATABASE_SSL_ROOT_CERT_PATH must be an absolute path (received: ${certPath}).`,
      );
    }

    return {
      ssl: { ca: fs.readFileSync(certPath, "utf8"), rejectUnauthorized: true },
      mode: "ca_verify",
    };
  }

  // Without a CA the sslmode param decides, and TLS is never verified.
  if (sslMode && TLS_SSLMODES.has(sslMode)) {
    return { ssl: { rejectUnauthorized: false }, mode: "insecure_ssl" };
  }

  return { ssl: false, mode: "disabled" };
}

export function buildPoolConfig(config: AppConfig, logger?: PoolLogger): PoolConfig {
  if (!config.databaseUrl) {
    throw new Error("DATABASE_URL is required to create a Postgres connection pool.");
  }

  const { connectionString, sslMode } = splitSslMode(config.databaseUrl);
  const { ssl, mode } = resolveSsl(config, sslMode);

  logger?.info(
    { dbSslMode: mode, databaseUrlSslmodeParam: sslMode },
    "database pool SSL mode configured",
  );

  return { connectionString, ssl };
}

export function buildPool(config: AppConfig, logger?: PoolLogger): Pool {
  return new Pool(buildPoolConfig(config, logger));
}
