import { Kysely, PostgresDialect } from "kysely";
import pg from "pg";

import { loadConfig } from "../config.js";
import { dbLogger } from "../logger.js";

import type { Database } from "./types.js";

const { Pool, types } = pg;

// Keep DATE columns as calendar days; the default parser shifts them into
// the process time zone.
types.setTypeParser(types.builtins.DATE, (val: string) => val);

// ============================================================================
// Configuration
// ============================================================================

const { databaseUrl } = loadConfig();

const poolConfig: pg.PoolConfig = {
  connectionString: databaseUrl,
  max: 10,
  idleTimeoutMillis: 30_000,
  connectionTimeoutMillis: 5000,
};

// ============================================================================
// Pool and Kysely Instance
// ============================================================================

export const pool = new Pool(poolConfig);

pool.on("error", (error) => {
  dbLogger.error({ error }, "Idle database client error");
});

export const db = new Kysely<Database>({
  dialect: new PostgresDialect({ pool }),
});

// ============================================================================
// Connection Management
// ============================================================================

/**
 * Check if the database connection is healthy
 */
export async function checkConnection(): Promise<boolean> {
  try {
    await pool.query("SELECT 1");
    return true;
  } catch (error) {
    dbLogger.warn({ error }, "Database health check failed");
    return false;
  }
}

/**
 * Close the database connection pool
 */
export async function closeConnection(): Promise<void> {
  try {
    // db.destroy() also ends the pool
    await db.destroy();
    dbLogger.info("Database connection closed");
  } catch (error) {
    dbLogger.error({ error }, "Error closing database connection");
    throw error;
  }
}

/**
 * Get the current database URL (for display, with password masked)
 */
export function getDatabaseUrl(): string {
  const url = new URL(databaseUrl);
  if (url.password !== "") {
    url.password = "****";
  }
  return url.toString();
}

export function getPoolStats(): {
  totalCount: number;
  idleCount: number;
  waitingCount: number;
} {
  return {
    totalCount: pool.totalCount,
    idleCount: pool.idleCount,
    waitingCount: pool.waitingCount,
  };
}
