import { readFileSync } from "node:fs";
import { dirname, join } from "node:path";
import { fileURLToPath } from "node:url";

import { dbLogger } from "../logger.js";
import { closeConnection, pool } from "./connection.js";

const currentFilePath = fileURLToPath(import.meta.url);
const currentDirPath = dirname(currentFilePath);

export const MIRROR_TABLES = ["users", "groups", "group_members"] as const;

// ============================================================================
// Migration Functions
// ============================================================================

/**
 * Apply postgres-schema.sql. With `fresh`, the mirror tables are dropped
 * first; the next reconciliation pass repopulates them.
 */
export async function runMigration(options?: {
  fresh?: boolean;
}): Promise<void> {
  const client = await pool.connect();

  try {
    const schemaPath = join(currentDirPath, "postgres-schema.sql");
    const schema = readFileSync(schemaPath, "utf8");

    await client.query("BEGIN");

    if (options?.fresh === true) {
      dbLogger.info("Dropping mirror tables (--fresh mode)...");
      await client.query(
        `DROP TABLE IF EXISTS ${MIRROR_TABLES.join(", ")} CASCADE`
      );
    }

    dbLogger.info("Running PostgreSQL schema migration...");
    await client.query(schema);
    await client.query("COMMIT");

    dbLogger.info("Schema migration completed successfully");
  } catch (error) {
    await client.query("ROLLBACK");
    dbLogger.error({ error }, "Schema migration failed");
    throw error;
  } finally {
    client.release();
  }
}

/**
 * Check whether every mirror table exists
 */
export async function hasSchema(): Promise<boolean> {
  const result = await pool.query<{ count: number }>(
    `
      SELECT COUNT(*)::int as count
      FROM information_schema.tables
      WHERE table_schema = 'public'
      AND table_name = ANY($1::text[])
    `,
    [[...MIRROR_TABLES]]
  );
  const row = result.rows[0];
  return row !== undefined && row.count === MIRROR_TABLES.length;
}

export interface TableStat {
  table_name: string;
  row_count: number;
}

/**
 * Exact row counts for the mirror tables
 */
export async function getTableStats(): Promise<TableStat[]> {
  const stats: TableStat[] = [];
  for (const table of MIRROR_TABLES) {
    const result = await pool.query<{ count: number }>(
      `SELECT COUNT(*)::int as count FROM ${table}`
    );
    stats.push({ table_name: table, row_count: result.rows[0]?.count ?? 0 });
  }
  return stats;
}

// ============================================================================
// CLI Entry Point (only runs when executed directly, not when imported)
// ============================================================================

async function main(): Promise<void> {
  const fresh = process.argv.slice(2).includes("--fresh");

  try {
    await runMigration({ fresh });
    console.log("Migration completed successfully!");

    const stats = await getTableStats();
    console.log("\nTable statistics:");
    for (const row of stats) {
      console.log(`  ${row.table_name}: ${String(row.row_count)} rows`);
    }
  } catch (error) {
    console.error("Migration failed:", error);
    process.exitCode = 1;
  } finally {
    await closeConnection();
  }
}

const isMainModule = process.argv[1]?.endsWith("migrate.ts") === true ||
  process.argv[1]?.endsWith("migrate.js") === true;
if (isMainModule) {
  void main();
}
