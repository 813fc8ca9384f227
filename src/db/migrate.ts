import { readdirSync, readFileSync } from "node:fs";
import { join } from "node:path";
import { fileURLToPath } from "node:url";
import type { Logger } from "pino";
import type { Sql } from "./client.ts";

const MIGRATIONS_DIR = fileURLToPath(new URL("./migrations", import.meta.url));

/**
 * Apply all pending migrations in order.
 *
 * Each migration is run inside a transaction. The `_migrations` table is
 * created by 001-standard-chunks.sql, so the first migration bootstraps itself
 * by catching the "table does not exist" error when checking applied state.
 */
export async function runMigrations(sql: Sql, logger: Logger): Promise<string[]> {
  const files = readdirSync(MIGRATIONS_DIR)
    .filter((f) => f.endsWith(".sql") && !f.endsWith(".down.sql"))
    .sort();

  const appliedNow: string[] = [];
  if (files.length === 0) {
    logger.warn({ dir: MIGRATIONS_DIR }, "No migration files found");
    return appliedNow;
  }

  let applied: Set<string>;
  try {
    const rows = await sql<{ name: string }[]>`SELECT name FROM _migrations`;
    applied = new Set(rows.map((r) => r.name));
  } catch (err) {
    // _migrations table doesn't exist yet -- first run
    logger.debug({ err }, "Migration table missing, bootstrapping");
    applied = new Set();
  }

  for (const file of files) {
    if (applied.has(file)) {
      logger.debug({ migration: file }, "Migration already applied");
      continue;
    }

    const sqlContent = readFileSync(join(MIGRATIONS_DIR, file), "utf-8");
    logger.info({ migration: file }, "Applying migration");

    await sql.begin(async (tx) => {
      await tx.unsafe(sqlContent);
      // unsafe() because TransactionSql's Omit<> strips call signatures
      await tx.unsafe("INSERT INTO _migrations (name) VALUES ($1)", [file]);
    });
    appliedNow.push(file);
  }

  logger.info({ applied: appliedNow.length }, "Migrations complete");
  return appliedNow;
}

/**
 * Roll back applied migrations to a target version number.
 *
 * Migrations with a numeric prefix greater than `targetVersion` are reverted
 * in descending order using their paired `.down.sql` files.
 * Pass `targetVersion = 0` to roll back everything.
 */
export async function runRollback(
  sql: Sql,
  targetVersion: number,
  logger: Logger,
): Promise<void> {
  const rows = await sql<{ id: number; name: string }[]>`
    SELECT id, name FROM _migrations ORDER BY id DESC
  `;

  for (const row of rows) {
    const versionStr = row.name.match(/^(\d+)/)?.[1];
    if (!versionStr) {
      logger.warn({ migration: row.name }, "Skipping migration without version prefix");
      continue;
    }

    if (parseInt(versionStr, 10) <= targetVersion) {
      break;
    }

    const downFile = row.name.replace(/\.sql$/, ".down.sql");
    let downSql: string;
    try {
      downSql = readFileSync(join(MIGRATIONS_DIR, downFile), "utf-8");
    } catch (err) {
      throw new Error(`Missing rollback file: ${downFile} (required to roll back ${row.name})`, {
        cause: err,
      });
    }

    logger.info({ migration: row.name }, "Rolling back migration");

    await sql.begin(async (tx) => {
      // Delete the record first: the 001 down script drops _migrations itself.
      await tx.unsafe("DELETE FROM _migrations WHERE name = $1", [row.name]);
      await tx.unsafe(downSql);
    });
  }

  logger.info({ targetVersion }, "Rollback complete");
}

// ── CLI entry point ──────────────────────────────────────────────────────────
// Usage:
//   tsx src/db/migrate.ts                 # apply all pending migrations
//   tsx src/db/migrate.ts up              # same as above
//   tsx src/db/migrate.ts down <version>  # rollback to version N (0 = all)
//
async function main(): Promise<number> {
  const { createDbClient } = await import("./client.ts");
  const { createLogger } = await import("../lib/logger.ts");
  const logger = createLogger();

  const subcommand = process.argv[2] ?? "up";
  if (subcommand !== "up" && subcommand !== "down") {
    console.error(`Unknown subcommand: ${subcommand}`);
    console.error("Usage: tsx src/db/migrate.ts [up | down <version>]");
    return 1;
  }

  const target = parseInt(process.argv[3] ?? "", 10);
  if (subcommand === "down" && (Number.isNaN(target) || target < 0)) {
    console.error("Usage: tsx src/db/migrate.ts down <version>");
    console.error("  version: target migration version (0 = roll back everything)");
    return 1;
  }

  const client = createDbClient({ logger });
  try {
    if (subcommand === "up") {
      await runMigrations(client.sql, logger);
    } else {
      await runRollback(client.sql, target, logger);
    }
    return 0;
  } finally {
    await client.close();
  }
}

if (process.argv[1] === fileURLToPath(import.meta.url)) {
  main().then(
    (code) => process.exit(code),
    (err: unknown) => {
      console.error(`FATAL: ${err instanceof Error ? err.message : String(err)}`);
      process.exit(1);
    },
  );
}
