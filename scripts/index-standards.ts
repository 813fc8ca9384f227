/**
 * CLI entry point for indexing the standards markdown directory.
 *
 * Usage:
 *   tsx scripts/index-standards.ts                     # Index ./standards (or STANDARDS_DOCS_PATH)
 *   tsx scripts/index-standards.ts --dir docs/rules    # Custom directory
 *   tsx scripts/index-standards.ts --dry-run           # Parse and chunk, don't store
 *   tsx scripts/index-standards.ts --timeout 60000     # Per store call budget in ms
 *
 * Environment variables:
 *   DATABASE_URL          - PostgreSQL connection string (not needed for --dry-run)
 *   VOYAGE_API_KEY        - VoyageAI API key (optional, lexical-only without it)
 */

import { parseArgs } from "node:util";
import pino from "pino";
import { loadConfig } from "../src/config.ts";
import { createDbClient, type DbClient } from "../src/db/client.ts";
import { runMigrations } from "../src/db/migrate.ts";
import { formatIndexError } from "../src/lib/errors.ts";
import {
  createEmbeddingProvider,
  createNoOpEmbeddingProvider,
} from "../src/standards/embeddings.ts";
import { indexStandards } from "../src/standards/indexer.ts";
import { createStandardChunkStore } from "../src/standards/store.ts";
import type { StandardChunkStore } from "../src/standards/types.ts";

const logger = pino({ level: process.env.LOG_LEVEL ?? "info" });

// ── Parse arguments ─────────────────────────────────────────────────────────

const { values } = parseArgs({
  args: process.argv.slice(2),
  options: {
    dir: { type: "string" },
    "dry-run": { type: "boolean", default: false },
    timeout: { type: "string", default: "30000" },
    help: { type: "boolean", default: false },
  },
});

if (values.help) {
  console.log(`
Usage: tsx scripts/index-standards.ts [options]

Options:
  --dir <path>       Standards directory (default: STANDARDS_DOCS_PATH or ./standards)
  --dry-run          Parse and chunk but don't store
  --timeout <ms>     Time budget for each store call (default: 30000)
  --help             Show this help

Environment:
  DATABASE_URL       PostgreSQL connection string (required unless --dry-run)
  VOYAGE_API_KEY     VoyageAI API key (optional)
`);
  process.exit(0);
}

const dryRun = values["dry-run"] ?? false;
const timeoutMs = parseInt(values.timeout ?? "30000", 10);

if (Number.isNaN(timeoutMs) || timeoutMs <= 0) {
  console.error(`ERROR: --timeout must be a positive number of milliseconds, got '${values.timeout}'.`);
  process.exit(1);
}

// Dry runs never touch the store.
const dryRunStore: StandardChunkStore = {
  async upsertChunks() {},
  async pruneStandardChunks() {
    return 0;
  },
  async pruneStandards() {
    return 0;
  },
  async searchByEmbedding() {
    return [];
  },
  async searchByFullText() {
    return [];
  },
  async listAlwaysScopeDocuments() {
    return [];
  },
  async countChunks() {
    return 0;
  },
};

// ── Main ────────────────────────────────────────────────────────────────────

async function main(): Promise<number> {
  const config = loadConfig();
  const rootDir = values.dir ?? config.standardsDocsPath;

  console.log(`Directory:  ${rootDir}`);
  console.log(`Timeout:    ${timeoutMs}ms`);
  if (dryRun) console.log("DRY RUN: No data will be written.");

  let client: DbClient | undefined;
  let store = dryRunStore;

  if (!dryRun) {
    if (!config.databaseUrl) {
      console.error("ERROR: DATABASE_URL environment variable is required.");
      return 1;
    }
    client = createDbClient({ connectionString: config.databaseUrl, logger });
    await runMigrations(client.sql, logger);
    store = createStandardChunkStore({
      sql: client.sql,
      logger,
      embeddingModel: config.embeddingModel,
    });
  }

  const embeddingProvider = dryRun
    ? createNoOpEmbeddingProvider(logger)
    : createEmbeddingProvider({
        apiKey: config.voyageApiKey,
        model: config.embeddingModel,
        dimensions: config.embeddingDimensions,
        logger,
      });

  try {
    const result = await indexStandards({
      rootDir,
      store,
      embeddingProvider,
      logger,
      dryRun,
      timeoutMs,
    });

    console.log("\nIndexing complete:");
    console.log(`  Documents:   ${result.totalDocuments}`);
    console.log(`  Chunks:      ${result.totalChunks}`);
    console.log(`  Embeddings:  ${result.totalEmbeddings}`);
    console.log(`  Pruned:      ${result.prunedChunks}`);
    console.log(`  Duration:    ${(result.durationMs / 1000).toFixed(1)}s`);
    return 0;
  } catch (err: unknown) {
    console.error(formatIndexError(err));
    return 1;
  } finally {
    await client?.close();
  }
}

main().then(
  (code) => process.exit(code),
  (err: unknown) => {
    console.error(`FATAL: ${err instanceof Error ? err.message : String(err)}`);
    process.exit(1);
  },
);
