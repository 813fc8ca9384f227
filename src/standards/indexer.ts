import type { Logger } from "pino";
import { StandardsIndexError } from "../lib/errors.ts";
import { withTimeout } from "../lib/time-budget.ts";
import { chunkStandardDocument, DEFAULT_CHUNK_MAX_CHARS } from "./chunker.ts";
import { loadStandardDocuments } from "./loader.ts";
import type {
  EmbeddingProvider,
  StandardChunk,
  StandardChunkStore,
  StandardDocument,
} from "./types.ts";

// ── Types ───────────────────────────────────────────────────────────────────

export type IndexStandardsResult = {
  totalDocuments: number;
  totalChunks: number;
  totalEmbeddings: number;
  prunedChunks: number;
  durationMs: number;
  dryRun: boolean;
};

export type IndexStandardsOptions = {
  rootDir: string;
  store: StandardChunkStore;
  embeddingProvider: EmbeddingProvider;
  logger: Logger;
  dryRun?: boolean;
  maxChunkChars?: number;
  /** Budget for each store call. */
  timeoutMs?: number;
  /** Remove standards that no longer exist on disk. Default: true */
  pruneMissing?: boolean;
};

const DEFAULT_STORE_TIMEOUT_MS = 30_000;

// ── Helpers ──────────────────────────────────────────────────────────────────

// One embed request per standard; a failed request leaves those chunks lexical-only.
async function embedChunks(
  chunks: StandardChunk[],
  embeddingProvider: EmbeddingProvider,
): Promise<number> {
  const texts = chunks.map(
    (chunk) => `${chunk.document.title} (${chunk.document.standardType}): ${chunk.text}`,
  );
  const results = await embeddingProvider.generateBatch(texts, "document");

  let embedded = 0;
  chunks.forEach((chunk, i) => {
    chunk.embedding = results[i]?.embedding ?? null;
    if (chunk.embedding) embedded++;
  });
  return embedded;
}

// ── Indexing run ─────────────────────────────────────────────────────────────

/**
 * Parse, chunk, embed and upsert every standards document under rootDir.
 *
 * All documents are parsed before anything is written, so one malformed
 * document aborts the run with no partial index. Each standard's chunks are
 * upserted by chunk id and the standard's chunks that were not produced this
 * run are pruned, which replaces an edited document wholesale while leaving
 * unchanged chunks untouched.
 */
export async function indexStandards(opts: IndexStandardsOptions): Promise<IndexStandardsResult> {
  const {
    rootDir,
    store,
    embeddingProvider,
    logger,
    dryRun = false,
    maxChunkChars = DEFAULT_CHUNK_MAX_CHARS,
    timeoutMs = DEFAULT_STORE_TIMEOUT_MS,
    pruneMissing = true,
  } = opts;

  const startTime = Date.now();

  const documents: StandardDocument[] = await loadStandardDocuments(rootDir);
  if (documents.length === 0) {
    throw new StandardsIndexError("no standards documents found", { sourceFile: rootDir });
  }
  logger.info({ rootDir, documents: documents.length }, "Loaded standards documents");

  const chunksByStandard = documents.map((document) => ({
    document,
    chunks: chunkStandardDocument(document, { maxChars: maxChunkChars }),
  }));
  const totalChunks = chunksByStandard.reduce((sum, entry) => sum + entry.chunks.length, 0);

  if (dryRun) {
    for (const { document, chunks } of chunksByStandard) {
      logger.info(
        { standardId: document.standardId, standardType: document.standardType, chunks: chunks.length },
        "Dry run: chunked standard",
      );
    }
    return {
      totalDocuments: documents.length,
      totalChunks,
      totalEmbeddings: 0,
      prunedChunks: 0,
      durationMs: Date.now() - startTime,
      dryRun: true,
    };
  }

  let totalEmbeddings = 0;
  let prunedChunks = 0;

  for (const { document, chunks } of chunksByStandard) {
    const embedded = await embedChunks(chunks, embeddingProvider);
    totalEmbeddings += embedded;
    if (embedded < chunks.length) {
      logger.warn(
        { standardId: document.standardId, missing: chunks.length - embedded },
        "Some chunks stored without embeddings (lexical search only)",
      );
    }

    await withTimeout((signal) => store.upsertChunks(chunks, { signal }), {
      timeoutMs,
      label: `upsert ${document.standardId}`,
    });

    const pruned = await withTimeout(
      (signal) =>
        store.pruneStandardChunks(
          document.standardId,
          chunks.map((c) => c.chunkId),
          { signal },
        ),
      { timeoutMs, label: `prune ${document.standardId}` },
    );
    prunedChunks += pruned;

    logger.debug(
      { standardId: document.standardId, chunks: chunks.length, pruned },
      "Indexed standard",
    );
  }

  if (pruneMissing) {
    const removed = await withTimeout(
      (signal) => store.pruneStandards(documents.map((d) => d.standardId), { signal }),
      { timeoutMs, label: "prune removed standards" },
    );
    prunedChunks += removed;
    if (removed > 0) {
      logger.info({ removed }, "Pruned chunks of standards no longer on disk");
    }
  }

  const result: IndexStandardsResult = {
    totalDocuments: documents.length,
    totalChunks,
    totalEmbeddings,
    prunedChunks,
    durationMs: Date.now() - startTime,
    dryRun: false,
  };
  logger.info(result, "Standards indexing complete");
  return result;
}
