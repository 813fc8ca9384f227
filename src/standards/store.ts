import type { Logger } from "pino";
import type { Sql } from "../db/client.ts";
import type {
  StandardChunk,
  StandardChunkRecord,
  StandardChunkSearchResult,
  StandardChunkStore,
  StandardDocument,
  StandardSeverity,
  StandardType,
  AppliesScope,
} from "./types.ts";

/**
 * Convert a Float32Array to pgvector-compatible string format: [0.1,0.2,...]
 */
function float32ArrayToVectorString(arr: Float32Array): string {
  const parts: string[] = new Array(arr.length);
  for (let i = 0; i < arr.length; i++) {
    parts[i] = String(arr[i]);
  }
  return `[${parts.join(",")}]`;
}

type ChunkRow = {
  chunk_id: string;
  standard_id: string;
  sequence_index: number;
  standard_type: StandardType;
  applies_scope: AppliesScope;
  title: string;
  content: string;
  tags: string[];
  applies_to_globs: string[];
  affected_files: string[];
  related_paths: string[];
  severity: StandardSeverity;
  updated_at: string;
  source_file: string | null;
  language: string | null;
  repo: string | null;
  team: string | null;
  postmortem_id: string | null;
  embedding_model: string | null;
  indexed_at: Date | string;
};

type ScoredChunkRow = ChunkRow & { score: number | string };

// Every column except the embedding and the generated tsvector
const COLUMNS = [
  "chunk_id",
  "standard_id",
  "sequence_index",
  "standard_type",
  "applies_scope",
  "title",
  "content",
  "tags",
  "applies_to_globs",
  "affected_files",
  "related_paths",
  "severity",
  "updated_at",
  "source_file",
  "language",
  "repo",
  "team",
  "postmortem_id",
  "embedding_model",
  "indexed_at",
];

function rowToDocument(row: ChunkRow, body: string): StandardDocument {
  return {
    standardId: row.standard_id,
    standardType: row.standard_type,
    appliesScope: row.applies_scope,
    title: row.title,
    body,
    tags: row.tags ?? [],
    appliesToGlobs: row.applies_to_globs ?? [],
    affectedFiles: row.affected_files ?? [],
    severity: row.severity,
    updatedAt: row.updated_at,
    sourceFile: row.source_file,
    language: row.language,
    repo: row.repo,
    team: row.team,
    postmortemId: row.postmortem_id,
    relatedPaths: row.related_paths ?? [],
  };
}

function rowToRecord(row: ChunkRow): StandardChunkRecord {
  return {
    chunkId: row.chunk_id,
    sequenceIndex: row.sequence_index,
    content: row.content,
    // A hit carries only its own chunk as the body; the assembler uses it as the excerpt.
    document: rowToDocument(row, row.content),
    embeddingModel: row.embedding_model,
    indexedAt: row.indexed_at instanceof Date ? row.indexed_at.toISOString() : row.indexed_at,
  };
}

/** Cancel an in-flight postgres.js query when the signal aborts. */
async function withCancel<T>(
  query: PromiseLike<T> & { cancel(): unknown },
  signal?: AbortSignal,
): Promise<T> {
  if (!signal) return await query;

  const onAbort = () => {
    query.cancel();
  };
  if (signal.aborted) onAbort();
  else signal.addEventListener("abort", onAbort, { once: true });

  try {
    return await query;
  } finally {
    signal.removeEventListener("abort", onAbort);
  }
}

/**
 * Create a standards chunk store backed by PostgreSQL with pgvector.
 *
 * Upserts are keyed by the content-addressed chunk id, so re-indexing the same
 * documents is idempotent and concurrent runs need no locking. Metadata columns
 * are refreshed on conflict because frontmatter can change while the body (and
 * therefore the id) does not.
 */
export function createStandardChunkStore(opts: {
  sql: Sql;
  logger: Logger;
  embeddingModel: string;
}): StandardChunkStore {
  const { sql, logger, embeddingModel } = opts;

  async function upsertOne(chunk: StandardChunk, signal?: AbortSignal): Promise<void> {
    const doc = chunk.document;
    const embeddingValue = chunk.embedding ? float32ArrayToVectorString(chunk.embedding) : null;
    const model = chunk.embedding ? embeddingModel : null;

    await withCancel(
      sql`
        INSERT INTO standard_chunks (
          chunk_id, standard_id, sequence_index, standard_type, applies_scope,
          title, content, tags, tags_text, applies_to_globs, affected_files, related_paths,
          severity, updated_at, source_file, language, repo, team, postmortem_id,
          embedding, embedding_model, indexed_at
        ) VALUES (
          ${chunk.chunkId}, ${chunk.parentStandardId}, ${chunk.sequenceIndex},
          ${doc.standardType}, ${doc.appliesScope},
          ${doc.title}, ${chunk.text}, ${sql.array(doc.tags)}, ${doc.tags.join(" ")},
          ${sql.array(doc.appliesToGlobs)}, ${sql.array(doc.affectedFiles)},
          ${sql.array(doc.relatedPaths ?? [])},
          ${doc.severity}, ${doc.updatedAt}, ${doc.sourceFile ?? null}, ${doc.language ?? null},
          ${doc.repo ?? null}, ${doc.team ?? null}, ${doc.postmortemId ?? null},
          ${embeddingValue}::vector, ${model}, now()
        )
        ON CONFLICT (chunk_id) DO UPDATE SET
          standard_type = EXCLUDED.standard_type,
          applies_scope = EXCLUDED.applies_scope,
          title = EXCLUDED.title,
          tags = EXCLUDED.tags,
          tags_text = EXCLUDED.tags_text,
          applies_to_globs = EXCLUDED.applies_to_globs,
          affected_files = EXCLUDED.affected_files,
          related_paths = EXCLUDED.related_paths,
          severity = EXCLUDED.severity,
          updated_at = EXCLUDED.updated_at,
          source_file = EXCLUDED.source_file,
          language = EXCLUDED.language,
          repo = EXCLUDED.repo,
          team = EXCLUDED.team,
          postmortem_id = EXCLUDED.postmortem_id,
          embedding = COALESCE(EXCLUDED.embedding, standard_chunks.embedding),
          embedding_model = COALESCE(EXCLUDED.embedding_model, standard_chunks.embedding_model),
          indexed_at = now()
      `,
      signal,
    );
  }

  const store: StandardChunkStore = {
    async upsertChunks(chunks, upsertOpts = {}): Promise<void> {
      for (const chunk of chunks) {
        try {
          await upsertOne(chunk, upsertOpts.signal);
        } catch (err: unknown) {
          logger.error(
            {
              err: err instanceof Error ? err.message : String(err),
              chunkId: chunk.chunkId,
              standardId: chunk.parentStandardId,
            },
            "Failed to upsert standard chunk",
          );
          throw err;
        }
      }
    },

    async pruneStandardChunks(standardId, keepChunkIds, pruneOpts = {}): Promise<number> {
      const result = await withCancel(
        sql`
          DELETE FROM standard_chunks
          WHERE standard_id = ${standardId}
            AND NOT (chunk_id = ANY(${sql.array(keepChunkIds)}))
        `,
        pruneOpts.signal,
      );
      return result.count;
    },

    async pruneStandards(keepStandardIds, pruneOpts = {}): Promise<number> {
      const result = await withCancel(
        sql`
          DELETE FROM standard_chunks
          WHERE NOT (standard_id = ANY(${sql.array(keepStandardIds)}))
        `,
        pruneOpts.signal,
      );
      return result.count;
    },

    async searchByEmbedding(params): Promise<StandardChunkSearchResult[]> {
      const queryEmbeddingString = float32ArrayToVectorString(params.queryEmbedding);

      const rows = await withCancel(
        sql<ScoredChunkRow[]>`
          SELECT ${sql(COLUMNS)},
            embedding <=> ${queryEmbeddingString}::vector AS score
          FROM standard_chunks
          WHERE embedding IS NOT NULL
          ORDER BY embedding <=> ${queryEmbeddingString}::vector
          LIMIT ${params.topK}
        `,
        params.signal,
      );

      return rows.map((row) => ({
        record: rowToRecord(row),
        distance: Number(row.score),
      }));
    },

    async searchByFullText(params): Promise<StandardChunkSearchResult[]> {
      if (!params.query.trim()) return [];

      const rows = await withCancel(
        sql<ScoredChunkRow[]>`
          SELECT ${sql(COLUMNS)},
            ts_rank(search_tsv, websearch_to_tsquery('english', ${params.query})) AS score
          FROM standard_chunks
          WHERE search_tsv @@ websearch_to_tsquery('english', ${params.query})
          ORDER BY score DESC
          LIMIT ${params.topK}
        `,
        params.signal,
      );

      return rows.map((row) => ({
        record: rowToRecord(row),
        distance: 1 - Number(row.score),
      }));
    },

    async listAlwaysScopeDocuments(listOpts = {}): Promise<StandardDocument[]> {
      const rows = await withCancel(
        sql<ChunkRow[]>`
          SELECT ${sql(COLUMNS)}
          FROM standard_chunks
          WHERE applies_scope = 'always'
          ORDER BY standard_id, sequence_index
        `,
        listOpts.signal,
      );

      const grouped = new Map<string, ChunkRow[]>();
      for (const row of rows) {
        const group = grouped.get(row.standard_id);
        if (group) group.push(row);
        else grouped.set(row.standard_id, [row]);
      }

      const documents: StandardDocument[] = [];
      for (const group of grouped.values()) {
        const first = group[0];
        if (!first) continue;
        documents.push(rowToDocument(first, group.map((r) => r.content).join("\n\n")));
      }
      return documents;
    },

    async countChunks(): Promise<number> {
      const rows = await sql<{ cnt: number }[]>`
        SELECT COUNT(*)::int AS cnt FROM standard_chunks
      `;
      return rows[0]?.cnt ?? 0;
    },
  };

  logger.debug("StandardChunkStore initialized with pgvector HNSW index");
  return store;
}
