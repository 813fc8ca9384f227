/**
 * Type definitions for standards documents, chunk storage, and retrieval.
 */

export const STANDARD_TYPES = [
  "corporate",
  "team",
  "repository",
  "file_history",
  "postmortem",
] as const;

export type StandardType = (typeof STANDARD_TYPES)[number];

export const ALWAYS_SCOPE_TYPES: readonly StandardType[] = ["corporate", "team", "repository"];
export const CONDITIONAL_SCOPE_TYPES: readonly StandardType[] = ["file_history", "postmortem"];

export type AppliesScope = "always" | "conditional";

export const SEVERITIES = ["critical", "high", "medium", "low", "info"] as const;
export type StandardSeverity = (typeof SEVERITIES)[number];

/** Scope every standard type is bound to. */
export function scopeForType(type: StandardType): AppliesScope {
  return ALWAYS_SCOPE_TYPES.includes(type) ? "always" : "conditional";
}

/** One governance rule set, parsed from a markdown file with frontmatter. */
export type StandardDocument = {
  standardId: string;
  standardType: StandardType;
  appliesScope: AppliesScope;
  title: string;
  body: string;
  tags: string[];
  appliesToGlobs: string[];
  affectedFiles: string[];
  severity: StandardSeverity;
  updatedAt: string;
  sourceFile?: string | null;
  language?: string | null;
  repo?: string | null;
  team?: string | null;
  postmortemId?: string | null;
  relatedPaths?: string[];
};

/** The unit stored and embedded: an ordered slice of a standard's body. */
export type StandardChunk = {
  chunkId: string;
  parentStandardId: string;
  sequenceIndex: number;
  text: string;
  document: StandardDocument;
  embedding?: Float32Array | null;
};

/** A stored chunk joined with its parent document metadata. */
export type StandardChunkRecord = {
  chunkId: string;
  sequenceIndex: number;
  content: string;
  document: StandardDocument;
  embeddingModel: string | null;
  indexedAt: string;
};

/** Store-level search hit; lower distance is better. */
export type StandardChunkSearchResult = {
  record: StandardChunkRecord;
  distance: number;
};

/** Store interface for standards chunk upsert, pruning and search. */
export type StandardChunkStore = {
  /** Upsert chunks keyed by chunk id. Commutative, safe to run concurrently. */
  upsertChunks(chunks: StandardChunk[], opts?: { signal?: AbortSignal }): Promise<void>;

  /** Delete chunks of a standard whose id is not in keepChunkIds. Returns deleted count. */
  pruneStandardChunks(
    standardId: string,
    keepChunkIds: string[],
    opts?: { signal?: AbortSignal },
  ): Promise<number>;

  /** Delete every chunk of standards not in keepStandardIds. Returns deleted count. */
  pruneStandards(keepStandardIds: string[], opts?: { signal?: AbortSignal }): Promise<number>;

  /** Vector similarity search over chunks that have an embedding. */
  searchByEmbedding(params: {
    queryEmbedding: Float32Array;
    topK: number;
    signal?: AbortSignal;
  }): Promise<StandardChunkSearchResult[]>;

  /** Lexical full-text search over title, content and tags. */
  searchByFullText(params: {
    query: string;
    topK: number;
    signal?: AbortSignal;
  }): Promise<StandardChunkSearchResult[]>;

  /** Rebuild every always-scope document from its stored chunks. */
  listAlwaysScopeDocuments(opts?: { signal?: AbortSignal }): Promise<StandardDocument[]>;

  /** Count stored chunks. */
  countChunks(): Promise<number>;
};

/** One retrieved chunk resolved to its parent document. */
export type StandardSearchHit = {
  document: StandardDocument;
  chunkId: string;
  chunkText: string;
  /** Higher is more relevant. */
  relevance: number;
};

export type RetrievalQuery = {
  queryText: string;
  topK: number;
  semanticTopK: number;
};

/** A changed file of the pull request under review. */
export type ChangedFile = {
  path: string;
  additions?: number;
  /** Text of added lines, in diff order, without the leading "+". */
  addedLines?: string[];
};

export type EmbeddingResult = {
  embedding: Float32Array;
  model: string;
  dimensions: number;
} | null;

export type EmbeddingInputType = "document" | "query";

/**
 * Fail-open embedding source: every method returns null instead of throwing,
 * including when `signal` aborts the request.
 */
export type EmbeddingProvider = {
  generate(
    text: string,
    inputType: EmbeddingInputType,
    opts?: { signal?: AbortSignal },
  ): Promise<EmbeddingResult>;
  /** One request for many texts; the result is index-aligned with `texts`. */
  generateBatch(
    texts: string[],
    inputType: EmbeddingInputType,
    opts?: { signal?: AbortSignal },
  ): Promise<EmbeddingResult[]>;
  readonly model: string;
  readonly dimensions: number;
};
