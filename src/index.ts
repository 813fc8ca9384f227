// Configuration and ambient helpers
export { loadConfig, type AppConfig, type StandardsConfig } from "./config.ts";
export { createLogger, createChildLogger, type Logger } from "./lib/logger.ts";
export {
  StandardsIndexError,
  RetrievalUnavailableError,
  ConfigError,
  classifyRetrievalError,
  formatIndexError,
  type RetrievalFailureReason,
} from "./lib/errors.ts";
export { withTimeout, TimeBudgetExceededError, OperationAbortedError } from "./lib/time-budget.ts";

// Database
export { createDbClient, type DbClient, type Sql } from "./db/client.ts";
export { runMigrations, runRollback } from "./db/migrate.ts";

// Indexing
export { parseStandardMarkdown, splitFrontmatter, normalizeRepoPath } from "./standards/frontmatter.ts";
export { chunkStandardDocument, computeChunkId, splitStandardBody } from "./standards/chunker.ts";
export { loadStandardDocuments } from "./standards/loader.ts";
export { indexStandards, type IndexStandardsOptions, type IndexStandardsResult } from "./standards/indexer.ts";
export { createStandardChunkStore } from "./standards/store.ts";
export { createEmbeddingProvider, createNoOpEmbeddingProvider } from "./standards/embeddings.ts";

// Retrieval
export { buildRetrievalQuery } from "./standards/retrieval-query.ts";
export { mergeHybridResults, type HybridHit } from "./standards/hybrid-search.ts";
export {
  createHybridSearchBackend,
  createStandardsRetriever,
  type StandardsSearchBackend,
  type StandardsRetriever,
} from "./standards/retrieval.ts";
export { createVoyageReranker, type SemanticReranker, type RerankScore } from "./standards/rerank.ts";

// Applicability and context
export {
  createStandardsCatalog,
  loadCatalogFromDirectory,
  loadCatalogFromStore,
  type StandardsCatalog,
} from "./standards/catalog.ts";
export {
  filterApplicableStandards,
  matchChangedFiles,
  type ApplicableStandard,
  type MatchReason,
} from "./standards/applicability.ts";
export {
  assembleStandardsContext,
  truncateAtBoundary,
  type AssembledContext,
  type AssembledEntry,
} from "./standards/context-assembler.ts";
export {
  buildStandardsContext,
  type RetrievalStatus,
  type StandardsContextResult,
} from "./review/standards-context.ts";
export { createStandardsRuntime, type StandardsRuntime } from "./review/runtime.ts";

// Diff line validation
export { parseUnifiedPatch, fileDiffFromPatch, addedLineTexts } from "./diff/patch-parser.ts";
export {
  collectAddedLines,
  findNearestAddedLine,
  getChangedLineRanges,
  buildAddedLineIndex,
  validateCommentTarget,
  validateCommentTargets,
  type AddedLineIndex,
  type BatchValidation,
} from "./diff/line-validator.ts";

// Types (re-export all)
export type {
  StandardType,
  AppliesScope,
  StandardSeverity,
  StandardDocument,
  StandardChunk,
  StandardChunkRecord,
  StandardChunkSearchResult,
  StandardChunkStore,
  StandardSearchHit,
  RetrievalQuery,
  ChangedFile,
  EmbeddingProvider,
  EmbeddingInputType,
  EmbeddingResult,
} from "./standards/types.ts";
export type {
  DiffLineRecord,
  DiffHunk,
  FileDiff,
  CommentTarget,
  CommentValidation,
  DropReason,
} from "./diff/types.ts";
