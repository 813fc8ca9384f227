import type { Logger } from "pino";
import { classifyRetrievalError, RetrievalUnavailableError } from "../lib/errors.ts";
import { TimeBudgetExceededError, withTimeout } from "../lib/time-budget.ts";
import { mergeHybridResults } from "./hybrid-search.ts";
import type { SemanticReranker } from "./rerank.ts";
import type {
  EmbeddingProvider,
  RetrievalQuery,
  StandardChunkSearchResult,
  StandardChunkStore,
  StandardSearchHit,
} from "./types.ts";

/**
 * The search collaborator: returns up to `semanticTopK` hits ordered by
 * descending relevance. Implementations should stop work when the signal fires.
 */
export type StandardsSearchBackend = {
  search(query: RetrievalQuery, opts: { signal: AbortSignal }): Promise<StandardSearchHit[]>;
};

export type StandardsRetriever = {
  /** Throws RetrievalUnavailableError on timeout, abort or store failure. */
  retrieve(
    query: RetrievalQuery,
    opts: { timeoutMs: number; signal?: AbortSignal },
  ): Promise<StandardSearchHit[]>;
};

function toHit(result: StandardChunkSearchResult, relevance: number): StandardSearchHit {
  return {
    document: result.record.document,
    chunkId: result.record.chunkId,
    chunkText: result.record.content,
    relevance,
  };
}

/**
 * Hybrid lexical + vector search over the chunk store, fused with RRF and
 * optionally re-ranked semantically.
 *
 * Embedding failure degrades to lexical-only; re-rank failure keeps the RRF
 * order. Store failures propagate. The signal reaches every store and Voyage
 * call, so a timed-out search stops its outstanding requests.
 */
export function createHybridSearchBackend(deps: {
  store: StandardChunkStore;
  embeddingProvider: EmbeddingProvider;
  reranker?: SemanticReranker;
  logger: Logger;
}): StandardsSearchBackend {
  const { store, embeddingProvider, reranker, logger } = deps;

  return {
    async search(query, { signal }) {
      if (!query.queryText.trim()) return [];
      const poolSize = Math.max(query.semanticTopK, query.topK);

      const embedResult = await embeddingProvider.generate(query.queryText, "query", { signal });
      signal.throwIfAborted();
      if (!embedResult) {
        logger.debug("Standards vector search skipped: embedding generation returned null");
      }

      const [vectorResults, lexicalResults] = await Promise.all([
        embedResult
          ? store.searchByEmbedding({ queryEmbedding: embedResult.embedding, topK: poolSize, signal })
          : Promise.resolve<StandardChunkSearchResult[]>([]),
        store.searchByFullText({ query: query.queryText, topK: poolSize, signal }),
      ]);

      const fused = mergeHybridResults({
        vectorResults,
        lexicalResults,
        getKey: (r) => r.record.chunkId,
        topK: poolSize,
      });

      let hits = fused.map((h) => toHit(h.item, h.score));

      if (reranker && hits.length > 1) {
        const scores = await reranker.rerank({
          query: query.queryText,
          documents: hits.map((h) => `${h.document.title}\n${h.chunkText}`),
          topK: hits.length,
          signal,
        });
        if (scores) {
          const reranked: StandardSearchHit[] = [];
          for (const score of scores) {
            const hit = hits[score.index];
            if (hit) reranked.push({ ...hit, relevance: score.relevance });
          }
          reranked.sort((a, b) => b.relevance - a.relevance);
          hits = reranked;
        }
      }

      logger.debug(
        {
          vectorCount: vectorResults.length,
          lexicalCount: lexicalResults.length,
          pool: hits.length,
          reranked: Boolean(reranker),
        },
        "Standards hybrid search complete",
      );
      return hits;
    },
  };
}

/**
 * Wrap a search backend with the retrieval contract: bounded by a timeout,
 * cancellable by the caller, results ordered by descending relevance and
 * capped at `semanticTopK`. Every failure surfaces as RetrievalUnavailableError.
 */
export function createStandardsRetriever(deps: {
  backend: StandardsSearchBackend;
  logger: Logger;
}): StandardsRetriever {
  const { backend, logger } = deps;

  return {
    async retrieve(query, { timeoutMs, signal }) {
      const startTime = Date.now();
      let hits: StandardSearchHit[];

      try {
        hits = await withTimeout((budgetSignal) => backend.search(query, { signal: budgetSignal }), {
          timeoutMs,
          signal,
          label: "standards retrieval",
        });
      } catch (err: unknown) {
        const reason = classifyRetrievalError(err, err instanceof TimeBudgetExceededError);
        logger.warn(
          { reason, timeoutMs, durationMs: Date.now() - startTime, err },
          "Standards retrieval unavailable",
        );
        throw new RetrievalUnavailableError(
          reason,
          `Standards retrieval unavailable (${reason}): ${err instanceof Error ? err.message : String(err)}`,
          { cause: err },
        );
      }

      const limit = Math.max(query.semanticTopK, query.topK);
      return [...hits].sort((a, b) => b.relevance - a.relevance).slice(0, limit);
    },
  };
}
