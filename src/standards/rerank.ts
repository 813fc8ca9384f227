import { VoyageAIClient, VoyageAIError } from "voyageai";
import type { Logger } from "pino";

/** Relevance for the document at `index` of the input list; higher is better. */
export type RerankScore = {
  index: number;
  relevance: number;
};

export type SemanticReranker = {
  /** Returns null when re-ranking is unavailable; callers keep their order. */
  rerank(params: {
    query: string;
    documents: string[];
    topK: number;
    signal?: AbortSignal;
  }): Promise<RerankScore[] | null>;
  readonly model: string;
};

/**
 * Create a Voyage AI semantic re-ranker. Fail-open like the embedding provider:
 * any API error returns null.
 */
export function createVoyageReranker(opts: {
  apiKey: string;
  model: string;
  timeoutSeconds?: number;
  logger: Logger;
}): SemanticReranker {
  const { apiKey, model, timeoutSeconds = 10, logger } = opts;
  const client = new VoyageAIClient({ apiKey });

  return {
    async rerank({ query, documents, topK, signal }) {
      if (documents.length === 0) return [];
      if (signal?.aborted) return null;
      try {
        const response = await client.rerank(
          { query, documents, model, topK, truncation: true },
          { timeoutInSeconds: timeoutSeconds, maxRetries: 1, abortSignal: signal },
        );

        const scores: RerankScore[] = [];
        for (const item of response.data ?? []) {
          if (item.index === undefined || item.relevanceScore === undefined) continue;
          scores.push({ index: item.index, relevance: item.relevanceScore });
        }
        return scores;
      } catch (err: unknown) {
        if (signal?.aborted) {
          logger.debug({ model }, "Rerank request aborted");
        } else if (err instanceof VoyageAIError) {
          logger.warn(
            { statusCode: err.statusCode, message: err.message },
            "Voyage AI rerank failed (fail-open)",
          );
        } else {
          logger.warn({ err }, "Rerank failed (fail-open)");
        }
        return null;
      }
    },
    get model() {
      return model;
    },
  };
}
