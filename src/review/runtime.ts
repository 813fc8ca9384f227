import type { Logger } from "pino";
import type { AppConfig } from "../config.ts";
import type { Sql } from "../db/client.ts";
import { loadCatalogFromDirectory, type StandardsCatalog } from "../standards/catalog.ts";
import { createEmbeddingProvider } from "../standards/embeddings.ts";
import { createVoyageReranker } from "../standards/rerank.ts";
import {
  createHybridSearchBackend,
  createStandardsRetriever,
  type StandardsRetriever,
} from "../standards/retrieval.ts";
import { createStandardChunkStore } from "../standards/store.ts";
import type { StandardChunkStore } from "../standards/types.ts";

export type StandardsRuntime = {
  store: StandardChunkStore;
  retriever: StandardsRetriever;
  catalog: StandardsCatalog;
};

/**
 * Wire the standards pipeline from config.
 *
 * The catalog is read from the standards directory rather than the store, so
 * always-scope rules stay available while the store is down. Re-ranking is
 * enabled only when RERANK_MODEL and a Voyage key are both set.
 */
export async function createStandardsRuntime(deps: {
  config: AppConfig;
  sql: Sql;
  logger: Logger;
}): Promise<StandardsRuntime> {
  const { config, sql, logger } = deps;

  const store = createStandardChunkStore({ sql, logger, embeddingModel: config.embeddingModel });
  const embeddingProvider = createEmbeddingProvider({
    apiKey: config.voyageApiKey,
    model: config.embeddingModel,
    dimensions: config.embeddingDimensions,
    logger,
  });
  const reranker =
    config.rerankModel && config.voyageApiKey
      ? createVoyageReranker({ apiKey: config.voyageApiKey, model: config.rerankModel, logger })
      : undefined;

  const backend = createHybridSearchBackend({ store, embeddingProvider, reranker, logger });
  const retriever = createStandardsRetriever({ backend, logger });
  const catalog = await loadCatalogFromDirectory(config.standardsDocsPath);

  logger.info(
    {
      catalogSize: catalog.size,
      embeddingModel: embeddingProvider.model,
      rerankModel: reranker?.model ?? null,
      searchEnabled: config.standards.searchEnabled,
    },
    "Standards runtime ready",
  );

  return { store, retriever, catalog };
}
