import type { Logger } from "pino";
import type { StandardsConfig } from "../config.ts";
import { RetrievalUnavailableError } from "../lib/errors.ts";
import type { StandardsCatalog } from "../standards/catalog.ts";
import {
  assembleStandardsContext,
  type AssembledContext,
} from "../standards/context-assembler.ts";
import { filterApplicableStandards, type ApplicableStandard } from "../standards/applicability.ts";
import { buildRetrievalQuery } from "../standards/retrieval-query.ts";
import type { StandardsRetriever } from "../standards/retrieval.ts";
import type { ChangedFile, RetrievalQuery, StandardSearchHit } from "../standards/types.ts";

export type RetrievalStatus = "ok" | "unavailable" | "skipped";

export type StandardsContextResult = AssembledContext & {
  retrievalStatus: RetrievalStatus;
  query: RetrievalQuery;
  applicable: ApplicableStandard[];
};

/**
 * Build the standards section of a review prompt for one pull request.
 *
 * Retrieval failures never fail the review: the pool is emptied and the
 * always-scope catalog still reaches the context.
 */
export async function buildStandardsContext(params: {
  catalog: StandardsCatalog;
  retriever: StandardsRetriever;
  changedFiles: readonly ChangedFile[];
  prTitle?: string | null;
  prBody?: string | null;
  config: StandardsConfig;
  logger: Logger;
  signal?: AbortSignal;
}): Promise<StandardsContextResult> {
  const { catalog, retriever, changedFiles, config, logger, signal } = params;

  const query = buildRetrievalQuery({
    changedFiles,
    prTitle: params.prTitle,
    prBody: params.prBody,
    topK: config.topK,
    semanticTopK: config.semanticTopK,
  });

  let pool: StandardSearchHit[] = [];
  let retrievalStatus: RetrievalStatus = "skipped";

  if (config.searchEnabled && query.queryText.length > 0) {
    try {
      pool = await retriever.retrieve(query, { timeoutMs: config.searchTimeoutMs, signal });
      retrievalStatus = "ok";
    } catch (err: unknown) {
      if (!(err instanceof RetrievalUnavailableError)) throw err;
      logger.warn(
        { reason: err.reason, catalogSize: catalog.size },
        "Standards retrieval unavailable; continuing with always-scope standards only",
      );
      retrievalStatus = "unavailable";
    }
  }

  const applicable = filterApplicableStandards({ pool, catalog, changedFiles });
  const assembled = assembleStandardsContext(applicable, {
    maxCharsPerDocument: config.maxCharsPerDocument,
    minAlwaysExcerptChars: config.minAlwaysExcerptChars,
    maxTotalChars: config.maxTotalChars,
  });

  logger.info(
    {
      retrievalStatus,
      poolSize: pool.length,
      included: assembled.entries.length,
      dropped: assembled.droppedStandardIds.length,
      referencedTypes: assembled.referencedTypes,
    },
    "Standards context assembled",
  );

  return { ...assembled, retrievalStatus, query, applicable };
}
