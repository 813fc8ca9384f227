import { VoyageAIClient, VoyageAIError } from "voyageai";
import type { Logger } from "pino";
import type { EmbeddingInputType, EmbeddingProvider, EmbeddingResult } from "./types.ts";

// Voyage accepts up to 128 inputs per embed request.
const MAX_BATCH_INPUTS = 128;

/**
 * Provider used when no Voyage key is configured. Retrieval runs lexical-only
 * and indexing stores chunks without vectors.
 */
export function createNoOpEmbeddingProvider(logger: Logger): EmbeddingProvider {
  logger.info("Embedding provider disabled; standards search will be lexical only");
  return {
    async generate() {
      return null;
    },
    async generateBatch(texts) {
      return texts.map(() => null);
    },
    model: "none",
    dimensions: 0,
  };
}

/**
 * Voyage AI embeddings for standards chunks and review queries.
 *
 * Fail-open: an API error, a malformed response or an aborted `signal` yields
 * null for the affected inputs. An abort is logged at debug, since the caller
 * that fired it already reports the timeout.
 */
export function createEmbeddingProvider(opts: {
  apiKey: string;
  model: string;
  dimensions: number;
  timeoutSeconds?: number;
  maxRetries?: number;
  logger: Logger;
}): EmbeddingProvider {
  const { apiKey, model, dimensions, timeoutSeconds = 10, maxRetries = 2, logger } = opts;

  if (!apiKey) {
    return createNoOpEmbeddingProvider(logger);
  }

  const client = new VoyageAIClient({ apiKey });

  async function embed(
    texts: string[],
    inputType: EmbeddingInputType,
    signal: AbortSignal | undefined,
  ): Promise<EmbeddingResult[]> {
    const results: EmbeddingResult[] = texts.map(() => null);
    if (texts.length === 0 || signal?.aborted) return results;

    try {
      const response = await client.embed(
        { input: texts, model, inputType, outputDimension: dimensions },
        { timeoutInSeconds: timeoutSeconds, maxRetries, abortSignal: signal },
      );

      for (const [position, item] of (response.data ?? []).entries()) {
        const index = item.index ?? position;
        if (!item.embedding || index < 0 || index >= texts.length) continue;
        results[index] = { embedding: new Float32Array(item.embedding), model, dimensions };
      }

      const missing = results.filter((r) => r === null).length;
      if (missing > 0) {
        logger.warn({ model, requested: texts.length, missing }, "Embedding response missing data (fail-open)");
      }
    } catch (err: unknown) {
      if (signal?.aborted) {
        logger.debug({ model, inputs: texts.length }, "Embedding request aborted");
      } else if (err instanceof VoyageAIError) {
        logger.warn(
          { statusCode: err.statusCode, message: err.message, inputs: texts.length },
          "Voyage AI embedding generation failed (fail-open)",
        );
      } else {
        logger.warn({ err, inputs: texts.length }, "Embedding generation failed (fail-open)");
      }
    }
    return results;
  }

  return {
    async generate(text, inputType, { signal } = {}) {
      const [result] = await embed([text], inputType, signal);
      return result ?? null;
    },

    async generateBatch(texts, inputType, { signal } = {}) {
      const results: EmbeddingResult[] = [];
      for (let start = 0; start < texts.length; start += MAX_BATCH_INPUTS) {
        const batch = texts.slice(start, start + MAX_BATCH_INPUTS);
        results.push(...(await embed(batch, inputType, signal)));
      }
      return results;
    },

    model,
    dimensions,
  };
}
