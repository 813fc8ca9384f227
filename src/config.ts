import { z } from "zod";
import { ConfigError } from "./lib/errors.ts";

const booleanFlag = z
  .string()
  .optional()
  .transform((v) => {
    if (v === undefined || v.trim() === "") return true;
    return ["1", "true", "yes", "on"].includes(v.trim().toLowerCase());
  });

const configSchema = z
  .object({
    databaseUrl: z.string().optional(),
    voyageApiKey: z.string().default(""),
    embeddingModel: z.string().default("voyage-code-3"),
    embeddingDimensions: z.coerce.number().int().positive().default(1024),
    rerankModel: z.string().default(""),
    standardsDocsPath: z.string().default("standards"),
    logLevel: z.string().default("info"),
    standards: z.object({
      searchEnabled: booleanFlag,
      topK: z.coerce.number().int().min(1).max(50).default(5),
      semanticTopK: z.coerce.number().int().min(1).max(200).default(20),
      maxCharsPerDocument: z.coerce.number().int().min(100).default(2000),
      minAlwaysExcerptChars: z.coerce.number().int().min(0).default(400),
      maxTotalChars: z.coerce.number().int().positive().optional(),
      searchTimeoutMs: z.coerce.number().int().min(100).max(60_000).default(5000),
    }),
  })
  .transform((cfg) => ({
    ...cfg,
    standards: {
      ...cfg.standards,
      // The pre-filter pool is never smaller than the final count.
      semanticTopK: Math.max(cfg.standards.semanticTopK, cfg.standards.topK),
    },
  }));

export type AppConfig = z.infer<typeof configSchema>;
export type StandardsConfig = AppConfig["standards"];

function emptyToUndefined(value: string | undefined): string | undefined {
  return value === undefined || value.trim() === "" ? undefined : value.trim();
}

/**
 * Build the application config from environment variables.
 *
 * Throws ConfigError listing every invalid setting.
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const result = configSchema.safeParse({
    databaseUrl: emptyToUndefined(env.DATABASE_URL),
    voyageApiKey: emptyToUndefined(env.VOYAGE_API_KEY),
    embeddingModel: emptyToUndefined(env.EMBEDDING_MODEL),
    embeddingDimensions: emptyToUndefined(env.EMBEDDING_DIMENSIONS),
    rerankModel: emptyToUndefined(env.RERANK_MODEL),
    standardsDocsPath: emptyToUndefined(env.STANDARDS_DOCS_PATH),
    logLevel: emptyToUndefined(env.LOG_LEVEL),
    standards: {
      searchEnabled: emptyToUndefined(env.STANDARDS_SEARCH_ENABLED),
      topK: emptyToUndefined(env.STANDARDS_TOP_K),
      semanticTopK: emptyToUndefined(env.STANDARDS_SEMANTIC_TOP_K),
      maxCharsPerDocument: emptyToUndefined(env.STANDARDS_MAX_CHARS),
      minAlwaysExcerptChars: emptyToUndefined(env.STANDARDS_MIN_ALWAYS_EXCERPT_CHARS),
      maxTotalChars: emptyToUndefined(env.STANDARDS_MAX_TOTAL_CHARS),
      searchTimeoutMs: emptyToUndefined(env.STANDARDS_SEARCH_TIMEOUT_MS),
    },
  });

  if (!result.success) {
    throw new ConfigError(
      result.error.issues.map((issue) => `${issue.path.join(".")}: ${issue.message}`),
    );
  }

  return result.data;
}
