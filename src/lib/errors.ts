/**
 * Error types shared by the indexing and retrieval paths.
 *
 * - StandardsIndexError aborts an indexing run and names the offending document.
 * - RetrievalUnavailableError is raised when the search store cannot answer in
 *   time. Callers treat it as non-fatal: always-scope standards are still
 *   delivered from the catalog.
 * - ConfigError carries every invalid environment setting at once.
 */

export type RetrievalFailureReason = "timeout" | "aborted" | "unreachable";

export class StandardsIndexError extends Error {
  readonly sourceFile: string;
  readonly field: string | undefined;

  constructor(
    message: string,
    opts: { sourceFile: string; field?: string; cause?: unknown },
  ) {
    super(`${opts.sourceFile}: ${message}`, { cause: opts.cause });
    this.name = "StandardsIndexError";
    this.sourceFile = opts.sourceFile;
    this.field = opts.field;
  }
}

export class RetrievalUnavailableError extends Error {
  readonly reason: RetrievalFailureReason;

  constructor(reason: RetrievalFailureReason, message: string, opts: { cause?: unknown } = {}) {
    super(message, { cause: opts.cause });
    this.name = "RetrievalUnavailableError";
    this.reason = reason;
  }
}

export class ConfigError extends Error {
  readonly issues: string[];

  constructor(issues: string[]) {
    super(`Invalid configuration:\n${issues.map((i) => `  ${i}`).join("\n")}`);
    this.name = "ConfigError";
    this.issues = issues;
  }
}

/**
 * Classify a failed store or embedding call into a retrieval failure reason.
 *
 * @param isTimeout - Whether the call was cut off by its time budget
 */
export function classifyRetrievalError(
  error: unknown,
  isTimeout: boolean,
): RetrievalFailureReason {
  if (isTimeout) return "timeout";
  if (error instanceof RetrievalUnavailableError) return error.reason;

  const name = error instanceof Error ? error.name : "";
  if (name === "AbortError") return "aborted";
  if (name === "TimeoutError") return "timeout";

  const message = error instanceof Error ? error.message : String(error);
  if (/timed? ?out|ETIMEDOUT|CONNECT_TIMEOUT/i.test(message)) return "timeout";

  return "unreachable";
}

/** One-line description of an indexing failure for CLI output. */
export function formatIndexError(error: unknown): string {
  if (error instanceof StandardsIndexError) {
    const field = error.field ? ` (field: ${error.field})` : "";
    return `Indexing aborted${field}: ${error.message}`;
  }
  return `Indexing aborted: ${error instanceof Error ? error.message : String(error)}`;
}
