import type { ChangedFile, RetrievalQuery } from "./types.ts";

export const MAX_QUERY_CHARS = 2000;
export const MAX_QUERY_ADDED_LINES = 50;

/**
 * Build the standards search query for a pull request.
 *
 * Sections, newline-separated and skipped when empty: PR title, PR body,
 * changed paths (space-joined), then the first 50 added lines across the file
 * set in set order. Blank lines count toward the 50 but are not joined. The
 * result is cut to 2000 characters.
 */
export function buildRetrievalQuery(params: {
  changedFiles: readonly ChangedFile[];
  prTitle?: string | null;
  prBody?: string | null;
  topK: number;
  semanticTopK: number;
}): RetrievalQuery {
  const { changedFiles, prTitle, prBody, topK, semanticTopK } = params;

  const addedLines: string[] = [];
  outer: for (const file of changedFiles) {
    for (const line of file.addedLines ?? []) {
      addedLines.push(line.trim());
      if (addedLines.length >= MAX_QUERY_ADDED_LINES) break outer;
    }
  }

  const parts = [
    prTitle?.trim() ?? "",
    prBody?.trim() ?? "",
    changedFiles.map((f) => f.path).join(" "),
    addedLines.filter((l) => l.length > 0).join(" "),
  ];

  const queryText = parts
    .filter((p) => p.length > 0)
    .join("\n")
    .trim()
    .slice(0, MAX_QUERY_CHARS);

  return {
    queryText,
    topK,
    semanticTopK: Math.max(semanticTopK, topK),
  };
}
