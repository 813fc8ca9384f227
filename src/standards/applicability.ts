import picomatch from "picomatch";
import type { StandardsCatalog } from "./catalog.ts";
import { normalizeRepoPath } from "./frontmatter.ts";
import {
  scopeForType,
  type ChangedFile,
  type StandardDocument,
  type StandardSearchHit,
} from "./types.ts";

export type MatchReason = "always" | "affected_file_exact" | "glob_match";

export type ApplicableStandard = {
  document: StandardDocument;
  reason: MatchReason;
  /** Best retrieval relevance for the document; null for catalog pulls that were not retrieved. */
  relevance: number | null;
  /** Changed path that satisfied a conditional match. */
  matchedPath: string | null;
};

export type FileMatch = {
  reason: "affected_file_exact" | "glob_match";
  path: string;
};

// A single "*" crosses directory separators, so "app/*.py" covers app/services/x.py
// and "*.sql" covers nested files.
const GLOB_OPTIONS = { dot: true, bash: true } as const;

/**
 * Match a document's file metadata against changed paths.
 *
 * Exact `affectedFiles` membership is checked across every path before any
 * glob; the two conditions are independent, either one is enough.
 */
export function matchChangedFiles(
  document: Pick<StandardDocument, "affectedFiles" | "appliesToGlobs">,
  changedPaths: readonly string[],
): FileMatch | null {
  if (changedPaths.length === 0) return null;

  const affected = new Set(document.affectedFiles.map(normalizeRepoPath));
  for (const path of changedPaths) {
    if (affected.has(path)) return { reason: "affected_file_exact", path };
  }

  const globs = document.appliesToGlobs.filter((g) => g.trim().length > 0);
  if (globs.length === 0) return null;

  const isMatch = picomatch(globs, GLOB_OPTIONS);
  for (const path of changedPaths) {
    if (isMatch(path)) return { reason: "glob_match", path };
  }
  return null;
}

function bestHitPerStandard(pool: readonly StandardSearchHit[]): StandardSearchHit[] {
  const best = new Map<string, StandardSearchHit>();
  for (const hit of pool) {
    const current = best.get(hit.document.standardId);
    if (!current || hit.relevance > current.relevance) {
      best.set(hit.document.standardId, hit);
    }
  }
  return [...best.values()].sort((a, b) => b.relevance - a.relevance);
}

/**
 * Decide which standards reach the review context.
 *
 * 1. Every catalog (always-scope) document is included, retrieved or not.
 * 2. A conditional document from the pool is included only if a changed path
 *    is in its affectedFiles or matches one of its appliesToGlobs; relevance
 *    alone never admits it. Scope is derived from the standard type, not the
 *    stored label.
 * 3. One entry per standard id, at its highest relevance.
 *
 * Output order: catalog documents, always-scope hits missing from the catalog,
 * then conditional documents by descending relevance.
 */
export function filterApplicableStandards(params: {
  pool: readonly StandardSearchHit[];
  catalog: StandardsCatalog;
  changedFiles: readonly ChangedFile[];
}): ApplicableStandard[] {
  const { pool, catalog, changedFiles } = params;
  const changedPaths = [...new Set(changedFiles.map((f) => normalizeRepoPath(f.path)))];

  const mandatory = new Map<string, ApplicableStandard>();
  for (const document of catalog.documents) {
    mandatory.set(document.standardId, {
      document,
      reason: "always",
      relevance: null,
      matchedPath: null,
    });
  }

  const conditional: ApplicableStandard[] = [];

  for (const hit of bestHitPerStandard(pool)) {
    const id = hit.document.standardId;

    if (scopeForType(hit.document.standardType) === "always") {
      const existing = mandatory.get(id);
      if (existing) {
        existing.relevance = hit.relevance;
      } else {
        mandatory.set(id, {
          document: hit.document,
          reason: "always",
          relevance: hit.relevance,
          matchedPath: null,
        });
      }
      continue;
    }

    const match = matchChangedFiles(hit.document, changedPaths);
    if (!match) continue;
    conditional.push({
      document: hit.document,
      reason: match.reason,
      relevance: hit.relevance,
      matchedPath: match.path,
    });
  }

  return [...mandatory.values(), ...conditional];
}
