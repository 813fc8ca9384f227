import type { ApplicableStandard } from "./applicability.ts";
import { STANDARD_TYPES, scopeForType, type StandardType } from "./types.ts";

export const DEFAULT_MAX_CHARS_PER_DOCUMENT = 2000;
export const DEFAULT_MIN_ALWAYS_EXCERPT_CHARS = 400;
const CONTEXT_HEADING = "### Coding standards";

export type AssembleOptions = {
  maxCharsPerDocument?: number;
  minAlwaysExcerptChars?: number;
  /** Overall cap; conditional entries are dropped from the tail to honor it. */
  maxTotalChars?: number;
};

export type AssembledEntry = {
  standardId: string;
  standardType: StandardType;
  title: string;
  reason: ApplicableStandard["reason"];
  excerpt: string;
  truncated: boolean;
};

export type AssembledContext = {
  text: string;
  entries: AssembledEntry[];
  referencedTypes: StandardType[];
  droppedStandardIds: string[];
};

/**
 * Cut text to at most `budget` characters, preferring the last paragraph
 * break, then the last sentence end, then the raw limit. A boundary cut is
 * only taken when it keeps at least `floor` characters.
 */
export function truncateAtBoundary(
  text: string,
  budget: number,
  floor: number = Math.floor(budget / 2),
): { text: string; truncated: boolean } {
  if (text.length <= budget) return { text, truncated: false };

  const window = text.slice(0, budget);
  const minCut = Math.min(floor, budget);

  const paragraphCut = window.lastIndexOf("\n\n");
  if (paragraphCut >= minCut && paragraphCut > 0) {
    return { text: window.slice(0, paragraphCut).trimEnd(), truncated: true };
  }

  let sentenceCut = -1;
  for (const m of window.matchAll(/[.!?](?=\s|$)/g)) {
    sentenceCut = (m.index ?? -1) + 1;
  }
  if (sentenceCut >= minCut && sentenceCut > 0) {
    return { text: window.slice(0, sentenceCut), truncated: true };
  }

  return { text: window, truncated: true };
}

function sortForContext(entries: readonly ApplicableStandard[]): ApplicableStandard[] {
  return entries
    .map((entry, index) => ({ entry, index }))
    .sort((a, b) => {
      const scopeA = scopeForType(a.entry.document.standardType) === "always" ? 0 : 1;
      const scopeB = scopeForType(b.entry.document.standardType) === "always" ? 0 : 1;
      if (scopeA !== scopeB) return scopeA - scopeB;

      const typeA = STANDARD_TYPES.indexOf(a.entry.document.standardType);
      const typeB = STANDARD_TYPES.indexOf(b.entry.document.standardType);
      if (typeA !== typeB) return typeA - typeB;

      const relA = a.entry.relevance ?? Number.NEGATIVE_INFINITY;
      const relB = b.entry.relevance ?? Number.NEGATIVE_INFINITY;
      if (relA !== relB) return relB - relA;

      return a.index - b.index;
    })
    .map(({ entry }) => entry);
}

function describeReason(entry: ApplicableStandard): string {
  switch (entry.reason) {
    case "always":
      return "always";
    case "affected_file_exact":
      return `affected file ${entry.matchedPath ?? ""}`.trim();
    case "glob_match":
      return `path match ${entry.matchedPath ?? ""}`.trim();
  }
}

function renderEntry(entry: ApplicableStandard, excerpt: string): string {
  const doc = entry.document;
  return [
    `#### [${doc.standardType}] ${doc.title} (${doc.standardId})`,
    `Severity: ${doc.severity} | Applies: ${describeReason(entry)}`,
    excerpt,
  ].join("\n");
}

/**
 * Assemble the standards context handed to the language model.
 *
 * Order: corporate, team, repository, file_history, postmortem; mandatory
 * categories first, by relevance within a category. Each body is held to
 * maxCharsPerDocument, except that always-scope excerpts are never cut below
 * minAlwaysExcerptChars (or the whole body, when shorter). Always-scope
 * entries are never dropped by maxTotalChars.
 */
export function assembleStandardsContext(
  entries: readonly ApplicableStandard[],
  opts: AssembleOptions = {},
): AssembledContext {
  const maxChars = opts.maxCharsPerDocument ?? DEFAULT_MAX_CHARS_PER_DOCUMENT;
  const minAlways = opts.minAlwaysExcerptChars ?? DEFAULT_MIN_ALWAYS_EXCERPT_CHARS;
  const maxTotal = opts.maxTotalChars;

  const sections: string[] = [];
  const included: AssembledEntry[] = [];
  const dropped: string[] = [];
  let total = CONTEXT_HEADING.length;

  for (const entry of sortForContext(entries)) {
    const doc = entry.document;
    const mandatory = scopeForType(doc.standardType) === "always";

    const excerpt = mandatory
      ? truncateAtBoundary(doc.body, Math.max(maxChars, minAlways), minAlways)
      : truncateAtBoundary(doc.body, maxChars);

    const section = renderEntry(entry, excerpt.text);
    const cost = section.length + 2;

    if (!mandatory && maxTotal !== undefined && total + cost > maxTotal) {
      dropped.push(doc.standardId);
      continue;
    }

    total += cost;
    sections.push(section);
    included.push({
      standardId: doc.standardId,
      standardType: doc.standardType,
      title: doc.title,
      reason: entry.reason,
      excerpt: excerpt.text,
      truncated: excerpt.truncated,
    });
  }

  if (sections.length === 0) {
    return { text: "", entries: [], referencedTypes: [], droppedStandardIds: dropped };
  }

  const referencedTypes: StandardType[] = [];
  for (const entry of included) {
    if (!referencedTypes.includes(entry.standardType)) referencedTypes.push(entry.standardType);
  }

  return {
    text: [CONTEXT_HEADING, ...sections].join("\n\n"),
    entries: included,
    referencedTypes,
    droppedStandardIds: dropped,
  };
}
