import { describe, test, expect } from "vitest";
import type { ApplicableStandard } from "./applicability.ts";
import { assembleStandardsContext, truncateAtBoundary } from "./context-assembler.ts";
import type { StandardDocument, StandardType } from "./types.ts";

function entry(
  id: string,
  type: StandardType,
  opts: { body?: string; relevance?: number | null; matchedPath?: string } = {},
): ApplicableStandard {
  const always = type === "corporate" || type === "team" || type === "repository";
  const document: StandardDocument = {
    standardId: id,
    standardType: type,
    appliesScope: always ? "always" : "conditional",
    title: `Title ${id}`,
    body: opts.body ?? `Body of ${id}.`,
    tags: [],
    appliesToGlobs: [],
    affectedFiles: [],
    severity: "high",
    updatedAt: "2024-01-01",
  };
  return {
    document,
    reason: always ? "always" : "affected_file_exact",
    relevance: opts.relevance ?? null,
    matchedPath: always ? null : (opts.matchedPath ?? "app/x.py"),
  };
}

describe("truncateAtBoundary", () => {
  test("returns short text unchanged", () => {
    expect(truncateAtBoundary("short", 10)).toEqual({ text: "short", truncated: false });
  });

  test("prefers a paragraph break", () => {
    expect(truncateAtBoundary("aaaa\n\nbbbb", 8)).toEqual({ text: "aaaa", truncated: true });
  });

  test("falls back to a sentence end", () => {
    expect(truncateAtBoundary("One two. Three four five.", 15)).toEqual({ text: "One two.", truncated: true });
  });

  test("cuts raw when no boundary keeps enough text", () => {
    expect(truncateAtBoundary("abcdefghij", 4)).toEqual({ text: "abcd", truncated: true });
    expect(truncateAtBoundary("a. bcdefghijklmnop", 10)).toEqual({ text: "a. bcdefgh", truncated: true });
  });
});

describe("assembleStandardsContext", () => {
  test("renders one section per standard under a heading", () => {
    const result = assembleStandardsContext([
      entry("pm-1", "postmortem", { relevance: 0.4, matchedPath: "app/services/github_service.py" }),
      entry("corp-1", "corporate", { body: "Never log keys." }),
    ]);

    expect(result.text).toBe(
      [
        "### Coding standards",
        "#### [corporate] Title corp-1 (corp-1)\nSeverity: high | Applies: always\nNever log keys.",
        "#### [postmortem] Title pm-1 (pm-1)\nSeverity: high | Applies: affected file app/services/github_service.py\nBody of pm-1.",
      ].join("\n\n"),
    );
    expect(result.referencedTypes).toEqual(["corporate", "postmortem"]);
  });

  test("orders by category, then relevance within a category", () => {
    const result = assembleStandardsContext([
      entry("pm-low", "postmortem", { relevance: 0.1 }),
      entry("team-1", "team"),
      entry("fh-1", "file_history", { relevance: 0.05 }),
      entry("pm-high", "postmortem", { relevance: 0.8 }),
      entry("corp-1", "corporate"),
      entry("repo-1", "repository", { relevance: 0.3 }),
    ]);

    expect(result.entries.map((e) => e.standardId)).toEqual([
      "corp-1",
      "team-1",
      "repo-1",
      "fh-1",
      "pm-high",
      "pm-low",
    ]);
  });

  test("caps conditional bodies at maxCharsPerDocument", () => {
    const result = assembleStandardsContext([entry("pm-1", "postmortem", { body: "x".repeat(500) })], {
      maxCharsPerDocument: 100,
    });

    expect(result.entries[0]!.excerpt).toHaveLength(100);
    expect(result.entries[0]!.truncated).toBe(true);
  });

  test("never cuts an always-scope excerpt below the minimum", () => {
    const result = assembleStandardsContext(
      [
        entry("corp-1", "corporate", { body: "x".repeat(1000) }),
        entry("team-1", "team", { body: "y".repeat(250) }),
      ],
      { maxCharsPerDocument: 100, minAlwaysExcerptChars: 400 },
    );

    expect(result.entries[0]!.excerpt).toHaveLength(400);
    expect(result.entries[1]!.excerpt).toHaveLength(250);
    expect(result.entries[1]!.truncated).toBe(false);
  });

  test("maxTotalChars drops conditional standards but never always-scope ones", () => {
    const result = assembleStandardsContext(
      [entry("corp-1", "corporate"), entry("pm-1", "postmortem", { relevance: 0.9 })],
      { maxTotalChars: 30 },
    );

    expect(result.entries.map((e) => e.standardId)).toEqual(["corp-1"]);
    expect(result.droppedStandardIds).toEqual(["pm-1"]);
    expect(result.referencedTypes).toEqual(["corporate"]);
  });

  test("returns empty text when nothing applies", () => {
    expect(assembleStandardsContext([])).toEqual({
      text: "",
      entries: [],
      referencedTypes: [],
      droppedStandardIds: [],
    });
  });
});
