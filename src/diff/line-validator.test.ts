import { describe, test, expect, vi } from "vitest";
import type { Logger } from "pino";
import {
  buildAddedLineIndex,
  collectAddedLines,
  findNearestAddedLine,
  getChangedLineRanges,
  validateCommentTarget,
  validateCommentTargets,
} from "./line-validator.ts";
import type { DiffLineRecord, FileDiff } from "./types.ts";

const mockLogger = {
  info: vi.fn(),
  warn: vi.fn(),
  error: vi.fn(),
  debug: vi.fn(),
  trace: vi.fn(),
  fatal: vi.fn(),
  child: () => mockLogger,
  level: "silent",
} as unknown as Logger;

function diffWithAdded(path: string, added: number[], context: number[] = []): FileDiff {
  const lines: DiffLineRecord[] = [
    ...context.map((newLine): DiffLineRecord => ({ kind: "context", newLine })),
    ...added.map((newLine): DiffLineRecord => ({ kind: "added", newLine })),
    { kind: "removed", oldLine: 3 },
  ];
  return { path, hunks: [{ oldStart: 1, newStart: 1, header: "", lines }] };
}

// --- findNearestAddedLine ---

describe("findNearestAddedLine", () => {
  test("picks the closer neighbour", () => {
    expect(findNearestAddedLine([10, 12, 48, 55], 50)).toBe(48);
  });

  test("breaks ties toward the later line", () => {
    expect(findNearestAddedLine([10, 12, 45, 55], 50)).toBe(55);
  });

  test("returns the line itself when added", () => {
    expect(findNearestAddedLine([10, 12], 12)).toBe(12);
  });

  test("clamps to the ends", () => {
    expect(findNearestAddedLine([10, 12], 1)).toBe(10);
    expect(findNearestAddedLine([10, 12], 99)).toBe(12);
  });

  test("returns null for an empty set", () => {
    expect(findNearestAddedLine([], 5)).toBeNull();
  });
});

// --- collectAddedLines / getChangedLineRanges ---

describe("collectAddedLines", () => {
  test("returns sorted unique added lines only", () => {
    const diff = diffWithAdded("a.ts", [12, 10, 12], [11]);
    expect(collectAddedLines(diff)).toEqual([10, 12]);
  });
});

describe("getChangedLineRanges", () => {
  test("collapses consecutive added lines", () => {
    expect(getChangedLineRanges(diffWithAdded("a.ts", [1, 2, 3, 7, 9, 10]))).toEqual([
      [1, 3],
      [7, 7],
      [9, 10],
    ]);
  });
});

// --- validateCommentTarget ---

describe("validateCommentTarget", () => {
  const index = buildAddedLineIndex([
    diffWithAdded("src/a.ts", [10, 12, 48, 55], [11, 50]),
    diffWithAdded("src/removed-only.ts", []),
  ]);

  test("accepts a target on an added line", () => {
    expect(validateCommentTarget({ path: "src/a.ts", line: 12 }, index)).toEqual({
      status: "accepted",
      target: { path: "src/a.ts", line: 12 },
      line: 12,
    });
  });

  test("moves a context-line target to the nearest added line", () => {
    expect(validateCommentTarget({ path: "src/a.ts", line: 50 }, index)).toEqual({
      status: "corrected",
      target: { path: "src/a.ts", line: 50 },
      line: 48,
      distance: 2,
    });
  });

  test("matches paths after normalization", () => {
    expect(validateCommentTarget({ path: "./src/a.ts", line: 10 }, index).status).toBe("accepted");
  });

  test("drops a target on a file outside the diff", () => {
    const outcome = validateCommentTarget({ path: "src/other.ts", line: 1 }, index);
    expect(outcome).toMatchObject({ status: "dropped", reason: "FileNotInDiff" });
  });

  test("drops a target on a file without added lines", () => {
    const outcome = validateCommentTarget({ path: "src/removed-only.ts", line: 1 }, index);
    expect(outcome).toMatchObject({ status: "dropped", reason: "NoAddedLines" });
  });

  test("drops a non-finite line", () => {
    const outcome = validateCommentTarget({ path: "src/a.ts", line: Number.NaN }, index);
    expect(outcome).toMatchObject({ status: "dropped", reason: "InvalidLine" });
  });

  test("drops corrections beyond maxDistance", () => {
    const outcome = validateCommentTarget({ path: "src/a.ts", line: 30 }, index, { maxDistance: 5 });
    expect(outcome).toMatchObject({ status: "dropped", reason: "OutOfRange" });
  });
});

// --- validateCommentTargets ---

describe("validateCommentTargets", () => {
  test("keeps input order and lists postable targets with their final line", () => {
    const diffs = [diffWithAdded("src/a.ts", [10, 12, 48, 55])];
    const result = validateCommentTargets(
      [
        { path: "src/a.ts", line: 50, payload: "first" },
        { path: "src/b.ts", line: 3, payload: "second" },
        { path: "src/a.ts", line: 10, payload: "third" },
      ],
      diffs,
      { logger: mockLogger },
    );

    expect(result.outcomes.map((o) => o.status)).toEqual(["corrected", "dropped", "accepted"]);
    expect(result.postable).toEqual([
      { path: "src/a.ts", line: 48, payload: "first" },
      { path: "src/a.ts", line: 10, payload: "third" },
    ]);
    expect(result.counts).toEqual({ accepted: 1, corrected: 1, dropped: 1 });
    expect(mockLogger.info).toHaveBeenCalledWith(
      { path: "src/b.ts", proposedLine: 3, reason: "FileNotInDiff" },
      "Comment target dropped",
    );
  });

  test("every postable line is an added line", () => {
    const diffs = [diffWithAdded("x.ts", [5, 20, 21, 40])];
    const index = buildAddedLineIndex(diffs);
    const targets = Array.from({ length: 50 }, (_, i) => ({ path: "x.ts", line: i }));

    const { postable } = validateCommentTargets(targets, index);

    expect(postable).toHaveLength(50);
    for (const target of postable) {
      expect([5, 20, 21, 40]).toContain(target.line);
    }
  });
});
