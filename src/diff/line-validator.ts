import type { Logger } from "pino";
import { normalizeRepoPath } from "../standards/frontmatter.ts";
import type {
  CommentTarget,
  CommentValidation,
  FileDiff,
} from "./types.ts";

/** Sorted, de-duplicated new-file line numbers of every added line. */
export function collectAddedLines(diff: Pick<FileDiff, "hunks">): number[] {
  const lines = new Set<number>();
  for (const hunk of diff.hunks) {
    for (const record of hunk.lines) {
      if (record.kind === "added") lines.add(record.newLine);
    }
  }
  return [...lines].sort((a, b) => a - b);
}

/** Index of the first element >= line. */
function lowerBound(sorted: readonly number[], line: number): number {
  let lo = 0;
  let hi = sorted.length;
  while (lo < hi) {
    const mid = (lo + hi) >>> 1;
    if ((sorted[mid] ?? Number.POSITIVE_INFINITY) < line) lo = mid + 1;
    else hi = mid;
  }
  return lo;
}

/**
 * Nearest member of `sorted` to `line`. Equal distance resolves to the later
 * line so comments lean toward the code that follows. Null when empty.
 */
export function findNearestAddedLine(sorted: readonly number[], line: number): number | null {
  const index = lowerBound(sorted, line);
  const after = sorted[index];
  const before = index > 0 ? sorted[index - 1] : undefined;

  if (after === undefined) return before ?? null;
  if (before === undefined) return after;

  return after - line <= line - before ? after : before;
}

/** Collapse a file's added lines into inclusive [start, end] runs. */
export function getChangedLineRanges(diff: FileDiff): Array<[number, number]> {
  const ranges: Array<[number, number]> = [];
  for (const line of collectAddedLines(diff)) {
    const last = ranges[ranges.length - 1];
    if (last && line === last[1] + 1) last[1] = line;
    else ranges.push([line, line]);
  }
  return ranges;
}

/** Added-line index over a review's file diffs, keyed by normalized path. */
export type AddedLineIndex = ReadonlyMap<string, readonly number[]>;

export function buildAddedLineIndex(diffs: readonly FileDiff[]): AddedLineIndex {
  const index = new Map<string, number[]>();
  for (const diff of diffs) {
    const path = normalizeRepoPath(diff.path);
    const merged = new Set([...(index.get(path) ?? []), ...collectAddedLines(diff)]);
    index.set(path, [...merged].sort((a, b) => a - b));
  }
  return index;
}

export type ValidateOptions = {
  /** Drop instead of correcting when the nearest added line is farther than this. */
  maxDistance?: number;
};

/**
 * Validate one proposed comment target.
 *
 * - accepted: the line is an added line
 * - corrected: moved to the nearest added line (ties go forward)
 * - dropped: FileNotInDiff, NoAddedLines, InvalidLine, or OutOfRange when
 *   maxDistance is set
 *
 * Accepted and corrected lines are always members of the file's added set.
 */
export function validateCommentTarget<P>(
  target: CommentTarget<P>,
  index: AddedLineIndex,
  opts: ValidateOptions = {},
): CommentValidation<P> {
  const added = index.get(normalizeRepoPath(target.path));
  if (added === undefined) return { status: "dropped", target, reason: "FileNotInDiff" };
  if (added.length === 0) return { status: "dropped", target, reason: "NoAddedLines" };
  if (!Number.isFinite(target.line)) return { status: "dropped", target, reason: "InvalidLine" };

  const line = Math.round(target.line);
  const nearest = findNearestAddedLine(added, line);
  if (nearest === null) return { status: "dropped", target, reason: "NoAddedLines" };

  if (nearest === line && line === target.line) {
    return { status: "accepted", target, line };
  }

  const distance = Math.abs(nearest - target.line);
  if (opts.maxDistance !== undefined && distance > opts.maxDistance) {
    return { status: "dropped", target, reason: "OutOfRange" };
  }
  return { status: "corrected", target, line: nearest, distance };
}

export type BatchValidation<P> = {
  outcomes: CommentValidation<P>[];
  /** Accepted and corrected targets with their final line, in input order. */
  postable: CommentTarget<P>[];
  counts: { accepted: number; corrected: number; dropped: number };
};

/**
 * Validate every proposed target of a review against its file diffs.
 * Corrections and drops are logged; outcomes keep input order.
 */
export function validateCommentTargets<P>(
  targets: readonly CommentTarget<P>[],
  diffs: readonly FileDiff[] | AddedLineIndex,
  opts: ValidateOptions & { logger?: Logger } = {},
): BatchValidation<P> {
  const index = isAddedLineIndex(diffs) ? diffs : buildAddedLineIndex(diffs);
  const outcomes: CommentValidation<P>[] = [];
  const postable: CommentTarget<P>[] = [];
  const counts = { accepted: 0, corrected: 0, dropped: 0 };

  for (const target of targets) {
    const outcome = validateCommentTarget(target, index, opts);
    outcomes.push(outcome);

    switch (outcome.status) {
      case "accepted":
        counts.accepted++;
        postable.push({ ...target, line: outcome.line });
        break;
      case "corrected":
        counts.corrected++;
        postable.push({ ...target, line: outcome.line });
        opts.logger?.debug(
          { path: target.path, proposedLine: target.line, line: outcome.line, distance: outcome.distance },
          "Comment target moved to nearest added line",
        );
        break;
      case "dropped":
        counts.dropped++;
        opts.logger?.info(
          { path: target.path, proposedLine: target.line, reason: outcome.reason },
          "Comment target dropped",
        );
        break;
    }
  }

  opts.logger?.info(counts, "Comment target validation complete");
  return { outcomes, postable, counts };
}

function isAddedLineIndex(value: readonly FileDiff[] | AddedLineIndex): value is AddedLineIndex {
  return value instanceof Map;
}
