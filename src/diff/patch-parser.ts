/**
 * Unified diff parser for a single file's patch (the `patch` field GitHub
 * returns per file). Produces the line-record shape the validator consumes.
 */

import type { DiffHunk, DiffLineRecord, FileDiff } from "./types.ts";

const HUNK_HEADER_RE = /^@@\s+-(\d+)(?:,(\d+))?\s+\+(\d+)(?:,(\d+))?\s+@@\s*(.*)$/;

/**
 * Parse the hunks of a unified diff.
 *
 * Hunk bodies are consumed by their header counts, so a removed line whose
 * text starts with "--" is never mistaken for a file header. Lines outside
 * hunks (diff/index/---/+++ headers) are ignored, as are
 * "\ No newline at end of file" markers.
 */
export function parseUnifiedPatch(patch: string | null | undefined): DiffHunk[] {
  if (!patch) return [];

  const hunks: DiffHunk[] = [];
  let current: DiffHunk | null = null;
  let oldRemaining = 0;
  let newRemaining = 0;
  let oldLine = 0;
  let newLine = 0;

  for (const line of patch.replace(/\r\n?/g, "\n").split("\n")) {
    const header = HUNK_HEADER_RE.exec(line);
    if (header) {
      oldLine = parseInt(header[1] ?? "0", 10);
      oldRemaining = parseInt(header[2] ?? "1", 10);
      newLine = parseInt(header[3] ?? "0", 10);
      newRemaining = parseInt(header[4] ?? "1", 10);
      current = { oldStart: oldLine, newStart: newLine, header: header[5]?.trim() ?? "", lines: [] };
      hunks.push(current);
      continue;
    }

    if (!current || (oldRemaining <= 0 && newRemaining <= 0)) continue;
    if (line.startsWith("\\")) continue;

    const marker = line.charAt(0);
    const text = line.slice(1);
    let record: DiffLineRecord;

    if (marker === "+") {
      record = { kind: "added", newLine, text };
      newLine++;
      newRemaining--;
    } else if (marker === "-") {
      record = { kind: "removed", oldLine, text };
      oldLine++;
      oldRemaining--;
    } else if (marker === " " || line === "") {
      // Some tools strip the leading space from blank context lines
      record = { kind: "context", newLine, text };
      oldLine++;
      newLine++;
      oldRemaining--;
      newRemaining--;
    } else {
      continue;
    }

    current.lines.push(record);
  }

  return hunks;
}

export function fileDiffFromPatch(path: string, patch: string | null | undefined): FileDiff {
  return { path, hunks: parseUnifiedPatch(patch) };
}

/** Added-line texts in diff order, for folding into a retrieval query. */
export function addedLineTexts(diff: FileDiff): string[] {
  const texts: string[] = [];
  for (const hunk of diff.hunks) {
    for (const record of hunk.lines) {
      if (record.kind === "added") texts.push(record.text ?? "");
    }
  }
  return texts;
}
