/**
 * Split a standard's body into embeddable chunks with content-addressed ids.
 *
 * Blocks are cut at headings and blank lines (never inside fenced code), then
 * packed greedily up to maxChars. A block larger than maxChars is split at the
 * last whitespace in the window, or raw when no whitespace falls in its
 * second half.
 */

import { createHash } from "node:crypto";
import type { StandardChunk, StandardDocument } from "./types.ts";

export const DEFAULT_CHUNK_MAX_CHARS = 1800;

const FENCE_RE = /^\s*(```|~~~)/;
const HEADING_RE = /^#{1,6}\s/;

/** Collapse whitespace runs so formatting-only edits keep the same id. */
export function normalizeChunkText(text: string): string {
  return text.replace(/\s+/g, " ").trim();
}

/**
 * Compute the content-addressed chunk id: SHA-256 over the parent standard id,
 * the chunk ordinal and the normalized text.
 */
export function computeChunkId(standardId: string, sequenceIndex: number, text: string): string {
  return createHash("sha256")
    .update(`${standardId}\u0000${sequenceIndex}\u0000${normalizeChunkText(text)}`, "utf8")
    .digest("hex");
}

function splitIntoBlocks(body: string): string[] {
  const blocks: string[] = [];
  let current: string[] = [];
  let inFence = false;

  const flush = () => {
    const text = current.join("\n").trim();
    if (text) blocks.push(text);
    current = [];
  };

  for (const line of body.replace(/\r\n?/g, "\n").split("\n")) {
    if (FENCE_RE.test(line)) {
      inFence = !inFence;
      current.push(line);
      continue;
    }
    if (!inFence && line.trim() === "") {
      flush();
      continue;
    }
    if (!inFence && HEADING_RE.test(line)) {
      flush();
    }
    current.push(line);
  }
  flush();

  // Keep a bare heading attached to the block it introduces
  const merged: string[] = [];
  for (let i = 0; i < blocks.length; i++) {
    const block = blocks[i]!;
    const next = blocks[i + 1];
    if (HEADING_RE.test(block) && !block.includes("\n") && next !== undefined) {
      merged.push(`${block}\n\n${next}`);
      i++;
    } else {
      merged.push(block);
    }
  }
  return merged;
}

function hardSplit(text: string, maxChars: number): string[] {
  const parts: string[] = [];
  let rest = text;

  while (rest.length > maxChars) {
    const window = rest.slice(0, maxChars);
    const cut = Math.max(window.lastIndexOf("\n"), window.lastIndexOf(" "));
    const at = cut >= maxChars / 2 ? cut : maxChars;
    parts.push(rest.slice(0, at).trim());
    rest = rest.slice(at).trim();
  }

  if (rest) parts.push(rest);
  return parts;
}

/** Split body text into ordered chunk texts of at most maxChars each. */
export function splitStandardBody(body: string, maxChars: number = DEFAULT_CHUNK_MAX_CHARS): string[] {
  const chunks: string[] = [];
  let current = "";

  for (const block of splitIntoBlocks(body)) {
    const candidate = current ? `${current}\n\n${block}` : block;
    if (candidate.length <= maxChars) {
      current = candidate;
      continue;
    }

    if (current) chunks.push(current);
    current = "";

    if (block.length <= maxChars) {
      current = block;
    } else {
      chunks.push(...hardSplit(block, maxChars));
    }
  }

  if (current) chunks.push(current);
  return chunks;
}

/**
 * Chunk a standard document. Re-chunking an unmodified document always yields
 * the same chunk ids.
 */
export function chunkStandardDocument(
  document: StandardDocument,
  opts: { maxChars?: number } = {},
): StandardChunk[] {
  const maxChars = opts.maxChars ?? DEFAULT_CHUNK_MAX_CHARS;

  return splitStandardBody(document.body, maxChars).map((text, sequenceIndex) => ({
    chunkId: computeChunkId(document.standardId, sequenceIndex, text),
    parentStandardId: document.standardId,
    sequenceIndex,
    text,
    document,
  }));
}
