import { readdir, readFile, stat } from "node:fs/promises";
import { join, sep } from "node:path";
import { StandardsIndexError } from "../lib/errors.ts";
import { parseStandardMarkdown } from "./frontmatter.ts";
import type { StandardDocument } from "./types.ts";

/**
 * Load every `*.md` standards document under rootDir, in sorted path order.
 *
 * All-or-nothing: the first malformed document, a duplicate standard_id, or a
 * missing directory throws StandardsIndexError and nothing is returned.
 */
export async function loadStandardDocuments(rootDir: string): Promise<StandardDocument[]> {
  try {
    const info = await stat(rootDir);
    if (!info.isDirectory()) {
      throw new StandardsIndexError("standards path is not a directory", { sourceFile: rootDir });
    }
  } catch (err) {
    if (err instanceof StandardsIndexError) throw err;
    throw new StandardsIndexError("standards directory not found", { sourceFile: rootDir, cause: err });
  }

  const entries = await readdir(rootDir, { recursive: true });
  const files = entries
    .map((entry) => entry.split(sep).join("/"))
    .filter((entry) => entry.toLowerCase().endsWith(".md"))
    .sort();

  const documents: StandardDocument[] = [];
  const seen = new Map<string, string>();

  for (const relativePath of files) {
    const fullPath = join(rootDir, relativePath);
    const [raw, info] = await Promise.all([readFile(fullPath, "utf-8"), stat(fullPath)]);

    const document = parseStandardMarkdown(raw, relativePath, {
      fallbackUpdatedAt: info.mtime.toISOString().slice(0, 10),
    });

    const previous = seen.get(document.standardId);
    if (previous !== undefined) {
      throw new StandardsIndexError(
        `duplicate standard_id '${document.standardId}' (also defined in ${previous})`,
        { sourceFile: relativePath, field: "standard_id" },
      );
    }
    seen.set(document.standardId, relativePath);
    documents.push(document);
  }

  return documents;
}
