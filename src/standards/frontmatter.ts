import yaml from "js-yaml";
import { z } from "zod";
import { StandardsIndexError } from "../lib/errors.ts";
import {
  SEVERITIES,
  STANDARD_TYPES,
  scopeForType,
  type StandardDocument,
} from "./types.ts";

const FRONTMATTER_RE = /^---[ \t]*\n([\s\S]*?)\n---[ \t]*(?:\n([\s\S]*))?$/;

export const REQUIRED_FRONTMATTER_FIELDS = [
  "standard_id",
  "standard_type",
  "title",
  "applies_scope",
  "tags",
  "applies_to_globs",
  "affected_files",
  "severity",
] as const;

const stringList = z.array(z.string().trim().min(1));

const frontmatterSchema = z
  .object({
    standard_id: z.string().trim().min(1),
    standard_type: z.enum(STANDARD_TYPES),
    title: z.string().trim().min(1),
    applies_scope: z.enum(["always", "conditional"]),
    tags: stringList,
    applies_to_globs: stringList,
    affected_files: stringList,
    severity: z.enum(SEVERITIES),
    updated_at: z.union([z.string().trim().min(1), z.date()]).optional(),
    language: z.string().optional(),
    repo: z.string().optional(),
    team: z.string().optional(),
    postmortem_id: z.string().optional(),
    related_paths: stringList.optional(),
  })
  .superRefine((fm, ctx) => {
    const expected = scopeForType(fm.standard_type);
    if (fm.applies_scope !== expected) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ["applies_scope"],
        message: `standard_type '${fm.standard_type}' requires applies_scope '${expected}', got '${fm.applies_scope}'`,
      });
    }
  });

export type StandardFrontmatter = z.infer<typeof frontmatterSchema>;

/** Normalize a repository-relative path the way changed-file lists report them. */
export function normalizeRepoPath(path: string): string {
  return path.trim().replace(/\\/g, "/").replace(/^(\.\/)+/, "");
}

function toDateString(value: string | Date): string {
  return value instanceof Date ? value.toISOString().slice(0, 10) : value;
}

/**
 * Split a markdown document into its YAML frontmatter block and body.
 * Returns null when the document does not open with a `---` block.
 */
export function splitFrontmatter(raw: string): { frontmatter: string; body: string } | null {
  const text = raw.replace(/^\uFEFF/, "").replace(/\r\n?/g, "\n");
  const match = FRONTMATTER_RE.exec(text);
  if (!match) return null;
  return { frontmatter: match[1] ?? "", body: (match[2] ?? "").trim() };
}

/**
 * Parse one standards markdown file into a StandardDocument.
 *
 * Frontmatter is validated against a fixed shape: a missing or mistyped
 * required field, an unknown enum value, or a scope that contradicts the
 * standard type throws StandardsIndexError. Nothing is defaulted except
 * `updated_at`, which falls back to `opts.fallbackUpdatedAt`.
 */
export function parseStandardMarkdown(
  raw: string,
  sourceFile: string,
  opts: { fallbackUpdatedAt?: string } = {},
): StandardDocument {
  const parts = splitFrontmatter(raw);
  if (!parts) {
    throw new StandardsIndexError("frontmatter block is required", { sourceFile });
  }

  let parsed: unknown;
  try {
    parsed = yaml.load(parts.frontmatter);
  } catch (err) {
    throw new StandardsIndexError(
      `frontmatter YAML parse error: ${err instanceof Error ? err.message : String(err)}`,
      { sourceFile, cause: err },
    );
  }

  if (parsed === null || typeof parsed !== "object" || Array.isArray(parsed)) {
    throw new StandardsIndexError("frontmatter must be a key/value mapping", { sourceFile });
  }

  const missing = REQUIRED_FRONTMATTER_FIELDS.filter((field) => !(field in parsed));
  if (missing.length > 0) {
    throw new StandardsIndexError(`missing frontmatter fields [${missing.join(", ")}]`, {
      sourceFile,
      field: missing[0],
    });
  }

  const result = frontmatterSchema.safeParse(parsed);
  if (!result.success) {
    const issue = result.error.issues[0];
    const field = issue ? issue.path.join(".") : undefined;
    const detail = result.error.issues
      .map((i) => `${i.path.join(".")}: ${i.message}`)
      .join("; ");
    throw new StandardsIndexError(`invalid frontmatter (${detail})`, { sourceFile, field });
  }

  if (parts.body.length === 0) {
    throw new StandardsIndexError("document body is empty", { sourceFile, field: "body" });
  }

  const fm = result.data;
  const updatedAt = fm.updated_at ?? opts.fallbackUpdatedAt;
  if (updatedAt === undefined) {
    throw new StandardsIndexError("updated_at is missing and no fallback is available", {
      sourceFile,
      field: "updated_at",
    });
  }

  return {
    standardId: fm.standard_id,
    standardType: fm.standard_type,
    appliesScope: fm.applies_scope,
    title: fm.title,
    body: parts.body,
    tags: [...new Set(fm.tags)],
    appliesToGlobs: fm.applies_to_globs,
    affectedFiles: [...new Set(fm.affected_files.map(normalizeRepoPath))],
    severity: fm.severity,
    updatedAt: toDateString(updatedAt),
    sourceFile,
    language: fm.language ?? null,
    repo: fm.repo ?? null,
    team: fm.team ?? null,
    postmortemId: fm.postmortem_id ?? null,
    relatedPaths: fm.related_paths ?? [],
  };
}
