import { describe, test, expect, beforeEach, afterEach, vi } from "vitest";
import { mkdtemp, rm, writeFile } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";
import type { Logger } from "pino";
import { StandardsIndexError } from "../lib/errors.ts";
import { indexStandards } from "./indexer.ts";
import type {
  EmbeddingProvider,
  StandardChunk,
  StandardChunkStore,
} from "./types.ts";

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

type MemoryStore = StandardChunkStore & { chunks: Map<string, StandardChunk>; upserts: number };

function createMemoryStore(): MemoryStore {
  const chunks = new Map<string, StandardChunk>();
  const store: MemoryStore = {
    chunks,
    upserts: 0,
    async upsertChunks(batch: StandardChunk[]) {
      store.upserts++;
      for (const chunk of batch) chunks.set(chunk.chunkId, chunk);
    },
    async pruneStandardChunks(standardId: string, keep: string[]) {
      let removed = 0;
      for (const [id, chunk] of chunks) {
        if (chunk.parentStandardId === standardId && !keep.includes(id)) {
          chunks.delete(id);
          removed++;
        }
      }
      return removed;
    },
    async pruneStandards(keep: string[]) {
      let removed = 0;
      for (const [id, chunk] of chunks) {
        if (!keep.includes(chunk.parentStandardId)) {
          chunks.delete(id);
          removed++;
        }
      }
      return removed;
    },
    async searchByEmbedding() {
      return [];
    },
    async searchByFullText() {
      return [];
    },
    async listAlwaysScopeDocuments() {
      return [];
    },
    async countChunks() {
      return chunks.size;
    },
  };
  return store;
}

const embeddingProvider: EmbeddingProvider = {
  async generate() {
    return { embedding: new Float32Array([0.1, 0.2]), model: "test-model", dimensions: 2 };
  },
  async generateBatch(texts) {
    return texts.map(() => ({ embedding: new Float32Array([0.1, 0.2]), model: "test-model", dimensions: 2 }));
  },
  model: "test-model",
  dimensions: 2,
};

function standard(id: string, body: string): string {
  return `---
standard_id: ${id}
standard_type: repository
title: Rule ${id}
applies_scope: always
tags: [style]
applies_to_globs: []
affected_files: []
severity: low
updated_at: "2024-02-01"
---

${body}
`;
}

describe("indexStandards", () => {
  let root: string;

  beforeEach(async () => {
    root = await mkdtemp(join(tmpdir(), "standards-index-"));
  });

  afterEach(async () => {
    await rm(root, { recursive: true, force: true });
  });

  test("indexes every chunk with an embedding", async () => {
    await writeFile(join(root, "a.md"), standard("repo-a", "Use tabs."));
    await writeFile(join(root, "b.md"), standard("repo-b", "Prefer const."));
    const store = createMemoryStore();

    const result = await indexStandards({ rootDir: root, store, embeddingProvider, logger: mockLogger });

    expect(result.totalDocuments).toBe(2);
    expect(result.totalChunks).toBe(2);
    expect(result.totalEmbeddings).toBe(2);
    expect(result.dryRun).toBe(false);
    expect(store.chunks.size).toBe(2);
    for (const chunk of store.chunks.values()) {
      expect(chunk.embedding).toEqual(new Float32Array([0.1, 0.2]));
    }
  });

  test("re-indexing unchanged documents keeps the same chunk ids", async () => {
    await writeFile(join(root, "a.md"), standard("repo-a", "Use tabs.\n\nWrap at 100 columns."));
    const store = createMemoryStore();

    await indexStandards({ rootDir: root, store, embeddingProvider, logger: mockLogger });
    const firstIds = [...store.chunks.keys()].sort();
    const second = await indexStandards({ rootDir: root, store, embeddingProvider, logger: mockLogger });

    expect([...store.chunks.keys()].sort()).toEqual(firstIds);
    expect(second.prunedChunks).toBe(0);
  });

  test("an edited document replaces its old chunks", async () => {
    await writeFile(join(root, "a.md"), standard("repo-a", "Use tabs."));
    const store = createMemoryStore();
    await indexStandards({ rootDir: root, store, embeddingProvider, logger: mockLogger });
    const [oldId] = [...store.chunks.keys()];

    await writeFile(join(root, "a.md"), standard("repo-a", "Use spaces."));
    const result = await indexStandards({ rootDir: root, store, embeddingProvider, logger: mockLogger });

    expect(result.prunedChunks).toBe(1);
    expect(store.chunks.size).toBe(1);
    expect(store.chunks.has(oldId ?? "")).toBe(false);
    expect([...store.chunks.values()][0]!.text).toBe("Use spaces.");
  });

  test("standards removed from disk are pruned", async () => {
    await writeFile(join(root, "a.md"), standard("repo-a", "Use tabs."));
    await writeFile(join(root, "b.md"), standard("repo-b", "Prefer const."));
    const store = createMemoryStore();
    await indexStandards({ rootDir: root, store, embeddingProvider, logger: mockLogger });

    await rm(join(root, "b.md"));
    const result = await indexStandards({ rootDir: root, store, embeddingProvider, logger: mockLogger });

    expect(result.prunedChunks).toBe(1);
    expect([...store.chunks.values()].map((c) => c.parentStandardId)).toEqual(["repo-a"]);
  });

  test("a malformed document aborts before any write", async () => {
    await writeFile(join(root, "a.md"), standard("repo-a", "Use tabs."));
    await writeFile(join(root, "b.md"), standard("repo-b", "x").replace("severity: low", "severity: extreme"));
    const store = createMemoryStore();

    await expect(
      indexStandards({ rootDir: root, store, embeddingProvider, logger: mockLogger }),
    ).rejects.toBeInstanceOf(StandardsIndexError);
    expect(store.upserts).toBe(0);
  });

  test("an empty directory is an error, not a wipe", async () => {
    const store = createMemoryStore();
    await expect(
      indexStandards({ rootDir: root, store, embeddingProvider, logger: mockLogger }),
    ).rejects.toThrow(`${root}: no standards documents found`);
  });

  test("dry run chunks without touching the store", async () => {
    await writeFile(join(root, "a.md"), standard("repo-a", "Use tabs."));
    const store = createMemoryStore();
    const generateBatch = vi.spyOn(embeddingProvider, "generateBatch");

    const result = await indexStandards({
      rootDir: root,
      store,
      embeddingProvider,
      logger: mockLogger,
      dryRun: true,
    });

    expect(result).toMatchObject({ totalDocuments: 1, totalChunks: 1, totalEmbeddings: 0, dryRun: true });
    expect(store.upserts).toBe(0);
    expect(generateBatch).not.toHaveBeenCalled();
    generateBatch.mockRestore();
  });

  test("embeds each standard's chunks in one batch request", async () => {
    await writeFile(join(root, "a.md"), standard("repo-a", "Use tabs.\n\nWrap at 100 columns."));
    const store = createMemoryStore();
    const generateBatch = vi.spyOn(embeddingProvider, "generateBatch");

    await indexStandards({ rootDir: root, store, embeddingProvider, logger: mockLogger, maxChunkChars: 20 });

    expect(generateBatch).toHaveBeenCalledTimes(1);
    expect(generateBatch).toHaveBeenCalledWith(
      ["Rule repo-a (repository): Use tabs.", "Rule repo-a (repository): Wrap at 100 columns."],
      "document",
    );
    generateBatch.mockRestore();
  });

  test("chunks are stored without vectors when embedding fails open", async () => {
    await writeFile(join(root, "a.md"), standard("repo-a", "Use tabs."));
    const store = createMemoryStore();
    const nullProvider: EmbeddingProvider = {
      async generate() {
        return null;
      },
      async generateBatch(texts) {
        return texts.map(() => null);
      },
      model: "none",
      dimensions: 0,
    };

    const result = await indexStandards({ rootDir: root, store, embeddingProvider: nullProvider, logger: mockLogger });

    expect(result.totalEmbeddings).toBe(0);
    expect([...store.chunks.values()][0]!.embedding).toBeNull();
  });
});
