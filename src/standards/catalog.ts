import type { Logger } from "pino";
import { withTimeout } from "../lib/time-budget.ts";
import { loadStandardDocuments } from "./loader.ts";
import {
  STANDARD_TYPES,
  scopeForType,
  type StandardChunkStore,
  type StandardDocument,
} from "./types.ts";

/**
 * Immutable set of always-scope standards (corporate, team, repository).
 *
 * Passed explicitly into the applicability filter so mandatory rules never
 * depend on a similarity score. Refreshed only by re-indexing and reloading.
 */
export type StandardsCatalog = {
  readonly documents: readonly StandardDocument[];
  readonly size: number;
  has(standardId: string): boolean;
  get(standardId: string): StandardDocument | undefined;
};

export function compareByTypeThenId(a: StandardDocument, b: StandardDocument): number {
  const byType = STANDARD_TYPES.indexOf(a.standardType) - STANDARD_TYPES.indexOf(b.standardType);
  if (byType !== 0) return byType;
  return a.standardId < b.standardId ? -1 : a.standardId > b.standardId ? 1 : 0;
}

/**
 * Build a catalog from documents of any scope; conditional-type documents are
 * left out. Ordered by type (corporate, team, repository) then standard id.
 */
export function createStandardsCatalog(documents: readonly StandardDocument[]): StandardsCatalog {
  const always = documents
    .filter((d) => scopeForType(d.standardType) === "always")
    .map((d) => Object.freeze({ ...d }))
    .sort(compareByTypeThenId);

  const byId = new Map(always.map((d) => [d.standardId, d] as const));
  const frozen = Object.freeze(always);

  return Object.freeze({
    documents: frozen,
    size: frozen.length,
    has: (standardId: string) => byId.has(standardId),
    get: (standardId: string) => byId.get(standardId),
  });
}

/** Load the catalog straight from the standards markdown directory. */
export async function loadCatalogFromDirectory(rootDir: string): Promise<StandardsCatalog> {
  return createStandardsCatalog(await loadStandardDocuments(rootDir));
}

/** Load the catalog from the chunk store, bounded by timeoutMs. */
export async function loadCatalogFromStore(opts: {
  store: StandardChunkStore;
  timeoutMs: number;
  logger: Logger;
}): Promise<StandardsCatalog> {
  const documents = await withTimeout(
    (signal) => opts.store.listAlwaysScopeDocuments({ signal }),
    { timeoutMs: opts.timeoutMs, label: "load standards catalog" },
  );
  const catalog = createStandardsCatalog(documents);
  opts.logger.info({ size: catalog.size }, "Loaded always-scope standards catalog");
  return catalog;
}
