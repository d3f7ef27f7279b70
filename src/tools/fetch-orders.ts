/**
 * Order fetching orchestration across seller accounts.
 * Each account gets its own snapshot and extraction run; results are merged
 * once every run has finished.
 */

import type { DocumentSnapshot } from "../core/dom/node";
import type { SourceConfig } from "../core/config";
import { createDebugLogger } from "../core/utils/debug";
import {
  extractOrderLines,
  type ContentFilter,
  type OrderLineExtractionStats,
} from "../ebay/extractors/order-lines";
import { mergeSourceResults, type MergedDataset, type SourceResult } from "./merge";

const debug = createDebugLogger("fetch-orders");

/**
 * Produces the orders page snapshot for one account. The live implementation
 * drives a browser; tests pass pre-built documents.
 */
export type SnapshotProvider = (
  source: SourceConfig,
  status: string,
) => Promise<DocumentSnapshot>;

/**
 * Options for fetching orders.
 */
export interface FetchOrdersOptions {
  status: string;
  sources: SourceConfig[];
  maxItems?: number;
  contentFilter?: ContentFilter;
  /** Run accounts concurrently. Each account must have its own profile. */
  parallel?: boolean;
  onProgress?: (message: string, current: number, total: number) => void;
}

export interface SourceRunResult extends SourceResult {
  stats?: OrderLineExtractionStats;
}

/**
 * Result of fetching orders.
 */
export interface FetchOrdersResult {
  sources: SourceRunResult[];
  dataset: MergedDataset;
  errors: string[];
}

async function runSource(
  source: SourceConfig,
  options: FetchOrdersOptions,
  provider: SnapshotProvider,
): Promise<SourceRunResult> {
  let snapshot: DocumentSnapshot;
  try {
    snapshot = await provider(source, options.status);
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    debug(`[${source.label}] Snapshot failed: ${message}`);
    return { source: source.label, records: [], errors: [message] };
  }

  const { records, stats } = extractOrderLines(snapshot, {
    maxItems: options.maxItems,
    contentFilter: options.contentFilter,
  });
  debug(`[${source.label}] ${records.length} order lines`);

  return { source: source.label, records, errors: [], stats };
}

/**
 * Fetch order lines for every configured account and merge them.
 * Results keep the account order of options.sources.
 */
export async function fetchSellerOrders(
  options: FetchOrdersOptions,
  provider: SnapshotProvider,
): Promise<FetchOrdersResult> {
  const { sources, parallel = false, onProgress } = options;
  const total = sources.length;

  let results: SourceRunResult[];
  if (parallel) {
    onProgress?.(`Fetching ${total} accounts in parallel...`, 0, total);
    let done = 0;
    results = await Promise.all(
      sources.map(async (source) => {
        const result = await runSource(source, options, provider);
        done++;
        onProgress?.(`Finished ${source.label}`, done, total);
        return result;
      }),
    );
  } else {
    results = [];
    for (const [index, source] of sources.entries()) {
      onProgress?.(`Fetching ${source.label}...`, index, total);
      results.push(await runSource(source, options, provider));
    }
    onProgress?.("Done", total, total);
  }

  const errors = results.flatMap((r) =>
    r.errors.map((e) => `${r.source}: ${e}`),
  );

  return {
    sources: results,
    dataset: mergeSourceResults(results),
    errors,
  };
}
