/**
 * Order line extraction from a Seller Hub orders page snapshot.
 *
 * Every item link on the page is a candidate. For each one, in page order:
 * derive the item id, skip duplicates, resolve the enclosing row, read the
 * row's fields, and build a record. Records without any textual identity
 * (phantom rows) and records rejected by the keyword filter are dropped.
 * Processing stops as soon as maxItems records have been produced.
 */

import type { DocumentNode, DocumentSnapshot } from "../../core/dom/node";
import {
  createOrderLine,
  type OrderLineRecord,
} from "../../core/types/order-line";
import { createDebugLogger } from "../../core/utils/debug";
import { getAttribute, getText } from "../../core/utils/extraction";
import {
  isOrderFull,
  parseItemIdFromUrl,
  parsePrice,
  parseQuantityAvailable,
  parseQuantitySold,
} from "../../core/utils/fields";
import { extractRowFields, type RawOrderLineFields } from "./row-fields";
import { resolveRow, type RowPredicate } from "./row-resolver";

const debug = createDebugLogger("order-lines");

export const ITEM_LINK_SELECTOR = 'a[href*="/itm/"]';
export const DEFAULT_MAX_ITEMS = 500;

/**
 * Keyword filter on item titles.
 */
export interface ContentFilter {
  enabled: boolean;
  keywords: string[];
}

export interface OrderLineExtractionOptions {
  /** Stop after this many records (default: 500). */
  maxItems?: number;
  contentFilter?: ContentFilter;
  rowPredicates?: readonly RowPredicate[];
  maxHops?: number;
}

export interface OrderLineExtractionStats {
  anchorsFound: number;
  missingItemId: number;
  duplicates: number;
  phantoms: number;
  filteredOut: number;
  failed: number;
  /** True when maxItems stopped the run before all anchors were seen. */
  bounded: boolean;
}

export interface OrderLineExtractionResult {
  records: OrderLineRecord[];
  stats: OrderLineExtractionStats;
}

/**
 * Record plus the raw text it was built from.
 */
interface ExtractedLine {
  record: OrderLineRecord;
  raw: RawOrderLineFields;
}

type PhantomRule = (line: ExtractedLine) => boolean;

const isBlank = (value: string | undefined): boolean => !value;

/**
 * A line is a phantom if any rule matches.
 */
const PHANTOM_RULES: readonly PhantomRule[] = [
  // no signal at all beyond the item id
  ({ record, raw }) =>
    isBlank(record.title) &&
    isBlank(record.orderFull) &&
    isBlank(record.orderNumber) &&
    isBlank(record.priceText) &&
    isBlank(raw.quantitySoldText) &&
    isBlank(raw.quantityAvailableText),
  // price or quantity without a title or order number is still noise
  ({ record }) =>
    isBlank(record.title) &&
    isBlank(record.orderFull) &&
    isBlank(record.orderNumber),
];

export function isPhantomLine(
  record: OrderLineRecord,
  raw: RawOrderLineFields = {},
): boolean {
  return PHANTOM_RULES.some((rule) => rule({ record, raw }));
}

function escapeRegExp(text: string): string {
  return text.replace(/[.*+?^${}()|[\]\\]/g, "\\$&");
}

/**
 * Build a title matcher for a content filter. Returns null when the filter
 * lets everything through.
 */
export function buildKeywordMatcher(
  filter: ContentFilter | undefined,
): RegExp | null {
  if (!filter?.enabled) {
    return null;
  }
  const keywords = filter.keywords
    .map((k) => k.trim())
    .filter((k) => k.length > 0)
    .map(escapeRegExp);
  if (keywords.length === 0) {
    return null;
  }
  return new RegExp(`\\b(?:${keywords.join("|")})\\b`, "i");
}

function resolveItemUrl(href: string, baseUrl: string | undefined): string {
  if (!baseUrl) {
    return href;
  }
  try {
    return new URL(href, baseUrl).toString();
  } catch {
    return href;
  }
}

function buildLine(
  anchor: DocumentNode,
  itemId: string,
  title: string,
  href: string,
  snapshot: DocumentSnapshot,
  options: OrderLineExtractionOptions,
): ExtractedLine | undefined {
  const row = resolveRow(anchor, {
    predicates: options.rowPredicates,
    maxHops: options.maxHops,
  });
  const raw = extractRowFields(row);
  const orderFull = isOrderFull(raw.orderText) ? raw.orderText : undefined;

  const record = createOrderLine({
    itemId,
    title,
    itemUrl: resolveItemUrl(href, snapshot.url),
    orderFull,
    quantitySold: parseQuantitySold(raw.quantitySoldText),
    quantityAvailable: parseQuantityAvailable(raw.quantityAvailableText),
    price: parsePrice(raw.priceText),
    priceText: raw.priceText,
  });

  return record ? { record, raw } : undefined;
}

/**
 * Extract order lines from one orders page snapshot.
 *
 * The dedup set lives for one call only, so separate calls (one per seller
 * account) never affect each other.
 */
export function extractOrderLines(
  snapshot: DocumentSnapshot,
  options: OrderLineExtractionOptions = {},
): OrderLineExtractionResult {
  const maxItems = options.maxItems ?? DEFAULT_MAX_ITEMS;
  const matcher = buildKeywordMatcher(options.contentFilter);

  const stats: OrderLineExtractionStats = {
    anchorsFound: 0,
    missingItemId: 0,
    duplicates: 0,
    phantoms: 0,
    filteredOut: 0,
    failed: 0,
    bounded: false,
  };
  const records: OrderLineRecord[] = [];
  const seen = new Set<string>();

  let anchors: DocumentNode[];
  try {
    anchors = snapshot.queryAll(ITEM_LINK_SELECTOR);
  } catch (e) {
    debug(`Anchor discovery failed: ${e}`);
    anchors = [];
  }
  stats.anchorsFound = anchors.length;
  debug(`Found ${anchors.length} item anchors`);

  if (maxItems <= 0) {
    stats.bounded = anchors.length > 0;
    return { records, stats };
  }

  for (let i = 0; i < anchors.length; i++) {
    if (records.length >= maxItems) {
      stats.bounded = true;
      debug(`Reached maxItems=${maxItems}, skipping ${anchors.length - i} anchors`);
      break;
    }

    const anchor = anchors[i];
    try {
      const href = getAttribute(anchor, "href");
      const title = getText(anchor);

      const itemId = parseItemIdFromUrl(href);
      if (!itemId) {
        stats.missingItemId++;
        continue;
      }

      // The same item is linked more than once per row (image and title)
      const key = JSON.stringify([itemId, title]);
      if (seen.has(key)) {
        stats.duplicates++;
        continue;
      }
      seen.add(key);

      const line = buildLine(anchor, itemId, title, href, snapshot, options);
      if (!line) {
        stats.missingItemId++;
        continue;
      }

      if (isPhantomLine(line.record, line.raw)) {
        stats.phantoms++;
        continue;
      }

      if (matcher && !matcher.test(line.record.title)) {
        stats.filteredOut++;
        continue;
      }

      records.push(line.record);
    } catch (e) {
      stats.failed++;
      debug(`Skipping anchor ${i}: ${e}`);
    }
  }

  debug(
    `Extracted ${records.length} order lines ` +
      `(duplicates=${stats.duplicates}, phantoms=${stats.phantoms}, ` +
      `filtered=${stats.filteredOut}, failed=${stats.failed})`,
  );

  return { records, stats };
}
