/**
 * eBay extractors barrel export.
 */

// Row resolution
export {
  resolveRow,
  DEFAULT_ROW_PREDICATES,
  DEFAULT_MAX_HOPS,
} from "./row-resolver";
export type { RowCandidate, RowPredicate, ResolveRowOptions } from "./row-resolver";

// Field extraction
export {
  extractRowFields,
  ORDER_TEXT_RULES,
  QUANTITY_AVAILABLE_RULES,
  QUANTITY_SOLD_RULES,
  PRICE_RULES,
} from "./row-fields";
export type { RawOrderLineFields } from "./row-fields";

// Order line pipeline
export {
  extractOrderLines,
  isPhantomLine,
  buildKeywordMatcher,
  ITEM_LINK_SELECTOR,
  DEFAULT_MAX_ITEMS,
} from "./order-lines";
export type {
  ContentFilter,
  OrderLineExtractionOptions,
  OrderLineExtractionResult,
  OrderLineExtractionStats,
} from "./order-lines";
