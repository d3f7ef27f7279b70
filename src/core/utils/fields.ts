/**
 * Field parsers for raw text pulled out of order rows.
 * All of them return undefined instead of throwing.
 */

/** Full order number as shown by Seller Hub, e.g. 27-13984-70927 */
export const ORDER_FULL_PATTERN = /^\d{2}-\d{5}-\d{5}$/;

const AVAILABLE_PATTERN = /\((\d+)\s+available\)/i;
const PRICE_PATTERN = /[-+]?[$£€]?\s*(\d+(?:\.\d{1,2})?)/;
const ITEM_PATH_PATTERN = /\/itm\/(\d+)/;

/**
 * Collapse runs of whitespace and trim.
 */
export function normalizeText(text: string | null | undefined): string {
  return (text ?? "").replace(/\s+/g, " ").trim();
}

/**
 * "(2 available)" -> 2
 */
export function parseQuantityAvailable(
  text: string | null | undefined,
): number | undefined {
  const match = (text ?? "").match(AVAILABLE_PATTERN);
  return match ? parseInt(match[1], 10) : undefined;
}

/**
 * Quantity sold is rendered as a bare number.
 */
export function parseQuantitySold(
  text: string | null | undefined,
): number | undefined {
  const trimmed = normalizeText(text);
  return /^\d+$/.test(trimmed) ? parseInt(trimmed, 10) : undefined;
}

/**
 * "$1,234.50" -> 1234.5
 */
export function parsePrice(text: string | null | undefined): number | undefined {
  if (!text) {
    return undefined;
  }
  const match = text.replace(/,/g, "").match(PRICE_PATTERN);
  if (!match) {
    return undefined;
  }
  const value = parseFloat(match[1]);
  return Number.isFinite(value) ? value : undefined;
}

/**
 * https://www.ebay.com/itm/356885714929?hash=x -> 356885714929
 *
 * Only the path is searched, so an /itm/ inside a query parameter (tracking
 * redirects do this) is ignored.
 */
export function parseItemIdFromUrl(
  href: string | null | undefined,
): string | undefined {
  if (!href) {
    return undefined;
  }

  let path: string;
  try {
    path = new URL(href, "https://www.ebay.com").pathname;
  } catch {
    path = href.split(/[?#]/)[0];
  }

  const match = path.match(ITEM_PATH_PATTERN);
  return match ? match[1] : undefined;
}

export function isOrderFull(text: string | null | undefined): boolean {
  return ORDER_FULL_PATTERN.test((text ?? "").trim());
}

/**
 * "27-13984-70927" -> "13984-70927"
 */
export function parseOrderShort(
  fullText: string | null | undefined,
): string | undefined {
  const trimmed = (fullText ?? "").trim();
  if (!ORDER_FULL_PATTERN.test(trimmed)) {
    return undefined;
  }
  const [, middle, last] = trimmed.split("-");
  return `${middle}-${last}`;
}
