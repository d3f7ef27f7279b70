/**
 * Raw field extraction from a resolved order row.
 *
 * Each field has an ordered list of fallback rules; the first rule that finds
 * an element with acceptable text wins. Fields are read independently, so a
 * missing or stale element only costs that one field.
 *
 * Expected markup (2024+ Seller Hub grid):
 *   <a href="/mesh/ord/details?orderid=...">27-13984-70927</a>
 *   <strong>1</strong>
 *   <span class="available-quantity">(1 available)</span>
 *   <div class="price-column-item">$19.99</div>
 */

import type { DocumentNode } from "../../core/dom/node";
import { type FieldRule, firstMatchingRule } from "../../core/utils/extraction";
import { isOrderFull } from "../../core/utils/fields";

const hasSeparator = (text: string): boolean =>
  text.length > 0 && text.includes("-");

export const ORDER_TEXT_RULES: readonly FieldRule[] = [
  {
    name: "order-details-link",
    selector: 'a[href*="/mesh/ord/details"]',
    candidate: hasSeparator,
    validate: isOrderFull,
  },
  {
    name: "any-link-with-separator",
    selector: "a",
    candidate: hasSeparator,
    validate: isOrderFull,
  },
];

export const AVAILABLE_QUANTITY_SELECTOR = '[class*="available-quantity"]';

export const QUANTITY_AVAILABLE_RULES: readonly FieldRule[] = [
  { name: "available-quantity", selector: AVAILABLE_QUANTITY_SELECTOR },
];

/**
 * Evaluated against the available-quantity element, not the row.
 */
export const QUANTITY_SOLD_RULES: readonly FieldRule[] = [
  {
    name: "previous-sibling-strong",
    locate: (available) => {
      const previous = available.previousSibling();
      return previous && previous.matches("strong") ? previous : undefined;
    },
  },
  {
    name: "preceding-strong",
    locate: (available) => available.preceding("strong"),
  },
];

export const PRICE_RULES: readonly FieldRule[] = [
  { name: "price-column", selector: "div.price-column-item" },
];

/**
 * Unparsed field text. Missing keys mean nothing usable was found.
 */
export interface RawOrderLineFields {
  orderText?: string;
  quantityAvailableText?: string;
  quantitySoldText?: string;
  priceText?: string;
}

/**
 * Extract the raw text of every field from a row.
 */
export function extractRowFields(row: DocumentNode): RawOrderLineFields {
  const fields: RawOrderLineFields = {};

  const order = firstMatchingRule(row, ORDER_TEXT_RULES);
  if (order) {
    fields.orderText = order.text;
  }

  const available = firstMatchingRule(row, QUANTITY_AVAILABLE_RULES);
  if (available) {
    if (available.text) {
      fields.quantityAvailableText = available.text;
    }
    const sold = firstMatchingRule(available.node, QUANTITY_SOLD_RULES);
    if (sold?.text) {
      fields.quantitySoldText = sold.text;
    }
  }

  const price = firstMatchingRule(row, PRICE_RULES);
  if (price?.text) {
    fields.priceText = price.text;
  }

  return fields;
}

