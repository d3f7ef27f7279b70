import { parseOrderShort } from "../utils/fields";

/**
 * One item line of a seller order, as read from the orders page.
 */
export interface OrderLineRecord {
  /** Short order number, e.g. "13984-70927". Derived from orderFull. */
  orderNumber?: string;
  /** Full order number, e.g. "27-13984-70927". */
  orderFull?: string;

  // Item
  itemId: string;
  title: string;
  itemUrl: string;

  // Quantities
  quantitySold?: number;
  quantityAvailable?: number;

  // Pricing
  price?: number;
  /** Price exactly as displayed. */
  priceText?: string;
}

/**
 * Order line tagged with the seller account it came from.
 */
export interface SourcedOrderLine extends OrderLineRecord {
  source: string;
}

/**
 * Fields an order line is built from. orderNumber is not accepted here: it
 * is always derived from orderFull.
 */
export interface OrderLineInput {
  itemId: string;
  title: string;
  itemUrl: string;
  orderFull?: string;
  quantitySold?: number;
  quantityAvailable?: number;
  price?: number;
  priceText?: string;
}

/**
 * Build an order line. Returns undefined without an item id.
 * Absent values are left off the object rather than set to undefined.
 */
export function createOrderLine(
  input: OrderLineInput,
): OrderLineRecord | undefined {
  const itemId = input.itemId.trim();
  if (!itemId) {
    return undefined;
  }

  const record: OrderLineRecord = {
    itemId,
    title: input.title,
    itemUrl: input.itemUrl,
  };

  const orderNumber = parseOrderShort(input.orderFull);
  if (orderNumber && input.orderFull) {
    record.orderNumber = orderNumber;
    record.orderFull = input.orderFull.trim();
  }
  if (input.quantitySold !== undefined) {
    record.quantitySold = input.quantitySold;
  }
  if (input.quantityAvailable !== undefined) {
    record.quantityAvailable = input.quantityAvailable;
  }
  if (input.price !== undefined) {
    record.price = input.price;
  }
  if (input.priceText) {
    record.priceText = input.priceText;
  }

  return record;
}
