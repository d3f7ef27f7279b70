/**
 * Seller Hub order status filters.
 */

import type { OrderStatusFilter } from "../core/types/platform";

export const SELLER_HUB_ORDERS_URL = "https://www.ebay.com/sh/ord/";

export const ORDER_STATUS_FILTERS: OrderStatusFilter[] = [
  {
    code: "awaiting_shipment",
    filter: "AWAITING_SHIPMENT",
    label: "Awaiting shipment",
  },
  {
    code: "awaiting_payment",
    filter: "AWAITING_PAYMENT",
    label: "Awaiting payment",
  },
  {
    code: "shipped",
    filter: "PAID_SHIPPED",
    label: "Paid and shipped",
  },
  {
    code: "all",
    filter: "ALL_ORDERS",
    label: "All orders",
  },
];

export const DEFAULT_STATUS = "awaiting_shipment";

/**
 * Get all status codes.
 */
export function getStatusCodes(): string[] {
  return ORDER_STATUS_FILTERS.map((s) => s.code);
}
