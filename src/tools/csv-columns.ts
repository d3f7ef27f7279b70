/**
 * Column definitions for order line exports.
 */

import type { CSVColumn } from "../core/utils/csv";
import type { TableRow, TableValue } from "./merge";

/**
 * Per-column value formatters. Columns without one are written as-is.
 */
const COLUMN_FORMATTERS: Record<string, (value: TableValue) => string> = {
  price: (value) =>
    typeof value === "number" ? value.toFixed(2) : String(value),
};

/**
 * Text form of one cell: "" for empty values, prices with two decimals.
 */
export function formatCell(column: string, value: TableValue | undefined): string {
  if (value === undefined || value === "") {
    return "";
  }
  const formatter = COLUMN_FORMATTERS[column];
  return formatter ? formatter(value) : String(value);
}

/**
 * CSV columns for a merged dataset. The header is the field name.
 */
export function orderLineCsvColumns(columns: string[]): CSVColumn<TableRow>[] {
  return columns.map((column) => ({
    key: column,
    header: column,
    getValue: (row: TableRow) => formatCell(column, row[column]),
  }));
}

function compareBlankLast(a: string, b: string): number {
  if (a === b) return 0;
  if (a === "") return 1;
  if (b === "") return -1;
  return a < b ? -1 : 1;
}

/**
 * Sort rows by order number, then item id, with blank values last.
 * Returns a new array; rows with equal keys keep their relative order.
 */
export function sortRowsForExport(rows: TableRow[]): TableRow[] {
  const key = (row: TableRow, column: string): string =>
    formatCell(column, row[column]);

  return [...rows].sort(
    (a, b) =>
      compareBlankLast(key(a, "orderNumber"), key(b, "orderNumber")) ||
      compareBlankLast(key(a, "itemId"), key(b, "itemId")),
  );
}
