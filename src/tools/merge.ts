/**
 * Merging of per-account results into one table.
 */

import type {
  OrderLineRecord,
  SourcedOrderLine,
} from "../core/types/order-line";

export type TableValue = string | number;
export type TableRow = Record<string, TableValue>;

/**
 * Records of every account in one uniform table.
 */
export interface MergedDataset {
  columns: string[];
  rows: TableRow[];
  records: SourcedOrderLine[];
}

/**
 * Outcome of one account's run.
 */
export interface SourceResult {
  source: string;
  records: OrderLineRecord[];
  errors: string[];
}

/**
 * Fixed column order. Every merged table has these columns, even when no
 * record fills them. Other fields go after these, in the order they were
 * first seen.
 */
export const PREFERRED_COLUMNS: readonly string[] = [
  "source",
  "orderNumber",
  "orderFull",
  "itemId",
  "title",
  "itemUrl",
  "quantitySold",
  "quantityAvailable",
  "price",
  "priceText",
];

/**
 * Column list for a set of field names: all fixed columns first, then the
 * extra fields.
 */
export function orderColumns(fields: Iterable<string>): string[] {
  const extra = [...new Set(fields)].filter((c) => !PREFERRED_COLUMNS.includes(c));
  return [...PREFERRED_COLUMNS, ...extra];
}

function presentFields(record: SourcedOrderLine): TableRow {
  const row: TableRow = {};
  for (const [key, value] of Object.entries(record)) {
    if (typeof value === "string" || typeof value === "number") {
      row[key] = value;
    }
  }
  return row;
}

/**
 * Tag every record with its account, concatenate in account order and
 * backfill missing fields with "" so every row has the same columns.
 */
export function mergeSourceResults(results: SourceResult[]): MergedDataset {
  const records: SourcedOrderLine[] = results.flatMap((result) =>
    result.records.map((record) => ({ source: result.source, ...record })),
  );

  const present = records.map(presentFields);
  const columns = orderColumns(present.flatMap((row) => Object.keys(row)));

  const rows = present.map((row) => {
    const filled: TableRow = {};
    for (const column of columns) {
      filled[column] = row[column] ?? "";
    }
    return filled;
  });

  return { columns, rows, records };
}
