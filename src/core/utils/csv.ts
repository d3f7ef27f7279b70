/**
 * CSV generation utilities.
 */

const NEEDS_QUOTING = /[",\r\n]/;

/**
 * Quote a cell when it holds a delimiter, a quote or a line break.
 * Embedded quotes are doubled.
 */
export function escapeCSVValue(value: unknown): string {
  if (value === null || value === undefined) {
    return "";
  }

  const str = String(value);
  return NEEDS_QUOTING.test(str) ? `"${str.replace(/"/g, '""')}"` : str;
}

/**
 * Column definition for CSV export.
 */
export interface CSVColumn<T> {
  key: string;
  header: string;
  getValue: (item: T) => unknown;
}

function csvLine(cells: unknown[]): string {
  return cells.map(escapeCSVValue).join(",");
}

/**
 * Header line followed by one line per item, joined with "\n" and without a
 * trailing newline. Returns an empty string when there is nothing to write.
 */
export function toCSVWithColumns<T>(data: T[], columns: CSVColumn<T>[]): string {
  if (data.length === 0 || columns.length === 0) {
    return "";
  }

  const header = csvLine(columns.map((col) => col.header));
  const rows = data.map((item) => csvLine(columns.map((col) => col.getValue(item))));
  return [header, ...rows].join("\n");
}
