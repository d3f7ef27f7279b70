/**
 * Plain-text table rendering for console output.
 */

export interface TableOptions {
  /** Longer cells are cut and end with "..." (default: 120). */
  maxColWidth?: number;
}

function fit(text: string, width: number): string {
  const flat = text.replace(/\s+/g, " ");
  if (flat.length <= width) {
    return flat;
  }
  return width > 3 ? `${flat.slice(0, width - 3)}...` : flat.slice(0, width);
}

function isNumeric(text: string): boolean {
  return text !== "" && /^-?\d+(\.\d+)?$/.test(text);
}

/**
 * Render rows as a fixed-width table with a header line. Numeric cells are
 * right-aligned, everything else left-aligned. Columns are separated by two
 * spaces and trailing whitespace is stripped.
 */
export function renderTable(
  columns: string[],
  rows: string[][],
  options: TableOptions = {},
): string {
  const { maxColWidth = 120 } = options;
  if (columns.length === 0) {
    return "";
  }

  const header = columns.map((c) => fit(c, maxColWidth));
  const body = rows.map((row) =>
    columns.map((_, i) => fit(row[i] ?? "", maxColWidth)),
  );

  const widths = header.map((h, i) =>
    Math.max(h.length, ...body.map((row) => row[i].length)),
  );

  const numericColumn = widths.map(
    (_, i) => body.length > 0 && body.every((row) => row[i] === "" || isNumeric(row[i])),
  );

  const formatLine = (cells: string[]): string =>
    cells
      .map((cell, i) =>
        numericColumn[i] ? cell.padStart(widths[i]) : cell.padEnd(widths[i]),
      )
      .join("  ")
      .trimEnd();

  return [formatLine(header), ...body.map(formatLine)].join("\n");
}
