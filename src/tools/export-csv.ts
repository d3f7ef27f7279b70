/**
 * CSV and console output for merged order lines.
 */

import { writeFile } from "fs/promises";
import { homedir } from "os";
import { join } from "path";
import { toCSVWithColumns } from "../core/utils/csv";
import { renderTable, type TableOptions } from "../core/utils/table";
import { formatCell, orderLineCsvColumns, sortRowsForExport } from "./csv-columns";
import type { MergedDataset } from "./merge";

/**
 * Export result returned by export functions.
 */
export interface ExportResult {
  success: boolean;
  filePath: string;
  rowCount: number;
  error?: string;
}

export interface ExportOptions {
  /** Sort by order number, then item id (blanks last). */
  sort?: boolean;
}

/**
 * Render a merged dataset as CSV text: header row of column names, one line
 * per row, no BOM.
 */
export function datasetToCSV(
  dataset: MergedDataset,
  options: ExportOptions = {},
): string {
  const rows = options.sort ? sortRowsForExport(dataset.rows) : dataset.rows;
  return toCSVWithColumns(rows, orderLineCsvColumns(dataset.columns));
}

/**
 * Export order lines to CSV file.
 */
export async function exportOrderLinesCSV(
  dataset: MergedDataset,
  outputPath: string,
  options: ExportOptions = {},
): Promise<ExportResult> {
  try {
    const csv = datasetToCSV(dataset, options);
    await writeFile(outputPath, csv, "utf-8");

    return {
      success: true,
      filePath: outputPath,
      rowCount: dataset.rows.length,
    };
  } catch (error) {
    return {
      success: false,
      filePath: outputPath,
      rowCount: 0,
      error: String(error),
    };
  }
}

/**
 * Render a merged dataset as a console table.
 */
export function formatDatasetTable(
  dataset: MergedDataset,
  options: TableOptions = {},
): string {
  const cells = dataset.rows.map((row) =>
    dataset.columns.map((column) => formatCell(column, row[column])),
  );
  return renderTable(dataset.columns, cells, options);
}

/**
 * Generate default filename for export.
 * Format: ebay-orders-{status}-{date}.csv
 * Example: ebay-orders-awaiting_shipment-2024-12-01.csv
 */
export function generateExportFilename(status: string, date = new Date()): string {
  const day = date.toISOString().split("T")[0];
  return `ebay-orders-${status}-${day}.csv`;
}

/**
 * Get default Downloads directory path.
 */
export function getDefaultDownloadsPath(): string {
  return join(homedir(), "Downloads");
}

/**
 * Generate full output path with default directory.
 */
export function getOutputPath(
  outputPath: string | undefined,
  status: string,
): string {
  if (outputPath) {
    return outputPath;
  }
  return join(getDefaultDownloadsPath(), generateExportFilename(status));
}
