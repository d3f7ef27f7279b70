/**
 * Tool implementations barrel export.
 */

export {
  fetchSellerOrders,
  type FetchOrdersOptions,
  type FetchOrdersResult,
  type SnapshotProvider,
  type SourceRunResult,
} from "./fetch-orders";

export {
  mergeSourceResults,
  orderColumns,
  PREFERRED_COLUMNS,
  type MergedDataset,
  type SourceResult,
  type TableRow,
} from "./merge";

export {
  datasetToCSV,
  exportOrderLinesCSV,
  formatDatasetTable,
  generateExportFilename,
  getOutputPath,
  type ExportResult,
} from "./export-csv";
