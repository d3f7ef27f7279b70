/**
 * Tests for CSV export and console rendering.
 */

import { mkdtempSync, readFileSync, rmSync } from "fs";
import { homedir, tmpdir } from "os";
import { join } from "path";
import {
  datasetToCSV,
  exportOrderLinesCSV,
  formatDatasetTable,
  generateExportFilename,
  getOutputPath,
  mergeSourceResults,
} from "../../../src/tools";
import { formatCell, sortRowsForExport } from "../../../src/tools/csv-columns";
import type { TableRow } from "../../../src/tools/merge";

const dataset = () =>
  mergeSourceResults([
    {
      source: "main",
      records: [
        {
          orderNumber: "55555-66666",
          orderFull: "31-55555-66666",
          itemId: "888002",
          title: "Garden Hose Reel",
          itemUrl: "https://www.ebay.com/itm/888002",
          price: 5,
          priceText: "US $5.00",
        },
      ],
      errors: [],
    },
    {
      source: "alt",
      records: [
        {
          itemId: "777001",
          title: 'Hinge, "brass"',
          itemUrl: "https://www.ebay.com/itm/777001",
          quantitySold: 3,
          price: 1249.5,
          priceText: "$1,249.50",
        },
      ],
      errors: [],
    },
  ]);

const EXPECTED_CSV = [
  "source,orderNumber,orderFull,itemId,title,itemUrl,quantitySold,quantityAvailable,price,priceText",
  "main,55555-66666,31-55555-66666,888002,Garden Hose Reel,https://www.ebay.com/itm/888002,,,5.00,US $5.00",
  'alt,,,777001,"Hinge, ""brass""",https://www.ebay.com/itm/777001,3,,1249.50,"$1,249.50"',
].join("\n");

describe("export", () => {
  describe("formatCell", () => {
    test("writes prices with two decimals", () => {
      expect(formatCell("price", 5)).toBe("5.00");
      expect(formatCell("price", 19.99)).toBe("19.99");
    });

    test("writes empty values as empty strings", () => {
      expect(formatCell("price", "")).toBe("");
      expect(formatCell("title", undefined)).toBe("");
    });

    test("writes other values as-is", () => {
      expect(formatCell("quantitySold", 0)).toBe("0");
      expect(formatCell("title", "Mug")).toBe("Mug");
    });
  });

  describe("datasetToCSV", () => {
    test("writes a header of column names and one line per row", () => {
      expect(datasetToCSV(dataset())).toBe(EXPECTED_CSV);
    });

    test("keeps the price columns when no record has a price", () => {
      const csv = datasetToCSV(
        mergeSourceResults([
          { source: "main", records: [{ itemId: "9", title: "Mug", itemUrl: "/itm/9" }], errors: [] },
        ]),
      );
      expect(csv.split("\n")).toEqual([
        "source,orderNumber,orderFull,itemId,title,itemUrl,quantitySold,quantityAvailable,price,priceText",
        "main,,,9,Mug,/itm/9,,,,",
      ]);
    });

    test("writes nothing for an empty dataset", () => {
      expect(datasetToCSV(mergeSourceResults([]))).toBe("");
    });

    test("can sort rows with blank order numbers last", () => {
      const lines = datasetToCSV(
        mergeSourceResults([
          { source: "alt", records: [{ itemId: "1", title: "A", itemUrl: "/itm/1" }], errors: [] },
          {
            source: "main",
            records: [
              {
                orderNumber: "55555-66666",
                orderFull: "31-55555-66666",
                itemId: "2",
                title: "B",
                itemUrl: "/itm/2",
              },
            ],
            errors: [],
          },
        ]),
        { sort: true },
      ).split("\n");
      expect(lines).toEqual([
        "source,orderNumber,orderFull,itemId,title,itemUrl,quantitySold,quantityAvailable,price,priceText",
        "main,55555-66666,31-55555-66666,2,B,/itm/2,,,,",
        "alt,,,1,A,/itm/1,,,,",
      ]);
    });
  });

  describe("sortRowsForExport", () => {
    test("orders by order number then item id, blanks last", () => {
      const rows: TableRow[] = [
        { orderNumber: "", itemId: "5" },
        { orderNumber: "200", itemId: "9" },
        { orderNumber: "100", itemId: "7" },
        { orderNumber: "100", itemId: "3" },
        { orderNumber: "", itemId: "" },
        { orderNumber: "", itemId: "4" },
      ];
      expect(sortRowsForExport(rows).map((r) => `${r.orderNumber}/${r.itemId}`)).toEqual([
        "100/3",
        "100/7",
        "200/9",
        "/4",
        "/5",
        "/",
      ]);
      expect(rows[0]).toEqual({ orderNumber: "", itemId: "5" });
    });
  });

  describe("exportOrderLinesCSV", () => {
    let dir: string;

    beforeEach(() => {
      dir = mkdtempSync(join(tmpdir(), "seller-orders-export-"));
    });

    afterEach(() => {
      rmSync(dir, { recursive: true, force: true });
    });

    test("writes the CSV file", async () => {
      const path = join(dir, "orders.csv");
      const result = await exportOrderLinesCSV(dataset(), path);
      expect(result).toEqual({ success: true, filePath: path, rowCount: 2 });
      expect(readFileSync(path, "utf-8")).toBe(EXPECTED_CSV);
    });

    test("reports a write failure instead of throwing", async () => {
      const path = join(dir, "missing", "orders.csv");
      const result = await exportOrderLinesCSV(dataset(), path);
      expect(result.success).toBe(false);
      expect(result.rowCount).toBe(0);
      expect(result.error).toContain("ENOENT");
    });
  });

  describe("formatDatasetTable", () => {
    test("renders formatted cells", () => {
      const table = formatDatasetTable(
        mergeSourceResults([
          {
            source: "main",
            records: [{ itemId: "9", title: "Mug", itemUrl: "/itm/9", price: 5 }],
            errors: [],
          },
        ]),
      );
      expect(table.split("\n")).toEqual([
        "source  orderNumber  orderFull  itemId  title  itemUrl  quantitySold  quantityAvailable  price  priceText",
        "main                                 9  Mug    /itm/9                                     5.00",
      ]);
    });
  });

  describe("output paths", () => {
    test("names the file after the status and day", () => {
      expect(generateExportFilename("shipped", new Date("2024-12-01T10:00:00Z"))).toBe(
        "ebay-orders-shipped-2024-12-01.csv",
      );
    });

    test("keeps an explicit output path", () => {
      expect(getOutputPath("/exports/orders.csv", "all")).toBe("/exports/orders.csv");
    });

    test("defaults to the Downloads directory", () => {
      const path = getOutputPath(undefined, "all");
      expect(path.startsWith(join(homedir(), "Downloads"))).toBe(true);
      expect(path).toMatch(/ebay-orders-all-\d{4}-\d{2}-\d{2}\.csv$/);
    });
  });
});
