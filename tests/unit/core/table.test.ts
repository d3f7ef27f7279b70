/**
 * Tests for console table rendering.
 */

import { renderTable } from "../../../src/core/utils/table";

describe("renderTable", () => {
  test("pads text left and numbers right", () => {
    const table = renderTable(
      ["itemId", "title", "price"],
      [
        ["123456", "Widget", "19.99"],
        ["7", "Garden Hose Reel", "5.00"],
      ],
    );
    expect(table.split("\n")).toEqual([
      "itemId  title             price",
      "123456  Widget            19.99",
      "     7  Garden Hose Reel   5.00",
    ]);
  });

  test("treats empty cells as numeric-compatible", () => {
    const table = renderTable(["qty", "name"], [["3", "a"], ["", "b"]]);
    expect(table.split("\n")).toEqual(["qty  name", "  3  a", "     b"]);
  });

  test("left-aligns a column with any non-numeric cell", () => {
    const table = renderTable(["v"], [["10"], ["n/a"]]);
    expect(table.split("\n")).toEqual(["v", "10", "n/a"]);
  });

  test("cuts long cells and flattens line breaks", () => {
    const table = renderTable(["title"], [["Brass\nHinge Set"]], {
      maxColWidth: 8,
    });
    expect(table.split("\n")).toEqual(["title", "Brass..."]);
  });

  test("renders only the header without rows", () => {
    expect(renderTable(["a", "bb"], [])).toBe("a  bb");
  });

  test("returns an empty string without columns", () => {
    expect(renderTable([], [["x"]])).toBe("");
  });
});
