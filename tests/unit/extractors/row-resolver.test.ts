/**
 * Row resolution tests.
 */

import { loadDocument } from "../../../src/core/dom/cheerio-document";
import {
  DEFAULT_ROW_PREDICATES,
  resolveRow,
  type RowPredicate,
} from "../../../src/ebay/extractors";
import { StubNode, firstNode } from "../../helpers/nodes";

describe("resolveRow", () => {
  describe("default predicates", () => {
    test("stops at a table row", () => {
      const doc = loadDocument(
        `<table><tr id="row"><td><div><a id="item" href="/itm/1">A</a></div></td></tr></table>`,
      );
      expect(resolveRow(firstNode(doc, "#item")).attr("id")).toBe("row");
    });

    test("stops at an ARIA row or rowgroup", () => {
      const doc = loadDocument(
        `<div role="rowgroup" id="group"><div role="ROW" id="row"><span><a id="item">A</a></span></div></div>`,
      );
      expect(resolveRow(firstNode(doc, "#item")).attr("id")).toBe("row");
    });

    test("stops at an order row or card container, ignoring case", () => {
      const doc = loadDocument(
        `<div class="Order-Card" id="card"><div class="item"><a id="item">A</a></div></div>`,
      );
      expect(resolveRow(firstNode(doc, "#item")).attr("id")).toBe("card");
    });

    test("does not take an order container that is neither row nor card", () => {
      const doc = loadDocument(
        `<div class="order-row" id="row"><div class="order-summary"><a id="item">A</a></div></div>`,
      );
      expect(resolveRow(firstNode(doc, "#item")).attr("id")).toBe("row");
    });

    test("stops at a shui card", () => {
      const doc = loadDocument(
        `<div class="shui-card-body" id="card"><a id="item">A</a></div>`,
      );
      expect(resolveRow(firstNode(doc, "#item")).attr("id")).toBe("card");
    });

    test("returns the anchor itself when it looks like a row", () => {
      const doc = loadDocument(`<div><a role="row" id="item">A</a></div>`);
      const anchor = firstNode(doc, "#item");
      expect(resolveRow(anchor)).toBe(anchor);
    });

    test("falls back to the anchor at the top of the tree", () => {
      const doc = loadDocument(`<div class="promo"><a id="item">A</a></div>`);
      const anchor = firstNode(doc, "#item");
      expect(resolveRow(anchor)).toBe(anchor);
    });

    test("lists the built-in predicates in order", () => {
      expect(DEFAULT_ROW_PREDICATES.map((p) => p.name)).toEqual([
        "table-row",
        "aria-row",
        "order-row-or-card",
        "shui-card",
      ]);
    });
  });

  describe("hop limit", () => {
    const html = `<table><tr id="row"><td><div><a id="item">A</a></div></td></tr></table>`;

    test("falls back to the anchor when the row is out of reach", () => {
      const doc = loadDocument(html);
      const anchor = firstNode(doc, "#item");
      expect(resolveRow(anchor, { maxHops: 3 })).toBe(anchor);
    });

    test("finds the row when it is within reach", () => {
      const doc = loadDocument(html);
      expect(resolveRow(firstNode(doc, "#item"), { maxHops: 4 }).attr("id")).toBe(
        "row",
      );
    });
  });

  test("accepts custom predicates", () => {
    const doc = loadDocument(
      `<section id="sec"><table><tr><td><a id="item">A</a></td></tr></table></section>`,
    );
    const predicates: RowPredicate[] = [
      { name: "section", accepts: (c) => c.tag === "section" },
    ];
    expect(resolveRow(firstNode(doc, "#item"), { predicates }).attr("id")).toBe("sec");
  });

  describe("unreadable nodes", () => {
    test("stops at the last readable node when an ancestor cannot be read", () => {
      const row = new StubNode({ tag: "tr" });
      const broken = new StubNode({ tag: "div", parent: row, failing: ["attr"] });
      const cell = new StubNode({ tag: "span", parent: broken });
      const anchor = new StubNode({ tag: "a", parent: cell });

      expect(resolveRow(anchor)).toBe(cell);
    });

    test("stops at a node whose parent lookup fails", () => {
      const row = new StubNode({ tag: "tr" });
      const cell = new StubNode({ tag: "td", parent: row, failing: ["parent"] });
      const anchor = new StubNode({ tag: "a", parent: cell });

      expect(resolveRow(anchor)).toBe(cell);
    });

    test("returns the anchor when the anchor itself cannot be read", () => {
      const row = new StubNode({ tag: "tr" });
      const anchor = new StubNode({ tag: "a", parent: row, failing: ["tagName"] });

      expect(resolveRow(anchor)).toBe(anchor);
    });
  });
});
