/**
 * Row resolution for item anchors on the Seller Hub orders page.
 *
 * The orders grid has no stable row ids and its nesting changes between
 * releases, so a row is found by walking up from the item link until a node
 * looks like a row: a <tr>, an ARIA row, or an order row/card container.
 */

import type { DocumentNode } from "../../core/dom/node";

export const DEFAULT_MAX_HOPS = 12;

/**
 * Lower-cased tag, class and role of the node under inspection.
 */
export interface RowCandidate {
  tag: string;
  className: string;
  role: string;
}

export interface RowPredicate {
  name: string;
  accepts: (candidate: RowCandidate) => boolean;
}

export const DEFAULT_ROW_PREDICATES: readonly RowPredicate[] = [
  { name: "table-row", accepts: (c) => c.tag === "tr" },
  {
    name: "aria-row",
    accepts: (c) => c.role === "row" || c.role === "rowgroup",
  },
  {
    name: "order-row-or-card",
    accepts: (c) =>
      c.className.includes("order") &&
      (c.className.includes("row") || c.className.includes("card")),
  },
  {
    name: "shui-card",
    accepts: (c) =>
      c.className.includes("shui") && c.className.includes("card"),
  },
];

export interface ResolveRowOptions {
  predicates?: readonly RowPredicate[];
  maxHops?: number;
}

function readCandidate(node: DocumentNode): RowCandidate {
  return {
    tag: node.tagName().toLowerCase(),
    className: (node.attr("class") ?? "").toLowerCase(),
    role: (node.attr("role") ?? "").toLowerCase(),
  };
}

/**
 * Find the row an anchor belongs to.
 *
 * Returns the first node (the anchor included) accepted by a predicate. If a
 * node cannot be read, or its parent lookup fails, the walk stops at the last
 * node that was read. Reaching the top of the tree or running out of hops
 * without a match falls back to the anchor.
 */
export function resolveRow(
  anchor: DocumentNode,
  options: ResolveRowOptions = {},
): DocumentNode {
  const { predicates = DEFAULT_ROW_PREDICATES, maxHops = DEFAULT_MAX_HOPS } =
    options;

  let current = anchor;
  let lastRead = anchor;
  for (let hop = 0; hop < maxHops; hop++) {
    let candidate: RowCandidate;
    try {
      candidate = readCandidate(current);
    } catch {
      return lastRead;
    }
    lastRead = current;

    if (predicates.some((p) => p.accepts(candidate))) {
      return current;
    }

    let parent: DocumentNode | undefined;
    try {
      parent = current.parent();
    } catch {
      return current;
    }
    if (!parent) {
      return anchor;
    }
    current = parent;
  }

  return anchor;
}
