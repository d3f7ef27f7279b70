/**
 * Hand-built DocumentNode stand-ins for exercising failure paths that a
 * parsed HTML document never produces.
 */

import type { DocumentNode, DocumentSnapshot } from "../../src/core/dom/node";

export type NodeMethod = keyof DocumentNode;

export interface StubNodeInit {
  tag: string;
  attrs?: Record<string, string>;
  text?: string;
  parent?: DocumentNode;
  /** Methods that throw when called. */
  failing?: NodeMethod[];
}

function stale(method: string): Error {
  return new Error(`stale node: ${method}`);
}

/**
 * Childless node with a fixed parent chain.
 */
export class StubNode implements DocumentNode {
  private readonly failing: Set<NodeMethod>;

  constructor(private readonly init: StubNodeInit) {
    this.failing = new Set(init.failing ?? []);
  }

  private check(method: NodeMethod): void {
    if (this.failing.has(method)) {
      throw stale(method);
    }
  }

  tagName(): string {
    this.check("tagName");
    return this.init.tag;
  }

  attr(name: string): string | undefined {
    this.check("attr");
    return this.init.attrs?.[name];
  }

  text(): string {
    this.check("text");
    return this.init.text ?? "";
  }

  parent(): DocumentNode | undefined {
    this.check("parent");
    return this.init.parent;
  }

  previousSibling(): DocumentNode | undefined {
    this.check("previousSibling");
    return undefined;
  }

  query(_selector: string): DocumentNode | undefined {
    this.check("query");
    return undefined;
  }

  queryAll(_selector: string): DocumentNode[] {
    this.check("queryAll");
    return [];
  }

  matches(_selector: string): boolean {
    this.check("matches");
    return false;
  }

  preceding(_selector: string): DocumentNode | undefined {
    this.check("preceding");
    return undefined;
  }
}

/**
 * Wraps a real node and makes selected methods throw. Other calls, and the
 * nodes they return, pass through unchanged.
 */
export class FlakyNode implements DocumentNode {
  private readonly failing: Set<NodeMethod>;

  constructor(
    private readonly inner: DocumentNode,
    failing: NodeMethod[],
  ) {
    this.failing = new Set(failing);
  }

  private check(method: NodeMethod): void {
    if (this.failing.has(method)) {
      throw stale(method);
    }
  }

  tagName(): string {
    this.check("tagName");
    return this.inner.tagName();
  }

  attr(name: string): string | undefined {
    this.check("attr");
    return this.inner.attr(name);
  }

  text(): string {
    this.check("text");
    return this.inner.text();
  }

  parent(): DocumentNode | undefined {
    this.check("parent");
    return this.inner.parent();
  }

  previousSibling(): DocumentNode | undefined {
    this.check("previousSibling");
    return this.inner.previousSibling();
  }

  query(selector: string): DocumentNode | undefined {
    this.check("query");
    return this.inner.query(selector);
  }

  queryAll(selector: string): DocumentNode[] {
    this.check("queryAll");
    return this.inner.queryAll(selector);
  }

  matches(selector: string): boolean {
    this.check("matches");
    return this.inner.matches(selector);
  }

  preceding(selector: string): DocumentNode | undefined {
    this.check("preceding");
    return this.inner.preceding(selector);
  }
}

/**
 * First node matching a selector; throws when there is none.
 */
export function firstNode(
  snapshot: DocumentSnapshot,
  selector: string,
): DocumentNode {
  const [node] = snapshot.queryAll(selector);
  if (!node) {
    throw new Error(`No node matches ${selector}`);
  }
  return node;
}
