/**
 * DocumentSnapshot implementation over a cheerio-parsed HTML string.
 */

import * as cheerio from "cheerio";
import { isTag } from "domhandler";
import type { AnyNode, Element } from "domhandler";
import type { DocumentNode, DocumentSnapshot } from "./node";

type CheerioAPI = ReturnType<typeof cheerio.load>;

function firstElement(nodes: AnyNode[]): Element | undefined {
  return nodes.find(isTag);
}

class CheerioNode implements DocumentNode {
  constructor(
    private readonly document: CheerioDocument,
    private readonly element: Element,
  ) {}

  tagName(): string {
    return this.element.tagName.toLowerCase();
  }

  attr(name: string): string | undefined {
    return this.element.attribs[name];
  }

  text(): string {
    return this.document.$(this.element).text();
  }

  parent(): DocumentNode | undefined {
    const parent = this.element.parent;
    return parent && isTag(parent) ? this.document.wrap(parent) : undefined;
  }

  previousSibling(): DocumentNode | undefined {
    const previous = firstElement(this.document.$(this.element).prev().toArray());
    return previous ? this.document.wrap(previous) : undefined;
  }

  query(selector: string): DocumentNode | undefined {
    const match = firstElement(
      this.document.$(this.element).find(selector).first().toArray(),
    );
    return match ? this.document.wrap(match) : undefined;
  }

  queryAll(selector: string): DocumentNode[] {
    return this.document
      .$(this.element)
      .find(selector)
      .toArray()
      .map((el) => this.document.wrap(el));
  }

  matches(selector: string): boolean {
    return this.document.$(this.element).is(selector);
  }

  preceding(selector: string): DocumentNode | undefined {
    const index = this.document.elementIndex(this.element);
    if (index <= 0) {
      return undefined;
    }

    const ancestors = new Set<AnyNode>();
    for (let p = this.element.parent; p; p = p.parent) {
      ancestors.add(p);
    }

    const ordered = this.document.elementsInOrder();
    const matching = this.document.matchingElements(selector);
    for (let i = index - 1; i >= 0; i--) {
      const candidate = ordered[i];
      if (matching.has(candidate) && !ancestors.has(candidate)) {
        return this.document.wrap(candidate);
      }
    }
    return undefined;
  }
}

/**
 * Parsed HTML document. Wrapped nodes are cached so that the same element
 * always maps to the same handle.
 */
export class CheerioDocument implements DocumentSnapshot {
  readonly $: CheerioAPI;
  readonly url?: string;

  private readonly handles = new Map<Element, CheerioNode>();
  private order: Element[] | null = null;
  private positions: Map<Element, number> | null = null;
  private readonly selections = new Map<string, Set<Element>>();

  constructor(html: string, url?: string) {
    this.$ = cheerio.load(html);
    this.url = url;
  }

  queryAll(selector: string): DocumentNode[] {
    return this.$(selector)
      .toArray()
      .filter(isTag)
      .map((el) => this.wrap(el));
  }

  wrap(element: Element): CheerioNode {
    let handle = this.handles.get(element);
    if (!handle) {
      handle = new CheerioNode(this, element);
      this.handles.set(element, handle);
    }
    return handle;
  }

  elementsInOrder(): Element[] {
    if (!this.order) {
      this.order = this.$("*").toArray().filter(isTag);
    }
    return this.order;
  }

  /**
   * Position of an element in document order, or -1 if it is not in this
   * document.
   */
  elementIndex(element: Element): number {
    if (!this.positions) {
      this.positions = new Map(
        this.elementsInOrder().map((el, i): [Element, number] => [el, i]),
      );
    }
    return this.positions.get(element) ?? -1;
  }

  /**
   * Every element matching a selector. The document is static, so results
   * are kept per selector.
   */
  matchingElements(selector: string): Set<Element> {
    let matched = this.selections.get(selector);
    if (!matched) {
      matched = new Set(this.$(selector).toArray().filter(isTag));
      this.selections.set(selector, matched);
    }
    return matched;
  }
}

/**
 * Load an HTML snapshot for extraction.
 */
export function loadDocument(html: string, url?: string): CheerioDocument {
  return new CheerioDocument(html, url);
}
