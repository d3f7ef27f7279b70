/**
 * Document tree abstraction used by the extraction pipeline.
 *
 * Any method may throw when the underlying node has gone stale. Callers go
 * through the helpers in core/utils/extraction, which turn a throw into
 * "not found".
 */

/**
 * Handle to one element of a rendered document.
 */
export interface DocumentNode {
  /** Lower-cased tag name. */
  tagName(): string;

  attr(name: string): string | undefined;

  /** Raw text content of the node and its descendants. */
  text(): string;

  /** Parent element, or undefined at the top of the tree. */
  parent(): DocumentNode | undefined;

  /** Immediately preceding element sibling. */
  previousSibling(): DocumentNode | undefined;

  /** First descendant matching a CSS selector, in document order. */
  query(selector: string): DocumentNode | undefined;

  /** All descendants matching a CSS selector, in document order. */
  queryAll(selector: string): DocumentNode[];

  matches(selector: string): boolean;

  /**
   * Nearest element before this one in document order that matches the
   * selector. Ancestors do not precede their descendants.
   */
  preceding(selector: string): DocumentNode | undefined;
}

/**
 * Whole-document handle captured from one page load.
 */
export interface DocumentSnapshot {
  /** URL the snapshot was taken from, used to resolve relative links. */
  readonly url?: string;

  queryAll(selector: string): DocumentNode[];
}
