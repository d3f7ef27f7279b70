/**
 * Fault-tolerant DOM query helpers and ordered fallback evaluation.
 *
 * Seller Hub markup shifts between releases and nodes can go stale while a
 * page re-renders, so every query here turns a failure into "not found".
 */

import type { DocumentNode } from "../dom/node";
import { normalizeText } from "./fields";

/**
 * First descendant matching a selector, or undefined.
 */
export function findFirst(
  root: DocumentNode,
  selector: string,
): DocumentNode | undefined {
  try {
    return root.query(selector);
  } catch {
    return undefined;
  }
}

/**
 * All descendants matching a selector, or an empty list.
 */
export function findAll(root: DocumentNode, selector: string): DocumentNode[] {
  try {
    return root.queryAll(selector);
  } catch {
    return [];
  }
}

/**
 * Whitespace-normalised text of a node, or the default value.
 */
export function getText(
  node: DocumentNode | undefined,
  defaultValue = "",
): string {
  if (!node) {
    return defaultValue;
  }
  try {
    return normalizeText(node.text()) || defaultValue;
  } catch {
    return defaultValue;
  }
}

/**
 * Trimmed attribute value, or the default value.
 */
export function getAttribute(
  node: DocumentNode | undefined,
  name: string,
  defaultValue = "",
): string {
  if (!node) {
    return defaultValue;
  }
  try {
    return node.attr(name)?.trim() || defaultValue;
  } catch {
    return defaultValue;
  }
}

/**
 * One step of an ordered fallback chain that searches the root's
 * descendants: the first element matching `selector` whose text passes
 * `candidate` (or simply the first match without one).
 */
export interface SelectorRule {
  name: string;
  selector: string;
  candidate?: (text: string) => boolean;
  validate?: (text: string) => boolean;
}

/**
 * One step of an ordered fallback chain that picks its element with custom
 * navigation from the root.
 */
export interface LocateRule {
  name: string;
  locate: (root: DocumentNode) => DocumentNode | undefined;
  validate?: (text: string) => boolean;
}

/**
 * `validate` decides whether the located element's text is accepted as the
 * field value. A rule whose element is missing or whose text fails
 * validation hands over to the next.
 */
export type FieldRule = SelectorRule | LocateRule;

/**
 * Element and text accepted by a fallback chain.
 */
export interface FieldMatch {
  rule: string;
  node: DocumentNode;
  text: string;
}

function locateByRule(
  root: DocumentNode,
  rule: FieldRule,
): { node: DocumentNode; text: string } | undefined {
  if ("locate" in rule) {
    let node: DocumentNode | undefined;
    try {
      node = rule.locate(root);
    } catch {
      return undefined;
    }
    return node ? { node, text: getText(node) } : undefined;
  }

  if (!rule.candidate) {
    const node = findFirst(root, rule.selector);
    return node ? { node, text: getText(node) } : undefined;
  }

  for (const node of findAll(root, rule.selector)) {
    const text = getText(node);
    if (rule.candidate(text)) {
      return { node, text };
    }
  }
  return undefined;
}

/**
 * Evaluate rules in order and return the first accepted match.
 */
export function firstMatchingRule(
  root: DocumentNode,
  rules: readonly FieldRule[],
): FieldMatch | undefined {
  for (const rule of rules) {
    const located = locateByRule(root, rule);
    if (!located) {
      continue;
    }
    if (rule.validate && !rule.validate(located.text)) {
      continue;
    }
    return { rule: rule.name, ...located };
  }
  return undefined;
}
