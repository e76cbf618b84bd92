/**
 * linkedom helpers shared by the extractors
 */
import { parseHTML } from 'linkedom';
import { SELECTORS } from './selectors.js';

const ELEMENT_NODE = 1;
const TEXT_NODE = 3;

export function parseDocument(html: string): Document {
  const { document } = parseHTML(html);
  return document;
}

export function isElement(node: Node): node is Element {
  return node.nodeType === ELEMENT_NODE;
}

export function isText(node: Node): node is Text {
  return node.nodeType === TEXT_NODE;
}

/** Lower-case tag name; linkedom upper-cases tagName for HTML documents. */
export function tagOf(element: Element): string {
  return element.tagName.toLowerCase();
}

/**
 * Text of `node` and the text siblings directly after it, up to the first
 * non-text sibling. linkedom splits a run of text at every entity, so a
 * single node only holds part of it.
 */
export function textRunFrom(node: ChildNode): string {
  let text = '';
  let current: ChildNode | null = node;
  while (current && isText(current)) {
    text += current.textContent ?? '';
    current = current.nextSibling;
  }
  return text;
}

/**
 * The `<noscript>` fallback right after an animated effect wrapper, or null
 * when `element` is not such a wrapper.
 */
export function effectFallback(element: Element): Element | null {
  if (!SELECTORS.effects.some((selector) => element.matches(selector))) return null;
  const fallback = element.nextElementSibling;
  return fallback && tagOf(fallback) === 'noscript' ? fallback : null;
}
