/**
 * Result page → ordered segment sequence.
 *
 * Two layouts are known. Newer pages embed the result as a JSON block list in
 * the container's `data-blocks` attribute; older ones only carry mixed text and
 * image markup. Strategies run in priority order and the first one producing
 * segments wins.
 */
import { ElementNotFoundError } from '../errors.js';
import { logger } from '../logger.js';
import { effectFallback, isElement, isText, parseDocument, tagOf } from './dom.js';
import { BLOCKS_ATTRIBUTE, SELECTORS } from './selectors.js';
import { imageSegment, textSegment, type Segment } from './segments.js';

export type StrategyOutcome = { kind: 'parsed'; segments: Segment[] } | { kind: 'empty' };

export type SegmentStrategyName = 'data-blocks' | 'dom';

export interface ParsedSegments {
  segments: Segment[];
  /** Strategy that produced the segments; null when neither found any. */
  strategy: SegmentStrategyName | null;
}

const EMPTY: StrategyOutcome = Object.freeze({ kind: 'empty' });

/** Keys an image block may carry its URL under, in lookup order. */
const IMAGE_SOURCE_KEYS = ['source', 'src', 'url', 'file'] as const;

const NBSP_PATTERN = /\u00a0|&nbsp;/g;

function toOutcome(segments: Segment[]): StrategyOutcome {
  return segments.length > 0 ? { kind: 'parsed', segments } : EMPTY;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/** Convert one payload block; unknown or malformed blocks yield null. */
function blockToSegment(block: unknown): Segment | null {
  if (!isRecord(block)) return null;

  switch (block.type) {
    case 'text':
      return typeof block.content === 'string' ? textSegment(block.content) : null;
    case 'user_input':
      return typeof block.value === 'string' ? textSegment(block.value) : null;
    case 'image': {
      // First key present wins, even when its value turns out unusable.
      const key = IMAGE_SOURCE_KEYS.find((k) => block[k] !== undefined);
      const url = key === undefined ? undefined : block[key];
      return typeof url === 'string' ? imageSegment(url) : null;
    }
    default:
      return null;
  }
}

/**
 * Strategy A: the structured `data-blocks` payload.
 */
export function parseBlockSegments(container: Element): StrategyOutcome {
  const payload = container.getAttribute(BLOCKS_ATTRIBUTE);
  if (!payload) return EMPTY;

  let blocks: unknown;
  try {
    blocks = JSON.parse(payload);
  } catch (e) {
    logger.debug({ error: String(e) }, 'Malformed data-blocks payload, falling back to DOM');
    return EMPTY;
  }
  if (!Array.isArray(blocks)) return EMPTY;

  const segments: Segment[] = [];
  for (const block of blocks) {
    const segment = blockToSegment(block);
    if (segment) segments.push(segment);
  }
  return toOutcome(segments);
}

/** A merged run of adjacent text nodes, or an element still to visit. */
type WalkItem = { kind: 'text'; value: string } | { kind: 'element'; element: Element };

/**
 * Children of `parent` with adjacent text nodes joined, so a run linkedom
 * split at entities is read as one piece.
 */
function walkItems(parent: Node): WalkItem[] {
  const items: WalkItem[] = [];
  let run: string | null = null;

  for (const child of parent.childNodes) {
    if (isText(child)) {
      run = (run ?? '') + (child.textContent ?? '');
      continue;
    }
    if (run !== null) {
      items.push({ kind: 'text', value: run });
      run = null;
    }
    if (isElement(child)) items.push({ kind: 'element', element: child });
  }
  if (run !== null) items.push({ kind: 'text', value: run });

  return items;
}

/**
 * Strategy B: depth-first walk of the container markup in document order.
 * Wrapper elements are transparent; only text, <br> and <img> emit segments.
 * An animated effect wrapper followed by its <noscript> fallback is skipped,
 * so the fallback alone supplies that text.
 * Uses an explicit stack so deeply nested pages cannot overflow the call stack.
 */
export function parseDomSegments(container: Element): StrategyOutcome {
  const segments: Segment[] = [];
  const stack: WalkItem[] = walkItems(container).reverse();

  for (let item = stack.pop(); item !== undefined; item = stack.pop()) {
    if (item.kind === 'text') {
      const value = item.value.replace(NBSP_PATTERN, ' ');
      if (value) segments.push(textSegment(value));
      continue;
    }

    const { element } = item;
    switch (tagOf(element)) {
      case 'br':
        segments.push(textSegment('\n'));
        break;
      case 'img': {
        const url = element.getAttribute('data-src') ?? element.getAttribute('src');
        if (url !== null) segments.push(imageSegment(url));
        break;
      }
      default: {
        if (effectFallback(element)) break;
        const children = walkItems(element);
        for (let i = children.length - 1; i >= 0; i--) {
          stack.push(children[i]);
        }
      }
    }
  }

  return toOutcome(segments);
}

const STRATEGIES: ReadonlyArray<{
  name: SegmentStrategyName;
  run: (container: Element) => StrategyOutcome;
}> = [
  { name: 'data-blocks', run: parseBlockSegments },
  { name: 'dom', run: parseDomSegments },
];

/**
 * @throws ElementNotFoundError('result') when the result container is absent
 */
export function parseSegmentsFromDocument(document: Document): ParsedSegments {
  const container = document.querySelector(SELECTORS.result);
  if (!container) {
    throw new ElementNotFoundError('result');
  }

  for (const strategy of STRATEGIES) {
    const outcome = strategy.run(container);
    if (outcome.kind === 'parsed') {
      logger.debug(
        { strategy: strategy.name, count: outcome.segments.length },
        'Parsed result segments'
      );
      return { segments: outcome.segments, strategy: strategy.name };
    }
  }

  return { segments: [], strategy: null };
}

/**
 * Parse a submission response into its segment sequence.
 * @throws ElementNotFoundError('result') when the result container is absent
 */
export function parseSegments(responseText: string): Segment[] {
  return parseSegmentsFromDocument(parseDocument(responseText)).segments;
}
