/**
 * Title and description extraction from a shindan page
 */
import { ElementNotFoundError } from '../errors.js';
import { isElement, isText, tagOf, textRunFrom } from './dom.js';
import { SELECTORS, TITLE_ATTRIBUTE } from './selectors.js';

/**
 * @throws ElementNotFoundError('title') when the title element or its marker attribute is missing
 */
export function extractTitle(document: Document): string {
  const title = document.querySelector(SELECTORS.title)?.getAttribute(TITLE_ATTRIBUTE);
  if (title === null || title === undefined) {
    throw new ElementNotFoundError('title');
  }
  return title;
}

/**
 * Flatten the description container: text nodes verbatim, <br> as a newline,
 * and for any other element only the text run its first child starts (no
 * deeper recursion).
 *
 * @throws ElementNotFoundError('description')
 */
export function extractDescription(document: Document): string {
  const container = document.querySelector(SELECTORS.description);
  if (!container) {
    throw new ElementNotFoundError('description');
  }

  const pieces: string[] = [];
  for (const child of container.childNodes) {
    if (isText(child)) {
      pieces.push(child.textContent ?? '');
    } else if (isElement(child)) {
      if (tagOf(child) === 'br') {
        pieces.push('\n');
        continue;
      }
      const first = child.firstChild;
      if (first) {
        pieces.push(textRunFrom(first));
      }
    }
  }

  return pieces.join('');
}
