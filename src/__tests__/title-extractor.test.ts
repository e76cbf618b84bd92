import { describe, it, expect } from 'vitest';
import { extractDescription, extractTitle } from '../extract/title-extractor.js';
import { parseDocument } from '../extract/dom.js';
import { ElementNotFoundError } from '../errors.js';
import { page, shindanPage } from './test-helpers.js';

function missingElement(fn: () => unknown): string | undefined {
  try {
    fn();
  } catch (error) {
    if (error instanceof ElementNotFoundError) return error.element;
    throw error;
  }
  return undefined;
}

describe('extract/title-extractor', () => {
  describe('extractTitle', () => {
    it('reads the title marker attribute', () => {
      expect(extractTitle(parseDocument(shindanPage({ title: 'Fantasy Stats' })))).toBe(
        'Fantasy Stats'
      );
    });

    it('prefers the attribute over the visible text', () => {
      const document = parseDocument(
        page('<h1 id="shindanTitle" data-shindan_title="Real Title">Shown <small>text</small></h1>')
      );
      expect(extractTitle(document)).toBe('Real Title');
    });

    it('decodes entities in the attribute', () => {
      const document = parseDocument(
        page('<h1 id="shindanTitle" data-shindan_title="Cats &amp; Dogs">x</h1>')
      );
      expect(extractTitle(document)).toBe('Cats & Dogs');
    });

    it('fails when the title element is missing', () => {
      expect(missingElement(() => extractTitle(parseDocument(page('<h1>No id</h1>'))))).toBe(
        'title'
      );
    });

    it('fails when the marker attribute is missing', () => {
      const document = parseDocument(page('<h1 id="shindanTitle">Fantasy Stats</h1>'));
      expect(missingElement(() => extractTitle(document))).toBe('title');
    });
  });

  describe('extractDescription', () => {
    it('concatenates text nodes and turns <br> into newlines', () => {
      const document = parseDocument(
        shindanPage({ description: 'Line one<br>Line two<br><br>Line four' })
      );
      expect(extractDescription(document)).toBe('Line one\nLine two\n\nLine four');
    });

    it('takes only the first child text of inline elements', () => {
      const document = parseDocument(
        shindanPage({ description: 'Hello <b>bold</b> and <a href="/x">link<i>tail</i></a>!' })
      );
      expect(extractDescription(document)).toBe('Hello bold and link!');
    });

    it('keeps entity-split text inside inline elements whole', () => {
      const document = parseDocument(shindanPage({ description: 'See <b>Tom &amp; Jerry</b>!' }));
      expect(extractDescription(document)).toBe('See Tom & Jerry!');
    });

    it('stops the first-child run at a nested element', () => {
      const document = parseDocument(
        shindanPage({ description: '<b>R &amp; D<i>lab</i> team</b> &lt;3' })
      );
      expect(extractDescription(document)).toBe('R & D <3');
    });

    it('skips elements whose first child is not text', () => {
      const document = parseDocument(
        shindanPage({ description: 'A<span><i>nested</i>after</span>B' })
      );
      expect(extractDescription(document)).toBe('AB');
    });

    it('returns an empty string for an empty container', () => {
      expect(extractDescription(parseDocument(shindanPage({ description: '' })))).toBe('');
    });

    it('fails when the container is missing', () => {
      expect(missingElement(() => extractDescription(parseDocument(page('<p>nothing</p>'))))).toBe(
        'description'
      );
    });
  });
});
