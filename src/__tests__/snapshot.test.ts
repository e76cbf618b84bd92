import { describe, it, expect } from 'vitest';
import {
  buildSnapshot,
  deanimate,
  fillTemplate,
  findShindanScript,
} from '../extract/snapshot.js';
import { loadBundledAsset, loadChartLibrary } from '../extract/assets.js';
import { parseDocument } from '../extract/dom.js';
import { ElementNotFoundError, ScriptNotFoundError } from '../errors.js';
import { page, resultPage } from './test-helpers.js';

const BASE_URL = 'https://en.shindanmaker.com/';

const TEMPLATE =
  '<base href="{{BASE_URL}}"><style>{{STYLESHEET}}</style>' +
  '<!-- TITLE_AND_RESULT -->|<script>{{BASE_SCRIPT}}</script>|<!-- SCRIPTS -->';

const assets = {
  template: TEMPLATE,
  stylesheet: 'css',
  baseScript: 'base',
  chartScripts: ['lib-one', 'lib-two'],
};

describe('extract/snapshot', () => {
  describe('fillTemplate', () => {
    it('replaces every placeholder occurrence', () => {
      const filled = fillTemplate('{{BASE_URL}}|{{BASE_URL}}|<!-- SCRIPTS -->', {
        stylesheet: 's',
        baseUrl: 'u',
        content: 'c',
        baseScript: 'b',
        scripts: 'x',
      });
      expect(filled).toBe('u|u|x');
    });

    it('does not rescan inserted values', () => {
      const filled = fillTemplate('<!-- TITLE_AND_RESULT -->{{STYLESHEET}}', {
        stylesheet: 'css',
        baseUrl: 'u',
        content: '{{STYLESHEET}} $& $1',
        baseScript: 'b',
        scripts: '',
      });
      expect(filled).toBe('{{STYLESHEET}} $& $1css');
    });
  });

  describe('buildSnapshot', () => {
    it('fills the template with the result block and assets', () => {
      const html = buildSnapshot('12345', resultPage('Hello'), { baseUrl: BASE_URL, assets });
      expect(html).toBe(
        '<base href="https://en.shindanmaker.com/"><style>css</style>' +
          '<div id="title_and_result"><div id="shindanResult">Hello</div></div>' +
          '|<script>base</script>|'
      );
    });

    it('escapes the base URL for the href attribute', () => {
      const html = buildSnapshot('12345', resultPage('Hello'), {
        baseUrl: 'https://mirror.test/?a="b"&c=<d>/',
        assets,
      });
      expect(html.startsWith('<base href="https://mirror.test/?a=&quot;b&quot;&amp;c=&lt;d&gt;/">')).toBe(
        true
      );
    });

    it('replaces animated effects with their noscript fallback', () => {
      const response = resultPage(
        '<span class="shindanEffects" data-mode="ef_typing">Al</span><noscript>Alice wins</noscript>' +
          ' and <span class="shindanEffects" data-mode="ef_shuffle">xx</span><noscript>Bob loses</noscript>'
      );
      const html = buildSnapshot('12345', response, { baseUrl: BASE_URL, assets });
      expect(html).toContain(
        '<div id="title_and_result"><div id="shindanResult">Alice wins and Bob loses</div></div>'
      );
    });

    it('inlines chart libraries then the page script for chart results', () => {
      const response = resultPage(
        '<canvas id="chart"></canvas>',
        '',
        '<script src="/js/chart.js"></script><script>renderChart(12345)</script>'
      );
      const html = buildSnapshot('12345', response, { baseUrl: BASE_URL, assets });
      expect(html.endsWith(
        '|<script>lib-one</script>\n<script>lib-two</script>\n<script>renderChart(12345)</script>'
      )).toBe(true);
    });

    it('leaves the scripts slot empty without a chart', () => {
      const response = resultPage('Hello', '', '<script>track(12345)</script>');
      const html = buildSnapshot('12345', response, { baseUrl: BASE_URL, assets });
      expect(html.endsWith('|<script>base</script>|')).toBe(true);
    });

    it('fails for a chart result without its page script', () => {
      const response = resultPage('x', '', '<script src="/js/chart.js"></script>');
      expect(() => buildSnapshot('12345', response, { baseUrl: BASE_URL, assets })).toThrow(
        ScriptNotFoundError
      );
    });

    it('fails when the result block is missing', () => {
      try {
        buildSnapshot('12345', page('<div id="shindanResult">x</div>'), {
          baseUrl: BASE_URL,
          assets,
        });
        expect.unreachable('expected ElementNotFoundError');
      } catch (error) {
        expect(error).toBeInstanceOf(ElementNotFoundError);
        if (error instanceof ElementNotFoundError) expect(error.element).toBe('title_and_result');
      }
    });

    it('uses the bundled template by default', () => {
      const html = buildSnapshot('12345', resultPage('Hello'), { baseUrl: BASE_URL });
      expect(html).toContain('<base href="https://en.shindanmaker.com/">');
      expect(html).toContain(
        '<div id="main"><div id="title_and_result"><div id="shindanResult">Hello</div></div></div>'
      );
      expect(html).toContain(`<style>${loadBundledAsset('stylesheet')}</style>`);
      expect(html).not.toMatch(/\{\{[A-Z_]+\}\}/);
      expect(html).not.toContain('<!-- SCRIPTS -->');
    });
  });

  describe('findShindanScript', () => {
    it('returns the first script mentioning the id', () => {
      const document = parseDocument(
        page('<script>other(1)</script><script>draw(777)</script><script>again(777)</script>')
      );
      expect(findShindanScript(document, '777')).toBe('<script>draw(777)</script>');
    });
  });

  describe('deanimate', () => {
    it('keeps effects that have no noscript fallback', () => {
      const document = parseDocument(
        page('<div id="r"><span class="shindanEffects" data-mode="ef_typing">typed</span><b>x</b></div>')
      );
      const markup = document.querySelector('#r')?.outerHTML ?? '';
      expect(deanimate(document, markup)).toBe(markup);
    });
  });

  it('bundles the chart.js UMD build', () => {
    expect(loadChartLibrary()).toContain('Chart');
  });
});
