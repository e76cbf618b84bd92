/**
 * Standalone HTML snapshot of a shindan result.
 *
 * The result fragment is lifted into a fixed template together with inlined
 * assets. Animated effect wrappers are swapped for their <noscript> fallbacks,
 * since the snapshot is meant to render without running the site's scripts.
 * Chart results additionally need the page's own chart script.
 */
import { ElementNotFoundError, ScriptNotFoundError } from '../errors.js';
import { logger } from '../logger.js';
import { loadBundledAsset, loadChartLibrary, type SnapshotAssets } from './assets.js';
import { effectFallback, parseDocument } from './dom.js';
import { SELECTORS } from './selectors.js';

export const PLACEHOLDERS = Object.freeze({
  stylesheet: '{{STYLESHEET}}',
  baseUrl: '{{BASE_URL}}',
  content: '<!-- TITLE_AND_RESULT -->',
  baseScript: '{{BASE_SCRIPT}}',
  scripts: '<!-- SCRIPTS -->',
} as const);

type PlaceholderKey = keyof typeof PLACEHOLDERS;

const PLACEHOLDER_KEYS: readonly PlaceholderKey[] = [
  'stylesheet',
  'baseUrl',
  'content',
  'baseScript',
  'scripts',
];

/** Raw-response marker showing the result renders a chart. */
export const CHART_MARKER = 'chart.js';

export interface SnapshotOptions {
  /** Injected as <base href> so relative links resolve against the live site */
  baseUrl: string;
  assets?: Readonly<Partial<SnapshotAssets>>;
}

const PLACEHOLDER_PATTERN = new RegExp(
  Object.values(PLACEHOLDERS)
    .map((token) => token.replace(/[.*+?^${}()|[\]\\]/g, '\\$&'))
    .join('|'),
  'g'
);

function escapeAttribute(value: string): string {
  return value
    .replace(/&/g, '&amp;')
    .replace(/"/g, '&quot;')
    .replace(/</g, '&lt;')
    .replace(/>/g, '&gt;');
}

/** Literal replace-all; the replacement is never interpreted as a pattern. */
function replaceLiteral(source: string, search: string, replacement: string): string {
  if (!search) return source;
  return source.split(search).join(replacement);
}

/**
 * Single pass over the template so inserted content is never rescanned for
 * placeholders.
 */
export function fillTemplate(template: string, values: Record<PlaceholderKey, string>): string {
  const byToken = new Map<string, string>(
    PLACEHOLDER_KEYS.map((key): [string, string] => [PLACEHOLDERS[key], values[key]])
  );
  return template.replace(PLACEHOLDER_PATTERN, (token) => byToken.get(token) ?? token);
}

/**
 * Drop each effect wrapper that has a <noscript> fallback right after it and
 * unwrap the fallback in its place.
 */
export function deanimate(document: Document, markup: string): string {
  let result = markup;
  for (const selector of SELECTORS.effects) {
    for (const effect of document.querySelectorAll(selector)) {
      const fallback = effectFallback(effect);
      if (!fallback) continue;
      result = replaceLiteral(result, effect.outerHTML, '');
      result = replaceLiteral(result, fallback.outerHTML, fallback.innerHTML);
    }
  }
  return result;
}

/**
 * The first <script> whose markup mentions the shindan id.
 * @throws ScriptNotFoundError
 */
export function findShindanScript(document: Document, id: string): string {
  for (const script of document.querySelectorAll(SELECTORS.script)) {
    const html = script.outerHTML;
    if (html.includes(id)) return html;
  }
  throw new ScriptNotFoundError(id);
}

function inlineScript(body: string): string {
  return `<script>${body}</script>`;
}

/**
 * Build the standalone document for a submission response.
 *
 * @throws ElementNotFoundError('title_and_result') when the result block is absent
 * @throws ScriptNotFoundError when a chart result lacks its page script
 */
export function buildSnapshot(id: string, responseText: string, options: SnapshotOptions): string {
  const document = parseDocument(responseText);
  const assets: Readonly<Partial<SnapshotAssets>> = options.assets ?? {};

  const container = document.querySelector(SELECTORS.titleAndResult);
  if (!container) {
    throw new ElementNotFoundError('title_and_result');
  }
  // Outer markup keeps the #title_and_result wrapper the stylesheet targets.
  const content = deanimate(document, container.outerHTML);

  let scripts = '';
  if (responseText.includes(CHART_MARKER)) {
    const shindanScript = findShindanScript(document, id);
    const libraries = assets.chartScripts ?? [loadChartLibrary()];
    scripts = [...libraries.map(inlineScript), shindanScript].join('\n');
    logger.debug({ id, libraries: libraries.length }, 'Inlined chart scripts into snapshot');
  }

  return fillTemplate(assets.template ?? loadBundledAsset('template'), {
    stylesheet: assets.stylesheet ?? loadBundledAsset('stylesheet'),
    baseUrl: escapeAttribute(options.baseUrl),
    content,
    baseScript: assets.baseScript ?? loadBundledAsset('baseScript'),
    scripts,
  });
}
