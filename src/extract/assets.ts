/**
 * Static text inlined into result snapshots: the page template, stylesheet,
 * baseline script, and the chart library needed by chart results.
 */
import { readFileSync } from 'fs';
import { createRequire } from 'node:module';
import { dirname, join } from 'path';
import { fileURLToPath } from 'url';

const require = createRequire(import.meta.url);

export interface SnapshotAssets {
  /** HTML document with the snapshot placeholders */
  template: string;
  stylesheet: string;
  /** Script run on every snapshot */
  baseScript: string;
  /** Library bodies inlined ahead of a chart result's own script */
  chartScripts: readonly string[];
}

export type BundledAsset = 'template' | 'stylesheet' | 'baseScript';

const BUNDLED_FILES: Readonly<Record<BundledAsset, string>> = Object.freeze({
  template: 'snapshot.html',
  stylesheet: 'snapshot.css',
  baseScript: 'snapshot.js',
});

/** Resolved once; file contents never change for the life of the process. */
const fileCache = new Map<string, string>();

function readCached(path: string): string {
  let content = fileCache.get(path);
  if (content === undefined) {
    content = readFileSync(path, 'utf-8');
    fileCache.set(path, content);
  }
  return content;
}

/** `assets/` at the package root, from both `src/extract` and `dist/extract`. */
export function getAssetsDir(): string {
  return join(dirname(fileURLToPath(import.meta.url)), '..', '..', 'assets');
}

export function loadBundledAsset(name: BundledAsset): string {
  return readCached(join(getAssetsDir(), BUNDLED_FILES[name]));
}

/** The UMD build of chart.js, which defines the global `Chart` page scripts call. */
export function loadChartLibrary(): string {
  const entry = require.resolve('chart.js');
  return readCached(join(dirname(entry), 'chart.umd.js'));
}
