/**
 * shindan-client - ShindanMaker client with browser TLS fingerprinting, result
 * segment parsing and standalone HTML snapshots.
 *
 * @module shindan-client
 */
export { ShindanClient } from './client.js';
export { resolveClientConfig, ClientOptionsSchema } from './config.js';
export {
  ShindanError,
  NetworkError,
  SessionCookieNotFoundError,
  TokenNotFoundError,
  ElementNotFoundError,
  ScriptNotFoundError,
  InvalidRegionError,
  InvalidOptionsError,
  isShindanError,
} from './errors.js';
export { REGIONS, REGION_BASE_URLS, parseRegion, isRegion, getRegionBaseUrl } from './sites/regions.js';
export { extractTitle, extractDescription } from './extract/title-extractor.js';
export { parseSegments, parseSegmentsFromDocument } from './extract/segment-parser.js';
export {
  textSegment,
  imageSegment,
  segmentText,
  segmentsToText,
  filterSegmentsByType,
  segmentEquals,
  segmentsEqual,
} from './extract/segments.js';
export { buildSnapshot } from './extract/snapshot.js';
export { parseDocument } from './extract/dom.js';
export type {
  CallOptions,
  TitleWithDescription,
  SegmentsWithTitle,
  HtmlWithTitle,
} from './client.js';
export type { ClientOptions, ClientConfig } from './config.js';
export type { ShindanErrorCode } from './errors.js';
export type { Region } from './sites/regions.js';
export type { Segment, SegmentType, SegmentOf } from './extract/segments.js';
export type { ParsedSegments, SegmentStrategyName } from './extract/segment-parser.js';
export type { SnapshotOptions } from './extract/snapshot.js';
export type { SnapshotAssets } from './extract/assets.js';
