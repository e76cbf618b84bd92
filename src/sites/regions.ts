/**
 * ShindanMaker regional sites and their base URLs.
 */
import { InvalidRegionError } from '../errors.js';

export const REGION_BASE_URLS = {
  jp: 'https://shindanmaker.com/',
  en: 'https://en.shindanmaker.com/',
  cn: 'https://cn.shindanmaker.com/',
  kr: 'https://kr.shindanmaker.com/',
  th: 'https://th.shindanmaker.com/',
} as const;

export type Region = keyof typeof REGION_BASE_URLS;

export const REGIONS: readonly Region[] = ['jp', 'en', 'cn', 'kr', 'th'];

export function isRegion(value: string): value is Region {
  return Object.hasOwn(REGION_BASE_URLS, value);
}

/**
 * Parse a region tag case-insensitively ("EN", "jp", " Cn ").
 * @throws InvalidRegionError for unknown tags
 */
export function parseRegion(tag: string): Region {
  const normalized = tag.trim().toLowerCase();
  if (!isRegion(normalized)) {
    throw new InvalidRegionError(tag);
  }
  return normalized;
}

export function getRegionBaseUrl(region: Region): string {
  return REGION_BASE_URLS[region];
}

/** Page URL for a shindan id: `{baseUrl}{id}`, no query string. */
export function buildShindanUrl(baseUrl: string, id: string): string {
  return `${baseUrl}${id}`;
}
