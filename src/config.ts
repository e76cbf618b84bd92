/**
 * Client configuration: validation and defaults.
 */
import { z } from 'zod';
import { InvalidOptionsError } from './errors.js';
import { DEFAULT_REQUEST_TIMEOUT_MS } from './fetch/http-client.js';
import type { SnapshotAssets } from './extract/assets.js';
import { getRegionBaseUrl, parseRegion, type Region } from './sites/regions.js';

/** Allowed proxy URL schemes */
const VALID_PROXY_SCHEMES = ['http:', 'https:', 'socks5:', 'socks5h:'];

export interface ClientOptions {
  /** Regional site, case-insensitive (default: "en") */
  region?: string;
  /** Overrides the regional base URL; must end with "/" */
  baseUrl?: string;
  /** Per-request timeout in milliseconds */
  timeout?: number;
  /** httpcloak TLS preset */
  preset?: string;
  proxy?: string;
  userAgent?: string;
  /** Replacement snapshot assets; unset entries load the bundled defaults */
  assets?: Partial<SnapshotAssets>;
}

export interface ClientConfig {
  readonly region: Region;
  readonly baseUrl: string;
  readonly timeout: number;
  readonly preset?: string;
  readonly proxy?: string;
  readonly userAgent?: string;
  readonly assets: Readonly<Partial<SnapshotAssets>>;
}

function hasProxyScheme(value: string): boolean {
  try {
    return VALID_PROXY_SCHEMES.includes(new URL(value).protocol);
  } catch {
    return false;
  }
}

export const SnapshotAssetsSchema = z
  .object({
    template: z.string(),
    stylesheet: z.string(),
    baseScript: z.string(),
    chartScripts: z.array(z.string()),
  })
  .partial()
  .strict();

export const ClientOptionsSchema = z
  .object({
    region: z.string().min(1).optional(),
    baseUrl: z
      .string()
      .url()
      .refine((value) => value.endsWith('/'), { message: 'baseUrl must end with "/"' })
      .optional(),
    timeout: z.number().int().positive().optional(),
    preset: z.string().min(1).optional(),
    proxy: z
      .string()
      .refine(hasProxyScheme, {
        message: `proxy must be a URL using one of: ${VALID_PROXY_SCHEMES.join(', ')}`,
      })
      .optional(),
    userAgent: z.string().min(1).optional(),
    assets: SnapshotAssetsSchema.optional(),
  })
  .strict();

/**
 * Validate client options and fill in defaults. The returned config is frozen.
 * @throws InvalidOptionsError when the options fail validation
 * @throws InvalidRegionError for an unknown region tag
 */
export function resolveClientConfig(options: ClientOptions = {}): ClientConfig {
  const result = ClientOptionsSchema.safeParse(options);
  if (!result.success) {
    throw new InvalidOptionsError(
      result.error.issues.map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`)
    );
  }

  const parsed = result.data;
  const region = parseRegion(parsed.region ?? 'en');

  return Object.freeze({
    region,
    baseUrl: parsed.baseUrl ?? getRegionBaseUrl(region),
    timeout: parsed.timeout ?? DEFAULT_REQUEST_TIMEOUT_MS,
    preset: parsed.preset,
    proxy: parsed.proxy,
    userAgent: parsed.userAgent,
    assets: Object.freeze({ ...parsed.assets }),
  });
}
