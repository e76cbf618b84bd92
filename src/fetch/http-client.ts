/**
 * httpcloak transport with browser-perfect fingerprints.
 *
 * A session is opened per logical operation and closed when it settles, so the
 * cookie jar of one GET/POST exchange is never visible to another.
 */
import httpcloak from 'httpcloak';
import { NetworkError } from '../errors.js';
import { logger } from '../logger.js';

/** httpcloak cookie shape (not exported by library) */
interface HttpcloakCookie {
  name: string;
  value: string;
  domain?: string;
  path?: string;
  expires?: string;
  httpOnly?: boolean;
  secure?: boolean;
}

export type HttpSession = httpcloak.Session;

export interface ResponseCookie {
  name: string;
  value: string;
  domain: string;
  path: string;
  expires?: string;
  httpOnly?: boolean;
  secure?: boolean;
}

export interface HttpResponse {
  success: boolean;
  statusCode: number;
  html?: string;
  headers: Record<string, string>;
  cookies: ResponseCookie[];
  error?: string;
  aborted?: boolean;
}

export interface SessionOptions {
  preset?: string;
  proxy?: string;
  timeout?: number;
}

export interface RequestOptions {
  headers?: Record<string, string>;
  timeoutMs?: number;
  signal?: AbortSignal;
}

export const DEFAULT_REQUEST_TIMEOUT_MS = 3000;
const MAX_RESPONSE_SIZE = 10 * 1024 * 1024; // 10MB

/** Default TLS preset */
const DEFAULT_PRESET = httpcloak.Preset.CHROME_143;

/**
 * Redact credentials from a proxy URL for safe logging.
 */
export function redactProxyUrl(proxy: string): string {
  try {
    const url = new URL(proxy);
    if (url.password) url.password = '***';
    if (url.username) url.username = '***';
    return url.toString();
  } catch {
    return '<invalid-proxy-url>';
  }
}

export function openSession(options: SessionOptions = {}): HttpSession {
  const timeoutMs = options.timeout ?? DEFAULT_REQUEST_TIMEOUT_MS;
  logger.debug(
    {
      preset: options.preset ?? DEFAULT_PRESET,
      proxy: options.proxy ? redactProxyUrl(options.proxy) : undefined,
    },
    'Creating httpcloak session'
  );
  return new httpcloak.Session({
    preset: options.preset ?? DEFAULT_PRESET,
    timeout: Math.max(1, Math.ceil(timeoutMs / 1000)),
    ...(options.proxy ? { proxy: options.proxy } : {}),
  });
}

/**
 * Run `fn` against a fresh session and close it afterwards, whether `fn`
 * resolves or rejects. Closing also tears down a request left in flight by a
 * timeout or abort.
 */
export async function withSession<T>(
  options: SessionOptions,
  fn: (session: HttpSession) => Promise<T>
): Promise<T> {
  const session = openSession(options);
  try {
    return await fn(session);
  } finally {
    try {
      session.close();
    } catch (error) {
      logger.warn({ error: String(error) }, 'Error closing httpcloak session');
    }
  }
}

/** Dispatch a request using the appropriate HTTP method. */
function dispatchRequest(
  session: HttpSession,
  method: 'GET' | 'POST',
  url: string,
  headers: Record<string, string>,
  body: string | undefined
): Promise<httpcloak.Response> {
  const opts = {
    headers,
    ...(method === 'POST' ? { body } : {}),
  } as httpcloak.RequestOptions;

  return method === 'POST' ? session.post(url, opts) : session.get(url, opts);
}

/** Create a timeout promise that rejects after the specified timeout. */
function createRequestTimeout(
  url: string,
  timeoutMs: number
): { promise: Promise<never>; cancel: () => void } {
  let timeoutId: NodeJS.Timeout;
  const promise = new Promise<never>((_, reject) => {
    timeoutId = setTimeout(
      () => reject(new Error(`Request timeout after ${timeoutMs}ms for ${url}`)),
      timeoutMs
    );
  });
  return { promise, cancel: () => clearTimeout(timeoutId) };
}

/** Create a promise that rejects once `signal` aborts. */
function createAbortWatcher(
  url: string,
  signal: AbortSignal | undefined
): { promise: Promise<never>; cancel: () => void } {
  if (!signal) {
    return { promise: new Promise<never>(() => {}), cancel: () => {} };
  }
  let onAbort: () => void = () => {};
  const promise = new Promise<never>((_, reject) => {
    onAbort = () => reject(new Error(`Request aborted for ${url}`));
    signal.addEventListener('abort', onAbort, { once: true });
  });
  return { promise, cancel: () => signal.removeEventListener('abort', onAbort) };
}

function failure(error: string, aborted = false): HttpResponse {
  return {
    success: false,
    statusCode: 0,
    headers: {},
    cookies: [],
    error,
    ...(aborted ? { aborted } : {}),
  };
}

/**
 * Internal HTTP request handler shared by httpRequest() and httpPost().
 * Handles timeout, cancellation, response parsing, and size limits.
 */
async function httpRequestInternal(
  session: HttpSession,
  method: 'GET' | 'POST',
  url: string,
  body: string | undefined,
  options: RequestOptions
): Promise<HttpResponse> {
  const { headers = {}, timeoutMs = DEFAULT_REQUEST_TIMEOUT_MS, signal } = options;

  if (signal?.aborted) {
    return failure(`Request aborted for ${url}`, true);
  }

  // Cache-Control: no-cache keeps CDNs from answering 304 with an empty body.
  const mergedHeaders: Record<string, string> = {
    'Cache-Control': 'no-cache',
    ...headers,
  };

  logger.debug({ url, method }, 'Making httpcloak request');

  const timeout = createRequestTimeout(url, timeoutMs);
  const abort = createAbortWatcher(url, signal);

  try {
    const response = await Promise.race([
      dispatchRequest(session, method, url, mergedHeaders, body),
      timeout.promise,
      abort.promise,
    ]);

    const contentLength = response.headers?.['content-length'];
    if (contentLength) {
      const size = parseInt(contentLength, 10);
      if (!isNaN(size) && size > MAX_RESPONSE_SIZE) {
        logger.warn(
          { url, contentLength: size, limit: MAX_RESPONSE_SIZE },
          'Content-Length exceeds size limit'
        );
        return { ...failure('response_too_large'), statusCode: response.statusCode };
      }
    }

    const responseCookies = (response.cookies || []).map((c: HttpcloakCookie) => ({
      name: c.name,
      value: c.value,
      domain: c.domain || new URL(url).hostname,
      path: c.path || '/',
      expires: c.expires,
      httpOnly: c.httpOnly,
      secure: c.secure,
    }));

    // NOTE: httpcloak sometimes returns text as function, sometimes as property
    const textValue = response.text as string | (() => string);
    const html = typeof textValue === 'function' ? textValue() : textValue;

    if (html && html.length > MAX_RESPONSE_SIZE) {
      logger.warn(
        { url, size: html.length, limit: MAX_RESPONSE_SIZE },
        'Response exceeds size limit'
      );
      return { ...failure('response_too_large'), statusCode: response.statusCode };
    }

    logger.debug(
      {
        url,
        method,
        statusCode: response.statusCode,
        cookieCount: responseCookies.length,
        bodyLength: html?.length || 0,
      },
      'httpcloak request complete'
    );

    // httpcloak's `ok` covers every status below 400; only 2xx counts here.
    return {
      success: response.ok && response.statusCode >= 200 && response.statusCode < 300,
      statusCode: response.statusCode,
      html,
      headers: response.headers || {},
      cookies: responseCookies,
    };
  } catch (error) {
    const aborted = signal?.aborted ?? false;
    logger.warn({ url, method, aborted, error: String(error) }, 'httpcloak request failed');
    return failure(String(error), aborted);
  } finally {
    timeout.cancel();
    abort.cancel();
  }
}

/**
 * Make HTTP GET request with browser-perfect fingerprint.
 */
export function httpRequest(
  session: HttpSession,
  url: string,
  options: RequestOptions = {}
): Promise<HttpResponse> {
  return httpRequestInternal(session, 'GET', url, undefined, options);
}

/**
 * Make HTTP POST request with an already url-encoded body.
 */
export function httpPost(
  session: HttpSession,
  url: string,
  body: string,
  options: RequestOptions = {}
): Promise<HttpResponse> {
  return httpRequestInternal(session, 'POST', url, body, {
    ...options,
    headers: {
      ...options.headers,
      'Content-Type': 'application/x-www-form-urlencoded',
    },
  });
}

/**
 * Return the body of a successful response, or throw NetworkError for a
 * transport failure or a non-2xx status.
 */
export function ensureSuccess(url: string, response: HttpResponse): string {
  if (response.success) {
    return response.html ?? '';
  }
  if (response.statusCode > 0 && !response.error) {
    throw new NetworkError(url, `HTTP ${response.statusCode} for ${url}`, {
      statusCode: response.statusCode,
    });
  }
  throw new NetworkError(url, response.error ?? `Request failed for ${url}`, {
    statusCode: response.statusCode > 0 ? response.statusCode : undefined,
    aborted: response.aborted,
  });
}
