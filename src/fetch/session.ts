/**
 * Session negotiation: the initial GET that yields the session cookie and the
 * hidden form tokens a submission has to echo back.
 */
import { SessionCookieNotFoundError } from '../errors.js';
import { parseDocument } from '../extract/dom.js';
import { logger } from '../logger.js';
import { extractTokenFields, discoverPartsFields } from './form.js';
import {
  ensureSuccess,
  httpRequest,
  type HttpSession,
  type ResponseCookie,
} from './http-client.js';
import type { RequestContext, SessionContext } from './types.js';

export const SESSION_COOKIE_NAME = '_session';

export interface FetchedPage {
  html: string;
  document: Document;
  cookies: ResponseCookie[];
}

export interface NegotiatedSession {
  context: SessionContext;
  html: string;
  document: Document;
}

export function requestHeaders(ctx: RequestContext): Record<string, string> {
  return ctx.userAgent ? { 'User-Agent': ctx.userAgent } : {};
}

/**
 * GET a shindan page and parse it.
 * @throws NetworkError on transport failure, timeout, abort or non-2xx status
 */
export async function fetchPage(
  session: HttpSession,
  url: string,
  ctx: RequestContext
): Promise<FetchedPage> {
  const response = await httpRequest(session, url, {
    headers: requestHeaders(ctx),
    timeoutMs: ctx.timeout,
    signal: ctx.signal,
  });
  const html = ensureSuccess(url, response);
  return { html, document: parseDocument(html), cookies: response.cookies };
}

export function extractSessionCookie(cookies: readonly ResponseCookie[]): string {
  const cookie = cookies.find((c) => c.name === SESSION_COOKIE_NAME);
  if (!cookie) {
    throw new SessionCookieNotFoundError(SESSION_COOKIE_NAME);
  }
  return cookie.value;
}

/**
 * Fetch the page and collect everything the follow-up POST needs.
 * @throws NetworkError, SessionCookieNotFoundError, TokenNotFoundError
 */
export async function negotiateSession(
  session: HttpSession,
  url: string,
  ctx: RequestContext
): Promise<NegotiatedSession> {
  const page = await fetchPage(session, url, ctx);
  const sessionCookie = extractSessionCookie(page.cookies);
  const tokenFields = extractTokenFields(page.document);
  const partsFields = discoverPartsFields(page.document);

  logger.debug(
    { url, tokens: tokenFields.map(([name]) => name), partsCount: partsFields.length },
    'Negotiated shindan session'
  );

  return {
    context: { url, tokenFields, partsFields, sessionCookie },
    html: page.html,
    document: page.document,
  };
}
