/**
 * Form submission with a negotiated session.
 */
import { logger } from '../logger.js';
import { buildFormFields, encodeFormBody } from './form.js';
import { ensureSuccess, httpPost, type HttpSession } from './http-client.js';
import { requestHeaders, SESSION_COOKIE_NAME } from './session.js';
import type { RequestContext, SessionContext } from './types.js';

export function sessionCookieHeader(sessionCookie: string): string {
  return `${SESSION_COOKIE_NAME}=${sessionCookie};`;
}

/**
 * POST the shindan form and return the raw result page. No retry.
 * @throws NetworkError on transport failure, timeout, abort or non-2xx status
 */
export async function submitForm(
  session: HttpSession,
  context: SessionContext,
  displayName: string,
  ctx: RequestContext
): Promise<string> {
  const body = encodeFormBody(buildFormFields(context, displayName));

  logger.debug({ url: context.url, bodyLength: body.length }, 'Submitting shindan form');

  const response = await httpPost(session, context.url, body, {
    headers: {
      ...requestHeaders(ctx),
      Cookie: sessionCookieHeader(context.sessionCookie),
    },
    timeoutMs: ctx.timeout,
    signal: ctx.signal,
  });
  return ensureSuccess(context.url, response);
}
