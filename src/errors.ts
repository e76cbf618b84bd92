/**
 * Error taxonomy for shindan operations.
 *
 * Every failure surfaces as a subclass of ShindanError carrying a stable `code`,
 * so callers can branch on the code without string-matching messages.
 */

export type ShindanErrorCode =
  | 'network_error'
  | 'session_cookie_not_found'
  | 'token_not_found'
  | 'element_not_found'
  | 'script_not_found'
  | 'invalid_region'
  | 'invalid_options';

export abstract class ShindanError extends Error {
  abstract readonly code: ShindanErrorCode;

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

/** Transport failure, timeout, cancellation or a non-2xx response. */
export class NetworkError extends ShindanError {
  readonly code = 'network_error';
  readonly url: string;
  readonly statusCode?: number;
  readonly aborted: boolean;

  constructor(
    url: string,
    message: string,
    details: { statusCode?: number; aborted?: boolean; cause?: unknown } = {}
  ) {
    super(message, { cause: details.cause });
    this.url = url;
    this.statusCode = details.statusCode;
    this.aborted = details.aborted ?? false;
  }
}

export class SessionCookieNotFoundError extends ShindanError {
  readonly code = 'session_cookie_not_found';
  readonly cookieName: string;

  constructor(cookieName: string) {
    super(`Session cookie "${cookieName}" not found in response`);
    this.cookieName = cookieName;
  }
}

export class TokenNotFoundError extends ShindanError {
  readonly code = 'token_not_found';
  readonly field: string;

  constructor(field: string) {
    super(`Required form token not found: ${field}`);
    this.field = field;
  }
}

export class ElementNotFoundError extends ShindanError {
  readonly code = 'element_not_found';
  readonly element: string;

  constructor(element: string) {
    super(`Expected element not found: ${element}`);
    this.element = element;
  }
}

export class ScriptNotFoundError extends ShindanError {
  readonly code = 'script_not_found';
  readonly shindanId: string;

  constructor(shindanId: string) {
    super(`Failed to find script with id ${shindanId}`);
    this.shindanId = shindanId;
  }
}

export class InvalidRegionError extends ShindanError {
  readonly code = 'invalid_region';
  readonly region: string;

  constructor(region: string) {
    super(`Invalid region: ${region}`);
    this.region = region;
  }
}

export class InvalidOptionsError extends ShindanError {
  readonly code = 'invalid_options';
  readonly issues: string[];

  constructor(issues: string[]) {
    super(`Invalid client options:\n${issues.join('\n')}`);
    this.issues = issues;
  }
}

export function isShindanError(error: unknown): error is ShindanError {
  return error instanceof ShindanError;
}
