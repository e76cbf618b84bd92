/**
 * Hidden form field discovery and submission body encoding.
 */
import { TokenNotFoundError } from '../errors.js';
import { SELECTORS, type TokenFieldName } from '../extract/selectors.js';
import type { FormField, SessionContext } from './types.js';

/** Tokens every shindan form carries. */
export const REQUIRED_TOKEN_FIELDS = ['_token', 'randname', 'type'] as const;

/**
 * Per-submission token exposed only by some page layouts. Required exactly when
 * the initial document contains the input.
 */
export const LAYOUT_TOKEN_FIELD = 'shindan_token';

export const USER_INPUT_FIELD = 'user_input_value_1';

function readTokenValue(document: Document, field: TokenFieldName): string | null {
  const input = document.querySelector(SELECTORS.tokenInputs[field]);
  if (!input) return null;
  const value = input.getAttribute('value');
  if (value === null) throw new TokenNotFoundError(field);
  return value;
}

/**
 * Read the anti-forgery tokens from the initial page, in submission order.
 * @throws TokenNotFoundError when a required token (or a declared layout token) has no value
 */
export function extractTokenFields(document: Document): FormField[] {
  const fields: FormField[] = [];

  for (const field of REQUIRED_TOKEN_FIELDS) {
    const value = readTokenValue(document, field);
    if (value === null) throw new TokenNotFoundError(field);
    fields.push([field, value]);
  }

  const layoutToken = readTokenValue(document, LAYOUT_TOKEN_FIELD);
  if (layoutToken !== null) {
    fields.push([LAYOUT_TOKEN_FIELD, layoutToken]);
  }

  return fields;
}

/** Names of the page-defined `parts[n]` inputs, in document order. */
export function discoverPartsFields(document: Document): string[] {
  const names: string[] = [];
  for (const input of document.querySelectorAll(SELECTORS.partsInputs)) {
    const name = input.getAttribute('name');
    if (name) names.push(name);
  }
  return names;
}

/**
 * Ordered submission pairs: tokens, the user input, then every `parts[n]`
 * field, all user-facing fields valued with the display name.
 */
export function buildFormFields(context: SessionContext, displayName: string): FormField[] {
  return [
    ...context.tokenFields,
    [USER_INPUT_FIELD, displayName],
    ...context.partsFields.map((name): FormField => [name, displayName]),
  ];
}

export function encodeFormBody(fields: readonly FormField[]): string {
  return new URLSearchParams(fields.map(([name, value]) => [name, value])).toString();
}
