/**
 * Shared types for the fetch module
 */

/** One url-encoded form pair, kept as a tuple so submission order is explicit. */
export type FormField = readonly [name: string, value: string];

export interface SubmissionRequest {
  readonly id: string;
  readonly displayName: string;
}

/**
 * Everything negotiated from the initial GET that the POST must echo back.
 * Built fresh for one submission and never reused.
 */
export interface SessionContext {
  readonly url: string;
  readonly tokenFields: readonly FormField[];
  /** Page-defined `parts[n]` input names, in document order. */
  readonly partsFields: readonly string[];
  readonly sessionCookie: string;
}

/** Per-request transport settings threaded through the negotiator and submitter. */
export interface RequestContext {
  timeout: number;
  userAgent?: string;
  signal?: AbortSignal;
}
