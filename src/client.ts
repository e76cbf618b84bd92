/**
 * ShindanMaker client: the public operations over negotiate → submit → extract.
 */
import { resolveClientConfig, type ClientConfig, type ClientOptions } from './config.js';
import { extractDescription, extractTitle } from './extract/title-extractor.js';
import { parseSegments } from './extract/segment-parser.js';
import type { Segment } from './extract/segments.js';
import { buildSnapshot } from './extract/snapshot.js';
import { withSession } from './fetch/http-client.js';
import { fetchPage, negotiateSession } from './fetch/session.js';
import { submitForm } from './fetch/submit.js';
import type { RequestContext, SubmissionRequest } from './fetch/types.js';
import { logger } from './logger.js';
import { buildShindanUrl } from './sites/regions.js';

export interface CallOptions {
  /** Aborts the in-flight request; the call rejects with NetworkError */
  signal?: AbortSignal;
}

export interface TitleWithDescription {
  title: string;
  description: string;
}

export interface SegmentsWithTitle {
  segments: Segment[];
  title: string;
}

export interface HtmlWithTitle {
  html: string;
  title: string;
}

interface Exchange<T> {
  initial: T;
  responseText: string;
}

const ignoreInitial = (): void => undefined;

/**
 * Calls share nothing but the frozen config: each one opens its own transport
 * session and negotiates its own tokens, so any number may run concurrently.
 */
export class ShindanClient {
  readonly config: ClientConfig;

  constructor(options: ClientOptions = {}) {
    this.config = resolveClientConfig(options);
  }

  /** Page URL for a shindan id on the configured site. */
  urlFor(id: string): string {
    return buildShindanUrl(this.config.baseUrl, id);
  }

  async getTitle(id: string, call: CallOptions = {}): Promise<string> {
    return extractTitle(await this.fetchDocument(id, call));
  }

  async getDescription(id: string, call: CallOptions = {}): Promise<string> {
    return extractDescription(await this.fetchDocument(id, call));
  }

  async getTitleWithDescription(id: string, call: CallOptions = {}): Promise<TitleWithDescription> {
    const document = await this.fetchDocument(id, call);
    return { title: extractTitle(document), description: extractDescription(document) };
  }

  async getSegments(id: string, displayName: string, call: CallOptions = {}): Promise<Segment[]> {
    const { responseText } = await this.exchange({ id, displayName }, call, ignoreInitial);
    return parseSegments(responseText);
  }

  async getSegmentsWithTitle(
    id: string,
    displayName: string,
    call: CallOptions = {}
  ): Promise<SegmentsWithTitle> {
    const { initial: title, responseText } = await this.exchange(
      { id, displayName },
      call,
      extractTitle
    );
    return { segments: parseSegments(responseText), title };
  }

  async getHtml(id: string, displayName: string, call: CallOptions = {}): Promise<string> {
    const { responseText } = await this.exchange({ id, displayName }, call, ignoreInitial);
    return this.snapshot(id, responseText);
  }

  async getHtmlWithTitle(
    id: string,
    displayName: string,
    call: CallOptions = {}
  ): Promise<HtmlWithTitle> {
    const { initial: title, responseText } = await this.exchange(
      { id, displayName },
      call,
      extractTitle
    );
    return { html: this.snapshot(id, responseText), title };
  }

  private snapshot(id: string, responseText: string): string {
    return buildSnapshot(id, responseText, {
      baseUrl: this.config.baseUrl,
      assets: this.config.assets,
    });
  }

  private requestContext(call: CallOptions): RequestContext {
    return {
      timeout: this.config.timeout,
      userAgent: this.config.userAgent,
      signal: call.signal,
    };
  }

  private fetchDocument(id: string, call: CallOptions): Promise<Document> {
    const url = this.urlFor(id);
    return withSession(this.config, async (session) => {
      const page = await fetchPage(session, url, this.requestContext(call));
      return page.document;
    });
  }

  /**
   * GET, negotiate, inspect the initial document, then POST. `inspectInitial`
   * runs before submission, so a missing title fails the call without a POST.
   */
  private exchange<T>(
    request: SubmissionRequest,
    call: CallOptions,
    inspectInitial: (document: Document) => T
  ): Promise<Exchange<T>> {
    const url = this.urlFor(request.id);
    const ctx = this.requestContext(call);

    return withSession(this.config, async (session) => {
      const negotiated = await negotiateSession(session, url, ctx);
      const initial = inspectInitial(negotiated.document);
      const responseText = await submitForm(
        session,
        negotiated.context,
        request.displayName,
        ctx
      );
      logger.debug({ id: request.id, bodyLength: responseText.length }, 'Shindan submitted');
      return { initial, responseText };
    });
  }
}
