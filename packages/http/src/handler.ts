import type {Extensions} from './extensions';
import type {HttpRequest} from './request';
import {intoResponse, notFoundResponse, type HttpResponse, type IntoResponse, type Responder} from './response';
import type {Result} from './result';

export type RequestContext = {
  readonly request: HttpRequest;
  readonly extensions: Extensions;
};

/** A failed extraction carries its own rendering, so handlers never see it. */
export type ExtractResult<T> = Result<T, IntoResponse>;

export type Extractor<T> = (context: RequestContext) => ExtractResult<T>;

export type DispatchOutcome =
  | {kind: 'routed'; response: HttpResponse}
  | {kind: 'extractor_failed'; response: HttpResponse}
  | {kind: 'no_route_matched'; request: HttpRequest};

export const routed = (response: HttpResponse): DispatchOutcome => ({kind: 'routed', response});

export const extractorFailed = (response: HttpResponse): DispatchOutcome => ({kind: 'extractor_failed', response});

export const noRouteMatched = (request: HttpRequest): DispatchOutcome => ({kind: 'no_route_matched', request});

/**
 * Entry point a router hands to the server. Built once at startup and shared,
 * read-only, by every connection.
 */
export type Dispatch = (request: HttpRequest, extensions: Extensions) => DispatchOutcome | Promise<DispatchOutcome>;

export type RouteHandler = (context: RequestContext) => Promise<DispatchOutcome>;

export const resolveDispatchOutcome = (outcome: DispatchOutcome): HttpResponse => {
  switch (outcome.kind) {
    case 'routed':
    case 'extractor_failed':
      return outcome.response;
    case 'no_route_matched':
      return notFoundResponse();
  }
};

type ExtractorSet = Record<string, Extractor<unknown>>;

export type Extracted<E extends ExtractorSet> = {
  [K in keyof E]: E[K] extends Extractor<infer T> ? T : never;
};

/**
 * Binds named extractors to a handler. Extractors run in declaration order and
 * the first rejection short-circuits into an `extractor_failed` outcome.
 */
export const createHandler =
  <E extends ExtractorSet>(
    extractors: E,
    handle: (values: Extracted<E>, context: RequestContext) => Responder | Promise<Responder>
  ): RouteHandler =>
  async context => {
    const values: Record<string, unknown> = {};
    for (const [name, extractor] of Object.entries(extractors)) {
      const extracted = extractor(context);
      if (!extracted.ok) {
        return extractorFailed(extracted.error.toResponse());
      }

      values[name] = extracted.value;
    }

    // every key of `extractors` was filled by the loop above
    const responder = await handle(values as Extracted<E>, context);
    return routed(intoResponse(responder));
  };
