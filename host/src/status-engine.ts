import { parseHttpDate, toHttpDatePrecision } from "./http-date";
import { createResponse, type HttpResponse } from "./http-response";
import { SUPPORTED_HTTP_VERSION, type HttpRequest } from "./request-parser";
import type { ResourceFacts, ResourceStore } from "./resource-store";

export type StatusDecision =
  | { status: 505 }
  | { status: 403 }
  | { status: 404 }
  | { status: 304; facts: ResourceFacts }
  | { status: 200; facts: ResourceFacts };

/**
 * Select the response status for a request. First match wins:
 * version, restriction, existence, conditional freshness, success.
 */
export function decideStatus(
  request: HttpRequest,
  facts: ResourceFacts,
): StatusDecision {
  if (request.version !== SUPPORTED_HTTP_VERSION) return { status: 505 };
  if (facts.restricted) return { status: 403 };
  if (!facts.exists) return { status: 404 };

  const ifModifiedSince = request.headers["if-modified-since"];
  if (ifModifiedSince !== undefined) {
    const since = parseHttpDate(ifModifiedSince);
    if (since !== null && toHttpDatePrecision(facts.lastModified) <= since) {
      return { status: 304, facts };
    }
  }

  return { status: 200, facts };
}

export type StatusEngineOptions = {
  /** clock used for `Date` headers */
  now?: () => Date;
  onError?: (error: Error, request: HttpRequest) => void;
};

/**
 * Builds complete responses for parsed requests against a resource store.
 */
export class StatusEngine {
  private readonly now: () => Date;
  private readonly onError?: (error: Error, request: HttpRequest) => void;

  constructor(
    private readonly store: ResourceStore,
    options: StatusEngineOptions = {},
  ) {
    this.now = options.now ?? (() => new Date());
    this.onError = options.onError;
  }

  async respond(request: HttpRequest): Promise<HttpResponse> {
    const now = this.now();

    // No resource lookup at all for an unsupported version.
    if (request.version !== SUPPORTED_HTTP_VERSION) {
      return createResponse(505, { now });
    }

    try {
      const facts = await this.store.resolve(request.path);
      const decision = decideStatus(request, facts);

      switch (decision.status) {
        case 200: {
          const body = await this.store.read(request.path);
          return createResponse(200, {
            body,
            contentType: decision.facts.contentType,
            lastModified: decision.facts.lastModified,
            now,
          });
        }
        case 304:
          return createResponse(304, { now });
        default:
          return createResponse(decision.status, { now });
      }
    } catch (err) {
      const error = err instanceof Error ? err : new Error(String(err));
      this.onError?.(error, request);
      return createResponse(500, { now });
    }
  }
}
