import { SpanKind } from "@opentelemetry/api";
import {
  ContextStack,
  CorrelationLogger,
  errorMessage,
  isObjectWithStringKeys,
  PipelineSpan,
  TracingContext,
} from "@pipeline-trace/core";

import { ExternalCallError } from "./errors";
import { PHASES } from "./phases";

export interface FetchInit {
  method: string;
  headers: Record<string, string>;
  signal?: AbortSignal;
}

/**
 * The part of `fetch` the adapter relies on.
 */
export type FetchLike = (url: string, init: FetchInit) => Promise<Response>;

export type ExternalCallResult =
  | { ok: true; status: number; body: Record<string, unknown> }
  | { ok: false; error: ExternalCallError };

export interface ExternalCallAdapterOptions {
  tracing: TracingContext;
  logger: CorrelationLogger;
  /**
   * Defaults to the global `fetch`.
   */
  fetch?: FetchLike;
}

/**
 * Performs a traced GET against an HTTP dependency that answers with a JSON
 * object. Calls are made once and never retried.
 */
export class ExternalCallAdapter {
  private readonly tracing: TracingContext;
  private readonly logger: CorrelationLogger;
  private readonly fetch: FetchLike;

  constructor({
    tracing,
    logger,
    fetch = (url, init) => globalThis.fetch(url, init),
  }: ExternalCallAdapterOptions) {
    this.tracing = tracing;
    this.logger = logger;
    this.fetch = fetch;
  }

  /**
   * Calls `endpoint` inside an `external_call` child span of `parent`.
   * Failures are returned, not thrown, and mark the span as an error.
   */
  call(
    endpoint: string,
    parent: ContextStack,
    { signal }: { signal?: AbortSignal } = {},
  ): Promise<ExternalCallResult> {
    return this.tracing.withSpan<ExternalCallResult>(
      PHASES.externalCall,
      parent,
      async (span) => {
        let response: Response;
        try {
          response = await this.fetch(endpoint, {
            method: "GET",
            headers: { accept: "application/json" },
            signal,
          });
        } catch (error) {
          return this.fail(
            span,
            new ExternalCallError(
              `Request to ${endpoint} failed: ${errorMessage(error)}`,
              { endpoint, reason: "transport", cause: error },
            ),
          );
        }

        const { status } = response;
        span.setAttribute("http.status_code", status);
        this.logger.info(
          `External API call to ${endpoint} completed with status ${status}`,
        );
        if (!response.ok) {
          return this.fail(
            span,
            new ExternalCallError(
              `${endpoint} responded with status ${status}`,
              { endpoint, reason: "status", status },
            ),
          );
        }

        let body: unknown;
        try {
          body = await response.json();
        } catch (error) {
          return this.fail(
            span,
            new ExternalCallError(
              `${endpoint} returned a body that is not valid JSON`,
              { endpoint, reason: "body", status, cause: error },
            ),
          );
        }
        if (!isObjectWithStringKeys(body)) {
          return this.fail(
            span,
            new ExternalCallError(`${endpoint} did not return a JSON object`, {
              endpoint,
              reason: "body",
              status,
            }),
          );
        }
        return { ok: true, status, body };
      },
      {
        kind: SpanKind.CLIENT,
        attributes: { "http.method": "GET", "http.url": endpoint },
      },
    );
  }

  private fail(span: PipelineSpan, error: ExternalCallError): ExternalCallResult {
    span.setStatus({ code: "error", detail: error.message });
    span.setAttribute("exception.type", error.name);
    return { ok: false, error };
  }
}
