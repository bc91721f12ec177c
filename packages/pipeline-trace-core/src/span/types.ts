import type { Attributes, HrTime, SpanKind } from "@opentelemetry/api";

/**
 * The outcome recorded on a span when it completes.
 * `cancelled` is reserved for spans that were force-closed because the
 * invocation that owned them was cancelled or timed out.
 */
export type SpanStatus =
  | { code: "ok" }
  | { code: "error"; detail?: string }
  | { code: "cancelled"; detail?: string };

export type SpanStatusCode = SpanStatus["code"];

/**
 * An immutable record of a finished span, as handed to a {@link SpanSink}.
 */
export interface CompletedSpan {
  readonly traceId: string;
  readonly spanId: string;
  /**
   * Span id of the enclosing span. Only used to rebuild the span tree.
   */
  readonly parentSpanId?: string;
  readonly name: string;
  readonly kind: SpanKind;
  readonly startTime: HrTime;
  readonly endTime: HrTime;
  readonly status: SpanStatus;
  readonly attributes: Readonly<Attributes>;
}

/**
 * Receives every span exactly once, at completion.
 * Implementations must not block or throw.
 */
export interface SpanSink {
  submit(span: CompletedSpan): void;
}
