import { SpanStatusCode, TraceFlags } from "@opentelemetry/api";
import type { SpanStatus as OTelSpanStatus } from "@opentelemetry/api";
import { hrTimeDuration, type InstrumentationScope } from "@opentelemetry/core";
import type { Resource } from "@opentelemetry/resources";
import type { ReadableSpan } from "@opentelemetry/sdk-trace-base";
import {
  assertUnreachable,
  type CompletedSpan,
  type SpanStatus,
} from "@pipeline-trace/core";

/**
 * Set on spans that were force-closed by a cancellation, since OTLP has no
 * cancelled status code.
 */
export const CANCELLED_ATTRIBUTE = "pipeline.cancelled";

export const DEFAULT_INSTRUMENTATION_SCOPE: InstrumentationScope = {
  name: "@pipeline-trace/exporter",
  version: "0.1.0",
};

export interface ExportTarget {
  resource: Resource;
  instrumentationScope: InstrumentationScope;
}

export function toOTelStatus(status: SpanStatus): OTelSpanStatus {
  switch (status.code) {
    case "ok":
      return { code: SpanStatusCode.OK };
    case "error":
      return { code: SpanStatusCode.ERROR, message: status.detail };
    case "cancelled":
      return {
        code: SpanStatusCode.ERROR,
        message: status.detail ?? "cancelled",
      };
    default:
      return assertUnreachable(status);
  }
}

/**
 * Converts a completed span into the shape OpenTelemetry exporters accept.
 */
export function toReadableSpan(
  span: CompletedSpan,
  { resource, instrumentationScope }: ExportTarget,
): ReadableSpan {
  const spanContext = {
    traceId: span.traceId,
    spanId: span.spanId,
    traceFlags: TraceFlags.SAMPLED,
  };
  const attributes =
    span.status.code === "cancelled"
      ? { ...span.attributes, [CANCELLED_ATTRIBUTE]: true }
      : { ...span.attributes };
  return {
    name: span.name,
    kind: span.kind,
    spanContext: () => spanContext,
    parentSpanContext:
      span.parentSpanId == null
        ? undefined
        : {
            traceId: span.traceId,
            spanId: span.parentSpanId,
            traceFlags: TraceFlags.SAMPLED,
          },
    startTime: span.startTime,
    endTime: span.endTime,
    duration: hrTimeDuration(span.startTime, span.endTime),
    status: toOTelStatus(span.status),
    attributes,
    links: [],
    events: [],
    ended: true,
    resource,
    instrumentationScope,
    droppedAttributesCount: 0,
    droppedEventsCount: 0,
    droppedLinksCount: 0,
  };
}
