import { SpanKind } from "@opentelemetry/api";
import { ExportResult, ExportResultCode } from "@opentelemetry/core";
import { resourceFromAttributes } from "@opentelemetry/resources";
import type { ReadableSpan, SpanExporter } from "@opentelemetry/sdk-trace-base";
import type { CompletedSpan, SpanStatus } from "@pipeline-trace/core";

export const TRACE_ID = "4bf92f3577b34da6a3ce929d0e0e4736";

export const testResource = resourceFromAttributes({
  "service.name": "test-service",
});

export function createCompletedSpan(
  name: string,
  overrides: Partial<CompletedSpan> = {},
): CompletedSpan {
  return {
    traceId: TRACE_ID,
    spanId: "00f067aa0ba902b7",
    name,
    kind: SpanKind.INTERNAL,
    startTime: [1_700_000_000, 0],
    endTime: [1_700_000_000, 250_000_000],
    status: { code: "ok" } satisfies SpanStatus,
    attributes: {},
    ...overrides,
  };
}

/**
 * A collector stand-in that fails its first `failures` export calls and
 * records every batch it accepts.
 */
export class ScriptedSpanExporter implements SpanExporter {
  attempts = 0;
  shutdownCalls = 0;
  readonly batches: ReadableSpan[][] = [];
  private readonly failures: number;

  constructor({ failures = 0 }: { failures?: number } = {}) {
    this.failures = failures;
  }

  export(
    spans: ReadableSpan[],
    resultCallback: (result: ExportResult) => void,
  ): void {
    this.attempts += 1;
    if (this.attempts <= this.failures) {
      resultCallback({
        code: ExportResultCode.FAILED,
        error: new Error("collector unavailable"),
      });
      return;
    }
    this.batches.push(spans);
    resultCallback({ code: ExportResultCode.SUCCESS });
  }

  exportedNames(): string[] {
    return this.batches.flat().map((span) => span.name);
  }

  async shutdown(): Promise<void> {
    this.shutdownCalls += 1;
  }
}

/**
 * A collector that never answers.
 */
export class HangingSpanExporter implements SpanExporter {
  attempts = 0;
  shutdownCalls = 0;

  export(): void {
    this.attempts += 1;
  }

  async shutdown(): Promise<void> {
    this.shutdownCalls += 1;
  }
}

export const delay = (ms: number) =>
  new Promise<void>((resolve) => setTimeout(resolve, ms));
