import { IdGenerator } from "@opentelemetry/sdk-trace-base";

import { InMemorySpanSink, TracingContext } from "../src";

/**
 * Produces predictable ids: trace ids count up from 1, span ids likewise.
 */
export class SequentialIdGenerator implements IdGenerator {
  private traces = 0;
  private spans = 0;

  generateTraceId(): string {
    this.traces += 1;
    return this.traces.toString(16).padStart(32, "0");
  }

  generateSpanId(): string {
    this.spans += 1;
    return this.spans.toString(16).padStart(16, "0");
  }
}

export function createTestTracing() {
  const sink = new InMemorySpanSink();
  const tracing = new TracingContext({
    sink,
    idGenerator: new SequentialIdGenerator(),
  });
  return { sink, tracing };
}

export const delay = (ms: number) =>
  new Promise<void>((resolve) => setTimeout(resolve, ms));
