import { CompletedSpan, SpanSink } from "../span/types";

/**
 * Keeps completed spans in memory, in completion order. Useful for tests and
 * for inspecting a single invocation.
 */
export class InMemorySpanSink implements SpanSink {
  private spans: CompletedSpan[] = [];

  submit(span: CompletedSpan): void {
    this.spans.push(span);
  }

  getFinishedSpans(): CompletedSpan[] {
    return [...this.spans];
  }

  findByName(name: string): CompletedSpan | undefined {
    return this.spans.find((span) => span.name === name);
  }

  reset(): void {
    this.spans = [];
  }
}
