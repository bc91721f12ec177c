import {
  Attributes,
  AttributeValue,
  diag,
  HrTime,
  SpanKind,
} from "@opentelemetry/api";
import { hrTime, hrTimeToNanoseconds } from "@opentelemetry/core";

import { SpanLifecycleError } from "../errors";

import { CompletedSpan, SpanStatus } from "./types";

export interface PipelineSpanOptions {
  traceId: string;
  spanId: string;
  name: string;
  kind?: SpanKind;
  parent?: PipelineSpan;
  attributes?: Attributes;
  /**
   * Called exactly once with the frozen record when the span completes.
   */
  onEnd: (span: CompletedSpan) => void;
}

/**
 * An open span owned by a single execution path.
 *
 * A span tracks its open children and refuses to complete before they have,
 * so a parent's interval always contains its children's intervals.
 */
export class PipelineSpan {
  readonly traceId: string;
  readonly spanId: string;
  readonly name: string;
  readonly kind: SpanKind;
  readonly parent?: PipelineSpan;
  readonly startTime: HrTime;
  private readonly attributes: Attributes;
  private readonly openChildren = new Set<PipelineSpan>();
  private readonly onEnd: (span: CompletedSpan) => void;
  private status: SpanStatus = { code: "ok" };
  private completed?: CompletedSpan;

  constructor({
    traceId,
    spanId,
    name,
    kind = SpanKind.INTERNAL,
    parent,
    attributes,
    onEnd,
  }: PipelineSpanOptions) {
    if (parent?.isEnded()) {
      throw new SpanLifecycleError(
        `Cannot open span "${name}" under completed span "${parent.name}"`,
      );
    }
    this.traceId = traceId;
    this.spanId = spanId;
    this.name = name;
    this.kind = kind;
    this.parent = parent;
    this.attributes = { ...attributes };
    this.onEnd = onEnd;
    this.startTime = hrTime();
    parent?.openChildren.add(this);
  }

  get parentSpanId(): string | undefined {
    return this.parent?.spanId;
  }

  get openChildCount(): number {
    return this.openChildren.size;
  }

  isEnded(): boolean {
    return this.completed != null;
  }

  setAttribute(key: string, value: AttributeValue): this {
    if (this.warnIfEnded("setAttribute")) {
      return this;
    }
    this.attributes[key] = value;
    return this;
  }

  setAttributes(attributes: Attributes): this {
    if (this.warnIfEnded("setAttributes")) {
      return this;
    }
    Object.assign(this.attributes, attributes);
    return this;
  }

  setStatus(status: SpanStatus): this {
    if (this.warnIfEnded("setStatus")) {
      return this;
    }
    this.status = status;
    return this;
  }

  getStatus(): SpanStatus {
    return this.completed?.status ?? this.status;
  }

  /**
   * Completes the span. Calling `end` on a completed span is a no-op and
   * returns `undefined`.
   * @param status overrides the status set through {@link setStatus}
   * @throws {SpanLifecycleError} if a child span is still open
   */
  end(status?: SpanStatus): CompletedSpan | undefined {
    if (this.completed) {
      return undefined;
    }
    if (this.openChildren.size > 0) {
      throw new SpanLifecycleError(
        `Span "${this.name}" cannot end while ${this.openChildren.size} child span(s) are still open`,
      );
    }
    return this.complete(status ?? this.status);
  }

  /**
   * Completes every open descendant, deepest first, and then this span, all
   * with the given status.
   * @returns the records completed by this call, in completion order
   */
  forceEnd(status: SpanStatus): CompletedSpan[] {
    if (this.completed) {
      return [];
    }
    const closed: CompletedSpan[] = [];
    for (const child of [...this.openChildren]) {
      closed.push(...child.forceEnd(status));
    }
    closed.push(this.complete(status));
    return closed;
  }

  private complete(status: SpanStatus): CompletedSpan {
    let endTime = hrTime();
    if (hrTimeToNanoseconds(endTime) < hrTimeToNanoseconds(this.startTime)) {
      endTime = this.startTime;
    }
    const completed: CompletedSpan = Object.freeze({
      traceId: this.traceId,
      spanId: this.spanId,
      parentSpanId: this.parentSpanId,
      name: this.name,
      kind: this.kind,
      startTime: this.startTime,
      endTime,
      status: Object.freeze({ ...status }),
      attributes: Object.freeze({ ...this.attributes }),
    });
    this.completed = completed;
    this.parent?.openChildren.delete(this);
    this.onEnd(completed);
    return completed;
  }

  private warnIfEnded(operation: string): boolean {
    if (this.completed) {
      diag.debug(
        `Ignoring ${operation} on completed span "${this.name}" (${this.spanId})`,
      );
      return true;
    }
    return false;
  }
}
