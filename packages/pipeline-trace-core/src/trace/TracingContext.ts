import {
  Attributes,
  ContextManager,
  createContextKey,
  SpanKind,
} from "@opentelemetry/api";
import { AsyncLocalStorageContextManager } from "@opentelemetry/context-async-hooks";
import { IdGenerator, RandomIdGenerator } from "@opentelemetry/sdk-trace-base";

import { ContextStack } from "../context/ContextStack";
import { SpanLifecycleError } from "../errors";
import { PipelineSpan } from "../span/PipelineSpan";
import { CompletedSpan, SpanSink, SpanStatus } from "../span/types";
import { errorMessage } from "../utils/typeUtils";

const CONTEXT_STACK_KEY = createContextKey(
  "pipeline-trace Context Key context stack",
);

export interface SpanStartOptions {
  attributes?: Attributes;
  kind?: SpanKind;
}

export interface TraceStartOptions extends SpanStartOptions {
  /**
   * Joins an existing trace instead of generating a new trace id.
   */
  traceId?: string;
}

export interface StartedSpan {
  span: PipelineSpan;
  /**
   * The parent stack with the new span pushed on top.
   */
  stack: ContextStack;
}

export interface TracingContextOptions {
  /**
   * Receives every completed span.
   */
  sink: SpanSink;
  idGenerator?: IdGenerator;
  /**
   * Tracks the active {@link ContextStack} of each async execution path.
   * It is enabled by the tracing context and never registered globally.
   */
  contextManager?: ContextManager;
}

/**
 * Owns span creation for one process: id generation, the hand-off of
 * completed spans to the sink and the active context stack of each async
 * execution path. Construct one at startup and pass it to whatever opens
 * spans.
 */
export class TracingContext {
  private readonly sink: SpanSink;
  private readonly idGenerator: IdGenerator;
  private readonly contextManager: ContextManager;

  constructor({
    sink,
    idGenerator = new RandomIdGenerator(),
    contextManager = new AsyncLocalStorageContextManager(),
  }: TracingContextOptions) {
    this.sink = sink;
    this.idGenerator = idGenerator;
    this.contextManager = contextManager.enable();
  }

  /**
   * Opens the root span of a new trace.
   */
  startTrace(
    name: string,
    {
      traceId = this.idGenerator.generateTraceId(),
      ...options
    }: TraceStartOptions = {},
  ): StartedSpan {
    const span = this.createSpan(name, traceId, undefined, options);
    return { span, stack: ContextStack.root(traceId).push(span) };
  }

  /**
   * Opens a child of the innermost span of `parent`.
   * @throws {SpanLifecycleError} if `parent` is empty or its top span has completed
   */
  startSpan(
    name: string,
    parent: ContextStack,
    options: SpanStartOptions = {},
  ): StartedSpan {
    const parentSpan = parent.top;
    if (parentSpan == null) {
      throw new SpanLifecycleError(
        `Cannot open span "${name}" on an empty context stack`,
      );
    }
    const span = this.createSpan(name, parent.traceId, parentSpan, options);
    return { span, stack: parent.push(span) };
  }

  /**
   * Completes the innermost span of `stack`.
   * @returns the stack beneath the completed span
   */
  endSpan(stack: ContextStack, status?: SpanStatus): ContextStack {
    const [span, rest] = stack.pop();
    span.end(status);
    return rest;
  }

  /**
   * Runs `fn` inside a new child span of `parent`, with the child's stack
   * active. The span ends with the status set on it (ok by default) when `fn`
   * resolves, or with an error status carrying the thrown message when it
   * rejects. The rejection is rethrown.
   */
  async withSpan<T>(
    name: string,
    parent: ContextStack,
    fn: (span: PipelineSpan, stack: ContextStack) => Promise<T> | T,
    options: SpanStartOptions = {},
  ): Promise<T> {
    const { span, stack } = this.startSpan(name, parent, options);
    return this.withStack(stack, async () => {
      try {
        return await fn(span, stack);
      } catch (error) {
        span.setStatus({ code: "error", detail: errorMessage(error) });
        if (error instanceof Error) {
          span.setAttribute("exception.type", error.name);
        }
        throw error;
      } finally {
        this.endSpan(stack);
      }
    });
  }

  /**
   * Runs `fn` with `stack` as the active stack of the current async path.
   */
  withStack<T>(stack: ContextStack, fn: () => T): T {
    const ctx = this.contextManager
      .active()
      .setValue(CONTEXT_STACK_KEY, stack);
    return this.contextManager.with(ctx, fn);
  }

  /**
   * The stack made active by the closest enclosing {@link withStack}, if any.
   */
  activeStack(): ContextStack | undefined {
    const value = this.contextManager.active().getValue(CONTEXT_STACK_KEY);
    return value instanceof ContextStack ? value : undefined;
  }

  fork(stack: ContextStack): ContextStack {
    return stack.fork();
  }

  /**
   * Force-closes `span` and all of its open descendants with the cancelled
   * status. Every closed span is submitted to the sink.
   */
  cancel(span: PipelineSpan, detail?: string): CompletedSpan[] {
    return span.forceEnd({ code: "cancelled", detail });
  }

  /**
   * Disables the context manager. Spans already open can still be ended.
   */
  close(): void {
    this.contextManager.disable();
  }

  private createSpan(
    name: string,
    traceId: string,
    parent: PipelineSpan | undefined,
    { attributes, kind }: SpanStartOptions,
  ): PipelineSpan {
    return new PipelineSpan({
      traceId,
      spanId: this.idGenerator.generateSpanId(),
      name,
      kind,
      parent,
      attributes,
      onEnd: (completed) => this.sink.submit(completed),
    });
  }
}
