import { diag } from "@opentelemetry/api";
import {
  BindOnceFuture,
  callWithTimeout,
  ExportResultCode,
  type InstrumentationScope,
} from "@opentelemetry/core";
import type { Resource } from "@opentelemetry/resources";
import type { ReadableSpan, SpanExporter } from "@opentelemetry/sdk-trace-base";
import {
  errorMessage,
  type CompletedSpan,
  type SpanSink,
} from "@pipeline-trace/core";

import {
  ExporterConfig,
  ExporterConfigOptions,
  resolveExporterConfig,
} from "./config";
import {
  DEFAULT_INSTRUMENTATION_SCOPE,
  ExportTarget,
  toReadableSpan,
} from "./toReadableSpan";

/**
 * Why a span never reached the collector.
 * - `capacity`: evicted from a full buffer
 * - `delivery`: its batch failed every delivery attempt
 * - `shutdown`: submitted after shutdown began
 */
export type DropReason = "capacity" | "delivery" | "shutdown";

export interface ExporterStats {
  /** Spans waiting in the buffer. */
  buffered: number;
  /** Spans in the batch being delivered. */
  inFlight: number;
  delivered: number;
  droppedCapacity: number;
  droppedDelivery: number;
  droppedShutdown: number;
  deliveredBatches: number;
  failedBatches: number;
}

export class ExportFailureError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "ExportFailureError";
  }
}

export interface BatchingSpanExporterOptions {
  /**
   * Delivers batches to the collector.
   */
  exporter: SpanExporter;
  /**
   * Describes the service that produced the spans.
   */
  resource: Resource;
  instrumentationScope?: InstrumentationScope;
  config?: ExporterConfigOptions;
  /**
   * Called once for every span that is dropped.
   */
  onDrop?: (span: CompletedSpan, reason: DropReason) => void;
}

const delay = (ms: number) =>
  new Promise<void>((resolve) => setTimeout(resolve, ms));

/**
 * Buffers completed spans and delivers them to a {@link SpanExporter} in
 * batches, away from the code that produced them.
 *
 * {@link submit} never blocks or throws. At most `bufferCapacity` spans are
 * held at once, counting the batch being delivered; beyond that the oldest
 * buffered span is dropped. A flush starts when `batchMaxSize` spans are
 * buffered, when `batchMaxAgeMillis` has passed since the last flush, or on
 * {@link flush} and {@link shutdown}. Only one batch is delivered at a time;
 * a failed delivery is retried `exportRetryLimit` times with exponential
 * backoff and the batch is then dropped. Delivery failures are only counted
 * and logged through `diag`.
 *
 * @example
 * ```typescript
 * import { OTLPTraceExporter } from "@opentelemetry/exporter-trace-otlp-proto";
 * import { resourceFromAttributes } from "@opentelemetry/resources";
 *
 * const exporter = new BatchingSpanExporter({
 *   exporter: new OTLPTraceExporter({ url: "http://localhost:4318/v1/traces" }),
 *   resource: resourceFromAttributes({ "service.name": "checkout" }),
 *   config: { batchMaxSize: 100, exportRetryLimit: 2 },
 * });
 * const tracing = new TracingContext({ sink: exporter });
 * ```
 */
export class BatchingSpanExporter implements SpanSink {
  private readonly exporter: SpanExporter;
  private readonly target: ExportTarget;
  private readonly config: ExporterConfig;
  private readonly onDrop?: (span: CompletedSpan, reason: DropReason) => void;
  private readonly shutdownOnce: BindOnceFuture<void>;
  private buffer: CompletedSpan[] = [];
  private delivering: CompletedSpan[] = [];
  private draining?: Promise<void>;
  private timer?: ReturnType<typeof setTimeout>;
  /** Set once the shutdown deadline has passed; nothing is exported after it. */
  private abandoned = false;
  private readonly counters = {
    delivered: 0,
    droppedCapacity: 0,
    droppedDelivery: 0,
    droppedShutdown: 0,
    deliveredBatches: 0,
    failedBatches: 0,
  };

  constructor({
    exporter,
    resource,
    instrumentationScope = DEFAULT_INSTRUMENTATION_SCOPE,
    config,
    onDrop,
  }: BatchingSpanExporterOptions) {
    this.exporter = exporter;
    this.target = { resource, instrumentationScope };
    this.config = resolveExporterConfig(config);
    this.onDrop = onDrop;
    this.shutdownOnce = new BindOnceFuture(this.doShutdown, this);
    this.resetTimer();
  }

  submit(span: CompletedSpan): void {
    if (this.shutdownOnce.isCalled) {
      this.drop(span, "shutdown");
      return;
    }
    this.buffer.push(span);
    while (
      this.buffer.length > 0 &&
      this.buffer.length + this.delivering.length > this.config.bufferCapacity
    ) {
      const evicted = this.buffer.shift();
      if (evicted) {
        this.drop(evicted, "capacity");
      }
    }
    if (
      this.draining == null &&
      this.buffer.length >= this.config.batchMaxSize
    ) {
      this.triggerFlush();
    }
  }

  /**
   * Delivers the buffer batch by batch until it is empty, including spans
   * submitted while delivering. Joins the delivery already under way, if any.
   * @returns a promise that settles once the buffer has been drained; it
   * never rejects
   */
  flush(): Promise<void> {
    this.resetTimer();
    if (this.draining == null) {
      this.draining = this.drain().finally(() => {
        this.draining = undefined;
      });
    }
    return this.draining;
  }

  /**
   * Flushes what is left, waiting at most `shutdownFlushTimeoutMillis`, then
   * shuts the underlying exporter down. Spans not delivered by the deadline
   * are dropped. Only the first call has an effect.
   */
  shutdown(): Promise<void> {
    return this.shutdownOnce.call();
  }

  /**
   * Spans currently buffered, oldest first.
   */
  bufferedSpans(): readonly CompletedSpan[] {
    return [...this.buffer];
  }

  stats(): ExporterStats {
    return {
      buffered: this.buffer.length,
      inFlight: this.delivering.length,
      ...this.counters,
    };
  }

  private async doShutdown(): Promise<void> {
    if (this.timer) {
      clearTimeout(this.timer);
      this.timer = undefined;
    }
    const timeout = this.config.shutdownFlushTimeoutMillis;
    try {
      await callWithTimeout(this.flush(), timeout);
    } catch (error) {
      const abandoned = this.abandon();
      diag.warn(
        `Span flush did not finish within ${timeout}ms of shutdown; dropped ${abandoned} span(s)`,
        error,
      );
    }
    try {
      await this.exporter.shutdown();
    } catch (error) {
      diag.error("Failed to shut down the span exporter", error);
    }
  }

  /**
   * Drops the batch being delivered and everything still buffered.
   * @returns the number of spans dropped
   */
  private abandon(): number {
    this.abandoned = true;
    const pending = [...this.delivering, ...this.buffer];
    this.delivering = [];
    this.buffer = [];
    for (const span of pending) {
      this.drop(span, "shutdown");
    }
    return pending.length;
  }

  private async drain(): Promise<void> {
    while (this.buffer.length > 0 && !this.abandoned) {
      const batch = this.buffer.splice(0, this.config.batchMaxSize);
      this.delivering = batch;
      try {
        await this.deliver(batch);
      } catch (error) {
        diag.error("Unexpected failure while delivering spans", error);
      } finally {
        if (this.delivering === batch) {
          this.delivering = [];
        }
      }
    }
  }

  private triggerFlush(): void {
    this.flush().catch((error: unknown) => {
      diag.error("Unexpected failure while flushing spans", error);
    });
  }

  private resetTimer(): void {
    if (this.timer) {
      clearTimeout(this.timer);
    }
    if (this.shutdownOnce.isCalled) {
      this.timer = undefined;
      return;
    }
    this.timer = setTimeout(
      () => this.triggerFlush(),
      this.config.batchMaxAgeMillis,
    );
    this.timer.unref();
  }

  /**
   * Exports one batch with retries. Once the exporter has been abandoned the
   * batch is already counted as dropped, so late outcomes are ignored.
   */
  private async deliver(batch: CompletedSpan[]): Promise<void> {
    const maxAttempts = this.config.exportRetryLimit + 1;
    const spans = batch.map((span) => toReadableSpan(span, this.target));
    let attempts = 0;
    let lastError: unknown;
    while (attempts < maxAttempts && !this.abandoned) {
      attempts += 1;
      try {
        await this.exportOnce(spans);
        if (this.abandoned) {
          return;
        }
        this.counters.delivered += batch.length;
        this.counters.deliveredBatches += 1;
        return;
      } catch (error) {
        lastError = error;
        diag.debug(
          `Span batch export attempt ${attempts}/${maxAttempts} failed: ${errorMessage(error)}`,
        );
      }
      if (attempts < maxAttempts && !this.abandoned) {
        await delay(this.backoffMillis(attempts));
      }
    }
    if (this.abandoned) {
      return;
    }
    this.counters.failedBatches += 1;
    for (const span of batch) {
      this.drop(span, "delivery");
    }
    diag.warn(
      `Dropped a batch of ${batch.length} span(s) after ${attempts} export attempt(s): ${errorMessage(lastError)}`,
    );
  }

  private exportOnce(spans: ReadableSpan[]): Promise<void> {
    const exported = new Promise<void>((resolve, reject) => {
      this.exporter.export(spans, (result) => {
        if (result.code === ExportResultCode.SUCCESS) {
          resolve();
        } else {
          reject(
            new ExportFailureError(
              `Collector rejected a batch of ${spans.length} span(s)`,
              { cause: result.error },
            ),
          );
        }
      });
    });
    return callWithTimeout(exported, this.config.exportTimeoutMillis);
  }

  private backoffMillis(attempt: number): number {
    return Math.min(
      this.config.retryBaseDelayMillis * 2 ** (attempt - 1),
      this.config.retryMaxDelayMillis,
    );
  }

  private drop(span: CompletedSpan, reason: DropReason): void {
    switch (reason) {
      case "capacity":
        this.counters.droppedCapacity += 1;
        break;
      case "delivery":
        this.counters.droppedDelivery += 1;
        break;
      case "shutdown":
        this.counters.droppedShutdown += 1;
        break;
    }
    if (this.onDrop == null) {
      return;
    }
    try {
      this.onDrop(span, reason);
    } catch (error) {
      diag.error("Span drop listener threw", error);
    }
  }
}
