import { DiagLogger } from "@opentelemetry/api";
import type { SpanExporter } from "@opentelemetry/sdk-trace-base";
import {
  CorrelationLogger,
  toDiagLogLevel,
  TracingContext,
} from "@pipeline-trace/core";
import {
  BatchingSpanExporter,
  createCollectorExporter,
  createServiceResource,
} from "@pipeline-trace/exporter";
import { Express } from "express";

import { createApp } from "./app";
import { ComplexOperationExecutor } from "./ComplexOperationExecutor";
import { ServiceConfig } from "./config";
import { ExternalCallAdapter, FetchLike } from "./ExternalCallAdapter";
import { PhaseHandlers } from "./phases";

export interface ComplexOperationService {
  app: Express;
  executor: ComplexOperationExecutor;
  exporter: BatchingSpanExporter;
  tracing: TracingContext;
  logger: CorrelationLogger;
  /**
   * Flushes buffered spans within the configured deadline and releases the
   * tracing context.
   */
  shutdown(): Promise<void>;
}

export interface CreateServiceOptions {
  config: ServiceConfig;
  /**
   * Receives span batches. Defaults to an OTLP exporter for
   * `config.exporter.collectorEndpoint`.
   */
  spanExporter?: SpanExporter;
  fetch?: FetchLike;
  handlers?: PhaseHandlers;
  logSink?: DiagLogger;
}

/**
 * Wires the tracing context, span exporter, executor and HTTP app together.
 */
export function createService({
  config,
  spanExporter = createCollectorExporter(config.exporter),
  fetch,
  handlers,
  logSink,
}: CreateServiceOptions): ComplexOperationService {
  const exporter = new BatchingSpanExporter({
    exporter: spanExporter,
    resource: createServiceResource(config.serviceName),
    config: config.exporter,
  });
  const tracing = new TracingContext({ sink: exporter });
  const logger = new CorrelationLogger({
    tracing,
    sink: logSink,
    level: toDiagLogLevel(config.logLevel),
  });
  const executor = new ComplexOperationExecutor({
    tracing,
    logger,
    externalCall: new ExternalCallAdapter({ tracing, logger, fetch }),
    externalApiUrl: config.externalApiUrl,
    handlers,
    timeoutMillis: config.pipelineTimeoutMillis,
  });
  return {
    app: createApp({ executor, exporter }),
    executor,
    exporter,
    tracing,
    logger,
    shutdown: async () => {
      await exporter.shutdown();
      tracing.close();
    },
  };
}
