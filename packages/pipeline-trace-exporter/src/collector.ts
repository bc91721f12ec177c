import { OTLPTraceExporter } from "@opentelemetry/exporter-trace-otlp-proto";
import { resourceFromAttributes, type Resource } from "@opentelemetry/resources";
import type { SpanExporter } from "@opentelemetry/sdk-trace-base";
import { ATTR_SERVICE_NAME } from "@opentelemetry/semantic-conventions";

import type { ExporterConfig } from "./config";

/**
 * Creates the OTLP/protobuf exporter that sends batches to the collector.
 */
export function createCollectorExporter({
  collectorEndpoint,
  exportTimeoutMillis,
}: Pick<ExporterConfig, "collectorEndpoint" | "exportTimeoutMillis">): SpanExporter {
  return new OTLPTraceExporter({
    url: collectorEndpoint,
    timeoutMillis: exportTimeoutMillis,
  });
}

export function createServiceResource(serviceName: string): Resource {
  return resourceFromAttributes({
    [ATTR_SERVICE_NAME]: serviceName,
  });
}
