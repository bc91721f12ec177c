import { ConfigError } from "@pipeline-trace/core";
import { z } from "zod";

export const DEFAULT_COLLECTOR_ENDPOINT = "http://localhost:4318/v1/traces";

/**
 * Settings of the span buffer and of delivery to the collector.
 * Durations are in milliseconds.
 */
export const ExporterConfigSchema = z.object({
  /** Where batches are exported. */
  collectorEndpoint: z.string().url().default(DEFAULT_COLLECTOR_ENDPOINT),
  /** A flush starts as soon as this many spans are buffered. */
  batchMaxSize: z.number().int().positive().default(512),
  /** A flush starts when this much time has passed since the last one. */
  batchMaxAgeMillis: z.number().int().positive().default(5000),
  /** Beyond this many buffered spans the oldest are dropped. */
  bufferCapacity: z.number().int().positive().default(2048),
  /** Retries after a failed delivery, before the batch is dropped. */
  exportRetryLimit: z.number().int().nonnegative().default(3),
  exportTimeoutMillis: z.number().int().positive().default(10_000),
  retryBaseDelayMillis: z.number().int().nonnegative().default(100),
  retryMaxDelayMillis: z.number().int().nonnegative().default(2000),
  /** Upper bound on the final flush performed by `shutdown`. */
  shutdownFlushTimeoutMillis: z.number().int().positive().default(5000),
});

export type ExporterConfig = z.infer<typeof ExporterConfigSchema>;

export type ExporterConfigOptions = z.input<typeof ExporterConfigSchema>;

/**
 * Applies defaults and validates exporter settings.
 * @throws {ConfigError} listing every invalid setting
 */
export function resolveExporterConfig(
  options: ExporterConfigOptions = {},
): ExporterConfig {
  const result = ExporterConfigSchema.safeParse(options);
  if (!result.success) {
    throw new ConfigError(
      "Invalid exporter configuration",
      result.error.issues.map(
        (issue) => `${issue.path.join(".")}: ${issue.message}`,
      ),
    );
  }
  return result.data;
}
