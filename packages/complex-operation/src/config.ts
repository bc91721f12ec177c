import {
  ConfigError,
  LOG_LEVEL_NAMES,
  type LogLevelName,
} from "@pipeline-trace/core";
import {
  DEFAULT_COLLECTOR_ENDPOINT,
  type ExporterConfig,
  resolveExporterConfig,
} from "@pipeline-trace/exporter";
import { z } from "zod";

import { DEFAULT_PIPELINE_TIMEOUT_MILLIS } from "./ComplexOperationExecutor";

export const DEFAULT_EXTERNAL_API_URL =
  "https://jsonplaceholder.typicode.com/todos/1";

/**
 * An empty variable (`PORT=` in a `.env` file) counts as unset.
 */
const unsetIfBlank = <T extends z.ZodTypeAny>(schema: T) =>
  z.preprocess((value) => (value === "" ? undefined : value), schema);

const optionalInt = unsetIfBlank(z.coerce.number().int().optional());

const ServiceEnvSchema = z.object({
  SERVICE_NAME: unsetIfBlank(
    z.string().min(1).default("complex-operation-service"),
  ),
  PORT: unsetIfBlank(z.coerce.number().int().min(0).max(65_535).default(5000)),
  LOG_LEVEL: unsetIfBlank(z.enum(LOG_LEVEL_NAMES).default("info")),
  COLLECTOR_ENDPOINT: unsetIfBlank(
    z.string().url().default(DEFAULT_COLLECTOR_ENDPOINT),
  ),
  EXTERNAL_API_URL: unsetIfBlank(
    z.string().url().default(DEFAULT_EXTERNAL_API_URL),
  ),
  PIPELINE_TIMEOUT_MS: unsetIfBlank(
    z.coerce.number().int().positive().default(DEFAULT_PIPELINE_TIMEOUT_MILLIS),
  ),
  BATCH_MAX_SIZE: optionalInt,
  BATCH_MAX_AGE_MS: optionalInt,
  BUFFER_CAPACITY: optionalInt,
  EXPORT_RETRY_LIMIT: optionalInt,
  EXPORT_TIMEOUT_MS: optionalInt,
  RETRY_BASE_DELAY_MS: optionalInt,
  RETRY_MAX_DELAY_MS: optionalInt,
  SHUTDOWN_FLUSH_TIMEOUT_MS: optionalInt,
});

export interface ServiceConfig {
  serviceName: string;
  port: number;
  logLevel: LogLevelName;
  externalApiUrl: string;
  pipelineTimeoutMillis: number;
  exporter: ExporterConfig;
}

/**
 * Reads the service configuration from environment variables.
 * @throws {ConfigError} listing every invalid variable
 */
export function loadServiceConfig(
  env: Record<string, string | undefined> = process.env,
): ServiceConfig {
  const result = ServiceEnvSchema.safeParse(env);
  if (!result.success) {
    throw new ConfigError(
      "Invalid service configuration",
      result.error.issues.map(
        (issue) => `${issue.path.join(".")}: ${issue.message}`,
      ),
    );
  }
  const vars = result.data;
  return {
    serviceName: vars.SERVICE_NAME,
    port: vars.PORT,
    logLevel: vars.LOG_LEVEL,
    externalApiUrl: vars.EXTERNAL_API_URL,
    pipelineTimeoutMillis: vars.PIPELINE_TIMEOUT_MS,
    exporter: resolveExporterConfig({
      collectorEndpoint: vars.COLLECTOR_ENDPOINT,
      batchMaxSize: vars.BATCH_MAX_SIZE,
      batchMaxAgeMillis: vars.BATCH_MAX_AGE_MS,
      bufferCapacity: vars.BUFFER_CAPACITY,
      exportRetryLimit: vars.EXPORT_RETRY_LIMIT,
      exportTimeoutMillis: vars.EXPORT_TIMEOUT_MS,
      retryBaseDelayMillis: vars.RETRY_BASE_DELAY_MS,
      retryMaxDelayMillis: vars.RETRY_MAX_DELAY_MS,
      shutdownFlushTimeoutMillis: vars.SHUTDOWN_FLUSH_TIMEOUT_MS,
    }),
  };
}
