import { DiagConsoleLogger, DiagLogger, DiagLogLevel } from "@opentelemetry/api";

import { TracingContext } from "../trace/TracingContext";

export type LogLevel = "error" | "warn" | "info" | "debug" | "verbose";

export const LOG_LEVEL_NAMES = [
  "none",
  "error",
  "warn",
  "info",
  "debug",
  "verbose",
  "all",
] as const;

export type LogLevelName = (typeof LOG_LEVEL_NAMES)[number];

const LOG_LEVEL_THRESHOLDS: Record<LogLevelName, DiagLogLevel> = {
  none: DiagLogLevel.NONE,
  error: DiagLogLevel.ERROR,
  warn: DiagLogLevel.WARN,
  info: DiagLogLevel.INFO,
  debug: DiagLogLevel.DEBUG,
  verbose: DiagLogLevel.VERBOSE,
  all: DiagLogLevel.ALL,
};

export function toDiagLogLevel(name: LogLevelName): DiagLogLevel {
  return LOG_LEVEL_THRESHOLDS[name];
}

export type LogRecordAttributes = Record<string, unknown>;

export interface CorrelationLoggerOptions {
  tracing: TracingContext;
  /**
   * Where records are written. Defaults to a {@link DiagConsoleLogger}.
   */
  sink?: DiagLogger;
  level?: DiagLogLevel;
}

/**
 * Writes log records tagged with the `trace_id` and `span_id` of the
 * innermost open span of the calling async path, so call sites never pass
 * identifiers around.
 */
export class CorrelationLogger {
  private readonly tracing: TracingContext;
  private readonly sink: DiagLogger;
  private readonly level: DiagLogLevel;

  constructor({
    tracing,
    sink = new DiagConsoleLogger(),
    level = DiagLogLevel.INFO,
  }: CorrelationLoggerOptions) {
    this.tracing = tracing;
    this.sink = sink;
    this.level = level;
  }

  log(
    level: LogLevel,
    message: string,
    attributes: LogRecordAttributes = {},
  ): void {
    if (LOG_LEVEL_THRESHOLDS[level] > this.level) {
      return;
    }
    this.sink[level](message, { ...this.correlationIds(), ...attributes });
  }

  error(message: string, attributes?: LogRecordAttributes): void {
    this.log("error", message, attributes);
  }

  warn(message: string, attributes?: LogRecordAttributes): void {
    this.log("warn", message, attributes);
  }

  info(message: string, attributes?: LogRecordAttributes): void {
    this.log("info", message, attributes);
  }

  debug(message: string, attributes?: LogRecordAttributes): void {
    this.log("debug", message, attributes);
  }

  verbose(message: string, attributes?: LogRecordAttributes): void {
    this.log("verbose", message, attributes);
  }

  private correlationIds(): { trace_id?: string; span_id?: string } {
    const stack = this.tracing.activeStack();
    if (stack == null) {
      return {};
    }
    const span = stack.innermostOpen();
    if (span == null) {
      return { trace_id: stack.traceId };
    }
    return { trace_id: span.traceId, span_id: span.spanId };
  }
}
