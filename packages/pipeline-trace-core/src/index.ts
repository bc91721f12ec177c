export * from "./span/types";
export * from "./span/PipelineSpan";
export * from "./context/ContextStack";
export * from "./trace/TracingContext";
export * from "./trace/InMemorySpanSink";
export * from "./logging/CorrelationLogger";
export * from "./errors";
export * from "./utils/typeUtils";
