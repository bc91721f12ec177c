export * from "./BatchingSpanExporter";
export * from "./collector";
export * from "./config";
export * from "./toReadableSpan";
