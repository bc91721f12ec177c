export * from "./app";
export * from "./ComplexOperationExecutor";
export * from "./config";
export * from "./errors";
export * from "./ExternalCallAdapter";
export * from "./phases";
export * from "./service";
