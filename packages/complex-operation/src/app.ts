import { BatchingSpanExporter } from "@pipeline-trace/exporter";
import express, { Express, Request, Response } from "express";

import { ComplexOperationExecutor } from "./ComplexOperationExecutor";
import { createComplexOperationRouter } from "./routes/complexOperation.route";

export interface CreateAppOptions {
  executor: ComplexOperationExecutor;
  exporter: BatchingSpanExporter;
}

export function createApp({ executor, exporter }: CreateAppOptions): Express {
  const app = express();

  app.get("/healthz", (_req: Request, res: Response) => {
    res.json({ status: "ok", exporter: exporter.stats() });
  });
  app.use("/complex-operation", createComplexOperationRouter(executor));

  return app;
}
