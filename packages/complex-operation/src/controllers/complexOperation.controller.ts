import { diag } from "@opentelemetry/api";
import { errorMessage } from "@pipeline-trace/core";
import { Request, Response } from "express";

import { ComplexOperationExecutor } from "../ComplexOperationExecutor";
import { statusCodeFor } from "../errors";

const correlationIdOf = (req: Request): string | undefined => {
  const header = req.get("x-correlation-id");
  if (header) {
    return header;
  }
  const { correlation_id } = req.query;
  return typeof correlation_id === "string" && correlation_id !== ""
    ? correlation_id
    : undefined;
};

export const createComplexOperationController =
  (executor: ComplexOperationExecutor) =>
  async (req: Request, res: Response) => {
    const controller = new AbortController();
    res.on("close", () => {
      if (!res.writableFinished) {
        controller.abort();
      }
    });
    try {
      const result = await executor.run(
        { correlationId: correlationIdOf(req) },
        { signal: controller.signal },
      );
      if (result.ok) {
        res.json(result.value);
        return;
      }
      res
        .status(statusCodeFor(result.error))
        .json({ error: result.error, trace_id: result.traceId });
    } catch (error) {
      diag.error("Unexpected failure while running the complex operation", error);
      res.status(500).json({
        error: { kind: "internal", message: errorMessage(error) },
      });
    }
  };
