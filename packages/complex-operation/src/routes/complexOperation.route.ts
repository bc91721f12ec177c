import express from "express";

import { ComplexOperationExecutor } from "../ComplexOperationExecutor";
import { createComplexOperationController } from "../controllers/complexOperation.controller";

export const createComplexOperationRouter = (
  executor: ComplexOperationExecutor,
) => {
  const router = express.Router();

  router.route("/").get(createComplexOperationController(executor));
  return router;
};
