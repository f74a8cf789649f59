import express, { type Express, type Router } from "express";
import type { Logger } from "pino";
import type { LivenessFlag } from "./lifecycle/liveness.js";
import { createAccessLogStage } from "./middleware/access-log.js";
import { createCorrelationStage } from "./middleware/correlation.js";
import { createDrainGate } from "./middleware/drain-gate.js";
import { createErrorHandler, notFoundHandler } from "./middleware/error-handler.js";
import { createRouter } from "./routes/index.js";
import type { RequestIdGenerator } from "./utils/request-id.js";

export type AppDependencies = {
  liveness: LivenessFlag;
  logger: Logger;
  nextRequestId?: RequestIdGenerator;
  /** Handler registry; defaults to the built-in routes. */
  registry?: Router;
};

export const createApp = ({ liveness, logger, nextRequestId, registry }: AppDependencies): Express => {
  const app = express();
  app.disable("x-powered-by");

  // Order matters: the correlation id must exist before the access log binds it.
  app.use(createCorrelationStage({ nextRequestId }));
  app.use(createAccessLogStage({ logger }));
  app.use(createDrainGate(liveness));
  app.use(registry ?? createRouter({ liveness }));

  app.use(notFoundHandler);
  app.use(createErrorHandler({ logger }));

  return app;
};
