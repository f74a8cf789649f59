import { Router } from "express";
import type { LivenessFlag } from "../lifecycle/liveness.js";
import { createHealthRoutes } from "./health.routes.js";
import pageRoutes from "./pages.routes.js";

export const createRouter = ({ liveness }: { liveness: LivenessFlag }): Router => {
  const router = Router();

  router.use(pageRoutes);
  router.use(createHealthRoutes(liveness));

  return router;
};
