import { Router } from "express";
import type { LivenessFlag } from "../lifecycle/liveness.js";

export const createHealthRoutes = (liveness: LivenessFlag): Router => {
  const router = Router();

  // No body either way; orchestration tooling only reads the status.
  router.get("/health", (_req, res) => {
    res.status(liveness.isReady() ? 204 : 503).end();
  });

  return router;
};
