import type { RequestHandler } from "express";
import type { LivenessFlag } from "../lifecycle/liveness.js";

const RETRY_AFTER_SECONDS = "5";

/**
 * Turns away requests that reach the pipeline after draining began, typically on
 * a keep-alive socket opened earlier. Mounted inside the correlation and access
 * log stages, so the refusal still carries X-Request-Id and gets its record.
 */
export const createDrainGate = (liveness: LivenessFlag): RequestHandler => {
  return (_req, res, next) => {
    if (liveness.state !== "draining") {
      return next();
    }

    res.setHeader("Connection", "close");
    res.setHeader("Retry-After", RETRY_AFTER_SECONDS);
    res.status(503).end();
  };
};
