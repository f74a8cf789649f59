import type { RequestHandler } from "express";
import { attachRequestContext, createRequestContext } from "../context/request-context.js";
import { randomRequestId, type RequestIdGenerator } from "../utils/request-id.js";

export const CORRELATION_ID_HEADER = "X-Request-Id";

export type CorrelationStageOptions = {
  nextRequestId?: RequestIdGenerator;
};

/**
 * Outermost pipeline stage: reuses a non-empty inbound X-Request-Id or generates
 * one, and echoes it on the response before any handler writes.
 */
export const createCorrelationStage = ({
  nextRequestId = randomRequestId
}: CorrelationStageOptions = {}): RequestHandler => {
  return (req, res, next) => {
    const inbound = req.get(CORRELATION_ID_HEADER);
    const correlationId = inbound ? inbound : nextRequestId();

    const context = attachRequestContext(req, createRequestContext({ correlationId }));
    res.setHeader(CORRELATION_ID_HEADER, context.correlationId);

    next();
  };
};
