import type { ErrorRequestHandler, RequestHandler } from "express";
import type { Logger } from "pino";
import { getCorrelationId } from "../context/request-context.js";
import { ApiError, notFound } from "../utils/api-error.js";

export const notFoundHandler: RequestHandler = (req, _res, next) => {
  next(notFound("Not Found", { path: req.path }));
};

export const createErrorHandler = ({ logger }: { logger: Logger }): ErrorRequestHandler => {
  return (err: unknown, req, res, next) => {
    if (res.headersSent) {
      return next(err);
    }

    const correlationId = getCorrelationId(req);

    if (err instanceof ApiError) {
      logger.warn({ err, path: req.path, correlationId }, err.message);
      return res.status(err.status).json({ message: err.message, details: err.details, correlationId });
    }

    logger.error({ err, path: req.path, correlationId }, "Unhandled error");
    return res.status(500).json({ message: "Internal Server Error", correlationId });
  };
};
