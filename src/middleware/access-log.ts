import type { IncomingMessage, ServerResponse } from "node:http";
import type { LevelWithSilent, Logger } from "pino";
import { pinoHttp, type HttpLogger } from "pino-http";
import { getCorrelationId } from "../context/request-context.js";

export type AccessLogRequest = {
  method: string;
  path: string;
  remoteAddress: string;
  userAgent: string;
};

const stripQuery = (url: string): string => {
  const queryStart = url.indexOf("?");
  return queryStart === -1 ? url : url.slice(0, queryStart);
};

export const describeRequest = (req: IncomingMessage): AccessLogRequest => ({
  method: req.method ?? "",
  path: stripQuery(req.url ?? ""),
  remoteAddress: req.socket.remoteAddress ?? "",
  userAgent: req.headers["user-agent"] ?? ""
});

const levelFor = (_req: IncomingMessage, res: ServerResponse, error?: Error): LevelWithSilent => {
  if (error || res.statusCode >= 500) return "error";
  if (res.statusCode >= 400) return "warn";
  return "info";
};

/**
 * Access log stage. Sits inside the correlation stage so the id is present when
 * the record is bound; pino-http writes one record per request when the response
 * finishes, errors, or its connection closes first.
 */
export const createAccessLogStage = ({ logger }: { logger: Logger }): HttpLogger =>
  pinoHttp({
    logger,
    genReqId: (req) => getCorrelationId(req),
    customProps: (req) => ({ correlationId: getCorrelationId(req) }),
    customLogLevel: levelFor,
    customSuccessMessage: () => "request completed",
    customErrorMessage: () => "request errored",
    wrapSerializers: false,
    serializers: {
      req: describeRequest,
      res: (res: ServerResponse) => ({ statusCode: res.statusCode })
    }
  });
