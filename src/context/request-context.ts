import type { IncomingMessage } from "node:http";

export type RequestContext = Readonly<{
  correlationId: string;
}>;

/** Logged in place of a correlation id when no context was attached upstream. */
export const UNKNOWN_CORRELATION_ID = "unknown";

export const createRequestContext = (fields: { correlationId: string }): RequestContext =>
  Object.freeze({ correlationId: fields.correlationId });

/**
 * Attaches `context` to the request unless one is already there, and returns the
 * context the request ends up carrying. The property is non-writable, so code
 * downstream of the first attach cannot replace it.
 */
export const attachRequestContext = (req: IncomingMessage, context: RequestContext): RequestContext => {
  if (req.requestContext) {
    return req.requestContext;
  }

  Object.defineProperty(req, "requestContext", {
    value: context,
    enumerable: true,
    writable: false,
    configurable: false
  });
  return context;
};

export const getCorrelationId = (req: IncomingMessage): string =>
  req.requestContext?.correlationId ?? UNKNOWN_CORRELATION_ID;
