import type { RequestContext } from "../context/request-context.js";

declare module "http" {
  interface IncomingMessage {
    /** Set once by the correlation stage; read-only from then on. */
    readonly requestContext?: RequestContext;
  }
}

export {};
