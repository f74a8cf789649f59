import {
  createServer,
  type IncomingMessage,
  type RequestListener,
  type Server,
  type ServerResponse
} from "node:http";
import type { AddressInfo } from "node:net";
import type { Logger } from "pino";
import { formatListenAddress, type ListenAddress } from "../config/listen-address.js";
import { ShutdownError, StartupError } from "./errors.js";

export type SessionTimeouts = {
  /** Max time to receive a full request, headers included. */
  readTimeoutMs: number;
  /** Max socket inactivity while a response is still being produced. */
  writeTimeoutMs: number;
  /** Max time a keep-alive connection may sit idle between requests. */
  idleTimeoutMs: number;
};

export type DrainResult = {
  forced: boolean;
  /** In-flight requests cut off when the deadline passed. */
  abandoned: number;
};

export type ServerSessionOptions = {
  handler: RequestListener;
  address: ListenAddress;
  timeouts: SessionTimeouts;
  logger: Logger;
};

const isServerNotRunning = (error: Error): boolean =>
  "code" in error && error.code === "ERR_SERVER_NOT_RUNNING";

/**
 * Owns the listening socket for one server lifetime and tracks the requests in
 * flight on it, so the shutdown orchestrator can stop intake and wait them out.
 */
export class ServerSession {
  readonly server: Server;

  private readonly inFlight = new Set<ServerResponse>();
  private accepting = true;
  private closed: Promise<void> | undefined;

  constructor(private readonly options: ServerSessionOptions) {
    const { readTimeoutMs, writeTimeoutMs, idleTimeoutMs } = options.timeouts;

    this.server = createServer((req, res) => this.handle(req, res));
    this.server.requestTimeout = readTimeoutMs;
    this.server.headersTimeout = readTimeoutMs;
    this.server.keepAliveTimeout = idleTimeoutMs;
    this.server.setTimeout(writeTimeoutMs);
  }

  get inFlightCount(): number {
    return this.inFlight.size;
  }

  get address(): string {
    return formatListenAddress(this.options.address);
  }

  listen(): Promise<AddressInfo> {
    const { host, port } = this.options.address;

    return new Promise((resolve, reject) => {
      const onError = (error: Error) => {
        reject(
          new StartupError({
            code: "bind_failed",
            message: `Could not listen on ${this.address}: ${error.message}`,
            cause: error
          })
        );
      };

      this.server.once("error", onError);
      this.server.listen({ host, port }, () => {
        this.server.off("error", onError);
        const bound = this.server.address();
        if (bound === null || typeof bound === "string") {
          reject(new StartupError({ code: "bind_failed", message: `Could not listen on ${this.address}` }));
          return;
        }
        resolve(bound);
      });
    });
  }

  handle(req: IncomingMessage, res: ServerResponse): void {
    // Keep-alive is off once intake stops; the app's drain gate answers the request.
    if (!this.accepting) {
      res.setHeader("Connection", "close");
    }

    this.inFlight.add(res);
    res.once("close", () => {
      this.inFlight.delete(res);
      if (!this.accepting) {
        this.server.closeIdleConnections();
      }
    });

    this.options.handler(req, res);
  }

  /**
   * Turns off keep-alive for everything still running and closes the listening
   * socket. Requests already in flight keep going.
   */
  stopAccepting(): void {
    if (!this.accepting) return;
    this.accepting = false;

    for (const res of this.inFlight) {
      if (!res.headersSent) {
        res.setHeader("Connection", "close");
      }
    }

    this.closed = new Promise((resolve, reject) => {
      this.server.close((error) => {
        if (error && !isServerNotRunning(error)) {
          reject(error);
          return;
        }
        resolve();
      });
    });
    this.server.closeIdleConnections();

    this.options.logger.debug({ inFlight: this.inFlight.size }, "Stopped accepting connections");
  }

  /**
   * Waits for every connection to close. Past `deadlineMs` the remaining ones are
   * destroyed and the result reports how many requests were cut off.
   */
  async drain(deadlineMs: number): Promise<DrainResult> {
    this.stopAccepting();
    const closed = this.closed ?? Promise.resolve();

    let timer: NodeJS.Timeout | undefined;
    const deadline = new Promise<"deadline">((resolve) => {
      timer = setTimeout(() => resolve("deadline"), deadlineMs);
    });

    try {
      const outcome = await Promise.race([closed.then(() => "drained" as const), deadline]);
      if (outcome === "drained") {
        return { forced: false, abandoned: 0 };
      }

      const abandoned = this.inFlight.size;
      this.server.closeAllConnections();
      await closed;
      return { forced: true, abandoned };
    } catch (error) {
      this.server.closeAllConnections();
      throw new ShutdownError({
        code: "drain_failed",
        message: "Server failed to release its connections",
        cause: error
      });
    } finally {
      clearTimeout(timer);
    }
  }
}
