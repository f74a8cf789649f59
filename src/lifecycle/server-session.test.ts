import { IncomingMessage, ServerResponse, type RequestListener } from "node:http";
import { Socket } from "node:net";
import { afterEach, describe, expect, it, vi } from "vitest";
import { createLogCapture } from "../test-helpers/log-capture.js";
import { StartupError } from "./errors.js";
import { ServerSession, type SessionTimeouts } from "./server-session.js";

const TIMEOUTS: SessionTimeouts = { readTimeoutMs: 5000, writeTimeoutMs: 10000, idleTimeoutMs: 15000 };

const sessions: ServerSession[] = [];

const createSession = (handler: RequestListener, port = 0) => {
  const { logger } = createLogCapture();
  const session = new ServerSession({ handler, address: { host: "127.0.0.1", port }, timeouts: TIMEOUTS, logger });
  sessions.push(session);
  return session;
};

afterEach(async () => {
  await Promise.all(sessions.splice(0).map((session) => session.drain(0)));
});

describe("ServerSession", () => {
  it("applies the configured timeouts to the server", () => {
    const session = createSession((_req, res) => res.end());

    expect(session.server.requestTimeout).toBe(5000);
    expect(session.server.headersTimeout).toBe(5000);
    expect(session.server.timeout).toBe(10000);
    expect(session.server.keepAliveTimeout).toBe(15000);
  });

  it("formats its configured address", () => {
    const session = createSession((_req, res) => res.end(), 9000);

    expect(session.address).toBe("127.0.0.1:9000");
  });

  it("resolves with the bound port", async () => {
    const session = createSession((_req, res) => res.end("ok"));

    const bound = await session.listen();

    expect(bound.port).toBeGreaterThan(0);
    const response = await fetch(`http://127.0.0.1:${bound.port}/`);
    expect(await response.text()).toBe("ok");
  });

  it("rejects with bind_failed when the port is taken", async () => {
    const first = createSession((_req, res) => res.end());
    const { port } = await first.listen();
    const second = createSession((_req, res) => res.end(), port);

    const failure = await second.listen().catch((error: unknown) => error);

    expect(failure).toBeInstanceOf(StartupError);
    expect(failure).toMatchObject({ code: "bind_failed", message: expect.stringContaining(`127.0.0.1:${port}`) });
  });

  it("still hands requests to the app once intake has stopped, without keep-alive", () => {
    let handled = 0;
    const session = createSession((_req, res) => {
      handled += 1;
      res.end();
    });
    session.stopAccepting();

    const req = new IncomingMessage(new Socket());
    const res = new ServerResponse(req);
    session.handle(req, res);

    expect(handled).toBe(1);
    expect(res.getHeader("Connection")).toBe("close");
  });

  it("drains immediately when nothing is in flight", async () => {
    const session = createSession((_req, res) => res.end());
    await session.listen();

    await expect(session.drain(1000)).resolves.toEqual({ forced: false, abandoned: 0 });
    expect(session.server.listening).toBe(false);
  });

  it("drains a session that never listened", async () => {
    const session = createSession((_req, res) => res.end());

    await expect(session.drain(1000)).resolves.toEqual({ forced: false, abandoned: 0 });
  });

  it("forces stuck requests closed at the deadline and counts them", async () => {
    const session = createSession(() => {
      // never answers
    });
    const { port } = await session.listen();
    const stuck = fetch(`http://127.0.0.1:${port}/stuck`).catch((error: unknown) => error);
    await vi.waitFor(() => expect(session.inFlightCount).toBe(1), { interval: 5 });

    const result = await session.drain(50);

    expect(result).toEqual({ forced: true, abandoned: 1 });
    expect(await stuck).toBeInstanceOf(Error);
  });
});
