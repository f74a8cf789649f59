import express from "express";
import request from "supertest";
import { describe, expect, it, vi } from "vitest";
import { createCorrelationStage } from "./correlation.js";

const buildApp = (stages: express.RequestHandler[]) => {
  const app = express();
  app.use(...stages);
  app.get("/context", (req, res) => {
    res.json({
      context: req.requestContext,
      frozen: Object.isFrozen(req.requestContext)
    });
  });
  return app;
};

describe("createCorrelationStage", () => {
  it("passes a non-empty inbound X-Request-Id through verbatim", async () => {
    const nextRequestId = vi.fn(() => "generated");
    const app = buildApp([createCorrelationStage({ nextRequestId })]);

    const response = await request(app).get("/context").set("X-Request-Id", "Upstream-ID_42/abc");

    expect(response.headers["x-request-id"]).toBe("Upstream-ID_42/abc");
    expect(response.body).toEqual({ context: { correlationId: "Upstream-ID_42/abc" }, frozen: true });
    expect(nextRequestId).not.toHaveBeenCalled();
  });

  it("generates an id when the header is absent", async () => {
    const app = buildApp([createCorrelationStage({ nextRequestId: () => "generated-1" })]);

    const response = await request(app).get("/context");

    expect(response.headers["x-request-id"]).toBe("generated-1");
    expect(response.body.context).toEqual({ correlationId: "generated-1" });
  });

  it("generates an id when the header is empty", async () => {
    const app = buildApp([createCorrelationStage({ nextRequestId: () => "generated-2" })]);

    const response = await request(app).get("/context").set("X-Request-Id", "");

    expect(response.headers["x-request-id"]).toBe("generated-2");
  });

  it("gives concurrent requests distinct generated ids by default", async () => {
    const app = buildApp([createCorrelationStage()]);

    const responses = await Promise.all(Array.from({ length: 5 }, () => request(app).get("/context")));
    const ids = responses.map((response) => response.headers["x-request-id"]);

    expect(ids.every((id) => typeof id === "string" && id.length > 0)).toBe(true);
    expect(new Set(ids).size).toBe(5);
  });

  it("never replaces a context set further out", async () => {
    const app = buildApp([
      createCorrelationStage({ nextRequestId: () => "outer" }),
      createCorrelationStage({ nextRequestId: () => "inner" })
    ]);

    const response = await request(app).get("/context");

    expect(response.headers["x-request-id"]).toBe("outer");
    expect(response.body.context).toEqual({ correlationId: "outer" });
  });
});
