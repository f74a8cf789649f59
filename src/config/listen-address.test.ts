import { describe, expect, it } from "vitest";
import { formatListenAddress, parseListenAddress } from "./listen-address.js";

describe("parseListenAddress", () => {
  it("binds every interface for :port", () => {
    expect(parseListenAddress(":9000")).toEqual({ port: 9000 });
  });

  it("parses host:port", () => {
    expect(parseListenAddress("127.0.0.1:8080")).toEqual({ host: "127.0.0.1", port: 8080 });
    expect(parseListenAddress("localhost:0")).toEqual({ host: "localhost", port: 0 });
  });

  it("parses bracketed IPv6 hosts", () => {
    expect(parseListenAddress("[::1]:9000")).toEqual({ host: "::1", port: 9000 });
  });

  it("rejects malformed addresses", () => {
    expect(parseListenAddress("9000")).toBeUndefined();
    expect(parseListenAddress("host:")).toBeUndefined();
    expect(parseListenAddress("host:port")).toBeUndefined();
    expect(parseListenAddress("::1:9000")).toBeUndefined();
    expect(parseListenAddress(":70000")).toBeUndefined();
  });
});

describe("formatListenAddress", () => {
  it("round-trips the accepted forms", () => {
    expect(formatListenAddress({ port: 9000 })).toBe(":9000");
    expect(formatListenAddress({ host: "0.0.0.0", port: 80 })).toBe("0.0.0.0:80");
    expect(formatListenAddress({ host: "::1", port: 9000 })).toBe("[::1]:9000");
  });
});
