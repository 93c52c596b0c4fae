/**
 * Tests for logger middleware.
 */

import { describe, it, expect } from "vitest";
import { captureLogger, createTestApp, jsonRequest } from "../setup.js";

function requestLines(lines: Record<string, unknown>[]): Record<string, unknown>[] {
  return lines.filter((line) => typeof line["method"] === "string");
}

describe("loggerMiddleware", () => {
  it("logs request details with the request id", async () => {
    const lines: Record<string, unknown>[] = [];
    const { app } = createTestApp({ logger: captureLogger(lines) });

    await app.request(
      jsonRequest("/health", "GET", undefined, { "X-Request-Id": "req-log-1" }),
    );

    const [entry] = requestLines(lines);
    expect(entry?.["method"]).toBe("GET");
    expect(entry?.["path"]).toBe("/health");
    expect(entry?.["status"]).toBe(200);
    expect(entry?.["requestId"]).toBe("req-log-1");
    expect(entry?.["msg"]).toBe("GET /health 200");
    expect(entry?.["level"]).toBe(30);
  });

  it("logs client errors at warn", async () => {
    const lines: Record<string, unknown>[] = [];
    const { app } = createTestApp({ logger: captureLogger(lines) });

    await app.request(jsonRequest("/api/v1/settlements/404/status"));

    const [entry] = requestLines(lines);
    expect(entry?.["status"]).toBe(404);
    expect(entry?.["level"]).toBe(40);
  });

  it("logs server errors at error", async () => {
    const lines: Record<string, unknown>[] = [];
    const { app, hub } = createTestApp({ logger: captureLogger(lines) });
    hub.failLookup = true;

    await app.request(jsonRequest("/api/v1/settlements/32/status"));

    const [entry] = requestLines(lines);
    expect(entry?.["status"]).toBe(503);
    expect(entry?.["level"]).toBe(50);
  });
});
