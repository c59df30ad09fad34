import { describe, it, expect } from "vitest";
import { Hono } from "hono";
import { HTTPException } from "hono/http-exception";
import { createLogger, InternalError, type LogEntry, type LogTransport } from "@vouch/core";
import type { ServerEnv } from "../context.js";
import { errorHandler, notFoundHandler, type ErrorHandlerOptions } from "./error-handler.js";

class CaptureTransport implements LogTransport {
  readonly name = "capture";
  entries: LogEntry[] = [];

  log(entry: LogEntry): void {
    this.entries.push(entry);
  }
}

function setup(options: Partial<ErrorHandlerOptions> = {}) {
  const transport = new CaptureTransport();
  const logger = createLogger({ level: "TRACE", transports: [transport], timestamp: () => "t" });
  const app = new Hono<ServerEnv>();
  app.onError(errorHandler({ logger, ...options }));
  app.notFound(notFoundHandler);
  return { app, transport };
}

describe("@vouch/server - errorHandler", () => {
  it("should include the stack when asked to", async () => {
    const { app } = setup({ includeStack: true });
    app.get("/boom", () => {
      throw new Error("kaboom");
    });

    const res = await app.request("/boom");
    const body = await res.json();

    expect(res.status).toBe(500);
    expect(body).toMatchObject({
      error: { code: "INTERNAL_ERROR", details: { stack: expect.stringContaining("kaboom") } },
    });
  });

  it("should log the cause of coded server errors", async () => {
    const { app, transport } = setup();
    app.get("/down", () => {
      throw new InternalError("Database unavailable", { cause: new Error("socket closed") });
    });

    const res = await app.request("/down");

    expect(res.status).toBe(500);
    expect(await res.json()).toEqual({
      success: false,
      error: { code: "INTERNAL_ERROR", message: "Database unavailable" },
    });
    expect(transport.entries).toHaveLength(1);
    expect(transport.entries[0]).toMatchObject({
      level: "ERROR",
      message: "Request error",
      context: { code: "INTERNAL_ERROR" },
      error: { message: "socket closed" },
    });
  });

  it("should pass HTTP exceptions through", async () => {
    const { app } = setup();
    app.get("/teapot", () => {
      throw new HTTPException(403, { message: "forbidden" });
    });

    const res = await app.request("/teapot");

    expect(res.status).toBe(403);
    expect(await res.text()).toBe("forbidden");
  });

  it("should name the missing route", async () => {
    const { app } = setup();

    const res = await app.request("/missing", { method: "POST" });

    expect(res.status).toBe(404);
    expect(await res.json()).toMatchObject({
      error: { code: "NOT_FOUND", message: "Route POST /missing not found" },
    });
  });
});
