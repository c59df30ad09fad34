import { describe, it, expect, vi } from "vitest";
import {
  Logger,
  createLogger,
  logError,
  measureTime,
  isLogLevelName,
  type LogEntry,
  type LogTransport,
} from "./logger.js";
import { ConsoleTransport } from "./transports/console.js";
import { InvalidTokenError } from "./errors.js";

class CaptureTransport implements LogTransport {
  readonly name = "capture";
  entries: LogEntry[] = [];

  log(entry: LogEntry): void {
    this.entries.push(entry);
  }
}

function setup(level: "TRACE" | "DEBUG" | "INFO" | "WARN" = "TRACE") {
  const transport = new CaptureTransport();
  const log = createLogger({
    level,
    transports: [transport],
    timestamp: () => "2024-01-15T10:30:00.000Z",
  });
  return { log, transport };
}

describe("@vouch/core - Logger", () => {
  it("should drop entries below the configured level", () => {
    const { log, transport } = setup("WARN");

    log.debug("hidden");
    log.info("hidden");
    log.warn("shown");

    expect(transport.entries.map((e) => e.message)).toEqual(["shown"]);
    expect(log.isLevelEnabled("DEBUG")).toBe(false);
    expect(log.isLevelEnabled("ERROR")).toBe(true);
  });

  it("should emit name and context", () => {
    const transport = new CaptureTransport();
    const log = new Logger({
      name: "session",
      level: "INFO",
      transports: [transport],
      timestamp: () => "t",
    });

    log.info("Login succeeded", { accountId: "acc1" });

    expect(transport.entries[0]).toEqual({
      level: "INFO",
      levelValue: 30,
      message: "Login succeeded",
      timestamp: "t",
      context: { module: "session", accountId: "acc1" },
      error: undefined,
    });
  });

  it("should redact token and password fields", () => {
    const { log, transport } = setup();

    log.info("request", {
      password: "test-password",
      refresh_token: "test-refresh",
      accessToken: "test-access",
      email: "a@x.com",
    });

    expect(transport.entries[0]?.context).toEqual({
      password: "[REDACTED]",
      refresh_token: "[REDACTED]",
      accessToken: "[REDACTED]",
      email: "a@x.com",
    });
  });

  it("should redact dotted paths without mutating the caller's object", () => {
    const transport = new CaptureTransport();
    const log = createLogger({ level: "INFO", transports: [transport], redact: ["body.pin"] });
    const body = { pin: "0000", name: "A" };

    log.info("request", { body });

    expect(transport.entries[0]?.context).toEqual({ body: { pin: "[REDACTED]", name: "A" } });
    expect(body.pin).toBe("0000");
  });

  it("should merge child context", () => {
    const { log, transport } = setup();
    const child = log.child({ requestId: "req-1" });

    child.warn("slow", { durationMs: 900 });

    expect(transport.entries[0]?.context).toEqual({ requestId: "req-1", durationMs: 900 });
  });

  it("should keep the parent level in children", () => {
    const { log, transport } = setup("WARN");

    log.child({ requestId: "req-1" }).info("hidden");

    expect(transport.entries).toHaveLength(0);
  });

  it("should serialize errors with code and cause", () => {
    const { log, transport } = setup();
    const error = new InvalidTokenError(undefined, undefined, { cause: new Error("bad signature") });

    log.error("Token rejected", error, { path: "/auth/profile" });

    const entry = transport.entries[0];
    expect(entry?.level).toBe("ERROR");
    expect(entry?.context).toEqual({ path: "/auth/profile" });
    expect(entry?.error?.name).toBe("InvalidTokenError");
    expect(entry?.error?.code).toBe("TOKEN_INVALID");
    expect(entry?.error?.cause).toEqual({ name: "Error", message: "bad signature" });
  });

  it("should accept context in place of an error", () => {
    const { log, transport } = setup();

    log.error("failed", { attempt: 2 });

    expect(transport.entries[0]?.error).toBeUndefined();
    expect(transport.entries[0]?.context).toEqual({ attempt: 2 });
  });

  it("should report a failing async transport instead of throwing", async () => {
    const consoleError = vi.spyOn(console, "error").mockImplementation(() => undefined);
    const failing: LogTransport = {
      name: "failing",
      log: () => Promise.reject(new Error("network down")),
    };
    const log = createLogger({ level: "INFO", transports: [failing] });

    log.info("hello");
    await new Promise((resolve) => setImmediate(resolve));

    expect(consoleError).toHaveBeenCalledWith('Log transport "failing" failed:', expect.any(Error));
    consoleError.mockRestore();
  });

  it("should recognize level names", () => {
    expect(isLogLevelName("DEBUG")).toBe(true);
    expect(isLogLevelName("debug")).toBe(false);
    expect(isLogLevelName("constructor")).toBe(false);
  });
});

describe("@vouch/core - logError", () => {
  it("should stringify non-Error values", () => {
    const { log, transport } = setup();

    logError(log, "boom", "Sweep failed", { job: "purge" });

    expect(transport.entries[0]?.context).toEqual({ error: "boom", job: "purge" });
    expect(transport.entries[0]?.error).toBeUndefined();
  });
});

describe("@vouch/core - measureTime", () => {
  it("should log completion and return the result", async () => {
    const { log, transport } = setup();

    const result = await measureTime(log, "migrations", async () => 3);

    expect(result).toBe(3);
    expect(transport.entries[0]?.message).toBe("migrations completed");
    expect(transport.entries[0]?.context?.["operation"]).toBe("migrations");
  });

  it("should log and rethrow failures", async () => {
    const { log, transport } = setup();

    await expect(
      measureTime(log, "migrations", async () => {
        throw new Error("syntax error");
      })
    ).rejects.toThrow("syntax error");
    expect(transport.entries[0]?.message).toBe("migrations failed");
    expect(transport.entries[0]?.level).toBe("ERROR");
  });
});

describe("@vouch/core - ConsoleTransport", () => {
  const entry: LogEntry = {
    level: "INFO",
    levelValue: 30,
    message: "Server started",
    timestamp: "2024-01-15T10:30:00.000Z",
    context: { port: 3000 },
    error: undefined,
  };

  it("should write JSON lines", () => {
    const lines: string[] = [];
    const transport = new ConsoleTransport({ pretty: false, write: (line) => lines.push(line) });

    transport.log(entry);

    expect(lines).toEqual([
      '{"level":"INFO","time":"2024-01-15T10:30:00.000Z","msg":"Server started","port":3000}',
    ]);
  });

  it("should write pretty lines without colors", () => {
    const lines: string[] = [];
    const transport = new ConsoleTransport({ pretty: true, colors: false, write: (line) => lines.push(line) });

    transport.log(entry);

    expect(lines).toEqual(['[10:30:00] INFO  Server started {"port":3000}']);
  });

  it("should pass the level to the sink", () => {
    const levels: string[] = [];
    const transport = new ConsoleTransport({ pretty: false, write: (_line, level) => levels.push(level) });

    transport.log({ ...entry, level: "ERROR", levelValue: 50 });

    expect(levels).toEqual(["ERROR"]);
  });
});
