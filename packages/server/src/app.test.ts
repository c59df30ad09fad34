import { describe, it, expect } from "vitest";
import { generateKeyPairSync } from "node:crypto";
import { createLogger, TokenRevokedError, type LogEntry, type LogTransport } from "@vouch/core";
import {
  JwtManager,
  RefreshTokenManager,
  createMemoryStores,
  createSessionService,
  importRsaKeyPair,
} from "@vouch/auth";
import { authResponse, type } from "@vouch/types";
import { createApp, type CreateAppOptions } from "./app.js";

class CaptureTransport implements LogTransport {
  readonly name = "capture";
  entries: LogEntry[] = [];

  log(entry: LogEntry): void {
    this.entries.push(entry);
  }
}

const pems = generateKeyPairSync("rsa", {
  modulusLength: 2048,
  publicKeyEncoding: { type: "spki", format: "pem" },
  privateKeyEncoding: { type: "pkcs8", format: "pem" },
});
const keys = importRsaKeyPair(pems.privateKey, pems.publicKey);

function setup(options: Partial<CreateAppOptions> = {}) {
  const transport = new CaptureTransport();
  const logger = createLogger({ level: "TRACE", transports: [transport], timestamp: () => "t" });
  const sessions = createSessionService({
    ...createMemoryStores(),
    jwt: new JwtManager({ keys }),
    refreshTokenManager: new RefreshTokenManager({ ttl: "168h" }),
    passwordIterations: 1000,
    logger,
  });
  const app = createApp({ sessions, logger, ...options });
  return { app, sessions, transport };
}

describe("@vouch/server - createApp", () => {
  describe("health", () => {
    it("should report liveness", async () => {
      const { app } = setup();

      const res = await app.request("/health");

      expect(res.status).toBe(200);
      expect(await res.json()).toEqual({ status: "ok", service: "vouch" });
    });

    it("should report readiness from the checks", async () => {
      const { app } = setup({ readinessChecks: { database: () => ({ status: "healthy" }) } });

      const res = await app.request("/health/ready");

      expect(res.status).toBe(200);
      expect(await res.json()).toEqual({ status: "ready", checks: { database: { status: "healthy" } } });
    });

    it("should answer 503 when a check fails", async () => {
      const { app } = setup({
        readinessChecks: {
          database: () => {
            throw new Error("connection refused");
          },
        },
      });

      const res = await app.request("/health/ready");

      expect(res.status).toBe(503);
      expect(await res.json()).toEqual({
        status: "not_ready",
        checks: { database: { status: "unhealthy", message: "connection refused" } },
      });
    });
  });

  it("should publish the key set", async () => {
    const { app, sessions } = setup();

    const res = await app.request("/.well-known/jwks.json");

    expect(res.status).toBe(200);
    expect(await res.json()).toEqual(sessions.getPublicKeySet());
  });

  it("should serve the auth routes under /auth", async () => {
    const { app } = setup();

    const registered = await app.request("/auth/register", {
      method: "POST",
      headers: { "Content-Type": "application/json" },
      body: JSON.stringify({ email: "a@x.com", password: "pw123456", name: "A" }),
    });
    const body = authResponse(await registered.json());
    if (body instanceof type.errors) throw new Error(body.summary);

    const profile = await app.request("/auth/profile", {
      headers: { Authorization: `Bearer ${body.access_token}` },
    });

    expect(registered.status).toBe(201);
    expect(profile.status).toBe(200);
    expect(await profile.json()).toEqual(body.user);
  });

  it("should answer unknown routes with NOT_FOUND", async () => {
    const { app } = setup();

    const res = await app.request("/nope");

    expect(res.status).toBe(404);
    expect(await res.json()).toEqual({
      success: false,
      error: { code: "NOT_FOUND", message: "Route GET /nope not found", details: { resource: "Route" } },
    });
  });

  describe("errors", () => {
    it("should hide unexpected errors behind INTERNAL_ERROR and log them", async () => {
      const { app, transport } = setup();
      app.get("/boom", () => {
        throw new Error("kaboom");
      });

      const res = await app.request("/boom");

      expect(res.status).toBe(500);
      expect(await res.json()).toEqual({
        success: false,
        error: { code: "INTERNAL_ERROR", message: "An unexpected error occurred" },
      });
      const logged = transport.entries.find((e) => e.message === "Unhandled error");
      expect(logged?.level).toBe("ERROR");
      expect(logged?.error?.message).toBe("kaboom");
    });

    it("should keep the status of coded errors", async () => {
      const { app } = setup();
      app.get("/revoked", () => {
        throw new TokenRevokedError();
      });

      const res = await app.request("/revoked");

      expect(res.status).toBe(401);
      expect(await res.json()).toEqual({
        success: false,
        error: { code: "TOKEN_REVOKED", message: "Token revoked" },
      });
    });
  });

  describe("request context", () => {
    it("should echo the request ID", async () => {
      const { app } = setup();

      const res = await app.request("/health", { headers: { "x-request-id": "req-1" } });

      expect(res.headers.get("x-request-id")).toBe("req-1");
    });

    it("should generate a request ID when none is sent", async () => {
      const { app } = setup();

      const res = await app.request("/health");

      expect(res.headers.get("x-request-id")).toMatch(/^[0-9a-f-]{36}$/);
    });

    it("should log each request with its outcome", async () => {
      const { app, transport } = setup();

      await app.request("/auth/profile", { headers: { "x-request-id": "req-2" } });

      const completed = transport.entries.filter((e) => e.message === "Request completed");
      expect(completed).toHaveLength(1);
      expect(completed[0]).toMatchObject({
        level: "WARN",
        context: { requestId: "req-2", method: "GET", path: "/auth/profile", status: 401 },
      });
    });

    it("should not log health probes", async () => {
      const { app, transport } = setup();

      await app.request("/health");

      expect(transport.entries.some((e) => e.message === "Request completed")).toBe(false);
    });
  });

  describe("cors", () => {
    it("should allow any origin by default", async () => {
      const { app } = setup();

      const res = await app.request("/health", { headers: { Origin: "https://app.example" } });

      expect(res.headers.get("Access-Control-Allow-Origin")).toBe("*");
    });

    it("should echo a listed origin only", async () => {
      const { app } = setup({ cors: { origin: ["https://app.example"] } });

      const allowed = await app.request("/health", { headers: { Origin: "https://app.example" } });
      const denied = await app.request("/health", { headers: { Origin: "https://other.example" } });

      expect(allowed.headers.get("Access-Control-Allow-Origin")).toBe("https://app.example");
      expect(denied.headers.get("Access-Control-Allow-Origin")).toBeNull();
    });

    it("should answer preflight requests", async () => {
      const { app } = setup();

      const res = await app.request("/auth/login", {
        method: "OPTIONS",
        headers: { Origin: "https://app.example" },
      });

      expect(res.status).toBe(204);
      expect(res.headers.get("Access-Control-Allow-Methods")).toBe("GET, POST, OPTIONS");
      expect(res.headers.get("Access-Control-Allow-Headers")).toBe("Content-Type, Authorization, X-Request-ID");
    });
  });
});
