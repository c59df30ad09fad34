/**
 * @vouch/server - CORS Middleware
 * Cross-Origin Resource Sharing configuration
 */

import type { HonoContext, HonoNext, CorsConfig } from "../context.js";

/**
 * Default CORS configuration
 */
const defaultCorsConfig: CorsConfig = {
  origin: "*",
  credentials: false,
  methods: ["GET", "POST", "OPTIONS"],
  allowedHeaders: ["Content-Type", "Authorization", "X-Request-ID"],
  exposedHeaders: ["X-Request-ID"],
  maxAge: 86400, // 24 hours
};

/**
 * Check if origin is allowed
 */
function isOriginAllowed(origin: string, config: CorsConfig): boolean {
  if (config.origin === "*") return true;

  if (typeof config.origin === "string") {
    return origin === config.origin;
  }

  return config.origin.includes(origin);
}

/**
 * Value for Access-Control-Allow-Origin. A wildcard config answers "*";
 * a list echoes the caller's origin when it is on the list.
 */
function allowOriginHeader(origin: string, config: CorsConfig): string | undefined {
  if (config.origin === "*") return "*";
  return origin && isOriginAllowed(origin, config) ? origin : undefined;
}

/**
 * Parse CORS_ORIGIN: "*" or a comma-separated list
 */
export function parseCorsOrigin(value: string): string | string[] {
  if (value.trim() === "*") return "*";
  return value
    .split(",")
    .map((origin) => origin.trim())
    .filter((origin) => origin.length > 0);
}

/**
 * CORS middleware
 *
 * @example
 * ```typescript
 * app.use('*', cors({
 *   origin: ['https://example.com', 'https://app.example.com'],
 *   credentials: true,
 * }));
 * ```
 */
export function cors(config?: Partial<CorsConfig>): (c: HonoContext, next: HonoNext) => Promise<Response | void> {
  const corsConfig = { ...defaultCorsConfig, ...config };

  return async (c: HonoContext, next: HonoNext): Promise<Response | void> => {
    const origin = c.req.header("origin") ?? "";
    const allowOrigin = allowOriginHeader(origin, corsConfig);

    // Handle preflight requests
    if (c.req.method === "OPTIONS") {
      const response = new Response(null, { status: 204 });

      if (allowOrigin) {
        response.headers.set("Access-Control-Allow-Origin", allowOrigin);
        if (allowOrigin !== "*") {
          response.headers.set("Vary", "Origin");
        }
      }

      if (corsConfig.credentials) {
        response.headers.set("Access-Control-Allow-Credentials", "true");
      }

      if (corsConfig.methods) {
        response.headers.set("Access-Control-Allow-Methods", corsConfig.methods.join(", "));
      }

      if (corsConfig.allowedHeaders) {
        response.headers.set("Access-Control-Allow-Headers", corsConfig.allowedHeaders.join(", "));
      }

      if (corsConfig.maxAge) {
        response.headers.set("Access-Control-Max-Age", String(corsConfig.maxAge));
      }

      return response;
    }

    // Handle actual requests
    await next();

    if (allowOrigin) {
      c.header("Access-Control-Allow-Origin", allowOrigin);
      if (allowOrigin !== "*") {
        c.header("Vary", "Origin");
      }
    }

    if (corsConfig.credentials) {
      c.header("Access-Control-Allow-Credentials", "true");
    }

    if (corsConfig.exposedHeaders) {
      c.header("Access-Control-Expose-Headers", corsConfig.exposedHeaders.join(", "));
    }
  };
}
