/**
 * @vouch/server - Server Context
 * Type definitions for server context and configuration
 */

import type { Context, Hono } from "hono";
import type { Logger } from "@vouch/core";
import type { AuthVariables } from "@vouch/auth";

/**
 * CORS configuration
 */
export interface CorsConfig {
  /** Allowed origins */
  origin: string | string[];
  /** Allow credentials */
  credentials?: boolean;
  /** Allowed methods */
  methods?: string[];
  /** Allowed headers */
  allowedHeaders?: string[];
  /** Exposed headers */
  exposedHeaders?: string[];
  /** Max age in seconds */
  maxAge?: number;
}

/**
 * Server context variables
 * Available in Hono context via c.get()
 */
export interface ServerContextVariables extends AuthVariables {
  /** Request logger */
  logger: Logger;
  /** Request ID */
  requestId: string;
}

export type ServerEnv = { Variables: ServerContextVariables };

/**
 * Hono app type with server context
 */
export type HonoApp = Hono<ServerEnv>;

/**
 * Hono context type with server context
 */
export type HonoContext = Context<ServerEnv>;

/**
 * Middleware next function
 */
export type HonoNext = () => Promise<void>;

/**
 * Generate a request ID
 */
export function generateRequestId(): string {
  return crypto.randomUUID();
}
