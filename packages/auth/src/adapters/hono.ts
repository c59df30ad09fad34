/**
 * Hono Framework Adapter
 * Middleware and routes for Hono applications
 */

import type { Context, Handler, Hono, MiddlewareHandler } from 'hono';
import type { ContentfulStatusCode } from 'hono/utils/http-status';
import { InvalidTokenError, UnauthorizedError, ValidationError, type VouchError } from '@vouch/core';
import {
  formatErrors,
  loginRequest,
  type LogoutAllResponse,
  type MessageResponse,
  refreshTokenRequest,
  registerRequest,
  type,
  type ArkErrors,
} from '@vouch/types';
import type { SessionService } from '../core/session-service.js';
import { extractBearerToken } from '../session/jwt-manager.js';
import {
  toAuthResponse,
  toErrorResponse,
  toSessionListResponse,
  type AuthContext,
} from './types.js';

/**
 * Hono auth context variables
 */
export interface AuthVariables {
  auth: AuthContext;
}

export type AuthEnv = { Variables: AuthVariables };

/**
 * Hono adapter configuration
 */
export interface HonoAdapterConfig {
  /** Session service instance */
  sessions: SessionService;
}

/**
 * Send a coded error as the standard error envelope
 */
export function sendError(c: Context, error: VouchError): Response {
  return c.json(toErrorResponse(error), error.statusCode as ContentfulStatusCode);
}

/**
 * Turn ArkType errors into a 400 ValidationError with per-field messages
 */
export function toValidationError(errors: ArkErrors): ValidationError {
  const fields = Object.entries(formatErrors(errors)).map(([field, message]) => ({ field, message }));
  return new ValidationError('Validation failed', fields);
}

type JsonBody = { ok: true; value: unknown } | { ok: false; error: ValidationError };

/**
 * Read a JSON request body. An unparsable body is a validation failure.
 */
async function readJson(c: Context): Promise<JsonBody> {
  try {
    return { ok: true, value: await c.req.json<unknown>() };
  } catch (error) {
    if (error instanceof SyntaxError) {
      return {
        ok: false,
        error: new ValidationError('Invalid JSON body', [{ field: 'root', message: 'must be valid JSON' }]),
      };
    }
    throw error;
  }
}

/**
 * Create Hono auth middleware
 * Validates the Bearer access token and attaches auth context to the request
 */
export function createAuthMiddleware(config: HonoAdapterConfig): MiddlewareHandler<AuthEnv> {
  const { sessions } = config;

  return async (c, next) => {
    const authHeader = c.req.header('Authorization');
    if (!authHeader) {
      return sendError(c, new UnauthorizedError('missing authorization header'));
    }

    const token = extractBearerToken(authHeader);
    if (!token) {
      return sendError(c, new UnauthorizedError('invalid authorization header format'));
    }

    const result = await sessions.validateAccessToken(token);
    if (!result.success) {
      return sendError(
        c,
        result.error instanceof InvalidTokenError ? new InvalidTokenError('invalid or expired token') : result.error
      );
    }

    c.set('auth', {
      accountId: result.data.user_id,
      email: result.data.email,
      claims: result.data,
    });

    return next();
  };
}

/**
 * Serve the public key set for /.well-known/jwks.json
 */
export function createJwksHandler(config: HonoAdapterConfig): Handler {
  return (c) => {
    c.header('Cache-Control', 'public, max-age=3600');
    return c.json(config.sessions.getPublicKeySet());
  };
}

/**
 * Register auth routes on an app, typically mounted at /auth
 *
 * @example
 * ```ts
 * const auth = new Hono<AuthEnv>();
 * createAuthRoutes(auth, { sessions });
 * app.route('/auth', auth);
 * ```
 */
export function createAuthRoutes(app: Hono<AuthEnv>, config: HonoAdapterConfig): Hono<AuthEnv> {
  const { sessions } = config;
  const requireAuth = createAuthMiddleware(config);

  /**
   * Register
   * POST /register
   */
  app.post('/register', async (c) => {
    const json = await readJson(c);
    if (!json.ok) return sendError(c, json.error);

    const body = registerRequest(json.value);
    if (body instanceof type.errors) return sendError(c, toValidationError(body));

    const result = await sessions.register(body, { signal: c.req.raw.signal });
    if (!result.success) return sendError(c, result.error);

    return c.json(toAuthResponse(result.data), 201);
  });

  /**
   * Login
   * POST /login
   */
  app.post('/login', async (c) => {
    const json = await readJson(c);
    if (!json.ok) return sendError(c, json.error);

    const body = loginRequest(json.value);
    if (body instanceof type.errors) return sendError(c, toValidationError(body));

    const result = await sessions.login(body, { signal: c.req.raw.signal });
    if (!result.success) return sendError(c, result.error);

    return c.json(toAuthResponse(result.data));
  });

  /**
   * Exchange a refresh token for a new pair
   * POST /refresh
   */
  app.post('/refresh', async (c) => {
    const json = await readJson(c);
    if (!json.ok) return sendError(c, json.error);

    const body = refreshTokenRequest(json.value);
    if (body instanceof type.errors) return sendError(c, toValidationError(body));

    const result = await sessions.refresh(body.refresh_token, { signal: c.req.raw.signal });
    if (!result.success) return sendError(c, result.error);

    return c.json(toAuthResponse(result.data));
  });

  /**
   * Revoke one refresh token
   * POST /logout
   */
  app.post('/logout', async (c) => {
    const json = await readJson(c);
    if (!json.ok) return sendError(c, json.error);

    const body = refreshTokenRequest(json.value);
    if (body instanceof type.errors) return sendError(c, toValidationError(body));

    const result = await sessions.logout(body.refresh_token, { signal: c.req.raw.signal });
    if (!result.success) return sendError(c, result.error);

    const response: MessageResponse = { message: 'successfully logged out' };
    return c.json(response);
  });

  /**
   * Revoke every refresh token of the caller
   * POST /logout-all
   */
  app.post('/logout-all', requireAuth, async (c) => {
    const result = await sessions.logoutAll(c.get('auth').accountId, { signal: c.req.raw.signal });
    if (!result.success) return sendError(c, result.error);

    const response: LogoutAllResponse = {
      message: 'successfully logged out from all devices',
      revoked_count: result.data.revokedCount,
    };
    return c.json(response);
  });

  /**
   * Current account
   * GET /profile
   */
  app.get('/profile', requireAuth, async (c) => {
    const result = await sessions.getProfile(c.get('auth').accountId, { signal: c.req.raw.signal });
    if (!result.success) return sendError(c, result.error);

    return c.json(result.data);
  });

  /**
   * Active sessions of the caller
   * GET /sessions
   */
  app.get('/sessions', requireAuth, async (c) => {
    const result = await sessions.listSessions(c.get('auth').accountId, { signal: c.req.raw.signal });
    if (!result.success) return sendError(c, result.error);

    return c.json(toSessionListResponse(result.data));
  });

  return app;
}
