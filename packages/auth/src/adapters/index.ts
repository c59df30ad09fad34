/**
 * Framework Adapters
 * Integrations for web frameworks and databases
 */

// Common types
export {
  toAuthResponse,
  toErrorResponse,
  toSessionListResponse,
  type AuthContext,
} from './types.js';

// Hono adapter
export {
  createAuthMiddleware,
  createAuthRoutes,
  createJwksHandler,
  sendError,
  toValidationError,
  type AuthEnv,
  type AuthVariables,
  type HonoAdapterConfig,
} from './hono.js';

// Drizzle stores
export {
  DrizzleAccountStore,
  DrizzleRefreshTokenStore,
  createDrizzleStores,
  isUniqueViolation,
  toAccount,
  toRefreshTokenRecord,
  accounts,
  refreshTokens,
  UNIQUE_VIOLATION,
  type DrizzleDb,
  type AccountRow,
  type RefreshTokenRow,
} from './drizzle/index.js';
