/**
 * Core Module
 * Session orchestration over the stores and token managers
 */

export {
  SessionService,
  createSessionService,
  type SessionResult,
  type SessionServiceConfig,
  type OperationOptions,
  type RegisterInput,
  type LoginInput,
  type AccountProfile,
  type IssuedSession,
  type SessionInfo,
} from './session-service.js';
