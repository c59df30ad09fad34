/**
 * Storage Module
 * Store interfaces and the in-memory adapters
 */

export * from './types.js';
export { withSignal } from './signal.js';
export {
  MemoryAccountStore,
  MemoryRefreshTokenStore,
  createMemoryStores,
  type MemoryStoreConfig,
} from './memory.js';
