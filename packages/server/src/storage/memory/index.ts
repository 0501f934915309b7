import type { ITicketStore } from '../interfaces/index.js';
import { MemoryAuthorizationCodeStorage } from './authorization-code-storage.js';
import { MemoryRefreshTokenStorage, MemoryAccessTokenStorage } from './token-storage.js';

export { MemoryAuthorizationCodeStorage } from './authorization-code-storage.js';
export { MemoryRefreshTokenStorage, MemoryAccessTokenStorage } from './token-storage.js';
export { MemoryServiceRegistry } from './service-registry.js';
export { MemoryResourceOwnerDirectory } from './resource-owner-directory.js';

/**
 * Create a complete in-memory ticket store
 */
export function createMemoryTicketStore(): ITicketStore {
  return {
    authorizationCodes: new MemoryAuthorizationCodeStorage(),
    refreshTokens: new MemoryRefreshTokenStorage(),
    accessTokens: new MemoryAccessTokenStorage(),
  };
}
