// Programmatic API; `server.ts` is the runnable entry point
export { createTokenServer, type TokenServerOptions } from './app.js';
export {
  createMemoryTicketStore,
  MemoryAuthorizationCodeStorage,
  MemoryRefreshTokenStorage,
  MemoryAccessTokenStorage,
  MemoryServiceRegistry,
  MemoryResourceOwnerDirectory,
} from './storage/memory/index.js';
export { DirectoryCallerAuthenticator, extractBasicAuth } from './auth/index.js';
export { RequestValidator, isSupportedGrantType } from './validation/request-validator.js';
export * from './grants/index.js';
export { TokenIssuer, type TokenIssuerOptions } from './services/token-issuer.js';
export { ExpirationPolicy, type ExpirationDefaults } from './services/expiration-policy.js';
export {
  ResponseBuilder,
  responseBuilder,
  negotiateResponseFormat,
  type RenderedResponse,
} from './services/response-builder.js';
export {
  createTokenRequestProcessor,
  type TokenRequestProcessor,
  type TokenOutcome,
} from './services/token-request-processor.js';
export { createLogger, silentLogger, type Logger } from './logging/logger.js';
export type * from './types/index.js';
export * from './storage/interfaces/index.js';
export * from './config/index.js';
export * from './errors/index.js';
export * from './crypto/index.js';
