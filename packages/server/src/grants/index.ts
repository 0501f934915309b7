export type { GrantExtractor, ExtractionResult } from './types.js';
export { GrantDispatcher, GRANT_DISPATCH_ORDER, type GrantExtractorTable } from './dispatcher.js';
export {
  createAuthorizationCodeExtractor,
  type AuthorizationCodeExtractorOptions,
} from './authorization-code/extractor.js';
export {
  createRefreshTokenExtractor,
  type RefreshTokenExtractorOptions,
} from './refresh-token/extractor.js';
export { createPasswordExtractor, type PasswordExtractorOptions } from './password/extractor.js';
