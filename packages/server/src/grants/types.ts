import type { GrantType } from '@grantline/shared';
import type { IssuanceContext, ValidatedTokenRequest } from '../types/grant.js';
import type { Result, InvalidGrantFailure } from '../errors/result.js';

export type ExtractionResult = Result<IssuanceContext, InvalidGrantFailure>;

/**
 * Resolves one grant type into an issuance context
 *
 * `extract` may consume or read tickets and authenticate credentials.
 * Store errors are thrown, not returned.
 */
export interface GrantExtractor {
  readonly grantType: GrantType;
  supports(request: ValidatedTokenRequest): boolean;
  extract(request: ValidatedTokenRequest): Promise<ExtractionResult>;
}
