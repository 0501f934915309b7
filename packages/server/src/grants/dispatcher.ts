import type { GrantType } from '@grantline/shared';
import type { ValidatedTokenRequest } from '../types/grant.js';
import type { GrantExtractor, ExtractionResult } from './types.js';
import { err, invalidGrant } from '../errors/result.js';
import {
  GRANT_TYPE_AUTHORIZATION_CODE,
  GRANT_TYPE_PASSWORD,
  GRANT_TYPE_REFRESH_TOKEN,
} from '../config/constants.js';

/**
 * Order in which extractors are offered a request
 */
export const GRANT_DISPATCH_ORDER = [
  GRANT_TYPE_AUTHORIZATION_CODE,
  GRANT_TYPE_REFRESH_TOKEN,
  GRANT_TYPE_PASSWORD,
] as const satisfies readonly GrantType[];

export type GrantExtractorTable = { readonly [G in GrantType]: GrantExtractor };

/**
 * Selects the first extractor, in dispatch order, that supports a request
 *
 * Does not repeat the validator's checks. A request no extractor supports is
 * an `invalid_grant`, the same as a failed extraction.
 */
export class GrantDispatcher {
  private readonly extractors: readonly GrantExtractor[];

  constructor(table: GrantExtractorTable) {
    this.extractors = GRANT_DISPATCH_ORDER.map((grantType) => table[grantType]);
  }

  /**
   * Extractors in the order they are tried
   */
  get order(): readonly GrantType[] {
    return this.extractors.map((extractor) => extractor.grantType);
  }

  async dispatch(request: ValidatedTokenRequest): Promise<ExtractionResult> {
    const extractor = this.extractors.find((candidate) => candidate.supports(request));

    if (!extractor) {
      return err(invalidGrant(`Request is not supported: ${request.grantType}`));
    }

    return extractor.extract(request);
  }
}
