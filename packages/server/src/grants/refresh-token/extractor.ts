import type { IRefreshTokenStorage } from '../../storage/interfaces/index.js';
import type { ValidatedTokenRequest } from '../../types/grant.js';
import type { GrantExtractor, ExtractionResult } from '../types.js';
import { ok, err, invalidGrant } from '../../errors/result.js';
import { GRANT_TYPE_REFRESH_TOKEN } from '../../config/constants.js';

export interface RefreshTokenExtractorOptions {
  refreshTokenStorage: IRefreshTokenStorage;
}

/**
 * Refresh token grant
 * RFC 6749 Section 6
 *
 * Refresh tokens are read, never invalidated, and not rotated: the token
 * stays usable until it expires or is revoked.
 */
export function createRefreshTokenExtractor(options: RefreshTokenExtractorOptions): GrantExtractor {
  const { refreshTokenStorage } = options;

  return {
    grantType: GRANT_TYPE_REFRESH_TOKEN,

    supports: (request) => request.grantType === GRANT_TYPE_REFRESH_TOKEN,

    async extract(request: ValidatedTokenRequest): Promise<ExtractionResult> {
      if (request.grantType !== GRANT_TYPE_REFRESH_TOKEN) {
        return err(invalidGrant('Request is not a refresh token grant'));
      }

      const { service, profile } = request;

      const refreshToken = await refreshTokenStorage.findByValue(request.refreshToken);

      if (!refreshToken) {
        return err(invalidGrant('Invalid refresh token'));
      }

      if (refreshToken.revokedAt) {
        return err(invalidGrant('Refresh token has been revoked'));
      }

      if (refreshToken.expiresAt <= new Date()) {
        return err(invalidGrant('Refresh token has expired'));
      }

      if (refreshToken.clientId !== profile.id) {
        return err(invalidGrant('Refresh token was issued to a different client'));
      }

      return ok({
        grantType: GRANT_TYPE_REFRESH_TOKEN,
        service,
        principal: refreshToken.principal,
        targetService: refreshToken.service,
        scopes: refreshToken.scopes,
        refreshToken,
        mintRefreshToken: false,
      });
    },
  };
}
