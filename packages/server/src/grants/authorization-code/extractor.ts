import type { IAuthorizationCodeStorage } from '../../storage/interfaces/index.js';
import type { ValidatedTokenRequest } from '../../types/grant.js';
import type { GrantExtractor, ExtractionResult } from '../types.js';
import type { Logger } from '../../logging/logger.js';
import { ok, err, invalidGrant } from '../../errors/result.js';
import { silentLogger } from '../../logging/logger.js';
import { GRANT_TYPE_AUTHORIZATION_CODE } from '../../config/constants.js';

export interface AuthorizationCodeExtractorOptions {
  authorizationCodeStorage: IAuthorizationCodeStorage;
  logger?: Logger;
}

/**
 * Authorization code grant
 * RFC 6749 Section 4.1.3
 *
 * The code is consumed before anything else is checked and before tokens are
 * minted: any later failure, including a store failure during issuance,
 * leaves it burned.
 */
export function createAuthorizationCodeExtractor(
  options: AuthorizationCodeExtractorOptions
): GrantExtractor {
  const { authorizationCodeStorage } = options;
  const logger = options.logger ?? silentLogger;

  return {
    grantType: GRANT_TYPE_AUTHORIZATION_CODE,

    supports: (request) => request.grantType === GRANT_TYPE_AUTHORIZATION_CODE,

    async extract(request: ValidatedTokenRequest): Promise<ExtractionResult> {
      if (request.grantType !== GRANT_TYPE_AUTHORIZATION_CODE) {
        return err(invalidGrant('Request is not an authorization code grant'));
      }

      const { service, profile } = request;

      // Consume authorization code atomically (prevents replay)
      const code = await authorizationCodeStorage.consume(request.code);

      if (!code) {
        return err(invalidGrant('Invalid or expired authorization code'));
      }

      logger.debug('Consumed authorization code', { codeId: code.id, clientId: profile.id });

      if (code.clientId !== profile.id) {
        return err(invalidGrant('Authorization code was issued to a different client'));
      }

      if (code.redirectUri !== undefined && code.redirectUri !== request.redirectUri) {
        return err(invalidGrant('redirect_uri does not match'));
      }

      return ok({
        grantType: GRANT_TYPE_AUTHORIZATION_CODE,
        service,
        principal: code.principal,
        targetService: code.service,
        scopes: code.scopes,
        code,
        mintRefreshToken: service.generateRefreshToken,
      });
    },
  };
}
