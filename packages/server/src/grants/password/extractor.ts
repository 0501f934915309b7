import type { ICallerAuthenticator } from '../../storage/interfaces/index.js';
import type { ValidatedTokenRequest } from '../../types/grant.js';
import type { GrantExtractor, ExtractionResult } from '../types.js';
import { ok, err, invalidGrant } from '../../errors/result.js';
import { scopeService } from '../../services/scope-service.js';
import {
  GRANT_TYPE_PASSWORD,
  PARAM_USERNAME,
  PARAM_PASSWORD,
  PARAM_SCOPE,
} from '../../config/constants.js';

export interface PasswordExtractorOptions {
  callerAuthenticator: ICallerAuthenticator;
}

/**
 * Resource owner password credentials grant
 * RFC 6749 Section 4.3.2
 *
 * Missing or wrong credentials are a grant failure, not a malformed request.
 */
export function createPasswordExtractor(options: PasswordExtractorOptions): GrantExtractor {
  const { callerAuthenticator } = options;

  return {
    grantType: GRANT_TYPE_PASSWORD,

    supports: (request) => request.grantType === GRANT_TYPE_PASSWORD,

    async extract(request: ValidatedTokenRequest): Promise<ExtractionResult> {
      if (request.grantType !== GRANT_TYPE_PASSWORD) {
        return err(invalidGrant('Request is not a password grant'));
      }

      const { service, params } = request;
      const username = params[PARAM_USERNAME];
      const password = params[PARAM_PASSWORD];

      if (!username || !password) {
        return err(invalidGrant('Missing resource owner credentials'));
      }

      const authentication = await callerAuthenticator.authenticateResourceOwner({
        username,
        password,
        clientId: request.clientId,
      });

      if (!authentication.authenticated) {
        return err(invalidGrant(authentication.reason));
      }

      const scopes = scopeService.resolveScopes(
        scopeService.parseScopes(params[PARAM_SCOPE]),
        service
      );

      return ok({
        grantType: GRANT_TYPE_PASSWORD,
        service,
        principal: authentication.principal,
        targetService: service.serviceId,
        scopes,
        mintRefreshToken: service.generateRefreshToken,
      });
    },
  };
}
