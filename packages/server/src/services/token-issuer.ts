import type { AccessToken, RefreshToken } from '@grantline/shared';
import type { IssuanceContext, IssuedTokens } from '../types/grant.js';
import type { ITicketStore } from '../storage/interfaces/index.js';
import type { AccessTokenSigner } from '../crypto/jwt.js';
import type { Logger } from '../logging/logger.js';
import type { ExpirationPolicy } from './expiration-policy.js';
import { type Result, type StorageFailure, ok, err, storageFailure } from '../errors/result.js';
import { errorFields, silentLogger } from '../logging/logger.js';
import { scopeService } from './scope-service.js';

export interface TokenIssuerOptions {
  ticketStore: ITicketStore;
  expirationPolicy: ExpirationPolicy;
  issuer: string;
  /**
   * Signs access tokens for services with `jwtAccessToken` set
   */
  signAccessToken?: AccessTokenSigner;
  logger?: Logger;
}

/**
 * Creates and stores the tokens for one successful extraction
 *
 * Trusts the context: no re-validation, no retries. Any store failure is
 * returned as a storage failure.
 */
export class TokenIssuer {
  private readonly ticketStore: ITicketStore;
  private readonly expirationPolicy: ExpirationPolicy;
  private readonly issuer: string;
  private readonly signAccessToken: AccessTokenSigner | undefined;
  private readonly logger: Logger;

  constructor(options: TokenIssuerOptions) {
    this.ticketStore = options.ticketStore;
    this.expirationPolicy = options.expirationPolicy;
    this.issuer = options.issuer;
    this.signAccessToken = options.signAccessToken;
    this.logger = options.logger ?? silentLogger;
  }

  async generate(context: IssuanceContext): Promise<Result<IssuedTokens, StorageFailure>> {
    const { service, principal, targetService, scopes } = context;
    const issuedAt = new Date();
    let refreshToken: { token: RefreshToken; value: string } | undefined;

    try {
      refreshToken = context.mintRefreshToken
        ? await this.ticketStore.refreshTokens.create({
            clientId: service.clientId,
            principal,
            service: targetService,
            scopes,
            expiresAt: this.expirationPolicy.expiresAt('refresh_token', issuedAt, service),
          })
        : undefined;

      const accessToken = await this.ticketStore.accessTokens.create({
        clientId: service.clientId,
        principal,
        service: targetService,
        scopes,
        expiresAt: this.expirationPolicy.expiresAt('access_token', issuedAt, service),
        refreshTokenId:
          context.grantType === 'refresh_token' ? context.refreshToken.id : refreshToken?.token.id,
      });

      const accessTokenValue = service.jwtAccessToken
        ? await this.encodeJwt(accessToken.token)
        : accessToken.value;

      this.logger.debug('Issued tokens', {
        grantType: context.grantType,
        clientId: service.clientId,
        accessTokenId: accessToken.token.id,
        refreshTokenId: refreshToken?.token.id,
      });

      return ok({
        grantType: context.grantType,
        accessToken: { token: accessToken.token, value: accessTokenValue },
        refreshToken,
        expiresIn: this.expirationPolicy.timeToLive('access_token', service),
      });
    } catch (cause) {
      // The minted refresh token was never handed out
      if (refreshToken) {
        await this.discardRefreshToken(refreshToken.token.id);
      }
      return err(storageFailure('Token could not be issued', cause));
    }
  }

  private async discardRefreshToken(id: string): Promise<void> {
    try {
      await this.ticketStore.refreshTokens.revoke(id);
    } catch (revokeError) {
      this.logger.error('Could not revoke unissued refresh token', {
        refreshTokenId: id,
        ...errorFields(revokeError),
      });
    }
  }

  private async encodeJwt(token: AccessToken): Promise<string> {
    if (!this.signAccessToken) {
      throw new Error('JWT access tokens requested but no signing key is configured');
    }

    return this.signAccessToken({
      iss: this.issuer,
      sub: token.principal.id,
      aud: token.clientId,
      client_id: token.clientId,
      jti: token.id,
      scope: token.scopes.length > 0 ? scopeService.formatScopes(token.scopes) : undefined,
      iat: Math.floor(token.issuedAt.getTime() / 1000),
      exp: Math.floor(token.expiresAt.getTime() / 1000),
    });
  }
}
