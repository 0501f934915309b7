import { z } from 'zod';
import type { GrantType, RegisteredService, CallerProfile } from '@grantline/shared';
import type { TokenRequest, ValidatedTokenRequest } from '../types/grant.js';
import type { IServiceRegistry } from '../storage/interfaces/index.js';
import {
  type Result,
  type InvalidRequestFailure,
  ok,
  err,
  invalidRequest,
} from '../errors/result.js';
import {
  SUPPORTED_GRANT_TYPES,
  GRANT_TYPE_AUTHORIZATION_CODE,
  GRANT_TYPE_PASSWORD,
  GRANT_TYPE_REFRESH_TOKEN,
} from '../config/constants.js';

const requiredParam = z.string().min(1);

const authorizationCodeParams = z.object({
  code: requiredParam,
  redirect_uri: requiredParam,
});

const refreshTokenParams = z.object({
  refresh_token: requiredParam,
});

const passwordParams = z.object({
  client_id: requiredParam,
});

type ValidationResult = Result<ValidatedTokenRequest, InvalidRequestFailure>;

/**
 * Check a grant type against the supported grant types
 */
export function isSupportedGrantType(grantType: string | undefined): grantType is GrantType {
  return SUPPORTED_GRANT_TYPES.some((supported) => supported === grantType);
}

function parseParams<T extends z.ZodTypeAny>(
  schema: T,
  params: Readonly<Record<string, string>>
): Result<z.infer<T>, InvalidRequestFailure> {
  const parsed = schema.safeParse(params);

  if (!parsed.success) {
    const missing = parsed.error.issues.map((issue) => issue.path.join('.'));
    return err(invalidRequest(`Missing required parameter: ${missing.join(', ')}`));
  }

  return ok(parsed.data);
}

/**
 * Checks a token request before any ticket is touched
 *
 * Reads the service registry only; every failure is `invalid_request`.
 */
export class RequestValidator {
  constructor(private readonly serviceRegistry: IServiceRegistry) {}

  async validate(request: TokenRequest): Promise<ValidationResult> {
    const { grantType, params, profile } = request;

    if (!isSupportedGrantType(grantType)) {
      return err(invalidRequest(`Unsupported grant type: ${grantType ?? '(missing)'}`));
    }

    if (!profile) {
      return err(invalidRequest('No authenticated caller profile'));
    }

    switch (grantType) {
      case GRANT_TYPE_AUTHORIZATION_CODE:
        return this.validateAuthorizationCode(params, profile);
      case GRANT_TYPE_REFRESH_TOKEN:
        return this.validateRefreshToken(params, profile);
      case GRANT_TYPE_PASSWORD:
        return this.validatePassword(params, profile);
    }
  }

  private async validateAuthorizationCode(
    params: Readonly<Record<string, string>>,
    profile: CallerProfile
  ): Promise<ValidationResult> {
    if (profile.kind !== 'client') {
      return err(invalidRequest('Authorization code grant requires a client profile'));
    }

    const parsed = parseParams(authorizationCodeParams, params);
    if (!parsed.ok) {
      return parsed;
    }

    const service = await this.resolveService(profile.id, GRANT_TYPE_AUTHORIZATION_CODE);
    if (!service.ok) {
      return service;
    }

    // Exact match only
    if (!service.value.redirectUris.includes(parsed.value.redirect_uri)) {
      return err(invalidRequest('redirect_uri is not registered for this client'));
    }

    return ok({
      grantType: GRANT_TYPE_AUTHORIZATION_CODE,
      params,
      profile,
      service: service.value,
      code: parsed.value.code,
      redirectUri: parsed.value.redirect_uri,
    });
  }

  private async validateRefreshToken(
    params: Readonly<Record<string, string>>,
    profile: CallerProfile
  ): Promise<ValidationResult> {
    if (profile.kind !== 'client') {
      return err(invalidRequest('Refresh token grant requires a client profile'));
    }

    const parsed = parseParams(refreshTokenParams, params);
    if (!parsed.ok) {
      return parsed;
    }

    const service = await this.resolveService(profile.id, GRANT_TYPE_REFRESH_TOKEN);
    if (!service.ok) {
      return service;
    }

    return ok({
      grantType: GRANT_TYPE_REFRESH_TOKEN,
      params,
      profile,
      service: service.value,
      refreshToken: parsed.value.refresh_token,
    });
  }

  private async validatePassword(
    params: Readonly<Record<string, string>>,
    profile: CallerProfile
  ): Promise<ValidationResult> {
    const parsed = parseParams(passwordParams, params);
    if (!parsed.ok) {
      return parsed;
    }

    const service = await this.resolveService(parsed.value.client_id, GRANT_TYPE_PASSWORD);
    if (!service.ok) {
      return service;
    }

    if (profile.kind !== 'user') {
      return err(invalidRequest('Password grant requires a user profile'));
    }

    return ok({
      grantType: GRANT_TYPE_PASSWORD,
      params,
      profile,
      service: service.value,
      clientId: parsed.value.client_id,
    });
  }

  private async resolveService(
    clientId: string,
    grantType: GrantType
  ): Promise<Result<RegisteredService, InvalidRequestFailure>> {
    const service = await this.serviceRegistry.findByClientId(clientId);

    if (!service) {
      return err(invalidRequest(`Unknown client: ${clientId}`));
    }

    if (!service.enabled) {
      return err(invalidRequest(`Client is disabled: ${clientId}`));
    }

    if (service.allowedGrants.length > 0 && !service.allowedGrants.includes(grantType)) {
      return err(invalidRequest(`Client is not authorized for the ${grantType} grant`));
    }

    return ok(service);
  }
}
