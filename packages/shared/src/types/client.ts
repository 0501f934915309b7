import type { GrantType } from './oauth.js';

/**
 * Registered service (OAuth client metadata)
 *
 * Owned by the service registry; the token endpoint only reads it.
 */
export interface RegisteredService {
  id: string;
  clientId: string;
  clientSecretHash?: string;
  name: string;
  serviceId: string; // Service URL tokens are bound to outside a redirect flow
  redirectUris: string[]; // Exact-match callbacks
  allowedGrants: GrantType[]; // Empty means every supported grant
  allowedScopes: string[];
  defaultScopes?: string[];
  enabled: boolean;
  generateRefreshToken: boolean;
  accessTokenTtl?: number; // Override policy default (seconds)
  refreshTokenTtl?: number;
  jwtAccessToken?: boolean; // Issue access tokens as signed JWTs
  createdAt: Date;
}

/**
 * Service registration input
 */
export interface RegisterServiceInput {
  clientId?: string;
  clientSecret?: string;
  confidential?: boolean;
  name: string;
  serviceId: string;
  redirectUris?: string[];
  allowedGrants?: GrantType[];
  allowedScopes?: string[];
  defaultScopes?: string[];
  enabled?: boolean;
  generateRefreshToken?: boolean;
  accessTokenTtl?: number;
  refreshTokenTtl?: number;
  jwtAccessToken?: boolean;
}
