import type { Principal } from './profile.js';

/**
 * Ticket kinds held by the ticket store
 */
export type TicketKind = 'authorization_code' | 'access_token' | 'refresh_token';

interface TicketBase {
  id: string;
  clientId: string;
  principal: Principal;
  service: string; // Target service URL
  scopes: string[];
  issuedAt: Date;
  expiresAt: Date;
}

/**
 * Authorization Code (stored)
 * Single use: `usedAt` is set by the first successful consume
 */
export interface AuthorizationCode extends TicketBase {
  codeHash: string;
  redirectUri?: string;
  usedAt?: Date;
}

/**
 * Refresh Token (stored)
 * Reusable until it expires or is revoked
 */
export interface RefreshToken extends TicketBase {
  tokenHash: string;
  revokedAt?: Date;
}

/**
 * Access Token (stored)
 */
export interface AccessToken extends TicketBase {
  tokenHash: string;
  refreshTokenId?: string;
  revokedAt?: Date;
}

/**
 * Authorization code creation input
 * `value` lets an upstream flow keep an identifier it already handed out
 */
export interface CreateAuthorizationCodeInput {
  value?: string;
  clientId: string;
  principal: Principal;
  service: string;
  redirectUri?: string;
  scopes?: string[];
  expiresAt: Date;
}

/**
 * Refresh token creation input
 */
export interface CreateRefreshTokenInput {
  value?: string;
  clientId: string;
  principal: Principal;
  service: string;
  scopes?: string[];
  expiresAt: Date;
}

/**
 * Access token creation input
 */
export interface CreateAccessTokenInput {
  clientId: string;
  principal: Principal;
  service: string;
  scopes?: string[];
  expiresAt: Date;
  refreshTokenId?: string;
}
