import type { CallerProfile, Principal } from '@grantline/shared';

/**
 * Credentials a caller presented with a request
 */
export interface CallerCredentials {
  authorization?: string; // Authorization header
  params: Readonly<Record<string, string>>;
}

/**
 * Resource-owner credentials (password grant)
 */
export interface ResourceOwnerCredentials {
  username: string;
  password: string;
  clientId: string;
}

/**
 * Authentication result from the caller authenticator
 */
export type ResourceOwnerAuthentication =
  | { authenticated: true; principal: Principal }
  | { authenticated: false; reason: string };

/**
 * Pluggable caller authenticator
 *
 * The token endpoint does NOT authenticate callers itself; it delegates to
 * this interface. `resolveProfile` reports who is calling (a machine client or
 * a resource owner) and `authenticateResourceOwner` checks resource-owner
 * credentials for the password grant.
 *
 * Example implementation:
 *
 * ```typescript
 * class GatewayCallerAuthenticator implements ICallerAuthenticator {
 *   async resolveProfile(credentials: CallerCredentials): Promise<CallerProfile | null> {
 *     const clientId = await this.gateway.clientFor(credentials.authorization);
 *     return clientId ? { kind: 'client', id: clientId } : null;
 *   }
 *
 *   async authenticateResourceOwner(
 *     credentials: ResourceOwnerCredentials
 *   ): Promise<ResourceOwnerAuthentication> {
 *     const user = await this.directory.login(credentials.username, credentials.password);
 *     return user
 *       ? { authenticated: true, principal: { id: user.id, attributes: user.claims } }
 *       : { authenticated: false, reason: 'Bad credentials' };
 *   }
 * }
 * ```
 */
export interface ICallerAuthenticator {
  /**
   * Resolve the profile of the current caller, or null when there is none
   */
  resolveProfile(credentials: CallerCredentials): Promise<CallerProfile | null>;

  /**
   * Authenticate resource-owner credentials
   */
  authenticateResourceOwner(credentials: ResourceOwnerCredentials): Promise<ResourceOwnerAuthentication>;
}
