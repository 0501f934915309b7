import type { RegisteredService } from '@grantline/shared';

/**
 * Read-only view of the service registry used by the token endpoint
 */
export interface IServiceRegistry {
  /**
   * Find a registered service by client_id
   */
  findByClientId(clientId: string): Promise<RegisteredService | null>;

  /**
   * Verify client credentials
   * Returns the service if credentials are valid, null otherwise
   */
  verifyClientCredentials(clientId: string, clientSecret: string): Promise<RegisteredService | null>;
}
