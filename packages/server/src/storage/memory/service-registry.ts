import type { RegisteredService, RegisterServiceInput } from '@grantline/shared';
import type { IServiceRegistry } from '../interfaces/service-registry.js';
import {
  generateId,
  generateClientId,
  generateClientSecret,
  hashSecret,
  verifySecret,
} from '../../crypto/index.js';

/**
 * In-memory service registry implementation
 */
export class MemoryServiceRegistry implements IServiceRegistry {
  private services = new Map<string, RegisteredService>(); // clientId -> service

  /**
   * Register a service
   * Returns the plaintext client secret for confidential services (only time it's available)
   */
  async register(
    input: RegisterServiceInput
  ): Promise<{ service: RegisteredService; clientSecret?: string }> {
    const clientId = input.clientId ?? generateClientId();

    if (this.services.has(clientId)) {
      throw new Error(`Client already registered: ${clientId}`);
    }

    let clientSecret: string | undefined;
    let clientSecretHash: string | undefined;

    if (input.confidential ?? true) {
      clientSecret = input.clientSecret ?? generateClientSecret();
      clientSecretHash = await hashSecret(clientSecret);
    }

    const service: RegisteredService = {
      id: generateId(),
      clientId,
      clientSecretHash,
      name: input.name,
      serviceId: input.serviceId,
      redirectUris: input.redirectUris ?? [],
      allowedGrants: input.allowedGrants ?? [],
      allowedScopes: input.allowedScopes ?? [],
      defaultScopes: input.defaultScopes,
      enabled: input.enabled ?? true,
      generateRefreshToken: input.generateRefreshToken ?? true,
      accessTokenTtl: input.accessTokenTtl,
      refreshTokenTtl: input.refreshTokenTtl,
      jwtAccessToken: input.jwtAccessToken,
      createdAt: new Date(),
    };

    this.services.set(clientId, service);

    return { service, clientSecret };
  }

  async findByClientId(clientId: string): Promise<RegisteredService | null> {
    return this.services.get(clientId) ?? null;
  }

  async verifyClientCredentials(
    clientId: string,
    clientSecret: string
  ): Promise<RegisteredService | null> {
    const service = this.services.get(clientId);
    if (!service?.clientSecretHash) {
      return null;
    }

    const isValid = await verifySecret(clientSecret, service.clientSecretHash);
    return isValid ? service : null;
  }
}
