import type { CallerProfile } from '@grantline/shared';
import type {
  ICallerAuthenticator,
  IServiceRegistry,
  CallerCredentials,
  ResourceOwnerCredentials,
  ResourceOwnerAuthentication,
} from '../storage/interfaces/index.js';
import type { MemoryResourceOwnerDirectory } from '../storage/memory/index.js';
import { extractBasicAuth } from './basic-auth.js';
import {
  PARAM_CLIENT_ID,
  PARAM_CLIENT_SECRET,
  PARAM_USERNAME,
} from '../config/constants.js';

export interface DirectoryCallerAuthenticatorOptions {
  serviceRegistry: IServiceRegistry;
  directory: MemoryResourceOwnerDirectory;
}

/**
 * Caller authenticator backed by the service registry and a resource-owner directory
 *
 * Profiles:
 * - client_secret_basic or client_secret_post credentials: client profile
 * - otherwise a `username` parameter: user profile for the claimed resource
 *   owner; the password grant verifies the credentials
 */
export class DirectoryCallerAuthenticator implements ICallerAuthenticator {
  private readonly serviceRegistry: IServiceRegistry;
  private readonly directory: MemoryResourceOwnerDirectory;

  constructor(options: DirectoryCallerAuthenticatorOptions) {
    this.serviceRegistry = options.serviceRegistry;
    this.directory = options.directory;
  }

  async resolveProfile(credentials: CallerCredentials): Promise<CallerProfile | null> {
    const { authorization, params } = credentials;

    if (authorization) {
      const basic = extractBasicAuth(authorization);
      if (!basic) {
        return null;
      }
      const service = await this.serviceRegistry.verifyClientCredentials(
        basic.clientId,
        basic.clientSecret
      );
      return service ? { kind: 'client', id: service.clientId } : null;
    }

    const clientId = params[PARAM_CLIENT_ID];
    const clientSecret = params[PARAM_CLIENT_SECRET];
    if (clientId && clientSecret) {
      const service = await this.serviceRegistry.verifyClientCredentials(clientId, clientSecret);
      return service ? { kind: 'client', id: service.clientId } : null;
    }

    const username = params[PARAM_USERNAME];
    if (username) {
      return { kind: 'user', id: username, attributes: {} };
    }

    return null;
  }

  async authenticateResourceOwner(
    credentials: ResourceOwnerCredentials
  ): Promise<ResourceOwnerAuthentication> {
    const principal = await this.directory.verify(credentials.username, credentials.password);

    if (!principal) {
      return { authenticated: false, reason: 'Invalid resource owner credentials' };
    }

    return { authenticated: true, principal };
  }
}
