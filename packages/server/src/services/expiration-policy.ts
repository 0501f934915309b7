import type { RegisteredService, TicketKind } from '@grantline/shared';
import type { Config } from '../config/index.js';

export type ExpirationDefaults = Config['defaults'];

/**
 * Maps a ticket kind to its time-to-live
 *
 * A registered service may override the access and refresh token TTLs.
 */
export class ExpirationPolicy {
  constructor(private readonly defaults: ExpirationDefaults) {}

  /**
   * Time-to-live in seconds
   */
  timeToLive(kind: TicketKind, service?: RegisteredService): number {
    switch (kind) {
      case 'access_token':
        return service?.accessTokenTtl ?? this.defaults.accessTokenTtl;
      case 'refresh_token':
        return service?.refreshTokenTtl ?? this.defaults.refreshTokenTtl;
      case 'authorization_code':
        return this.defaults.authorizationCodeTtl;
    }
  }

  expiresAt(kind: TicketKind, issuedAt: Date, service?: RegisteredService): Date {
    return new Date(issuedAt.getTime() + this.timeToLive(kind, service) * 1000);
  }
}
