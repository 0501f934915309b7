import type {
  RefreshToken,
  CreateRefreshTokenInput,
  AccessToken,
  CreateAccessTokenInput,
} from '@grantline/shared';
import type { IRefreshTokenStorage, IAccessTokenStorage } from '../interfaces/ticket-storage.js';
import { generateId, generateTicketValue, hashToken } from '../../crypto/index.js';
import {
  TICKET_PREFIX_ACCESS_TOKEN,
  TICKET_PREFIX_REFRESH_TOKEN,
} from '../../config/constants.js';

/**
 * In-memory refresh token storage implementation
 */
export class MemoryRefreshTokenStorage implements IRefreshTokenStorage {
  private tokens = new Map<string, RefreshToken>();
  private hashIndex = new Map<string, string>(); // hash -> id

  async create(input: CreateRefreshTokenInput): Promise<{ token: RefreshToken; value: string }> {
    const id = generateId();
    const tokenValue = input.value ?? generateTicketValue(TICKET_PREFIX_REFRESH_TOKEN);
    const tokenHash = hashToken(tokenValue);

    if (this.hashIndex.has(tokenHash)) {
      throw new Error('Refresh token value already exists');
    }

    const token: RefreshToken = {
      id,
      clientId: input.clientId,
      principal: input.principal,
      service: input.service,
      scopes: input.scopes ?? [],
      tokenHash,
      issuedAt: new Date(),
      expiresAt: input.expiresAt,
    };

    this.tokens.set(id, token);
    this.hashIndex.set(tokenHash, id);

    return { token, value: tokenValue };
  }

  async findByValue(tokenValue: string): Promise<RefreshToken | null> {
    const id = this.hashIndex.get(hashToken(tokenValue));
    if (!id) return null;
    return this.tokens.get(id) ?? null;
  }

  async revoke(id: string): Promise<void> {
    const token = this.tokens.get(id);
    if (token && !token.revokedAt) {
      this.tokens.set(id, { ...token, revokedAt: new Date() });
    }
  }

  async deleteExpired(): Promise<number> {
    const now = new Date();
    let deleted = 0;

    for (const [id, token] of this.tokens) {
      if (token.expiresAt < now) {
        this.hashIndex.delete(token.tokenHash);
        this.tokens.delete(id);
        deleted++;
      }
    }

    return deleted;
  }
}

/**
 * In-memory access token storage implementation
 */
export class MemoryAccessTokenStorage implements IAccessTokenStorage {
  private tokens = new Map<string, AccessToken>();
  private hashIndex = new Map<string, string>(); // hash -> id

  async create(input: CreateAccessTokenInput): Promise<{ token: AccessToken; value: string }> {
    const id = generateId();
    const tokenValue = generateTicketValue(TICKET_PREFIX_ACCESS_TOKEN);
    const tokenHash = hashToken(tokenValue);

    const token: AccessToken = {
      id,
      clientId: input.clientId,
      principal: input.principal,
      service: input.service,
      scopes: input.scopes ?? [],
      tokenHash,
      refreshTokenId: input.refreshTokenId,
      issuedAt: new Date(),
      expiresAt: input.expiresAt,
    };

    this.tokens.set(id, token);
    this.hashIndex.set(tokenHash, id);

    return { token, value: tokenValue };
  }

  async findByValue(tokenValue: string): Promise<AccessToken | null> {
    const id = this.hashIndex.get(hashToken(tokenValue));
    if (!id) return null;
    return this.tokens.get(id) ?? null;
  }

  async revoke(id: string): Promise<void> {
    const token = this.tokens.get(id);
    if (token && !token.revokedAt) {
      this.tokens.set(id, { ...token, revokedAt: new Date() });
    }
  }

  async deleteExpired(): Promise<number> {
    const now = new Date();
    let deleted = 0;

    for (const [id, token] of this.tokens) {
      if (token.expiresAt < now) {
        this.hashIndex.delete(token.tokenHash);
        this.tokens.delete(id);
        deleted++;
      }
    }

    return deleted;
  }
}
