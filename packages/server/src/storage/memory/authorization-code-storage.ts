import type { AuthorizationCode, CreateAuthorizationCodeInput } from '@grantline/shared';
import type { IAuthorizationCodeStorage } from '../interfaces/ticket-storage.js';
import { generateId, generateTicketValue, hashToken } from '../../crypto/index.js';
import { TICKET_PREFIX_AUTHORIZATION_CODE } from '../../config/constants.js';

/**
 * In-memory authorization code storage implementation
 */
export class MemoryAuthorizationCodeStorage implements IAuthorizationCodeStorage {
  private codes = new Map<string, AuthorizationCode>();
  private hashIndex = new Map<string, string>(); // hash -> id

  async create(input: CreateAuthorizationCodeInput): Promise<{ code: AuthorizationCode; value: string }> {
    const id = generateId();
    const codeValue = input.value ?? generateTicketValue(TICKET_PREFIX_AUTHORIZATION_CODE);
    const codeHash = hashToken(codeValue);

    if (this.hashIndex.has(codeHash)) {
      throw new Error('Authorization code value already exists');
    }

    const code: AuthorizationCode = {
      id,
      clientId: input.clientId,
      principal: input.principal,
      service: input.service,
      redirectUri: input.redirectUri,
      scopes: input.scopes ?? [],
      codeHash,
      issuedAt: new Date(),
      expiresAt: input.expiresAt,
    };

    this.codes.set(id, code);
    this.hashIndex.set(codeHash, id);

    return { code, value: codeValue };
  }

  async findByValue(codeValue: string): Promise<AuthorizationCode | null> {
    const id = this.hashIndex.get(hashToken(codeValue));
    if (!id) return null;
    return this.codes.get(id) ?? null;
  }

  async consume(codeValue: string): Promise<AuthorizationCode | null> {
    const id = this.hashIndex.get(hashToken(codeValue));
    if (!id) return null;

    const code = this.codes.get(id);
    if (!code) return null;

    // Check if already used
    if (code.usedAt) {
      return null;
    }

    // Check if expired
    if (code.expiresAt <= new Date()) {
      return null;
    }

    // Mark as used; no await between the read and this write
    const usedCode: AuthorizationCode = {
      ...code,
      usedAt: new Date(),
    };
    this.codes.set(id, usedCode);

    return usedCode;
  }

  async deleteExpired(): Promise<number> {
    const now = new Date();
    let deleted = 0;

    for (const [id, code] of this.codes) {
      if (code.expiresAt < now) {
        this.hashIndex.delete(code.codeHash);
        this.codes.delete(id);
        deleted++;
      }
    }

    return deleted;
  }
}
