import { describe, it, expect, beforeEach } from 'vitest';
import type { RegisteredService } from '@grantline/shared';
import type { IssuanceContext } from '../../types/grant.js';
import type { ITicketStore } from '../../storage/interfaces/index.js';
import { TokenIssuer } from '../../services/token-issuer.js';
import { ExpirationPolicy } from '../../services/expiration-policy.js';
import {
  createMemoryTicketStore,
  MemoryRefreshTokenStorage,
  MemoryAccessTokenStorage,
} from '../../storage/memory/index.js';
import { createAccessTokenSigner, verifyAccessToken } from '../../crypto/jwt.js';

const SIGNING_KEY = 'test-signing-key-0123456789abcdef';

const service: RegisteredService = {
  id: 'svc-1',
  clientId: 'svc-client',
  name: 'Test Service',
  serviceId: 'https://svc.example',
  redirectUris: [],
  allowedGrants: [],
  allowedScopes: [],
  enabled: true,
  generateRefreshToken: true,
  createdAt: new Date(),
};

const alice = { id: 'alice', attributes: {} };

class FailingAccessTokenStorage extends MemoryAccessTokenStorage {
  override async create(): Promise<never> {
    throw new Error('disk full');
  }
}

class FailingRefreshTokenStorage extends MemoryRefreshTokenStorage {
  override async create(): Promise<never> {
    throw new Error('disk full');
  }
}

function passwordContext(overrides: Partial<RegisteredService> = {}, mint = true): IssuanceContext {
  return {
    grantType: 'password',
    service: { ...service, ...overrides },
    principal: alice,
    targetService: 'https://svc.example',
    scopes: ['read', 'write'],
    mintRefreshToken: mint,
  };
}

describe('TokenIssuer', () => {
  let ticketStore: ITicketStore;
  let issuer: TokenIssuer;

  beforeEach(() => {
    ticketStore = createMemoryTicketStore();
    issuer = new TokenIssuer({
      ticketStore,
      expirationPolicy: new ExpirationPolicy({
        accessTokenTtl: 7200,
        refreshTokenTtl: 2592000,
        authorizationCodeTtl: 30,
      }),
      issuer: 'https://auth.example',
      signAccessToken: createAccessTokenSigner(SIGNING_KEY),
    });
  });

  it('should mint an access token and a refresh token', async () => {
    const result = await issuer.generate(passwordContext());

    expect(result.ok).toBe(true);
    if (!result.ok) return;

    const { accessToken, refreshToken, expiresIn } = result.value;
    expect(expiresIn).toBe(7200);
    expect(refreshToken?.value).toMatch(/^RT-1-/);
    expect(accessToken.token.refreshTokenId).toBe(refreshToken?.token.id);
    expect(accessToken.token.clientId).toBe('svc-client');
    expect(accessToken.token.scopes).toEqual(['read', 'write']);

    const ttl = accessToken.token.expiresAt.getTime() - accessToken.token.issuedAt.getTime();
    expect(Math.round(ttl / 1000)).toBe(7200);

    const stored = await ticketStore.accessTokens.findByValue(accessToken.value);
    expect(stored?.id).toBe(accessToken.token.id);
  });

  it('should skip the refresh token when the context says so', async () => {
    const result = await issuer.generate(passwordContext({}, false));

    expect(result.ok).toBe(true);
    if (result.ok) {
      expect(result.value.refreshToken).toBeUndefined();
      expect(result.value.accessToken.token.refreshTokenId).toBeUndefined();
    }
  });

  it('should link tokens issued from a refresh token to it', async () => {
    const { token } = await ticketStore.refreshTokens.create({
      value: 'RT999',
      clientId: 'svc-client',
      principal: alice,
      service: 'https://svc.example',
      expiresAt: new Date(Date.now() + 60_000),
    });

    const result = await issuer.generate({
      grantType: 'refresh_token',
      service,
      principal: alice,
      targetService: 'https://svc.example',
      scopes: [],
      refreshToken: token,
      mintRefreshToken: false,
    });

    expect(result.ok && result.value.accessToken.token.refreshTokenId).toBe(token.id);
  });

  it('should apply the service access token lifetime', async () => {
    const result = await issuer.generate(passwordContext({ accessTokenTtl: 60 }));

    expect(result.ok && result.value.expiresIn).toBe(60);
  });

  it('should sign a JWT access token for services that ask for one', async () => {
    const result = await issuer.generate(passwordContext({ jwtAccessToken: true }));

    expect(result.ok).toBe(true);
    if (!result.ok) return;

    const payload = await verifyAccessToken(result.value.accessToken.value, SIGNING_KEY);
    expect(payload.iss).toBe('https://auth.example');
    expect(payload.sub).toBe('alice');
    expect(payload.aud).toBe('svc-client');
    expect(payload.jti).toBe(result.value.accessToken.token.id);
    expect(payload['scope']).toBe('read write');
  });

  it('should report a storage failure when no signing key is configured', async () => {
    const unsigned = new TokenIssuer({
      ticketStore,
      expirationPolicy: new ExpirationPolicy({
        accessTokenTtl: 7200,
        refreshTokenTtl: 2592000,
        authorizationCodeTtl: 30,
      }),
      issuer: 'https://auth.example',
    });

    const result = await unsigned.generate(passwordContext({ jwtAccessToken: true }));

    expect(result.ok).toBe(false);
    if (!result.ok) {
      expect(result.error.kind).toBe('storage_failure');
      expect(result.error.description).toBe('Token could not be issued');
    }
  });

  it('should report a storage failure when the store throws', async () => {
    const failing = new TokenIssuer({
      ticketStore: { ...ticketStore, refreshTokens: new FailingRefreshTokenStorage() },
      expirationPolicy: new ExpirationPolicy({
        accessTokenTtl: 7200,
        refreshTokenTtl: 2592000,
        authorizationCodeTtl: 30,
      }),
      issuer: 'https://auth.example',
    });

    const result = await failing.generate(passwordContext());

    expect(result.ok).toBe(false);
    if (!result.ok) {
      expect(result.error.cause).toBeInstanceOf(Error);
    }
  });

  it('should revoke the refresh token it minted when the access token cannot be stored', async () => {
    const minted: string[] = [];
    const refreshTokens = new MemoryRefreshTokenStorage();
    const create = refreshTokens.create.bind(refreshTokens);
    refreshTokens.create = async (input) => {
      const created = await create(input);
      minted.push(created.value);
      return created;
    };

    const failing = new TokenIssuer({
      ticketStore: { ...ticketStore, refreshTokens, accessTokens: new FailingAccessTokenStorage() },
      expirationPolicy: new ExpirationPolicy({
        accessTokenTtl: 7200,
        refreshTokenTtl: 2592000,
        authorizationCodeTtl: 30,
      }),
      issuer: 'https://auth.example',
    });

    const result = await failing.generate(passwordContext());

    expect(result.ok).toBe(false);
    expect(minted).toHaveLength(1);
    const orphan = await refreshTokens.findByValue(minted[0] ?? '');
    expect(orphan?.revokedAt).toBeInstanceOf(Date);
  });
});
