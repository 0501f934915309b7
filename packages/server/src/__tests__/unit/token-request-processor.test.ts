import { describe, it, expect, beforeEach } from 'vitest';
import type { Logger } from '../../logging/logger.js';
import type { ITicketStore } from '../../storage/interfaces/index.js';
import {
  createTokenRequestProcessor,
  type TokenRequestProcessor,
} from '../../services/token-request-processor.js';
import { RequestValidator } from '../../validation/request-validator.js';
import {
  GrantDispatcher,
  createAuthorizationCodeExtractor,
  createRefreshTokenExtractor,
  createPasswordExtractor,
} from '../../grants/index.js';
import { TokenIssuer } from '../../services/token-issuer.js';
import { ExpirationPolicy } from '../../services/expiration-policy.js';
import { DirectoryCallerAuthenticator } from '../../auth/index.js';
import {
  createMemoryTicketStore,
  MemoryAuthorizationCodeStorage,
  MemoryServiceRegistry,
  MemoryResourceOwnerDirectory,
} from '../../storage/memory/index.js';

interface LogEntry {
  level: string;
  message: string;
  fields?: Record<string, unknown>;
}

function recordingLogger(entries: LogEntry[]): Logger {
  const logger: Logger = {
    debug: (message, fields) => entries.push({ level: 'debug', message, fields }),
    info: (message, fields) => entries.push({ level: 'info', message, fields }),
    warn: (message, fields) => entries.push({ level: 'warn', message, fields }),
    error: (message, fields) => entries.push({ level: 'error', message, fields }),
    child: () => logger,
  };
  return logger;
}

class BrokenAuthorizationCodeStorage extends MemoryAuthorizationCodeStorage {
  override async consume(): Promise<never> {
    throw new Error('connection reset');
  }
}

const client = { kind: 'client' as const, id: 'svc-client' };

describe('TokenRequestProcessor', () => {
  let ticketStore: ITicketStore;
  let entries: LogEntry[];
  let processRequest: TokenRequestProcessor;

  async function build(store: ITicketStore): Promise<TokenRequestProcessor> {
    const serviceRegistry = new MemoryServiceRegistry();
    const directory = new MemoryResourceOwnerDirectory();
    await serviceRegistry.register({
      clientId: 'svc-client',
      clientSecret: 'test-secret',
      name: 'Test Service',
      serviceId: 'https://svc.example',
      redirectUris: ['https://svc.example/cb'],
    });
    const logger = recordingLogger(entries);

    return createTokenRequestProcessor({
      validator: new RequestValidator(serviceRegistry),
      dispatcher: new GrantDispatcher({
        authorization_code: createAuthorizationCodeExtractor({
          authorizationCodeStorage: store.authorizationCodes,
        }),
        refresh_token: createRefreshTokenExtractor({ refreshTokenStorage: store.refreshTokens }),
        password: createPasswordExtractor({
          callerAuthenticator: new DirectoryCallerAuthenticator({ serviceRegistry, directory }),
        }),
      }),
      issuer: new TokenIssuer({
        ticketStore: store,
        expirationPolicy: new ExpirationPolicy({
          accessTokenTtl: 7200,
          refreshTokenTtl: 2592000,
          authorizationCodeTtl: 30,
        }),
        issuer: 'https://auth.example',
      }),
      logger,
    });
  }

  beforeEach(async () => {
    entries = [];
    ticketStore = createMemoryTicketStore();
    processRequest = await build(ticketStore);
  });

  it('should run a request through to issued tokens', async () => {
    await ticketStore.refreshTokens.create({
      value: 'RT999',
      clientId: 'svc-client',
      principal: { id: 'alice', attributes: {} },
      service: 'https://svc.example',
      expiresAt: new Date(Date.now() + 60_000),
    });

    const outcome = await processRequest({
      grantType: 'refresh_token',
      params: { grant_type: 'refresh_token', refresh_token: 'RT999' },
      profile: client,
    });

    expect(outcome.ok).toBe(true);
    if (outcome.ok) {
      expect(outcome.value.grantType).toBe('refresh_token');
      expect(outcome.value.refreshToken).toBeUndefined();
    }
  });

  it('should stop at validation and log the rejection', async () => {
    const outcome = await processRequest({ grantType: 'bogus', params: {}, profile: client });

    expect(outcome).toEqual({
      ok: false,
      error: { kind: 'invalid_request', description: 'Unsupported grant type: bogus' },
    });
    expect(entries).toEqual([
      {
        level: 'warn',
        message: 'Token request rejected',
        fields: { grantType: 'bogus', reason: 'Unsupported grant type: bogus' },
      },
    ]);
  });

  it('should log extraction failures', async () => {
    const outcome = await processRequest({
      grantType: 'refresh_token',
      params: { refresh_token: 'RT-unknown' },
      profile: client,
    });

    expect(outcome.ok).toBe(false);
    expect(entries).toEqual([
      {
        level: 'warn',
        message: 'Grant extraction failed',
        fields: {
          grantType: 'refresh_token',
          clientId: 'svc-client',
          reason: 'Invalid refresh token',
        },
      },
    ]);
  });

  it('should turn a throwing store into a storage failure', async () => {
    const broken: ITicketStore = {
      ...createMemoryTicketStore(),
      authorizationCodes: new BrokenAuthorizationCodeStorage(),
    };
    const brokenProcessor = await build(broken);

    const outcome = await brokenProcessor({
      grantType: 'authorization_code',
      params: { code: 'ABC123', redirect_uri: 'https://svc.example/cb' },
      profile: client,
    });

    expect(outcome.ok).toBe(false);
    if (!outcome.ok) {
      expect(outcome.error.kind).toBe('storage_failure');
      expect(outcome.error.description).toBe('Ticket store failure');
    }
    expect(entries.map((entry) => `${entry.level}:${entry.message}`)).toEqual([
      'error:Ticket store failure',
    ]);
  });
});
