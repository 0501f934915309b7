import { describe, it, expect, beforeEach } from 'vitest';
import { DirectoryCallerAuthenticator, extractBasicAuth } from '../../auth/index.js';
import { MemoryServiceRegistry, MemoryResourceOwnerDirectory } from '../../storage/memory/index.js';

function basic(value: string): string {
  return `Basic ${Buffer.from(value).toString('base64')}`;
}

describe('extractBasicAuth', () => {
  it('should decode client credentials', () => {
    expect(extractBasicAuth(basic('svc-client:test-secret'))).toEqual({
      clientId: 'svc-client',
      clientSecret: 'test-secret',
    });
  });

  it('should form-decode both parts', () => {
    expect(extractBasicAuth(basic('svc%3Aclient:a%20b'))).toEqual({
      clientId: 'svc:client',
      clientSecret: 'a b',
    });
  });

  it('should reject other schemes and malformed values', () => {
    expect(extractBasicAuth('Bearer abc')).toBeNull();
    expect(extractBasicAuth(basic('no-colon'))).toBeNull();
    expect(extractBasicAuth(basic('bad%zz:secret'))).toBeNull();
  });
});

describe('DirectoryCallerAuthenticator', () => {
  let authenticator: DirectoryCallerAuthenticator;

  beforeEach(async () => {
    const serviceRegistry = new MemoryServiceRegistry();
    const directory = new MemoryResourceOwnerDirectory();
    await serviceRegistry.register({
      clientId: 'svc-client',
      clientSecret: 'test-secret',
      name: 'Test Service',
      serviceId: 'https://svc.example',
    });
    await directory.register('alice', 'alice-password', { role: 'tester' });
    authenticator = new DirectoryCallerAuthenticator({ serviceRegistry, directory });
  });

  it('should resolve a client profile from a Basic header', async () => {
    const profile = await authenticator.resolveProfile({
      authorization: basic('svc-client:test-secret'),
      params: {},
    });

    expect(profile).toEqual({ kind: 'client', id: 'svc-client' });
  });

  it('should not fall back to body credentials when the header is wrong', async () => {
    const profile = await authenticator.resolveProfile({
      authorization: basic('svc-client:wrong-secret'),
      params: { client_id: 'svc-client', client_secret: 'test-secret' },
    });

    expect(profile).toBeNull();
  });

  it('should resolve a client profile from body credentials', async () => {
    const profile = await authenticator.resolveProfile({
      params: { client_id: 'svc-client', client_secret: 'test-secret' },
    });

    expect(profile).toEqual({ kind: 'client', id: 'svc-client' });
  });

  it('should resolve a user profile from a username', async () => {
    const profile = await authenticator.resolveProfile({
      params: { client_id: 'svc-client', username: 'alice', password: 'alice-password' },
    });

    expect(profile).toEqual({ kind: 'user', id: 'alice', attributes: {} });
  });

  it('should resolve nothing without credentials', async () => {
    expect(await authenticator.resolveProfile({ params: { grant_type: 'password' } })).toBeNull();
  });

  it('should authenticate resource owners against the directory', async () => {
    expect(
      await authenticator.authenticateResourceOwner({
        username: 'alice',
        password: 'alice-password',
        clientId: 'svc-client',
      })
    ).toEqual({ authenticated: true, principal: { id: 'alice', attributes: { role: 'tester' } } });

    expect(
      await authenticator.authenticateResourceOwner({
        username: 'alice',
        password: 'wrong-password',
        clientId: 'svc-client',
      })
    ).toEqual({ authenticated: false, reason: 'Invalid resource owner credentials' });
  });
});
