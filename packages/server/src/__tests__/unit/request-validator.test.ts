import { describe, it, expect, beforeEach } from 'vitest';
import type { CallerProfile } from '@grantline/shared';
import { RequestValidator, isSupportedGrantType } from '../../validation/request-validator.js';
import { MemoryServiceRegistry } from '../../storage/memory/index.js';

const client: CallerProfile = { kind: 'client', id: 'svc-client' };
const user: CallerProfile = { kind: 'user', id: 'alice', attributes: {} };

describe('RequestValidator', () => {
  let registry: MemoryServiceRegistry;
  let validator: RequestValidator;

  beforeEach(async () => {
    registry = new MemoryServiceRegistry();
    await registry.register({
      clientId: 'svc-client',
      clientSecret: 'test-secret',
      name: 'Test Service',
      serviceId: 'https://svc.example',
      redirectUris: ['https://svc.example/cb'],
    });
    await registry.register({
      clientId: 'disabled-client',
      clientSecret: 'test-secret',
      name: 'Disabled',
      serviceId: 'https://disabled.example',
      redirectUris: ['https://disabled.example/cb'],
      enabled: false,
    });
    await registry.register({
      clientId: 'code-only',
      clientSecret: 'test-secret',
      name: 'Code Only',
      serviceId: 'https://code.example',
      redirectUris: ['https://code.example/cb'],
      allowedGrants: ['authorization_code'],
    });
    validator = new RequestValidator(registry);
  });

  it('should recognise supported grant types', () => {
    expect(isSupportedGrantType('authorization_code')).toBe(true);
    expect(isSupportedGrantType('password')).toBe(true);
    expect(isSupportedGrantType('refresh_token')).toBe(true);
    expect(isSupportedGrantType('client_credentials')).toBe(false);
    expect(isSupportedGrantType(undefined)).toBe(false);
  });

  it('should reject an unsupported grant type before looking at the profile', async () => {
    const result = await validator.validate({
      grantType: 'client_credentials',
      params: {},
      profile: null,
    });

    expect(result).toEqual({
      ok: false,
      error: { kind: 'invalid_request', description: 'Unsupported grant type: client_credentials' },
    });
  });

  it('should reject a missing caller profile', async () => {
    const result = await validator.validate({
      grantType: 'refresh_token',
      params: { refresh_token: 'RT999' },
      profile: null,
    });

    expect(result).toEqual({
      ok: false,
      error: { kind: 'invalid_request', description: 'No authenticated caller profile' },
    });
  });

  describe('authorization_code', () => {
    it('should accept a client profile with a registered redirect_uri', async () => {
      const result = await validator.validate({
        grantType: 'authorization_code',
        params: { code: 'ABC123', redirect_uri: 'https://svc.example/cb' },
        profile: client,
      });

      expect(result.ok).toBe(true);
      if (result.ok && result.value.grantType === 'authorization_code') {
        expect(result.value.code).toBe('ABC123');
        expect(result.value.redirectUri).toBe('https://svc.example/cb');
        expect(result.value.service.clientId).toBe('svc-client');
      }
    });

    it('should require a client profile', async () => {
      const result = await validator.validate({
        grantType: 'authorization_code',
        params: { code: 'ABC123', redirect_uri: 'https://svc.example/cb' },
        profile: user,
      });

      expect(result.ok).toBe(false);
      if (!result.ok) {
        expect(result.error.description).toBe('Authorization code grant requires a client profile');
      }
    });

    it('should match redirect_uri exactly', async () => {
      const result = await validator.validate({
        grantType: 'authorization_code',
        params: { code: 'ABC123', redirect_uri: 'https://svc.example/cb/' },
        profile: client,
      });

      expect(result.ok).toBe(false);
      if (!result.ok) {
        expect(result.error.description).toBe('redirect_uri is not registered for this client');
      }
    });

    it('should treat empty parameters as missing', async () => {
      const result = await validator.validate({
        grantType: 'authorization_code',
        params: { code: '', redirect_uri: 'https://svc.example/cb' },
        profile: client,
      });

      expect(result.ok).toBe(false);
      if (!result.ok) {
        expect(result.error.description).toBe('Missing required parameter: code');
      }
    });

    it('should reject an unknown or disabled client', async () => {
      const unknown = await validator.validate({
        grantType: 'authorization_code',
        params: { code: 'ABC123', redirect_uri: 'https://svc.example/cb' },
        profile: { kind: 'client', id: 'ghost' },
      });
      const disabled = await validator.validate({
        grantType: 'authorization_code',
        params: { code: 'ABC123', redirect_uri: 'https://disabled.example/cb' },
        profile: { kind: 'client', id: 'disabled-client' },
      });

      expect(unknown.ok ? null : unknown.error.description).toBe('Unknown client: ghost');
      expect(disabled.ok ? null : disabled.error.description).toBe(
        'Client is disabled: disabled-client'
      );
    });
  });

  describe('refresh_token', () => {
    it('should accept a client profile with a refresh_token', async () => {
      const result = await validator.validate({
        grantType: 'refresh_token',
        params: { refresh_token: 'RT999' },
        profile: client,
      });

      expect(result.ok).toBe(true);
      if (result.ok && result.value.grantType === 'refresh_token') {
        expect(result.value.refreshToken).toBe('RT999');
      }
    });

    it('should reject a grant the service does not allow', async () => {
      const result = await validator.validate({
        grantType: 'refresh_token',
        params: { refresh_token: 'RT999' },
        profile: { kind: 'client', id: 'code-only' },
      });

      expect(result.ok).toBe(false);
      if (!result.ok) {
        expect(result.error.description).toBe(
          'Client is not authorized for the refresh_token grant'
        );
      }
    });
  });

  describe('password', () => {
    it('should accept a user profile with a known client_id', async () => {
      const result = await validator.validate({
        grantType: 'password',
        params: { client_id: 'svc-client', username: 'alice', password: 'alice-password' },
        profile: user,
      });

      expect(result.ok).toBe(true);
      if (result.ok && result.value.grantType === 'password') {
        expect(result.value.clientId).toBe('svc-client');
        expect(result.value.profile).toEqual(user);
      }
    });

    it('should require client_id', async () => {
      const result = await validator.validate({
        grantType: 'password',
        params: { username: 'alice' },
        profile: user,
      });

      expect(result.ok).toBe(false);
      if (!result.ok) {
        expect(result.error.description).toBe('Missing required parameter: client_id');
      }
    });

    it('should require a user profile', async () => {
      const result = await validator.validate({
        grantType: 'password',
        params: { client_id: 'svc-client' },
        profile: client,
      });

      expect(result.ok).toBe(false);
      if (!result.ok) {
        expect(result.error.description).toBe('Password grant requires a user profile');
      }
    });
  });
});
