/**
 * Authorization pipeline tests
 *
 * End-to-end scenarios from request headers to principal or AuthError.
 */

import { describe, it, expect, beforeAll } from 'vitest';
import { z } from 'zod';

import { loadAuthConfig } from '@config';
import { renderAuthError } from '@errors';

import {
  createFetchStub,
  createSigningKey,
  keySetDocument,
  rejectedAuthError,
  signToken,
  validClaims,
  TEST_AUDIENCE,
  TEST_ISSUER,
  TEST_JWKS_URI,
} from '../../../test/factories';
import { encodeBasicAuth } from '../extractors';
import { KeySetCache } from '../jwks';
import { AuthorizationPipeline } from '../pipeline';
import { StaticApiKeyProvider, StaticBasicAuthProvider, type ApiKeyProvider } from '../providers';

const signingKey = createSigningKey('key-1');

const jwtOptions = {
  audiences: [TEST_AUDIENCE],
  issuers: [TEST_ISSUER],
  validateNotBefore: true,
  clockToleranceSeconds: 0,
};

describe('AuthorizationPipeline', () => {
  let keySetCache: KeySetCache;
  let fetchFn: ReturnType<typeof createFetchStub>;
  let pipeline: AuthorizationPipeline;

  beforeAll(async () => {
    fetchFn = createFetchStub(keySetDocument(signingKey));
    keySetCache = await KeySetCache.create({ jwksUri: TEST_JWKS_URI, ttlSeconds: 300, fetch: fetchFn });
    pipeline = new AuthorizationPipeline({
      apiKeyProvider: new StaticApiKeyProvider(['test-key']),
      basicAuthProvider: new StaticBasicAuthProvider([{ username: 'alice', password: 'test-password' }]),
      keySetCache,
      jwt: jwtOptions,
    });
  });

  // ============================================================================
  // API key
  // ============================================================================

  describe('API key', () => {
    it('should reject a missing key with 401', async () => {
      const decision = await pipeline.authorize({}, 'api-key');

      expect(decision.ok).toBe(false);
      if (!decision.ok) {
        expect(decision.error.kind).toBe('MISSING_CREDENTIAL');
        expect(decision.error.statusCode).toBe(401);
      }
    });

    it('should reject an unknown key with 403', async () => {
      const decision = await pipeline.authorize({ 'x-api-key': 'other-key' }, 'api-key');

      expect(decision.ok).toBe(false);
      if (!decision.ok) {
        expect(decision.error.kind).toBe('INVALID_CREDENTIAL');
        expect(decision.error.statusCode).toBe(403);
      }
    });

    it('should accept a configured key', async () => {
      await expect(pipeline.authenticateApiKey({ 'x-api-key': 'test-key' })).resolves.toEqual({
        type: 'api-key',
        apiKey: 'test-key',
      });
    });

    it('should report a failing provider as an internal error', async () => {
      const failing: ApiKeyProvider = {
        validate: async () => {
          throw new Error('key store unavailable');
        },
      };
      const withFailingProvider = new AuthorizationPipeline({ apiKeyProvider: failing });

      const error = await rejectedAuthError(withFailingProvider.authenticateApiKey({ 'x-api-key': 'test-key' }));

      expect(error.kind).toBe('INTERNAL_ERROR');
      expect(error.reason).toBe('API key provider failed');
    });

    it('should read a custom header', async () => {
      const custom = new AuthorizationPipeline({
        apiKeyHeader: 'x-service-token',
        apiKeyProvider: new StaticApiKeyProvider(['test-key']),
      });

      await expect(custom.authenticateApiKey({ 'x-service-token': 'test-key' })).resolves.toEqual({
        type: 'api-key',
        apiKey: 'test-key',
      });
    });
  });

  // ============================================================================
  // Basic
  // ============================================================================

  describe('Basic', () => {
    it('should accept a configured pair', async () => {
      const principal = await pipeline.authenticateBasicAuth({
        authorization: encodeBasicAuth('alice', 'test-password'),
      });

      expect(principal).toEqual({ type: 'basic', username: 'alice', password: 'test-password' });
    });

    it('should reject a wrong password with a Basic challenge', async () => {
      const error = await rejectedAuthError(
        pipeline.authenticateBasicAuth({ authorization: encodeBasicAuth('alice', 'wrong-password') })
      );

      expect(error.kind).toBe('INVALID_CREDENTIAL');
      expect(error.challenge).toBe('Basic');
    });

    it('should reject invalid base64 with 401', async () => {
      const decision = await pipeline.authorize({ authorization: 'Basic %%%' }, 'basic');

      expect(decision.ok).toBe(false);
      if (!decision.ok) {
        expect(decision.error.kind).toBe('DECODE_FAILURE');
        expect(decision.error.statusCode).toBe(401);
      }
    });
  });

  // ============================================================================
  // Bearer
  // ============================================================================

  describe('Bearer', () => {
    it('should accept a valid token', async () => {
      const token = signToken(signingKey);

      const principal = await pipeline.authenticateBearer({ authorization: `Bearer ${token}` });

      expect(principal.type).toBe('jwt');
      expect(principal.token).toBe(token);
      expect(principal.claims.claims.sub).toBe('user-1');
    });

    it('should validate claims with a custom schema', async () => {
      const schema = z.object({ sub: z.string(), tenant: z.string() });
      const token = signToken(signingKey, validClaims({ tenant: 'tenant-a' }));

      const principal = await pipeline.authenticateBearer({ authorization: `Bearer ${token}` }, schema);

      expect(principal.claims.claims).toEqual({ sub: 'user-1', tenant: 'tenant-a' });
    });

    it('should report an audience mismatch in full detail', async () => {
      const token = signToken(signingKey, validClaims({ aud: 'other-api' }));

      const decision = await pipeline.authorize({ authorization: `Bearer ${token}` }, 'bearer');

      expect(decision.ok).toBe(false);
      if (!decision.ok) {
        expect(renderAuthError(decision.error, 'full')).toEqual({
          statusCode: 401,
          headers: { 'WWW-Authenticate': 'Bearer' },
          body: {
            error: 'Token is invalid',
            code: 'TOKEN_INVALID',
            details: {
              kid: 'key-1',
              reason: `jwt audience invalid. expected: ${TEST_AUDIENCE}`,
            },
          },
        });
      }
    });

    it('should stop at the first failure without reading the key set', async () => {
      fetchFn.mockClear();

      const decision = await pipeline.authorize({ authorization: 'Token abc' }, 'bearer');

      expect(decision.ok).toBe(false);
      if (!decision.ok) {
        expect(decision.error.kind).toBe('MALFORMED_CREDENTIAL');
      }
      expect(fetchFn).not.toHaveBeenCalled();
    });

    it('should report a missing key set as an internal error', async () => {
      const withoutJwt = new AuthorizationPipeline({});

      const error = await rejectedAuthError(withoutJwt.authenticateBearer({ authorization: 'Bearer abc' }));

      expect(error.kind).toBe('INTERNAL_ERROR');
      expect(error.reason).toBe('Bearer authentication is not configured');
    });
  });

  // ============================================================================
  // Optional
  // ============================================================================

  describe('optional', () => {
    it('should resolve to the principal when authentication succeeds', async () => {
      await expect(pipeline.optional(pipeline.authenticateApiKey({ 'x-api-key': 'test-key' }))).resolves.toEqual({
        type: 'api-key',
        apiKey: 'test-key',
      });
    });

    it('should resolve to undefined when authentication fails', async () => {
      await expect(pipeline.optional(pipeline.authenticateApiKey({}))).resolves.toBeUndefined();
    });
  });

  // ============================================================================
  // Configuration
  // ============================================================================

  describe('fromConfig', () => {
    it('should use the configured allow-lists', async () => {
      const config = loadAuthConfig({
        API_KEY_HEADER: 'X-Client-Key',
        API_KEYS: 'test-key-1,test-key-2',
        BASIC_AUTH_USERS: 'alice:test-password',
      });
      const configured = AuthorizationPipeline.fromConfig(config);

      await expect(configured.authenticateApiKey({ 'x-client-key': 'test-key-2' })).resolves.toEqual({
        type: 'api-key',
        apiKey: 'test-key-2',
      });
      await expect(
        configured.authenticateBasicAuth({ authorization: encodeBasicAuth('alice', 'test-password') })
      ).resolves.toMatchObject({ username: 'alice' });
    });
  });
});
