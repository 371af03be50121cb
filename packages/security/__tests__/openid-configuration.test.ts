import { describe, it, expect } from 'vitest';

import { createFetchStub, TEST_ISSUER, TEST_JWKS_URI } from '../../../test/factories';
import {
  DiscoveryError,
  discoveryUrl,
  fetchOpenIdConfiguration,
  resolveJwksUri,
} from '../openid-configuration';

const document = {
  issuer: TEST_ISSUER,
  jwks_uri: TEST_JWKS_URI,
  authorization_endpoint: `${TEST_ISSUER}/authorize`,
  token_endpoint: `${TEST_ISSUER}/token`,
  id_token_signing_alg_values_supported: ['RS256'],
};

describe('OpenID discovery', () => {
  it('should build the well-known location with or without a trailing slash', () => {
    expect(discoveryUrl('https://issuer.test')).toBe('https://issuer.test/.well-known/openid-configuration');
    expect(discoveryUrl('https://issuer.test/realms/main/')).toBe(
      'https://issuer.test/realms/main/.well-known/openid-configuration'
    );
  });

  it('should fetch and validate the discovery document', async () => {
    const fetchFn = createFetchStub(document);

    const configuration = await fetchOpenIdConfiguration(TEST_ISSUER, { fetch: fetchFn });

    expect(configuration.jwks_uri).toBe(TEST_JWKS_URI);
    expect(configuration.id_token_signing_alg_values_supported).toEqual(['RS256']);
    expect(fetchFn).toHaveBeenCalledWith(
      'https://issuer.test/.well-known/openid-configuration',
      expect.objectContaining({ headers: { Accept: 'application/json' } })
    );
  });

  it('should reject a document without jwks_uri', async () => {
    const fetchFn = createFetchStub({ issuer: TEST_ISSUER });

    await expect(fetchOpenIdConfiguration(TEST_ISSUER, { fetch: fetchFn })).rejects.toBeInstanceOf(DiscoveryError);
  });

  it('should reject failed responses', async () => {
    const fetchFn = createFetchStub({}, 404);

    await expect(fetchOpenIdConfiguration(TEST_ISSUER, { fetch: fetchFn })).rejects.toMatchObject({
      code: 'DISCOVERY_FAILED',
      message: 'Discovery request to https://issuer.test/.well-known/openid-configuration failed: HTTP 404',
    });
  });

  describe('resolveJwksUri', () => {
    it('should prefer the configured location', async () => {
      const fetchFn = createFetchStub(document);

      await expect(
        resolveJwksUri({ issuers: [TEST_ISSUER], jwksUri: 'https://keys.test/jwks.json' }, { fetch: fetchFn })
      ).resolves.toBe('https://keys.test/jwks.json');
      expect(fetchFn).not.toHaveBeenCalled();
    });

    it('should discover the location from the first issuer', async () => {
      const fetchFn = createFetchStub(document);

      await expect(resolveJwksUri({ issuers: [TEST_ISSUER] }, { fetch: fetchFn })).resolves.toBe(TEST_JWKS_URI);
    });
  });
});
