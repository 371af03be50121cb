import { describe, it, expect } from 'vitest';

import { constantTimeCompare, StaticApiKeyProvider, StaticBasicAuthProvider } from '../providers';

describe('Credential Providers', () => {
  describe('constantTimeCompare', () => {
    it('should match equal strings', () => {
      expect(constantTimeCompare('test-key', 'test-key')).toBe(true);
    });

    it('should reject different strings of any length', () => {
      expect(constantTimeCompare('test-key', 'test-kez')).toBe(false);
      expect(constantTimeCompare('test-key', 'test-key-2')).toBe(false);
    });

    it('should never match empty strings', () => {
      expect(constantTimeCompare('', '')).toBe(false);
    });
  });

  describe('StaticApiKeyProvider', () => {
    const provider = new StaticApiKeyProvider(['test-key-1', 'test-key-2']);

    it('should accept configured keys', async () => {
      await expect(provider.validate('test-key-2')).resolves.toBe(true);
    });

    it('should reject unknown keys', async () => {
      await expect(provider.validate('other-key')).resolves.toBe(false);
    });

    it('should reject everything when no keys are configured', async () => {
      await expect(new StaticApiKeyProvider([]).validate('test-key-1')).resolves.toBe(false);
    });
  });

  describe('StaticBasicAuthProvider', () => {
    const provider = new StaticBasicAuthProvider([{ username: 'alice', password: 'test-password' }]);

    it('should accept a configured pair', async () => {
      await expect(provider.authenticate('alice', 'test-password')).resolves.toBe(true);
    });

    it('should reject a wrong password', async () => {
      await expect(provider.authenticate('alice', 'wrong-password')).resolves.toBe(false);
    });

    it('should reject an absent password', async () => {
      await expect(provider.authenticate('alice', undefined)).resolves.toBe(false);
    });
  });
});
