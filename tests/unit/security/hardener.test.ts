import { describe, it, expect } from 'vitest';
import { PASSWORD_ALPHABET, encodePassword } from '../../../src/security/encoder.js';
import { deriveKey, derivePassword, hardenPassword } from '../../../src/security/hardener.js';
import { InputError } from '../../../src/security/errors.js';
import type { MetadataSet } from '../../../src/types/hardener.js';

const ITERATIONS = 1000;
const SALT = '00112233445566778899aabbccddeeff';
const METADATA: MetadataSet = { house_name: 'Maple House', birthday_token: '0101' };

const alphabetOnly = new RegExp(`^[${PASSWORD_ALPHABET.replace(/[\^\]\\-]/g, '\\$&')}]+$`);

describe('Hardener Module', () => {
  describe('hardenPassword', () => {
    it('should produce three variants of 16, 24 and 32 characters', () => {
      const result = hardenPassword('test-secret', METADATA, { iterations: ITERATIONS, salt: SALT });

      expect(result.variants.short.password).toHaveLength(16);
      expect(result.variants.medium.password).toHaveLength(24);
      expect(result.variants.long.password).toHaveLength(32);
      expect(result.variants.medium.password).toMatch(alphabetOnly);
    });

    it('should label variants and attach their entropy', () => {
      const result = hardenPassword('test-secret', METADATA, { iterations: ITERATIONS, salt: SALT });

      expect(result.variants.short.label).toBe('short');
      expect(result.variants.long.label).toBe('long');
      expect(result.variants.medium.entropy).toBeGreaterThan(0);
    });

    it('should report the derivation parameters', () => {
      const result = hardenPassword('test-secret', METADATA, { iterations: ITERATIONS, salt: SALT });

      expect(result.salt).toBe(SALT);
      expect(result.iterations).toBe(ITERATIONS);
      expect(result.algorithm).toBe('PBKDF2-HMAC-SHA256');
      expect(result.hardenedFull).toMatch(/^[0-9a-f]{64}$/);
    });

    it('should measure the entropy of the base secret', () => {
      // 8 * log2(26)
      const result = hardenPassword('password', {}, { iterations: ITERATIONS, salt: SALT });

      expect(result.originalEntropy).toBe(37.6);
    });

    it('should derive every variant from the same key', () => {
      const result = hardenPassword('test-secret', METADATA, { iterations: ITERATIONS, salt: SALT });

      expect(result.variants.long.password).toBe(encodePassword(result.hardenedFull, 32));
      expect(result.variants.long.password.startsWith(result.variants.medium.password)).toBe(true);
    });

    it('should be deterministic for a fixed salt', () => {
      const a = hardenPassword('test-secret', METADATA, { iterations: ITERATIONS, salt: SALT });
      const b = hardenPassword('test-secret', METADATA, { iterations: ITERATIONS, salt: SALT });

      expect(b.hardenedFull).toBe(a.hardenedFull);
    });

    it('should generate a new salt when none is given', () => {
      const a = hardenPassword('test-secret', METADATA, { iterations: ITERATIONS });
      const b = hardenPassword('test-secret', METADATA, { iterations: ITERATIONS });

      expect(a.salt).toMatch(/^[0-9a-f]{32}$/);
      expect(a.salt).not.toBe(b.salt);
      expect(a.hardenedFull).not.toBe(b.hardenedFull);
    });

    it('should treat metadata case and padding as equivalent', () => {
      const a = hardenPassword('test-secret', { house_name: ' MAPLE house ' }, { iterations: ITERATIONS, salt: SALT });
      const b = hardenPassword('test-secret', { house_name: 'maple house' }, { iterations: ITERATIONS, salt: SALT });

      expect(a.hardenedFull).toBe(b.hardenedFull);
    });

    it('should reject an empty base secret', () => {
      expect(() => hardenPassword('', METADATA, { iterations: ITERATIONS, salt: SALT })).toThrow(InputError);
    });
  });

  describe('derivePassword', () => {
    it('should match the hardened variant for the same inputs', () => {
      const result = hardenPassword('test-secret', METADATA, { iterations: ITERATIONS, salt: SALT });

      expect(derivePassword('test-secret', METADATA, SALT, 24, ITERATIONS)).toBe(result.variants.medium.password);
    });

    it('should differ when the salt differs', () => {
      const a = derivePassword('test-secret', METADATA, SALT, 24, ITERATIONS);
      const b = derivePassword('test-secret', METADATA, 'ffeeddccbbaa99887766554433221100', 24, ITERATIONS);

      expect(a).not.toBe(b);
    });
  });

  describe('deriveKey', () => {
    it('should match the full key of hardenPassword', () => {
      const result = hardenPassword('test-secret', METADATA, { iterations: ITERATIONS, salt: SALT });

      expect(deriveKey('test-secret', METADATA, SALT, ITERATIONS).toString('hex')).toBe(result.hardenedFull);
    });
  });
});
