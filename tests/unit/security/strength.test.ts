import { describe, it, expect } from 'vitest';
import { computeEntropy, detectCharacterClasses, charsetSize } from '../../../src/security/entropy.js';
import { estimateCrackTime } from '../../../src/security/crack-time.js';
import { analyzePasswordStrength, classifyStrength } from '../../../src/security/strength.js';

describe('Strength Analysis', () => {
  describe('computeEntropy', () => {
    it('should use the assumed charset of the present classes', () => {
      // 15 * log2(62)
      expect(computeEntropy('MySimplePass123')).toBe(89.31);
      // 8 * log2(26)
      expect(computeEntropy('password')).toBe(37.6);
      // 4 * log2(10)
      expect(computeEntropy('1234')).toBe(13.29);
    });

    it.each([
      ['all four classes', 'aB3!'],
      ['lowercase only', 'q'],
    ])('should never decrease as the password grows (%s)', (_label, unit) => {
      const entropies = Array.from({ length: 8 }, (_, i) => computeEntropy(unit.repeat(i + 1)));

      for (let i = 1; i < entropies.length; i++) {
        expect(entropies[i]).toBeGreaterThanOrEqual(entropies[i - 1]);
      }
      expect(entropies[7]).toBeGreaterThan(entropies[0]);
    });

    it('should return 0 for an empty string', () => {
      expect(computeEntropy('')).toBe(0);
    });

    it('should return 0 when no class is present', () => {
      expect(computeEntropy('   ')).toBe(0);
    });

    it('should count code points, not UTF-16 units', () => {
      // 'ab' + 이모지 1개 = 3 code points, 소문자만 → 3 * log2(26)
      expect(computeEntropy('ab\u{1F600}')).toBe(14.1);
    });
  });

  describe('detectCharacterClasses', () => {
    it('should detect each class', () => {
      expect(detectCharacterClasses('aB3!')).toEqual({
        hasLowercase: true,
        hasUppercase: true,
        hasDigits: true,
        hasSymbols: true,
      });
    });

    it('should treat non-ASCII letters as letters', () => {
      expect(detectCharacterClasses('é').hasLowercase).toBe(true);
    });

    it('should give 94 for all four classes', () => {
      expect(charsetSize(detectCharacterClasses('aB3!'))).toBe(94);
    });
  });

  describe('estimateCrackTime', () => {
    it('should report 0 seconds for zero entropy', () => {
      expect(estimateCrackTime(0)).toEqual({ numeric: 0, unit: 'seconds', display: '0 seconds' });
    });

    it.each([
      [30, 1.07, 'seconds'],
      [40, 18.33, 'minutes'],
      [50, 13.03, 'days'],
      [60, 36.56, 'years'],
    ])('should express %s bits as %s %s', (entropy, numeric, unit) => {
      const estimate = estimateCrackTime(entropy);

      expect(estimate.numeric).toBe(numeric);
      expect(estimate.unit).toBe(unit);
    });

    it('should resolve 100 bits to centuries', () => {
      expect(estimateCrackTime(100).unit).toBe('centuries');
    });
  });

  describe('classifyStrength', () => {
    it.each([
      [0, 'Very Weak', 'red'],
      [27.99, 'Very Weak', 'red'],
      [28, 'Weak', 'orange'],
      [36, 'Moderate', 'yellow'],
      [60, 'Strong', 'lightgreen'],
      [80, 'Very Strong', 'green'],
    ])('should rate %s bits as %s', (entropy, strength, color) => {
      expect(classifyStrength(entropy)).toEqual({ strength, color });
    });
  });

  describe('analyzePasswordStrength', () => {
    it('should combine all measurements', () => {
      const analysis = analyzePasswordStrength('password');

      expect(analysis).toEqual({
        length: 8,
        hasLowercase: true,
        hasUppercase: false,
        hasDigits: false,
        hasSymbols: false,
        entropy: 37.6,
        crackTime: estimateCrackTime(37.6),
        strength: 'Moderate',
        color: 'yellow',
      });
    });
  });
});
