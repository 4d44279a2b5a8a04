/**
 * 패스워드 강도 분류 및 종합 분석
 */

import type { StrengthAnalysis, StrengthColor, StrengthRating } from '../types/hardener.js';
import { codePointLength, computeEntropy, detectCharacterClasses } from './entropy.js';
import { estimateCrackTime } from './crack-time.js';

/**
 * 등급 기준 (상한 미만이면 해당 등급)
 */
const STRENGTH_THRESHOLDS: ReadonlyArray<{ below: number; strength: StrengthRating; color: StrengthColor }> = [
  { below: 28, strength: 'Very Weak', color: 'red' },
  { below: 36, strength: 'Weak', color: 'orange' },
  { below: 60, strength: 'Moderate', color: 'yellow' },
  { below: 80, strength: 'Strong', color: 'lightgreen' },
];

/**
 * 엔트로피를 강도 등급으로 분류합니다
 */
export function classifyStrength(entropy: number): { strength: StrengthRating; color: StrengthColor } {
  for (const { below, strength, color } of STRENGTH_THRESHOLDS) {
    if (entropy < below) {
      return { strength, color };
    }
  }
  return { strength: 'Very Strong', color: 'green' };
}

/**
 * 패스워드 강도를 종합 분석합니다
 * @param password - 분석할 패스워드
 */
export function analyzePasswordStrength(password: string): StrengthAnalysis {
  const entropy = computeEntropy(password);

  return {
    length: codePointLength(password),
    ...detectCharacterClasses(password),
    entropy,
    crackTime: estimateCrackTime(entropy),
    ...classifyStrength(entropy),
  };
}
