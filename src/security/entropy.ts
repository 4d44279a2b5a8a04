/**
 * 엔트로피 추정 모듈
 *
 * 문자 클래스별 크기를 더한 "가정된" 문자 집합 크기로 엔트로피를 계산한다.
 * 반복 문자나 사전 단어는 고려하지 않는 상한 추정치이다.
 */

import type { CharacterClasses } from '../types/hardener.js';

// 클래스별 문자 집합 크기
const LOWERCASE_SIZE = 26;
const UPPERCASE_SIZE = 26;
const DIGIT_SIZE = 10;
const SYMBOL_SIZE = 32;

/**
 * ASCII 구두점/기호 32자
 */
export const PUNCTUATION = '!"#$%&\'()*+,-./:;<=>?@[\\]^_`{|}~';

const punctuationSet = new Set(PUNCTUATION);

/**
 * 소수점 자릿수 반올림
 */
export function roundTo(value: number, digits: number): number {
  const factor = 10 ** digits;
  return Math.round(value * factor) / factor;
}

/**
 * 코드 포인트 기준 문자열 길이
 */
export function codePointLength(text: string): number {
  return Array.from(text).length;
}

/**
 * 패스워드에 포함된 문자 클래스를 확인합니다
 */
export function detectCharacterClasses(password: string): CharacterClasses {
  const chars = Array.from(password);

  return {
    hasLowercase: chars.some((c) => /\p{Ll}/u.test(c)),
    hasUppercase: chars.some((c) => /\p{Lu}/u.test(c)),
    hasDigits: chars.some((c) => /\p{Nd}/u.test(c)),
    hasSymbols: chars.some((c) => punctuationSet.has(c)),
  };
}

/**
 * 포함된 클래스 크기의 합
 */
export function charsetSize(classes: CharacterClasses): number {
  let size = 0;
  if (classes.hasLowercase) size += LOWERCASE_SIZE;
  if (classes.hasUppercase) size += UPPERCASE_SIZE;
  if (classes.hasDigits) size += DIGIT_SIZE;
  if (classes.hasSymbols) size += SYMBOL_SIZE;
  return size;
}

/**
 * 패스워드 엔트로피(bits)를 계산합니다
 * @returns length * log2(charset), 소수점 2자리 (해당 클래스가 없으면 0)
 */
export function computeEntropy(password: string): number {
  const size = charsetSize(detectCharacterClasses(password));

  if (size === 0) {
    return 0;
  }

  return roundTo(codePointLength(password) * Math.log2(size), 2);
}
