/**
 * 파생 키 → 패스워드 인코더
 */

import { InputError } from './errors.js';

/**
 * 출력 문자 집합 (70자). 순서 고정: 소문자, 대문자, 숫자, 기호
 */
export const PASSWORD_ALPHABET =
  'abcdefghijklmnopqrstuvwxyzABCDEFGHIJKLMNOPQRSTUVWXYZ0123456789!@#$%^&*';

const HEX_PATTERN = /^[0-9a-fA-F]*$/;

/**
 * hex 문자열을 바이트로 변환합니다 (홀수 길이면 마지막 한 자리는 버림)
 */
function hexToBytes(hex: string): Buffer {
  if (!HEX_PATTERN.test(hex)) {
    throw new InputError('Key material must be a hex string');
  }
  return Buffer.from(hex.slice(0, hex.length - (hex.length % 2)), 'hex');
}

/**
 * 파생 키를 입력 가능한 패스워드로 변환합니다
 *
 * 문자 하나당 키 1바이트를 쓰고 `byte % 70`으로 문자를 고른다.
 * length는 항상 출력 문자 수이며, 키가 모자라면 만들어진 만큼만 반환한다.
 *
 * @param key - 파생 키 (Buffer 또는 hex 문자열)
 * @param length - 출력 문자 수
 */
export function encodePassword(key: Buffer | string, length: number): string {
  if (!Number.isSafeInteger(length) || length < 0) {
    throw new InputError(`Password length must be a non-negative integer, got ${length}`);
  }

  const bytes = typeof key === 'string' ? hexToBytes(key) : key;
  const count = Math.min(length, bytes.length);
  let password = '';

  for (let i = 0; i < count; i++) {
    password += PASSWORD_ALPHABET[bytes[i] % PASSWORD_ALPHABET.length];
  }

  return password;
}
