/**
 * 패스워드 검증 모듈
 * 재파생 결과와 저장값을 상수 시간으로 비교한다
 */

import { createHash, timingSafeEqual } from 'crypto';
import type { VerifyInput } from '../types/hardener.js';
import { encodePassword } from './encoder.js';
import { codePointLength } from './entropy.js';
import { deriveKey } from './hardener.js';
import { DEFAULT_ITERATIONS, KEY_LENGTH, clearKey } from './stretch.js';

const FULL_KEY_PATTERN = new RegExp(`^[0-9a-f]{${KEY_LENGTH * 2}}$`);

/**
 * 두 문자열을 상수 시간으로 비교합니다
 * 길이가 달라도 같은 크기의 다이제스트끼리 비교하므로 첫 불일치 위치가 드러나지 않는다
 */
export function constantTimeEqual(a: string, b: string): boolean {
  const digestA = createHash('sha256').update(a, 'utf-8').digest();
  const digestB = createHash('sha256').update(b, 'utf-8').digest();
  const sameDigest = timingSafeEqual(digestA, digestB);
  return sameDigest && a.length === b.length;
}

/**
 * 기본 비밀번호 + 메타데이터 + salt로 저장값을 재현할 수 있는지 검증합니다
 *
 * stored가 64자 소문자 hex이면 파생 키 전체와 비교하고,
 * 그 밖에는 같은 길이로 인코딩한 패스워드와 비교한다.
 *
 * 빈 저장값은 어떤 입력으로도 재현된 것으로 보지 않는다.
 *
 * @returns 일치 여부 (불일치는 에러가 아님)
 */
export function verifyPassword(input: VerifyInput): boolean {
  if (input.stored.length === 0) {
    return false;
  }

  const key = deriveKey(input.baseSecret, input.metadata, input.salt, input.iterations ?? DEFAULT_ITERATIONS);

  try {
    const computed = FULL_KEY_PATTERN.test(input.stored)
      ? key.toString('hex')
      : encodePassword(key, codePointLength(input.stored));
    return constantTimeEqual(computed, input.stored);
  } finally {
    clearKey(key);
  }
}
