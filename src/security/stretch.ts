/**
 * 키 스트레칭 모듈
 * PBKDF2-HMAC-SHA256 기반 키 파생
 */

import { pbkdf2Sync, randomBytes } from 'crypto';
import type { DerivationParameters } from '../types/hardener.js';
import { ConfigError, InputError } from './errors.js';

// PBKDF2 설정
const DIGEST = 'sha256';
export const KEY_LENGTH = 32; // 256-bit
export const DEFAULT_ITERATIONS = 100000;
export const DEFAULT_SALT_BYTES = 16;
export const DEFAULT_MAX_ITERATIONS = 1000000;

/**
 * 반복 횟수를 검증합니다
 * @param iterations - 반복 횟수
 * @throws ConfigError 양의 정수가 아닐 때
 */
export function assertIterations(iterations: number): void {
  if (!Number.isSafeInteger(iterations) || iterations <= 0) {
    throw new ConfigError(`Iterations must be a positive integer, got ${iterations}`);
  }
}

/**
 * 외부 입력으로 받은 반복 횟수를 상한과 함께 검증합니다
 * 반복 횟수만큼 CPU를 쓰므로 네트워크/CLI 입력은 반드시 이 함수를 거친다
 * @param iterations - 반복 횟수
 * @param maxIterations - 허용 상한
 */
export function assertIterationsWithin(iterations: number, maxIterations: number): void {
  assertIterations(iterations);
  if (iterations > maxIterations) {
    throw new ConfigError(`Iterations must not exceed ${maxIterations}, got ${iterations}`);
  }
}

/**
 * 기본 비밀번호가 비어 있지 않은지 검증합니다
 * @throws InputError 빈 문자열일 때
 */
export function assertBaseSecret(baseSecret: string): void {
  if (baseSecret.length === 0) {
    throw new InputError('Base password is required');
  }
}

/**
 * 랜덤 salt를 생성합니다
 * @param bytes - 바이트 수 (기본 16)
 * @returns hex 문자열 (bytes * 2 자)
 */
export function generateSalt(bytes: number = DEFAULT_SALT_BYTES): string {
  if (!Number.isSafeInteger(bytes) || bytes < DEFAULT_SALT_BYTES) {
    throw new ConfigError(`Salt must be at least ${DEFAULT_SALT_BYTES} bytes, got ${bytes}`);
  }
  return randomBytes(bytes).toString('hex');
}

/**
 * 기본 비밀번호와 메타데이터로부터 32바이트 키를 파생합니다
 *
 * 입력은 `${baseSecret}:${metadata}`의 UTF-8 바이트, salt는 문자열의 UTF-8 바이트.
 * 같은 입력이면 항상 같은 키가 나온다.
 *
 * @returns 파생 키 - 사용 후 호출자가 clearKey로 지울 것
 */
export function stretchKey(params: DerivationParameters): Buffer {
  assertBaseSecret(params.baseSecret);
  assertIterations(params.iterations);

  const input = Buffer.from(`${params.baseSecret}:${params.metadata}`, 'utf-8');
  try {
    return pbkdf2Sync(input, Buffer.from(params.salt, 'utf-8'), params.iterations, KEY_LENGTH, DIGEST);
  } finally {
    input.fill(0);
  }
}

/**
 * 파생 키를 메모리에서 지웁니다
 */
export function clearKey(key: Buffer): void {
  key.fill(0);
}
