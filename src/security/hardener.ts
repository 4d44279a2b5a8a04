/**
 * 패스워드 하드닝 모듈
 * 메타데이터 정규화 → PBKDF2 → 인코딩으로 세 가지 길이의 패스워드를 만든다
 */

import {
  KDF_ALGORITHM,
  VARIANT_LENGTHS,
  type HardenOptions,
  type HardenResult,
  type MetadataSet,
  type PasswordVariant,
  type VariantLabel,
} from '../types/hardener.js';
import { normalizeMetadata } from './metadata.js';
import { DEFAULT_ITERATIONS, clearKey, generateSalt, stretchKey } from './stretch.js';
import { encodePassword } from './encoder.js';
import { computeEntropy } from './entropy.js';

/**
 * 메타데이터를 정규화한 뒤 키를 파생합니다
 * @returns 32바이트 파생 키 (사용 후 clearKey 호출)
 */
export function deriveKey(
  baseSecret: string,
  metadata: MetadataSet,
  salt: string,
  iterations: number = DEFAULT_ITERATIONS
): Buffer {
  return stretchKey({
    baseSecret,
    metadata: normalizeMetadata(metadata),
    salt,
    iterations,
  });
}

/**
 * 지정 길이의 하드닝 패스워드를 파생합니다
 * 같은 입력이면 언제나 같은 패스워드가 나온다 (복구의 전제)
 */
export function derivePassword(
  baseSecret: string,
  metadata: MetadataSet,
  salt: string,
  length: number,
  iterations: number = DEFAULT_ITERATIONS
): string {
  const key = deriveKey(baseSecret, metadata, salt, iterations);
  try {
    return encodePassword(key, length);
  } finally {
    clearKey(key);
  }
}

function toVariant(label: VariantLabel, key: Buffer): PasswordVariant {
  const password = encodePassword(key, VARIANT_LENGTHS[label]);
  return { label, password, entropy: computeEntropy(password) };
}

/**
 * 기본 비밀번호를 하드닝합니다
 * @param baseSecret - 기본 비밀번호
 * @param metadata - 개인 메타데이터
 * @param options - 반복 횟수, 기존 salt
 */
export function hardenPassword(
  baseSecret: string,
  metadata: MetadataSet,
  options: HardenOptions = {}
): HardenResult {
  const iterations = options.iterations ?? DEFAULT_ITERATIONS;
  const salt = options.salt ?? generateSalt();
  const key = deriveKey(baseSecret, metadata, salt, iterations);

  try {
    return {
      originalEntropy: computeEntropy(baseSecret),
      salt,
      iterations,
      algorithm: KDF_ALGORITHM,
      hardenedFull: key.toString('hex'),
      variants: {
        short: toVariant('short', key),
        medium: toVariant('medium', key),
        long: toVariant('long', key),
      },
    };
  } finally {
    clearKey(key);
  }
}
