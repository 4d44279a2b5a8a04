/**
 * 로그 메타데이터 마스킹
 */

export const REDACTED = '[REDACTED]';

/**
 * 기본 마스킹 키 (소문자 비교)
 */
export const DEFAULT_REDACT_KEYS = [
  'basesecret',
  'basepassword',
  'password',
  'secret',
  'secretkey',
  'secret_key',
  'salt',
  'stored',
  'storedhash',
  'hardenedfull',
  'metadata',
];

/**
 * 민감 키의 값을 마스킹한 사본을 반환합니다 (중첩 객체 포함)
 * @param metadata - 원본 메타데이터
 * @param keys - 마스킹할 키 목록 (소문자)
 */
export function redactMetadata(
  metadata: Record<string, unknown>,
  keys: ReadonlySet<string>
): Record<string, unknown> {
  const result: Record<string, unknown> = {};

  for (const [key, value] of Object.entries(metadata)) {
    if (keys.has(key.toLowerCase())) {
      result[key] = REDACTED;
    } else if (value !== null && typeof value === 'object' && !Array.isArray(value) && !(value instanceof Date)) {
      result[key] = redactMetadata(Object.fromEntries(Object.entries(value)), keys);
    } else {
      result[key] = value;
    }
  }

  return result;
}
