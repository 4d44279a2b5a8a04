/**
 * 메타데이터 정규화 모듈
 */

import { METADATA_FIELDS, type MetadataField, type MetadataSet } from '../types/hardener.js';

/**
 * 모든 메타데이터 필드에 대해 값을 만들어 레코드로 반환합니다
 */
export function mapMetadataFields<T>(fn: (field: MetadataField) => T): Record<MetadataField, T> {
  return {
    house_name: fn('house_name'),
    phone_suffix: fn('phone_suffix'),
    core_memory: fn('core_memory'),
    handle_name: fn('handle_name'),
    birthday_token: fn('birthday_token'),
    custom: fn('custom'),
  };
}

/**
 * 메타데이터를 하나의 정규화된 문자열로 합칩니다
 *
 * 호출자가 만든 객체의 키 순서와 무관하게 METADATA_FIELDS 순서로 이어 붙인다.
 * 값은 trim 후 소문자로 변환하며, 비어 있는 필드와 알 수 없는 키는 무시한다.
 *
 * @param metadata - 개인 메타데이터
 * @returns 정규화된 문자열 (구분자 없음, 빈 문자열 가능)
 */
export function normalizeMetadata(metadata: MetadataSet): string {
  let combined = '';

  for (const field of METADATA_FIELDS) {
    const value = metadata[field]?.trim();
    if (value) {
      combined += value.toLowerCase();
    }
  }

  return combined;
}
