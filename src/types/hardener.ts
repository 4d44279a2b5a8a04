/**
 * 패스워드 하드닝 관련 타입 정의
 */

/**
 * 메타데이터 필드 목록
 * 배열 순서가 곧 정규화 순서이므로 순서를 바꾸면 기존 패스워드를 복구할 수 없다
 */
export const METADATA_FIELDS = [
  'house_name',
  'phone_suffix',
  'core_memory',
  'handle_name',
  'birthday_token',
  'custom',
] as const;

/**
 * 메타데이터 필드명
 */
export type MetadataField = (typeof METADATA_FIELDS)[number];

/**
 * 개인 메타데이터 (모든 필드 선택)
 */
export type MetadataSet = Partial<Record<MetadataField, string>>;

/**
 * 키 파생 알고리즘 식별자
 */
export const KDF_ALGORITHM = 'PBKDF2-HMAC-SHA256';

export type KdfAlgorithm = typeof KDF_ALGORITHM;

/**
 * 키 파생 파라미터 (한 번의 파생에만 사용)
 */
export interface DerivationParameters {
  /** 사용자가 기억하는 기본 비밀번호 */
  readonly baseSecret: string;
  /** 정규화된 메타데이터 문자열 */
  readonly metadata: string;
  /** salt 문자열 (UTF-8 바이트로 사용) */
  readonly salt: string;
  /** PBKDF2 반복 횟수 */
  readonly iterations: number;
}

/**
 * 패스워드 변형 라벨
 */
export type VariantLabel = 'short' | 'medium' | 'long';

/**
 * 라벨별 패스워드 길이 (문자 수)
 */
export const VARIANT_LENGTHS: Record<VariantLabel, number> = {
  short: 16,
  medium: 24,
  long: 32,
};

/**
 * 하드닝된 패스워드 변형
 */
export interface PasswordVariant {
  label: VariantLabel;
  password: string;
  /** 엔트로피 (bits) */
  entropy: number;
}

/**
 * 하드닝 옵션
 */
export interface HardenOptions {
  /** 반복 횟수 (기본 100000) */
  iterations?: number;
  /** 기존 salt 재사용 (없으면 새로 생성) */
  salt?: string;
}

/**
 * 하드닝 결과
 */
export interface HardenResult {
  /** 기본 비밀번호의 엔트로피 */
  originalEntropy: number;
  salt: string;
  iterations: number;
  algorithm: KdfAlgorithm;
  /** 파생 키 전체 (hex, 진단용) */
  hardenedFull: string;
  variants: Record<VariantLabel, PasswordVariant>;
}

/**
 * 크랙 시간 단위
 */
export type TimeUnit = 'centuries' | 'years' | 'months' | 'days' | 'hours' | 'minutes' | 'seconds';

/**
 * 크랙 시간 추정치
 */
export interface CrackTimeEstimate {
  numeric: number;
  unit: TimeUnit;
  /** 예: "3.5 hours" */
  display: string;
}

/**
 * 강도 등급
 */
export type StrengthRating = 'Very Weak' | 'Weak' | 'Moderate' | 'Strong' | 'Very Strong';

/**
 * 등급 표시 색상
 */
export type StrengthColor = 'red' | 'orange' | 'yellow' | 'lightgreen' | 'green';

/**
 * 문자 클래스 포함 여부
 */
export interface CharacterClasses {
  hasLowercase: boolean;
  hasUppercase: boolean;
  hasDigits: boolean;
  hasSymbols: boolean;
}

/**
 * 패스워드 강도 분석 결과
 */
export interface StrengthAnalysis extends CharacterClasses {
  length: number;
  entropy: number;
  crackTime: CrackTimeEstimate;
  strength: StrengthRating;
  color: StrengthColor;
}

/**
 * 복구 패키지
 * 기본 비밀번호와 메타데이터 원문은 절대 포함하지 않는다
 */
export interface RecoveryPackage {
  /** salt (복구 키) */
  secretKey: string;
  /** 필드별 힌트 (앞 2글자 + "...") */
  metadataHints: Record<MetadataField, string>;
  iterations: number;
  algorithm: KdfAlgorithm;
  warning: string;
}

/**
 * 복구 패키지 생성 결과
 */
export interface RecoveryPackageResult {
  secretKey: string;
  passwords: Record<VariantLabel, string>;
  metadataHints: Record<MetadataField, string>;
  recoveryFile: string;
}

/**
 * 검증 입력
 */
export interface VerifyInput {
  baseSecret: string;
  metadata: MetadataSet;
  salt: string;
  /** 저장된 값: 파생 키 hex(64자) 또는 하드닝된 패스워드 */
  stored: string;
  iterations?: number;
}
