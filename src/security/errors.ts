/**
 * 하드너 에러 클래스
 */

export type HardenerErrorCode = 'INVALID_INPUT' | 'INVALID_CONFIG' | 'NOT_FOUND' | 'MALFORMED_DATA';

/**
 * 하드너 에러 기본 클래스
 */
export class HardenerError extends Error {
  constructor(
    message: string,
    public code: HardenerErrorCode
  ) {
    super(message);
    this.name = 'HardenerError';
  }
}

/**
 * 잘못된 입력 (빈 기본 비밀번호, 잘못된 길이 등)
 */
export class InputError extends HardenerError {
  constructor(message: string) {
    super(message, 'INVALID_INPUT');
    this.name = 'InputError';
  }
}

/**
 * 잘못된 설정값 (반복 횟수 등)
 */
export class ConfigError extends HardenerError {
  constructor(message: string) {
    super(message, 'INVALID_CONFIG');
    this.name = 'ConfigError';
  }
}

/**
 * 복구 파일 없음
 */
export class RecoveryNotFoundError extends HardenerError {
  constructor(
    message: string,
    public path: string
  ) {
    super(message, 'NOT_FOUND');
    this.name = 'RecoveryNotFoundError';
  }
}

/**
 * 복구 파일 형식 오류
 */
export class MalformedRecoveryError extends HardenerError {
  constructor(
    message: string,
    public path: string,
    public details: string[] = []
  ) {
    super(message, 'MALFORMED_DATA');
    this.name = 'MalformedRecoveryError';
  }
}
