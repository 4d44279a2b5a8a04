/**
 * 설정 관련 타입 정의
 */

/**
 * 키 파생 설정
 */
export interface DerivationConfig {
  /** 기본 PBKDF2 반복 횟수 */
  iterations: number;
  /** 외부 입력으로 허용할 최대 반복 횟수 */
  maxIterations: number;
  /** 새 salt의 바이트 수 (최소 16) */
  saltBytes: number;
}

/**
 * 복구 설정
 */
export interface RecoveryConfig {
  /** 기본 복구 파일 경로 */
  defaultFile: string;
  /** 기본 복구 변형 */
  defaultVariant: 'short' | 'medium' | 'long';
}

/**
 * Gateway 설정
 */
export interface GatewayConfig {
  httpPort: number;
  host: string;
  cors?: {
    origins: string[];
  };
}

/**
 * 로깅 설정
 */
export interface LoggingConfig {
  level: 'debug' | 'info' | 'warn' | 'error';
  /** 콘솔 출력 */
  console: boolean;
  /** 파일 출력 */
  file?: {
    enabled: boolean;
    path: string;
  };
  /** JSON 형식 */
  json: boolean;
}

/**
 * 애플리케이션 설정
 */
export interface AppConfig {
  /** 설정 버전 */
  version: string;
  derivation: DerivationConfig;
  recovery: RecoveryConfig;
  gateway: GatewayConfig;
  logging: LoggingConfig;
}

/**
 * 설정 검증 결과
 */
export interface ConfigValidationResult {
  valid: boolean;
  errors: string[];
}
