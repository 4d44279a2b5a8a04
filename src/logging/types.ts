/**
 * 로깅 시스템 타입 정의
 * @description 구조화된 JSON 로깅을 위한 타입 시스템
 */

/**
 * 로그 레벨 열거형
 */
export enum LogLevel {
  DEBUG = 'debug',
  INFO = 'info',
  WARN = 'warn',
  ERROR = 'error',
}

/**
 * 로그 레벨 숫자 값 (비교용)
 */
export const LogLevelValue: Record<LogLevel, number> = {
  [LogLevel.DEBUG]: 0,
  [LogLevel.INFO]: 1,
  [LogLevel.WARN]: 2,
  [LogLevel.ERROR]: 3,
};

/**
 * 구조화된 로그 엔트리
 */
export interface LogEntry {
  /** ISO 8601 타임스탬프 */
  timestamp: string;
  level: LogLevel;
  message: string;
  /** 로그 컨텍스트 (모듈/컴포넌트명) */
  context?: string;
  /** 추가 메타데이터 (민감 키는 마스킹됨) */
  metadata?: Record<string, unknown>;
  error?: {
    name: string;
    message: string;
    stack?: string;
  };
  /** 요청 ID (gateway) */
  requestId?: string;
}

/**
 * 로그 출력 대상
 */
export enum LogOutput {
  CONSOLE = 'console',
  FILE = 'file',
  BOTH = 'both',
}

/**
 * 로거 설정 옵션
 */
export interface LoggerOptions {
  /** 최소 로그 레벨 (이 레벨 이상만 출력) */
  minLevel: LogLevel;
  output: LogOutput;
  /** 로그 파일 경로 (output이 file 또는 both인 경우) */
  logFilePath?: string;
  /** 콘솔 출력 포맷 */
  consoleFormat?: 'json' | 'pretty';
  /** 색상 사용 여부 (pretty 모드에서만 적용) */
  useColors?: boolean;
  /** 컨텍스트 접두사 */
  context?: string;
  /** 기본 메타데이터 (모든 로그에 포함) */
  defaultMetadata?: Record<string, unknown>;
  /** 마스킹할 메타데이터 키 (기본 목록에 추가) */
  redactKeys?: string[];
  /** 트랜스포트 직접 지정 (테스트용) */
  transport?: LogTransport;
}

/**
 * 로거 인터페이스
 */
export interface ILogger {
  debug(message: string, metadata?: Record<string, unknown>): void;
  info(message: string, metadata?: Record<string, unknown>): void;
  warn(message: string, metadata?: Record<string, unknown>): void;
  error(message: string, error?: Error, metadata?: Record<string, unknown>): void;
  /** 로그 레벨 변경 */
  setLevel(level: LogLevel): void;
  /** 자식 로거 생성 (컨텍스트 상속) */
  child(context: string, metadata?: Record<string, unknown>): ILogger;
  /** 로거 종료 (리소스 정리) */
  close(): Promise<void>;
}

/**
 * 환경별 로그 설정
 */
export interface EnvironmentLogConfig {
  development: LoggerOptions;
  production: LoggerOptions;
  test: LoggerOptions;
}

/**
 * 로그 포맷터 인터페이스
 */
export interface LogFormatter {
  format(entry: LogEntry): string;
}

/**
 * 로그 트랜스포트 인터페이스
 */
export interface LogTransport {
  send(entry: LogEntry): void;
  close(): Promise<void>;
}
