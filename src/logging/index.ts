/**
 * 로깅 시스템 모듈
 * @description 구조화된 JSON 로깅, 민감 정보 마스킹, 환경별 설정 지원
 *
 * @example
 * ```typescript
 * import { getLogger, initializeLogger, LogLevel } from './logging/index.js';
 *
 * const logger = getLogger();
 * logger.info('Password hardened', { iterations: 100000 });
 *
 * // baseSecret, salt 등은 자동으로 [REDACTED] 처리
 * logger.debug('Derivation input', { baseSecret: '...' });
 *
 * const recoveryLogger = logger.child('recovery');
 * ```
 */

export type {
  LogEntry,
  LoggerOptions,
  LogFormatter,
  LogTransport,
  ILogger,
  EnvironmentLogConfig,
} from './types.js';

export { LogLevel, LogOutput, LogLevelValue } from './types.js';

export { Logger, initializeLogger, getLogger, closeLogger } from './logger.js';

import { LogLevel, LogOutput } from './types.js';
import type { LoggerOptions } from './types.js';
import type { LoggingConfig } from '../types/config.js';
import { Logger } from './logger.js';

const levelByName: Record<LoggingConfig['level'], LogLevel> = {
  debug: LogLevel.DEBUG,
  info: LogLevel.INFO,
  warn: LogLevel.WARN,
  error: LogLevel.ERROR,
};

/**
 * 애플리케이션 로깅 설정을 로거 옵션으로 변환합니다
 */
export function toLoggerOptions(config: LoggingConfig): Partial<LoggerOptions> {
  const fileEnabled = config.file?.enabled === true;
  let output = config.console ? LogOutput.CONSOLE : LogOutput.FILE;
  if (fileEnabled && config.console) {
    output = LogOutput.BOTH;
  }

  return {
    minLevel: levelByName[config.level],
    output,
    consoleFormat: config.json ? 'json' : 'pretty',
    logFilePath: fileEnabled ? config.file?.path : undefined,
  };
}

/**
 * 애플리케이션 로깅 설정으로 로거를 생성합니다
 */
export function createLogger(config: LoggingConfig): Logger {
  return new Logger(toLoggerOptions(config));
}

export { JsonFormatter, PrettyFormatter, createFormatter } from './formatters.js';

export { ConsoleTransport, FileTransport, CompositeTransport, MemoryTransport } from './transports.js';

export { REDACTED, DEFAULT_REDACT_KEYS, redactMetadata } from './redact.js';

export {
  DEFAULT_LOG_DIR,
  DEFAULT_LOG_FILENAME,
  defaultConfigs,
  detectEnvironment,
  getDefaultConfig,
  mergeConfig,
  loadConfigFromEnv,
  loadConfig,
} from './config.js';
