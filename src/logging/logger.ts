/**
 * 로거 클래스 구현
 * @description 구조화된 JSON 로깅, 민감 정보 마스킹, 다중 트랜스포트
 */

import type { ILogger, LogEntry, LoggerOptions, LogTransport } from './types.js';
import { LogLevel, LogLevelValue, LogOutput } from './types.js';
import { ConsoleTransport, CompositeTransport } from './transports.js';
import { loadConfig } from './config.js';
import { DEFAULT_REDACT_KEYS, redactMetadata } from './redact.js';

/**
 * 로거 클래스
 */
export class Logger implements ILogger {
  private options: LoggerOptions;
  private transport: LogTransport;
  private context: string;
  private defaultMetadata: Record<string, unknown>;
  private redactKeys: ReadonlySet<string>;

  constructor(options?: Partial<LoggerOptions>) {
    this.options = loadConfig(options);
    this.context = this.options.context || 'pph';
    this.defaultMetadata = this.options.defaultMetadata || {};
    this.redactKeys = new Set([
      ...DEFAULT_REDACT_KEYS,
      ...(this.options.redactKeys ?? []).map((key) => key.toLowerCase()),
    ]);
    this.transport = this.options.transport ?? this.createTransport();
  }

  /**
   * 트랜스포트 생성
   */
  private createTransport(): LogTransport {
    if (this.options.output === LogOutput.CONSOLE) {
      return new ConsoleTransport(this.options.consoleFormat, this.options.useColors);
    }
    return new CompositeTransport(this.options);
  }

  /**
   * 로그 엔트리 생성
   */
  private createEntry(
    level: LogLevel,
    message: string,
    metadata?: Record<string, unknown>,
    error?: Error
  ): LogEntry {
    const { requestId, ...rest } = { ...this.defaultMetadata, ...metadata };

    const entry: LogEntry = {
      timestamp: new Date().toISOString(),
      level,
      message,
      context: this.context,
      metadata: redactMetadata(rest, this.redactKeys),
    };

    if (typeof requestId === 'string') {
      entry.requestId = requestId;
    }

    if (error) {
      entry.error = {
        name: error.name,
        message: error.message,
        stack: error.stack,
      };
    }

    return entry;
  }

  private shouldLog(level: LogLevel): boolean {
    return LogLevelValue[level] >= LogLevelValue[this.options.minLevel];
  }

  private log(entry: LogEntry): void {
    if (!this.shouldLog(entry.level)) {
      return;
    }

    try {
      this.transport.send(entry);
    } catch (err) {
      // 트랜스포트 에러는 콘솔에 직접 출력
      console.error('Failed to send log:', err);
    }
  }

  debug(message: string, metadata?: Record<string, unknown>): void {
    this.log(this.createEntry(LogLevel.DEBUG, message, metadata));
  }

  info(message: string, metadata?: Record<string, unknown>): void {
    this.log(this.createEntry(LogLevel.INFO, message, metadata));
  }

  warn(message: string, metadata?: Record<string, unknown>): void {
    this.log(this.createEntry(LogLevel.WARN, message, metadata));
  }

  error(message: string, error?: Error, metadata?: Record<string, unknown>): void {
    this.log(this.createEntry(LogLevel.ERROR, message, metadata, error));
  }

  setLevel(level: LogLevel): void {
    this.options.minLevel = level;
  }

  /**
   * 자식 로거 생성 (트랜스포트 공유)
   */
  child(context: string, metadata?: Record<string, unknown>): Logger {
    return new Logger({
      ...this.options,
      context: `${this.context}:${context}`,
      defaultMetadata: {
        ...this.defaultMetadata,
        ...metadata,
      },
      transport: this.transport,
    });
  }

  async close(): Promise<void> {
    await this.transport.close();
  }

  /**
   * 현재 설정 조회
   */
  getOptions(): LoggerOptions {
    return { ...this.options };
  }
}

/**
 * 글로벌 로거 인스턴스
 */
let globalLogger: Logger | null = null;

/**
 * 글로벌 로거 초기화
 */
export function initializeLogger(options?: Partial<LoggerOptions>): Logger {
  globalLogger = new Logger(options);
  return globalLogger;
}

/**
 * 글로벌 로거 조회
 */
export function getLogger(): Logger {
  if (!globalLogger) {
    globalLogger = new Logger();
  }
  return globalLogger;
}

/**
 * 글로벌 로거 종료
 */
export async function closeLogger(): Promise<void> {
  if (globalLogger) {
    await globalLogger.close();
    globalLogger = null;
  }
}
