/**
 * 로그 트랜스포트 구현
 * @description 콘솔, 파일, 메모리 로그 전송
 */

import { appendFileSync, existsSync, mkdirSync } from 'fs';
import { dirname } from 'path';
import type { LogEntry, LogTransport, LoggerOptions, LogFormatter } from './types.js';
import { LogLevel, LogOutput } from './types.js';
import { createFormatter } from './formatters.js';

/**
 * 콘솔 트랜스포트
 */
export class ConsoleTransport implements LogTransport {
  private formatter: LogFormatter;

  constructor(format: 'json' | 'pretty' = 'pretty', useColors: boolean = true) {
    this.formatter = createFormatter(format, useColors);
  }

  send(entry: LogEntry): void {
    const formatted = this.formatter.format(entry);

    switch (entry.level) {
      case LogLevel.ERROR:
        console.error(formatted);
        break;
      case LogLevel.WARN:
        console.warn(formatted);
        break;
      default:
        console.log(formatted);
    }
  }

  async close(): Promise<void> {
    // 콘솔은 별도 정리 필요 없음
  }
}

/**
 * 파일 트랜스포트 (JSON Lines)
 */
export class FileTransport implements LogTransport {
  private formatter: LogFormatter = createFormatter('json', false);

  constructor(private logFilePath: string) {
    const dir = dirname(logFilePath);
    if (!existsSync(dir)) {
      mkdirSync(dir, { recursive: true });
    }
  }

  send(entry: LogEntry): void {
    appendFileSync(this.logFilePath, `${this.formatter.format(entry)}\n`, { encoding: 'utf-8', mode: 0o600 });
  }

  async close(): Promise<void> {
    // appendFileSync가 매번 파일을 열고 닫음
  }

  getFilePath(): string {
    return this.logFilePath;
  }
}

/**
 * 복합 트랜스포트 (콘솔 + 파일)
 */
export class CompositeTransport implements LogTransport {
  private transports: LogTransport[] = [];

  constructor(options: LoggerOptions) {
    if (options.output !== LogOutput.FILE) {
      this.transports.push(new ConsoleTransport(options.consoleFormat, options.useColors));
    }
    if (options.output !== LogOutput.CONSOLE && options.logFilePath) {
      this.transports.push(new FileTransport(options.logFilePath));
    }
  }

  send(entry: LogEntry): void {
    for (const transport of this.transports) {
      transport.send(entry);
    }
  }

  async close(): Promise<void> {
    await Promise.all(this.transports.map((transport) => transport.close()));
  }

  /**
   * 구성된 트랜스포트 수 (테스트용)
   */
  size(): number {
    return this.transports.length;
  }
}

/**
 * 메모리 트랜스포트 (테스트용)
 */
export class MemoryTransport implements LogTransport {
  private logs: LogEntry[] = [];

  constructor(private maxLogs: number = 1000) {}

  send(entry: LogEntry): void {
    this.logs.push(entry);

    if (this.logs.length > this.maxLogs) {
      this.logs.shift();
    }
  }

  async close(): Promise<void> {
    this.logs = [];
  }

  getLogs(): LogEntry[] {
    return [...this.logs];
  }

  clear(): void {
    this.logs = [];
  }

  getLogsByLevel(level: LogLevel): LogEntry[] {
    return this.logs.filter((log) => log.level === level);
  }
}
