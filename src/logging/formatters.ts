/**
 * 로그 포맷터 구현
 * @description JSON 및 Pretty 포맷팅 지원
 */

import pc from 'picocolors';
import type { LogEntry, LogFormatter } from './types.js';
import { LogLevel } from './types.js';

type Palette = ReturnType<typeof pc.createColors>;

/**
 * 로그 레벨별 색상
 */
function levelColor(palette: Palette, level: LogLevel): (text: string) => string {
  switch (level) {
    case LogLevel.DEBUG:
      return palette.gray;
    case LogLevel.INFO:
      return palette.cyan;
    case LogLevel.WARN:
      return palette.yellow;
    case LogLevel.ERROR:
      return palette.red;
  }
}

/**
 * JSON 포맷터
 */
export class JsonFormatter implements LogFormatter {
  format(entry: LogEntry): string {
    return JSON.stringify(entry);
  }
}

/**
 * Pretty 포맷터
 * 사람이 읽기 쉬운 형태로 변환
 */
export class PrettyFormatter implements LogFormatter {
  private palette: Palette;

  constructor(useColors: boolean = true) {
    this.palette = pc.createColors(useColors);
  }

  format(entry: LogEntry): string {
    const { timestamp, level, message, context, metadata, error, requestId } = entry;
    const c = this.palette;

    const ts = c.dim(this.formatTimestamp(timestamp));
    const levelStr = levelColor(c, level)(level.toUpperCase().padEnd(5));
    const contextStr = context ? c.magenta(`[${context}]`) : '';
    const traceStr = requestId ? c.dim(`(${requestId})`) : '';

    let output = [ts, levelStr, contextStr, traceStr, message].filter(Boolean).join(' ');

    if (metadata && Object.keys(metadata).length > 0) {
      const metaStr = Object.entries(metadata)
        .map(([key, value]) => `${key}=${this.formatValue(value)}`)
        .join(' ');
      output += `\n  ${c.dim('meta:')} ${metaStr}`;
    }

    if (error) {
      output += `\n  ${c.red('error:')} ${error.name}: ${error.message}`;
      if (error.stack) {
        const stackLines = error.stack.split('\n').slice(1);
        output += stackLines
          .slice(0, 5)
          .map((line) => `\n    ${c.gray(line.trim())}`)
          .join('');
        if (stackLines.length > 5) {
          output += `\n    ${c.gray(`... ${stackLines.length - 5} more lines`)}`;
        }
      }
    }

    return output;
  }

  /**
   * HH:mm:ss.SSS
   */
  private formatTimestamp(timestamp: string): string {
    const date = new Date(timestamp);
    const hh = date.getHours().toString().padStart(2, '0');
    const mm = date.getMinutes().toString().padStart(2, '0');
    const ss = date.getSeconds().toString().padStart(2, '0');
    const ms = date.getMilliseconds().toString().padStart(3, '0');
    return `${hh}:${mm}:${ss}.${ms}`;
  }

  private formatValue(value: unknown): string {
    if (value === null) return 'null';
    if (value === undefined) return 'undefined';
    if (typeof value === 'string') return `"${value}"`;
    if (typeof value === 'number' || typeof value === 'boolean') return value.toString();
    if (value instanceof Date) return value.toISOString();
    if (Array.isArray(value)) return `[${value.length} items]`;
    if (typeof value === 'object') return `{${Object.keys(value).length} keys}`;
    return String(value);
  }
}

/**
 * 포맷터 팩토리
 */
export function createFormatter(type: 'json' | 'pretty', useColors: boolean = true): LogFormatter {
  return type === 'pretty' ? new PrettyFormatter(useColors) : new JsonFormatter();
}
