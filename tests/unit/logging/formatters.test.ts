import { describe, it, expect } from 'vitest';
import {
  JsonFormatter,
  PrettyFormatter,
  createFormatter,
} from '../../../src/logging/formatters.js';
import { Logger } from '../../../src/logging/logger.js';
import { MemoryTransport } from '../../../src/logging/transports.js';
import { LogLevel, LogOutput } from '../../../src/logging/types.js';
import type { LogEntry } from '../../../src/logging/types.js';

/**
 * 로거를 거친 엔트리 하나를 캡처합니다 (마스킹/requestId 분리가 적용된 상태)
 */
function capture(write: (logger: Logger) => void): LogEntry {
  const transport = new MemoryTransport();
  const logger = new Logger({
    minLevel: LogLevel.DEBUG,
    output: LogOutput.CONSOLE,
    context: 'pph:gateway',
    transport,
  });
  write(logger);

  const [entry] = transport.getLogs();
  return entry;
}

describe('Formatters', () => {
  describe('JsonFormatter', () => {
    it('should serialize secrets as redacted', () => {
      const entry = capture((logger) =>
        logger.info('Password hardened', { baseSecret: 'test-secret', salt: '00ff', iterations: 1000 })
      );

      const result = new JsonFormatter().format(entry);
      const parsed = JSON.parse(result);

      expect(parsed.context).toBe('pph:gateway');
      expect(parsed.metadata).toEqual({ baseSecret: '[REDACTED]', salt: '[REDACTED]', iterations: 1000 });
      expect(result.includes('test-secret')).toBe(false);
    });

    it('should redact nested secret keys and keep the rest', () => {
      const entry = capture((logger) =>
        logger.debug('Recover request', { request: { password: 'test-secret', variant: 'long' } })
      );

      const parsed = JSON.parse(new JsonFormatter().format(entry));

      expect(parsed.metadata).toEqual({ request: { password: '[REDACTED]', variant: 'long' } });
    });

    it('should hoist requestId to the top level', () => {
      const entry = capture((logger) => logger.info('Verification completed', { requestId: 'req-1', valid: true }));

      const parsed = JSON.parse(new JsonFormatter().format(entry));

      expect(parsed.requestId).toBe('req-1');
      expect(parsed.metadata).toEqual({ valid: true });
    });

    it('should include error details', () => {
      const entry = capture((logger) => logger.error('Request error', new TypeError('bad state')));

      const parsed = JSON.parse(new JsonFormatter().format(entry));

      expect(parsed.level).toBe('error');
      expect(parsed.error.name).toBe('TypeError');
      expect(parsed.error.message).toBe('bad state');
    });
  });

  describe('PrettyFormatter', () => {
    it('should print level, context, request id and redacted metadata', () => {
      const entry = capture((logger) =>
        logger.info('Password recovered', { requestId: 'req-1', variant: 'medium', secretKey: '00ff' })
      );

      const lines = new PrettyFormatter(false).format(entry).split('\n');

      expect(lines).toHaveLength(2);
      expect(lines[0]).toMatch(/^\d{2}:\d{2}:\d{2}\.\d{3} INFO  \[pph:gateway\] \(req-1\) Password recovered$/);
      expect(lines[1]).toBe('  meta: variant="medium" secretKey="[REDACTED]"');
    });

    it('should carry a child logger request id and context', () => {
      const entry = capture((logger) => logger.child('recover', { requestId: 'req-2' }).warn('Request rejected'));

      const result = new PrettyFormatter(false).format(entry);

      expect(result).toMatch(/ WARN  \[pph:gateway:recover\] \(req-2\) Request rejected$/);
    });

    it('should limit the stack trace to five lines', () => {
      const stackLines = Array.from({ length: 10 }, (_, i) => `    at line ${i}`).join('\n');
      const entry: LogEntry = {
        timestamp: '2026-01-15T10:30:00.000Z',
        level: LogLevel.ERROR,
        message: 'Request error',
        error: { name: 'Error', message: 'boom', stack: `Error: boom\n${stackLines}` },
      };

      const lines = new PrettyFormatter(false).format(entry).split('\n');

      expect(lines[1]).toBe('  error: Error: boom');
      expect(lines[2]).toBe('    at line 0');
      expect(lines[6]).toBe('    at line 4');
      expect(lines[7]).toBe('    ... 5 more lines');
    });

    it('should emit ANSI codes only when colors are enabled', () => {
      const entry = capture((logger) => logger.info('Gateway started'));

      expect(new PrettyFormatter(true).format(entry)).toContain('\x1b[');
      expect(new PrettyFormatter(false).format(entry)).not.toContain('\x1b[');
    });
  });

  describe('createFormatter', () => {
    it('should create formatters by type', () => {
      expect(createFormatter('json')).toBeInstanceOf(JsonFormatter);
      expect(createFormatter('pretty')).toBeInstanceOf(PrettyFormatter);
    });
  });
});
