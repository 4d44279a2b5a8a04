import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import { Logger, initializeLogger, getLogger, closeLogger } from '../../../src/logging/logger.js';
import { LogLevel, LogOutput } from '../../../src/logging/types.js';
import type { LogTransport } from '../../../src/logging/types.js';
import { MemoryTransport } from '../../../src/logging/transports.js';
import { createLogger, toLoggerOptions } from '../../../src/logging/index.js';

describe('Logger', () => {
  let logger: Logger;
  let memoryTransport: MemoryTransport;

  beforeEach(() => {
    memoryTransport = new MemoryTransport();
    logger = new Logger({
      minLevel: LogLevel.DEBUG,
      output: LogOutput.CONSOLE,
      context: 'test',
      transport: memoryTransport,
    });
  });

  afterEach(async () => {
    await logger.close();
    vi.restoreAllMocks();
  });

  describe('로그 레벨', () => {
    it('DEBUG 레벨 로그를 출력해야 함', () => {
      logger.debug('debug message');
      const logs = memoryTransport.getLogs();
      expect(logs).toHaveLength(1);
      expect(logs[0].level).toBe(LogLevel.DEBUG);
      expect(logs[0].message).toBe('debug message');
    });

    it('ERROR 레벨 로그에 에러 정보를 포함해야 함', () => {
      logger.error('error message', new Error('test error'));
      const logs = memoryTransport.getLogs();
      expect(logs).toHaveLength(1);
      expect(logs[0].level).toBe(LogLevel.ERROR);
      expect(logs[0].error?.message).toBe('test error');
    });

    it('설정된 최소 레벨 이상만 출력해야 함', () => {
      logger.setLevel(LogLevel.WARN);

      logger.debug('debug');
      logger.info('info');
      logger.warn('warn');
      logger.error('error');

      const logs = memoryTransport.getLogs();
      expect(logs.map((log) => log.level)).toEqual([LogLevel.WARN, LogLevel.ERROR]);
    });
  });

  describe('메타데이터', () => {
    it('메타데이터를 포함하여 로그를 출력해야 함', () => {
      logger.info('message', { iterations: 1000, variant: 'medium' });
      expect(memoryTransport.getLogs()[0].metadata).toEqual({ iterations: 1000, variant: 'medium' });
    });

    it('기본 메타데이터와 함께 로그를 출력해야 함', () => {
      const withDefaults = new Logger({
        minLevel: LogLevel.DEBUG,
        output: LogOutput.CONSOLE,
        defaultMetadata: { component: 'gateway' },
        transport: memoryTransport,
      });

      withDefaults.info('message', { valid: true });
      expect(memoryTransport.getLogs()[0].metadata).toEqual({ component: 'gateway', valid: true });
    });

    it('requestId는 엔트리 필드로 옮겨야 함', () => {
      logger.info('message', { requestId: 'req-1', valid: false });
      const [entry] = memoryTransport.getLogs();
      expect(entry.requestId).toBe('req-1');
      expect(entry.metadata).toEqual({ valid: false });
    });
  });

  describe('민감 정보 마스킹', () => {
    it('기본 비밀번호, salt, 키를 마스킹해야 함', () => {
      logger.info('derive', {
        baseSecret: 'test-secret',
        salt: 'test-salt',
        hardenedFull: 'abcd',
        iterations: 1000,
      });

      expect(memoryTransport.getLogs()[0].metadata).toEqual({
        baseSecret: '[REDACTED]',
        salt: '[REDACTED]',
        hardenedFull: '[REDACTED]',
        iterations: 1000,
      });
    });

    it('중첩 객체와 대소문자에 상관없이 마스킹해야 함', () => {
      logger.info('nested', { request: { PASSWORD: 'test-secret', variant: 'long' } });

      expect(memoryTransport.getLogs()[0].metadata).toEqual({
        request: { PASSWORD: '[REDACTED]', variant: 'long' },
      });
    });

    it('추가 마스킹 키를 지원해야 함', () => {
      const custom = new Logger({
        minLevel: LogLevel.DEBUG,
        output: LogOutput.CONSOLE,
        redactKeys: ['Token'],
        transport: memoryTransport,
      });

      custom.info('message', { token: 'test-token' });
      expect(memoryTransport.getLogs()[0].metadata).toEqual({ token: '[REDACTED]' });
    });
  });

  describe('컨텍스트', () => {
    it('컨텍스트를 포함하여 로그를 출력해야 함', () => {
      logger.info('message');
      expect(memoryTransport.getLogs()[0].context).toBe('test');
    });

    it('자식 로거는 부모 컨텍스트와 트랜스포트를 상속해야 함', () => {
      const childLogger = logger.child('recovery', { extra: 'data' });

      childLogger.info('child message');
      const logs = memoryTransport.getLogs();
      expect(logs[0].context).toBe('test:recovery');
      expect(logs[0].metadata).toEqual({ extra: 'data' });
    });
  });

  describe('타임스탬프', () => {
    it('ISO 8601 형식의 타임스탬프를 포함해야 함', () => {
      logger.info('message');
      const timestamp = memoryTransport.getLogs()[0].timestamp;
      expect(new Date(timestamp).toISOString()).toBe(timestamp);
    });
  });

  describe('글로벌 로거', () => {
    afterEach(async () => {
      await closeLogger();
    });

    it('initializeLogger로 글로벌 로거를 초기화해야 함', () => {
      const globalLogger = initializeLogger({ minLevel: LogLevel.INFO, output: LogOutput.CONSOLE });
      expect(getLogger()).toBe(globalLogger);
    });

    it('closeLogger 후에는 새 로거를 반환해야 함', async () => {
      const first = initializeLogger({ minLevel: LogLevel.INFO, output: LogOutput.CONSOLE });
      await closeLogger();
      expect(getLogger()).not.toBe(first);
    });
  });

  describe('에러 처리', () => {
    it('트랜스포트 에러가 발생해도 콘솔에 출력해야 함', () => {
      const consoleSpy = vi.spyOn(console, 'error').mockImplementation(() => {});
      const errorTransport: LogTransport = {
        send: () => {
          throw new Error('Transport error');
        },
        close: async () => {},
      };
      const failing = new Logger({ minLevel: LogLevel.DEBUG, output: LogOutput.CONSOLE, transport: errorTransport });

      failing.info('message');

      expect(consoleSpy).toHaveBeenCalledWith('Failed to send log:', expect.any(Error));
    });
  });

  describe('설정 조회', () => {
    it('현재 설정을 조회할 수 있어야 함', () => {
      const options = logger.getOptions();
      expect(options.minLevel).toBe(LogLevel.DEBUG);
      expect(options.context).toBe('test');
    });
  });
});

describe('toLoggerOptions', () => {
  it('콘솔 전용 설정을 변환해야 함', () => {
    expect(toLoggerOptions({ level: 'warn', console: true, json: true })).toEqual({
      minLevel: LogLevel.WARN,
      output: LogOutput.CONSOLE,
      consoleFormat: 'json',
      logFilePath: undefined,
    });
  });

  it('콘솔과 파일을 함께 쓰는 설정을 변환해야 함', () => {
    const options = toLoggerOptions({
      level: 'debug',
      console: true,
      json: false,
      file: { enabled: true, path: '/tmp/pph-test.log' },
    });

    expect(options.output).toBe(LogOutput.BOTH);
    expect(options.consoleFormat).toBe('pretty');
    expect(options.logFilePath).toBe('/tmp/pph-test.log');
  });

  it('createLogger는 설정 레벨을 적용해야 함', () => {
    const created = createLogger({ level: 'error', console: true, json: false });
    expect(created.getOptions().minLevel).toBe(LogLevel.ERROR);
  });
});
