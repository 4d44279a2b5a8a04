/**
 * 로거 설정 관리
 * @description 환경별 로그 설정 및 기본값 제공
 */

import { homedir } from 'os';
import { join } from 'path';
import type { LoggerOptions, EnvironmentLogConfig } from './types.js';
import { LogLevel, LogOutput } from './types.js';

export const DEFAULT_LOG_DIR = join(homedir(), '.pph', 'logs');

export const DEFAULT_LOG_FILENAME = 'pph.log';

/**
 * 환경별 기본 설정
 */
export const defaultConfigs: EnvironmentLogConfig = {
  development: {
    minLevel: LogLevel.DEBUG,
    output: LogOutput.CONSOLE,
    consoleFormat: 'pretty',
    useColors: true,
    context: 'pph',
  },
  production: {
    minLevel: LogLevel.INFO,
    output: LogOutput.BOTH,
    logFilePath: join(DEFAULT_LOG_DIR, DEFAULT_LOG_FILENAME),
    consoleFormat: 'json',
    useColors: false,
    context: 'pph',
  },
  test: {
    minLevel: LogLevel.ERROR,
    output: LogOutput.CONSOLE,
    consoleFormat: 'json',
    useColors: false,
    context: 'test',
  },
};

/**
 * 현재 환경 감지
 */
export function detectEnvironment(): 'development' | 'production' | 'test' {
  if (process.env.NODE_ENV === 'test' || process.env.VITEST) {
    return 'test';
  }
  if (process.env.NODE_ENV === 'production') {
    return 'production';
  }
  return 'development';
}

/**
 * 환경별 기본 설정 조회
 */
export function getDefaultConfig(
  env: 'development' | 'production' | 'test' = detectEnvironment()
): LoggerOptions {
  return { ...defaultConfigs[env] };
}

/**
 * 설정 병합 (사용자 설정 + 기본값)
 */
export function mergeConfig(userConfig: Partial<LoggerOptions>): LoggerOptions {
  const defaultConfig = getDefaultConfig();

  return {
    ...defaultConfig,
    ...userConfig,
    defaultMetadata: {
      ...defaultConfig.defaultMetadata,
      ...userConfig.defaultMetadata,
    },
  };
}

function parseLogLevel(value: string): LogLevel | undefined {
  return Object.values(LogLevel).find((level) => level === value.toLowerCase());
}

function parseLogOutput(value: string): LogOutput | undefined {
  return Object.values(LogOutput).find((output) => output === value.toLowerCase());
}

/**
 * 환경 변수에서 설정 로드
 */
export function loadConfigFromEnv(): Partial<LoggerOptions> {
  const config: Partial<LoggerOptions> = {};

  if (process.env.LOG_LEVEL) {
    const level = parseLogLevel(process.env.LOG_LEVEL);
    if (level) {
      config.minLevel = level;
    }
  }

  if (process.env.LOG_OUTPUT) {
    const output = parseLogOutput(process.env.LOG_OUTPUT);
    if (output) {
      config.output = output;
    }
  }

  if (process.env.LOG_FILE_PATH) {
    config.logFilePath = process.env.LOG_FILE_PATH;
  }

  if (process.env.LOG_FORMAT) {
    const format = process.env.LOG_FORMAT.toLowerCase();
    if (format === 'json' || format === 'pretty') {
      config.consoleFormat = format;
    }
  }

  // NO_COLOR 규약 우선
  if (process.env.NO_COLOR) {
    config.useColors = false;
  } else if (process.env.LOG_COLORS) {
    config.useColors = process.env.LOG_COLORS === 'true';
  }

  if (process.env.LOG_CONTEXT) {
    config.context = process.env.LOG_CONTEXT;
  }

  return config;
}

/**
 * 전체 설정 로드 (환경 변수 + 기본값 + 사용자 설정)
 */
export function loadConfig(userConfig?: Partial<LoggerOptions>): LoggerOptions {
  const envConfig = loadConfigFromEnv();
  return mergeConfig({ ...envConfig, ...userConfig });
}
