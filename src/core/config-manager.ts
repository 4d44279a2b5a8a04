/**
 * 설정 파일 관리 시스템
 * YAML 설정, 환경변수 참조, 스키마 검증
 */

import { readFileSync, writeFileSync, existsSync, mkdirSync } from 'fs';
import { dirname, join, resolve } from 'path';
import { homedir } from 'os';
import { load, dump } from 'js-yaml';
import { z } from 'zod';
import type { AppConfig, ConfigValidationResult } from '../types/config.js';
import { DEFAULT_ITERATIONS, DEFAULT_MAX_ITERATIONS, DEFAULT_SALT_BYTES } from '../security/stretch.js';
import { DEFAULT_RECOVERY_FILE } from '../security/recovery.js';
import { ConfigError } from '../security/errors.js';

// 기본 설정 디렉토리
export const DEFAULT_CONFIG_DIR = join(homedir(), '.pph');
export const DEFAULT_CONFIG_PATH = join(DEFAULT_CONFIG_DIR, 'config.yaml');

// Zod 스키마 정의
const DerivationConfigSchema = z
  .object({
    iterations: z.number().int().positive().default(DEFAULT_ITERATIONS),
    maxIterations: z.number().int().positive().default(DEFAULT_MAX_ITERATIONS),
    saltBytes: z.number().int().min(DEFAULT_SALT_BYTES).max(1024).default(DEFAULT_SALT_BYTES),
  })
  .refine((value) => value.iterations <= value.maxIterations, {
    message: 'iterations must not exceed maxIterations',
    path: ['iterations'],
  });

const RecoveryConfigSchema = z.object({
  defaultFile: z.string().min(1).default(DEFAULT_RECOVERY_FILE),
  defaultVariant: z.enum(['short', 'medium', 'long']).default('medium'),
});

const GatewayConfigSchema = z.object({
  httpPort: z.number().int().min(0).max(65535).default(5000),
  host: z.string().default('127.0.0.1'),
  cors: z
    .object({
      origins: z.array(z.string()).default(['http://localhost:3000']),
    })
    .optional(),
});

const LoggingConfigSchema = z.object({
  level: z.enum(['debug', 'info', 'warn', 'error']).default('info'),
  console: z.boolean().default(true),
  file: z
    .object({
      enabled: z.boolean().default(false),
      path: z.string().default(join(DEFAULT_CONFIG_DIR, 'logs', 'pph.log')),
    })
    .optional(),
  json: z.boolean().default(false),
});

const AppConfigSchema = z.object({
  version: z.string().default('1'),
  derivation: DerivationConfigSchema.default({}),
  recovery: RecoveryConfigSchema.default({}),
  gateway: GatewayConfigSchema.default({}),
  logging: LoggingConfigSchema.default({}),
});

function formatIssues(error: z.ZodError): string[] {
  return error.errors.map((e) => `${e.path.join('.')}: ${e.message}`);
}

/**
 * 환경변수 참조를 해석합니다 (${VAR} 또는 ${VAR:default} 문법)
 */
export function resolveEnvVars(value: string): string {
  return value.replace(/\$\{([^}]+)\}/g, (match, content: string) => {
    // 기본값에는 ':'가 들어갈 수 있음 (URL 등)
    const separator = content.indexOf(':');
    const varName = separator === -1 ? content : content.slice(0, separator);
    const defaultValue = separator === -1 ? undefined : content.slice(separator + 1);
    const envValue = process.env[varName];
    return envValue !== undefined ? envValue : defaultValue || match;
  });
}

/**
 * 객체의 모든 문자열 값에서 환경변수 참조를 해석합니다
 */
function resolveEnvVarsInObject(obj: unknown): unknown {
  if (typeof obj === 'string') {
    return resolveEnvVars(obj);
  }

  if (Array.isArray(obj)) {
    return obj.map(resolveEnvVarsInObject);
  }

  if (obj !== null && typeof obj === 'object') {
    const result: Record<string, unknown> = {};
    for (const [key, value] of Object.entries(obj)) {
      result[key] = resolveEnvVarsInObject(value);
    }
    return result;
  }

  return obj;
}

/**
 * 설정 관리자 클래스
 */
export class ConfigManager {
  private config: AppConfig | null = null;
  private configPath: string;

  /**
   * @param configPath - 설정 파일 경로 (기본값: PPH_CONFIG 또는 ~/.pph/config.yaml)
   */
  constructor(configPath: string = process.env.PPH_CONFIG || DEFAULT_CONFIG_PATH) {
    this.configPath = resolve(configPath);
  }

  getConfigPath(): string {
    return this.configPath;
  }

  exists(): boolean {
    return existsSync(this.configPath);
  }

  /**
   * 설정 파일을 스키마 검증 없이 읽습니다
   * @param resolveEnv - ${VAR} 참조 해석 여부
   */
  readRaw(resolveEnv: boolean = true): unknown {
    if (!this.exists()) {
      throw new ConfigError(`Config file not found: ${this.configPath}`);
    }

    const content = readFileSync(this.configPath, 'utf-8');
    // 빈 파일은 기본값으로 취급
    const parsed: unknown = load(content) ?? {};
    return resolveEnv ? resolveEnvVarsInObject(parsed) : parsed;
  }

  /**
   * 원시 설정을 검증하고 기본값을 채웁니다
   * @throws ConfigError 검증 실패 시
   */
  parse(raw: unknown): AppConfig {
    const result = AppConfigSchema.safeParse(raw);
    if (!result.success) {
      throw new ConfigError(`Config validation failed:\n${formatIssues(result.error).join('\n')}`);
    }
    return result.data;
  }

  /**
   * 설정을 로드합니다
   * @throws ConfigError 파일이 없거나 파싱/검증 실패 시
   */
  load(): AppConfig {
    this.config = this.parse(this.readRaw());
    return this.config;
  }

  /**
   * 설정 파일이 있으면 로드하고, 없으면 기본 설정을 반환합니다 (파일은 만들지 않음)
   */
  loadOrDefault(): AppConfig {
    return this.exists() ? this.load() : this.createDefaultConfig();
  }

  /**
   * 설정을 저장합니다
   */
  save(config: AppConfig): void {
    const validated = this.parse(config);

    const configDir = dirname(this.configPath);
    if (!existsSync(configDir)) {
      mkdirSync(configDir, { recursive: true });
    }

    const yaml = dump(validated, {
      indent: 2,
      lineWidth: -1,
      noRefs: true,
      sortKeys: true,
    });

    writeFileSync(this.configPath, yaml, 'utf-8');
    this.config = validated;
  }

  /**
   * 현재 설정 (로드되지 않았으면 null)
   */
  getConfig(): AppConfig | null {
    return this.config;
  }

  validate(config: unknown): ConfigValidationResult {
    const result = AppConfigSchema.safeParse(config);

    if (result.success) {
      return { valid: true, errors: [] };
    }

    return { valid: false, errors: formatIssues(result.error) };
  }

  createDefaultConfig(): AppConfig {
    return AppConfigSchema.parse({});
  }

  /**
   * 설정 파일이 없으면 기본 설정으로 초기화합니다
   */
  initialize(): AppConfig {
    if (this.exists()) {
      return this.load();
    }

    const defaultConfig = this.createDefaultConfig();
    this.save(defaultConfig);
    return defaultConfig;
  }
}

/**
 * 전역 설정 관리자 인스턴스
 */
let globalConfigManager: ConfigManager | null = null;

/**
 * 전역 설정 관리자를 가져옵니다
 */
export function getConfigManager(): ConfigManager {
  if (!globalConfigManager) {
    globalConfigManager = new ConfigManager();
  }
  return globalConfigManager;
}

/**
 * 전역 설정 관리자를 초기화합니다 (테스트/--config 옵션용)
 */
export function resetConfigManager(configPath?: string): ConfigManager {
  globalConfigManager = new ConfigManager(configPath);
  return globalConfigManager;
}
