/**
 * 복구 패키지 모듈
 * salt + 힌트 + 파라미터만 저장하고, 기본 비밀번호 없이 패스워드 재생성을 돕는다
 */

import {
  closeSync,
  existsSync,
  fsyncSync,
  mkdirSync,
  openSync,
  readFileSync,
  renameSync,
  rmSync,
  writeFileSync,
} from 'fs';
import { dirname, resolve } from 'path';
import { randomBytes } from 'crypto';
import { z } from 'zod';
import {
  KDF_ALGORITHM,
  VARIANT_LENGTHS,
  type MetadataField,
  type MetadataSet,
  type RecoveryPackage,
  type RecoveryPackageResult,
  type VariantLabel,
} from '../types/hardener.js';
import type { ILogger } from '../logging/index.js';
import { getLogger } from '../logging/index.js';
import { InputError, MalformedRecoveryError, RecoveryNotFoundError } from './errors.js';
import { mapMetadataFields } from './metadata.js';
import { derivePassword } from './hardener.js';
import { codePointLength } from './entropy.js';
import { constantTimeEqual } from './verifier.js';
import { DEFAULT_ITERATIONS, DEFAULT_MAX_ITERATIONS, assertIterationsWithin } from './stretch.js';

export const DEFAULT_RECOVERY_FILE = 'recovery_info.json';
export const HINT_NOT_PROVIDED = 'Not provided';
export const HINT_ELLIPSIS = '...';
export const RECOVERY_WARNING = 'Keep this file secure! Store base password separately.';

// 저장 형식 (snake_case)
const hint = z.string().default(HINT_NOT_PROVIDED);

const PersistedRecoveryPackageSchema = z.object({
  secret_key: z.string().min(1),
  metadata_hints: z
    .object({
      house_name: hint,
      phone_suffix: hint,
      core_memory: hint,
      handle_name: hint,
      birthday_token: hint,
      custom: hint,
    })
    .default({}),
  iterations: z.number().int().positive(),
  algorithm: z.literal(KDF_ALGORITHM),
  warning: z.string().default(RECOVERY_WARNING),
});

export type PersistedRecoveryPackage = z.infer<typeof PersistedRecoveryPackageSchema>;

/**
 * 메타데이터 값 하나를 힌트로 바꿉니다
 * 빈 값 → "Not provided", 그 외 → 앞 최대 2글자 + "..."
 */
export function toHint(value: string | undefined): string {
  const trimmed = value?.trim() ?? '';
  if (trimmed.length === 0) {
    return HINT_NOT_PROVIDED;
  }
  return Array.from(trimmed).slice(0, 2).join('') + HINT_ELLIPSIS;
}

/**
 * 모든 필드의 힌트를 생성합니다
 */
export function createMetadataHints(metadata: MetadataSet): Record<MetadataField, string> {
  return mapMetadataFields((field) => toHint(metadata[field]));
}

/**
 * 복구 패키지를 생성합니다 (저장하지 않음)
 * @param secretKey - 하드닝에 사용한 salt
 * @param metadata - 힌트를 만들 메타데이터 (원문은 저장되지 않음)
 * @param iterations - 반복 횟수
 */
export function buildRecoveryPackage(
  secretKey: string,
  metadata: MetadataSet,
  iterations: number = DEFAULT_ITERATIONS
): RecoveryPackage {
  if (secretKey.length === 0) {
    throw new InputError('Secret key is required');
  }

  return {
    secretKey,
    metadataHints: createMetadataHints(metadata),
    iterations,
    algorithm: KDF_ALGORITHM,
    warning: RECOVERY_WARNING,
  };
}

/**
 * 복구 패키지를 저장 형식으로 변환합니다
 */
export function toPersistedRecoveryPackage(pkg: RecoveryPackage): PersistedRecoveryPackage {
  return {
    secret_key: pkg.secretKey,
    metadata_hints: pkg.metadataHints,
    iterations: pkg.iterations,
    algorithm: pkg.algorithm,
    warning: pkg.warning,
  };
}

/**
 * 저장 형식 데이터를 검증하여 복구 패키지로 변환합니다
 * @param data - JSON.parse 결과 또는 요청 본문
 * @param source - 에러 메시지용 출처
 * @throws MalformedRecoveryError 구조가 맞지 않을 때
 */
export function parseRecoveryPackage(data: unknown, source: string = '<inline>'): RecoveryPackage {
  const result = PersistedRecoveryPackageSchema.safeParse(data);

  if (!result.success) {
    const details = result.error.errors.map((e) => `${e.path.join('.')}: ${e.message}`);
    throw new MalformedRecoveryError('Invalid recovery file format!', source, details);
  }

  const parsed = result.data;
  return {
    secretKey: parsed.secret_key,
    metadataHints: parsed.metadata_hints,
    iterations: parsed.iterations,
    algorithm: parsed.algorithm,
    warning: parsed.warning,
  };
}

/**
 * JSON 문자열에서 복구 패키지를 읽습니다
 */
export function deserializeRecoveryPackage(json: string, source: string = '<inline>'): RecoveryPackage {
  let data: unknown;
  try {
    data = JSON.parse(json);
  } catch {
    throw new MalformedRecoveryError('Invalid recovery file format!', source, ['content is not valid JSON']);
  }
  return parseRecoveryPackage(data, source);
}

function isErrnoException(error: unknown): error is NodeJS.ErrnoException {
  return error instanceof Error && 'code' in error;
}

/**
 * 복구 패키지를 파일로 저장합니다
 *
 * 임시 파일에 쓰고 fsync 후 rename 하므로 중간에 중단되어도
 * 반쯤 쓰인 파일이 대상 경로에 남지 않는다.
 */
export function saveRecoveryPackage(pkg: RecoveryPackage, filePath: string = DEFAULT_RECOVERY_FILE): string {
  const target = resolve(filePath);
  const dir = dirname(target);
  if (!existsSync(dir)) {
    mkdirSync(dir, { recursive: true });
  }

  const tempPath = `${target}.${randomBytes(6).toString('hex')}.tmp`;
  const content = `${JSON.stringify(toPersistedRecoveryPackage(pkg), null, 2)}\n`;
  let fd: number | undefined;
  let committed = false;

  try {
    fd = openSync(tempPath, 'wx', 0o600);
    writeFileSync(fd, content, 'utf-8');
    fsyncSync(fd);
    closeSync(fd);
    fd = undefined;
    renameSync(tempPath, target);
    committed = true;
  } finally {
    if (fd !== undefined) {
      closeSync(fd);
    }
    if (!committed) {
      rmSync(tempPath, { force: true });
    }
  }

  return target;
}

/**
 * 파일에서 복구 패키지를 읽습니다
 * @throws RecoveryNotFoundError 파일이 없을 때
 * @throws MalformedRecoveryError JSON/구조 오류
 */
export function loadRecoveryPackage(filePath: string = DEFAULT_RECOVERY_FILE): RecoveryPackage {
  const target = resolve(filePath);
  let fd: number;

  try {
    fd = openSync(target, 'r');
  } catch (error) {
    if (isErrnoException(error) && error.code === 'ENOENT') {
      throw new RecoveryNotFoundError(`Recovery file '${filePath}' not found!`, target);
    }
    throw error;
  }

  let content: string;
  try {
    content = readFileSync(fd, 'utf-8');
  } finally {
    closeSync(fd);
  }

  return deserializeRecoveryPackage(content, target);
}

/**
 * 복구 키(salt)로 지정 길이의 패스워드를 재생성합니다
 */
export function regeneratePassword(
  baseSecret: string,
  metadata: MetadataSet,
  secretKey: string,
  length: number,
  iterations: number = DEFAULT_ITERATIONS
): string {
  return derivePassword(baseSecret, metadata, secretKey, length, iterations);
}

/**
 * 복구 키로 만든 패스워드가 기대값과 같은지 상수 시간으로 확인합니다
 */
export function verifyRecoveryCredentials(
  baseSecret: string,
  metadata: MetadataSet,
  secretKey: string,
  expectedPassword: string,
  iterations: number = DEFAULT_ITERATIONS
): boolean {
  if (expectedPassword.length === 0) {
    return false;
  }
  const regenerated = regeneratePassword(
    baseSecret,
    metadata,
    secretKey,
    codePointLength(expectedPassword),
    iterations
  );
  return constantTimeEqual(regenerated, expectedPassword);
}

/**
 * 복구 관리자 옵션
 */
export interface RecoveryManagerOptions {
  /** 새 패키지의 반복 횟수 */
  iterations?: number;
  /** 읽어온 패키지에 허용할 최대 반복 횟수 */
  maxIterations?: number;
  logger?: ILogger;
}

/**
 * 복구 패키지 생성/저장/로드/재생성 관리자
 */
export class RecoveryManager {
  private iterations: number;
  private maxIterations: number;
  private logger: ILogger;

  constructor(options: RecoveryManagerOptions = {}) {
    this.iterations = options.iterations ?? DEFAULT_ITERATIONS;
    this.maxIterations = options.maxIterations ?? DEFAULT_MAX_ITERATIONS;
    this.logger = options.logger ?? getLogger().child('recovery');
    assertIterationsWithin(this.iterations, this.maxIterations);
  }

  /**
   * 세 가지 변형을 만들고 복구 패키지를 저장합니다
   */
  createPackage(
    baseSecret: string,
    metadata: MetadataSet,
    secretKey: string,
    outputFile: string = DEFAULT_RECOVERY_FILE
  ): RecoveryPackageResult {
    const pkg = buildRecoveryPackage(secretKey, metadata, this.iterations);
    const passwords: Record<VariantLabel, string> = {
      short: this.regenerate(baseSecret, metadata, pkg, 'short'),
      medium: this.regenerate(baseSecret, metadata, pkg, 'medium'),
      long: this.regenerate(baseSecret, metadata, pkg, 'long'),
    };

    const recoveryFile = this.savePackage(pkg, outputFile);

    return {
      secretKey,
      passwords,
      metadataHints: pkg.metadataHints,
      recoveryFile,
    };
  }

  /**
   * 복구 패키지를 저장합니다
   * @returns 저장된 절대 경로
   */
  savePackage(pkg: RecoveryPackage, outputFile: string = DEFAULT_RECOVERY_FILE): string {
    const saved = saveRecoveryPackage(pkg, outputFile);
    this.logger.info('Recovery package saved', { recoveryFile: saved, iterations: pkg.iterations });
    return saved;
  }

  /**
   * 복구 패키지를 읽습니다
   */
  loadPackage(recoveryFile: string = DEFAULT_RECOVERY_FILE): RecoveryPackage {
    try {
      const pkg = loadRecoveryPackage(recoveryFile);
      this.logger.debug('Recovery package loaded', { recoveryFile, iterations: pkg.iterations });
      return pkg;
    } catch (error) {
      this.logger.warn('Failed to load recovery package', {
        recoveryFile,
        reason: error instanceof Error ? error.message : String(error),
      });
      throw error;
    }
  }

  /**
   * 패키지의 salt와 반복 횟수로 지정 변형을 재생성합니다
   */
  regenerate(baseSecret: string, metadata: MetadataSet, pkg: RecoveryPackage, variant: VariantLabel): string {
    assertIterationsWithin(pkg.iterations, this.maxIterations);
    return regeneratePassword(baseSecret, metadata, pkg.secretKey, VARIANT_LENGTHS[variant], pkg.iterations);
  }

  /**
   * 복구 파일을 읽어 패스워드를 복구합니다
   * 기본 비밀번호와 메타데이터가 생성 당시와 같으면 같은 패스워드가 나온다
   */
  recoverPassword(
    baseSecret: string,
    metadata: MetadataSet,
    recoveryFile: string = DEFAULT_RECOVERY_FILE,
    variant: VariantLabel = 'medium'
  ): string {
    const pkg = this.loadPackage(recoveryFile);
    return this.regenerate(baseSecret, metadata, pkg, variant);
  }
}
