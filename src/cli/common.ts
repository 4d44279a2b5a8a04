/**
 * CLI 공통 유틸리티
 * @description 메타데이터 옵션, 프롬프트, 출력 포맷, 에러 처리
 */

import { InvalidArgumentError, type Command } from 'commander';
import * as p from '@clack/prompts';
import pc from 'picocolors';
import type { AppConfig } from '../types/config.js';
import type {
  MetadataField,
  MetadataSet,
  PasswordVariant,
  StrengthAnalysis,
  StrengthColor,
} from '../types/hardener.js';
import { METADATA_FIELDS } from '../types/hardener.js';
import { getConfigManager } from '../core/config-manager.js';
import { createLogger, LogLevel, type Logger } from '../logging/index.js';
import { HardenerError, MalformedRecoveryError } from '../security/errors.js';
import { mapMetadataFields } from '../security/metadata.js';

export type Palette = ReturnType<typeof pc.createColors>;

/**
 * 메타데이터 CLI 옵션 (commander가 camelCase로 변환)
 */
export interface MetadataOptions {
  houseName?: string;
  phoneSuffix?: string;
  coreMemory?: string;
  handleName?: string;
  birthdayToken?: string;
  custom?: string;
}

/**
 * 필드별 옵션 이름과 프롬프트 라벨
 */
const FIELD_OPTIONS: Record<MetadataField, { flag: string; key: keyof MetadataOptions; label: string }> = {
  house_name: { flag: '--house-name <value>', key: 'houseName', label: 'House name' },
  phone_suffix: { flag: '--phone-suffix <value>', key: 'phoneSuffix', label: 'Phone number suffix' },
  core_memory: { flag: '--core-memory <value>', key: 'coreMemory', label: 'Core memory' },
  handle_name: { flag: '--handle-name <value>', key: 'handleName', label: 'Handle / username' },
  birthday_token: { flag: '--birthday-token <value>', key: 'birthdayToken', label: 'Birthday token (e.g. MMDD)' },
  custom: { flag: '--custom <value>', key: 'custom', label: 'Custom value' },
};

/**
 * 메타데이터 옵션을 명령어에 추가합니다
 */
export function addMetadataOptions(command: Command): Command {
  for (const field of METADATA_FIELDS) {
    const { flag, label } = FIELD_OPTIONS[field];
    command.option(flag, label);
  }
  return command;
}

/**
 * CLI 옵션에서 메타데이터를 추출합니다
 */
export function metadataFromOptions(options: MetadataOptions): MetadataSet {
  return mapMetadataFields((field) => options[FIELD_OPTIONS[field].key]);
}

function hasAnyMetadata(metadata: MetadataSet): boolean {
  return METADATA_FIELDS.some((field) => (metadata[field] ?? '').trim().length > 0);
}

/**
 * 반복 횟수 옵션 파서
 */
export function parseIterationsOption(value: string): number {
  const parsed = Number(value);
  if (!Number.isSafeInteger(parsed) || parsed <= 0) {
    throw new InvalidArgumentError('Iterations must be a positive integer.');
  }
  return parsed;
}

/**
 * 포트 옵션 파서
 */
export function parsePortOption(value: string): number {
  const parsed = Number(value);
  if (!Number.isInteger(parsed) || parsed < 0 || parsed > 65535) {
    throw new InvalidArgumentError('Port must be between 0 and 65535.');
  }
  return parsed;
}

/**
 * 취소 시 종료
 */
function exitOnCancel<T>(value: T | symbol): T {
  if (p.isCancel(value)) {
    p.cancel('작업이 취소되었습니다.');
    process.exit(0);
  }
  return value;
}

/**
 * 비밀번호를 입력받습니다 (빈 값 불가)
 */
export async function promptSecret(message: string): Promise<string> {
  const value = await p.password({
    message,
    validate: (input) => (input.length === 0 ? '비밀번호를 입력하세요.' : undefined),
  });
  return exitOnCancel(value);
}

/**
 * 옵션으로 메타데이터가 하나도 주어지지 않았으면 대화형으로 입력받습니다
 */
export async function resolveMetadata(options: MetadataOptions): Promise<MetadataSet> {
  const fromOptions = metadataFromOptions(options);
  if (hasAnyMetadata(fromOptions)) {
    return fromOptions;
  }

  p.log.info(pc.dim('개인 메타데이터를 입력하세요 (비워두면 건너뜀). 복구 시 같은 값을 입력해야 합니다.'));

  const metadata: MetadataSet = {};
  for (const field of METADATA_FIELDS) {
    const value = exitOnCancel(
      await p.text({
        message: FIELD_OPTIONS[field].label,
        placeholder: '(optional)',
        defaultValue: '',
      })
    );
    metadata[field] = value;
  }
  return metadata;
}

/**
 * 설정 파일을 로드합니다 (없으면 기본값)
 */
export function loadAppConfig(): AppConfig {
  return getConfigManager().loadOrDefault();
}

/**
 * 설정 기반 CLI 로거
 */
export function createCliLogger(config: AppConfig): Logger {
  const logger = createLogger(config.logging);
  if (process.env.LOG_LEVEL === LogLevel.DEBUG) {
    logger.setLevel(LogLevel.DEBUG);
  }
  return logger;
}

const strengthColors: Record<StrengthColor, (palette: Palette) => (text: string) => string> = {
  red: (c) => c.red,
  orange: (c) => c.yellow,
  yellow: (c) => c.yellow,
  lightgreen: (c) => c.green,
  green: (c) => (text) => c.bold(c.green(text)),
};

/**
 * 강도 분석 결과를 출력용 줄로 변환합니다
 */
export function formatAnalysis(analysis: StrengthAnalysis, palette: Palette = pc): string[] {
  const color = strengthColors[analysis.color](palette);
  const classes = [
    analysis.hasLowercase ? 'lower' : null,
    analysis.hasUppercase ? 'upper' : null,
    analysis.hasDigits ? 'digits' : null,
    analysis.hasSymbols ? 'symbols' : null,
  ].filter((value): value is string => value !== null);

  return [
    `Length: ${analysis.length}`,
    `Character classes: ${classes.length > 0 ? classes.join(', ') : 'none'}`,
    `Entropy: ${analysis.entropy} bits`,
    `Strength: ${color(analysis.strength)}`,
    `Crack time: ${analysis.crackTime.display}`,
  ];
}

/**
 * 패스워드 변형을 출력용 줄로 변환합니다
 */
export function formatVariant(variant: PasswordVariant, palette: Palette = pc): string {
  const label = variant.label.padEnd(6);
  return `${palette.cyan(label)} ${palette.bold(variant.password)} ${palette.dim(`(${variant.entropy} bits)`)}`;
}

/**
 * 메타데이터 힌트를 출력용 줄로 변환합니다
 */
export function formatHints(hints: Record<MetadataField, string>, palette: Palette = pc): string[] {
  return METADATA_FIELDS.map((field) => `${palette.dim(field)}: ${hints[field]}`);
}

/**
 * 명령어 실패를 출력하고 종료합니다
 */
export function failCommand(error: unknown): never {
  if (error instanceof MalformedRecoveryError) {
    p.log.error(`${error.message} (${error.path})`);
    for (const detail of error.details) {
      p.log.error(`  • ${detail}`);
    }
  } else if (error instanceof HardenerError) {
    p.log.error(error.message);
  } else {
    p.log.error(`오류: ${error instanceof Error ? error.message : String(error)}`);
  }
  process.exit(1);
}
