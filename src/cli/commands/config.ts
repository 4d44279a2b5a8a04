/**
 * Config CLI 명령어
 * @description 설정 관리 명령어 구현
 */

import type { Command } from 'commander';
import * as p from '@clack/prompts';
import pc from 'picocolors';
import { getConfigManager, resolveEnvVars } from '../../core/config-manager.js';
import { failCommand } from '../common.js';

type ConfigTree = Record<string, unknown>;

function isTree(value: unknown): value is ConfigTree {
  return value !== null && typeof value === 'object' && !Array.isArray(value);
}

/**
 * 설정 객체를 수정 가능한 트리로 복제합니다
 */
function cloneTree(value: unknown): ConfigTree {
  const copy: unknown = JSON.parse(JSON.stringify(value));
  if (!isTree(copy)) {
    throw new Error('Configuration root must be a mapping');
  }
  return copy;
}

/**
 * 설정값을 문자열로 변환합니다
 */
export function formatValue(value: unknown): string {
  if (value === null) return 'null';
  if (value === undefined) return 'undefined';
  if (typeof value === 'object') return JSON.stringify(value, null, 2);
  return String(value);
}

/**
 * 객체에서 중첩된 값을 가져옵니다
 */
export function getNestedValue(obj: ConfigTree, path: string): unknown {
  let current: unknown = obj;

  for (const key of path.split('.')) {
    if (!isTree(current)) {
      return undefined;
    }
    current = current[key];
  }

  return current;
}

/**
 * 객체에 중첩된 값을 설정합니다 (중간 경로는 생성)
 */
export function setNestedValue(obj: ConfigTree, path: string, value: string): void {
  const keys = path.split('.');
  const finalKey = keys.pop();
  if (finalKey === undefined || finalKey.length === 0) {
    throw new Error(`Invalid config key: ${path}`);
  }

  let current = obj;
  for (const key of keys) {
    const next = current[key];
    if (isTree(next)) {
      current = next;
    } else {
      const created: ConfigTree = {};
      current[key] = created;
      current = created;
    }
  }

  current[finalKey] = parseValue(value);
}

/**
 * 문자열 값을 적절한 타입으로 파싱합니다
 */
export function parseValue(value: string): unknown {
  const lower = value.toLowerCase();
  if (lower === 'true') return true;
  if (lower === 'false') return false;
  if (lower === 'null') return null;

  if (/^-?\d+$/.test(value)) return parseInt(value, 10);
  if (/^-?\d+\.\d+$/.test(value)) return parseFloat(value);

  if ((value.startsWith('{') && value.endsWith('}')) || (value.startsWith('[') && value.endsWith(']'))) {
    try {
      const parsed: unknown = JSON.parse(value);
      return parsed;
    } catch {
      return value;
    }
  }

  return value;
}

/**
 * 설정에서 모든 환경변수 참조를 찾습니다
 */
export function findEnvVarReferences(
  obj: unknown,
  path = ''
): Array<{ path: string; value: string; resolved: string }> {
  const results: Array<{ path: string; value: string; resolved: string }> = [];

  if (typeof obj === 'string' && obj.includes('${')) {
    results.push({ path: path || 'root', value: obj, resolved: resolveEnvVars(obj) });
  } else if (Array.isArray(obj)) {
    obj.forEach((item, i) => results.push(...findEnvVarReferences(item, `${path}[${i}]`)));
  } else if (isTree(obj)) {
    for (const [key, value] of Object.entries(obj)) {
      results.push(...findEnvVarReferences(value, path ? `${path}.${key}` : key));
    }
  }

  return results;
}

/**
 * 설정 파일이 없으면 안내 후 종료합니다
 */
function requireConfigFile(): ReturnType<typeof getConfigManager> {
  const configManager = getConfigManager();
  if (!configManager.exists()) {
    p.log.error(`설정 파일을 찾을 수 없습니다: ${configManager.getConfigPath()}`);
    p.log.info('`pph config init`으로 기본 설정을 만드세요.');
    process.exit(1);
  }
  return configManager;
}

/**
 * config init 명령어 핸들러
 */
async function handleConfigInit(): Promise<void> {
  try {
    const configManager = getConfigManager();
    const existed = configManager.exists();
    configManager.initialize();
    if (existed) {
      p.log.info(`설정 파일이 이미 있습니다: ${pc.cyan(configManager.getConfigPath())}`);
    } else {
      p.log.success(`기본 설정을 생성했습니다: ${pc.cyan(configManager.getConfigPath())}`);
    }
  } catch (error) {
    failCommand(error);
  }
}

/**
 * config get 명령어 핸들러
 */
async function handleConfigGet(key?: string): Promise<void> {
  try {
    const configManager = getConfigManager();
    const config = cloneTree(configManager.loadOrDefault());

    if (!key) {
      p.log.success(pc.cyan(`전체 설정 (${configManager.getConfigPath()}):`));
      p.log.message(formatValue(config));
      return;
    }

    const value = getNestedValue(config, key);
    if (value === undefined) {
      p.log.error(`설정 키를 찾을 수 없습니다: ${key}`);
      process.exit(1);
    }
    p.log.info(`${pc.cyan(key)}: ${pc.yellow(formatValue(value))}`);
  } catch (error) {
    failCommand(error);
  }
}

/**
 * config set 명령어 핸들러
 */
async function handleConfigSet(key: string, value: string): Promise<void> {
  try {
    const configManager = getConfigManager();
    const current = cloneTree(configManager.loadOrDefault());
    setNestedValue(current, key, value);

    const result = configManager.validate(current);
    if (!result.valid) {
      p.log.error(pc.red('✗ 잘못된 설정값입니다:'));
      for (const issue of result.errors) {
        p.log.error(`  • ${issue}`);
      }
      process.exit(1);
    }

    // validate 통과 후 스키마 기본값까지 채운 형태로 저장
    configManager.save(configManager.parse(current));
    p.log.success(`${pc.cyan(key)} = ${pc.yellow(formatValue(getNestedValue(current, key)))}`);
  } catch (error) {
    failCommand(error);
  }
}

/**
 * config validate 명령어 핸들러
 */
async function handleConfigValidate(): Promise<void> {
  try {
    const configManager = requireConfigFile();
    const raw = configManager.readRaw();
    const result = configManager.validate(raw);

    if (!result.valid) {
      p.log.error(pc.red('✗ 설정에 오류가 있습니다:'));
      for (const issue of result.errors) {
        p.log.error(`  • ${issue}`);
      }
      process.exit(1);
    }
    p.log.success(pc.green('✓ 설정이 유효합니다.'));

    const envVars = findEnvVarReferences(configManager.readRaw(false));
    if (envVars.length > 0) {
      p.log.info(pc.cyan('환경변수 참조:'));
      for (const { path, value, resolved } of envVars) {
        const status = resolved !== value ? pc.green('✓') : pc.red('✗ (미설정)');
        p.log.info(`  ${status} ${pc.dim(path)}: ${pc.yellow(value)}`);
      }
    }
  } catch (error) {
    failCommand(error);
  }
}

/**
 * Commander 명령어 등록
 */
export function registerConfigCommand(program: Command): void {
  const configCmd = program.command('config').description('Manage configuration settings');

  configCmd.command('init').description('Create the default configuration file').action(handleConfigInit);

  configCmd.command('get [key]').description('Get configuration value').action(handleConfigGet);

  configCmd.command('set <key> <value>').description('Set configuration value').action(handleConfigSet);

  configCmd.command('validate').description('Validate configuration file').action(handleConfigValidate);
}
