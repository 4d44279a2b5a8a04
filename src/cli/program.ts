/**
 * CLI 프로그램 구성
 * @description Commander 프로그램 생성과 명령어 등록
 */

import { Command } from 'commander';
import { readFileSync } from 'fs';
import { join, dirname } from 'path';
import { fileURLToPath } from 'url';
import { resetConfigManager } from '../core/config-manager.js';

import { registerHardenCommand } from './commands/harden.js';
import { registerAnalyzeCommand } from './commands/analyze.js';
import { registerVerifyCommand } from './commands/verify.js';
import { registerRecoverCommand } from './commands/recover.js';
import { registerPackageCommand } from './commands/package.js';
import { registerGatewayCommand } from './commands/gateway.js';
import { registerConfigCommand } from './commands/config.js';

// 현재 파일의 디렉토리 경로 (ESM 환경)
const __dirname = dirname(fileURLToPath(import.meta.url));

function readVersion(pkgPath: string): string | null {
  try {
    const pkg: unknown = JSON.parse(readFileSync(pkgPath, 'utf-8'));
    if (pkg !== null && typeof pkg === 'object' && 'version' in pkg && typeof pkg.version === 'string') {
      return pkg.version;
    }
  } catch {
    // 다음 후보 경로로
  }
  return null;
}

/**
 * package.json에서 버전 정보를 읽어옵니다
 */
export function getVersion(): string {
  // src/cli 와 dist/cli 양쪽에서 동작
  const possiblePaths = [join(__dirname, '../../package.json'), join(__dirname, '../package.json')];

  for (const pkgPath of possiblePaths) {
    const version = readVersion(pkgPath);
    if (version) {
      return version;
    }
  }
  return '0.0.0';
}

interface GlobalOptions {
  verbose?: boolean;
  config?: string;
  color?: boolean;
}

/**
 * 메인 CLI 프로그램 생성
 */
export function createProgram(): Command {
  const program = new Command();

  program
    .name('pph')
    .description('Personal Password Hardener: deterministic passwords from a base secret and personal metadata')
    .version(getVersion(), '-v, --version', '버전 정보를 출력합니다')
    .helpOption('-h, --help', '도움말을 출력합니다')
    .usage('[command] [options]');

  // 글로벌 옵션
  program
    .option('--verbose', '상세 로그 출력', false)
    .option('--config <path>', '설정 파일 경로 지정')
    .option('--no-color', '컬러 출력 비활성화');

  program.hook('preAction', (thisCommand) => {
    const opts = thisCommand.opts<GlobalOptions>();

    if (opts.verbose) {
      process.env.LOG_LEVEL = 'debug';
    }

    // picocolors는 argv의 --no-color를 직접 읽고, 로거는 NO_COLOR를 읽는다
    if (opts.color === false) {
      process.env.NO_COLOR = '1';
    }

    if (opts.config) {
      process.env.PPH_CONFIG = opts.config;
      resetConfigManager(opts.config);
    }
  });

  registerCommands(program);
  return program;
}

/**
 * 모든 명령어 등록
 */
function registerCommands(program: Command): void {
  registerHardenCommand(program);
  registerAnalyzeCommand(program);
  registerVerifyCommand(program);
  registerRecoverCommand(program);
  registerPackageCommand(program);
  registerGatewayCommand(program);
  registerConfigCommand(program);
}
