/**
 * Package CLI 명령어
 * @description 복구 패키지 조회 및 생성
 */

import type { Command } from 'commander';
import * as p from '@clack/prompts';
import pc from 'picocolors';
import { RecoveryManager, loadRecoveryPackage } from '../../security/recovery.js';
import {
  addMetadataOptions,
  createCliLogger,
  failCommand,
  formatHints,
  formatVariant,
  loadAppConfig,
  parseIterationsOption,
  promptSecret,
  resolveMetadata,
  type MetadataOptions,
} from '../common.js';
import { computeEntropy } from '../../security/entropy.js';

interface CreateOptions extends MetadataOptions {
  salt: string;
  output?: string;
  iterations?: number;
}

/**
 * package show 명령어 핸들러
 */
async function handleShow(file: string): Promise<void> {
  try {
    const pkg = loadRecoveryPackage(file);
    p.log.step(pc.bold(file));
    p.log.message(
      [
        `Algorithm: ${pkg.algorithm}`,
        `Iterations: ${pkg.iterations}`,
        `Secret key: ${pkg.secretKey}`,
        ...formatHints(pkg.metadataHints),
      ].join('\n')
    );
    p.log.warn(pkg.warning);
  } catch (error) {
    failCommand(error);
  }
}

/**
 * package create 명령어 핸들러
 * 기존 salt로 세 변형을 만들고 복구 파일을 저장한다
 */
async function handleCreate(options: CreateOptions): Promise<void> {
  try {
    const config = loadAppConfig();
    const manager = new RecoveryManager({
      iterations: options.iterations ?? config.derivation.iterations,
      maxIterations: config.derivation.maxIterations,
      logger: createCliLogger(config).child('recovery'),
    });

    const baseSecret = await promptSecret('기본 비밀번호를 입력하세요:');
    const metadata = await resolveMetadata(options);
    const result = manager.createPackage(
      baseSecret,
      metadata,
      options.salt,
      options.output ?? config.recovery.defaultFile
    );

    p.log.success(`복구 파일 저장: ${pc.cyan(result.recoveryFile)}`);
    p.log.message(
      (['short', 'medium', 'long'] as const)
        .map((label) => {
          const password = result.passwords[label];
          return formatVariant({ label, password, entropy: computeEntropy(password) });
        })
        .join('\n')
    );
  } catch (error) {
    failCommand(error);
  }
}

/**
 * Commander 명령어 등록
 */
export function registerPackageCommand(program: Command): void {
  const packageCmd = program.command('package').description('Inspect or create recovery packages');

  packageCmd.command('show <file>').description('Print a recovery package').action(handleShow);

  const create = packageCmd
    .command('create')
    .description('Create a recovery package for an existing salt')
    .requiredOption('--salt <salt>', 'Salt used when the password was hardened')
    .option('-o, --output <file>', 'Output file (default from config)')
    .option('-i, --iterations <count>', 'PBKDF2 iteration count', parseIterationsOption);

  addMetadataOptions(create).action(handleCreate);
}
