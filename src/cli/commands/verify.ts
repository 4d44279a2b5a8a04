/**
 * Verify CLI 명령어
 * @description 기본 비밀번호 + 메타데이터 + salt가 저장값을 재현하는지 확인
 */

import type { Command } from 'commander';
import * as p from '@clack/prompts';
import pc from 'picocolors';
import { verifyPassword } from '../../security/verifier.js';
import { assertIterationsWithin } from '../../security/stretch.js';
import {
  addMetadataOptions,
  createCliLogger,
  failCommand,
  loadAppConfig,
  parseIterationsOption,
  promptSecret,
  resolveMetadata,
  type MetadataOptions,
} from '../common.js';

interface VerifyOptions extends MetadataOptions {
  salt: string;
  stored?: string;
  iterations?: number;
}

/**
 * verify 명령어 핸들러
 */
async function handleVerify(options: VerifyOptions): Promise<void> {
  try {
    const config = loadAppConfig();
    const logger = createCliLogger(config).child('verify');
    const iterations = options.iterations ?? config.derivation.iterations;
    assertIterationsWithin(iterations, config.derivation.maxIterations);

    const baseSecret = await promptSecret('기본 비밀번호를 입력하세요:');
    const metadata = await resolveMetadata(options);
    const stored = options.stored ?? (await promptSecret('저장된 패스워드(또는 64자 hex 키)를 입력하세요:'));

    const valid = verifyPassword({ baseSecret, metadata, salt: options.salt, stored, iterations });
    logger.debug('Verification completed', { valid });

    if (valid) {
      p.log.success(pc.green('✓ 일치합니다.'));
    } else {
      p.log.error(pc.red('✗ 일치하지 않습니다.'));
      process.exitCode = 1;
    }
  } catch (error) {
    failCommand(error);
  }
}

/**
 * Commander 명령어 등록
 */
export function registerVerifyCommand(program: Command): void {
  const command = program
    .command('verify')
    .description('Check that a base password and metadata reproduce a stored password')
    .requiredOption('--salt <salt>', 'Salt used when the password was hardened')
    .option('--stored <value>', 'Stored password or hex key (prompted when omitted)')
    .option('-i, --iterations <count>', 'PBKDF2 iteration count', parseIterationsOption);

  addMetadataOptions(command).action(handleVerify);
}
