/**
 * Recover CLI 명령어
 * @description 복구 파일 + 기본 비밀번호 + 메타데이터로 패스워드 재생성
 */

import { Option, type Command } from 'commander';
import * as p from '@clack/prompts';
import pc from 'picocolors';
import type { VariantLabel } from '../../types/hardener.js';
import { RecoveryManager } from '../../security/recovery.js';
import { computeEntropy } from '../../security/entropy.js';
import {
  addMetadataOptions,
  createCliLogger,
  failCommand,
  formatHints,
  formatVariant,
  loadAppConfig,
  promptSecret,
  resolveMetadata,
  type MetadataOptions,
} from '../common.js';

interface RecoverOptions extends MetadataOptions {
  file?: string;
  variant?: VariantLabel;
}

/**
 * recover 명령어 핸들러
 */
async function handleRecover(options: RecoverOptions): Promise<void> {
  p.intro(pc.cyan('🔑 Password Recovery'));

  try {
    const config = loadAppConfig();
    const logger = createCliLogger(config).child('recovery');
    const manager = new RecoveryManager({
      iterations: config.derivation.iterations,
      maxIterations: config.derivation.maxIterations,
      logger,
    });

    const file = options.file ?? config.recovery.defaultFile;
    const variant = options.variant ?? config.recovery.defaultVariant;
    const pkg = manager.loadPackage(file);

    p.log.info(pc.bold('메타데이터 힌트'));
    p.log.message(formatHints(pkg.metadataHints).join('\n'));
    p.log.warn(pkg.warning);

    const baseSecret = await promptSecret('기본 비밀번호를 입력하세요:');
    const metadata = await resolveMetadata(options);

    const spinner = p.spinner();
    spinner.start(`키 스트레칭 중 (PBKDF2 × ${pkg.iterations})...`);
    const password = manager.regenerate(baseSecret, metadata, pkg, variant);
    spinner.stop('복구 완료');

    p.log.message(formatVariant({ label: variant, password, entropy: computeEntropy(password) }));
    p.outro(pc.dim('같은 기본 비밀번호와 메타데이터를 입력했을 때만 원래 패스워드가 나옵니다.'));
  } catch (error) {
    failCommand(error);
  }
}

/**
 * Commander 명령어 등록
 */
export function registerRecoverCommand(program: Command): void {
  const command = program
    .command('recover')
    .description('Regenerate a hardened password from a recovery package')
    .option('-f, --file <path>', 'Recovery package file (default from config)')
    .addOption(
      new Option('--variant <variant>', 'Password variant to regenerate').choices(['short', 'medium', 'long'])
    );

  addMetadataOptions(command).action(handleRecover);
}
