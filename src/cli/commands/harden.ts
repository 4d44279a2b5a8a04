/**
 * Harden CLI 명령어
 * @description 기본 비밀번호 + 메타데이터로 하드닝 패스워드 생성
 */

import type { Command } from 'commander';
import * as p from '@clack/prompts';
import pc from 'picocolors';
import { hardenPassword } from '../../security/hardener.js';
import { analyzePasswordStrength } from '../../security/strength.js';
import { assertIterationsWithin, generateSalt } from '../../security/stretch.js';
import { RecoveryManager, buildRecoveryPackage } from '../../security/recovery.js';
import {
  addMetadataOptions,
  createCliLogger,
  failCommand,
  formatAnalysis,
  formatHints,
  formatVariant,
  loadAppConfig,
  parseIterationsOption,
  promptSecret,
  resolveMetadata,
  type MetadataOptions,
} from '../common.js';

interface HardenOptions extends MetadataOptions {
  iterations?: number;
  salt?: string;
  save?: string;
}

/**
 * harden 명령어 핸들러
 */
async function handleHarden(options: HardenOptions): Promise<void> {
  p.intro(pc.cyan('🔐 Personal Password Hardener'));

  try {
    const config = loadAppConfig();
    const logger = createCliLogger(config).child('harden');
    const iterations = options.iterations ?? config.derivation.iterations;
    assertIterationsWithin(iterations, config.derivation.maxIterations);

    const baseSecret = await promptSecret('기본 비밀번호를 입력하세요:');
    const metadata = await resolveMetadata(options);

    const spinner = p.spinner();
    spinner.start(`키 스트레칭 중 (PBKDF2 × ${iterations})...`);
    const result = hardenPassword(baseSecret, metadata, {
      iterations,
      salt: options.salt ?? generateSalt(config.derivation.saltBytes),
    });
    spinner.stop('하드닝 완료');
    logger.debug('Password hardened', { iterations });

    p.log.step(pc.bold('기본 비밀번호 분석'));
    p.log.message(formatAnalysis(analyzePasswordStrength(baseSecret)).join('\n'));

    p.log.step(pc.bold('하드닝된 패스워드'));
    p.log.message(
      [result.variants.short, result.variants.medium, result.variants.long]
        .map((variant) => formatVariant(variant))
        .join('\n')
    );

    p.log.step(pc.bold('하드닝 패스워드 분석 (medium)'));
    p.log.message(formatAnalysis(analyzePasswordStrength(result.variants.medium.password)).join('\n'));

    p.log.step(pc.bold('암호화 정보'));
    p.log.message(
      [
        `Algorithm: ${result.algorithm}`,
        `Iterations: ${result.iterations}`,
        `Salt (recovery key): ${result.salt}`,
      ].join('\n')
    );

    if (options.save) {
      const manager = new RecoveryManager({
        iterations,
        maxIterations: config.derivation.maxIterations,
        logger,
      });
      const pkg = buildRecoveryPackage(result.salt, metadata, iterations);
      const saved = manager.savePackage(pkg, options.save);
      p.log.success(`복구 파일 저장: ${pc.cyan(saved)}`);
      p.log.message(formatHints(pkg.metadataHints).join('\n'));
      p.log.warn('기본 비밀번호는 복구 파일과 별도로 보관하세요!');
    } else {
      p.log.warn('salt를 잃어버리면 패스워드를 복구할 수 없습니다. --save 옵션으로 복구 파일을 만드세요.');
    }

    p.outro(pc.green('완료'));
  } catch (error) {
    failCommand(error);
  }
}

/**
 * Commander 명령어 등록
 */
export function registerHardenCommand(program: Command): void {
  const command = program
    .command('harden')
    .description('Harden a base password with personal metadata')
    .option('-i, --iterations <count>', 'PBKDF2 iteration count', parseIterationsOption)
    .option('--salt <salt>', 'Reuse an existing salt instead of generating one')
    .option('-s, --save <file>', 'Write a recovery package to this file');

  addMetadataOptions(command).action(handleHarden);
}
