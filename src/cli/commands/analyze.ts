/**
 * Analyze CLI 명령어
 * @description 임의 패스워드의 강도 분석
 */

import type { Command } from 'commander';
import * as p from '@clack/prompts';
import pc from 'picocolors';
import { analyzePasswordStrength } from '../../security/strength.js';
import { failCommand, formatAnalysis, promptSecret } from '../common.js';

interface AnalyzeOptions {
  json?: boolean;
}

/**
 * analyze 명령어 핸들러
 */
async function handleAnalyze(options: AnalyzeOptions): Promise<void> {
  try {
    const password = await promptSecret('분석할 패스워드를 입력하세요:');
    const analysis = analyzePasswordStrength(password);

    if (options.json) {
      process.stdout.write(`${JSON.stringify(analysis, null, 2)}\n`);
      return;
    }

    p.log.step(pc.bold('강도 분석'));
    p.log.message(formatAnalysis(analysis).join('\n'));
  } catch (error) {
    failCommand(error);
  }
}

/**
 * Commander 명령어 등록
 */
export function registerAnalyzeCommand(program: Command): void {
  program
    .command('analyze')
    .description('Analyze the strength of a password')
    .option('--json', 'Print the analysis as JSON')
    .action(handleAnalyze);
}
