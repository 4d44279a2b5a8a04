#!/usr/bin/env node

/**
 * pph CLI 엔트리포인트
 * @description Commander.js 기반 메인 CLI
 */

import type { Command } from 'commander';
import pc from 'picocolors';
import { createProgram } from './program.js';

/**
 * 에러 핸들링 설정
 */
function setupErrorHandling(program: Command): void {
  program.on('command:*', (operands: string[]) => {
    console.error(`
  ${pc.red('❌')} 오류: 알 수 없는 명령어 '${operands[0]}'

  사용 가능한 명령어를 보려면:
    $ pph --help
`);
    process.exit(1);
  });

  process.on('uncaughtException', (error) => {
    console.error(`
  ${pc.red('❌')} 처리되지 않은 예외가 발생했습니다:
     ${error.message}
`);
    process.exit(1);
  });

  process.on('unhandledRejection', (reason) => {
    console.error(`
  ${pc.red('❌')} 처리되지 않은 Promise 거부가 발생했습니다:
     ${reason instanceof Error ? reason.message : String(reason)}
`);
    process.exit(1);
  });
}

/**
 * CLI 실행
 */
async function main(): Promise<void> {
  const program = createProgram();
  setupErrorHandling(program);

  // 명령어가 없으면 도움말 표시
  if (process.argv.length <= 2) {
    program.help();
  }

  await program.parseAsync(process.argv);
}

main().catch((error: unknown) => {
  console.error('CLI 실행 중 오류가 발생했습니다:', error instanceof Error ? error.message : error);
  process.exit(1);
});
