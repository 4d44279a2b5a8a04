/**
 * Gateway CLI 명령어
 * @description HTTP API 서버 시작
 */

import type { Command } from 'commander';
import * as p from '@clack/prompts';
import pc from 'picocolors';
import { GatewayServer } from '../../gateway/server.js';
import { createCliLogger, failCommand, loadAppConfig, parsePortOption } from '../common.js';

interface GatewayOptions {
  port?: number;
  host?: string;
}

/**
 * gateway 명령어 핸들러
 */
async function handleGateway(options: GatewayOptions): Promise<void> {
  try {
    const config = loadAppConfig();
    const logger = createCliLogger(config).child('gateway');

    const host = options.host ?? config.gateway.host;
    const server = new GatewayServer(
      {
        httpPort: options.port ?? config.gateway.httpPort,
        host,
        cors: config.gateway.cors,
        iterations: config.derivation.iterations,
        maxIterations: config.derivation.maxIterations,
        saltBytes: config.derivation.saltBytes,
      },
      logger
    );

    await server.start();
    const port = server.getAddress()?.port ?? config.gateway.httpPort;
    p.log.success(`Gateway listening on ${pc.cyan(`http://${host}:${port}`)}`);
    p.log.info(pc.dim('Ctrl+C로 종료합니다.'));

    const shutdown = (): void => {
      server
        .stop()
        .then(() => logger.close())
        .then(() => process.exit(0))
        .catch((error: unknown) => failCommand(error));
    };
    process.once('SIGINT', shutdown);
    process.once('SIGTERM', shutdown);
  } catch (error) {
    failCommand(error);
  }
}

/**
 * Commander 명령어 등록
 */
export function registerGatewayCommand(program: Command): void {
  program
    .command('gateway')
    .description('Start the HTTP API server')
    .option('-p, --port <port>', 'HTTP port (default from config)', parsePortOption)
    .option('-H, --host <host>', 'Bind address (default from config)')
    .action(handleGateway);
}
