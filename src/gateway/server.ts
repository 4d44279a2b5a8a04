/**
 * Gateway HTTP 서버
 * @description Express 기반 하드닝/분석/검증/복구 API
 */

import { createServer, type Server as HTTPServer } from 'http';
import type { AddressInfo } from 'net';
import express, { type Request, type Response, type NextFunction, type Application } from 'express';
import { randomUUID } from 'crypto';
import { ZodError } from 'zod';
import type { ILogger } from '../logging/index.js';
import { KDF_ALGORITHM, VARIANT_LENGTHS } from '../types/hardener.js';
import { HardenerError } from '../security/errors.js';
import { hardenPassword, derivePassword } from '../security/hardener.js';
import { analyzePasswordStrength } from '../security/strength.js';
import { computeEntropy } from '../security/entropy.js';
import { verifyPassword } from '../security/verifier.js';
import { createMetadataHints, parseRecoveryPackage } from '../security/recovery.js';
import { assertIterationsWithin, generateSalt } from '../security/stretch.js';
import {
  AnalyzeRequestSchema,
  HardenRequestSchema,
  RecoverRequestSchema,
  VerifyRequestSchema,
  pickMetadata,
} from './schemas.js';
import type {
  APIResponse,
  AnalyzeResponse,
  GatewayServerConfig,
  HardenResponse,
  RecoverResponse,
  ServerStatus,
  VerifyResponse,
} from './types.js';

const SERVER_VERSION = '1.0.0';

/**
 * Gateway 서버 클래스
 */
export class GatewayServer {
  private app: Application;
  private httpServer: HTTPServer | null = null;
  private config: GatewayServerConfig;
  private logger: ILogger;
  private startedAt: Date = new Date();

  constructor(config: GatewayServerConfig, logger: ILogger) {
    this.config = config;
    this.logger = logger;
    this.app = express();

    assertIterationsWithin(config.iterations, config.maxIterations);

    this.setupMiddleware();
    this.setupRoutes();
  }

  /**
   * 미들웨어를 설정합니다
   */
  private setupMiddleware(): void {
    this.app.disable('x-powered-by');

    // 요청 ID 부여 + 로깅 (본문은 기록하지 않음). 본문 파싱 실패 응답에도 같은 ID를 쓴다
    this.app.use((req: Request, _res, next) => {
      req.requestId = randomUUID();
      this.logger.debug(`${req.method} ${req.path}`, { requestId: req.requestId, ip: req.ip });
      next();
    });

    this.app.use(express.json({ limit: '16kb' }));

    // CORS
    this.app.use((req, res, next) => {
      const origin = req.headers.origin;
      const allowedOrigins = this.config.cors?.origins || ['http://localhost:3000'];

      if (origin && allowedOrigins.includes(origin)) {
        res.header('Access-Control-Allow-Origin', origin);
      }
      res.header('Access-Control-Allow-Methods', 'GET, POST, OPTIONS');
      res.header('Access-Control-Allow-Headers', 'Content-Type');

      if (req.method === 'OPTIONS') {
        res.sendStatus(200);
        return;
      }
      next();
    });

  }

  /**
   * 라우트를 설정합니다
   */
  private setupRoutes(): void {
    this.app.get('/v1/health', this.handleHealth.bind(this));
    this.app.post('/v1/harden', this.handleHarden.bind(this));
    this.app.post('/v1/analyze', this.handleAnalyze.bind(this));
    this.app.post('/v1/verify', this.handleVerify.bind(this));
    this.app.post('/v1/recover', this.handleRecover.bind(this));

    // 404 핸들러
    this.app.use((req: Request, res: Response) => {
      res.status(404).json(this.createErrorResponse(req, 'NOT_FOUND', 'Endpoint not found'));
    });

    // 에러 핸들러
    this.app.use((err: unknown, req: Request, res: Response, _next: NextFunction) => {
      this.sendError(req, res, err);
    });
  }

  /**
   * 헬스 체크 핸들러
   */
  private handleHealth(req: Request, res: Response): void {
    const status: ServerStatus = {
      status: 'healthy',
      startedAt: this.startedAt.toISOString(),
      version: SERVER_VERSION,
      algorithm: KDF_ALGORITHM,
      maxIterations: this.config.maxIterations,
    };
    res.json(this.createSuccessResponse(req, status));
  }

  /**
   * 하드닝 핸들러
   */
  private handleHarden(req: Request, res: Response): void {
    try {
      const body = HardenRequestSchema.parse(req.body);
      const iterations = this.resolveIterations(body.iterations);
      const metadata = pickMetadata(body);

      const result = hardenPassword(body.password, metadata, {
        iterations,
        salt: generateSalt(this.config.saltBytes),
      });

      const data: HardenResponse = {
        original: { analysis: analyzePasswordStrength(body.password) },
        hardened: {
          variants: result.variants,
          analysis: analyzePasswordStrength(result.variants.medium.password),
        },
        cryptoDetails: {
          algorithm: result.algorithm,
          iterations: result.iterations,
          salt: result.salt,
        },
        metadataHints: createMetadataHints(metadata),
      };

      this.logger.info('Password hardened', { requestId: req.requestId, iterations });
      res.json(this.createSuccessResponse(req, data));
    } catch (error) {
      this.sendError(req, res, error);
    }
  }

  /**
   * 강도 분석 핸들러
   */
  private handleAnalyze(req: Request, res: Response): void {
    try {
      const body = AnalyzeRequestSchema.parse(req.body);
      const data: AnalyzeResponse = { analysis: analyzePasswordStrength(body.password) };
      res.json(this.createSuccessResponse(req, data));
    } catch (error) {
      this.sendError(req, res, error);
    }
  }

  /**
   * 검증 핸들러
   */
  private handleVerify(req: Request, res: Response): void {
    try {
      const body = VerifyRequestSchema.parse(req.body);
      const valid = verifyPassword({
        baseSecret: body.password,
        metadata: pickMetadata(body),
        salt: body.salt,
        stored: body.stored,
        iterations: this.resolveIterations(body.iterations),
      });

      this.logger.info('Verification completed', { requestId: req.requestId, valid });
      const data: VerifyResponse = { valid };
      res.json(this.createSuccessResponse(req, data));
    } catch (error) {
      this.sendError(req, res, error);
    }
  }

  /**
   * 복구 핸들러 (복구 패키지를 본문으로 받음)
   */
  private handleRecover(req: Request, res: Response): void {
    try {
      const body = RecoverRequestSchema.parse(req.body);
      const pkg = parseRecoveryPackage(body.package, 'request body');
      assertIterationsWithin(pkg.iterations, this.config.maxIterations);

      const password = derivePassword(
        body.password,
        pickMetadata(body),
        pkg.secretKey,
        VARIANT_LENGTHS[body.variant],
        pkg.iterations
      );

      const data: RecoverResponse = {
        variant: body.variant,
        password,
        entropy: computeEntropy(password),
      };
      this.logger.info('Password recovered', { requestId: req.requestId, variant: body.variant });
      res.json(this.createSuccessResponse(req, data));
    } catch (error) {
      this.sendError(req, res, error);
    }
  }

  /**
   * 요청의 반복 횟수를 기본값/상한과 함께 결정합니다
   */
  private resolveIterations(requested: number | undefined): number {
    const iterations = requested ?? this.config.iterations;
    assertIterationsWithin(iterations, this.config.maxIterations);
    return iterations;
  }

  /**
   * 에러를 HTTP 응답으로 변환합니다
   */
  private sendError(req: Request, res: Response, error: unknown): void {
    if (error instanceof ZodError) {
      const details = error.errors.map((e) => `${e.path.join('.') || 'body'}: ${e.message}`);
      const message = error.errors[0]?.message ?? 'Invalid request';
      res.status(400).json(this.createErrorResponse(req, 'INVALID_INPUT', message, details));
      return;
    }

    if (error instanceof HardenerError) {
      this.logger.warn('Request rejected', { requestId: req.requestId, code: error.code, reason: error.message });
      res.status(400).json(this.createErrorResponse(req, error.code, error.message));
      return;
    }

    // express.json() 파싱 실패
    if (error instanceof SyntaxError) {
      res.status(400).json(this.createErrorResponse(req, 'INVALID_INPUT', 'Malformed JSON body'));
      return;
    }

    const err = error instanceof Error ? error : new Error(String(error));
    this.logger.error('Request error', err, { requestId: req.requestId, path: req.path });
    res.status(500).json(this.createErrorResponse(req, 'INTERNAL_ERROR', 'Internal server error'));
  }

  /**
   * 요청 미들웨어가 부여한 ID (미들웨어를 거치지 않은 요청이면 새로 발급)
   */
  private requestIdOf(req: Request): string {
    const requestId = req.requestId ?? randomUUID();
    req.requestId = requestId;
    return requestId;
  }

  /**
   * 성공 응답을 생성합니다
   */
  private createSuccessResponse<T>(req: Request, data: T): APIResponse<T> {
    return {
      success: true,
      data,
      meta: {
        timestamp: new Date().toISOString(),
        requestId: this.requestIdOf(req),
      },
    };
  }

  /**
   * 에러 응답을 생성합니다
   */
  private createErrorResponse(req: Request, code: string, message: string, details?: unknown): APIResponse {
    return {
      success: false,
      error: details === undefined ? { code, message } : { code, message, details },
      meta: {
        timestamp: new Date().toISOString(),
        requestId: this.requestIdOf(req),
      },
    };
  }

  /**
   * Express 앱 (테스트용)
   */
  getApp(): Application {
    return this.app;
  }

  /**
   * 바인딩된 주소 (시작 전이면 null)
   */
  getAddress(): AddressInfo | null {
    const address = this.httpServer?.address();
    return address && typeof address === 'object' ? address : null;
  }

  /**
   * 서버를 시작합니다
   */
  async start(): Promise<void> {
    return new Promise((resolve, reject) => {
      const server = createServer(this.app);
      this.httpServer = server;

      server.once('error', (error) => {
        this.logger.error('HTTP server error', error);
        reject(error);
      });

      server.listen(this.config.httpPort, this.config.host, () => {
        const port = this.getAddress()?.port ?? this.config.httpPort;
        this.logger.info(`HTTP server started on ${this.config.host}:${port}`);
        resolve();
      });
    });
  }

  /**
   * 서버를 중지합니다
   */
  async stop(): Promise<void> {
    const server = this.httpServer;
    if (!server) {
      return;
    }
    this.httpServer = null;

    return new Promise((resolve, reject) => {
      server.close((error) => {
        if (error) {
          reject(error);
          return;
        }
        this.logger.info('HTTP server stopped');
        resolve();
      });
    });
  }
}
