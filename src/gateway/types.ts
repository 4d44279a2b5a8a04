/**
 * Gateway 서버 타입 정의
 * @description HTTP API 요청/응답 타입
 */

import type { MetadataField, StrengthAnalysis, VariantLabel, PasswordVariant } from '../types/hardener.js';

/**
 * Gateway 서버 설정
 */
export interface GatewayServerConfig {
  httpPort: number;
  host: string;
  cors?: {
    origins: string[];
  };
  /** 요청에 반복 횟수가 없을 때 사용 */
  iterations: number;
  /** 요청으로 받을 수 있는 최대 반복 횟수 */
  maxIterations: number;
  /** 새 salt 바이트 수 */
  saltBytes: number;
}

/**
 * 에러 정보
 */
export interface APIError {
  code: string;
  message: string;
  details?: unknown;
}

/**
 * API 응답 표준 형식
 */
export interface APIResponse<T = unknown> {
  success: boolean;
  data?: T;
  error?: APIError;
  meta?: {
    timestamp: string;
    requestId: string;
  };
}

/**
 * 서버 상태
 */
export interface ServerStatus {
  status: 'healthy';
  startedAt: string;
  version: string;
  algorithm: string;
  maxIterations: number;
}

/**
 * POST /v1/harden 응답
 */
export interface HardenResponse {
  original: {
    analysis: StrengthAnalysis;
  };
  hardened: {
    variants: Record<VariantLabel, PasswordVariant>;
    /** medium 변형 분석 */
    analysis: StrengthAnalysis;
  };
  cryptoDetails: {
    algorithm: string;
    iterations: number;
    salt: string;
  };
  metadataHints: Record<MetadataField, string>;
}

/**
 * POST /v1/analyze 응답
 */
export interface AnalyzeResponse {
  analysis: StrengthAnalysis;
}

/**
 * POST /v1/verify 응답
 */
export interface VerifyResponse {
  valid: boolean;
}

/**
 * POST /v1/recover 응답
 */
export interface RecoverResponse {
  variant: VariantLabel;
  password: string;
  entropy: number;
}
