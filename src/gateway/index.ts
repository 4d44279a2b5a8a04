/**
 * Gateway 모듈
 * @description 하드닝 HTTP API
 */

export * from './types.js';
export { GatewayServer } from './server.js';
export { HardenRequestSchema, AnalyzeRequestSchema, VerifyRequestSchema, RecoverRequestSchema } from './schemas.js';
