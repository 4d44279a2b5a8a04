/**
 * personal-password-hardener 라이브러리 진입점
 */

export * from './security/index.js';
export type * from './types/hardener.js';
export { METADATA_FIELDS, KDF_ALGORITHM, VARIANT_LENGTHS } from './types/hardener.js';
export type { AppConfig } from './types/config.js';
export { ConfigManager, getConfigManager, resetConfigManager } from './core/config-manager.js';
export { GatewayServer } from './gateway/index.js';
export { Logger, getLogger, initializeLogger, createLogger } from './logging/index.js';
