/**
 * 보안 모듈 메인 exports
 */

// 에러
export {
  HardenerError,
  InputError,
  ConfigError,
  RecoveryNotFoundError,
  MalformedRecoveryError,
  type HardenerErrorCode,
} from './errors.js';

// 키 스트레칭
export {
  KEY_LENGTH,
  DEFAULT_ITERATIONS,
  DEFAULT_SALT_BYTES,
  DEFAULT_MAX_ITERATIONS,
  assertIterations,
  assertIterationsWithin,
  generateSalt,
  stretchKey,
  clearKey,
} from './stretch.js';

// 정규화/인코딩
export { normalizeMetadata } from './metadata.js';
export { PASSWORD_ALPHABET, encodePassword } from './encoder.js';

// 강도 분석
export { computeEntropy, detectCharacterClasses, charsetSize } from './entropy.js';
export { GUESSES_PER_SECOND, estimateCrackTime } from './crack-time.js';
export { classifyStrength, analyzePasswordStrength } from './strength.js';

// 하드닝/검증
export { deriveKey, derivePassword, hardenPassword } from './hardener.js';
export { constantTimeEqual, verifyPassword } from './verifier.js';

// 복구
export {
  DEFAULT_RECOVERY_FILE,
  RECOVERY_WARNING,
  createMetadataHints,
  buildRecoveryPackage,
  parseRecoveryPackage,
  deserializeRecoveryPackage,
  saveRecoveryPackage,
  loadRecoveryPackage,
  regeneratePassword,
  verifyRecoveryCredentials,
  RecoveryManager,
  type RecoveryManagerOptions,
  type PersistedRecoveryPackage,
} from './recovery.js';
