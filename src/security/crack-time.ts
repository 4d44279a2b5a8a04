/**
 * 크랙 시간 추정 모듈
 */

import type { CrackTimeEstimate, TimeUnit } from '../types/hardener.js';
import { roundTo } from './entropy.js';

/**
 * 공격자 처리량 (초당 추측 횟수)
 */
export const GUESSES_PER_SECOND = 1e9;

/**
 * 시간 단위 (큰 단위부터)
 */
export const TIME_UNITS: ReadonlyArray<readonly [TimeUnit, number]> = [
  ['centuries', 3153600000],
  ['years', 31536000],
  ['months', 2592000],
  ['days', 86400],
  ['hours', 3600],
  ['minutes', 60],
  ['seconds', 1],
];

function toEstimate(value: number, unit: TimeUnit): CrackTimeEstimate {
  const numeric = roundTo(value, 2);
  return {
    numeric,
    unit,
    display: `${numeric} ${unit}`,
  };
}

/**
 * 엔트로피로부터 전수 조사 시간을 추정합니다
 *
 * seconds = 2^entropy / 1e9 를 넘지 않는 가장 큰 단위로 표시한다.
 * 1초 미만이면 seconds 단위 (반올림되어 0이 될 수 있음).
 *
 * @param entropy - 엔트로피 (bits)
 */
export function estimateCrackTime(entropy: number): CrackTimeEstimate {
  const seconds = 2 ** entropy / GUESSES_PER_SECOND;

  for (const [unit, divisor] of TIME_UNITS) {
    if (seconds >= divisor) {
      return toEstimate(seconds / divisor, unit);
    }
  }

  return toEstimate(seconds, 'seconds');
}
