/**
 * Gateway 요청 스키마
 */

import { z } from 'zod';
import type { MetadataSet } from '../types/hardener.js';

const metadataValue = z.string().max(256).optional();

/**
 * 요청 본문의 평면 메타데이터 필드
 */
const MetadataFieldsSchema = z.object({
  house_name: metadataValue,
  phone_suffix: metadataValue,
  core_memory: metadataValue,
  handle_name: metadataValue,
  birthday_token: metadataValue,
  custom: metadataValue,
});

const password = z.string({ required_error: 'Password is required' }).min(1, 'Password is required').max(1024);

const iterations = z.number().int().positive().optional();

export const HardenRequestSchema = MetadataFieldsSchema.extend({
  password,
  iterations,
});

export const AnalyzeRequestSchema = z.object({
  password,
});

export const VerifyRequestSchema = MetadataFieldsSchema.extend({
  password,
  salt: z.string().min(1),
  stored: z.string().min(1),
  iterations,
});

export const RecoverRequestSchema = MetadataFieldsSchema.extend({
  password,
  variant: z.enum(['short', 'medium', 'long']).default('medium'),
  package: z.unknown(),
});

/**
 * 요청 본문에서 메타데이터만 추출합니다
 */
export function pickMetadata(body: z.infer<typeof MetadataFieldsSchema>): MetadataSet {
  return {
    house_name: body.house_name,
    phone_suffix: body.phone_suffix,
    core_memory: body.core_memory,
    handle_name: body.handle_name,
    birthday_token: body.birthday_token,
    custom: body.custom,
  };
}
