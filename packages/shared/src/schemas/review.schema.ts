/**
 * 复习相关Zod Schema
 */

import { z } from 'zod';
import type { ReviewQuality } from '../types/srs';

export const MIN_QUALITY = 0;
export const MAX_QUALITY = 5;

/**
 * 只接受 0-5 的整数，不做四舍五入或字符串转换
 */
export function isReviewQuality(value: unknown): value is ReviewQuality {
  return (
    typeof value === 'number' &&
    Number.isInteger(value) &&
    value >= MIN_QUALITY &&
    value <= MAX_QUALITY
  );
}

export const ReviewQualitySchema = z.custom<ReviewQuality>(isReviewQuality, {
  message: `Quality must be an integer between ${MIN_QUALITY} and ${MAX_QUALITY}`,
});
