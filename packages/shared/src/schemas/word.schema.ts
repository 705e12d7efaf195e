/**
 * 词条相关Zod Schema
 * 用于运行时验证和类型推断
 */

import { z } from 'zod';

/**
 * 排除标记Schema
 */
export const ItemFlagSchema = z.enum(['SKIP_MANUAL']);

/**
 * 创建词条Schema
 */
export const CreateItemSchema = z.object({
  text: z.string().trim().min(1, 'Text is required').max(200, 'Text too long'),
  meaning: z.string().trim().min(1, 'Meaning is required').max(500, 'Meaning too long'),
  tags: z.array(z.string().trim().min(1)).default([]),
  flags: z.array(ItemFlagSchema).default([]),
});

export type CreateItemDto = z.infer<typeof CreateItemSchema>;
