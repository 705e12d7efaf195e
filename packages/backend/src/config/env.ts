/**
 * 后端环境变量配置
 *
 * 使用 Zod 进行运行时验证，确保环境变量的类型安全和完整性
 * 所有环境变量都通过此文件统一访问，避免直接使用 process.env
 */

import { config } from 'dotenv';
import { z } from 'zod';
import { startupLogger } from '../logger';

// 加载 .env 文件
config();

const intFromString = (fallback: string) =>
  z
    .string()
    .default(fallback)
    .transform((val) => parseInt(val, 10));

/**
 * 环境变量 Schema 定义
 */
export const envSchema = z.object({
  NODE_ENV: z.enum(['development', 'production', 'test']).default('development'),

  // ============================================
  // 日志配置
  // ============================================
  LOG_LEVEL: z
    .enum(['trace', 'debug', 'info', 'warn', 'error', 'fatal', 'silent'])
    .default('info'),

  // ============================================
  // 数据库配置
  // ============================================
  DATABASE_PATH: z.string().min(1, 'DATABASE_PATH 不能为空').default('./data/lexiloop.db'),

  // ============================================
  // 学习节奏配置
  // ============================================
  NEW_ITEMS_PER_DAY: intFromString('10').pipe(
    z.number().int().min(0, 'NEW_ITEMS_PER_DAY 不能为负数'),
  ),

  RECALL_PROBABILITY: z
    .string()
    .default('0.3')
    .transform((val) => parseFloat(val))
    .pipe(z.number().min(0).max(1, 'RECALL_PROBABILITY 必须在 0-1 范围内')),

  // 旧数据中表示"手动跳过"的自由标签，导入时转换为 SKIP_MANUAL 标记
  SKIP_TAG: z.string().min(1).default('skip:manual'),

  // ============================================
  // 并发控制
  // ============================================
  ITEM_LOCK_TIMEOUT_MS: intFromString('30000').pipe(
    z.number().int().min(100, 'ITEM_LOCK_TIMEOUT_MS 最小值为 100'),
  ),
});

export type Env = z.infer<typeof envSchema>;

/**
 * 验证并解析环境变量
 */
export function validateEnv(source: NodeJS.ProcessEnv = process.env): Env {
  const result = envSchema.safeParse({
    NODE_ENV: source.NODE_ENV,
    LOG_LEVEL: source.LOG_LEVEL,
    DATABASE_PATH: source.DATABASE_PATH,
    NEW_ITEMS_PER_DAY: source.NEW_ITEMS_PER_DAY,
    RECALL_PROBABILITY: source.RECALL_PROBABILITY,
    SKIP_TAG: source.SKIP_TAG,
    ITEM_LOCK_TIMEOUT_MS: source.ITEM_LOCK_TIMEOUT_MS,
  });

  if (!result.success) {
    startupLogger.error('环境变量验证失败:');
    result.error.errors.forEach((err) => {
      startupLogger.error(`  - ${err.path.join('.')}: ${err.message}`);
    });
    throw new Error('环境变量配置错误，请检查 .env 文件');
  }

  const parsed = result.data;

  if (parsed.NODE_ENV === 'production' && parsed.DATABASE_PATH === ':memory:') {
    startupLogger.warn('⚠️ 生产环境使用内存数据库，复习记录不会持久化');
  }

  startupLogger.debug(`环境变量验证成功 (环境: ${parsed.NODE_ENV})`);
  return parsed;
}

/**
 * 导出验证后的环境变量
 *
 * @example
 * ```ts
 * import { env } from './config/env';
 *
 * openDatabase(env.DATABASE_PATH);
 * ```
 */
export const env = validateEnv();
