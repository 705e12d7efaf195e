/**
 * 日志
 *
 * 生产环境输出 JSON 到 stdout，开发环境经 pino-pretty 着色，测试环境默认静默。
 * 各模块通过 createChildLogger 绑定 module 字段，便于按模块过滤
 */

import pino, { type DestinationStream, type Logger, type LoggerOptions } from 'pino';

const APP_NAME = 'lexiloop-backend';

/** 词库和复习记录本身不含敏感字段，这里只防止配置类对象被整体打印 */
const REDACT_PATHS = ['*.password', '*.token', '*.secret', '*.apiKey'];

type RuntimeEnv = 'development' | 'production' | 'test';

function detectRuntime(): RuntimeEnv {
  const value = process.env.NODE_ENV;
  return value === 'production' || value === 'test' ? value : 'development';
}

const RUNTIME = detectRuntime();

/**
 * 显式设置的 LOG_LEVEL 优先；测试环境默认 silent
 */
function resolveLevel(): string {
  if (process.env.LOG_LEVEL) {
    return process.env.LOG_LEVEL;
  }
  return RUNTIME === 'test' ? 'silent' : 'info';
}

/**
 * 保留 AppError 的 code 字段
 */
function serializeError(err: Error): pino.SerializedError {
  const serialized = pino.stdSerializers.err(err);
  if ('code' in err && typeof err.code === 'string') {
    serialized.code = err.code;
  }
  return serialized;
}

function buildOptions(): LoggerOptions {
  return {
    level: resolveLevel(),
    base: { app: APP_NAME, env: RUNTIME },
    serializers: { err: serializeError },
    redact: { paths: REDACT_PATHS, censor: '[REDACTED]' },
    timestamp: pino.stdTimeFunctions.isoTime,
    formatters: {
      level: (label) => ({ level: label }),
      // 开发环境去掉 pid/hostname，减少噪音
      bindings: ({ pid, hostname, ...rest }) =>
        RUNTIME === 'production' ? { pid, hostname, ...rest } : rest,
    },
  };
}

function buildDestination(): DestinationStream | undefined {
  if (RUNTIME === 'test') {
    return undefined;
  }

  const target: pino.TransportTargetOptions =
    RUNTIME === 'production'
      ? { target: 'pino/file', options: { destination: 1 } }
      : {
          target: 'pino-pretty',
          options: { colorize: true, translateTime: 'SYS:standard', ignore: 'pid,hostname' },
        };

  try {
    return pino.transport({ targets: [target] });
  } catch (err) {
    console.warn('[logger] transport unavailable, writing plain JSON:', err);
    return undefined;
  }
}

export const logger: Logger = pino(buildOptions(), buildDestination());

export interface LoggerBindings {
  module?: string;
  itemId?: string;
  [key: string]: unknown;
}

/**
 * @example
 * ```typescript
 * const log = createChildLogger({ module: 'due-query' });
 * log.debug({ limit: 20 }, '查询到期词条');
 * ```
 */
export function createChildLogger(bindings: LoggerBindings = {}): Logger {
  return logger.child(bindings);
}

/** SM-2 计算 */
export const srsLogger = createChildLogger({ module: 'srs' });

/** SQLite 连接与迁移 */
export const dbLogger = createChildLogger({ module: 'database' });

export const serviceLogger = createChildLogger({ module: 'service' });

/** 配置校验与应用装配 */
export const startupLogger = createChildLogger({ module: 'startup' });

export type { Logger } from 'pino';
