/**
 * @lexiloop/shared
 *
 * 调度核心与调用方共享的类型、Schema 和工具函数
 */

export * from './types';
export * from './schemas';
export * from './utils/day-math';
