/**
 * Shared Types - 类型定义导出
 */

// 词条相关
export * from './word';

// 调度相关
export * from './srs';
