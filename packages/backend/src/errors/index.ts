/**
 * 结构化应用错误
 * 区分可预期的业务错误（调用方可修正后重试）和系统错误
 */

export class AppError extends Error {
  code: string;
  isOperational: boolean;

  constructor(message: string, code: string = 'BAD_REQUEST', isOperational: boolean = true) {
    super(message);
    this.name = 'AppError';
    this.code = code;
    this.isOperational = isOperational;
    Object.setPrototypeOf(this, AppError.prototype);
  }

  // 常用错误工厂方法
  static conflict(message: string = '资源冲突'): AppError {
    return new AppError(message, 'CONFLICT');
  }

  static badRequest(message: string = '请求参数错误', code: string = 'BAD_REQUEST'): AppError {
    return new AppError(message, code);
  }

  static internal(message: string = '内部错误'): AppError {
    return new AppError(message, 'INTERNAL_ERROR', false);
  }
}

/**
 * 评分不在 0-5 整数范围内
 * 在读取或写入任何状态之前抛出
 */
export class InvalidRatingError extends AppError {
  readonly quality: unknown;

  constructor(quality: unknown) {
    super(`评分必须是 0-5 之间的整数，收到: ${String(quality)}`, 'INVALID_RATING');
    this.name = 'InvalidRatingError';
    this.quality = quality;
    Object.setPrototypeOf(this, InvalidRatingError.prototype);
  }
}

export class ItemNotFoundError extends AppError {
  readonly itemId: string;

  constructor(itemId: string) {
    super(`词条不存在: ${itemId}`, 'ITEM_NOT_FOUND');
    this.name = 'ItemNotFoundError';
    this.itemId = itemId;
    Object.setPrototypeOf(this, ItemNotFoundError.prototype);
  }
}

export class LockTimeoutError extends AppError {
  readonly key: string;

  constructor(key: string, timeoutMs: number) {
    super(`词条锁超时 (${key}): 操作超过 ${timeoutMs}ms`, 'LOCK_TIMEOUT', false);
    this.name = 'LockTimeoutError';
    this.key = key;
    Object.setPrototypeOf(this, LockTimeoutError.prototype);
  }
}
