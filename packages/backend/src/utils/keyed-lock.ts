/**
 * 按键串行化的异步锁
 *
 * 同一词条的"读取最新状态 + 追加复习记录"必须串行，否则并发写入会丢失更新；
 * 不同词条互不阻塞
 */

import { LockTimeoutError } from '../errors';
import { createChildLogger } from '../logger';

const logger = createChildLogger({ module: 'keyed-lock' });

export const DEFAULT_LOCK_TIMEOUT_MS = 30_000;

const noop = (): void => undefined;

/**
 * promise 在 ms 内未完成则以 onTimeout() 的错误拒绝；计时器在结束后清除
 */
export function withTimeout<T>(
  promise: Promise<T>,
  ms: number,
  onTimeout: () => Error,
): Promise<T> {
  let timer: ReturnType<typeof setTimeout> | undefined;
  const expiry = new Promise<never>((_, reject) => {
    timer = setTimeout(() => reject(onTimeout()), ms);
  });
  return Promise.race([promise, expiry]).finally(() => clearTimeout(timer));
}

export class KeyedLock {
  /** 每个键对应队尾任务，队尾永不拒绝 */
  private readonly tails = new Map<string, Promise<void>>();

  constructor(private readonly timeoutMs: number = DEFAULT_LOCK_TIMEOUT_MS) {}

  /**
   * 当前持有或等待中的键数量
   */
  get size(): number {
    return this.tails.size;
  }

  /**
   * 在 key 对应的锁内执行 fn
   *
   * 超时只作用于调用方：调用方收到 LockTimeoutError，但锁一直占用到 fn 结束，
   * 同一键上的两个 fn 不会重叠。排队期间已超时的任务不会再执行 fn。
   * fn 永不结束时该键会一直被占用
   */
  run<T>(key: string, fn: () => Promise<T>, timeoutMs: number = this.timeoutMs): Promise<T> {
    let expired = false;

    const task = (this.tails.get(key) ?? Promise.resolve()).then(() => {
      if (expired) {
        throw new LockTimeoutError(key, timeoutMs);
      }
      return fn();
    });

    const tail: Promise<void> = task.then(noop, noop).then(() => {
      if (this.tails.get(key) === tail) {
        this.tails.delete(key);
      }
    });
    this.tails.set(key, tail);

    return withTimeout(task, timeoutMs, () => {
      expired = true;
      logger.warn({ key, timeoutMs }, '锁超时');
      return new LockTimeoutError(key, timeoutMs);
    });
  }
}
