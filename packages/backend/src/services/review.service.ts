/**
 * Review Service
 * 记录复习结果：读取最新状态 → 计算新状态 → 追加一条复习记录
 */

import type { CardState, ReviewEvent } from '@lexiloop/shared';
import { env } from '../config/env';
import { ItemNotFoundError } from '../errors';
import { serviceLogger } from '../logger';
import type { ItemCatalogRepository, ReviewLedgerRepository } from '../repositories';
import { assertQuality, computeNextState, deriveState } from '../srs';
import { type Clock, systemClock } from '../utils/clock';
import { KeyedLock } from '../utils/keyed-lock';

const logger = serviceLogger.child({ module: 'review' });

export interface ReviewServiceOptions {
  clock?: Clock;
  lockTimeoutMs?: number;
}

export class ReviewService {
  private readonly clock: Clock;
  private readonly lock: KeyedLock;

  constructor(
    private readonly items: ItemCatalogRepository,
    private readonly ledger: ReviewLedgerRepository,
    options: ReviewServiceOptions = {},
  ) {
    this.clock = options.clock ?? systemClock;
    this.lock = new KeyedLock(options.lockTimeoutMs ?? env.ITEM_LOCK_TIMEOUT_MS);
  }

  /**
   * 当前调度状态，从未复习过返回初始状态
   * @throws ItemNotFoundError
   */
  async getCardState(itemId: string): Promise<CardState> {
    await this.requireItem(itemId);
    const latest = await this.ledger.findLatest(itemId);
    return deriveState(itemId, latest);
  }

  /**
   * 记录一次复习并返回新状态
   *
   * 评分在任何读写之前校验；同一词条的读写串行执行
   * @throws InvalidRatingError | ItemNotFoundError
   */
  async recordReview(itemId: string, quality: number): Promise<CardState> {
    const q = assertQuality(quality);

    return this.lock.run(itemId, async () => {
      await this.requireItem(itemId);

      const latest = await this.ledger.findLatest(itemId);
      const current = deriveState(itemId, latest);
      const now = this.clock();
      const next = computeNextState(current, q, now);

      const event: ReviewEvent = await this.ledger.append({
        itemId,
        reviewedAt: now,
        quality: q,
        easeFactor: next.easeFactor,
        interval: next.interval,
        repetition: next.repetition,
      });

      logger.info(
        {
          itemId,
          eventId: event.id,
          quality: q,
          easeFactor: next.easeFactor,
          interval: next.interval,
          repetition: next.repetition,
        },
        '复习已记录',
      );
      return next;
    });
  }

  /**
   * 用户声明已经掌握，按满分记录
   */
  async markKnown(itemId: string): Promise<CardState> {
    return this.recordReview(itemId, 5);
  }

  private async requireItem(itemId: string): Promise<void> {
    const item = await this.items.findById(itemId);
    if (!item) {
      throw new ItemNotFoundError(itemId);
    }
  }
}
