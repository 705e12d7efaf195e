/**
 * Leech Service
 * 顽固词检测：连续答错达到阈值的词条需要调用方单独处理（例如重新讲解）
 */

import type { LeechCard, ReviewEvent } from '@lexiloop/shared';
import { AppError, ItemNotFoundError } from '../errors';
import { serviceLogger } from '../logger';
import type { ItemCatalogRepository, ReviewLedgerRepository } from '../repositories';
import {
  FAILURE_LOOKBACK,
  LEECH_CANDIDATE_MULTIPLIER,
  LEECH_THRESHOLD,
  PASSING_QUALITY,
  deriveState,
} from '../srs';
import { toScheduledCard } from './due-query.service';

const logger = serviceLogger.child({ module: 'leech' });

export const DEFAULT_LEECH_LIMIT = 20;

/**
 * 从最新一条往前数连续失败次数，遇到答对即停止
 * @param events - 最新的在前
 */
export function countConsecutiveFailures(events: readonly ReviewEvent[]): number {
  let count = 0;
  for (const event of events) {
    if (event.quality >= PASSING_QUALITY) {
      break;
    }
    count += 1;
  }
  return count;
}

export class LeechService {
  constructor(
    private readonly items: ItemCatalogRepository,
    private readonly ledger: ReviewLedgerRepository,
  ) {}

  /**
   * 最多回看 FAILURE_LOOKBACK 条记录
   * @throws ItemNotFoundError
   */
  async consecutiveFailures(itemId: string): Promise<number> {
    await this.requireItem(itemId);
    const recent = await this.ledger.findRecent(itemId, FAILURE_LOOKBACK);
    return countConsecutiveFailures(recent);
  }

  async isLeech(itemId: string): Promise<boolean> {
    return (await this.consecutiveFailures(itemId)) >= LEECH_THRESHOLD;
  }

  /**
   * 顽固词列表
   *
   * 只在最近有失败记录的词条中查找（候选池为 limit 的若干倍），最近失败的在前
   */
  async listLeeches(limit: number = DEFAULT_LEECH_LIMIT): Promise<LeechCard[]> {
    if (!Number.isInteger(limit) || limit < 0) {
      throw AppError.badRequest(`limit 必须是非负整数，收到: ${limit}`);
    }
    if (limit === 0) {
      return [];
    }

    const candidateIds = await this.ledger.findFailingItemIds(limit * LEECH_CANDIDATE_MULTIPLIER);
    const leeches: LeechCard[] = [];

    for (const itemId of candidateIds) {
      const item = await this.items.findById(itemId);
      if (!item) {
        continue;
      }

      const recent = await this.ledger.findRecent(itemId, FAILURE_LOOKBACK);
      const failures = countConsecutiveFailures(recent);
      if (failures >= LEECH_THRESHOLD) {
        leeches.push({
          ...toScheduledCard(item, deriveState(itemId, recent[0])),
          consecutiveFailures: failures,
        });
      }

      if (leeches.length >= limit) {
        break;
      }
    }

    if (leeches.length > 0) {
      logger.warn(
        { count: leeches.length, itemIds: leeches.map((card) => card.itemId) },
        '发现顽固词',
      );
    }
    return leeches;
  }

  private async requireItem(itemId: string): Promise<void> {
    const item = await this.items.findById(itemId);
    if (!item) {
      throw new ItemNotFoundError(itemId);
    }
  }
}
