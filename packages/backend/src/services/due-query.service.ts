/**
 * Due Query Service
 * 从复习流水重建每个词条的最新状态，返回到期词条
 *
 * 排序规则:
 * - 复习过的词条在前，按上次复习时间升序（超期最久的先出现）
 * - 从未复习的新词在后，随机顺序，避免每次都从词库开头取词
 */

import type { CardState, DueSummary, ScheduledCard, VocabularyItem } from '@lexiloop/shared';
import { AppError } from '../errors';
import { serviceLogger } from '../logger';
import type { ItemCatalogRepository, ReviewLedgerRepository } from '../repositories';
import { classifyCard, deriveState, isDue } from '../srs';
import { type Clock, systemClock } from '../utils/clock';
import { type RandomSource, shuffle } from '../utils/random';
import type { ExclusionPredicate } from './catalog.service';

const logger = serviceLogger.child({ module: 'due-query' });

export const DEFAULT_DUE_LIMIT = 20;

export interface DueQueryServiceOptions {
  isExcluded: ExclusionPredicate;
  clock?: Clock;
  random?: RandomSource;
}

export function toScheduledCard(
  item: Pick<VocabularyItem, 'id' | 'text' | 'meaning'>,
  state: CardState,
): ScheduledCard {
  return { ...state, itemId: item.id, text: item.text, meaning: item.meaning };
}

export class DueQueryService {
  private readonly isExcluded: ExclusionPredicate;
  private readonly clock: Clock;
  private readonly random: RandomSource;

  constructor(
    private readonly items: ItemCatalogRepository,
    private readonly ledger: ReviewLedgerRepository,
    options: DueQueryServiceOptions,
  ) {
    this.isExcluded = options.isExcluded;
    this.clock = options.clock ?? systemClock;
    this.random = options.random ?? Math.random;
  }

  /**
   * 到期词条，最多 limit 个
   */
  async loadDueItems(limit: number = DEFAULT_DUE_LIMIT): Promise<ScheduledCard[]> {
    if (!Number.isInteger(limit) || limit < 0) {
      throw AppError.badRequest(`limit 必须是非负整数，收到: ${limit}`);
    }

    const due = await this.collectDue();

    const reviewed = due
      .filter((card) => card.lastReviewedAt !== null)
      .sort((a, b) => reviewedAtMs(a) - reviewedAtMs(b));
    const fresh = shuffle(
      due.filter((card) => card.lastReviewedAt === null),
      this.random,
    );

    const result = [...reviewed, ...fresh].slice(0, limit);

    logger.debug(
      { limit, due: due.length, reviewed: reviewed.length, fresh: fresh.length },
      '到期词条查询完成',
    );
    return result;
  }

  /**
   * 全部到期词条按阶段计数
   */
  async dueSummary(): Promise<DueSummary> {
    const due = await this.collectDue();
    const summary: DueSummary = { total: due.length, new: 0, learning: 0, review: 0 };
    for (const card of due) {
      summary[classifyCard(card)] += 1;
    }
    return summary;
  }

  private async collectDue(): Promise<ScheduledCard[]> {
    const now = this.clock();
    const [items, latest] = await Promise.all([
      this.items.findAll(),
      this.ledger.findLatestForAll(),
    ]);

    const due: ScheduledCard[] = [];
    for (const item of items) {
      if (this.isExcluded(item)) {
        continue;
      }
      const state = deriveState(item.id, latest.get(item.id));
      if (isDue(state, now)) {
        due.push(toScheduledCard(item, state));
      }
    }
    return due;
  }
}

function reviewedAtMs(card: ScheduledCard): number {
  return card.lastReviewedAt ? card.lastReviewedAt.getTime() : 0;
}
