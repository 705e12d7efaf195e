/**
 * Progress Service
 * 学习进度快照：词库规模、掌握情况、保持率、顽固词和到期概况
 *
 * 只返回结构化数据，文案由调用方生成
 */

import type { DueSummary, LeechCard, RetentionStats, ScheduledCard } from '@lexiloop/shared';
import { serviceLogger } from '../logger';
import type { ItemCatalogRepository, ReviewLedgerRepository } from '../repositories';
import { MASTERED_INTERVAL_DAYS, stateFromEvent } from '../srs';
import { type DueQueryService, toScheduledCard } from './due-query.service';
import type { LeechService } from './leech.service';
import type { RetentionService } from './retention.service';

const logger = serviceLogger.child({ module: 'progress' });

const SNAPSHOT_LEECH_LIMIT = 8;
const STRUGGLING_LIMIT = 10;
const STRONGEST_LIMIT = 5;
const STRUGGLING_EASE = 2.0;

const FOCUS_REVIEW_MIN_RECENT = 5;
const ADD_NEW_MIN_RECENT = 10;
const ADD_NEW_RATE_PCT = 85;

export type ProgressRecommendation = 'focus_review' | 'add_new_items';

export interface ProgressSnapshot {
  totalItems: number;
  /** 至少复习过一次的词条数 */
  seenItems: number;
  masteredItems: number;
  totalReviews: number;
  retention: RetentionStats;
  recommendation: ProgressRecommendation | null;
  leeches: LeechCard[];
  struggling: ScheduledCard[];
  strongest: ScheduledCard[];
  due: DueSummary;
}

export function recommend(stats: RetentionStats): ProgressRecommendation | null {
  if (stats.trend === 'declining' && stats.recent7dReviews > FOCUS_REVIEW_MIN_RECENT) {
    return 'focus_review';
  }
  if (stats.recent7dRatePct > ADD_NEW_RATE_PCT && stats.recent7dReviews > ADD_NEW_MIN_RECENT) {
    return 'add_new_items';
  }
  return null;
}

export function isStruggling(card: ScheduledCard): boolean {
  return card.easeFactor < STRUGGLING_EASE || card.repetition === 0;
}

export class ProgressService {
  constructor(
    private readonly items: ItemCatalogRepository,
    private readonly ledger: ReviewLedgerRepository,
    private readonly dueQuery: DueQueryService,
    private readonly leech: LeechService,
    private readonly retention: RetentionService,
  ) {}

  async snapshot(): Promise<ProgressSnapshot> {
    const [items, latest, retention, leeches, due] = await Promise.all([
      this.items.findAll(),
      this.ledger.findLatestForAll(),
      this.retention.retentionStats(),
      this.leech.listLeeches(SNAPSHOT_LEECH_LIMIT),
      this.dueQuery.dueSummary(),
    ]);

    const seen: ScheduledCard[] = [];
    for (const item of items) {
      const event = latest.get(item.id);
      if (event) {
        seen.push(toScheduledCard(item, stateFromEvent(event)));
      }
    }

    const struggling = seen
      .filter(isStruggling)
      .sort((a, b) => a.easeFactor - b.easeFactor || a.interval - b.interval)
      .slice(0, STRUGGLING_LIMIT);

    const strongest = [...seen]
      .sort((a, b) => b.interval - a.interval)
      .slice(0, STRONGEST_LIMIT);

    const snapshot: ProgressSnapshot = {
      totalItems: items.length,
      seenItems: seen.length,
      masteredItems: seen.filter((card) => card.interval >= MASTERED_INTERVAL_DAYS).length,
      totalReviews: retention.totalReviews,
      retention,
      recommendation: recommend(retention),
      leeches,
      struggling,
      strongest,
      due,
    };

    logger.debug(
      {
        totalItems: snapshot.totalItems,
        seenItems: snapshot.seenItems,
        masteredItems: snapshot.masteredItems,
        recommendation: snapshot.recommendation,
      },
      '进度快照生成完成',
    );
    return snapshot;
  }
}
