/**
 * Retention Service
 * 保持率与质量趋势，供外部的出题/节奏策略参考
 *
 * 只读，不修改复习流水
 */

import { type QualityTrend, type RetentionStats, addDays } from '@lexiloop/shared';
import { serviceLogger } from '../logger';
import type { LedgerAggregate, ReviewLedgerRepository } from '../repositories';
import { RECENT_WINDOW_DAYS, TREND_THRESHOLD } from '../srs';
import { type Clock, systemClock } from '../utils/clock';

const logger = serviceLogger.child({ module: 'retention' });

export interface RetentionServiceOptions {
  clock?: Clock;
}

/**
 * 答对率（百分比），没有记录时为 0
 */
export function ratePct(aggregate: LedgerAggregate): number {
  return aggregate.count > 0 ? (aggregate.successes / aggregate.count) * 100 : 0;
}

/**
 * 平均评分，没有记录时为 0
 */
export function meanQuality(aggregate: LedgerAggregate): number {
  return aggregate.count > 0 ? aggregate.qualitySum / aggregate.count : 0;
}

/**
 * 近期均值与更早均值比较
 *
 * 没有更早记录时 olderMean 按 0 计算，因此冷启动阶段近期均值 > 0.3 即判定为 improving
 */
export function classifyTrend(recentMean: number, olderMean: number): QualityTrend {
  if (recentMean > olderMean + TREND_THRESHOLD) {
    return 'improving';
  }
  if (recentMean < olderMean - TREND_THRESHOLD) {
    return 'declining';
  }
  return 'stable';
}

export class RetentionService {
  private readonly clock: Clock;

  constructor(
    private readonly ledger: ReviewLedgerRepository,
    options: RetentionServiceOptions = {},
  ) {
    this.clock = options.clock ?? systemClock;
  }

  async retentionStats(): Promise<RetentionStats> {
    const windowStart = addDays(this.clock(), -RECENT_WINDOW_DAYS);

    const [overall, recent, older] = await Promise.all([
      this.ledger.aggregate(),
      this.ledger.aggregate({ from: windowStart }),
      this.ledger.aggregate({ to: windowStart }),
    ]);

    const recentMeanQuality = meanQuality(recent);
    const olderMeanQuality = meanQuality(older);

    const stats: RetentionStats = {
      overallRatePct: ratePct(overall),
      recent7dRatePct: ratePct(recent),
      totalReviews: overall.count,
      recent7dReviews: recent.count,
      recentMeanQuality,
      olderMeanQuality,
      trend: classifyTrend(recentMeanQuality, olderMeanQuality),
    };

    logger.debug(stats, '保持率统计完成');
    return stats;
  }
}
