/**
 * 间隔重复（SM-2）相关类型
 */

/**
 * 回忆质量评分
 * 0 完全想不起 / 1 看到答案才认出 / 2 答错但眼熟
 * 3 勉强答对 / 4 略有迟疑 / 5 完美回忆
 */
export type ReviewQuality = 0 | 1 | 2 | 3 | 4 | 5;

/**
 * 卡片调度状态（由复习流水推导，不单独存储）
 */
export interface CardState {
  itemId: string;
  easeFactor: number;
  /** 间隔天数，可以是小数（学习步长不足一天） */
  interval: number;
  repetition: number;
  lastReviewedAt: Date | null;
}

/**
 * 携带词条文本的卡片，用于到期/顽固词查询结果
 */
export interface ScheduledCard extends CardState {
  text: string;
  meaning: string;
}

export interface LeechCard extends ScheduledCard {
  consecutiveFailures: number;
}

/**
 * 复习流水中的一条记录（只追加，不修改）
 * 保存的是本次复习之后的状态快照
 */
export interface ReviewEvent {
  id: number;
  itemId: string;
  reviewedAt: Date;
  quality: ReviewQuality;
  easeFactor: number;
  interval: number;
  repetition: number;
}

export type NewReviewEvent = Omit<ReviewEvent, 'id'>;

export type CardPhase = 'new' | 'learning' | 'review';

export type QualityTrend = 'improving' | 'declining' | 'stable';

export interface RetentionStats {
  overallRatePct: number;
  recent7dRatePct: number;
  totalReviews: number;
  recent7dReviews: number;
  recentMeanQuality: number;
  olderMeanQuality: number;
  trend: QualityTrend;
}

export interface DueSummary {
  total: number;
  new: number;
  learning: number;
  review: number;
}
