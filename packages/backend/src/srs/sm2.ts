/**
 * SM-2 状态转移
 *
 * 在经典 SM-2 基础上增加:
 * - 学习步长：首次答对只安排约 20 分钟后再次出现，第二次答对才毕业到 1 天
 * - 超期衰减：严重超期后的一次答对不足以证明长期记忆，限制间隔增长
 *
 * 纯函数，除 now 外不依赖任何外部状态
 */

import { type CardState, type ReviewQuality, daysBetween, isReviewQuality } from '@lexiloop/shared';
import { InvalidRatingError } from '../errors';
import { srsLogger } from '../logger';
import {
  GRADUATION_INTERVAL,
  LEARNING_STEP,
  MIN_EASE,
  OVERDUE_GROWTH_CAP,
  OVERDUE_RATIO_THRESHOLD,
  PASSING_QUALITY,
  SECOND_INTERVAL,
} from './constants';

/**
 * 标准 SM-2 难度因子调整，结果不低于 MIN_EASE
 */
export function adjustEase(easeFactor: number, quality: ReviewQuality): number {
  const miss = 5 - quality;
  const ease = easeFactor + (0.1 - miss * (0.08 + miss * 0.02));
  return Math.max(MIN_EASE, ease);
}

/**
 * 校验评分，非法评分抛出 InvalidRatingError
 */
export function assertQuality(quality: unknown): ReviewQuality {
  if (!isReviewQuality(quality)) {
    throw new InvalidRatingError(quality);
  }
  return quality;
}

/**
 * 根据当前状态和评分计算下一个状态
 *
 * 返回新对象，不修改输入
 */
export function computeNextState(state: CardState, quality: number, now: Date = new Date()): CardState {
  const q = assertQuality(quality);
  const easeFactor = adjustEase(state.easeFactor, q);

  // 答错：完全重置，下次答对重新走学习步长
  if (q < PASSING_QUALITY) {
    return {
      itemId: state.itemId,
      easeFactor,
      interval: 0,
      repetition: 0,
      lastReviewedAt: now,
    };
  }

  let interval: number;
  if (state.repetition === 0) {
    interval = LEARNING_STEP;
  } else if (state.repetition === 1) {
    interval = GRADUATION_INTERVAL;
  } else if (state.repetition === 2) {
    interval = SECOND_INTERVAL;
  } else {
    interval = state.interval * easeFactor;
  }

  if (state.interval > 1 && state.lastReviewedAt) {
    const overdueRatio = daysBetween(state.lastReviewedAt, now) / state.interval;
    if (overdueRatio > OVERDUE_RATIO_THRESHOLD) {
      const capped = Math.min(interval, state.interval * OVERDUE_GROWTH_CAP);
      srsLogger.debug(
        { itemId: state.itemId, overdueRatio, interval, capped },
        '严重超期，限制间隔增长',
      );
      interval = capped;
    }
  }

  return {
    itemId: state.itemId,
    easeFactor,
    interval,
    repetition: state.repetition + 1,
    lastReviewedAt: now,
  };
}
