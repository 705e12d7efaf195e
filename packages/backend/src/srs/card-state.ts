/**
 * 卡片状态推导与判定
 */

import {
  type CardPhase,
  type CardState,
  type ReviewEvent,
  addDays,
  daysBetween,
} from '@lexiloop/shared';
import { DEFAULT_EASE } from './constants';

/**
 * 从未复习过的词条的隐式初始状态
 */
export function createVirginState(itemId: string): CardState {
  return {
    itemId,
    easeFactor: DEFAULT_EASE,
    interval: 0,
    repetition: 0,
    lastReviewedAt: null,
  };
}

/**
 * 复习记录中保存的就是复习后的状态快照
 */
export function stateFromEvent(event: ReviewEvent): CardState {
  return {
    itemId: event.itemId,
    easeFactor: event.easeFactor,
    interval: event.interval,
    repetition: event.repetition,
    lastReviewedAt: event.reviewedAt,
  };
}

export function deriveState(itemId: string, latest: ReviewEvent | null | undefined): CardState {
  return latest ? stateFromEvent(latest) : createVirginState(itemId);
}

/**
 * 到期时间；从未复习返回 null（始终到期）
 */
export function dueAt(state: CardState): Date | null {
  if (!state.lastReviewedAt) {
    return null;
  }
  return addDays(state.lastReviewedAt, state.interval);
}

export function isDue(state: CardState, now: Date = new Date()): boolean {
  const due = dueAt(state);
  return due === null || now.getTime() >= due.getTime();
}

/**
 * 超期程度：1.0 表示按时，>1 表示超期
 */
export function overdueFactor(state: CardState, now: Date = new Date()): number {
  if (!state.lastReviewedAt || state.interval <= 0) {
    return 1.0;
  }
  const daysSince = daysBetween(state.lastReviewedAt, now);
  return Math.max(1.0, daysSince / state.interval);
}

/**
 * 仍处于学习阶段（尚未越过 1 天这一步）
 */
export function isLearning(state: CardState): boolean {
  return state.repetition < 2;
}

export function classifyCard(state: CardState): CardPhase {
  if (!state.lastReviewedAt) {
    return 'new';
  }
  return isLearning(state) ? 'learning' : 'review';
}
