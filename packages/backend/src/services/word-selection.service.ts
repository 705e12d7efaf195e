/**
 * 单词选择服务
 * Word Selection Service
 *
 * 职责：
 * - 在到期词条基础上为一条消息挑选学习中/复习/新词的组合
 * - 为主动回忆测验挑选复习词
 * - 根据保持率趋势调整回忆测验的频率
 */

import {
  type RetentionStats,
  type ScheduledCard,
  startOfLocalDay,
} from '@lexiloop/shared';
import { env } from '../config/env';
import { serviceLogger } from '../logger';
import type { ReviewLedgerRepository } from '../repositories';
import { classifyCard } from '../srs';
import { type Clock, systemClock } from '../utils/clock';
import { type RandomSource, sample, shuffle } from '../utils/random';
import type { DueQueryService } from './due-query.service';
import type { RetentionService } from './retention.service';

const logger = serviceLogger.child({ module: 'word-selection' });

// ========== 常量 ==========

/** 消息选词时考察的到期词条数 */
const MESSAGE_CANDIDATE_POOL = 15;
/** 回忆测验时考察的到期词条数 */
const RECALL_CANDIDATE_POOL = 20;

const MAX_LEARNING_PER_MESSAGE = 2;
const MIN_WORDS_PER_MESSAGE = 3;
const MAX_WORDS_PER_MESSAGE = 5;
const MAX_RECALL_WORDS = 2;

/** 回忆测验偏好的间隔范围（天）：太新没东西可回忆，太熟没有测验价值 */
const RECALL_MIN_INTERVAL = 1.0;
const RECALL_MAX_INTERVAL = 30.0;

// 保持率下降时提高回忆频率，保持率很高时降低
const DECLINING_RECALL_BOOST = 0.15;
const DECLINING_RECALL_MAX = 0.5;
const STRONG_RETENTION_PCT = 85;
const STRONG_RETENTION_MIN_REVIEWS = 10;
const STRONG_RECALL_CUT = 0.1;
const STRONG_RECALL_MIN = 0.15;

// ========== 类型定义 ==========

export interface SelectForMessageOptions {
  newLimit?: number;
  reviewLimit?: number;
}

export interface SelectionResult {
  cards: ScheduledCard[];
  reason: string;
}

export interface WordSelectionServiceOptions {
  newItemsPerDay?: number;
  recallProbability?: number;
  clock?: Clock;
  random?: RandomSource;
}

/**
 * 根据保持率统计调整回忆测验概率
 */
export function adjustRecallProbability(stats: RetentionStats, base: number): number {
  if (stats.trend === 'declining') {
    return Math.min(DECLINING_RECALL_MAX, base + DECLINING_RECALL_BOOST);
  }
  if (
    stats.recent7dRatePct > STRONG_RETENTION_PCT &&
    stats.recent7dReviews > STRONG_RETENTION_MIN_REVIEWS
  ) {
    return Math.max(STRONG_RECALL_MIN, base - STRONG_RECALL_CUT);
  }
  return base;
}

// ========== 服务类 ==========

export class WordSelectionService {
  private readonly newItemsPerDay: number;
  private readonly recallProbability: number;
  private readonly clock: Clock;
  private readonly random: RandomSource;

  constructor(
    private readonly dueQuery: DueQueryService,
    private readonly retention: RetentionService,
    private readonly ledger: ReviewLedgerRepository,
    options: WordSelectionServiceOptions = {},
  ) {
    this.newItemsPerDay = options.newItemsPerDay ?? env.NEW_ITEMS_PER_DAY;
    this.recallProbability = options.recallProbability ?? env.RECALL_PROBABILITY;
    this.clock = options.clock ?? systemClock;
    this.random = options.random ?? Math.random;
  }

  /**
   * 今天还能引入的新词数量
   */
  async remainingNewQuota(): Promise<number> {
    const introducedToday = await this.ledger.countItemsFirstReviewedSince(
      startOfLocalDay(this.clock()),
    );
    return Math.max(0, this.newItemsPerDay - introducedToday);
  }

  /**
   * 为一条消息选词
   *
   * 优先级：学习中的词（需要第二次见面）→ 复习词 → 新词；
   * 不足 3 个时从剩余到期词条中补齐
   */
  async selectForMessage(options: SelectForMessageOptions = {}): Promise<SelectionResult> {
    const { newLimit = 3, reviewLimit = 3 } = options;

    const due = await this.dueQuery.loadDueItems(MESSAGE_CANDIDATE_POOL);
    const learning = due.filter((card) => classifyCard(card) === 'learning');
    const review = due.filter((card) => classifyCard(card) === 'review');
    const fresh = due.filter((card) => classifyCard(card) === 'new');
    let newBudget = await this.remainingNewQuota();

    const selected: ScheduledCard[] = [];
    selected.push(...learning.slice(0, MAX_LEARNING_PER_MESSAGE));
    selected.push(...review.slice(0, Math.max(0, reviewLimit - selected.length)));

    const newSlots = Math.min(
      newLimit,
      Math.max(0, MAX_WORDS_PER_MESSAGE - selected.length),
      newBudget,
    );
    const pickedNew = fresh.slice(0, newSlots);
    selected.push(...pickedNew);
    newBudget -= pickedNew.length;

    if (selected.length < MIN_WORDS_PER_MESSAGE) {
      const chosen = new Set(selected.map((card) => card.itemId));
      for (const card of due) {
        if (selected.length >= MIN_WORDS_PER_MESSAGE) {
          break;
        }
        if (chosen.has(card.itemId)) {
          continue;
        }
        if (classifyCard(card) === 'new') {
          if (newBudget <= 0) {
            continue;
          }
          newBudget -= 1;
        }
        selected.push(card);
        chosen.add(card.itemId);
      }
    }

    const counts = { learning: 0, review: 0, new: 0 };
    for (const card of selected) {
      counts[classifyCard(card)] += 1;
    }
    const reason = `学习中 ${counts.learning} 个 + 复习 ${counts.review} 个 + 新词 ${counts.new} 个`;

    logger.debug({ due: due.length, ...counts }, `[WordSelection] 消息选词: ${reason}`);
    return { cards: shuffle(selected, this.random), reason };
  }

  /**
   * 为主动回忆测验选 1-2 个词
   *
   * 只选复习过的词，优先已毕业且间隔适中的
   */
  async selectForRecall(): Promise<SelectionResult> {
    const due = await this.dueQuery.loadDueItems(RECALL_CANDIDATE_POOL);
    const reviewed = due.filter((card) => card.lastReviewedAt !== null);

    let candidates = reviewed.filter((card) => card.repetition >= 2);
    let reason = '已毕业的到期复习词';
    if (candidates.length === 0) {
      candidates = reviewed;
      reason = '学习中的到期词';
    }

    if (candidates.length === 0) {
      return { cards: [], reason: '没有可回忆的词' };
    }

    const moderate = candidates.filter(
      (card) => card.interval >= RECALL_MIN_INTERVAL && card.interval <= RECALL_MAX_INTERVAL,
    );
    if (moderate.length > 0) {
      candidates = moderate;
      reason = `间隔 ${RECALL_MIN_INTERVAL}-${RECALL_MAX_INTERVAL} 天的${reason}`;
    }

    return { cards: sample(candidates, MAX_RECALL_WORDS, this.random), reason };
  }

  /**
   * 本次是否使用回忆测验模式
   */
  async shouldUseRecall(): Promise<boolean> {
    const stats = await this.retention.retentionStats();
    const probability = adjustRecallProbability(stats, this.recallProbability);
    logger.debug(
      { trend: stats.trend, recent7dRatePct: stats.recent7dRatePct, probability },
      '[WordSelection] 回忆测验概率',
    );
    return this.random() < probability;
  }
}
