/**
 * 存储接口
 *
 * 服务层只依赖这些接口，不关心底层是哪种数据库
 */

import type {
  CreateItemDto,
  ImportItemsResult,
  ItemFlag,
  NewReviewEvent,
  ReviewEvent,
  VocabularyItem,
} from '@lexiloop/shared';

/**
 * 时间窗口：from 含，to 不含
 */
export interface LedgerWindow {
  from?: Date;
  to?: Date;
}

export interface LedgerAggregate {
  count: number;
  /** 评分 >= 3 的条数 */
  successes: number;
  qualitySum: number;
}

/**
 * 复习流水仓库（只追加）
 *
 * "最新"按 reviewedAt 排序，时间相同时按追加顺序
 */
export interface ReviewLedgerRepository {
  append(event: NewReviewEvent): Promise<ReviewEvent>;
  findLatest(itemId: string): Promise<ReviewEvent | null>;
  findLatestForAll(): Promise<Map<string, ReviewEvent>>;
  /** 最新的在前 */
  findRecent(itemId: string, limit: number): Promise<ReviewEvent[]>;
  /** 有过失败记录的词条，最近失败的在前 */
  findFailingItemIds(limit: number): Promise<string[]>;
  aggregate(window?: LedgerWindow): Promise<LedgerAggregate>;
  countItemsFirstReviewedSince(from: Date): Promise<number>;
}

/**
 * 词库仓库
 */
export interface ItemCatalogRepository {
  create(input: CreateItemDto): Promise<VocabularyItem>;
  /** 文本重复的词条跳过 */
  createMany(inputs: CreateItemDto[]): Promise<ImportItemsResult>;
  findById(id: string): Promise<VocabularyItem | null>;
  findByText(text: string): Promise<VocabularyItem | null>;
  findAll(): Promise<VocabularyItem[]>;
  count(): Promise<number>;
  updateFlags(id: string, flags: ItemFlag[]): Promise<VocabularyItem | null>;
}
