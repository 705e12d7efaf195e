/**
 * Catalog Service
 * 词库管理：添加、导入、查找词条，维护排除标记
 *
 * 调度核心只通过 isExcluded 读取排除标记，从不直接解析标签
 */

import {
  type CreateItemDto,
  type ImportItemsResult,
  type ItemFlag,
  type VocabularyItem,
  CreateItemSchema,
} from '@lexiloop/shared';
import type { ZodError } from 'zod';
import { env } from '../config/env';
import { AppError, ItemNotFoundError } from '../errors';
import { serviceLogger } from '../logger';
import type { ItemCatalogRepository } from '../repositories';

const logger = serviceLogger.child({ module: 'catalog' });

/**
 * 排除谓词：返回 true 的词条不会出现在到期列表中
 */
export type ExclusionPredicate = (item: VocabularyItem) => boolean;

export const SKIP_FLAG: ItemFlag = 'SKIP_MANUAL';

export interface CatalogServiceOptions {
  /** 旧数据中表示手动跳过的标签 */
  skipTag?: string;
}

export interface MarkSkippedResult {
  item: VocabularyItem;
  alreadySkipped: boolean;
}

function formatZodError(error: ZodError): string {
  const issue = error.errors[0];
  if (!issue) {
    return '词条数据不合法';
  }
  return issue.path.length > 0 ? `${issue.path.join('.')}: ${issue.message}` : issue.message;
}

/**
 * 统一大小写和空白，用于模糊查找
 */
export function normalizeText(text: string): string {
  return text.trim().replace(/\s+/g, ' ').toLocaleLowerCase();
}

export function hasFlag(item: VocabularyItem, flag: ItemFlag): boolean {
  return item.flags.includes(flag);
}

export class CatalogService {
  private readonly skipTag: string;

  constructor(
    private readonly items: ItemCatalogRepository,
    options: CatalogServiceOptions = {},
  ) {
    this.skipTag = options.skipTag ?? env.SKIP_TAG;
  }

  /**
   * 被手动跳过的词条不参与调度
   */
  readonly isExcluded: ExclusionPredicate = (item) => hasFlag(item, SKIP_FLAG);

  /**
   * 添加单个词条
   * @throws AppError VALIDATION_ERROR / CONFLICT
   */
  async addItem(input: unknown): Promise<VocabularyItem> {
    const parsed = CreateItemSchema.safeParse(input);
    if (!parsed.success) {
      throw AppError.badRequest(formatZodError(parsed.error), 'VALIDATION_ERROR');
    }

    const dto = this.applyLegacyTags(parsed.data);
    const existing = await this.items.findByText(dto.text);
    if (existing) {
      throw AppError.conflict(`词条已存在: ${dto.text}`);
    }

    const item = await this.items.create(dto);
    logger.info({ itemId: item.id, text: item.text }, '词条已添加');
    return item;
  }

  /**
   * 批量导入，重复或不合法的条目计入 skipped
   */
  async importItems(inputs: readonly unknown[]): Promise<ImportItemsResult> {
    const valid: CreateItemDto[] = [];
    let invalid = 0;

    inputs.forEach((input, index) => {
      const parsed = CreateItemSchema.safeParse(input);
      if (parsed.success) {
        valid.push(this.applyLegacyTags(parsed.data));
      } else {
        invalid += 1;
        logger.warn({ index, reason: formatZodError(parsed.error) }, '导入时跳过不合法的词条');
      }
    });

    const result = await this.items.createMany(valid);
    const summary = { added: result.added, skipped: result.skipped + invalid };

    logger.info(summary, '词条导入完成');
    return summary;
  }

  /**
   * @throws ItemNotFoundError
   */
  async getItem(id: string): Promise<VocabularyItem> {
    const item = await this.items.findById(id);
    if (!item) {
      throw new ItemNotFoundError(id);
    }
    return item;
  }

  /**
   * 先精确匹配，再忽略大小写和多余空白匹配
   */
  async findItem(text: string): Promise<VocabularyItem | null> {
    const exact = await this.items.findByText(text.trim());
    if (exact) {
      return exact;
    }

    const target = normalizeText(text);
    if (!target) {
      return null;
    }
    const all = await this.items.findAll();
    return all.find((item) => normalizeText(item.text) === target) ?? null;
  }

  async listItems(): Promise<VocabularyItem[]> {
    return this.items.findAll();
  }

  async markSkipped(id: string): Promise<MarkSkippedResult> {
    const item = await this.getItem(id);
    if (hasFlag(item, SKIP_FLAG)) {
      return { item, alreadySkipped: true };
    }

    const updated = await this.updateFlags(id, [...item.flags, SKIP_FLAG]);
    logger.info({ itemId: id }, '词条已标记为跳过');
    return { item: updated, alreadySkipped: false };
  }

  async unskip(id: string): Promise<VocabularyItem> {
    const item = await this.getItem(id);
    if (!hasFlag(item, SKIP_FLAG)) {
      return item;
    }

    const updated = await this.updateFlags(
      id,
      item.flags.filter((flag) => flag !== SKIP_FLAG),
    );
    logger.info({ itemId: id }, '词条已取消跳过');
    return updated;
  }

  private async updateFlags(id: string, flags: ItemFlag[]): Promise<VocabularyItem> {
    const updated = await this.items.updateFlags(id, flags);
    if (!updated) {
      throw new ItemNotFoundError(id);
    }
    return updated;
  }

  /**
   * 旧数据的跳过标签转换为类型化标记
   */
  private applyLegacyTags(dto: CreateItemDto): CreateItemDto {
    if (!dto.tags.includes(this.skipTag)) {
      return dto;
    }
    const flags = dto.flags.includes(SKIP_FLAG) ? dto.flags : [...dto.flags, SKIP_FLAG];
    return {
      ...dto,
      tags: dto.tags.filter((tag) => tag !== this.skipTag),
      flags,
    };
  }
}
