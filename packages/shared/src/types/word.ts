/**
 * 词条相关类型
 */

/**
 * 词条排除标记
 * 由词库维护，调度核心只通过 isExcluded 谓词读取
 */
export type ItemFlag = 'SKIP_MANUAL';

export interface VocabularyItem {
  id: string;
  /** 主文本（要学习的单词/短语） */
  text: string;
  /** 释义 */
  meaning: string;
  /** 自由标签，核心不解释其含义 */
  tags: string[];
  flags: ItemFlag[];
  createdAt: Date;
}

export interface ImportItemsResult {
  added: number;
  skipped: number;
}
