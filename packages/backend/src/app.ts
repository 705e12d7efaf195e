/**
 * 应用装配
 *
 * 打开数据库，创建仓库与服务，并对外暴露统一的操作入口
 */

import { env } from './config/env';
import { type SqliteDatabase, openDatabase } from './database/sqlite';
import { startupLogger } from './logger';
import {
  type ItemCatalogRepository,
  type ReviewLedgerRepository,
  SqliteItemCatalogRepository,
  SqliteReviewLedgerRepository,
} from './repositories';
import {
  CatalogService,
  DueQueryService,
  LeechService,
  ProgressService,
  RetentionService,
  ReviewService,
  WordSelectionService,
} from './services';
import { type Clock, systemClock } from './utils/clock';
import type { RandomSource } from './utils/random';

export interface LexiloopOptions {
  /** 默认取 DATABASE_PATH */
  databasePath?: string;
  clock?: Clock;
  random?: RandomSource;
  newItemsPerDay?: number;
  recallProbability?: number;
  lockTimeoutMs?: number;
}

export interface Lexiloop {
  readonly db: SqliteDatabase;
  readonly items: ItemCatalogRepository;
  readonly ledger: ReviewLedgerRepository;
  readonly catalog: CatalogService;
  readonly reviews: ReviewService;
  readonly dueQuery: DueQueryService;
  readonly leeches: LeechService;
  readonly retention: RetentionService;
  readonly selection: WordSelectionService;
  readonly progress: ProgressService;
  close(): void;
}

export function createLexiloop(options: LexiloopOptions = {}): Lexiloop {
  const databasePath = options.databasePath ?? env.DATABASE_PATH;
  const clock = options.clock ?? systemClock;
  const random = options.random ?? Math.random;

  const db = openDatabase(databasePath);
  const items = new SqliteItemCatalogRepository(db, clock);
  const ledger = new SqliteReviewLedgerRepository(db);

  const catalog = new CatalogService(items);
  const reviews = new ReviewService(items, ledger, {
    clock,
    lockTimeoutMs: options.lockTimeoutMs,
  });
  const dueQuery = new DueQueryService(items, ledger, {
    isExcluded: catalog.isExcluded,
    clock,
    random,
  });
  const leeches = new LeechService(items, ledger);
  const retention = new RetentionService(ledger, { clock });
  const selection = new WordSelectionService(dueQuery, retention, ledger, {
    newItemsPerDay: options.newItemsPerDay,
    recallProbability: options.recallProbability,
    clock,
    random,
  });
  const progress = new ProgressService(items, ledger, dueQuery, leeches, retention);

  startupLogger.info({ databasePath }, 'lexiloop 已初始化');

  return {
    db,
    items,
    ledger,
    catalog,
    reviews,
    dueQuery,
    leeches,
    retention,
    selection,
    progress,
    close() {
      db.close();
      startupLogger.info({ databasePath }, 'lexiloop 已关闭');
    },
  };
}
