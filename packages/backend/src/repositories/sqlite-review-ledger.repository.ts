/**
 * 复习流水仓库 - SQLite 实现
 */

import { type NewReviewEvent, type ReviewEvent, isReviewQuality } from '@lexiloop/shared';
import type { SqliteDatabase } from '../database/sqlite';
import { AppError } from '../errors';
import { PASSING_QUALITY } from '../srs/constants';
import type { LedgerAggregate, LedgerWindow, ReviewLedgerRepository } from './types';

type ReviewEventRow = {
  id: number;
  item_id: string;
  reviewed_at: number;
  quality: number;
  ease_factor: number;
  interval_days: number;
  repetition: number;
};

type AggregateRow = {
  count: number;
  successes: number;
  quality_sum: number;
};

type WindowParams = {
  from: number | null;
  to: number | null;
};

const EVENT_COLUMNS = 'id, item_id, reviewed_at, quality, ease_factor, interval_days, repetition';

function toReviewEvent(row: ReviewEventRow): ReviewEvent {
  // 表上有 CHECK 约束，这里只是把数字收窄为评分类型
  if (!isReviewQuality(row.quality)) {
    throw AppError.internal(`复习记录 ${row.id} 的评分非法: ${row.quality}`);
  }
  return {
    id: row.id,
    itemId: row.item_id,
    reviewedAt: new Date(row.reviewed_at),
    quality: row.quality,
    easeFactor: row.ease_factor,
    interval: row.interval_days,
    repetition: row.repetition,
  };
}

export class SqliteReviewLedgerRepository implements ReviewLedgerRepository {
  constructor(private readonly db: SqliteDatabase) {}

  async append(event: NewReviewEvent): Promise<ReviewEvent> {
    const result = this.db
      .prepare<[string, number, number, number, number, number]>(
        `INSERT INTO review_events (item_id, reviewed_at, quality, ease_factor, interval_days, repetition)
         VALUES (?, ?, ?, ?, ?, ?)`,
      )
      .run(
        event.itemId,
        event.reviewedAt.getTime(),
        event.quality,
        event.easeFactor,
        event.interval,
        event.repetition,
      );

    return { id: Number(result.lastInsertRowid), ...event };
  }

  async findLatest(itemId: string): Promise<ReviewEvent | null> {
    const row = this.db
      .prepare<[string], ReviewEventRow>(
        `SELECT ${EVENT_COLUMNS} FROM review_events
         WHERE item_id = ?
         ORDER BY reviewed_at DESC, id DESC
         LIMIT 1`,
      )
      .get(itemId);
    return row ? toReviewEvent(row) : null;
  }

  async findLatestForAll(): Promise<Map<string, ReviewEvent>> {
    const rows = this.db
      .prepare<[], ReviewEventRow>(
        `SELECT ${EVENT_COLUMNS} FROM (
           SELECT ${EVENT_COLUMNS},
                  ROW_NUMBER() OVER (PARTITION BY item_id ORDER BY reviewed_at DESC, id DESC) AS rn
           FROM review_events
         ) WHERE rn = 1`,
      )
      .all();

    const latest = new Map<string, ReviewEvent>();
    for (const row of rows) {
      latest.set(row.item_id, toReviewEvent(row));
    }
    return latest;
  }

  async findRecent(itemId: string, limit: number): Promise<ReviewEvent[]> {
    const rows = this.db
      .prepare<[string, number], ReviewEventRow>(
        `SELECT ${EVENT_COLUMNS} FROM review_events
         WHERE item_id = ?
         ORDER BY reviewed_at DESC, id DESC
         LIMIT ?`,
      )
      .all(itemId, limit);
    return rows.map(toReviewEvent);
  }

  async findFailingItemIds(limit: number): Promise<string[]> {
    const rows = this.db
      .prepare<[number, number], { item_id: string }>(
        `SELECT item_id FROM review_events
         WHERE quality < ?
         GROUP BY item_id
         ORDER BY MAX(reviewed_at) DESC, MAX(id) DESC
         LIMIT ?`,
      )
      .all(PASSING_QUALITY, limit);
    return rows.map((row) => row.item_id);
  }

  async aggregate(window: LedgerWindow = {}): Promise<LedgerAggregate> {
    const row = this.db
      .prepare<[WindowParams & { passing: number }], AggregateRow>(
        `SELECT COUNT(*) AS count,
                COALESCE(SUM(CASE WHEN quality >= @passing THEN 1 ELSE 0 END), 0) AS successes,
                COALESCE(SUM(quality), 0) AS quality_sum
         FROM review_events
         WHERE (@from IS NULL OR reviewed_at >= @from)
           AND (@to IS NULL OR reviewed_at < @to)`,
      )
      .get({
        from: window.from ? window.from.getTime() : null,
        to: window.to ? window.to.getTime() : null,
        passing: PASSING_QUALITY,
      });

    return {
      count: row?.count ?? 0,
      successes: row?.successes ?? 0,
      qualitySum: row?.quality_sum ?? 0,
    };
  }

  async countItemsFirstReviewedSince(from: Date): Promise<number> {
    const row = this.db
      .prepare<[number], { count: number }>(
        `SELECT COUNT(*) AS count FROM (
           SELECT item_id, MIN(reviewed_at) AS first_reviewed_at
           FROM review_events
           GROUP BY item_id
         ) WHERE first_reviewed_at >= ?`,
      )
      .get(from.getTime());
    return row?.count ?? 0;
  }
}
