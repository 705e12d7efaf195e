/**
 * SQLite 连接
 *
 * 使用 better-sqlite3，同步 API；仓库层再包装成异步接口，
 * 以便将来替换为其他存储引擎时服务层无需修改
 */

import Database from 'better-sqlite3';
import { mkdirSync } from 'fs';
import path from 'path';
import { dbLogger } from '../logger';

export type SqliteDatabase = Database.Database;

export const MEMORY_DATABASE = ':memory:';

/**
 * 表结构
 *
 * items: 词库，text 唯一
 * review_events: 复习流水，只追加；保存复习后的状态快照
 */
const SCHEMA_SQL = `
  CREATE TABLE IF NOT EXISTS items (
    id          TEXT PRIMARY KEY,
    text        TEXT NOT NULL,
    meaning     TEXT NOT NULL,
    tags        TEXT NOT NULL DEFAULT '[]',
    flags       TEXT NOT NULL DEFAULT '[]',
    created_at  INTEGER NOT NULL
  );

  CREATE UNIQUE INDEX IF NOT EXISTS idx_items_text ON items(text);

  CREATE TABLE IF NOT EXISTS review_events (
    id            INTEGER PRIMARY KEY AUTOINCREMENT,
    item_id       TEXT NOT NULL REFERENCES items(id),
    reviewed_at   INTEGER NOT NULL,
    quality       INTEGER NOT NULL CHECK (quality BETWEEN 0 AND 5),
    ease_factor   REAL NOT NULL,
    interval_days REAL NOT NULL,
    repetition    INTEGER NOT NULL
  );

  CREATE INDEX IF NOT EXISTS idx_review_events_item
    ON review_events(item_id, reviewed_at);
`;

export function migrate(db: SqliteDatabase): void {
  db.exec(SCHEMA_SQL);
}

/**
 * 打开数据库并确保表结构存在
 */
export function openDatabase(filename: string): SqliteDatabase {
  if (filename !== MEMORY_DATABASE) {
    mkdirSync(path.dirname(path.resolve(filename)), { recursive: true });
  }

  const db = new Database(filename);
  db.pragma('journal_mode = WAL');
  db.pragma('foreign_keys = ON');
  migrate(db);

  dbLogger.debug({ filename }, 'SQLite 数据库已打开');
  return db;
}
