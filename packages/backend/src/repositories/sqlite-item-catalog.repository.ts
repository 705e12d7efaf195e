/**
 * 词库仓库 - SQLite 实现
 */

import { randomUUID } from 'crypto';
import { z } from 'zod';
import {
  type CreateItemDto,
  type ImportItemsResult,
  type ItemFlag,
  type VocabularyItem,
  ItemFlagSchema,
} from '@lexiloop/shared';
import type { SqliteDatabase } from '../database/sqlite';
import type { ItemCatalogRepository } from './types';

type ItemRow = {
  id: string;
  text: string;
  meaning: string;
  tags: string;
  flags: string;
  created_at: number;
};

type InsertParams = {
  id: string;
  text: string;
  meaning: string;
  tags: string;
  flags: string;
  createdAt: number;
};

const TagsColumnSchema = z.array(z.string());
const FlagsColumnSchema = z.array(ItemFlagSchema);

const ITEM_COLUMNS = 'id, text, meaning, tags, flags, created_at';

const INSERT_SQL = `
  INSERT INTO items (id, text, meaning, tags, flags, created_at)
  VALUES (@id, @text, @meaning, @tags, @flags, @createdAt)
`;

function parseJsonColumn<T>(schema: z.ZodType<T>, raw: string): T {
  return schema.parse(JSON.parse(raw));
}

function toItem(row: ItemRow): VocabularyItem {
  return {
    id: row.id,
    text: row.text,
    meaning: row.meaning,
    tags: parseJsonColumn(TagsColumnSchema, row.tags),
    flags: parseJsonColumn(FlagsColumnSchema, row.flags),
    createdAt: new Date(row.created_at),
  };
}

function toInsertParams(input: CreateItemDto, createdAt: Date): InsertParams {
  return {
    id: randomUUID(),
    text: input.text,
    meaning: input.meaning,
    tags: JSON.stringify(input.tags),
    flags: JSON.stringify(input.flags),
    createdAt: createdAt.getTime(),
  };
}

export class SqliteItemCatalogRepository implements ItemCatalogRepository {
  constructor(
    private readonly db: SqliteDatabase,
    private readonly clock: () => Date = () => new Date(),
  ) {}

  async create(input: CreateItemDto): Promise<VocabularyItem> {
    const params = toInsertParams(input, this.clock());
    this.db.prepare<[InsertParams]>(INSERT_SQL).run(params);
    return toItem({
      id: params.id,
      text: params.text,
      meaning: params.meaning,
      tags: params.tags,
      flags: params.flags,
      created_at: params.createdAt,
    });
  }

  async createMany(inputs: CreateItemDto[]): Promise<ImportItemsResult> {
    const insert = this.db.prepare<[InsertParams]>(
      INSERT_SQL.replace('INSERT INTO', 'INSERT OR IGNORE INTO'),
    );
    const createdAt = this.clock();

    const insertAll = this.db.transaction((batch: CreateItemDto[]) => {
      let added = 0;
      for (const input of batch) {
        added += insert.run(toInsertParams(input, createdAt)).changes;
      }
      return added;
    });

    const added = insertAll(inputs);
    return { added, skipped: inputs.length - added };
  }

  async findById(id: string): Promise<VocabularyItem | null> {
    const row = this.db
      .prepare<[string], ItemRow>(`SELECT ${ITEM_COLUMNS} FROM items WHERE id = ?`)
      .get(id);
    return row ? toItem(row) : null;
  }

  async findByText(text: string): Promise<VocabularyItem | null> {
    const row = this.db
      .prepare<[string], ItemRow>(`SELECT ${ITEM_COLUMNS} FROM items WHERE text = ?`)
      .get(text);
    return row ? toItem(row) : null;
  }

  async findAll(): Promise<VocabularyItem[]> {
    const rows = this.db
      .prepare<[], ItemRow>(`SELECT ${ITEM_COLUMNS} FROM items ORDER BY created_at ASC, rowid ASC`)
      .all();
    return rows.map(toItem);
  }

  async count(): Promise<number> {
    const row = this.db.prepare<[], { count: number }>('SELECT COUNT(*) AS count FROM items').get();
    return row?.count ?? 0;
  }

  async updateFlags(id: string, flags: ItemFlag[]): Promise<VocabularyItem | null> {
    this.db
      .prepare<[string, string]>('UPDATE items SET flags = ? WHERE id = ?')
      .run(JSON.stringify(flags), id);
    return this.findById(id);
  }
}
