import Database from 'better-sqlite3'
import {
  createEagerAggregates,
  type EagerAggregatesClient,
} from '../../src'
import type { EagerAggregatesConfig } from '../../src/types'
import { MODELS, THROUGH } from '../fixtures/schema'
import { createQueryLog, type QueryLog } from './query-capture'

export interface TestDB {
  db: Database.Database
  client: EagerAggregatesClient
  log: QueryLog
  insert(table: string, rows: Record<string, unknown>[]): void
  close(): void
}

const DDL = `
  CREATE TABLE "User" (id INTEGER PRIMARY KEY, name TEXT NOT NULL);
  CREATE TABLE "Post" (
    id INTEGER PRIMARY KEY,
    title TEXT NOT NULL,
    published INTEGER NOT NULL DEFAULT 0,
    score INTEGER NOT NULL DEFAULT 0,
    userId INTEGER NOT NULL
  );
  CREATE TABLE "Category" (id INTEGER PRIMARY KEY, name TEXT NOT NULL);
  CREATE TABLE "PostCategory" (
    id INTEGER PRIMARY KEY,
    postId INTEGER NOT NULL,
    categoryId INTEGER NOT NULL
  );
  CREATE TABLE "Comment" (
    id INTEGER PRIMARY KEY,
    body TEXT NOT NULL,
    likes INTEGER NOT NULL DEFAULT 0,
    postId INTEGER NOT NULL,
    authorId INTEGER
  );
  CREATE TABLE "Tag" (id INTEGER PRIMARY KEY, label TEXT NOT NULL);
  CREATE TABLE "_TagToUser" (A INTEGER NOT NULL, B INTEGER NOT NULL);
`

export function createTestDB(
  config: Partial<EagerAggregatesConfig> = {},
): TestDB {
  const db = new Database(':memory:')
  db.exec(DDL)

  const log = createQueryLog()
  const client = createEagerAggregates({
    models: MODELS,
    through: THROUGH,
    ...config,
    sqlite: db,
    onQuery: log.onQuery,
  })

  function insert(table: string, rows: Record<string, unknown>[]): void {
    for (const row of rows) {
      const columns = Object.keys(row)
      const values = columns.map((c) => {
        const v = row[c]
        return typeof v === 'boolean' ? (v ? 1 : 0) : v
      })
      db.prepare(
        `INSERT INTO "${table}" (${columns.map((c) => `"${c}"`).join(', ')}) VALUES (${columns.map(() => '?').join(', ')})`,
      ).run(...values)
    }
  }

  return {
    db,
    client,
    log,
    insert,
    close: () => db.close(),
  }
}
