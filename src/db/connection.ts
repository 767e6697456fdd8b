/**
 * SQLite connection for the article store
 *
 * Opens (or creates) the database file, applies pragmas and creates the
 * tables when missing. Pass ':memory:' for a throwaway database.
 */

import Database from 'better-sqlite3';
import { drizzle, type BetterSQLite3Database } from 'drizzle-orm/better-sqlite3';
import { existsSync, mkdirSync } from 'node:fs';
import { dirname } from 'node:path';
import * as schema from './schema.js';
import { createComponentLogger } from '../utils/logger.js';
import { StorageError, toError } from '../core/errors.js';

const logger = createComponentLogger('db-connection');

export type AppDb = BetterSQLite3Database<typeof schema>;

export interface DatabaseDeps {
  db: AppDb;
  sqlite: Database.Database;
}

export interface ConnectionOptions {
  path: string;
  busyTimeoutMs?: number;
}

const CREATE_TABLES = `
  CREATE TABLE IF NOT EXISTS articles (
    id TEXT PRIMARY KEY,
    text TEXT NOT NULL,
    domain TEXT NOT NULL,
    language TEXT NOT NULL,
    title TEXT,
    metadata TEXT NOT NULL,
    created_at TEXT DEFAULT CURRENT_TIMESTAMP NOT NULL
  );

  CREATE INDEX IF NOT EXISTS idx_articles_domain ON articles(domain);

  CREATE TABLE IF NOT EXISTS article_chunks (
    id TEXT PRIMARY KEY,
    article_id TEXT NOT NULL REFERENCES articles(id) ON DELETE CASCADE,
    chunk_index INTEGER NOT NULL,
    text TEXT NOT NULL,
    char_start INTEGER NOT NULL,
    char_end INTEGER NOT NULL,
    word_count INTEGER NOT NULL,
    token_estimate INTEGER NOT NULL,
    overlap_previous INTEGER DEFAULT 0 NOT NULL,
    semantic_type TEXT NOT NULL,
    scores TEXT,
    confidence REAL,
    routing_reasons TEXT NOT NULL,
    refinement_status TEXT NOT NULL,
    refinement TEXT,
    drop_suggested INTEGER DEFAULT 0 NOT NULL,
    created_at TEXT DEFAULT CURRENT_TIMESTAMP NOT NULL
  );

  CREATE INDEX IF NOT EXISTS idx_article_chunks_article ON article_chunks(article_id);
  CREATE UNIQUE INDEX IF NOT EXISTS idx_article_chunks_article_order
    ON article_chunks(article_id, chunk_index);
`;

/**
 * Create the tables on an open connection
 */
export function initializeSchema(sqlite: Database.Database): void {
  sqlite.exec(CREATE_TABLES);
}

export function openDatabase(options: ConnectionOptions): DatabaseDeps {
  const inMemory = options.path === ':memory:';

  if (!inMemory) {
    const dir = dirname(options.path);
    if (!existsSync(dir)) {
      mkdirSync(dir, { recursive: true });
    }
  }

  let sqlite: Database.Database;
  try {
    sqlite = new Database(options.path, { timeout: options.busyTimeoutMs ?? 5000 });
  } catch (error) {
    throw new StorageError(`Failed to open database: ${toError(error).message}`, 'load', {
      path: options.path,
    });
  }

  if (!inMemory) {
    sqlite.pragma('journal_mode = WAL');
  }
  sqlite.pragma('foreign_keys = ON');

  initializeSchema(sqlite);
  logger.debug({ path: options.path }, 'Database opened');

  return { db: drizzle(sqlite, { schema }), sqlite };
}

export function closeDatabase(deps: DatabaseDeps): void {
  if (deps.sqlite.open) {
    deps.sqlite.close();
  }
}
