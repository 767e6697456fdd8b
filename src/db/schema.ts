import { sqliteTable, text, integer, real, index, uniqueIndex } from 'drizzle-orm/sqlite-core';
import { sql } from 'drizzle-orm';
import {
  SEMANTIC_TYPES,
  type QualityScores,
  type RefinementAnnotation,
  type RoutingReason,
} from '../core/types.js';

const REFINEMENT_STATUSES = ['unrefined', 'refined', 'refinement_failed'] as const;

/**
 * Articles - pipeline input
 */
export const articles = sqliteTable(
  'articles',
  {
    id: text('id').primaryKey(),
    text: text('text').notNull(),
    domain: text('domain').notNull(),
    language: text('language').notNull(),
    title: text('title'),
    metadata: text('metadata', { mode: 'json' }).$type<Record<string, unknown>>().notNull(),
    createdAt: text('created_at')
      .default(sql`CURRENT_TIMESTAMP`)
      .notNull(),
  },
  (table) => ({
    domainIdx: index('idx_articles_domain').on(table.domain),
  })
);

/**
 * Final chunks of an article, replaced as a whole on every persist
 */
export const articleChunks = sqliteTable(
  'article_chunks',
  {
    id: text('id').primaryKey(),
    articleId: text('article_id')
      .references(() => articles.id, { onDelete: 'cascade' })
      .notNull(),
    chunkIndex: integer('chunk_index').notNull(),
    text: text('text').notNull(),
    charStart: integer('char_start').notNull(),
    charEnd: integer('char_end').notNull(),
    wordCount: integer('word_count').notNull(),
    tokenEstimate: integer('token_estimate').notNull(),
    overlapPrevious: integer('overlap_previous').default(0).notNull(),
    semanticType: text('semantic_type', { enum: SEMANTIC_TYPES }).notNull(),
    scores: text('scores', { mode: 'json' }).$type<QualityScores>(),
    confidence: real('confidence'),
    routingReasons: text('routing_reasons', { mode: 'json' }).$type<RoutingReason[]>().notNull(),
    refinementStatus: text('refinement_status', { enum: REFINEMENT_STATUSES }).notNull(),
    refinement: text('refinement', { mode: 'json' }).$type<RefinementAnnotation>(),
    dropSuggested: integer('drop_suggested', { mode: 'boolean' }).default(false).notNull(),
    createdAt: text('created_at')
      .default(sql`CURRENT_TIMESTAMP`)
      .notNull(),
  },
  (table) => ({
    articleIdx: index('idx_article_chunks_article').on(table.articleId),
    articleOrderIdx: uniqueIndex('idx_article_chunks_article_order').on(table.articleId, table.chunkIndex),
  })
);

export type ArticleRow = typeof articles.$inferSelect;
export type NewArticleRow = typeof articles.$inferInsert;
export type ArticleChunkRow = typeof articleChunks.$inferSelect;
export type NewArticleChunkRow = typeof articleChunks.$inferInsert;
