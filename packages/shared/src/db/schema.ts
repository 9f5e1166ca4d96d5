/**
 * Database schema for ThreadSage
 *
 * Single source of truth for table shapes. `initializeDb` in client.ts creates
 * the same tables with raw SQL so a fresh file needs no migration step.
 */

import { sqliteTable, text, integer, primaryKey, index } from 'drizzle-orm/sqlite-core';
import { sql } from 'drizzle-orm';

// ============================================================================
// ROOM CONFIGURATION
// ============================================================================

/**
 * Room configs - one row per Slack channel, created on first write
 */
export const roomConfigs = sqliteTable('room_configs', {
  roomId: text('room_id').primaryKey(),
  assistants: text('assistants').notNull().default('[]'), // JSON array of assistant ids
  customPrompt: text('custom_prompt'),
  contextSize: integer('context_size').notNull(),
  createdAt: text('created_at').default(sql`CURRENT_TIMESTAMP`),
  updatedAt: text('updated_at').notNull(), // ISO-8601, never decreases
});

// ============================================================================
// FEEDBACK
// ============================================================================

/**
 * Feedback records - one vote per (answer, user), last write wins
 */
export const feedbackRecords = sqliteTable(
  'feedback_records',
  {
    answerId: text('answer_id').notNull(),
    userId: text('user_id').notNull(),
    verdict: text('verdict', { enum: ['positive', 'negative'] }).notNull(),
    recordedAt: text('recorded_at').notNull(),
  },
  (table) => ({
    pk: primaryKey({ columns: [table.answerId, table.userId] }),
    answerIdx: index('idx_feedback_answer_id').on(table.answerId),
  })
);

export type RoomConfigRow = typeof roomConfigs.$inferSelect;
export type NewRoomConfigRow = typeof roomConfigs.$inferInsert;
export type FeedbackRecordRow = typeof feedbackRecords.$inferSelect;
