/**
 * Feedback Tracker - like/dislike votes on answers
 *
 * One record per (answer, user). A repeat vote overwrites, an identical
 * replay is a no-op, and votes for the same pair apply in receipt order.
 */

import { and, eq } from 'drizzle-orm';
import { ResultAsync, err, ok, type Result } from 'neverthrow';
import { feedbackRecords, logger, type DbHandle } from '@threadsage/shared';
import { KeyedMutex } from '../utils/keyed-mutex.js';
import type { AnswerRegistry } from './answer-registry.js';
import { StorageUnavailableError, UnknownAnswerError, type FeedbackError } from '../types/errors.js';

export type Verdict = 'positive' | 'negative';

export type FeedbackOutcome = 'created' | 'updated' | 'unchanged';

export interface FeedbackRecord {
  answerId: string;
  userId: string;
  verdict: Verdict;
  recordedAt: string;
}

export class FeedbackTracker {
  private readonly locks = new KeyedMutex();

  constructor(
    private readonly handle: DbHandle,
    private readonly answers: AnswerRegistry,
    private readonly now: () => Date = () => new Date()
  ) {}

  record(answerId: string, userId: string, verdict: Verdict): ResultAsync<FeedbackOutcome, FeedbackError> {
    return new ResultAsync(
      this.locks.runExclusive(`${answerId}:${userId}`, () => this.write(answerId, userId, verdict))
    );
  }

  /**
   * Current vote for a pair, if any
   */
  find(answerId: string, userId: string): FeedbackRecord | undefined {
    const row = this.handle.db
      .select()
      .from(feedbackRecords)
      .where(and(eq(feedbackRecords.answerId, answerId), eq(feedbackRecords.userId, userId)))
      .get();
    return row ? { ...row } : undefined;
  }

  /**
   * All votes on one answer, oldest first
   */
  listForAnswer(answerId: string): FeedbackRecord[] {
    return this.handle.db
      .select()
      .from(feedbackRecords)
      .where(eq(feedbackRecords.answerId, answerId))
      .orderBy(feedbackRecords.recordedAt)
      .all();
  }

  private write(answerId: string, userId: string, verdict: Verdict): Result<FeedbackOutcome, FeedbackError> {
    if (!this.answers.has(answerId)) {
      return err(new UnknownAnswerError(`Answer ${answerId} was not issued by this process`, { answerId }));
    }

    try {
      const outcome = this.handle.db.transaction((tx): FeedbackOutcome => {
        const existing = tx
          .select()
          .from(feedbackRecords)
          .where(and(eq(feedbackRecords.answerId, answerId), eq(feedbackRecords.userId, userId)))
          .get();

        if (existing?.verdict === verdict) {
          return 'unchanged';
        }

        const recordedAt = this.now().toISOString();
        tx.insert(feedbackRecords)
          .values({ answerId, userId, verdict, recordedAt })
          .onConflictDoUpdate({
            target: [feedbackRecords.answerId, feedbackRecords.userId],
            set: { verdict, recordedAt },
          })
          .run();

        return existing ? 'updated' : 'created';
      });

      logger.info(`👍 Feedback ${outcome} for answer ${answerId}`, { answerId, userId, verdict });
      return ok(outcome);
    } catch (error) {
      logger.error(`❌ Failed to record feedback for answer ${answerId}`, {
        answerId,
        userId,
        error: error instanceof Error ? error.message : String(error),
      });
      return err(new StorageUnavailableError('Feedback storage unavailable', { answerId }, { cause: error }));
    }
  }
}
