/**
 * Context Window Extractor
 *
 * Pulls recent history for a room (channel-wide or one thread), drops
 * duplicates and non-human messages, resolves author names and returns at
 * most `limit` messages, oldest first.
 *
 * Channel pages come newest first, so paging stops once the window is full
 * or the page cap is hit. Thread pages come oldest first, so a thread is
 * read to its end in full-size pages while only the newest `limit`
 * messages are kept.
 *
 * Failure modes:
 * - first page fails        -> ContextUnavailableError
 * - a later page fails      -> whatever was collected is returned
 * - caller aborts           -> OperationCancelledError, collected data dropped
 * - extractor deadline hits -> ContextUnavailableError
 */

import { logger } from '@threadsage/shared';
import type { AppConfig } from '../config/app-config.js';
import {
  SLACK_PAGE_MAX,
  type ContextScope,
  type HistoryPage,
  type HistorySource,
  type RawMessage,
} from './history-source.js';
import type { UserDirectory } from './user-directory.js';
import { compareSlackTs } from '../utils/slack-ts.js';
import { createDeadline, raceAbort, type Deadline } from '../utils/deadline.js';
import { ContextUnavailableError, OperationCancelledError } from '../types/errors.js';

export interface ContextMessage {
  readonly authorDisplayName: string;
  readonly text: string;
  readonly timestamp: string;
  readonly threadRef?: string;
}

type ExtractorSettings = {
  context: Pick<AppConfig['context'], 'max' | 'extractTimeoutMs' | 'maxHistoryPages'>;
};

interface Collected {
  message: RawMessage & { userId: string; text: string };
  arrival: number;
}

/**
 * Oldest-first, at most `size` entries, keeping the newest.
 * Equal timestamps keep arrival order.
 */
function newestWindow(collected: Collected[], size: number): Collected[] {
  const sorted = [...collected].sort(
    (a, b) => compareSlackTs(a.message.timestamp, b.message.timestamp) || a.arrival - b.arrival
  );
  return sorted.slice(-size);
}

export class ContextWindowExtractor {
  constructor(
    private readonly history: HistorySource,
    private readonly directory: UserDirectory,
    private readonly settings: ExtractorSettings
  ) {}

  /**
   * Clamp a requested window size to [1, CONTEXT_MAX]
   */
  clampLimit(limit: number): number {
    const max = this.settings.context.max;
    if (!Number.isFinite(limit)) return max;
    return Math.max(1, Math.min(Math.floor(limit), max));
  }

  async extract(roomId: string, scope: ContextScope, limit: number, signal?: AbortSignal): Promise<ContextMessage[]> {
    const windowSize = this.clampLimit(limit);
    const deadline = createDeadline(this.settings.context.extractTimeoutMs, signal);

    try {
      const window = await this.collect(roomId, scope, windowSize, deadline);

      const names = await this.resolveNames(window, deadline);

      logger.debug(`Extracted ${window.length} context messages for room ${roomId}`, {
        roomId,
        scope: scope.kind,
        requested: limit,
        windowSize,
      });

      return window.map(({ message }) =>
        Object.freeze({
          authorDisplayName: names.get(message.userId) ?? message.userId,
          text: message.text,
          timestamp: message.timestamp,
          ...(message.threadRef ? { threadRef: message.threadRef } : {}),
        })
      );
    } finally {
      deadline.dispose();
    }
  }

  // ===========================================================================
  // INTERNALS
  // ===========================================================================

  private async collect(
    roomId: string,
    scope: ContextScope,
    windowSize: number,
    deadline: Deadline
  ): Promise<Collected[]> {
    const seen = new Set<string>();
    let collected: Collected[] = [];
    let arrival = 0;
    let cursor: string | undefined;
    let pagesFetched = 0;

    const pageLimit = scope.kind === 'thread' ? SLACK_PAGE_MAX : windowSize;

    do {
      if (deadline.signal.aborted) {
        throw this.abortError(deadline, roomId);
      }

      let page: HistoryPage;
      try {
        page = await raceAbort(
          this.history.fetchPage({ roomId, scope, limit: pageLimit, cursor, signal: deadline.signal }),
          deadline.signal,
          () => this.abortError(deadline, roomId)
        );
      } catch (error) {
        if (error instanceof OperationCancelledError || error instanceof ContextUnavailableError) {
          throw error;
        }
        if (pagesFetched === 0) {
          logger.error(`Failed to extract context for room ${roomId}`, {
            roomId,
            scope: scope.kind,
            error: error instanceof Error ? error.message : String(error),
          });
          throw new ContextUnavailableError(`Could not read history for room ${roomId}`, { roomId }, { cause: error });
        }
        // Later page failed: return what earlier pages gave us
        break;
      }
      pagesFetched++;

      for (const message of page.messages) {
        if (seen.has(message.id)) continue;
        seen.add(message.id);

        if (message.botId || message.subtype) continue;
        const text = message.text?.trim();
        if (!text) continue;

        collected.push({
          message: { ...message, userId: message.userId || 'unknown', text },
          arrival: arrival++,
        });
      }

      cursor = page.nextCursor;
      collected = newestWindow(collected, windowSize);

      // Channel pages are newest first, so once the window is full we are done
      if (scope.kind === 'channel' && collected.length >= windowSize) break;
    } while (cursor && (scope.kind === 'thread' || pagesFetched < this.settings.context.maxHistoryPages));

    return collected;
  }

  private async resolveNames(window: Collected[], deadline: Deadline): Promise<Map<string, string>> {
    const ids = [...new Set(window.map(({ message }) => message.userId))];
    const names = new Map<string, string>();

    const lookups = ids.map(async (id) => {
      try {
        const name = await this.directory.resolve(id);
        if (name?.trim()) names.set(id, name.trim());
      } catch (error) {
        logger.debug(`Name lookup failed for ${id}, using raw id`, {
          userId: id,
          error: error instanceof Error ? error.message : String(error),
        });
      }
    });

    await raceAbort(Promise.all(lookups), deadline.signal, () => this.abortError(deadline, 'name resolution'));
    return names;
  }

  private abortError(deadline: Deadline, what: string): OperationCancelledError | ContextUnavailableError {
    if (deadline.timedOut) {
      return new ContextUnavailableError(`Context extraction timed out (${what})`);
    }
    return new OperationCancelledError(`Context extraction cancelled (${what})`);
  }
}
