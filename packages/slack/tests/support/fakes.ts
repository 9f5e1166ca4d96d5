/**
 * In-process stand-ins for Slack and the QA service
 */

import { ResultAsync, ok, type Result } from 'neverthrow';
import { initializeDb, openDatabase, type DbHandle } from '@threadsage/shared';
import type { HistoryPage, HistoryRequest, HistorySource, RawMessage } from '../../src/services/history-source.js';
import type { UserDirectory } from '../../src/services/user-directory.js';
import type { Answer, AskOptions, QAGateway } from '../../src/services/qa-gateway.js';
import type { FeedbackClient, FeedbackSubmission } from '../../src/services/feedback-client.js';
import type { ContextRequest } from '../../src/services/context-request-builder.js';
import type { ChatClient, OutgoingMessage } from '../../src/handlers/deps.js';
import type { QAError } from '../../src/types/errors.js';

export type FakePage = RawMessage[] | Error | 'hang';

/**
 * Serves pre-built pages; the cursor is the next page's index
 */
export class FakeHistorySource implements HistorySource {
  readonly requests: HistoryRequest[] = [];

  constructor(private readonly pages: FakePage[]) {}

  async fetchPage(request: HistoryRequest): Promise<HistoryPage> {
    this.requests.push(request);
    const index = request.cursor ? Number(request.cursor) : 0;
    const page = this.pages[index];

    if (page === 'hang') return new Promise<HistoryPage>(() => undefined);
    if (page instanceof Error) throw page;
    if (!page) return { messages: [] };

    return {
      messages: page,
      nextCursor: index + 1 < this.pages.length ? String(index + 1) : undefined,
    };
  }
}

export class FakeUserDirectory implements UserDirectory {
  readonly lookups: string[] = [];

  constructor(
    private readonly names: Record<string, string>,
    private readonly failing: string[] = []
  ) {}

  async resolve(userId: string): Promise<string | null> {
    this.lookups.push(userId);
    if (this.failing.includes(userId)) {
      throw new Error(`lookup failed for ${userId}`);
    }
    return this.names[userId] ?? null;
  }
}

export class FakeQAGateway implements QAGateway {
  readonly requests: ContextRequest[] = [];
  readonly options: AskOptions[] = [];

  constructor(
    private readonly reply: (request: ContextRequest) => Result<Answer, QAError> = () =>
      ok({ answerId: 'answer-1', text: 'The answer is 42.', sources: [] })
  ) {}

  ask(request: ContextRequest, options: AskOptions): ResultAsync<Answer, QAError> {
    this.requests.push(request);
    this.options.push(options);
    return new ResultAsync(Promise.resolve(this.reply(request)));
  }
}

export class FakeFeedbackClient implements FeedbackClient {
  readonly sent: FeedbackSubmission[] = [];

  constructor(private readonly reply: () => Result<void, QAError> = () => ok(undefined)) {}

  send(submission: FeedbackSubmission): ResultAsync<void, QAError> {
    this.sent.push(submission);
    return new ResultAsync(Promise.resolve(this.reply()));
  }
}

export class FakeChatClient implements ChatClient {
  readonly posted: OutgoingMessage[] = [];
  readonly updated: (OutgoingMessage & { ts: string })[] = [];

  /** null simulates Slack accepting the call without returning a ts */
  constructor(private readonly nextTs: string | null = 'loading-ts') {}

  async postMessage(message: OutgoingMessage): Promise<string | undefined> {
    this.posted.push(message);
    return this.nextTs ?? undefined;
  }

  async update(message: OutgoingMessage & { ts: string }): Promise<void> {
    this.updated.push(message);
  }
}

/**
 * Slack-style ts for message n; ordering follows n
 */
export function tsFor(n: number): string {
  return `1700000000.${String(n).padStart(6, '0')}`;
}

export function message(n: number, userId = 'U1', overrides: Partial<RawMessage> = {}): RawMessage {
  return {
    id: tsFor(n),
    userId,
    text: `message ${n}`,
    timestamp: tsFor(n),
    ...overrides,
  };
}

export function testDb(): DbHandle {
  return initializeDb(openDatabase(':memory:'));
}
