import type { WebClient } from '@slack/web-api';
import { throwIfCancelled } from '../utils/deadline.js';

export type ContextScope = { kind: 'channel' } | { kind: 'thread'; threadRef: string };

/**
 * A message as the transport delivers it, before filtering and name resolution
 */
export interface RawMessage {
  /** Transport message id; Slack uses the message ts */
  id: string;
  userId?: string;
  text?: string;
  timestamp: string;
  threadRef?: string;
  botId?: string;
  subtype?: string;
}

export interface HistoryPage {
  messages: RawMessage[];
  nextCursor?: string;
}

export interface HistoryRequest {
  roomId: string;
  scope: ContextScope;
  limit: number;
  cursor?: string;
  /** Aborted when the caller gives up; sources should not start a call after that */
  signal?: AbortSignal;
}

/**
 * Paginated conversation history. Channel pages come newest first,
 * thread pages oldest first (Slack's own ordering).
 */
export interface HistorySource {
  fetchPage(request: HistoryRequest): Promise<HistoryPage>;
}

interface SlackApiMessage {
  ts?: string;
  user?: string;
  text?: string;
  thread_ts?: string;
  bot_id?: string;
  subtype?: string;
}

export const SLACK_PAGE_MAX = 200;

function toRawMessage(message: SlackApiMessage): RawMessage | null {
  if (!message.ts) return null;
  return {
    id: message.ts,
    userId: message.user,
    text: message.text,
    timestamp: message.ts,
    threadRef: message.thread_ts,
    botId: message.bot_id,
    subtype: message.subtype,
  };
}

/**
 * conversations.history / conversations.replies with cursor pagination
 */
export class SlackHistorySource implements HistorySource {
  constructor(private readonly client: WebClient) {}

  async fetchPage({ roomId, scope, limit, cursor, signal }: HistoryRequest): Promise<HistoryPage> {
    // WebClient takes no per-call signal, so the check happens before each call
    throwIfCancelled(signal, 'History fetch');
    const pageSize = Math.min(limit, SLACK_PAGE_MAX);

    const response =
      scope.kind === 'thread'
        ? await this.client.conversations.replies({ channel: roomId, ts: scope.threadRef, limit: pageSize, cursor })
        : await this.client.conversations.history({ channel: roomId, limit: pageSize, cursor });

    if (!response.ok) {
      throw new Error(`Slack history request failed: ${response.error ?? 'unknown_error'}`);
    }

    const page: SlackApiMessage[] = response.messages ?? [];
    const messages = page
      .map((message) => toRawMessage(message))
      .filter((message): message is RawMessage => message !== null);

    const nextCursor = response.response_metadata?.next_cursor || undefined;
    return { messages, nextCursor };
  }
}
