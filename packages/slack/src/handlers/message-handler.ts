/**
 * Slack Mention Handler
 *
 * `@bot question` asks the QA service directly. `@bot context: question` asks
 * about the thread the mention sits in (or the channel, outside a thread).
 * A loading message is posted first and then replaced with the answer.
 */

import type { App } from '@slack/bolt';
import { describeError, logger } from '@threadsage/shared';
import { chatClientFor, type ChatClient, type HandlerDeps } from './deps.js';
import type { QuestionMode } from '../services/question-service.js';
import { generateCorrelationId, getShortCorrelationId } from '../utils/correlation.js';
import { answerBlocks, formatWithSources } from '../utils/formatters.js';
import { NO_CONTEXT_MESSAGE, userMessageFor } from '../utils/error-messages.js';

// Socket Mode can redeliver an event it thinks was not acknowledged
const EVENT_CACHE_TTL = 60000; // 1 minute
const CONTEXT_PREFIX = /^context:\s*/i;

export interface MentionEvent {
  channel: string;
  ts: string;
  text: string;
  user?: string;
  thread_ts?: string;
}

export interface ParsedMention {
  question: string;
  mode: QuestionMode;
}

const seenEvents = new Map<string, number>();

/**
 * Strip bot mentions and pick direct or context mode
 */
export function parseMention(event: MentionEvent): ParsedMention {
  const text = event.text.replace(/<@[A-Z0-9]+(\|[^>]*)?>/g, '').trim();

  if (!CONTEXT_PREFIX.test(text)) {
    return { question: text, mode: { kind: 'direct' } };
  }

  const question = text.replace(CONTEXT_PREFIX, '').trim();
  return {
    question,
    mode: {
      kind: 'context',
      scope: event.thread_ts ? { kind: 'thread', threadRef: event.thread_ts } : { kind: 'channel' },
    },
  };
}

function isDuplicate(event: MentionEvent, now = Date.now()): boolean {
  for (const [key, seenAt] of seenEvents) {
    if (now - seenAt > EVENT_CACHE_TTL) seenEvents.delete(key);
  }
  const key = `${event.channel}:${event.ts}`;
  if (seenEvents.has(key)) return true;
  seenEvents.set(key, now);
  return false;
}

export async function handleMention(deps: HandlerDeps, chat: ChatClient, event: MentionEvent): Promise<void> {
  const correlationId = generateCorrelationId();
  const shortId = getShortCorrelationId(correlationId);
  const threadTs = event.thread_ts ?? event.ts;

  if (isDuplicate(event)) {
    logger.info(`🚫 Duplicate mention ignored [${shortId}]`, { channel: event.channel, ts: event.ts });
    return;
  }

  const { question, mode } = parseMention(event);

  logger.info(`📨 Mention received [${shortId}]`, {
    correlationId,
    userId: event.user,
    channelId: event.channel,
    mode: mode.kind,
    questionLength: question.length,
  });

  if (!question) {
    await chat.postMessage({
      channel: event.channel,
      thread_ts: threadTs,
      text: `Ask me something after the mention, e.g. \`@${deps.config.botName} what is our release process?\``,
    });
    return;
  }

  let loadingTs: string | undefined;
  try {
    loadingTs = await chat.postMessage({ channel: event.channel, thread_ts: threadTs, text: deps.loading.next() });
  } catch (error) {
    logger.error(`❌ Failed to post loading message [${shortId}]`, {
      error: error instanceof Error ? error.message : String(error),
    });
  }
  if (!loadingTs) return;

  const outcome = await deps.questions.ask({
    roomId: event.channel,
    question,
    mode,
    threadTs: event.thread_ts,
    signal: deps.shutdownSignal,
    correlationId: shortId,
  });

  if (outcome.status === 'answered') {
    await chat.update({
      channel: event.channel,
      ts: loadingTs,
      text: formatWithSources(outcome.answer),
      blocks: answerBlocks(outcome.answer),
    });
    deps.answers.linkMessage(event.channel, loadingTs, outcome.answer.answerId);
    return;
  }

  if (outcome.status === 'no_context') {
    await chat.update({ channel: event.channel, ts: loadingTs, text: NO_CONTEXT_MESSAGE });
    return;
  }

  const text = userMessageFor(outcome.error, deps.config.botName);
  if (text === null) {
    logger.info(`Mention cancelled [${shortId}]`);
    return;
  }
  await chat.update({ channel: event.channel, ts: loadingTs, text });
}

export function setupMessageHandler(app: App, deps: HandlerDeps): void {
  app.event('app_mention', async ({ event, client }) => {
    try {
      await handleMention(deps, chatClientFor(client), {
        channel: event.channel,
        ts: event.ts,
        text: event.text,
        user: event.user,
        thread_ts: event.thread_ts,
      });
    } catch (error) {
      logger.error('❌ Error handling Slack mention:', {
        ...describeError(error),
        channelId: event.channel,
        messageTs: event.ts,
      });
    }
  });
}

/** Test hook */
export function resetMentionCache(): void {
  seenEvents.clear();
}
