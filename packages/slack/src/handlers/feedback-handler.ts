/**
 * Feedback Handler - like/dislike on posted answers
 *
 * Two entry points feed the same FeedbackTracker, and every stored vote is
 * forwarded to the QA service:
 * - the 👍 / 👎 buttons under an answer (the buttons are then replaced
 *   with a short note)
 * - thumbs reactions on an answer message the bot posted
 */

import type { App, KnownBlock } from '@slack/bolt';
import { logger } from '@threadsage/shared';
import type { HandlerDeps } from './deps.js';
import type { Verdict } from '../services/feedback-tracker.js';
import { generateCorrelationId, getShortCorrelationId } from '../utils/correlation.js';
import { FEEDBACK_ACTION_PATTERN, parseFeedbackAction, replaceFeedbackBlocks } from '../utils/formatters.js';

export const FEEDBACK_SENDING = 'Sending feedback...';
export const FEEDBACK_THANKS = 'Thank you for your feedback!';
export const FEEDBACK_FAILED = 'Sorry, something went wrong sending your feedback.';

const REACTION_VERDICTS: Record<string, Verdict> = {
  '+1': 'positive',
  thumbsup: 'positive',
  '-1': 'negative',
  thumbsdown: 'negative',
};

export interface FeedbackVote {
  answerId: string;
  userId: string;
  verdict: Verdict;
}

export interface ReactionEvent {
  user: string;
  reaction: string;
  item: { type: string; channel?: string; ts?: string };
}

/**
 * Record one vote, then forward it to the QA service.
 * Returns whether both steps succeeded.
 */
export async function submitFeedback(deps: HandlerDeps, vote: FeedbackVote): Promise<boolean> {
  const shortId = getShortCorrelationId(generateCorrelationId());

  const result = await deps.feedback
    .record(vote.answerId, vote.userId, vote.verdict)
    .andThen((outcome) =>
      deps.feedbackClient
        .send({ answerId: vote.answerId, verdict: vote.verdict }, deps.shutdownSignal)
        .map(() => outcome)
    );

  return result.match(
    (outcome) => {
      logger.info(`📝 Feedback ${outcome} and forwarded [${shortId}]`, { ...vote });
      return true;
    },
    (error) => {
      logger.warn(`⚠️ Feedback failed with ${error.kind} [${shortId}]: ${error.message}`, { ...vote });
      return false;
    }
  );
}

/**
 * Verdict for a reaction name; skin tones count like the base emoji
 */
export function verdictForReaction(reaction: string): Verdict | undefined {
  const base = reaction.split('::')[0];
  return REACTION_VERDICTS[base];
}

export async function handleReaction(deps: HandlerDeps, event: ReactionEvent): Promise<boolean> {
  if (event.item.type !== 'message' || !event.item.channel || !event.item.ts) return false;

  const verdict = verdictForReaction(event.reaction);
  if (!verdict) return false;

  const answerId = deps.answers.answerForMessage(event.item.channel, event.item.ts);
  if (!answerId) return false;

  return submitFeedback(deps, { answerId, userId: event.user, verdict });
}

function isKnownBlockArray(value: unknown): value is KnownBlock[] {
  return (
    Array.isArray(value) &&
    value.every((block: unknown) => typeof block === 'object' && block !== null && 'type' in block)
  );
}

export function setupFeedbackHandler(app: App, deps: HandlerDeps): void {
  app.action(FEEDBACK_ACTION_PATTERN, async ({ ack, body, action, respond }) => {
    await ack();
    if (body.type !== 'block_actions' || !('action_id' in action)) return;

    const parsed = parseFeedbackAction(action.action_id);
    if (!parsed) return;

    const rawBlocks: unknown = body.message?.blocks;
    const rawText: unknown = body.message?.text;
    const blocks = isKnownBlockArray(rawBlocks) ? rawBlocks : [];
    const text = typeof rawText === 'string' ? rawText : '';

    try {
      await respond({ replace_original: true, text, blocks: replaceFeedbackBlocks(blocks, FEEDBACK_SENDING) });

      const stored = await submitFeedback(deps, { ...parsed, userId: body.user.id });
      await respond({
        replace_original: true,
        text,
        blocks: replaceFeedbackBlocks(blocks, stored ? FEEDBACK_THANKS : FEEDBACK_FAILED),
      });
    } catch (error) {
      logger.error('Feedback button handling failed:', {
        error: error instanceof Error ? error.message : String(error),
        actionId: action.action_id,
      });
    }
  });

  app.event('reaction_added', async ({ event }) => {
    try {
      await handleReaction(deps, event);
    } catch (error) {
      logger.error('Reaction handling failed:', {
        error: error instanceof Error ? error.message : String(error),
        reaction: event.reaction,
      });
    }
  });

  logger.info('Slack feedback handler ready');
}
