/**
 * Slack message formatting for answers and feedback
 */

import type { KnownBlock } from '@slack/bolt';
import type { Answer } from '../services/qa-gateway.js';

// Slack caps section text at 3000 chars and a message at 50 blocks
export const SECTION_TEXT_LIMIT = 3000;
const MAX_SOURCES = 3;

export const FEEDBACK_LIKE_PREFIX = 'feedback_like_';
export const FEEDBACK_DISLIKE_PREFIX = 'feedback_dislike_';
export const FEEDBACK_ACTION_PATTERN = /^feedback_(like|dislike)_(.+)$/;

/**
 * Answer text followed by up to three source links
 */
export function formatWithSources(answer: Pick<Answer, 'text' | 'sources'>): string {
  const links = answer.sources
    .slice(0, MAX_SOURCES)
    .filter((source) => source.url)
    .map((source) => `<${source.url}|${source.title?.trim() || 'Source'}>`);

  return links.length > 0 ? `${answer.text}\n\n*Sources:*\n${links.join('\n')}` : answer.text;
}

/**
 * Split text into pieces no longer than maxLength, preferring paragraph
 * breaks, then line breaks, then spaces. A single word longer than the limit
 * is cut hard.
 */
export function chunkMessage(text: string, maxLength: number = SECTION_TEXT_LIMIT): string[] {
  const chunks: string[] = [];
  let current = '';

  const flush = () => {
    if (current.trim()) chunks.push(current.trim());
    current = '';
  };

  const append = (piece: string, separator: string) => {
    if (!current) {
      current = piece;
    } else if (current.length + separator.length + piece.length <= maxLength) {
      current += separator + piece;
    } else {
      flush();
      current = piece;
    }
  };

  for (const paragraph of text.split(/\n\n+/)) {
    if (paragraph.length <= maxLength) {
      append(paragraph, '\n\n');
      continue;
    }
    for (const line of paragraph.split('\n')) {
      if (line.length <= maxLength) {
        append(line, '\n');
        continue;
      }
      for (const word of line.split(' ')) {
        for (let i = 0; i < word.length; i += maxLength) {
          append(word.slice(i, i + maxLength), ' ');
        }
      }
    }
  }
  flush();

  return chunks.length > 0 ? chunks : [text];
}

export function feedbackActionsBlock(answerId: string): KnownBlock {
  return {
    type: 'actions',
    block_id: `feedback_${answerId}`,
    elements: [
      {
        type: 'button',
        text: { type: 'plain_text', text: '👍 Helpful', emoji: true },
        action_id: `${FEEDBACK_LIKE_PREFIX}${answerId}`,
        value: answerId,
      },
      {
        type: 'button',
        text: { type: 'plain_text', text: '👎 Not helpful', emoji: true },
        action_id: `${FEEDBACK_DISLIKE_PREFIX}${answerId}`,
        value: answerId,
      },
    ],
  };
}

export function textBlocks(text: string): KnownBlock[] {
  return chunkMessage(text).map((chunk) => ({
    type: 'section',
    text: { type: 'mrkdwn', text: chunk },
  }));
}

/**
 * Answer with sources and like/dislike buttons
 */
export function answerBlocks(answer: Answer, withFeedback = true): KnownBlock[] {
  const blocks = textBlocks(formatWithSources(answer));
  return withFeedback ? [...blocks, feedbackActionsBlock(answer.answerId)] : blocks;
}

export function contextNoteBlock(text: string): KnownBlock {
  return {
    type: 'context',
    elements: [{ type: 'mrkdwn', text }],
  };
}

/**
 * Replace the feedback buttons of a posted answer with a short note
 */
export function replaceFeedbackBlocks(blocks: readonly KnownBlock[], note: string): KnownBlock[] {
  const kept = blocks.filter(
    (block) => !(block.type === 'actions' && block.block_id?.startsWith('feedback_'))
  );
  return [...kept, contextNoteBlock(note)];
}

export function parseFeedbackAction(
  actionId: string
): { verdict: 'positive' | 'negative'; answerId: string } | null {
  const match = FEEDBACK_ACTION_PATTERN.exec(actionId);
  if (!match) return null;
  return { verdict: match[1] === 'like' ? 'positive' : 'negative', answerId: match[2] };
}
