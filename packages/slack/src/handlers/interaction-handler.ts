/**
 * Slack Interaction Handler
 *
 * - `/{bot}-ask <question>`: question about recent channel history, answered
 *   ephemerally
 * - `/{bot}-config`: opens the room config modal
 * - config modal submission: validates and saves through the ConfigStore
 */

import type { App, KnownBlock } from '@slack/bolt';
import { describeError, logger } from '@threadsage/shared';
import type { HandlerDeps } from './deps.js';
import {
  ASSISTANTS_BLOCK,
  CONFIG_MODAL_CALLBACK_ID,
  blockForError,
  buildConfigModal,
  parseConfigSubmission,
  type ViewStateValues,
} from './config-modal.js';
import type { RoomConfig } from '../services/config-store.js';
import { slashCommand } from '../config/app-config.js';
import { generateCorrelationId, getShortCorrelationId } from '../utils/correlation.js';
import { answerBlocks, formatWithSources } from '../utils/formatters.js';
import { NO_CONTEXT_MESSAGE, genericFailureMessage, userMessageFor } from '../utils/error-messages.js';
import { InvalidConfigurationError, isThreadSageError } from '../types/errors.js';

export interface ResponsePayload {
  text: string;
  blocks?: KnownBlock[];
  response_type?: 'ephemeral' | 'in_channel';
  replace_original?: boolean;
}

export type Responder = (message: ResponsePayload) => Promise<unknown>;

export interface AskCommand {
  channelId: string;
  userId: string;
  text: string;
}

export type ConfigSubmissionResult =
  | { status: 'saved'; config: RoomConfig }
  | { status: 'invalid'; errors: Record<string, string> };

// =============================================================================
// CONTEXT QUESTIONS
// =============================================================================

export async function handleAskCommand(deps: HandlerDeps, command: AskCommand, respond: Responder): Promise<void> {
  const correlationId = generateCorrelationId();
  const shortId = getShortCorrelationId(correlationId);
  const question = command.text.trim();

  logger.info(`💬 Context question [${shortId}]`, {
    correlationId,
    userId: command.userId,
    channelId: command.channelId,
    questionLength: question.length,
  });

  if (!question) {
    await respond({
      response_type: 'ephemeral',
      text: `Usage: \`${slashCommand(deps.config.botName, 'ask')} <question about this channel>\``,
    });
    return;
  }

  await respond({ response_type: 'ephemeral', text: deps.loading.next() });

  const outcome = await deps.questions.ask({
    roomId: command.channelId,
    question,
    mode: { kind: 'context', scope: { kind: 'channel' } },
    signal: deps.shutdownSignal,
    correlationId: shortId,
  });

  if (outcome.status === 'answered') {
    await respond({
      response_type: 'ephemeral',
      replace_original: true,
      text: formatWithSources(outcome.answer),
      blocks: answerBlocks(outcome.answer),
    });
    return;
  }

  if (outcome.status === 'no_context') {
    await respond({ response_type: 'ephemeral', replace_original: true, text: NO_CONTEXT_MESSAGE });
    return;
  }

  const text = userMessageFor(outcome.error, deps.config.botName);
  if (text !== null) {
    await respond({ response_type: 'ephemeral', replace_original: true, text });
  }
}

// =============================================================================
// ROOM CONFIG
// =============================================================================

export async function processConfigSubmission(
  deps: HandlerDeps,
  roomId: string,
  values: ViewStateValues
): Promise<ConfigSubmissionResult> {
  const parsed = parseConfigSubmission(values);
  if (!parsed.ok) {
    return { status: 'invalid', errors: parsed.errors };
  }

  try {
    const config = await deps.configStore.upsert(roomId, parsed.update);
    return { status: 'saved', config };
  } catch (error) {
    if (error instanceof InvalidConfigurationError) {
      return { status: 'invalid', errors: { [blockForError(error)]: error.message } };
    }
    const message = isThreadSageError(error)
      ? (userMessageFor(error, deps.config.botName) ?? genericFailureMessage(deps.config.botName))
      : genericFailureMessage(deps.config.botName);
    logger.error(`❌ Failed to save config for room ${roomId}`, {
      error: error instanceof Error ? error.message : String(error),
    });
    return { status: 'invalid', errors: { [ASSISTANTS_BLOCK]: message } };
  }
}

export function describeSavedConfig(config: RoomConfig): string {
  const assistants = config.assistants.length > 0 ? config.assistants.join(', ') : 'none';
  const prompt = config.customPrompt ? 'custom' : 'default';
  return (
    `✅ Settings saved for <#${config.roomId}>. ` +
    `Assistants: ${assistants}. Prompt: ${prompt}. Context size: ${config.contextSize}.`
  );
}

// =============================================================================
// REGISTRATION
// =============================================================================

export function setupInteractionHandler(app: App, deps: HandlerDeps): void {
  const askCommand = slashCommand(deps.config.botName, 'ask');
  const configCommand = slashCommand(deps.config.botName, 'config');

  app.command(askCommand, async ({ command, ack, respond }) => {
    // Slack wants an ack within 3 seconds
    await ack();
    try {
      await handleAskCommand(
        deps,
        { channelId: command.channel_id, userId: command.user_id, text: command.text },
        respond
      );
    } catch (error) {
      logger.error(`Command ${askCommand} failed:`, {
        ...describeError(error),
        userId: command.user_id,
      });
      await respond({ response_type: 'ephemeral', text: genericFailureMessage(deps.config.botName) });
    }
  });

  app.command(configCommand, async ({ command, ack, respond, client }) => {
    await ack();
    try {
      const display = await deps.configStore.describe(command.channel_id);
      await client.views.open({
        trigger_id: command.trigger_id,
        view: buildConfigModal(display, deps.config.botName),
      });
    } catch (error) {
      logger.error(`Command ${configCommand} failed:`, {
        error: error instanceof Error ? error.message : String(error),
        userId: command.user_id,
      });
      const text = isThreadSageError(error) ? userMessageFor(error, deps.config.botName) : null;
      await respond({ response_type: 'ephemeral', text: text ?? genericFailureMessage(deps.config.botName) });
    }
  });

  app.view(CONFIG_MODAL_CALLBACK_ID, async ({ ack, body, view, client }) => {
    const roomId = view.private_metadata;
    const result = await processConfigSubmission(deps, roomId, view.state.values);

    if (result.status === 'invalid') {
      await ack({ response_action: 'errors', errors: result.errors });
      return;
    }
    await ack();

    try {
      await client.chat.postEphemeral({
        channel: roomId,
        user: body.user.id,
        text: describeSavedConfig(result.config),
      });
    } catch (error) {
      logger.warn(`Saved config for ${roomId} but could not confirm to user`, {
        error: error instanceof Error ? error.message : String(error),
      });
    }
  });

  logger.info(`Slack interaction handler ready (${askCommand}, ${configCommand})`);
}
