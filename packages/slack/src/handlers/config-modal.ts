/**
 * Room config modal: Block Kit view and submission parsing
 */

import type { ModalView, ViewStateValue } from '@slack/bolt';
import type { RoomConfigDisplay, RoomConfigUpdate } from '../services/config-store.js';
import type { InvalidConfigurationError } from '../types/errors.js';

export const CONFIG_MODAL_CALLBACK_ID = 'room_config_modal';

export const ASSISTANTS_BLOCK = 'assistants_block';
export const ASSISTANTS_INPUT = 'assistants_input';
export const PROMPT_BLOCK = 'prompt_block';
export const PROMPT_INPUT = 'prompt_input';
export const CONTEXT_SIZE_BLOCK = 'context_size_block';
export const CONTEXT_SIZE_INPUT = 'context_size_input';

export type ViewStateValues = Record<string, Record<string, ViewStateValue>>;

export type ParsedSubmission =
  | { ok: true; update: RoomConfigUpdate }
  | { ok: false; errors: Record<string, string> };

export function buildConfigModal(display: RoomConfigDisplay, botName: string): ModalView {
  const { config, contextMin, contextMax } = display;

  return {
    type: 'modal',
    callback_id: CONFIG_MODAL_CALLBACK_ID,
    private_metadata: config.roomId,
    title: { type: 'plain_text', text: `${botName} settings`.slice(0, 24) },
    submit: { type: 'plain_text', text: 'Save' },
    close: { type: 'plain_text', text: 'Cancel' },
    blocks: [
      {
        type: 'context',
        elements: [
          {
            type: 'mrkdwn',
            text: display.hasCustomConfig
              ? `Settings for <#${config.roomId}>, last updated ${config.updatedAt ?? 'never'}.`
              : `<#${config.roomId}> is using the default settings.`,
          },
        ],
      },
      {
        type: 'input',
        block_id: ASSISTANTS_BLOCK,
        optional: true,
        label: { type: 'plain_text', text: 'Assistants' },
        hint: { type: 'plain_text', text: 'Comma-separated assistant names.' },
        element: {
          type: 'plain_text_input',
          action_id: ASSISTANTS_INPUT,
          initial_value: config.assistants.join(', '),
        },
      },
      {
        type: 'input',
        block_id: PROMPT_BLOCK,
        optional: true,
        label: { type: 'plain_text', text: 'System prompt' },
        hint: { type: 'plain_text', text: 'Leave blank to use the default prompt.' },
        element: {
          type: 'plain_text_input',
          action_id: PROMPT_INPUT,
          multiline: true,
          max_length: 5000,
          initial_value: config.customPrompt ?? '',
        },
      },
      {
        type: 'input',
        block_id: CONTEXT_SIZE_BLOCK,
        label: { type: 'plain_text', text: 'Context size' },
        hint: {
          type: 'plain_text',
          text: `Messages read for context questions (${contextMin}-${contextMax}).`,
        },
        element: {
          type: 'plain_text_input',
          action_id: CONTEXT_SIZE_INPUT,
          initial_value: String(config.contextSize),
        },
      },
    ],
  };
}

function inputValue(values: ViewStateValues, block: string, action: string): string {
  return values[block]?.[action]?.value?.trim() ?? '';
}

/**
 * Turn modal state into a config update. Only shape problems are caught here;
 * range checks belong to the store.
 */
export function parseConfigSubmission(values: ViewStateValues): ParsedSubmission {
  const assistants = inputValue(values, ASSISTANTS_BLOCK, ASSISTANTS_INPUT)
    .split(',')
    .map((name) => name.trim())
    .filter(Boolean);
  const prompt = inputValue(values, PROMPT_BLOCK, PROMPT_INPUT);
  const sizeText = inputValue(values, CONTEXT_SIZE_BLOCK, CONTEXT_SIZE_INPUT);

  const update: RoomConfigUpdate = {
    assistants,
    customPrompt: prompt || null,
  };

  if (sizeText) {
    if (!/^\d+$/.test(sizeText)) {
      return { ok: false, errors: { [CONTEXT_SIZE_BLOCK]: 'Enter a whole number.' } };
    }
    update.contextSize = Number(sizeText);
  }

  return { ok: true, update };
}

/**
 * Block to attach a store validation error to
 */
export function blockForError(error: InvalidConfigurationError): string {
  switch (error.field) {
    case 'customPrompt':
      return PROMPT_BLOCK;
    case 'contextSize':
      return CONTEXT_SIZE_BLOCK;
    default:
      return ASSISTANTS_BLOCK;
  }
}
