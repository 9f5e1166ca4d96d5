import { slashCommand } from '../config/app-config.js';
import { severityOf, type ThreadSageError } from '../types/errors.js';

export const NO_CONTEXT_MESSAGE = "I couldn't find any recent conversation context to answer your question about.";

export function genericFailureMessage(botName: string): string {
  return `Oops, ${botName} hit a snag. Please try again in a moment.`;
}

export function unavailableMessage(botName: string): string {
  return `${botName} is unavailable right now. An administrator has been notified.`;
}

/**
 * Text shown to the user for a failed operation, or null when nothing should
 * be shown (the request was cancelled). Raw downstream errors never leak here.
 */
export function userMessageFor(error: ThreadSageError, botName: string): string | null {
  switch (severityOf(error.kind)) {
    case 'cancelled':
      return null;
    case 'fatal':
      return unavailableMessage(botName);
    case 'validation':
      if (error.kind === 'NoAssistantConfigured') {
        return `No assistants are configured for this channel yet. Use \`${slashCommand(botName, 'config')}\` to choose one.`;
      }
      return `⚠️ ${error.message}`;
    default:
      return genericFailureMessage(botName);
  }
}
