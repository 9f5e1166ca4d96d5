import { existsSync, readFileSync } from 'fs';
import { join } from 'path';
import { logger } from '@threadsage/shared';

export const SYSTEM_PROMPT_FILE = 'default_system_prompt.txt';
export const USER_PROMPT_FILE = 'default_user_prompt.txt';

export interface Prompts {
  systemPrompt: string;
  /** Sent alongside every question when the file exists */
  userPrompt?: string;
}

/**
 * Read the prompt files once at startup. The system prompt is required; the
 * user prompt is optional, but an empty one stops the bot like a missing
 * system prompt does.
 */
export function loadPrompts(promptsDir: string): Prompts {
  const systemPrompt = readPromptFile(join(promptsDir, SYSTEM_PROMPT_FILE), 'system prompt');

  const userPromptPath = join(promptsDir, USER_PROMPT_FILE);
  const userPrompt = existsSync(userPromptPath) ? readPromptFile(userPromptPath, 'user prompt') : undefined;

  logger.info(`📝 Loaded prompts from ${promptsDir}`, {
    systemPromptChars: systemPrompt.length,
    userPromptChars: userPrompt?.length ?? 0,
  });
  return { systemPrompt, userPrompt };
}

function readPromptFile(path: string, label: string): string {
  if (!existsSync(path)) {
    throw new Error(`Missing ${label} file: ${path}`);
  }
  const content = readFileSync(path, 'utf-8').trim();
  if (!content) {
    throw new Error(`Empty ${label} file: ${path}`);
  }
  return content;
}
