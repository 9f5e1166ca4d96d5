import { readFileSync } from 'fs';
import { dirname, resolve } from 'path';
import { fileURLToPath } from 'url';
import Chance from 'chance';

const __dirname = dirname(fileURLToPath(import.meta.url));
const MESSAGES_FILE = resolve(__dirname, '../../data/loading-messages.json');

export function readLoadingMessages(path: string = MESSAGES_FILE): string[] {
  const parsed: unknown = JSON.parse(readFileSync(path, 'utf-8'));
  if (!Array.isArray(parsed) || !parsed.every((m): m is string => typeof m === 'string')) {
    throw new Error(`Loading messages file ${path} must be a JSON array of strings`);
  }
  return parsed;
}

/**
 * Placeholder text posted while a question is in flight
 */
export class LoadingMessageProvider {
  private readonly messages: readonly string[];

  constructor(
    messages: readonly string[] = readLoadingMessages(),
    private readonly chance: Chance.Chance = new Chance()
  ) {
    if (messages.length === 0) {
      throw new Error('Loading messages cannot be empty');
    }
    this.messages = [...messages];
  }

  next(): string {
    return this.chance.pickone([...this.messages]);
  }

  get count(): number {
    return this.messages.length;
  }
}
