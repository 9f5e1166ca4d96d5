import type { KnownBlock } from '@slack/bolt';
import type { WebClient } from '@slack/web-api';
import type { AppConfig } from '../config/app-config.js';
import type { AnswerRegistry } from '../services/answer-registry.js';
import type { ConfigStore } from '../services/config-store.js';
import type { FeedbackClient } from '../services/feedback-client.js';
import type { FeedbackTracker } from '../services/feedback-tracker.js';
import type { LoadingMessageProvider } from '../services/loading-messages.js';
import type { QuestionService } from '../services/question-service.js';

/**
 * Everything the Slack handlers need, built once by the bootstrap
 */
export interface HandlerDeps {
  config: Readonly<AppConfig>;
  questions: QuestionService;
  configStore: ConfigStore;
  feedback: FeedbackTracker;
  /** Forwards stored votes to the QA service */
  feedbackClient: FeedbackClient;
  answers: AnswerRegistry;
  loading: LoadingMessageProvider;
  /** Aborts in-flight questions on shutdown */
  shutdownSignal?: AbortSignal;
}

export interface OutgoingMessage {
  channel: string;
  text: string;
  blocks?: KnownBlock[];
  thread_ts?: string;
}

/**
 * The slice of the Slack chat API the handlers use
 */
export interface ChatClient {
  /** Returns the posted message's ts */
  postMessage(message: OutgoingMessage): Promise<string | undefined>;
  update(message: OutgoingMessage & { ts: string }): Promise<void>;
}

export function chatClientFor(client: WebClient): ChatClient {
  return {
    async postMessage({ channel, text, blocks, thread_ts }) {
      const response = await client.chat.postMessage({ channel, text, blocks, thread_ts });
      return response.ts;
    },
    async update({ channel, ts, text, blocks }) {
      await client.chat.update({ channel, ts, text, blocks });
    },
  };
}
