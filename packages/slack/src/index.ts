import './env.js';
import { App, LogLevel } from '@slack/bolt';
import { checkDbIntegrity, closeDb, getDb, describeError, logger } from '@threadsage/shared';
import { loadAppConfig, slashCommand, type AppConfig } from './config/app-config.js';
import { setupMessageHandler } from './handlers/message-handler.js';
import { setupInteractionHandler } from './handlers/interaction-handler.js';
import { setupFeedbackHandler } from './handlers/feedback-handler.js';
import type { HandlerDeps } from './handlers/deps.js';
import { AnswerRegistry } from './services/answer-registry.js';
import { ConfigStore } from './services/config-store.js';
import { ContextWindowExtractor } from './services/context-extractor.js';
import { ContextRequestBuilder } from './services/context-request-builder.js';
import { HttpFeedbackClient } from './services/feedback-client.js';
import { FeedbackTracker } from './services/feedback-tracker.js';
import { SlackHistorySource } from './services/history-source.js';
import { LoadingMessageProvider } from './services/loading-messages.js';
import { loadPrompts } from './services/prompt-loader.js';
import { HttpQAGateway } from './services/qa-gateway.js';
import { QuestionService } from './services/question-service.js';
import { SlackUserDirectory } from './services/user-directory.js';

function required(value: string | undefined, name: string): string {
  if (!value) {
    throw new Error(`${name} is required`);
  }
  return value;
}

function createApp(config: Readonly<AppConfig>): App {
  return new App({
    token: required(config.slack.botToken, 'SLACK_BOT_TOKEN'),
    appToken: required(config.slack.appToken, 'SLACK_APP_TOKEN'),
    signingSecret: config.slack.signingSecret,
    socketMode: true,
    logLevel: process.env.NODE_ENV === 'development' ? LogLevel.DEBUG : LogLevel.INFO,
  });
}

async function start(): Promise<void> {
  const config = loadAppConfig();
  const prompts = loadPrompts(config.promptsDir);

  const db = getDb(config.databasePath);
  const integrity = checkDbIntegrity(db);
  if (!integrity.ok) {
    throw new Error(`Database integrity check failed: ${integrity.result}`);
  }

  const app = createApp(config);
  const shutdown = new AbortController();

  const answers = new AnswerRegistry();
  const configStore = new ConfigStore(db, config);
  const extractor = new ContextWindowExtractor(
    new SlackHistorySource(app.client),
    new SlackUserDirectory(app.client),
    config
  );
  const builder = new ContextRequestBuilder({
    maxPayloadBytes: config.maxPayloadBytes,
    defaultPrompt: prompts.systemPrompt,
    userPrompt: prompts.userPrompt,
  });
  const qaSettings = {
    apiUrl: required(config.qa.apiUrl, 'QA_API_URL'),
    apiToken: required(config.qa.apiToken, 'QA_API_TOKEN'),
  };
  const gateway = new HttpQAGateway(qaSettings);

  const deps: HandlerDeps = {
    config,
    questions: new QuestionService(configStore, extractor, builder, gateway, answers, config),
    configStore,
    feedback: new FeedbackTracker(db, answers),
    feedbackClient: new HttpFeedbackClient(qaSettings),
    answers,
    loading: new LoadingMessageProvider(),
    shutdownSignal: shutdown.signal,
  };

  setupMessageHandler(app, deps);
  setupInteractionHandler(app, deps);
  setupFeedbackHandler(app, deps);

  await app.start();

  logger.info(`✅ ${config.botName} connected to Slack (Socket Mode)`, {
    commands: [slashCommand(config.botName, 'ask'), slashCommand(config.botName, 'config')],
    contextBounds: `${config.context.min}-${config.context.max}`,
    modelOverride: config.modelOverride ?? null,
    defaultAssistants: config.defaultAssistants,
  });

  let stopping = false;
  const stop = async (signal: string) => {
    if (stopping) return;
    stopping = true;
    logger.info(`${signal} received, shutting down ${config.botName}`);
    shutdown.abort();
    try {
      await app.stop();
    } catch (error) {
      logger.error('Error while stopping Slack app:', {
        error: error instanceof Error ? error.message : String(error),
      });
    }
    closeDb();
    process.exit(0);
  };

  process.on('SIGTERM', () => void stop('SIGTERM'));
  process.on('SIGINT', () => void stop('SIGINT'));
}

start().catch((error: unknown) => {
  logger.error('Failed to start Slack bot:', {
    ...describeError(error),
  });
  closeDb();
  process.exit(1);
});
