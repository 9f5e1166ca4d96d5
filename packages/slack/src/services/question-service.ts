/**
 * Question Service - one inbound question, end to end
 *
 * config read (copied, no lock held) -> optional context extraction ->
 * request build -> QA call -> answer registration. A context question over
 * an empty window stops before the QA call.
 *
 * Every failure comes back as a typed outcome; handlers decide what the user
 * sees. An Unauthorized answer from the QA service halts all later calls
 * until the process restarts.
 */

import { logger, performanceLogger } from '@threadsage/shared';
import type { AppConfig } from '../config/app-config.js';
import type { ConfigStore, RoomConfig } from './config-store.js';
import type { ContextMessage, ContextWindowExtractor } from './context-extractor.js';
import type { ContextRequestBuilder } from './context-request-builder.js';
import type { ContextScope } from './history-source.js';
import type { Answer, QAGateway } from './qa-gateway.js';
import type { AnswerRegistry } from './answer-registry.js';
import { sessionIdFor } from '../utils/session-id.js';
import { throwIfCancelled } from '../utils/deadline.js';
import {
  ServiceError,
  UnauthorizedError,
  isThreadSageError,
  severityOf,
  type ErrorSeverity,
  type ThreadSageError,
} from '../types/errors.js';

export type QuestionMode =
  /** Plain question, no conversation history attached */
  | { kind: 'direct' }
  /** Question about recent history in the given scope */
  | { kind: 'context'; scope: ContextScope };

export interface QuestionInput {
  roomId: string;
  question: string;
  mode: QuestionMode;
  /** Thread the question was asked in, used for the session id */
  threadTs?: string;
  signal?: AbortSignal;
  correlationId?: string;
}

export type QuestionOutcome =
  | {
      status: 'answered';
      answer: Answer;
      contextMessages: number;
      trimmedChunks: number;
    }
  /** A context question found no usable history; the QA service was not called */
  | { status: 'no_context' }
  | {
      status: 'failed';
      error: ThreadSageError;
      severity: ErrorSeverity;
    };

type ServiceSettings = Pick<AppConfig, 'modelOverride'> & {
  qa: Pick<AppConfig['qa'], 'timeoutMs'>;
};

export class QuestionService {
  private halted: UnauthorizedError | null = null;

  constructor(
    private readonly configStore: ConfigStore,
    private readonly extractor: ContextWindowExtractor,
    private readonly builder: ContextRequestBuilder,
    private readonly gateway: QAGateway,
    private readonly answers: AnswerRegistry,
    private readonly settings: ServiceSettings
  ) {}

  get isHalted(): boolean {
    return this.halted !== null;
  }

  async ask(input: QuestionInput): Promise<QuestionOutcome> {
    const tag = input.correlationId ? ` [${input.correlationId}]` : '';

    if (this.halted) {
      return this.fail(new UnauthorizedError('QA calls halted after an authorization failure'));
    }

    try {
      const roomConfig: RoomConfig = await this.configStore.get(input.roomId);

      let messages: ContextMessage[] = [];
      if (input.mode.kind === 'context') {
        messages = await this.extractor.extract(
          input.roomId,
          input.mode.scope,
          roomConfig.contextSize,
          input.signal
        );
        throwIfCancelled(input.signal, 'Question');

        if (messages.length === 0) {
          logger.info(`🔍 No context found for room ${input.roomId}, skipping QA call${tag}`, {
            scope: input.mode.scope.kind,
          });
          return { status: 'no_context' };
        }
      }
      throwIfCancelled(input.signal, 'Question');

      const request = this.builder.build(input.question, messages, roomConfig, this.settings.modelOverride, {
        sessionId: sessionIdFor(input.roomId, input.threadTs),
      });

      if (request.trimmedChunks > 0) {
        logger.info(`✂️ Trimmed ${request.trimmedChunks} oldest context chunks to fit payload${tag}`, {
          roomId: input.roomId,
        });
      }

      const timer = performanceLogger.startTimer(`QA request${tag}`);
      const result = await this.gateway.ask(request, {
        timeoutMs: this.settings.qa.timeoutMs,
        signal: input.signal,
      });
      timer.end({ roomId: input.roomId, success: result.isOk() });

      if (result.isErr()) {
        if (result.error instanceof UnauthorizedError) {
          this.halted = result.error;
          logger.error(`🛑 QA service rejected our credentials, halting further calls${tag}`, {
            roomId: input.roomId,
          });
        }
        return this.fail(result.error, tag);
      }

      this.answers.register(result.value.answerId);
      logger.info(`✅ Answer ${result.value.answerId} for room ${input.roomId}${tag}`, {
        contextMessages: messages.length,
        sources: result.value.sources.length,
      });

      return {
        status: 'answered',
        answer: result.value,
        contextMessages: messages.length,
        trimmedChunks: request.trimmedChunks,
      };
    } catch (error) {
      if (isThreadSageError(error)) {
        return this.fail(error, tag);
      }
      logger.error(`❌ Unexpected failure answering question${tag}`, {
        roomId: input.roomId,
        error: error instanceof Error ? error.message : String(error),
        stack: error instanceof Error ? error.stack : undefined,
      });
      return this.fail(new ServiceError('Unexpected failure', undefined, undefined, { cause: error }));
    }
  }

  private fail(error: ThreadSageError, tag = ''): QuestionOutcome {
    const severity = severityOf(error.kind);
    if (severity === 'transient') {
      logger.warn(`⚠️ Question failed with ${error.kind}${tag}: ${error.message}`);
    }
    return { status: 'failed', error, severity };
  }
}
