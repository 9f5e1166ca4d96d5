/**
 * Context Request Builder - pure, no I/O
 *
 * Turns a question plus an extracted window into the request the QA service
 * receives. Chunk order is chronological. When the serialized payload is over
 * budget, chunks are dropped from the oldest end.
 */

import type { AppConfig } from '../config/app-config.js';
import type { ContextMessage } from './context-extractor.js';
import type { RoomConfig } from './config-store.js';
import { NoAssistantConfiguredError } from '../types/errors.js';

export interface ContextChunk {
  readonly text: string;
}

export interface ContextRequest {
  readonly question: string;
  readonly chunks: readonly ContextChunk[];
  readonly assistants: readonly string[];
  readonly model?: string;
  readonly prompt?: string;
  readonly userPrompt?: string;
  readonly sessionId?: string;
  /** How many of the oldest chunks were dropped to fit the payload bound */
  readonly trimmedChunks: number;
}

/**
 * JSON body sent to the QA service
 */
export interface QAWireRequest {
  question: string;
  chunks: { text: string }[];
  assistants: string[];
  model?: string;
  prompt?: string;
  user_prompt?: string;
  session_id?: string;
}

export interface BuildOptions {
  sessionId?: string;
}

type BuilderSettings = Pick<AppConfig, 'maxPayloadBytes'> & {
  defaultPrompt?: string;
  userPrompt?: string;
};

export function toChunk(message: ContextMessage): ContextChunk {
  return { text: `${message.authorDisplayName}: ${message.text}` };
}

/**
 * Wire form of a request. Key order is fixed so equal requests serialize to
 * equal bytes.
 */
export function toWirePayload(request: ContextRequest): QAWireRequest {
  const payload: QAWireRequest = {
    question: request.question,
    chunks: request.chunks.map((chunk) => ({ text: chunk.text })),
    assistants: [...request.assistants],
  };
  if (request.model) payload.model = request.model;
  if (request.prompt) payload.prompt = request.prompt;
  if (request.userPrompt) payload.user_prompt = request.userPrompt;
  if (request.sessionId) payload.session_id = request.sessionId;
  return payload;
}

export function serializeRequest(request: ContextRequest): string {
  return JSON.stringify(toWirePayload(request));
}

export class ContextRequestBuilder {
  constructor(private readonly settings: BuilderSettings) {}

  build(
    question: string,
    messages: readonly ContextMessage[],
    roomConfig: RoomConfig,
    modelOverride?: string | null,
    options: BuildOptions = {}
  ): ContextRequest {
    if (roomConfig.assistants.length === 0) {
      throw new NoAssistantConfiguredError(`No assistants configured for room ${roomConfig.roomId}`, {
        roomId: roomConfig.roomId,
      });
    }

    const model = modelOverride?.trim() || undefined;
    const prompt = roomConfig.customPrompt?.trim() || this.settings.defaultPrompt?.trim() || undefined;
    const userPrompt = this.settings.userPrompt?.trim() || undefined;

    const draft: ContextRequest = {
      question: question.trim(),
      chunks: messages.map(toChunk),
      assistants: [...roomConfig.assistants],
      ...(model ? { model } : {}),
      ...(prompt ? { prompt } : {}),
      ...(userPrompt ? { userPrompt } : {}),
      ...(options.sessionId ? { sessionId: options.sessionId } : {}),
      trimmedChunks: 0,
    };

    const chunks = this.fitChunks(draft);
    const trimmedChunks = draft.chunks.length - chunks.length;

    return Object.freeze({
      ...draft,
      chunks: Object.freeze(chunks.map((chunk) => Object.freeze({ ...chunk }))),
      assistants: Object.freeze([...draft.assistants]),
      trimmedChunks,
    });
  }

  /**
   * Size of `[c1,c2,...]` is the sum of each chunk's JSON plus the commas
   * between them, so the total can be tracked without re-serializing.
   */
  private fitChunks(draft: ContextRequest): ContextChunk[] {
    const limit = this.settings.maxPayloadBytes;
    const baseBytes = Buffer.byteLength(serializeRequest({ ...draft, chunks: [] }), 'utf8');
    const chunkBytes = draft.chunks.map((chunk) => Buffer.byteLength(JSON.stringify({ text: chunk.text }), 'utf8'));

    let total = baseBytes + chunkBytes.reduce((sum, bytes) => sum + bytes, 0) + Math.max(chunkBytes.length - 1, 0);
    let start = 0;

    while (total > limit && start < chunkBytes.length) {
      const remaining = chunkBytes.length - start;
      // Dropping a chunk also drops one separating comma, unless it was the last one
      total -= chunkBytes[start] + (remaining > 1 ? 1 : 0);
      start++;
    }

    return draft.chunks.slice(start);
  }
}
