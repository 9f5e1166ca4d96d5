/**
 * QA Gateway - the only door to the downstream question-answering service
 *
 * One network attempt per call, no retries, no logging, no shared state.
 * Every outcome comes back as a Result: an Answer or a classified QAError.
 */

import axios, { type AxiosInstance, type AxiosResponse } from 'axios';
import { ResultAsync, err, ok, type Result } from 'neverthrow';
import { z } from 'zod';
import type { ContextRequest } from './context-request-builder.js';
import { toWirePayload } from './context-request-builder.js';
import { createDeadline, type Deadline } from '../utils/deadline.js';
import {
  MalformedResponseError,
  OperationCancelledError,
  RateLimitedError,
  ServiceError,
  TimeoutError,
  UnauthorizedError,
  type QAError,
} from '../types/errors.js';

const CHAT_PATH = '/api/assistants/chat';
const EMPTY_ANSWER_TEXT = '(No response from assistant)';

export interface AnswerSource {
  title?: string;
  url?: string;
}

export interface Answer {
  answerId: string;
  text: string;
  sources: AnswerSource[];
}

export interface AskOptions {
  timeoutMs: number;
  signal?: AbortSignal;
}

export interface QAGateway {
  ask(request: ContextRequest, options: AskOptions): ResultAsync<Answer, QAError>;
}

const answerSchema = z.object({
  answer_text: z.string(),
  answer_id: z.string().min(1),
  sources: z
    .array(
      z.object({
        title: z.string().optional(),
        url: z.string().optional(),
      })
    )
    .optional(),
});

export interface HttpQAGatewaySettings {
  apiUrl: string;
  apiToken: string;
}

function parseRetryAfter(value: unknown): number | undefined {
  if (typeof value !== 'string' && typeof value !== 'number') return undefined;
  const seconds = Number(value);
  return Number.isFinite(seconds) && seconds >= 0 ? seconds : undefined;
}

/**
 * QAError for a non-2xx status, or undefined when the status is a success
 */
export function errorForStatus(status: number, retryAfter?: unknown): QAError | undefined {
  if (status === 401 || status === 403) {
    return new UnauthorizedError(`QA service rejected credentials (HTTP ${status})`, { status });
  }
  if (status === 429) {
    return new RateLimitedError('QA service rate limit reached', parseRetryAfter(retryAfter), { status });
  }
  if (status < 200 || status >= 300) {
    return new ServiceError(`QA service returned HTTP ${status}`, status);
  }
  return undefined;
}

/**
 * QAError for a request that never produced a response
 */
export function errorForTransportFailure(error: unknown, deadline: Deadline, timeoutMs: number): QAError {
  if (deadline.timedOut) {
    return new TimeoutError(`QA service did not respond within ${timeoutMs}ms`, { timeoutMs });
  }
  if (deadline.signal.aborted) {
    return new OperationCancelledError('QA request cancelled');
  }
  const code = axios.isAxiosError(error) ? error.code : undefined;
  return new ServiceError('QA service unreachable', undefined, { code }, { cause: error });
}

/**
 * Map a completed HTTP exchange to an Answer or a QAError
 */
export function interpretResponse(status: number, body: string, retryAfter?: unknown): Result<Answer, QAError> {
  const statusError = errorForStatus(status, retryAfter);
  if (statusError) {
    return err(statusError);
  }

  let json: unknown;
  try {
    json = JSON.parse(body);
  } catch {
    return err(new MalformedResponseError('QA service returned invalid JSON', { status }));
  }

  const parsed = answerSchema.safeParse(json);
  if (!parsed.success) {
    return err(
      new MalformedResponseError('QA service response is missing required fields', {
        issues: parsed.error.issues.map((issue) => issue.path.join('.')),
      })
    );
  }

  return ok({
    answerId: parsed.data.answer_id,
    text: parsed.data.answer_text.trim() || EMPTY_ANSWER_TEXT,
    sources: parsed.data.sources ?? [],
  });
}

export class HttpQAGateway implements QAGateway {
  private readonly http: AxiosInstance;
  private readonly endpoint: string;

  constructor(
    private readonly settings: HttpQAGatewaySettings,
    http: AxiosInstance = axios.create()
  ) {
    this.http = http;
    this.endpoint = `${settings.apiUrl.replace(/\/+$/, '')}${CHAT_PATH}`;
  }

  ask(request: ContextRequest, options: AskOptions): ResultAsync<Answer, QAError> {
    return new ResultAsync(this.execute(request, options));
  }

  private async execute(request: ContextRequest, { timeoutMs, signal }: AskOptions): Promise<Result<Answer, QAError>> {
    if (signal?.aborted) {
      return err(new OperationCancelledError('QA request cancelled before sending'));
    }

    const deadline = createDeadline(timeoutMs, signal);
    try {
      const response: AxiosResponse<string> = await this.http.post(this.endpoint, toWirePayload(request), {
        headers: {
          Authorization: `Bearer ${this.settings.apiToken}`,
          'Content-Type': 'application/json',
        },
        signal: deadline.signal,
        responseType: 'text',
        // Keep the raw body so unparseable JSON can be classified here
        transformResponse: [(data: unknown) => data],
        validateStatus: () => true,
      });

      const body = typeof response.data === 'string' ? response.data : JSON.stringify(response.data ?? null);
      return interpretResponse(response.status, body, response.headers['retry-after']);
    } catch (error) {
      return err(errorForTransportFailure(error, deadline, timeoutMs));
    } finally {
      deadline.dispose();
    }
  }
}
