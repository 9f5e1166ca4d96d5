/**
 * Feedback Client - forwards votes to the QA service's feedback endpoint
 *
 * Same rules as the QA gateway: one attempt, no logging, a classified
 * QAError on failure.
 */

import axios, { type AxiosInstance } from 'axios';
import { ResultAsync, err, ok, type Result } from 'neverthrow';
import type { Verdict } from './feedback-tracker.js';
import { errorForStatus, errorForTransportFailure } from './qa-gateway.js';
import { createDeadline } from '../utils/deadline.js';
import { OperationCancelledError, type QAError } from '../types/errors.js';

const FEEDBACK_PATH = '/api/feedback';
const DEFAULT_FEEDBACK_TIMEOUT_MS = 30000;

export interface FeedbackSubmission {
  answerId: string;
  verdict: Verdict;
  /** Free-text comment; buttons and reactions send none */
  comment?: string;
}

/**
 * JSON body of a feedback call
 */
export interface FeedbackWireRequest {
  like: boolean;
  dislike: boolean;
  feedback: string;
  interactionId: string;
}

export interface FeedbackClient {
  send(submission: FeedbackSubmission, signal?: AbortSignal): ResultAsync<void, QAError>;
}

export interface HttpFeedbackClientSettings {
  apiUrl: string;
  apiToken: string;
  timeoutMs?: number;
}

export function toFeedbackPayload({ answerId, verdict, comment }: FeedbackSubmission): FeedbackWireRequest {
  return {
    like: verdict === 'positive',
    dislike: verdict === 'negative',
    feedback: comment ?? '',
    interactionId: answerId,
  };
}

export class HttpFeedbackClient implements FeedbackClient {
  private readonly http: AxiosInstance;
  private readonly endpoint: string;
  private readonly timeoutMs: number;

  constructor(
    private readonly settings: HttpFeedbackClientSettings,
    http: AxiosInstance = axios.create()
  ) {
    this.http = http;
    this.endpoint = `${settings.apiUrl.replace(/\/+$/, '')}${FEEDBACK_PATH}`;
    this.timeoutMs = settings.timeoutMs ?? DEFAULT_FEEDBACK_TIMEOUT_MS;
  }

  send(submission: FeedbackSubmission, signal?: AbortSignal): ResultAsync<void, QAError> {
    return new ResultAsync(this.execute(submission, signal));
  }

  private async execute(submission: FeedbackSubmission, signal?: AbortSignal): Promise<Result<void, QAError>> {
    if (signal?.aborted) {
      return err(new OperationCancelledError('Feedback request cancelled before sending'));
    }

    const deadline = createDeadline(this.timeoutMs, signal);
    try {
      const response = await this.http.post(this.endpoint, toFeedbackPayload(submission), {
        headers: {
          Authorization: `Bearer ${this.settings.apiToken}`,
          'Content-Type': 'application/json',
        },
        signal: deadline.signal,
        validateStatus: () => true,
      });

      const statusError = errorForStatus(response.status, response.headers['retry-after']);
      return statusError ? err(statusError) : ok(undefined);
    } catch (error) {
      return err(errorForTransportFailure(error, deadline, this.timeoutMs));
    } finally {
      deadline.dispose();
    }
  }
}
