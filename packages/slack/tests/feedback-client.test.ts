import { describe, it, expect } from 'vitest';
import axios, { AxiosError, type AxiosAdapter, type InternalAxiosRequestConfig } from 'axios';
import { HttpFeedbackClient, toFeedbackPayload } from '../src/services/feedback-client.js';
import {
  OperationCancelledError,
  RateLimitedError,
  ServiceError,
  TimeoutError,
  UnauthorizedError,
} from '../src/types/errors.js';

const settings = { apiUrl: 'https://qa.test/', apiToken: 'test-secret' };

function respondWith(status: number, headers: Record<string, string> = {}) {
  const seen: InternalAxiosRequestConfig[] = [];
  const adapter: AxiosAdapter = async (config) => {
    seen.push(config);
    return { data: '', status, statusText: '', headers, config };
  };
  return { client: new HttpFeedbackClient(settings, axios.create({ adapter })), seen };
}

const hangingAdapter: AxiosAdapter = (config) =>
  new Promise<never>((_, reject) => {
    config.signal?.addEventListener?.('abort', () => reject(new axios.CanceledError('canceled')));
  });

describe('toFeedbackPayload', () => {
  it('maps a positive vote to like', () => {
    expect(toFeedbackPayload({ answerId: 'a1', verdict: 'positive' })).toEqual({
      like: true,
      dislike: false,
      feedback: '',
      interactionId: 'a1',
    });
  });

  it('maps a negative vote to dislike and keeps a comment', () => {
    expect(toFeedbackPayload({ answerId: 'a2', verdict: 'negative', comment: 'outdated' })).toEqual({
      like: false,
      dislike: true,
      feedback: 'outdated',
      interactionId: 'a2',
    });
  });
});

describe('HttpFeedbackClient', () => {
  it('posts the vote to the feedback endpoint with the bearer token', async () => {
    const { client, seen } = respondWith(200);

    const result = await client.send({ answerId: 'a1', verdict: 'positive' });

    expect(result.isOk()).toBe(true);
    expect(seen).toHaveLength(1);
    expect(seen[0].method).toBe('post');
    expect(seen[0].url).toBe('https://qa.test/api/feedback');
    expect(seen[0].headers.Authorization).toBe('Bearer test-secret');
    expect(seen[0].data).toBe('{"like":true,"dislike":false,"feedback":"","interactionId":"a1"}');
  });

  it('maps a rejected token to Unauthorized', async () => {
    const { client } = respondWith(401);

    const error = (await client.send({ answerId: 'a1', verdict: 'negative' }))._unsafeUnwrapErr();

    expect(error).toBeInstanceOf(UnauthorizedError);
  });

  it('returns RateLimited for a 429 and makes a single attempt', async () => {
    const { client, seen } = respondWith(429, { 'retry-after': '5' });

    const error = (await client.send({ answerId: 'a1', verdict: 'positive' }))._unsafeUnwrapErr();

    expect(error).toBeInstanceOf(RateLimitedError);
    expect(error).toMatchObject({ retryAfterSeconds: 5 });
    expect(seen).toHaveLength(1);
  });

  it('maps a server error to ServiceError with its status', async () => {
    const { client } = respondWith(503);

    const error = (await client.send({ answerId: 'a1', verdict: 'positive' }))._unsafeUnwrapErr();

    expect(error).toBeInstanceOf(ServiceError);
    expect(error).toMatchObject({ statusCode: 503 });
  });

  it('returns ServiceError when the service cannot be reached', async () => {
    const adapter: AxiosAdapter = async () => {
      throw new AxiosError('connect ECONNREFUSED', 'ECONNREFUSED');
    };
    const client = new HttpFeedbackClient(settings, axios.create({ adapter }));

    const error = (await client.send({ answerId: 'a1', verdict: 'positive' }))._unsafeUnwrapErr();

    expect(error).toBeInstanceOf(ServiceError);
    expect(error.context).toEqual({ code: 'ECONNREFUSED' });
  });

  it('returns Timeout when its deadline passes', async () => {
    const client = new HttpFeedbackClient({ ...settings, timeoutMs: 20 }, axios.create({ adapter: hangingAdapter }));

    const error = (await client.send({ answerId: 'a1', verdict: 'positive' }))._unsafeUnwrapErr();

    expect(error).toBeInstanceOf(TimeoutError);
  });

  it('sends nothing when the caller already aborted', async () => {
    const { client, seen } = respondWith(200);
    const controller = new AbortController();
    controller.abort();

    const error = (await client.send({ answerId: 'a1', verdict: 'positive' }, controller.signal))._unsafeUnwrapErr();

    expect(error).toBeInstanceOf(OperationCancelledError);
    expect(seen).toHaveLength(0);
  });
});
