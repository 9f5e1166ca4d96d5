import { describe, it, expect } from 'vitest';
import axios, { AxiosError, type AxiosAdapter, type InternalAxiosRequestConfig } from 'axios';
import { HttpQAGateway, interpretResponse } from '../src/services/qa-gateway.js';
import { ContextRequestBuilder, serializeRequest } from '../src/services/context-request-builder.js';
import {
  MalformedResponseError,
  OperationCancelledError,
  RateLimitedError,
  ServiceError,
  TimeoutError,
  UnauthorizedError,
} from '../src/types/errors.js';

const request = new ContextRequestBuilder({ maxPayloadBytes: 200000 }).build(
  'What is the deploy process?',
  [{ authorDisplayName: 'Ada', text: 'we deploy on Fridays', timestamp: '1700000000.000001' }],
  { roomId: 'C1', assistants: ['docs'], customPrompt: null, contextSize: 50, updatedAt: null }
);

const settings = { apiUrl: 'https://qa.test/', apiToken: 'test-secret' };

function respondWith(status: number, body: string, headers: Record<string, string> = {}) {
  const seen: InternalAxiosRequestConfig[] = [];
  const adapter: AxiosAdapter = async (config) => {
    seen.push(config);
    return { data: body, status, statusText: '', headers, config };
  };
  return { gateway: new HttpQAGateway(settings, axios.create({ adapter })), seen };
}

// Never answers; rejects the way axios does once the request signal aborts
const hangingAdapter: AxiosAdapter = (config) =>
  new Promise<never>((_, reject) => {
    config.signal?.addEventListener?.('abort', () => reject(new axios.CanceledError('canceled')));
  });

describe('interpretResponse', () => {
  it('maps a valid body to an Answer', () => {
    const body = JSON.stringify({
      answer_text: 'Fridays.',
      answer_id: 'a1',
      sources: [{ title: 'Runbook', url: 'https://docs.test/runbook' }],
    });

    expect(interpretResponse(200, body)._unsafeUnwrap()).toEqual({
      answerId: 'a1',
      text: 'Fridays.',
      sources: [{ title: 'Runbook', url: 'https://docs.test/runbook' }],
    });
  });

  it('substitutes a placeholder for blank answer text', () => {
    const answer = interpretResponse(200, '{"answer_text":"  ","answer_id":"a1"}')._unsafeUnwrap();
    expect(answer.text).toBe('(No response from assistant)');
    expect(answer.sources).toEqual([]);
  });

  it.each([401, 403])('maps %s to Unauthorized', (status) => {
    expect(interpretResponse(status, 'nope')._unsafeUnwrapErr()).toBeInstanceOf(UnauthorizedError);
  });

  it('maps 429 to RateLimited with the retry hint', () => {
    const error = interpretResponse(429, '', '12')._unsafeUnwrapErr();
    expect(error).toBeInstanceOf(RateLimitedError);
    expect(error).toMatchObject({ kind: 'RateLimited', retryAfterSeconds: 12 });
  });

  it.each([500, 502, 404])('maps %s to ServiceError', (status) => {
    const error = interpretResponse(status, 'stack trace here')._unsafeUnwrapErr();
    expect(error).toBeInstanceOf(ServiceError);
    expect(error).toMatchObject({ statusCode: status });
  });

  it('maps an unparseable body to MalformedResponse', () => {
    expect(interpretResponse(200, '<html>')._unsafeUnwrapErr()).toBeInstanceOf(MalformedResponseError);
  });

  it('maps a body without an answer id to MalformedResponse', () => {
    expect(interpretResponse(200, '{"answer_text":"hi"}')._unsafeUnwrapErr()).toBeInstanceOf(
      MalformedResponseError
    );
  });
});

describe('HttpQAGateway', () => {
  it('posts the serialized request with the bearer token', async () => {
    const { gateway, seen } = respondWith(200, '{"answer_text":"Fridays.","answer_id":"a1"}');

    const result = await gateway.ask(request, { timeoutMs: 1000 });

    expect(result._unsafeUnwrap().answerId).toBe('a1');
    expect(seen).toHaveLength(1);
    expect(seen[0].method).toBe('post');
    expect(seen[0].url).toBe('https://qa.test/api/assistants/chat');
    expect(seen[0].headers.Authorization).toBe('Bearer test-secret');
    expect(seen[0].data).toBe(serializeRequest(request));
  });

  it('returns RateLimited for a 429 and makes a single attempt', async () => {
    const { gateway, seen } = respondWith(429, '{"error":"slow down"}', { 'retry-after': '30' });

    const error = (await gateway.ask(request, { timeoutMs: 1000 }))._unsafeUnwrapErr();

    expect(error).toBeInstanceOf(RateLimitedError);
    expect(error).toMatchObject({ retryAfterSeconds: 30 });
    expect(seen).toHaveLength(1);
  });

  it('returns MalformedResponse for a 200 with a broken body', async () => {
    const { gateway } = respondWith(200, '{"answer_text":');

    const error = (await gateway.ask(request, { timeoutMs: 1000 }))._unsafeUnwrapErr();

    expect(error).toBeInstanceOf(MalformedResponseError);
  });

  it('returns ServiceError when the service cannot be reached', async () => {
    const adapter: AxiosAdapter = async () => {
      throw new AxiosError('connect ECONNREFUSED', 'ECONNREFUSED');
    };
    const gateway = new HttpQAGateway(settings, axios.create({ adapter }));

    const error = (await gateway.ask(request, { timeoutMs: 1000 }))._unsafeUnwrapErr();

    expect(error).toBeInstanceOf(ServiceError);
    expect(error.message).toBe('QA service unreachable');
    expect(error.context).toEqual({ code: 'ECONNREFUSED' });
  });

  it('returns Timeout when the deadline passes', async () => {
    const gateway = new HttpQAGateway(settings, axios.create({ adapter: hangingAdapter }));

    const error = (await gateway.ask(request, { timeoutMs: 20 }))._unsafeUnwrapErr();

    expect(error).toBeInstanceOf(TimeoutError);
  });

  it('returns Cancelled when the caller aborts', async () => {
    const gateway = new HttpQAGateway(settings, axios.create({ adapter: hangingAdapter }));
    const controller = new AbortController();

    const pending = gateway.ask(request, { timeoutMs: 5000, signal: controller.signal });
    setTimeout(() => controller.abort(), 5);

    expect((await pending)._unsafeUnwrapErr()).toBeInstanceOf(OperationCancelledError);
  });

  it('does not send anything when the caller already aborted', async () => {
    const { gateway, seen } = respondWith(200, '{"answer_text":"x","answer_id":"a1"}');
    const controller = new AbortController();
    controller.abort();

    const error = (await gateway.ask(request, { timeoutMs: 1000, signal: controller.signal }))._unsafeUnwrapErr();

    expect(error).toBeInstanceOf(OperationCancelledError);
    expect(seen).toHaveLength(0);
  });
});
