/**
 * Tests for ArchiveHttpClient against an in-process axios adapter
 */

import { FakeReply, createFakeArchive, instantRetry } from '../../__tests__/fakeArchive';
import { ArchiveHttpClient } from '../ArchiveHttpClient';
import { createLogger } from '../LoggingService';
import { NoopRateLimiter, RateLimiter } from '../RateLimiter';
import { HttpRequestError, RetryPolicy } from '../RetryPolicy';

class CountingLimiter implements RateLimiter {
  calls = 0;

  async acquire(): Promise<number> {
    this.calls++;
    return Date.now();
  }
}

const logger = createLogger('test');

function sequence(replies: FakeReply[]): () => FakeReply {
  let index = 0;
  return () => replies[Math.min(index++, replies.length - 1)];
}

async function failureOf(promise: Promise<unknown>): Promise<HttpRequestError> {
  try {
    await promise;
  } catch (error) {
    if (error instanceof HttpRequestError) {
      return error;
    }
    throw error;
  }
  throw new Error('Expected the request to fail');
}

describe('ArchiveHttpClient', () => {
  it('should return the body and content type of a 2xx response', async () => {
    const archive = createFakeArchive(() => ({
      data: 'User-agent: *',
      headers: { 'content-type': 'text/plain; charset=utf-8' },
    }));
    const http = new ArchiveHttpClient(new NoopRateLimiter(), logger, {
      client: archive.client,
      retryPolicy: instantRetry(),
    });

    const response = await http.get({ url: 'https://web.archive.org/x', responseType: 'text' });

    expect(response.status).toBe(200);
    expect(response.data).toBe('User-agent: *');
    expect(response.contentType).toBe('text/plain; charset=utf-8');
  });

  it('should leave the interceptors of an injected client alone', () => {
    const archive = createFakeArchive(() => ({ data: '[]' }));
    const use = jest.spyOn(archive.client.interceptors.response, 'use');

    new ArchiveHttpClient(new NoopRateLimiter(), logger, { client: archive.client });
    new ArchiveHttpClient(new NoopRateLimiter(), logger, { client: archive.client });

    expect(use).not.toHaveBeenCalled();
  });

  it('should pass query parameters through', async () => {
    const archive = createFakeArchive(() => ({ data: '[]' }));
    const http = new ArchiveHttpClient(new NoopRateLimiter(), logger, {
      client: archive.client,
      retryPolicy: instantRetry(),
    });

    await http.get({
      url: 'https://web.archive.org/cdx/search/cdx',
      params: new URLSearchParams({ url: 'example.com', output: 'json' }),
      responseType: 'text',
    });

    expect(archive.requests).toHaveLength(1);
    expect(archive.requests[0].params.get('url')).toBe('example.com');
    expect(archive.requests[0].params.get('output')).toBe('json');
  });

  it('should retry 5xx responses up to the attempt limit', async () => {
    const archive = createFakeArchive(() => ({ status: 503 }));
    const limiter = new CountingLimiter();
    const http = new ArchiveHttpClient(limiter, logger, { client: archive.client, retryPolicy: instantRetry() });

    const error = await failureOf(http.get({ url: 'https://web.archive.org/x', responseType: 'text' }));

    expect(error.status).toBe(503);
    expect(error.transient).toBe(true);
    expect(archive.requests).toHaveLength(3);
    expect(limiter.calls).toBe(3);
  });

  it('should not retry a 404', async () => {
    const archive = createFakeArchive(() => ({ status: 404 }));
    const http = new ArchiveHttpClient(new NoopRateLimiter(), logger, {
      client: archive.client,
      retryPolicy: instantRetry(),
    });

    const error = await failureOf(http.get({ url: 'https://web.archive.org/x', responseType: 'text' }));

    expect(error.status).toBe(404);
    expect(error.transient).toBe(false);
    expect(archive.requests).toHaveLength(1);
  });

  it('should honour Retry-After on a 429', async () => {
    const sleeps: number[] = [];
    const archive = createFakeArchive(
      sequence([{ status: 429, headers: { 'retry-after': '7' } }, { data: 'ok' }])
    );
    const http = new ArchiveHttpClient(new NoopRateLimiter(), logger, {
      client: archive.client,
      retryPolicy: new RetryPolicy({ attempts: 3, baseDelayMs: 0, maxDelayMs: 60000 }, async (ms) => {
        sleeps.push(ms);
      }),
    });

    const response = await http.get({ url: 'https://web.archive.org/x', responseType: 'text' });

    expect(response.data).toBe('ok');
    expect(sleeps).toEqual([7000]);
    expect(archive.requests).toHaveLength(2);
  });

  it('should retry dropped connections', async () => {
    const archive = createFakeArchive(sequence([{ networkError: 'socket hang up' }, { data: 'ok' }]));
    const http = new ArchiveHttpClient(new NoopRateLimiter(), logger, {
      client: archive.client,
      retryPolicy: instantRetry(),
    });

    const response = await http.get({ url: 'https://web.archive.org/x', responseType: 'text' });

    expect(response.data).toBe('ok');
    expect(archive.requests).toHaveLength(2);
  });

  it('should report a network failure without a status', async () => {
    const archive = createFakeArchive(() => ({ networkError: 'socket hang up' }));
    const http = new ArchiveHttpClient(new NoopRateLimiter(), logger, {
      client: archive.client,
      retryPolicy: instantRetry(2),
    });

    const error = await failureOf(http.get({ url: 'https://web.archive.org/x', responseType: 'text' }));

    expect(error.status).toBeUndefined();
    expect(error.code).toBe('ECONNRESET');
    expect(error.message).toBe('Network error for https://web.archive.org/x: socket hang up');
    expect(archive.requests).toHaveLength(2);
  });
});
