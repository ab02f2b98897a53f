/**
 * Unit tests for the readiness gate
 *
 * fetch is stubbed; sleep is injected so no test waits on a real timer.
 *
 * @module tests/unit/services/inference/readiness
 */

import { describe, it, expect, vi, afterEach } from 'vitest';
import { awaitReady, probeOnce, probeUrl } from '../../../../src/services/inference/readiness.js';
import { ServiceUnavailableError } from '../../../../src/services/errors.js';

function okResponse(): Response {
  return new Response('ok', { status: 200 });
}

function unavailableResponse(): Response {
  return new Response('loading', { status: 503, statusText: 'Service Unavailable' });
}

afterEach(() => {
  vi.unstubAllGlobals();
});

describe('probeUrl', () => {
  it('joins endpoint and path without doubling slashes', () => {
    expect(probeUrl('http://127.0.0.1:8000/')).toBe('http://127.0.0.1:8000/health');
    expect(probeUrl('http://127.0.0.1:8000', '/v1/models')).toBe('http://127.0.0.1:8000/v1/models');
  });
});

describe('probeOnce', () => {
  it('reports ok for a 2xx answer', async () => {
    const fetchMock = vi.fn().mockResolvedValue(okResponse());
    vi.stubGlobal('fetch', fetchMock);

    const result = await probeOnce('http://model:8000', { timeoutMs: 1000 });

    expect(result.ok).toBe(true);
    expect(result.status).toBe(200);
    expect(result.reason).toBeUndefined();
    expect(fetchMock).toHaveBeenCalledWith('http://model:8000/health', expect.objectContaining({ method: 'GET' }));
  });

  it('reports the status for a non-2xx answer', async () => {
    vi.stubGlobal('fetch', vi.fn().mockResolvedValue(unavailableResponse()));

    const result = await probeOnce('http://model:8000', { timeoutMs: 1000 });

    expect(result.ok).toBe(false);
    expect(result.status).toBe(503);
    expect(result.reason).toBe('HTTP 503 Service Unavailable');
  });

  it('never throws on a transport error', async () => {
    vi.stubGlobal('fetch', vi.fn().mockRejectedValue(new TypeError('fetch failed')));

    const result = await probeOnce('http://model:8000', { timeoutMs: 1000 });

    expect(result).toMatchObject({ ok: false, status: null, reason: 'fetch failed' });
  });

  it('reports a timeout when the probe is aborted', async () => {
    vi.stubGlobal(
      'fetch',
      vi.fn(
        (_url: string, init?: RequestInit) =>
          new Promise<Response>((_resolve, reject) => {
            init?.signal?.addEventListener('abort', () => reject(new Error('aborted')));
          })
      )
    );

    const result = await probeOnce('http://model:8000', { timeoutMs: 10 });

    expect(result.ok).toBe(false);
    expect(result.reason).toBe('probe timed out after 10ms');
  });
});

describe('awaitReady', () => {
  it('succeeds after exactly i attempts when the i-th probe is the first 2xx', async () => {
    const fetchMock = vi
      .fn()
      .mockRejectedValueOnce(new TypeError('connection refused'))
      .mockResolvedValueOnce(unavailableResponse())
      .mockResolvedValueOnce(okResponse());
    vi.stubGlobal('fetch', fetchMock);
    const sleep = vi.fn().mockResolvedValue(undefined);

    const report = await awaitReady('http://model:8000', {
      maxAttempts: 5,
      timeoutMs: 1000,
      intervalMs: 250,
      sleep,
    });

    expect(report.attempts).toBe(3);
    expect(report.endpoint).toBe('http://model:8000');
    expect(fetchMock).toHaveBeenCalledTimes(3);
    expect(sleep).toHaveBeenCalledTimes(2);
    expect(sleep).toHaveBeenCalledWith(250);
  });

  it('does not sleep when the first probe succeeds', async () => {
    vi.stubGlobal('fetch', vi.fn().mockResolvedValue(okResponse()));
    const sleep = vi.fn().mockResolvedValue(undefined);

    const report = await awaitReady('http://model:8000', {
      maxAttempts: 3,
      timeoutMs: 1000,
      intervalMs: 250,
      sleep,
    });

    expect(report.attempts).toBe(1);
    expect(sleep).not.toHaveBeenCalled();
  });

  it('fails after exactly maxAttempts probes, sleeping between each', async () => {
    const fetchMock = vi.fn().mockResolvedValue(unavailableResponse());
    vi.stubGlobal('fetch', fetchMock);
    const sleep = vi.fn().mockResolvedValue(undefined);

    const error = await awaitReady('http://model:8000', {
      maxAttempts: 4,
      timeoutMs: 1000,
      intervalMs: 100,
      serviceName: 'reasoning',
      sleep,
    }).catch((e: unknown) => e);

    expect(error).toBeInstanceOf(ServiceUnavailableError);
    if (!(error instanceof ServiceUnavailableError)) return;
    expect(error.category).toBe('SERVICE_UNAVAILABLE');
    expect(error.endpoint).toBe('http://model:8000');
    expect(error.attempts).toBe(4);
    expect(error.message).toBe(
      'reasoning server at http://model:8000 not ready after 4 attempts: HTTP 503 Service Unavailable'
    );
    expect(fetchMock).toHaveBeenCalledTimes(4);
    expect(sleep).toHaveBeenCalledTimes(3);
  });
});
