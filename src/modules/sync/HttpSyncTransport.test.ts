import { describe, it, expect, vi } from 'vitest';
import { rejectedCode } from '../../testing/fixtures';
import { HttpSyncTransport } from './HttpSyncTransport';

const ENDPOINT = 'https://collector.test/api/scans';

// Rejects only once aborted, like fetch on a stalled connection
const hangingFetch = vi.fn(
  (_url: string, init: RequestInit) =>
    new Promise<{ ok: boolean; status: number }>((_resolve, reject) => {
      const { signal } = init;
      if (signal?.aborted) {
        reject(new Error('request aborted'));
        return;
      }
      signal?.addEventListener('abort', () => reject(new Error('request aborted')));
    })
);

describe('HttpSyncTransport', () => {
  it('posts the payload as JSON', async () => {
    const fetchImpl = vi.fn(async (_url: string, _init: RequestInit) => ({ ok: true, status: 200 }));
    const transport = new HttpSyncTransport({
      endpoint: ENDPOINT,
      headers: { Authorization: 'Bearer test-token' },
      fetchImpl
    });

    expect(await transport.send('{"count":0}')).toBe(true);

    const [url, init] = fetchImpl.mock.calls[0];
    expect(url).toBe(ENDPOINT);
    expect(init.method).toBe('POST');
    expect(init.body).toBe('{"count":0}');
    expect(init.headers).toEqual({ 'Content-Type': 'application/json', Authorization: 'Bearer test-token' });
  });

  it('treats a non-2xx status as a rejection', async () => {
    const transport = new HttpSyncTransport({
      endpoint: ENDPOINT,
      fetchImpl: async () => ({ ok: false, status: 503 })
    });
    expect(await transport.send('{}')).toBe(false);
  });

  it('fails with TRANSPORT_FAILURE on timeout', async () => {
    const transport = new HttpSyncTransport({ endpoint: ENDPOINT, timeoutMs: 10, fetchImpl: hangingFetch });
    expect(await rejectedCode(transport.send('{}'))).toBe('TRANSPORT_FAILURE');
  });

  it('passes a caller abort through unchanged', async () => {
    const transport = new HttpSyncTransport({ endpoint: ENDPOINT, timeoutMs: 60_000, fetchImpl: hangingFetch });
    const controller = new AbortController();

    const sending = transport.send('{}', controller.signal);
    controller.abort();
    await expect(sending).rejects.toThrow('request aborted');

    await expect(transport.send('{}', controller.signal)).rejects.toThrow('request aborted');
  });

  it('propagates network errors', async () => {
    const transport = new HttpSyncTransport({
      endpoint: ENDPOINT,
      fetchImpl: async () => {
        throw new TypeError('fetch failed');
      }
    });
    expect(await rejectedCode(transport.send('{}'))).toBe('UNKNOWN');
  });
});
