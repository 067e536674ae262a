import { SCREENING_CONFIG } from '../config/ScreeningConfig';
import { ScreeningError } from '../errors/ScreeningError';
import { debugSync } from '../../utils/debug';
import type { SyncTransport } from './SyncTransport';

export type FetchLike = (url: string, init: RequestInit) => Promise<Pick<Response, 'ok' | 'status'>>;

export interface HttpSyncTransportOptions {
  endpoint: string;
  timeoutMs?: number;
  headers?: Record<string, string>;
  fetchImpl?: FetchLike;
}

/**
 * POSTs the batch as JSON. 2xx means accepted; any other status is a rejection.
 */
export class HttpSyncTransport implements SyncTransport {
  private readonly endpoint: string;
  private readonly timeoutMs: number;
  private readonly headers: Record<string, string>;
  private readonly fetchImpl: FetchLike;

  constructor(options: HttpSyncTransportOptions) {
    this.endpoint = options.endpoint;
    this.timeoutMs = options.timeoutMs ?? SCREENING_CONFIG.SYNC.TRANSPORT_TIMEOUT_MS;
    this.headers = options.headers ?? {};
    this.fetchImpl = options.fetchImpl ?? ((url, init) => fetch(url, init));
  }

  public async send(payload: string, signal?: AbortSignal): Promise<boolean> {
    const controller = new AbortController();
    let timedOut = false;
    const timer = setTimeout(() => {
      timedOut = true;
      controller.abort();
    }, this.timeoutMs);
    const forwardAbort = () => controller.abort();

    if (signal?.aborted) {
      controller.abort();
    } else {
      signal?.addEventListener('abort', forwardAbort, { once: true });
    }

    try {
      const response = await this.fetchImpl(this.endpoint, {
        method: 'POST',
        headers: { 'Content-Type': 'application/json', ...this.headers },
        body: payload,
        signal: controller.signal
      });

      if (!response.ok) {
        console.warn(`HttpSyncTransport: collector rejected batch with status ${response.status}`);
        return false;
      }
      debugSync('batch accepted', { status: response.status });
      return true;
    } catch (error) {
      if (timedOut) {
        throw new ScreeningError('TRANSPORT_FAILURE', `Sync request timed out after ${this.timeoutMs}ms`, error);
      }
      throw error;
    } finally {
      clearTimeout(timer);
      signal?.removeEventListener('abort', forwardAbort);
    }
  }
}
