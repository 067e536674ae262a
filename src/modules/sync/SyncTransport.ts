
/**
 * Delivers a serialized batch. Resolves true only when the collector accepted it;
 * false, a rejection or a timeout all count as failure.
 */
export interface SyncTransport {
  send(payload: string, signal?: AbortSignal): Promise<boolean>;
}
