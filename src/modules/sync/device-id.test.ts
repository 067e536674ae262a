import { describe, it, expect, vi } from 'vitest';
import { MemoryKeyValueStore } from '../storage/key-value-store';
import { loadAnonymousDeviceId } from './device-id';

describe('loadAnonymousDeviceId', () => {
  it('generates and persists an id on first use', async () => {
    const store = new MemoryKeyValueStore();
    const generate = vi.fn(() => 'device-test-1');

    expect(await loadAnonymousDeviceId(store, generate)).toBe('device-test-1');
    expect(await store.get('anonymous_device_id')).toBe('device-test-1');
  });

  it('reuses the stored id afterwards', async () => {
    const store = new MemoryKeyValueStore();
    await store.set('anonymous_device_id', 'device-existing');
    const generate = vi.fn(() => 'device-new');

    expect(await loadAnonymousDeviceId(store, generate)).toBe('device-existing');
    expect(generate).not.toHaveBeenCalled();
  });

  it('defaults to a random UUID', async () => {
    const id = await loadAnonymousDeviceId(new MemoryKeyValueStore());
    expect(id).toMatch(/^[0-9a-f]{8}-[0-9a-f]{4}-4[0-9a-f]{3}-[89ab][0-9a-f]{3}-[0-9a-f]{12}$/);
  });
});
