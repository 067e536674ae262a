import { SCREENING_CONFIG } from '../config/ScreeningConfig';
import type { KeyValueStore } from '../storage/key-value-store';

/**
 * Reads the per-device anonymous identifier, creating and persisting it on first use.
 * It is random (UUID v4) and never derived from patient or hardware identifiers.
 * Call once at startup and pass the value to the sync layer.
 */
export async function loadAnonymousDeviceId(
  store: KeyValueStore,
  generate: () => string = () => crypto.randomUUID()
): Promise<string> {
  const existing = await store.get(SCREENING_CONFIG.SYNC.DEVICE_ID_KEY);
  if (existing) {
    return existing;
  }

  const deviceId = generate();
  await store.set(SCREENING_CONFIG.SYNC.DEVICE_ID_KEY, deviceId);
  console.log('loadAnonymousDeviceId: generated new anonymous device id');
  return deviceId;
}
