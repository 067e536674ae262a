
export interface KeyValueStore {
  get(key: string): Promise<string | null>;
  set(key: string, value: string): Promise<void>;
}

export class MemoryKeyValueStore implements KeyValueStore {
  private readonly values = new Map<string, string>();

  public async get(key: string): Promise<string | null> {
    return this.values.get(key) ?? null;
  }

  public async set(key: string, value: string): Promise<void> {
    this.values.set(key, value);
  }
}

/** Minimal slice of the Web Storage API (`localStorage`, `sessionStorage`). */
export interface WebStorageLike {
  getItem(key: string): string | null;
  setItem(key: string, value: string): void;
}

export class WebStorageKeyValueStore implements KeyValueStore {
  constructor(private readonly storage: WebStorageLike, private readonly prefix = 'pallor-screen:') {}

  public async get(key: string): Promise<string | null> {
    return this.storage.getItem(this.prefix + key);
  }

  public async set(key: string, value: string): Promise<void> {
    this.storage.setItem(this.prefix + key, value);
  }
}
