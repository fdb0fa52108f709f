import { KeyValueStore } from '@libs/core';

export class InMemoryKeyValueStore implements KeyValueStore {
  readonly entries = new Map<string, { value: string; ttlSeconds: number }>();
  failing = false;

  async get(key: string): Promise<string | null> {
    if (this.failing) {
      throw new Error('store offline');
    }
    return this.entries.get(key)?.value ?? null;
  }

  async set(key: string, value: string, ttlSeconds: number): Promise<void> {
    if (this.failing) {
      throw new Error('store offline');
    }
    this.entries.set(key, { value, ttlSeconds });
  }

  async ping(): Promise<boolean> {
    return !this.failing;
  }
}
