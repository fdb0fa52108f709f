export const KEY_VALUE_STORE = Symbol('KEY_VALUE_STORE');

export interface KeyValueStore {
  get(key: string): Promise<string | null>;
  set(key: string, value: string, ttlSeconds: number): Promise<void>;
  ping(): Promise<boolean>;
}
