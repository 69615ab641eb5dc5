/**
 * Shared key-value store with a mandatory time-to-live on every entry.
 * Single-key operations are atomic; there are no multi-key transactions.
 */
export type StoredValue = Buffer | string;

export interface KeyValueStore {
  get(key: string): Buffer | null;
  set(key: string, value: StoredValue, ttlSeconds: number): void;
  /**
   * Atomic read-modify-write of one live key. Returns the written value,
   * or null (without calling mutate) when the key is absent or expired.
   */
  update(key: string, ttlSeconds: number, mutate: (current: Buffer) => StoredValue): Buffer | null;
  delete(key: string): boolean;
  /** Live keys starting with the prefix */
  keys(prefix: string): string[];
  /** Removes expired entries, returns how many were dropped */
  purgeExpired(): number;
  /** Throws when the store cannot be reached */
  ping(): void;
}
