/**
 * Key-Value Store
 *
 * The external (tier-2) store as consumed by the response cache.
 * Implementations report unavailability through `connect()` returning
 * false; other calls may reject and are handled by the caller.
 */

export interface KeyValueStore {
  /** Establish or verify the connection. Resolves false when unavailable. */
  connect(): Promise<boolean>;
  get(key: string): Promise<Buffer | null>;
  set(key: string, value: Buffer, ttlSeconds: number): Promise<void>;
  /** @returns the number of keys removed */
  delete(...keys: string[]): Promise<number>;
  /** Enumerate keys matching a Redis-style glob */
  scanKeys(pattern: string): Promise<string[]>;
  info(): Promise<Record<string, string>>;
  close(): Promise<void>;
}
