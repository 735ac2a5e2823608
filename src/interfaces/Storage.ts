import type { Entry, SortOption } from '../common/Types';

export type EntryValue = Buffer | Uint8Array | string;

export interface IDiskCache {
  readonly dir: string;

  filename(key: string): string;

  filepath(key: string): string;

  /**
   * Write an entry, replacing any existing one for the same key.
   *
   * @param ttlMs - may be negative, which stores an already-expired entry
   */
  put(key: string, value: EntryValue, ttlMs: number): Promise<void>;

  /** Raw entry, expired or not. */
  read(key: string): Promise<Entry>;

  /** Value of a live entry; throws ExpiredError once past expiry. */
  get(key: string): Promise<Buffer>;

  has(key: string): Promise<boolean>;

  /** Stored expiry, or the zero timestamp when the entry cannot be read. */
  expiry(key: string): Promise<Date>;

  lookupExpiry(key: string): Promise<Date | undefined>;

  isExpired(key: string): Promise<boolean>;

  remove(key: string): Promise<void>;

  list(...options: SortOption[]): Promise<Entry[]>;

  /** @returns number of files deleted */
  flush(): Promise<number>;

  /** @returns number of expired entries deleted */
  clean(): Promise<number>;

  delete(): Promise<void>;
}
