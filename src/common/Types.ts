/**
 * Common type definitions for the disk cache.
 * These types are shared by the store, the sort options and the CLI.
 */

export interface Entry {
  readonly key: string;
  readonly value: Buffer;
  readonly expiry: Date;
}

export type Comparator<T> = (a: T, b: T) => number;

/**
 * Sorts a listing in place. Options passed to `list` run in order.
 */
export type SortOption = (entries: Entry[]) => void;

/** Milliseconds since the epoch. */
export type Clock = () => number;
