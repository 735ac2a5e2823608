import type { Comparator, Entry, SortOption } from '../../common/Types';

/**
 * Array.prototype.sort is stable, so entries that compare equal keep the
 * order of the previous option (or of the directory listing).
 */
export function sortWith(comparator: Comparator<Entry>): SortOption {
  return (entries) => {
    entries.sort(comparator);
  };
}

/** UTF-8 byte order, which is also code point order. */
export const compareByKey: Comparator<Entry> = (a, b) =>
  Buffer.compare(Buffer.from(a.key, 'utf8'), Buffer.from(b.key, 'utf8'));

export const compareByValue: Comparator<Entry> = (a, b) => Buffer.compare(a.value, b.value);

export const compareByExpiry: Comparator<Entry> = (a, b) => a.expiry.getTime() - b.expiry.getTime();

export const sortByKey: SortOption = sortWith(compareByKey);

export const sortByValue: SortOption = sortWith(compareByValue);

export const sortByExpiry: SortOption = sortWith(compareByExpiry);
